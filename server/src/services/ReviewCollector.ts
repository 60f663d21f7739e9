import type { PlaceDetails, PlacesProvider, ProviderReview } from '../adapters/PlacesProvider';
import type { Place, RawReview } from '../types/search';
import { errorMessage } from '../errors';
import { isoFromUnixSeconds } from '../utils/time';

export type PlaceReviewsOutcome =
  | { status: 'collected'; place: Place; reviews: RawReview[] }
  | { status: 'unavailable'; place: Place; error: unknown };

/**
 * Pulls place details (address, category, provider rating and the handful of
 * recent reviews the provider exposes) for places that survived the radius
 * filter. Never throws: a failed details call comes back as `unavailable`.
 */
export class ReviewCollector {
  constructor(private readonly provider: PlacesProvider) {}

  async collect(place: Place, signal?: AbortSignal): Promise<PlaceReviewsOutcome> {
    let details: PlaceDetails;
    try {
      details = await this.provider.placeDetails(place.placeId, signal);
    } catch (error) {
      console.warn(`ReviewCollector: details for ${place.placeId} unavailable: ${errorMessage(error)}`);
      return { status: 'unavailable', place, error };
    }

    const enriched = enrichPlace(place, details);
    const reviews: RawReview[] = [];
    for (const review of details.reviews) {
      const raw = toRawReview(enriched, review);
      if (raw) reviews.push(raw);
    }

    return { status: 'collected', place: enriched, reviews };
  }

  /** Outcomes come back in input order; concurrency is bounded by the provider's gate. */
  collectAll(places: readonly Place[], signal?: AbortSignal): Promise<PlaceReviewsOutcome[]> {
    return Promise.all(places.map((place) => this.collect(place, signal)));
  }
}

/** Discovery coordinates are kept so the radius filter's verdict still holds. */
function enrichPlace(place: Place, details: PlaceDetails): Place {
  return {
    ...place,
    name: details.name ?? place.name,
    address: details.formattedAddress ?? place.address,
    category: details.types[0] ?? place.category,
    components: details.components,
    providerRating: details.rating,
    providerRatingCount: details.ratingCount,
  };
}

function toRawReview(place: Place, review: ProviderReview): RawReview | null {
  const { rating } = review;
  if (rating === null || !Number.isInteger(rating) || rating < 1 || rating > 5) {
    return null;
  }

  const publishedAt = isoFromUnixSeconds(review.time);
  return {
    placeId: place.placeId,
    placeName: place.name,
    address: place.address,
    components: place.components,
    rating,
    text: (review.text ?? '').trim(),
    author: review.author,
    // a timestamp outside the Date range is dropped, not the review
    unixTime: publishedAt === null ? null : review.time,
    publishedAt,
    relativeTime: review.relativeTime,
  };
}
