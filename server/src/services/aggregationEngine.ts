import type {
  AnalyticRow,
  CrossPlaceInsights,
  Place,
  RatingDistribution,
  Review,
  ReviewIssue,
  SentimentCounts,
  SentimentLabel,
} from '../types/search';
import { isoFromUnixSeconds } from '../utils/time';

export interface AggregationOptions {
  /** Negative share at or above which a place is flagged */
  negativeShareThreshold: number;
  /** Fewer reviews than this never raise the flag */
  minReviewsForFlag: number;
  /** Places whose details call failed; their rows report detailsAvailable=false */
  detailsUnavailable?: ReadonlySet<string>;
}

export const DEFAULT_AGGREGATION_OPTIONS: AggregationOptions = {
  negativeShareThreshold: 0.3,
  minReviewsForFlag: 3,
};

const TOP_LIST_SIZE = 10;
const RATING_KEYS = [1, 2, 3, 4, 5] as const;

const SENTIMENT_KEY: Record<SentimentLabel, keyof SentimentCounts> = {
  Positive: 'positive',
  Neutral: 'neutral',
  Negative: 'negative',
};

/**
 * One row per place, in place order. Places without reviews still get a row
 * (all counts zero, mean and share null, never flagged). Reviews for places
 * not in the list are ignored.
 */
export function aggregate(
  places: readonly Place[],
  reviews: readonly Review[],
  options: Partial<AggregationOptions> = {},
): AnalyticRow[] {
  const opts: AggregationOptions = { ...DEFAULT_AGGREGATION_OPTIONS, ...options };
  const byPlace = new Map<string, Review[]>();
  for (const place of places) byPlace.set(place.placeId, []);
  for (const review of reviews) byPlace.get(review.placeId)?.push(review);

  return places.map((place) => buildRow(place, byPlace.get(place.placeId) ?? [], opts));
}

function buildRow(place: Place, reviews: readonly Review[], opts: AggregationOptions): AnalyticRow {
  const ratingDistribution = emptyDistribution();
  const sentimentCounts: SentimentCounts = { positive: 0, neutral: 0, negative: 0 };
  let ratingSum = 0;

  for (const review of reviews) {
    if (isRatingKey(review.rating)) ratingDistribution[review.rating] += 1;
    ratingSum += review.rating;
    sentimentCounts[SENTIMENT_KEY[review.sentiment]] += 1;
  }

  const reviewCount = reviews.length;
  const negativeShare = reviewCount > 0 ? sentimentCounts.negative / reviewCount : null;

  return {
    placeId: place.placeId,
    name: place.name,
    address: place.address,
    lat: place.lat,
    lng: place.lng,
    distanceMiles: place.distanceMiles,
    reviewCount,
    meanRating: reviewCount > 0 ? ratingSum / reviewCount : null,
    ratingDistribution,
    sentimentCounts,
    negativeShare,
    monthlyCounts: countByMonth(reviews),
    highNegative:
      reviewCount >= opts.minReviewsForFlag && negativeShare !== null && negativeShare >= opts.negativeShareThreshold,
    detailsAvailable: !(opts.detailsUnavailable?.has(place.placeId) ?? false),
  };
}

/** Totals across every row of a run. */
export function summarize(rows: readonly AnalyticRow[], reviews: readonly Review[]): CrossPlaceInsights {
  const inRows = new Set(rows.map((r) => r.placeId));
  const scoped = reviews.filter((r) => inRows.has(r.placeId));

  const ratingDistribution = emptyDistribution();
  const sentimentCounts: SentimentCounts = { positive: 0, neutral: 0, negative: 0 };
  for (const row of rows) {
    for (const key of RATING_KEYS) ratingDistribution[key] += row.ratingDistribution[key];
    sentimentCounts.positive += row.sentimentCounts.positive;
    sentimentCounts.neutral += row.sentimentCounts.neutral;
    sentimentCounts.negative += row.sentimentCounts.negative;
  }

  const issueCounts: Record<ReviewIssue, number> = { food: 0, service: 0, cleanliness: 0, price: 0 };
  const authors = new Set<string>();
  let ratingSum = 0;
  for (const review of scoped) {
    ratingSum += review.rating;
    if (review.author) authors.add(review.author);
    for (const issue of review.issues) issueCounts[issue] += 1;
  }

  const topNegativePlaces = rows
    .filter((r) => r.sentimentCounts.negative > 0)
    .sort((a, b) => b.sentimentCounts.negative - a.sentimentCounts.negative)
    .slice(0, TOP_LIST_SIZE)
    .map((r) => ({ placeId: r.placeId, name: r.name, count: r.sentimentCounts.negative }));

  const nearestPlaces = [...rows]
    .sort((a, b) => a.distanceMiles - b.distanceMiles)
    .slice(0, TOP_LIST_SIZE)
    .map((r) => ({ placeId: r.placeId, name: r.name, address: r.address, distanceMiles: r.distanceMiles }));

  return {
    placeCount: rows.length,
    reviewCount: scoped.length,
    meanRating: scoped.length > 0 ? ratingSum / scoped.length : null,
    uniqueAuthors: authors.size,
    ratingDistribution,
    sentimentCounts,
    monthlyCounts: countByMonth(scoped),
    issueCounts,
    topNegativePlaces,
    nearestPlaces,
  };
}

function emptyDistribution(): RatingDistribution {
  return { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
}

function isRatingKey(value: number): value is 1 | 2 | 3 | 4 | 5 {
  return value === 1 || value === 2 || value === 3 || value === 4 || value === 5;
}

/** UTC `YYYY-MM` buckets; reviews without a usable time are left out. */
function countByMonth(reviews: readonly Review[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const review of reviews) {
    const iso = isoFromUnixSeconds(review.unixTime);
    if (iso === null) continue;
    const month = iso.slice(0, 7);
    counts.set(month, (counts.get(month) ?? 0) + 1);
  }

  const sorted: Record<string, number> = {};
  for (const month of [...counts.keys()].sort()) {
    sorted[month] = counts.get(month) ?? 0;
  }
  return sorted;
}
