import type { Place, PlaceCandidate, Review, ReviewIssue, SentimentLabel } from '../types/search';
import type { SearchPipelineOptions } from '../services/SearchPipeline';
import { isoFromUnixSeconds } from '../utils/time';

/** Small tiles and no page-token wait. */
export const FAST_PIPELINE_OPTIONS: SearchPipelineOptions = {
  geo: { tileRadiusMiles: 2, overlap: 0.15, maxPagesPerTile: 3, pageDelayMs: 0 },
  brand: { maxPages: 3, pageDelayMs: 0 },
  negativeShareThreshold: 0.3,
  minReviewsForFlag: 3,
  largeRadiusWarningMiles: 25,
};

export function candidate(placeId: string, overrides: Partial<PlaceCandidate> = {}): PlaceCandidate {
  return {
    placeId,
    name: `Place ${placeId}`,
    lat: 33.0198,
    lng: -96.6989,
    address: `${placeId} address`,
    types: ['restaurant', 'food'],
    distanceMiles: 0,
    source: { strategy: 'geo', tileId: 'tile-0', page: 1 },
    ...overrides,
  };
}

export function place(placeId: string, overrides: Partial<Place> = {}): Place {
  return {
    ...candidate(placeId),
    category: 'restaurant',
    components: { city: 'Plano', state: 'TX', zip: '75024', country: 'US' },
    providerRating: null,
    providerRatingCount: null,
    ...overrides,
  };
}

export interface ReviewFields {
  rating: number;
  sentiment: SentimentLabel;
  issues?: ReviewIssue[];
  author?: string | null;
  unixTime?: number | null;
  text?: string;
}

export function review(placeId: string, fields: ReviewFields): Review {
  const unixTime = fields.unixTime ?? null;
  return {
    placeId,
    placeName: `Place ${placeId}`,
    address: `${placeId} address`,
    components: { city: 'Plano', state: 'TX', zip: '75024', country: 'US' },
    rating: fields.rating,
    text: fields.text ?? '',
    author: fields.author === undefined ? 'Reviewer' : fields.author,
    unixTime,
    publishedAt: isoFromUnixSeconds(unixTime),
    relativeTime: null,
    sentiment: fields.sentiment,
    issues: fields.issues ?? [],
  };
}

/** Seconds since epoch for a UTC calendar date. */
export function utc(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): number {
  return Date.UTC(year, month - 1, day, hour, minute, second) / 1000;
}
