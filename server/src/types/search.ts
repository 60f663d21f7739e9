import type { Coordinate } from '../geo/distance';
import type { Tile } from '../geo/tileGenerator';

export type StrategyKind = 'brand' | 'geo';

export interface SearchQuery {
  center: Coordinate;
  /** Miles, always > 0 */
  radiusMiles: number;
  strategy: StrategyKind;
  keyword?: string;
  /** Resolved address, used to phrase text queries */
  locationLabel?: string;
}

export interface AddressComponents {
  city: string | null;
  state: string | null;
  zip: string | null;
  country: string | null;
}

export interface ResolvedAddress {
  center: Coordinate;
  formattedAddress: string;
  components: AddressComponents;
}

export interface CandidateSource {
  strategy: StrategyKind;
  /** Set for GeoCoverage candidates */
  tileId?: string;
  page: number;
}

export interface PlaceCandidate {
  placeId: string;
  name: string;
  lat: number;
  lng: number;
  address: string | null;
  types: string[];
  /** Computed from the query center, never taken from the provider */
  distanceMiles: number;
  source: CandidateSource;
}

export interface Place extends PlaceCandidate {
  category: string | null;
  components: AddressComponents | null;
  providerRating: number | null;
  providerRatingCount: number | null;
}

export type SentimentLabel = 'Positive' | 'Neutral' | 'Negative';

export type ReviewIssue = 'food' | 'service' | 'cleanliness' | 'price';

export interface RawReview {
  readonly placeId: string;
  readonly placeName: string;
  readonly address: string | null;
  readonly components: AddressComponents | null;
  /** Integer 1–5 */
  readonly rating: number;
  readonly text: string;
  readonly author: string | null;
  /** Seconds since epoch */
  readonly unixTime: number | null;
  /** ISO-8601, UTC */
  readonly publishedAt: string | null;
  readonly relativeTime: string | null;
}

export interface Review extends RawReview {
  readonly sentiment: SentimentLabel;
  readonly issues: readonly ReviewIssue[];
}

export type RatingDistribution = Record<1 | 2 | 3 | 4 | 5, number>;

export interface SentimentCounts {
  positive: number;
  neutral: number;
  negative: number;
}

export interface AnalyticRow {
  placeId: string;
  name: string;
  address: string | null;
  lat: number;
  lng: number;
  distanceMiles: number;
  reviewCount: number;
  meanRating: number | null;
  ratingDistribution: RatingDistribution;
  sentimentCounts: SentimentCounts;
  negativeShare: number | null;
  /** `YYYY-MM` → review count, keys ascending */
  monthlyCounts: Record<string, number>;
  highNegative: boolean;
  detailsAvailable: boolean;
}

export interface PlaceCount {
  placeId: string;
  name: string;
  count: number;
}

export interface NearestPlace {
  placeId: string;
  name: string;
  address: string | null;
  distanceMiles: number;
}

export interface CrossPlaceInsights {
  placeCount: number;
  reviewCount: number;
  meanRating: number | null;
  uniqueAuthors: number;
  ratingDistribution: RatingDistribution;
  sentimentCounts: SentimentCounts;
  monthlyCounts: Record<string, number>;
  issueCounts: Record<ReviewIssue, number>;
  topNegativePlaces: PlaceCount[];
  nearestPlaces: NearestPlace[];
}

export type WarningCode =
  | 'COVERAGE_INCOMPLETE'
  | 'QUOTA_EXCEEDED'
  | 'RUN_CANCELLED'
  | 'DETAILS_UNAVAILABLE'
  | 'NO_RESULTS_IN_RADIUS'
  | 'LARGE_RADIUS';

export interface RunWarning {
  code: WarningCode;
  message: string;
  /** Tile, page or place the warning is about */
  unit?: string;
}

export interface RunResult {
  query: SearchQuery;
  location: ResolvedAddress;
  tiles: Tile[];
  places: Place[];
  reviews: Review[];
  rows: AnalyticRow[];
  insights: CrossPlaceInsights;
  warnings: RunWarning[];
  /** False when any warning means results may be incomplete */
  complete: boolean;
}
