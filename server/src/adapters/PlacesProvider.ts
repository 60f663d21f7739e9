/**
 * PlacesProvider — the seam between the search pipeline and a place-data vendor.
 *
 * Google ships at MVP. Every component that issues requests receives the same
 * provider instance, so all of them share one request gate and quota.
 */

import type { Coordinate } from '../geo/distance';
import type { AddressComponents, ResolvedAddress } from '../types/search';

export interface PlaceSummary {
  placeId: string;
  name: string;
  location: Coordinate;
  /** Vicinity or formatted address, whichever the endpoint returns */
  address: string | null;
  types: string[];
}

export interface SearchPage {
  results: PlaceSummary[];
  /** Absent on the last page */
  nextPageToken?: string;
}

export interface TextSearchRequest {
  query: string;
  location?: Coordinate;
  /** Bias radius in metres */
  radiusMetres?: number;
  pageToken?: string;
}

export interface NearbySearchRequest {
  location: Coordinate;
  /** Metres, never above the provider's cap */
  radiusMetres: number;
  keyword?: string;
  pageToken?: string;
}

export interface ProviderReview {
  rating: number | null;
  text: string | null;
  author: string | null;
  /** Seconds since epoch */
  time: number | null;
  relativeTime: string | null;
}

export interface PlaceDetails {
  placeId: string;
  name: string | null;
  formattedAddress: string | null;
  components: AddressComponents;
  types: string[];
  rating: number | null;
  ratingCount: number | null;
  reviews: ProviderReview[];
}

export interface PlacesProvider {
  /** Human-readable identifier, e.g. "google" */
  readonly providerId: string;
  /** Largest radius a single nearby call accepts, in metres */
  readonly maxNearbyRadiusMetres: number;

  geocode(address: string, signal?: AbortSignal): Promise<ResolvedAddress>;
  textSearch(request: TextSearchRequest, signal?: AbortSignal): Promise<SearchPage>;
  nearbySearch(request: NearbySearchRequest, signal?: AbortSignal): Promise<SearchPage>;
  placeDetails(placeId: string, signal?: AbortSignal): Promise<PlaceDetails>;
}
