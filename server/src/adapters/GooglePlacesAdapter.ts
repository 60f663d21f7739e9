import axios, { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';
import axiosRetry from 'axios-retry';
import {
  NearbySearchRequest,
  PlaceDetails,
  PlacesProvider,
  PlaceSummary,
  ProviderReview,
  SearchPage,
  TextSearchRequest,
} from './PlacesProvider';
import { RateLimitGate } from '../services/RateLimitGate';
import { isValidCoordinate } from '../geo/distance';
import type { AddressComponents, ResolvedAddress } from '../types/search';
import {
  GeocodeFailure,
  PlaceDetailsUnavailable,
  ProviderQuotaExceeded,
  ProviderRequestError,
  ProviderTransientError,
  RunCancelled,
} from '../errors';
import { env } from '../config/env';

/** Raw shapes returned by the Maps web services; every field may be missing. */
interface GoogleLatLng {
  lat?: number;
  lng?: number;
}

interface GoogleAddressComponent {
  long_name?: string;
  short_name?: string;
  types?: string[];
}

interface GooglePlaceResult {
  place_id?: string;
  name?: string;
  vicinity?: string;
  formatted_address?: string;
  types?: string[];
  geometry?: { location?: GoogleLatLng };
}

interface GoogleReview {
  author_name?: string;
  rating?: number;
  text?: string;
  time?: number;
  relative_time_description?: string;
}

interface GoogleEnvelope {
  status?: string;
  error_message?: string;
}

interface GoogleGeocodeResponse extends GoogleEnvelope {
  results?: Array<{
    formatted_address?: string;
    address_components?: GoogleAddressComponent[];
    geometry?: { location?: GoogleLatLng };
  }>;
}

interface GoogleSearchResponse extends GoogleEnvelope {
  results?: GooglePlaceResult[];
  next_page_token?: string;
}

interface GoogleDetailsResponse extends GoogleEnvelope {
  result?: GooglePlaceResult & {
    address_components?: GoogleAddressComponent[];
    rating?: number;
    user_ratings_total?: number;
    reviews?: GoogleReview[];
  };
}

/** AxiosError code for an HTTP 200 whose body reports UNKNOWN_ERROR. */
const PROVIDER_UNKNOWN_ERROR = 'ERR_PROVIDER_UNKNOWN';

type QueryParams = Record<string, string | number | undefined>;

const DETAILS_FIELDS = [
  'place_id',
  'name',
  'rating',
  'user_ratings_total',
  'reviews',
  'formatted_address',
  'address_component',
  'geometry',
  'type',
].join(',');

export interface GooglePlacesAdapterOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  maxNearbyRadiusMetres: number;
  gate: RateLimitGate;
  /** Replaces the HTTP transport; used by tests */
  httpAdapter?: AxiosAdapter;
}

export class GooglePlacesAdapter implements PlacesProvider {
  readonly providerId = 'google';
  readonly maxNearbyRadiusMetres: number;
  private readonly client: AxiosInstance;
  private readonly gate: RateLimitGate;
  private readonly apiKey: string;
  private retries = 0;

  constructor(options: Partial<GooglePlacesAdapterOptions> = {}) {
    const retryBaseDelayMs = options.retryBaseDelayMs ?? env.PROVIDER_RETRY_BASE_DELAY_MS;
    const retryMaxDelayMs = options.retryMaxDelayMs ?? env.PROVIDER_RETRY_MAX_DELAY_MS;

    this.apiKey = options.apiKey ?? env.GOOGLE_MAPS_API_KEY;
    this.maxNearbyRadiusMetres = options.maxNearbyRadiusMetres ?? env.NEARBY_MAX_RADIUS_METRES;
    this.gate = options.gate ?? new RateLimitGate();
    this.client = axios.create({
      baseURL: options.baseUrl ?? env.GOOGLE_MAPS_BASE_URL,
      timeout: options.timeoutMs ?? env.PROVIDER_TIMEOUT_MS,
      headers: { Accept: 'application/json' },
      adapter: options.httpAdapter,
    });

    // Retries re-send outside the gate queue; none may go out while it is closed.
    this.client.interceptors.request.use((config) => {
      if (this.gate.isHalted) {
        throw new ProviderQuotaExceeded(`${config.url ?? 'request'} not re-sent: request gate is closed`);
      }
      return config;
    });
    // Registered before axios-retry so the rejection reaches its retry handler.
    this.client.interceptors.response.use((response) => {
      if (isUnknownErrorBody(response.data)) {
        throw new AxiosError(
          `${response.config.url ?? 'request'} answered status=UNKNOWN_ERROR`,
          PROVIDER_UNKNOWN_ERROR,
          response.config,
          response.request,
          response,
        );
      }
      return response;
    });

    axiosRetry(this.client, {
      retries: options.maxRetries ?? env.PROVIDER_MAX_RETRIES,
      retryDelay: (retryCount) => Math.min(retryBaseDelayMs * 2 ** (retryCount - 1), retryMaxDelayMs),
      retryCondition: (err) => !this.gate.isHalted && isTransientHttpError(err),
      onRetry: (retryCount, err, requestConfig) => {
        this.retries += 1;
        console.warn(`GooglePlacesAdapter: retry ${retryCount} for ${requestConfig.url ?? '?'}: ${err.message}`);
      },
    });
  }

  /** Retries issued since this client was created. */
  get retryAttempts(): number {
    return this.retries;
  }

  async geocode(address: string, signal?: AbortSignal): Promise<ResolvedAddress> {
    const text = address.trim();
    if (!text) {
      throw new GeocodeFailure('Address is empty');
    }

    let data: GoogleGeocodeResponse;
    try {
      data = await this.request<GoogleGeocodeResponse>('/geocode/json', { address: text }, signal);
    } catch (err) {
      if (err instanceof ProviderRequestError) {
        throw new GeocodeFailure(`Geocode request rejected: ${err.message}`, err.providerStatus);
      }
      throw err;
    }

    if (data.status === 'ZERO_RESULTS') {
      throw new GeocodeFailure(`No match for "${text}"`, data.status);
    }
    if (data.status !== 'OK') {
      throw new GeocodeFailure(describeStatus('Geocode', data), data.status);
    }

    const first = data.results?.[0];
    const location = first?.geometry?.location;
    if (!first || !isValidCoordinate(location)) {
      throw new GeocodeFailure(`Malformed geocode response for "${text}"`, data.status);
    }

    return {
      center: { lat: location.lat, lng: location.lng },
      formattedAddress: first.formatted_address ?? text,
      components: parseAddressComponents(first.address_components),
    };
  }

  async textSearch(request: TextSearchRequest, signal?: AbortSignal): Promise<SearchPage> {
    const params: QueryParams = {
      query: request.query,
      location: request.location ? `${request.location.lat},${request.location.lng}` : undefined,
      radius:
        request.radiusMetres !== undefined
          ? Math.round(Math.min(request.radiusMetres, this.maxNearbyRadiusMetres))
          : undefined,
      pagetoken: request.pageToken,
    };

    const data = await this.request<GoogleSearchResponse>('/place/textsearch/json', params, signal);
    return toSearchPage('Text Search', data);
  }

  async nearbySearch(request: NearbySearchRequest, signal?: AbortSignal): Promise<SearchPage> {
    const params: QueryParams = {
      location: `${request.location.lat},${request.location.lng}`,
      radius: Math.round(Math.min(request.radiusMetres, this.maxNearbyRadiusMetres)),
      keyword: request.keyword || undefined,
      pagetoken: request.pageToken,
    };

    const data = await this.request<GoogleSearchResponse>('/place/nearbysearch/json', params, signal);
    return toSearchPage('Nearby Search', data);
  }

  async placeDetails(placeId: string, signal?: AbortSignal): Promise<PlaceDetails> {
    let data: GoogleDetailsResponse;
    try {
      data = await this.request<GoogleDetailsResponse>(
        '/place/details/json',
        { place_id: placeId, fields: DETAILS_FIELDS, reviews_sort: 'newest' },
        signal,
      );
    } catch (err) {
      if (err instanceof ProviderRequestError) {
        throw new PlaceDetailsUnavailable(placeId, err.message);
      }
      throw err;
    }

    const result = data.result;
    if (data.status !== 'OK' || !result) {
      throw new PlaceDetailsUnavailable(placeId, describeStatus('Place Details', data));
    }

    return {
      placeId: result.place_id ?? placeId,
      name: result.name ?? null,
      formattedAddress: result.formatted_address ?? null,
      components: parseAddressComponents(result.address_components),
      types: result.types ?? [],
      rating: finiteOrNull(result.rating),
      ratingCount: finiteOrNull(result.user_ratings_total),
      reviews: (result.reviews ?? []).map(toProviderReview),
    };
  }

  private async request<T extends GoogleEnvelope>(path: string, params: QueryParams, signal?: AbortSignal): Promise<T> {
    const data = await this.gate.schedule(async () => {
      try {
        const response = await this.client.get<T>(path, {
          params: { ...params, key: this.apiKey },
          signal,
        });
        return response.data;
      } catch (err) {
        throw this.toProviderError(err, path);
      }
    }, signal);

    if (typeof data !== 'object' || data === null) {
      throw new ProviderTransientError(`${path} returned a non-JSON body`);
    }

    switch (data.status) {
      case 'OVER_QUERY_LIMIT':
        this.gate.halt(`${path} answered OVER_QUERY_LIMIT`);
        throw new ProviderQuotaExceeded(describeStatus(path, data));
      case 'REQUEST_DENIED':
      case 'INVALID_REQUEST':
        throw new ProviderRequestError(describeStatus(path, data), data.status);
      default:
        return data;
    }
  }

  private toProviderError(err: unknown, path: string): Error {
    if (!axios.isAxiosError(err)) {
      return err instanceof Error ? err : new Error(String(err));
    }
    if (err.code === AxiosError.ERR_CANCELED) {
      return new RunCancelled(`${path} cancelled`);
    }
    if (err.code === PROVIDER_UNKNOWN_ERROR) {
      return new ProviderTransientError(`${path} error: status=UNKNOWN_ERROR`);
    }

    const status = err.response?.status;
    if (status === 429) {
      this.gate.halt(`${path} answered HTTP 429`);
      return new ProviderQuotaExceeded(`${path} answered HTTP 429`);
    }
    if (status !== undefined && status < 500) {
      return new ProviderRequestError(`${path} answered HTTP ${status}`, `HTTP_${status}`);
    }
    return new ProviderTransientError(`${path} failed: ${err.message}`, status);
  }
}

function isTransientHttpError(err: AxiosError): boolean {
  if (err.code === AxiosError.ERR_CANCELED) return false;
  if (err.code === PROVIDER_UNKNOWN_ERROR) return true;
  const status = err.response?.status;
  if (status !== undefined) return status >= 500;
  return axiosRetry.isNetworkError(err) || err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT';
}

function isUnknownErrorBody(data: unknown): boolean {
  return typeof data === 'object' && data !== null && 'status' in data && data.status === 'UNKNOWN_ERROR';
}

function toSearchPage(what: string, data: GoogleSearchResponse): SearchPage {
  if (data.status !== 'OK' && data.status !== 'ZERO_RESULTS') {
    throw new ProviderRequestError(describeStatus(what, data), data.status ?? 'MISSING_STATUS');
  }

  const results: PlaceSummary[] = [];
  for (const raw of data.results ?? []) {
    const summary = toPlaceSummary(raw);
    if (summary) results.push(summary);
  }

  return data.next_page_token ? { results, nextPageToken: data.next_page_token } : { results };
}

function toPlaceSummary(raw: GooglePlaceResult): PlaceSummary | null {
  const location = raw.geometry?.location;
  if (!raw.place_id || !isValidCoordinate(location)) return null;

  return {
    placeId: raw.place_id,
    name: raw.name ?? 'Unknown Business',
    location: { lat: location.lat, lng: location.lng },
    address: raw.formatted_address ?? raw.vicinity ?? null,
    types: raw.types ?? [],
  };
}

function toProviderReview(raw: GoogleReview): ProviderReview {
  return {
    rating: finiteOrNull(raw.rating),
    text: raw.text ?? null,
    author: raw.author_name ?? null,
    time: finiteOrNull(raw.time),
    relativeTime: raw.relative_time_description ?? null,
  };
}

export function parseAddressComponents(components: GoogleAddressComponent[] | undefined): AddressComponents {
  const out: AddressComponents = { city: null, state: null, zip: null, country: null };
  for (const c of components ?? []) {
    const types = c.types ?? [];
    if (types.includes('locality')) out.city = c.long_name ?? null;
    if (types.includes('administrative_area_level_1')) out.state = c.short_name ?? null;
    if (types.includes('postal_code')) out.zip = c.long_name ?? null;
    if (types.includes('country')) out.country = c.short_name ?? null;
  }
  return out;
}

function describeStatus(what: string, data: GoogleEnvelope): string {
  const status = data.status ?? 'MISSING_STATUS';
  return data.error_message ? `${what} error: status=${status}, msg=${data.error_message}` : `${what} error: status=${status}`;
}

function finiteOrNull(value: number | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
