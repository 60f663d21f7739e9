import type { PlaceSummary } from '../../adapters/PlacesProvider';
import { Coordinate, haversineMiles } from '../../geo/distance';
import type { Tile } from '../../geo/tileGenerator';
import type { CandidateSource, PlaceCandidate, RunWarning, SearchQuery, StrategyKind } from '../../types/search';

export interface DiscoveryResult {
  /** Raw candidates in a reproducible order; may hold duplicates and out-of-radius places */
  candidates: PlaceCandidate[];
  /** Tiles queried (empty for strategies that do not tile) */
  tiles: Tile[];
  warnings: RunWarning[];
  /** Units (tiles or text queries) whose first page came back */
  succeededUnits: number;
  failedUnits: number;
  /** Units that stopped at the page cap while the provider still had pages */
  truncatedUnits: number;
}

export interface DiscoveryStrategy {
  readonly kind: StrategyKind;
  discover(query: SearchQuery, signal?: AbortSignal): Promise<DiscoveryResult>;
}

export function toCandidate(summary: PlaceSummary, center: Coordinate, source: CandidateSource): PlaceCandidate {
  return {
    placeId: summary.placeId,
    name: summary.name,
    lat: summary.location.lat,
    lng: summary.location.lng,
    address: summary.address,
    types: summary.types,
    distanceMiles: haversineMiles(center, summary.location),
    source,
  };
}
