import type { PlacesProvider } from '../../adapters/PlacesProvider';
import { metresToMiles, milesToMetres } from '../../geo/distance';
import { generateTiles } from '../../geo/tileGenerator';
import type { PlaceCandidate, RunWarning, SearchQuery } from '../../types/search';
import { errorMessage } from '../../errors';
import { env } from '../../config/env';
import { addWarning, warningForFailure } from '../warnings';
import { DiscoveryResult, DiscoveryStrategy, toCandidate } from './DiscoveryStrategy';
import { paginate } from './paginate';

export interface GeoCoverageOptions {
  /** Working radius of one nearby call; capped by the provider's own limit */
  tileRadiusMiles: number;
  overlap: number;
  maxPagesPerTile: number;
  pageDelayMs: number;
}

/**
 * Tiled nearby search. Tiles are fetched concurrently through the provider's
 * gate, then merged in tile order so the first-seen order does not depend on
 * which response arrived first.
 */
export class GeoCoverageStrategy implements DiscoveryStrategy {
  readonly kind = 'geo' as const;
  private readonly options: GeoCoverageOptions;

  constructor(
    private readonly provider: PlacesProvider,
    options: Partial<GeoCoverageOptions> = {},
  ) {
    this.options = {
      tileRadiusMiles: options.tileRadiusMiles ?? metresToMiles(env.TILE_RADIUS_METRES),
      overlap: options.overlap ?? env.TILE_OVERLAP,
      maxPagesPerTile: options.maxPagesPerTile ?? env.MAX_PAGES_PER_TILE,
      pageDelayMs: options.pageDelayMs ?? env.PAGE_TOKEN_DELAY_MS,
    };
  }

  async discover(query: SearchQuery, signal?: AbortSignal): Promise<DiscoveryResult> {
    const maxTileRadiusMiles = Math.min(
      this.options.tileRadiusMiles,
      metresToMiles(this.provider.maxNearbyRadiusMetres),
    );
    const tiles = generateTiles(query.center, query.radiusMiles, maxTileRadiusMiles, this.options.overlap);
    const keyword = query.keyword?.trim() || undefined;

    const outcomes = await Promise.all(
      tiles.map((tile) =>
        paginate(
          (pageToken) =>
            this.provider.nearbySearch(
              { location: tile.center, radiusMetres: milesToMetres(tile.radiusMiles), keyword, pageToken },
              signal,
            ),
          { maxPages: this.options.maxPagesPerTile, pageDelayMs: this.options.pageDelayMs, signal },
        ),
      ),
    );

    const candidates: PlaceCandidate[] = [];
    const warnings: RunWarning[] = [];
    let succeededUnits = 0;
    let failedUnits = 0;
    let truncatedUnits = 0;

    outcomes.forEach((outcome, i) => {
      const tile = tiles[i];
      outcome.pages.forEach((page, p) => {
        for (const summary of page.results) {
          candidates.push(toCandidate(summary, query.center, { strategy: 'geo', tileId: tile.id, page: p + 1 }));
        }
      });

      if (outcome.pages.length > 0) succeededUnits += 1;
      else failedUnits += 1;
      if (outcome.truncated) truncatedUnits += 1;

      if (outcome.error !== undefined) {
        console.warn(`GeoCoverage: ${tile.id} failed after ${outcome.pages.length} page(s): ${errorMessage(outcome.error)}`);
        addWarning(warnings, warningForFailure(outcome.error, tile.id));
      }
    });

    console.info(
      `GeoCoverage: ${tiles.length} tile(s) of ${maxTileRadiusMiles.toFixed(1)} mi, ` +
        `${candidates.length} raw candidate(s), ${truncatedUnits} tile(s) at the page cap`,
    );

    return { candidates, tiles, warnings, succeededUnits, failedUnits, truncatedUnits };
  }
}
