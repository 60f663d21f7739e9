import type { PlacesProvider } from '../../adapters/PlacesProvider';
import { milesToMetres } from '../../geo/distance';
import type { PlaceCandidate, RunWarning, SearchQuery } from '../../types/search';
import { errorMessage } from '../../errors';
import { env } from '../../config/env';
import { addWarning, warningForFailure } from '../warnings';
import { DiscoveryResult, DiscoveryStrategy, toCandidate } from './DiscoveryStrategy';
import { paginate } from './paginate';

export interface BrandSearchOptions {
  maxPages: number;
  pageDelayMs: number;
}

/**
 * One ranked text query around the center. Faster than tiling, but only as
 * complete as the provider's ranking allows.
 */
export class BrandSearchStrategy implements DiscoveryStrategy {
  readonly kind = 'brand' as const;
  private readonly options: BrandSearchOptions;

  constructor(
    private readonly provider: PlacesProvider,
    options: Partial<BrandSearchOptions> = {},
  ) {
    this.options = {
      maxPages: options.maxPages ?? env.MAX_TEXT_SEARCH_PAGES,
      pageDelayMs: options.pageDelayMs ?? env.PAGE_TOKEN_DELAY_MS,
    };
  }

  async discover(query: SearchQuery, signal?: AbortSignal): Promise<DiscoveryResult> {
    const keyword = query.keyword?.trim();
    if (!keyword) {
      throw new RangeError('Brand search needs a keyword');
    }

    const text = query.locationLabel ? `${keyword} near ${query.locationLabel}` : keyword;
    const radiusMetres = Math.min(milesToMetres(query.radiusMiles), this.provider.maxNearbyRadiusMetres);

    const outcome = await paginate(
      (pageToken) => this.provider.textSearch({ query: text, location: query.center, radiusMetres, pageToken }, signal),
      { ...this.options, signal },
    );

    const candidates: PlaceCandidate[] = outcome.pages.flatMap((page, i) =>
      page.results.map((summary) => toCandidate(summary, query.center, { strategy: 'brand', page: i + 1 })),
    );

    const warnings: RunWarning[] = [];
    if (outcome.error !== undefined) {
      const unit = `text-search page ${outcome.pages.length + 1}`;
      console.warn(`BrandSearch: ${unit} failed: ${errorMessage(outcome.error)}`);
      addWarning(warnings, warningForFailure(outcome.error, unit));
    }

    const succeeded = outcome.pages.length > 0;
    return {
      candidates,
      tiles: [],
      warnings,
      succeededUnits: succeeded ? 1 : 0,
      failedUnits: succeeded ? 0 : 1,
      truncatedUnits: outcome.truncated ? 1 : 0,
    };
  }
}
