import type { PlacesProvider } from '../adapters/PlacesProvider';
import type { Tile } from '../geo/tileGenerator';
import type {
  Place,
  ResolvedAddress,
  Review,
  RunResult,
  RunWarning,
  SearchQuery,
  StrategyKind,
} from '../types/search';
import type { SearchParams } from '../validation/searchParams';
import { ProviderUnavailable } from '../errors';
import { env } from '../config/env';
import { AddressResolver } from './AddressResolver';
import { ReviewCollector } from './ReviewCollector';
import { BrandSearchOptions, BrandSearchStrategy } from './discovery/BrandSearchStrategy';
import { GeoCoverageOptions, GeoCoverageStrategy } from './discovery/GeoCoverageStrategy';
import type { DiscoveryStrategy } from './discovery/DiscoveryStrategy';
import { dedupe } from './deduplicator';
import { filterByRadius } from './radiusFilter';
import { classifyReview } from './sentimentClassifier';
import { aggregate, AggregationOptions, summarize } from './aggregationEngine';
import { addWarning, isComplete, mergeWarnings, warningForFailure } from './warnings';

export interface SearchPipelineOptions {
  geo: Partial<GeoCoverageOptions>;
  brand: Partial<BrandSearchOptions>;
  negativeShareThreshold: number;
  minReviewsForFlag: number;
  /** Radii above this carry a ranked-subset warning */
  largeRadiusWarningMiles: number;
}

/**
 * One search run: resolve, discover, dedupe, enforce the radius, collect
 * reviews, classify and aggregate. Failures local to a tile, page or place
 * become warnings; only an unresolvable address or a provider that answered
 * nothing at all end the run.
 */
export class SearchPipeline {
  readonly resolver: AddressResolver;
  private readonly strategies: Record<StrategyKind, DiscoveryStrategy>;
  private readonly collector: ReviewCollector;
  private readonly aggregation: Pick<AggregationOptions, 'negativeShareThreshold' | 'minReviewsForFlag'>;
  private readonly largeRadiusWarningMiles: number;

  constructor(provider: PlacesProvider, options: Partial<SearchPipelineOptions> = {}) {
    this.resolver = new AddressResolver(provider);
    this.collector = new ReviewCollector(provider);
    this.strategies = {
      geo: new GeoCoverageStrategy(provider, options.geo),
      brand: new BrandSearchStrategy(provider, options.brand),
    };
    this.aggregation = {
      negativeShareThreshold: options.negativeShareThreshold ?? env.HIGH_NEGATIVE_SHARE,
      minReviewsForFlag: options.minReviewsForFlag ?? env.HIGH_NEGATIVE_MIN_REVIEWS,
    };
    this.largeRadiusWarningMiles = options.largeRadiusWarningMiles ?? env.LARGE_RADIUS_WARNING_MILES;
  }

  async run(params: SearchParams, signal?: AbortSignal): Promise<RunResult> {
    const location = await this.resolver.resolve(params.address, signal);
    const query: SearchQuery = {
      center: location.center,
      radiusMiles: params.radiusMiles,
      strategy: params.strategy,
      keyword: params.keyword || undefined,
      locationLabel: location.formattedAddress,
    };
    return this.search(query, location, signal);
  }

  async search(query: SearchQuery, location: ResolvedAddress, signal?: AbortSignal): Promise<RunResult> {
    const warnings: RunWarning[] = [];
    if (query.radiusMiles > this.largeRadiusWarningMiles) {
      addWarning(warnings, {
        code: 'LARGE_RADIUS',
        message:
          'The provider returns a ranked subset per query; large areas may not list every business even with tiling',
      });
    }

    const discovery = await this.strategies[query.strategy].discover(query, signal);
    mergeWarnings(warnings, discovery.warnings);

    const stoppedEarly = warnings.some((w) => w.code === 'QUOTA_EXCEEDED' || w.code === 'RUN_CANCELLED');
    if (discovery.succeededUnits === 0 && discovery.failedUnits > 0 && !stoppedEarly) {
      throw new ProviderUnavailable(`All ${discovery.failedUnits} discovery request(s) failed`);
    }

    const places = filterByRadius(dedupe(discovery.candidates), query.center, query.radiusMiles);
    if (places.length === 0) {
      addWarning(warnings, {
        code: 'NO_RESULTS_IN_RADIUS',
        message: `No places found within ${query.radiusMiles} mi`,
      });
      return this.buildResult(query, location, discovery.tiles, [], [], new Set(), warnings);
    }

    const outcomes = await this.collector.collectAll(places, signal);
    const collected: Place[] = [];
    const reviews: Review[] = [];
    const unavailable = new Set<string>();

    for (const outcome of outcomes) {
      collected.push(outcome.place);
      if (outcome.status === 'collected') {
        reviews.push(...outcome.reviews.map(classifyReview));
        continue;
      }

      unavailable.add(outcome.place.placeId);
      const warning = warningForFailure(outcome.error, outcome.place.placeId);
      addWarning(
        warnings,
        warning.code === 'COVERAGE_INCOMPLETE'
          ? { code: 'DETAILS_UNAVAILABLE', message: warning.message, unit: outcome.place.placeId }
          : warning,
      );
    }

    const result = this.buildResult(query, location, discovery.tiles, collected, reviews, unavailable, warnings);
    console.info(
      `SearchPipeline: ${query.strategy} search, ${discovery.candidates.length} candidate(s) -> ` +
        `${collected.length} place(s), ${reviews.length} review(s), ${warnings.length} warning(s), ` +
        `${discovery.truncatedUnits} unit(s) at the page cap`,
    );
    return result;
  }

  private buildResult(
    query: SearchQuery,
    location: ResolvedAddress,
    tiles: Tile[],
    places: Place[],
    reviews: Review[],
    detailsUnavailable: ReadonlySet<string>,
    warnings: RunWarning[],
  ): RunResult {
    const rows = aggregate(places, reviews, { ...this.aggregation, detailsUnavailable });
    return {
      query,
      location,
      tiles,
      places,
      reviews,
      rows,
      insights: summarize(rows, reviews),
      warnings,
      complete: isComplete(warnings),
    };
  }
}
