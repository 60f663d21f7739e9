import { CacheService } from './CacheService';
import { summarize } from './aggregationEngine';
import type { RunResult } from '../types/search';
import type { SearchParams } from '../validation/searchParams';
import { PLANO } from '../test/fakePlacesProvider';

const params: SearchParams = { address: 'Plano, TX', radiusMiles: 5, strategy: 'geo' };

function runResult(complete: boolean): RunResult {
  return {
    query: { center: PLANO.center, radiusMiles: 5, strategy: 'geo', locationLabel: PLANO.formattedAddress },
    location: PLANO,
    tiles: [],
    places: [],
    reviews: [],
    rows: [],
    insights: summarize([], []),
    warnings: complete ? [] : [{ code: 'COVERAGE_INCOMPLETE', message: 'tile-1 skipped: timeout', unit: 'tile-1' }],
    complete,
  };
}

describe('CacheService (in-memory backend)', () => {
  let cache: CacheService;

  beforeEach(() => {
    cache = new CacheService(60);
  });

  afterEach(async () => {
    await cache.quit();
  });

  it('returns null for a cache miss', async () => {
    const result = await cache.get('missing-key');
    expect(result).toBeNull();
  });

  it('stores and retrieves a value', async () => {
    await cache.set('key1', { foo: 'bar' });
    const result = await cache.get<{ foo: string }>('key1');
    expect(result).toEqual({ foo: 'bar' });
  });

  it('reports in-memory backend when Redis is unavailable', () => {
    expect(cache.isRedis).toBe(false);
  });

  it('round-trips a complete run', async () => {
    const result = runResult(true);
    await cache.setRun(params, result);
    expect(await cache.getRun(params)).toEqual(result);
  });

  it('does not cache an incomplete run', async () => {
    await cache.setRun(params, runResult(false));
    expect(await cache.getRun(params)).toBeNull();
  });

  describe('CacheService.runKey', () => {
    it('produces deterministic keys for the same params', () => {
      expect(CacheService.runKey(params)).toBe(CacheService.runKey({ ...params }));
    });

    it('starts with the prefix and strategy', () => {
      expect(CacheService.runKey(params)).toMatch(/^review-radius:run:geo:[0-9a-f]+$/);
    });

    it('ignores case and extra whitespace in the address', () => {
      const k1 = CacheService.runKey(params);
      const k2 = CacheService.runKey({ ...params, address: '  plano,   TX ' });
      expect(k1).toBe(k2);
    });

    it('treats radii equal to 0.01 mi as the same run', () => {
      const k1 = CacheService.runKey(params);
      const k2 = CacheService.runKey({ ...params, radiusMiles: 5.001 });
      expect(k1).toBe(k2);
    });

    it('produces different keys for different radii', () => {
      const k1 = CacheService.runKey(params);
      const k2 = CacheService.runKey({ ...params, radiusMiles: 6 });
      expect(k1).not.toBe(k2);
    });

    it('produces different keys for different strategies and keywords', () => {
      const brand = CacheService.runKey({ ...params, strategy: 'brand', keyword: 'pizza' });
      const otherBrand = CacheService.runKey({ ...params, strategy: 'brand', keyword: 'tacos' });
      expect(brand).not.toBe(CacheService.runKey(params));
      expect(brand).not.toBe(otherBrand);
    });
  });
});
