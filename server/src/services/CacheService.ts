import NodeCache from 'node-cache';
import type { Redis } from 'ioredis';
import type { RunResult } from '../types/search';
import type { SearchParams } from '../validation/searchParams';
import { env } from '../config/env';

const KEY_PREFIX = 'review-radius';

interface CacheBackend {
  readonly kind: 'redis' | 'in-memory';
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  quit?(): Promise<void>;
}

class MemoryBackend implements CacheBackend {
  readonly kind = 'in-memory' as const;
  private readonly store = new NodeCache({ useClones: false, checkperiod: 0 });

  async get(key: string): Promise<string | null> {
    return this.store.get<string>(key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.store.set(key, value, ttlSeconds);
  }

  async quit(): Promise<void> {
    this.store.close();
  }
}

class RedisBackend implements CacheBackend {
  readonly kind = 'redis' as const;
  private client: Redis | null = null;
  private ready = false;

  async connect(url: string): Promise<boolean> {
    const { default: RedisClient } = await import('ioredis');
    const client = new RedisClient(url, {
      lazyConnect: true,
      enableOfflineQueue: false,
      connectTimeout: 3000,
      maxRetriesPerRequest: 1,
    });
    this.client = client;

    client.on('ready', () => {
      this.ready = true;
    });
    client.on('error', (err: Error) => {
      if (this.ready) console.warn('CacheService: Redis error:', err.message);
      this.ready = false;
    });

    try {
      await client.connect();
    } catch (err) {
      console.warn('CacheService: Redis connect failed:', err instanceof Error ? err.message : err);
      this.ready = false;
      client.disconnect();
    }
    return this.ready;
  }

  async get(key: string): Promise<string | null> {
    if (!this.client || !this.ready) return null;
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (!this.client || !this.ready) return;
    await this.client.setex(key, ttlSeconds, value);
  }

  async quit(): Promise<void> {
    if (this.client && this.ready) {
      await this.client.quit();
    }
  }
}

/**
 * Caches complete search runs. Redis when reachable, process memory otherwise;
 * a cache failure never fails a request.
 */
export class CacheService {
  private backend: CacheBackend = new MemoryBackend();
  private readonly ttl: number;

  constructor(ttlSeconds = env.CACHE_TTL_SECONDS) {
    this.ttl = ttlSeconds;
  }

  async connect(redisUrl = env.REDIS_URL): Promise<void> {
    if (env.NODE_ENV === 'test') return;

    const redis = new RedisBackend();
    if (await redis.connect(redisUrl)) {
      await this.backend.quit?.();
      this.backend = redis;
      console.info('CacheService: connected to Redis');
    } else {
      console.warn('CacheService: Redis unavailable, falling back to in-memory cache');
    }
  }

  get isRedis(): boolean {
    return this.backend.kind === 'redis';
  }

  async getRun(params: SearchParams): Promise<RunResult | null> {
    return this.get<RunResult>(CacheService.runKey(params));
  }

  /** Incomplete runs are not cached; a retry may fill the gaps. */
  async setRun(params: SearchParams, result: RunResult): Promise<void> {
    if (!result.complete) return;
    await this.set(CacheService.runKey(params), result);
  }

  async get<T>(key: string): Promise<T | null> {
    try {
      const raw = await this.backend.get(key);
      if (raw === null) return null;
      const parsed: T = JSON.parse(raw);
      return parsed;
    } catch (err) {
      console.warn('CacheService.get failed:', err);
      return null;
    }
  }

  async set<T>(key: string, value: T, ttlSeconds = this.ttl): Promise<void> {
    try {
      await this.backend.set(key, JSON.stringify(value), ttlSeconds);
    } catch (err) {
      console.warn('CacheService.set failed:', err);
    }
  }

  async quit(): Promise<void> {
    await this.backend.quit?.();
  }

  /**
   * Deterministic key for a run. Address and keyword are compared
   * case-insensitively with collapsed whitespace; the radius to 0.01 mi.
   * Format: review-radius:run:{strategy}:{hash}
   */
  static runKey(params: SearchParams): string {
    const normalized = {
      address: params.address.replace(/\s+/g, ' ').trim().toLowerCase(),
      radiusMiles: Math.round(params.radiusMiles * 100) / 100,
      keyword: (params.keyword ?? '').replace(/\s+/g, ' ').trim().toLowerCase(),
    };
    return `${KEY_PREFIX}:run:${params.strategy}:${hashKey(normalized)}`;
  }
}

/** djb2 over the JSON of the params with sorted keys. */
function hashKey(params: Record<string, unknown>): string {
  const stable = JSON.stringify(params, Object.keys(params).sort());
  let hash = 5381;
  for (let i = 0; i < stable.length; i++) {
    hash = ((hash << 5) + hash) ^ stable.charCodeAt(i);
  }
  return (hash >>> 0).toString(16);
}
