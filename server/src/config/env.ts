import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(4000),

  // Google Maps Platform
  GOOGLE_MAPS_API_KEY: z.string().min(1, 'GOOGLE_MAPS_API_KEY is required'),
  GOOGLE_MAPS_BASE_URL: z.string().url().default('https://maps.googleapis.com/maps/api'),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),

  // Retries and the shared request gate
  PROVIDER_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  PROVIDER_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  PROVIDER_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(8_000),
  PROVIDER_MAX_CONCURRENCY: z.coerce.number().int().positive().default(4),
  PROVIDER_MIN_INTERVAL_MS: z.coerce.number().int().min(0).default(150),
  PROVIDER_QUOTA_COOLDOWN_MS: z.coerce.number().int().min(0).default(60_000),

  // Discovery
  NEARBY_MAX_RADIUS_METRES: z.coerce.number().positive().max(50_000).default(50_000),
  TILE_RADIUS_METRES: z.coerce.number().positive().default(40_000),
  TILE_OVERLAP: z.coerce.number().min(0).lt(1).default(0.15),
  MAX_PAGES_PER_TILE: z.coerce.number().int().positive().default(3),
  MAX_TEXT_SEARCH_PAGES: z.coerce.number().int().positive().default(3),
  PAGE_TOKEN_DELAY_MS: z.coerce.number().int().min(0).default(2_200),
  LARGE_RADIUS_WARNING_MILES: z.coerce.number().positive().default(25),

  // Aggregation
  HIGH_NEGATIVE_SHARE: z.coerce.number().gt(0).max(1).default(0.3),
  HIGH_NEGATIVE_MIN_REVIEWS: z.coerce.number().int().min(1).default(3),

  // Redis
  REDIS_URL: z.string().default('redis://localhost:6379'),
  CACHE_TTL_SECONDS: z.coerce.number().default(3600),

  // Rate limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60_000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(30),

  // CORS
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.flatten().fieldErrors);
    process.exit(1);
  }
  return parsed.data;
}

export const env = loadEnv();
