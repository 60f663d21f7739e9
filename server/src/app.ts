import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import compression from 'compression';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';

import { env } from './config/env';
import { CacheService } from './services/CacheService';
import { RateLimitGate } from './services/RateLimitGate';
import { SearchPipeline } from './services/SearchPipeline';
import { GooglePlacesAdapter } from './adapters/GooglePlacesAdapter';
import type { PlacesProvider } from './adapters/PlacesProvider';
import { createSearchRouter } from './routes/search.routes';
import { createGeocodeRouter } from './routes/geocode.routes';
import { errorHandler } from './middleware/errorHandler';

export interface AppServices {
  pipeline: SearchPipeline;
  cache: CacheService;
}

/** One provider client, and so one request gate, for the whole process. */
export function createServices(provider: PlacesProvider = new GooglePlacesAdapter({ gate: new RateLimitGate() })): AppServices {
  return {
    pipeline: new SearchPipeline(provider),
    cache: new CacheService(),
  };
}

export function buildApp({ pipeline, cache }: AppServices): Express {
  const app = express();

  // ── Security headers ──────────────────────────────────────────────────────────
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'none'"],
          frameAncestors: ["'none'"],
        },
      },
      hsts: { maxAge: 31_536_000, includeSubDomains: true, preload: true },
    }),
  );

  // ── CORS ─────────────────────────────────────────────────────────────────────
  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
      exposedHeaders: ['X-Cache', 'X-Results-Incomplete', 'Content-Disposition'],
    }),
  );

  // ── Body parsing & compression ────────────────────────────────────────────────
  app.use(express.json({ limit: '100kb' }));
  app.use(compression());

  // ── Logging ───────────────────────────────────────────────────────────────────
  if (env.NODE_ENV !== 'test') {
    app.use(morgan('combined'));
  }

  // ── Rate limiting ─────────────────────────────────────────────────────────────
  // Each search fans out into many provider calls, so the budget is per client.
  const limiter = rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX_REQUESTS,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later.' },
  });
  app.use('/api/', limiter);

  // ── Health checks ─────────────────────────────────────────────────────────────
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/api/health/cache', (_req, res) => {
    res.json({
      status: 'ok',
      backend: cache.isRedis ? 'redis' : 'in-memory',
      timestamp: new Date().toISOString(),
    });
  });

  // ── Routes ────────────────────────────────────────────────────────────────────
  app.use('/api/v1/search', createSearchRouter(pipeline, cache));
  app.use('/api/v1/geocode', createGeocodeRouter(pipeline.resolver));

  // ── 404 catch-all ─────────────────────────────────────────────────────────────
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler);

  return app;
}

// ── Startup ───────────────────────────────────────────────────────────────────
async function start(): Promise<void> {
  const services = createServices();
  await services.cache.connect();

  const server = buildApp(services).listen(env.PORT, () => {
    console.info(`Server listening on http://localhost:${env.PORT}`);
    console.info(`   NODE_ENV: ${env.NODE_ENV}`);
    console.info(`   Cache backend: ${services.cache.isRedis ? 'Redis' : 'in-memory'}`);
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    console.info(`${signal} received, closing server`);
    server.close(() => {
      void services.cache
        .quit()
        .catch((err: unknown) => console.warn('CacheService: quit failed:', err))
        .finally(() => process.exit(0));
    });
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

if (require.main === module) {
  void start();
}
