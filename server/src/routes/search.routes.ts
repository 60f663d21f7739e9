import { Router, Request, Response } from 'express';
import type { SearchPipeline } from '../services/SearchPipeline';
import type { CacheService } from '../services/CacheService';
import type { RunResult } from '../types/search';
import { exportQuerySchema, SearchParams, searchParamsSchema } from '../validation/searchParams';
import {
  PLACE_EXPORT_COLUMNS,
  REVIEW_EXPORT_COLUMNS,
  toCsv,
  toPlaceExportRows,
  toReviewExportRows,
} from '../transformers/exportTransformer';
import { asyncHandler } from '../middleware/errorHandler';

/** Aborts the run when the client goes away before the response is written. */
function abortOnDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller;
}

export function createSearchRouter(pipeline: SearchPipeline, cache: CacheService): Router {
  const router = Router();

  async function runCached(params: SearchParams, res: Response): Promise<RunResult> {
    const cached = await cache.getRun(params);
    if (cached) {
      res.setHeader('X-Cache', 'HIT');
      return cached;
    }

    const controller = abortOnDisconnect(res);
    const result = await pipeline.run(params, controller.signal);
    await cache.setRun(params, result);
    res.setHeader('X-Cache', 'MISS');
    return result;
  }

  /**
   * POST /api/v1/search
   * Runs discovery, review collection and aggregation for an address and radius.
   */
  router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const parsed = searchParamsSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid search parameters', details: parsed.error.flatten() });
      return;
    }

    const result = await runCached(parsed.data, res);
    res.json(result);
  }));

  /**
   * POST /api/v1/search/export?table=places|reviews
   * Same run as POST /search, flattened to CSV.
   */
  router.post('/export', asyncHandler(async (req: Request, res: Response) => {
    const query = exportQuerySchema.safeParse(req.query);
    const parsed = searchParamsSchema.safeParse(req.body);
    if (!query.success || !parsed.success) {
      res.status(400).json({
        error: 'Invalid export parameters',
        details: query.success ? parsed.error?.flatten() : query.error.flatten(),
      });
      return;
    }

    const result = await runCached(parsed.data, res);
    const csv =
      query.data.table === 'places'
        ? toCsv(toPlaceExportRows(result.rows), PLACE_EXPORT_COLUMNS)
        : toCsv(toReviewExportRows(result.reviews), REVIEW_EXPORT_COLUMNS);

    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="${query.data.table}.csv"`);
    if (!result.complete) res.setHeader('X-Results-Incomplete', 'true');
    res.send(csv);
  }));

  return router;
}
