import { Router, Request, Response } from 'express';
import type { AddressResolver } from '../services/AddressResolver';
import { geocodeQuerySchema } from '../validation/searchParams';
import { asyncHandler } from '../middleware/errorHandler';

export function createGeocodeRouter(resolver: AddressResolver): Router {
  const router = Router();

  /**
   * GET /api/v1/geocode?address=
   * Resolves free text to a center coordinate and address components.
   */
  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const parsed = geocodeQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid query parameters', details: parsed.error.flatten() });
      return;
    }

    res.json(await resolver.resolve(parsed.data.address));
  }));

  return router;
}
