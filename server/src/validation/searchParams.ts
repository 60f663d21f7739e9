import { z } from 'zod';

export const MAX_RADIUS_MILES = 200;

export const searchParamsSchema = z
  .object({
    address: z.string().trim().min(1, 'address is required').max(300),
    radiusMiles: z.coerce.number().positive().max(MAX_RADIUS_MILES),
    strategy: z.enum(['geo', 'brand']).default('geo'),
    keyword: z.string().trim().max(100).optional(),
  })
  .refine((params) => params.strategy !== 'brand' || Boolean(params.keyword), {
    message: 'keyword is required for brand search',
    path: ['keyword'],
  });

export type SearchParams = z.infer<typeof searchParamsSchema>;

export const geocodeQuerySchema = z.object({
  address: z.string().trim().min(1, 'address is required').max(300),
});

export const exportQuerySchema = z.object({
  table: z.enum(['places', 'reviews']).default('places'),
});
