import { z } from 'zod';

/**
 * Search envelope as returned by `/{country}/search/{page}`.
 * Items stay `unknown` here: their nested fields switch between objects and
 * scalars, so each one is resolved individually by the mapper.
 */
export const adzunaSearchResponseSchema = z
  .object({
    results: z.array(z.unknown()).default([]),
    count: z.number().optional(),
    mean: z.number().optional(),
  })
  .passthrough();

export const adzunaCategoriesResponseSchema = z
  .object({
    results: z.array(z.unknown()).default([]),
  })
  .passthrough();

export type AdzunaSearchResponse = z.infer<typeof adzunaSearchResponseSchema>;
export type AdzunaCategoriesResponse = z.infer<typeof adzunaCategoriesResponseSchema>;

export interface AdzunaSearchParams {
  country: string;
  page: number;
  resultsPerPage: number;
  what: string;
  where: string;
}
