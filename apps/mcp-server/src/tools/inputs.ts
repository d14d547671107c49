import { z } from 'zod';

export const MAX_RESULTS_PER_PAGE = 50;

export const keywordsField = z
  .string()
  .default('')
  .describe('Job search keywords, e.g. "Software Engineer" or "Marketing Manager"');

export const locationField = z
  .string()
  .default('India')
  .describe('Location to search, e.g. "India", "Bangalore", "Mumbai"');

export const countryField = z
  .string()
  .trim()
  .toLowerCase()
  .regex(/^[a-z]{2}$/, 'country must be a two-letter code such as "in", "gb" or "us"')
  .default('in')
  .describe('Two-letter Adzuna country code ("in" for India, "us" for USA, "gb" for UK)');

export const pageField = z.number().int().min(1).default(1).describe('Page number, starting at 1');

export const resultsPerPageField = z
  .number()
  .int()
  .min(1)
  .max(MAX_RESULTS_PER_PAGE)
  .default(20)
  .describe(`Number of results per page (max ${MAX_RESULTS_PER_PAGE})`);
