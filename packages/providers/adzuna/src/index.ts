export {
  AdzunaClient,
  AdzunaClientClosedError,
  AdzunaHttpError,
  AdzunaResponseError,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
} from './client.js';
export type { AdzunaClientOptions } from './client.js';
export {
  isInternshipTitle,
  isRemoteLocation,
  normalizeCategories,
  normalizeJob,
  normalizeSearchResults,
  resolveField,
  SOURCE_NAME,
  UNKNOWN_COMPANY,
} from './mapper.js';
export type { NormalizeOptions, ResolvedField } from './mapper.js';
export { currencySymbolForCountry, formatSalary } from './salary.js';
export { AdzunaJobSearch, companyMatches, internshipKeywords } from './search.js';
export type { AdzunaJobSearchOptions, AdzunaSearchClient } from './search.js';
export type { AdzunaSearchParams, AdzunaSearchResponse, AdzunaCategoriesResponse } from './types.js';
