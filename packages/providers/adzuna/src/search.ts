import type {
  CompanySearchQuery,
  InternshipSearchQuery,
  JobCategory,
  JobRecord,
  JobSearchProvider,
  JobSearchQuery,
  SearchLogger,
} from '@jobdesk/listing-sdk';
import type { AdzunaClient } from './client.js';
import { normalizeCategories, normalizeSearchResults, SOURCE_NAME } from './mapper.js';
import { currencySymbolForCountry } from './salary.js';

const COMPANY_OVERFETCH_FACTOR = 3;

export type AdzunaSearchClient = Pick<AdzunaClient, 'searchJobs' | 'getCategories'>;

export interface AdzunaJobSearchOptions {
  client: AdzunaSearchClient;
  logger?: SearchLogger;
}

const silentLogger: SearchLogger = {
  debug: () => undefined,
  warn: () => undefined,
};

function serializeError(error: unknown): { name?: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }

  return { message: String(error) };
}

function normalizeCompanyName(value: string): string {
  return value.toLowerCase().trim();
}

export function internshipKeywords(field: string): string {
  const trimmed = field.trim();
  return trimmed ? `${trimmed} Intern` : 'Intern';
}

export function companyMatches(jobCompany: string, wanted: string): boolean {
  const company = normalizeCompanyName(jobCompany);
  const query = normalizeCompanyName(wanted);

  return company === query || company.includes(query) || query.includes(company);
}

/**
 * Adzuna-backed {@link JobSearchProvider}.
 *
 * Fail-soft by contract: every upstream problem (network, timeout, HTTP status,
 * undecodable body) is logged and collapsed into an empty list.
 */
export class AdzunaJobSearch implements JobSearchProvider {
  readonly sourceName = SOURCE_NAME;

  private readonly client: AdzunaSearchClient;
  private readonly logger: SearchLogger;

  constructor(options: AdzunaJobSearchOptions) {
    this.client = options.client;
    this.logger = options.logger ?? silentLogger;
  }

  async search(query: JobSearchQuery): Promise<JobRecord[]> {
    try {
      const response = await this.client.searchJobs({
        country: query.country,
        page: query.page,
        resultsPerPage: query.resultsPerPage,
        what: query.keywords,
        where: query.location,
      });

      const jobs = normalizeSearchResults(response.results, {
        currencySymbol: currencySymbolForCountry(query.country),
      });

      this.logger.debug(
        {
          event: 'upstream_search_completed',
          country: query.country,
          page: query.page,
          received: response.results.length,
          normalized: jobs.length,
        },
        'Adzuna search completed',
      );

      return jobs;
    } catch (error) {
      this.logger.warn(
        {
          event: 'upstream_failed',
          operation: 'search',
          country: query.country,
          page: query.page,
          error: serializeError(error),
        },
        'Adzuna search failed; returning no results',
      );
      return [];
    }
  }

  async searchInternships(query: InternshipSearchQuery): Promise<JobRecord[]> {
    const { field, ...rest } = query;
    return this.search({ ...rest, keywords: internshipKeywords(field) });
  }

  async searchByCompany(query: CompanySearchQuery): Promise<JobRecord[]> {
    const { companyName, resultsPerPage, ...rest } = query;
    const jobs = await this.search({
      ...rest,
      keywords: companyName,
      resultsPerPage: resultsPerPage * COMPANY_OVERFETCH_FACTOR,
    });

    const matches: JobRecord[] = [];
    for (const job of jobs) {
      if (!companyMatches(job.company, companyName)) {
        continue;
      }

      matches.push(job);
      if (matches.length >= resultsPerPage) {
        break;
      }
    }

    return matches;
  }

  async getCategories(country: string): Promise<JobCategory[]> {
    try {
      const response = await this.client.getCategories(country);
      return normalizeCategories(response.results);
    } catch (error) {
      this.logger.warn(
        {
          event: 'upstream_failed',
          operation: 'categories',
          country,
          error: serializeError(error),
        },
        'Adzuna categories request failed; returning no categories',
      );
      return [];
    }
  }
}
