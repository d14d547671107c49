import type { RemoteEnvelope } from '@jobdesk/listing-sdk';
import { defineTool } from './define-tool.js';
import { countryField, keywordsField, pageField, resultsPerPageField } from './inputs.js';

export const REMOTE_LOCATION = 'Remote';

export function remoteSearchTerms(keywords: string): string {
  return keywords ? `${keywords} remote` : 'remote';
}

export const searchRemoteJobsTool = defineTool({
  name: 'search_remote_jobs',
  title: 'Search remote jobs',
  description:
    'Search specifically for remote job opportunities. Only listings whose location mentions "remote" are returned.',
  inputShape: {
    keywords: keywordsField,
    country: countryField,
    page: pageField,
    results_per_page: resultsPerPageField,
  },
  async run(input, { provider, now }): Promise<RemoteEnvelope> {
    const jobs = await provider.search({
      keywords: remoteSearchTerms(input.keywords),
      location: REMOTE_LOCATION,
      country: input.country,
      page: input.page,
      resultsPerPage: input.results_per_page,
    });

    // The query only biases ranking; the per-record flag decides.
    const remoteJobs = jobs.filter((job) => job.remote);

    return {
      search_terms: input.keywords,
      country: input.country,
      page: input.page,
      remote_jobs: remoteJobs,
      total_found: remoteJobs.length,
      timestamp: now().toISOString(),
    };
  },
});
