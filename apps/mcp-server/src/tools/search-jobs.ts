import type { SearchEnvelope } from '@jobdesk/listing-sdk';
import { defineTool } from './define-tool.js';
import { countryField, keywordsField, locationField, pageField, resultsPerPageField } from './inputs.js';

export const searchJobsTool = defineTool({
  name: 'search_jobs',
  title: 'Search jobs',
  description: 'Search for job opportunities across all industries. Returns a JSON envelope with normalized listings.',
  inputShape: {
    keywords: keywordsField,
    location: locationField,
    country: countryField,
    page: pageField,
    results_per_page: resultsPerPageField,
  },
  async run(input, { provider, now }): Promise<SearchEnvelope> {
    const jobs = await provider.search({
      keywords: input.keywords,
      location: input.location,
      country: input.country,
      page: input.page,
      resultsPerPage: input.results_per_page,
    });

    return {
      search_terms: input.keywords,
      location: input.location,
      country: input.country,
      page: input.page,
      jobs,
      total_found: jobs.length,
      timestamp: now().toISOString(),
    };
  },
});
