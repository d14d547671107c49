import type { CategoryEnvelope } from '@jobdesk/listing-sdk';
import { defineTool } from './define-tool.js';
import { countryField } from './inputs.js';

export const listJobCategoriesTool = defineTool({
  name: 'list_job_categories',
  title: 'List job categories',
  description: 'List the job categories the upstream platform offers for a country.',
  inputShape: {
    country: countryField,
  },
  async run(input, { provider, now }): Promise<CategoryEnvelope> {
    const categories = await provider.getCategories(input.country);

    return {
      country: input.country,
      categories,
      total_found: categories.length,
      timestamp: now().toISOString(),
    };
  },
});
