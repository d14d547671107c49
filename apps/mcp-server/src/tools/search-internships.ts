import { z } from 'zod';
import type { InternshipEnvelope } from '@jobdesk/listing-sdk';
import { defineTool } from './define-tool.js';
import { countryField, locationField, pageField, resultsPerPageField } from './inputs.js';

export const searchInternshipsTool = defineTool({
  name: 'search_internships',
  title: 'Search internships',
  description:
    'Search for internship opportunities in a field. Each listing carries an is_internship flag derived from its title.',
  inputShape: {
    field: z.string().default('').describe('Field or industry, e.g. "Software", "Marketing", "Finance"'),
    location: locationField,
    country: countryField,
    page: pageField,
    results_per_page: resultsPerPageField,
  },
  async run(input, { provider, now }): Promise<InternshipEnvelope> {
    const internships = await provider.searchInternships({
      field: input.field,
      location: input.location,
      country: input.country,
      page: input.page,
      resultsPerPage: input.results_per_page,
    });

    return {
      field: input.field,
      location: input.location,
      country: input.country,
      page: input.page,
      internships,
      total_found: internships.length,
      timestamp: now().toISOString(),
    };
  },
});
