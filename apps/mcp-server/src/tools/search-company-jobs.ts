import { z } from 'zod';
import type { CompanyEnvelope } from '@jobdesk/listing-sdk';
import { defineTool } from './define-tool.js';
import { countryField, locationField, pageField, resultsPerPageField } from './inputs.js';

export const searchCompanyJobsTool = defineTool({
  name: 'search_company_jobs',
  title: 'Search company jobs',
  description:
    'Search for job opportunities at a specific company. Listings are kept when their company name matches the query in either direction.',
  inputShape: {
    company_name: z.string().describe('Name of the company to search'),
    job_description: z.string().default('').describe('Job description or title; echoed back in the response'),
    location: locationField,
    country: countryField,
    page: pageField,
    results_per_page: resultsPerPageField,
  },
  async run(input, { provider, now }): Promise<CompanyEnvelope> {
    const jobs = await provider.searchByCompany({
      companyName: input.company_name,
      location: input.location,
      country: input.country,
      page: input.page,
      resultsPerPage: input.results_per_page,
    });

    return {
      company: input.company_name,
      job_description: input.job_description,
      location: input.location,
      country: input.country,
      page: input.page,
      jobs,
      total_found: jobs.length,
      timestamp: now().toISOString(),
    };
  },
});
