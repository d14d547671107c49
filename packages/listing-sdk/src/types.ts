export interface JobRecord {
  title: string;
  company: string;
  location: string;
  description: string;
  posted_date: string;
  job_id: string;
  apply_url: string;
  salary: string;
  contract_type: string;
  contract_time: string;
  remote: boolean;
  category: string;
  is_internship: boolean;
  source: string;
}

export interface JobCategory {
  tag: string;
  label: string;
}

export interface JobSearchQuery {
  keywords: string;
  location: string;
  country: string;
  page: number;
  resultsPerPage: number;
}

export interface InternshipSearchQuery extends Omit<JobSearchQuery, 'keywords'> {
  field: string;
}

export interface CompanySearchQuery extends Omit<JobSearchQuery, 'keywords'> {
  companyName: string;
}

/**
 * Contract between the tool layer and an upstream listing provider.
 * Implementations never reject: upstream failures resolve to an empty list.
 */
export interface JobSearchProvider {
  readonly sourceName: string;
  search(query: JobSearchQuery): Promise<JobRecord[]>;
  searchInternships(query: InternshipSearchQuery): Promise<JobRecord[]>;
  searchByCompany(query: CompanySearchQuery): Promise<JobRecord[]>;
  getCategories(country: string): Promise<JobCategory[]>;
}

export interface SearchLogger {
  debug(payload: Record<string, unknown>, message: string): void;
  warn(payload: Record<string, unknown>, message: string): void;
}
