export type {
  JobRecord,
  JobCategory,
  JobSearchQuery,
  InternshipSearchQuery,
  CompanySearchQuery,
  JobSearchProvider,
  SearchLogger,
} from './types.js';
export {
  jobRecordSchema,
  jobCategorySchema,
  searchEnvelopeSchema,
  companyEnvelopeSchema,
  remoteEnvelopeSchema,
  internshipEnvelopeSchema,
  categoryEnvelopeSchema,
} from './schema.js';
export type {
  SearchEnvelope,
  CompanyEnvelope,
  RemoteEnvelope,
  InternshipEnvelope,
  CategoryEnvelope,
} from './schema.js';
