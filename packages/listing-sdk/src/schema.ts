import { z } from 'zod';

export const jobRecordSchema = z.object({
  title: z.string(),
  company: z.string(),
  location: z.string(),
  description: z.string(),
  posted_date: z.string(),
  job_id: z.string(),
  apply_url: z.string(),
  salary: z.string().min(1),
  contract_type: z.string(),
  contract_time: z.string(),
  remote: z.boolean(),
  category: z.string(),
  is_internship: z.boolean(),
  source: z.string().min(1),
});

export const jobCategorySchema = z.object({
  tag: z.string(),
  label: z.string(),
});

const envelopeBase = {
  country: z.string(),
  total_found: z.number().int().nonnegative(),
  timestamp: z.string().datetime(),
};

export const searchEnvelopeSchema = z.object({
  ...envelopeBase,
  search_terms: z.string(),
  location: z.string(),
  page: z.number().int().positive(),
  jobs: z.array(jobRecordSchema),
});

export const companyEnvelopeSchema = z.object({
  ...envelopeBase,
  company: z.string(),
  job_description: z.string(),
  location: z.string(),
  page: z.number().int().positive(),
  jobs: z.array(jobRecordSchema),
});

export const remoteEnvelopeSchema = z.object({
  ...envelopeBase,
  search_terms: z.string(),
  page: z.number().int().positive(),
  remote_jobs: z.array(jobRecordSchema),
});

export const internshipEnvelopeSchema = z.object({
  ...envelopeBase,
  field: z.string(),
  location: z.string(),
  page: z.number().int().positive(),
  internships: z.array(jobRecordSchema),
});

export const categoryEnvelopeSchema = z.object({
  ...envelopeBase,
  categories: z.array(jobCategorySchema),
});

export type SearchEnvelope = z.infer<typeof searchEnvelopeSchema>;
export type CompanyEnvelope = z.infer<typeof companyEnvelopeSchema>;
export type RemoteEnvelope = z.infer<typeof remoteEnvelopeSchema>;
export type InternshipEnvelope = z.infer<typeof internshipEnvelopeSchema>;
export type CategoryEnvelope = z.infer<typeof categoryEnvelopeSchema>;
