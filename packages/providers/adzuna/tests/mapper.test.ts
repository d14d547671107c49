import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { jobRecordSchema, searchEnvelopeSchema } from '@jobdesk/listing-sdk';
import {
  isInternshipTitle,
  isRemoteLocation,
  normalizeCategories,
  normalizeJob,
  normalizeSearchResults,
  resolveField,
} from '../src/mapper.js';
import { adzunaCategoriesResponseSchema, adzunaSearchResponseSchema } from '../src/types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture = adzunaSearchResponseSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../fixtures/search-response.json'), 'utf-8')),
);
const categoriesFixture = adzunaCategoriesResponseSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../fixtures/categories-response.json'), 'utf-8')),
);

describe('Adzuna mapper', () => {
  it('maps a fully populated listing', () => {
    const [job] = normalizeSearchResults(fixture.results);

    expect(job).toEqual({
      title: 'Software Engineer Intern',
      company: 'Acme Corp',
      location: 'Bengaluru, Karnataka',
      description: 'Work with the platform team on internal tooling.',
      posted_date: '2026-10-01T09:15:00Z',
      job_id: '4310581299',
      apply_url: 'https://example.test/land/ad/4310581299',
      salary: '₹50,000 - ₹80,000',
      contract_type: 'permanent',
      contract_time: 'full_time',
      remote: false,
      category: 'IT Jobs',
      is_internship: true,
      source: 'Adzuna',
    });
  });

  it('keeps the display name when the area list is too short', () => {
    const job = normalizeSearchResults(fixture.results)[1];

    expect(job?.location).toBe('Remote');
    expect(job?.remote).toBe(true);
    expect(job?.salary).toBe('₹1,200,000+');
    expect(job?.company).toBe('Acme Corporation India');
  });

  it('resolves scalar company and location fields', () => {
    const job = normalizeSearchResults(fixture.results)[2];

    expect(job?.job_id).toBe('98765');
    expect(job?.company).toBe('Other');
    expect(job?.location).toBe('Pune (Remote friendly)');
    expect(job?.remote).toBe(true);
    expect(job?.category).toBe('');
    expect(job?.salary).toBe('Up to ₹80,000');
    expect(job?.is_internship).toBe(true);
  });

  it('fills every default for an empty listing', () => {
    const job = normalizeSearchResults(fixture.results)[3];

    expect(job).toEqual({
      title: '',
      company: 'Unknown Company',
      location: '',
      description: '',
      posted_date: '',
      job_id: '',
      apply_url: '',
      salary: 'Not specified',
      contract_type: '',
      contract_time: '',
      remote: false,
      category: '',
      is_internship: false,
      source: 'Adzuna',
    });
  });

  it('produces records that pass the record schema', () => {
    const jobs = normalizeSearchResults(fixture.results);

    expect(jobs.map((job) => jobRecordSchema.safeParse(job).success)).toEqual([true, true, true, true]);
  });

  it('keeps a blank nested company name and still satisfies the output schemas', () => {
    const job = normalizeJob({ company: { display_name: '' } });

    expect(job.company).toBe('');
    expect(jobRecordSchema.safeParse(job).success).toBe(true);
    expect(
      searchEnvelopeSchema.safeParse({
        search_terms: '',
        location: 'India',
        country: 'in',
        page: 1,
        jobs: [job],
        total_found: 1,
        timestamp: '2026-10-19T08:00:00.000Z',
      }).success,
    ).toBe(true);
  });

  it('skips entries that are not objects', () => {
    const jobs = normalizeSearchResults(['garbage', null, 42, { title: 'Trainee Chef' }]);

    expect(jobs).toHaveLength(1);
    expect(jobs[0]?.is_internship).toBe(true);
  });

  it('uses the currency symbol it is given', () => {
    const job = normalizeJob({ salary_min: 30000, salary_max: 45000 }, { currencySymbol: '£' });

    expect(job.salary).toBe('£30,000 - £45,000');
  });

  it('falls back to the default company when the nested name is missing', () => {
    expect(normalizeJob({ company: {} }).company).toBe('Unknown Company');
    expect(normalizeJob({ company: '' }).company).toBe('Unknown Company');
    expect(normalizeJob({ company: { display_name: null } }).company).toBe('Unknown Company');
  });

  it('does not mutate the upstream item and freezes the record', () => {
    const raw = { title: 'Analyst', location: { display_name: 'Delhi', area: ['India', 'Delhi', 'New Delhi'] } };
    const snapshot = JSON.stringify(raw);

    const job = normalizeJob(raw);

    expect(JSON.stringify(raw)).toBe(snapshot);
    expect(job.location).toBe('New Delhi, Delhi');
    expect(Object.isFrozen(job)).toBe(true);
  });

  it('falls back to the display name when area entries are not text', () => {
    const job = normalizeJob({ location: { display_name: 'New Delhi', area: [{ code: 'IN' }, 'Delhi'] } });

    expect(job.location).toBe('New Delhi');
  });

  it('accepts numeric area entries', () => {
    const job = normalizeJob({ location: { display_name: 'Sector 62', area: ['Noida', 62] } });

    expect(job.location).toBe('62, Noida');
  });
});

describe('resolveField', () => {
  it('tags objects, scalars and absent values', () => {
    expect(resolveField({ label: 'IT Jobs' })).toEqual({ kind: 'object', fields: { label: 'IT Jobs' } });
    expect(resolveField('Acme')).toEqual({ kind: 'scalar', text: 'Acme' });
    expect(resolveField(17)).toEqual({ kind: 'scalar', text: '17' });
    expect(resolveField('')).toEqual({ kind: 'absent' });
    expect(resolveField(null)).toEqual({ kind: 'absent' });
    expect(resolveField(undefined)).toEqual({ kind: 'absent' });
    expect(resolveField(['India'])).toEqual({ kind: 'absent' });
  });
});

describe('title and location heuristics', () => {
  it.each([
    ['Marketing Intern', true],
    ['Graduate Trainee', true],
    ['Electrician APPRENTICE', true],
    ['Internal Communications Lead', true],
    ['Senior Backend Engineer', false],
    ['', false],
  ])('isInternshipTitle(%j) is %s', (title, expected) => {
    expect(isInternshipTitle(title)).toBe(expected);
  });

  it.each([
    ['Remote', true],
    ['Mumbai (REMOTE)', true],
    ['Work remotely, India', true],
    ['Chennai, Tamil Nadu', false],
    ['', false],
  ])('isRemoteLocation(%j) is %s', (location, expected) => {
    expect(isRemoteLocation(location)).toBe(expected);
  });
});

describe('normalizeCategories', () => {
  it('keeps tag/label pairs and drops incomplete entries', () => {
    expect(normalizeCategories(categoriesFixture.results)).toEqual([
      { tag: 'it-jobs', label: 'IT Jobs' },
      { tag: 'graduate-jobs', label: 'Graduate Jobs' },
    ]);
  });
});
