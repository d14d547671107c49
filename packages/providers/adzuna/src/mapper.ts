import type { JobCategory, JobRecord } from '@jobdesk/listing-sdk';
import { DEFAULT_CURRENCY_SYMBOL, formatSalary } from './salary.js';

export const SOURCE_NAME = 'Adzuna';
export const UNKNOWN_COMPANY = 'Unknown Company';

const INTERNSHIP_KEYWORDS = ['intern', 'trainee', 'apprentice'] as const;

/**
 * Shape of a single upstream field that may arrive either as a nested object
 * (`{ display_name: ... }`, `{ label: ... }`) or as a bare value.
 */
export type ResolvedField =
  | { kind: 'object'; fields: Record<string, unknown> }
  | { kind: 'scalar'; text: string }
  | { kind: 'absent' };

export interface NormalizeOptions {
  currencySymbol?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  return undefined;
}

export function resolveField(value: unknown): ResolvedField {
  if (isRecord(value)) {
    return { kind: 'object', fields: value };
  }

  if (typeof value === 'string' && value.length > 0) {
    return { kind: 'scalar', text: value };
  }

  if ((typeof value === 'number' && Number.isFinite(value) && value !== 0) || value === true) {
    return { kind: 'scalar', text: String(value) };
  }

  return { kind: 'absent' };
}

function resolveCompany(value: unknown): string {
  const field = resolveField(value);

  switch (field.kind) {
    case 'object':
      return asText(field.fields.display_name) ?? UNKNOWN_COMPANY;
    case 'scalar':
      return field.text;
    case 'absent':
      return UNKNOWN_COMPANY;
  }
}

function resolveLocation(value: unknown): string {
  const field = resolveField(value);

  switch (field.kind) {
    case 'object': {
      const area = field.fields.area;
      if (Array.isArray(area) && area.length >= 2) {
        const locality = asText(area[area.length - 1]);
        const region = asText(area[area.length - 2]);
        if (locality !== undefined && region !== undefined) {
          return `${locality}, ${region}`;
        }
      }

      return asText(field.fields.display_name) ?? '';
    }
    case 'scalar':
      return field.text;
    case 'absent':
      return '';
  }
}

function resolveCategory(value: unknown): string {
  const field = resolveField(value);

  switch (field.kind) {
    case 'object':
      return asText(field.fields.label) ?? '';
    case 'scalar':
    case 'absent':
      return '';
  }
}

/**
 * Plain substring match, so "Internal Auditor" counts as an internship.
 */
export function isInternshipTitle(title: string): boolean {
  const normalized = title.toLowerCase();
  return INTERNSHIP_KEYWORDS.some((keyword) => normalized.includes(keyword));
}

export function isRemoteLocation(location: string): boolean {
  return location.toLowerCase().includes('remote');
}

export function normalizeJob(raw: Record<string, unknown>, options: NormalizeOptions = {}): JobRecord {
  const title = asText(raw.title) ?? '';
  const location = resolveLocation(raw.location);

  return Object.freeze({
    title,
    company: resolveCompany(raw.company),
    location,
    description: asText(raw.description) ?? '',
    posted_date: asText(raw.created) ?? '',
    job_id: asText(raw.id) ?? '',
    apply_url: asText(raw.redirect_url) ?? '',
    salary: formatSalary(raw.salary_min, raw.salary_max, options.currencySymbol ?? DEFAULT_CURRENCY_SYMBOL),
    contract_type: asText(raw.contract_type) ?? '',
    contract_time: asText(raw.contract_time) ?? '',
    remote: isRemoteLocation(location),
    category: resolveCategory(raw.category),
    is_internship: isInternshipTitle(title),
    source: SOURCE_NAME,
  });
}

/**
 * Maps every object entry of an upstream `results` array; anything else is skipped.
 */
export function normalizeSearchResults(results: unknown[], options: NormalizeOptions = {}): JobRecord[] {
  return results.filter(isRecord).map((item) => normalizeJob(item, options));
}

export function normalizeCategories(results: unknown[]): JobCategory[] {
  const categories: JobCategory[] = [];

  for (const item of results) {
    if (!isRecord(item)) {
      continue;
    }

    const tag = asText(item.tag);
    const label = asText(item.label);
    if (tag === undefined || label === undefined) {
      continue;
    }

    categories.push({ tag, label });
  }

  return categories;
}
