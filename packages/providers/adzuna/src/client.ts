import type { z } from 'zod';
import {
  adzunaCategoriesResponseSchema,
  adzunaSearchResponseSchema,
  type AdzunaCategoriesResponse,
  type AdzunaSearchParams,
  type AdzunaSearchResponse,
} from './types.js';

export const DEFAULT_BASE_URL = 'https://api.adzuna.com/v1/api/jobs';
export const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_USER_AGENT = 'jobdesk/0.1';

export interface AdzunaClientOptions {
  appId?: string;
  appKey?: string;
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class AdzunaHttpError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Adzuna API request failed with status ${status}`);
    this.name = 'AdzunaHttpError';
    this.status = status;
    this.body = body;
  }
}

export class AdzunaResponseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AdzunaResponseError';
  }
}

export class AdzunaClientClosedError extends Error {
  constructor() {
    super('Adzuna client is closed');
    this.name = 'AdzunaClientClosedError';
  }
}

/**
 * Thin HTTP client for the Adzuna jobs API.
 *
 * One instance is meant to live for the whole process. Every request gets its
 * own timeout; `close()` aborts whatever is still in flight and rejects any
 * later call with {@link AdzunaClientClosedError}.
 */
export class AdzunaClient {
  private readonly appId: string;
  private readonly appKey: string;
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(options: AdzunaClientOptions = {}) {
    this.appId = options.appId ?? '';
    this.appKey = options.appKey ?? '';
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async searchJobs(params: AdzunaSearchParams): Promise<AdzunaSearchResponse> {
    const query = new URLSearchParams({
      app_id: this.appId,
      app_key: this.appKey,
      results_per_page: String(params.resultsPerPage),
      what: params.what,
      where: params.where,
    });

    return this.request(
      `/${encodeURIComponent(params.country)}/search/${params.page}?${query.toString()}`,
      adzunaSearchResponseSchema,
    );
  }

  async getCategories(country: string): Promise<AdzunaCategoriesResponse> {
    const query = new URLSearchParams({
      app_id: this.appId,
      app_key: this.appKey,
    });

    return this.request(`/${encodeURIComponent(country)}/categories?${query.toString()}`, adzunaCategoriesResponseSchema);
  }

  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  private async request<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    if (this.closed) {
      throw new AdzunaClientClosedError();
    }

    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    this.inFlight.add(controller);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        signal: controller.signal,
        headers: {
          Accept: 'application/json',
          'User-Agent': this.userAgent,
        },
      });

      if (!response.ok) {
        const body = await response.text();
        throw new AdzunaHttpError(response.status, body);
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        throw new AdzunaResponseError('Adzuna API returned a body that is not valid JSON', { cause: error });
      }

      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new AdzunaResponseError(`Adzuna API returned an unexpected payload${where}: ${issue?.message ?? 'invalid'}`);
      }

      return parsed.data;
    } finally {
      clearTimeout(timeout);
      this.inFlight.delete(controller);
    }
  }
}
