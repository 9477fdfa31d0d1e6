import type { z } from 'zod';
import { logger as defaultLogger } from '@hourwise/core/observability';
import type { Logger } from '@hourwise/core/observability';
import { UpstreamApiError } from '../errors';
import { companySchema, listResponseSchema, recordsPageSchema, staffMemberSchema } from '../validation';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface SchedulingClientOptions {
  baseUrl: string;
  partnerToken: string;
  userToken?: string;
  timeoutMs?: number;
  /** Total attempts per request, including the first. */
  retries?: number;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface RecordsPage {
  data: unknown[];
  totalCount: number;
}

export interface StaffMember {
  id: number;
  name: string;
}

export interface Company {
  id: number;
  title: string;
}

/** The upstream surface the pipeline and group resolution depend on. */
export interface SchedulingSource {
  getRecordsPage(branchId: number, query: { startDate: string; endDate: string; page: number; count: number }): Promise<RecordsPage>;
  getStaff(branchId: number): Promise<StaffMember[]>;
  getCompanies(): Promise<Company[]>;
}

type QueryParams = Record<string, string | number>;

export function backoffDelayMs(attempt: number): number {
  return Math.min(2 ** attempt, 10) * 1000;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

class RetryableFailure extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export class SchedulingClient implements SchedulingSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(private readonly options: SchedulingClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retries = Math.max(1, options.retries ?? 3);
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? defaultLogger;
  }

  private headers(): Record<string, string> {
    let auth = `Bearer ${this.options.partnerToken}`;
    if (this.options.userToken) {
      auth = `${auth}, User ${this.options.userToken}`;
    }
    return {
      Accept: 'application/vnd.yclients.v2+json',
      'Content-Type': 'application/json',
      Authorization: auth,
    };
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async attempt(url: string, path: string): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: this.headers(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      // Network failures and timeouts are worth another try.
      throw new RetryableFailure(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    }

    if (response.status >= 500) {
      throw new RetryableFailure(`Server error ${response.status}`, response.status);
    }

    const text = await response.text();
    let body: unknown = {};
    if (text.length > 0) {
      try {
        body = JSON.parse(text);
      } catch {
        throw new UpstreamApiError(`Invalid JSON from ${path} (status ${response.status})`, {
          status: response.status,
          retryable: false,
          path,
        });
      }
    }

    const envelope = listResponseSchema.safeParse(body);
    if (envelope.success && envelope.data.success === false) {
      throw new UpstreamApiError(`Request to ${path} reported success=false: ${describeMeta(body)}`, {
        status: response.status,
        retryable: false,
        path,
      });
    }
    if (response.status >= 400) {
      throw new UpstreamApiError(`Request to ${path} failed with status ${response.status}: ${describeMeta(body)}`, {
        status: response.status,
        retryable: false,
        path,
      });
    }
    return body;
  }

  /** GET with bounded retries on 5xx, timeouts and network errors. */
  async request<S extends z.ZodTypeAny>(path: string, schema: S, params?: QueryParams): Promise<z.output<S>> {
    const url = this.buildUrl(path, params);
    let last: RetryableFailure | null = null;

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      try {
        const body = await this.attempt(url, path);
        const parsed = schema.safeParse(body);
        if (!parsed.success) {
          throw new UpstreamApiError(`Unexpected response shape from ${path}`, { retryable: false, path });
        }
        return parsed.data;
      } catch (err) {
        if (!(err instanceof RetryableFailure)) throw err;
        last = err;
        if (attempt < this.retries) {
          const delay = backoffDelayMs(attempt);
          this.log.warn('Scheduling API request failed, retrying', {
            path,
            attempt,
            delayMs: delay,
            error: { message: err.message },
          });
          await this.sleep(delay);
        }
      }
    }

    throw new UpstreamApiError(`Scheduling API request to ${path} failed after ${this.retries} attempts: ${last?.message ?? 'unknown error'}`, {
      status: last?.status,
      attempts: this.retries,
      retryable: true,
      path,
    });
  }

  async getRecordsPage(
    branchId: number,
    query: { startDate: string; endDate: string; page: number; count: number },
  ): Promise<RecordsPage> {
    const body = await this.request(`/api/v1/records/${branchId}`, recordsPageSchema, {
      page: query.page,
      count: query.count,
      start_date: query.startDate,
      end_date: query.endDate,
    });
    const meta = body.meta;
    const totalCount = meta && !Array.isArray(meta) ? (meta.total_count ?? 0) : 0;
    return { data: body.data ?? [], totalCount };
  }

  /**
   * All staff of a branch. Staff id 0 asks for everyone; some accounts reject
   * that, in which case the older listing endpoint is used.
   */
  async getStaff(branchId: number): Promise<StaffMember[]> {
    let body: z.output<typeof listResponseSchema>;
    try {
      body = await this.request(`/api/v1/company/${branchId}/staff/0`, listResponseSchema);
    } catch (err) {
      if (!isStaffEndpointRejection(err)) throw err;
      this.log.info('Staff endpoint rejected staff id 0, using fallback', { branchId });
      body = await this.request(`/api/v1/staff/${branchId}`, listResponseSchema);
    }
    return parseItems(body.data, staffMemberSchema).map((s) => ({ id: s.id, name: (s.name ?? '').trim() }));
  }

  async getCompanies(): Promise<Company[]> {
    const body = await this.request('/api/v1/companies', listResponseSchema, { my: 1 });
    return parseItems(body.data, companySchema).map((c) => ({ id: c.id, title: (c.title ?? '').trim() }));
  }
}

function isStaffEndpointRejection(err: unknown): boolean {
  if (!(err instanceof UpstreamApiError) || err.retryable) return false;
  if (err.status === 400 || err.status === 422) return true;
  return /masterId|staff_id/.test(err.message);
}

function parseItems<S extends z.ZodTypeAny>(items: unknown[] | null | undefined, schema: S): z.output<S>[] {
  const out: z.output<S>[] = [];
  for (const item of items ?? []) {
    const parsed = schema.safeParse(item);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

function describeMeta(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'meta' in body) {
    return JSON.stringify(body.meta);
  }
  return JSON.stringify(body);
}
