import { describe, it, expect, vi } from 'vitest';
import { silentLogger } from '@hourwise/core';
import { SchedulingClient, backoffDelayMs } from '../upstream/scheduling-client';
import type { FetchLike } from '../upstream/scheduling-client';
import { UpstreamApiError } from '../errors';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function createClient(fetchImpl: FetchLike, overrides: { userToken?: string; retries?: number } = {}) {
  const sleep = vi.fn(async () => {});
  const client = new SchedulingClient({
    baseUrl: 'https://scheduling.test/',
    partnerToken: 'test-partner',
    userToken: overrides.userToken,
    retries: overrides.retries ?? 3,
    fetch: fetchImpl,
    sleep,
    logger: silentLogger,
  });
  return { client, sleep };
}

describe('backoffDelayMs', () => {
  it('doubles per attempt and caps at ten seconds', () => {
    expect([1, 2, 3, 4, 5].map(backoffDelayMs)).toEqual([2000, 4000, 8000, 10000, 10000]);
  });
});

describe('SchedulingClient', () => {
  it('sends the versioned accept header and both tokens', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse(200, { success: true, data: [], meta: [] }));
    const { client } = createClient(fetchImpl, { userToken: 'test-user' });

    await client.getRecordsPage(101, { startDate: '2025-03-01', endDate: '2025-03-31', page: 2, count: 50 });

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe(
      'https://scheduling.test/api/v1/records/101?page=2&count=50&start_date=2025-03-01&end_date=2025-03-31',
    );
    expect(init?.headers).toMatchObject({
      Accept: 'application/vnd.yclients.v2+json',
      Authorization: 'Bearer test-partner, User test-user',
    });
  });

  it('reads the total count and tolerates an empty meta array', async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse(200, { success: true, data: [{ id: 1 }], meta: { total_count: '120' } }))
      .mockResolvedValueOnce(jsonResponse(200, { success: true, data: [], meta: [] }));
    const { client } = createClient(fetchImpl);
    const query = { startDate: '2025-03-01', endDate: '2025-03-31', page: 1, count: 50 };

    await expect(client.getRecordsPage(101, query)).resolves.toEqual({ data: [{ id: 1 }], totalCount: 120 });
    await expect(client.getRecordsPage(101, query)).resolves.toEqual({ data: [], totalCount: 0 });
  });

  it('retries server errors with backoff and then succeeds', async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse(502, {}))
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(jsonResponse(200, { success: true, data: [{ id: 3, title: ' Central ' }] }));
    const { client, sleep } = createClient(fetchImpl);

    await expect(client.getCompanies()).resolves.toEqual([{ id: 3, title: 'Central' }]);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://scheduling.test/api/v1/companies?my=1');
  });

  it('gives up after the configured attempts without a trailing sleep', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse(503, {}));
    const { client, sleep } = createClient(fetchImpl, { retries: 2 });

    const error = await client.getCompanies().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(UpstreamApiError);
    expect(error).toMatchObject({ retryable: true, attempts: 2, status: 503 });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('fails immediately on success:false and on client errors', async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse(200, { success: false, meta: { message: 'denied' } }))
      .mockResolvedValueOnce(jsonResponse(404, { success: false }));
    const { client, sleep } = createClient(fetchImpl);

    await expect(client.getCompanies()).rejects.toThrow('success=false');
    await expect(client.getCompanies()).rejects.toMatchObject({ retryable: false });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('falls back to the legacy staff endpoint when staff id 0 is rejected', async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse(422, { success: false, meta: { message: 'masterId is invalid' } }))
      .mockResolvedValueOnce(jsonResponse(200, { success: true, data: [{ id: '7', name: 'Anna  ' }, { name: 'no id' }] }));
    const { client } = createClient(fetchImpl);

    await expect(client.getStaff(101)).resolves.toEqual([{ id: 7, name: 'Anna' }]);
    expect(fetchImpl.mock.calls.map((c) => c[0])).toEqual([
      'https://scheduling.test/api/v1/company/101/staff/0',
      'https://scheduling.test/api/v1/staff/101',
    ]);
  });
});
