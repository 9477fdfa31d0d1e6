import { describe, it, expect, vi } from 'vitest';
import { fetchAllRecords } from '../upstream/fetch-records';
import type { RecordsPage, SchedulingSource } from '../upstream/scheduling-client';
import { EtlCancelledError } from '../errors';

function sourceWithPages(pages: RecordsPage[]) {
  const getRecordsPage = vi.fn(async (_branchId: number, query: { page: number }) => {
    return pages[query.page - 1] ?? { data: [], totalCount: 0 };
  });
  const source: SchedulingSource = {
    getRecordsPage,
    getStaff: async () => [],
    getCompanies: async () => [],
  };
  return { source, getRecordsPage };
}

describe('fetchAllRecords', () => {
  it('stops once the reported total is covered', async () => {
    const { source, getRecordsPage } = sourceWithPages([
      { data: [1, 2], totalCount: 3 },
      { data: [3], totalCount: 3 },
      { data: [4], totalCount: 3 },
    ]);
    const progress: string[] = [];

    const records = await fetchAllRecords(source, 101, '2025-03-01', '2025-03-31', {
      pageSize: 2,
      onProgress: (text) => {
        progress.push(text);
      },
    });

    expect(records).toEqual([1, 2, 3]);
    expect(getRecordsPage).toHaveBeenCalledTimes(2);
    expect(getRecordsPage.mock.calls[0]).toEqual([
      101,
      { startDate: '2025-03-01', endDate: '2025-03-31', page: 1, count: 2 },
    ]);
    expect(progress).toEqual(['101: page 1 / ~3', '101: page 2 / ~3']);
  });

  it('stops on a short page when no total is reported', async () => {
    const { source, getRecordsPage } = sourceWithPages([
      { data: [1, 2], totalCount: 0 },
      { data: [3], totalCount: 0 },
    ]);
    const progress: string[] = [];

    const records = await fetchAllRecords(source, 7, '2025-03-01', '2025-03-01', {
      pageSize: 2,
      onProgress: (text) => {
        progress.push(text);
      },
    });

    expect(records).toEqual([1, 2, 3]);
    expect(getRecordsPage).toHaveBeenCalledTimes(2);
    expect(progress).toEqual(['7: page 1', '7: page 2']);
  });

  it('stops on an empty page', async () => {
    const { source, getRecordsPage } = sourceWithPages([{ data: [1, 2], totalCount: 0 }]);

    const records = await fetchAllRecords(source, 7, '2025-03-01', '2025-03-01', { pageSize: 2 });

    expect(records).toEqual([1, 2]);
    expect(getRecordsPage).toHaveBeenCalledTimes(2);
  });

  it('checks for cancellation before each page', async () => {
    const { source, getRecordsPage } = sourceWithPages([
      { data: [1, 2], totalCount: 10 },
      { data: [3, 4], totalCount: 10 },
    ]);
    let calls = 0;

    await expect(
      fetchAllRecords(source, 7, '2025-03-01', '2025-03-31', {
        pageSize: 2,
        throwIfCancelled: () => {
          calls += 1;
          if (calls > 1) throw new EtlCancelledError();
        },
      }),
    ).rejects.toThrow('cancelled');
    expect(getRecordsPage).toHaveBeenCalledTimes(1);
  });
});
