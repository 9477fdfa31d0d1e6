import type { IsoDate } from '@hourwise/shared';
import type { SchedulingSource } from './scheduling-client';

export interface FetchRecordsOptions {
  pageSize: number;
  onProgress?: (text: string) => Promise<void> | void;
  /** Called before every page; throws to stop the fetch. */
  throwIfCancelled?: () => void;
}

/**
 * Every record of a branch with a visit date in [from, to]. Stops on an
 * empty page, once the reported total is covered, or on a short page when
 * no total is reported.
 */
export async function fetchAllRecords(
  source: SchedulingSource,
  branchId: number,
  from: IsoDate,
  to: IsoDate,
  options: FetchRecordsOptions,
): Promise<unknown[]> {
  const out: unknown[] = [];
  const count = options.pageSize;
  let page = 1;

  for (;;) {
    options.throwIfCancelled?.();
    const { data, totalCount } = await source.getRecordsPage(branchId, {
      startDate: from,
      endDate: to,
      page,
      count,
    });
    if (data.length === 0) break;
    out.push(...data);

    await options.onProgress?.(
      totalCount > 0 ? `${branchId}: page ${page} / ~${totalCount}` : `${branchId}: page ${page}`,
    );

    if (totalCount > 0) {
      if (page * count >= totalCount) break;
    } else if (data.length < count) {
      break;
    }
    page += 1;
  }
  return out;
}
