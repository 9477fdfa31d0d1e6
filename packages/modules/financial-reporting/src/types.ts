import type { IsoDate } from '@hourwise/shared';

export interface DateWindow {
  from: IsoDate;
  to: IsoDate;
}

/** Daily values of one metric, keyed by date. A missing date means unknown. */
export type MetricSeries = ReadonlyMap<IsoDate, number>;
export type SeriesByMetric = ReadonlyMap<string, MetricSeries>;

/** Aggregated or derived values by metric code; null means no data. */
export type MetricValues = Readonly<Record<string, number | null>>;

export interface DailyMetricFact {
  branchCode: string;
  metricCode: string;
  date: IsoDate;
  value: number;
  source: string;
}

export interface MonthlyPlan {
  branchCode: string;
  metricCode: string;
  /** First day of the month. */
  monthStart: IsoDate;
  value: number;
}

export interface Branch {
  code: string;
  name: string;
}

export type MetricAggregation = 'sum' | 'avg';

export interface MetricDefinition {
  code: string;
  label: string;
  unit: string | null;
  group: string | null;
  plan: boolean;
  derived: boolean;
  aggregation: MetricAggregation;
}

export interface MonthlyTotal {
  metricCode: string;
  /** `YYYY-MM`. */
  month: string;
  value: number;
}

/**
 * Daily load figures from the occupancy side, keyed by date. Wired in by
 * the caller so the financial reports never import occupancy code.
 */
export type LoadSource = (branchCode: string, from: IsoDate, to: IsoDate) => Promise<ReadonlyMap<IsoDate, number>>;
