import { z } from 'zod';
import { ConfigurationError } from '@hourwise/shared';
import catalogJson from './metric-catalog.json';
import branchCodesJson from './branch-codes.json';

const metricCode = z.string().regex(/^[a-z][a-z0-9_]*$/);

const metricDefinitionSchema = z.object({
  code: metricCode,
  label: z.string().min(1),
  unit: z.enum(['rub', 'qty', 'pct', 'ratio']),
  group: z.string().min(1),
  plan: z.boolean(),
  derived: z.boolean(),
});

const monthReportRowSchema = z.object({
  key: z.string().min(1),
  code: metricCode,
  label: z.string().min(1).optional(),
  group: z.string().min(1).optional(),
});

const catalogSchema = z.object({
  groups: z.record(z.string()),
  metrics: z.array(metricDefinitionSchema).min(1),
  monthReport: z.array(monthReportRowSchema),
  expenseCodes: z.array(metricCode),
  coworkingCodes: z.array(metricCode),
  drivers: z.array(z.object({ code: metricCode, label: z.string().min(1) })),
  yearMetrics: z.array(metricCode),
  yearGroups: z.array(z.object({ label: z.string().min(1), metrics: z.array(metricCode) })),
});

const branchCodesSchema = z.object({
  ignored: z.array(z.string()),
  aliases: z.record(z.string()),
  latinToCyrillic: z.record(z.string().length(1)),
});

export type MetricUnit = z.infer<typeof metricDefinitionSchema>['unit'];
export type CatalogMetric = z.infer<typeof metricDefinitionSchema>;
export type DriverSource = { code: string; label: string };

/** One row of the month report; `key` is unique, `code` may repeat under another group. */
export interface MonthReportRow {
  key: string;
  metric: CatalogMetric;
  label: string;
  group: string;
}

export interface MetricCatalog {
  groups: Readonly<Record<string, string>>;
  metrics: readonly CatalogMetric[];
  /** Codes stored as daily facts, in catalog order. */
  baseCodes: readonly string[];
  derivedCodes: readonly string[];
  monthReport: readonly MonthReportRow[];
  expenseCodes: readonly string[];
  coworkingCodes: readonly string[];
  drivers: readonly DriverSource[];
  yearMetrics: readonly string[];
  yearGroups: ReadonlyArray<{ label: string; metrics: readonly string[] }>;
  get(code: string): CatalogMetric | undefined;
  labelOf(code: string): string;
}

export interface BranchCodeRules {
  ignored: ReadonlySet<string>;
  aliases: ReadonlyMap<string, string>;
  latinToCyrillic: ReadonlyMap<string, string>;
}

export function parseMetricCatalog(input: unknown): MetricCatalog {
  const parsed = catalogSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid metric catalog: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  const doc = parsed.data;
  const byCode = new Map(doc.metrics.map((m) => [m.code, m]));
  const lookup = (code: string, where: string): CatalogMetric => {
    const metric = byCode.get(code);
    if (!metric) throw new ConfigurationError(`Metric catalog: ${where} names unknown metric "${code}"`);
    return metric;
  };

  const monthReport = doc.monthReport.map((row) => {
    const metric = lookup(row.code, 'monthReport');
    return { key: row.key, metric, label: row.label ?? metric.label, group: row.group ?? metric.group };
  });
  if (new Set(monthReport.map((r) => r.key)).size !== monthReport.length) {
    throw new ConfigurationError('Metric catalog: monthReport keys must be unique');
  }
  for (const code of [
    ...doc.expenseCodes,
    ...doc.coworkingCodes,
    ...doc.yearMetrics,
    ...doc.drivers.map((d) => d.code),
  ]) {
    lookup(code, 'a code list');
  }

  return {
    groups: doc.groups,
    metrics: doc.metrics,
    baseCodes: doc.metrics.filter((m) => !m.derived).map((m) => m.code),
    derivedCodes: doc.metrics.filter((m) => m.derived).map((m) => m.code),
    monthReport,
    expenseCodes: doc.expenseCodes,
    coworkingCodes: doc.coworkingCodes,
    drivers: doc.drivers,
    yearMetrics: doc.yearMetrics,
    yearGroups: doc.yearGroups,
    get: (code) => byCode.get(code),
    labelOf: (code) => byCode.get(code)?.label ?? code,
  };
}

export function parseBranchCodeRules(input: unknown): BranchCodeRules {
  const parsed = branchCodesSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid branch code rules: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return {
    ignored: new Set(parsed.data.ignored),
    aliases: new Map(Object.entries(parsed.data.aliases)),
    latinToCyrillic: new Map(Object.entries(parsed.data.latinToCyrillic)),
  };
}

export const defaultCatalog: MetricCatalog = parseMetricCatalog(catalogJson);
export const defaultBranchCodeRules: BranchCodeRules = parseBranchCodeRules(branchCodesJson);
