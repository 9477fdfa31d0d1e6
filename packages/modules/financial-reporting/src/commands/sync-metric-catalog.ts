import { isRateMetric } from '../periods';
import { catalogOf } from '../context';
import type { FinancialContext } from '../context';
import type { MetricDefinition } from '../types';

/** Writes the catalog into the `metrics` table; returns the definitions written. */
export async function syncMetricCatalog(ctx: FinancialContext): Promise<MetricDefinition[]> {
  const definitions = catalogOf(ctx).metrics.map(
    (m): MetricDefinition => ({
      code: m.code,
      label: m.label,
      unit: m.unit,
      group: m.group,
      plan: m.plan,
      derived: m.derived,
      aggregation: isRateMetric(m.code) ? 'avg' : 'sum',
    }),
  );
  await ctx.financial.upsertMetrics(definitions);
  return definitions;
}
