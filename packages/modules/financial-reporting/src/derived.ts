import { defaultCatalog } from './catalog';
import type { MetricCatalog } from './catalog';
import { sumValues } from './periods';
import type { MetricValues } from './types';

type Maybe = number | null | undefined;

/** a / b, or null when either side is missing or b is zero. */
export function safeDiv(a: Maybe, b: Maybe): number | null {
  if (a === null || a === undefined || b === null || b === undefined || b === 0) return null;
  return a / b;
}

/** Sum of the present values; null when none is present. */
export function safeSum(values: readonly Maybe[]): number | null {
  return sumValues(values);
}

function minus(a: Maybe, b: Maybe): number | null {
  if (a === null || a === undefined || b === null || b === undefined) return null;
  return a - b;
}

export interface DerivedMetrics {
  avg_check: number | null;
  writeoff_rate: number | null;
  writeoff_rate_full: number | null;
  lab_to_open_space_ratio: number | null;
  revenue_per_load: number | null;
  coffee_revenue_per_load: number | null;
  total_expenses: number | null;
  expense_ratio: number | null;
  gross_profit: number | null;
  operating_profit: number | null;
  operating_margin: number | null;
  coworking_total: number | null;
}

/**
 * Ratios and totals computed from already aggregated values. Any missing
 * input makes the dependent figure null.
 */
export function computeDerivedMetrics(values: MetricValues, catalog: MetricCatalog = defaultCatalog): DerivedMetrics {
  const revenueTotal = values.revenue_total;
  const coffeeRevenue = values.coffee_revenue_total;
  const soldFood = values.sold_food_total;
  const writtenOff = values.written_off_food_total;
  const load = values.load_percent;
  const openSpace = values.revenue_open_space;

  const totalExpenses = safeSum(catalog.expenseCodes.map((code) => values[code]));
  const operatingProfit = minus(revenueTotal, totalExpenses);

  return {
    avg_check: safeDiv(coffeeRevenue, values.coffee_checks),
    writeoff_rate: safeDiv(writtenOff, soldFood),
    writeoff_rate_full: safeDiv(writtenOff, safeSum([soldFood, writtenOff])),
    lab_to_open_space_ratio: safeDiv(values.revenue_lab, openSpace),
    revenue_per_load: safeDiv(openSpace, load),
    coffee_revenue_per_load: safeDiv(coffeeRevenue, load),
    total_expenses: totalExpenses,
    expense_ratio: safeDiv(totalExpenses, revenueTotal),
    gross_profit: minus(revenueTotal, values.expense_food_purchase),
    operating_profit: operatingProfit,
    operating_margin: safeDiv(operatingProfit, revenueTotal),
    coworking_total: safeSum(catalog.coworkingCodes.map((code) => values[code])),
  };
}

/** Aggregated values with the derived figures merged in. */
export function withDerivedMetrics(values: MetricValues, catalog: MetricCatalog = defaultCatalog): MetricValues {
  return { ...values, ...computeDerivedMetrics(values, catalog) };
}
