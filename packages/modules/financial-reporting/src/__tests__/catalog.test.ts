import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@hourwise/shared';
import { defaultCatalog, parseMetricCatalog } from '../catalog';
import { isIgnoredBranchCode, normalizeBranchCode } from '../branch-codes';

describe('metric catalog', () => {
  it('separates stored and derived codes', () => {
    expect(defaultCatalog.baseCodes).toContain('revenue_total');
    expect(defaultCatalog.baseCodes).not.toContain('avg_check');
    expect(defaultCatalog.derivedCodes).toContain('avg_check');
    expect(defaultCatalog.expenseCodes).toHaveLength(10);
    expect(defaultCatalog.coworkingCodes).toHaveLength(6);
  });

  it('lets one metric appear twice in the month report under different keys', () => {
    const food = defaultCatalog.monthReport.filter((row) => row.metric.code === 'sold_food_total');
    expect(food.map((row) => [row.key, row.group])).toEqual([
      ['sold_food_total_total', 'coffee_fact'],
      ['sold_food_total_food', 'coffee_categories'],
    ]);
  });

  it('rejects a report row that names an unknown metric', () => {
    const broken = {
      groups: {},
      metrics: [{ code: 'revenue_total', label: 'Revenue', unit: 'rub', group: 'revenue', plan: false, derived: false }],
      monthReport: [{ key: 'x', code: 'missing_metric' }],
      expenseCodes: [],
      coworkingCodes: [],
      drivers: [],
      yearMetrics: [],
      yearGroups: [],
    };
    expect(() => parseMetricCatalog(broken)).toThrow(ConfigurationError);
  });
});

describe('normalizeBranchCode', () => {
  it('trims, upper-cases and maps aliases', () => {
    expect(normalizeBranchCode(' cm ')).toBe('СМ');
  });

  it('swaps Latin look-alike letters for Cyrillic ones', () => {
    expect(normalizeBranchCode('ak')).toBe('АК');
  });

  it('leaves letters without a twin alone', () => {
    expect(normalizeBranchCode('Ж1')).toBe('Ж1');
  });

  it('returns null for blank input', () => {
    expect(normalizeBranchCode('  ')).toBeNull();
    expect(normalizeBranchCode(undefined)).toBeNull();
  });
});

describe('isIgnoredBranchCode', () => {
  it('matches roll-up codes in either alphabet', () => {
    expect(isIgnoredBranchCode('sum')).toBe(true);
    expect(isIgnoredBranchCode('СУМ')).toBe(true);
    expect(isIgnoredBranchCode('СС')).toBe(false);
  });
});
