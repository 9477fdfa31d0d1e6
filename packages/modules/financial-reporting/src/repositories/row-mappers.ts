import type { MetricAggregation } from '../types';

export const WRITE_CHUNK = 500;

export function chunk<T>(items: readonly T[], size: number = WRITE_CHUNK): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

export function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string') return Number(value);
  throw new TypeError(`Expected a numeric column, got ${typeof value}`);
}

export function toAggregation(value: unknown): MetricAggregation {
  return value === 'avg' ? 'avg' : 'sum';
}

export function toBool(value: unknown): boolean {
  return value === true || value === 1 || value === 't' || value === '1';
}
