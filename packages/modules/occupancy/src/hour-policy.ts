/**
 * Benchmark hours are the inclusive range [startHour, endHour]; every other
 * hour of the day is gray. One policy per deployment.
 */
export interface HourPolicy {
  readonly startHour: number;
  readonly endHour: number;
  inBenchmark(hour: number): boolean;
  inGray(hour: number): boolean;
  benchmarkHours(): number[];
}

export const DEFAULT_BENCHMARK = { startHour: 10, endHour: 21 } as const;

export function createHourPolicy(range: { startHour: number; endHour: number } = DEFAULT_BENCHMARK): HourPolicy {
  const { startHour, endHour } = range;
  if (!Number.isInteger(startHour) || !Number.isInteger(endHour) || startHour < 0 || endHour > 23 || startHour > endHour) {
    throw new RangeError(`Invalid benchmark range ${startHour}-${endHour}`);
  }
  const inBenchmark = (hour: number) => hour >= startHour && hour <= endHour;
  return {
    startHour,
    endHour,
    inBenchmark,
    inGray: (hour) => !inBenchmark(hour),
    benchmarkHours: () => Array.from({ length: endHour - startHour + 1 }, (_, i) => startHour + i),
  };
}
