import { ON_TIME_DELAY_MINUTES, SORT_DIRECTION } from '@constants';
import type { BucketBoundaries } from '@constants';

export interface GroupAverage<TKey> {
  key: TKey;
  average: number;
  count: number;
}

export interface GroupCount<TKey> {
  key: TKey;
  count: number;
}

type GroupKey<TKey> = TKey | null | undefined;

export function roundTo(value: number, precision: number = 2): number {
  const multiplier = Math.pow(10, precision);
  return Math.round(value * multiplier) / multiplier;
}

function isMeasured(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function countByStatus(orders: ReadonlyArray<{ status: string }>, status: string): number {
  return orders.filter(order => order.status === status).length;
}

/**
 * Percentage of `numerator` over `denominator`, rounded to 2 decimals.
 * A zero denominator yields 0.
 */
export function rate(numerator: number, denominator: number): number {
  if (denominator <= 0) return 0;
  return roundTo((numerator * 100) / denominator);
}

/**
 * Plain quotient rounded to 2 decimals, 0 when the denominator is 0.
 */
export function ratio(numerator: number, denominator: number): number {
  if (denominator === 0) return 0;
  return roundTo(numerator / denominator);
}

/**
 * Mean of the measured values. Nulls and non-finite values are ignored;
 * an empty selection yields 0.
 */
export function average(values: ReadonlyArray<number | null | undefined>): number {
  let sum = 0;
  let count = 0;
  for (const value of values) {
    if (!isMeasured(value)) continue;
    sum += value;
    count++;
  }
  return count > 0 ? sum / count : 0;
}

/**
 * Groups rows by key in a single pass and averages `valueFn` per group.
 *
 * Groups come back in first-encounter order. Rows with a null key are left
 * out; rows with a null value still count toward the group size but not
 * toward its average.
 */
export function groupAverage<TRow, TKey>(
  rows: ReadonlyArray<TRow>,
  keyFn: (row: TRow) => GroupKey<TKey>,
  valueFn: (row: TRow) => number | null | undefined,
): GroupAverage<TKey>[] {
  const accumulators = new Map<TKey, { count: number; sum: number; measured: number }>();

  for (const row of rows) {
    const key = keyFn(row);
    if (key === null || key === undefined) continue;

    let accumulator = accumulators.get(key);
    if (!accumulator) {
      accumulator = { count: 0, sum: 0, measured: 0 };
      accumulators.set(key, accumulator);
    }

    accumulator.count++;
    const value = valueFn(row);
    if (isMeasured(value)) {
      accumulator.sum += value;
      accumulator.measured++;
    }
  }

  return Array.from(accumulators.entries()).map(([key, accumulator]) => ({
    key,
    average: accumulator.measured > 0 ? accumulator.sum / accumulator.measured : 0,
    count: accumulator.count,
  }));
}

export function groupCount<TRow, TKey>(
  rows: ReadonlyArray<TRow>,
  keyFn: (row: TRow) => GroupKey<TKey>,
): GroupCount<TKey>[] {
  const counts = new Map<TKey, number>();
  for (const row of rows) {
    const key = keyFn(row);
    if (key === null || key === undefined) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return Array.from(counts.entries()).map(([key, count]) => ({ key, count }));
}

/**
 * First `n` entries ranked by `valueFn`. The sort is stable, so entries with
 * equal values keep their original relative order.
 */
export function topN<T>(
  entries: ReadonlyArray<T>,
  n: number,
  valueFn: (entry: T) => number,
  direction: SORT_DIRECTION = SORT_DIRECTION.DESC,
): T[] {
  const sign = direction === SORT_DIRECTION.DESC ? -1 : 1;
  return [...entries].sort((a, b) => sign * (valueFn(a) - valueFn(b))).slice(0, Math.max(n, 0));
}

export function distributionBucket<TLabel extends string>(
  value: number,
  boundaries: BucketBoundaries<TLabel>,
): TLabel {
  for (const boundary of boundaries) {
    if (boundary.upTo === null) return boundary.label;
    if (boundary.inclusive ? value <= boundary.upTo : value < boundary.upTo) {
      return boundary.label;
    }
  }
  return boundaries[boundaries.length - 1].label;
}

/**
 * Counts measured values per bucket. Every label is present, empty buckets
 * at 0.
 */
export function countByBucket<TLabel extends string>(
  values: ReadonlyArray<number | null | undefined>,
  boundaries: BucketBoundaries<TLabel>,
): Map<TLabel, number> {
  const counts = new Map<TLabel, number>(
    boundaries.map((boundary): [TLabel, number] => [boundary.label, 0]),
  );
  for (const value of values) {
    if (!isMeasured(value)) continue;
    const label = distributionBucket(value, boundaries);
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }
  return counts;
}

export function isOnTime(delayMinutes: number | null | undefined): boolean {
  return isMeasured(delayMinutes) && delayMinutes <= ON_TIME_DELAY_MINUTES;
}
