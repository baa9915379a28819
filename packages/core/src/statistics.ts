import type { ModeResult, ValueSummary } from './types.js';

/** Round to two decimal places (cents). */
export function roundCents(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/**
 * Arithmetic mean of a non-empty list.
 *
 * @param values - Values to average.
 * @returns The mean, or NaN for an empty list.
 */
export function mean(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total / values.length;
}

/**
 * Median of a non-empty list; even-length lists average the two middle values.
 *
 * @param values - Values in any order. Not mutated.
 * @returns The median, or NaN for an empty list.
 */
export function median(values: readonly number[]): number {
  return medianOfSorted([...values].sort((a, b) => a - b));
}

function medianOfSorted(sorted: readonly number[]): number {
  if (sorted.length === 0) return NaN;
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) {
    return sorted[mid];
  }
  return (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Most frequent value. Ties for the highest frequency never pick a winner.
 *
 * @param values - Values to inspect.
 * @returns `{ kind: 'mode', value }` or `{ kind: 'noUniqueMode' }` (also for an empty list).
 */
export function computeMode(values: readonly number[]): ModeResult {
  const counts = new Map<number, number>();
  for (const v of values) {
    counts.set(v, (counts.get(v) ?? 0) + 1);
  }

  let best: number | undefined;
  let bestCount = 0;
  let tied = false;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
      tied = false;
    } else if (count === bestCount) {
      tied = true;
    }
  }

  if (best === undefined || tied) {
    return { kind: 'noUniqueMode' };
  }
  return { kind: 'mode', value: best };
}

/**
 * Descriptive statistics for a group of agent values.
 * Values are rounded to cents before any statistic is taken.
 *
 * @param values - Agent values; may be empty.
 * @returns `{ kind: 'noData' }` for an empty group, otherwise the summary.
 *
 * @example
 * ```typescript
 * summarizeValues([1000, 1100, 1100]);
 * // { kind: 'summary', count: 3, mean: 1066.67, median: 1100, min: 1000, max: 1100,
 * //   mode: { kind: 'mode', value: 1100 } }
 * ```
 */
export function summarizeValues(values: readonly number[]): ValueSummary {
  if (values.length === 0) {
    return { kind: 'noData' };
  }

  const rounded = values.map(roundCents);
  // Math.min(...values) overflows the call stack for large populations
  const sorted = [...rounded].sort((a, b) => a - b);
  return {
    kind: 'summary',
    count: rounded.length,
    mean: roundCents(mean(rounded)),
    median: roundCents(medianOfSorted(sorted)),
    min: sorted[0],
    max: sorted[sorted.length - 1],
    mode: computeMode(rounded),
  };
}
