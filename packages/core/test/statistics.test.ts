import { describe, it, expect } from 'vitest';
import { summarizeValues, computeMode, mean, median, roundCents } from '../src/statistics.js';

describe('computeMode', () => {
  it('reports no unique mode when the top frequency is shared', () => {
    expect(computeMode([1, 1, 2, 2])).toEqual({ kind: 'noUniqueMode' });
  });

  it('returns the single most frequent value', () => {
    expect(computeMode([1, 1, 1, 2])).toEqual({ kind: 'mode', value: 1 });
  });

  it('reports no unique mode when every value is distinct', () => {
    expect(computeMode([3, 1, 2])).toEqual({ kind: 'noUniqueMode' });
  });

  it('returns the value of a single-element list', () => {
    expect(computeMode([900])).toEqual({ kind: 'mode', value: 900 });
  });

  it('finds a mode that appears after a lower-frequency tie', () => {
    expect(computeMode([5, 6, 7, 7])).toEqual({ kind: 'mode', value: 7 });
  });

  it('reports no unique mode for an empty list', () => {
    expect(computeMode([])).toEqual({ kind: 'noUniqueMode' });
  });
});

describe('mean / median', () => {
  it('computes the mean', () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5);
  });

  it('takes the middle value of an odd-length list', () => {
    expect(median([9, 1, 5])).toBe(5);
  });

  it('averages the two middle values of an even-length list', () => {
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });

  it('does not reorder its input', () => {
    const values = [3, 1, 2];
    median(values);
    expect(values).toEqual([3, 1, 2]);
  });
});

describe('roundCents', () => {
  it('rounds to two decimals', () => {
    expect(roundCents(1066.666666)).toBe(1066.67);
    expect(roundCents(729)).toBe(729);
  });
});

describe('summarizeValues', () => {
  it('returns an explicit no-data result for an empty group', () => {
    expect(summarizeValues([])).toEqual({ kind: 'noData' });
  });

  it('summarizes a group', () => {
    expect(summarizeValues([1000, 1100, 1100])).toEqual({
      kind: 'summary',
      count: 3,
      mean: 1066.67,
      median: 1100,
      min: 1000,
      max: 1100,
      mode: { kind: 'mode', value: 1100 },
    });
  });

  it('rounds values to cents before counting the mode', () => {
    const summary = summarizeValues([1210.0000000000002, 1210, 990]);
    expect(summary).toEqual({
      kind: 'summary',
      count: 3,
      mean: 1136.67,
      median: 1210,
      min: 990,
      max: 1210,
      mode: { kind: 'mode', value: 1210 },
    });
  });

  it('carries the no-unique-mode variant', () => {
    const summary = summarizeValues([600, 1300]);
    expect(summary.kind).toBe('summary');
    if (summary.kind === 'summary') {
      expect(summary.mode).toEqual({ kind: 'noUniqueMode' });
      expect(summary.median).toBe(950);
    }
  });

  it('summarizes a population of several hundred thousand values', () => {
    const values = Array.from({ length: 300_000 }, (_, i) => 1000 + (i % 1000));
    expect(summarizeValues(values)).toEqual({
      kind: 'summary',
      count: 300_000,
      mean: 1499.5,
      median: 1499.5,
      min: 1000,
      max: 1999,
      mode: { kind: 'noUniqueMode' },
    });
  });
});
