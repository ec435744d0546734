import { describe, expect, it } from 'vitest';
import { compareSummaries, histogram, percentile, summarize } from '../src/report/statistics';

describe('percentile', () => {
  it('interpolates between closest ranks', () => {
    expect(percentile([1, 2, 3, 4], 50)).toBe(2.5);
    expect(percentile([1, 2, 3, 4], 95)).toBeCloseTo(3.85, 9);
    expect(percentile([1, 2, 3, 4], 0)).toBe(1);
    expect(percentile([1, 2, 3, 4], 100)).toBe(4);
  });

  it('returns the only value of a single-sample set', () => {
    expect(percentile([0.7], 99)).toBe(0.7);
  });

  it('rejects percentiles outside 0..100', () => {
    expect(() => percentile([1], 101)).toThrow(RangeError);
  });
});

describe('summarize', () => {
  it('computes descriptive statistics regardless of input order', () => {
    const summary = summarize([4, 1, 3, 2]);

    expect(summary.count).toBe(4);
    expect(summary.mean).toBe(2.5);
    expect(summary.median).toBe(2.5);
    expect(summary.p95).toBeCloseTo(3.85, 9);
    expect(summary.p99).toBeCloseTo(3.97, 9);
    expect(summary.min).toBe(1);
    expect(summary.max).toBe(4);
    expect(summary.stdDev).toBeCloseTo(Math.sqrt(5 / 3), 9);
  });

  it('returns zeros for an empty set', () => {
    expect(summarize([])).toEqual({
      count: 0, mean: 0, median: 0, p95: 0, p99: 0, min: 0, max: 0, stdDev: 0
    });
  });

  it('reports no spread for a single sample', () => {
    expect(summarize([0.5]).stdDev).toBe(0);
  });
});

describe('histogram', () => {
  it('splits the range into equal-width bins with the maximum in the last bin', () => {
    const bins = histogram([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10], 5);

    expect(bins.map(bin => bin.count)).toEqual([2, 2, 2, 2, 3]);
    expect(bins[0]).toEqual({ start: 0, end: 2, count: 2 });
    expect(bins[4]).toEqual({ start: 8, end: 10, count: 3 });
  });

  it('puts identical values into a single bin', () => {
    expect(histogram([0.5, 0.5, 0.5], 10)).toEqual([{ start: 0.5, end: 0.5, count: 3 }]);
  });

  it('returns no bins for no data', () => {
    expect(histogram([], 10)).toEqual([]);
  });

  it('rejects a non-positive bin count', () => {
    expect(() => histogram([1], 0)).toThrow(RangeError);
  });
});

describe('compareSummaries', () => {
  it('reports positive improvement when the candidate is faster', () => {
    const baseline = summarize([2, 2, 2]);
    const candidate = summarize([1, 1, 1]);

    const comparison = compareSummaries('jvm', baseline, 'native', candidate);

    expect(comparison.baseline).toBe('jvm');
    expect(comparison.candidate).toBe('native');
    expect(comparison.improvement.mean).toBeCloseTo(50, 9);
    expect(comparison.improvement.median).toBeCloseTo(50, 9);
    expect(comparison.improvement.p95).toBeCloseTo(50, 9);
    expect(comparison.improvement.p99).toBeCloseTo(50, 9);
  });

  it('reports zero improvement against an empty baseline', () => {
    const comparison = compareSummaries('empty', summarize([]), 'native', summarize([1]));

    expect(comparison.improvement.mean).toBe(0);
  });
});
