import type { HistogramBin, LatencySummary, SummaryComparison } from '../types';

const EMPTY_SUMMARY: LatencySummary = {
  count: 0,
  mean: 0,
  median: 0,
  p95: 0,
  p99: 0,
  min: 0,
  max: 0,
  stdDev: 0
};

// Linear interpolation between closest ranks; `sorted` must be ascending
export const percentile = (sorted: readonly number[], p: number): number => {
  if (sorted.length === 0) return 0;
  if (p < 0 || p > 100) {
    throw new RangeError(`Percentile must be within [0, 100], got ${p}`);
  }

  const index = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const weight = index - lower;
  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
};

export const summarize = (latencies: readonly number[]): LatencySummary => {
  const n = latencies.length;
  if (n === 0) return { ...EMPTY_SUMMARY };

  const sorted = [...latencies].sort((a, b) => a - b);
  const mean = sorted.reduce((sum, value) => sum + value, 0) / n;
  const variance = n > 1
    ? sorted.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (n - 1)
    : 0;

  return {
    count: n,
    mean,
    median: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    min: sorted[0],
    max: sorted[n - 1],
    stdDev: Math.sqrt(variance)
  };
};

export const histogram = (latencies: readonly number[], bins: number): HistogramBin[] => {
  if (!Number.isInteger(bins) || bins < 1) {
    throw new RangeError(`Bin count must be a positive integer, got ${bins}`);
  }
  if (latencies.length === 0) return [];

  const min = latencies.reduce((acc, value) => Math.min(acc, value), Number.POSITIVE_INFINITY);
  const max = latencies.reduce((acc, value) => Math.max(acc, value), Number.NEGATIVE_INFINITY);
  const width = (max - min) / bins;

  // All values equal: a single bin holds everything
  if (width === 0) {
    return [{ start: min, end: max, count: latencies.length }];
  }

  const result: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    start: min + i * width,
    end: i === bins - 1 ? max : min + (i + 1) * width,
    count: 0
  }));

  for (const value of latencies) {
    const index = Math.min(bins - 1, Math.floor((value - min) / width));
    result[index].count++;
  }

  return result;
};

// Positive improvement means the candidate is faster than the baseline
const relativeImprovement = (baseline: number, candidate: number): number =>
  baseline === 0 ? 0 : ((baseline - candidate) / baseline) * 100;

export const compareSummaries = (
  baselineName: string,
  baseline: LatencySummary,
  candidateName: string,
  candidate: LatencySummary
): SummaryComparison => ({
  baseline: baselineName,
  candidate: candidateName,
  improvement: {
    mean: relativeImprovement(baseline.mean, candidate.mean),
    median: relativeImprovement(baseline.median, candidate.median),
    p95: relativeImprovement(baseline.p95, candidate.p95),
    p99: relativeImprovement(baseline.p99, candidate.p99)
  }
});
