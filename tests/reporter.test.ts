import { describe, expect, it } from 'vitest';
import { ResultReporter } from '../src/report/reporter';

describe('ResultReporter', () => {
  describe('formatLatency', () => {
    it('picks a unit for the magnitude', () => {
      expect(ResultReporter.formatLatency(0.0005)).toBe('500.0μs');
      expect(ResultReporter.formatLatency(0.25)).toBe('250.0ms');
      expect(ResultReporter.formatLatency(1.5)).toBe('1.50s');
    });
  });

  describe('renderHistogram', () => {
    it('scales bars to the fullest bin', () => {
      const lines = ResultReporter.renderHistogram([
        { start: 0, end: 0.5, count: 2 },
        { start: 0.5, end: 1, count: 4 }
      ], 10);

      expect(lines).toEqual([
        `${'0.0μs - 500.0ms'.padEnd(24)} █████ 2`,
        `${'500.0ms - 1.00s'.padEnd(24)} ██████████ 4`
      ]);
    });

    it('renders nothing for empty bins', () => {
      expect(ResultReporter.renderHistogram([])).toEqual([]);
    });
  });

  describe('buildLogReport', () => {
    it('summarizes the samples and counts skipped records', () => {
      const report = ResultReporter.buildLogReport('g.txt', {
        layout: 'records',
        samples: [
          { timestamp: 1700000000, latency: 0.4 },
          { timestamp: 1700000005, latency: 0.6 }
        ],
        malformed: [{ lineNumber: 3, content: 'garbage' }]
      }, 2);

      expect(report.logName).toBe('g.txt');
      expect(report.summary.count).toBe(2);
      expect(report.summary.mean).toBeCloseTo(0.5, 9);
      expect(report.histogram.map(bin => bin.count)).toEqual([1, 1]);
      expect(report.malformed).toBe(1);
    });
  });

  describe('buildOverallReport', () => {
    it('compares every log against the first one', () => {
      const contents = (latency: number) => ({
        layout: 'records' as const,
        samples: [{ timestamp: 1700000000, latency }],
        malformed: []
      });
      const jvm = ResultReporter.buildLogReport('my-func-cold.txt', contents(2), 1);
      const graalvm = ResultReporter.buildLogReport('my-func-graalvm-cold.txt', contents(0.5), 1);

      const report = ResultReporter.buildOverallReport([jvm, graalvm], new Date('2024-05-01T12:00:00.000Z'));

      expect(report.generatedAt).toBe('2024-05-01T12:00:00.000Z');
      expect(report.comparisons).toEqual([{
        baseline: 'my-func-cold.txt',
        candidate: 'my-func-graalvm-cold.txt',
        improvement: { mean: 75, median: 75, p95: 75, p99: 75 }
      }]);
    });
  });
});
