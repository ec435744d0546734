import { writeFileSync } from 'fs';
import chalk from 'chalk';
import Table from 'cli-table3';
import { compareSummaries, histogram, summarize } from './statistics';
import type {
  ExperimentResult,
  HistogramBin,
  LatencySummary,
  LogReport,
  OverallReport,
  SampleLogContents,
  SummaryComparison
} from '../types';

const HISTOGRAM_WIDTH = 40;

export class ResultReporter {
  // Latencies are stored in seconds
  static formatLatency(seconds: number): string {
    const ms = seconds * 1000;
    if (ms < 1) {
      return `${(ms * 1000).toFixed(1)}μs`;
    } else if (ms < 1000) {
      return `${ms.toFixed(1)}ms`;
    } else {
      return `${seconds.toFixed(2)}s`;
    }
  }

  static formatPercentage(num: number): string {
    const sign = num > 0 ? '+' : '';
    const color = num > 0 ? chalk.green : num < 0 ? chalk.red : chalk.gray;
    return color(`${sign}${num.toFixed(1)}%`);
  }

  static buildLogReport(logName: string, contents: SampleLogContents, bins: number): LogReport {
    const latencies = contents.samples.map(sample => sample.latency);
    return {
      logName,
      summary: summarize(latencies),
      histogram: histogram(latencies, bins),
      malformed: contents.malformed.length
    };
  }

  static buildOverallReport(logs: LogReport[], generatedAt: Date = new Date()): OverallReport {
    const comparisons: SummaryComparison[] = [];
    const [baseline, ...candidates] = logs;
    if (baseline) {
      for (const candidate of candidates) {
        comparisons.push(compareSummaries(baseline.logName, baseline.summary, candidate.logName, candidate.summary));
      }
    }
    return { generatedAt: generatedAt.toISOString(), logs, comparisons };
  }

  static renderHistogram(bins: readonly HistogramBin[], width: number = HISTOGRAM_WIDTH): string[] {
    const peak = bins.reduce((max, bin) => Math.max(max, bin.count), 0);
    if (peak === 0) return [];

    return bins.map((bin) => {
      const length = Math.round((bin.count / peak) * width);
      const range = `${this.formatLatency(bin.start)} - ${this.formatLatency(bin.end)}`;
      return `${range.padEnd(24)} ${'█'.repeat(length)} ${bin.count}`;
    });
  }

  static printExperimentResult(result: ExperimentResult): void {
    const color = result.label === 'cold' ? chalk.cyan : chalk.yellow;
    console.log(`\n${color.bold(`${result.label.toUpperCase()} - ${result.target.name}`)}`);

    if (result.collected === 0) {
      console.log(chalk.gray(`Log ${result.logName} already holds ${result.samples.length} samples, nothing collected`));
    } else {
      console.log(chalk.white(`Collected ${result.collected} samples into ${result.logName} (${result.samples.length} total)`));
    }

    this.printSummaryTable(summarize(result.samples.map(sample => sample.latency)));
  }

  static printSummaryTable(summary: LatencySummary): void {
    const table = new Table({
      head: ['Metric', 'Value'],
      colWidths: [20, 15]
    });

    table.push(
      ['Samples', summary.count.toString()],
      ['Mean', this.formatLatency(summary.mean)],
      ['Median', this.formatLatency(summary.median)],
      ['P95', this.formatLatency(summary.p95)],
      ['P99', this.formatLatency(summary.p99)],
      ['Min', this.formatLatency(summary.min)],
      ['Max', this.formatLatency(summary.max)],
      ['Std Dev', this.formatLatency(summary.stdDev)]
    );

    console.log(table.toString());
  }

  static printLogReport(report: LogReport): void {
    console.log(`\n${chalk.bold.white(`📊 ${report.logName}`)}`);
    this.printSummaryTable(report.summary);

    if (report.malformed > 0) {
      console.log(chalk.red(`  • ${report.malformed} malformed records skipped`));
    }

    const lines = this.renderHistogram(report.histogram);
    if (lines.length > 0) {
      console.log(chalk.gray('\nDistribution:'));
      lines.forEach(line => console.log(chalk.blue(`  ${line}`)));
    }
  }

  static printComparison(comparison: SummaryComparison, baseline: LatencySummary, candidate: LatencySummary): void {
    console.log(`\n${chalk.bold.white('═'.repeat(80))}`);
    console.log(chalk.bold.white(`🔥 COMPARISON: ${comparison.baseline} vs ${comparison.candidate}`));
    console.log(chalk.bold.white('═'.repeat(80)));

    const table = new Table({
      head: ['Metric', comparison.baseline, comparison.candidate, 'Improvement'],
      colWidths: [15, 22, 22, 15]
    });

    table.push(
      ['Mean', this.formatLatency(baseline.mean), this.formatLatency(candidate.mean), this.formatPercentage(comparison.improvement.mean)],
      ['Median', this.formatLatency(baseline.median), this.formatLatency(candidate.median), this.formatPercentage(comparison.improvement.median)],
      ['P95', this.formatLatency(baseline.p95), this.formatLatency(candidate.p95), this.formatPercentage(comparison.improvement.p95)],
      ['P99', this.formatLatency(baseline.p99), this.formatLatency(candidate.p99), this.formatPercentage(comparison.improvement.p99)]
    );

    console.log(table.toString());

    const improvement = comparison.improvement.mean;
    if (improvement > 10) {
      console.log(chalk.green.bold(`✅ ${comparison.candidate} is ${improvement.toFixed(1)}% faster on average`));
    } else if (improvement < -10) {
      console.log(chalk.red.bold(`❌ ${comparison.baseline} is ${Math.abs(improvement).toFixed(1)}% faster on average`));
    } else {
      console.log(chalk.gray.bold('⚖️  Performance is comparable'));
    }
  }

  static printOverallReport(report: OverallReport): void {
    report.logs.forEach(log => this.printLogReport(log));

    const byName = new Map(report.logs.map(log => [log.logName, log.summary]));
    for (const comparison of report.comparisons) {
      const baseline = byName.get(comparison.baseline);
      const candidate = byName.get(comparison.candidate);
      if (baseline && candidate) {
        this.printComparison(comparison, baseline, candidate);
      }
    }
  }

  static exportResults(results: OverallReport, filename?: string): string {
    const timestamp = results.generatedAt.replace(/[:.]/g, '-');
    const file = filename || `performance-report-${timestamp}.json`;

    writeFileSync(file, JSON.stringify(results, null, 2));
    console.log(chalk.blue(`\n📊 Results exported to: ${file}`));
    return file;
  }
}
