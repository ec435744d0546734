import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { resolveTarget } from './config/app';
import type { Harness } from './harness';
import { ResultReporter } from './report/reporter';
import { suiteLogName, type RunOptions } from './runner/experiment-runner';
import type { ExperimentLabel, ExperimentMode, LogReport, TrialProgress } from './types';

interface ExperimentCommandOptions {
  count: number;
  log?: string;
  mode: ExperimentMode;
  flushEvery?: number;
  warmUp: number;
}

interface SuiteCommandOptions {
  coldCount: number;
  warmCount: number;
  mode: ExperimentMode;
  redeploy?: boolean;
}

interface ReportCommandOptions {
  bins: number;
  export?: string | boolean;
}

export const parseCount = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
};

export const parsePositive = (value: string): number => {
  const parsed = parseCount(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
};

export const parseMode = (value: string): ExperimentMode => {
  if (value === 'idempotent' || value === 'cumulative') return value;
  throw new InvalidArgumentError('Expected "idempotent" or "cumulative".');
};

// Prints roughly twenty progress lines per series
const progressPrinter = () => (progress: TrialProgress) => {
  const every = Math.max(1, Math.floor(progress.total / 20));
  if (progress.trial % every !== 0 && progress.trial !== progress.total) return;

  const percent = (progress.trial / progress.total) * 100;
  console.log(chalk.blue(
    `[${progress.target}:${progress.label}] ${progress.trial}/${progress.total} ` +
    `(${percent.toFixed(1)}%) last ${ResultReporter.formatLatency(progress.latency)}`
  ));
};

const addExperimentCommand = (
  program: Command,
  label: ExperimentLabel,
  description: string,
  defaultCount: number,
  getHarness: () => Harness
) => {
  program
    .command(label)
    .description(description)
    .argument('<target>', 'Configured target name')
    .option('-n, --count <count>', 'Number of accepted samples', parseCount, defaultCount)
    .option('-o, --log <file>', 'Sample log file inside the data directory (default: <target>-<kind>.txt)')
    .option('-m, --mode <mode>', 'idempotent (skip or top up an existing log) or cumulative (always append)', parseMode, 'idempotent')
    .option('--flush-every <count>', 'Persist after this many samples', parsePositive)
    .option('--warm-up <count>', 'Discarded requests before a warm series', parseCount, label === 'warm' ? 1 : 0)
    .action(async (targetName: string, options: ExperimentCommandOptions) => {
      const harness = getHarness();
      const target = resolveTarget(harness.config, targetName);
      const logName = options.log ?? suiteLogName(target, label);
      const runOptions: RunOptions = {
        mode: options.mode,
        flushEvery: options.flushEvery,
        warmUpRequests: options.warmUp,
        onProgress: progressPrinter()
      };

      console.log(chalk.white(`Target: ${target.name} (${target.url})`));
      console.log(chalk.white(`Log: ${harness.store.resolvePath(logName)}`));

      const result = label === 'cold'
        ? await harness.runner.runColdStart(target, options.count, logName, runOptions)
        : await harness.runner.runWarm(target, options.count, logName, runOptions);

      ResultReporter.printExperimentResult(result);
    });
};

export const createProgram = (getHarness: () => Harness): Command => {
  const program = new Command();

  program
    .name('cold-start-bench')
    .description('Cold-start and warm-request latency benchmark for HTTP functions')
    .version('1.0.0');

  program
    .command('targets')
    .description('List configured targets')
    .action(() => {
      const { config } = getHarness();
      const table = new Table({
        head: [chalk.cyan('Target'), chalk.cyan('URL')]
      });
      for (const target of config.targets.values()) {
        table.push([target.name, target.url]);
      }
      console.log(table.toString());
    });

  addExperimentCommand(program, 'cold', 'Measure forced cold starts against a target', 50, getHarness);
  addExperimentCommand(program, 'warm', 'Measure warm requests against a target', 1000, getHarness);

  program
    .command('suite')
    .description('Run cold and warm series for every configured target')
    .option('-c, --cold-count <count>', 'Cold samples per target', parseCount, 50)
    .option('-w, --warm-count <count>', 'Warm samples per target', parseCount, 1000)
    .option('-m, --mode <mode>', 'idempotent or cumulative', parseMode, 'idempotent')
    .option('--redeploy', 'Redeploy each target service before its cold series')
    .action(async (options: SuiteCommandOptions) => {
      const harness = getHarness();
      const targets = [...harness.config.targets.values()];
      if (targets.length === 0) {
        console.log(chalk.yellow('⚠️  No targets configured'));
        return;
      }

      const results = await harness.runner.runSuite(targets, {
        coldCount: options.coldCount,
        warmCount: options.warmCount,
        mode: options.mode,
        redeploy: options.redeploy
          ? async (target) => {
              await harness.redeployer.redeploy(target.name);
            }
          : undefined,
        onProgress: progressPrinter()
      });

      results.forEach(result => ResultReporter.printExperimentResult(result));
    });

  program
    .command('report')
    .description('Summarize sample logs; the first log is the baseline for comparisons')
    .argument('<logs...>', 'Sample log files inside the data directory')
    .option('-b, --bins <count>', 'Histogram bins', parsePositive, 20)
    .option('-e, --export [file]', 'Write the report as JSON')
    .action(async (logs: string[], options: ReportCommandOptions) => {
      const { store } = getHarness();
      const reports: LogReport[] = [];
      for (const logName of logs) {
        const contents = await store.inspect(logName);
        reports.push(ResultReporter.buildLogReport(logName, contents, options.bins));
      }

      const overall = ResultReporter.buildOverallReport(reports);
      ResultReporter.printOverallReport(overall);

      if (options.export) {
        ResultReporter.exportResults(overall, typeof options.export === 'string' ? options.export : undefined);
      }
    });

  program
    .command('compare')
    .description('Compare two sample logs')
    .argument('<baseline>', 'Baseline sample log')
    .argument('<candidate>', 'Candidate sample log')
    .action(async (baselineLog: string, candidateLog: string) => {
      const { store } = getHarness();
      const baseline = ResultReporter.buildLogReport(baselineLog, await store.inspect(baselineLog), 1);
      const candidate = ResultReporter.buildLogReport(candidateLog, await store.inspect(candidateLog), 1);
      const overall = ResultReporter.buildOverallReport([baseline, candidate]);

      overall.comparisons.forEach(comparison =>
        ResultReporter.printComparison(comparison, baseline.summary, candidate.summary)
      );
    });

  program
    .command('redeploy')
    .description('Force a fresh deployment of a container service')
    .argument('<service>', 'Service name')
    .action(async (service: string) => {
      const { redeployer, config } = getHarness();
      const nonce = await redeployer.redeploy(service);
      console.log(chalk.green(`✅ ${service} redeployed (${config.deploy.envVar}=${nonce})`));
    });

  return program;
};
