import { CONFIG } from '../config/constants';
import type { TrialClient } from '../client/request-client';
import { classifyLogState, type SampleStore } from '../store/sample-store';
import { getLogger, type Logger } from '../utils/simple-logger';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep';
import type {
  ExperimentLabel,
  ExperimentMode,
  ExperimentResult,
  PersistenceStrategy,
  Sample,
  Target,
  TrialProgress
} from '../types';

export interface RunOptions {
  mode?: ExperimentMode;
  persistence?: PersistenceStrategy;
  // Persist after this many new samples; Infinity writes once at the end
  flushEvery?: number;
  // Discarded requests sent before a warm series so its first trial is not a cold start
  warmUpRequests?: number;
  onProgress?: (progress: TrialProgress) => void;
}

export interface ExperimentRunnerOptions {
  client: TrialClient;
  store: SampleStore;
  coldStartDelayMs?: number;
  warmDelayMs?: number;
  sleep?: Sleep;
  now?: () => number;
  logger?: Logger;
}

export interface SuitePlan {
  coldCount: number;
  warmCount: number;
  mode?: ExperimentMode;
  warmUpRequests?: number;
  // Forces a fresh deployment before the target's cold series
  redeploy?: (target: Target) => Promise<void>;
  onProgress?: (progress: TrialProgress) => void;
}

export const suiteLogName = (target: Target, label: ExperimentLabel): string =>
  `${target.name}-${label}.txt`;

/**
 * Runs sequential trials against one target and persists the accepted
 * samples. Only one request is ever in flight.
 *
 * `idempotent` runs consult the log first: a complete log is returned as
 * is, a partial one is topped up to the requested count. `cumulative` runs
 * always collect `count` new samples and add them to the log.
 */
export class ExperimentRunner {
  private readonly client: TrialClient;
  private readonly store: SampleStore;
  private readonly coldStartDelayMs: number;
  private readonly warmDelayMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly logger: Logger;

  // Targets this runner has already forced a cold start on
  private readonly coldTargets = new Set<string>();

  constructor(options: ExperimentRunnerOptions) {
    this.client = options.client;
    this.store = options.store;
    this.coldStartDelayMs = options.coldStartDelayMs ?? CONFIG.TIMING.COLD_START_DELAY_MS;
    this.warmDelayMs = options.warmDelayMs ?? CONFIG.TIMING.WARM_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? getLogger('experiment-runner', 'ExperimentRunner');
  }

  runColdStart(target: Target, count: number, logName: string, options: RunOptions = {}): Promise<ExperimentResult> {
    return this.run('cold', target, count, logName, options);
  }

  runWarm(target: Target, count: number, logName: string, options: RunOptions = {}): Promise<ExperimentResult> {
    return this.run('warm', target, count, logName, options);
  }

  async runSuite(targets: readonly Target[], plan: SuitePlan): Promise<ExperimentResult[]> {
    const results: ExperimentResult[] = [];
    const options: RunOptions = { mode: plan.mode, onProgress: plan.onProgress };
    const warmOptions: RunOptions = { ...options, warmUpRequests: plan.warmUpRequests ?? 1 };

    for (const target of targets) {
      if (plan.redeploy) {
        await plan.redeploy(target);
      }
      results.push(await this.runColdStart(target, plan.coldCount, suiteLogName(target, 'cold'), options));
      results.push(await this.runWarm(target, plan.warmCount, suiteLogName(target, 'warm'), warmOptions));
    }

    return results;
  }

  private async run(
    label: ExperimentLabel,
    target: Target,
    count: number,
    logName: string,
    options: RunOptions
  ): Promise<ExperimentResult> {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Trial count must be a non-negative integer, got ${count}`);
    }

    const mode = options.mode ?? 'idempotent';
    const persistence = options.persistence ?? (mode === 'idempotent' ? 'snapshot' : 'append-log');
    const flushEvery = options.flushEvery ?? (mode === 'idempotent' ? Number.POSITIVE_INFINITY : 1);
    if (!(flushEvery >= 1)) {
      throw new RangeError(`flushEvery must be at least 1, got ${flushEvery}`);
    }

    const contents = await this.store.inspect(logName);
    const existing = contents.samples;
    const initialState = classifyLogState(existing.length, count);
    const base = { target, label, logName, mode, initialState };

    if (mode === 'idempotent' && initialState === 'complete') {
      this.logger.info('Sample log already complete, skipping collection', {
        target: target.name, label, logName, samples: existing.length
      });
      return { ...base, collected: 0, samples: existing };
    }

    const trials = mode === 'idempotent' ? count - existing.length : count;
    const delayMs = label === 'cold' ? this.coldStartDelayMs : this.warmDelayMs;
    // Only a log with no content is ever truncated; skipped lines stay on disk
    const strategy: PersistenceStrategy =
      persistence === 'snapshot' && contents.layout !== 'empty' ? 'append-log' : persistence;
    const collected: Sample[] = [];
    let pending: Sample[] = [];

    const flush = async () => {
      if (pending.length === 0) return;
      if (strategy === 'append-log') {
        await this.store.append(pending, logName);
      } else {
        await this.store.replace([...existing, ...collected], logName);
      }
      pending = [];
    };

    this.logger.info('Starting experiment', {
      target: target.name, label, logName, mode, initialState, trials
    });

    if (label === 'warm' && trials > 0) {
      await this.warmUp(target, options.warmUpRequests ?? 0);
    }

    for (let trial = 1; trial <= trials; trial++) {
      if (delayMs > 0 && (trial > 1 || this.needsLeadingDelay(label, target))) {
        await this.sleep(delayMs);
      }

      const latency = await this.client.send(target.url, label === 'cold');
      if (label === 'cold') {
        this.coldTargets.add(target.name);
      }

      const sample: Sample = { timestamp: Math.floor(this.now() / 1000), latency };
      collected.push(sample);
      pending.push(sample);

      this.logger.debug('Accepted sample', { target: target.name, label, trial, latency });
      options.onProgress?.({ target: target.name, label, trial, total: trials, latency });

      if (pending.length >= flushEvery) {
        await flush();
      }
    }

    await flush();

    this.logger.info('Experiment finished', {
      target: target.name, label, logName, collected: collected.length
    });

    return { ...base, collected: collected.length, samples: [...existing, ...collected] };
  }

  async warmUp(target: Target, requests: number): Promise<void> {
    if (requests <= 0) return;

    if (this.coldTargets.has(target.name) && this.coldStartDelayMs > 0) {
      await this.sleep(this.coldStartDelayMs);
    }
    for (let i = 0; i < requests; i++) {
      await this.client.send(target.url, false);
    }
    this.coldTargets.delete(target.name);
    this.logger.debug('Warmed up target', { target: target.name, requests });
  }

  // A previous cold trial on this target may still be tearing its instance down
  private needsLeadingDelay(label: ExperimentLabel, target: Target): boolean {
    return label === 'cold' && this.coldTargets.has(target.name);
  }
}
