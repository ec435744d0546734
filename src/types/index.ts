// A deployed function under test
export interface Target {
  readonly name: string;
  readonly url: string;
}

export type TargetMap = ReadonlyMap<string, Target>;

export type ExperimentLabel = 'cold' | 'warm';

// An accepted measurement. `timestamp` is unix seconds at capture time;
// samples read back from the legacy single-line layout carry none.
export interface Sample {
  timestamp: number | null;
  latency: number;
}

export type SampleLogState = 'empty' | 'partial' | 'complete';

export type SampleLogLayout = 'records' | 'legacy' | 'empty';

export interface MalformedLine {
  lineNumber: number;
  content: string;
}

export interface SampleLogContents {
  layout: SampleLogLayout;
  samples: Sample[];
  malformed: MalformedLine[];
}

export type ExperimentMode = 'idempotent' | 'cumulative';

export type PersistenceStrategy = 'snapshot' | 'append-log';

export interface ExperimentResult {
  target: Target;
  label: ExperimentLabel;
  logName: string;
  mode: ExperimentMode;
  initialState: SampleLogState;
  collected: number;
  samples: Sample[];
}

export interface TrialProgress {
  target: string;
  label: ExperimentLabel;
  trial: number;
  total: number;
  latency: number;
}

export type TokenRefreshPolicy =
  | { kind: 'per-request' }
  | { kind: 'session' }
  | { kind: 'max-age'; maxAgeMs: number };

export interface LatencySummary {
  count: number;
  mean: number;
  median: number;
  p95: number;
  p99: number;
  min: number;
  max: number;
  stdDev: number;
}

export interface HistogramBin {
  start: number;
  end: number;
  count: number;
}

export interface SummaryComparison {
  baseline: string;
  candidate: string;
  improvement: {
    mean: number;
    median: number;
    p95: number;
    p99: number;
  };
}

export interface LogReport {
  logName: string;
  summary: LatencySummary;
  histogram: HistogramBin[];
  malformed: number;
}

export interface OverallReport {
  generatedAt: string;
  logs: LogReport[];
  comparisons: SummaryComparison[];
}
