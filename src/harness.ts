import type { BenchConfig } from './config/app';
import { CommandTokenProvider, StaticTokenProvider, type TokenProvider } from './auth/token-provider';
import { RequestClient } from './client/request-client';
import { createAxiosTransport, type HttpTransport } from './client/transport';
import { Redeployer } from './deploy/redeployer';
import { ExperimentRunner } from './runner/experiment-runner';
import { SampleStore } from './store/sample-store';

export interface Harness {
  config: BenchConfig;
  tokens: TokenProvider;
  client: RequestClient;
  store: SampleStore;
  runner: ExperimentRunner;
  redeployer: Redeployer;
}

export interface HarnessOverrides {
  transport?: HttpTransport;
  tokens?: TokenProvider;
}

export const createTokenProvider = (config: BenchConfig): TokenProvider => {
  if (config.auth.staticToken) {
    return new StaticTokenProvider(config.auth.staticToken);
  }
  return new CommandTokenProvider({
    commandLine: config.auth.tokenCommand,
    policy: config.auth.refresh
  });
};

// Wires the session context once; every component receives it explicitly
export const createHarness = (config: BenchConfig, overrides: HarnessOverrides = {}): Harness => {
  const tokens = overrides.tokens ?? createTokenProvider(config);

  const client = new RequestClient({
    transport: overrides.transport ?? createAxiosTransport({ timeoutMs: config.requestTimeoutMs }),
    tokens,
    retry: {
      maxAttempts: config.maxAttempts,
      rateLimitDelayMs: config.rateLimitDelayMs,
      errorDelayMs: config.errorDelayMs
    }
  });

  const store = new SampleStore({ rootDir: config.dataDir });

  const runner = new ExperimentRunner({
    client,
    store,
    coldStartDelayMs: config.coldStartDelayMs,
    warmDelayMs: config.warmDelayMs
  });

  return {
    config,
    tokens,
    client,
    store,
    runner,
    redeployer: new Redeployer({ config: config.deploy })
  };
};
