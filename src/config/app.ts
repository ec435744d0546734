import { CONFIG } from './constants';
import { ConfigError } from '../utils/errors';
import type { Target, TargetMap, TokenRefreshPolicy } from '../types';

export interface AuthConfig {
  staticToken?: string;
  tokenCommand: string;
  refresh: TokenRefreshPolicy;
}

export interface DeployConfig {
  region?: string;
  project?: string;
  envVar: string;
}

export interface BenchConfig {
  targets: TargetMap;
  dataDir: string;
  coldStartDelayMs: number;
  warmDelayMs: number;
  rateLimitDelayMs: number;
  errorDelayMs: number;
  maxAttempts: number;
  requestTimeoutMs: number;
  auth: AuthConfig;
  deploy: DeployConfig;
}

type Env = Record<string, string | undefined>;

const readInt = (env: Env, name: string, fallback: number): number => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(name, `expected a non-negative integer, got "${raw}"`);
  }
  return value;
};

const readMaxAttempts = (env: Env): number => {
  const raw = env.MAX_ATTEMPTS;
  if (raw === undefined || raw.trim() === '' || raw.trim().toLowerCase() === 'unbounded') {
    return Number.POSITIVE_INFINITY;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError('MAX_ATTEMPTS', `expected "unbounded" or a positive integer, got "${raw}"`);
  }
  return value;
};

const readRefreshPolicy = (env: Env): TokenRefreshPolicy => {
  const kind = (env.TOKEN_REFRESH || 'max-age').trim();
  switch (kind) {
    case 'per-request':
      return { kind: 'per-request' };
    case 'session':
      return { kind: 'session' };
    case 'max-age':
      return { kind: 'max-age', maxAgeMs: readInt(env, 'TOKEN_MAX_AGE_MS', CONFIG.AUTH.TOKEN_MAX_AGE_MS) };
    default:
      throw new ConfigError('TOKEN_REFRESH', `expected per-request, session or max-age, got "${kind}"`);
  }
};

export const parseTargetUrl = (variable: string, raw: string): string => {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(variable, `"${raw}" is not a valid URL`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(variable, `"${raw}" must use http or https`);
  }
  return raw;
};

// TARGETS=name=url;name=url
export const parseTargets = (value: string): Target[] => {
  return value
    .split(';')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map((entry) => {
      const separator = entry.indexOf('=');
      if (separator <= 0) {
        throw new ConfigError('TARGETS', `entry "${entry}" must look like name=url`);
      }
      const name = entry.slice(0, separator).trim();
      const url = parseTargetUrl('TARGETS', entry.slice(separator + 1).trim());
      return { name, url };
    });
};

export const buildTargetMap = (targets: Target[]): TargetMap => {
  const map = new Map<string, Target>();
  for (const target of targets) {
    if (map.has(target.name)) {
      throw new ConfigError('TARGETS', `duplicate target name "${target.name}"`);
    }
    map.set(target.name, Object.freeze({ ...target }));
  }
  return map;
};

const readTargets = (env: Env): TargetMap => {
  if (env.TARGETS && env.TARGETS.trim() !== '') {
    return buildTargetMap(parseTargets(env.TARGETS));
  }

  const targets: Target[] = [];
  if (env.STANDARD_FUNCTION_URL) {
    targets.push({
      name: env.STANDARD_FUNCTION_NAME || CONFIG.DEFAULT_TARGETS.STANDARD_NAME,
      url: parseTargetUrl('STANDARD_FUNCTION_URL', env.STANDARD_FUNCTION_URL)
    });
  }
  if (env.NATIVE_FUNCTION_URL) {
    targets.push({
      name: env.NATIVE_FUNCTION_NAME || CONFIG.DEFAULT_TARGETS.NATIVE_NAME,
      url: parseTargetUrl('NATIVE_FUNCTION_URL', env.NATIVE_FUNCTION_URL)
    });
  }
  return buildTargetMap(targets);
};

export const loadConfig = (env: Env = process.env): BenchConfig => {
  const config: BenchConfig = {
    targets: readTargets(env),
    dataDir: env.DATA_DIR || CONFIG.STORE.DEFAULT_DATA_DIR,
    coldStartDelayMs: readInt(env, 'COLD_START_DELAY_MS', CONFIG.TIMING.COLD_START_DELAY_MS),
    warmDelayMs: readInt(env, 'WARM_DELAY_MS', CONFIG.TIMING.WARM_DELAY_MS),
    rateLimitDelayMs: readInt(env, 'RATE_LIMIT_DELAY_MS', CONFIG.TIMING.RATE_LIMIT_DELAY_MS),
    errorDelayMs: readInt(env, 'ERROR_DELAY_MS', CONFIG.TIMING.ERROR_DELAY_MS),
    maxAttempts: readMaxAttempts(env),
    requestTimeoutMs: readInt(env, 'REQUEST_TIMEOUT_MS', CONFIG.TIMING.REQUEST_TIMEOUT_MS),
    auth: {
      staticToken: env.BENCH_TOKEN || undefined,
      tokenCommand: env.TOKEN_COMMAND || CONFIG.AUTH.TOKEN_COMMAND,
      refresh: readRefreshPolicy(env)
    },
    deploy: {
      region: env.GCLOUD_REGION || undefined,
      project: env.GCLOUD_PROJECT || undefined,
      envVar: env.REDEPLOY_ENV_VAR || CONFIG.DEPLOY.REDEPLOY_ENV_VAR
    }
  };

  return Object.freeze(config);
};

export const resolveTarget = (config: BenchConfig, name: string): Target => {
  const target = config.targets.get(name);
  if (!target) {
    const known = [...config.targets.keys()];
    const hint = known.length > 0 ? `known targets: ${known.join(', ')}` : 'no targets configured';
    throw new ConfigError('TARGETS', `unknown target "${name}" (${hint})`);
  }
  return target;
};
