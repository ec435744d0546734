// Central configuration constants for the cold-start benchmark
export const CONFIG = {
  // Request marker understood by the deployed functions: terminate the
  // process shortly after responding so the next request starts cold
  COLD_START: {
    MARKER: 'coldstart',
  },

  // Timing defaults, all in milliseconds
  TIMING: {
    COLD_START_DELAY_MS: 5000,   // let the instance terminate between cold trials
    WARM_DELAY_MS: 0,
    RATE_LIMIT_DELAY_MS: 30000,  // fixed backoff after a 429
    ERROR_DELAY_MS: 0,           // transient errors retry immediately
    REQUEST_TIMEOUT_MS: 120000,
  },

  // Identity token handling
  AUTH: {
    TOKEN_COMMAND: 'gcloud auth print-identity-token',
    TOKEN_MAX_AGE_MS: 45 * 60 * 1000, // identity tokens expire after 60 minutes
  },

  HTTP: {
    OK: 200,
    UNAUTHORIZED: 401,
    FORBIDDEN: 403,
    TOO_MANY_REQUESTS: 429,
  },

  STORE: {
    DEFAULT_DATA_DIR: './data',
    LATENCY_DECIMALS: 6,
  },

  DEPLOY: {
    CLI: 'gcloud',
    REDEPLOY_ENV_VAR: 'BENCH_REDEPLOY_NONCE',
  },

  DEFAULT_TARGETS: {
    STANDARD_NAME: 'my-func',
    NATIVE_NAME: 'my-func-graalvm',
  },
} as const;

export default CONFIG;
