import type { TokenProvider } from '../auth/token-provider';
import { RetryExhaustedError, TokenError, errorMessage } from '../utils/errors';
import { getLogger, type Logger } from '../utils/simple-logger';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep';
import { withColdStartMarker } from './cold-start';
import { classifyStatus, createRetryPolicy, retryDelay, type AttemptOutcome, type RetryPolicy } from './retry-policy';
import type { HttpTransport } from './transport';

export interface Measurement {
  url: string;
  // Seconds spent in the accepted (200) request only
  latency: number;
  attempts: number;
  rateLimited: number;
}

export interface RequestClientOptions {
  transport: HttpTransport;
  tokens: TokenProvider;
  retry?: Partial<RetryPolicy>;
  sleep?: Sleep;
  clock?: () => bigint;
  logger?: Logger;
}

// Anything that can produce one accepted latency for a URL
export interface TrialClient {
  send(url: string, forceColdStart: boolean): Promise<number>;
}

const NANOS_PER_SECOND = 1_000_000_000;

export class RequestClient implements TrialClient {
  private readonly transport: HttpTransport;
  private readonly tokens: TokenProvider;
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly clock: () => bigint;
  private readonly logger: Logger;

  constructor(options: RequestClientOptions) {
    this.transport = options.transport;
    this.tokens = options.tokens;
    this.policy = createRetryPolicy(options.retry);
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? (() => process.hrtime.bigint());
    this.logger = options.logger ?? getLogger('request-client', 'RequestClient');
  }

  get retryPolicy(): Readonly<RetryPolicy> {
    return this.policy;
  }

  async send(url: string, forceColdStart: boolean): Promise<number> {
    const measurement = await this.measure(url, forceColdStart);
    return measurement.latency;
  }

  /**
   * Issues GETs against `url` until one returns 200 and reports the elapsed
   * time of that request alone. Time spent in rejected attempts and in
   * backoff is never part of the result.
   */
  async measure(url: string, forceColdStart: boolean): Promise<Measurement> {
    const requestUrl = forceColdStart ? withColdStartMarker(url) : url;
    let rateLimited = 0;
    let lastStatus: number | undefined;
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
      let outcome: AttemptOutcome;
      try {
        const token = await this.tokens.getToken();
        const headers = { Authorization: `Bearer ${token}` };

        const start = this.clock();
        const response = await this.transport({ url: requestUrl, headers });
        const end = this.clock();
        lastStatus = response.status;
        outcome = classifyStatus(response.status);

        if (outcome.kind === 'accepted') {
          return {
            url: requestUrl,
            latency: Number(end - start) / NANOS_PER_SECOND,
            attempts: attempt,
            rateLimited
          };
        }
      } catch (error) {
        lastError = error;
        lastStatus = undefined;
        outcome = { kind: 'failed' };
        const reason = error instanceof TokenError ? 'Token fetch failed' : 'Request failed without a response';
        this.logger.warn(reason, { url: requestUrl, attempt, error: errorMessage(error) });
      }

      if (outcome.kind === 'rate-limited') {
        rateLimited++;
        this.logger.warn('Rate limited, backing off', { url: requestUrl, attempt, delayMs: this.policy.rateLimitDelayMs });
      } else if (outcome.kind === 'auth-rejected') {
        this.tokens.invalidate();
        this.logger.warn('Token rejected, refreshing', { url: requestUrl, attempt, status: outcome.status });
      } else if (outcome.status !== undefined) {
        this.logger.debug('Unexpected status, retrying', { url: requestUrl, attempt, status: outcome.status });
      }

      if (attempt >= this.policy.maxAttempts) break;

      const delay = retryDelay(this.policy, outcome);
      if (delay > 0) {
        await this.sleep(delay);
      }
    }

    throw new RetryExhaustedError(requestUrl, this.policy.maxAttempts, lastStatus, lastError);
  }
}
