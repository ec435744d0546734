import { runCommand, splitCommand, type CommandRunner } from '../utils/command';
import { TokenError, errorMessage } from '../utils/errors';
import { getLogger, type Logger } from '../utils/simple-logger';
import type { TokenRefreshPolicy } from '../types';

export interface TokenProvider {
  getToken(): Promise<string>;
  // Drop any cached token so the next call fetches a fresh one
  invalidate(): void;
}

export class StaticTokenProvider implements TokenProvider {
  constructor(private readonly token: string) {
    if (token.trim() === '') {
      throw new TokenError('Static bearer token is empty');
    }
  }

  async getToken(): Promise<string> {
    return this.token;
  }

  invalidate(): void {
    // A static token cannot be refreshed
  }
}

interface CachedToken {
  value: string;
  fetchedAt: number;
}

export interface CommandTokenProviderOptions {
  commandLine: string;
  policy: TokenRefreshPolicy;
  runner?: CommandRunner;
  now?: () => number;
  logger?: Logger;
}

/**
 * Obtains identity tokens from an external command such as
 * `gcloud auth print-identity-token`.
 *
 * The refresh policy decides how long a fetched token is reused:
 * `per-request` runs the command on every call, `session` keeps the first
 * token until it is invalidated, and `max-age` refetches once the cached
 * token is older than the configured age.
 */
export class CommandTokenProvider implements TokenProvider {
  private readonly command: string;
  private readonly args: string[];
  private readonly policy: TokenRefreshPolicy;
  private readonly runner: CommandRunner;
  private readonly now: () => number;
  private readonly logger: Logger;

  private cached: CachedToken | null = null;
  private inFlight: Promise<string> | null = null;

  constructor(options: CommandTokenProviderOptions) {
    const { command, args } = splitCommand(options.commandLine);
    if (!command) {
      throw new TokenError('Token command is empty');
    }
    this.command = command;
    this.args = args;
    this.policy = options.policy;
    this.runner = options.runner ?? runCommand;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? getLogger('token-provider', 'CommandTokenProvider');
  }

  private isFresh(token: CachedToken): boolean {
    switch (this.policy.kind) {
      case 'per-request':
        return false;
      case 'session':
        return true;
      case 'max-age':
        return this.now() - token.fetchedAt < this.policy.maxAgeMs;
    }
  }

  async getToken(): Promise<string> {
    if (this.cached && this.isFresh(this.cached)) {
      return this.cached.value;
    }

    if (!this.inFlight) {
      this.inFlight = this.fetchToken().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  invalidate(): void {
    this.cached = null;
  }

  private async fetchToken(): Promise<string> {
    let stdout: string;
    try {
      ({ stdout } = await this.runner(this.command, this.args));
    } catch (error) {
      throw new TokenError(`Failed to obtain identity token: ${errorMessage(error)}`, error);
    }

    const value = stdout.trim();
    if (value === '') {
      throw new TokenError(`Token command "${this.command}" produced no output`);
    }

    this.cached = { value, fetchedAt: this.now() };
    this.logger.debug('Fetched identity token', { policy: this.policy.kind });
    return value;
  }
}
