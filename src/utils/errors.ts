export type BenchErrorCode =
  | 'CONFIG_INVALID'
  | 'RETRY_EXHAUSTED'
  | 'SAMPLE_LOG_PARSE'
  | 'SAMPLE_LOG_PATH'
  | 'COMMAND_FAILED'
  | 'TOKEN_UNAVAILABLE';

export class BenchError extends Error {
  readonly code: BenchErrorCode;

  constructor(code: BenchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends BenchError {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super('CONFIG_INVALID', `${variable}: ${message}`);
    this.variable = variable;
  }
}

export class RetryExhaustedError extends BenchError {
  readonly url: string;
  readonly attempts: number;
  readonly lastStatus?: number;

  constructor(url: string, attempts: number, lastStatus?: number, cause?: unknown) {
    const last = lastStatus !== undefined ? `last status ${lastStatus}` : 'no response';
    super('RETRY_EXHAUSTED', `Gave up on ${url} after ${attempts} attempts (${last})`, { cause });
    this.url = url;
    this.attempts = attempts;
    this.lastStatus = lastStatus;
  }
}

export class SampleLogParseError extends BenchError {
  readonly file: string;
  readonly lineNumber: number;
  readonly content: string;

  constructor(file: string, lineNumber: number, content: string) {
    super('SAMPLE_LOG_PARSE', `Malformed record in ${file} at line ${lineNumber}: "${content}"`);
    this.file = file;
    this.lineNumber = lineNumber;
    this.content = content;
  }
}

export class SampleLogPathError extends BenchError {
  constructor(logName: string) {
    super('SAMPLE_LOG_PATH', `Log name "${logName}" resolves outside the data directory`);
  }
}

export class CommandError extends BenchError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string, cause?: unknown) {
    const detail = stderr.trim() || (exitCode === null ? 'terminated by signal' : `exit code ${exitCode}`);
    super('COMMAND_FAILED', `Command failed: ${command} (${detail})`, { cause });
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class TokenError extends BenchError {
  constructor(message: string, cause?: unknown) {
    super('TOKEN_UNAVAILABLE', message, { cause });
  }
}

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};
