import { createLogger, type LogContext } from './logger';

// Environment-aware logging levels
export const LOG_LEVELS = {
  SILENT: 0,
  ERROR: 1,
  WARN: 2,
  INFO: 3,
  DEBUG: 4,
  TRACE: 5
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

const isLogLevel = (value: string): value is LogLevel => value in LOG_LEVELS;

// An explicit LOG_LEVEL wins; otherwise development runs log DEBUG, everything else INFO
export const resolveLogLevel = (env: NodeJS.ProcessEnv = process.env): number => {
  const requested = (env.LOG_LEVEL || '').toUpperCase();
  if (isLogLevel(requested)) return LOG_LEVELS[requested];
  return env.NODE_ENV === 'development' ? LOG_LEVELS.DEBUG : LOG_LEVELS.INFO;
};

export interface Logger {
  error(message: string, error?: Error, meta?: LogContext): void;
  warn(message: string, meta?: LogContext): void;
  info(message: string, meta?: LogContext): void;
  debug(message: string, meta?: LogContext): void;
}

export class SimpleLogger implements Logger {
  private logger: ReturnType<typeof createLogger>;
  private level: number;

  constructor(module: string, functionName: string = '', level: number = resolveLogLevel()) {
    this.logger = createLogger(module, functionName);
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= this.level;
  }

  private line(message: string): string {
    return `[${this.logger.prefix()}] ${message}`;
  }

  // Errors go to the console and to the error log file
  error(message: string, error?: Error, meta?: LogContext) {
    if (this.shouldLog('ERROR')) {
      console.error(this.line(message), error ? error.message : '');
      this.logger.writeError(error || new Error(message), { message, ...meta });
    }
  }

  warn(message: string, meta?: LogContext) {
    if (this.shouldLog('WARN')) {
      console.warn(this.line(message), meta ?? '');
    }
  }

  info(message: string, meta?: LogContext) {
    if (this.shouldLog('INFO')) {
      console.info(this.line(message), meta ?? '');
    }
  }

  debug(message: string, meta?: LogContext) {
    if (this.shouldLog('DEBUG')) {
      console.debug(this.line(message), meta ?? '');
    }
  }
}

// Factory function for consistent logger creation
export const getLogger = (module: string, functionName?: string): Logger => {
  return new SimpleLogger(module, functionName);
};
