import { writeFileSync, existsSync, readFileSync } from "fs";
import { resolve } from "path";

// Configurable logging options
export interface LogConfig {
  includeFile?: boolean;
  includeFunction?: boolean;
  includeStep?: boolean;
}

// Get log configuration from environment variables
const getLogConfigFromEnv = (): LogConfig => {
  return {
    includeFile: process.env.LOG_INCLUDE_FILE !== 'false',
    includeFunction: process.env.LOG_INCLUDE_FUNCTION !== 'false',
    includeStep: process.env.LOG_INCLUDE_STEP !== 'false'
  };
};

// Default log configuration from environment
export const DEFAULT_LOG_CONFIG: LogConfig = getLogConfigFromEnv();

// Helper function to format log prefix with configurable fields
export const formatLogPrefix = (
  fileName: string,
  functionName: string,
  step?: string,
  config: LogConfig = DEFAULT_LOG_CONFIG
) => {
  const parts: string[] = [];

  if (config.includeFile) {
    parts.push(`File: ${fileName}`);
  }

  if (config.includeFunction && functionName) {
    parts.push(`Function: ${functionName}`);
  }

  if (config.includeStep && step) {
    parts.push(step);
  }

  return parts.join(', ');
};

export type LogContext = Record<string, unknown>;

// Stringify context that may hold BigInt values (hrtime readings)
export const safeStringify = (obj: unknown, space?: string | number): string => {
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'bigint') {
      return value.toString();
    }
    return value;
  }, space);
};

// Error logging interface
export interface ErrorLogEntry {
  timestamp: string;
  functionName: string;
  fileName: string;
  error: {
    message: string;
    stack?: string;
    name: string;
    code?: string;
  };
  context?: string;
}

export const errorLogPath = (): string =>
  resolve(process.env.ERROR_LOG_PATH || 'error-logs.json');

const readExistingLogs = (path: string): ErrorLogEntry[] => {
  if (!existsSync(path)) return [];

  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
    return Array.isArray(parsed) ? parsed : [];
  } catch (parseError) {
    console.error('Failed to parse existing error log file:', parseError);
    return [];
  }
};

// Write error to log file
export const writeErrorToFile = (
  functionName: string,
  fileName: string,
  error: Error,
  context?: LogContext,
  path: string = errorLogPath()
): ErrorLogEntry => {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;

  const errorEntry: ErrorLogEntry = {
    timestamp: new Date().toISOString(),
    functionName,
    fileName,
    error: {
      message: error.message,
      stack: error.stack,
      name: error.name,
      code
    },
    context: context ? safeStringify(context) : undefined
  };

  const existingLogs = readExistingLogs(path);
  existingLogs.push(errorEntry);

  try {
    writeFileSync(path, JSON.stringify(existingLogs, null, 2));
  } catch (writeError) {
    console.error('Failed to write error to log file:', writeError);
  }

  return errorEntry;
};

// Helper to create a log function for a specific file and function
export const createLogger = (fileName: string, functionName: string) => {
  return {
    prefix: (step?: string) => formatLogPrefix(fileName, functionName, step),
    writeError: (error: Error, context?: LogContext) =>
      writeErrorToFile(functionName, fileName, error, context)
  };
};
