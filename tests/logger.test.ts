import { readFile } from 'fs/promises';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { formatLogPrefix, safeStringify, writeErrorToFile } from '../src/utils/logger';
import { LOG_LEVELS, SimpleLogger, resolveLogLevel } from '../src/utils/simple-logger';
import { SampleLogPathError } from '../src/utils/errors';
import { makeTempDir, removeDir } from './helpers';

describe('formatLogPrefix', () => {
  it('includes only the enabled fields', () => {
    const all = { includeFile: true, includeFunction: true, includeStep: true };

    expect(formatLogPrefix('runner', 'run', 'trial 2', all)).toBe('File: runner, Function: run, trial 2');
    expect(formatLogPrefix('runner', 'run', 'trial 2', { ...all, includeFile: false })).toBe('Function: run, trial 2');
    expect(formatLogPrefix('runner', '', undefined, all)).toBe('File: runner');
  });
});

describe('safeStringify', () => {
  it('writes bigint values as strings', () => {
    expect(safeStringify({ start: 10n })).toBe('{"start":"10"}');
  });
});

describe('error log file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it('appends entries with the error code and context', async () => {
    const path = join(dir, 'errors.json');

    writeErrorToFile('append', 'sample-store', new Error('disk full'), undefined, path);
    const entry = writeErrorToFile('resolvePath', 'sample-store', new SampleLogPathError('../x.txt'), { logName: '../x.txt' }, path);

    expect(entry.error.code).toBe('SAMPLE_LOG_PATH');
    expect(entry.context).toBe('{"logName":"../x.txt"}');

    const written: unknown = JSON.parse(await readFile(path, 'utf8'));
    expect(Array.isArray(written) && written.length).toBe(2);
  });

  it('is written by SimpleLogger.error', async () => {
    const path = join(dir, 'errors.json');
    vi.stubEnv('ERROR_LOG_PATH', path);
    vi.spyOn(console, 'error').mockImplementation(() => {});

    new SimpleLogger('cli', 'main', LOG_LEVELS.ERROR).error('Command failed', new Error('boom'));

    const written: unknown = JSON.parse(await readFile(path, 'utf8'));
    expect(written).toEqual([
      expect.objectContaining({
        fileName: 'cli',
        functionName: 'main',
        error: expect.objectContaining({ message: 'boom', name: 'Error' }),
        context: '{"message":"Command failed"}'
      })
    ]);
  });
});

describe('SimpleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages above the configured level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new SimpleLogger('runner', 'run', LOG_LEVELS.WARN);
    logger.info('Trial complete');
    logger.warn('Rate limited', { url: 'https://fn.example.test/' });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][1]).toEqual({ url: 'https://fn.example.test/' });
  });
});

describe('resolveLogLevel', () => {
  it('reads LOG_LEVEL case-insensitively and defaults to INFO', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'debug' })).toBe(LOG_LEVELS.DEBUG);
    expect(resolveLogLevel({ LOG_LEVEL: 'chatty' })).toBe(LOG_LEVELS.INFO);
    expect(resolveLogLevel({})).toBe(LOG_LEVELS.INFO);
  });

  it('logs DEBUG in development unless LOG_LEVEL says otherwise', () => {
    expect(resolveLogLevel({ NODE_ENV: 'development' })).toBe(LOG_LEVELS.DEBUG);
    expect(resolveLogLevel({ NODE_ENV: 'development', LOG_LEVEL: 'warn' })).toBe(LOG_LEVELS.WARN);
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe(LOG_LEVELS.INFO);
  });
});
