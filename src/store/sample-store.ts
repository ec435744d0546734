import { appendFile, mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'path';
import { SampleLogParseError, SampleLogPathError } from '../utils/errors';
import { getLogger, type Logger } from '../utils/simple-logger';
import type { Sample, SampleLogContents, SampleLogState } from '../types';
import { decodeSampleLog, formatRecords } from './sample-codec';
import { KeyedLock } from './keyed-lock';

export interface SampleStoreOptions {
  rootDir: string;
  // Fail the whole load on the first malformed record instead of skipping it
  strict?: boolean;
  logger?: Logger;
}

export const classifyLogState = (existing: number, expected: number): SampleLogState => {
  if (existing === 0) return 'empty';
  return existing >= expected ? 'complete' : 'partial';
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Durable, append-only sample logs kept as plain text files under one
 * directory. One `timestamp,latency` record per line.
 */
export class SampleStore {
  readonly rootDir: string;
  private readonly strict: boolean;
  private readonly logger: Logger;
  private readonly lock = new KeyedLock();

  constructor(options: SampleStoreOptions) {
    this.rootDir = resolve(options.rootDir);
    this.strict = options.strict ?? false;
    this.logger = options.logger ?? getLogger('sample-store', 'SampleStore');
  }

  resolvePath(logName: string): string {
    const path = resolve(this.rootDir, logName);
    const rel = relative(this.rootDir, path);
    if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new SampleLogPathError(logName);
    }
    return path;
  }

  async exists(logName: string): Promise<boolean> {
    const contents = await this.readRaw(this.resolvePath(logName));
    return contents !== null;
  }

  async inspect(logName: string): Promise<SampleLogContents> {
    const path = this.resolvePath(logName);
    const raw = await this.readRaw(path);
    const contents = decodeSampleLog(raw ?? '');

    if (contents.malformed.length > 0) {
      const [first] = contents.malformed;
      if (this.strict) {
        throw new SampleLogParseError(path, first.lineNumber, first.content);
      }
      this.logger.warn('Skipped malformed sample records', {
        file: path,
        count: contents.malformed.length,
        firstLine: first.lineNumber
      });
    }

    return contents;
  }

  async loadAll(logName: string): Promise<Sample[]> {
    const { samples } = await this.inspect(logName);
    return samples;
  }

  async state(logName: string, expected: number): Promise<SampleLogState> {
    const samples = await this.loadAll(logName);
    return classifyLogState(samples.length, expected);
  }

  // Adds records after whatever the log already holds
  async append(samples: readonly Sample[], logName: string): Promise<void> {
    const path = this.resolvePath(logName);
    if (samples.length === 0) return;

    await this.lock.run(path, async () => {
      await mkdir(dirname(path), { recursive: true });

      const raw = (await this.readRaw(path)) ?? '';
      const existing = decodeSampleLog(raw);
      if (existing.layout === 'legacy') {
        this.logger.info('Converting legacy sample log to record layout', { file: path });
        await this.writeAtomic(path, formatRecords([...existing.samples, ...samples]));
        return;
      }

      const separator = raw.length > 0 && !raw.endsWith('\n') ? '\n' : '';
      await appendFile(path, `${separator}${formatRecords(samples)}`, 'utf8');
    });
  }

  // Truncates the log and writes exactly `samples`
  async replace(samples: readonly Sample[], logName: string): Promise<void> {
    const path = this.resolvePath(logName);

    await this.lock.run(path, async () => {
      await mkdir(dirname(path), { recursive: true });
      await this.writeAtomic(path, formatRecords(samples));
    });
  }

  private async writeAtomic(path: string, content: string): Promise<void> {
    const temp = `${path}.${process.pid}.tmp`;
    await writeFile(temp, content, 'utf8');
    await rename(temp, path);
  }

  private async readRaw(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }
}
