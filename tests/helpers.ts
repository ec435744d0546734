import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { vi } from 'vitest';
import type { Logger } from '../src/utils/simple-logger';

export const createMockLogger = (): Logger => ({
  error: vi.fn(),
  warn: vi.fn(),
  info: vi.fn(),
  debug: vi.fn()
});

export const makeTempDir = (): Promise<string> => mkdtemp(join(tmpdir(), 'cold-start-bench-'));

export const removeDir = (dir: string): Promise<void> => rm(dir, { recursive: true, force: true });

// Returns the given hrtime readings in order, repeating the last one
export const clockFrom = (...readings: bigint[]) => {
  let index = 0;
  return () => {
    const value = readings[Math.min(index, readings.length - 1)];
    index++;
    return value;
  };
};

// Single comma-joined line of latencies, the layout older snapshot runs wrote
export const formatLegacyLine = (latencies: readonly number[]): string =>
  latencies.map(latency => latency.toFixed(3)).join(',');
