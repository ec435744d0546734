import { CONFIG } from '../config/constants';
import type { MalformedLine, Sample, SampleLogContents } from '../types';

const RECORD_PATTERN = /^(\d*),(\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)$/;
const LATENCY_PATTERN = /^\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

export const formatRecord = (sample: Sample): string => {
  const timestamp = sample.timestamp === null ? '' : String(sample.timestamp);
  return `${timestamp},${sample.latency.toFixed(CONFIG.STORE.LATENCY_DECIMALS)}`;
};

export const formatRecords = (samples: readonly Sample[]): string =>
  samples.map(sample => `${formatRecord(sample)}\n`).join('');

export const parseRecord = (line: string): Sample | null => {
  const match = RECORD_PATTERN.exec(line.trim());
  if (!match) return null;

  const [, rawTimestamp, rawLatency] = match;
  const latency = Number(rawLatency);
  if (!Number.isFinite(latency)) return null;

  return {
    timestamp: rawTimestamp === '' ? null : Number(rawTimestamp),
    latency
  };
};

const parseLegacyLine = (line: string): Sample[] | null => {
  const fields = line.split(',').map(field => field.trim());
  if (!fields.every(field => LATENCY_PATTERN.test(field))) return null;
  return fields.map(field => ({ timestamp: null, latency: Number(field) }));
};

// A lone line that is not a timestamped record (first field has a decimal
// point, or the line has one field or more than two) is the legacy layout
const looksLegacy = (lines: string[]): boolean => {
  if (lines.length !== 1) return false;
  const [line] = lines;
  return parseRecord(line) === null && parseLegacyLine(line) !== null;
};

export const decodeSampleLog = (content: string): SampleLogContents => {
  const lines = content.split(/\r?\n/);
  const nonEmpty = lines.filter(line => line.trim() !== '');

  if (nonEmpty.length === 0) {
    return { layout: 'empty', samples: [], malformed: [] };
  }

  if (looksLegacy(nonEmpty)) {
    return { layout: 'legacy', samples: parseLegacyLine(nonEmpty[0]) ?? [], malformed: [] };
  }

  const samples: Sample[] = [];
  const malformed: MalformedLine[] = [];

  lines.forEach((line, index) => {
    if (line.trim() === '') return;
    const sample = parseRecord(line);
    if (sample) {
      samples.push(sample);
    } else {
      malformed.push({ lineNumber: index + 1, content: line });
    }
  });

  return { layout: 'records', samples, malformed };
};
