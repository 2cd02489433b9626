import { RivetError } from './errors.js';

const DURATION_PATTERN = /^(\d+)(ms|s|m)?$/;

/**
 * Parses `500ms`, `30s`, `5m` or a bare number of seconds into milliseconds.
 */
export function parseDuration(value: string): number {
  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) {
    throw new RivetError('CONFIG', `Invalid duration format: ${value}`);
  }

  const amount = parseInt(match[1], 10);
  switch (match[2]) {
    case 'ms':
      return amount;
    case 'm':
      return amount * 60_000;
    default:
      return amount * 1000;
  }
}

export function parsePositiveInt(value: string, label: string): number {
  const trimmed = value.trim();
  const parsed = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new RivetError('CONFIG', `Invalid ${label}: ${value} (expected a positive integer)`);
  }
  return parsed;
}

export function parseHeaders(headers: string[]): Record<string, string> {
  const parsed: Record<string, string> = {};

  for (const header of headers) {
    const separator = header.indexOf(':');
    if (separator === -1) {
      throw new RivetError('CONFIG', `Invalid header format: ${header}`);
    }
    parsed[header.slice(0, separator).trim()] = header.slice(separator + 1).trim();
  }

  return parsed;
}

export function formatDuration(ms: number): string {
  if (ms < 1) return '<1ms';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}
