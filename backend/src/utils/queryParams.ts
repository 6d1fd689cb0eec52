import { ValidationError } from './errors';

export type QueryInput = Record<string, unknown>;

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

function single(query: QueryInput, key: string): string | undefined {
  const value = query[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${key}_invalid`, [{ field: key, code: 'invalid_type', message: `${key} must be given once` }]);
  }
  return value.trim();
}

// Largest offset a Date can hold; anything longer has no representable start
export const MAX_DURATION_MS = 8.64e15;

/**
 * Parse "90s", "30m", "24h", "7d" or "500ms" into milliseconds.
 * Zero and durations beyond MAX_DURATION_MS yield null.
 */
export function parseDuration(text: string): number | null {
  const match = /^(\d+)\s*(ms|s|m|h|d)$/i.exec(text.trim());
  if (!match) return null;
  const amount = parseInt(match[1], 10);
  const ms = amount * DURATION_UNITS[match[2].toLowerCase()];
  return ms > 0 && ms <= MAX_DURATION_MS ? ms : null;
}

/**
 * Accepts ISO-8601 strings or unix seconds.
 */
export function parseInstant(text: string): Date | null {
  const date = /^\d+(\.\d+)?$/.test(text) ? new Date(parseFloat(text) * 1000) : new Date(text);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function parsePositiveInt(query: QueryInput, key: string): number | undefined {
  const raw = single(query, key);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${key}_invalid`, [
      { field: key, code: 'invalid_value', message: `${key} must be a positive integer` },
    ]);
  }
  return value;
}

/**
 * `limit` clamped to [1, max]; `fallback` when absent.
 */
export function parseLimit(query: QueryInput, fallback: number, max: number): number {
  const limit = parsePositiveInt(query, 'limit');
  return Math.min(limit ?? fallback, max);
}

export function parseDurationParam(query: QueryInput, key: string): number | undefined {
  const raw = single(query, key);
  if (raw === undefined) return undefined;
  const ms = parseDuration(raw);
  if (ms === null) {
    throw new ValidationError(`${key}_invalid`, [
      {
        field: key,
        code: 'invalid_value',
        message: `${key} must look like 30m, 24h or 7d, at most ${MAX_DURATION_MS / 86400000}d`,
      },
    ]);
  }
  return ms;
}

/**
 * `start`/`end` pair. `end` defaults to now when only `start` is given.
 * Returns null when neither is present.
 */
export function parseTimeRange(query: QueryInput, now: Date): { start: Date; end: Date } | null {
  const startRaw = single(query, 'start');
  const endRaw = single(query, 'end');
  if (startRaw === undefined && endRaw === undefined) return null;

  if (startRaw === undefined) {
    throw new ValidationError('start_missing', [{ field: 'start', code: 'missing', message: 'end requires start' }]);
  }

  const start = parseInstant(startRaw);
  if (!start) {
    throw new ValidationError('start_invalid', [{ field: 'start', code: 'invalid_date', message: 'Invalid start' }]);
  }
  const end = endRaw === undefined ? now : parseInstant(endRaw);
  if (!end) {
    throw new ValidationError('end_invalid', [{ field: 'end', code: 'invalid_date', message: 'Invalid end' }]);
  }
  if (start.getTime() > end.getTime()) {
    throw new ValidationError('range_inverted', [
      { field: 'start', code: 'out_of_range', message: 'start must not be after end' },
    ]);
  }
  return { start, end };
}
