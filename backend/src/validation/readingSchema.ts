import { z } from 'zod';
import { Reading } from '../types/reading';
import { ValidationError, ValidationIssue } from '../utils/errors';

export const GAS_RAW_MIN = 0;
export const GAS_RAW_MAX = 1023;
export const TEMPERATURE_RANGE = { min: -40, max: 125 } as const;
export const HUMIDITY_RANGE = { min: 0, max: 100 } as const;
export const DEVICE_ID_MAX_LENGTH = 64;
export const DEFAULT_DEVICE_ID = 'unknown';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Early firmware posted the gas channel as `gas_analog`
function applyLegacyAliases(body: unknown): unknown {
  if (isRecord(body) && body.gas_raw === undefined && body.gas_analog !== undefined) {
    return { ...body, gas_raw: body.gas_analog };
  }
  return body;
}

const measurement = (range: { min: number; max: number }) =>
  z.number().finite().min(range.min).max(range.max).nullable();

export const ReadingPayload = z.preprocess(
  applyLegacyAliases,
  z.object({
    temperature: measurement(TEMPERATURE_RANGE),
    humidity: measurement(HUMIDITY_RANGE),
    gas_raw: z.number().int().min(GAS_RAW_MIN).max(GAS_RAW_MAX),
    gas_digital: z.preprocess((v) => (v === 0 ? false : v === 1 ? true : v), z.boolean()),
    // ISO-8601 string or unix seconds; null means the device has no clock
    timestamp: z
      .preprocess(
        (v) => (typeof v === 'number' ? new Date(v * 1000) : typeof v === 'string' ? new Date(v) : v),
        z.date().nullable()
      )
      .optional(),
    device_id: z.string().trim().min(1).max(DEVICE_ID_MAX_LENGTH).optional(),
    uptime_ms: z.number().int().nonnegative().optional(),
  })
);
export type ReadingPayload = z.infer<typeof ReadingPayload>;

function issueCode(issue: z.ZodIssue): string {
  switch (issue.code) {
    case 'invalid_type':
      return issue.received === 'undefined' ? 'missing' : 'invalid_type';
    case 'too_small':
    case 'too_big':
      return 'out_of_range';
    case 'invalid_date':
      return 'invalid_date';
    default:
      return issue.code;
  }
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'body',
    code: issueCode(issue),
    message: issue.message,
  }));
}

/**
 * Validate an ingestion body. Throws ValidationError whose `reason` names the
 * first offending field, e.g. `gas_raw_out_of_range` or `temperature_missing`.
 */
export function parseReading(body: unknown): Reading {
  const result = ReadingPayload.safeParse(body);
  if (!result.success) {
    const issues = toValidationIssues(result.error);
    const first = issues[0];
    const reason = first.field === 'body' ? 'invalid_body' : `${first.field}_${first.code}`;
    throw new ValidationError(reason, issues);
  }

  const payload = result.data;
  return {
    timestamp: payload.timestamp ?? null,
    device_id: payload.device_id ?? DEFAULT_DEVICE_ID,
    temperature: payload.temperature,
    humidity: payload.humidity,
    gas_raw: payload.gas_raw,
    gas_digital: payload.gas_digital,
    uptime_ms: payload.uptime_ms ?? null,
  };
}
