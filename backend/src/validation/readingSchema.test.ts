import { describe, expect, it } from 'vitest';
import { parseReading } from './readingSchema';
import { ValidationError } from '../utils/errors';

const valid = { temperature: 23.0, humidity: 80.1, gas_raw: 197, gas_digital: true };

function rejection(body: unknown): ValidationError {
  try {
    parseReading(body);
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected parseReading to reject');
}

describe('parseReading', () => {
  it('accepts a complete payload and fills defaults', () => {
    expect(parseReading(valid)).toEqual({
      timestamp: null,
      device_id: 'unknown',
      temperature: 23,
      humidity: 80.1,
      gas_raw: 197,
      gas_digital: true,
      uptime_ms: null,
    });
  });

  it('accepts null temperature and humidity as sensor faults', () => {
    const reading = parseReading({ ...valid, temperature: null, humidity: null });
    expect(reading.temperature).toBeNull();
    expect(reading.humidity).toBeNull();
  });

  it('requires the temperature key even though it may be null', () => {
    const { temperature: _omit, ...rest } = valid;
    const error = rejection(rest);
    expect(error.reason).toBe('temperature_missing');
    expect(error.issues).toEqual([{ field: 'temperature', code: 'missing', message: 'Required' }]);
  });

  it('reports every missing field, first one as the reason', () => {
    const error = rejection({});
    expect(error.reason).toBe('temperature_missing');
    expect(error.issues.map((issue) => issue.field)).toEqual(['temperature', 'humidity', 'gas_raw', 'gas_digital']);
  });

  it('rejects gas_raw outside 0-1023', () => {
    expect(rejection({ ...valid, gas_raw: 1024 }).reason).toBe('gas_raw_out_of_range');
    expect(rejection({ ...valid, gas_raw: -1 }).reason).toBe('gas_raw_out_of_range');
  });

  it('rejects a fractional gas_raw', () => {
    expect(rejection({ ...valid, gas_raw: 12.5 }).reason).toBe('gas_raw_invalid_type');
  });

  it('rejects humidity above 100 %RH', () => {
    expect(rejection({ ...valid, humidity: 101 }).reason).toBe('humidity_out_of_range');
  });

  it('accepts 0/1 for gas_digital', () => {
    expect(parseReading({ ...valid, gas_digital: 1 }).gas_digital).toBe(true);
    expect(parseReading({ ...valid, gas_digital: 0 }).gas_digital).toBe(false);
    expect(rejection({ ...valid, gas_digital: 'yes' }).reason).toBe('gas_digital_invalid_type');
  });

  it('parses ISO and unix-second timestamps', () => {
    expect(parseReading({ ...valid, timestamp: '2026-01-01T00:00:00Z' }).timestamp?.toISOString()).toBe(
      '2026-01-01T00:00:00.000Z'
    );
    expect(parseReading({ ...valid, timestamp: 1700000000 }).timestamp?.getTime()).toBe(1700000000000);
    expect(rejection({ ...valid, timestamp: 'yesterday-ish' }).reason).toBe('timestamp_invalid_date');
  });

  it('treats a null timestamp like a missing one', () => {
    expect(parseReading({ ...valid, timestamp: null })).toEqual(parseReading(valid));
    expect(parseReading({ ...valid, timestamp: null }).timestamp).toBeNull();
  });

  it('maps the legacy gas_analog field onto gas_raw', () => {
    const { gas_raw: _omit, ...rest } = valid;
    expect(parseReading({ ...rest, gas_analog: 310 }).gas_raw).toBe(310);
  });

  it('keeps device_id and uptime_ms when given', () => {
    const reading = parseReading({ ...valid, device_id: '  esp-kitchen ', uptime_ms: 42000 });
    expect(reading.device_id).toBe('esp-kitchen');
    expect(reading.uptime_ms).toBe(42000);
  });

  it('rejects a body that is not an object', () => {
    expect(rejection([valid]).reason).toBe('invalid_body');
    expect(rejection(null).reason).toBe('invalid_body');
  });
});
