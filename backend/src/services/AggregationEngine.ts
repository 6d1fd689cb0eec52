import { RowSelection, TimeSeriesStore } from '../store/TimeSeriesStore';
import { StoredReading } from '../types/reading';
import {
  Correlation,
  MetricStats,
  NumericMetric,
  StatsWindow,
  WindowStats,
} from '../types/stats';
import { ValidationError } from '../utils/errors';
import { QueryInput, parseDurationParam, parsePositiveInt, parseTimeRange } from '../utils/queryParams';

export const DEFAULT_STATS_WINDOW: StatsWindow = { kind: 'duration', ms: 24 * 60 * 60 * 1000 };

/**
 * Map `window=all`, `last=N`, `duration=24h` or `start`/`end` onto a window.
 * Exactly one selector may be given; none selects the last 24 hours.
 */
export function parseWindow(query: QueryInput, now: Date): StatsWindow {
  const windows: StatsWindow[] = [];

  const named = query.window;
  if (named !== undefined) {
    if (named !== 'all') {
      throw new ValidationError('window_invalid', [
        { field: 'window', code: 'invalid_value', message: 'window only accepts "all"' },
      ]);
    }
    windows.push({ kind: 'all' });
  }

  const count = parsePositiveInt(query, 'last');
  if (count !== undefined) windows.push({ kind: 'count', count });

  const ms = parseDurationParam(query, 'duration');
  if (ms !== undefined) windows.push({ kind: 'duration', ms });

  const range = parseTimeRange(query, now);
  if (range) windows.push({ kind: 'range', ...range });

  if (windows.length > 1) {
    throw new ValidationError('window_conflict', [
      { field: 'window', code: 'conflict', message: 'Use only one of window, last, duration or start/end' },
    ]);
  }
  return windows[0] ?? DEFAULT_STATS_WINDOW;
}

function metricStats(values: number[]): MetricStats | null {
  if (values.length === 0) return null;
  let min = values[0];
  let max = values[0];
  let sum = 0;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
    sum += value;
  }
  return { min, max, mean: sum / values.length, count: values.length };
}

/**
 * Pearson correlation over rows where both metrics are valid.
 */
export function correlate(rows: StoredReading[], a: NumericMetric, b: NumericMetric): Correlation {
  const pairs: Array<[number, number]> = [];
  for (const row of rows) {
    const x = row[a];
    const y = row[b];
    if (x !== null && y !== null) pairs.push([x, y]);
  }

  const n = pairs.length;
  if (n < 2) {
    return { value: null, samples: n, reason: 'insufficient_samples' };
  }

  const meanX = pairs.reduce((sum, [x]) => sum + x, 0) / n;
  const meanY = pairs.reduce((sum, [, y]) => sum + y, 0) / n;
  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (const [x, y] of pairs) {
    const dx = x - meanX;
    const dy = y - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  if (varianceX === 0 || varianceY === 0) {
    return { value: null, samples: n, reason: 'zero_variance' };
  }
  const r = covariance / Math.sqrt(varianceX * varianceY);
  // Clamp float drift just outside [-1, 1]
  return { value: Math.max(-1, Math.min(1, r)), samples: n };
}

/**
 * Computes WindowStats from the rows a window selects. Results are rebuilt on
 * every call; `epoch` and `last_row_id` identify the data they were built from.
 */
export class AggregationEngine {
  constructor(
    private store: TimeSeriesStore,
    private maxRows: number = 100000,
    private now: () => Date = () => new Date()
  ) {}

  public async stats(window: StatsWindow): Promise<WindowStats> {
    const { rows, epoch } = await this.store.snapshot(this.select(window));
    return AggregationEngine.summarize(rows, window, epoch);
  }

  // Every window reads at most `maxRows` rows, the newest ones it covers
  private select(window: StatsWindow): RowSelection {
    switch (window.kind) {
      case 'all':
        return { kind: 'recent', limit: this.maxRows };
      case 'count':
        return { kind: 'recent', limit: Math.min(window.count, this.maxRows) };
      case 'duration': {
        const end = this.now();
        return { kind: 'range', start: new Date(end.getTime() - window.ms), end, limit: this.maxRows };
      }
      case 'range':
        return { kind: 'range', start: window.start, end: window.end, limit: this.maxRows };
    }
  }

  public static summarize(rows: StoredReading[], window: StatsWindow, epoch: number): WindowStats {
    if (rows.length === 0) {
      return { status: 'no_data', window, epoch };
    }

    const byId = [...rows].sort((a, b) => a.row_id - b.row_id);
    const temperature: number[] = [];
    const humidity: number[] = [];
    const gas: number[] = [];
    let triggered = 0;

    for (const row of byId) {
      if (row.temperature !== null) temperature.push(row.temperature);
      if (row.humidity !== null) humidity.push(row.humidity);
      gas.push(row.gas_raw);
      if (row.gas_digital) triggered++;
    }

    const first = byId[0];
    const last = byId[byId.length - 1];
    return {
      status: 'ok',
      window,
      epoch,
      row_count: byId.length,
      first_row_id: first.row_id,
      last_row_id: last.row_id,
      from: first.received_at,
      to: last.received_at,
      metrics: {
        temperature: metricStats(temperature),
        humidity: metricStats(humidity),
        gas_raw: metricStats(gas),
      },
      gas_digital: {
        triggered,
        ratio: triggered / byId.length,
      },
      correlation: {
        temperature_humidity: correlate(byId, 'temperature', 'humidity'),
        temperature_gas_raw: correlate(byId, 'temperature', 'gas_raw'),
        humidity_gas_raw: correlate(byId, 'humidity', 'gas_raw'),
      },
    };
  }
}
