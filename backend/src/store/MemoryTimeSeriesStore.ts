import { AppendResult, Reading, StoreInfo, StoreSnapshot, StoredReading, TruncateResult } from '../types/reading';
import { RowSelection, TimeSeriesStore } from './TimeSeriesStore';
import { log } from '../utils/logger';

function byReceipt(a: StoredReading, b: StoredReading): number {
  return Date.parse(a.received_at) - Date.parse(b.received_at) || a.row_id - b.row_id;
}

function selectRange(rows: StoredReading[], start: Date, end: Date, limit: number): StoredReading[] {
  const from = start.getTime();
  const to = end.getTime();
  const matching = rows
    .filter((row) => {
      const t = Date.parse(row.received_at);
      return t >= from && t <= to;
    })
    .sort(byReceipt);
  return matching.slice(Math.max(0, matching.length - limit));
}

function selectRecent(rows: StoredReading[], limit: number): StoredReading[] {
  return rows.slice(Math.max(0, rows.length - limit)).reverse();
}

/**
 * In-process store used by tests and by STORE_DRIVER=memory development runs.
 * Nothing survives a restart.
 *
 * Rows live in one array ordered by row id. Appends push onto it; truncation
 * replaces it in a single assignment, so every read sees either the old array
 * with the old epoch or the new one with the new epoch.
 */
export class MemoryTimeSeriesStore implements TimeSeriesStore {
  private rows: StoredReading[] = [];
  private nextRowId = 1;
  private epoch = 1;

  public async initialize(): Promise<void> {
    log.warn('Using in-memory store - readings are lost on restart', 'MemoryTimeSeriesStore');
  }

  public async append(reading: Reading, receivedAt: Date): Promise<AppendResult> {
    const receivedIso = receivedAt.toISOString();
    const stored: StoredReading = Object.freeze({
      row_id: this.nextRowId++,
      timestamp: reading.timestamp ? reading.timestamp.toISOString() : receivedIso,
      received_at: receivedIso,
      device_id: reading.device_id,
      temperature: reading.temperature,
      humidity: reading.humidity,
      gas_raw: reading.gas_raw,
      gas_digital: reading.gas_digital,
      uptime_ms: reading.uptime_ms,
    });
    this.rows.push(stored);
    return { reading: stored, epoch: this.epoch };
  }

  public async query(limit: number): Promise<StoredReading[]> {
    return selectRecent(this.rows, limit);
  }

  public async queryRange(start: Date, end: Date, limit: number): Promise<StoredReading[]> {
    return selectRange(this.rows, start, end, limit);
  }

  public async snapshot(selection: RowSelection): Promise<StoreSnapshot> {
    const { rows, epoch } = this;
    switch (selection.kind) {
      case 'recent':
        return { rows: selectRecent(rows, selection.limit), epoch };
      case 'range':
        return { rows: selectRange(rows, selection.start, selection.end, selection.limit), epoch };
    }
  }

  public async latest(): Promise<StoredReading | null> {
    const rows = this.rows;
    return rows.length > 0 ? rows[rows.length - 1] : null;
  }

  public async truncate(): Promise<TruncateResult> {
    const removed = this.rows.length;
    this.rows = [];
    this.nextRowId = 1;
    this.epoch++;
    return { removed, epoch: this.epoch };
  }

  public async info(): Promise<StoreInfo> {
    const rows = this.rows;
    return {
      epoch: this.epoch,
      row_count: rows.length,
      last_row_id: rows.length > 0 ? rows[rows.length - 1].row_id : null,
    };
  }

  public async close(): Promise<void> {
    this.rows = [];
  }
}
