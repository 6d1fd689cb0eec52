import { AppendResult, Reading, StoreInfo, StoreSnapshot, StoredReading, TruncateResult } from '../types/reading';

/**
 * Which rows a snapshot reads. Both kinds are bounded by `limit`; a range
 * holding more rows keeps its newest `limit`.
 */
export type RowSelection =
  | { kind: 'recent'; limit: number }
  | { kind: 'range'; start: Date; end: Date; limit: number };

/**
 * Append-only log of readings.
 *
 * Row ids strictly increase within an epoch. `truncate` removes every row,
 * restarts ids at 1 and starts a new epoch; callers holding ids from an older
 * epoch must discard them.
 */
export interface TimeSeriesStore {
  initialize(): Promise<void>;
  append(reading: Reading, receivedAt: Date): Promise<AppendResult>;
  /** At most `limit` rows, newest first. */
  query(limit: number): Promise<StoredReading[]>;
  /** The newest `limit` rows with received_at in [start, end], oldest first. */
  queryRange(start: Date, end: Date, limit: number): Promise<StoredReading[]>;
  /** Selected rows together with the epoch they were read in. */
  snapshot(selection: RowSelection): Promise<StoreSnapshot>;
  latest(): Promise<StoredReading | null>;
  truncate(): Promise<TruncateResult>;
  info(): Promise<StoreInfo>;
  close(): Promise<void>;
}

export type StoreDriver = 'postgres' | 'memory';
