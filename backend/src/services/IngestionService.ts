import { EventEmitter } from 'events';
import { TimeSeriesStore } from '../store/TimeSeriesStore';
import { AppendResult, StoreInfo, StoredReading, TruncateResult } from '../types/reading';
import { parseReading } from '../validation/readingSchema';
import { WriteLock } from '../utils/WriteLock';
import { log } from '../utils/logger';

/**
 * Write path and read paths over the time-series store.
 *
 * Appends and truncation share one WriteLock so no append can interleave with
 * a truncation. Identical payloads are stored as separate rows; delivery is
 * at-least-once and duplicates stay visible.
 */
export class IngestionService extends EventEmitter {
  constructor(
    private store: TimeSeriesStore,
    private lock: WriteLock = new WriteLock(),
    private now: () => Date = () => new Date()
  ) {
    super();
  }

  /**
   * Validate and append one reading. Validation happens before the lock is
   * taken; an invalid body never reaches the store.
   */
  public async ingest(body: unknown): Promise<AppendResult> {
    const reading = parseReading(body);

    const result = await this.lock.runExclusive(() => this.store.append(reading, this.now()));

    log.debug(
      `Stored row ${result.reading.row_id}: T=${reading.temperature ?? 'invalid'}°C, ` +
        `H=${reading.humidity ?? 'invalid'}%, Gas=${reading.gas_raw}`,
      'IngestionService'
    );
    this.emit('readingStored', result);
    return result;
  }

  public latest(): Promise<StoredReading | null> {
    return this.store.latest();
  }

  public recent(limit: number): Promise<StoredReading[]> {
    return this.store.query(limit);
  }

  /** The newest `limit` readings received within [start, end], newest first. */
  public async range(start: Date, end: Date, limit: number): Promise<StoredReading[]> {
    return (await this.store.queryRange(start, end, limit)).reverse();
  }

  public info(): Promise<StoreInfo> {
    return this.store.info();
  }

  /**
   * Remove every stored reading and start a new store epoch.
   */
  public async clear(): Promise<TruncateResult> {
    const result = await this.lock.runExclusive(() => this.store.truncate());
    log.warn(`Store truncated: ${result.removed} rows removed, epoch is now ${result.epoch}`, 'IngestionService');
    this.emit('storeTruncated', result);
    return result;
  }
}
