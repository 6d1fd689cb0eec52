import { SqlExecutor, TransactionalExecutor } from '../database/database';
import { AppendResult, Reading, StoreInfo, StoreSnapshot, StoredReading, TruncateResult } from '../types/reading';
import { StorageFailure } from '../utils/errors';
import { RowSelection, TimeSeriesStore } from './TimeSeriesStore';
import { log } from '../utils/logger';

// node-pg returns BIGINT / BIGSERIAL columns as strings
type ReadingRow = {
  row_id: string;
  device_timestamp: Date | null;
  received_at: Date;
  device_id: string;
  temperature: number | null;
  humidity: number | null;
  gas_raw: number;
  gas_digital: boolean;
  uptime_ms: string | null;
};

type EpochRow = { epoch: number };
type CountRow = { epoch: number | null; row_count: string; last_row_id: string | null };

// Subquery evaluated in the same statement snapshot as the rest of the query
const EPOCH = '(SELECT epoch FROM store_meta WHERE id = 1)';

const COLUMNS = `row_id, device_timestamp, received_at, device_id,
  temperature, humidity, gas_raw, gas_digital, uptime_ms`;

export function toStoredReading(row: ReadingRow): StoredReading {
  const receivedAt = row.received_at.toISOString();
  return {
    row_id: Number(row.row_id),
    timestamp: row.device_timestamp ? row.device_timestamp.toISOString() : receivedAt,
    received_at: receivedAt,
    device_id: row.device_id,
    temperature: row.temperature,
    humidity: row.humidity,
    gas_raw: row.gas_raw,
    gas_digital: row.gas_digital,
    uptime_ms: row.uptime_ms === null ? null : Number(row.uptime_ms),
  };
}

/**
 * Durable store on PostgreSQL. Row ids come from a BIGSERIAL sequence, so a
 * restarted process keeps appending after the last committed id.
 */
export class PgTimeSeriesStore implements TimeSeriesStore {
  constructor(private db: TransactionalExecutor, private initSchema: () => Promise<void> = async () => undefined) {}

  public async initialize(): Promise<void> {
    await this.guard('initialize', () => this.initSchema());
    const info = await this.info();
    log.info(
      `Time-series store ready (epoch ${info.epoch}, ${info.row_count} rows, last id ${info.last_row_id ?? '-'})`,
      'PgTimeSeriesStore'
    );
  }

  public append(reading: Reading, receivedAt: Date): Promise<AppendResult> {
    return this.guard('append', async () => {
      const row = await this.db.get<ReadingRow & { epoch: number | null }>(
        `INSERT INTO sensor_readings
           (device_timestamp, received_at, device_id, temperature, humidity, gas_raw, gas_digital, uptime_ms)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${COLUMNS}, ${EPOCH} AS epoch`,
        [
          reading.timestamp,
          receivedAt,
          reading.device_id,
          reading.temperature,
          reading.humidity,
          reading.gas_raw,
          reading.gas_digital,
          reading.uptime_ms,
        ]
      );
      if (!row) {
        throw new Error('INSERT returned no row');
      }
      return { reading: toStoredReading(row), epoch: row.epoch ?? 1 };
    });
  }

  public query(limit: number): Promise<StoredReading[]> {
    return this.guard('query', () => this.selectRecent(this.db, limit));
  }

  public queryRange(start: Date, end: Date, limit: number): Promise<StoredReading[]> {
    return this.guard('queryRange', () => this.selectRange(this.db, start, end, limit));
  }

  /**
   * Reads rows and epoch in one REPEATABLE READ transaction. The share lock
   * is taken before the snapshot, so a concurrent TRUNCATE either committed
   * before it or waits until this read is done.
   */
  public snapshot(selection: RowSelection): Promise<StoreSnapshot> {
    return this.guard('snapshot', () =>
      this.db.transaction(async (tx) => {
        await tx.run('LOCK TABLE sensor_readings IN ACCESS SHARE MODE');
        const rows =
          selection.kind === 'recent'
            ? await this.selectRecent(tx, selection.limit)
            : await this.selectRange(tx, selection.start, selection.end, selection.limit);
        const meta = await tx.get<EpochRow>('SELECT epoch FROM store_meta WHERE id = 1');
        return { rows, epoch: meta?.epoch ?? 1 };
      }, 'REPEATABLE READ')
    );
  }

  public latest(): Promise<StoredReading | null> {
    return this.guard('latest', async () => {
      const row = await this.db.get<ReadingRow>(
        `SELECT ${COLUMNS} FROM sensor_readings ORDER BY row_id DESC LIMIT 1`
      );
      return row ? toStoredReading(row) : null;
    });
  }

  /**
   * TRUNCATE is transactional in PostgreSQL and takes an ACCESS EXCLUSIVE
   * lock, so concurrent readers see either every old row or none.
   */
  public truncate(): Promise<TruncateResult> {
    return this.guard('truncate', () =>
      this.db.transaction(async (tx) => {
        await tx.run('LOCK TABLE sensor_readings IN ACCESS EXCLUSIVE MODE');
        const counted = await tx.get<{ removed: string }>('SELECT COUNT(*) AS removed FROM sensor_readings');
        await tx.run('TRUNCATE sensor_readings RESTART IDENTITY');
        const meta = await tx.get<EpochRow>(
          'UPDATE store_meta SET epoch = epoch + 1, truncated_at = NOW() WHERE id = 1 RETURNING epoch'
        );
        if (!meta) {
          throw new Error('store_meta row missing');
        }
        return { removed: Number(counted?.removed ?? 0), epoch: meta.epoch };
      })
    );
  }

  public info(): Promise<StoreInfo> {
    return this.guard('info', async () => {
      const counts = await this.db.get<CountRow>(
        `SELECT ${EPOCH} AS epoch, COUNT(*) AS row_count, MAX(row_id) AS last_row_id FROM sensor_readings`
      );
      return {
        epoch: counts?.epoch ?? 1,
        row_count: Number(counts?.row_count ?? 0),
        last_row_id: counts?.last_row_id ? Number(counts.last_row_id) : null,
      };
    });
  }

  public async close(): Promise<void> {
    // The pool is owned by Database and closed at shutdown
  }

  private async selectRecent(db: SqlExecutor, limit: number): Promise<StoredReading[]> {
    const rows = await db.all<ReadingRow>(
      `SELECT ${COLUMNS} FROM sensor_readings ORDER BY row_id DESC LIMIT $1`,
      [limit]
    );
    return rows.map(toStoredReading);
  }

  // Newest `limit` rows of the range, returned oldest first
  private async selectRange(db: SqlExecutor, start: Date, end: Date, limit: number): Promise<StoredReading[]> {
    const rows = await db.all<ReadingRow>(
      `SELECT ${COLUMNS} FROM (
         SELECT ${COLUMNS} FROM sensor_readings
         WHERE received_at >= $1 AND received_at <= $2
         ORDER BY received_at DESC, row_id DESC
         LIMIT $3
       ) AS windowed
       ORDER BY received_at ASC, row_id ASC`,
      [start, end, limit]
    );
    return rows.map(toStoredReading);
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      log.error(`Store ${operation} failed`, 'PgTimeSeriesStore', error);
      throw new StorageFailure(operation, error);
    }
  }
}
