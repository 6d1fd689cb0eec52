import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import * as fs from 'fs';
import * as path from 'path';
import { log } from '../utils/logger';

/**
 * Minimal query surface the stores depend on. Implemented by Database and by
 * the transaction-scoped executor handed to `transaction` callbacks.
 */
export interface SqlExecutor {
  run(sql: string, params?: unknown[]): Promise<QueryResult>;
  get<T extends QueryResultRow>(sql: string, params?: unknown[]): Promise<T | undefined>;
  all<T extends QueryResultRow>(sql: string, params?: unknown[]): Promise<T[]>;
}

export type IsolationLevel = 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

export interface TransactionalExecutor extends SqlExecutor {
  transaction<T>(callback: (tx: SqlExecutor) => Promise<T>, isolation?: IsolationLevel): Promise<T>;
}

class ClientExecutor implements SqlExecutor {
  constructor(private client: PoolClient) {}

  public run(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.client.query(sql, params);
  }

  public async get<T extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    const result = await this.client.query<T>(sql, params);
    return result.rows[0];
  }

  public async all<T extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<T[]> {
    const result = await this.client.query<T>(sql, params);
    return result.rows;
  }
}

export class Database implements TransactionalExecutor {
  private pool: Pool;
  private static instance: Database | null = null;

  private constructor(databaseUrl: string) {
    this.pool = new Pool({
      connectionString: databaseUrl,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    this.pool.on('error', (err) => {
      log.error('Unexpected error on idle PostgreSQL client', 'Database', err);
    });

    log.info('Connected to PostgreSQL database', 'Database');
  }

  public static getInstance(databaseUrl?: string): Database {
    if (!Database.instance) {
      if (!databaseUrl) {
        throw new Error('DATABASE_URL environment variable is required for PostgreSQL connection');
      }
      Database.instance = new Database(databaseUrl);
    }
    return Database.instance;
  }

  public async initialize(): Promise<void> {
    const schemaPath = path.join(__dirname, 'schema.sql');
    const schema = fs.readFileSync(schemaPath, 'utf8');

    try {
      await this.pool.query(schema);
      log.info('Database schema initialized successfully', 'Database');
    } catch (error) {
      log.error('Error initializing database schema', 'Database', error);
      throw error;
    }
  }

  // Run a query (INSERT, UPDATE, DELETE)
  public run(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.pool.query(sql, params);
  }

  // Get a single row
  public async get<T extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    const result = await this.pool.query<T>(sql, params);
    return result.rows[0];
  }

  // Get all rows
  public async all<T extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<T[]> {
    const result = await this.pool.query<T>(sql, params);
    return result.rows;
  }

  public async close(): Promise<void> {
    await this.pool.end();
    Database.instance = null;
    log.info('Database connection pool closed', 'Database');
  }

  // Transaction support
  public async transaction<T>(
    callback: (tx: SqlExecutor) => Promise<T>,
    isolation: IsolationLevel = 'READ COMMITTED'
  ): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query(`BEGIN ISOLATION LEVEL ${isolation}`);
      const result = await callback(new ClientExecutor(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}

export default Database;
