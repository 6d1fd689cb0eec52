import { StoreDriver } from '../store/TimeSeriesStore';

export interface BackendConfig {
  port: number;
  wsPort: number;
  databaseUrl: string | null;
  storeDriver: StoreDriver;
  logLevel: string;
  defaultQueryLimit: number;
  maxQueryLimit: number;
  statsMaxRows: number;
}

function isStoreDriver(value: string): value is StoreDriver {
  return value === 'postgres' || value === 'memory';
}

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Read backend settings from the environment (after dotenv has loaded .env).
 * STORE_DRIVER defaults to postgres when DATABASE_URL is set, memory otherwise.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BackendConfig {
  const databaseUrl = env.DATABASE_URL?.trim() || null;
  const driver = (env.STORE_DRIVER || (databaseUrl ? 'postgres' : 'memory')).trim().toLowerCase();

  if (!isStoreDriver(driver)) {
    throw new Error(`Unknown STORE_DRIVER "${driver}" (expected "postgres" or "memory")`);
  }
  if (driver === 'postgres' && !databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required when STORE_DRIVER=postgres');
  }

  const maxQueryLimit = intFromEnv(env.MAX_QUERY_LIMIT, 10000);
  return {
    port: intFromEnv(env.PORT, 5001),
    wsPort: intFromEnv(env.WS_PORT, 5002),
    databaseUrl,
    storeDriver: driver,
    logLevel: env.LOG_LEVEL || 'info',
    defaultQueryLimit: Math.min(intFromEnv(env.DEFAULT_QUERY_LIMIT, 100), maxQueryLimit),
    maxQueryLimit,
    statsMaxRows: intFromEnv(env.STATS_MAX_ROWS, 100000),
  };
}
