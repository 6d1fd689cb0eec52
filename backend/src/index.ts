// Load environment variables FIRST before any other imports
import dotenv from 'dotenv';
dotenv.config();

import { Server } from 'http';
import { createApp } from './app';
import { BackendConfig, loadConfig } from './config/config';
import Database from './database/database';
import { TimeSeriesStore } from './store/TimeSeriesStore';
import { PgTimeSeriesStore } from './store/PgTimeSeriesStore';
import { MemoryTimeSeriesStore } from './store/MemoryTimeSeriesStore';
import { IngestionService } from './services/IngestionService';
import { AggregationEngine } from './services/AggregationEngine';
import { WebSocketHub } from './services/WebSocketHub';
import { log, logger } from './utils/logger';

interface Services {
  db: Database | null;
  store: TimeSeriesStore;
  ingestion: IngestionService;
  aggregation: AggregationEngine;
  webSocketHub: WebSocketHub;
  server: Server;
}

let services: Services | null = null;

function createStore(config: BackendConfig): { store: TimeSeriesStore; db: Database | null } {
  if (config.storeDriver === 'postgres' && config.databaseUrl) {
    const db = Database.getInstance(config.databaseUrl);
    return { store: new PgTimeSeriesStore(db, () => db.initialize()), db };
  }
  return { store: new MemoryTimeSeriesStore(), db: null };
}

async function startServer(): Promise<void> {
  const config = loadConfig();
  logger.setLogLevel(config.logLevel);
  log.info(` Initializing envtrack backend (store: ${config.storeDriver})...`, 'index');

  const { store, db } = createStore(config);
  await store.initialize();

  const ingestion = new IngestionService(store);
  const aggregation = new AggregationEngine(store, config.statsMaxRows);
  const webSocketHub = new WebSocketHub(ingestion);
  await webSocketHub.initialize(config.wsPort);

  const app = createApp(
    { ingestion, aggregation },
    { defaultQueryLimit: config.defaultQueryLimit, maxQueryLimit: config.maxQueryLimit }
  );

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.port, () => resolve(listening));
    listening.once('error', reject);
  });

  services = { db, store, ingestion, aggregation, webSocketHub, server };

  log.important(` envtrack backend started`, 'index');
  log.info(` HTTP API: http://localhost:${config.port}`, 'index');
  log.info(` WebSocket: ws://localhost:${config.wsPort}`, 'index');
  log.info(`   POST   /api/sensor-data  - Receive sensor data`, 'index');
  log.info(`   GET    /api/sensor-data  - Historical data (limit | start/end)`, 'index');
  log.info(`   GET    /api/latest       - Latest reading`, 'index');
  log.info(`   GET    /api/stats        - Windowed statistics`, 'index');
  log.info(`   DELETE /api/sensor-data  - Clear store (confirm=true)`, 'index');
  log.info(`   GET    /health           - Health check`, 'index');
}

async function shutdown(signal: string): Promise<void> {
  log.info(` Received ${signal}, shutting down envtrack backend...`, 'index');

  if (services) {
    const { server, webSocketHub, store, db } = services;
    try {
      await new Promise<void>((resolve) => server.close(() => resolve()));
      await webSocketHub.cleanup();
      await store.close();
      if (db) {
        await db.close();
      }
      log.info(' All services cleaned up', 'index');
    } catch (error) {
      log.error(' Error during cleanup:', 'index', error);
      process.exit(1);
    }
  }

  process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

startServer().catch((error: unknown) => {
  log.error(' Failed to start server:', 'index', error);
  process.exit(1);
});
