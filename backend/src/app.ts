import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { IngestionService } from './services/IngestionService';
import { AggregationEngine } from './services/AggregationEngine';
import { createReadingsRouter } from './routes/readings';
import { createStatsRouter } from './routes/stats';
import { sendError } from './routes/respond';
import { log } from './utils/logger';

export const SERVICE_NAME = 'envtrack-backend';
export const SERVICE_VERSION = '1.0.0';

export interface AppServices {
  ingestion: IngestionService;
  aggregation: AggregationEngine;
}

export interface AppOptions {
  defaultQueryLimit: number;
  maxQueryLimit: number;
}

// body-parser attaches `type` and `status` to the errors it raises
function isBodyParserError(error: unknown): error is Error & { type: string; status: number } {
  return (
    error instanceof Error &&
    'type' in error &&
    typeof error.type === 'string' &&
    'status' in error &&
    typeof error.status === 'number'
  );
}

export function createApp(services: AppServices, options: AppOptions): Express {
  const app = express();
  const startedAt = Date.now();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '16kb' }));

  // Liveness only: never touches the store
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      uptime_s: Math.floor((Date.now() - startedAt) / 1000),
      timestamp: new Date().toISOString(),
    });
  });

  // API routes
  app.use(
    '/api/sensor-data',
    createReadingsRouter(services.ingestion, {
      defaultLimit: options.defaultQueryLimit,
      maxLimit: options.maxQueryLimit,
    })
  );
  app.use('/api/stats', createStatsRouter(services.aggregation));

  // Latest stored reading
  app.get('/api/latest', async (req: Request, res: Response) => {
    try {
      const latest = await services.ingestion.latest();
      if (!latest) {
        return res.status(404).json({ message: 'No data available' });
      }
      res.json(latest);
    } catch (error) {
      sendError(res, error, 'app', 'fetch latest reading');
    }
  });

  // Store epoch and size, for clients that cache row ids
  app.get('/api/store', async (req: Request, res: Response) => {
    try {
      res.json(await services.ingestion.info());
    } catch (error) {
      sendError(res, error, 'app', 'fetch store info');
    }
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'not_found', path: req.path });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParserError(error)) {
      const reason = error.type === 'entity.parse.failed' ? 'invalid_json' : error.type;
      log.warn(`Rejected request body: ${reason}`, 'app');
      return res.status(error.status).json({ error: 'validation_failed', reason, issues: [] });
    }
    sendError(res, error, 'app', 'handle request');
  });

  return app;
}
