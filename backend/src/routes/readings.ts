import { Router, Request, Response } from 'express';
import { IngestionService } from '../services/IngestionService';
import { StoredReading } from '../types/reading';
import { readingsToCsv } from '../utils/csv';
import { ValidationError } from '../utils/errors';
import { parseLimit, parseTimeRange } from '../utils/queryParams';
import { sendError } from './respond';

export interface ReadingsRouterOptions {
  defaultLimit: number;
  maxLimit: number;
}

export function createReadingsRouter(ingestion: IngestionService, options: ReadingsRouterOptions): Router {
  const router = Router();

  // `limit` selects the newest rows; `start`/`end` selects a receipt-time range.
  // Both return newest first.
  async function selectReadings(req: Request): Promise<StoredReading[]> {
    const limit = parseLimit(req.query, options.defaultLimit, options.maxLimit);
    const range = parseTimeRange(req.query, new Date());
    if (range) {
      return ingestion.range(range.start, range.end, limit);
    }
    return ingestion.recent(limit);
  }

  // POST /api/sensor-data - Receive one reading from a device
  router.post('/', async (req: Request, res: Response) => {
    try {
      const { reading, epoch } = await ingestion.ingest(req.body);
      res.status(201).json({ row_id: reading.row_id, epoch });
    } catch (error) {
      sendError(res, error, 'readings', 'store reading');
    }
  });

  // GET /api/sensor-data - Readings for the dashboard, newest first
  router.get('/', async (req: Request, res: Response) => {
    try {
      res.json(await selectReadings(req));
    } catch (error) {
      sendError(res, error, 'readings', 'fetch readings');
    }
  });

  // GET /api/sensor-data/export.csv - Same selection as CSV
  router.get('/export.csv', async (req: Request, res: Response) => {
    try {
      const rows = await selectReadings(req);
      const stamp = new Date().toISOString().replace(/[-:]/g, '').replace(/\..*$/, '');
      res
        .status(200)
        .type('text/csv')
        .attachment(`sensor_data_${stamp}.csv`)
        .send(readingsToCsv(rows));
    } catch (error) {
      sendError(res, error, 'readings', 'export readings');
    }
  });

  // DELETE /api/sensor-data?confirm=true - Truncate the store (new epoch)
  router.delete('/', async (req: Request, res: Response) => {
    try {
      if (req.query.confirm !== 'true') {
        throw new ValidationError('confirmation_required', [
          { field: 'confirm', code: 'missing', message: 'Pass confirm=true to delete every stored reading' },
        ]);
      }
      const result = await ingestion.clear();
      res.json(result);
    } catch (error) {
      sendError(res, error, 'readings', 'clear readings');
    }
  });

  return router;
}
