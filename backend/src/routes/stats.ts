import { Router, Request, Response } from 'express';
import { AggregationEngine, parseWindow } from '../services/AggregationEngine';
import { sendError } from './respond';

export function createStatsRouter(aggregation: AggregationEngine): Router {
  const router = Router();

  // GET /api/stats?window=all | ?last=N | ?duration=24h | ?start=&end=
  router.get('/', async (req: Request, res: Response) => {
    try {
      const window = parseWindow(req.query, new Date());
      res.json(await aggregation.stats(window));
    } catch (error) {
      sendError(res, error, 'stats', 'compute statistics');
    }
  });

  return router;
}
