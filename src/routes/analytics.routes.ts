import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AppServices } from '../container';
import { parseOrThrow } from './validation';

const escalationsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export function createAnalyticsRouter(services: Pick<AppServices, 'analytics'>): Router {
  const router = Router();
  const analytics = services.analytics;

  router.get('/overview', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, ...(await analytics.overview()) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/customers/stats', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, ...(await analytics.customerStats()) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/escalations', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = parseOrThrow(escalationsQuery, req.query);
      res.json({ success: true, ...(await analytics.escalations(limit)) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/messages/stats', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, ...(await analytics.messageStats()) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/dashboard', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, ...(await analytics.dashboard()) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
