import { Router, Request, Response } from 'express';
import type { AppServices } from '../container';

export function createAdminRouter(services: Pick<AppServices, 'health'>): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    const checks = await services.health();
    const healthy = Object.values(checks).every((c) => c.status === 'healthy');

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      ...checks,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
