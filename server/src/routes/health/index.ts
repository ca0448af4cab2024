import { Router, Request, Response } from 'express';

export interface HealthRoutesConfig {
  metricsEnabled: boolean;
}

export function createHealthRouter(config: HealthRoutesConfig): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ status: 'ok', metricsEnabled: config.metricsEnabled });
  });

  return router;
}
