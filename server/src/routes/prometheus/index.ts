import { Router } from 'express';
import { MetricSource, QueryEvaluator } from '../../services/metrics';
import { createQueryHandler } from './query';
import { createMetricsHandler } from './metrics';

export interface PrometheusRoutesConfig {
  source: MetricSource;
  evaluator: QueryEvaluator;
}

/**
 * The emulated Prometheus surface: `/api/v1/query` and `/metrics`.
 */
export function createPrometheusRouter(config: PrometheusRoutesConfig): Router {
  const router = Router();
  const handleQuery = createQueryHandler(config.evaluator);

  router.get('/api/v1/query', handleQuery);
  router.post('/api/v1/query', handleQuery);
  router.get('/metrics', createMetricsHandler(config.source));

  return router;
}
