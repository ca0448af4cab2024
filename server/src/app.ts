import express, { Express } from 'express';
import cors from 'cors';
import type { Logger } from 'pino';
import { AppConfig } from './config';
import { QueryEvaluator, ScenarioEngine } from './services/metrics';
import { createAdminRouter } from './routes/admin';
import { createHealthRouter } from './routes/health';
import { createPrometheusRouter } from './routes/prometheus';
import { createScenarioRouter } from './routes/scenarios';
import { createRequestLogger } from './middleware/requestLogger';
import { errorHandler, notFoundHandler } from './utils/errors';
import { Clock, systemClock } from './utils/clock';

export interface AppDependencies {
  config: Pick<AppConfig, 'corsOrigin'>;
  logger: Logger;
  /** Absent when the metrics emulation is disabled. */
  engine?: ScenarioEngine;
  /** Stamps query results; should match the engine's clock. */
  clock?: Clock;
}

export function createApp(deps: AppDependencies): Express {
  const { config, logger, engine, clock = systemClock } = deps;
  const app = express();

  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));
  app.use(createRequestLogger({ logger }));

  app.use('/health', createHealthRouter({ metricsEnabled: engine !== undefined }));

  if (engine) {
    app.use(createPrometheusRouter({ source: engine, evaluator: new QueryEvaluator(engine, clock) }));
    app.use('/prometheus/api', createScenarioRouter(engine));
    app.use('/prometheus', createAdminRouter());
  }

  app.use(notFoundHandler);

  // Must be registered last (Express identifies error handlers by 4-param signature).
  app.use(errorHandler);

  return app;
}
