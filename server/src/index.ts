import dotenv from 'dotenv';
import { AppConfig, loadConfig } from './config';
import { createApp } from './app';
import { ScenarioEngine } from './services/metrics';
import defaultLogger, { createLogger } from './utils/logger';

dotenv.config();

function readConfig(): Readonly<AppConfig> {
  try {
    return loadConfig();
  } catch (error) {
    defaultLogger.fatal({ err: error }, 'failed to load configuration');
    process.exit(1);
  }
}

function start(): void {
  const config = readConfig();
  const logger = createLogger({ level: config.logLevel });

  logger.info(
    { port: config.port, host: config.host, metricsEnabled: config.metricsEnabled },
    'configuration loaded'
  );

  let engine: ScenarioEngine | undefined;
  if (config.metricsEnabled) {
    engine = new ScenarioEngine({ initialScenario: config.initialScenario, logger });
  }

  const app = createApp({ config, logger, engine });

  const server = app.listen(config.port, config.host, () => {
    logger.info({ host: config.host, port: config.port }, 'server started');
  });

  const shutdown = () => {
    logger.info('shutting down');

    engine?.shutdown();

    server.close(() => {
      logger.info('server closed');
      process.exit(0);
    });

    // unref() so this timer doesn't keep the process alive
    const forceExitTimer = setTimeout(() => {
      logger.warn('forcing exit after timeout');
      process.exit(0);
    }, 10000);
    forceExitTimer.unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

start();
