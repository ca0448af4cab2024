import { ConfigError } from '../utils/errors';
import { LogLevel, parseLogLevel } from '../utils/logger';

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  corsOrigin: string;
  /** Whether the metrics emulation routes are mounted at all. */
  metricsEnabled: boolean;
  initialScenario: string;
}

type Env = Record<string, string | undefined>;

const DEFAULT_PORT = '8080';
const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_SCENARIO = 'healthy';

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value ? value : defaultValue;
}

/**
 * Parse true/false, 1/0, yes/no, on/off. Anything else keeps the default.
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;

  switch (value.toLowerCase().trim()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      return defaultValue;
  }
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`PORT must be a number between 1 and 65535, got: ${value}`, 'PORT');
  }
  return port;
}

export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  return Object.freeze({
    port: parsePort(getEnvOrDefault(env, 'PORT', DEFAULT_PORT).trim()),
    host: getEnvOrDefault(env, 'HOST', DEFAULT_HOST),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    corsOrigin: getEnvOrDefault(env, 'CORS_ORIGIN', '*'),
    metricsEnabled: parseBoolean(env.PROMETHEUS_ENABLED, true),
    initialScenario: getEnvOrDefault(env, 'STAGE_PROMETHEUS_SCENARIO', DEFAULT_SCENARIO),
  });
}
