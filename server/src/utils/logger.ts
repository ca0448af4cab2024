import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const VALID_LOG_LEVELS: readonly LogLevel[] = [
  'fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent',
];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LOG_LEVELS as readonly string[]).includes(value);
}

export function parseLogLevel(envValue: string | undefined): LogLevel {
  if (!envValue) return 'info';
  const normalized = envValue.toLowerCase().trim();
  if (isLogLevel(normalized)) return normalized;
  return 'info';
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  // Jest sets NODE_ENV=test; the pretty transport runs in a worker thread.
  const isDev = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
  const pretty = options.pretty ?? isDev;

  const transport = pretty
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' } }
    : undefined;

  return pino({ level, transport });
}

const logger = createLogger();

export default logger;
