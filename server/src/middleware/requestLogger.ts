import pinoHttp from 'pino-http';
import type { Logger } from 'pino';

const REDACTED_HEADERS: ReadonlySet<string> = new Set([
  'authorization',
  'cookie',
  'set-cookie',
]);

/** Paths polled by probes and scrapers. */
const QUIET_PATHS: ReadonlySet<string> = new Set(['/health', '/metrics']);

export interface RequestLoggerOptions {
  logger: Logger;
  quietScrapes?: boolean;
}

export function createRequestLogger(options: RequestLoggerOptions) {
  const { logger, quietScrapes = true } = options;

  return pinoHttp({
    logger,

    autoLogging: {
      ignore: quietScrapes
        ? (req) => QUIET_PATHS.has((req.url ?? '').split('?')[0])
        : undefined,
    },

    serializers: {
      req: (req) => ({
        method: req.method,
        url: req.url,
        headers: redactHeaders(req.headers),
      }),
      res: (res) => ({
        statusCode: res.statusCode,
      }),
    },
  });
}

function redactHeaders(
  headers: Record<string, string | string[] | undefined>
): Record<string, string | string[] | undefined> {
  const redacted: Record<string, string | string[] | undefined> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (REDACTED_HEADERS.has(key.toLowerCase())) {
      redacted[key] = '[REDACTED]';
    } else if (value !== undefined) {
      redacted[key] = value;
    }
  }
  return redacted;
}

export { redactHeaders };
