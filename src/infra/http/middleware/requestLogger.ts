import { randomUUID } from 'crypto';
import type { IncomingMessage, ServerResponse } from 'http';
import { pinoHttp, type HttpLogger } from 'pino-http';
import type { Logger } from '../../logging/logger.js';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Access log. Reuses an incoming `x-request-id` and echoes it back.
 */
export function createRequestLogger(logger: Logger): HttpLogger {
  return pinoHttp({
    logger,
    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const id = headerValue(req.headers['x-request-id']) || randomUUID();
      res.setHeader('x-request-id', id);
      return id;
    },
    customLogLevel: (_req, res, err) => {
      if (err || res.statusCode >= 500) return 'error';
      if (res.statusCode >= 400) return 'warn';
      return 'info';
    },
    autoLogging: {
      ignore: (req) => req.url === '/healthz',
    },
  });
}
