/**
 * Request Logging Middleware
 *
 * One pino-http line per request. The request ID doubles as the pipeline
 * correlation ID and is echoed back in `X-Request-Id`.
 */

import pinoHttp, { Options } from 'pino-http';
import { randomUUID } from 'crypto';
import { loggers } from '../../shared/logging/logger';
import { config } from '../config';
import type { IncomingMessage, ServerResponse } from 'http';

const ID_HEADERS = ['x-request-id', 'x-correlation-id'] as const;

/**
 * Take the caller's request or correlation ID, or mint one
 */
export function requestIdFor(req: IncomingMessage): string {
  for (const header of ID_HEADERS) {
    const value = req.headers[header];
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return randomUUID();
}

/**
 * Health checks are noise; tailoring calls are the interesting traffic
 */
export function levelFor(req: IncomingMessage, res: ServerResponse, err?: Error): 'error' | 'warn' | 'info' | 'debug' {
  if (err || res.statusCode >= 500) return 'error';
  if (res.statusCode >= 400) return 'warn';
  if (req.url === '/api/health') return 'debug';
  return 'info';
}

export function createRequestLogger(options: Options = {}) {
  return pinoHttp({
    logger: loggers.http,
    genReqId: (req, res) => {
      const id = requestIdFor(req);
      res.setHeader('X-Request-Id', id);
      return id;
    },
    serializers: {
      req: (req: IncomingMessage) => ({
        method: req.method,
        url: req.url,
        contentLength: req.headers['content-length']
      }),
      res: (res: ServerResponse) => ({ statusCode: res.statusCode })
    },
    customLogLevel: levelFor,
    customSuccessMessage: (req, res, responseTime) =>
      `${req.method} ${req.url} ${res.statusCode} ${responseTime.toFixed(0)}ms`,
    customErrorMessage: (req, res, err) => `${req.method} ${req.url} ${res.statusCode} - ${err.message}`,
    autoLogging: {
      ignore: req => config.server.isProduction && req.url === '/api/health'
    },
    customAttributeKeys: { reqId: 'requestId' },
    ...options
  });
}

export const requestLogger = createRequestLogger();
