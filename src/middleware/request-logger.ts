import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { createLogger } from '../utils/logger.js';

const log = createLogger('HTTP');

/**
 * Log method, path, status and duration once each response has been sent.
 * Requests that end in a client or server error are logged at error level.
 */
export function requestLogger(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const started = process.hrtime.bigint();

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - started) / 1e6;
      const line = `${req.method} ${req.originalUrl} ${res.statusCode} ${durationMs.toFixed(1)}ms`;
      if (res.statusCode >= 400) {
        log.error(line);
      } else {
        log.info(line);
      }
    });

    next();
  };
}
