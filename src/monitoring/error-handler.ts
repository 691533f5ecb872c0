import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { ZodError } from 'zod';
import { ErrorCodes, GatewayError, httpStatusFor, type ErrorCode } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ErrorHandler');

export interface ErrorInfo {
  id: string;
  timestamp: string;
  code: ErrorCode;
  status: number;
  message: string;
  context: {
    url?: string;
    method?: string;
    userAgent?: string;
    ip?: string;
  };
}

export interface ErrorEnvelope {
  success: false;
  error: string;
  code: ErrorCode;
  errorId: string;
  timestamp: string;
}

export interface ErrorStats {
  total: number;
  byCode: Record<string, number>;
  recent: ErrorInfo[];
}

const MAX_RECENT_ERRORS = 100;

/**
 * Turn anything thrown by a route into a GatewayError. Body-parser failures
 * and zod validation errors are the caller's fault; everything unrecognised
 * is internal.
 */
export function normalizeError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
    return GatewayError.invalidInput(`invalid request body: ${issues.join('; ')}`);
  }
  if (error instanceof Error && 'type' in error) {
    if (error.type === 'entity.parse.failed') {
      return GatewayError.invalidInput('malformed JSON body');
    }
    if (error.type === 'entity.too.large') {
      return GatewayError.invalidInput('request body too large');
    }
  }
  return GatewayError.wrap(error, 'unhandled error');
}

export class ErrorHandler {
  private recent: ErrorInfo[] = [];
  private counts = new Map<ErrorCode, number>();
  private total = 0;

  /**
   * Express error handling middleware
   */
  middleware(): ErrorRequestHandler {
    return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
      const gatewayError = normalizeError(error);
      const info = this.captureError(gatewayError, {
        url: req.originalUrl,
        method: req.method,
        userAgent: req.get('User-Agent'),
        ip: req.ip,
      });

      // A streamed response has already committed its status
      if (res.headersSent) {
        next(error);
        return;
      }
      res.status(info.status).json(this.toEnvelope(info));
    };
  }

  captureError(error: GatewayError, context: ErrorInfo['context'] = {}): ErrorInfo {
    const status = httpStatusFor(error.code);
    const info: ErrorInfo = {
      id: uuidv4(),
      timestamp: new Date().toISOString(),
      code: error.code,
      status,
      message: error.message,
      context,
    };

    this.total++;
    this.counts.set(error.code, (this.counts.get(error.code) ?? 0) + 1);
    this.recent.push(info);
    if (this.recent.length > MAX_RECENT_ERRORS) {
      this.recent.shift();
    }

    this.logError(info, error);
    return info;
  }

  toEnvelope(info: ErrorInfo): ErrorEnvelope {
    return {
      success: false,
      error: info.code === ErrorCodes.INTERNAL ? 'Internal server error' : info.message,
      code: info.code,
      errorId: info.id,
      timestamp: info.timestamp,
    };
  }

  getErrorStats(): ErrorStats {
    return {
      total: this.total,
      byCode: Object.fromEntries(this.counts),
      recent: [...this.recent],
    };
  }

  private logError(info: ErrorInfo, error: GatewayError): void {
    const meta = { code: info.code, status: info.status, method: info.context.method, url: info.context.url };
    if (info.status >= 500) {
      log.error(`Error ${info.id}: ${info.message}`, { ...meta, stack: error.stack });
    } else {
      log.warn(`Error ${info.id}: ${info.message}`, meta);
    }
  }
}
