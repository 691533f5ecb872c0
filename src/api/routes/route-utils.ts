import type { NextFunction, Request, Response } from 'express';
import type { z } from 'zod';
import { ErrorCodes, GatewayError, describeError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('Routes');

export interface RouteOptions {
  /** Deadline for a whole request, upstream calls included */
  requestTimeoutMs?: number;
}

/**
 * Decode a JSON body with a zod schema. A missing body is decoded as `{}` so
 * the schema reports which fields are required.
 */
export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
    throw GatewayError.invalidInput(`invalid request body: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * An AbortSignal that fires when the client goes away before the response
 * has been written, or with a TIMEOUT error as its reason once `timeoutMs`
 * has passed.
 */
export function requestSignal(res: Response, timeoutMs?: number): AbortSignal {
  const controller = new AbortController();
  const deadline =
    timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
          controller.abort(new GatewayError(ErrorCodes.TIMEOUT, `request exceeded the ${timeoutMs}ms deadline`));
        }, timeoutMs);
  deadline?.unref();

  res.on('close', () => {
    clearTimeout(deadline);
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

/** The TIMEOUT error of a signal aborted by its deadline rather than by the client. */
export function deadlineFailure(signal: AbortSignal): GatewayError | undefined {
  const reason: unknown = signal.reason;
  if (signal.aborted && reason instanceof GatewayError && reason.code === ErrorCodes.TIMEOUT) {
    return reason;
  }
  return undefined;
}

export function sendSuccess(res: Response, data: unknown): void {
  if (res.headersSent) {
    log.debug('response already sent, dropping late result');
    return;
  }
  res.json({ success: true, data, timestamp: new Date().toISOString() });
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(GatewayError.cancelled('request aborted')), { once: true });
  });
}

type AsyncRoute = (req: Request, res: Response, signal: AbortSignal) => Promise<void>;

/**
 * Run a route under the request signal. A rejected route, an abort or the
 * deadline is forwarded to the error middleware; once the deadline has
 * passed the failure is reported as TIMEOUT. Routes that already started
 * their response (streams) report their own failures.
 */
export function asyncRoute(
  route: AsyncRoute,
  options: RouteOptions = {}
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    const signal = requestSignal(res, options.requestTimeoutMs);
    Promise.race([route(req, res, signal), rejectOnAbort(signal)]).catch((error: unknown) => {
      if (res.headersSent) {
        log.debug('route failed after its response started', { error: describeError(error) });
        return;
      }
      next(deadlineFailure(signal) ?? error);
    });
  };
}
