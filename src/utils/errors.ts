import axios from 'axios';

export const ErrorCodes = {
  INVALID_INPUT: 'INVALID_INPUT',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  TIMEOUT: 'TIMEOUT',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  BAD_GATEWAY: 'BAD_GATEWAY',
  TYPE_ASSERTION: 'TYPE_ASSERTION_ERROR',
  PARSING: 'PARSING_ERROR',
  REQUEST_CANCELLED: 'REQUEST_CANCELLED',
  CACHE: 'CACHE_ERROR',
  INTERNAL: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type ErrorDetails = Record<string, string | number | boolean>;

/**
 * Application error carrying a stable code that the delivery layer maps to a
 * response status.
 */
export class GatewayError extends Error {
  readonly code: ErrorCode;
  readonly details: ErrorDetails;

  constructor(code: ErrorCode, message: string, options: { cause?: unknown; details?: ErrorDetails } = {}) {
    super(message, { cause: options.cause });
    this.name = 'GatewayError';
    this.code = code;
    this.details = options.details ?? {};
  }

  static invalidInput(message: string, details?: ErrorDetails): GatewayError {
    return new GatewayError(ErrorCodes.INVALID_INPUT, message, { details });
  }

  static cancelled(context: string): GatewayError {
    return new GatewayError(ErrorCodes.REQUEST_CANCELLED, `${context}: request was cancelled`);
  }

  /**
   * Prefix an error with the operation that failed. The code of an existing
   * GatewayError is kept; anything else becomes INTERNAL_ERROR.
   */
  static wrap(error: unknown, context: string): GatewayError {
    if (error instanceof GatewayError) {
      return new GatewayError(error.code, `${context}: ${error.message}`, {
        cause: error,
        details: error.details,
      });
    }
    return new GatewayError(ErrorCodes.INTERNAL, `${context}: ${describeError(error)}`, { cause: error });
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'ECONNRESET', 'EHOSTUNREACH']);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function codeForStatus(status: number): ErrorCode {
  switch (status) {
    case 400:
      return ErrorCodes.INVALID_INPUT;
    case 401:
      return ErrorCodes.UNAUTHORIZED;
    case 403:
      return ErrorCodes.FORBIDDEN;
    case 404:
      return ErrorCodes.NOT_FOUND;
    case 408:
    case 504:
      return ErrorCodes.TIMEOUT;
    case 502:
    case 503:
      return ErrorCodes.SERVICE_UNAVAILABLE;
    default:
      return ErrorCodes.BAD_GATEWAY;
  }
}

/**
 * Classify an error thrown by an upstream HTTP call. Response bodies are
 * deliberately left out of the details.
 */
export function fromHttpError(error: unknown, context: string, provider: string): GatewayError {
  if (error instanceof GatewayError) {
    return GatewayError.wrap(error, context);
  }

  if (axios.isCancel(error)) {
    return new GatewayError(ErrorCodes.REQUEST_CANCELLED, `${context}: request was cancelled`, {
      cause: error,
      details: { provider },
    });
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      return new GatewayError(codeForStatus(status), `${context}: ${provider} responded with status ${status}`, {
        cause: error,
        details: { provider, status },
      });
    }

    const networkCode = error.code ?? '';
    if (TIMEOUT_CODES.has(networkCode)) {
      return new GatewayError(ErrorCodes.TIMEOUT, `${context}: ${provider} did not respond in time`, {
        cause: error,
        details: { provider },
      });
    }
    if (UNREACHABLE_CODES.has(networkCode)) {
      return new GatewayError(ErrorCodes.SERVICE_UNAVAILABLE, `${context}: ${provider} is unreachable`, {
        cause: error,
        details: { provider, network: networkCode },
      });
    }
  }

  return new GatewayError(ErrorCodes.INTERNAL, `${context}: ${describeError(error)}`, {
    cause: error,
    details: { provider },
  });
}

export function httpStatusFor(code: ErrorCode): number {
  switch (code) {
    case ErrorCodes.INVALID_INPUT:
      return 400;
    case ErrorCodes.UNAUTHORIZED:
      return 401;
    case ErrorCodes.FORBIDDEN:
      return 403;
    case ErrorCodes.NOT_FOUND:
      return 404;
    case ErrorCodes.REQUEST_CANCELLED:
      return 499;
    case ErrorCodes.TIMEOUT:
      return 504;
    case ErrorCodes.SERVICE_UNAVAILABLE:
      return 503;
    case ErrorCodes.BAD_GATEWAY:
    case ErrorCodes.TYPE_ASSERTION:
    case ErrorCodes.PARSING:
      return 502;
    default:
      return 500;
  }
}
