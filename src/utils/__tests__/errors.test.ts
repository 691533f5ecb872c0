import axios, { AxiosError, CanceledError } from 'axios';
import { describe, expect, it } from 'vitest';
import { ErrorCodes, GatewayError, fromHttpError, httpStatusFor } from '../errors.js';

/** Capture the error axios raises for an upstream answering with `status`. */
function statusError(status: number): Promise<unknown> {
  const client = axios.create({
    adapter: async (config) => {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, {
        status,
        statusText: 'error',
        headers: {},
        config,
        data: { detail: 'upstream body' },
      });
    },
  });
  return client.get('/resource').then(
    () => undefined,
    (error: unknown) => error
  );
}

describe('fromHttpError', () => {
  it.each([
    [400, ErrorCodes.INVALID_INPUT],
    [401, ErrorCodes.UNAUTHORIZED],
    [403, ErrorCodes.FORBIDDEN],
    [404, ErrorCodes.NOT_FOUND],
    [408, ErrorCodes.TIMEOUT],
    [429, ErrorCodes.BAD_GATEWAY],
    [500, ErrorCodes.BAD_GATEWAY],
    [502, ErrorCodes.SERVICE_UNAVAILABLE],
    [503, ErrorCodes.SERVICE_UNAVAILABLE],
    [504, ErrorCodes.TIMEOUT],
  ])('maps upstream status %i to %s', async (status, code) => {
    const error = fromHttpError(await statusError(status), 'failed to search wikipedia', 'wikipedia');

    expect(error.code).toBe(code);
    expect(error.message).toBe(`failed to search wikipedia: wikipedia responded with status ${status}`);
    expect(error.details).toEqual({ provider: 'wikipedia', status });
  });

  it('classifies timeouts', () => {
    const error = fromHttpError(new AxiosError('timeout of 10ms exceeded', 'ECONNABORTED'), 'failed to chat', 'ollama');

    expect(error.code).toBe(ErrorCodes.TIMEOUT);
    expect(error.message).toBe('failed to chat: ollama did not respond in time');
  });

  it('classifies unreachable hosts', () => {
    const error = fromHttpError(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'), 'failed to chat', 'ollama');

    expect(error.code).toBe(ErrorCodes.SERVICE_UNAVAILABLE);
    expect(error.details).toEqual({ provider: 'ollama', network: 'ECONNREFUSED' });
  });

  it('classifies cancellation', () => {
    expect(fromHttpError(new CanceledError(), 'failed to chat', 'ollama').code).toBe(ErrorCodes.REQUEST_CANCELLED);
  });

  it('keeps the code of a GatewayError and adds context', () => {
    const inner = new GatewayError(ErrorCodes.PARSING, 'bad body');
    const error = fromHttpError(inner, 'failed to chat', 'ollama');

    expect(error.code).toBe(ErrorCodes.PARSING);
    expect(error.message).toBe('failed to chat: bad body');
  });

  it('treats anything else as internal', () => {
    const error = fromHttpError(new TypeError('x is not a function'), 'failed to chat', 'ollama');

    expect(error.code).toBe(ErrorCodes.INTERNAL);
    expect(error.message).toBe('failed to chat: x is not a function');
  });
});

describe('GatewayError', () => {
  it('wraps foreign errors as internal', () => {
    const error = GatewayError.wrap('plain string', 'startup');

    expect(error.code).toBe(ErrorCodes.INTERNAL);
    expect(error.message).toBe('startup: plain string');
  });
});

describe('httpStatusFor', () => {
  it.each([
    [ErrorCodes.INVALID_INPUT, 400],
    [ErrorCodes.UNAUTHORIZED, 401],
    [ErrorCodes.FORBIDDEN, 403],
    [ErrorCodes.NOT_FOUND, 404],
    [ErrorCodes.REQUEST_CANCELLED, 499],
    [ErrorCodes.TIMEOUT, 504],
    [ErrorCodes.SERVICE_UNAVAILABLE, 503],
    [ErrorCodes.BAD_GATEWAY, 502],
    [ErrorCodes.TYPE_ASSERTION, 502],
    [ErrorCodes.PARSING, 502],
    [ErrorCodes.CACHE, 500],
    [ErrorCodes.INTERNAL, 500],
  ])('maps %s to %i', (code, status) => {
    expect(httpStatusFor(code)).toBe(status);
  });
});
