import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { ErrorCodes, GatewayError, fromHttpError } from '../utils/errors.js';
import { isRecord, type JsonRecord } from '../utils/safe-fields.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('HttpClient');

export const USER_AGENT = 'EncyclopediaGateway/1.0.0';

export interface HttpClientOptions {
  /** Provider name used in log lines and error details */
  name: string;
  baseURL?: string;
  timeoutMs: number;
  apiKey?: string;
  /** Replaces the network transport, e.g. with an in-process stand-in */
  adapter?: AxiosAdapter;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    'User-Agent': USER_AGENT,
  };
  if (options.apiKey) {
    headers['Authorization'] = `Bearer ${options.apiKey}`;
  }

  const client = axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    headers,
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });

  // Interceptor for structured error logging
  client.interceptors.response.use(
    (response) => response,
    (error: unknown) => {
      if (axios.isAxiosError(error) && !axios.isCancel(error)) {
        log.debug(`${options.name} API error`, {
          message: error.message,
          code: error.code,
          status: error.response?.status,
          url: error.config?.url,
        });
      }
      return Promise.reject(error);
    }
  );

  return client;
}

/**
 * Issue a request and return the decoded JSON object body. Transport and
 * status failures become classified GatewayErrors; a body that is not a JSON
 * object becomes PARSING_ERROR.
 */
export async function requestJson(
  client: AxiosInstance,
  config: AxiosRequestConfig,
  context: string,
  provider: string
): Promise<JsonRecord> {
  if (config.signal?.aborted) {
    throw GatewayError.cancelled(context);
  }

  let data: unknown;
  try {
    const response = await client.request<unknown>(config);
    data = response.data;
  } catch (error) {
    throw fromHttpError(error, context, provider);
  }

  if (typeof data === 'string') {
    try {
      data = JSON.parse(data);
    } catch (error) {
      throw new GatewayError(ErrorCodes.PARSING, `${context}: ${provider} returned a body that is not JSON`, {
        cause: error,
        details: { provider },
      });
    }
  }

  if (!isRecord(data)) {
    throw new GatewayError(ErrorCodes.PARSING, `${context}: ${provider} returned an unexpected body`, {
      details: { provider },
    });
  }
  return data;
}
