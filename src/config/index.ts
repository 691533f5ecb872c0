import { z } from 'zod';
import { GatewayError } from '../utils/errors.js';
import type { LogLevel } from '../utils/logger.js';

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const milliseconds = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const seconds = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().default('0.0.0.0'),
  URL_PREFIX: z.string().startsWith('/').default('/api/v1'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  REQUEST_TIMEOUT_MS: milliseconds(60_000),

  LLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  LLAMA_API_KEY: optionalText,
  LLAMA_DEFAULT_MODEL: z.string().min(1).default('llama2'),
  LLAMA_TIMEOUT_MS: milliseconds(60_000),

  // {language} is replaced with the requested language code
  WIKIPEDIA_API_URL: z.string().default('https://{language}.wikipedia.org'),
  WIKIPEDIA_TIMEOUT_MS: milliseconds(30_000),
  BRITANNICA_API_URL: z.string().url().default('https://api.britannica.com'),
  BRITANNICA_API_KEY: optionalText,
  BRITANNICA_TIMEOUT_MS: milliseconds(30_000),

  REDIS_URL: optionalText,
  CACHE_TTL_CHAT_SECONDS: seconds(3_600),
  CACHE_TTL_COMPLETION_SECONDS: seconds(3_600),
  CACHE_TTL_EMBEDDING_SECONDS: seconds(86_400),
  CACHE_TTL_MODELS_SECONDS: seconds(3_600),
  CACHE_TTL_SEARCH_SECONDS: seconds(3_600),
  CACHE_TTL_ARTICLE_SECONDS: seconds(86_400),

  SHUTDOWN_TIMEOUT_MS: milliseconds(30_000),
});

export interface CacheTtlPolicy {
  chat: number;
  completion: number;
  embedding: number;
  models: number;
  search: number;
  article: number;
}

export interface UpstreamConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

export interface GatewayConfig {
  server: {
    port: number;
    host: string;
    urlPrefix: string;
    nodeEnv: 'development' | 'production' | 'test';
    requestTimeoutMs: number;
    shutdownTimeoutMs: number;
  };
  logLevel: LogLevel;
  llm: UpstreamConfig & { defaultModel: string };
  wikipedia: UpstreamConfig;
  britannica: UpstreamConfig;
  cache: {
    redisUrl?: string;
    ttlSeconds: CacheTtlPolicy;
  };
}

/**
 * Build the gateway configuration from an environment map. Empty strings are
 * treated as unset so that a blank line in `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      present[key] = value;
    }
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw GatewayError.invalidInput(`Invalid configuration: ${fields.join('; ')}`);
  }
  const e = parsed.data;

  return Object.freeze({
    server: {
      port: e.PORT,
      host: e.HOST,
      urlPrefix: e.URL_PREFIX.replace(/\/+$/, ''),
      nodeEnv: e.NODE_ENV,
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
      shutdownTimeoutMs: e.SHUTDOWN_TIMEOUT_MS,
    },
    logLevel: e.LOG_LEVEL,
    llm: {
      baseUrl: e.LLAMA_BASE_URL.replace(/\/+$/, ''),
      apiKey: e.LLAMA_API_KEY,
      defaultModel: e.LLAMA_DEFAULT_MODEL,
      timeoutMs: e.LLAMA_TIMEOUT_MS,
    },
    wikipedia: {
      baseUrl: e.WIKIPEDIA_API_URL.replace(/\/+$/, ''),
      timeoutMs: e.WIKIPEDIA_TIMEOUT_MS,
    },
    britannica: {
      baseUrl: e.BRITANNICA_API_URL.replace(/\/+$/, ''),
      apiKey: e.BRITANNICA_API_KEY,
      timeoutMs: e.BRITANNICA_TIMEOUT_MS,
    },
    cache: {
      redisUrl: e.REDIS_URL,
      ttlSeconds: {
        chat: e.CACHE_TTL_CHAT_SECONDS,
        completion: e.CACHE_TTL_COMPLETION_SECONDS,
        embedding: e.CACHE_TTL_EMBEDDING_SECONDS,
        models: e.CACHE_TTL_MODELS_SECONDS,
        search: e.CACHE_TTL_SEARCH_SECONDS,
        article: e.CACHE_TTL_ARTICLE_SECONDS,
      },
    },
  });
}
