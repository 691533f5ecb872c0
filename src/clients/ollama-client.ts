/**
 * Ollama client
 * Handles communication with an Ollama-compatible inference server and maps
 * its responses onto the OpenAI-style domain types used by the gateway.
 */

import { Readable } from 'node:stream';
import { createInterface } from 'node:readline';
import type { AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import type { GatewayConfig } from '../config/index.js';
import type {
  CompletionRequest,
  CompletionResponse,
  EmbeddingRequest,
  EmbeddingResponse,
  LLMModel,
  LLMRequest,
  LLMResponse,
  Message,
  StreamChunk,
  Usage,
  UpstreamHealth,
} from '../types/index.js';
import { ErrorCodes, GatewayError, describeError, fromHttpError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import {
  isRecord,
  optionalNumber,
  optionalString,
  readArray,
  readPathString,
  readString,
  requireField,
  type JsonRecord,
} from '../utils/safe-fields.js';
import type { LLMClient } from './interfaces.js';
import { createHttpClient, requestJson, type HttpClientOptions } from './http-client.js';

const HEALTH_TIMEOUT_MS = 5000;

interface GenerationOptions {
  temperature?: number;
  maxTokens?: number;
  stop?: string;
}

export class OllamaClient implements LLMClient {
  readonly name = 'ollama';

  private client: AxiosInstance;
  private defaultModel: string;
  private log: Logger;

  constructor(config: GatewayConfig['llm'], adapter?: HttpClientOptions['adapter']) {
    this.defaultModel = config.defaultModel;
    this.log = createLogger('OllamaClient');
    this.client = createHttpClient({
      name: this.name,
      baseURL: config.baseUrl,
      timeoutMs: config.timeoutMs,
      apiKey: config.apiKey,
      adapter,
    });
  }

  async chat(request: LLMRequest, signal?: AbortSignal): Promise<LLMResponse> {
    const model = request.model ?? this.defaultModel;
    const body = await requestJson(
      this.client,
      { method: 'POST', url: '/api/chat', data: this.buildChatBody(request, model, false), signal },
      'failed to make chat request',
      this.name
    );

    const content = requireField(readPathString(body, ['message', 'content']), 'failed to decode chat response');

    return {
      id: this.generateId('chatcmpl'),
      object: 'chat.completion',
      created: this.now(),
      model,
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content },
          finishReason: optionalString(body, 'done_reason') ?? 'stop',
        },
      ],
      usage: this.parseUsage(body),
    };
  }

  async completion(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const model = request.model ?? this.defaultModel;
    const body = await requestJson(
      this.client,
      {
        method: 'POST',
        url: '/api/generate',
        data: {
          model,
          prompt: request.prompt,
          stream: false,
          ...this.buildOptions(request),
        },
        signal,
      },
      'failed to make completion request',
      this.name
    );

    const text = requireField(readString(body, 'response'), 'failed to decode completion response');

    return {
      id: this.generateId('cmpl'),
      object: 'text_completion',
      created: this.now(),
      model,
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content: text },
          finishReason: optionalString(body, 'done_reason') ?? 'stop',
        },
      ],
      usage: this.parseUsage(body),
    };
  }

  async embedding(request: EmbeddingRequest, signal?: AbortSignal): Promise<EmbeddingResponse> {
    const model = request.model ?? this.defaultModel;
    const body = await requestJson(
      this.client,
      { method: 'POST', url: '/api/embeddings', data: { model, prompt: request.input }, signal },
      'failed to make embedding request',
      this.name
    );

    const values = requireField(readArray(body, 'embedding'), 'failed to decode embedding response');
    const vector = values.map((value, index) => {
      if (typeof value === 'number' && Number.isFinite(value)) {
        return value;
      }
      this.log.warn('replacing invalid embedding value with 0', { index });
      return 0;
    });

    return {
      object: 'list',
      data: [{ object: 'embedding', embedding: vector, index: 0 }],
      model,
      usage: this.parseUsage(body),
    };
  }

  async listModels(signal?: AbortSignal): Promise<LLMModel[]> {
    const body = await requestJson(
      this.client,
      { method: 'GET', url: '/api/tags', signal },
      'failed to list models',
      this.name
    );

    const entries = requireField(readArray(body, 'models'), 'failed to list models');
    const models: LLMModel[] = [];
    for (const entry of entries) {
      if (!isRecord(entry)) {
        this.log.warn('skipping invalid model entry');
        continue;
      }
      const name = readString(entry, 'name');
      if (!name.ok) {
        this.log.warn('skipping model without name', { error: name.error.message });
        continue;
      }

      const modifiedAt = Date.parse(optionalString(entry, 'modified_at') ?? '');
      const size = optionalNumber(entry, 'size');
      models.push({
        id: name.value,
        object: 'model',
        created: Number.isNaN(modifiedAt) ? this.now() : Math.floor(modifiedAt / 1000),
        ownedBy: 'ollama',
        ...(size !== undefined ? { size } : {}),
      });
    }
    return models;
  }

  /**
   * Stream a chat reply. Ollama answers with one JSON object per line; each
   * becomes a StreamChunk. Lines that are not valid JSON are skipped.
   */
  async *streamChat(request: LLMRequest, signal?: AbortSignal): AsyncGenerator<StreamChunk, void, undefined> {
    const context = 'failed to stream chat';
    if (signal?.aborted) {
      throw GatewayError.cancelled(context);
    }

    const model = request.model ?? this.defaultModel;
    let body: unknown;
    try {
      const response = await this.client.request<unknown>({
        method: 'POST',
        url: '/api/chat',
        data: this.buildChatBody(request, model, true),
        responseType: 'stream',
        signal,
      });
      body = response.data;
    } catch (error) {
      throw fromHttpError(error, context, this.name);
    }
    if (!(body instanceof Readable)) {
      throw new GatewayError(ErrorCodes.PARSING, `${context}: ${this.name} did not return a stream`);
    }
    const stream = body;

    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        const chunk = this.parseStreamLine(line, model);
        if (!chunk) {
          continue;
        }
        yield chunk;
        if (chunk.done) {
          return;
        }
      }
    } catch (error) {
      if (signal?.aborted) {
        throw GatewayError.cancelled(context);
      }
      throw new GatewayError(ErrorCodes.SERVICE_UNAVAILABLE, `${context}: ${describeError(error)}`, {
        cause: error,
        details: { provider: this.name },
      });
    } finally {
      lines.close();
      stream.destroy();
    }
  }

  async checkHealth(): Promise<UpstreamHealth> {
    const started = Date.now();
    try {
      await this.client.get('/api/tags', { timeout: HEALTH_TIMEOUT_MS });
      return { name: this.name, reachable: true, latencyMs: Date.now() - started };
    } catch (error) {
      const classified = fromHttpError(error, 'health check failed', this.name);
      return { name: this.name, reachable: false, latencyMs: Date.now() - started, error: classified.message };
    }
  }

  // Helper methods

  private buildChatBody(request: LLMRequest, model: string, stream: boolean): JsonRecord {
    return {
      model,
      messages: request.messages.map((message: Message) => ({ role: message.role, content: message.content })),
      stream,
      ...this.buildOptions(request),
    };
  }

  private buildOptions(request: GenerationOptions): { options?: JsonRecord } {
    const options: JsonRecord = {};
    if (request.temperature !== undefined) {
      options['temperature'] = request.temperature;
    }
    if (request.maxTokens !== undefined) {
      options['num_predict'] = request.maxTokens;
    }
    if (request.stop !== undefined) {
      options['stop'] = [request.stop];
    }
    return Object.keys(options).length > 0 ? { options } : {};
  }

  private parseUsage(body: JsonRecord): Usage {
    const promptTokens = optionalNumber(body, 'prompt_eval_count') ?? 0;
    const completionTokens = optionalNumber(body, 'eval_count') ?? 0;
    return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
  }

  private parseStreamLine(line: string, model: string): StreamChunk | undefined {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      this.log.warn('skipping malformed stream line', { line: trimmed.slice(0, 200) });
      return undefined;
    }
    if (!isRecord(parsed)) {
      this.log.warn('skipping non-object stream line');
      return undefined;
    }

    const content = readPathString(parsed, ['message', 'content']);
    return {
      content: content.ok ? content.value : '',
      done: parsed['done'] === true,
      model: optionalString(parsed, 'model') ?? model,
    };
  }

  private generateId(prefix: string): string {
    return `${prefix}-${uuidv4()}`;
  }

  private now(): number {
    return Math.floor(Date.now() / 1000);
  }
}
