/**
 * LLM usecase: request defaults, validation and cache-aside around the LLM
 * client. Streaming is passed through uncached.
 */

import type { LLMClient } from '../clients/interfaces.js';
import type { CacheTtlPolicy } from '../config/index.js';
import {
  CompletionResponseSchema,
  EmbeddingResponseSchema,
  LLMModelListSchema,
  LLMResponseSchema,
  type CompletionRequest,
  type CompletionResponse,
  type EmbeddingRequest,
  type EmbeddingResponse,
  type LLMModel,
  type LLMRequest,
  type LLMResponse,
  type StreamChunk,
  type UpstreamHealth,
} from '../types/index.js';
import { CacheAside } from '../utils/cache-aside.js';
import type { ICache } from '../utils/cache-layer.js';
import { MODELS_KEY, chatKey, completionKey, embeddingKey } from '../utils/cache-keys.js';
import { GatewayError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

/** The part of the LLM usecase other usecases depend on. */
export interface ChatService {
  chat(request: LLMRequest, signal?: AbortSignal): Promise<LLMResponse>;
}

type WithModel<T> = T & { model: string };

export class LLMUsecase implements ChatService {
  private readonly cacheAside: CacheAside;

  constructor(
    private readonly client: LLMClient,
    cache: ICache,
    private readonly ttl: CacheTtlPolicy,
    private readonly defaultModel: string
  ) {
    this.cacheAside = new CacheAside(cache, createLogger('LLMUsecase'));
  }

  async chat(request: LLMRequest, signal?: AbortSignal): Promise<LLMResponse> {
    const prepared = this.prepareChat(request);
    return this.cacheAside.getOrLoad(chatKey(prepared), LLMResponseSchema, this.ttl.chat, () =>
      this.client.chat(prepared, signal)
    );
  }

  async completion(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    if (request.prompt.trim().length === 0) {
      throw GatewayError.invalidInput('prompt is required', { field: 'prompt' });
    }
    const prepared: WithModel<CompletionRequest> = { ...request, model: this.resolveModel(request.model) };
    return this.cacheAside.getOrLoad(completionKey(prepared), CompletionResponseSchema, this.ttl.completion, () =>
      this.client.completion(prepared, signal)
    );
  }

  async embedding(request: EmbeddingRequest, signal?: AbortSignal): Promise<EmbeddingResponse> {
    if (request.input.trim().length === 0) {
      throw GatewayError.invalidInput('input is required', { field: 'input' });
    }
    const prepared: WithModel<EmbeddingRequest> = { ...request, model: this.resolveModel(request.model) };
    return this.cacheAside.getOrLoad(embeddingKey(prepared), EmbeddingResponseSchema, this.ttl.embedding, () =>
      this.client.embedding(prepared, signal)
    );
  }

  async listModels(signal?: AbortSignal): Promise<LLMModel[]> {
    return this.cacheAside.getOrLoad(MODELS_KEY, LLMModelListSchema, this.ttl.models, () =>
      this.client.listModels(signal)
    );
  }

  /**
   * Validation runs when this is called, before the first chunk is pulled,
   * so callers can report a bad request before they start streaming.
   */
  streamChat(request: LLMRequest, signal?: AbortSignal): AsyncGenerator<StreamChunk, void, undefined> {
    return this.client.streamChat(this.prepareChat(request), signal);
  }

  checkHealth(): Promise<UpstreamHealth> {
    return this.client.checkHealth();
  }

  private prepareChat(request: LLMRequest): WithModel<LLMRequest> {
    if (request.messages.length === 0) {
      throw GatewayError.invalidInput('messages must not be empty', { field: 'messages' });
    }
    return { ...request, model: this.resolveModel(request.model) };
  }

  private resolveModel(model: string | undefined): string {
    const trimmed = model?.trim();
    return trimmed ? trimmed : this.defaultModel;
  }
}
