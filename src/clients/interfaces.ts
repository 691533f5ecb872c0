import type {
  ArticleLookup,
  CompletionRequest,
  CompletionResponse,
  EmbeddingRequest,
  EmbeddingResponse,
  LLMModel,
  LLMRequest,
  LLMResponse,
  ProviderInfo,
  SearchResult,
  StreamChunk,
  UpstreamHealth,
} from '../types/index.js';

/**
 * An encyclopedia content source. Implementations map the provider's own
 * response shapes onto SearchResult/Article and throw GatewayError on failure.
 */
export interface EncyclopediaProvider extends ProviderInfo {
  /** Whether an article URL points at this provider */
  ownsUrl(url: string): boolean;

  search(query: string, language: string, maxResults: number, signal?: AbortSignal): Promise<SearchResult[]>;

  getArticle(title: string, language: string, maxLength: number, signal?: AbortSignal): Promise<ArticleLookup>;
}

/**
 * LLM inference backend. Requests reaching a client already carry a model.
 */
export interface LLMClient {
  chat(request: LLMRequest, signal?: AbortSignal): Promise<LLMResponse>;
  completion(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse>;
  embedding(request: EmbeddingRequest, signal?: AbortSignal): Promise<EmbeddingResponse>;
  listModels(signal?: AbortSignal): Promise<LLMModel[]>;
  streamChat(request: LLMRequest, signal?: AbortSignal): AsyncGenerator<StreamChunk, void, undefined>;
  checkHealth(): Promise<UpstreamHealth>;
}
