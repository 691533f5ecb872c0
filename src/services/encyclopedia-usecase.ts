/**
 * Encyclopedia usecase: search (single provider or parallel fan-out), article
 * retrieval and LLM-backed prompt generation, with cache-aside on the first
 * two.
 */

import type { EncyclopediaProvider } from '../clients/interfaces.js';
import type { CacheTtlPolicy } from '../config/index.js';
import {
  ALL_SOURCES,
  ArticleResponseSchema,
  SearchResponseSchema,
  type ArticleRequest,
  type ArticleResponse,
  type PromptLength,
  type PromptRequest,
  type PromptResponse,
  type PromptStyle,
  type ProviderInfo,
  type SearchRequest,
  type SearchResponse,
} from '../types/index.js';
import { CacheAside } from '../utils/cache-aside.js';
import type { ICache } from '../utils/cache-layer.js';
import { articleKey, searchKey } from '../utils/cache-keys.js';
import { GatewayError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { hostLabel, titleFromUrl } from '../utils/text.js';
import { extractKeywords, generateSuggestions } from './keywords.js';
import type { ChatService } from './llm-usecase.js';
import { ParallelSearchAggregator } from './search-aggregator.js';

export const DEFAULT_MAX_RESULTS = 5;
export const DEFAULT_LANGUAGE = 'en';
export const DEFAULT_MAX_LENGTH = 2000;

const PROMPT_TEMPERATURE = 0.7;
const PROMPT_MAX_TOKENS = 1000;

const STYLE_GUIDANCE: Record<PromptStyle, string> = {
  academic: 'formal and detailed, citing sources where possible',
  casual: 'conversational, engaging and easy to follow',
  educational: 'clear explanations with examples and learning objectives',
};

const LENGTH_GUIDANCE: Record<PromptLength, string> = {
  short: '100-200 words covering only the key points',
  medium: '300-500 words with balanced coverage',
  long: '600-1000 words with comprehensive treatment',
};

export interface EncyclopediaUsecaseDeps {
  providers: readonly EncyclopediaProvider[];
  cache: ICache;
  ttl: CacheTtlPolicy;
  chat: ChatService;
}

export class EncyclopediaUsecase {
  private readonly providers: Map<string, EncyclopediaProvider>;
  private readonly aggregator: ParallelSearchAggregator;
  private readonly cacheAside: CacheAside;
  private readonly ttl: CacheTtlPolicy;
  private readonly chatService: ChatService;
  private readonly log: Logger;

  constructor(deps: EncyclopediaUsecaseDeps) {
    this.providers = new Map(deps.providers.map((provider) => [provider.name, provider]));
    this.aggregator = new ParallelSearchAggregator(deps.providers);
    this.ttl = deps.ttl;
    this.chatService = deps.chat;
    this.log = createLogger('EncyclopediaUsecase');
    this.cacheAside = new CacheAside(deps.cache, this.log);
  }

  listSources(): ProviderInfo[] {
    return [...this.providers.values()].map((provider) => ({
      name: provider.name,
      description: provider.description,
      homepage: provider.homepage,
      supportedLanguages: [...provider.supportedLanguages],
    }));
  }

  /** Union of every provider's languages, in registration order. */
  listLanguages(): string[] {
    const languages = new Set<string>();
    for (const provider of this.providers.values()) {
      provider.supportedLanguages.forEach((language) => languages.add(language));
    }
    return [...languages];
  }

  async searchEncyclopedia(request: SearchRequest, signal?: AbortSignal): Promise<SearchResponse> {
    const query = request.query.trim();
    if (query.length === 0) {
      throw GatewayError.invalidInput('query is required', { field: 'query' });
    }
    const maxResults = request.maxResults ?? DEFAULT_MAX_RESULTS;
    if (!Number.isInteger(maxResults) || maxResults <= 0) {
      throw GatewayError.invalidInput('maxResults must be a positive integer', { field: 'maxResults' });
    }
    const language = this.resolveLanguage(request.language);
    const source = request.source?.trim().toLowerCase() || ALL_SOURCES;
    const provider = source === ALL_SOURCES ? undefined : this.requireProvider(source);

    const key = searchKey({ source, query, language, maxResults });
    const cached = await this.cacheAside.lookup(key, SearchResponseSchema);
    if (cached) {
      return cached;
    }

    if (provider) {
      const results = await provider.search(query, language, maxResults, signal);
      const response = this.buildSearchResponse(query, results, source, language);
      await this.cacheAside.store(key, response, this.ttl.search);
      return response;
    }

    const { results, outcomes } = await this.aggregator.search(query, language, maxResults, signal);
    if (signal?.aborted) {
      throw GatewayError.cancelled('failed to search encyclopedias');
    }

    const response = this.buildSearchResponse(query, results, source, language);
    const failed = outcomes.filter((outcome) => !outcome.success).map((outcome) => outcome.provider);
    if (failed.length > 0) {
      this.log.warn('parallel search partially failed', { query, failed: failed.join(',') });
    }
    await this.cacheAside.store(key, response, this.ttl.search);
    return response;
  }

  async getArticle(request: ArticleRequest, signal?: AbortSignal): Promise<ArticleResponse> {
    const url = request.url?.trim() ?? '';
    const title = request.title?.trim() || (url ? titleFromUrl(url) : undefined);
    if (!title) {
      throw GatewayError.invalidInput(url ? `cannot derive an article title from ${url}` : 'title or url is required', {
        field: url ? 'url' : 'title',
      });
    }
    const maxLength = request.maxLength ?? DEFAULT_MAX_LENGTH;
    if (!Number.isInteger(maxLength) || maxLength <= 0) {
      throw GatewayError.invalidInput('maxLength must be a positive integer', { field: 'maxLength' });
    }
    const provider = this.resolveArticleProvider(url, request.source);
    const language = request.language?.trim()
      ? this.resolveLanguage(request.language)
      : this.languageFromUrl(url, provider) ?? DEFAULT_LANGUAGE;

    const key = articleKey({ source: provider.name, title, url, language, maxLength });
    return this.cacheAside.getOrLoad(key, ArticleResponseSchema, this.ttl.article, async () => {
      const { article, related } = await provider.getArticle(title, language, maxLength, signal);
      return { article, related, source: provider.name, language };
    });
  }

  async generatePrompt(request: PromptRequest, signal?: AbortSignal): Promise<PromptResponse> {
    const topic = request.topic.trim();
    if (topic.length === 0) {
      throw GatewayError.invalidInput('topic is required', { field: 'topic' });
    }
    const style = request.style ?? 'educational';
    const length = request.length ?? 'medium';
    const language = this.resolveLanguage(request.language);

    const response = await this.chatService.chat(
      {
        messages: [
          { role: 'system', content: this.buildSystemPrompt(topic, style, length, language, request.includeExamples) },
          { role: 'user', content: `Generate an encyclopedia-style prompt about: ${topic}` },
        ],
        temperature: PROMPT_TEMPERATURE,
        maxTokens: PROMPT_MAX_TOKENS,
      },
      signal
    );

    const prompt = response.choices[0]?.message.content ?? '';
    return {
      topic,
      prompt,
      style,
      length,
      language,
      suggestions: generateSuggestions(topic, style),
      keywords: extractKeywords(prompt),
    };
  }

  private buildSearchResponse(
    query: string,
    results: SearchResponse['results'],
    source: string,
    language: string
  ): SearchResponse {
    return Object.freeze({ query, results, totalFound: results.length, source, language });
  }

  private buildSystemPrompt(
    topic: string,
    style: PromptStyle,
    length: PromptLength,
    language: string,
    includeExamples = false
  ): string {
    const lines = [
      `You are an expert encyclopedia editor. Write a well-structured prompt about "${topic}".`,
      '',
      'The prompt should:',
      '- follow encyclopedia writing conventions',
      '- cover the key facts and concepts',
      `- suit readers of the "${language}" language`,
      '',
      `Style (${style}): ${STYLE_GUIDANCE[style]}.`,
      `Length (${length}): ${LENGTH_GUIDANCE[length]}.`,
    ];
    if (includeExamples) {
      lines.push('Include concrete examples that illustrate the main ideas.');
    }
    return lines.join('\n');
  }

  private resolveLanguage(language: string | undefined): string {
    return language?.trim().toLowerCase() || DEFAULT_LANGUAGE;
  }

  /** Language edition named by a URL's first host label, e.g. `fr.wikipedia.org`. */
  private languageFromUrl(url: string, provider: EncyclopediaProvider): string | undefined {
    const label = url ? hostLabel(url) : undefined;
    return label && provider.supportedLanguages.includes(label) ? label : undefined;
  }

  private requireProvider(name: string): EncyclopediaProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw GatewayError.invalidInput(`unsupported source: ${name}`, { field: 'source', source: name });
    }
    return provider;
  }

  /**
   * A URL decides the provider by its host; without one the named source is
   * used, falling back to the first registered provider.
   */
  private resolveArticleProvider(url: string, source: string | undefined): EncyclopediaProvider {
    const named = source?.trim().toLowerCase();
    if (url) {
      const owner = [...this.providers.values()].find((provider) => provider.ownsUrl(url));
      if (owner) {
        return owner;
      }
      if (named && named !== ALL_SOURCES) {
        return this.requireProvider(named);
      }
      throw GatewayError.invalidInput(`cannot determine source for ${url}`, { field: 'url' });
    }

    if (named && named !== ALL_SOURCES) {
      return this.requireProvider(named);
    }
    const first = this.providers.values().next();
    if (first.done) {
      throw GatewayError.invalidInput('no encyclopedia sources are configured', { field: 'source' });
    }
    return first.value;
  }
}
