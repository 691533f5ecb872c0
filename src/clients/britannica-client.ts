/**
 * Britannica client
 * Talks to a Britannica-style REST API (`/search`, `/article/{title}`)
 * authenticated with a bearer key.
 */

import type { AxiosInstance } from 'axios';
import type { UpstreamConfig } from '../config/index.js';
import type { Article, ArticleLookup, SearchResult } from '../types/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import {
  isRecord,
  optionalNumber,
  optionalString,
  readArray,
  readString,
  stringList,
  type JsonRecord,
} from '../utils/safe-fields.js';
import { ErrorCodes, GatewayError } from '../utils/errors.js';
import { countWords, hostMatches, today, truncate } from '../utils/text.js';
import type { EncyclopediaProvider } from './interfaces.js';
import { createHttpClient, requestJson, type HttpClientOptions } from './http-client.js';

const DEFAULT_RELEVANCE = 0.9;

export class BritannicaClient implements EncyclopediaProvider {
  readonly name = 'britannica';
  readonly description = 'Professional encyclopedia with expert-curated content';
  readonly homepage = 'https://www.britannica.com';
  readonly supportedLanguages = ['en'] as const;

  private client: AxiosInstance;
  private log: Logger;

  constructor(config: UpstreamConfig, adapter?: HttpClientOptions['adapter']) {
    this.log = createLogger('BritannicaClient');
    this.client = createHttpClient({
      name: this.name,
      baseURL: config.baseUrl,
      timeoutMs: config.timeoutMs,
      apiKey: config.apiKey,
      adapter,
    });
  }

  ownsUrl(url: string): boolean {
    return hostMatches(url, 'britannica.com');
  }

  async search(query: string, language: string, maxResults: number, signal?: AbortSignal): Promise<SearchResult[]> {
    const body = await requestJson(
      this.client,
      { method: 'GET', url: '/search', params: { q: query, limit: maxResults, language }, signal },
      'failed to search britannica',
      this.name
    );

    const articles = readArray(body, 'articles');
    if (!articles.ok) {
      this.log.warn('britannica search response has no articles', { error: articles.error.message });
      return [];
    }

    const results: SearchResult[] = [];
    for (const entry of articles.value) {
      if (!isRecord(entry)) {
        this.log.warn('skipping invalid article entry');
        continue;
      }

      const title = readString(entry, 'title');
      if (!title.ok) {
        this.log.warn('skipping article without title', { error: title.error.message });
        continue;
      }

      const url = readString(entry, 'url');
      if (!url.ok) {
        this.log.warn('skipping article without url', { title: title.value, error: url.error.message });
        continue;
      }

      const snippet = optionalString(entry, 'snippet') ?? optionalString(entry, 'description');
      results.push({
        title: title.value,
        url: url.value,
        ...(snippet ? { snippet } : {}),
        source: this.name,
        language,
        relevance: optionalNumber(entry, 'relevance') ?? DEFAULT_RELEVANCE,
      });
    }
    return results;
  }

  async getArticle(title: string, language: string, maxLength: number, signal?: AbortSignal): Promise<ArticleLookup> {
    const body = await requestJson(
      this.client,
      { method: 'GET', url: `/article/${encodeURIComponent(title)}`, params: { language }, signal },
      'failed to get britannica article',
      this.name
    );

    return {
      article: this.parseArticle(body, title, language, maxLength),
      related: stringList(body, 'related'),
    };
  }

  private parseArticle(body: JsonRecord, requestedTitle: string, language: string, maxLength: number): Article {
    const text = optionalString(body, 'content') ?? optionalString(body, 'text');
    if (text === undefined) {
      throw new GatewayError(ErrorCodes.TYPE_ASSERTION, 'failed to get britannica article: field "content" is missing', {
        details: { provider: this.name, field: 'content' },
      });
    }

    const content = truncate(text, maxLength);
    const lastUpdated = optionalString(body, 'lastUpdated') ?? optionalString(body, 'last_updated');

    return {
      title: optionalString(body, 'title') ?? requestedTitle,
      url: optionalString(body, 'url') ?? '',
      source: this.name,
      language: optionalString(body, 'language') ?? language,
      content,
      summary: optionalString(body, 'summary') ?? truncate(text, 200),
      categories: stringList(body, 'categories'),
      references: stringList(body, 'references'),
      lastUpdated: lastUpdated ? lastUpdated.slice(0, 10) : today(),
      wordCount: countWords(content),
    };
  }
}
