/**
 * Wikipedia client
 * Searches pages through the MediaWiki REST API and reads article summaries
 * through the page summary endpoint.
 */

import type { AxiosInstance } from 'axios';
import type { UpstreamConfig } from '../config/index.js';
import type { Article, ArticleLookup, SearchResult } from '../types/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import {
  isRecord,
  optionalString,
  readArray,
  readPathString,
  readString,
  type JsonRecord,
} from '../utils/safe-fields.js';
import { ErrorCodes, GatewayError } from '../utils/errors.js';
import { countWords, hostMatches, stripHtml, today, truncate } from '../utils/text.js';
import type { EncyclopediaProvider } from './interfaces.js';
import { createHttpClient, requestJson, type HttpClientOptions } from './http-client.js';

export const WIKIPEDIA_LANGUAGES = ['en', 'es', 'fr', 'de', 'it', 'pt', 'ru', 'ja', 'zh', 'ar'] as const;

const DEFAULT_RELEVANCE = 0.9;

export class WikipediaClient implements EncyclopediaProvider {
  readonly name = 'wikipedia';
  readonly description = 'Free online encyclopedia with articles in multiple languages';
  readonly homepage = 'https://www.wikipedia.org';
  readonly supportedLanguages = WIKIPEDIA_LANGUAGES;

  private client: AxiosInstance;
  private baseUrlTemplate: string;
  private log: Logger;

  constructor(config: UpstreamConfig, adapter?: HttpClientOptions['adapter']) {
    this.baseUrlTemplate = config.baseUrl;
    this.log = createLogger('WikipediaClient');
    this.client = createHttpClient({ name: this.name, timeoutMs: config.timeoutMs, adapter });
  }

  ownsUrl(url: string): boolean {
    return hostMatches(url, 'wikipedia.org');
  }

  private baseUrl(language: string): string {
    return this.baseUrlTemplate.replace('{language}', encodeURIComponent(language));
  }

  private pageUrl(language: string, key: string): string {
    return `${this.baseUrl(language)}/wiki/${encodeURIComponent(key.replace(/ /g, '_'))}`;
  }

  async search(query: string, language: string, maxResults: number, signal?: AbortSignal): Promise<SearchResult[]> {
    const body = await requestJson(
      this.client,
      {
        method: 'GET',
        url: `${this.baseUrl(language)}/w/rest.php/v1/search/page`,
        params: { q: query, limit: maxResults },
        signal,
      },
      'failed to search wikipedia',
      this.name
    );

    return this.parseSearchResults(body, language);
  }

  async getArticle(title: string, language: string, maxLength: number, signal?: AbortSignal): Promise<ArticleLookup> {
    const body = await requestJson(
      this.client,
      {
        method: 'GET',
        url: `${this.baseUrl(language)}/api/rest_v1/page/summary/${encodeURIComponent(title.replace(/ /g, '_'))}`,
        signal,
      },
      'failed to get wikipedia article',
      this.name
    );

    return { article: this.parseArticle(body, title, language, maxLength), related: [] };
  }

  /**
   * Entries without a title or a resolvable URL are skipped with a warning.
   */
  private parseSearchResults(body: JsonRecord, language: string): SearchResult[] {
    const pages = readArray(body, 'pages');
    if (!pages.ok) {
      this.log.warn('wikipedia search response has no pages', { error: pages.error.message });
      return [];
    }

    const results: SearchResult[] = [];
    for (const page of pages.value) {
      if (!isRecord(page)) {
        this.log.warn('skipping invalid page entry');
        continue;
      }

      const title = readString(page, 'title');
      if (!title.ok) {
        this.log.warn('skipping page without title', { error: title.error.message });
        continue;
      }

      const url = this.resolvePageUrl(page, language);
      if (!url) {
        this.log.warn('skipping page without url', { title: title.value });
        continue;
      }

      const excerpt = optionalString(page, 'excerpt');
      const snippet = excerpt ? stripHtml(excerpt) : optionalString(page, 'description');

      results.push({
        title: title.value,
        url,
        ...(snippet ? { snippet } : {}),
        source: this.name,
        language,
        relevance: DEFAULT_RELEVANCE,
      });
    }
    return results;
  }

  private resolvePageUrl(page: JsonRecord, language: string): string | undefined {
    const desktop = readPathString(page, ['content_urls', 'desktop', 'page']);
    if (desktop.ok) {
      return desktop.value;
    }
    const key = optionalString(page, 'key');
    return key ? this.pageUrl(language, key) : undefined;
  }

  private parseArticle(body: JsonRecord, requestedTitle: string, language: string, maxLength: number): Article {
    const extract = readString(body, 'extract');
    if (!extract.ok) {
      throw new GatewayError(ErrorCodes.TYPE_ASSERTION, `failed to get wikipedia article: ${extract.error.message}`, {
        cause: extract.error,
        details: { provider: this.name, field: 'extract' },
      });
    }

    const title = optionalString(body, 'title') ?? requestedTitle;
    const desktop = readPathString(body, ['content_urls', 'desktop', 'page']);
    const content = truncate(extract.value, maxLength);
    const timestamp = optionalString(body, 'timestamp');

    return {
      title,
      url: desktop.ok ? desktop.value : this.pageUrl(language, title),
      source: this.name,
      language: optionalString(body, 'lang') ?? language,
      content,
      summary: optionalString(body, 'description') ?? truncate(extract.value, 200),
      categories: [],
      references: [],
      lastUpdated: timestamp ? timestamp.slice(0, 10) : today(),
      wordCount: countWords(content),
    };
  }
}
