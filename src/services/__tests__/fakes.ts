import type { EncyclopediaProvider } from '../../clients/interfaces.js';
import type { Article, ArticleLookup, SearchResult } from '../../types/index.js';
import { hostMatches } from '../../utils/text.js';

export interface FakeProviderOptions {
  name: string;
  domain?: string;
  languages?: readonly string[];
  results?: SearchResult[];
  error?: Error;
  delayMs?: number;
  related?: string[];
}

export interface RecordedSearch {
  query: string;
  language: string;
  maxResults: number;
  signal?: AbortSignal;
}

export function makeResult(title: string, source: string): SearchResult {
  return {
    title,
    url: `https://${source}.example.test/${encodeURIComponent(title)}`,
    source,
    language: 'en',
    relevance: 0.9,
  };
}

export function makeArticle(title: string, source: string, language = 'en'): Article {
  return {
    title,
    url: `https://${source}.example.test/${encodeURIComponent(title)}`,
    source,
    language,
    content: `${title} content`,
    summary: `${title} summary`,
    categories: [],
    references: [],
    lastUpdated: '2024-01-01',
    wordCount: 2,
  };
}

/**
 * In-process encyclopedia provider. Search results are cut to the requested
 * limit; an optional delay resolves through setTimeout so fake timers can
 * control completion order.
 */
export class FakeProvider implements EncyclopediaProvider {
  readonly name: string;
  readonly description: string;
  readonly homepage: string;
  readonly supportedLanguages: readonly string[];

  searches: RecordedSearch[] = [];
  articleRequests: Array<{ title: string; language: string; maxLength: number }> = [];
  completedAt: number[] = [];

  private options: FakeProviderOptions;

  constructor(options: FakeProviderOptions) {
    this.options = options;
    this.name = options.name;
    this.description = `${options.name} test provider`;
    this.homepage = `https://${options.domain ?? `${options.name}.example.test`}`;
    this.supportedLanguages = options.languages ?? ['en'];
  }

  setDelay(delayMs: number): void {
    this.options = { ...this.options, delayMs };
  }

  ownsUrl(url: string): boolean {
    return hostMatches(url, this.options.domain ?? `${this.name}.example.test`);
  }

  async search(query: string, language: string, maxResults: number, signal?: AbortSignal): Promise<SearchResult[]> {
    this.searches.push({ query, language, maxResults, signal });
    await this.wait();
    this.completedAt.push(Date.now());
    if (this.options.error) {
      throw this.options.error;
    }
    return (this.options.results ?? []).slice(0, maxResults);
  }

  async getArticle(title: string, language: string, maxLength: number): Promise<ArticleLookup> {
    this.articleRequests.push({ title, language, maxLength });
    await this.wait();
    if (this.options.error) {
      throw this.options.error;
    }
    return { article: makeArticle(title, this.name, language), related: this.options.related ?? [] };
  }

  private wait(): Promise<void> {
    const delay = this.options.delayMs;
    if (!delay) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, delay));
  }
}
