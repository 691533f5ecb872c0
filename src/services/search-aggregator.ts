/**
 * ParallelSearchAggregator - fans one search out to every registered
 * encyclopedia provider at once and merges the results.
 *
 * Each provider runs in its own task that never rejects: a failure is logged,
 * recorded in the provider's outcome, and contributes no results. The merged
 * list follows provider registration order regardless of which task finished
 * first.
 */

import type { EncyclopediaProvider } from '../clients/interfaces.js';
import type { SearchResult } from '../types/index.js';
import { describeError, isGatewayError, type ErrorCode } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('SearchAggregator');

export interface ProviderOutcome {
  provider: string;
  success: boolean;
  resultCount: number;
  durationMs: number;
  error?: string;
  errorCode?: ErrorCode;
}

export interface AggregatedSearch {
  results: SearchResult[];
  outcomes: ProviderOutcome[];
}

interface ProviderTaskResult {
  results: SearchResult[];
  outcome: ProviderOutcome;
}

export class ParallelSearchAggregator {
  private readonly providers: readonly EncyclopediaProvider[];

  constructor(providers: readonly EncyclopediaProvider[]) {
    this.providers = providers;
  }

  get providerNames(): string[] {
    return this.providers.map((provider) => provider.name);
  }

  /**
   * Per-provider share of `maxResults`: integer division with the remainder
   * dropped (5 over 2 providers asks each for 2, 1 over 2 asks each for 0).
   */
  shareFor(maxResults: number): number {
    if (this.providers.length === 0) {
      return 0;
    }
    return Math.floor(maxResults / this.providers.length);
  }

  async search(query: string, language: string, maxResults: number, signal?: AbortSignal): Promise<AggregatedSearch> {
    if (this.providers.length === 0) {
      return { results: [], outcomes: [] };
    }

    const share = this.shareFor(maxResults);
    const tasks = this.providers.map((provider) => this.runProvider(provider, query, language, share, signal));
    const settled = await Promise.all(tasks);

    const results = settled.flatMap((entry) => entry.results);
    const outcomes = settled.map((entry) => entry.outcome);

    const failed = outcomes.filter((outcome) => !outcome.success).length;
    log.debug('aggregated search finished', {
      query,
      providers: outcomes.length,
      failed,
      results: results.length,
    });

    return { results, outcomes };
  }

  private async runProvider(
    provider: EncyclopediaProvider,
    query: string,
    language: string,
    limit: number,
    signal?: AbortSignal
  ): Promise<ProviderTaskResult> {
    const started = Date.now();
    try {
      const results = await provider.search(query, language, limit, signal);
      return {
        results,
        outcome: {
          provider: provider.name,
          success: true,
          resultCount: results.length,
          durationMs: Date.now() - started,
        },
      };
    } catch (error) {
      const message = describeError(error);
      log.warn(`${provider.name} search failed`, { query, language, error: message });
      return {
        results: [],
        outcome: {
          provider: provider.name,
          success: false,
          resultCount: 0,
          durationMs: Date.now() - started,
          error: message,
          ...(isGatewayError(error) ? { errorCode: error.code } : {}),
        },
      };
    }
  }
}
