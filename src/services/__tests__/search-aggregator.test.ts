import { afterEach, describe, expect, it, vi } from 'vitest';
import { ErrorCodes, GatewayError } from '../../utils/errors.js';
import { ParallelSearchAggregator } from '../search-aggregator.js';
import { FakeProvider, makeResult } from './fakes.js';

const wikiResults = [makeResult('wiki1', 'wikipedia'), makeResult('wiki2', 'wikipedia'), makeResult('wiki3', 'wikipedia')];
const britResults = [makeResult('brit1', 'britannica'), makeResult('brit2', 'britannica')];

function titles(results: { title: string }[]): string[] {
  return results.map((result) => result.title);
}

describe('ParallelSearchAggregator', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('splits maxResults evenly and drops the remainder', () => {
    const aggregator = new ParallelSearchAggregator([
      new FakeProvider({ name: 'wikipedia' }),
      new FakeProvider({ name: 'britannica' }),
    ]);

    expect(aggregator.shareFor(4)).toBe(2);
    expect(aggregator.shareFor(5)).toBe(2);
    expect(aggregator.shareFor(1)).toBe(0);
  });

  it('asks each provider for its share with the same query, language and signal', async () => {
    const wiki = new FakeProvider({ name: 'wikipedia', results: wikiResults });
    const brit = new FakeProvider({ name: 'britannica', results: britResults });
    const aggregator = new ParallelSearchAggregator([wiki, brit]);
    const controller = new AbortController();

    const { results } = await aggregator.search('turing', 'fr', 5, controller.signal);

    expect(wiki.searches).toEqual([{ query: 'turing', language: 'fr', maxResults: 2, signal: controller.signal }]);
    expect(brit.searches).toEqual([{ query: 'turing', language: 'fr', maxResults: 2, signal: controller.signal }]);
    expect(titles(results)).toEqual(['wiki1', 'wiki2', 'brit1', 'brit2']);
  });

  it('keeps the results of healthy providers when one fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const aggregator = new ParallelSearchAggregator([
      new FakeProvider({ name: 'wikipedia', results: wikiResults }),
      new FakeProvider({
        name: 'britannica',
        error: new GatewayError(ErrorCodes.SERVICE_UNAVAILABLE, 'failed to search britannica: britannica is unreachable'),
      }),
    ]);

    const { results, outcomes } = await aggregator.search('turing', 'en', 6);

    expect(titles(results)).toEqual(['wiki1', 'wiki2', 'wiki3']);
    expect(outcomes.map((outcome) => [outcome.provider, outcome.success, outcome.resultCount])).toEqual([
      ['wikipedia', true, 3],
      ['britannica', false, 0],
    ]);
    expect(outcomes[1].errorCode).toBe(ErrorCodes.SERVICE_UNAVAILABLE);
    expect(outcomes[1].error).toBe('failed to search britannica: britannica is unreachable');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('returns an empty list without throwing when every provider fails', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const aggregator = new ParallelSearchAggregator([
      new FakeProvider({ name: 'wikipedia', error: new Error('boom') }),
      new FakeProvider({ name: 'britannica', error: new Error('bang') }),
    ]);

    const { results, outcomes } = await aggregator.search('turing', 'en', 4);

    expect(results).toEqual([]);
    expect(outcomes.every((outcome) => !outcome.success)).toBe(true);
    expect(outcomes[0].errorCode).toBeUndefined();
  });

  it('merges in registration order whichever provider finishes first', async () => {
    vi.useFakeTimers();
    const wiki = new FakeProvider({ name: 'wikipedia', results: wikiResults, delayMs: 50 });
    const brit = new FakeProvider({ name: 'britannica', results: britResults, delayMs: 10 });
    const aggregator = new ParallelSearchAggregator([wiki, brit]);

    const slowWiki = aggregator.search('turing', 'en', 4);
    await vi.advanceTimersByTimeAsync(50);
    const first = await slowWiki;

    wiki.setDelay(10);
    brit.setDelay(50);
    const slowBrit = aggregator.search('turing', 'en', 4);
    await vi.advanceTimersByTimeAsync(50);
    const second = await slowBrit;

    // britannica finished first on run one, wikipedia on run two
    expect(brit.completedAt[0]).toBeLessThan(wiki.completedAt[0]);
    expect(wiki.completedAt[1]).toBeLessThan(brit.completedAt[1]);
    expect(titles(first.results)).toEqual(['wiki1', 'wiki2', 'brit1', 'brit2']);
    expect(titles(second.results)).toEqual(titles(first.results));
  });

  it('asks each provider for zero results when there are more providers than results', async () => {
    const wiki = new FakeProvider({ name: 'wikipedia', results: wikiResults });
    const brit = new FakeProvider({ name: 'britannica', results: britResults });
    const aggregator = new ParallelSearchAggregator([wiki, brit]);

    const { results } = await aggregator.search('turing', 'en', 1);

    expect(wiki.searches[0].maxResults).toBe(0);
    expect(brit.searches[0].maxResults).toBe(0);
    expect(results).toEqual([]);
  });

  it('returns nothing when no providers are registered', async () => {
    const aggregator = new ParallelSearchAggregator([]);

    await expect(aggregator.search('turing', 'en', 5)).resolves.toEqual({ results: [], outcomes: [] });
  });
});
