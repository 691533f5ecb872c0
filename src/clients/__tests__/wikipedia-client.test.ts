import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ErrorCodes } from '../../utils/errors.js';
import { WikipediaClient } from '../wikipedia-client.js';
import { fakeAdapter } from './adapter.js';

const config = { baseUrl: 'https://{language}.wikipedia.org', timeoutMs: 1000 };

describe('WikipediaClient', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
  });

  it('searches the language edition and maps pages to results', async () => {
    const { adapter, requests } = fakeAdapter(() => ({
      status: 200,
      data: {
        pages: [
          {
            title: 'Alan Turing',
            key: 'Alan_Turing',
            excerpt: '<span class="searchmatch">Alan</span> Turing was a mathematician',
            description: 'British mathematician',
          },
          { key: 'No_Title' },
          { title: 'Turing machine', key: 'Turing_machine', description: 'Model of computation' },
        ],
      },
    }));
    const client = new WikipediaClient(config, adapter);

    const results = await client.search('turing', 'fr', 3);

    expect(requests[0].url).toBe('https://fr.wikipedia.org/w/rest.php/v1/search/page');
    expect(requests[0].params).toEqual({ q: 'turing', limit: 3 });
    expect(results).toEqual([
      {
        title: 'Alan Turing',
        url: 'https://fr.wikipedia.org/wiki/Alan_Turing',
        snippet: 'Alan Turing was a mathematician',
        source: 'wikipedia',
        language: 'fr',
        relevance: 0.9,
      },
      {
        title: 'Turing machine',
        url: 'https://fr.wikipedia.org/wiki/Turing_machine',
        snippet: 'Model of computation',
        source: 'wikipedia',
        language: 'fr',
        relevance: 0.9,
      },
    ]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('returns no results when the response has no pages', async () => {
    const { adapter } = fakeAdapter(() => ({ status: 200, data: {} }));
    const client = new WikipediaClient(config, adapter);

    await expect(client.search('turing', 'en', 5)).resolves.toEqual([]);
  });

  it('reads an article summary', async () => {
    const { adapter, requests } = fakeAdapter(() => ({
      status: 200,
      data: {
        title: 'Alan Turing',
        extract: 'Alan Turing was a mathematician.',
        description: 'English mathematician (1912-1954)',
        timestamp: '2024-03-01T12:00:00Z',
        content_urls: { desktop: { page: 'https://en.wikipedia.org/wiki/Alan_Turing' } },
      },
    }));
    const client = new WikipediaClient(config, adapter);

    const { article, related } = await client.getArticle('Alan Turing', 'en', 10);

    expect(requests[0].url).toBe('https://en.wikipedia.org/api/rest_v1/page/summary/Alan_Turing');
    expect(article).toEqual({
      title: 'Alan Turing',
      url: 'https://en.wikipedia.org/wiki/Alan_Turing',
      source: 'wikipedia',
      language: 'en',
      content: 'Alan Turin...',
      summary: 'English mathematician (1912-1954)',
      categories: [],
      references: [],
      lastUpdated: '2024-03-01',
      wordCount: 2,
    });
    expect(related).toEqual([]);
  });

  it('fails with a type assertion error when the extract is missing', async () => {
    const { adapter } = fakeAdapter(() => ({ status: 200, data: { title: 'Alan Turing' } }));
    const client = new WikipediaClient(config, adapter);

    await expect(client.getArticle('Alan Turing', 'en', 100)).rejects.toMatchObject({
      code: ErrorCodes.TYPE_ASSERTION,
      message: 'failed to get wikipedia article: field "extract" is missing',
    });
  });

  it('maps a missing page to NOT_FOUND', async () => {
    const { adapter } = fakeAdapter(() => ({ status: 404, data: { title: 'Not found.' } }));
    const client = new WikipediaClient(config, adapter);

    await expect(client.getArticle('Nope', 'en', 100)).rejects.toMatchObject({
      code: ErrorCodes.NOT_FOUND,
      message: 'failed to get wikipedia article: wikipedia responded with status 404',
    });
  });

  it('does not call the upstream once the request is cancelled', async () => {
    const { adapter, requests } = fakeAdapter(() => ({ status: 200, data: {} }));
    const client = new WikipediaClient(config, adapter);
    const controller = new AbortController();
    controller.abort();

    await expect(client.search('turing', 'en', 5, controller.signal)).rejects.toMatchObject({
      code: ErrorCodes.REQUEST_CANCELLED,
    });
    expect(requests).toHaveLength(0);
  });

  it('owns wikipedia.org URLs', () => {
    const client = new WikipediaClient(config);

    expect(client.ownsUrl('https://de.wikipedia.org/wiki/Berlin')).toBe(true);
    expect(client.ownsUrl('https://www.britannica.com/topic/Berlin')).toBe(false);
  });
});
