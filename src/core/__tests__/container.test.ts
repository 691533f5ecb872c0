import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../config/index.js';
import { FakeProvider, makeResult } from '../../services/__tests__/fakes.js';
import { InMemoryCache } from '../../utils/cache-layer.js';
import { buildContainer } from '../container.js';

describe('buildContainer', () => {
  it('registers wikipedia before britannica and defaults to the in-memory cache', () => {
    const container = buildContainer(loadConfig({}));

    expect(container.providers.map((provider) => provider.name)).toEqual(['wikipedia', 'britannica']);
    expect(container.cache).toBeInstanceOf(InMemoryCache);
    expect(container.llmClient).toBeDefined();
  });

  it('wires overridden providers and cache into the encyclopedia usecase', async () => {
    const cache = new InMemoryCache();
    const alpha = new FakeProvider({ name: 'alpha', results: [makeResult('A1', 'alpha')] });
    const beta = new FakeProvider({ name: 'beta', languages: ['en', 'de'], results: [makeResult('B1', 'beta')] });

    const container = buildContainer(loadConfig({}), { cache, providers: [alpha, beta] });
    const response = await container.encyclopedia.searchEncyclopedia({ query: 'letters', maxResults: 2 });

    expect(container.encyclopedia.listLanguages()).toEqual(['en', 'de']);
    expect(response.results.map((result) => result.title)).toEqual(['A1', 'B1']);
    expect((await cache.getStats()).entries).toBe(1);
  });
});
