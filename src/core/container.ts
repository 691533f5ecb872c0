import type { EncyclopediaProvider, LLMClient } from '../clients/interfaces.js';
import { BritannicaClient } from '../clients/britannica-client.js';
import { OllamaClient } from '../clients/ollama-client.js';
import { WikipediaClient } from '../clients/wikipedia-client.js';
import type { GatewayConfig } from '../config/index.js';
import { EncyclopediaUsecase } from '../services/encyclopedia-usecase.js';
import { LLMUsecase } from '../services/llm-usecase.js';
import { createCache, type ICache } from '../utils/cache-layer.js';

export interface Container {
  config: GatewayConfig;
  cache: ICache;
  llmClient: LLMClient;
  providers: readonly EncyclopediaProvider[];
  llm: LLMUsecase;
  encyclopedia: EncyclopediaUsecase;
}

/** Replacements for the upstream collaborators, used by tests. */
export interface ContainerOverrides {
  cache?: ICache;
  llmClient?: LLMClient;
  providers?: readonly EncyclopediaProvider[];
}

/**
 * Wire clients, cache and usecases from configuration. Providers are
 * registered in the order parallel search merges their results.
 */
export function buildContainer(config: GatewayConfig, overrides: ContainerOverrides = {}): Container {
  const cache = overrides.cache ?? createCache(config.cache.redisUrl);
  const llmClient = overrides.llmClient ?? new OllamaClient(config.llm);
  const providers = overrides.providers ?? [
    new WikipediaClient(config.wikipedia),
    new BritannicaClient(config.britannica),
  ];

  const llm = new LLMUsecase(llmClient, cache, config.cache.ttlSeconds, config.llm.defaultModel);
  const encyclopedia = new EncyclopediaUsecase({
    providers,
    cache,
    ttl: config.cache.ttlSeconds,
    chat: llm,
  });

  return { config, cache, llmClient, providers, llm, encyclopedia };
}
