import { z } from 'zod';

// LLM types

export const MessageRoleSchema = z.enum(['system', 'user', 'assistant']);
export type MessageRole = z.infer<typeof MessageRoleSchema>;

export const MessageSchema = z.object({
  role: MessageRoleSchema,
  content: z.string(),
});
export type Message = z.infer<typeof MessageSchema>;

export const UsageSchema = z.object({
  promptTokens: z.number(),
  completionTokens: z.number(),
  totalTokens: z.number(),
});
export type Usage = z.infer<typeof UsageSchema>;

export const ChoiceSchema = z.object({
  index: z.number(),
  message: MessageSchema,
  finishReason: z.string().optional(),
});
export type Choice = z.infer<typeof ChoiceSchema>;

export const LLMRequestSchema = z.object({
  messages: z.array(MessageSchema),
  model: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
});
export type LLMRequest = z.infer<typeof LLMRequestSchema>;

export const LLMResponseSchema = z.object({
  id: z.string(),
  object: z.literal('chat.completion'),
  created: z.number(),
  model: z.string(),
  choices: z.array(ChoiceSchema),
  usage: UsageSchema,
});
export type LLMResponse = z.infer<typeof LLMResponseSchema>;

export const CompletionRequestSchema = z.object({
  prompt: z.string(),
  model: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  stop: z.string().optional(),
});
export type CompletionRequest = z.infer<typeof CompletionRequestSchema>;

export const CompletionResponseSchema = z.object({
  id: z.string(),
  object: z.literal('text_completion'),
  created: z.number(),
  model: z.string(),
  choices: z.array(ChoiceSchema),
  usage: UsageSchema,
});
export type CompletionResponse = z.infer<typeof CompletionResponseSchema>;

export const EmbeddingRequestSchema = z.object({
  input: z.string(),
  model: z.string().optional(),
});
export type EmbeddingRequest = z.infer<typeof EmbeddingRequestSchema>;

export const EmbeddingSchema = z.object({
  object: z.literal('embedding'),
  embedding: z.array(z.number()),
  index: z.number(),
});
export type Embedding = z.infer<typeof EmbeddingSchema>;

export const EmbeddingResponseSchema = z.object({
  object: z.literal('list'),
  data: z.array(EmbeddingSchema),
  model: z.string(),
  usage: UsageSchema,
});
export type EmbeddingResponse = z.infer<typeof EmbeddingResponseSchema>;

export const LLMModelSchema = z.object({
  id: z.string(),
  object: z.literal('model'),
  created: z.number(),
  ownedBy: z.string(),
  size: z.number().optional(),
});
export type LLMModel = z.infer<typeof LLMModelSchema>;

export const LLMModelListSchema = z.array(LLMModelSchema);

export interface StreamChunk {
  content: string;
  done: boolean;
  model?: string;
}

export interface UpstreamHealth {
  name: string;
  reachable: boolean;
  latencyMs: number;
  error?: string;
}

// Encyclopedia types

/** Sentinel source value that fans a search out to every provider. */
export const ALL_SOURCES = 'all';

export const SearchRequestSchema = z.object({
  query: z.string(),
  source: z.string().optional(),
  maxResults: z.number().int().optional(),
  language: z.string().optional(),
});
export type SearchRequest = z.infer<typeof SearchRequestSchema>;

export const SearchResultSchema = z.object({
  title: z.string(),
  url: z.string(),
  snippet: z.string().optional(),
  source: z.string(),
  language: z.string(),
  relevance: z.number(),
});
export type SearchResult = z.infer<typeof SearchResultSchema>;

export const SearchResponseSchema = z.object({
  query: z.string(),
  results: z.array(SearchResultSchema),
  totalFound: z.number(),
  source: z.string(),
  language: z.string(),
});
export type SearchResponse = z.infer<typeof SearchResponseSchema>;

export const ArticleRequestSchema = z.object({
  title: z.string().optional(),
  url: z.string().optional(),
  source: z.string().optional(),
  language: z.string().optional(),
  maxLength: z.number().int().optional(),
});
export type ArticleRequest = z.infer<typeof ArticleRequestSchema>;

export const ArticleSchema = z.object({
  title: z.string(),
  url: z.string(),
  source: z.string(),
  language: z.string(),
  content: z.string(),
  summary: z.string(),
  categories: z.array(z.string()),
  references: z.array(z.string()),
  lastUpdated: z.string(),
  wordCount: z.number(),
});
export type Article = z.infer<typeof ArticleSchema>;

export const ArticleResponseSchema = z.object({
  article: ArticleSchema,
  related: z.array(z.string()),
  source: z.string(),
  language: z.string(),
});
export type ArticleResponse = z.infer<typeof ArticleResponseSchema>;

export interface ArticleLookup {
  article: Article;
  related: string[];
}

export const PromptStyleSchema = z.enum(['academic', 'casual', 'educational']);
export type PromptStyle = z.infer<typeof PromptStyleSchema>;

export const PromptLengthSchema = z.enum(['short', 'medium', 'long']);
export type PromptLength = z.infer<typeof PromptLengthSchema>;

export const PromptRequestSchema = z.object({
  topic: z.string(),
  style: PromptStyleSchema.optional(),
  length: PromptLengthSchema.optional(),
  includeExamples: z.boolean().optional(),
  language: z.string().optional(),
});
export type PromptRequest = z.infer<typeof PromptRequestSchema>;

export interface PromptResponse {
  topic: string;
  prompt: string;
  style: PromptStyle;
  length: PromptLength;
  language: string;
  suggestions: string[];
  keywords: string[];
}

export interface ProviderInfo {
  name: string;
  description: string;
  homepage: string;
  supportedLanguages: readonly string[];
}
