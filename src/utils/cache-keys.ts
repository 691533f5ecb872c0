import { createHash } from 'node:crypto';
import type { CompletionRequest, EmbeddingRequest, Message } from '../types/index.js';

/**
 * Cache keys are `<namespace>:<sha256 of a canonical JSON array>`. The array
 * fixes field order, and JSON quoting keeps separators inside values from
 * colliding with the separators between them. Callers pass requests with
 * defaults already applied.
 */
function digest(namespace: string, parts: readonly unknown[]): string {
  const canonical = JSON.stringify(parts);
  return `${namespace}:${createHash('sha256').update(canonical).digest('hex')}`;
}

export interface ChatKeyInput {
  model: string;
  messages: readonly Message[];
  temperature?: number;
  maxTokens?: number;
}

export function chatKey(input: ChatKeyInput): string {
  return digest('chat', [
    input.model,
    input.messages.map((message) => [message.role, message.content]),
    input.temperature ?? null,
    input.maxTokens ?? null,
  ]);
}

export function completionKey(input: CompletionRequest & { model: string }): string {
  return digest('completion', [
    input.model,
    input.prompt,
    input.temperature ?? null,
    input.maxTokens ?? null,
    input.stop ?? null,
  ]);
}

export function embeddingKey(input: EmbeddingRequest & { model: string }): string {
  return digest('embedding', [input.model, input.input]);
}

export const MODELS_KEY = 'models:all';

export interface SearchKeyInput {
  source: string;
  query: string;
  language: string;
  maxResults: number;
}

export function searchKey(input: SearchKeyInput): string {
  return digest('search', [input.source, input.query, input.language, input.maxResults]);
}

export interface ArticleKeyInput {
  source: string;
  title: string;
  url: string;
  language: string;
  maxLength: number;
}

export function articleKey(input: ArticleKeyInput): string {
  return digest('article', [input.source, input.title, input.url, input.language, input.maxLength]);
}
