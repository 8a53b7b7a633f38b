import type { CanonicalUsage } from '../types.js';

export interface ClaudeUsage {
  input_tokens: number;
  output_tokens: number;
  cache_creation_input_tokens?: number;
  cache_read_input_tokens?: number;
}

export interface GeminiUsageMetadata {
  promptTokenCount: number;
  candidatesTokenCount: number;
  totalTokenCount: number;
  cachedContentTokenCount?: number;
  thoughtsTokenCount?: number;
}

export interface ResponsesUsage {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
  input_tokens_details?: { cached_tokens: number };
  output_tokens_details?: { reasoning_tokens: number };
  cache_creation_input_tokens?: number;
  cache_read_input_tokens?: number;
  cache_ttl?: string;
}

export function toClaudeUsage(usage: CanonicalUsage): ClaudeUsage {
  const rendered: ClaudeUsage = { input_tokens: usage.inputTokens, output_tokens: usage.outputTokens };
  if (usage.cacheCreationTokens !== undefined && usage.cacheCreationTokens > 0) {
    rendered.cache_creation_input_tokens = usage.cacheCreationTokens;
  }
  if (usage.cacheReadTokens !== undefined && usage.cacheReadTokens > 0) {
    rendered.cache_read_input_tokens = usage.cacheReadTokens;
  }
  return rendered;
}

/** Gemini counts cached content inside the prompt, so the cache read is added back. */
export function toGeminiUsageMetadata(usage: CanonicalUsage): GeminiUsageMetadata {
  const cached = usage.cacheReadTokens ?? 0;
  const prompt = usage.inputTokens + cached;
  const rendered: GeminiUsageMetadata = {
    promptTokenCount: prompt,
    candidatesTokenCount: usage.outputTokens,
    totalTokenCount: prompt + usage.outputTokens
  };
  if (cached > 0) {
    rendered.cachedContentTokenCount = cached;
  }
  if (usage.reasoningTokens !== undefined && usage.reasoningTokens > 0) {
    rendered.thoughtsTokenCount = usage.reasoningTokens;
  }
  return rendered;
}

export function toResponsesUsage(usage: CanonicalUsage): ResponsesUsage {
  const rendered: ResponsesUsage = {
    input_tokens: usage.inputTokens,
    output_tokens: usage.outputTokens,
    total_tokens: usage.totalTokens
  };
  if (usage.cachedTokens !== undefined) {
    rendered.input_tokens_details = { cached_tokens: usage.cachedTokens };
  }
  if (usage.reasoningTokens !== undefined) {
    rendered.output_tokens_details = { reasoning_tokens: usage.reasoningTokens };
  }
  if (usage.cacheCreationTokens !== undefined && usage.cacheCreationTokens > 0) {
    rendered.cache_creation_input_tokens = usage.cacheCreationTokens;
  }
  if (usage.cacheReadTokens !== undefined && usage.cacheReadTokens > 0) {
    rendered.cache_read_input_tokens = usage.cacheReadTokens;
  }
  if (usage.cacheTtl) {
    rendered.cache_ttl = usage.cacheTtl;
  }
  return rendered;
}
