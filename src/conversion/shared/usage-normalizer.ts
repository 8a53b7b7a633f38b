import { isRecord, type UnknownObject } from '../../types/common-types.js';
import type { CacheTtlClass, CanonicalUsage } from '../types.js';

export type UsageDialect = 'claude' | 'gemini' | 'openai';

function readCount(source: UnknownObject, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? Math.trunc(value) : undefined;
}

function emptyUsage(): CanonicalUsage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

/**
 * Field-presence sniffing. Upstreams send plain JSON with no format tag, so an
 * OpenAI-compatible upstream that emits `cache_read_input_tokens` lands in the
 * Claude branch. Kept in one place so an explicit tag can replace it later.
 */
export function detectUsageDialect(raw: UnknownObject): UsageDialect {
  if ('cache_creation_input_tokens' in raw || 'cache_read_input_tokens' in raw) {
    return 'claude';
  }
  if ('promptTokenCount' in raw) {
    return 'gemini';
  }
  return 'openai';
}

export function normalizeUsage(raw: unknown): CanonicalUsage {
  if (!isRecord(raw)) {
    return emptyUsage();
  }
  switch (detectUsageDialect(raw)) {
    case 'claude':
      return normalizeClaudeUsage(raw);
    case 'gemini':
      return normalizeGeminiUsage(raw);
    default:
      return normalizeOpenAIUsage(raw);
  }
}

export function normalizeClaudeUsage(raw: UnknownObject): CanonicalUsage {
  const inputTokens = readCount(raw, 'input_tokens') ?? 0;
  const outputTokens = readCount(raw, 'output_tokens') ?? 0;
  const usage: CanonicalUsage = { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens };

  const creation = readCount(raw, 'cache_creation_input_tokens');
  if (creation !== undefined) {
    usage.cacheCreationTokens = creation;
  }
  const creation5m = readCount(raw, 'cache_creation_5m_input_tokens');
  if (creation5m !== undefined) {
    usage.cacheCreation5mTokens = creation5m;
  }
  const creation1h = readCount(raw, 'cache_creation_1h_input_tokens');
  if (creation1h !== undefined) {
    usage.cacheCreation1hTokens = creation1h;
  }
  const ttl = resolveCacheTtl(creation5m ?? 0, creation1h ?? 0);
  if (ttl) {
    usage.cacheTtl = ttl;
  }

  const cacheRead = readCount(raw, 'cache_read_input_tokens');
  if (cacheRead !== undefined) {
    usage.cacheReadTokens = cacheRead;
    // only reads count as "already cached"; creation tokens never do
    if (cacheRead > 0) {
      usage.cachedTokens = cacheRead;
    }
  }
  return usage;
}

function resolveCacheTtl(fiveMinute: number, oneHour: number): CacheTtlClass | undefined {
  if (fiveMinute > 0 && oneHour > 0) return 'mixed';
  if (oneHour > 0) return '1h';
  if (fiveMinute > 0) return '5m';
  return undefined;
}

export function normalizeOpenAIUsage(raw: UnknownObject): CanonicalUsage {
  let inputTokens = readCount(raw, 'input_tokens') ?? readCount(raw, 'prompt_tokens') ?? 0;
  const outputTokens = readCount(raw, 'output_tokens') ?? readCount(raw, 'completion_tokens') ?? 0;
  const explicitTotal = readCount(raw, 'total_tokens');

  const usage: CanonicalUsage = {
    inputTokens,
    outputTokens,
    totalTokens: explicitTotal ?? inputTokens + outputTokens
  };

  const inputDetails = raw.input_tokens_details ?? raw.prompt_tokens_details;
  if (isRecord(inputDetails)) {
    const cached = readCount(inputDetails, 'cached_tokens');
    if (cached !== undefined) {
      const clamped = Math.max(0, cached);
      usage.cachedTokens = clamped;
      usage.cacheReadTokens = clamped;
      inputTokens = Math.max(0, inputTokens - clamped);
      usage.inputTokens = inputTokens;
      if (explicitTotal === undefined) {
        usage.totalTokens = inputTokens + outputTokens;
      }
    }
  }

  const outputDetails = raw.output_tokens_details ?? raw.completion_tokens_details;
  if (isRecord(outputDetails)) {
    const reasoning = readCount(outputDetails, 'reasoning_tokens');
    if (reasoning !== undefined) {
      usage.reasoningTokens = reasoning;
    }
  }
  return usage;
}

export function normalizeGeminiUsage(raw: UnknownObject): CanonicalUsage {
  const prompt = readCount(raw, 'promptTokenCount') ?? 0;
  const cached = readCount(raw, 'cachedContentTokenCount') ?? 0;
  const outputTokens = readCount(raw, 'candidatesTokenCount') ?? 0;
  // promptTokenCount already includes the cached content
  const inputTokens = Math.max(0, prompt - cached);

  const usage: CanonicalUsage = { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens };
  if (cached > 0) {
    usage.cacheReadTokens = cached;
    usage.cachedTokens = cached;
  }
  const thoughts = readCount(raw, 'thoughtsTokenCount');
  if (thoughts !== undefined && thoughts > 0) {
    usage.reasoningTokens = thoughts;
  }
  return usage;
}
