import { describe, expect, it } from '@jest/globals';

import { detectUsageDialect, normalizeUsage } from '../../../src/conversion/shared/usage-normalizer.js';
import { toClaudeUsage, toGeminiUsageMetadata, toResponsesUsage } from '../../../src/conversion/shared/usage-rendering.js';

describe('normalizeUsage', () => {
  it('returns zeros for non-object input', () => {
    expect(normalizeUsage(null)).toEqual({ inputTokens: 0, outputTokens: 0, totalTokens: 0 });
    expect(normalizeUsage([1, 2])).toEqual({ inputTokens: 0, outputTokens: 0, totalTokens: 0 });
  });

  it('detects the dialect by field presence', () => {
    expect(detectUsageDialect({ cache_read_input_tokens: 1 })).toBe('claude');
    expect(detectUsageDialect({ promptTokenCount: 1 })).toBe('gemini');
    expect(detectUsageDialect({ prompt_tokens: 1 })).toBe('openai');
  });

  it('classifies mixed cache ttl and counts only reads as cached', () => {
    const usage = normalizeUsage({
      input_tokens: 10,
      output_tokens: 5,
      cache_creation_input_tokens: 30,
      cache_creation_5m_input_tokens: 10,
      cache_creation_1h_input_tokens: 20,
      cache_read_input_tokens: 7
    });
    expect(usage).toEqual({
      inputTokens: 10,
      outputTokens: 5,
      totalTokens: 15,
      cacheCreationTokens: 30,
      cacheCreation5mTokens: 10,
      cacheCreation1hTokens: 20,
      cacheTtl: 'mixed',
      cacheReadTokens: 7,
      cachedTokens: 7
    });
  });

  it('leaves cachedTokens unset when nothing was read from cache', () => {
    const usage = normalizeUsage({ input_tokens: 4, output_tokens: 2, cache_creation_input_tokens: 9, cache_creation_1h_input_tokens: 9, cache_read_input_tokens: 0 });
    expect(usage.cacheTtl).toBe('1h');
    expect(usage.cacheReadTokens).toBe(0);
    expect(usage.cachedTokens).toBeUndefined();
  });

  it('subtracts Gemini cached content from the prompt count', () => {
    expect(
      normalizeUsage({ promptTokenCount: 100, cachedContentTokenCount: 40, candidatesTokenCount: 20, thoughtsTokenCount: 5 })
    ).toEqual({
      inputTokens: 60,
      outputTokens: 20,
      totalTokens: 80,
      cacheReadTokens: 40,
      cachedTokens: 40,
      reasoningTokens: 5
    });
  });

  it('subtracts OpenAI cached tokens but keeps an explicit total', () => {
    expect(
      normalizeUsage({
        prompt_tokens: 100,
        completion_tokens: 20,
        total_tokens: 120,
        prompt_tokens_details: { cached_tokens: 30 },
        completion_tokens_details: { reasoning_tokens: 4 }
      })
    ).toEqual({
      inputTokens: 70,
      outputTokens: 20,
      totalTokens: 120,
      cachedTokens: 30,
      cacheReadTokens: 30,
      reasoningTokens: 4
    });
  });

  it('clamps input at zero when cached exceeds input', () => {
    const usage = normalizeUsage({ input_tokens: 50, output_tokens: 10, input_tokens_details: { cached_tokens: 80 } });
    expect(usage.inputTokens).toBe(0);
    expect(usage.totalTokens).toBe(10);
    expect(usage.cachedTokens).toBe(80);
  });

  it('truncates fractional counts', () => {
    expect(normalizeUsage({ prompt_tokens: 3.7, completion_tokens: 1.2 })).toEqual({ inputTokens: 3, outputTokens: 1, totalTokens: 4 });
  });
});

describe('usage rendering', () => {
  const canonical = { inputTokens: 60, outputTokens: 20, totalTokens: 80, cacheReadTokens: 40, cachedTokens: 40, reasoningTokens: 5 };

  it('adds the cache read back into the Gemini prompt count', () => {
    expect(toGeminiUsageMetadata(canonical)).toEqual({
      promptTokenCount: 100,
      candidatesTokenCount: 20,
      totalTokenCount: 120,
      cachedContentTokenCount: 40,
      thoughtsTokenCount: 5
    });
  });

  it('omits zero cache fields from Claude usage', () => {
    expect(toClaudeUsage({ inputTokens: 1, outputTokens: 2, totalTokens: 3, cacheCreationTokens: 0 })).toEqual({
      input_tokens: 1,
      output_tokens: 2
    });
    expect(toClaudeUsage(canonical)).toEqual({ input_tokens: 60, output_tokens: 20, cache_read_input_tokens: 40 });
  });

  it('renders Responses usage details', () => {
    expect(toResponsesUsage({ ...canonical, cacheTtl: '5m' })).toEqual({
      input_tokens: 60,
      output_tokens: 20,
      total_tokens: 80,
      input_tokens_details: { cached_tokens: 40 },
      output_tokens_details: { reasoning_tokens: 5 },
      cache_read_input_tokens: 40,
      cache_ttl: '5m'
    });
  });
});
