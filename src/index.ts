/**
 * LLM dialect relay: protocol translation between the Claude Messages,
 * OpenAI Chat Completions, Gemini generateContent and Responses dialects.
 */

export * from './conversion/types.js';
export * from './conversion/errors.js';

export { cleanJsonSchema } from './conversion/shared/schema-cleaner.js';
export {
  detectUsageDialect,
  normalizeUsage,
  normalizeClaudeUsage,
  normalizeGeminiUsage,
  normalizeOpenAIUsage,
  type UsageDialect
} from './conversion/shared/usage-normalizer.js';
export {
  toClaudeUsage,
  toGeminiUsageMetadata,
  toResponsesUsage,
  type ClaudeUsage,
  type GeminiUsageMetadata,
  type ResponsesUsage
} from './conversion/shared/usage-rendering.js';
export * from './conversion/shared/stop-reason-mapping.js';

export * from './conversion/codecs/claude-codec.js';
export * from './conversion/codecs/openai-codec.js';
export * from './conversion/codecs/gemini-codec.js';
export * from './conversion/responses/responses-session-bridge.js';

export type * from './conversion/wire/claude-wire.js';
export type * from './conversion/wire/openai-wire.js';
export type * from './conversion/wire/gemini-wire.js';
export type * from './conversion/wire/responses-wire.js';

export { EventChannel, ErrorSlot, collectStream, type StreamChannels, type CollectedStream } from './conversion/streaming/event-channel.js';
export { launchTranscoder, type EventSink, type LaunchOptions, type StreamTranscoder } from './conversion/streaming/stream-runner.js';
export { readSseLines, formatSseEvent, formatSseData, MAX_SSE_LINE_LENGTH } from './conversion/streaming/sse-line-reader.js';
export { OpenAIToAnthropicTranscoder, transcodeOpenAIStreamToAnthropic } from './conversion/streaming/openai-to-anthropic-transformer.js';
export { GeminiToAnthropicTranscoder, transcodeGeminiStreamToAnthropic } from './conversion/streaming/gemini-to-anthropic-transformer.js';
export { AnthropicToGeminiTranscoder, transcodeAnthropicStreamToGemini } from './conversion/streaming/anthropic-to-gemini-transformer.js';
export { OpenAIToGeminiTranscoder, transcodeOpenAIStreamToGemini } from './conversion/streaming/openai-to-gemini-transformer.js';
export * from './conversion/streaming/sse-passthrough-relay.js';

export { buildUpstreamUrl } from './client/upstream-url.js';
export * from './config/routing-config.js';
export { loadUpstreamConfig, parseUpstreamConfig } from './config/config-loader.js';
export * from './providers/core/api/provider-types.js';
export * from './providers/core/utils/upstream-headers.js';
export { createProvider, type ProviderFactoryOptions } from './providers/core/runtime/provider-factory.js';
export { AnthropicHttpProvider } from './providers/core/runtime/anthropic-http-provider.js';
export { OpenAIHttpProvider } from './providers/core/runtime/openai-http-provider.js';
export { GeminiHttpProvider } from './providers/core/runtime/gemini-http-provider.js';
export { ResponsesHttpProvider, type SessionSource } from './providers/core/runtime/responses-http-provider.js';

export { runCli } from './cli/main.js';
