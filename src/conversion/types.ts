import type { JsonValue } from '../types/common-types.js';

export type CanonicalRole = 'user' | 'assistant' | 'system' | 'tool';

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ImageBlock {
  type: 'image';
  mediaType: string;
  /** base64 payload, never decoded */
  data: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: JsonValue;
}

export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  content: JsonValue;
  isError?: boolean;
}

/**
 * Provider-defined reasoning payload. A nested object stays an object; it is
 * carried through by reference and re-serialized as-is.
 */
export interface ThinkingBlock {
  type: 'thinking';
  thinking: JsonValue;
  signature?: string;
}

export type ContentBlock = TextBlock | ImageBlock | ToolUseBlock | ToolResultBlock | ThinkingBlock;

export interface CanonicalMessage {
  role: CanonicalRole;
  content: ContentBlock[];
}

export type CacheTtlClass = '5m' | '1h' | 'mixed';

export interface CanonicalUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  cacheReadTokens?: number;
  cacheCreationTokens?: number;
  cacheCreation5mTokens?: number;
  cacheCreation1hTokens?: number;
  cacheTtl?: CacheTtlClass;
  /** OpenAI-style `input_tokens_details.cached_tokens`, mirrored for cross-dialect consumers. */
  cachedTokens?: number;
  reasoningTokens?: number;
}

export type ClaudeStopReason = 'end_turn' | 'max_tokens' | 'stop_sequence' | 'tool_use';

export interface CanonicalResponse {
  id: string;
  model: string;
  content: ContentBlock[];
  stopReason: string | null;
  stopSequence: string | null;
  usage?: CanonicalUsage;
}

export type Dialect = 'claude' | 'openai' | 'gemini' | 'responses';
