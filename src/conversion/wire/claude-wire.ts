import type { JsonValue } from '../../types/common-types.js';
import type { ClaudeUsage } from '../shared/usage-rendering.js';

export interface ClaudeTextContent {
  type: 'text';
  text: string;
}

export interface ClaudeImageContent {
  type: 'image';
  source: { type: 'base64'; media_type: string; data: string };
}

export interface ClaudeToolUseContent {
  type: 'tool_use';
  id: string;
  name: string;
  input: JsonValue;
}

export interface ClaudeToolResultContent {
  type: 'tool_result';
  tool_use_id: string;
  content: JsonValue;
  is_error?: boolean;
}

export interface ClaudeThinkingContent {
  type: 'thinking';
  thinking: JsonValue;
  signature?: string;
}

export type ClaudeContent =
  | ClaudeTextContent
  | ClaudeImageContent
  | ClaudeToolUseContent
  | ClaudeToolResultContent
  | ClaudeThinkingContent;

export interface ClaudeMessage {
  role: 'user' | 'assistant';
  content: string | ClaudeContent[];
}

export interface ClaudeTool {
  name: string;
  description?: string;
  input_schema: JsonValue;
}

export interface ClaudeRequest {
  model: string;
  messages: ClaudeMessage[];
  system?: string;
  max_tokens: number;
  temperature?: number;
  top_p?: number;
  top_k?: number;
  stop_sequences?: string[];
  stream?: boolean;
  tools?: ClaudeTool[];
}

export interface ClaudeResponse {
  id: string;
  type: 'message';
  role: 'assistant';
  model?: string;
  content: ClaudeContent[];
  stop_reason: string | null;
  stop_sequence: string | null;
  usage?: ClaudeUsage;
}
