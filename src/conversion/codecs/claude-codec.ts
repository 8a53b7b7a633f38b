import { isRecord, readString, type UnknownObject } from '../../types/common-types.js';
import { toJsonValue } from '../shared/jsonish.js';
import { normalizeUsage } from '../shared/usage-normalizer.js';
import { toClaudeUsage } from '../shared/usage-rendering.js';
import type {
  CanonicalMessage,
  CanonicalResponse,
  CanonicalRole,
  ContentBlock,
  ThinkingBlock,
  ToolResultBlock
} from '../types.js';
import type {
  ClaudeContent,
  ClaudeMessage,
  ClaudeResponse,
  ClaudeThinkingContent,
  ClaudeToolResultContent
} from '../wire/claude-wire.js';

const CANONICAL_ROLES: readonly CanonicalRole[] = ['user', 'assistant', 'system', 'tool'];

/** Lower-cases the role; anything outside the four known roles becomes `user`. */
export function normalizeRole(role: unknown): CanonicalRole {
  const lowered = typeof role === 'string' ? role.toLowerCase() : '';
  return CANONICAL_ROLES.find((known) => known === lowered) ?? 'user';
}

export function parseClaudeContentBlock(raw: unknown): ContentBlock | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  switch (raw.type) {
    case 'text': {
      const text = readString(raw, 'text');
      return text === undefined ? undefined : { type: 'text', text };
    }
    case 'image': {
      const source = isRecord(raw.source) ? raw.source : undefined;
      const data = source ? readString(source, 'data') : undefined;
      if (!source || data === undefined) {
        return undefined;
      }
      return { type: 'image', mediaType: readString(source, 'media_type') ?? 'application/octet-stream', data };
    }
    case 'tool_use':
      return {
        type: 'tool_use',
        id: readString(raw, 'id') ?? '',
        name: readString(raw, 'name') ?? '',
        input: toJsonValue(raw.input)
      };
    case 'tool_result': {
      const block: ToolResultBlock = {
        type: 'tool_result',
        toolUseId: readString(raw, 'tool_use_id') ?? '',
        content: toJsonValue(raw.content)
      };
      if (raw.is_error === true) {
        block.isError = true;
      }
      return block;
    }
    case 'thinking': {
      const block: ThinkingBlock = { type: 'thinking', thinking: toJsonValue(raw.thinking) };
      const signature = readString(raw, 'signature');
      if (signature !== undefined) {
        block.signature = signature;
      }
      return block;
    }
    default:
      return undefined;
  }
}

export function parseClaudeContent(content: unknown): ContentBlock[] {
  if (typeof content === 'string') {
    return [{ type: 'text', text: content }];
  }
  if (!Array.isArray(content)) {
    return [];
  }
  const blocks: ContentBlock[] = [];
  for (const item of content) {
    const block = parseClaudeContentBlock(item);
    if (block) {
      blocks.push(block);
    }
  }
  return blocks;
}

export function claudeMessageToCanonical(raw: UnknownObject): CanonicalMessage {
  return { role: normalizeRole(raw.role), content: parseClaudeContent(raw.content) };
}

/** `system` may be a plain string or a list of text blocks; blocks are newline-joined. */
export function extractSystemText(system: unknown): string {
  if (typeof system === 'string') {
    return system;
  }
  if (!Array.isArray(system)) {
    return '';
  }
  const parts: string[] = [];
  for (const item of system) {
    if (isRecord(item) && item.type === 'text') {
      const text = readString(item, 'text');
      if (text !== undefined) {
        parts.push(text);
      }
    }
  }
  return parts.join('\n');
}

export function contentBlockToClaude(block: ContentBlock): ClaudeContent {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text };
    case 'image':
      return { type: 'image', source: { type: 'base64', media_type: block.mediaType, data: block.data } };
    case 'tool_use':
      return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
    case 'tool_result': {
      const result: ClaudeToolResultContent = { type: 'tool_result', tool_use_id: block.toolUseId, content: block.content };
      if (block.isError) {
        result.is_error = true;
      }
      return result;
    }
    case 'thinking': {
      const thinking: ClaudeThinkingContent = { type: 'thinking', thinking: block.thinking };
      if (block.signature !== undefined) {
        thinking.signature = block.signature;
      }
      return thinking;
    }
  }
}

/**
 * Claude messages only carry user and assistant turns; tool results ride on
 * user turns and system text is hoisted out by the caller.
 */
export function canonicalToClaudeMessage(message: CanonicalMessage): ClaudeMessage {
  return {
    role: message.role === 'assistant' ? 'assistant' : 'user',
    content: message.content.map(contentBlockToClaude)
  };
}

export function claudeResponseToCanonical(raw: UnknownObject): CanonicalResponse {
  const response: CanonicalResponse = {
    id: readString(raw, 'id') ?? '',
    model: readString(raw, 'model') ?? '',
    content: parseClaudeContent(Array.isArray(raw.content) ? raw.content : []),
    stopReason: readString(raw, 'stop_reason') ?? null,
    stopSequence: readString(raw, 'stop_sequence') ?? null
  };
  if (isRecord(raw.usage)) {
    response.usage = normalizeUsage(raw.usage);
  }
  return response;
}

export function canonicalResponseToClaude(response: CanonicalResponse): ClaudeResponse {
  const rendered: ClaudeResponse = {
    id: response.id,
    type: 'message',
    role: 'assistant',
    model: response.model,
    content: response.content.map(contentBlockToClaude),
    stop_reason: response.stopReason,
    stop_sequence: response.stopSequence
  };
  if (response.usage) {
    rendered.usage = toClaudeUsage(response.usage);
  }
  return rendered;
}
