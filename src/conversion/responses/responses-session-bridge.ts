import { isRecord, readArray, readRecord, readString, type UnknownObject } from '../../types/common-types.js';
import { normalizeRole } from '../codecs/claude-codec.js';
import { UnrecognizedFormatError } from '../errors.js';
import { normalizeUsage } from '../shared/usage-normalizer.js';
import { toResponsesUsage } from '../shared/usage-rendering.js';
import type { CanonicalMessage } from '../types.js';
import type { OpenAIChatMessage } from '../wire/openai-wire.js';
import type { ResponsesItem, ResponsesOutputItem, ResponsesResponse } from '../wire/responses-wire.js';

/** Read-only view of a stored conversation; the bridge never writes to it. */
export interface SessionHistory {
  readonly items: readonly ResponsesItem[];
}

export const EMPTY_SESSION: SessionHistory = { items: [] };

/**
 * `input` is a bare string, or a list of items. Non-object list entries are
 * skipped; any other shape is rejected.
 */
export function parseResponsesInput(input: unknown): ResponsesItem[] {
  if (typeof input === 'string') {
    return [{ type: 'text', content: input }];
  }
  if (!Array.isArray(input)) {
    throw new UnrecognizedFormatError(`unsupported responses input type: ${input === null ? 'null' : typeof input}`);
  }
  const items: ResponsesItem[] = [];
  for (const entry of input) {
    if (!isRecord(entry)) continue;
    const item: ResponsesItem = { type: readString(entry, 'type') ?? '', content: entry.content };
    const role = readString(entry, 'role');
    if (role) item.role = role;
    items.push(item);
  }
  return items;
}

/** Strings pass through; block lists contribute their input_text/output_text parts, newline-joined. */
export function extractItemText(content: unknown): string {
  if (typeof content === 'string') {
    return content;
  }
  if (!Array.isArray(content)) {
    return '';
  }
  const texts: string[] = [];
  for (const block of content) {
    if (isRecord(block) && (block.type === 'input_text' || block.type === 'output_text')) {
      const text = readString(block, 'text');
      if (text !== undefined) texts.push(text);
    }
  }
  return texts.join('\n');
}

function textMessage(role: string | undefined, text: string): CanonicalMessage {
  return { role: normalizeRole(role || 'user'), content: [{ type: 'text', text }] };
}

/**
 * Strict item conversion. `tool_call` and `tool_result` items are accepted
 * but produce nothing yet; unknown types fail.
 */
export function responsesItemToCanonical(item: ResponsesItem): CanonicalMessage | undefined {
  switch (item.type) {
    case 'message': {
      const text = extractItemText(item.content);
      return text ? textMessage(item.role, text) : undefined;
    }
    case 'text': {
      const text = extractItemText(item.content);
      if (!text) {
        throw new UnrecognizedFormatError('responses text item has empty content');
      }
      return textMessage(item.role, text);
    }
    case 'tool_call':
    case 'tool_result':
      return undefined;
    default:
      throw new UnrecognizedFormatError(`unrecognized responses item type: ${item.type || '(missing)'}`, {
        itemType: item.type
      });
  }
}

/** History first, then the new input, order preserved. */
export function flattenSession(session: SessionHistory, input: unknown): CanonicalMessage[] {
  const messages: CanonicalMessage[] = [];
  const newItems = parseResponsesInput(input);
  for (const item of [...session.items, ...newItems]) {
    const message = responsesItemToCanonical(item);
    if (message) messages.push(message);
  }
  return messages;
}

/**
 * Lenient chat variant: instructions become a leading system message, items
 * of any other type and empty texts are skipped instead of failing.
 */
export function responsesToOpenAIMessages(session: SessionHistory, input: unknown, instructions?: string): OpenAIChatMessage[] {
  const messages: OpenAIChatMessage[] = [];
  if (instructions) {
    messages.push({ role: 'system', content: instructions });
  }
  for (const item of [...session.items, ...parseResponsesInput(input)]) {
    if (item.type !== 'message' && item.type !== 'text') continue;
    const text = extractItemText(item.content);
    if (!text) continue;
    messages.push({ role: normalizeRole(item.role || 'user'), content: text });
  }
  return messages;
}

export function generateResponseId(): string {
  return `resp_${Date.now()}`;
}

function buildResponse(model: string, output: ResponsesOutputItem[], usageRaw: unknown, id: string): ResponsesResponse {
  return {
    id,
    object: 'response',
    model,
    status: 'completed',
    output,
    usage: toResponsesUsage(normalizeUsage(usageRaw)),
    created_at: Math.floor(Date.now() / 1000)
  };
}

export function claudeResponseToResponses(raw: UnknownObject, id: string = generateResponseId()): ResponsesResponse {
  const output: ResponsesOutputItem[] = [];
  for (const block of readArray(raw, 'content') ?? []) {
    if (isRecord(block) && block.type === 'text') {
      output.push({ type: 'text', content: readString(block, 'text') ?? '' });
    }
  }
  return buildResponse(readString(raw, 'model') ?? '', output, raw.usage, id);
}

export function openAIResponseToResponses(raw: UnknownObject, id: string = generateResponseId()): ResponsesResponse {
  const output: ResponsesOutputItem[] = [];
  const choices = readArray(raw, 'choices') ?? [];
  const choice = choices.length > 0 && isRecord(choices[0]) ? choices[0] : undefined;
  if (choice) {
    const message = readRecord(choice, 'message') ?? {};
    output.push({ type: 'text', content: readString(message, 'content') ?? '' });
  }
  return buildResponse(readString(raw, 'model') ?? '', output, raw.usage, id);
}
