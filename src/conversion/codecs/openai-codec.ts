import { isRecord, readString, type UnknownObject } from '../../types/common-types.js';
import { cleanJsonSchema } from '../shared/schema-cleaner.js';
import { stringifyToolContent, toJsonValue, tryParseJson } from '../shared/jsonish.js';
import { openAIFinishReasonToClaude } from '../shared/stop-reason-mapping.js';
import { normalizeUsage } from '../shared/usage-normalizer.js';
import { toClaudeUsage } from '../shared/usage-rendering.js';
import type { CanonicalMessage } from '../types.js';
import type { ClaudeContent, ClaudeResponse } from '../wire/claude-wire.js';
import type { OpenAIChatMessage, OpenAIFunctionTool, OpenAIToolCall } from '../wire/openai-wire.js';
import { claudeMessageToCanonical, extractSystemText } from './claude-codec.js';

/**
 * Splits one canonical message into OpenAI chat messages: every tool result
 * becomes its own `tool` message (emitted first), then a single message
 * carries the newline-joined text and the tool calls. A `tool`-role message
 * only ever yields its tool results.
 */
export function canonicalToOpenAIMessages(message: CanonicalMessage): OpenAIChatMessage[] {
  const toolResults: OpenAIChatMessage[] = [];
  const texts: string[] = [];
  const toolCalls: OpenAIToolCall[] = [];

  for (const block of message.content) {
    switch (block.type) {
      case 'text':
        texts.push(block.text);
        break;
      case 'tool_use':
        toolCalls.push({
          id: block.id,
          type: 'function',
          function: { name: block.name, arguments: JSON.stringify(block.input) }
        });
        break;
      case 'tool_result':
        toolResults.push({ role: 'tool', tool_call_id: block.toolUseId, content: stringifyToolContent(block.content) });
        break;
      default:
        // images and thinking have no chat-completions counterpart here
        break;
    }
  }

  const messages = [...toolResults];
  if (message.role !== 'tool' && (texts.length > 0 || toolCalls.length > 0)) {
    const combined: OpenAIChatMessage = {
      role: message.role,
      content: texts.length > 0 ? texts.join('\n') : null
    };
    if (toolCalls.length > 0) {
      combined.tool_calls = toolCalls;
    }
    messages.push(combined);
  }
  return messages;
}

export function claudeMessagesToOpenAI(rawMessages: unknown, system: unknown): OpenAIChatMessage[] {
  const messages: OpenAIChatMessage[] = [];
  const systemText = system === undefined || system === null ? '' : extractSystemText(system);
  if (systemText) {
    messages.push({ role: 'system', content: systemText });
  }
  if (!Array.isArray(rawMessages)) {
    return messages;
  }
  for (const raw of rawMessages) {
    if (isRecord(raw)) {
      messages.push(...canonicalToOpenAIMessages(claudeMessageToCanonical(raw)));
    }
  }
  return messages;
}

export function claudeToolsToOpenAI(rawTools: unknown): OpenAIFunctionTool[] {
  if (!Array.isArray(rawTools)) {
    return [];
  }
  const tools: OpenAIFunctionTool[] = [];
  for (const raw of rawTools) {
    if (!isRecord(raw)) continue;
    const fn: OpenAIFunctionTool['function'] = { name: readString(raw, 'name') ?? '' };
    const description = readString(raw, 'description');
    if (description) {
      fn.description = description;
    }
    if (raw.input_schema !== undefined) {
      fn.parameters = cleanJsonSchema(toJsonValue(raw.input_schema));
    }
    tools.push({ type: 'function', function: fn });
  }
  return tools;
}

export function generateMessageId(): string {
  return `msg_${Date.now()}`;
}

function readToolCalls(message: UnknownObject): UnknownObject[] {
  return Array.isArray(message.tool_calls) ? message.tool_calls.filter(isRecord) : [];
}

/**
 * Only `choices[0]` is read; any further choices are dropped. Tool calls force
 * `tool_use` no matter what finish_reason says.
 */
export function openAIResponseToClaude(raw: UnknownObject, messageId: string = generateMessageId()): ClaudeResponse {
  const content: ClaudeContent[] = [];
  let stopReason: string | null = null;

  const choices = Array.isArray(raw.choices) ? raw.choices : [];
  const choice = choices.length > 0 && isRecord(choices[0]) ? choices[0] : undefined;
  if (choice) {
    const message = isRecord(choice.message) ? choice.message : {};
    const text = readString(message, 'content');
    if (text) {
      content.push({ type: 'text', text });
    }
    const toolCalls = readToolCalls(message);
    for (const call of toolCalls) {
      const fn = isRecord(call.function) ? call.function : {};
      content.push({
        type: 'tool_use',
        id: readString(call, 'id') ?? '',
        name: readString(fn, 'name') ?? '',
        input: tryParseJson(readString(fn, 'arguments') ?? '') ?? {}
      });
    }
    stopReason = openAIFinishReasonToClaude(readString(choice, 'finish_reason'), toolCalls.length > 0);
  }

  const response: ClaudeResponse = {
    id: messageId,
    type: 'message',
    role: 'assistant',
    content,
    stop_reason: stopReason,
    stop_sequence: null
  };
  const model = readString(raw, 'model');
  if (model) {
    response.model = model;
  }
  if (isRecord(raw.usage)) {
    response.usage = toClaudeUsage(normalizeUsage(raw.usage));
  }
  return response;
}
