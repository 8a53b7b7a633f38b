import { isRecord, readArray, readNumber, readRecord, readString, type JsonValue, type UnknownObject } from '../../types/common-types.js';
import { toJsonValue, tryParseJson } from '../shared/jsonish.js';
import { cleanJsonSchema } from '../shared/schema-cleaner.js';
import {
  claudeStopReasonToGemini,
  geminiFinishReasonToClaude,
  openAIFinishReasonToGemini
} from '../shared/stop-reason-mapping.js';
import { normalizeUsage } from '../shared/usage-normalizer.js';
import { toClaudeUsage, toGeminiUsageMetadata } from '../shared/usage-rendering.js';
import type { CanonicalMessage, ContentBlock } from '../types.js';
import type { ClaudeContent, ClaudeRequest, ClaudeResponse, ClaudeTool } from '../wire/claude-wire.js';
import type {
  GeminiContent,
  GeminiFunctionDeclaration,
  GeminiGenerationConfig,
  GeminiPart,
  GeminiRequest,
  GeminiResponse
} from '../wire/gemini-wire.js';
import type { OpenAIChatMessage, OpenAIChatRequest, OpenAIFunctionTool } from '../wire/openai-wire.js';
import { canonicalToClaudeMessage, claudeMessageToCanonical, extractSystemText } from './claude-codec.js';
import { canonicalToOpenAIMessages, generateMessageId } from './openai-codec.js';

export const DEFAULT_CLAUDE_MAX_TOKENS = 8192;

/**
 * Gemini has no call ids. Calls get sequential ids; a functionResponse is
 * paired with the oldest unanswered call of the same name, or falls back to
 * the function name.
 */
class ToolCallIdLedger {
  private next = 0;
  private readonly pending = new Map<string, string[]>();

  constructor(private readonly prefix: string) {}

  issue(name: string): string {
    const id = `${this.prefix}${this.next++}`;
    const queue = this.pending.get(name) ?? [];
    queue.push(id);
    this.pending.set(name, queue);
    return id;
  }

  resolve(name: string): string {
    const queue = this.pending.get(name);
    return queue?.shift() ?? name;
  }
}

function geminiRoleToCanonical(role: unknown): CanonicalMessage['role'] {
  return role === 'model' ? 'assistant' : 'user';
}

function geminiPartsToBlocks(parts: unknown[], ledger: ToolCallIdLedger): ContentBlock[] {
  const blocks: ContentBlock[] = [];
  for (const part of parts) {
    if (!isRecord(part)) continue;
    const text = readString(part, 'text');
    // replayed thoughts carry no signature a different upstream would accept
    if (text && part.thought !== true) {
      blocks.push({ type: 'text', text });
    }
    const inline = readRecord(part, 'inlineData');
    if (inline) {
      blocks.push({
        type: 'image',
        mediaType: readString(inline, 'mimeType') ?? 'application/octet-stream',
        data: readString(inline, 'data') ?? ''
      });
    }
    const call = readRecord(part, 'functionCall');
    if (call) {
      const name = readString(call, 'name') ?? '';
      blocks.push({ type: 'tool_use', id: ledger.issue(name), name, input: toJsonValue(call.args ?? {}) });
    }
    const response = readRecord(part, 'functionResponse');
    if (response) {
      const name = readString(response, 'name') ?? '';
      blocks.push({ type: 'tool_result', toolUseId: ledger.resolve(name), content: toJsonValue(response.response ?? {}) });
    }
  }
  return blocks;
}

export function geminiContentsToCanonical(contents: unknown, idPrefix: string): CanonicalMessage[] {
  const ledger = new ToolCallIdLedger(idPrefix);
  const messages: CanonicalMessage[] = [];
  for (const content of Array.isArray(contents) ? contents : []) {
    if (!isRecord(content)) continue;
    const blocks = geminiPartsToBlocks(readArray(content, 'parts') ?? [], ledger);
    if (blocks.length > 0) {
      messages.push({ role: geminiRoleToCanonical(content.role), content: blocks });
    }
  }
  return messages;
}

function extractGeminiText(content: unknown): string {
  if (!isRecord(content)) return '';
  const texts: string[] = [];
  for (const part of readArray(content, 'parts') ?? []) {
    if (isRecord(part)) {
      const text = readString(part, 'text');
      if (text) texts.push(text);
    }
  }
  return texts.join('\n');
}

function readFunctionDeclarations(rawTools: unknown): UnknownObject[] {
  const declarations: UnknownObject[] = [];
  for (const tool of Array.isArray(rawTools) ? rawTools : []) {
    if (!isRecord(tool)) continue;
    for (const fn of readArray(tool, 'functionDeclarations') ?? []) {
      if (isRecord(fn)) declarations.push(fn);
    }
  }
  return declarations;
}

function readStopSequences(source: UnknownObject, key: string): string[] | undefined {
  const raw = readArray(source, key);
  const values = raw?.filter((value): value is string => typeof value === 'string');
  return values && values.length > 0 ? values : undefined;
}

export function geminiRequestToClaude(raw: UnknownObject, model: string): ClaudeRequest {
  const messages = geminiContentsToCanonical(raw.contents, 'toolu_').map(canonicalToClaudeMessage);
  const config = readRecord(raw, 'generationConfig') ?? {};
  const maxOutput = readNumber(config, 'maxOutputTokens');
  const request: ClaudeRequest = {
    model,
    messages,
    max_tokens: maxOutput !== undefined && maxOutput > 0 ? maxOutput : DEFAULT_CLAUDE_MAX_TOKENS
  };
  const system = extractGeminiText(raw.systemInstruction);
  if (system) request.system = system;

  const temperature = readNumber(config, 'temperature');
  if (temperature !== undefined) request.temperature = temperature;
  const topP = readNumber(config, 'topP');
  if (topP !== undefined) request.top_p = topP;
  const topK = readNumber(config, 'topK');
  if (topK !== undefined) request.top_k = topK;
  const stops = readStopSequences(config, 'stopSequences');
  if (stops) request.stop_sequences = stops;

  const tools: ClaudeTool[] = readFunctionDeclarations(raw.tools).map((fn) => {
    const tool: ClaudeTool = {
      name: readString(fn, 'name') ?? '',
      input_schema: fn.parameters !== undefined ? toJsonValue(fn.parameters) : { type: 'object', properties: {} }
    };
    const description = readString(fn, 'description');
    if (description) tool.description = description;
    return tool;
  });
  if (tools.length > 0) request.tools = tools;
  return request;
}

export function geminiRequestToOpenAI(raw: UnknownObject, model: string): OpenAIChatRequest {
  const messages: OpenAIChatMessage[] = [];
  const system = extractGeminiText(raw.systemInstruction);
  if (system) {
    messages.push({ role: 'system', content: system });
  }
  for (const message of geminiContentsToCanonical(raw.contents, 'call_')) {
    messages.push(...canonicalToOpenAIMessages(message));
  }

  const request: OpenAIChatRequest = { model, messages };
  const config = readRecord(raw, 'generationConfig') ?? {};
  const maxOutput = readNumber(config, 'maxOutputTokens');
  if (maxOutput !== undefined && maxOutput > 0) request.max_completion_tokens = maxOutput;
  const temperature = readNumber(config, 'temperature');
  if (temperature !== undefined) request.temperature = temperature;
  const topP = readNumber(config, 'topP');
  if (topP !== undefined) request.top_p = topP;
  const stops = readStopSequences(config, 'stopSequences');
  if (stops) request.stop = stops;

  const tools: OpenAIFunctionTool[] = readFunctionDeclarations(raw.tools).map((fn) => {
    const tool: OpenAIFunctionTool = { type: 'function', function: { name: readString(fn, 'name') ?? '' } };
    const description = readString(fn, 'description');
    if (description) tool.function.description = description;
    if (fn.parameters !== undefined) tool.function.parameters = cleanJsonSchema(toJsonValue(fn.parameters));
    return tool;
  });
  if (tools.length > 0) request.tools = tools;
  return request;
}

function toolResultToGeminiResponse(content: JsonValue): JsonValue {
  if (isRecord(content)) {
    return content;
  }
  if (Array.isArray(content)) {
    const texts = content.flatMap((item) => (isRecord(item) && typeof item.text === 'string' ? [item.text] : []));
    if (texts.length === content.length) {
      return { content: texts.join('\n') };
    }
  }
  return { content };
}

function blocksToGeminiParts(blocks: ContentBlock[], toolNames: Map<string, string>): GeminiPart[] {
  const parts: GeminiPart[] = [];
  for (const block of blocks) {
    switch (block.type) {
      case 'text':
        parts.push({ text: block.text });
        break;
      case 'image':
        parts.push({ inlineData: { mimeType: block.mediaType, data: block.data } });
        break;
      case 'tool_use':
        toolNames.set(block.id, block.name);
        parts.push({ functionCall: { name: block.name, args: block.input ?? {} } });
        break;
      case 'tool_result':
        parts.push({
          functionResponse: {
            name: toolNames.get(block.toolUseId) ?? block.toolUseId,
            response: toolResultToGeminiResponse(block.content)
          }
        });
        break;
      case 'thinking':
        if (typeof block.thinking === 'string') {
          const part: GeminiPart = { text: block.thinking, thought: true };
          if (block.signature) part.thoughtSignature = block.signature;
          parts.push(part);
        }
        break;
    }
  }
  return parts;
}

export function claudeRequestToGemini(raw: UnknownObject): GeminiRequest {
  const toolNames = new Map<string, string>();
  const contents: GeminiContent[] = [];
  for (const message of readArray(raw, 'messages') ?? []) {
    if (!isRecord(message)) continue;
    const canonical = claudeMessageToCanonical(message);
    const parts = blocksToGeminiParts(canonical.content, toolNames);
    if (parts.length > 0) {
      contents.push({ role: canonical.role === 'assistant' ? 'model' : 'user', parts });
    }
  }

  const request: GeminiRequest = { contents };
  const system = raw.system === undefined ? '' : extractSystemText(raw.system);
  if (system) {
    request.systemInstruction = { parts: [{ text: system }] };
  }

  const config: GeminiGenerationConfig = {};
  const maxTokens = readNumber(raw, 'max_tokens');
  if (maxTokens !== undefined && maxTokens > 0) config.maxOutputTokens = maxTokens;
  const temperature = readNumber(raw, 'temperature');
  if (temperature !== undefined) config.temperature = temperature;
  const topP = readNumber(raw, 'top_p');
  if (topP !== undefined) config.topP = topP;
  const topK = readNumber(raw, 'top_k');
  if (topK !== undefined) config.topK = topK;
  const stops = readStopSequences(raw, 'stop_sequences');
  if (stops) config.stopSequences = stops;
  if (Object.keys(config).length > 0) {
    request.generationConfig = config;
  }

  const declarations: GeminiFunctionDeclaration[] = [];
  for (const tool of readArray(raw, 'tools') ?? []) {
    if (!isRecord(tool)) continue;
    const declaration: GeminiFunctionDeclaration = { name: readString(tool, 'name') ?? '' };
    const description = readString(tool, 'description');
    if (description) declaration.description = description;
    if (tool.input_schema !== undefined) declaration.parameters = cleanJsonSchema(toJsonValue(tool.input_schema));
    declarations.push(declaration);
  }
  if (declarations.length > 0) {
    request.tools = [{ functionDeclarations: declarations }];
  }
  return request;
}

function firstCandidate(raw: UnknownObject): UnknownObject | undefined {
  const candidates = readArray(raw, 'candidates') ?? [];
  return candidates.length > 0 && isRecord(candidates[0]) ? candidates[0] : undefined;
}

export function geminiResponseToClaude(raw: UnknownObject, messageId: string = generateMessageId()): ClaudeResponse {
  const content: ClaudeContent[] = [];
  const candidate = firstCandidate(raw);
  let calls = 0;
  for (const part of readArray(readRecord(candidate ?? {}, 'content') ?? {}, 'parts') ?? []) {
    if (!isRecord(part)) continue;
    const text = readString(part, 'text');
    if (text && part.thought === true) {
      content.push({ type: 'thinking', thinking: text, signature: readString(part, 'thoughtSignature') ?? '' });
    } else if (text) {
      content.push({ type: 'text', text });
    }
    const call = readRecord(part, 'functionCall');
    if (call) {
      content.push({ type: 'tool_use', id: `toolu_${calls++}`, name: readString(call, 'name') ?? '', input: toJsonValue(call.args ?? {}) });
    }
  }

  const response: ClaudeResponse = {
    id: messageId,
    type: 'message',
    role: 'assistant',
    content,
    stop_reason: calls > 0 ? 'tool_use' : geminiFinishReasonToClaude(candidate ? readString(candidate, 'finishReason') : undefined),
    stop_sequence: null
  };
  const model = readString(raw, 'modelVersion');
  if (model) response.model = model;
  if (isRecord(raw.usageMetadata)) {
    response.usage = toClaudeUsage(normalizeUsage(raw.usageMetadata));
  }
  return response;
}

export function claudeResponseToGemini(raw: UnknownObject): GeminiResponse {
  const parts: GeminiPart[] = [];
  for (const block of readArray(raw, 'content') ?? []) {
    if (!isRecord(block)) continue;
    if (block.type === 'text') {
      parts.push({ text: readString(block, 'text') ?? '' });
    } else if (block.type === 'tool_use') {
      parts.push({ functionCall: { name: readString(block, 'name') ?? '', args: toJsonValue(block.input ?? {}) } });
    }
  }
  const response: GeminiResponse = {
    candidates: [
      {
        content: { role: 'model', parts },
        finishReason: claudeStopReasonToGemini(readString(raw, 'stop_reason') ?? 'end_turn'),
        index: 0
      }
    ]
  };
  if (isRecord(raw.usage)) {
    response.usageMetadata = toGeminiUsageMetadata(normalizeUsage(raw.usage));
  }
  return response;
}

export function openAIResponseToGemini(raw: UnknownObject): GeminiResponse {
  const choices = readArray(raw, 'choices') ?? [];
  const choice = choices.length > 0 && isRecord(choices[0]) ? choices[0] : undefined;
  if (!choice) {
    return { candidates: [] };
  }
  const parts: GeminiPart[] = [];
  const message = readRecord(choice, 'message') ?? {};
  const text = readString(message, 'content');
  if (text) {
    parts.push({ text });
  }
  for (const call of readArray(message, 'tool_calls') ?? []) {
    if (!isRecord(call)) continue;
    const fn = readRecord(call, 'function');
    if (!fn) continue;
    const args = readString(fn, 'arguments');
    parts.push({ functionCall: { name: readString(fn, 'name') ?? '', args: (args ? tryParseJson(args) : undefined) ?? {} } });
  }
  const finishReason = readString(choice, 'finish_reason');
  const response: GeminiResponse = {
    candidates: [
      {
        content: { role: 'model', parts },
        finishReason: finishReason === undefined ? 'STOP' : openAIFinishReasonToGemini(finishReason),
        index: 0
      }
    ]
  };
  if (isRecord(raw.usage)) {
    response.usageMetadata = toGeminiUsageMetadata(normalizeUsage(raw.usage));
  }
  return response;
}
