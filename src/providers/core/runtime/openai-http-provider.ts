/**
 * OpenAI HTTP Provider
 *
 * Chat Completions upstream for Claude and Gemini clients. The request is
 * always rebuilt; responses and streams are translated back.
 */

import type { Readable } from 'node:stream';

import type { HttpProtocolClient } from '../../../client/http-protocol-client.js';
import { OpenAIChatProtocolClient } from '../../../client/openai/chat-protocol-client.js';
import { redirectModel, type RoutingConfig } from '../../../config/routing-config.js';
import { geminiRequestToOpenAI, openAIResponseToGemini } from '../../../conversion/codecs/gemini-codec.js';
import { claudeMessagesToOpenAI, claudeToolsToOpenAI, openAIResponseToClaude } from '../../../conversion/codecs/openai-codec.js';
import { decodeJsonObject } from '../../../conversion/shared/jsonish.js';
import type { StreamChannels } from '../../../conversion/streaming/event-channel.js';
import { transcodeOpenAIStreamToAnthropic } from '../../../conversion/streaming/openai-to-anthropic-transformer.js';
import { transcodeOpenAIStreamToGemini } from '../../../conversion/streaming/openai-to-gemini-transformer.js';
import type { LaunchOptions } from '../../../conversion/streaming/stream-runner.js';
import { readArray, readNumber, type UnknownObject } from '../../../types/common-types.js';
import type { ClientResponseBody, InboundRequest } from '../api/provider-types.js';
import { HttpTransportProvider, type RequestPlan } from './http-transport-provider.js';
import { isGeminiStreamPath, modelFromGeminiPath, readModel, readStreamFlag } from './request-peek.js';

export type OpenAIClientDialect = 'claude' | 'gemini';

const CHAT_COMPLETIONS_ENDPOINT = '/chat/completions';

export class OpenAIHttpProvider extends HttpTransportProvider {
  readonly serviceType = 'openai';
  private readonly protocolClient = new OpenAIChatProtocolClient();

  constructor(clientDialect: OpenAIClientDialect = 'claude') {
    super('openai-http-provider', clientDialect, 'openai');
  }

  protected protocolClientFor(_routing: RoutingConfig): HttpProtocolClient {
    return this.protocolClient;
  }

  protected planRequest(inbound: InboundRequest, routing: RoutingConfig): RequestPlan {
    return this.clientDialect === 'gemini' ? this.planFromGemini(inbound, routing) : this.planFromClaude(inbound, routing);
  }

  private planFromClaude(inbound: InboundRequest, routing: RoutingConfig): RequestPlan {
    const claude = decodeJsonObject(inbound.body, 'claude request');
    const model = redirectModel(readModel(claude), routing);
    const data: UnknownObject = { messages: claudeMessagesToOpenAI(claude.messages, claude.system) };
    const maxTokens = readNumber(claude, 'max_tokens');
    if (maxTokens !== undefined && maxTokens > 0) {
      data.max_completion_tokens = maxTokens;
    }
    const temperature = readNumber(claude, 'temperature');
    if (temperature !== undefined) {
      data.temperature = temperature;
    }
    const tools = claudeToolsToOpenAI(readArray(claude, 'tools') ?? []);
    if (tools.length > 0) {
      data.tools = tools;
      data.tool_choice = 'auto';
    }
    return { method: 'POST', endpoint: CHAT_COMPLETIONS_ENDPOINT, model, stream: readStreamFlag(claude), data };
  }

  private planFromGemini(inbound: InboundRequest, routing: RoutingConfig): RequestPlan {
    const gemini = decodeJsonObject(inbound.body, 'gemini request');
    const model = redirectModel(modelFromGeminiPath(inbound.path) ?? readModel(gemini), routing);
    return {
      method: 'POST',
      endpoint: CHAT_COMPLETIONS_ENDPOINT,
      model,
      stream: isGeminiStreamPath(inbound.path),
      data: { ...geminiRequestToOpenAI(gemini, model) }
    };
  }

  convertResponse(body: Buffer | string): ClientResponseBody {
    const raw = decodeJsonObject(body, 'openai response');
    return this.clientDialect === 'gemini' ? openAIResponseToGemini(raw) : openAIResponseToClaude(raw);
  }

  transcodeStream(body: Readable, options?: LaunchOptions): StreamChannels {
    return this.clientDialect === 'gemini' ? transcodeOpenAIStreamToGemini(body, options) : transcodeOpenAIStreamToAnthropic(body, options);
  }
}
