/**
 * Responses HTTP Provider
 *
 * Serves Responses-dialect clients. The stored session (looked up by
 * `previous_response_id`) plus the new input is replayed to the upstream:
 * verbatim for a Responses upstream, flattened into Messages or Chat bodies
 * otherwise. Only Responses upstreams are streamed; the others are always
 * called non-streaming and converted as a whole.
 */

import type { Readable } from 'node:stream';

import { AnthropicProtocolClient } from '../../../client/anthropic/anthropic-protocol-client.js';
import type { HttpProtocolClient } from '../../../client/http-protocol-client.js';
import { OpenAIChatProtocolClient } from '../../../client/openai/chat-protocol-client.js';
import { ResponsesProtocolClient } from '../../../client/responses/responses-protocol-client.js';
import { hasModelMapping, redirectModel, type RoutingConfig } from '../../../config/routing-config.js';
import { canonicalToClaudeMessage } from '../../../conversion/codecs/claude-codec.js';
import { DEFAULT_CLAUDE_MAX_TOKENS } from '../../../conversion/codecs/gemini-codec.js';
import { UnrecognizedFormatError } from '../../../conversion/errors.js';
import {
  claudeResponseToResponses,
  EMPTY_SESSION,
  flattenSession,
  openAIResponseToResponses,
  responsesToOpenAIMessages,
  type SessionHistory
} from '../../../conversion/responses/responses-session-bridge.js';
import { decodeJsonObject } from '../../../conversion/shared/jsonish.js';
import type { StreamChannels } from '../../../conversion/streaming/event-channel.js';
import { relayResponsesStream } from '../../../conversion/streaming/sse-passthrough-relay.js';
import type { LaunchOptions } from '../../../conversion/streaming/stream-runner.js';
import type { ClaudeMessage } from '../../../conversion/wire/claude-wire.js';
import { readNumber, readString, type UnknownObject } from '../../../types/common-types.js';
import type { ClientResponseBody, InboundRequest } from '../api/provider-types.js';
import { HttpTransportProvider, type RequestPlan } from './http-transport-provider.js';
import { readModel, readStreamFlag } from './request-peek.js';

export type ResponsesUpstream = 'responses' | 'claude' | 'openai';

/** Read-only access to stored conversations; the provider never writes. */
export interface SessionSource {
  lookup(previousResponseId: string): SessionHistory | undefined;
}

const NO_SESSIONS: SessionSource = { lookup: () => undefined };

export class ResponsesHttpProvider extends HttpTransportProvider {
  readonly serviceType: ResponsesUpstream;

  constructor(
    upstream: ResponsesUpstream = 'responses',
    private readonly sessions: SessionSource = NO_SESSIONS
  ) {
    super('responses-http-provider', 'responses', upstream === 'claude' ? 'claude' : 'codex');
    this.serviceType = upstream;
  }

  protected protocolClientFor(routing: RoutingConfig): HttpProtocolClient {
    switch (this.serviceType) {
      case 'claude':
        return new AnthropicProtocolClient(routing.anthropicVersion);
      case 'openai':
        return new OpenAIChatProtocolClient();
      default:
        return new ResponsesProtocolClient();
    }
  }

  protected planRequest(inbound: InboundRequest, routing: RoutingConfig): RequestPlan {
    const body = decodeJsonObject(inbound.body, 'responses request');
    const model = redirectModel(readModel(body), routing);
    switch (this.serviceType) {
      case 'claude':
        return { method: 'POST', endpoint: '/messages', model, stream: false, data: this.toClaudeBody(body) };
      case 'openai':
        return { method: 'POST', endpoint: '/chat/completions', model, stream: false, data: this.toChatBody(body) };
      default: {
        const plan: RequestPlan = { method: 'POST', endpoint: '/responses', model, stream: readStreamFlag(body) };
        return hasModelMapping(routing) ? { ...plan, data: body } : { ...plan, rawBody: inbound.body };
      }
    }
  }

  private sessionFor(body: UnknownObject): SessionHistory {
    const previous = readString(body, 'previous_response_id');
    return (previous && this.sessions.lookup(previous)) || EMPTY_SESSION;
  }

  private toClaudeBody(body: UnknownObject): UnknownObject {
    const systemParts: string[] = [];
    const instructions = readString(body, 'instructions');
    if (instructions) {
      systemParts.push(instructions);
    }
    const messages: ClaudeMessage[] = [];
    for (const message of flattenSession(this.sessionFor(body), body.input)) {
      if (message.role === 'system') {
        // Messages has no system turns; fold them into the prompt
        for (const block of message.content) {
          if (block.type === 'text') systemParts.push(block.text);
        }
        continue;
      }
      messages.push(canonicalToClaudeMessage(message));
    }
    const maxOutput = readNumber(body, 'max_output_tokens');
    const claude: UnknownObject = {
      messages,
      max_tokens: maxOutput !== undefined && maxOutput > 0 ? maxOutput : DEFAULT_CLAUDE_MAX_TOKENS
    };
    if (systemParts.length > 0) {
      claude.system = systemParts.join('\n\n');
    }
    const temperature = readNumber(body, 'temperature');
    if (temperature !== undefined) {
      claude.temperature = temperature;
    }
    return claude;
  }

  private toChatBody(body: UnknownObject): UnknownObject {
    const chat: UnknownObject = {
      messages: responsesToOpenAIMessages(this.sessionFor(body), body.input, readString(body, 'instructions'))
    };
    const maxOutput = readNumber(body, 'max_output_tokens');
    if (maxOutput !== undefined && maxOutput > 0) {
      chat.max_completion_tokens = maxOutput;
    }
    const temperature = readNumber(body, 'temperature');
    if (temperature !== undefined) {
      chat.temperature = temperature;
    }
    return chat;
  }

  convertResponse(body: Buffer | string): ClientResponseBody {
    const raw = decodeJsonObject(body, 'responses upstream response');
    switch (this.serviceType) {
      case 'claude':
        return claudeResponseToResponses(raw);
      case 'openai':
        return openAIResponseToResponses(raw);
      default:
        return raw;
    }
  }

  transcodeStream(body: Readable, options?: LaunchOptions): StreamChannels {
    if (this.serviceType !== 'responses') {
      throw new UnrecognizedFormatError(`responses clients are not streamed from ${this.serviceType} upstreams`);
    }
    return relayResponsesStream(body, options);
  }
}
