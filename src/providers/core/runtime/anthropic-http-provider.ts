/**
 * Anthropic HTTP Provider
 *
 * Claude Messages upstream. Claude clients get a true passthrough: the body
 * is forwarded byte-for-byte unless a model mapping forces a rewrite, and the
 * completed response comes back as decoded. Gemini clients are converted both
 * ways.
 */

import type { Readable } from 'node:stream';

import { AnthropicProtocolClient } from '../../../client/anthropic/anthropic-protocol-client.js';
import type { HttpProtocolClient } from '../../../client/http-protocol-client.js';
import { hasModelMapping, redirectModel, type RoutingConfig } from '../../../config/routing-config.js';
import { claudeResponseToGemini, geminiRequestToClaude } from '../../../conversion/codecs/gemini-codec.js';
import { decodeJsonObject } from '../../../conversion/shared/jsonish.js';
import { transcodeAnthropicStreamToGemini } from '../../../conversion/streaming/anthropic-to-gemini-transformer.js';
import type { StreamChannels } from '../../../conversion/streaming/event-channel.js';
import { relayClaudeStream } from '../../../conversion/streaming/sse-passthrough-relay.js';
import type { LaunchOptions } from '../../../conversion/streaming/stream-runner.js';
import type { ClientResponseBody, InboundRequest } from '../api/provider-types.js';
import { HttpTransportProvider, type RequestPlan } from './http-transport-provider.js';
import { isGeminiStreamPath, modelFromGeminiPath, peekJsonObject, readModel, readStreamFlag } from './request-peek.js';

export type AnthropicClientDialect = 'claude' | 'gemini';

export class AnthropicHttpProvider extends HttpTransportProvider {
  readonly serviceType = 'claude';

  constructor(clientDialect: AnthropicClientDialect = 'claude') {
    super('anthropic-http-provider', clientDialect, 'claude');
  }

  protected protocolClientFor(routing: RoutingConfig): HttpProtocolClient {
    return new AnthropicProtocolClient(routing.anthropicVersion);
  }

  protected planRequest(inbound: InboundRequest, routing: RoutingConfig): RequestPlan {
    return this.clientDialect === 'gemini' ? this.planFromGemini(inbound, routing) : this.planPassthrough(inbound, routing);
  }

  private planPassthrough(inbound: InboundRequest, routing: RoutingConfig): RequestPlan {
    const peeked = peekJsonObject(inbound.body);
    const model = readModel(peeked);
    const plan: RequestPlan = {
      method: inbound.method,
      endpoint: inbound.path.replace(/^\/v1(?=\/|$)/, ''),
      model,
      stream: readStreamFlag(peeked),
      query: inbound.query
    };
    if (!hasModelMapping(routing) || inbound.body.length === 0) {
      return { ...plan, rawBody: inbound.body };
    }
    const data = decodeJsonObject(inbound.body, 'claude request');
    return { ...plan, model: model ? redirectModel(model, routing) : model, data };
  }

  private planFromGemini(inbound: InboundRequest, routing: RoutingConfig): RequestPlan {
    const gemini = decodeJsonObject(inbound.body, 'gemini request');
    const model = redirectModel(modelFromGeminiPath(inbound.path) ?? readModel(gemini), routing);
    const stream = isGeminiStreamPath(inbound.path);
    const claude = geminiRequestToClaude(gemini, model);
    if (stream) {
      claude.stream = true;
    }
    return { method: 'POST', endpoint: '/messages', model, stream, data: { ...claude } };
  }

  convertResponse(body: Buffer | string): ClientResponseBody {
    const raw = decodeJsonObject(body, 'claude response');
    if (this.clientDialect === 'gemini') {
      return claudeResponseToGemini(raw);
    }
    // same dialect: cache_control marks and cache-creation splits go back untouched
    return raw;
  }

  transcodeStream(body: Readable, options?: LaunchOptions): StreamChannels {
    return this.clientDialect === 'gemini' ? transcodeAnthropicStreamToGemini(body, options) : relayClaudeStream(body, options);
  }
}
