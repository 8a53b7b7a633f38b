/**
 * Gemini HTTP Provider
 *
 * generateContent upstream. A body that already carries `contents` is
 * forwarded as-is (model redirect only touches the URL); a Claude body is
 * converted first.
 */

import type { Readable } from 'node:stream';

import { GeminiProtocolClient } from '../../../client/gemini/gemini-protocol-client.js';
import type { HttpProtocolClient } from '../../../client/http-protocol-client.js';
import { redirectModel, type RoutingConfig } from '../../../config/routing-config.js';
import { claudeRequestToGemini, geminiResponseToClaude } from '../../../conversion/codecs/gemini-codec.js';
import { decodeJsonObject } from '../../../conversion/shared/jsonish.js';
import type { StreamChannels } from '../../../conversion/streaming/event-channel.js';
import { transcodeGeminiStreamToAnthropic } from '../../../conversion/streaming/gemini-to-anthropic-transformer.js';
import { relayGeminiStream } from '../../../conversion/streaming/sse-passthrough-relay.js';
import type { LaunchOptions } from '../../../conversion/streaming/stream-runner.js';
import type { ClientResponseBody, InboundRequest } from '../api/provider-types.js';
import { HttpTransportProvider, type RequestPlan } from './http-transport-provider.js';
import { isGeminiStreamPath, modelFromGeminiPath, readModel, readStreamFlag } from './request-peek.js';

export type GeminiClientDialect = 'claude' | 'gemini';

export class GeminiHttpProvider extends HttpTransportProvider {
  readonly serviceType = 'gemini';
  private readonly protocolClient = new GeminiProtocolClient();

  constructor(clientDialect: GeminiClientDialect = 'claude') {
    super('gemini-http-provider', clientDialect, 'gemini');
  }

  protected protocolClientFor(_routing: RoutingConfig): HttpProtocolClient {
    return this.protocolClient;
  }

  protected planRequest(inbound: InboundRequest, routing: RoutingConfig): RequestPlan {
    const raw = decodeJsonObject(inbound.body, 'gemini upstream request');
    if (Array.isArray(raw.contents)) {
      const model = redirectModel(modelFromGeminiPath(inbound.path) ?? readModel(raw), routing);
      return {
        method: 'POST',
        endpoint: '/models',
        model,
        stream: isGeminiStreamPath(inbound.path) || readStreamFlag(raw),
        data: raw
      };
    }
    const model = redirectModel(readModel(raw), routing);
    return { method: 'POST', endpoint: '/models', model, stream: readStreamFlag(raw), data: { ...claudeRequestToGemini(raw) } };
  }

  convertResponse(body: Buffer | string): ClientResponseBody {
    const raw = decodeJsonObject(body, 'gemini response');
    return this.clientDialect === 'gemini' ? raw : geminiResponseToClaude(raw);
  }

  transcodeStream(body: Readable, options?: LaunchOptions): StreamChannels {
    return this.clientDialect === 'gemini' ? relayGeminiStream(body, options) : transcodeGeminiStreamToAnthropic(body, options);
  }
}
