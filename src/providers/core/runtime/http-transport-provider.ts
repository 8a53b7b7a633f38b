/**
 * HTTP transport provider base
 *
 * Shared build pipeline for every upstream dialect:
 * plan (dialect body, endpoint, model, stream) → protocol client body →
 * URL → prepared headers → credentials → user agent → dialect headers.
 * Subclasses only decide the plan and how responses come back.
 */

import type { Readable } from 'node:stream';

import { buildUpstreamUrl, hostOf } from '../../../client/upstream-url.js';
import type { HttpProtocolClient } from '../../../client/http-protocol-client.js';
import { getEffectiveBaseUrl, type RoutingConfig, type ServiceType } from '../../../config/routing-config.js';
import type { StreamChannels } from '../../../conversion/streaming/event-channel.js';
import type { LaunchOptions } from '../../../conversion/streaming/stream-runner.js';
import type { UnknownObject } from '../../../types/common-types.js';
import { createModuleLogger, type ModuleLogger } from '../../../utils/logger.js';
import type {
  BuildResult,
  ClientDialect,
  ClientResponseBody,
  InboundRequest,
  OutboundHttpRequest,
  UpstreamProvider
} from '../api/provider-types.js';
import { ensureCompatibleUserAgent, prepareUpstreamHeaders, setAuthenticationHeader } from '../utils/upstream-headers.js';

export interface RequestPlan {
  method: string;
  endpoint: string;
  model: string;
  stream: boolean;
  /** Upstream-dialect body, run through the protocol client. */
  data?: UnknownObject;
  /** Bytes forwarded untouched; wins over `data`. */
  rawBody?: Buffer;
  /** Inbound query string to carry over. */
  query?: string;
}

export abstract class HttpTransportProvider implements UpstreamProvider {
  abstract readonly serviceType: ServiceType;
  protected readonly log: ModuleLogger;

  constructor(
    moduleName: string,
    readonly clientDialect: ClientDialect,
    /** Tag handed to ensureCompatibleUserAgent. */
    private readonly userAgentTag: string
  ) {
    this.log = createModuleLogger(moduleName);
  }

  protected abstract planRequest(inbound: InboundRequest, routing: RoutingConfig): RequestPlan;

  protected abstract protocolClientFor(routing: RoutingConfig): HttpProtocolClient;

  abstract convertResponse(body: Buffer | string): ClientResponseBody;

  abstract transcodeStream(body: Readable, options?: LaunchOptions): StreamChannels;

  build(inbound: InboundRequest, routing: RoutingConfig, apiKey: string): BuildResult {
    const plan = this.planRequest(inbound, routing);
    const client = this.protocolClientFor(routing);
    const payload = { data: plan.data ?? {}, model: plan.model, stream: plan.stream };

    const rawBody = plan.rawBody ?? Buffer.from(JSON.stringify(client.buildRequestBody(payload)), 'utf-8');
    const endpoint = client.resolveEndpoint(payload, plan.endpoint);
    const url = buildUpstreamUrl(getEffectiveBaseUrl(routing), endpoint, plan.query);

    const headers = prepareUpstreamHeaders(inbound.headers, hostOf(url));
    setAuthenticationHeader(headers, apiKey);
    ensureCompatibleUserAgent(headers, this.userAgentTag);

    const request: OutboundHttpRequest = {
      method: plan.method,
      url,
      headers: client.finalizeHeaders(headers, payload),
      body: rawBody
    };
    this.log.debug(
      `built ${plan.method} ${endpoint} model=${plan.model || '-'} stream=${plan.stream} bytes=${rawBody.length}`
    );
    return { request, rawBody, model: plan.model, stream: plan.stream };
  }
}
