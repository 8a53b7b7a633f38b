/**
 * Provider contract types
 *
 * A provider owns one upstream dialect: it builds the outbound HTTP request,
 * converts a completed upstream body and transcodes a live upstream stream
 * into the dialect the client spoke.
 */

import type { Readable } from 'node:stream';

import type { RoutingConfig, ServiceType } from '../../../config/routing-config.js';
import type { StreamChannels } from '../../../conversion/streaming/event-channel.js';
import type { ClaudeResponse } from '../../../conversion/wire/claude-wire.js';
import type { GeminiResponse } from '../../../conversion/wire/gemini-wire.js';
import type { ResponsesResponse } from '../../../conversion/wire/responses-wire.js';
import type { LaunchOptions } from '../../../conversion/streaming/stream-runner.js';
import type { UnknownObject } from '../../../types/common-types.js';
import type { InboundHeaders } from '../utils/upstream-headers.js';

/** Dialect the calling client speaks. */
export type ClientDialect = 'claude' | 'gemini' | 'responses';

export interface InboundRequest {
  method: string;
  /** Path as received, e.g. `/v1/messages`. */
  path: string;
  /** Raw query string without the leading `?`. */
  query?: string;
  headers: InboundHeaders;
  body: Buffer;
}

export interface OutboundHttpRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: Buffer;
}

export interface BuildResult {
  request: OutboundHttpRequest;
  /** Exactly the bytes in `request.body`. */
  rawBody: Buffer;
  model: string;
  stream: boolean;
}

/** Passthrough paths hand back the upstream object as decoded. */
export type ClientResponseBody = ClaudeResponse | GeminiResponse | ResponsesResponse | UnknownObject;

export interface UpstreamProvider {
  readonly serviceType: ServiceType;
  readonly clientDialect: ClientDialect;
  build(inbound: InboundRequest, routing: RoutingConfig, apiKey: string): BuildResult;
  /** Completed upstream body → client-dialect body. */
  convertResponse(body: Buffer | string): ClientResponseBody;
  transcodeStream(body: Readable, options?: LaunchOptions): StreamChannels;
}
