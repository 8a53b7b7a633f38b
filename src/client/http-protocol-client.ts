import type { UnknownObject } from '../types/common-types.js';

/**
 * What a protocol client is handed: the upstream-dialect body plus the two
 * facts that steer endpoint and header choices.
 */
export interface ProtocolRequestPayload {
  data: UnknownObject;
  model: string;
  stream: boolean;
}

export interface HttpProtocolClient<TPayload extends ProtocolRequestPayload = ProtocolRequestPayload> {
  buildRequestBody(request: TPayload): UnknownObject;
  resolveEndpoint(request: TPayload, defaultEndpoint: string): string;
  finalizeHeaders(headers: Record<string, string>, request: TPayload): Record<string, string>;
}

export function acceptHeaderFor(stream: boolean): string {
  return stream ? 'text/event-stream' : 'application/json';
}

/** Moves a Bearer token out of `authorization` into a dialect-specific key header. */
export function moveBearerToHeader(headers: Record<string, string>, target: string): void {
  if (headers[target]) {
    return;
  }
  const token = headers.authorization?.replace(/^Bearer\s+/i, '').trim();
  if (token) {
    headers[target] = token;
    delete headers.authorization;
  }
}
