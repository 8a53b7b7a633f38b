import type { UnknownObject } from '../../types/common-types.js';
import {
  acceptHeaderFor,
  moveBearerToHeader,
  type HttpProtocolClient,
  type ProtocolRequestPayload
} from '../http-protocol-client.js';

/** Model and stream mode live in the URL for Gemini, never in the body. */
export class GeminiProtocolClient implements HttpProtocolClient {
  buildRequestBody(request: ProtocolRequestPayload): UnknownObject {
    const body: UnknownObject = { ...request.data };
    delete body.model;
    delete body.stream;
    return body;
  }

  resolveEndpoint(request: ProtocolRequestPayload, defaultEndpoint: string): string {
    const model = request.model.trim();
    if (!model) {
      return defaultEndpoint;
    }
    const method = request.stream ? 'streamGenerateContent?alt=sse' : 'generateContent';
    return `/models/${encodeURIComponent(model)}:${method}`;
  }

  finalizeHeaders(headers: Record<string, string>, request: ProtocolRequestPayload): Record<string, string> {
    const normalized: Record<string, string> = { ...headers };
    moveBearerToHeader(normalized, 'x-goog-api-key');
    normalized.accept = acceptHeaderFor(request.stream);
    return normalized;
  }
}
