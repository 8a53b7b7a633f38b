import type { UnknownObject } from '../../types/common-types.js';
import { acceptHeaderFor, type HttpProtocolClient, type ProtocolRequestPayload } from '../http-protocol-client.js';

export class ResponsesProtocolClient implements HttpProtocolClient {
  buildRequestBody(request: ProtocolRequestPayload): UnknownObject {
    const body: UnknownObject = { ...request.data, model: request.model };
    this.ensureStreamFlag(body, request.stream);
    return body;
  }

  resolveEndpoint(_request: ProtocolRequestPayload, defaultEndpoint: string): string {
    return defaultEndpoint;
  }

  finalizeHeaders(headers: Record<string, string>, request: ProtocolRequestPayload): Record<string, string> {
    return { ...headers, accept: acceptHeaderFor(request.stream) };
  }

  ensureStreamFlag(body: UnknownObject, useStream: boolean): void {
    if (useStream) {
      body.stream = true;
      return;
    }
    if ('stream' in body) {
      delete body.stream;
    }
  }
}
