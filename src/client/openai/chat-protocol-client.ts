import { readNumber, type UnknownObject } from '../../types/common-types.js';
import { acceptHeaderFor, type HttpProtocolClient, type ProtocolRequestPayload } from '../http-protocol-client.js';

export const DEFAULT_MAX_COMPLETION_TOKENS = 65535;

export class OpenAIChatProtocolClient implements HttpProtocolClient {
  constructor(private readonly defaultMaxTokens = DEFAULT_MAX_COMPLETION_TOKENS) {}

  buildRequestBody(request: ProtocolRequestPayload): UnknownObject {
    const body: UnknownObject = { ...request.data, model: request.model };
    body.max_completion_tokens = this.resolveMaxTokens(body);
    delete body.max_tokens;
    if (request.stream) {
      body.stream = true;
      body.stream_options = { include_usage: true };
    } else {
      delete body.stream;
      delete body.stream_options;
    }
    return body;
  }

  resolveEndpoint(_request: ProtocolRequestPayload, defaultEndpoint: string): string {
    return defaultEndpoint;
  }

  finalizeHeaders(headers: Record<string, string>, request: ProtocolRequestPayload): Record<string, string> {
    return { ...headers, accept: acceptHeaderFor(request.stream) };
  }

  private resolveMaxTokens(body: UnknownObject): number {
    const completion = readNumber(body, 'max_completion_tokens');
    if (completion !== undefined && completion > 0) {
      return completion;
    }
    const legacy = readNumber(body, 'max_tokens');
    if (legacy !== undefined && legacy > 0) {
      return legacy;
    }
    return this.defaultMaxTokens;
  }
}
