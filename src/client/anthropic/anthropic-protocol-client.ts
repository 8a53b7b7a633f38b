import { isRecord, type UnknownObject } from '../../types/common-types.js';
import { acceptHeaderFor, type HttpProtocolClient, type ProtocolRequestPayload } from '../http-protocol-client.js';

export const DEFAULT_ANTHROPIC_VERSION = '2023-06-01';

/** String tool_choice values from OpenAI-flavoured callers → Messages objects. */
function normalizeToolChoice(raw: unknown): UnknownObject | undefined {
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (!trimmed) return undefined;
    const lower = trimmed.toLowerCase();
    if (lower === 'required') return { type: 'any' };
    if (lower === 'auto' || lower === 'none' || lower === 'any') return { type: lower };
    return { type: trimmed };
  }
  return isRecord(raw) ? { ...raw } : undefined;
}

export class AnthropicProtocolClient implements HttpProtocolClient {
  constructor(private readonly version: string = DEFAULT_ANTHROPIC_VERSION) {}

  buildRequestBody(request: ProtocolRequestPayload): UnknownObject {
    const body: UnknownObject = { ...request.data };
    if (request.model) {
      body.model = request.model;
    }
    if (body.tool_choice !== undefined && body.tool_choice !== null) {
      const normalized = normalizeToolChoice(body.tool_choice);
      if (normalized) {
        body.tool_choice = normalized;
      } else {
        // an unusable value would only earn a 400 upstream
        delete body.tool_choice;
      }
    }
    return body;
  }

  resolveEndpoint(_request: ProtocolRequestPayload, defaultEndpoint: string): string {
    return defaultEndpoint;
  }

  finalizeHeaders(headers: Record<string, string>, request: ProtocolRequestPayload): Record<string, string> {
    const normalized: Record<string, string> = { ...headers };
    if (!normalized['anthropic-version']) {
      normalized['anthropic-version'] = this.version;
    }
    normalized.accept = acceptHeaderFor(request.stream);
    return normalized;
  }
}
