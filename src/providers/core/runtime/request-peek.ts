import { isRecord, readString, type UnknownObject } from '../../../types/common-types.js';
import { tryParseJson } from '../../../conversion/shared/jsonish.js';

/** Best-effort look at a body that may be forwarded untouched. */
export function peekJsonObject(body: Buffer): UnknownObject | undefined {
  if (body.length === 0) {
    return undefined;
  }
  const parsed = tryParseJson(body.toString('utf-8'));
  return isRecord(parsed) ? parsed : undefined;
}

export function readModel(body: UnknownObject | undefined): string {
  return body ? readString(body, 'model') ?? '' : '';
}

export function readStreamFlag(body: UnknownObject | undefined): boolean {
  return body?.stream === true;
}

/** `/v1beta/models/gemini-2.5-pro:streamGenerateContent` → `gemini-2.5-pro`. */
export function modelFromGeminiPath(path: string): string | undefined {
  const match = /\/models\/([^/:]+)(?::|$)/.exec(path);
  const segment = match?.[1];
  if (!segment) {
    return undefined;
  }
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      return segment;
    }
    throw error;
  }
}

export function isGeminiStreamPath(path: string): boolean {
  return path.includes(':streamGenerateContent');
}
