// Shared JSON parsing helpers

import { isRecord, type JsonValue, type UnknownObject } from '../../types/common-types.js';
import { DecodeError } from '../errors.js';

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/** Parse or return undefined; used where an unparsable fragment is simply held or skipped. */
export function tryParseJson(text: string): JsonValue | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonValue(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export function toJsonValue(value: unknown): JsonValue {
  return isJsonValue(value) ? value : null;
}

export function decodeJsonObject(raw: string | Buffer, context: string): UnknownObject {
  const text = typeof raw === 'string' ? raw : raw.toString('utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DecodeError(`${context}: body is not valid JSON`, {
      length: text.length,
      reason: error instanceof Error ? error.message : String(error)
    });
  }
  if (!isRecord(parsed)) {
    throw new DecodeError(`${context}: expected a JSON object`, { length: text.length });
  }
  return parsed;
}

/** Tool results may be a string or any JSON; OpenAI wants a string. */
export function stringifyToolContent(content: JsonValue): string {
  return typeof content === 'string' ? content : JSON.stringify(content);
}
