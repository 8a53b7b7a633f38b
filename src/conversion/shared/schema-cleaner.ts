import type { JsonValue } from '../../types/common-types.js';

type JsonObject = { [key: string]: JsonValue };

const DENYLISTED_KEYWORDS = new Set(['$schema', 'title', 'examples', 'additionalProperties']);

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cleanPropertyMap(properties: JsonObject): JsonObject {
  // keys here are parameter names, not keywords: never filter them
  const cleaned: JsonObject = {};
  for (const [name, definition] of Object.entries(properties)) {
    cleaned[name] = cleanJsonSchema(definition);
  }
  return cleaned;
}

/**
 * Strips keywords that OpenAI-style and Gemini function schemas reject:
 * `$schema`, `title`, `examples`, `additionalProperties`, and `format` on
 * string-typed nodes. Everything else passes through untouched. Never throws.
 */
export function cleanJsonSchema(schema: JsonValue): JsonValue {
  if (Array.isArray(schema)) {
    return schema.map((item) => cleanJsonSchema(item));
  }
  if (!isJsonObject(schema)) {
    return schema;
  }
  const cleaned: JsonObject = {};
  for (const [key, value] of Object.entries(schema)) {
    if (DENYLISTED_KEYWORDS.has(key)) {
      continue;
    }
    if (key === 'format' && schema.type === 'string') {
      continue;
    }
    if (key === 'properties' && isJsonObject(value)) {
      cleaned[key] = cleanPropertyMap(value);
      continue;
    }
    cleaned[key] = cleanJsonSchema(value);
  }
  return cleaned;
}
