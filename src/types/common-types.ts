export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type UnknownObject = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(source: UnknownObject, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Reads a numeric field, accepting only finite numbers. Absent or non-numeric
 * values come back as undefined so callers can tell "not provided" from zero.
 */
export function readNumber(source: UnknownObject, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readRecord(source: UnknownObject, key: string): UnknownObject | undefined {
  const value = source[key];
  return isRecord(value) ? value : undefined;
}

export function readArray(source: UnknownObject, key: string): unknown[] | undefined {
  const value = source[key];
  return Array.isArray(value) ? value : undefined;
}
