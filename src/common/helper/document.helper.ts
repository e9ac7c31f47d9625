import { ObjectId } from 'mongodb';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | JsonObject;

export type JsonObject = { [key: string]: JsonValue };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a stored document into a plain JSON-friendly copy.
 *
 * `_id` is exposed as `id`, every ObjectId becomes its hex string and every
 * Date its ISO-8601 form. Nested documents and arrays are converted as well.
 * Keys holding `undefined` are dropped.
 */
export function toJsonFriendly(document: Record<string, unknown>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(document)) {
    if (value === undefined) continue;
    if (key === '_id' && value instanceof ObjectId) {
      result.id = value.toHexString();
    } else {
      result[key] = toJsonValue(value);
    }
  }
  return result;
}

function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (value instanceof ObjectId) return value.toHexString();
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (isRecord(value)) return toJsonFriendly(value);
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  return String(value);
}
