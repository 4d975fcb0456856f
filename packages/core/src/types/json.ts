/**
 * JSON value shapes used for opaque payloads (proposals, serialized
 * input/output data).
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonArray = ReadonlyArray<JsonValue>;

export type JsonObject = { readonly [key: string]: JsonValue | undefined };

export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/** Narrow an unknown value to a plain JSON object (not an array). */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Narrow an unknown value (e.g. the result of JSON.parse) to a JsonValue. */
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
