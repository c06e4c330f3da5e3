/**
 * Dynamically-typed wire representation of a protocol message.
 * Key order follows insertion order, as JSON.parse produces it.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonArray
  | JsonObject;

export type JsonArray = JsonValue[];

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonKind =
  | 'null'
  | 'bool'
  | 'integer'
  | 'float'
  | 'string'
  | 'array'
  | 'object';

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonArray(value: JsonValue | undefined): value is JsonArray {
  return Array.isArray(value);
}

export function jsonKind(value: JsonValue): JsonKind {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'float';
  }
  if (typeof value === 'string') return 'string';
  return Array.isArray(value) ? 'array' : 'object';
}

/**
 * Walks nested objects along a `.`-separated path.
 * Returns undefined when a segment is missing or an intermediate value is not
 * an object.
 */
export function getValue(
  value: JsonValue | undefined,
  path: string,
): JsonValue | undefined {
  let current: JsonValue | undefined = value;
  for (const key of path.split('.')) {
    if (!isJsonObject(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function getString(
  value: JsonValue | undefined,
  path: string,
): string | undefined {
  const found = getValue(value, path);
  return typeof found === 'string' ? found : undefined;
}

export function getInteger(
  value: JsonValue | undefined,
  path: string,
): number | undefined {
  const found = getValue(value, path);
  return typeof found === 'number' && Number.isInteger(found)
    ? found
    : undefined;
}

export function getObject(
  value: JsonValue | undefined,
  path: string,
): JsonObject | undefined {
  const found = getValue(value, path);
  return isJsonObject(found) ? found : undefined;
}

/**
 * Defines `key` as an own enumerable field, so `__proto__` is stored as data
 * rather than replacing the prototype.
 */
export function setField(
  object: JsonObject,
  key: string,
  value: JsonValue,
): void {
  Object.defineProperty(object, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

/**
 * Narrows a value produced by JSON.parse. Anything JSON.parse returns is a
 * JsonValue; this only rejects values that did not come from it.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null) return null;
  if (typeof value === 'boolean' || typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJsonValue(item));
  }
  if (typeof value === 'object') {
    const object: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      setField(object, key, toJsonValue(item));
    }
    return object;
  }
  throw new TypeError(`Value of type ${typeof value} is not representable as JSON`);
}
