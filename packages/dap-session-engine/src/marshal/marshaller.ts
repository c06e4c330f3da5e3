import { MarshalError } from '../errors';
import { JsonObject, JsonValue, isJsonObject, setField } from '../protocol/json';
import { Schema, StringCloner, cloneJson, copyStrings } from './schema';

/**
 * Writes a typed value into the generic tree. The root must encode to an
 * object; an absent optional root encodes as an empty object.
 */
export function toObject<T>(schema: Schema<T>, value: T): JsonObject {
  const encoded = schema.encode(value, '$');
  if (encoded === null) return {};
  if (!isJsonObject(encoded)) {
    throw new MarshalError(
      'NotAnObject',
      '$',
      `A ${schema.kind} value does not encode to an object`,
    );
  }
  return encoded;
}

export function toValue<T>(schema: Schema<T>, value: T): JsonValue {
  return schema.encode(value, '$');
}

/**
 * Reads a typed value out of the generic tree. The result shares no
 * structure with `value`.
 */
export function fromValue<T>(
  schema: Schema<T>,
  value: JsonValue | undefined,
  path: string = '$',
): T {
  return schema.decode(value, path);
}

function ancestorOf(object: JsonObject, path: string): JsonObject {
  let ancestor = object;
  if (path === '') return ancestor;

  let walked = '$';
  for (const segment of path.split('.')) {
    walked = `${walked}.${segment}`;
    if (!Object.prototype.hasOwnProperty.call(ancestor, segment)) {
      throw new MarshalError(
        'AncestorDoesNotExist',
        walked,
        `No field '${segment}' to inject into`,
      );
    }
    const next = ancestor[segment];
    if (!isJsonObject(next)) {
      throw new MarshalError(
        'AncestorIsNotAnObject',
        walked,
        `Field '${segment}' is not an object`,
      );
    }
    ancestor = next;
  }
  return ancestor;
}

/**
 * Sets `key` on the object found by walking the `.`-separated `path` from
 * `object`. An empty path targets `object` itself.
 */
export function injectIntoAncestor(
  object: JsonObject,
  path: string,
  key: string,
  value: JsonValue,
): void {
  setField(ancestorOf(object, path), key, value);
}

/**
 * Overwrites `object` with every entry of `extra`, or the object at `path`
 * when one is given.
 */
export function mergeObject(
  object: JsonObject,
  extra: JsonObject,
  path: string = '',
): void {
  const keys = Object.keys(extra);
  if (keys.length === 0) return;
  const ancestor = ancestorOf(object, path);
  for (const key of keys) {
    setField(ancestor, key, extra[key]);
  }
}

/**
 * Recursively clones a protocol value, keeping its shape and the active tag of
 * every union. Strings go through `cloner`, so the same walk copies into a
 * long-lived intern store or into a throwaway one.
 */
export function deepClone<T>(
  schema: Schema<T>,
  value: T,
  cloner: StringCloner = copyStrings,
): T {
  return schema.clone(value, cloner);
}

export function deepCloneJson(
  value: JsonValue,
  cloner: StringCloner = copyStrings,
): JsonValue {
  return cloneJson(value, cloner);
}
