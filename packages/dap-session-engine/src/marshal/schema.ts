import { MarshalError } from '../errors';
import {
  JsonObject,
  JsonValue,
  isJsonArray,
  isJsonObject,
  jsonKind,
  setField,
} from '../protocol/json';

/**
 * Strategy used by {@link Schema.clone} to copy every string it meets, keys of
 * generic objects included.
 */
export interface StringCloner {
  cloneString(value: string): string;
}

export const copyStrings: StringCloner = {
  cloneString: (value) => value,
};

export type SchemaKind =
  | 'bool'
  | 'integer'
  | 'float'
  | 'string'
  | 'enum'
  | 'optional'
  | 'list'
  | 'struct'
  | 'union'
  | 'json';

/**
 * Visitor for one protocol type: how to write it into the generic tree, read it
 * back, and deep-clone it.
 */
export interface Schema<T> {
  readonly kind: SchemaKind;
  encode(value: T, path: string): JsonValue;
  decode(value: JsonValue | undefined, path: string): T;
  clone(value: T, cloner: StringCloner): T;
}

export type Infer<S> = S extends Schema<infer T> ? T : never;

type Simplify<T> = { [K in keyof T]: T[K] } & {};

type FieldSchemas = Record<string, Schema<unknown>>;

export type StructValue<F extends FieldSchemas> = Simplify<
  {
    [K in keyof F as undefined extends Infer<F[K]> ? never : K]: Infer<F[K]>;
  } & {
    [K in keyof F as undefined extends Infer<F[K]> ? K : never]?: Exclude<
      Infer<F[K]>,
      undefined
    >;
  }
>;

/** A tagged union member that carries data. */
export interface Tagged<K extends string, V> {
  readonly tag: K;
  readonly value: V;
}

/** A tagged union member without data; encodes as its tag name. */
export interface Tag<K extends string> {
  readonly tag: K;
}

type BranchSchemas = Record<string, Schema<unknown> | null>;

export type UnionValue<B extends BranchSchemas> = {
  [K in keyof B & string]: B[K] extends Schema<infer V> ? Tagged<K, V> : Tag<K>;
}[keyof B & string];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mismatch(path: string, expected: string, got: JsonValue | undefined): MarshalError {
  const found = got === undefined ? 'nothing' : jsonKind(got);
  return new MarshalError('TypeMismatch', path, `Expected ${expected}, found ${found}`);
}

function unsupported(path: string, value: unknown): MarshalError {
  const shape = Array.isArray(value) ? 'array' : typeof value;
  return new MarshalError(
    'UnsupportedShape',
    path,
    `Value of shape '${shape}' cannot be marshalled here`,
  );
}

function child(path: string, key: string | number): string {
  return typeof key === 'number' ? `${path}[${key}]` : `${path}.${key}`;
}

export function bool(): Schema<boolean> {
  return {
    kind: 'bool',
    encode(value, path) {
      if (typeof value !== 'boolean') throw unsupported(path, value);
      return value;
    },
    decode(value, path) {
      if (typeof value !== 'boolean') throw mismatch(path, 'bool', value);
      return value;
    },
    clone: (value) => value,
  };
}

export function integer(): Schema<number> {
  return {
    kind: 'integer',
    encode(value, path) {
      if (!Number.isInteger(value)) throw unsupported(path, value);
      return value;
    },
    decode(value, path) {
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw mismatch(path, 'integer', value);
      }
      return value;
    },
    clone: (value) => value,
  };
}

export function float(): Schema<number> {
  return {
    kind: 'float',
    encode(value, path) {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw unsupported(path, value);
      }
      return value;
    },
    decode(value, path) {
      if (typeof value !== 'number') throw mismatch(path, 'float', value);
      return value;
    },
    clone: (value) => value,
  };
}

export function string(): Schema<string> {
  return {
    kind: 'string',
    encode(value, path) {
      if (typeof value !== 'string') throw unsupported(path, value);
      return value;
    },
    decode(value, path) {
      if (typeof value !== 'string') throw mismatch(path, 'string', value);
      return value;
    },
    clone: (value, cloner) => cloner.cloneString(value),
  };
}

/**
 * Closed set of names. Members are plain strings in both forms.
 */
export function enumeration<E extends string>(...members: E[]): Schema<E> {
  const find = (value: unknown): E | undefined =>
    members.find((member) => member === value);
  return {
    kind: 'enum',
    encode(value, path) {
      const member = find(value);
      if (member === undefined) {
        throw new MarshalError(
          'UnsupportedShape',
          path,
          `'${String(value)}' is not one of ${members.join(', ')}`,
        );
      }
      return member;
    },
    decode(value, path) {
      const member = find(value);
      if (member === undefined) {
        throw mismatch(path, `one of ${members.join(', ')}`, value);
      }
      return member;
    },
    // enum members are compile-time names, never copied
    clone: (value) => value,
  };
}

/**
 * Absent values encode as null; null and a missing key decode as absent.
 */
export function optional<T>(inner: Schema<T>): Schema<T | undefined> {
  return {
    kind: 'optional',
    encode(value, path) {
      return value === undefined || value === null
        ? null
        : inner.encode(value, path);
    },
    decode(value, path) {
      return value === undefined || value === null
        ? undefined
        : inner.decode(value, path);
    },
    clone(value, cloner) {
      return value === undefined ? undefined : inner.clone(value, cloner);
    },
  };
}

/**
 * Slice of non-string elements.
 */
export function list<T>(element: Schema<T>): Schema<T[]> {
  return {
    kind: 'list',
    encode(value, path) {
      if (!Array.isArray(value)) throw unsupported(path, value);
      return value.map((item, i) => element.encode(item, child(path, i)));
    },
    decode(value, path) {
      if (!isJsonArray(value)) throw mismatch(path, 'array', value);
      return value.map((item, i) => element.decode(item, child(path, i)));
    },
    clone(value, cloner) {
      return value.map((item) => element.clone(item, cloner));
    },
  };
}

/**
 * Record with a fixed set of fields. Field names become object keys
 * verbatim, in declaration order; unknown keys are ignored when decoding.
 */
export function struct<F extends FieldSchemas>(
  fields: F,
): Schema<StructValue<F>> {
  const entries: Array<[string, Schema<unknown>]> = Object.entries(fields);
  return {
    kind: 'struct',
    encode(value: unknown, path) {
      if (!isRecord(value)) throw unsupported(path, value);
      const object: JsonObject = {};
      for (const [name, schema] of entries) {
        object[name] = schema.encode(value[name], child(path, name));
      }
      return object;
    },
    decode(value, path) {
      if (!isJsonObject(value)) throw mismatch(path, 'object', value);
      const decoded: Record<string, unknown> = {};
      for (const [name, schema] of entries) {
        const field = schema.decode(value[name], child(path, name));
        if (field !== undefined) decoded[name] = field;
      }
      // the loop above wrote exactly the fields F describes
      return decoded as StructValue<F>;
    },
    clone(value: unknown, cloner) {
      if (!isRecord(value)) throw unsupported('$', value);
      const cloned: Record<string, unknown> = {};
      for (const [name, schema] of entries) {
        if (!Object.prototype.hasOwnProperty.call(value, name)) continue;
        cloned[name] = schema.clone(value[name], cloner);
      }
      return cloned as StructValue<F>;
    },
  };
}

/**
 * Tagged union. A branch mapped to `null` carries no data and encodes as its
 * tag name; any other branch encodes its payload directly in place of the
 * union. Decoding tries branches in declaration order.
 */
export function union<B extends BranchSchemas>(
  branches: B,
): Schema<UnionValue<B>> {
  const entries: Array<[string, Schema<unknown> | null]> =
    Object.entries(branches);

  const activeBranch = (
    value: unknown,
    path: string,
  ): [string, Schema<unknown> | null] => {
    const tag = isRecord(value) ? value.tag : undefined;
    const found = entries.find(([name]) => name === tag);
    if (!found) {
      throw new MarshalError(
        'UntaggedUnion',
        path,
        `Union value has no active tag among ${entries.map(([name]) => name).join(', ')}`,
      );
    }
    return found;
  };

  const payload = (value: unknown): unknown =>
    isRecord(value) ? value.value : undefined;

  return {
    kind: 'union',
    encode(value, path) {
      const [tag, schema] = activeBranch(value, path);
      return schema === null ? tag : schema.encode(payload(value), path);
    },
    decode(value, path) {
      for (const [tag, schema] of entries) {
        if (schema === null) {
          if (value === tag) return { tag } as UnionValue<B>;
          continue;
        }
        try {
          return { tag, value: schema.decode(value, path) } as UnionValue<B>;
        } catch (error) {
          if (!(error instanceof MarshalError)) throw error;
        }
      }
      throw mismatch(
        path,
        `a member of union (${entries.map(([tag]) => tag).join(' | ')})`,
        value,
      );
    },
    clone(value, cloner) {
      const [tag, schema] = activeBranch(value, '$');
      if (schema === null) return { tag } as UnionValue<B>;
      return {
        tag,
        value: schema.clone(payload(value), cloner),
      } as UnionValue<B>;
    },
  };
}

/**
 * Deep copy of a generic value, every string and key passed through `cloner`.
 */
export function cloneJson(value: JsonValue, cloner: StringCloner): JsonValue {
  if (typeof value === 'string') return cloner.cloneString(value);
  if (isJsonArray(value)) return value.map((item) => cloneJson(item, cloner));
  if (isJsonObject(value)) {
    const cloned: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      setField(cloned, cloner.cloneString(key), cloneJson(item, cloner));
    }
    return cloned;
  }
  return value;
}

function checkJson(value: unknown, path: string): JsonValue {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw unsupported(path, value);
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, i) => checkJson(item, child(path, i)));
  }
  if (isRecord(value)) {
    const object: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      setField(object, key, checkJson(item, child(path, key)));
    }
    return object;
  }
  throw unsupported(path, value);
}

/**
 * Pre-built generic value, copied verbatim. Nested objects and arrays are
 * cloned recursively.
 */
export function json(): Schema<JsonValue> {
  return {
    kind: 'json',
    encode: (value, path) => checkJson(value, path),
    decode(value, path) {
      if (value === undefined) throw mismatch(path, 'any value', value);
      return cloneJson(value, copyStrings);
    },
    clone: (value, cloner) => cloneJson(value, cloner),
  };
}
