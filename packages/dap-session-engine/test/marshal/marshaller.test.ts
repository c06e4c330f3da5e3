import { expect } from 'chai';
import * as sinon from 'sinon';
import { MarshalError } from '../../src/errors';
import {
  deepClone,
  deepCloneJson,
  fromValue,
  injectIntoAncestor,
  mergeObject,
  toObject,
  toValue,
} from '../../src/marshal/marshaller';
import {
  Infer,
  Schema,
  StringCloner,
  enumeration,
  float,
  integer,
  json,
  list,
  optional,
  string,
  struct,
  union,
} from '../../src/marshal/schema';
import { JsonObject, isJsonObject, toJsonValue } from '../../src/protocol/json';

describe('Marshaller', () => {
  const target = union({
    none: null,
    pid: integer(),
    name: string(),
  });

  const launchLike = struct({
    name: string(),
    count: optional(integer()),
    mode: enumeration('fast', 'slow'),
    target,
  });

  describe('toObject', () => {
    it('writes field names verbatim and absent optionals as null', () => {
      const object = toObject(launchLike, {
        name: 'job',
        mode: 'fast',
        target: { tag: 'none' },
      });

      expect(object).to.deep.equal({
        name: 'job',
        count: null,
        mode: 'fast',
        target: 'none',
      });
      expect(Object.keys(object)).to.deep.equal([
        'name',
        'count',
        'mode',
        'target',
      ]);
    });

    it('encodes a data-carrying union branch in place of the union', () => {
      const object = toObject(launchLike, {
        name: 'job',
        count: 2,
        mode: 'slow',
        target: { tag: 'pid', value: 42 },
      });

      expect(object.target).to.equal(42);
      expect(object.count).to.equal(2);
    });

    it('encodes an absent optional root as an empty object', () => {
      expect(toObject(optional(struct({})), undefined)).to.deep.equal({});
    });

    it('rejects a root that does not encode to an object', () => {
      expect(() => toObject(integer(), 3))
        .to.throw(MarshalError)
        .with.property('code', 'NotAnObject');
    });

    it('rejects a union value without an active tag', () => {
      const loose: Schema<unknown> = target;

      expect(() => toValue(loose, { kind: 'pid' }))
        .to.throw(MarshalError)
        .with.property('code', 'UntaggedUnion');
    });

    it('rejects values that have no wire form', () => {
      const anyJson: Schema<unknown> = json();

      expect(() => toValue(anyJson, { run: () => 1 }))
        .to.throw(MarshalError)
        .with.property('path', '$.run');
      expect(() => toValue(float(), Number.NaN))
        .to.throw(MarshalError)
        .with.property('code', 'UnsupportedShape');
    });

    it('copies a pre-built generic value through', () => {
      const withPayload = struct({ payload: json() });
      const object = toObject(withPayload, {
        payload: { nested: [1, 'two', { three: true }] },
      });

      expect(object).to.deep.equal({
        payload: { nested: [1, 'two', { three: true }] },
      });
    });
  });

  describe('fromValue', () => {
    it('omits absent optionals and ignores unknown keys', () => {
      const value = fromValue(launchLike, {
        name: 'job',
        count: null,
        mode: 'slow',
        target: 7,
        extra: 'ignored',
      });

      expect(value).to.deep.equal({
        name: 'job',
        mode: 'slow',
        target: { tag: 'pid', value: 7 },
      });
    });

    it('tries union branches in declaration order', () => {
      expect(fromValue(target, 'none')).to.deep.equal({ tag: 'none' });
      expect(fromValue(target, 'main')).to.deep.equal({
        tag: 'name',
        value: 'main',
      });
    });

    it('reports the path of a mismatched field', () => {
      let caught: unknown;
      try {
        fromValue(launchLike, { name: 5, mode: 'fast', target: 1 });
      } catch (e: unknown) {
        caught = e;
      }

      expect(caught).to.be.instanceOf(MarshalError);
      expect(caught).to.have.property('code', 'TypeMismatch');
      expect(caught).to.have.property('path', '$.name');
      expect(caught).to.have.property(
        'message',
        'Expected string, found integer (at $.name)',
      );
    });

    it('indexes list elements in the path', () => {
      expect(() => fromValue(list(integer()), [1, 2.5], '$.items'))
        .to.throw(MarshalError)
        .with.property('path', '$.items[1]');
    });
  });

  describe('injectIntoAncestor', () => {
    let request: JsonObject;

    beforeEach(() => {
      request = {
        seq: 1,
        arguments: { adapterID: 'test-adapter', nested: { depth: 1 } },
      };
    });

    it('sets a key on the object at the ancestor path', () => {
      injectIntoAncestor(request, 'arguments.nested', 'extra', true);

      expect(request.arguments).to.deep.equal({
        adapterID: 'test-adapter',
        nested: { depth: 1, extra: true },
      });
    });

    it('targets the root for an empty path', () => {
      injectIntoAncestor(request, '', 'seq', 9);

      expect(request.seq).to.equal(9);
    });

    it('fails on a missing ancestor', () => {
      expect(() => injectIntoAncestor(request, 'arguments.missing', 'k', 1))
        .to.throw(MarshalError)
        .with.property('path', '$.arguments.missing');
    });

    it('fails on an ancestor that is not an object', () => {
      expect(() => injectIntoAncestor(request, 'seq', 'k', 1))
        .to.throw(MarshalError)
        .with.property('code', 'AncestorIsNotAnObject');
    });
  });

  describe('mergeObject', () => {
    it('overwrites and adds keys at the root', () => {
      const object: JsonObject = { a: 1, b: 'keep' };

      mergeObject(object, { a: 'over', c: null });

      expect(object).to.deep.equal({ a: 'over', b: 'keep', c: null });
    });

    it('merges under a path', () => {
      const object: JsonObject = { arguments: { program: 'app' } };

      mergeObject(object, { stopOnEntry: true }, 'arguments');

      expect(object).to.deep.equal({
        arguments: { program: 'app', stopOnEntry: true },
      });
    });

    it('does nothing for an empty extra, even when the path is missing', () => {
      const object: JsonObject = {};

      expect(() => mergeObject(object, {}, 'arguments')).to.not.throw();
      expect(object).to.deep.equal({});
    });
  });

  describe('__proto__ keys', () => {
    const raw = '{"__proto__":{"polluted":true},"a":1}';

    function parsed(): JsonObject {
      const value = toJsonValue(JSON.parse(raw));
      if (!isJsonObject(value)) throw new Error('expected an object');
      return value;
    }

    it('keeps the key as a field when narrowing parsed JSON', () => {
      const value = parsed();

      expect(Object.keys(value)).to.deep.equal(['__proto__', 'a']);
      expect(Object.getPrototypeOf(value)).to.equal(Object.prototype);
      expect(JSON.stringify(value)).to.equal(raw);
    });

    it('keeps the key through clones, encoding and merges', () => {
      const merged: JsonObject = {};
      mergeObject(merged, parsed());

      expect(JSON.stringify(deepCloneJson(parsed()))).to.equal(raw);
      expect(JSON.stringify(toValue(json(), parsed()))).to.equal(raw);
      expect(JSON.stringify(merged)).to.equal(raw);
      expect(Object.getPrototypeOf(merged)).to.equal(Object.prototype);
    });
  });

  describe('deepClone', () => {
    it('yields an equal value that shares no structure', () => {
      const original: Infer<typeof launchLike> = {
        name: 'job',
        count: 3,
        mode: 'fast',
        target: { tag: 'name', value: 'main' },
      };

      const cloned = deepClone(launchLike, original);

      expect(cloned).to.deep.equal(original);
      expect(cloned).to.not.equal(original);
      expect(cloned.target).to.not.equal(original.target);
    });

    it('round-trips through the generic tree', () => {
      const original = fromValue(launchLike, {
        name: 'job',
        mode: 'slow',
        target: 'none',
      });

      const roundTripped = fromValue(launchLike, toObject(launchLike, original));

      expect(deepClone(launchLike, roundTripped)).to.deep.equal(original);
    });

    it('passes every string, generic keys included, through the cloner', () => {
      const schema = struct({
        name: string(),
        tags: list(string()),
        meta: json(),
      });
      const cloneString = sinon.spy((value: string) => value.toUpperCase());
      const cloner: StringCloner = { cloneString };

      const cloned = deepClone(
        schema,
        { name: 'a', tags: ['x', 'y'], meta: { k: 'v', n: [1, 'z'] } },
        cloner,
      );

      expect(cloned).to.deep.equal({
        name: 'A',
        tags: ['X', 'Y'],
        meta: { K: 'V', N: [1, 'Z'] },
      });
      expect(cloneString.callCount).to.equal(7);
    });
  });
});
