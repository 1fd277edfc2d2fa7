/**
 * Value serializer
 *
 * Uses the V8 structured-clone wire format, which round-trips the value's
 * data model exactly: primitives (including undefined, bigint, NaN and -0),
 * Date, RegExp, Map, Set, typed arrays, nested containers and circular
 * references. The format restores only built-in types, so instances of any
 * other class are rejected rather than returned as plain objects.
 */

import { deserialize as v8Deserialize, serialize as v8Serialize } from 'node:v8';

import { SerializationError } from '../lib/errors.js';

// First byte of every V8 serialization header
const VERSION_TAG = 0xff;

const RESTORED_PROTOTYPES = new Set<unknown>([
  Object.prototype,
  Array.prototype,
  Date.prototype,
  RegExp.prototype,
  Map.prototype,
  Set.prototype,
  ArrayBuffer.prototype,
  DataView.prototype,
  Buffer.prototype,
  Int8Array.prototype,
  Uint8Array.prototype,
  Uint8ClampedArray.prototype,
  Int16Array.prototype,
  Uint16Array.prototype,
  Int32Array.prototype,
  Uint32Array.prototype,
  Float32Array.prototype,
  Float64Array.prototype,
  BigInt64Array.prototype,
  BigUint64Array.prototype,
  Boolean.prototype,
  Number.prototype,
  String.prototype,
  BigInt.prototype
]);

function assertRestorable(root: unknown): void {
  const seen = new Set<object>();
  const pending: unknown[] = [root];

  while (pending.length > 0) {
    const value = pending.pop();
    if (typeof value !== 'object' || value === null || seen.has(value)) {
      continue;
    }
    seen.add(value);

    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype !== null && !RESTORED_PROTOTYPES.has(prototype)) {
      const name = typeof value.constructor === 'function' && value.constructor.name ? value.constructor.name : 'unknown';
      throw new SerializationError(`Value is not serializable: instances of ${name} do not round-trip`);
    }

    if (value instanceof Map) {
      for (const [key, entry] of value) {
        pending.push(key, entry);
      }
    } else if (value instanceof Set) {
      for (const entry of value) {
        pending.push(entry);
      }
    } else if (!ArrayBuffer.isView(value)) {
      pending.push(...Object.values(value));
    }
  }
}

export function serialize(value: unknown): Buffer {
  assertRestorable(value);

  try {
    return v8Serialize(value);
  } catch (error) {
    throw new SerializationError('Value is not serializable', { cause: error });
  }
}

export function deserialize(bytes: Buffer): unknown {
  if (bytes.length === 0 || bytes.readUInt8(0) !== VERSION_TAG) {
    throw new SerializationError('Bytes do not hold a serialized value');
  }

  try {
    return v8Deserialize(bytes);
  } catch (error) {
    throw new SerializationError('Bytes do not hold a serialized value', { cause: error });
  }
}
