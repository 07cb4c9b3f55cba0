/**
 * Snapshot Encoders
 *
 * Byte formats used by EncodedSnapshotStore backends.
 */

import { deserialize, serialize } from 'v8';
import { DecodeError, errorMessage } from '../utils/errors';
import { isVariableMapping, type SnapshotEncoder, type VariableMapping } from './types';

const V8_MAGIC = Buffer.from('CKPT', 'ascii');
const V8_FORMAT_VERSION = 1;
const V8_HEADER_LENGTH = V8_MAGIC.length + 1;

/**
 * Structured-clone encoder.
 *
 * Handles everything the V8 serializer does: nested objects and arrays,
 * Map, Set, Date, RegExp, BigInt, typed arrays, and shared or circular
 * references. Functions and symbols cannot be encoded. Class instances come
 * back as plain objects.
 */
export const v8Encoder: SnapshotEncoder = {
  format: 'v8',

  encode(mapping: VariableMapping): Uint8Array {
    const payload = serialize(mapping);
    return Buffer.concat([V8_MAGIC, Buffer.from([V8_FORMAT_VERSION]), payload]);
  },

  decode(data: Uint8Array): VariableMapping {
    if (data.length < V8_HEADER_LENGTH || !V8_MAGIC.equals(data.subarray(0, V8_MAGIC.length))) {
      throw new DecodeError('Not a v8 snapshot: missing header');
    }

    const version = data[V8_MAGIC.length];
    if (version !== V8_FORMAT_VERSION) {
      throw new DecodeError(`Unsupported v8 snapshot version: ${version}`);
    }

    let decoded: unknown;
    try {
      decoded = deserialize(data.subarray(V8_HEADER_LENGTH));
    } catch (error) {
      throw new DecodeError(`Corrupt v8 snapshot: ${errorMessage(error)}`, { cause: error });
    }

    if (!isVariableMapping(decoded)) {
      throw new DecodeError('Decoded v8 snapshot is not a variable mapping');
    }
    return decoded;
  },
};

/**
 * UTF-8 JSON encoder, for human-readable snapshots of JSON-safe data.
 *
 * Only plain objects, arrays, strings, finite numbers, booleans and null are
 * accepted, so a snapshot always decodes to the mapping that was saved.
 * Anything else (Map, Set, Date, class instances, `undefined`, NaN,
 * BigInt, functions, circular references) is rejected at encode time.
 */
export const jsonEncoder: SnapshotEncoder = {
  format: 'json',

  encode(mapping: VariableMapping): Uint8Array {
    const text = JSON.stringify(
      mapping,
      function (this: Record<string, unknown>, key: string, value: unknown) {
        // `value` has already been through toJSON(); check what is actually stored
        assertJsonSafe(this[key], key);
        return value;
      }
    );
    return Buffer.from(text, 'utf-8');
  },

  decode(data: Uint8Array): VariableMapping {
    let decoded: unknown;
    try {
      const text = new TextDecoder('utf-8', { fatal: true }).decode(data);
      decoded = JSON.parse(text);
    } catch (error) {
      throw new DecodeError(`Corrupt JSON snapshot: ${errorMessage(error)}`, { cause: error });
    }

    if (!isVariableMapping(decoded)) {
      throw new DecodeError('Decoded JSON snapshot is not a variable mapping');
    }
    return decoded;
  },
};

function assertJsonSafe(raw: unknown, key: string): void {
  switch (typeof raw) {
    case 'string':
    case 'boolean':
      return;
    case 'number':
      if (!Number.isFinite(raw)) {
        throw new TypeError(`Cannot encode non-finite number ${raw} at key '${key}' as JSON`);
      }
      return;
    case 'object': {
      if (raw === null) {
        return;
      }
      const proto: unknown = Object.getPrototypeOf(raw);
      if (proto !== Object.prototype && proto !== Array.prototype && proto !== null) {
        const kind = raw.constructor.name || 'object';
        throw new TypeError(`Cannot encode ${kind} at key '${key}' as JSON`);
      }
      return;
    }
    default:
      throw new TypeError(`Cannot encode ${typeof raw} at key '${key}' as JSON`);
  }
}

/**
 * Look up a built-in encoder by format name
 */
export function getEncoder(format: 'v8' | 'json'): SnapshotEncoder {
  return format === 'json' ? jsonEncoder : v8Encoder;
}
