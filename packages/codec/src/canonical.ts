/**
 * Canonical serialization: deterministic CBOR.
 *
 * Rules:
 *   1. Map keys ordered by encoded length, then bytewise (DAG-CBOR order)
 *   2. Integers only; floats are rejected
 *   3. Arrays keep caller order
 *   4. Fields whose value is `undefined` are dropped
 */

import { Encoder } from 'cbor-x';

const encoder = new Encoder({
  structuredClone: false,
  useRecords: false,
  mapsAsObjects: true,
  pack: false,
  variableMapSize: true,
});

const utf8 = new TextEncoder();

export function compareMapKeys(a: string, b: string): number {
  const left = utf8.encode(a);
  const right = utf8.encode(b);
  if (left.length !== right.length) return left.length - right.length;
  for (let i = 0; i < left.length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Rebuild `value` with every object turned into a `Map` in canonical key order.
 * Maps keep their order when encoded, whatever the keys look like.
 */
export function toCanonicalValue(value: unknown): unknown {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new TypeError(`Canonical encoding only supports safe integers, got ${value}`);
    }
    return value;
  }
  if (Array.isArray(value)) return value.map(toCanonicalValue);
  if (typeof value === 'object' && isPlainObject(value)) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => compareMapKeys(a, b));
    return new Map(entries.map(([k, v]) => [k, toCanonicalValue(v)]));
  }
  throw new TypeError(`Cannot canonically encode a value of type ${typeof value}`);
}

/**
 * Canonical encode: order keys, then CBOR encode.
 * Structurally equal inputs always produce identical bytes.
 */
export function canonicalEncode(value: unknown): Uint8Array {
  return encoder.encode(toCanonicalValue(value));
}

export function canonicalDecode(bytes: Uint8Array): unknown {
  return encoder.decode(bytes);
}
