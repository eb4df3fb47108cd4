import { base58 } from '@scure/base';
import { KeyError } from './errors.js';

/** Multicodec codes of the public key types with curve support. */
export const SECP256K1_PUB_CODEC = 0xe7;
export const P256_PUB_CODEC = 0x1200;

/** Multibase prefix for base58btc. */
export const BASE58BTC_PREFIX = 'z';

const MAX_VARINT_BYTES = 9;

export function encodeVarint(value: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Cannot encode ${value} as an unsigned varint`);
  }

  const bytes: number[] = [];
  let rest = value;
  while (rest >= 0x80) {
    bytes.push((rest % 0x80) | 0x80);
    rest = Math.floor(rest / 0x80);
  }
  bytes.push(rest);
  return Uint8Array.from(bytes);
}

/**
 * Decode an unsigned LEB128 varint from the start of `bytes`.
 * Truncated, over-long and non-minimal encodings are rejected, as are codes
 * beyond `Number.MAX_SAFE_INTEGER`, which could not be re-encoded exactly.
 */
export function decodeVarint(bytes: Uint8Array): { value: number; length: number } {
  let value = 0;
  let factor = 1;

  for (let i = 0; i < bytes.length && i < MAX_VARINT_BYTES; i++) {
    const byte = bytes[i] ?? 0;
    value += (byte & 0x7f) * factor;

    if ((byte & 0x80) === 0) {
      if (byte === 0 && i > 0) {
        throw new KeyError('UnsupportedAlgorithm', 'Multicodec varint is not minimally encoded');
      }
      if (!Number.isSafeInteger(value)) {
        throw new KeyError('UnsupportedAlgorithm', 'Multicodec varint exceeds the supported codec range');
      }
      return { value, length: i + 1 };
    }
    factor *= 0x80;
  }

  throw new KeyError('UnsupportedAlgorithm', 'Multicodec varint is truncated');
}

/** Split a base58btc multibase multikey into its codec and key bytes. */
export function decodeMultikey(multibase: string): { codec: number; keyBytes: Uint8Array } {
  if (!multibase.startsWith(BASE58BTC_PREFIX)) {
    throw new KeyError('UnsupportedAlgorithm', 'Multikey is not base58btc multibase');
  }

  let bytes: Uint8Array;
  try {
    bytes = base58.decode(multibase.slice(BASE58BTC_PREFIX.length));
  } catch (err) {
    throw new KeyError('UnsupportedAlgorithm', `Multikey is not valid base58btc: ${(err as Error).message}`);
  }

  const { value, length } = decodeVarint(bytes);
  return { codec: value, keyBytes: bytes.slice(length) };
}

export function encodeMultikey(codec: number, keyBytes: Uint8Array): string {
  const prefix = encodeVarint(codec);
  const bytes = new Uint8Array(prefix.length + keyBytes.length);
  bytes.set(prefix, 0);
  bytes.set(keyBytes, prefix.length);
  return BASE58BTC_PREFIX + base58.encode(bytes);
}
