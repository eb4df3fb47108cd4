import { secp256k1 } from '@noble/curves/secp256k1';
import { p256 } from '@noble/curves/p256';
import { bytesToHex } from '@noble/hashes/utils';
import type { Key, KeyAlgorithm } from '@plclog/types';
import { KeyError } from './errors.js';
import { P256_PUB_CODEC, SECP256K1_PUB_CODEC, decodeMultikey, encodeMultikey } from './multikey.js';

export const DID_KEY_PREFIX = 'did:key:';

const CODEC_BY_ALGORITHM: Record<KeyAlgorithm, number> = {
  secp256k1: SECP256K1_PUB_CODEC,
  p256: P256_PUB_CODEC,
};

export const CURVES = { secp256k1, p256 } as const;

function algorithmForCodec(codec: number): KeyAlgorithm | undefined {
  switch (codec) {
    case SECP256K1_PUB_CODEC:
      return 'secp256k1';
    case P256_PUB_CODEC:
      return 'p256';
    default:
      return undefined;
  }
}

/**
 * Parse a `did:key` string into a typed key.
 *
 * Keys with an unrecognised multicodec come back as the `unknown` variant.
 * Throws `KeyError` when the prefix or the codec tag is missing or malformed,
 * or when a recognised key is not a point on its curve.
 */
export function parseDidKey(didKey: string): Key {
  if (!didKey.startsWith(DID_KEY_PREFIX)) {
    throw new KeyError('UnsupportedAlgorithm', `Not a did:key: ${didKey}`);
  }

  const { codec, keyBytes } = decodeMultikey(didKey.slice(DID_KEY_PREFIX.length));
  const algorithm = algorithmForCodec(codec);

  if (!algorithm) {
    return { algorithm: 'unknown', codec, publicKey: keyBytes };
  }

  try {
    CURVES[algorithm].ProjectivePoint.fromHex(keyBytes);
  } catch {
    throw new KeyError('InvalidPublicKey', `Key is not a valid ${algorithm} point: ${didKey}`);
  }

  return { algorithm, publicKey: keyBytes };
}

export function formatDidKey(key: Key): string {
  const codec = key.algorithm === 'unknown' ? key.codec : CODEC_BY_ALGORITHM[key.algorithm];
  return DID_KEY_PREFIX + encodeMultikey(codec, key.publicKey);
}

/** The multibase form used as `publicKeyMultibase` in DID documents. */
export function keyMultibase(key: Key): string {
  return formatDidKey(key).slice(DID_KEY_PREFIX.length);
}

/** Raw key bytes as hex, for display next to unrecognised keys. */
export function publicKeyHex(key: Key): string {
  return bytesToHex(key.publicKey);
}

export function keysEqual(a: Key, b: Key): boolean {
  return formatDidKey(a) === formatDidKey(b);
}

export function isDidKey(value: string): boolean {
  try {
    parseDidKey(value);
    return true;
  } catch {
    return false;
  }
}
