import { sha256 } from '@noble/hashes/sha256';
import { utils } from '@scure/base';
import type { Key } from '@plclog/types';
import { CURVES } from './did-key.js';

/** Compact `r || s` signatures are 64 bytes on both supported curves. */
export const SIGNATURE_LENGTH = 64;

/** RFC 4648 base64url without padding; leftover bits must be zero. */
export const base64UrlNoPad = utils.chain(
  utils.radix2(6),
  utils.alphabet('ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_'),
  utils.join(''),
);

/**
 * Decode the `sig` field of an operation.
 * Padded or otherwise non-canonical text is not accepted as a signature.
 */
export function decodeSignature(sig: string): Uint8Array | undefined {
  let bytes: Uint8Array;
  try {
    bytes = base64UrlNoPad.decode(sig);
  } catch {
    return undefined;
  }
  return bytes.length === SIGNATURE_LENGTH ? bytes : undefined;
}

export function encodeSignature(signature: Uint8Array): string {
  return base64UrlNoPad.encode(signature);
}

/**
 * Verify a compact ECDSA signature over SHA-256(message).
 *
 * Signatures with a high S value are rejected on every curve, so each
 * operation has exactly one valid signature per key. Never throws.
 */
export function verifySignature(key: Key, message: Uint8Array, signature: Uint8Array): boolean {
  if (key.algorithm === 'unknown' || signature.length !== SIGNATURE_LENGTH) {
    return false;
  }

  const curve = CURVES[key.algorithm];
  try {
    const sig = curve.Signature.fromCompact(signature);
    if (sig.hasHighS()) return false;
    return curve.verify(sig, sha256(message), key.publicKey, { lowS: true });
  } catch {
    return false;
  }
}
