export type KeyAlgorithm = 'secp256k1' | 'p256';

/** A public key on one of the curves the verifier understands. */
export interface KnownKey {
  readonly algorithm: KeyAlgorithm;
  /** Encoded curve point, as it appeared in the multikey body */
  readonly publicKey: Uint8Array;
}

/**
 * A well-formed multikey whose codec is not recognised.
 * Kept verbatim so that it can be re-encoded; it never verifies anything.
 */
export interface UnknownKey {
  readonly algorithm: 'unknown';
  /** Multicodec code of the key type */
  readonly codec: number;
  readonly publicKey: Uint8Array;
}

export type Key = KnownKey | UnknownKey;

export function isKnownKey(key: Key): key is KnownKey {
  return key.algorithm !== 'unknown';
}
