import { sha256 } from '@noble/hashes/sha256';
import type { Key, KeyAlgorithm } from '@plclog/types';
import { CURVES, encodeSignature, formatDidKey } from '@plclog/keys';

/**
 * A throwaway keypair for building signed test logs.
 * Private material never leaves this object.
 */
export class TestKeypair {
  readonly key: Key;

  private constructor(
    readonly algorithm: KeyAlgorithm,
    private readonly privateKey: Uint8Array,
  ) {
    this.key = { algorithm, publicKey: CURVES[algorithm].getPublicKey(privateKey, true) };
  }

  static generate(algorithm: KeyAlgorithm = 'p256'): TestKeypair {
    return new TestKeypair(algorithm, CURVES[algorithm].utils.randomPrivateKey());
  }

  get didKey(): string {
    return formatDidKey(this.key);
  }

  /** Compact low-S signature over SHA-256(message). */
  sign(message: Uint8Array): Uint8Array {
    return CURVES[this.algorithm].sign(sha256(message), this.privateKey, { lowS: true }).toCompactRawBytes();
  }

  /** The high-S twin of `sign`, which verifies mathematically but is not canonical. */
  signHighS(message: Uint8Array): Uint8Array {
    const curve = CURVES[this.algorithm];
    const sig = curve.Signature.fromCompact(this.sign(message));
    return new curve.Signature(sig.r, curve.CURVE.n - sig.s).toCompactRawBytes();
  }

  signToString(message: Uint8Array): string {
    return encodeSignature(this.sign(message));
  }

  toJSON(): string {
    return `[TestKeypair ${this.didKey}]`;
  }
}
