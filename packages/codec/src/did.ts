import { sha256 } from '@noble/hashes/sha256';
import type { Operation } from '@plclog/types';
import { base32Lower, signedOperationBytes } from './cid.js';

export const DID_PLC_PREFIX = 'did:plc:';
export const DID_PLC_PATTERN = /^did:plc:[a-z2-7]{24}$/;

/** An identity is named by the truncated hash of its signed genesis operation. */
export function deriveDid(genesis: Operation): string {
  const hash = sha256(signedOperationBytes(genesis));
  return DID_PLC_PREFIX + base32Lower.encode(hash).slice(0, 24);
}

export function isPlcDid(value: string): boolean {
  return DID_PLC_PATTERN.test(value);
}
