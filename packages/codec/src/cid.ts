import { sha256 } from '@noble/hashes/sha256';
import { utils } from '@scure/base';
import { createCid, type Cid, type Operation } from '@plclog/types';
import { canonicalEncode } from './canonical.js';
import { toJsonOperation, toUnsignedJsonOperation } from './wire.js';

/** CIDv1 header: version 1, dag-cbor codec (0x71), sha2-256 multihash (0x12) of 32 bytes. */
const CID_HEADER = Uint8Array.from([0x01, 0x71, 0x12, 0x20]);
const CID_LENGTH = CID_HEADER.length + 32;

/** Multibase prefix for base32 lower without padding. */
export const BASE32_PREFIX = 'b';

export const base32Lower = utils.chain(
  utils.radix2(5),
  utils.alphabet('abcdefghijklmnopqrstuvwxyz234567'),
  utils.join(''),
);

export class CidError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CidError';
  }
}

/** Signed message and CID pre-image of an operation. */
export function unsignedOperationBytes(op: Operation): Uint8Array {
  return canonicalEncode(toUnsignedJsonOperation(op));
}

/** Canonical encoding including the signature. */
export function signedOperationBytes(op: Operation): Uint8Array {
  return canonicalEncode(toJsonOperation(op));
}

export function computeCid(bytes: Uint8Array): Cid {
  const cid = new Uint8Array(CID_LENGTH);
  cid.set(CID_HEADER, 0);
  cid.set(sha256(bytes), CID_HEADER.length);
  return createCid(BASE32_PREFIX + base32Lower.encode(cid));
}

export function cidForOperation(op: Operation): Cid {
  return computeCid(unsignedOperationBytes(op));
}

/** Decode a CID text form; only CIDv1 dag-cbor sha2-256 in base32 lower is accepted. */
export function parseCid(text: string): Uint8Array {
  if (!text.startsWith(BASE32_PREFIX)) {
    throw new CidError(`CID is not base32 multibase: ${text}`);
  }

  let bytes: Uint8Array;
  try {
    bytes = base32Lower.decode(text.slice(BASE32_PREFIX.length));
  } catch (err) {
    throw new CidError(`CID is not valid base32: ${(err as Error).message}`);
  }

  if (bytes.length !== CID_LENGTH || !CID_HEADER.every((b, i) => bytes[i] === b)) {
    throw new CidError(`CID is not a dag-cbor sha2-256 CIDv1: ${text}`);
  }
  return bytes;
}

export function isCid(text: string): text is Cid {
  try {
    parseCid(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Total order over CIDs: lexicographic over their binary form (version,
 * codec, multihash), not over the base32 text. The two orders can differ,
 * since the base32 digits `2`-`7` encode values above the letters yet sort
 * before them as characters.
 */
export function compareCids(a: Cid, b: Cid): number {
  const left = parseCid(a);
  const right = parseCid(b);
  for (let i = 0; i < CID_LENGTH; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}
