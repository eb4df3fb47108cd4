export { canonicalEncode, canonicalDecode, toCanonicalValue, compareMapKeys } from './canonical.js';
export { toJsonOperation, toUnsignedJsonOperation, type UnsignedJsonOperation } from './wire.js';
export {
  BASE32_PREFIX,
  base32Lower,
  CidError,
  unsignedOperationBytes,
  signedOperationBytes,
  computeCid,
  cidForOperation,
  parseCid,
  isCid,
  compareCids,
} from './cid.js';
export { DID_PLC_PREFIX, DID_PLC_PATTERN, deriveDid, isPlcDid } from './did.js';
