export { KeyError, type KeyErrorCode } from './errors.js';
export {
  DID_KEY_PREFIX,
  CURVES,
  parseDidKey,
  formatDidKey,
  keyMultibase,
  publicKeyHex,
  keysEqual,
  isDidKey,
} from './did-key.js';
export {
  SECP256K1_PUB_CODEC,
  P256_PUB_CODEC,
  encodeVarint,
  decodeVarint,
  encodeMultikey,
  decodeMultikey,
} from './multikey.js';
export {
  SIGNATURE_LENGTH,
  base64UrlNoPad,
  decodeSignature,
  encodeSignature,
  verifySignature,
} from './signature.js';
