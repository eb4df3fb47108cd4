export {
  ATPROTO_VERIFICATION_METHOD,
  ATPROTO_PDS_SERVICE,
  ATPROTO_PDS_TYPE,
  operationSchema,
  logEntrySchema,
  parseOperation,
  parseLogEntry,
  operationPayload,
  rotationKeysOf,
  type ParsedLogEntry,
} from './operation.js';
export { DEFAULT_RECOVERY_WINDOW_MS, resolveFork, type ForkDecision } from './fork.js';
export { causalOrder, type PendingEntry } from './causal-order.js';
export {
  ChainValidator,
  ChainValidationError,
  findSigner,
  validateChain,
  type ChainValidatorOptions,
} from './validator.js';
export { reduceState, toPlcData, primaryHandle, pdsEndpoint, atprotoSigningKey } from './reducer.js';
export { diffStates } from './diff.js';
export {
  DID_DOCUMENT_CONTEXT,
  buildDidDocument,
  type DidDocument,
  type VerificationMethodEntry,
  type ServiceEntry,
} from './did-document.js';
export { auditLog } from './audit.js';
