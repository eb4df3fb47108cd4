import type { Cid, Operation } from './operation.js';
import type { IdentityState } from './state.js';

export type ValidationErrorCode =
  | 'MalformedOperation'
  | 'SignatureInvalid'
  | 'LinkInvalid'
  | 'AuthorityInvalid'
  | 'RecoveryWindowExpired'
  | 'ChainIncomplete'
  | 'ChainTerminated'
  | 'ForkRejected'
  | 'GenesisInvalid'
  | 'CidMismatch'
  | 'DidMismatch'
  | 'TimestampOutOfOrder'
  | 'DuplicateOperation';

/** Final verdict for one entry of the supplied log. */
export type EntryStatus = 'Accepted' | 'Rejected' | 'Superseded';

export interface AcceptedOperation {
  /** Position of the entry in the supplied log */
  readonly entryIndex: number;
  readonly cid: Cid;
  readonly operation: Operation;
  readonly createdAt: string;
  /** Index of the predecessor's rotation key that signed this operation */
  readonly signerIndex: number;
}

export interface ChainStep extends AcceptedOperation {
  /** Position in the validated chain */
  readonly position: number;
  /** State immediately after this operation */
  readonly state: IdentityState;
}

export interface RejectedEntry {
  readonly entryIndex: number;
  readonly cid?: Cid;
  readonly code: ValidationErrorCode;
  readonly reason: string;
}

export interface SupersededOperation extends AcceptedOperation {
  /** CID of the operation that displaced this one, directly or through an ancestor */
  readonly supersededBy: Cid;
}

export interface EntryVerdict {
  readonly entryIndex: number;
  readonly cid?: Cid;
  readonly status: EntryStatus;
  readonly code?: ValidationErrorCode;
  readonly reason?: string;
}

export interface ValidatedChain {
  readonly did: string;
  readonly steps: readonly ChainStep[];
  readonly state: IdentityState;
  readonly head: Cid;
  readonly rejected: readonly RejectedEntry[];
  readonly superseded: readonly SupersededOperation[];
  readonly verdicts: readonly EntryVerdict[];
}

export interface ChainValidationResult {
  readonly valid: boolean;
  readonly code?: ValidationErrorCode;
  readonly cid?: Cid;
  readonly reason?: string;
  readonly chain?: ValidatedChain;
}

export type AuditFindingKind = 'EntryIncorrectlyNullified' | 'EntryIncorrectlyActive';

export interface AuditFinding {
  readonly kind: AuditFindingKind;
  readonly entryIndex: number;
  readonly cid?: Cid;
  /** What the validator decided for the entry */
  readonly status: EntryStatus;
  /** Why a rejected entry failed */
  readonly code?: ValidationErrorCode;
  readonly reason?: string;
}

export interface AuditReport {
  readonly valid: boolean;
  readonly reason?: string;
  readonly findings: readonly AuditFinding[];
  readonly chain?: ValidatedChain;
}
