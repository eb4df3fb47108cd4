import type { Key } from './keys.js';

/** Opaque branded type for content identifiers in their text form */
export type Cid = string & { readonly __brand: 'Cid' };

export function createCid(cid: string): Cid {
  return cid as Cid;
}

export interface Service {
  readonly type: string;
  readonly endpoint: string;
}

/** The identity fields carried by every non-tombstone operation. */
export interface OperationPayload {
  /** Ordered by authority: index 0 may override every other key */
  readonly rotationKeys: readonly Key[];
  readonly verificationMethods: Readonly<Record<string, Key>>;
  readonly alsoKnownAs: readonly string[];
  readonly services: Readonly<Record<string, Service>>;
}

export interface PlcOperation extends OperationPayload {
  readonly type: 'plc_operation';
  /** `null` marks a genesis operation */
  readonly prev: Cid | null;
  readonly sig: string;
}

export interface TombstoneOperation {
  readonly type: 'plc_tombstone';
  readonly prev: Cid;
  readonly sig: string;
}

/** Genesis format used by the earliest identities. */
export interface LegacyCreateOperation {
  readonly type: 'create';
  readonly signingKey: Key;
  readonly recoveryKey: Key;
  readonly handle: string;
  readonly service: string;
  readonly prev: null;
  readonly sig: string;
}

export type Operation = PlcOperation | TombstoneOperation | LegacyCreateOperation;

export type OperationKind = 'genesis' | 'update' | 'tombstone';

export function operationKind(op: Operation): OperationKind {
  if (op.type === 'plc_tombstone') return 'tombstone';
  return op.prev === null ? 'genesis' : 'update';
}

/** One record of a directory audit log, after shape validation. */
export interface LogEntry {
  readonly did?: string;
  readonly operation: Operation;
  /** CID the log source claims for the operation */
  readonly cid?: Cid;
  readonly createdAt: string;
  /** Whether the log source considers this operation superseded */
  readonly nullified: boolean;
}

/** Wire form of operations, as decoded from JSON. Keys are `did:key` strings. */
export interface JsonPlcOperation {
  readonly type: 'plc_operation';
  readonly rotationKeys: readonly string[];
  readonly verificationMethods: Readonly<Record<string, string>>;
  readonly alsoKnownAs: readonly string[];
  readonly services: Readonly<Record<string, Service>>;
  readonly prev: string | null;
  readonly sig: string;
}

export interface JsonTombstoneOperation {
  readonly type: 'plc_tombstone';
  readonly prev: string;
  readonly sig: string;
}

export interface JsonLegacyCreateOperation {
  readonly type: 'create';
  readonly signingKey: string;
  readonly recoveryKey: string;
  readonly handle: string;
  readonly service: string;
  readonly prev: null;
  readonly sig: string;
}

export type JsonOperation = JsonPlcOperation | JsonTombstoneOperation | JsonLegacyCreateOperation;

export interface JsonLogEntry {
  readonly did: string;
  readonly operation: JsonOperation;
  readonly cid: string;
  readonly nullified: boolean;
  readonly createdAt: string;
}
