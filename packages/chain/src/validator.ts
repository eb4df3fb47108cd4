import type {
  AcceptedOperation,
  ChainStep,
  ChainValidationResult,
  Cid,
  EntryVerdict,
  Key,
  Operation,
  RejectedEntry,
  SupersededOperation,
  ValidatedChain,
  ValidationErrorCode,
} from '@plclog/types';
import { decodeSignature, verifySignature } from '@plclog/keys';
import { cidForOperation, deriveDid, unsignedOperationBytes } from '@plclog/codec';
import { parseLogEntry, rotationKeysOf } from './operation.js';
import { causalOrder, type PendingEntry } from './causal-order.js';
import { DEFAULT_RECOVERY_WINDOW_MS, resolveFork } from './fork.js';
import { reduceState } from './reducer.js';

export interface ChainValidatorOptions {
  /** Window in which a higher-authority key may override a newer operation */
  readonly recoveryWindowMs?: number;
  /** DID the log is expected to describe */
  readonly did?: string;
  /** CID the log source reports as the latest operation */
  readonly expectedHead?: string;
}

/** A failure that leaves no trustworthy chain at all. */
export class ChainValidationError extends Error {
  constructor(
    readonly code: ValidationErrorCode,
    message: string,
    readonly entryIndex?: number,
    readonly cid?: Cid,
  ) {
    super(message);
    this.name = 'ChainValidationError';
  }
}

type Signer =
  | { readonly kind: 'signed'; readonly index: number }
  | { readonly kind: 'unauthorized' }
  | { readonly kind: 'malformed' };

/** Index of the first key in `keys` that signed `op`. */
export function findSigner(op: Operation, keys: readonly Key[]): Signer {
  const signature = decodeSignature(op.sig);
  if (!signature) return { kind: 'malformed' };

  const message = unsignedOperationBytes(op);
  const index = keys.findIndex((key) => verifySignature(key, message, signature));
  return index < 0 ? { kind: 'unauthorized' } : { kind: 'signed', index };
}

type Outcome =
  | { readonly kind: 'rejected'; readonly rejection: RejectedEntry; readonly rawPrev?: string }
  | { readonly kind: 'accepted'; readonly accepted: AcceptedOperation; readonly position: number };

interface MalformedEntry {
  readonly entryIndex: number;
  readonly prev: string;
  readonly reason: string;
}

/**
 * Validates an identity's operation log and reconstructs its chain.
 *
 * The first entry must be the genesis. The rest are applied in causal order
 * (see `causalOrder`), so the outcome does not depend on the order they are
 * supplied in. A candidate that fails a check is rejected and the fold
 * continues; only failures that leave no trustworthy chain are thrown as
 * `ChainValidationError`.
 */
export class ChainValidator {
  private readonly recoveryWindowMs: number;

  constructor(private readonly options: ChainValidatorOptions = {}) {
    this.recoveryWindowMs = options.recoveryWindowMs ?? DEFAULT_RECOVERY_WINDOW_MS;
  }

  validate(entries: readonly unknown[]): ValidatedChain {
    if (entries.length === 0) {
      throw new ChainValidationError('ChainIncomplete', 'Operation log is empty');
    }

    const [first, ...rest] = entries;
    const { did, genesis } = this.acceptGenesis(first);
    let chain: readonly AcceptedOperation[] = [genesis];
    const rejected: RejectedEntry[] = [];
    const superseded: SupersededOperation[] = [];
    const malformed: MalformedEntry[] = [];

    for (const pending of causalOrder(rest, genesis)) {
      const { entryIndex } = pending;
      const outcome = this.consider(pending, did, chain, superseded);

      if (outcome.kind === 'rejected') {
        rejected.push(outcome.rejection);
        if (outcome.rejection.code === 'MalformedOperation' && outcome.rawPrev !== undefined) {
          malformed.push({ entryIndex, prev: outcome.rawPrev, reason: outcome.rejection.reason });
        }
        continue;
      }

      const displaced = chain.slice(outcome.position);
      superseded.push(...displaced.map((op) => ({ ...op, supersededBy: outcome.accepted.cid })));
      chain = [...chain.slice(0, outcome.position), outcome.accepted];
    }
    rejected.sort(byEntryIndex);
    superseded.sort(byEntryIndex);

    const head = chain[chain.length - 1] ?? genesis;

    if (this.options.expectedHead !== undefined && this.options.expectedHead !== head.cid) {
      throw new ChainValidationError(
        'ChainIncomplete',
        `Log ends at ${head.cid} but the latest operation is ${this.options.expectedHead}`,
        head.entryIndex,
        head.cid,
      );
    }

    // A malformed update of the head is the only way the identity could have moved on
    const blocking = malformed.find((entry) => entry.prev === head.cid);
    if (blocking && head.operation.type !== 'plc_tombstone') {
      throw new ChainValidationError(
        'MalformedOperation',
        `Successor of ${head.cid} is malformed: ${blocking.reason}`,
        blocking.entryIndex,
      );
    }

    const steps: ChainStep[] = chain.map((op, position) => ({
      ...op,
      position,
      state: reduceState(chain.slice(0, position + 1)),
    }));

    return {
      did,
      steps,
      state: reduceState(chain),
      head: head.cid,
      rejected,
      superseded,
      verdicts: buildVerdicts(entries.length, chain, rejected, superseded),
    };
  }

  /**
   * Like `validate`, but reports a terminal failure as a result instead of throwing.
   */
  audit(entries: readonly unknown[]): ChainValidationResult {
    try {
      return { valid: true, chain: this.validate(entries) };
    } catch (err) {
      if (!(err instanceof ChainValidationError)) throw err;
      return { valid: false, code: err.code, cid: err.cid, reason: err.message };
    }
  }

  private acceptGenesis(raw: unknown): { did: string; genesis: AcceptedOperation } {
    const parsed = parseLogEntry(raw);
    if (!parsed.ok) {
      throw new ChainValidationError('MalformedOperation', `Genesis operation is malformed: ${parsed.reason}`, 0);
    }

    const { entry } = parsed;
    const { operation } = entry;
    if (operation.type === 'plc_tombstone' || operation.prev !== null) {
      throw new ChainValidationError('GenesisInvalid', 'First operation in the log is not a genesis operation', 0);
    }

    const cid = cidForOperation(operation);
    if (entry.cid !== undefined && entry.cid !== cid) {
      throw new ChainValidationError(
        'CidMismatch',
        `Genesis is listed as ${entry.cid} but hashes to ${cid}`,
        0,
        cid,
      );
    }

    const signer = findSigner(operation, rotationKeysOf(operation));
    if (signer.kind === 'malformed') {
      throw new ChainValidationError('SignatureInvalid', 'Genesis signature is not a 64-byte unpadded base64url value', 0, cid);
    }
    if (signer.kind === 'unauthorized') {
      throw new ChainValidationError('SignatureInvalid', 'Genesis is not signed by any of its own rotation keys', 0, cid);
    }

    const did = deriveDid(operation);
    for (const claimed of [this.options.did, entry.did]) {
      if (claimed !== undefined && claimed !== did) {
        throw new ChainValidationError('DidMismatch', `Genesis operation creates ${did}, not ${claimed}`, 0, cid);
      }
    }

    return {
      did,
      genesis: { entryIndex: 0, cid, operation, createdAt: entry.createdAt, signerIndex: signer.index },
    };
  }

  private consider(
    pending: PendingEntry,
    did: string,
    chain: readonly AcceptedOperation[],
    superseded: readonly SupersededOperation[],
  ): Outcome {
    const { entryIndex } = pending;
    if (!pending.ok) {
      return {
        kind: 'rejected',
        rejection: { entryIndex, code: 'MalformedOperation', reason: pending.reason },
        rawPrev: pending.prev,
      };
    }

    const { entry, cid } = pending;
    const reject = (code: ValidationErrorCode, reason: string): Outcome => ({
      kind: 'rejected',
      rejection: { entryIndex, cid, code, reason },
    });

    if (entry.did !== undefined && entry.did !== did) {
      return reject('DidMismatch', `Entry belongs to ${entry.did}, not ${did}`);
    }
    if (entry.cid !== undefined && entry.cid !== cid) {
      return reject('CidMismatch', `Entry is listed as ${entry.cid} but hashes to ${cid}`);
    }

    const { prev } = entry.operation;
    if (prev === null) {
      return reject('LinkInvalid', 'Only the first operation of a log may omit prev');
    }
    if (chain.some((op) => op.cid === cid)) {
      return reject('DuplicateOperation', `Operation ${cid} is already on the chain`);
    }

    const position = chain.findIndex((op) => op.cid === prev);
    const parent = chain[position];
    if (!parent) {
      return superseded.some((op) => op.cid === prev)
        ? reject('LinkInvalid', `prev ${prev} was superseded by a recovery operation`)
        : reject('LinkInvalid', `prev ${prev} does not name an accepted operation`);
    }
    if (parent.operation.type === 'plc_tombstone') {
      return reject('ChainTerminated', `prev ${prev} is a tombstone`);
    }

    const createdAtMs = Date.parse(entry.createdAt);
    if (createdAtMs < Date.parse(parent.createdAt)) {
      return reject('TimestampOutOfOrder', `Created at ${entry.createdAt}, before its parent at ${parent.createdAt}`);
    }

    const signer = findSigner(entry.operation, rotationKeysOf(parent.operation));
    if (signer.kind === 'malformed') {
      return reject('SignatureInvalid', 'Signature is not a 64-byte unpadded base64url value');
    }
    if (signer.kind === 'unauthorized') {
      return reject('AuthorityInvalid', `Not signed by any rotation key of ${prev}`);
    }

    const accepted: AcceptedOperation = {
      entryIndex,
      cid,
      operation: entry.operation,
      createdAt: entry.createdAt,
      signerIndex: signer.index,
    };

    const standing = chain[position + 1];
    if (standing) {
      const decision = resolveFork(standing, accepted, this.recoveryWindowMs);
      if (!decision.supersede) return reject(decision.code, decision.reason);
    }

    return { kind: 'accepted', accepted, position: position + 1 };
  }
}

function byEntryIndex(a: { readonly entryIndex: number }, b: { readonly entryIndex: number }): number {
  return a.entryIndex - b.entryIndex;
}

function buildVerdicts(
  count: number,
  chain: readonly AcceptedOperation[],
  rejected: readonly RejectedEntry[],
  superseded: readonly SupersededOperation[],
): EntryVerdict[] {
  const verdicts = new Map<number, EntryVerdict>();

  for (const op of superseded) {
    verdicts.set(op.entryIndex, { entryIndex: op.entryIndex, cid: op.cid, status: 'Superseded' });
  }
  for (const { entryIndex, cid, code, reason } of rejected) {
    verdicts.set(entryIndex, { entryIndex, cid, status: 'Rejected', code, reason });
  }
  for (const op of chain) {
    verdicts.set(op.entryIndex, { entryIndex: op.entryIndex, cid: op.cid, status: 'Accepted' });
  }

  return Array.from({ length: count }, (_, entryIndex) => {
    const verdict = verdicts.get(entryIndex);
    if (!verdict) throw new Error(`No verdict for entry ${entryIndex}`);
    return verdict;
  });
}

/** Validate `entries` with default options. */
export function validateChain(entries: readonly unknown[], options?: ChainValidatorOptions): ValidatedChain {
  return new ChainValidator(options).validate(entries);
}
