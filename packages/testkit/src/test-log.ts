import {
  createCid,
  type Cid,
  type JsonLogEntry,
  type KeyAlgorithm,
  type LegacyCreateOperation,
  type Operation,
  type OperationPayload,
  type PlcOperation,
  type Service,
  type TombstoneOperation,
} from '@plclog/types';
import { encodeSignature } from '@plclog/keys';
import { cidForOperation, deriveDid, toJsonOperation, unsignedOperationBytes } from '@plclog/codec';
import { TestKeypair } from './keypair.js';

export const TEST_EPOCH = '2024-01-01T00:00:00.000Z';
/** Default spacing between consecutive test entries */
export const TEST_STEP_MS = 60_000;

export const PDS_SERVICE = 'atproto_pds';
export const PDS_SERVICE_TYPE = 'AtprotoPersonalDataServer';

export interface IdentityKeys {
  readonly rotation: readonly TestKeypair[];
  readonly signing: TestKeypair;
}

export interface TestEntry {
  readonly did: string;
  readonly operation: Operation;
  readonly cid: Cid;
  readonly createdAt: string;
  readonly nullified: boolean;
}

interface EntryContext {
  readonly keys: IdentityKeys;
  readonly payload: OperationPayload;
}

export interface GenesisOptions {
  readonly algorithm?: KeyAlgorithm;
  readonly rotationKeyCount?: number;
  readonly handle?: string;
  readonly pds?: string;
  readonly createdAt?: string;
}

type Signer =
  | { readonly kind: 'rotation'; readonly index: number; readonly fromEntry?: number }
  | { readonly kind: 'signing' }
  | { readonly kind: 'keypair'; readonly keypair: TestKeypair };

type SignatureStyle = 'valid' | 'invalid' | 'padded' | 'highS';

type PrevChoice =
  | { readonly kind: 'last' }
  | { readonly kind: 'entry'; readonly index: number }
  | { readonly kind: 'cid'; readonly cid: Cid }
  | { readonly kind: 'none' };

/** Options shared by updates and tombstones. */
abstract class EntryBuilder<Self extends EntryBuilder<Self>> {
  protected prev: PrevChoice = { kind: 'last' };
  protected signer: Signer | undefined;
  protected signature: SignatureStyle = 'valid';
  protected timestamp: string | undefined;
  protected offsetMs: { readonly fromEntry: number; readonly ms: number } | undefined;
  protected flaggedNullified = false;

  protected abstract self(): Self;

  /** Link to the entry at `index` instead of the latest one. */
  withPrevOp(index: number): Self {
    this.prev = { kind: 'entry', index };
    return this.self();
  }

  withPrevCid(cid: string): Self {
    this.prev = { kind: 'cid', cid: createCid(cid) };
    return this.self();
  }

  withoutPrev(): Self {
    this.prev = { kind: 'none' };
    return this.self();
  }

  /** Sign with the parent's rotation key at `index`. */
  signedWithKey(index: number): Self {
    this.signer = { kind: 'rotation', index };
    return this.self();
  }

  /** Sign with a rotation key as of some other entry. */
  signedWithKeyFrom(entry: number, index: number): Self {
    this.signer = { kind: 'rotation', index, fromEntry: entry };
    return this.self();
  }

  signedWithSigningKey(): Self {
    this.signer = { kind: 'signing' };
    return this.self();
  }

  signedWith(keypair: TestKeypair): Self {
    this.signer = { kind: 'keypair', keypair };
    return this.self();
  }

  invalidSig(): Self {
    this.signature = 'invalid';
    return this.self();
  }

  paddedSig(): Self {
    this.signature = 'padded';
    return this.self();
  }

  highSSig(): Self {
    this.signature = 'highS';
    return this.self();
  }

  createdAt(iso: string): Self {
    this.timestamp = iso;
    this.offsetMs = undefined;
    return this.self();
  }

  /** Timestamp relative to another entry's `createdAt`. */
  createdAfter(entry: number, ms: number): Self {
    this.offsetMs = { fromEntry: entry, ms };
    this.timestamp = undefined;
    return this.self();
  }

  nullified(flag = true): Self {
    this.flaggedNullified = flag;
    return this.self();
  }

  /** @internal */
  resolveParent(log: TestLog): { prev: Cid | null; context: EntryContext } {
    const lastIndex = log.entries.length - 1;
    switch (this.prev.kind) {
      case 'last':
        return { prev: log.cidFor(lastIndex), context: log.contextFor(lastIndex) };
      case 'entry':
        return { prev: log.cidFor(this.prev.index), context: log.contextFor(this.prev.index) };
      case 'cid':
        return { prev: this.prev.cid, context: log.contextFor(lastIndex) };
      case 'none':
        return { prev: null, context: log.contextFor(lastIndex) };
    }
  }

  /** @internal */
  resolveCreatedAt(log: TestLog): string {
    if (this.timestamp !== undefined) return this.timestamp;
    if (this.offsetMs !== undefined) {
      const base = Date.parse(log.entryAt(this.offsetMs.fromEntry).createdAt);
      return new Date(base + this.offsetMs.ms).toISOString();
    }
    return new Date(Date.parse(TEST_EPOCH) + log.entries.length * TEST_STEP_MS).toISOString();
  }

  /** @internal */
  sign(log: TestLog, parentKeys: IdentityKeys, unsigned: Uint8Array): string {
    const keypair = this.resolveSigner(log, parentKeys);
    switch (this.signature) {
      case 'valid':
        return encodeSignature(keypair.sign(unsigned));
      case 'invalid':
        return encodeSignature(keypair.sign(new Uint8Array(0)));
      case 'padded':
        return `${encodeSignature(keypair.sign(unsigned))}==`;
      case 'highS':
        return encodeSignature(keypair.signHighS(unsigned));
    }
  }

  /** @internal */
  isNullified(): boolean {
    return this.flaggedNullified;
  }

  private resolveSigner(log: TestLog, parentKeys: IdentityKeys): TestKeypair {
    // Least authority unless told otherwise
    const signer: Signer = this.signer ?? { kind: 'rotation', index: parentKeys.rotation.length - 1 };
    switch (signer.kind) {
      case 'signing':
        return parentKeys.signing;
      case 'keypair':
        return signer.keypair;
      case 'rotation': {
        const keys = signer.fromEntry === undefined ? parentKeys : log.contextFor(signer.fromEntry).keys;
        const keypair = keys.rotation[signer.index];
        if (!keypair) throw new RangeError(`No rotation key at index ${signer.index}`);
        return keypair;
      }
    }
  }
}

export class UpdateBuilder extends EntryBuilder<UpdateBuilder> {
  private handle: { readonly kind: 'set'; readonly value: string } | { readonly kind: 'remove' } | undefined;
  private readonly serviceChanges = new Map<string, Service | null>();
  private readonly rotatedKeys = new Set<number>();
  private readonly removedKeys = new Set<number>();
  private newSigningKey = false;

  protected self(): UpdateBuilder {
    return this;
  }

  changeHandle(handle: string): UpdateBuilder {
    this.handle = { kind: 'set', value: handle };
    return this;
  }

  removeHandle(): UpdateBuilder {
    this.handle = { kind: 'remove' };
    return this;
  }

  changePds(endpoint: string): UpdateBuilder {
    return this.setService(PDS_SERVICE, { type: PDS_SERVICE_TYPE, endpoint });
  }

  removePds(): UpdateBuilder {
    return this.removeService(PDS_SERVICE);
  }

  setService(name: string, service: Service): UpdateBuilder {
    this.serviceChanges.set(name, service);
    return this;
  }

  removeService(name: string): UpdateBuilder {
    this.serviceChanges.set(name, null);
    return this;
  }

  /** Replace the rotation key at `index`, or append one when `index` is past the end. */
  rotateRotationKey(index: number): UpdateBuilder {
    this.rotatedKeys.add(index);
    return this;
  }

  removeRotationKey(index: number): UpdateBuilder {
    this.removedKeys.add(index);
    return this;
  }

  rotateSigningKey(): UpdateBuilder {
    this.newSigningKey = true;
    return this;
  }

  /** @internal */
  buildEntry(log: TestLog): { entry: TestEntry; context: EntryContext } {
    const { prev, context } = this.resolveParent(log);
    const keys = this.nextKeys(context.keys);
    const payload = this.nextPayload(context.payload, keys);

    const unsigned: PlcOperation = { type: 'plc_operation', ...payload, prev, sig: '' };
    const operation: PlcOperation = {
      ...unsigned,
      sig: this.sign(log, context.keys, unsignedOperationBytes(unsigned)),
    };

    return {
      entry: {
        did: log.did,
        operation,
        cid: cidForOperation(operation),
        createdAt: this.resolveCreatedAt(log),
        nullified: this.isNullified(),
      },
      context: { keys, payload },
    };
  }

  private nextKeys(parent: IdentityKeys): IdentityKeys {
    const algorithm = parent.signing.algorithm;
    const rotation = [...parent.rotation];
    for (const index of [...this.rotatedKeys].sort((a, b) => a - b)) {
      rotation[Math.min(index, rotation.length)] = TestKeypair.generate(algorithm);
    }
    for (const index of [...this.removedKeys].sort((a, b) => b - a)) {
      rotation.splice(index, 1);
    }
    return {
      rotation,
      signing: this.newSigningKey ? TestKeypair.generate(algorithm) : parent.signing,
    };
  }

  private nextPayload(parent: OperationPayload, keys: IdentityKeys): OperationPayload {
    const alsoKnownAs = [...parent.alsoKnownAs];
    if (this.handle?.kind === 'set') {
      alsoKnownAs[0] = `at://${this.handle.value}`;
    } else if (this.handle?.kind === 'remove') {
      alsoKnownAs.splice(0, 1);
    }

    const services: Record<string, Service> = { ...parent.services };
    for (const [name, service] of this.serviceChanges) {
      if (service) {
        services[name] = service;
      } else {
        delete services[name];
      }
    }

    return {
      rotationKeys: keys.rotation.map((k) => k.key),
      verificationMethods: { ...parent.verificationMethods, atproto: keys.signing.key },
      alsoKnownAs,
      services,
    };
  }
}

export class TombstoneBuilder extends EntryBuilder<TombstoneBuilder> {
  protected self(): TombstoneBuilder {
    return this;
  }

  /** @internal */
  buildEntry(log: TestLog): { entry: TestEntry; context: EntryContext } {
    const { prev, context } = this.resolveParent(log);
    if (prev === null) throw new RangeError('A tombstone always has a prev');

    const unsigned: TombstoneOperation = { type: 'plc_tombstone', prev, sig: '' };
    const operation: TombstoneOperation = {
      ...unsigned,
      sig: this.sign(log, context.keys, unsignedOperationBytes(unsigned)),
    };

    return {
      entry: {
        did: log.did,
        operation,
        cid: cidForOperation(operation),
        createdAt: this.resolveCreatedAt(log),
        nullified: this.isNullified(),
      },
      context,
    };
  }
}

/**
 * Immutable builder of signed operation logs.
 * Every update returns a new log; the keys behind each entry stay reachable for later signing.
 */
export class TestLog {
  private constructor(
    readonly did: string,
    readonly entries: readonly TestEntry[],
    private readonly contexts: readonly EntryContext[],
  ) {}

  static withGenesis(options: GenesisOptions = {}): TestLog {
    const algorithm = options.algorithm ?? 'p256';
    const rotation = Array.from({ length: options.rotationKeyCount ?? 2 }, () => TestKeypair.generate(algorithm));
    const keys: IdentityKeys = { rotation, signing: TestKeypair.generate(algorithm) };
    const payload: OperationPayload = {
      rotationKeys: rotation.map((k) => k.key),
      verificationMethods: { atproto: keys.signing.key },
      alsoKnownAs: [`at://${options.handle ?? 'alice.test'}`],
      services: {
        [PDS_SERVICE]: { type: PDS_SERVICE_TYPE, endpoint: options.pds ?? 'https://pds.alice.test' },
      },
    };

    const unsigned: PlcOperation = { type: 'plc_operation', ...payload, prev: null, sig: '' };
    const signer = rotation[rotation.length - 1] ?? keys.signing;
    const genesis: PlcOperation = { ...unsigned, sig: signer.signToString(unsignedOperationBytes(unsigned)) };

    return TestLog.fromGenesis(genesis, options.createdAt, { keys, payload });
  }

  /** Genesis in the legacy `create` format: rotation keys are [recovery, signing]. */
  static withLegacyGenesis(options: GenesisOptions = {}): TestLog {
    const algorithm = options.algorithm ?? 'secp256k1';
    const recovery = TestKeypair.generate(algorithm);
    const signing = TestKeypair.generate(algorithm);
    const handle = options.handle ?? 'alice.test';
    const service = options.pds ?? 'https://pds.alice.test';

    const unsigned: LegacyCreateOperation = {
      type: 'create',
      signingKey: signing.key,
      recoveryKey: recovery.key,
      handle,
      service,
      prev: null,
      sig: '',
    };
    const genesis: LegacyCreateOperation = {
      ...unsigned,
      sig: signing.signToString(unsignedOperationBytes(unsigned)),
    };

    return TestLog.fromGenesis(genesis, options.createdAt, {
      keys: { rotation: [recovery, signing], signing },
      payload: {
        rotationKeys: [recovery.key, signing.key],
        verificationMethods: { atproto: signing.key },
        alsoKnownAs: [`at://${handle}`],
        services: { [PDS_SERVICE]: { type: PDS_SERVICE_TYPE, endpoint: service } },
      },
    });
  }

  private static fromGenesis(genesis: Operation, createdAt: string | undefined, context: EntryContext): TestLog {
    const did = deriveDid(genesis);
    const entry: TestEntry = {
      did,
      operation: genesis,
      cid: cidForOperation(genesis),
      createdAt: createdAt ?? TEST_EPOCH,
      nullified: false,
    };
    return new TestLog(did, [entry], [context]);
  }

  update(configure: (builder: UpdateBuilder) => UpdateBuilder = (b) => b): TestLog {
    return this.append(configure(new UpdateBuilder()).buildEntry(this));
  }

  tombstone(configure: (builder: TombstoneBuilder) => TombstoneBuilder = (b) => b): TestLog {
    return this.append(configure(new TombstoneBuilder()).buildEntry(this));
  }

  entryAt(index: number): TestEntry {
    const entry = this.entries[index];
    if (!entry) throw new RangeError(`No entry at index ${index}`);
    return entry;
  }

  cidFor(index: number): Cid {
    return this.entryAt(index).cid;
  }

  /** Keys in effect after the entry at `index`. */
  keysAt(index: number): IdentityKeys {
    return this.contextFor(index).keys;
  }

  /** @internal */
  contextFor(index: number): EntryContext {
    const context = this.contexts[index];
    if (!context) throw new RangeError(`No entry at index ${index}`);
    return context;
  }

  /** Drop the entry at `index`, keeping the rest in order. */
  without(index: number): TestLog {
    return new TestLog(
      this.did,
      this.entries.filter((_, i) => i !== index),
      this.contexts.filter((_, i) => i !== index),
    );
  }

  /** Exchange two entries, producing an out-of-order log. */
  swap(a: number, b: number): TestLog {
    const entries = [...this.entries];
    const contexts = [...this.contexts];
    [entries[a], entries[b]] = [this.entryAt(b), this.entryAt(a)];
    [contexts[a], contexts[b]] = [this.contextFor(b), this.contextFor(a)];
    return new TestLog(this.did, entries, contexts);
  }

  /** The log as a directory would serve it from its audit endpoint. */
  toJson(): JsonLogEntry[] {
    return this.entries.map((entry) => ({
      did: entry.did,
      operation: toJsonOperation(entry.operation),
      cid: entry.cid,
      nullified: entry.nullified,
      createdAt: entry.createdAt,
    }));
  }

  private append(built: { entry: TestEntry; context: EntryContext }): TestLog {
    return new TestLog(this.did, [...this.entries, built.entry], [...this.contexts, built.context]);
  }
}
