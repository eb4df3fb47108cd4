import { describe, it, expect } from 'vitest';
import type { JsonLogEntry } from '@plclog/types';
import { base58 } from '@scure/base';
import { compareCids } from '@plclog/codec';
import { PDS_SERVICE_TYPE, TestKeypair, TestLog } from '@plclog/testkit';
import { ChainValidator, ChainValidationError } from './validator.js';
import { primaryHandle, toPlcData } from './reducer.js';

const HOUR = 60 * 60 * 1000;
const MINUTE = 60 * 1000;

function validate(entries: readonly unknown[]) {
  return new ChainValidator().validate(entries);
}

function terminalCode(entries: readonly unknown[], validator = new ChainValidator()) {
  return validator.audit(entries).code;
}

function withEntry(entries: JsonLogEntry[], index: number, patch: (entry: JsonLogEntry) => unknown): unknown[] {
  return entries.map((entry, i) => (i === index ? patch(entry) : entry));
}

describe('ChainValidator', () => {
  describe('linear logs', () => {
    it('should accept a genesis followed by updates', () => {
      const log = TestLog.withGenesis()
        .update((u) => u.changeHandle('bob.test'))
        .update((u) => u.changePds('https://pds.bob.test'));

      const chain = validate(log.toJson());

      expect(chain.did).toBe(log.did);
      expect(chain.steps.map((s) => s.cid)).toEqual([log.cidFor(0), log.cidFor(1), log.cidFor(2)]);
      expect(chain.head).toBe(log.cidFor(2));
      expect(chain.rejected).toEqual([]);
      expect(chain.superseded).toEqual([]);
      expect(chain.verdicts.map((v) => v.status)).toEqual(['Accepted', 'Accepted', 'Accepted']);
      expect(chain.state.status).toBe('active');
      if (chain.state.status === 'active') {
        expect(primaryHandle(chain.state)).toBe('bob.test');
      }
    });

    it('should record the signer index of every step', () => {
      const log = TestLog.withGenesis({ rotationKeyCount: 3 })
        .update((u) => u.signedWithKey(0))
        .update((u) => u.signedWithKey(2));

      expect(validate(log.toJson()).steps.map((s) => s.signerIndex)).toEqual([2, 0, 2]);
    });

    it('should be deterministic', () => {
      const entries = TestLog.withGenesis()
        .update((u) => u.changeHandle('bob.test'))
        .update((u) => u.rotateSigningKey())
        .toJson();

      expect(validate(entries)).toEqual(validate(entries));
    });

    it('should accept a legacy create genesis', () => {
      const log = TestLog.withLegacyGenesis().update((u) => u.changeHandle('bob.test'));

      const chain = validate(log.toJson());

      expect(chain.steps).toHaveLength(2);
      expect(chain.steps[0]?.signerIndex).toBe(1);
      expect(chain.steps[1]?.signerIndex).toBe(1);
    });

    it('should accept secp256k1 identities', () => {
      const log = TestLog.withGenesis({ algorithm: 'secp256k1' }).update((u) => u.changeHandle('bob.test'));
      expect(validate(log.toJson()).steps).toHaveLength(2);
    });
  });

  describe('end-to-end scenario', () => {
    it('should accept genesis plus three updates and snapshot every step', () => {
      const log = TestLog.withGenesis({ handle: 'alice.test', pds: 'https://pds.alice.test' })
        .update((u) => u.changeHandle('bob.test'))
        .update((u) => u)
        .update((u) => u.rotateSigningKey().changePds('https://pds.bob.test'));

      const chain = validate(log.toJson());

      expect(chain.steps.map((s) => s.entryIndex)).toEqual([0, 1, 2, 3]);
      expect(chain.steps.map((s) => s.state.status)).toEqual(['active', 'active', 'active', 'active']);
      expect(chain.state).toEqual(chain.steps[3]?.state);

      const keys = log.keysAt(3);
      expect(chain.state.status === 'active' && toPlcData(chain.state)).toEqual({
        rotationKeys: keys.rotation.map((k) => k.didKey),
        verificationMethods: { atproto: keys.signing.didKey },
        alsoKnownAs: ['at://bob.test'],
        services: { atproto_pds: { type: PDS_SERVICE_TYPE, endpoint: 'https://pds.bob.test' } },
      });

      const first = chain.steps[0]?.state;
      expect(first?.status === 'active' && first.alsoKnownAs).toEqual(['at://alice.test']);
    });
  });

  describe('genesis', () => {
    it('should fail an empty log as incomplete', () => {
      expect(() => validate([])).toThrow(ChainValidationError);
      expect(terminalCode([])).toBe('ChainIncomplete');
    });

    it('should fail when the first entry is not a genesis', () => {
      const entries = TestLog.withGenesis().update().swap(0, 1).toJson();
      expect(terminalCode(entries)).toBe('GenesisInvalid');
    });

    it('should fail a malformed genesis', () => {
      const entries = withEntry(TestLog.withGenesis().toJson(), 0, (entry) => ({
        ...entry,
        operation: { ...entry.operation, rotationKeys: 'did:key:zQ3s' },
      }));

      const result = new ChainValidator().audit(entries);

      expect(result.valid).toBe(false);
      expect(result.code).toBe('MalformedOperation');
      expect(result.reason).toContain('rotationKeys');
    });

    it('should fail a genesis not signed by its own rotation keys', () => {
      const log = TestLog.withGenesis().update();
      const [genesis, update] = log.toJson();
      if (!genesis || !update) throw new Error('log too short');

      const entries = [{ ...genesis, operation: { ...genesis.operation, sig: update.operation.sig } }];
      const result = new ChainValidator().audit(entries);

      expect(result.code).toBe('SignatureInvalid');
      expect(result.cid).toBe(log.cidFor(0));
    });

    it('should fail a genesis whose listed CID does not match', () => {
      const log = TestLog.withGenesis().update();
      const entries = withEntry(log.toJson(), 0, (entry) => ({ ...entry, cid: log.cidFor(1) }));
      expect(terminalCode(entries)).toBe('CidMismatch');
    });

    it('should fail when the log describes a different DID', () => {
      const entries = TestLog.withGenesis().toJson();
      const validator = new ChainValidator({ did: 'did:plc:aaaaaaaaaaaaaaaaaaaaaaaa' });
      expect(terminalCode(entries, validator)).toBe('DidMismatch');
    });

    it('should expose the failing code on the thrown error', () => {
      const entries = TestLog.withGenesis().update().swap(0, 1).toJson();
      try {
        validate(entries);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ChainValidationError);
        expect(err instanceof ChainValidationError && err.entryIndex).toBe(0);
      }
    });
  });

  describe('per-operation rejection', () => {
    it('should reject an update signed by the signing key', () => {
      const log = TestLog.withGenesis().update((u) => u.signedWithSigningKey());

      const chain = validate(log.toJson());

      expect(chain.head).toBe(log.cidFor(0));
      expect(chain.rejected).toEqual([
        expect.objectContaining({ entryIndex: 1, cid: log.cidFor(1), code: 'AuthorityInvalid' }),
      ]);
      expect(chain.verdicts[1]).toEqual(
        expect.objectContaining({ status: 'Rejected', code: 'AuthorityInvalid' }),
      );
    });

    it('should reject an update signed by an unrelated key', () => {
      const log = TestLog.withGenesis().update((u) => u.signedWith(TestKeypair.generate()));
      expect(validate(log.toJson()).rejected[0]?.code).toBe('AuthorityInvalid');
    });

    it('should reject a padded signature as invalid encoding', () => {
      const log = TestLog.withGenesis().update((u) => u.paddedSig());
      expect(validate(log.toJson()).rejected[0]?.code).toBe('SignatureInvalid');
    });

    it('should reject a signature over other bytes', () => {
      const log = TestLog.withGenesis().update((u) => u.invalidSig());
      expect(validate(log.toJson()).rejected[0]?.code).toBe('AuthorityInvalid');
    });

    it('should reject a high-S signature', () => {
      const log = TestLog.withGenesis().update((u) => u.highSSig());
      expect(validate(log.toJson()).rejected[0]?.code).toBe('AuthorityInvalid');
    });

    it('should reject an update without prev', () => {
      const log = TestLog.withGenesis().update((u) => u.withoutPrev());
      expect(validate(log.toJson()).rejected[0]?.code).toBe('LinkInvalid');
    });

    it('should reject an update whose prev is unknown', () => {
      const stranger = TestLog.withGenesis();
      const log = TestLog.withGenesis().update((u) => u.withPrevCid(stranger.cidFor(0)));
      expect(validate(log.toJson()).rejected[0]?.code).toBe('LinkInvalid');
    });

    it('should apply an update supplied before its parent', () => {
      const log = TestLog.withGenesis().update().update();

      const chain = validate(log.swap(1, 2).toJson());

      expect(chain.rejected).toEqual([]);
      expect(chain.head).toBe(log.cidFor(2));
      expect(chain.steps.map((s) => s.entryIndex)).toEqual([0, 2, 1]);
    });

    it('should reject an entry whose listed CID does not match', () => {
      const log = TestLog.withGenesis().update().update();
      const entries = withEntry(log.toJson(), 2, (entry) => ({ ...entry, cid: log.cidFor(1) }));
      expect(validate(entries).rejected[0]?.code).toBe('CidMismatch');
    });

    it('should reject an entry for another DID', () => {
      const other = TestLog.withGenesis();
      const entries = withEntry(TestLog.withGenesis().update().toJson(), 1, (entry) => ({ ...entry, did: other.did }));
      expect(validate(entries).rejected[0]?.code).toBe('DidMismatch');
    });

    it('should reject a repeated operation', () => {
      const entries = TestLog.withGenesis().update().toJson();
      const repeated = [...entries, entries[1]];

      const chain = validate(repeated);

      expect(chain.rejected).toEqual([expect.objectContaining({ entryIndex: 2, code: 'DuplicateOperation' })]);
      expect(chain.steps).toHaveLength(2);
    });

    it('should reject an update timestamped before its parent', () => {
      const log = TestLog.withGenesis().update((u) => u.createdAt('2023-12-31T00:00:00.000Z'));
      expect(validate(log.toJson()).rejected[0]?.code).toBe('TimestampOutOfOrder');
    });

    it('should reject a malformed update that is not on the path forward', () => {
      const log = TestLog.withGenesis().update().update();
      const entries = withEntry(log.toJson(), 1, (entry) => ({
        ...entry,
        operation: { ...entry.operation, alsoKnownAs: 'at://bob.test' },
      }));

      const chain = validate([...entries, log.toJson()[1]]);

      expect(chain.rejected).toEqual([expect.objectContaining({ entryIndex: 1, code: 'MalformedOperation' })]);
      expect(chain.steps.map((s) => s.entryIndex)).toEqual([0, 3, 2]);
    });

    it('should treat a key with an out-of-range codec as malformed', () => {
      const bytes = Uint8Array.from([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x7f, 1, 2, 3]);
      const entries = withEntry(TestLog.withGenesis().update().toJson(), 1, (entry) => ({
        ...entry,
        operation: { ...entry.operation, rotationKeys: [`did:key:z${base58.encode(bytes)}`] },
      }));

      expect(new ChainValidator().audit(entries)).toMatchObject({ valid: false, code: 'MalformedOperation' });
    });

    it('should fail when a malformed operation is the only successor of the head', () => {
      const log = TestLog.withGenesis().update();
      const entries = withEntry(log.toJson(), 1, (entry) => ({
        ...entry,
        operation: { ...entry.operation, services: [] },
      }));

      const result = new ChainValidator().audit(entries);

      expect(result.valid).toBe(false);
      expect(result.code).toBe('MalformedOperation');
    });
  });

  describe('rotation authority', () => {
    it('should reject an update signed by a rotated-out key', () => {
      const log = TestLog.withGenesis()
        .update((u) => u.rotateRotationKey(1))
        .update((u) => u.withPrevOp(1).signedWithKeyFrom(0, 1))
        .update((u) => u.withPrevOp(1).signedWithKey(1).changeHandle('bob.test'));

      const chain = validate(log.toJson());

      expect(chain.rejected).toEqual([expect.objectContaining({ entryIndex: 2, code: 'AuthorityInvalid' })]);
      expect(chain.head).toBe(log.cidFor(3));
    });

    it('should reject an update signed by a removed key', () => {
      const log = TestLog.withGenesis()
        .update((u) => u.removeRotationKey(1))
        .update((u) => u.signedWithKeyFrom(0, 1));

      const chain = validate(log.toJson());

      expect(chain.rejected[0]?.code).toBe('AuthorityInvalid');
      expect(chain.head).toBe(log.cidFor(1));
    });

    it('should let a newly added key sign the next update', () => {
      const log = TestLog.withGenesis()
        .update((u) => u.rotateRotationKey(2))
        .update((u) => u.signedWithKey(2));

      expect(validate(log.toJson()).steps.map((s) => s.signerIndex)).toEqual([1, 1, 2]);
    });
  });

  describe('forks', () => {
    function forkAt(offsetMs: number) {
      return TestLog.withGenesis()
        .update((u) => u.signedWithKey(1).changeHandle('mallory.test'))
        .update((u) => u.withPrevOp(0).signedWithKey(0).createdAfter(1, offsetMs));
    }

    it('should let a higher-authority key supersede within the recovery window', () => {
      const log = forkAt(71 * HOUR + 59 * MINUTE);

      const chain = validate(log.toJson());

      expect(chain.steps.map((s) => s.cid)).toEqual([log.cidFor(0), log.cidFor(2)]);
      expect(chain.superseded).toEqual([
        expect.objectContaining({ entryIndex: 1, cid: log.cidFor(1), supersededBy: log.cidFor(2) }),
      ]);
      expect(chain.verdicts.map((v) => v.status)).toEqual(['Accepted', 'Superseded', 'Accepted']);
    });

    it('should reject a recovery after the window closes', () => {
      const log = forkAt(72 * HOUR + MINUTE);

      const chain = validate(log.toJson());

      expect(chain.head).toBe(log.cidFor(1));
      expect(chain.rejected).toEqual([expect.objectContaining({ entryIndex: 2, code: 'RecoveryWindowExpired' })]);
    });

    it('should reject a recovery exactly at the window boundary', () => {
      const log = forkAt(72 * HOUR);
      expect(validate(log.toJson()).rejected[0]?.code).toBe('RecoveryWindowExpired');
    });

    it('should honour a configured recovery window', () => {
      const log = forkAt(2 * HOUR);
      const chain = new ChainValidator({ recoveryWindowMs: HOUR }).validate(log.toJson());
      expect(chain.rejected[0]?.code).toBe('RecoveryWindowExpired');
    });

    it('should supersede every operation after the displaced one', () => {
      const log = TestLog.withGenesis()
        .update((u) => u.changeHandle('mallory.test'))
        .update((u) => u.changePds('https://pds.mallory.test'))
        .update((u) => u.withPrevOp(0).signedWithKey(0).createdAfter(1, HOUR))
        .update((u) => u.withPrevOp(2).createdAfter(3, MINUTE));

      const chain = validate(log.toJson());

      expect(chain.head).toBe(log.cidFor(3));
      expect(chain.superseded.map((s) => s.cid)).toEqual([log.cidFor(1), log.cidFor(2)]);
      expect(chain.rejected).toEqual([
        expect.objectContaining({ entryIndex: 4, code: 'LinkInvalid', reason: expect.stringContaining('superseded') }),
      ]);
    });

    it('should reject a competitor of equal authority', () => {
      const log = TestLog.withGenesis()
        .update((u) => u.changeHandle('first.test'))
        .update((u) => u.withPrevOp(0).changeHandle('second.test'));

      const chain = validate(log.toJson());

      expect(chain.head).toBe(log.cidFor(1));
      expect(chain.rejected[0]?.code).toBe('ForkRejected');
    });

    it('should reject a competitor of lower authority', () => {
      const log = TestLog.withGenesis()
        .update((u) => u.signedWithKey(0))
        .update((u) => u.withPrevOp(0).signedWithKey(1));

      expect(validate(log.toJson()).rejected[0]?.code).toBe('ForkRejected');
    });

    it('should break ties by the smaller CID whatever the arrival order', () => {
      const at = '2024-01-02T00:00:00.000Z';
      const log = TestLog.withGenesis()
        .update((u) => u.changeHandle('a.test').createdAt(at))
        .update((u) => u.withPrevOp(0).changeHandle('b.test').createdAt(at));
      const a = log.cidFor(1);
      const b = log.cidFor(2);
      const winner = compareCids(a, b) < 0 ? a : b;

      expect(validate(log.toJson()).head).toBe(winner);
      expect(validate(log.swap(1, 2).toJson()).head).toBe(winner);
    });

    it('should keep the earlier of two equal-authority operations whatever the arrival order', () => {
      const log = TestLog.withGenesis()
        .update((u) => u.signedWithKey(0).changeHandle('a.test').createdAt('2024-01-02T00:00:00.000Z'))
        .update((u) => u.withPrevOp(0).signedWithKey(0).changeHandle('b.test').createdAt('2024-01-02T01:00:00.000Z'));

      const inOrder = validate(log.toJson());
      const swapped = validate(log.swap(1, 2).toJson());

      expect(inOrder.head).toBe(log.cidFor(1));
      expect(swapped.head).toBe(log.cidFor(1));
      expect(inOrder.rejected).toEqual([expect.objectContaining({ entryIndex: 2, cid: log.cidFor(2), code: 'ForkRejected' })]);
      expect(swapped.rejected).toEqual([expect.objectContaining({ entryIndex: 1, cid: log.cidFor(2), code: 'ForkRejected' })]);
    });

    it('should apply the recovery window whatever the arrival order', () => {
      const late = forkAt(80 * HOUR);
      const inOrder = validate(late.toJson());
      const swapped = validate(late.swap(1, 2).toJson());

      expect(inOrder.head).toBe(late.cidFor(1));
      expect(swapped.head).toBe(late.cidFor(1));
      expect(swapped.rejected).toEqual([
        expect.objectContaining({ entryIndex: 1, cid: late.cidFor(2), code: 'RecoveryWindowExpired' }),
      ]);

      const timely = forkAt(HOUR);
      const recovered = validate(timely.swap(1, 2).toJson());

      expect(recovered.head).toBe(timely.cidFor(2));
      expect(recovered.superseded).toEqual([expect.objectContaining({ entryIndex: 2, cid: timely.cidFor(1) })]);
    });
  });

  describe('tombstones', () => {
    it('should deactivate the identity and refuse later updates', () => {
      const log = TestLog.withGenesis()
        .update((u) => u.changeHandle('bob.test'))
        .tombstone()
        .update((u) => u.changeHandle('carol.test'));

      const chain = validate(log.toJson());

      expect(chain.head).toBe(log.cidFor(2));
      expect(chain.state).toEqual({ status: 'deactivated' });
      expect(chain.steps.map((s) => s.state.status)).toEqual(['active', 'active', 'deactivated']);
      expect(chain.rejected).toEqual([expect.objectContaining({ entryIndex: 3, code: 'ChainTerminated' })]);
    });

    it('should require rotation authority for a tombstone', () => {
      const log = TestLog.withGenesis().tombstone((t) => t.signedWithSigningKey());

      const chain = validate(log.toJson());

      expect(chain.state.status).toBe('active');
      expect(chain.rejected[0]?.code).toBe('AuthorityInvalid');
    });
  });

  describe('expected head', () => {
    it('should fail when the log stops short of the reported head', () => {
      const log = TestLog.withGenesis().update().update();
      const validator = new ChainValidator({ expectedHead: log.cidFor(2) });

      expect(terminalCode(log.without(2).toJson(), validator)).toBe('ChainIncomplete');
      expect(validator.audit(log.toJson()).valid).toBe(true);
    });
  });
});
