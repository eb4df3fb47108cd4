import type {
  JsonLegacyCreateOperation,
  JsonOperation,
  JsonPlcOperation,
  JsonTombstoneOperation,
  Operation,
} from '@plclog/types';
import { formatDidKey } from '@plclog/keys';

/** Render an operation in its JSON wire form, keys as `did:key` strings. */
export function toJsonOperation(op: Operation): JsonOperation {
  switch (op.type) {
    case 'plc_operation':
      return {
        type: op.type,
        rotationKeys: op.rotationKeys.map(formatDidKey),
        verificationMethods: Object.fromEntries(
          Object.entries(op.verificationMethods).map(([name, key]) => [name, formatDidKey(key)]),
        ),
        alsoKnownAs: [...op.alsoKnownAs],
        services: Object.fromEntries(
          Object.entries(op.services).map(([name, s]) => [name, { type: s.type, endpoint: s.endpoint }]),
        ),
        prev: op.prev,
        sig: op.sig,
      };
    case 'plc_tombstone':
      return { type: op.type, prev: op.prev, sig: op.sig };
    case 'create':
      return {
        type: op.type,
        signingKey: formatDidKey(op.signingKey),
        recoveryKey: formatDidKey(op.recoveryKey),
        handle: op.handle,
        service: op.service,
        prev: null,
        sig: op.sig,
      };
  }
}

export type UnsignedJsonOperation =
  | Omit<JsonPlcOperation, 'sig'>
  | Omit<JsonTombstoneOperation, 'sig'>
  | Omit<JsonLegacyCreateOperation, 'sig'>;

/** The wire form without `sig`: what is signed and content-addressed. */
export function toUnsignedJsonOperation(op: Operation): UnsignedJsonOperation {
  const { sig: _sig, ...unsigned } = toJsonOperation(op);
  return unsigned;
}
