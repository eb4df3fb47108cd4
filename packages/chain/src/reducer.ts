import type { AcceptedOperation, ActiveIdentityState, IdentityState, Key, PlcData } from '@plclog/types';
import { formatDidKey } from '@plclog/keys';
import { ATPROTO_PDS_SERVICE, ATPROTO_PDS_TYPE, ATPROTO_VERIFICATION_METHOD, operationPayload } from './operation.js';

/**
 * State of an identity after the last operation of `prefix`.
 * Depends on nothing but the prefix, so any snapshot can be recomputed.
 */
export function reduceState(prefix: readonly AcceptedOperation[]): IdentityState {
  const last = prefix.at(-1);
  if (!last) {
    throw new RangeError('Cannot reduce an empty chain');
  }
  if (last.operation.type === 'plc_tombstone') {
    return { status: 'deactivated' };
  }
  return { status: 'active', ...operationPayload(last.operation) };
}

export function toPlcData(state: ActiveIdentityState): PlcData {
  return {
    rotationKeys: state.rotationKeys.map(formatDidKey),
    verificationMethods: Object.fromEntries(
      Object.entries(state.verificationMethods).map(([name, key]) => [name, formatDidKey(key)]),
    ),
    alsoKnownAs: [...state.alsoKnownAs],
    services: Object.fromEntries(
      Object.entries(state.services).map(([name, { type, endpoint }]) => [name, { type, endpoint }]),
    ),
  };
}

/** Host part of the first `at://` alias. */
export function primaryHandle(state: ActiveIdentityState): string | undefined {
  const alias = state.alsoKnownAs.find((aka) => aka.startsWith('at://'));
  return alias?.slice('at://'.length).split('/')[0];
}

export function pdsEndpoint(state: ActiveIdentityState): string | undefined {
  const service = state.services[ATPROTO_PDS_SERVICE];
  return service?.type === ATPROTO_PDS_TYPE ? service.endpoint : undefined;
}

export function atprotoSigningKey(state: ActiveIdentityState): Key | undefined {
  return state.verificationMethods[ATPROTO_VERIFICATION_METHOD];
}
