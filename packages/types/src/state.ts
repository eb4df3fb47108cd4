import type { OperationPayload, Service } from './operation.js';

export interface ActiveIdentityState extends OperationPayload {
  readonly status: 'active';
}

export interface DeactivatedIdentityState {
  readonly status: 'deactivated';
}

/** Identity state as of some prefix of a validated chain. */
export type IdentityState = ActiveIdentityState | DeactivatedIdentityState;

/** JSON view of an active state, keys rendered as `did:key` strings. */
export interface PlcData {
  readonly rotationKeys: string[];
  readonly verificationMethods: Record<string, string>;
  readonly alsoKnownAs: string[];
  readonly services: Record<string, { type: string; endpoint: string }>;
}

export type SequenceField = 'rotationKeys' | 'alsoKnownAs';
export type MapField = 'verificationMethods' | 'services';

export type StateChange =
  | { readonly field: SequenceField; readonly change: 'inserted'; readonly index: number; readonly value: string }
  | { readonly field: SequenceField; readonly change: 'altered'; readonly index: number; readonly value: string }
  | { readonly field: SequenceField; readonly change: 'removed'; readonly index: number }
  | { readonly field: 'verificationMethods'; readonly change: 'added' | 'altered'; readonly name: string; readonly value: string }
  | { readonly field: 'services'; readonly change: 'added' | 'altered'; readonly name: string; readonly value: Service }
  | { readonly field: MapField; readonly change: 'removed'; readonly name: string }
  | { readonly field: 'status'; readonly change: 'deactivated' | 'reactivated' };
