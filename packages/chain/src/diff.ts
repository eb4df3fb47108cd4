import type { IdentityState, PlcData, SequenceField, Service, StateChange } from '@plclog/types';
import { toPlcData } from './reducer.js';

const EMPTY: PlcData = { rotationKeys: [], verificationMethods: {}, alsoKnownAs: [], services: {} };

/**
 * Positional diff: common indices are compared in place, extra entries are
 * inserted at the end or removed from the end (highest index first).
 */
function diffSequence(field: SequenceField, before: readonly string[], after: readonly string[]): StateChange[] {
  const changes: StateChange[] = [];
  const shared = Math.min(before.length, after.length);

  for (let index = 0; index < shared; index++) {
    const value = after[index];
    if (value !== undefined && value !== before[index]) {
      changes.push({ field, change: 'altered', index, value });
    }
  }
  for (let index = shared; index < after.length; index++) {
    const value = after[index];
    if (value !== undefined) changes.push({ field, change: 'inserted', index, value });
  }
  for (let index = before.length - 1; index >= shared; index--) {
    changes.push({ field, change: 'removed', index });
  }
  return changes;
}

function diffMethods(before: Record<string, string>, after: Record<string, string>): StateChange[] {
  const changes: StateChange[] = [];
  for (const [name, value] of Object.entries(after)) {
    if (!(name in before)) {
      changes.push({ field: 'verificationMethods', change: 'added', name, value });
    } else if (before[name] !== value) {
      changes.push({ field: 'verificationMethods', change: 'altered', name, value });
    }
  }
  for (const name of Object.keys(before)) {
    if (!(name in after)) changes.push({ field: 'verificationMethods', change: 'removed', name });
  }
  return changes;
}

function sameService(a: Service | undefined, b: Service): boolean {
  return a?.type === b.type && a.endpoint === b.endpoint;
}

function diffServices(before: Record<string, Service>, after: Record<string, Service>): StateChange[] {
  const changes: StateChange[] = [];
  for (const [name, value] of Object.entries(after)) {
    if (!(name in before)) {
      changes.push({ field: 'services', change: 'added', name, value });
    } else if (!sameService(before[name], value)) {
      changes.push({ field: 'services', change: 'altered', name, value });
    }
  }
  for (const name of Object.keys(before)) {
    if (!(name in after)) changes.push({ field: 'services', change: 'removed', name });
  }
  return changes;
}

/** Changes that turn `before` into `after`; `undefined` stands for the state before genesis. */
export function diffStates(before: IdentityState | undefined, after: IdentityState): StateChange[] {
  if (after.status === 'deactivated') {
    return before?.status === 'active' ? [{ field: 'status', change: 'deactivated' }] : [];
  }

  const changes: StateChange[] = before?.status === 'deactivated' ? [{ field: 'status', change: 'reactivated' }] : [];
  const from = before?.status === 'active' ? toPlcData(before) : EMPTY;
  const to = toPlcData(after);

  return [
    ...changes,
    ...diffSequence('rotationKeys', from.rotationKeys, to.rotationKeys),
    ...diffMethods(from.verificationMethods, to.verificationMethods),
    ...diffSequence('alsoKnownAs', from.alsoKnownAs, to.alsoKnownAs),
    ...diffServices(from.services, to.services),
  ];
}
