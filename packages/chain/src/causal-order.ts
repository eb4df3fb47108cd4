import type { AcceptedOperation, Cid, LogEntry } from '@plclog/types';
import { cidForOperation, compareCids } from '@plclog/codec';
import { parseLogEntry } from './operation.js';

/** A log entry after the genesis, parsed and waiting to be applied. */
export type PendingEntry =
  | { readonly entryIndex: number; readonly ok: true; readonly entry: LogEntry; readonly cid: Cid }
  | { readonly entryIndex: number; readonly ok: false; readonly reason: string; readonly prev?: string };

interface OrderKey {
  /** Latest `createdAt` along the entry's `prev` ancestry */
  readonly time: number;
  /** Hops from the genesis */
  readonly depth: number;
}

/**
 * Parse the entries that follow the genesis and sort them into the order
 * they are applied: by effective timestamp, then depth, then CID.
 *
 * A parent always sorts before its children, so the result is the same for
 * any permutation of `entries`. Malformed entries go last.
 */
export function causalOrder(entries: readonly unknown[], genesis: AcceptedOperation): PendingEntry[] {
  const pending: PendingEntry[] = entries.map((raw, offset): PendingEntry => {
    const parsed = parseLogEntry(raw);
    const entryIndex = offset + 1;
    return parsed.ok
      ? { entryIndex, ok: true, entry: parsed.entry, cid: cidForOperation(parsed.entry.operation) }
      : { entryIndex, ok: false, reason: parsed.reason, prev: parsed.prev };
  });

  const byCid = new Map<string, PendingEntry>();
  for (const entry of pending) {
    if (entry.ok && !byCid.has(entry.cid)) byCid.set(entry.cid, entry);
  }

  const root: OrderKey = { time: Date.parse(genesis.createdAt), depth: 0 };
  const keys = new Map<PendingEntry, OrderKey>();

  const keyOf = (entry: PendingEntry, visiting: Set<PendingEntry>): OrderKey => {
    const known = keys.get(entry);
    if (known) return known;
    if (!entry.ok) return { time: Infinity, depth: 0 };

    const time = Date.parse(entry.entry.createdAt);
    const { prev } = entry.entry.operation;
    const parent = prev === null ? undefined : byCid.get(prev);

    let parentKey: OrderKey | undefined;
    if (prev === genesis.cid) {
      parentKey = root;
    } else if (parent && parent !== entry && !visiting.has(parent)) {
      visiting.add(entry);
      parentKey = keyOf(parent, visiting);
      visiting.delete(entry);
    }

    const key = parentKey
      ? { time: Math.max(time, parentKey.time), depth: parentKey.depth + 1 }
      : { time, depth: 1 };
    keys.set(entry, key);
    return key;
  };

  const ordered = pending.map((entry) => ({ entry, key: keyOf(entry, new Set()) }));
  ordered.sort(
    (a, b) =>
      compareNumbers(a.key.time, b.key.time) ||
      a.key.depth - b.key.depth ||
      compareOptionalCids(a.entry.ok ? a.entry.cid : undefined, b.entry.ok ? b.entry.cid : undefined) ||
      a.entry.entryIndex - b.entry.entryIndex,
  );
  return ordered.map(({ entry }) => entry);
}

function compareNumbers(a: number, b: number): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareOptionalCids(a: Cid | undefined, b: Cid | undefined): number {
  if (a === undefined || b === undefined) return (a === undefined ? 1 : 0) - (b === undefined ? 1 : 0);
  return compareCids(a, b);
}
