import { z } from 'zod';
import { isPlcDid } from '@plclog/codec';

export const StoredEntrySchema = z.object({
  did: z.string().refine(isPlcDid, 'Not a did:plc identifier'),
  operation: z.record(z.unknown()),
  cid: z.string().min(1),
  nullified: z.boolean().default(false),
  createdAt: z.string().datetime({ offset: true }),
});

export type StoredEntry = z.infer<typeof StoredEntrySchema>;

export interface ExportQuery {
  readonly count: number;
  /** Only entries created strictly after this instant */
  readonly after?: string;
}

/**
 * In-memory audit-log registry, keyed by DID.
 * Entries are kept exactly as imported; they are only validated when read.
 */
export class LogStore {
  private readonly logs = new Map<string, StoredEntry[]>();

  /** Append entries in order, skipping CIDs already stored for the DID. */
  import(entries: readonly StoredEntry[]): number {
    let imported = 0;
    for (const entry of entries) {
      const log = this.logs.get(entry.did) ?? [];
      if (log.some((existing) => existing.cid === entry.cid)) continue;

      log.push(entry);
      this.logs.set(entry.did, log);
      imported++;
    }
    return imported;
  }

  get(did: string): readonly StoredEntry[] | undefined {
    return this.logs.get(did);
  }

  has(did: string): boolean {
    return this.logs.has(did);
  }

  get size(): number {
    return this.logs.size;
  }

  /** Entries of every DID in creation order. */
  export(query: ExportQuery): StoredEntry[] {
    const afterMs = query.after === undefined ? Number.NEGATIVE_INFINITY : Date.parse(query.after);
    return [...this.logs.values()]
      .flat()
      .filter((entry) => Date.parse(entry.createdAt) > afterMs)
      .sort((a, b) => Date.parse(a.createdAt) - Date.parse(b.createdAt))
      .slice(0, query.count);
  }
}
