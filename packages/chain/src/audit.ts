import { z } from 'zod';
import type { AuditFinding, AuditReport } from '@plclog/types';
import { ChainValidator, type ChainValidatorOptions } from './validator.js';

const nullifiedFlagSchema = z.object({ nullified: z.boolean().default(false) }).passthrough();

function flaggedNullified(raw: unknown): boolean {
  const result = nullifiedFlagSchema.safeParse(raw);
  return result.success && result.data.nullified;
}

/**
 * Validate a directory audit log and check its `nullified` flags against
 * the chain the validator reconstructs.
 */
export function auditLog(entries: readonly unknown[], options?: ChainValidatorOptions): AuditReport {
  const result = new ChainValidator(options).audit(entries);
  if (!result.chain) {
    return { valid: false, reason: result.reason, findings: [] };
  }

  const supersededBy = new Map(result.chain.superseded.map((op) => [op.entryIndex, op.supersededBy] as const));
  const findings: AuditFinding[] = [];
  for (const { entryIndex, cid, status, code, reason } of result.chain.verdicts) {
    const nullified = flaggedNullified(entries[entryIndex]);
    if (status === 'Accepted' && nullified) {
      findings.push({ kind: 'EntryIncorrectlyNullified', entryIndex, cid, status });
    } else if (status === 'Rejected' && !nullified) {
      findings.push({ kind: 'EntryIncorrectlyActive', entryIndex, cid, status, code, reason });
    } else if (status === 'Superseded' && !nullified) {
      findings.push({
        kind: 'EntryIncorrectlyActive',
        entryIndex,
        cid,
        status,
        reason: `Superseded by ${supersededBy.get(entryIndex) ?? 'a recovery operation'}`,
      });
    }
  }

  if (findings.length > 0) {
    return {
      valid: false,
      reason: `${findings.length} of ${entries.length} entries disagree with their nullified flag`,
      findings,
      chain: result.chain,
    };
  }
  return { valid: true, findings, chain: result.chain };
}
