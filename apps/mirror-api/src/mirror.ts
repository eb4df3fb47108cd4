import type { AuditReport, ValidatedChain, ValidationErrorCode } from '@plclog/types';
import { ChainValidator, auditLog, type ChainValidatorOptions } from '@plclog/chain';
import type { MirrorConfig } from './config.js';
import { LogStore } from './store.js';

export type Resolution =
  | { readonly status: 'missing' }
  | { readonly status: 'invalid'; readonly code?: ValidationErrorCode; readonly reason: string }
  | { readonly status: 'valid'; readonly chain: ValidatedChain };

/**
 * Mirror services: the stored logs and the validator that reads them.
 * Every read re-validates the DID's log against the current snapshot.
 */
export interface MirrorServices {
  readonly config: MirrorConfig;
  readonly store: LogStore;
  resolve(did: string): Resolution;
  audit(did: string): AuditReport | undefined;
}

export function createMirrorServices(config: MirrorConfig, store = new LogStore()): MirrorServices {
  const optionsFor = (did: string): ChainValidatorOptions => ({
    did,
    recoveryWindowMs: config.recoveryWindowMs,
  });

  return {
    config,
    store,

    resolve(did: string): Resolution {
      const entries = store.get(did);
      if (!entries) return { status: 'missing' };

      const result = new ChainValidator(optionsFor(did)).audit(entries);
      if (!result.chain) {
        return { status: 'invalid', code: result.code, reason: result.reason ?? 'Operation log failed validation' };
      }
      return { status: 'valid', chain: result.chain };
    },

    audit(did: string): AuditReport | undefined {
      const entries = store.get(did);
      return entries ? auditLog(entries, optionsFor(did)) : undefined;
    },
  };
}
