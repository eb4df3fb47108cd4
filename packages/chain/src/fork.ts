import type { AcceptedOperation, ValidationErrorCode } from '@plclog/types';
import { compareCids } from '@plclog/codec';

export const DEFAULT_RECOVERY_WINDOW_MS = 72 * 60 * 60 * 1000;

export type ForkDecision =
  | { readonly supersede: true }
  | { readonly supersede: false; readonly code: ValidationErrorCode; readonly reason: string };

const SUPERSEDE: ForkDecision = { supersede: true };

/**
 * Decide whether `candidate` displaces `standing`, the accepted operation
 * that already follows their common parent.
 *
 * The winner does not depend on which of the two is standing:
 * - with equal signer index the earlier operation wins, then the smaller CID;
 * - otherwise the higher-authority operation wins unless it was created a full
 *   recovery window or more after the other one.
 */
export function resolveFork(
  standing: AcceptedOperation,
  candidate: AcceptedOperation,
  recoveryWindowMs: number = DEFAULT_RECOVERY_WINDOW_MS,
): ForkDecision {
  const elapsedMs = Date.parse(candidate.createdAt) - Date.parse(standing.createdAt);

  if (candidate.signerIndex === standing.signerIndex) {
    const order = elapsedMs === 0 ? compareCids(candidate.cid, standing.cid) : elapsedMs;
    if (order < 0) return SUPERSEDE;
    return {
      supersede: false,
      code: 'ForkRejected',
      reason: `Signed by rotation key ${candidate.signerIndex}, as is the earlier ${standing.cid}`,
    };
  }

  if (candidate.signerIndex < standing.signerIndex) {
    if (elapsedMs < recoveryWindowMs) return SUPERSEDE;
    return {
      supersede: false,
      code: 'RecoveryWindowExpired',
      reason: `Recovery of ${standing.cid} attempted ${elapsedMs}ms after it, window is ${recoveryWindowMs}ms`,
    };
  }

  // standing outranks the candidate but came too late to override it
  if (-elapsedMs >= recoveryWindowMs) return SUPERSEDE;

  return {
    supersede: false,
    code: 'ForkRejected',
    reason: `Signed by rotation key ${candidate.signerIndex}, which does not outrank key ${standing.signerIndex} of ${standing.cid}`,
  };
}
