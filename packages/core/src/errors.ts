/**
 * ledgergate core — Error Types
 */

import type { ChainViolation } from './verification/chain.js';

/**
 * Thrown when a ledger's existing chain fails verification at open time.
 *
 * The ledger refuses to initialize rather than append onto a compromised
 * history. Never auto-repaired: the violations are for a human to act on.
 */
export class LedgerIntegrityError extends Error {
  constructor(
    readonly location: string,
    readonly violations: ReadonlyArray<ChainViolation>,
  ) {
    super(
      `Audit log integrity check failed for ${location}: ` +
        `${violations.length} violation(s); first: ${violations[0]?.message ?? 'unknown'}`,
    );
    this.name = 'LedgerIntegrityError';
  }
}

/**
 * Thrown when the approval workflow is misused: deciding or cancelling an
 * unknown request, deciding one that is already decided or has a decision
 * in flight, or deciding with no way to obtain a decision.
 *
 * Usage errors never write to the ledger.
 */
export class ApprovalUsageError extends Error {
  constructor(
    message: string,
    readonly requestId?: string,
  ) {
    super(message);
    this.name = 'ApprovalUsageError';
  }
}
