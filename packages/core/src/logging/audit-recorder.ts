/**
 * ledgergate core — Audit Recorder Interface
 *
 * The narrow write-side contract consumed by components that must leave an
 * audit trail (ApprovalGate, agent harnesses). HashChainLedger in the
 * runtime host is the production implementation; tests may inject their own.
 *
 * An entry is durable when record() returns. A failure to record throws to
 * the caller; an unrecorded action must never look recorded.
 */

import type { AppendOptions, AuditAction, LedgerEntry } from '../types/entry.js';

export interface AuditRecorder {
  /** The session new entries are written under. */
  readonly sessionId: string;

  append(action: AuditAction, agentId: string, opts?: AppendOptions): LedgerEntry;
}
