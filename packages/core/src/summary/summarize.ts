/**
 * ledgergate core — Session Summary
 *
 * Derived, non-authoritative statistics over a session's entries, for
 * reporting tools. The ledger itself remains the source of truth.
 */

import { AuditAction } from '../types/entry.js';
import type { LedgerEntry } from '../types/entry.js';

export interface ApprovalStats {
  readonly requested: number;
  readonly granted: number;
  readonly denied: number;
  readonly modified: number;
  /**
   * Percentage of decided requests that went ahead, counting modified
   * approvals as granted. 0 when nothing was decided.
   */
  readonly approval_rate: number;
}

export interface SessionStats {
  readonly session_id: string;
  readonly total_entries: number;
  readonly first_timestamp: string;
  readonly last_timestamp: string;
  readonly action_counts: Readonly<Record<string, number>>;
  readonly agent_counts: Readonly<Record<string, number>>;
  readonly total_duration_ms: number;
  readonly failed_count: number;
  /** Percentage of entries with success = true. */
  readonly success_rate: number;
  readonly approvals: ApprovalStats;
}

/** A session with no entries carries only its id and a zero count. */
export interface EmptySessionStats {
  readonly session_id: string;
  readonly total_entries: 0;
}

export type SessionSummary = SessionStats | EmptySessionStats;

export function isEmptySummary(summary: SessionSummary): summary is EmptySessionStats {
  return summary.total_entries === 0;
}

/** Summarize a session's entries, given in ledger order. */
export function summarizeEntries(
  sessionId: string,
  entries: ReadonlyArray<LedgerEntry>,
): SessionSummary {
  const first = entries[0];
  const last = entries[entries.length - 1];
  if (first === undefined || last === undefined) {
    return { session_id: sessionId, total_entries: 0 };
  }

  const actionCounts: Record<string, number> = {};
  const agentCounts: Record<string, number> = {};
  let totalDuration = 0;
  let failedCount = 0;

  for (const entry of entries) {
    actionCounts[entry.action] = (actionCounts[entry.action] ?? 0) + 1;
    agentCounts[entry.agent_id] = (agentCounts[entry.agent_id] ?? 0) + 1;
    if (entry.duration_ms !== null) {
      totalDuration += entry.duration_ms;
    }
    if (!entry.success) {
      failedCount++;
    }
  }

  const granted = actionCounts[AuditAction.ApprovalGranted] ?? 0;
  const denied = actionCounts[AuditAction.ApprovalDenied] ?? 0;
  const modified = actionCounts[AuditAction.ApprovalModified] ?? 0;
  const decided = granted + denied + modified;

  return {
    session_id: sessionId,
    total_entries: entries.length,
    first_timestamp: first.timestamp,
    last_timestamp: last.timestamp,
    action_counts: actionCounts,
    agent_counts: agentCounts,
    total_duration_ms: totalDuration,
    failed_count: failedCount,
    success_rate: ((entries.length - failedCount) / entries.length) * 100,
    approvals: {
      requested: actionCounts[AuditAction.ApprovalRequested] ?? 0,
      granted,
      denied,
      modified,
      approval_rate: decided === 0 ? 0 : ((granted + modified) / decided) * 100,
    },
  };
}
