/**
 * ledgergate core — Session Summary Tests
 */

import { describe, it, expect } from 'vitest';
import { AuditAction } from '../src/types/entry.js';
import type { LedgerEntry } from '../src/types/entry.js';
import { sealEntry } from '../src/hashing/entry-hash.js';
import { isEmptySummary, summarizeEntries } from '../src/summary/summarize.js';

function entry(
  seq: number,
  action: AuditAction,
  agentId: string,
  extra: Partial<Pick<LedgerEntry, 'duration_ms' | 'success'>> = {},
): LedgerEntry {
  return sealEntry({
    timestamp: `2026-03-0${seq}T12:00:00.000Z`,
    action,
    agent_id: agentId,
    session_id: 'S1',
    input_data: null,
    output_data: null,
    reasoning: null,
    sequence_num: seq,
    previous_hash: '',
    model_name: null,
    duration_ms: extra.duration_ms ?? null,
    success: extra.success ?? true,
    error_message: null,
  });
}

describe('summarizeEntries', () => {
  it('returns only the session id and a zero count for no entries', () => {
    const summary = summarizeEntries('S0', []);
    expect(summary).toEqual({ session_id: 'S0', total_entries: 0 });
    expect(isEmptySummary(summary)).toBe(true);
  });

  it('counts actions and agents and spans first to last timestamp', () => {
    const summary = summarizeEntries('S1', [
      entry(1, AuditAction.AgentInvoked, 'analyst'),
      entry(2, AuditAction.ToolCalled, 'analyst', { duration_ms: 120 }),
      entry(3, AuditAction.ToolResult, 'analyst', { duration_ms: 30 }),
      entry(4, AuditAction.AgentCompleted, 'reviewer'),
    ]);
    if (isEmptySummary(summary)) throw new Error('expected stats');

    expect(summary.total_entries).toBe(4);
    expect(summary.first_timestamp).toBe('2026-03-01T12:00:00.000Z');
    expect(summary.last_timestamp).toBe('2026-03-04T12:00:00.000Z');
    expect(summary.action_counts).toEqual({
      agent_invoked: 1,
      tool_called: 1,
      tool_result: 1,
      agent_completed: 1,
    });
    expect(summary.agent_counts).toEqual({ analyst: 3, reviewer: 1 });
    expect(summary.total_duration_ms).toBe(150);
    expect(summary.failed_count).toBe(0);
    expect(summary.success_rate).toBe(100);
  });

  it('derives the success rate from failed entries', () => {
    const summary = summarizeEntries('S1', [
      entry(1, AuditAction.ToolCalled, 'a'),
      entry(2, AuditAction.AgentFailed, 'a', { success: false }),
      entry(3, AuditAction.ToolCalled, 'a'),
      entry(4, AuditAction.AgentFailed, 'a', { success: false }),
    ]);
    if (isEmptySummary(summary)) throw new Error('expected stats');
    expect(summary.failed_count).toBe(2);
    expect(summary.success_rate).toBe(50);
  });

  it('counts modified approvals as granted in the approval rate', () => {
    const summary = summarizeEntries('S1', [
      entry(1, AuditAction.ApprovalRequested, 'a'),
      entry(2, AuditAction.ApprovalGranted, 'human'),
      entry(3, AuditAction.ApprovalRequested, 'a'),
      entry(4, AuditAction.ApprovalModified, 'human'),
      entry(5, AuditAction.ApprovalRequested, 'a'),
      entry(6, AuditAction.ApprovalDenied, 'human'),
      entry(7, AuditAction.ApprovalRequested, 'a'),
      entry(8, AuditAction.ApprovalGranted, 'human'),
    ]);
    if (isEmptySummary(summary)) throw new Error('expected stats');
    expect(summary.approvals).toEqual({
      requested: 4,
      granted: 2,
      denied: 1,
      modified: 1,
      approval_rate: 75,
    });
  });

  it('reports an approval rate of 0 when nothing was decided', () => {
    const summary = summarizeEntries('S1', [entry(1, AuditAction.ApprovalRequested, 'a')]);
    if (isEmptySummary(summary)) throw new Error('expected stats');
    expect(summary.approvals.approval_rate).toBe(0);
  });
});
