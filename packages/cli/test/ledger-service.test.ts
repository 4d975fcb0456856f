/**
 * ledgergate cli — LedgerService Tests
 *
 * The dashboard's read-only view: fresh reads on every call, strict
 * verification reported rather than thrown.
 */

import { describe, it, expect } from 'vitest';
import { AuditAction } from '@ledgergate/core';
import { HashChainLedger, MemoryLedgerStore } from '@ledgergate/runtime-host';
import { LedgerService } from '../src/tui/services/index.js';

function seeded(): { store: MemoryLedgerStore; second: HashChainLedger } {
  const store = new MemoryLedgerStore();
  const first = HashChainLedger.open(store, { sessionId: 'S1' });
  first.append(AuditAction.AgentInvoked, 'agent-1');
  first.append(AuditAction.ToolCalled, 'agent-1');
  first.append(AuditAction.AgentCompleted, 'agent-1', { durationMs: 15 });
  const second = HashChainLedger.open(store, { sessionId: 'S2' });
  second.append(AuditAction.ApprovalRequested, 'agent-2');
  second.append(AuditAction.ApprovalGranted, 'agent-2');
  return { store, second };
}

describe('LedgerService', () => {
  it('reports a valid chain and its head', async () => {
    const { store, second } = seeded();
    const integrity = await new LedgerService(store).getIntegrity();

    expect(integrity).toEqual({
      location: 'memory://ledger',
      valid: true,
      recordsChecked: 5,
      violations: [],
      headHash: second.lastHash,
      headSequence: 5,
    });
  });

  it('finds the latest session and its recent entries', async () => {
    const { store } = seeded();
    const service = new LedgerService(store);

    expect(await service.getLatestSessionId()).toBe('S2');
    expect((await service.getRecentEntries(2)).map((e) => e.sequence_num)).toEqual([4, 5]);
    expect((await service.getRecentEntries(10, 'S1')).map((e) => e.sequence_num)).toEqual([1, 2, 3]);

    const summary = await service.getSummary('S1');
    expect(summary.total_entries).toBe(3);
  });

  it('sees entries appended after it was created', async () => {
    const { store, second } = seeded();
    const service = new LedgerService(store);
    second.append(AuditAction.SystemOutput, 'agent-2');

    expect((await service.getIntegrity()).headSequence).toBe(6);
  });

  it('reports tampering instead of throwing', async () => {
    const { store } = seeded();
    store.overwrite(store.readRaw().replace('"agent_id":"agent-2"', '"agent_id":"agent-3"'));

    const integrity = await new LedgerService(store).getIntegrity();
    expect(integrity.valid).toBe(false);
    expect(integrity.violations.map((v) => [v.kind, v.sequence])).toEqual([['hash_mismatch', 4], ['broken_link', 5]]);
  });

  it('flags a torn final line', async () => {
    const { store } = seeded();
    store.overwrite(store.readRaw() + '{"timestamp":');

    const integrity = await new LedgerService(store).getIntegrity();
    expect(integrity.valid).toBe(false);
    expect(integrity.violations.map((v) => v.kind)).toEqual(['malformed']);
    expect(integrity.recordsChecked).toBe(6);
  });

  it('handles an empty log', async () => {
    const service = new LedgerService(new MemoryLedgerStore());
    expect(await service.getLatestSessionId()).toBeNull();
    expect(await service.getIntegrity()).toMatchObject({ valid: true, headHash: '', headSequence: 0 });
  });
});
