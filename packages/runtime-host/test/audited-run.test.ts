/**
 * ledgergate runtime host — Audited Run Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AuditAction } from '@ledgergate/core';
import type { ApprovalResponse, LedgerEntry } from '@ledgergate/core';
import { HashChainLedger } from '../src/ledger/hash-chain-ledger.js';
import { MemoryLedgerStore } from '../src/state/ledger-store.js';
import { runAudited } from '../src/harness/audited-run.js';

let ledger: HashChainLedger;

beforeEach(() => {
  ledger = HashChainLedger.open(new MemoryLedgerStore(), { sessionId: 'S1' });
});

/** A clock that reads 1000 at the start of the run and 1250 at the end. */
function stopwatch(): () => number {
  const ticks = [1000, 1250];
  return () => ticks.shift() ?? 0;
}

function decision(status: ApprovalResponse['status']): ApprovalResponse {
  return { request_id: 'req_1', status, timestamp: '2026-01-01T00:00:00.000Z' };
}

function entries(): LedgerEntry[] {
  return Array.from(ledger.query());
}

describe('runAudited', () => {
  it('records the invocation and completion with duration and approval counts', async () => {
    const result = await runAudited(
      ledger,
      'analyst',
      async (run) => {
        run.countApproval(decision('approved'));
        run.countApproval(decision('modified'));
        run.countApproval(decision('rejected'));
        return 'done';
      },
      { input: { task: 'summarize' }, modelName: 'test-model', now: stopwatch() },
    );

    expect(result).toEqual({
      success: true,
      agentId: 'analyst',
      output: 'done',
      durationMs: 250,
      approvals: { requested: 3, granted: 2, denied: 1 },
    });

    const [invoked, completed] = entries();
    expect(invoked).toMatchObject({
      action: AuditAction.AgentInvoked,
      agent_id: 'analyst',
      input_data: '{"task":"summarize"}',
      reasoning: 'Starting analyst',
      model_name: 'test-model',
      duration_ms: null,
    });
    expect(completed).toMatchObject({
      action: AuditAction.AgentCompleted,
      output_data: '{"approvals_denied":1,"approvals_granted":2,"approvals_requested":3,"output":"done"}',
      duration_ms: 250,
      success: true,
      error_message: null,
    });
    expect(ledger.verify().valid).toBe(true);
  });

  it('records a failure and hands the error back instead of throwing', async () => {
    const result = await runAudited(
      ledger,
      'analyst',
      async () => {
        throw new TypeError('bad input');
      },
      { now: stopwatch() },
    );

    expect(result).toEqual({
      success: false,
      agentId: 'analyst',
      errorMessage: 'bad input',
      errorType: 'TypeError',
      durationMs: 250,
      approvals: { requested: 0, granted: 0, denied: 0 },
    });
    expect(entries().map((e) => e.action)).toEqual([AuditAction.AgentInvoked, AuditAction.AgentFailed]);
    expect(entries()[1]).toMatchObject({
      output_data: 'bad input',
      reasoning: 'Agent failed with TypeError',
      duration_ms: 250,
      success: false,
      error_message: 'bad input',
    });
  });

  it('describes a thrown non-error by its type', async () => {
    const result = await runAudited(ledger, 'analyst', () => Promise.reject('quota exceeded'), { now: stopwatch() });
    expect(result).toMatchObject({ success: false, errorMessage: 'quota exceeded', errorType: 'string' });
  });

  it('logs an output that is not plain JSON as null', async () => {
    await runAudited(ledger, 'analyst', async () => ({ count: 1n }), { now: stopwatch() });
    expect(entries()[1]?.output_data).toBe(
      '{"approvals_denied":0,"approvals_granted":0,"approvals_requested":0,"output":null}',
    );
  });

  it('exposes the recorder session to the work', async () => {
    const result = await runAudited(ledger, 'analyst', async (run) => run.sessionId);
    expect(result).toMatchObject({ success: true, output: 'S1' });
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('does not start the work when the invocation cannot be recorded', async () => {
    let started = false;
    const failing = {
      sessionId: 'S1',
      append(): LedgerEntry {
        throw new Error('disk full');
      },
    };

    await expect(
      runAudited(failing, 'analyst', async () => {
        started = true;
      }),
    ).rejects.toThrow('disk full');
    expect(started).toBe(false);
  });
});
