/**
 * ledgergate cli — TerminalReviewer Tests
 *
 * Drives the interactive prompt with scripted answers. Verifies each of the
 * a/r/m/v choices, the per-action modify flows, and that a closed input
 * ends the review as a recorded rejection.
 */

import { describe, it, expect } from 'vitest';
import { AuditAction } from '@ledgergate/core';
import type { ApprovalRequest } from '@ledgergate/core';
import { ApprovalGate } from '@ledgergate/approval-gate';
import { HashChainLedger, MemoryLedgerStore } from '@ledgergate/runtime-host';
import { TerminalReviewer } from '../src/review/terminal-reviewer.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function scripted(answers: string[]) {
  const prompts: string[] = [];
  const printed: string[] = [];
  const ask = async (prompt: string): Promise<string> => {
    prompts.push(prompt);
    const next = answers.shift();
    if (next === undefined) throw new Error('input closed');
    return next;
  };
  const print = (line: string): void => {
    printed.push(line);
  };
  return { prompts, printed, ask, print };
}

function shellRequest(overrides: Partial<ApprovalRequest> = {}): ApprovalRequest {
  return {
    request_id: 'req_20260101_000000_0001',
    agent_id: 'agent-1',
    action_type: 'run_shell',
    description: 'List the workspace',
    proposal: { command: 'ls' },
    risk_level: 'low',
    reversible: true,
    timestamp: '2026-01-01T00:00:00.000Z',
    status: 'pending',
    ...overrides,
  };
}

const editRequest = shellRequest({
  action_type: 'edit_file',
  description: 'Update notes',
  proposal: { file_path: 'notes.txt', content: 'b\n' },
  original_content: 'a\n',
  proposed_content: 'b\n',
});

const genericRequest = shellRequest({
  action_type: 'generate_doc',
  description: 'Write the changelog',
  proposal: { title: 'Changelog' },
});

// ---------------------------------------------------------------------------
// Choices
// ---------------------------------------------------------------------------

describe('TerminalReviewer: choices', () => {
  it('approves with notes', async () => {
    const io = scripted(['a', 'looks fine']);
    const decision = await new TerminalReviewer(io).review(shellRequest());

    expect(decision).toEqual({ status: 'approved', notes: 'looks fine' });
    expect(io.prompts).toEqual([
      '\nYour decision [a/r/m/v]: ',
      'Notes (optional, press Enter to skip): ',
    ]);
  });

  it('treats blank notes as no notes', async () => {
    const io = scripted([' A ', '   ']);
    const decision = await new TerminalReviewer(io).review(shellRequest());
    expect(decision).toEqual({ status: 'approved', notes: undefined });
  });

  it('rejects with a reason', async () => {
    const io = scripted(['r', 'too broad']);
    const decision = await new TerminalReviewer(io).review(shellRequest());
    expect(decision).toEqual({ status: 'rejected', notes: 'too broad' });
    expect(io.prompts[1]).toBe('Reason for rejection: ');
  });

  it('re-prompts after an invalid choice and after viewing details', async () => {
    const io = scripted(['x', 'v', 'a', '']);
    const decision = await new TerminalReviewer(io).review(shellRequest());

    expect(decision.status).toBe('approved');
    expect(io.prompts.filter((p) => p === '\nYour decision [a/r/m/v]: ')).toHaveLength(3);
    expect(io.printed).toContain("Invalid choice. Please enter 'a', 'r', 'm', or 'v'.");
    expect(io.printed).toContain('--- Full Request Details ---');
    expect(io.printed).toContain('Timestamp: 2026-01-01T00:00:00.000Z');
  });

  it('prints the description through the style function', async () => {
    const io = scripted(['a', '']);
    await new TerminalReviewer({ ...io, style: (line) => `<${line}>` }).review(shellRequest());

    expect(io.printed[0]).toBe(`<${'='.repeat(70)}>`);
    expect(io.printed[1]).toBe('<APPROVAL REQUIRED>');
    expect(io.printed).toContain('<Command: ls>');
    // The options menu is not styled.
    expect(io.printed).toContain('  [a] Approve - proceed with the proposed action');
  });

  it('propagates a closed input', async () => {
    const io = scripted([]);
    await expect(new TerminalReviewer(io).review(shellRequest())).rejects.toThrow('input closed');
  });
});

// ---------------------------------------------------------------------------
// Modify flows
// ---------------------------------------------------------------------------

describe('TerminalReviewer: modify', () => {
  it('replaces a shell command', async () => {
    const io = scripted(['m', '  ls -la src ', 'narrowed to src']);
    const decision = await new TerminalReviewer(io).review(shellRequest());

    expect(decision).toEqual({
      status: 'modified',
      modifiedProposal: { command: 'ls -la src' },
      notes: 'narrowed to src',
    });
    expect(io.printed).toContain('Original command: ls');
  });

  it('reads replacement file content from a path', async () => {
    const io = scripted(['m', '/tmp/replacement.txt', '']);
    const reads: string[] = [];
    const readFile = (path: string): string => {
      reads.push(path);
      return 'c\n';
    };
    const decision = await new TerminalReviewer({ ...io, readFile }).review(editRequest);

    expect(reads).toEqual(['/tmp/replacement.txt']);
    expect(decision).toEqual({
      status: 'modified',
      modifiedProposal: { file_path: 'notes.txt', content: 'c\n' },
      notes: undefined,
    });
  });

  it('keeps the original edit when the replacement cannot be read', async () => {
    const io = scripted(['m', '/missing.txt', 'kept']);
    const readFile = (): string => {
      throw new Error('ENOENT: no such file');
    };
    const decision = await new TerminalReviewer({ ...io, readFile }).review(editRequest);

    expect(decision).toEqual({
      status: 'modified',
      modifiedProposal: { file_path: 'notes.txt', content: 'b\n' },
      notes: 'kept',
    });
    expect(io.printed).toContain('Error reading file: ENOENT: no such file');
  });

  it('parses a replacement JSON proposal', async () => {
    const io = scripted(['m', '{"title":"Release notes","draft":true}', '']);
    const decision = await new TerminalReviewer(io).review(genericRequest);

    expect(decision).toEqual({
      status: 'modified',
      modifiedProposal: { title: 'Release notes', draft: true },
      notes: undefined,
    });
  });

  it("keeps the original proposal on 'skip'", async () => {
    const io = scripted(['m', 'SKIP', '']);
    const decision = await new TerminalReviewer(io).review(genericRequest);
    expect(decision).toEqual({ status: 'modified', modifiedProposal: { title: 'Changelog' }, notes: undefined });
  });

  it('keeps the original proposal on invalid JSON', async () => {
    const io = scripted(['m', '{not json', '']);
    const decision = await new TerminalReviewer(io).review(genericRequest);

    expect(decision).toEqual({ status: 'modified', modifiedProposal: { title: 'Changelog' }, notes: undefined });
    expect(io.printed.some((line) => line.startsWith('Invalid JSON: '))).toBe(true);
    expect(io.printed).toContain('Keeping the original proposal.');
  });
});

// ---------------------------------------------------------------------------
// Through the gate
// ---------------------------------------------------------------------------

describe('TerminalReviewer with ApprovalGate', () => {
  function setup(answers: string[]) {
    const ledger = HashChainLedger.open(new MemoryLedgerStore(), { sessionId: 'S1' });
    const io = scripted(answers);
    const gate = new ApprovalGate({ recorder: ledger, reviewer: new TerminalReviewer(io) });
    return { ledger, io, gate };
  }

  it('records a rejection with the typed reason', async () => {
    const { ledger, io, gate } = setup(['r', 'not on main']);
    const request = gate.requestShellCommand('agent-1', 'rm -rf build', 'Clean build output');

    const response = await gate.decide(request.request_id);

    expect(response.status).toBe('rejected');
    expect(response.notes).toBe('not on main');
    expect(io.printed).toContain('Reversible: NO - IRREVERSIBLE');

    const denials = Array.from(ledger.query({ action: AuditAction.ApprovalDenied }));
    expect(denials).toHaveLength(1);
    expect(denials[0]?.reasoning).toBe('not on main');
    expect(ledger.verify().valid).toBe(true);
  });

  it('records a closed input as a rejection and clears the request', async () => {
    const { ledger, gate } = setup([]);
    const request = gate.requestShellCommand('agent-1', 'ls', 'List files');

    const response = await gate.decide(request.request_id);

    expect(response.status).toBe('rejected');
    expect(gate.pending()).toEqual([]);
    expect(Array.from(ledger.query()).map((e) => e.action)).toEqual([
      AuditAction.ApprovalRequested,
      AuditAction.ApprovalDenied,
    ]);
  });
});
