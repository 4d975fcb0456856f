/**
 * TerminalReviewer — interactive approval prompt.
 *
 * Shows the request (with a coloured diff for file edits), then loops on:
 *   a  approve as proposed
 *   r  reject, with a reason
 *   m  modify, then approve the replacement
 *   v  show every field of the request
 *
 * Input and output are injected so the prompt runs against readline in the
 * CLI and against scripted answers in tests. A rejected `ask` (closed stdin,
 * Ctrl-C) propagates; the gate records it as a rejection.
 */

import { readFileSync } from 'node:fs';
import { EDIT_FILE_ACTION, RUN_SHELL_ACTION, isJsonValue } from '@ledgergate/core';
import type { ApprovalRequest, JsonValue, ReviewDecision, Reviewer } from '@ledgergate/core';
import {
  describeRequest,
  describeRequestDetails,
  proposedCommand,
  proposedFilePath,
} from '@ledgergate/approval-gate';

export interface TerminalReviewerOptions {
  /** Prompt for one line of input. */
  readonly ask: (prompt: string) => Promise<string>;
  /** Write one line of output. */
  readonly print: (line: string) => void;
  /** Applied to each request description line. Default: unchanged. */
  readonly style?: ((line: string) => string) | undefined;
  /** Reads replacement content for file edits. Default: fs, utf-8. */
  readonly readFile?: ((path: string) => string) | undefined;
}

const OPTIONS_HELP = [
  '',
  'Options:',
  '  [a] Approve - proceed with the proposed action',
  '  [r] Reject  - do not perform this action',
  '  [m] Modify  - edit the proposal before approving',
  '  [v] View    - show full request details',
];

export class TerminalReviewer implements Reviewer {
  private readonly ask: (prompt: string) => Promise<string>;
  private readonly print: (line: string) => void;
  private readonly style: (line: string) => string;
  private readonly readFile: (path: string) => string;

  constructor(opts: TerminalReviewerOptions) {
    this.ask = opts.ask;
    this.print = opts.print;
    this.style = opts.style ?? ((line) => line);
    this.readFile = opts.readFile ?? ((path) => readFileSync(path, 'utf-8'));
  }

  async review(request: ApprovalRequest): Promise<ReviewDecision> {
    for (const line of describeRequest(request)) {
      this.print(this.style(line));
    }
    OPTIONS_HELP.forEach((line) => this.print(line));

    for (;;) {
      const choice = (await this.ask('\nYour decision [a/r/m/v]: ')).trim().toLowerCase();

      if (choice === 'a') {
        const notes = (await this.ask('Notes (optional, press Enter to skip): ')).trim();
        return { status: 'approved', notes: notes === '' ? undefined : notes };
      }

      if (choice === 'r') {
        const notes = (await this.ask('Reason for rejection: ')).trim();
        return { status: 'rejected', notes: notes === '' ? undefined : notes };
      }

      if (choice === 'm') {
        const modifiedProposal = await this.modify(request);
        const notes = (await this.ask('Notes on modification: ')).trim();
        return { status: 'modified', modifiedProposal, notes: notes === '' ? undefined : notes };
      }

      if (choice === 'v') {
        this.print('');
        describeRequestDetails(request).forEach((line) => this.print(line));
        continue;
      }

      this.print("Invalid choice. Please enter 'a', 'r', 'm', or 'v'.");
    }
  }

  private async modify(request: ApprovalRequest): Promise<JsonValue> {
    if (request.action_type === RUN_SHELL_ACTION) {
      this.print(`Original command: ${proposedCommand(request) ?? 'N/A'}`);
      const command = (await this.ask('Enter modified command: ')).trim();
      return { command };
    }

    if (request.action_type === EDIT_FILE_ACTION) {
      const source = (await this.ask('Path of a file containing the modified content: ')).trim();
      try {
        return { file_path: proposedFilePath(request) ?? null, content: this.readFile(source) };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.print(`Error reading file: ${message}`);
        this.print('Keeping the original proposal.');
        return request.proposal;
      }
    }

    this.print(`Current proposal: ${JSON.stringify(request.proposal, null, 2)}`);
    const text = (await this.ask("Enter modified proposal as JSON (or 'skip' to keep original): ")).trim();
    if (text.toLowerCase() === 'skip') {
      return request.proposal;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      if (isJsonValue(parsed)) return parsed;
      this.print('Invalid JSON: not a plain JSON value');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.print(`Invalid JSON: ${message}`);
    }
    this.print('Keeping the original proposal.');
    return request.proposal;
  }
}
