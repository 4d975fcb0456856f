/**
 * ledgergate core — Approval Types
 *
 * Defines the approval request/response model: a point-in-time proposal
 * from an agent and the terminal decision a reviewer makes about it.
 *
 * These are pure data shapes. ApprovalGate (packages/approval-gate) owns the
 * state machine and writes both halves of every request to the ledger.
 *
 * State machine:
 *   pending → approved   Reviewer accepted the proposal as-is
 *   pending → rejected   Reviewer refused, or the decision was cancelled
 *   pending → modified   Reviewer supplied a replacement proposal
 *
 * All three outcomes are terminal. A request never returns to 'pending'
 * and is never decided twice.
 */

import type { JsonValue } from './json.js';

// ---------------------------------------------------------------------------
// Status and risk
// ---------------------------------------------------------------------------

/** Lifecycle status of an approval request. */
export type ApprovalStatus = 'pending' | 'approved' | 'rejected' | 'modified';

/** The statuses a decision may end in. */
export type TerminalStatus = Exclude<ApprovalStatus, 'pending'>;

export const TERMINAL_STATUSES: ReadonlyArray<TerminalStatus> = ['approved', 'rejected', 'modified'];

export function isTerminalStatus(value: unknown): value is TerminalStatus {
  return typeof value === 'string' && (TERMINAL_STATUSES as ReadonlyArray<string>).includes(value);
}

/**
 * Advisory risk classification shown to the reviewer.
 * The gate never blocks on risk; it only guarantees a recorded decision.
 */
export type RiskLevel = 'low' | 'medium' | 'high';

export const RISK_LEVELS: ReadonlyArray<RiskLevel> = ['low', 'medium', 'high'];

export function isRiskLevel(value: unknown): value is RiskLevel {
  return typeof value === 'string' && (RISK_LEVELS as ReadonlyArray<string>).includes(value);
}

// ---------------------------------------------------------------------------
// Proposal payloads
// ---------------------------------------------------------------------------

/** Proposal carried by a file edit request. */
export type FileEditProposal = {
  readonly file_path: string;
  readonly content: string;
};

/** Proposal carried by a shell command request. */
export type ShellCommandProposal = {
  readonly command: string;
};

/** Action types with a dedicated request variant and presentation. */
export const EDIT_FILE_ACTION = 'edit_file';
export const RUN_SHELL_ACTION = 'run_shell';

// ---------------------------------------------------------------------------
// ApprovalRequest
// ---------------------------------------------------------------------------

/**
 * A request for a human decision on a side-effecting proposal.
 *
 * Created by ApprovalGate in 'pending' status. A status transition produces
 * a new record with the decision fields populated; ApprovalGate.get()
 * returns whichever record is current.
 */
export interface ApprovalRequest {
  /** Unique identifier, e.g. `req_20260101_120000_0001`. */
  readonly request_id: string;
  readonly agent_id: string;
  /** e.g. 'edit_file', 'run_shell', 'generate_doc'. */
  readonly action_type: string;
  /** Human-readable summary of the proposed action. */
  readonly description: string;
  /** The proposed change. Opaque to the gate. */
  readonly proposal: JsonValue;
  readonly context?: string | undefined;
  readonly risk_level: RiskLevel;
  /** Whether the action can be undone. Advisory. */
  readonly reversible: boolean;
  /** Content before the change, for diff display. */
  readonly original_content?: string | undefined;
  /** Content after the change, for diff display. */
  readonly proposed_content?: string | undefined;
  /** ISO 8601 creation timestamp. */
  readonly timestamp: string;
  readonly status: ApprovalStatus;
  /** The decision notes, set on the decided record. */
  readonly reviewer_notes?: string | undefined;
}

// ---------------------------------------------------------------------------
// ApprovalResponse
// ---------------------------------------------------------------------------

/**
 * The terminal decision for a request.
 *
 * `modified_proposal` is only meaningful when status is 'modified'; it is
 * then the authoritative action to execute in place of the original.
 */
export interface ApprovalResponse {
  readonly request_id: string;
  readonly status: TerminalStatus;
  readonly modified_proposal?: JsonValue | undefined;
  readonly notes?: string | undefined;
  /** ISO 8601 timestamp of the decision. */
  readonly timestamp: string;
}

/**
 * What a reviewer hands back. The gate stamps request_id and timestamp.
 */
export type ReviewDecision =
  | { readonly status: 'approved'; readonly notes?: string | undefined }
  | { readonly status: 'rejected'; readonly notes?: string | undefined }
  | {
      readonly status: 'modified';
      readonly modifiedProposal?: JsonValue | undefined;
      readonly notes?: string | undefined;
    };

/**
 * The reviewer-facing presentation contract.
 *
 * Implementations (terminal prompt, dashboard, test doubles) are handed a
 * pending request and resolve with one of the three terminal decisions.
 * A rejected promise is treated as a cancelled review.
 */
export interface Reviewer {
  review(request: ApprovalRequest): Promise<ReviewDecision>;
}
