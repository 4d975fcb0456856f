/**
 * ledgergate approval gate — ApprovalGate
 *
 * Forces every side-effecting proposal through an explicit decision and
 * records both halves of it in the ledger: an `approval_requested` entry
 * when the request is made, and exactly one `approval_granted`,
 * `approval_denied` or `approval_modified` entry when it is decided.
 *
 * State machine (per request):
 *   pending → approved   Reviewer accepted the proposal as-is
 *   pending → rejected   Reviewer refused, the review failed, or it was cancelled
 *   pending → modified   Reviewer supplied a replacement proposal
 *
 * All outcomes are terminal. A decided request is never decided again.
 * Deciding replaces the pending record with a new one carrying the final
 * status and reviewer notes; get() returns the current record.
 *
 * Concurrency:
 *   decide() suspends for as long as the reviewer takes. Nothing is held
 *   while it waits: ledger appends are synchronous and happen before and
 *   after the wait, never across it. The pending table is only touched
 *   synchronously, so pending() always sees a consistent snapshot.
 *
 * Decision sources, in order:
 *   autoApprove  — explicit opt-in for non-interactive pipelines and tests
 *   reviewer     — any Reviewer (terminal prompt, dashboard, test double)
 */

import {
  ApprovalUsageError,
  AuditAction,
  EDIT_FILE_ACTION,
  RUN_SHELL_ACTION,
  isTerminalStatus,
} from '@ledgergate/core';
import type {
  ApprovalRequest,
  ApprovalResponse,
  AuditRecorder,
  FileEditProposal,
  JsonValue,
  ReviewDecision,
  Reviewer,
  RiskLevel,
  ShellCommandProposal,
  TerminalStatus,
} from '@ledgergate/core';
import { isReversibleCommand } from './shell-risk.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const AUTO_APPROVE_NOTES = 'Auto-approved (non-interactive mode)';
export const CANCELLED_NOTES = 'cancelled';

const DECISION_ACTIONS: Readonly<Record<TerminalStatus, AuditAction>> = {
  approved: AuditAction.ApprovalGranted,
  rejected: AuditAction.ApprovalDenied,
  modified: AuditAction.ApprovalModified,
};

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ApprovalGateOptions {
  /** Where requests and decisions are recorded. */
  readonly recorder: AuditRecorder;
  /** Source of human decisions. Required unless autoApprove is set. */
  readonly reviewer?: Reviewer | undefined;
  /**
   * Approve every request without asking. Strictly for non-interactive
   * and test contexts; the ledger entries are the same as for a human
   * decision. Default: false.
   */
  readonly autoApprove?: boolean | undefined;
  readonly clock?: (() => Date) | undefined;
}

export interface RequestOptions {
  readonly context?: string | undefined;
  /** Default: 'medium'. */
  readonly riskLevel?: RiskLevel | undefined;
  /** Default: true. */
  readonly reversible?: boolean | undefined;
}

export type ShellRequestOptions = Omit<RequestOptions, 'reversible'>;

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------

type ReviewOutcome =
  | { readonly cancelled: false; readonly decision: ReviewDecision }
  | { readonly cancelled: true };

interface PendingEntry {
  readonly request: ApprovalRequest;
  /** Present while a decide() call is waiting on the reviewer. */
  abort?: (() => void) | undefined;
}

// ---------------------------------------------------------------------------
// ApprovalGate
// ---------------------------------------------------------------------------

export class ApprovalGate {
  private readonly recorder: AuditRecorder;
  private readonly reviewer: Reviewer | undefined;
  private readonly autoApprove: boolean;
  private readonly clock: () => Date;

  private readonly pendingTable: Map<string, PendingEntry> = new Map();
  private readonly decidedTable: Map<string, ApprovalRequest> = new Map();
  private requestCounter = 0;

  constructor(opts: ApprovalGateOptions) {
    this.recorder = opts.recorder;
    this.reviewer = opts.reviewer;
    this.autoApprove = opts.autoApprove ?? false;
    this.clock = opts.clock ?? ((): Date => new Date());
  }

  // -------------------------------------------------------------------------
  // request
  // -------------------------------------------------------------------------

  /**
   * Submit a proposal for a decision.
   *
   * The request is recorded before it becomes pending: if the ledger write
   * fails, the error propagates and no request exists.
   */
  request(
    agentId: string,
    actionType: string,
    proposal: JsonValue,
    description: string,
    opts?: RequestOptions,
  ): ApprovalRequest {
    return this.submit(
      {
        agent_id: agentId,
        action_type: actionType,
        description,
        proposal,
        context: opts?.context,
        risk_level: opts?.riskLevel ?? 'medium',
        reversible: opts?.reversible ?? true,
      },
      {},
    );
  }

  /** Submit a file edit, keeping both versions for diff display. */
  requestFileEdit(
    agentId: string,
    filePath: string,
    originalContent: string,
    proposedContent: string,
    description: string,
    context?: string,
  ): ApprovalRequest {
    const proposal: FileEditProposal = { file_path: filePath, content: proposedContent };
    return this.submit(
      {
        agent_id: agentId,
        action_type: EDIT_FILE_ACTION,
        description,
        proposal,
        context,
        risk_level: 'medium',
        reversible: true,
        original_content: originalContent,
        proposed_content: proposedContent,
      },
      { file_path: filePath },
    );
  }

  /** Submit a shell command. Reversibility is derived from the command text. */
  requestShellCommand(
    agentId: string,
    command: string,
    description: string,
    opts?: ShellRequestOptions,
  ): ApprovalRequest {
    const proposal: ShellCommandProposal = { command };
    return this.submit(
      {
        agent_id: agentId,
        action_type: RUN_SHELL_ACTION,
        description,
        proposal,
        context: opts?.context,
        risk_level: opts?.riskLevel ?? 'medium',
        reversible: isReversibleCommand(command),
      },
      { command },
    );
  }

  // -------------------------------------------------------------------------
  // decide
  // -------------------------------------------------------------------------

  /**
   * Obtain and record the decision for a pending request.
   *
   * A reviewer failure (EOF, interrupt, thrown error) is a rejection with
   * notes `Cancelled: <reason>`. The decision entry is on the ledger
   * before the promise resolves; if that write fails the error propagates
   * and the request stays pending.
   *
   * @throws {ApprovalUsageError} for unknown, decided or in-flight requests,
   *   or when the gate has no way to obtain a decision
   */
  async decide(target: ApprovalRequest | string): Promise<ApprovalResponse> {
    const requestId = typeof target === 'string' ? target : target.request_id;
    const entry = this.pendingTable.get(requestId);
    if (entry === undefined) {
      throw new ApprovalUsageError(
        this.decidedTable.has(requestId)
          ? `Approval request ${requestId} has already been decided`
          : `Unknown approval request: ${requestId}`,
        requestId,
      );
    }
    if (entry.abort !== undefined) {
      throw new ApprovalUsageError(`A decision for ${requestId} is already in progress`, requestId);
    }
    if (!this.autoApprove && this.reviewer === undefined) {
      throw new ApprovalUsageError('No reviewer configured and auto-approve is off', requestId);
    }

    const outcome = await this.awaitReview(entry);
    entry.abort = undefined;

    if (outcome.cancelled || !this.pendingTable.has(requestId)) {
      // cancel() has already recorded the denial and cleared the request.
      return this.respond(requestId, 'rejected', CANCELLED_NOTES, undefined);
    }

    const { decision } = outcome;
    const request = entry.request;
    let modifiedProposal: JsonValue | undefined;
    if (decision.status === 'modified') {
      modifiedProposal = decision.modifiedProposal ?? request.proposal;
    }

    this.recorder.append(DECISION_ACTIONS[decision.status], request.agent_id, {
      inputData: { request_id: requestId },
      outputData: {
        status: decision.status,
        notes: decision.notes ?? null,
        modified: decision.status === 'modified',
        modified_proposal: modifiedProposal,
      },
      reasoning: decision.notes,
    });

    this.settle(request, decision.status, decision.notes);
    return this.respond(requestId, decision.status, decision.notes, modifiedProposal);
  }

  // -------------------------------------------------------------------------
  // pending / cancel
  // -------------------------------------------------------------------------

  /** Snapshot of outstanding requests, oldest first. */
  pending(): ReadonlyArray<ApprovalRequest> {
    return Array.from(this.pendingTable.values(), (e) => e.request);
  }

  /** The current record for a request: pending or decided. */
  get(requestId: string): ApprovalRequest | undefined {
    return this.pendingTable.get(requestId)?.request ?? this.decidedTable.get(requestId);
  }

  /**
   * Withdraw a pending request without a human decision, recording it as
   * denied. A decide() waiting on this request resolves as rejected.
   *
   * @returns false when the id is unknown or already decided
   */
  cancel(requestId: string): boolean {
    const entry = this.pendingTable.get(requestId);
    if (entry === undefined) return false;

    this.recorder.append(AuditAction.ApprovalDenied, entry.request.agent_id, {
      inputData: { request_id: requestId },
      outputData: { status: 'cancelled' },
      reasoning: CANCELLED_NOTES,
    });

    this.settle(entry.request, 'rejected', CANCELLED_NOTES);
    entry.abort?.();
    return true;
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private submit(
    fields: Omit<ApprovalRequest, 'request_id' | 'timestamp' | 'status'>,
    loggedExtras: Readonly<Record<string, string>>,
  ): ApprovalRequest {
    const now = this.clock();
    const request: ApprovalRequest = {
      ...fields,
      request_id: this.nextRequestId(now),
      timestamp: now.toISOString(),
      status: 'pending',
    };

    this.recorder.append(AuditAction.ApprovalRequested, request.agent_id, {
      inputData: {
        request_id: request.request_id,
        action_type: request.action_type,
        description: request.description,
        risk_level: request.risk_level,
        ...loggedExtras,
      },
      reasoning: request.context,
    });

    this.pendingTable.set(request.request_id, { request });
    return request;
  }

  /** Race the reviewer against cancel(). Never rejects. */
  private awaitReview(entry: PendingEntry): Promise<ReviewOutcome> {
    return new Promise<ReviewOutcome>((resolve) => {
      entry.abort = (): void => resolve({ cancelled: true });
      void this.askReviewer(entry.request).then(
        (decision) => resolve({ cancelled: false, decision }),
        (err: unknown) =>
          resolve({
            cancelled: false,
            decision: { status: 'rejected', notes: `Cancelled: ${describeError(err)}` },
          }),
      );
    });
  }

  private async askReviewer(request: ApprovalRequest): Promise<ReviewDecision> {
    if (this.autoApprove) {
      return { status: 'approved', notes: AUTO_APPROVE_NOTES };
    }
    if (this.reviewer === undefined) {
      throw new ApprovalUsageError('No reviewer configured', request.request_id);
    }
    return checkDecision(await this.reviewer.review(request));
  }

  private settle(request: ApprovalRequest, status: TerminalStatus, notes: string | undefined): void {
    const decided: ApprovalRequest = Object.freeze({ ...request, status, reviewer_notes: notes });
    this.pendingTable.delete(request.request_id);
    this.decidedTable.set(request.request_id, decided);
  }

  private respond(
    requestId: string,
    status: TerminalStatus,
    notes: string | undefined,
    modifiedProposal: JsonValue | undefined,
  ): ApprovalResponse {
    return {
      request_id: requestId,
      status,
      ...(modifiedProposal !== undefined ? { modified_proposal: modifiedProposal } : {}),
      ...(notes !== undefined ? { notes } : {}),
      timestamp: this.clock().toISOString(),
    };
  }

  /** `req_<yyyymmdd>_<hhmmss>_<counter:4>`, UTC. */
  private nextRequestId(now: Date): string {
    this.requestCounter++;
    const iso = now.toISOString();
    const stamp = `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
    return `req_${stamp}_${String(this.requestCounter).padStart(4, '0')}`;
  }
}

/**
 * A reviewer outside the type system can hand back any status. Anything
 * that is not a terminal status is recorded as a rejection.
 */
function checkDecision(decision: ReviewDecision): ReviewDecision {
  const status: unknown = decision.status;
  if (isTerminalStatus(status)) return decision;
  return { status: 'rejected', notes: `Reviewer returned an unrecognised status: ${String(status)}` };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
