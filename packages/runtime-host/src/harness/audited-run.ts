/**
 * ledgergate runtime host — Audited Agent Runs
 *
 * Wraps one unit of agent work in ledger entries:
 *
 *   agent_invoked                   before the work starts
 *   agent_completed                 when it resolves (duration, success=true)
 *   agent_failed                    when it throws (duration, success=false, error_message)
 *
 * A failing run does not throw: the error comes back on the result. A
 * failure to write any of the three entries does throw, since an unrecorded
 * run must never look recorded.
 *
 * The run context counts the approval decisions the work obtained. A
 * modification counts as granted.
 */

import { AuditAction, isJsonValue } from '@ledgergate/core';
import type { ApprovalResponse, AuditRecorder, JsonValue } from '@ledgergate/core';

export interface ApprovalTally {
  readonly requested: number;
  readonly granted: number;
  readonly denied: number;
}

/** Handed to the wrapped work. */
export interface AuditedRunContext {
  readonly agentId: string;
  readonly sessionId: string;
  /** Count a decision toward this run's approval tally. */
  countApproval(response: ApprovalResponse): void;
}

export interface AuditedRunOptions {
  /** Logged as the invocation's input. */
  readonly input?: unknown;
  /** Default: `Starting <agentId>`. */
  readonly reasoning?: string | undefined;
  readonly modelName?: string | undefined;
  /** Milliseconds clock. Default: Date.now. */
  readonly now?: (() => number) | undefined;
}

export type AuditedRunResult<T> =
  | {
      readonly success: true;
      readonly agentId: string;
      readonly output: T;
      readonly durationMs: number;
      readonly approvals: ApprovalTally;
    }
  | {
      readonly success: false;
      readonly agentId: string;
      readonly errorMessage: string;
      /** Constructor name of the thrown value, e.g. `TypeError`. */
      readonly errorType: string;
      readonly durationMs: number;
      readonly approvals: ApprovalTally;
    };

export async function runAudited<T>(
  recorder: AuditRecorder,
  agentId: string,
  work: (context: AuditedRunContext) => Promise<T>,
  opts?: AuditedRunOptions,
): Promise<AuditedRunResult<T>> {
  const now = opts?.now ?? Date.now;
  const tally = { requested: 0, granted: 0, denied: 0 };

  recorder.append(AuditAction.AgentInvoked, agentId, {
    inputData: opts?.input ?? null,
    reasoning: opts?.reasoning ?? `Starting ${agentId}`,
    modelName: opts?.modelName,
  });

  const context: AuditedRunContext = {
    agentId,
    sessionId: recorder.sessionId,
    countApproval(response) {
      tally.requested++;
      if (response.status === 'rejected') tally.denied++;
      else tally.granted++;
    },
  };

  const started = now();
  let output: T;
  try {
    output = await work(context);
  } catch (err: unknown) {
    const durationMs = Math.max(0, Math.round(now() - started));
    const errorMessage = err instanceof Error ? err.message : String(err);
    const errorType = err instanceof Error ? err.constructor.name : typeof err;
    const approvals = { ...tally };

    recorder.append(AuditAction.AgentFailed, agentId, {
      outputData: errorMessage,
      reasoning: `Agent failed with ${errorType}`,
      modelName: opts?.modelName,
      durationMs,
      success: false,
      errorMessage,
    });

    return { success: false, agentId, errorMessage, errorType, durationMs, approvals };
  }

  const durationMs = Math.max(0, Math.round(now() - started));
  const approvals = { ...tally };

  recorder.append(AuditAction.AgentCompleted, agentId, {
    outputData: {
      output: loggable(output),
      approvals_requested: approvals.requested,
      approvals_granted: approvals.granted,
      approvals_denied: approvals.denied,
    },
    modelName: opts?.modelName,
    durationMs,
    success: true,
  });

  return { success: true, agentId, output, durationMs, approvals };
}

/** Outputs that are not plain JSON are logged as null. */
function loggable(value: unknown): JsonValue {
  return isJsonValue(value) ? value : null;
}
