/**
 * ledgergate core — Ledger Entry Types
 *
 * Defines the closed set of auditable actions and the ledger entry record.
 *
 * Every agent action, approval decision and model interaction is written to
 * the ledger as exactly one LedgerEntry. Entries are immutable: they are
 * built unsealed, hashed, and frozen. Nothing edits an entry after it is
 * sealed.
 */

// ---------------------------------------------------------------------------
// Audit Action
// ---------------------------------------------------------------------------

/**
 * The kinds of auditable action. The string values are the wire format and
 * never change between versions.
 */
export enum AuditAction {
  AgentInvoked = 'agent_invoked',
  AgentCompleted = 'agent_completed',
  AgentFailed = 'agent_failed',
  ToolCalled = 'tool_called',
  ToolResult = 'tool_result',
  ApprovalRequested = 'approval_requested',
  ApprovalGranted = 'approval_granted',
  ApprovalDenied = 'approval_denied',
  ApprovalModified = 'approval_modified',
  LlmRequest = 'llm_request',
  LlmResponse = 'llm_response',
  UserInput = 'user_input',
  SystemOutput = 'system_output',
}

/** All AuditAction values, in declaration order. */
export const AUDIT_ACTIONS: ReadonlyArray<AuditAction> = Object.values(AuditAction);

/** Narrow an arbitrary string to an AuditAction. */
export function isAuditAction(value: unknown): value is AuditAction {
  return typeof value === 'string' && (AUDIT_ACTIONS as ReadonlyArray<string>).includes(value);
}

// ---------------------------------------------------------------------------
// Ledger Entry
// ---------------------------------------------------------------------------

/**
 * A single sealed ledger record.
 *
 * Field names are the on-disk JSONL field names and are stable across
 * versions. Absent optional values are written as `null`, never omitted, so
 * every record carries exactly the same set of fields.
 *
 * Chain invariants, for every entry n > 1 in a log:
 * - entry[n].previous_hash === entry[n-1].entry_hash
 * - entry[n].sequence_num === entry[n-1].sequence_num + 1
 * - entry.entry_hash === sha256(canonical(entry without entry_hash))
 */
export interface LedgerEntry {
  /** ISO 8601 UTC timestamp, recorded at write time. */
  readonly timestamp: string;
  readonly action: AuditAction;
  /** Identifier of the actor that produced the entry. */
  readonly agent_id: string;
  /** Groups entries from one continuous run of a ledger instance. */
  readonly session_id: string;
  /** Opaque serialized input payload. */
  readonly input_data: string | null;
  /** Opaque serialized output payload. */
  readonly output_data: string | null;
  /** Free-text rationale for the action. */
  readonly reasoning: string | null;
  /** 1-based position in the log. Contiguous, no gaps. */
  readonly sequence_num: number;
  /** entry_hash of the preceding entry; empty string for the first entry. */
  readonly previous_hash: string;
  /** SHA-256 hex digest over every other field. */
  readonly entry_hash: string;
  readonly model_name: string | null;
  readonly duration_ms: number | null;
  readonly success: boolean;
  readonly error_message: string | null;
}

/** A fully-populated entry whose hash has not been computed yet. */
export type UnsealedEntry = Omit<LedgerEntry, 'entry_hash'>;

/**
 * The on-disk field order of a ledger record. Also the exact set of fields
 * a record may carry: anything else makes the record malformed.
 */
export const LEDGER_ENTRY_FIELDS = [
  'timestamp',
  'action',
  'agent_id',
  'session_id',
  'input_data',
  'output_data',
  'reasoning',
  'sequence_num',
  'previous_hash',
  'entry_hash',
  'model_name',
  'duration_ms',
  'success',
  'error_message',
] as const satisfies ReadonlyArray<keyof LedgerEntry>;

// ---------------------------------------------------------------------------
// Append options
// ---------------------------------------------------------------------------

/**
 * Optional content of an appended entry.
 *
 * Payloads that are not strings are serialized with the canonical encoder
 * before they are stored.
 */
export interface AppendOptions {
  readonly inputData?: unknown;
  readonly outputData?: unknown;
  readonly reasoning?: string | undefined;
  readonly modelName?: string | undefined;
  readonly durationMs?: number | undefined;
  /** Defaults to true. */
  readonly success?: boolean | undefined;
  readonly errorMessage?: string | undefined;
}

// ---------------------------------------------------------------------------
// Query filter
// ---------------------------------------------------------------------------

/** Filters for a ledger scan. Every field is optional; omitted fields match all. */
export interface EntryFilter {
  readonly sessionId?: string | undefined;
  readonly agentId?: string | undefined;
  readonly action?: AuditAction | undefined;
  /** Inclusive lower bound on the entry timestamp. */
  readonly since?: Date | undefined;
  /** Inclusive upper bound on the entry timestamp. */
  readonly until?: Date | undefined;
}

/** True when the entry satisfies every filter that is set. */
export function matchesFilter(entry: LedgerEntry, filter: EntryFilter): boolean {
  if (filter.sessionId !== undefined && entry.session_id !== filter.sessionId) return false;
  if (filter.agentId !== undefined && entry.agent_id !== filter.agentId) return false;
  if (filter.action !== undefined && entry.action !== filter.action) return false;
  if (filter.since !== undefined || filter.until !== undefined) {
    const at = Date.parse(entry.timestamp);
    if (filter.since !== undefined && at < filter.since.getTime()) return false;
    if (filter.until !== undefined && at > filter.until.getTime()) return false;
  }
  return true;
}
