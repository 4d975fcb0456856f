/**
 * ledgergate core — Type Exports
 *
 * Re-exports all core types from a single entry point.
 * No logic lives in this file.
 */

export type { AppendOptions, EntryFilter, LedgerEntry, UnsealedEntry } from './entry.js';
export { AUDIT_ACTIONS, AuditAction, LEDGER_ENTRY_FIELDS, isAuditAction, matchesFilter } from './entry.js';

export type {
  ApprovalRequest,
  ApprovalResponse,
  ApprovalStatus,
  FileEditProposal,
  ReviewDecision,
  Reviewer,
  RiskLevel,
  ShellCommandProposal,
  TerminalStatus,
} from './approval.js';
export {
  EDIT_FILE_ACTION,
  RISK_LEVELS,
  RUN_SHELL_ACTION,
  TERMINAL_STATUSES,
  isRiskLevel,
  isTerminalStatus,
} from './approval.js';

export type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from './json.js';
export { isJsonObject, isJsonValue } from './json.js';
