/**
 * @ledgergate/approval-gate
 *
 * The human-in-the-loop gate: every side-effecting proposal waits for an
 * explicit decision, and both the request and the decision are recorded
 * through an AuditRecorder.
 */

export type {
  ApprovalGateOptions,
  RequestOptions,
  ShellRequestOptions,
} from './gate.js';
export { ApprovalGate, AUTO_APPROVE_NOTES, CANCELLED_NOTES } from './gate.js';

export { IRREVERSIBLE_PATTERNS, isReversibleCommand } from './shell-risk.js';

export type { DiffLine, DiffOp, UnifiedDiffOptions } from './diff.js';
export { diffLines, splitLines, unifiedDiff } from './diff.js';

export {
  describeRequest,
  describeRequestDetails,
  proposedCommand,
  proposedFilePath,
} from './present.js';
