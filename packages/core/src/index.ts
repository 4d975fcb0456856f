/**
 * @ledgergate/core
 *
 * Tamper-evident audit core — entry and approval types, canonical
 * serialization, entry hashing, chain verification, session summaries,
 * and the store/recorder interfaces.
 *
 * This package is side-effect free. It contains no imports of node:fs or
 * any other I/O API. node:crypto is used for hashing (pure computation,
 * not I/O).
 *
 * Concrete stores and the HashChainLedger live in @ledgergate/runtime-host.
 */

// Types
export * from './types/index.js';

// Hashing
export { canonicalize, serializePayload } from './hashing/canonical.js';
export { computeEntryHash, sealEntry, sha256Hex, toRecordLine } from './hashing/entry-hash.js';

// Verification
export type { ParseRecordResult, RecordLine, SplitRecords } from './verification/record.js';
export { parseLedgerRecord, splitRecordLines } from './verification/record.js';
export type {
  ChainViolation,
  ChainViolationKind,
  VerificationResult,
  VerifyOptions,
} from './verification/chain.js';
export { verifyChain } from './verification/chain.js';

// Summaries
export type {
  ApprovalStats,
  EmptySessionStats,
  SessionStats,
  SessionSummary,
} from './summary/summarize.js';
export { isEmptySummary, summarizeEntries } from './summary/summarize.js';

// Persistence and recording interfaces (implementations live in runtime-host)
export type { LedgerStore } from './logging/ledger-store.js';
export type { AuditRecorder } from './logging/audit-recorder.js';

// Errors
export { ApprovalUsageError, LedgerIntegrityError } from './errors.js';
