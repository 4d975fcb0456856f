/**
 * @ledgergate/runtime-host
 *
 * Side-effectful implementations behind the core interfaces: ledger stores,
 * the HashChainLedger, standalone verification, audited agent runs, and
 * home/config resolution. Depends on @ledgergate/core; no core code imports from this
 * package.
 */

// Stores
export { FileLedgerStore, MemoryLedgerStore, isNodeError } from './state/ledger-store.js';

// Ledger
export type { OpenLedgerOptions } from './ledger/hash-chain-ledger.js';
export { HashChainLedger } from './ledger/hash-chain-ledger.js';
export { verifyAuditFile } from './ledger/verify-file.js';

// Agent runs
export type {
  ApprovalTally,
  AuditedRunContext,
  AuditedRunOptions,
  AuditedRunResult,
} from './harness/audited-run.js';
export { runAudited } from './harness/audited-run.js';

// Reading and ids
export type { LedgerReadResult, LedgerReadStats } from './logging/ledger-reader.js';
export { readLedger } from './logging/ledger-reader.js';
export { compactStamp, newSessionId } from './logging/session-id.js';

// Home and configuration
export type { ResolveLedgerHomeOptions } from './home.js';
export { getOsConfigPath, readLedgerHomeFromConfig, resolveLedgerHome } from './home.js';
export type { LedgerConfig, LoadConfigOptions } from './config.js';
export { CONFIG_FILENAME, DEFAULT_AUDIT_LOG, loadConfig, validateConfig } from './config.js';
