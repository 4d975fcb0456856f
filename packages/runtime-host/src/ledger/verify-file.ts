/**
 * ledgergate runtime host — Standalone Verification
 *
 * Verifies a ledger file with no active session, for an auditor who holds
 * only the file. Never throws on integrity failures: they are the result.
 * A missing file is an empty, valid ledger; other I/O errors propagate.
 */

import { verifyChain } from '@ledgergate/core';
import type { VerificationResult } from '@ledgergate/core';
import { FileLedgerStore } from '../state/ledger-store.js';

/**
 * Verify the hash chain of a ledger file.
 *
 * The file is judged at rest, so an unterminated final record counts as
 * malformed.
 */
export function verifyAuditFile(logPath: string): VerificationResult {
  return verifyChain(new FileLedgerStore(logPath).readRaw(), { partialTail: 'strict' });
}
