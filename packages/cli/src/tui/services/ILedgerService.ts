/**
 * ILedgerService — the single boundary between the dashboard and the ledger.
 *
 * Every value the dashboard shows comes through this interface. Reads are
 * fresh on each call so a refresh picks up entries appended by other
 * processes.
 */

import type { ChainViolation, LedgerEntry, SessionSummary } from '@ledgergate/core'

export interface IntegrityStatus {
  location: string
  valid: boolean
  recordsChecked: number
  violations: ReadonlyArray<ChainViolation>
  /** Hash of the last well-formed record; '' for an empty log. */
  headHash: string
  headSequence: number
}

export interface ILedgerService {
  getIntegrity(): Promise<IntegrityStatus>
  /** The session of the most recent entry, or null for an empty log. */
  getLatestSessionId(): Promise<string | null>
  getSummary(sessionId: string): Promise<SessionSummary>
  /** The last `limit` entries, optionally restricted to one session. */
  getRecentEntries(limit: number, sessionId?: string): Promise<LedgerEntry[]>
}
