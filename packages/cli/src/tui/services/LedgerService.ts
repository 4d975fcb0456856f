import { summarizeEntries, verifyChain } from '@ledgergate/core'
import type { LedgerEntry, LedgerStore, SessionSummary } from '@ledgergate/core'
import { readLedger } from '@ledgergate/runtime-host'
import type { ILedgerService, IntegrityStatus } from './ILedgerService.js'

/**
 * LedgerService — read-only view over a LedgerStore.
 *
 * Never appends and never opens a HashChainLedger, so a damaged log can
 * still be inspected: verification runs strict and its violations are
 * reported rather than thrown.
 */
export class LedgerService implements ILedgerService {
  constructor(private readonly store: LedgerStore) {}

  async getIntegrity(): Promise<IntegrityStatus> {
    const result = verifyChain(this.store.readRaw(), { partialTail: 'strict' })
    return {
      location: this.store.location,
      valid: result.valid,
      recordsChecked: result.recordsChecked,
      violations: result.violations,
      headHash: result.lastEntry?.entry_hash ?? '',
      headSequence: result.lastEntry?.sequence_num ?? 0,
    }
  }

  async getLatestSessionId(): Promise<string | null> {
    const { entries } = readLedger(this.store.readRaw())
    return entries[entries.length - 1]?.session_id ?? null
  }

  async getSummary(sessionId: string): Promise<SessionSummary> {
    return summarizeEntries(sessionId, this.entries(sessionId))
  }

  async getRecentEntries(limit: number, sessionId?: string): Promise<LedgerEntry[]> {
    return this.entries(sessionId).slice(-limit)
  }

  private entries(sessionId?: string): ReadonlyArray<LedgerEntry> {
    const { entries } = readLedger(this.store.readRaw())
    return sessionId === undefined ? entries : entries.filter(e => e.session_id === sessionId)
  }
}
