/**
 * ledgergate runtime host — LedgerReader
 *
 * Pure function for reading ledger JSONL text into entries for reporting
 * (query, summaries, the dashboard). Integrity is not judged here; that is
 * verifyChain's job. The reader only answers "which complete records can
 * be read right now".
 *
 * Guarantees:
 *   - every complete, well-formed record is returned, in file order
 *   - malformed lines are dropped and counted in parseErrors
 *   - an unterminated final line (an append in progress, or a torn write)
 *     is dropped and flagged
 *   - empty input returns an empty result with zero stats
 *
 * This function has no I/O. Callers obtain raw content via LedgerStore.readRaw().
 */

import { parseLedgerRecord, splitRecordLines } from '@ledgergate/core';
import type { LedgerEntry } from '@ledgergate/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Statistics collected while reading; counts reflect the raw content. */
export interface LedgerReadStats {
  /** Number of complete, non-empty lines processed. */
  readonly totalLines: number;
  /** Number of records parsed and returned. */
  readonly parsedEntries: number;
  /** Number of lines dropped because they are not valid ledger records. */
  readonly parseErrors: number;
  /** True if the content ends with an unterminated record. */
  readonly partialTrailingLine: boolean;
  /**
   * True if any timestamp regression was seen in file order. A ledger
   * writer never regresses, so this points at records spliced in from
   * elsewhere.
   */
  readonly outOfOrder: boolean;
}

export interface LedgerReadResult {
  readonly entries: ReadonlyArray<LedgerEntry>;
  readonly stats: LedgerReadStats;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Parse the complete records of raw ledger text.
 *
 * @param rawContent - Raw JSONL text content of the ledger
 */
export function readLedger(rawContent: string): LedgerReadResult {
  const { lines, partialTail } = splitRecordLines(rawContent);

  const entries: LedgerEntry[] = [];
  let parseErrors = 0;
  let outOfOrder = false;

  for (const { text } of lines) {
    const parsed = parseLedgerRecord(text);
    if (!parsed.ok) {
      parseErrors++;
      continue;
    }
    const prev = entries[entries.length - 1];
    if (prev !== undefined && parsed.entry.timestamp < prev.timestamp) {
      outOfOrder = true;
    }
    entries.push(parsed.entry);
  }

  return {
    entries,
    stats: {
      totalLines: lines.length,
      parsedEntries: entries.length,
      parseErrors,
      partialTrailingLine: partialTail !== null,
      outOfOrder,
    },
  };
}
