/**
 * ledgergate core — Chain Verification
 *
 * Proves the integrity of a ledger from its raw text alone. Pure: the
 * caller supplies the file content, so an auditor needs nothing but the
 * file.
 *
 * Every record is checked, in file order, for:
 *   1. well-formedness (valid JSON, exactly the ledger fields, right types)
 *   2. sequence continuity from 1
 *   3. previous_hash equal to the actual hash of the preceding record
 *   4. entry_hash equal to a fresh hash of the record's own content
 *
 * The scan never stops at the first problem: every violation is collected.
 * After a sequence gap the expected sequence resynchronizes on the record
 * found, so one deletion is reported once rather than at every later
 * record.
 *
 * A record whose content no longer matches its stored hash taints the rest
 * of the chain: every later record's link is reported broken, since each
 * one vouches for history that was altered.
 */

import type { LedgerEntry } from '../types/entry.js';
import { computeEntryHash } from '../hashing/entry-hash.js';
import { parseLedgerRecord, splitRecordLines } from './record.js';

export type ChainViolationKind = 'malformed' | 'sequence_gap' | 'broken_link' | 'hash_mismatch';

export interface ChainViolation {
  readonly kind: ChainViolationKind;
  /** 1-based line number in the file. */
  readonly line: number;
  /** Sequence number of the offending record; null when it could not be parsed. */
  readonly sequence: number | null;
  readonly message: string;
}

export interface VerificationResult {
  readonly valid: boolean;
  readonly violations: ReadonlyArray<ChainViolation>;
  /** Records read, including malformed ones. */
  readonly recordsChecked: number;
  /** The last well-formed record, if any. */
  readonly lastEntry: LedgerEntry | null;
}

export interface VerifyOptions {
  /**
   * How to treat a final line without a terminating newline.
   * 'strict' reports it as malformed (a torn write in a file at rest);
   * 'ignore' skips it (a record that is still being appended).
   * Default: 'strict'.
   */
  readonly partialTail?: 'strict' | 'ignore';
}

/** Verify the hash chain of raw ledger text. */
export function verifyChain(raw: string, opts?: VerifyOptions): VerificationResult {
  const { lines, partialTail } = splitRecordLines(raw);
  const violations: ChainViolation[] = [];

  let expectedSequence = 1;
  // null: the predecessor could not be read, so linkage cannot be checked.
  let expectedPrevious: string | null = '';
  let lastEntry: LedgerEntry | null = null;
  // Sequence of the first record whose content hash failed.
  let tamperedAt: number | null = null;

  for (const { line, text } of lines) {
    const parsed = parseLedgerRecord(text);
    if (!parsed.ok) {
      violations.push({
        kind: 'malformed',
        line,
        sequence: null,
        message: `Malformed record at line ${line}: ${parsed.error}`,
      });
      expectedSequence++;
      expectedPrevious = null;
      continue;
    }

    const entry = parsed.entry;

    if (entry.sequence_num !== expectedSequence) {
      violations.push({
        kind: 'sequence_gap',
        line,
        sequence: entry.sequence_num,
        message: `Sequence gap at ${entry.sequence_num}, expected ${expectedSequence}`,
      });
    }

    if (expectedPrevious !== null && entry.previous_hash !== expectedPrevious) {
      violations.push({
        kind: 'broken_link',
        line,
        sequence: entry.sequence_num,
        message:
          `Hash chain broken at sequence ${entry.sequence_num}: ` +
          `expected previous_hash '${abbreviate(expectedPrevious)}', ` +
          `got '${abbreviate(entry.previous_hash)}'`,
      });
    } else if (tamperedAt !== null) {
      violations.push({
        kind: 'broken_link',
        line,
        sequence: entry.sequence_num,
        message:
          `Hash chain broken at sequence ${entry.sequence_num}: ` +
          `links through tampered record at sequence ${tamperedAt}`,
      });
    }

    const computed = computeEntryHash(entry);
    if (computed !== entry.entry_hash) {
      violations.push({
        kind: 'hash_mismatch',
        line,
        sequence: entry.sequence_num,
        message:
          `Entry tampered at sequence ${entry.sequence_num}: ` +
          `computed hash '${abbreviate(computed)}', stored hash '${abbreviate(entry.entry_hash)}'`,
      });
      if (tamperedAt === null) tamperedAt = entry.sequence_num;
    }

    expectedSequence = entry.sequence_num + 1;
    expectedPrevious = computed;
    lastEntry = entry;
  }

  let recordsChecked = lines.length;
  if (partialTail !== null && (opts?.partialTail ?? 'strict') === 'strict') {
    recordsChecked++;
    violations.push({
      kind: 'malformed',
      line: partialTail.line,
      sequence: null,
      message: `Malformed record at line ${partialTail.line}: record is not newline-terminated`,
    });
  }

  return {
    valid: violations.length === 0,
    violations,
    recordsChecked,
    lastEntry,
  };
}

function abbreviate(hash: string): string {
  return hash.length > 16 ? `${hash.slice(0, 16)}...` : hash;
}
