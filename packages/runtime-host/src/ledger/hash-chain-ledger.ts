/**
 * ledgergate runtime host — HashChainLedger
 *
 * The append-only, tamper-evident audit log. Each entry carries the hash of
 * its predecessor, so altering, removing or reordering any record breaks the
 * chain from that point on.
 *
 * One instance owns the write side of one store: the next sequence number,
 * the last entry hash and the last timestamp live on the instance, never in
 * module state, so ledgers opened in the same process do not interfere.
 *
 * Single writer: append() is synchronous from building the entry to
 * advancing the in-memory state, so two appends can never race on the last
 * hash within a process. Reads (verify, query, summarize, export) work on a
 * fresh snapshot of the store and ignore a record still being written.
 */

import {
  LedgerIntegrityError,
  matchesFilter,
  parseLedgerRecord,
  sealEntry,
  serializePayload,
  splitRecordLines,
  summarizeEntries,
  toRecordLine,
  verifyChain,
} from '@ledgergate/core';
import type {
  AppendOptions,
  AuditAction,
  AuditRecorder,
  EntryFilter,
  LedgerEntry,
  LedgerStore,
  SessionSummary,
  VerificationResult,
} from '@ledgergate/core';
import { FileLedgerStore } from '../state/ledger-store.js';
import { readLedger } from '../logging/ledger-reader.js';
import { compactStamp, newSessionId } from '../logging/session-id.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface OpenLedgerOptions {
  /** Session id for new entries. Default: a fresh `session_...` id. */
  readonly sessionId?: string | undefined;
  /**
   * Verify the full existing chain before accepting appends.
   * Default: true. Disable only for read-only tooling.
   */
  readonly autoVerify?: boolean | undefined;
  /** Time source for entry timestamps. Default: `() => new Date()`. */
  readonly clock?: (() => Date) | undefined;
}

interface ChainHead {
  readonly sequence: number;
  readonly hash: string;
  readonly timestamp: string | null;
}

// ---------------------------------------------------------------------------
// HashChainLedger
// ---------------------------------------------------------------------------

export class HashChainLedger implements AuditRecorder {
  private head: ChainHead;

  private constructor(
    readonly store: LedgerStore,
    readonly sessionId: string,
    head: ChainHead,
    private readonly clock: () => Date,
  ) {
    this.head = head;
  }

  /**
   * Open (or create) a ledger.
   *
   * The existing log is loaded to recover the chain head. With autoVerify
   * (the default) the whole chain is verified first and any violation
   * aborts the open; without it, only the final record must be readable.
   *
   * @param target - A log file path, or any LedgerStore
   * @throws {LedgerIntegrityError} when the existing log cannot be trusted
   */
  static open(target: string | LedgerStore, opts?: OpenLedgerOptions): HashChainLedger {
    const store = typeof target === 'string' ? new FileLedgerStore(target) : target;
    const clock = opts?.clock ?? ((): Date => new Date());
    store.init();

    const raw = store.readRaw();
    let last: LedgerEntry | null;
    if (opts?.autoVerify ?? true) {
      const result = verifyChain(raw, { partialTail: 'strict' });
      if (!result.valid) {
        throw new LedgerIntegrityError(store.location, result.violations);
      }
      last = result.lastEntry;
    } else {
      last = readTail(raw, store.location);
    }

    const head: ChainHead =
      last === null
        ? { sequence: 0, hash: '', timestamp: null }
        : { sequence: last.sequence_num, hash: last.entry_hash, timestamp: last.timestamp };

    const sessionId = opts?.sessionId ?? newSessionId(clock());
    return new HashChainLedger(store, sessionId, head, clock);
  }

  /** Sequence number of the last entry in the chain (0 when empty). */
  get lastSequence(): number {
    return this.head.sequence;
  }

  /** entry_hash of the last entry in the chain ('' when empty). */
  get lastHash(): string {
    return this.head.hash;
  }

  /**
   * Append a new entry. The only mutation a ledger supports.
   *
   * The record is durable when this returns. If the store throws, the
   * error propagates and the chain head is left where it was: a failed
   * write is never retried, since it may or may not have landed.
   */
  append(action: AuditAction, agentId: string, opts: AppendOptions = {}): LedgerEntry {
    const timestamp = this.nextTimestamp();
    const entry = sealEntry({
      timestamp,
      action,
      agent_id: agentId,
      session_id: this.sessionId,
      input_data: serializePayload(opts.inputData),
      output_data: serializePayload(opts.outputData),
      reasoning: opts.reasoning ?? null,
      sequence_num: this.head.sequence + 1,
      previous_hash: this.head.hash,
      model_name: opts.modelName ?? null,
      duration_ms: opts.durationMs ?? null,
      success: opts.success ?? true,
      error_message: opts.errorMessage ?? null,
    });

    this.store.appendLine(toRecordLine(entry));

    this.head = { sequence: entry.sequence_num, hash: entry.entry_hash, timestamp };
    return entry;
  }

  /**
   * Verify the full chain as it stands now.
   *
   * Every violation is reported. A final record still being written by
   * another process is not counted against the chain.
   */
  verify(): VerificationResult {
    return verifyChain(this.store.readRaw(), { partialTail: 'ignore' });
  }

  /**
   * Entries matching a filter, in ledger order.
   *
   * The result is lazy and restartable: each iteration reads a fresh
   * snapshot of the store.
   */
  query(filter: EntryFilter = {}): Iterable<LedgerEntry> {
    const store = this.store;
    return {
      *[Symbol.iterator](): Generator<LedgerEntry> {
        for (const entry of readLedger(store.readRaw()).entries) {
          if (matchesFilter(entry, filter)) {
            yield entry;
          }
        }
      },
    };
  }

  /**
   * Write a session's entries to a standalone JSONL file.
   *
   * @param sessionId - Default: this ledger's session
   * @param outputPath - Default: `audit_export_<session>_<stamp>.jsonl` beside the log
   * @returns Where the export was written
   */
  export(sessionId: string = this.sessionId, outputPath?: string): string {
    const lines = Array.from(this.query({ sessionId }), (e) => toRecordLine(e) + '\n');
    const target = outputPath ?? `audit_export_${sessionId}_${compactStamp(this.clock())}.jsonl`;
    return this.store.writeExport(target, lines.join(''));
  }

  /** Summary statistics for a session (default: this ledger's session). */
  summarize(sessionId: string = this.sessionId): SessionSummary {
    return summarizeEntries(sessionId, Array.from(this.query({ sessionId })));
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  /** Timestamps never run backwards within a chain; a clock regression reuses the last one. */
  private nextTimestamp(): string {
    const now = this.clock().toISOString();
    const last = this.head.timestamp;
    return last !== null && now < last ? last : now;
  }
}

/**
 * Recover the last entry without verifying the chain.
 *
 * Appending after an unreadable record would extend a chain whose head is
 * unknown, so the final record must still parse.
 */
function readTail(raw: string, location: string): LedgerEntry | null {
  const { lines, partialTail } = splitRecordLines(raw);
  if (partialTail !== null) {
    throw malformedTail(location, partialTail.line, 'record is not newline-terminated');
  }

  const tail = lines[lines.length - 1];
  if (tail === undefined) return null;

  const parsed = parseLedgerRecord(tail.text);
  if (!parsed.ok) {
    throw malformedTail(location, tail.line, parsed.error);
  }
  return parsed.entry;
}

function malformedTail(location: string, line: number, reason: string): LedgerIntegrityError {
  return new LedgerIntegrityError(location, [
    { kind: 'malformed', line, sequence: null, message: `Malformed record at line ${line}: ${reason}` },
  ]);
}
