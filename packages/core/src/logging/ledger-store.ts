/**
 * ledgergate core — Ledger Store Interface
 *
 * Defines the injection point for ledger persistence.
 *
 * The core owns the contract (this interface); concrete implementations live
 * in the runtime host layer (FileLedgerStore, MemoryLedgerStore). The core
 * never touches the file system directly: hashing, verification and
 * summaries all work on text handed to them.
 */

/**
 * An append-only backing store for ledger records.
 *
 * Contract:
 * - appendLine() writes one record followed by '\n' and returns only once
 *   the write has completed. Failures throw; nothing is retried.
 * - readRaw() returns the full current content ('' when the store does not
 *   exist yet). A concurrent append may leave an unterminated final line.
 * - Existing content is never rewritten or truncated.
 */
export interface LedgerStore {
  /** Human-readable location (a file path, or a memory:// label). */
  readonly location: string;

  /** Create the backing store if it does not exist yet. Never alters content. */
  init(): void;

  readRaw(): string;

  /**
   * Append one record line.
   *
   * @param line - Record content without the trailing newline
   */
  appendLine(line: string): void;

  /**
   * Write a standalone export file, replacing any file of the same name.
   *
   * Relative targets resolve beside the store; absolute targets are used
   * as-is.
   *
   * @returns The location the export was written to
   */
  writeExport(target: string, content: string): string;
}
