/**
 * ledgergate runtime host — Ledger Stores
 *
 * Concrete implementations of the core LedgerStore interface.
 *
 *   - FileLedgerStore   — durable append-only JSONL file
 *   - MemoryLedgerStore — in-memory store for tests and embedded use
 *
 * Synchronous I/O is deliberate: an append completes before control returns
 * to the event loop, so the ledger's sequence/last-hash update can never
 * interleave with another append in the same process.
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, isAbsolute, join } from 'node:path';
import type { LedgerStore } from '@ledgergate/core';

// ---------------------------------------------------------------------------
// FileLedgerStore
// ---------------------------------------------------------------------------

/**
 * File-system LedgerStore for a single JSONL log file.
 *
 * The parent directory is created on demand. A missing file reads as an
 * empty ledger. ENOENT is the only recoverable error; every other I/O
 * failure is rethrown for the operator to address.
 */
export class FileLedgerStore implements LedgerStore {
  constructor(private readonly logPath: string) {}

  get location(): string {
    return this.logPath;
  }

  init(): void {
    mkdirSync(dirname(this.logPath), { recursive: true });
    // 'a' creates the file without touching existing content.
    appendFileSync(this.logPath, '', 'utf-8');
  }

  readRaw(): string {
    try {
      return readFileSync(this.logPath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }

  appendLine(line: string): void {
    mkdirSync(dirname(this.logPath), { recursive: true });
    appendFileSync(this.logPath, line + '\n', 'utf-8');
  }

  writeExport(target: string, content: string): string {
    const exportPath = isAbsolute(target) ? target : join(dirname(this.logPath), target);
    mkdirSync(dirname(exportPath), { recursive: true });
    writeFileSync(exportPath, content, 'utf-8');
    return exportPath;
  }
}

// ---------------------------------------------------------------------------
// MemoryLedgerStore
// ---------------------------------------------------------------------------

/**
 * In-memory LedgerStore.
 *
 * Holds the log as one raw string so that readRaw() returns exactly what a
 * file would contain ('a\nb\n'). Exports are kept in a map keyed by target.
 *
 * Isolation guarantee: instances share nothing.
 */
export class MemoryLedgerStore implements LedgerStore {
  private raw: string;
  private readonly exports: Map<string, string> = new Map();

  constructor(
    readonly location: string = 'memory://ledger',
    initialContent = '',
  ) {
    this.raw = initialContent;
  }

  init(): void {
    // Nothing to create.
  }

  readRaw(): string {
    return this.raw;
  }

  appendLine(line: string): void {
    this.raw += line + '\n';
  }

  writeExport(target: string, content: string): string {
    this.exports.set(target, content);
    return `memory://${target}`;
  }

  /**
   * Replace the raw content wholesale.
   *
   * Not part of the LedgerStore interface: it exists so tests can simulate
   * tampering, truncation and torn writes directly in the backing store.
   */
  overwrite(content: string): void {
    this.raw = content;
  }

  /** Return the content of an export written by writeExport(), if any. */
  readExport(target: string): string | undefined {
    return this.exports.get(target);
  }

  /** Return the complete record lines currently held. */
  readLines(): ReadonlyArray<string> {
    return this.raw.split('\n').filter((l) => l.length > 0);
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
