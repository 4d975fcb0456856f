/**
 * ledgergate runtime host — LedgerStore Contract Tests
 *
 * Both implementations must present the same raw content for the same
 * appends ('a\nb\n'), read a missing store as empty, and never rewrite
 * existing content.
 *
 * Isolation: MemoryLedgerStore tests have no I/O. FileLedgerStore tests use temp dirs.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileLedgerStore, MemoryLedgerStore } from '../src/state/ledger-store.js';

// ---------------------------------------------------------------------------
// MemoryLedgerStore
// ---------------------------------------------------------------------------

describe('MemoryLedgerStore', () => {
  it('reads as empty before anything is appended', () => {
    expect(new MemoryLedgerStore().readRaw()).toBe('');
  });

  it('terminates every appended line with a newline', () => {
    const store = new MemoryLedgerStore();
    store.appendLine('{"a":1}');
    store.appendLine('{"b":2}');
    expect(store.readRaw()).toBe('{"a":1}\n{"b":2}\n');
    expect(store.readLines()).toEqual(['{"a":1}', '{"b":2}']);
  });

  it('keeps exports apart from the log', () => {
    const store = new MemoryLedgerStore('memory://audit');
    expect(store.writeExport('x.jsonl', 'content\n')).toBe('memory://x.jsonl');
    expect(store.readExport('x.jsonl')).toBe('content\n');
    expect(store.readRaw()).toBe('');
    expect(store.location).toBe('memory://audit');
  });

  it('shares nothing between instances', () => {
    const a = new MemoryLedgerStore();
    const b = new MemoryLedgerStore();
    a.appendLine('only in a');
    expect(b.readRaw()).toBe('');
  });
});

// ---------------------------------------------------------------------------
// FileLedgerStore
// ---------------------------------------------------------------------------

describe('FileLedgerStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ledgergate-store-'));
  });

  it('reads a missing file as empty', () => {
    expect(new FileLedgerStore(join(dir, 'missing.jsonl')).readRaw()).toBe('');
  });

  it('creates parent directories and appends newline-terminated lines', () => {
    const logPath = join(dir, 'nested', 'audit', 'audit.jsonl');
    const store = new FileLedgerStore(logPath);
    store.appendLine('{"a":1}');
    store.appendLine('{"b":2}');
    expect(readFileSync(logPath, 'utf-8')).toBe('{"a":1}\n{"b":2}\n');
    expect(store.readRaw()).toBe('{"a":1}\n{"b":2}\n');
  });

  it('init creates an empty file without touching existing content', () => {
    const logPath = join(dir, 'audit.jsonl');
    const store = new FileLedgerStore(logPath);
    store.init();
    expect(readFileSync(logPath, 'utf-8')).toBe('');

    writeFileSync(logPath, 'existing\n', 'utf-8');
    store.init();
    expect(readFileSync(logPath, 'utf-8')).toBe('existing\n');
  });

  it('resolves relative export targets beside the log and keeps absolute ones', () => {
    const store = new FileLedgerStore(join(dir, 'audit.jsonl'));
    const relative = store.writeExport('export.jsonl', 'r\n');
    const absolute = store.writeExport(join(dir, 'elsewhere', 'export.jsonl'), 'a\n');

    expect(relative).toBe(join(dir, 'export.jsonl'));
    expect(absolute).toBe(join(dir, 'elsewhere', 'export.jsonl'));
    expect(readFileSync(relative, 'utf-8')).toBe('r\n');
    expect(readFileSync(absolute, 'utf-8')).toBe('a\n');
  });

  it('propagates read errors other than a missing file', () => {
    // A directory cannot be read as a file (EISDIR).
    expect(() => new FileLedgerStore(dir).readRaw()).toThrow();
  });
});
