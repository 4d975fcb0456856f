/**
 * ledgergate core — Entry Hashing Tests
 *
 * Expected digests are fixed values: any conformant implementation must
 * produce them for the same entry content.
 */

import { describe, it, expect } from 'vitest';
import { AuditAction } from '../src/types/entry.js';
import type { UnsealedEntry } from '../src/types/entry.js';
import { computeEntryHash, sealEntry, toRecordLine } from '../src/hashing/entry-hash.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const UNSEALED: UnsealedEntry = {
  timestamp: '2026-01-01T00:00:00.000Z',
  action: AuditAction.ToolCalled,
  agent_id: 'requirements_analyst',
  session_id: 'S1',
  input_data: '{"path":"config.py","tool":"read_file"}',
  output_data: null,
  reasoning: 'Need the project settings',
  sequence_num: 1,
  previous_hash: '',
  model_name: null,
  duration_ms: null,
  success: true,
  error_message: null,
};

const EXPECTED_HASH = 'd1757bf958be27d994422f14969eda7491761923f0ce6aae71e9c22ac6852574';

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('computeEntryHash', () => {
  it('produces the fixed SHA-256 digest of the canonical content', () => {
    expect(computeEntryHash(UNSEALED)).toBe(EXPECTED_HASH);
  });

  it('hashes non-ASCII text through its escaped form', () => {
    expect(computeEntryHash({ ...UNSEALED, reasoning: 'Prüfung ✓' })).toBe(
      '51a2480acaf539596655e03b120c85b6147f436993b50c8b072ce92b898e41dd',
    );
  });

  it('changes when any hashed field changes', () => {
    const variants: UnsealedEntry[] = [
      { ...UNSEALED, timestamp: '2026-01-01T00:00:00.001Z' },
      { ...UNSEALED, action: AuditAction.ToolResult },
      { ...UNSEALED, agent_id: 'other' },
      { ...UNSEALED, session_id: 'S2' },
      { ...UNSEALED, input_data: null },
      { ...UNSEALED, output_data: 'x' },
      { ...UNSEALED, reasoning: null },
      { ...UNSEALED, sequence_num: 2 },
      { ...UNSEALED, previous_hash: 'abc' },
      { ...UNSEALED, model_name: 'local-model' },
      { ...UNSEALED, duration_ms: 5 },
      { ...UNSEALED, success: false },
      { ...UNSEALED, error_message: 'boom' },
    ];
    const hashes = new Set(variants.map((v) => computeEntryHash(v)));
    expect(hashes.size).toBe(variants.length);
    expect(hashes.has(EXPECTED_HASH)).toBe(false);
  });

  it('ignores properties outside the entry field set', () => {
    const withExtra = { ...UNSEALED, note: 'not hashed' };
    expect(computeEntryHash(withExtra)).toBe(EXPECTED_HASH);
  });
});

describe('sealEntry', () => {
  it('returns a frozen copy carrying the computed hash', () => {
    const sealed = sealEntry(UNSEALED);
    expect(sealed.entry_hash).toBe(EXPECTED_HASH);
    expect(Object.isFrozen(sealed)).toBe(true);
    expect(sealed.reasoning).toBe('Need the project settings');
  });

  it('leaves the unsealed input untouched', () => {
    const input = { ...UNSEALED };
    sealEntry(input);
    expect('entry_hash' in input).toBe(false);
  });
});

describe('toRecordLine', () => {
  it('writes every field in the stable on-disk order', () => {
    const line = toRecordLine(sealEntry(UNSEALED));
    expect(Object.keys(JSON.parse(line) as Record<string, unknown>)).toEqual([
      'timestamp', 'action', 'agent_id', 'session_id', 'input_data', 'output_data', 'reasoning',
      'sequence_num', 'previous_hash', 'entry_hash', 'model_name', 'duration_ms', 'success',
      'error_message',
    ]);
    expect(line.includes('\n')).toBe(false);
  });
});
