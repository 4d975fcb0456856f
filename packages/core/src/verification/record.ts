/**
 * ledgergate core — Record Parsing
 *
 * Turns raw JSONL text into candidate ledger records. Pure: no I/O.
 */

import { isAuditAction, LEDGER_ENTRY_FIELDS } from '../types/entry.js';
import type { LedgerEntry } from '../types/entry.js';

/** One non-empty line of a ledger file, with its 1-based line number. */
export interface RecordLine {
  readonly line: number;
  readonly text: string;
}

/** Lines of a ledger file, split at newlines. */
export interface SplitRecords {
  /** Complete (newline-terminated), non-blank lines in file order. */
  readonly lines: ReadonlyArray<RecordLine>;
  /**
   * The final line when the content does not end with '\n'. Either a torn
   * write or a record still being appended; never part of `lines`.
   */
  readonly partialTail: RecordLine | null;
}

/** Split raw ledger text into newline-terminated record lines. */
export function splitRecordLines(raw: string): SplitRecords {
  if (raw.length === 0) {
    return { lines: [], partialTail: null };
  }
  const parts = raw.split('\n');
  // A trailing '\n' leaves an empty final element; anything else there is unterminated.
  const last = parts.pop() ?? '';
  const lines: RecordLine[] = [];
  parts.forEach((text, idx) => {
    if (text.trim().length > 0) {
      lines.push({ line: idx + 1, text });
    }
  });
  const partialTail = last.trim().length > 0 ? { line: parts.length + 1, text: last } : null;
  return { lines, partialTail };
}

export type ParseRecordResult =
  | { readonly ok: true; readonly entry: LedgerEntry }
  | { readonly ok: false; readonly error: string };

/**
 * Parse and validate one JSONL record.
 *
 * A record must be a JSON object carrying exactly the LedgerEntry fields
 * with the right types. Unknown fields are rejected: they would sit outside
 * the hash and could be altered undetected.
 */
export function parseLedgerRecord(text: string): ParseRecordResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err: unknown) {
    return { ok: false, error: `invalid JSON (${err instanceof Error ? err.message : String(err)})` };
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { ok: false, error: 'record is not a JSON object' };
  }
  const rec = parsed as Record<string, unknown>;

  const known = new Set<string>(LEDGER_ENTRY_FIELDS);
  const unknown = Object.keys(rec).filter((k) => !known.has(k));
  if (unknown.length > 0) {
    return { ok: false, error: `unexpected field(s): ${unknown.join(', ')}` };
  }
  const missing = LEDGER_ENTRY_FIELDS.filter((k) => !(k in rec));
  if (missing.length > 0) {
    return { ok: false, error: `missing field(s): ${missing.join(', ')}` };
  }

  const {
    timestamp, action, agent_id, session_id, input_data, output_data, reasoning,
    sequence_num, previous_hash, entry_hash, model_name, duration_ms, success, error_message,
  } = rec;

  if (typeof timestamp !== 'string') return fieldError('timestamp', 'a string');
  if (!isAuditAction(action)) return fieldError('action', 'a known audit action');
  if (typeof agent_id !== 'string') return fieldError('agent_id', 'a string');
  if (typeof session_id !== 'string') return fieldError('session_id', 'a string');
  if (!isNullableString(input_data)) return fieldError('input_data', 'a string or null');
  if (!isNullableString(output_data)) return fieldError('output_data', 'a string or null');
  if (!isNullableString(reasoning)) return fieldError('reasoning', 'a string or null');
  if (typeof sequence_num !== 'number' || !Number.isInteger(sequence_num)) {
    return fieldError('sequence_num', 'an integer');
  }
  if (typeof previous_hash !== 'string') return fieldError('previous_hash', 'a string');
  if (typeof entry_hash !== 'string') return fieldError('entry_hash', 'a string');
  if (!isNullableString(model_name)) return fieldError('model_name', 'a string or null');
  if (!isNullableFiniteNumber(duration_ms)) return fieldError('duration_ms', 'a number or null');
  if (typeof success !== 'boolean') return fieldError('success', 'a boolean');
  if (!isNullableString(error_message)) return fieldError('error_message', 'a string or null');

  return {
    ok: true,
    entry: Object.freeze({
      timestamp,
      action,
      agent_id,
      session_id,
      input_data,
      output_data,
      reasoning,
      sequence_num,
      previous_hash,
      entry_hash,
      model_name,
      duration_ms,
      success,
      error_message,
    }),
  };
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function isNullableFiniteNumber(value: unknown): value is number | null {
  return value === null || (typeof value === 'number' && Number.isFinite(value));
}

function fieldError(field: string, expected: string): ParseRecordResult {
  return { ok: false, error: `field '${field}' must be ${expected}` };
}
