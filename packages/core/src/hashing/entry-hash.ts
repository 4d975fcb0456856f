/**
 * ledgergate core — Entry Hashing
 *
 * Computes entry hashes and seals entries.
 *
 * An entry is built unsealed, its hash computed over every other field, and
 * a frozen copy carrying the hash is returned. The hash is never recomputed
 * into an existing entry; verification recomputes it only to compare.
 */

import { createHash } from 'node:crypto';
import type { LedgerEntry, UnsealedEntry } from '../types/entry.js';
import { canonicalize } from './canonical.js';

/** Lowercase hex SHA-256 of a UTF-8 string. */
export function sha256Hex(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Compute the hash of an entry's content: SHA-256 over the canonical
 * serialization of every field except entry_hash.
 *
 * The field set is listed explicitly so that a stray property on the
 * object can never leak into the hash input.
 */
export function computeEntryHash(entry: UnsealedEntry): string {
  return sha256Hex(
    canonicalize({
      timestamp: entry.timestamp,
      action: entry.action,
      agent_id: entry.agent_id,
      session_id: entry.session_id,
      input_data: entry.input_data,
      output_data: entry.output_data,
      reasoning: entry.reasoning,
      sequence_num: entry.sequence_num,
      previous_hash: entry.previous_hash,
      model_name: entry.model_name,
      duration_ms: entry.duration_ms,
      success: entry.success,
      error_message: entry.error_message,
    }),
  );
}

/** Produce the sealed, frozen entry for an unsealed one. */
export function sealEntry(unsealed: UnsealedEntry): LedgerEntry {
  const entry: LedgerEntry = {
    timestamp: unsealed.timestamp,
    action: unsealed.action,
    agent_id: unsealed.agent_id,
    session_id: unsealed.session_id,
    input_data: unsealed.input_data,
    output_data: unsealed.output_data,
    reasoning: unsealed.reasoning,
    sequence_num: unsealed.sequence_num,
    previous_hash: unsealed.previous_hash,
    entry_hash: computeEntryHash(unsealed),
    model_name: unsealed.model_name,
    duration_ms: unsealed.duration_ms,
    success: unsealed.success,
    error_message: unsealed.error_message,
  };
  return Object.freeze(entry);
}

/**
 * Serialize a sealed entry as one JSONL record (no trailing newline),
 * with fields in their stable on-disk order.
 */
export function toRecordLine(entry: LedgerEntry): string {
  return JSON.stringify({
    timestamp: entry.timestamp,
    action: entry.action,
    agent_id: entry.agent_id,
    session_id: entry.session_id,
    input_data: entry.input_data,
    output_data: entry.output_data,
    reasoning: entry.reasoning,
    sequence_num: entry.sequence_num,
    previous_hash: entry.previous_hash,
    entry_hash: entry.entry_hash,
    model_name: entry.model_name,
    duration_ms: entry.duration_ms,
    success: entry.success,
    error_message: entry.error_message,
  });
}
