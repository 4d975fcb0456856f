/**
 * ledgergate runtime host — Identifier Generation
 *
 * Session ids group the entries written by one ledger instance:
 *
 *   session_<yyyymmdd>_<hhmmss>_<8 hex>
 *
 * The stamp is UTC so ids sort by creation time regardless of the host's
 * timezone; the random suffix uses node:crypto and keeps two sessions
 * started in the same second apart.
 */

import { randomBytes } from 'node:crypto';

/** Format a date as `yyyymmdd_hhmmss` (UTC). */
export function compactStamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Generate a new session id.
 *
 * @example
 * newSessionId(new Date('2026-01-01T12:00:00Z'));
 * // e.g. 'session_20260101_120000_9f3c01ab'
 */
export function newSessionId(now: Date = new Date()): string {
  return `session_${compactStamp(now)}_${randomBytes(4).toString('hex')}`;
}
