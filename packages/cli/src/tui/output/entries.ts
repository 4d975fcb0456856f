import type { LedgerEntry } from '@ledgergate/core'
import { actionColor, t } from '../theme.js'

const ACTION_WIDTH = 18

/** `2026-01-02T03:04:05.678Z` → `2026-01-02 03:04:05` */
export function shortTimestamp(iso: string): string {
  return iso.substring(0, 19).replace('T', ' ')
}

/**
 * formatEntryRow — one ledger entry as a table row.
 *
 *   #    3  2026-01-02 03:04:05  approval_granted    agent-1
 */
export function formatEntryRow(entry: LedgerEntry): string {
  const seq    = t.blueDim(`#${String(entry.sequence_num).padStart(5)}`)
  const at     = t.muted(shortTimestamp(entry.timestamp))
  const action = actionColor(entry.action)(entry.action.padEnd(ACTION_WIDTH))
  const failed = entry.success
    ? ''
    : '  ' + t.red(`FAILED${entry.error_message !== null ? ': ' + entry.error_message : ''}`)
  return `  ${seq}  ${at}  ${action}  ${t.text(entry.agent_id)}${failed}`
}

/** formatEntryTable — header, rows and a count footer. */
export function formatEntryTable(entries: ReadonlyArray<LedgerEntry>, total: number): string {
  let out = '\n'
  out += '  ' + t.dim('seq     timestamp            action              agent') + '\n'
  out += '  ' + t.dim('──────  ───────────────────  ──────────────────  ────────────────') + '\n'
  for (const entry of entries) {
    out += formatEntryRow(entry) + '\n'
  }
  out += '\n'
  out += '  ' + t.dim(`showing ${entries.length} of ${total} entries`) + '\n'
  return out
}
