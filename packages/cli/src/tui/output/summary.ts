import { isEmptySummary } from '@ledgergate/core'
import type { SessionSummary } from '@ledgergate/core'
import { actionColor, t } from '../theme.js'

function percent(value: number): string {
  return `${value.toFixed(1)}%`
}

/** formatSummary — session statistics as an aligned block. */
export function formatSummary(summary: SessionSummary): string {
  let out = '\n'
  out += '  ' + t.blue('session') + '  ' + t.white(summary.session_id) + '\n'

  if (isEmptySummary(summary)) {
    out += '  ' + t.muted('no entries recorded for this session') + '\n'
    return out
  }

  const rows: Array<[string, string]> = [
    ['entries',  String(summary.total_entries)],
    ['first',    summary.first_timestamp],
    ['last',     summary.last_timestamp],
    ['duration', `${summary.total_duration_ms} ms`],
    ['failed',   String(summary.failed_count)],
    ['success',  percent(summary.success_rate)],
  ]
  for (const [label, value] of rows) {
    out += '  ' + t.muted(label.padEnd(9)) + t.text(value) + '\n'
  }

  out += '\n  ' + t.blue('actions') + '\n'
  for (const [action, count] of Object.entries(summary.action_counts)) {
    out += '  ' + actionColor(action)(action.padEnd(20)) + t.text(String(count)) + '\n'
  }

  out += '\n  ' + t.blue('agents') + '\n'
  for (const [agent, count] of Object.entries(summary.agent_counts)) {
    out += '  ' + t.text(agent.padEnd(20)) + t.text(String(count)) + '\n'
  }

  const a = summary.approvals
  out += '\n  ' + t.blue('approvals') + '\n'
  out += '  ' + t.muted('requested'.padEnd(10)) + t.text(String(a.requested)) +
         '  ' + t.muted('granted') + ' ' + t.green(String(a.granted)) +
         '  ' + t.muted('denied') + ' ' + t.red(String(a.denied)) +
         '  ' + t.muted('modified') + ' ' + t.blueBright(String(a.modified)) + '\n'
  out += '  ' + t.muted('rate'.padEnd(10)) + t.text(percent(a.approval_rate)) + '\n'
  return out
}
