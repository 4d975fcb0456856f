import React from 'react'
import { Text } from 'ink'
import { isEmptySummary } from '@ledgergate/core'
import type { SessionSummary } from '@ledgergate/core'
import { Panel } from './Panel.js'
import { Row } from './Row.js'

interface SessionPanelProps {
  summary: SessionSummary | null
  isFocused: boolean
}

/** SessionPanel — totals and approval counts for the shown session. */
export function SessionPanel({ summary, isFocused }: SessionPanelProps): React.ReactElement {
  if (summary === null || isEmptySummary(summary)) {
    return (
      <Panel label="Session" isFocused={isFocused}>
        <Text color="#444444">no entries</Text>
      </Panel>
    )
  }

  const a = summary.approvals
  return (
    <Panel label="Session" meta={`${summary.total_entries} entries`} isFocused={isFocused}>
      <Row label="failed">
        <Text color={summary.failed_count > 0 ? '#CF6679' : '#81C784'}>{String(summary.failed_count)}</Text>
      </Row>
      <Row label="success">
        <Text color="#C8C8C0">{summary.success_rate.toFixed(1)}%</Text>
      </Row>
      <Row label="duration">
        <Text color="#C8C8C0">{summary.total_duration_ms} ms</Text>
      </Row>
      <Row label="approvals">
        <Text>
          <Text color="#D4880A">{a.requested} req</Text>
          {'  '}
          <Text color="#81C784">{a.granted} ok</Text>
          {'  '}
          <Text color="#CF6679">{a.denied} no</Text>
          {'  '}
          <Text color="#81D4FA">{a.modified} mod</Text>
        </Text>
      </Row>
      <Row label="approval rate">
        <Text color="#C8C8C0">{a.approval_rate.toFixed(1)}%</Text>
      </Row>
    </Panel>
  )
}
