import React from 'react'
import { Box, Text } from 'ink'
import type { SessionSummary } from '@ledgergate/core'
import { isEmptySummary } from '@ledgergate/core'
import { Panel } from './Panel.js'

interface ActionPanelProps {
  summary: SessionSummary | null
  isFocused: boolean
}

/** ActionPanel — per-action entry counts, largest first. */
export function ActionPanel({ summary, isFocused }: ActionPanelProps): React.ReactElement {
  const counts = summary === null || isEmptySummary(summary)
    ? []
    : Object.entries(summary.action_counts).sort(([, x], [, y]) => y - x)

  return (
    <Panel label="Actions" meta={`${counts.length} kinds`} isFocused={isFocused}>
      {counts.length === 0 && <Text color="#444444">—</Text>}
      {counts.map(([action, count]) => (
        <Box key={action} justifyContent="space-between">
          <Text color="#C8C8C0">{action}</Text>
          <Text color="#4FC3F7">{String(count)}</Text>
        </Box>
      ))}
    </Panel>
  )
}
