import React from 'react'
import { Box, Text } from 'ink'
import type { IntegrityStatus } from '../services/index.js'

interface DashboardHeaderProps {
  integrity: IntegrityStatus
  sessionId: string | null
}

/**
 * DashboardHeader — full-width header row.
 *
 * ◈ LEDGERGATE — /home/op/.ledgergate/audit/audit.jsonl · session_…    q quit · tab navigate · r refresh
 */
export function DashboardHeader({ integrity, sessionId }: DashboardHeaderProps): React.ReactElement {
  return (
    <Box justifyContent="space-between" paddingX={1} borderStyle="single" borderColor="#222222">
      <Box gap={1}>
        <Text color="#4FC3F7" bold>◈ LEDGERGATE</Text>
        <Text color="#2A2A2A">—</Text>
        <Text color="#666666">{integrity.location}</Text>
        <Text color="#2A2A2A">·</Text>
        <Text color="#0277BD">{sessionId ?? 'no sessions'}</Text>
      </Box>

      <Text color="#444444">q quit · tab navigate · r refresh</Text>
    </Box>
  )
}
