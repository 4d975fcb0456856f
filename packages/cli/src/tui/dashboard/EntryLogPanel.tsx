import React from 'react'
import { Box, Text } from 'ink'
import { AuditAction } from '@ledgergate/core'
import type { LedgerEntry } from '@ledgergate/core'
import { Panel } from './Panel.js'

interface EntryLogPanelProps {
  entries: LedgerEntry[]
  isFocused: boolean
}

function actionHex(entry: LedgerEntry): string {
  if (!entry.success) return '#CF6679'
  switch (entry.action) {
    case AuditAction.ApprovalGranted:   return '#81C784'
    case AuditAction.ApprovalDenied:    return '#CF6679'
    case AuditAction.ApprovalRequested: return '#D4880A'
    case AuditAction.ApprovalModified:  return '#81D4FA'
    default:                   return '#C8C8C0'
  }
}

/**
 * EntryLogPanel — last N ledger entries, full width.
 *
 * Format: seq | timestamp | action colored | agent dim
 */
export function EntryLogPanel({ entries, isFocused }: EntryLogPanelProps): React.ReactElement {
  return (
    <Panel label="Ledger" meta={`last ${entries.length}`} isFocused={isFocused}>
      {entries.map(entry => (
        <Box key={entry.sequence_num} gap={2}>
          <Text color="#0277BD">#{entry.sequence_num}</Text>
          <Text color="#444444">{entry.timestamp}</Text>
          <Box flexGrow={1}><Text color={actionHex(entry)}>{entry.action}</Text></Box>
          <Text color="#666666">{entry.agent_id}</Text>
        </Box>
      ))}
    </Panel>
  )
}
