import React, { useReducer, useState, useEffect } from 'react'
import { Box, Text, useInput, useApp, useStdout } from 'ink'
import chalk from 'chalk'
import type { LedgerEntry, SessionSummary } from '@ledgergate/core'
import type { ILedgerService, IntegrityStatus } from '../services/index.js'
import { DashboardHeader } from './DashboardHeader.js'
import { IntegrityPanel } from './IntegrityPanel.js'
import { SessionPanel } from './SessionPanel.js'
import { ActionPanel } from './ActionPanel.js'
import { EntryLogPanel } from './EntryLogPanel.js'

// ─── State ───────────────────────────────────────────────────────────────────

interface DashboardData {
  integrity: IntegrityStatus
  sessionId: string | null
  summary: SessionSummary | null
  entries: LedgerEntry[]
}

type DashboardState =
  | { phase: 'loading' }
  | { phase: 'ready'; data: DashboardData }
  | { phase: 'error'; message: string }

type DashboardAction =
  | { type: 'LOADED'; data: DashboardData }
  | { type: 'ERROR'; message: string }
  | { type: 'RELOAD' }

function reducer(_prev: DashboardState, action: DashboardAction): DashboardState {
  switch (action.type) {
    case 'LOADED': return { phase: 'ready', data: action.data }
    case 'ERROR':  return { phase: 'error', message: action.message }
    case 'RELOAD': return { phase: 'loading' }
  }
}

const PANEL_COUNT = 4
const ENTRY_ROWS = 8

async function loadDashboard(service: ILedgerService, session: string | undefined): Promise<DashboardData> {
  const integrity = await service.getIntegrity()
  const sessionId = session ?? await service.getLatestSessionId()
  const summary = sessionId === null ? null : await service.getSummary(sessionId)
  const entries = await service.getRecentEntries(ENTRY_ROWS, sessionId ?? undefined)
  return { integrity, sessionId, summary, entries }
}

// ─── Component ───────────────────────────────────────────────────────────────

export interface DashboardViewProps {
  service: ILedgerService
  /** Session to show; default: the most recent one in the log. */
  sessionId?: string | undefined
  onExit: () => void
}

/**
 * DashboardView — full-screen Ink view of one ledger.
 *
 * Keyboard:
 *   q / Escape  → exit
 *   Tab         → next panel
 *   Shift+Tab   → previous panel
 *   r           → re-read the log
 */
export function DashboardView({ service, sessionId, onExit }: DashboardViewProps): React.ReactElement {
  const { exit: inkExit } = useApp()
  const [state, dispatch] = useReducer(reducer, { phase: 'loading' })
  const [activePanel, setActivePanel] = useState(0)
  const [refreshKey, setRefreshKey] = useState(0)
  const { stdout } = useStdout()

  useEffect(() => {
    let cancelled = false

    dispatch({ type: 'RELOAD' })
    loadDashboard(service, sessionId)
      .then(data => {
        if (!cancelled) dispatch({ type: 'LOADED', data })
      })
      .catch((err: unknown) => {
        if (!cancelled) {
          const message = err instanceof Error ? err.message : String(err)
          dispatch({ type: 'ERROR', message })
        }
      })

    return () => { cancelled = true }
  }, [service, sessionId, refreshKey])

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      onExit()
      inkExit()
      return
    }
    if (key.tab && !key.shift) {
      setActivePanel(p => (p + 1) % PANEL_COUNT)
      return
    }
    if (key.tab && key.shift) {
      setActivePanel(p => (p - 1 + PANEL_COUNT) % PANEL_COUNT)
      return
    }
    if (input === 'r') {
      setRefreshKey(k => k + 1)
    }
  })

  // ─── Loading ─────────────────────────────────────────────────────────────

  if (state.phase === 'loading') {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color="#4FC3F7">◈ LEDGERGATE</Text>
        <Text color="#444444">loading…</Text>
      </Box>
    )
  }

  if (state.phase === 'error') {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color="#CF6679">error loading dashboard: {state.message}</Text>
        <Text color="#444444">press q to exit</Text>
      </Box>
    )
  }

  const { data } = state
  const cols = stdout.columns ?? 80

  const chain   = data.integrity.valid ? 'chain verified' : 'CHAIN COMPROMISED'
  const slLeft  = ` ◈ ${chain} · ${data.integrity.recordsChecked} records · head #${data.integrity.headSequence}`
  const slRight = `q quit · r refresh · tab navigate panels `
  const slFill  = ' '.repeat(Math.max(0, cols - slLeft.length - slRight.length))
  const slBg    = data.integrity.valid ? '#0277BD' : '#CF6679'
  const slLine  = chalk.bgHex(slBg).white(slLeft + slFill + slRight)

  // ─── Layout ──────────────────────────────────────────────────────────────

  return (
    <Box flexDirection="column">
      <DashboardHeader integrity={data.integrity} sessionId={data.sessionId} />

      {/* Row 1: Integrity | Session | Actions */}
      <Box flexDirection="row">
        <IntegrityPanel integrity={data.integrity} isFocused={activePanel === 0} />
        <SessionPanel   summary={data.summary}     isFocused={activePanel === 1} />
        <ActionPanel    summary={data.summary}     isFocused={activePanel === 2} />
      </Box>

      {/* Row 2: recent entries, full width */}
      <EntryLogPanel entries={data.entries} isFocused={activePanel === 3} />

      <Box>
        <Text>{slLine}</Text>
      </Box>
    </Box>
  )
}
