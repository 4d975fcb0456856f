import React from 'react'
import { Box, Text } from 'ink'

export type PanelTone = 'normal' | 'alert'

interface PanelProps {
  label: string
  meta?: string
  isFocused: boolean
  /** 'alert' draws the border and meta in red regardless of focus. */
  tone?: PanelTone
  flexGrow?: number
  children: React.ReactNode
}

function borderFor(tone: PanelTone, isFocused: boolean): string {
  if (tone === 'alert') return '#CF6679'
  return isFocused ? '#4FC3F7' : '#242424'
}

/**
 * Panel — bordered dashboard section with an uppercase label and a
 * right-aligned meta string.
 */
export function Panel({ label, meta, isFocused, tone = 'normal', flexGrow = 1, children }: PanelProps): React.ReactElement {
  return (
    <Box
      flexGrow={flexGrow}
      flexDirection="column"
      borderStyle="single"
      borderColor={borderFor(tone, isFocused)}
      paddingX={1}
    >
      <Box justifyContent="space-between">
        <Text color="#4FC3F7" dimColor={!isFocused}>
          {label.toUpperCase()}
        </Text>
        {meta !== undefined && (
          <Text color={tone === 'alert' ? '#CF6679' : '#666666'}>{meta}</Text>
        )}
      </Box>

      {children}
    </Box>
  )
}
