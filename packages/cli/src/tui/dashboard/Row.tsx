import React from 'react'
import { Box, Text } from 'ink'

/** Row — label on the left, value on the right. */
export function Row({ label, children }: { label: string; children: React.ReactNode }): React.ReactElement {
  return (
    <Box justifyContent="space-between">
      <Text color="#666666">{label}</Text>
      {children}
    </Box>
  )
}
