import React from 'react'
import { Text } from 'ink'
import { Panel } from './Panel.js'
import { Row } from './Row.js'
import type { IntegrityStatus } from '../services/index.js'

interface IntegrityPanelProps {
  integrity: IntegrityStatus
  isFocused: boolean
}

/**
 * IntegrityPanel — strict chain verification of the whole log, with the
 * first few violations when it fails.
 */
export function IntegrityPanel({ integrity, isFocused }: IntegrityPanelProps): React.ReactElement {
  const head = integrity.headHash === '' ? '—' : integrity.headHash.substring(0, 16)

  return (
    <Panel
      label="Integrity"
      meta={integrity.valid ? 'verified' : 'COMPROMISED'}
      tone={integrity.valid ? 'normal' : 'alert'}
      isFocused={isFocused}
    >
      <Row label="chain">
        {integrity.valid
          ? <Text color="#81C784">✓ valid</Text>
          : <Text color="#CF6679">✕ {integrity.violations.length} violation(s)</Text>}
      </Row>
      <Row label="records">
        <Text color="#C8C8C0">{String(integrity.recordsChecked)}</Text>
      </Row>
      <Row label="head seq">
        <Text color="#C8C8C0">{String(integrity.headSequence)}</Text>
      </Row>
      <Row label="head hash">
        <Text color="#0277BD">{head}</Text>
      </Row>
      {integrity.violations.slice(0, 3).map((v, i) => (
        <Text key={i} color="#D4880A" wrap="truncate-end">{v.message}</Text>
      ))}
    </Panel>
  )
}
