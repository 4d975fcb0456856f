import chalk, { type ChalkInstance } from 'chalk'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueBright: chalk.hex('#81D4FA'),
  blueDim:    chalk.hex('#0277BD'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _actionColors: Record<string, ChalkInstance> = {
  agent_failed:       t.red,
  approval_requested: t.amber,
  approval_granted:   t.green,
  approval_denied:    t.red,
  approval_modified:  t.blueBright,
  llm_request:        t.blue,
  llm_response:       t.blue,
}

export const actionColor = (action: string): ChalkInstance =>
  _actionColors[action] ?? t.text

const _riskColors: Record<string, ChalkInstance> = {
  low:    t.green,
  medium: t.amber,
  high:   t.red,
}

export const riskColor = (risk: string): ChalkInstance =>
  _riskColors[risk] ?? t.muted

/** Styles one line of a request description; diff markers drive the colour. */
export function styleReviewLine(line: string): string {
  if (line.startsWith('+++') || line.startsWith('---')) return t.white(line)
  if (line.startsWith('@@')) return t.blue(line)
  if (line.startsWith('+')) return t.green(line)
  if (line.startsWith('-')) return t.red(line)
  if (line.startsWith('=') || line === 'APPROVAL REQUIRED') return t.amber(line)
  if (line.startsWith('Reversible: NO')) return t.red(line)
  return line
}
