import chalk, { type ChalkInstance } from 'chalk'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueDim:    chalk.hex('#0277BD'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _tierColors: ReadonlyArray<ChalkInstance> = [t.muted, t.text, t.blue, t.amber]

/** Deeper tiers share the last colour. */
export const tierColor = (tier: number): ChalkInstance =>
  _tierColors[Math.min(tier, _tierColors.length - 1)] ?? t.muted

const _outcomeColors: Record<string, ChalkInstance> = {
  resolved:   t.green,
  conflicted: t.amber,
  failed:     t.red,
}

export const outcomeColor = (outcome: string): ChalkInstance =>
  _outcomeColors[outcome] ?? t.muted

const _modeColors: Record<string, ChalkInstance> = {
  override: t.blueDim,
  augment:  t.green,
}

export const modeColor = (mode: string): ChalkInstance =>
  _modeColors[mode] ?? t.muted
