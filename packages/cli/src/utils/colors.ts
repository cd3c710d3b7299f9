/**
 * Terminal styling keyed by what a piece of text means, not by its colour.
 * `--color` picks the mode; `auto` follows NO_COLOR / FORCE_COLOR and the TTY.
 */
export type ColorMode = 'auto' | 'always' | 'never'
export type Tone = 'ok' | 'fail' | 'warn' | 'info' | 'note' | 'muted' | 'title'

const SGR: Readonly<Record<Tone, readonly [open: number, close: number]>> = {
  ok: [32, 39],
  fail: [31, 39],
  warn: [33, 39],
  info: [96, 39],
  note: [34, 39],
  muted: [2, 22],
  title: [1, 22]
}

let mode: ColorMode = 'auto'

export function setColorMode(m: ColorMode): void { mode = m }

export function isColorMode(v: string): v is ColorMode {
  return v === 'auto' || v === 'always' || v === 'never'
}

export function colorEnabled(env: NodeJS.ProcessEnv = process.env, isTTY: boolean = process.stdout.isTTY === true): boolean {
  if (mode !== 'auto') return mode === 'always'
  if (env.NO_COLOR !== undefined || env.FORCE_COLOR === '0') return false
  return isTTY
}

export function paint(tone: Tone, text: string): string {
  if (!colorEnabled()) return text
  const [open, close] = SGR[tone]
  return `\u001b[${open}m${text}\u001b[${close}m`
}
