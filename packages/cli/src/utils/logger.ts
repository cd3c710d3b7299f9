import { paint, type Tone } from './colors'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

interface Logger {
  readonly debug: (msg: string) => void
  readonly info: (msg: string) => void
  readonly warn: (msg: string) => void
  readonly error: (msg: string) => void
  readonly success: (msg: string) => void
  readonly note: (msg: string) => void
  readonly section: (title: string) => void
  /** Raw line on stdout (log streams); redacted, suppressed in JSON modes. */
  readonly raw: (text: string) => void
  readonly json: (val: unknown) => void
  readonly isJson: () => boolean
  readonly isNdjson: () => boolean
  readonly setLevel: (lvl: LogLevel) => void
  readonly setJsonOnly: (on: boolean) => void
  readonly setNoEmoji: (on: boolean) => void
  readonly setNdjson: (on: boolean) => void
  readonly setTimestamps: (on: boolean) => void
  readonly setRedactors: (patterns: readonly (string | RegExp)[]) => void
  readonly redact: (msg: string) => string
  readonly reset: () => void
}

let level: LogLevel = 'info'
let jsonOnly = false
let noEmoji = false
let ndjson = false
let timestampsOn = false
let redactors: RegExp[] = []

const RANK: Readonly<Record<LogLevel, number>> = { error: 0, warn: 1, info: 2, debug: 3 }

function enabled(kind: LogLevel): boolean {
  return RANK[kind] <= RANK[level]
}

function applyRedaction(msg: string): string {
  if (redactors.length === 0) return msg
  let out = msg
  for (const r of redactors) out = out.replace(r, '******')
  return out
}

const TONE: Readonly<Record<LogLevel, Tone>> = { error: 'fail', warn: 'warn', info: 'info', debug: 'muted' }

function write(kind: LogLevel, msg: string): void {
  if (jsonOnly || !enabled(kind)) return
  const prefix: string = noEmoji
    ? (kind === 'error' ? '[error]' : kind === 'warn' ? '[warn]' : kind === 'info' ? '[info]' : '[debug]')
    : (kind === 'error' ? '✖' : kind === 'warn' ? '⚠' : kind === 'info' ? 'ℹ' : '•')
  const ts: string = timestampsOn ? `${new Date().toISOString()} ` : ''
  // Redact secrets in human logs only
  const redacted: string = applyRedaction(msg)
  const hasAnsi: boolean = redacted.includes('\u001b[')
  const colored: string = hasAnsi ? redacted : paint(TONE[kind], redacted)
  // eslint-disable-next-line no-console
  console[kind === 'error' || kind === 'warn' ? 'error' : 'log'](`${ts}${prefix} ${colored}`)
}

function enrichJson(val: unknown): unknown {
  if (!timestampsOn) return val
  if (val !== null && typeof val === 'object' && !Array.isArray(val)) {
    const obj: Record<string, unknown> = { ...val }
    if (obj.ts === undefined) obj.ts = new Date().toISOString()
    return obj
  }
  return val
}

export const logger: Logger = {
  debug: (msg: string): void => { write('debug', msg) },
  info: (msg: string): void => { write('info', msg) },
  warn: (msg: string): void => { write('warn', msg) },
  error: (msg: string): void => { write('error', msg) },
  success: (msg: string): void => { if (jsonOnly) return; const text = `${noEmoji ? '[ok]' : '✓'} ${msg}`; write('info', paint('ok', text)) },
  note: (msg: string): void => { if (jsonOnly) return; const text = `${noEmoji ? '[note]' : '✱'} ${msg}`; write('info', paint('note', text)) },
  section: (title: string): void => {
    if (jsonOnly || !enabled('info')) return
    const bar = '─'.repeat(Math.max(12, Math.min(60, title.length + 10)))
    // eslint-disable-next-line no-console
    console.log(`${paint('info', bar)}\n${paint('title', title)}\n${paint('info', bar)}`)
  },
  raw: (text: string): void => {
    if (jsonOnly) return
    process.stdout.write(applyRedaction(text))
  },
  json: (val: unknown): void => {
    const v = enrichJson(val)
    const line: string = ndjson ? JSON.stringify(v) : JSON.stringify(v, null, 2)
    // eslint-disable-next-line no-console
    console.log(line)
  },
  isJson: (): boolean => jsonOnly,
  isNdjson: (): boolean => ndjson,
  setLevel: (lvl: LogLevel): void => { level = lvl },
  setJsonOnly: (on: boolean): void => { jsonOnly = on },
  setNoEmoji: (on: boolean): void => { noEmoji = on },
  setNdjson: (on: boolean): void => { ndjson = on; if (on) jsonOnly = true },
  setTimestamps: (on: boolean): void => { timestampsOn = on },
  setRedactors: (patterns: readonly (string | RegExp)[]): void => {
    redactors = patterns.map((p) => p instanceof RegExp ? p : new RegExp(escapeRegExp(p), 'g'))
  },
  redact: (msg: string): string => applyRedaction(msg),
  reset: (): void => {
    level = 'info'; jsonOnly = false; noEmoji = false; ndjson = false; timestampsOn = false; redactors = []
  }
}

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}
