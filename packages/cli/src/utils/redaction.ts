import { parse } from 'dotenv'
import { join } from 'node:path'
import { fsx } from './fs'
import { escapeRegExp } from './logger'

const TRIVIAL: ReadonlySet<string> = new Set(['true', 'false', 'null', 'undefined', 'on', 'off', 'yes', 'no'])

/** Literal, base64, base64url and URL-encoded forms of a secret value. */
export function valueToPatterns(val: string): RegExp[] {
  const patterns: RegExp[] = []
  if (val.length < 4) return patterns
  // Avoid trivial literals that commonly appear in logs/JSON and are not secrets
  if (TRIVIAL.has(val.toLowerCase())) return patterns
  patterns.push(new RegExp(escapeRegExp(val), 'g'))
  const b64 = Buffer.from(val, 'utf8').toString('base64')
  if (b64.length >= 8) patterns.push(new RegExp(escapeRegExp(b64), 'g'))
  const b64url = b64.replace(/=+$/, '').replace(/\+/g, '-').replace(/\//g, '_')
  if (b64url.length >= 8 && b64url !== b64) patterns.push(new RegExp(escapeRegExp(b64url), 'g'))
  const enc = encodeURIComponent(val)
  if (enc.length >= 8 && enc !== val) patterns.push(new RegExp(escapeRegExp(enc), 'g'))
  return patterns
}

/** Built-in token shapes, kept conservative to avoid over-redaction. */
export const DEFAULT_REDACTORS: readonly RegExp[] = [
  // JWT (three base64url segments with dots)
  /eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g,
  // Google API key
  /AIza[0-9A-Za-z_-]{35}/g,
  // Google OAuth access token
  /ya29\.[0-9A-Za-z_-]{20,}/g,
  // Google OAuth client secret
  /GOCSPX-[A-Za-z0-9_-]{10,}/g,
  // GitHub PATs
  /ghp_[A-Za-z0-9_]{20,}/g,
  /github_pat_[A-Za-z0-9_]{20,}/g
]

/**
 * Redaction patterns from the project's dotenv files, extra literal values
 * (e.g. a secret given on the command line) and the built-in token shapes.
 */
export async function computeRedactors(args: { readonly cwd: string; readonly envFiles?: readonly string[]; readonly literals?: readonly string[] }): Promise<RegExp[]> {
  const patterns: RegExp[] = []
  const files: readonly string[] = args.envFiles && args.envFiles.length > 0 ? args.envFiles : ['.env', '.env.local']
  for (const name of files) {
    const content = await fsx.readText(join(args.cwd, name))
    if (content === undefined) continue
    for (const v of Object.values(parse(content))) {
      for (const re of valueToPatterns(v)) patterns.push(re)
    }
  }
  for (const lit of args.literals ?? []) {
    for (const re of valueToPatterns(lit)) patterns.push(re)
  }
  for (const d of DEFAULT_REDACTORS) patterns.push(d)
  return patterns
}
