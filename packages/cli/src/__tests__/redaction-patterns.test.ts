import { describe, it, expect } from 'vitest'
import { computeRedactors, valueToPatterns } from '../utils/redaction'
import { createTempProject } from '../../../../tests/helpers/temp-project'

function applyAll(msg: string, res: readonly RegExp[]): string {
  let out = msg
  for (const r of res) out = out.replace(r, '******')
  return out
}

describe('redaction patterns', () => {
  it('redacts .env literals and their encodings', async () => {
    const secret = 's3cr3tV@lue!'
    const tmp = createTempProject('redact', { '.env': `SECRET=${secret}\nDEBUG=true\n` })
    try {
      const b64 = Buffer.from(secret, 'utf8').toString('base64')
      const enc = encodeURIComponent(secret)
      const res = await computeRedactors({ cwd: tmp.cwd })
      expect(applyAll(`literal:${secret} b64:${b64} enc:${enc} debug:true`, res)).toBe('literal:****** b64:****** enc:****** debug:true')
    } finally {
      tmp.cleanup()
    }
  })

  it('covers literals passed on the command line', async () => {
    const tmp = createTempProject('redact-literal', {})
    try {
      const res = await computeRedactors({ cwd: tmp.cwd, literals: ['test-secret'] })
      expect(applyAll('set API_KEY=test-secret', res)).toBe('set API_KEY=******')
    } finally {
      tmp.cleanup()
    }
  })

  it('includes default token shapes', async () => {
    const tmp = createTempProject('redact-defaults', {})
    try {
      const res = await computeRedactors({ cwd: tmp.cwd })
      const oauth = `ya29.${'a'.repeat(24)}`
      const gh = `ghp_${'b'.repeat(24)}`
      expect(applyAll(`${oauth} ${gh}`, res)).toBe('****** ******')
    } finally {
      tmp.cleanup()
    }
  })

  it('skips short and trivial values', () => {
    expect(valueToPatterns('abc')).toEqual([])
    expect(valueToPatterns('TRUE')).toEqual([])
  })
})
