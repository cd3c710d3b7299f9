import { describe, it, expect } from 'vitest'
import { NodeProcessRunner } from '../src/process/runner'

const nodeBin = process.execPath

describe('NodeProcessRunner.exec redaction', () => {
  it('redacts secret values in stdout and stderr via redactors option', async () => {
    const r = new NodeProcessRunner()
    const secret = 'test-secret-value'
    const script = 'console.log("token:' + secret + '"); console.error("ERR:' + secret + '")'
    const res = await r.exec(nodeBin, ['-e', script], { timeoutMs: 2000, redactors: [new RegExp(secret, 'g')] })
    expect(res.ok).toBe(true)
    expect(res.stdout.trim()).toBe('token:***')
    expect(res.stderr.trim()).toBe('ERR:***')
  })
})
