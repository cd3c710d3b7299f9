import type { ExecOptions, ExecResult, ProcessRunner, SpawnCtl, SpawnOptions } from '@runway/core'
import { LaunchFailedError } from '@runway/core'

export interface FakeCall {
  readonly bin: string
  readonly args: string[]
  readonly cwd?: string
  readonly stdin?: string
}

/** Programmed reply. `launch` makes the call reject as if the binary could not start. */
export interface FakeReply {
  readonly ok?: boolean
  readonly code?: number
  readonly stdout?: string
  readonly stderr?: string
  readonly launch?: string
}

export type FakeHandler = (bin: string, args: readonly string[], opts?: ExecOptions) => FakeReply | undefined

/** In-memory runner with programmable results; records every call. */
export class FakeRunner implements ProcessRunner {
  public readonly calls: FakeCall[] = []
  private readonly handlers: FakeHandler[] = []

  add(handler: FakeHandler): this {
    this.handlers.push(handler)
    return this
  }

  /**
   * Reply to calls whose argument list starts with `prefix`. With several
   * replies they are used in order and the last one repeats.
   */
  on(bin: string, prefix: readonly string[], ...replies: FakeReply[]): this {
    let i = 0
    return this.add((b, args) => {
      if (b !== bin || !prefix.every((p, idx) => args[idx] === p)) return undefined
      const r = replies[Math.min(i, replies.length - 1)]
      i++
      return r ?? {}
    })
  }

  /** Calls whose argument list starts with `prefix`. */
  find(prefix: readonly string[]): FakeCall[] {
    return this.calls.filter(c => prefix.every((p, idx) => c.args[idx] === p))
  }

  async exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult> {
    this.calls.push({ bin, args: [...args], cwd: opts?.cwd, stdin: opts?.stdin })
    for (const h of this.handlers) {
      const r = h(bin, args, opts)
      if (r === undefined) continue
      if (r.launch !== undefined) throw new LaunchFailedError(bin, r.launch)
      const ok = r.ok ?? (r.code === undefined || r.code === 0)
      return { ok, code: r.code ?? (ok ? 0 : 1), stdout: r.stdout ?? '', stderr: r.stderr ?? '' }
    }
    return { ok: false, code: 1, stdout: '', stderr: `unhandled exec: ${bin} ${args.join(' ')}` }
  }

  spawn(bin: string, args: readonly string[], opts?: SpawnOptions): SpawnCtl {
    const done = this.exec(bin, args, opts).then((res) => {
      if (res.stdout) opts?.onStdout?.(res.stdout)
      if (res.stderr) opts?.onStderr?.(res.stderr)
      return res
    })
    return { done, cancel: () => { /* nothing to stop */ } }
  }
}
