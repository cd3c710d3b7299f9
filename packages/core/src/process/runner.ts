import { spawn, type SpawnOptions as NodeSpawnOptions } from 'node:child_process'
import { EOL } from 'node:os'
import { LaunchFailedError } from '../errors'

export interface ExecResult {
  readonly ok: boolean
  readonly code: number | null
  readonly stdout: string
  readonly stderr: string
}

export interface SpawnCtl {
  readonly done: Promise<ExecResult>
  cancel(reason?: string): void
}

export interface ExecOptions {
  readonly cwd?: string
  /** Overlay merged on top of the parent environment. */
  readonly env?: Readonly<Record<string, string>>
  /** Written to the child's stdin, which is then closed. */
  readonly stdin?: string
  readonly timeoutMs?: number
  readonly redactors?: readonly RegExp[]
}

export interface SpawnOptions extends ExecOptions {
  readonly onStdout?: (chunk: string) => void
  readonly onStderr?: (chunk: string) => void
}

/**
 * The single seam between Runway and external programs.
 *
 * A nonzero exit is never an error: `exec` resolves with the exit code and both
 * output streams. Only a failure to start the program at all (missing binary,
 * permission denied) rejects, with {@link LaunchFailedError}.
 */
export interface ProcessRunner {
  exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult>
  spawn(bin: string, args: readonly string[], opts?: SpawnOptions): SpawnCtl
}

function redact(s: string, patterns?: readonly RegExp[]): string {
  if (!patterns || patterns.length === 0) return s
  let out = s
  for (const re of patterns) out = out.replace(re, '***')
  return out
}

export class NodeProcessRunner implements ProcessRunner {
  async exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult> {
    const ctl = this.spawn(bin, args, opts)
    return await ctl.done
  }

  spawn(bin: string, args: readonly string[], opts?: SpawnOptions): SpawnCtl {
    const env: NodeJS.ProcessEnv = opts?.env !== undefined ? { ...process.env, ...opts.env } : process.env
    const nodeOpts: NodeSpawnOptions = {
      cwd: opts?.cwd,
      env,
      shell: false,
      windowsHide: true,
      stdio: [typeof opts?.stdin === 'string' ? 'pipe' : 'ignore', 'pipe', 'pipe']
    }
    const child = spawn(bin, [...args], nodeOpts)
    let stdout = ''
    let stderr = ''
    const apply = (s: string): string => redact(s, opts?.redactors)
    child.stdout?.setEncoding('utf8')
    child.stderr?.setEncoding('utf8')
    child.stdout?.on('data', (s: string) => { const r = apply(s); stdout += r; opts?.onStdout?.(r) })
    child.stderr?.on('data', (s: string) => { const r = apply(s); stderr += r; opts?.onStderr?.(r) })

    if (typeof opts?.stdin === 'string' && child.stdin) {
      child.stdin.on('error', (err: Error) => { stderr += `${EOL}stdin: ${err.message}${EOL}` })
      child.stdin.end(opts.stdin)
    }

    let timeoutTimer: NodeJS.Timeout | undefined
    if (opts?.timeoutMs && opts.timeoutMs > 0) {
      timeoutTimer = setTimeout(() => {
        stderr += `${EOL}timed out after ${opts.timeoutMs}ms${EOL}`
        child.kill('SIGTERM')
      }, opts.timeoutMs)
    }

    let settled = false
    const done = new Promise<ExecResult>((resolve, reject) => {
      child.on('error', (err: NodeJS.ErrnoException) => {
        if (timeoutTimer) clearTimeout(timeoutTimer)
        if (settled) return
        settled = true
        reject(new LaunchFailedError(bin, err.code ?? err.message))
      })
      child.on('close', (code: number | null) => {
        if (timeoutTimer) clearTimeout(timeoutTimer)
        if (settled) return
        settled = true
        resolve({ ok: code === 0, code, stdout, stderr })
      })
    })

    return {
      done,
      cancel: (reason?: string) => {
        if (reason) stderr += `${EOL}cancelled: ${reason}${EOL}`
        child.kill('SIGTERM')
      }
    }
  }
}
