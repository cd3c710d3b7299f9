import { setTimeout as sleep } from 'node:timers/promises'
import { CancelledError, TimeoutError } from './errors'

export interface PollOptions {
  readonly intervalMs: number
  readonly timeoutMs: number
  readonly signal?: AbortSignal
  /** Used in timeout and cancellation messages. */
  readonly label?: string
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError'
}

/**
 * Call `attempt` until `done` accepts its value.
 * Errors thrown by `attempt` propagate unchanged. The remote operation is not
 * cancelled when the local wait ends.
 */
export async function pollUntil<T>(
  attempt: () => Promise<T>,
  done: (value: T) => boolean,
  opts: PollOptions
): Promise<T> {
  const label = opts.label ?? 'operation'
  const deadline = Date.now() + opts.timeoutMs
  for (;;) {
    if (opts.signal?.aborted) throw new CancelledError(`${label} cancelled`)
    const value = await attempt()
    if (done(value)) return value
    const remaining = deadline - Date.now()
    if (remaining <= 0) throw new TimeoutError(`${label} did not finish within ${Math.round(opts.timeoutMs / 1000)}s`)
    try {
      await sleep(Math.min(opts.intervalMs, remaining), undefined, { signal: opts.signal })
    } catch (err) {
      if (isAbort(err)) throw new CancelledError(`${label} cancelled`, { cause: err })
      throw err
    }
  }
}
