import type { RunwayEvent, RunwaySummary } from "./types"

export function evt(args: {
  readonly action: RunwayEvent["action"]
  readonly phase?: string
  readonly ok?: boolean
  readonly message?: string
  readonly buildId?: string
  readonly service?: string
  readonly url?: string
  readonly timestamp?: string
}): RunwayEvent {
  return { ...args }
}

export function summary(args: {
  readonly ok: boolean
  readonly action: RunwaySummary["action"]
  readonly service?: string
  readonly url?: string
  readonly message?: string
  readonly error?: RunwaySummary["error"]
}): RunwaySummary {
  return { ...args, final: true }
}
