import { InvalidArgumentError } from 'commander'
import { NodeProcessRunner, type ProcessRunner } from '@runway/core'
import { CloudRunClient } from '@runway/provider-cloud-run'

/** What every command needs from the outside world. Tests swap in fakes. */
export interface CliDeps {
  readonly runner: ProcessRunner
  readonly cwd: () => string
}

export function defaultDeps(): CliDeps {
  return { runner: new NodeProcessRunner(), cwd: () => process.cwd() }
}

export function clientFor(deps: CliDeps, redactors?: readonly RegExp[]): CloudRunClient {
  return new CloudRunClient({ runner: deps.runner, redactors })
}

/** Commander option parser for counts and durations. */
export function parsePositiveInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Expected a positive integer.')
  return n
}
