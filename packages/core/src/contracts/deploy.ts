import type { RunwayError } from '../errors'
import type { RemoteTarget, RunwayConfig } from './config'
import type { ProjectMetadata } from './metadata'

/** Output of the build artifact generator. */
export interface BuildArtifact {
  readonly dockerfile: string
  /** Relative POSIX paths, sorted. */
  readonly files: readonly string[]
  /** Absolute path of the bundle directory. */
  readonly dir: string
}

/** Everything resolved during validation; fixed for the rest of the run. */
export interface DeployPlan {
  readonly config: RunwayConfig
  readonly target: RemoteTarget
  readonly meta: ProjectMetadata
  readonly serviceName: string
  readonly imageTag: string
}

export type DeployPhase = 'validating' | 'bundling' | 'building' | 'deploying'

export type DeployState =
  | { readonly kind: 'validating' }
  | { readonly kind: 'bundling'; readonly plan: DeployPlan }
  | { readonly kind: 'building'; readonly plan: DeployPlan; readonly artifact: BuildArtifact }
  | { readonly kind: 'deploying'; readonly plan: DeployPlan; readonly buildId: string }
  | { readonly kind: 'done'; readonly plan: DeployPlan; readonly buildId: string; readonly serviceName: string; readonly url: string }
  | { readonly kind: 'failed'; readonly at: DeployPhase; readonly cause: RunwayError }

export type TerminalDeployState = Extract<DeployState, { kind: 'done' | 'failed' }>

export function isTerminal(state: DeployState): state is TerminalDeployState {
  return state.kind === 'done' || state.kind === 'failed'
}
