import {
  CancelledError,
  isTerminal,
  toRunwayError,
  type DeployPhase,
  type DeployPlan,
  type DeployState,
  type ProcessRunner,
  type TerminalDeployState
} from '@runway/core'
import type { CloudRunClient } from '@runway/provider-cloud-run'
import { loadConfig, requireRemoteTarget } from '../config/config'
import { loadMetadata } from '../config/metadata'
import { renderDockerfile } from '../build/dockerfile'
import { assembleBundle } from '../build/bundle'
import { loadEjectedDockerfile } from '../build/eject'
import { ensureClean, planFor } from './plan'
import { preflight } from './preflight'

export interface DeployContext {
  readonly cwd: string
  /** Remote operations. */
  readonly client: CloudRunClient
  /** Local tools (git, cargo). */
  readonly runner: ProcessRunner
  readonly allowDirty?: boolean
  /** Aborts the run (SIGINT, overall timeout). */
  readonly signal?: AbortSignal
  /** Progress notes within a phase. */
  readonly onNote?: (message: string) => void
}

export interface RunDeployOptions {
  readonly onTransition?: (state: DeployState) => void
}

async function validate(ctx: DeployContext): Promise<DeployPlan> {
  const config = await loadConfig(ctx.cwd)
  const target = requireRemoteTarget(config)
  if (!ctx.allowDirty) await ensureClean(ctx.cwd, ctx.runner)
  const meta = await loadMetadata(ctx.cwd, ctx.runner)
  return planFor(config, target, meta)
}

function checkCancelled(ctx: DeployContext, phase: DeployPhase): void {
  if (ctx.signal?.aborted) throw new CancelledError(`deploy cancelled during ${phase}`)
}

async function advance(state: Exclude<DeployState, TerminalDeployState>, ctx: DeployContext): Promise<DeployState> {
  checkCancelled(ctx, state.kind)
  switch (state.kind) {
    case 'validating': {
      const plan = await validate(ctx)
      return { kind: 'bundling', plan }
    }
    case 'bundling': {
      const { plan } = state
      const ejected = await loadEjectedDockerfile(ctx.cwd)
      if (ejected !== undefined) ctx.onNote?.('Using ejected Dockerfile (.runway/Dockerfile)')
      const dockerfile = ejected ?? renderDockerfile(plan.config.build, plan.meta, plan.config.service.port)
      const artifact = await assembleBundle({
        cwd: ctx.cwd,
        dockerfile,
        include: plan.config.build.include,
        runner: ctx.runner,
        ejected: ejected !== undefined
      })
      ctx.onNote?.(`Bundled ${artifact.files.length} file(s)`)
      return { kind: 'building', plan, artifact }
    }
    case 'building': {
      const { plan, artifact } = state
      const { projectId, region } = plan.target
      await preflight(ctx.client, projectId)
      ctx.onNote?.('Pre-flight checks passed')
      const repo = await ctx.client.ensureArtifactRepo(projectId, region)
      if (repo === 'created') ctx.onNote?.('Created Artifact Registry repository')
      const buildId = await ctx.client.submitBuild(artifact.dir, projectId, plan.imageTag)
      ctx.onNote?.(`Build ${buildId} submitted`)
      await ctx.client.waitForBuild(buildId, projectId, {
        intervalMs: plan.config.deploy.pollIntervalMs,
        timeoutMs: plan.config.deploy.buildTimeoutMs,
        signal: ctx.signal
      })
      return { kind: 'deploying', plan, buildId }
    }
    case 'deploying': {
      const { plan, buildId } = state
      const { projectId, region } = plan.target
      const secrets = await ctx.client.listSecrets(projectId)
      if (secrets.length > 0) ctx.onNote?.(`${secrets.length} secret(s) will be injected`)
      await ctx.client.deployService({
        name: plan.serviceName,
        image: plan.imageTag,
        projectId,
        region,
        service: plan.config.service,
        env: plan.config.build.env,
        secrets
      })
      const svc = await ctx.client.waitForService(plan.serviceName, projectId, region, {
        intervalMs: plan.config.deploy.pollIntervalMs,
        timeoutMs: plan.config.deploy.deployTimeoutMs,
        signal: ctx.signal
      })
      return { kind: 'done', plan, buildId, serviceName: plan.serviceName, url: svc.url ?? '' }
    }
  }
}

/**
 * Transition function of the deploy state machine. Terminal states are
 * returned unchanged; any error moves to `failed` at the current phase.
 */
export async function step(state: DeployState, ctx: DeployContext): Promise<DeployState> {
  if (isTerminal(state)) return state
  try {
    return await advance(state, ctx)
  } catch (err) {
    return { kind: 'failed', at: state.kind, cause: toRunwayError(err) }
  }
}

/** Drive the state machine from `validating` to a terminal state. */
export async function runDeploy(ctx: DeployContext, opts: RunDeployOptions = {}): Promise<TerminalDeployState> {
  let state: DeployState = { kind: 'validating' }
  opts.onTransition?.(state)
  while (!isTerminal(state)) {
    state = await step(state, ctx)
    opts.onTransition?.(state)
  }
  return state
}
