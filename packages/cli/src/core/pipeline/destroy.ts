import { rm } from 'node:fs/promises'
import { join } from 'node:path'
import { BUNDLE_DIR, LocalValidationError, RemoteNotFoundError, toRunwayError, type DeployPlan, type RunwayError } from '@runway/core'
import { serviceAccountEmail, type CloudRunClient } from '@runway/provider-cloud-run'
import { fsx } from '../../utils/fs'
import { CI_ACCOUNT_ID, CI_POOL_ID } from '../ci/bootstrap'
import { GH_SECRET_NAMES, type GitHubCli } from '../ci/github'
import { WORKFLOW_PATH } from '../ci/workflow'

export type DestroyResource = 'service' | 'image' | 'bundle' | 'secrets' | 'ci'

export interface DestroyFailure {
  readonly resource: DestroyResource
  readonly error: RunwayError
}

export interface DestroyReport {
  readonly ok: boolean
  readonly removed: readonly DestroyResource[]
  /** Already gone; counts as success. */
  readonly absent: readonly DestroyResource[]
  readonly failed?: DestroyFailure
  /** Not attempted because an earlier step failed. */
  readonly remaining: readonly DestroyResource[]
}

export interface DestroyContext {
  readonly cwd: string
  readonly client: CloudRunClient
  /** Needed only with `includeCi`. */
  readonly github?: GitHubCli
}

export interface DestroyOptions {
  readonly includeSecrets?: boolean
  /** What `ci init` set up: repository secrets, deployer account, identity pool, workflow file. */
  readonly includeCi?: boolean
  readonly onStep?: (resource: DestroyResource, outcome: 'removed' | 'absent' | 'failed') => void
}

type Outcome = 'removed' | 'absent'

/** Image path without the tag; `--delete-tags` removes every tag under it. */
export function untaggedImage(tag: string): string {
  const slash = tag.lastIndexOf('/')
  const colon = tag.lastIndexOf(':')
  return colon > slash ? tag.slice(0, colon) : tag
}

async function remote(op: () => Promise<void>): Promise<Outcome> {
  try {
    await op()
    return 'removed'
  } catch (err) {
    if (err instanceof RemoteNotFoundError) return 'absent'
    throw err
  }
}

/** Resources in deletion order. */
export function destroyOrder(opts: Pick<DestroyOptions, 'includeSecrets' | 'includeCi'> = {}): DestroyResource[] {
  const order: DestroyResource[] = ['service', 'image', 'bundle']
  if (opts.includeSecrets === true) order.push('secrets')
  if (opts.includeCi === true) order.push('ci')
  return order
}

/**
 * Delete the service, its image and the local bundle (and optionally every
 * secret in the project and the CI wiring), in that order. Not-found counts as already removed;
 * any other error stops the run and the rest is reported as remaining.
 */
export async function runDestroy(plan: DeployPlan, ctx: DestroyContext, opts: DestroyOptions = {}): Promise<DestroyReport> {
  const { projectId, region } = plan.target
  const steps: Readonly<Record<DestroyResource, () => Promise<Outcome>>> = {
    service: () => remote(() => ctx.client.deleteService(plan.serviceName, projectId, region)),
    image: () => remote(() => ctx.client.deleteImage(untaggedImage(plan.imageTag), projectId)),
    bundle: async () => {
      const dir = join(ctx.cwd, BUNDLE_DIR)
      if (!(await fsx.exists(dir))) return 'absent'
      await rm(dir, { recursive: true, force: true })
      return 'removed'
    },
    secrets: async () => {
      const names = await ctx.client.listSecrets(projectId)
      if (names.length === 0) return 'absent'
      for (const name of names) await remote(() => ctx.client.deleteSecret(projectId, name))
      return 'removed'
    },
    ci: async () => {
      const github = ctx.github
      if (github === undefined) {
        throw new LocalValidationError('removing CI resources needs the GitHub CLI', { code: 'GITHUB_CLI_REQUIRED', remedy: 'Install gh and run: gh auth login' })
      }
      const repo = await github.repository()
      const outcomes: Outcome[] = []
      for (const name of GH_SECRET_NAMES) outcomes.push(await remote(() => github.deleteSecret(repo, name)))
      outcomes.push(await remote(() => ctx.client.deleteServiceAccount(projectId, serviceAccountEmail(CI_ACCOUNT_ID, projectId))))
      outcomes.push(await remote(() => ctx.client.deleteWorkloadIdentityPool(projectId, CI_POOL_ID)))
      const workflow = join(ctx.cwd, WORKFLOW_PATH)
      if (await fsx.exists(workflow)) {
        await rm(workflow, { force: true })
        outcomes.push('removed')
      }
      return outcomes.includes('removed') ? 'removed' : 'absent'
    }
  }

  const order = destroyOrder(opts)
  const removed: DestroyResource[] = []
  const absent: DestroyResource[] = []
  for (let i = 0; i < order.length; i++) {
    const resource = order[i]
    if (resource === undefined) continue
    try {
      const outcome = await steps[resource]()
      if (outcome === 'removed') removed.push(resource)
      else absent.push(resource)
      opts.onStep?.(resource, outcome)
    } catch (err) {
      opts.onStep?.(resource, 'failed')
      return { ok: false, removed, absent, failed: { resource, error: toRunwayError(err) }, remaining: order.slice(i + 1) }
    }
  }
  return { ok: true, removed, absent, remaining: [] }
}
