import { join } from 'node:path'
import { LocalValidationError } from '@runway/core'
import {
  serviceAccountEmail,
  workloadIdentityProviderName,
  type CloudRunClient,
  type EnsureOutcome
} from '@runway/provider-cloud-run'
import { fsx } from '../../utils/fs'
import { loadConfig, requireRemoteTarget } from '../config/config'
import { preflight } from '../pipeline/preflight'
import { GH_SECRET_NAMES, type GhSecretName, type GitHubCli } from './github'
import { renderWorkflow, WORKFLOW_PATH } from './workflow'

export const CI_POOL_ID = 'runway-github'
export const CI_PROVIDER_ID = 'github'
export const CI_ACCOUNT_ID = 'runway-deploy'

/**
 * Project roles of the CI deployer. `run.admin` because `--allow-unauthenticated` sets the
 * service IAM policy; secret access is granted per secret by `secret set`, so listing is enough.
 */
export const CI_ROLES: readonly string[] = [
  'roles/artifactregistry.writer',
  'roles/cloudbuild.builds.editor',
  'roles/iam.serviceAccountUser',
  'roles/run.admin',
  'roles/secretmanager.viewer',
  'roles/serviceusage.serviceUsageViewer',
  'roles/storage.objectAdmin',
  'roles/viewer'
]

/** Workload Identity Federation exchanges the GitHub token through these. */
export const CI_APIS: readonly string[] = ['iam.googleapis.com', 'iamcredentials.googleapis.com', 'sts.googleapis.com']

export interface CiContext {
  readonly cwd: string
  readonly client: CloudRunClient
  readonly github: GitHubCli
  readonly onStep?: (message: string) => void
}

export interface CiInitOptions {
  readonly branch: string
  readonly cliVersion: string
}

export interface CiInitResult {
  readonly repo: string
  readonly projectId: string
  readonly serviceAccount: string
  readonly workloadIdentityProvider: string
  readonly workflowPath: string
  /** Cloud resources this run created (or restored). */
  readonly created: readonly string[]
  readonly secrets: readonly GhSecretName[]
}

/**
 * Wire a GitHub repository to deploy through Workload Identity Federation:
 * pool, OIDC provider, deployer service account and its roles, repository
 * secrets, and the workflow file. Every cloud step is idempotent; the
 * workflow file is the one thing that is never overwritten.
 */
export async function runCiInit(ctx: CiContext, opts: CiInitOptions): Promise<CiInitResult> {
  const step = (message: string): void => ctx.onStep?.(message)
  const workflowFile = join(ctx.cwd, WORKFLOW_PATH)
  if (await fsx.exists(workflowFile)) {
    throw new LocalValidationError(`${WORKFLOW_PATH} already exists`, {
      code: 'WORKFLOW_EXISTS',
      remedy: 'Edit the workflow directly, or delete it and run ci init again'
    })
  }
  const { projectId } = requireRemoteTarget(await loadConfig(ctx.cwd))

  step(`GitHub CLI ${await ctx.github.version()}`)
  await ctx.github.authStatus()
  const repo = await ctx.github.repository()
  step(`Repository ${repo}`)

  await preflight(ctx.client, projectId, CI_APIS)
  step('Pre-flight checks passed')

  const created: string[] = []
  const track = (what: string, outcome: EnsureOutcome): void => {
    if (outcome === 'created') created.push(what)
    step(`${outcome === 'created' ? 'Created' : 'Found'} ${what}`)
  }
  track(`pool ${CI_POOL_ID}`, await ctx.client.ensureWorkloadIdentityPool(projectId, CI_POOL_ID))
  track(`provider ${CI_PROVIDER_ID}`, await ctx.client.ensureGitHubOidcProvider(projectId, CI_POOL_ID, CI_PROVIDER_ID, repo))
  const email = serviceAccountEmail(CI_ACCOUNT_ID, projectId)
  track(`service account ${email}`, await ctx.client.ensureServiceAccount(projectId, CI_ACCOUNT_ID, 'Runway CI deployer'))
  await ctx.client.bindProjectRoles(projectId, email, CI_ROLES)
  step(`Granted ${CI_ROLES.length} roles to ${email}`)

  const projectNumber = await ctx.client.projectNumber(projectId)
  await ctx.client.bindWorkloadIdentity(projectId, projectNumber, CI_POOL_ID, email, repo)
  const provider = workloadIdentityProviderName(projectNumber, CI_POOL_ID, CI_PROVIDER_ID)
  step(`Allowed ${repo} to impersonate ${email}`)

  const values: Readonly<Record<GhSecretName, string>> = {
    GCP_PROJECT_ID: projectId,
    WIF_PROVIDER: provider,
    WIF_SERVICE_ACCOUNT: email
  }
  for (const name of GH_SECRET_NAMES) {
    await ctx.github.setSecret(repo, name, values[name])
    step(`Set secret ${name}`)
  }

  await fsx.writeText(workflowFile, renderWorkflow(opts))
  step(`Wrote ${WORKFLOW_PATH}`)
  return {
    repo,
    projectId,
    serviceAccount: email,
    workloadIdentityProvider: provider,
    workflowPath: WORKFLOW_PATH,
    created,
    secrets: [...GH_SECRET_NAMES]
  }
}
