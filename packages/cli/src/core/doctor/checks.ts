import {
  LaunchFailedError,
  RemoteAuthError,
  RemoteNotFoundError,
  RemotePermissionError,
  toRunwayError,
  type CheckResult,
  type ProcessRunner
} from '@runway/core'
import type { CloudRunClient } from '@runway/provider-cloud-run'
import { configFileName, loadConfig } from '../config/config'

/** Read-only inputs shared by every check. */
export interface DoctorContext {
  readonly client: CloudRunClient
  readonly runner: ProcessRunner
  readonly cwd: string
  readonly projectId?: string
}

export interface DoctorCheck {
  readonly name: string
  readonly run: (ctx: DoctorContext) => Promise<CheckResult>
}

/** APIs a deploy needs, with their display labels. */
export const REQUIRED_APIS: ReadonlyArray<readonly [label: string, api: string]> = [
  ['Cloud Build', 'cloudbuild.googleapis.com'],
  ['Cloud Run', 'run.googleapis.com'],
  ['Secret Manager', 'secretmanager.googleapis.com'],
  ['Artifact Registry', 'artifactregistry.googleapis.com']
]

const pass = (name: string, detail?: string): CheckResult => ({ name, status: 'pass', detail })
const fail = (name: string, detail?: string): CheckResult => ({ name, status: 'fail', detail })
const unknown = (name: string, detail?: string): CheckResult => ({ name, status: 'unknown', detail })

/** A missing binary is a definitive no; any other launch problem leaves the tool unknown. */
function toolError(name: string, err: unknown): CheckResult {
  if (err instanceof LaunchFailedError) {
    return err.detail === 'ENOENT' ? fail(name, `${err.bin} not installed`) : unknown(name, err.message)
  }
  return unknown(name, toRunwayError(err).message)
}

/** Auth, permission and not-found answers are definitive; everything else is unknown. */
function remoteError(name: string, err: unknown, prefix = ''): CheckResult {
  const e = toRunwayError(err)
  if (e instanceof RemoteAuthError || e instanceof RemotePermissionError || e instanceof RemoteNotFoundError) {
    return fail(name, `${prefix}${e.message}`)
  }
  return unknown(name, `${prefix}${e.message}`)
}

function noProject(name: string): CheckResult {
  return unknown(name, `project.projectId not set in ${configFileName()}`)
}

export const gcloudCheck: DoctorCheck = {
  name: 'gcloud CLI',
  run: async (ctx) => {
    try { return pass('gcloud CLI', await ctx.client.version()) } catch (err) { return toolError('gcloud CLI', err) }
  }
}

export const gitCheck: DoctorCheck = {
  name: 'git',
  run: async (ctx) => {
    try {
      const res = await ctx.runner.exec('git', ['--version'], { cwd: ctx.cwd, timeoutMs: 10_000 })
      if (!res.ok) return unknown('git', res.stderr.trim() || `exit code ${String(res.code)}`)
      return pass('git', res.stdout.trim().replace(/^git version /, ''))
    } catch (err) {
      return toolError('git', err)
    }
  }
}

export const accountCheck: DoctorCheck = {
  name: 'Account',
  run: async (ctx) => {
    try {
      const account = await ctx.client.activeAccount()
      return account ? pass('Account', account) : fail('Account', 'no active account (run: gcloud auth login)')
    } catch (err) {
      return remoteError('Account', err)
    }
  }
}

export const projectCheck: DoctorCheck = {
  name: 'Project',
  run: async (ctx) => {
    const p = ctx.projectId
    if (!p) return noProject('Project')
    try {
      const name = await ctx.client.describeProject(p)
      return pass('Project', name ? `${p} (${name})` : p)
    } catch (err) {
      return remoteError('Project', err, `${p}: `)
    }
  }
}

export const billingCheck: DoctorCheck = {
  name: 'Billing',
  run: async (ctx) => {
    const p = ctx.projectId
    if (!p) return noProject('Billing')
    try {
      return (await ctx.client.billingEnabled(p)) ? pass('Billing', 'enabled') : fail('Billing', 'not enabled')
    } catch (err) {
      return remoteError('Billing', err)
    }
  }
}

export function apiCheck(label: string, api: string): DoctorCheck {
  const name = `${label} API`
  return {
    name,
    run: async (ctx) => {
      const p = ctx.projectId
      if (!p) return noProject(name)
      try {
        return (await ctx.client.apiEnabled(p, api)) ? pass(name, 'enabled') : fail(name, `not enabled (run: gcloud services enable ${api} --project ${p})`)
      } catch (err) {
        return remoteError(name, err)
      }
    }
  }
}

export const configCheck: DoctorCheck = {
  name: 'Config file',
  run: async (ctx) => {
    try {
      await loadConfig(ctx.cwd)
      return pass('Config file', configFileName())
    } catch (err) {
      return fail('Config file', toRunwayError(err).message)
    }
  }
}

/** Checks in report order. */
export function defaultChecks(): DoctorCheck[] {
  return [
    gcloudCheck,
    gitCheck,
    accountCheck,
    projectCheck,
    billingCheck,
    ...REQUIRED_APIS.map(([label, api]) => apiCheck(label, api)),
    configCheck
  ]
}
