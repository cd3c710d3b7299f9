import {
  BUNDLE_DIR,
  LocalIOError,
  LocalValidationError,
  type DeployPlan,
  type ProcessRunner,
  type ProjectMetadata,
  type RemoteTarget,
  type RunwayConfig
} from '@runway/core'
import { artifactImageTag } from '@runway/provider-cloud-run'
import { loadConfig, requireRemoteTarget } from '../config/config'
import { loadMetadata } from '../config/metadata'

const SERVICE_NAME = /^[a-z]([-a-z0-9]{0,47}[a-z0-9])?$/

/** Cloud Run service name: `project.name`, else the crate name with `_` as `-`. */
export function serviceNameFor(config: RunwayConfig, meta: ProjectMetadata): string {
  const name = config.project.name ?? meta.name.toLowerCase().replace(/_/g, '-')
  if (!SERVICE_NAME.test(name)) {
    throw new LocalValidationError(`"${name}" is not a valid service name`, {
      code: 'INVALID_SERVICE_NAME',
      remedy: 'Set project.name to lowercase letters, digits and hyphens, starting with a letter'
    })
  }
  return name
}

/**
 * Changed paths from `git status --porcelain`. Only the generated bundle is
 * ignored; an edited `.runway/Dockerfile` counts as a change.
 */
export async function dirtyPaths(cwd: string, runner: ProcessRunner): Promise<string[]> {
  const res = await runner.exec('git', ['status', '--porcelain'], { cwd, timeoutMs: 60_000 })
  if (!res.ok) {
    throw new LocalIOError(`git status failed: ${res.stderr.trim() || `exit code ${String(res.code)}`}`, {
      remedy: 'Run Runway inside a git repository (git init)'
    })
  }
  return res.stdout
    .split(/\r?\n/)
    .filter(l => l.trim().length > 0)
    .map(l => l.slice(3).replace(/^"|"$/g, ''))
    .filter(p => {
      const path = p.replace(/\/$/, '')
      return path !== BUNDLE_DIR && !path.startsWith(BUNDLE_DIR + '/')
    })
}

export function planFor(config: RunwayConfig, target: RemoteTarget, meta: ProjectMetadata): DeployPlan {
  const serviceName = serviceNameFor(config, meta)
  return {
    config,
    target,
    meta,
    serviceName,
    imageTag: artifactImageTag(target.projectId, target.region, serviceName)
  }
}

/** Config, remote target, metadata and deterministic names. Local only. */
export async function resolvePlan(cwd: string, runner: ProcessRunner): Promise<DeployPlan> {
  const config = await loadConfig(cwd)
  const target = requireRemoteTarget(config)
  const meta = await loadMetadata(cwd, runner)
  return planFor(config, target, meta)
}

export async function ensureClean(cwd: string, runner: ProcessRunner): Promise<void> {
  const dirty = await dirtyPaths(cwd, runner)
  if (dirty.length === 0) return
  const shown = dirty.slice(0, 5).join(', ') + (dirty.length > 5 ? `, and ${dirty.length - 5} more` : '')
  throw new LocalValidationError(`uncommitted changes detected: ${shown}`, {
    code: 'DIRTY_TREE',
    remedy: 'Commit your changes, or pass --allow-dirty to deploy anyway'
  })
}
