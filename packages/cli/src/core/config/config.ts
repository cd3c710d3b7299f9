import Ajv from 'ajv'
import { join } from 'node:path'
import {
  CONFIG_FILE,
  DEFAULT_BUILD,
  DEFAULT_DEPLOY,
  DEFAULT_REGION,
  DEFAULT_SERVICE,
  LocalValidationError,
  type RemoteTarget,
  type RunwayConfig
} from '@runway/core'
import { configSchema, type RawConfig } from '../../schemas/config.schema'
import { fsx } from '../../utils/fs'

const ajv = new Ajv({ allErrors: true, strict: false })
const validateRaw = ajv.compile<RawConfig>(configSchema)

/** Config file name, honouring `RUNWAY_CONFIG_FILE`. */
export function configFileName(): string {
  const override = process.env.RUNWAY_CONFIG_FILE
  return override && override.trim().length > 0 ? override.trim() : CONFIG_FILE
}

export function configPath(cwd: string): string {
  return join(cwd, configFileName())
}

/** Apply defaults. Pure. */
export function resolveConfig(raw: RawConfig): RunwayConfig {
  const b = raw.build ?? {}
  const s = raw.service ?? {}
  const d = raw.deploy ?? {}
  return {
    project: {
      name: raw.project?.name,
      projectId: raw.project?.projectId?.trim() ?? '',
      region: raw.project?.region?.trim() ?? DEFAULT_REGION
    },
    build: {
      baseImage: b.baseImage ?? DEFAULT_BUILD.baseImage,
      runtimeImage: b.runtimeImage ?? DEFAULT_BUILD.runtimeImage,
      extraPackages: [...(b.extraPackages ?? DEFAULT_BUILD.extraPackages)],
      cargoChefVersion: b.cargoChefVersion ?? DEFAULT_BUILD.cargoChefVersion,
      include: b.include ? [...b.include] : undefined,
      env: { ...(b.env ?? DEFAULT_BUILD.env) }
    },
    service: {
      memory: s.memory ?? DEFAULT_SERVICE.memory,
      cpu: s.cpu ?? DEFAULT_SERVICE.cpu,
      minInstances: s.minInstances ?? DEFAULT_SERVICE.minInstances,
      maxInstances: s.maxInstances ?? DEFAULT_SERVICE.maxInstances,
      concurrency: s.concurrency ?? DEFAULT_SERVICE.concurrency,
      port: s.port ?? DEFAULT_SERVICE.port
    },
    deploy: {
      pollIntervalMs: d.pollIntervalMs ?? DEFAULT_DEPLOY.pollIntervalMs,
      buildTimeoutMs: d.buildTimeoutMs ?? DEFAULT_DEPLOY.buildTimeoutMs,
      deployTimeoutMs: d.deployTimeoutMs ?? DEFAULT_DEPLOY.deployTimeoutMs
    }
  }
}

/** Validate parsed JSON against the config schema and apply defaults. */
export function parseConfig(text: string, file: string = CONFIG_FILE): RunwayConfig {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new LocalValidationError(`${file} is not valid JSON: ${reason}`, { code: 'CONFIG_INVALID', cause: err })
  }
  if (!validateRaw(parsed)) {
    const errs: string[] = (validateRaw.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? ''}`.trim())
    throw new LocalValidationError(`${file} is invalid: ${errs.join('; ')}`, {
      code: 'CONFIG_INVALID',
      remedy: `Fix the listed fields in ${file}`
    })
  }
  const cfg = resolveConfig(parsed)
  if (cfg.service.minInstances > cfg.service.maxInstances) {
    throw new LocalValidationError(`${file} is invalid: service.minInstances (${cfg.service.minInstances}) exceeds service.maxInstances (${cfg.service.maxInstances})`, { code: 'CONFIG_INVALID' })
  }
  return cfg
}

/** Read, validate and resolve the project configuration file. */
export async function loadConfig(cwd: string): Promise<RunwayConfig> {
  const file = configFileName()
  const text = await fsx.readText(join(cwd, file))
  if (text === undefined) {
    throw new LocalValidationError(`${file} not found in ${cwd}`, {
      code: 'CONFIG_NOT_FOUND',
      remedy: 'Run: runway init'
    })
  }
  return parseConfig(text, file)
}

/** Project id and region, both required before any remote call. */
export function requireRemoteTarget(config: RunwayConfig): RemoteTarget {
  const projectId = config.project.projectId.trim()
  if (!projectId) {
    throw new LocalValidationError('project.projectId is not set', {
      code: 'PROJECT_ID_MISSING',
      remedy: `Set project.projectId in ${configFileName()}`
    })
  }
  const region = config.project.region.trim()
  if (!region) {
    throw new LocalValidationError('project.region is not set', {
      code: 'REGION_MISSING',
      remedy: `Set project.region in ${configFileName()}`
    })
  }
  return { projectId, region }
}
