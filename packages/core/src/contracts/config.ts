/**
 * Project configuration as stored in `runway.json`, after defaults.
 */

export interface ProjectSection {
  /** Service name override; the crate name is used when absent. */
  readonly name?: string
  readonly projectId: string
  readonly region: string
}

export interface BuildSection {
  readonly baseImage: string
  readonly runtimeImage: string
  /** apt packages installed in the cacher and builder stages, in order. */
  readonly extraPackages: readonly string[]
  readonly cargoChefVersion: string
  /** Paths (files or directories) shipped to the build and copied into the runtime image. */
  readonly include?: readonly string[]
  readonly env: Readonly<Record<string, string>>
}

export interface ServiceSection {
  readonly memory: string
  readonly cpu: number
  readonly minInstances: number
  readonly maxInstances: number
  readonly concurrency: number
  readonly port: number
}

export interface DeploySection {
  readonly pollIntervalMs: number
  readonly buildTimeoutMs: number
  readonly deployTimeoutMs: number
}

export interface RunwayConfig {
  readonly project: ProjectSection
  readonly build: BuildSection
  readonly service: ServiceSection
  readonly deploy: DeploySection
}

/** Target of every remote operation. */
export interface RemoteTarget {
  readonly projectId: string
  readonly region: string
}

export const CONFIG_FILE = 'runway.json'
export const BUNDLE_DIR = '.runway-bundle'
export const EJECT_DIR = '.runway'
export const ARTIFACT_REPOSITORY = 'runway'

export const DEFAULT_REGION = 'us-central1'

export const DEFAULT_BUILD: BuildSection = {
  baseImage: 'rust:1.84-bookworm',
  runtimeImage: 'gcr.io/distroless/cc-debian12',
  extraPackages: [],
  cargoChefVersion: '0.1.68',
  env: {}
}

export const DEFAULT_SERVICE: ServiceSection = {
  memory: '512Mi',
  cpu: 1,
  minInstances: 0,
  maxInstances: 10,
  concurrency: 80,
  port: 8080
}

export const DEFAULT_DEPLOY: DeploySection = {
  pollIntervalMs: 5_000,
  buildTimeoutMs: 20 * 60_000,
  deployTimeoutMs: 10 * 60_000
}
