import Ajv from 'ajv'
import { realpath } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import { LocalValidationError, type ProcessRunner, type ProjectMetadata } from '@runway/core'
import { cargoMetadataSchema, type CargoMetadata, type CargoPackage } from '../../schemas/cargo-metadata.schema'
import { fsx } from '../../utils/fs'

const ajv = new Ajv({ allErrors: true, strict: false })
const validateMetadata = ajv.compile<CargoMetadata>(cargoMetadataSchema)

async function canonical(p: string): Promise<string> {
  try { return await realpath(p) } catch { return resolve(p) }
}

/**
 * Pick the binary to build: `default-run` when it names a bin target, else
 * the only bin, else the bin named like the package.
 */
export function selectBinary(bins: readonly string[], defaultRun: string | null | undefined, packageName: string): string {
  if (defaultRun && bins.includes(defaultRun)) return defaultRun
  if (bins.length === 0) {
    throw new LocalValidationError(`package ${packageName} has no binary target`, {
      code: 'NO_BINARY_TARGET',
      remedy: 'Add src/main.rs or a [[bin]] section to Cargo.toml'
    })
  }
  if (bins.length === 1) return bins[0] ?? packageName
  if (bins.includes(packageName)) return packageName
  throw new LocalValidationError(`package ${packageName} has several binaries (${bins.join(', ')}) and none is selected`, {
    code: 'MULTIPLE_BINARIES',
    remedy: 'Set default-run in the [package] section of Cargo.toml'
  })
}

async function findPackage(meta: CargoMetadata, cwd: string): Promise<CargoPackage> {
  const dir = await canonical(cwd)
  for (const pkg of meta.packages) {
    if ((await canonical(dirname(pkg.manifest_path))) === dir) return pkg
  }
  const members = meta.packages.map(p => p.name).join(', ')
  throw new LocalValidationError(`no package is defined in ${cwd}${members ? ` (workspace members: ${members})` : ''}`, {
    code: 'NO_PACKAGE',
    remedy: 'Run Runway from the directory of the crate to deploy'
  })
}

/** Name, version and binary of the crate in `cwd`, via `cargo metadata`. */
export async function loadMetadata(cwd: string, runner: ProcessRunner): Promise<ProjectMetadata> {
  const manifest = join(cwd, 'Cargo.toml')
  if (!(await fsx.exists(manifest))) {
    throw new LocalValidationError(`Cargo.toml not found in ${cwd}`, { code: 'MANIFEST_NOT_FOUND', remedy: 'Run: runway new <name>' })
  }
  const res = await runner.exec('cargo', ['metadata', '--no-deps', '--format-version', '1', '--manifest-path', manifest], { cwd, timeoutMs: 120_000 })
  if (!res.ok) {
    throw new LocalValidationError(`cargo metadata failed: ${res.stderr.trim() || `exit code ${String(res.code)}`}`, { code: 'MANIFEST_INVALID' })
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(res.stdout)
  } catch (err) {
    throw new LocalValidationError('cargo metadata printed output that is not JSON', { code: 'MANIFEST_INVALID', cause: err })
  }
  if (!validateMetadata(parsed)) {
    const errs: string[] = (validateMetadata.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? ''}`.trim())
    throw new LocalValidationError(`unexpected cargo metadata shape: ${errs.join('; ')}`, { code: 'MANIFEST_INVALID' })
  }
  const pkg = await findPackage(parsed, cwd)
  const bins = pkg.targets.filter(t => t.kind.includes('bin')).map(t => t.name)
  return { name: pkg.name, version: pkg.version, binaryName: selectBinary(bins, pkg.default_run, pkg.name) }
}
