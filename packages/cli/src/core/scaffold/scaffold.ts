import { join, resolve } from 'node:path'
import { LocalValidationError } from '@runway/core'
import { fsx } from '../../utils/fs'
import { configFileName } from '../config/config'
import { ENV_EXAMPLE, GITIGNORE, MAIN_RS, cargoToml, runwayJson } from './templates'

const CRATE_NAME = /^[A-Za-z][A-Za-z0-9_-]*$/

export interface ScaffoldResult {
  readonly dir: string
  readonly created: readonly string[]
  readonly skipped: readonly string[]
}

/** Create `<parent>/<name>` with a minimal HTTP service. Refuses an existing path. */
export async function scaffoldProject(parent: string, name: string): Promise<ScaffoldResult> {
  if (!CRATE_NAME.test(name)) {
    throw new LocalValidationError(`"${name}" is not a valid crate name`, {
      code: 'INVALID_NAME',
      remedy: 'Use letters, digits, "-" and "_", starting with a letter'
    })
  }
  const dir = resolve(parent, name)
  if (await fsx.exists(dir)) {
    throw new LocalValidationError(`directory '${name}' already exists`, { code: 'ALREADY_EXISTS' })
  }
  const files: ReadonlyArray<readonly [string, string]> = [
    ['Cargo.toml', cargoToml(name)],
    ['src/main.rs', MAIN_RS],
    [configFileName(), runwayJson()],
    ['.env.example', ENV_EXAMPLE],
    ['.gitignore', GITIGNORE]
  ]
  for (const [rel, content] of files) await fsx.writeText(join(dir, rel), content)
  return { dir, created: files.map(([rel]) => rel), skipped: [] }
}

/** Add the config file and `.env.example` to an existing crate, keeping files already there. */
export async function initProject(cwd: string): Promise<ScaffoldResult> {
  if (!(await fsx.exists(join(cwd, 'Cargo.toml')))) {
    throw new LocalValidationError('Cargo.toml not found. Run this command from a Rust project root.', { code: 'MANIFEST_NOT_FOUND' })
  }
  const created: string[] = []
  const skipped: string[] = []
  const files: ReadonlyArray<readonly [string, string]> = [
    [configFileName(), runwayJson()],
    ['.env.example', ENV_EXAMPLE]
  ]
  for (const [rel, content] of files) {
    const path = join(cwd, rel)
    if (await fsx.exists(path)) { skipped.push(rel); continue }
    await fsx.writeText(path, content)
    created.push(rel)
  }
  return { dir: cwd, created, skipped }
}
