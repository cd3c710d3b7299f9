import { join } from 'node:path'
import { EJECT_DIR, LocalValidationError } from '@runway/core'
import { fsx } from '../../utils/fs'

export function ejectedDockerfilePath(cwd: string): string {
  return join(cwd, EJECT_DIR, 'Dockerfile')
}

/** Write `.runway/Dockerfile`; refuses to overwrite an earlier eject. */
export async function ejectDockerfile(cwd: string, text: string): Promise<string> {
  const path = ejectedDockerfilePath(cwd)
  if (await fsx.exists(path)) {
    throw new LocalValidationError(`build definition already ejected at ${path}`, {
      code: 'ALREADY_EJECTED',
      remedy: 'Edit it directly, or delete it to eject again'
    })
  }
  await fsx.writeText(path, text)
  return path
}

/** The ejected Dockerfile, or undefined when the project has not ejected. */
export async function loadEjectedDockerfile(cwd: string): Promise<string | undefined> {
  return await fsx.readText(ejectedDockerfilePath(cwd))
}
