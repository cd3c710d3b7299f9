import { Command } from 'commander'
import { summary } from '@runway/core'
import { logger } from '../utils/logger'
import { reportFailure } from '../utils/errors'
import { loadConfig } from '../core/config/config'
import { loadMetadata } from '../core/config/metadata'
import { renderDockerfile } from '../core/build/dockerfile'
import { ejectDockerfile } from '../core/build/eject'
import type { CliDeps } from './context'

export function registerEjectCommand(program: Command, deps: CliDeps): void {
  program
    .command('eject')
    .description('Write the generated Dockerfile to .runway/Dockerfile; deploys use it from then on')
    .action(async (): Promise<void> => {
      try {
        const cwd = deps.cwd()
        const config = await loadConfig(cwd)
        const meta = await loadMetadata(cwd, deps.runner)
        const path = await ejectDockerfile(cwd, renderDockerfile(config.build, meta, config.service.port))
        logger.success(`Wrote ${path}`)
        if (logger.isJson()) logger.json(summary({ ok: true, action: 'eject', message: path }))
      } catch (err) {
        reportFailure('eject', err)
      }
    })
}
