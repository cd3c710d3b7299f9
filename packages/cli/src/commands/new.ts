import { Command } from 'commander'
import { summary } from '@runway/core'
import { logger } from '../utils/logger'
import { reportFailure } from '../utils/errors'
import { scaffoldProject, initProject, type ScaffoldResult } from '../core/scaffold/scaffold'
import type { CliDeps } from './context'

function printCreated(res: ScaffoldResult): void {
  for (const f of res.created) logger.success(`created ${f}`)
  for (const f of res.skipped) logger.note(`kept existing ${f}`)
}

export function registerNewCommand(program: Command, deps: CliDeps): void {
  program
    .command('new')
    .description('Create a new Rust HTTP service ready to deploy')
    .argument('<name>', 'Crate and directory name')
    .action(async (name: string): Promise<void> => {
      try {
        const res = await scaffoldProject(deps.cwd(), name)
        printCreated(res)
        logger.info(`Next: cd ${name} && runway doctor`)
        if (logger.isJson()) logger.json({ ...summary({ ok: true, action: 'new', message: res.dir }), created: res.created })
      } catch (err) {
        reportFailure('new', err)
      }
    })
}

export function registerInitCommand(program: Command, deps: CliDeps): void {
  program
    .command('init')
    .description('Add Runway configuration to an existing Cargo project')
    .action(async (): Promise<void> => {
      try {
        const res = await initProject(deps.cwd())
        printCreated(res)
        if (res.created.length === 0) logger.info('Nothing to do')
        if (logger.isJson()) logger.json({ ...summary({ ok: true, action: 'init' }), created: res.created, skipped: res.skipped })
      } catch (err) {
        reportFailure('init', err)
      }
    })
}
