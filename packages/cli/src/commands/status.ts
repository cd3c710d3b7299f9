import { Command } from 'commander'
import { summary } from '@runway/core'
import { logger } from '../utils/logger'
import { reportFailure } from '../utils/errors'
import { resolvePlan } from '../core/pipeline/plan'
import { clientFor, type CliDeps } from './context'

export function registerStatusCommand(program: Command, deps: CliDeps): void {
  program
    .command('status')
    .description('Show the service URL, readiness and latest revision')
    .action(async (): Promise<void> => {
      try {
        const plan = await resolvePlan(deps.cwd(), deps.runner)
        const { projectId, region } = plan.target
        const svc = await clientFor(deps).describeService(plan.serviceName, projectId, region)
        const ok = svc.ready === 'True'
        if (!ok) process.exitCode = 1
        if (logger.isJson()) {
          logger.json({
            ...summary({ ok, action: 'status', service: svc.name, url: svc.url, message: svc.message }),
            ready: svc.ready,
            revision: svc.latestRevision
          })
          return
        }
        logger.info(`Service:  ${svc.name} (${projectId}/${region})`)
        logger.info(`URL:      ${svc.url ?? '(none yet)'}`)
        logger.info(`Ready:    ${svc.ready}${svc.message ? ` - ${svc.message}` : ''}`)
        if (svc.latestRevision) logger.info(`Revision: ${svc.latestRevision}`)
      } catch (err) {
        reportFailure('status', err)
      }
    })
}
