import { Command } from 'commander'
import { evt, summary, type DeployState } from '@runway/core'
import { logger } from '../utils/logger'
import { reportFailure } from '../utils/errors'
import { computeRedactors } from '../utils/redaction'
import { runDeploy } from '../core/pipeline/deploy'
import { clientFor, parsePositiveInt, type CliDeps } from './context'

interface DeployOptions {
  readonly allowDirty?: boolean
  readonly timeout?: number
}

function describeState(state: DeployState): string | undefined {
  switch (state.kind) {
    case 'validating': return 'Validating project'
    case 'bundling': return `Bundling sources for ${state.plan.serviceName}`
    case 'building': return `Building ${state.plan.imageTag}`
    case 'deploying': return `Deploying ${state.plan.serviceName} to ${state.plan.target.region}`
    default: return undefined
  }
}

function announce(state: DeployState): void {
  if (logger.isNdjson()) {
    switch (state.kind) {
      case 'done':
        logger.json(evt({ action: 'deploy', phase: 'done', ok: true, buildId: state.buildId, service: state.serviceName, url: state.url }))
        return
      case 'failed':
        logger.json(evt({ action: 'deploy', phase: 'failed', ok: false, message: `${state.at}: ${state.cause.message}` }))
        return
      case 'deploying':
        logger.json(evt({ action: 'deploy', phase: state.kind, buildId: state.buildId, service: state.plan.serviceName }))
        return
      default:
        logger.json(evt({ action: 'deploy', phase: state.kind }))
        return
    }
  }
  const line = describeState(state)
  if (line) logger.info(line)
}

export function registerDeployCommand(program: Command, deps: CliDeps): void {
  program
    .command('deploy')
    .description('Build the service with Cloud Build and roll it out to Cloud Run')
    .option('--allow-dirty', 'Deploy even when the working tree has uncommitted changes')
    .option('--timeout <minutes>', 'Give up on the whole deploy after this many minutes', parsePositiveInt)
    .action(async (opts: DeployOptions): Promise<void> => {
      const cwd = deps.cwd()
      const controller = new AbortController()
      const onSigint = (): void => { controller.abort() }
      process.once('SIGINT', onSigint)
      const timer: NodeJS.Timeout | undefined = opts.timeout !== undefined
        ? setTimeout(() => {
          logger.warn(`Deploy exceeded ${String(opts.timeout)} minute(s); stopping`)
          controller.abort()
        }, opts.timeout * 60_000)
        : undefined
      try {
        const redactors = await computeRedactors({ cwd })
        logger.setRedactors(redactors)
        const final = await runDeploy({
          cwd,
          client: clientFor(deps, redactors),
          runner: deps.runner,
          allowDirty: opts.allowDirty === true,
          signal: controller.signal,
          onNote: (message: string): void => {
            if (logger.isNdjson()) logger.json(evt({ action: 'deploy', message }))
            else logger.note(message)
          }
        }, { onTransition: announce })
        if (final.kind === 'failed') {
          reportFailure('deploy', final.cause, `deploy failed during ${final.at}`)
          return
        }
        logger.success(`Deployed ${final.serviceName}`)
        if (final.url) logger.info(`URL: ${final.url}`)
        if (logger.isJson()) logger.json({ ...summary({ ok: true, action: 'deploy', service: final.serviceName, url: final.url }), buildId: final.buildId })
      } catch (err) {
        reportFailure('deploy', err)
      } finally {
        process.removeListener('SIGINT', onSigint)
        if (timer) clearTimeout(timer)
      }
    })
}
