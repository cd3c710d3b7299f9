import { Command } from 'commander'
import { classifyRemoteFailure, summary } from '@runway/core'
import { logger } from '../utils/logger'
import { reportFailure } from '../utils/errors'
import { computeRedactors } from '../utils/redaction'
import { resolvePlan } from '../core/pipeline/plan'
import { clientFor, parsePositiveInt, type CliDeps } from './context'

interface LogsOptions {
  readonly follow?: boolean
  readonly lines: number
}

export function registerLogsCommand(program: Command, deps: CliDeps): void {
  program
    .command('logs')
    .description('Print recent service logs, or follow new ones')
    .option('-f, --follow', 'Stream new log lines until interrupted')
    .option('-n, --lines <count>', 'Number of recent lines', parsePositiveInt, 100)
    .action(async (opts: LogsOptions): Promise<void> => {
      try {
        const cwd = deps.cwd()
        const redactors = await computeRedactors({ cwd })
        logger.setRedactors(redactors)
        const plan = await resolvePlan(cwd, deps.runner)
        const { projectId, region } = plan.target
        const client = clientFor(deps, redactors)
        if (opts.follow !== true) {
          const out = await client.readLogs(plan.serviceName, projectId, region, opts.lines)
          if (logger.isJson()) {
            logger.json({ ...summary({ ok: true, action: 'logs', service: plan.serviceName }), lines: out.split(/\r?\n/).filter(l => l.length > 0) })
            return
          }
          logger.raw(out.endsWith('\n') || out.length === 0 ? out : `${out}\n`)
          return
        }
        const ctl = client.tailLogs(plan.serviceName, projectId, region, (chunk: string): void => { logger.raw(chunk) })
        let interrupted = false
        const stop = (): void => { interrupted = true; ctl.cancel('interrupted') }
        process.once('SIGINT', stop)
        try {
          const res = await ctl.done
          if (!res.ok && !interrupted) throw classifyRemoteFailure(res.stderr, 'run services logs tail')
        } finally {
          process.removeListener('SIGINT', stop)
        }
        if (logger.isJson()) logger.json(summary({ ok: true, action: 'logs', service: plan.serviceName }))
      } catch (err) {
        reportFailure('logs', err)
      }
    })
}
