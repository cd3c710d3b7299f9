import { Command } from 'commander'
import { LocalValidationError, summary } from '@runway/core'
import { logger } from '../utils/logger'
import { reportFailure } from '../utils/errors'
import { confirmAction } from '../utils/prompt'
import { resolvePlan } from '../core/pipeline/plan'
import { runDestroy, destroyOrder } from '../core/pipeline/destroy'
import { GitHubCli } from '../core/ci/github'
import { clientFor, type CliDeps } from './context'

interface DestroyCliOptions {
  readonly yes?: boolean
  readonly includeSecrets?: boolean
  readonly includeCi?: boolean
}

export function registerDestroyCommand(program: Command, deps: CliDeps): void {
  program
    .command('destroy')
    .description('Delete the Cloud Run service, its image and the local bundle')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .option('--include-secrets', 'Also delete every Secret Manager secret in the project')
    .option('--include-ci', 'Also remove what ci init set up: GitHub secrets, deployer account, identity pool, workflow')
    .action(async (opts: DestroyCliOptions): Promise<void> => {
      try {
        const cwd = deps.cwd()
        const plan = await resolvePlan(cwd, deps.runner)
        const includeSecrets = opts.includeSecrets === true
        const includeCi = opts.includeCi === true
        if (opts.yes !== true) {
          if (logger.isJson()) {
            throw new LocalValidationError('destroy needs confirmation', { code: 'CONFIRMATION_REQUIRED', remedy: 'Re-run with --yes' })
          }
          const what = destroyOrder({ includeSecrets, includeCi }).join(', ')
          const ok = await confirmAction(`Delete ${what} for ${plan.serviceName} in ${plan.target.projectId}/${plan.target.region}?`)
          if (!ok) {
            logger.note('Destroy cancelled')
            return
          }
        }
        const github = includeCi ? new GitHubCli(deps.runner, cwd) : undefined
        const report = await runDestroy(plan, { cwd, client: clientFor(deps), github }, {
          includeSecrets,
          includeCi,
          onStep: (resource, outcome): void => {
            if (outcome === 'removed') logger.success(`${resource} deleted`)
            else if (outcome === 'absent') logger.info(`${resource} already gone`)
          }
        })
        if (report.failed) {
          const info = report.failed.error.toInfo()
          logger.error(`failed to delete ${report.failed.resource}: ${info.message}`)
          if (info.remedy) logger.note(`Try: ${info.remedy}`)
          if (report.remaining.length > 0) logger.warn(`Not attempted: ${report.remaining.join(', ')}`)
          process.exitCode = 1
        }
        if (logger.isJson()) {
          logger.json({
            ...summary({ ok: report.ok, action: 'destroy', service: plan.serviceName }),
            removed: report.removed,
            absent: report.absent,
            failed: report.failed ? { resource: report.failed.resource, error: report.failed.error.toInfo() } : undefined,
            remaining: report.remaining
          })
        }
      } catch (err) {
        reportFailure('destroy', err)
      }
    })
}
