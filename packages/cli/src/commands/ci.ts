import { Command } from 'commander'
import { summary } from '@runway/core'
import { logger } from '../utils/logger'
import { reportFailure } from '../utils/errors'
import { runCiInit } from '../core/ci/bootstrap'
import { GitHubCli } from '../core/ci/github'
import { clientFor, type CliDeps } from './context'

interface CiInitCliOptions {
  readonly branch: string
}

export function registerCiCommand(program: Command, deps: CliDeps): void {
  const ci = program
    .command('ci')
    .description('Continuous deployment from GitHub Actions')

  ci
    .command('init')
    .description('Set up keyless deploys from GitHub Actions through Workload Identity Federation')
    .option('--branch <name>', 'Branch whose pushes deploy', 'main')
    .action(async (opts: CiInitCliOptions): Promise<void> => {
      try {
        const cwd = deps.cwd()
        const result = await runCiInit(
          { cwd, client: clientFor(deps), github: new GitHubCli(deps.runner, cwd), onStep: (m): void => { logger.info(m) } },
          { branch: opts.branch, cliVersion: program.version() ?? 'latest' }
        )
        logger.success(`GitHub Actions will deploy ${result.repo} on every push to ${opts.branch}`)
        logger.note(`Commit ${result.workflowPath} to turn it on`)
        if (logger.isJson()) {
          logger.json({
            ...summary({ ok: true, action: 'ci', message: result.workflowPath }),
            repo: result.repo,
            projectId: result.projectId,
            serviceAccount: result.serviceAccount,
            workloadIdentityProvider: result.workloadIdentityProvider,
            created: result.created,
            secrets: result.secrets
          })
        }
      } catch (err) {
        reportFailure('ci', err, 'ci init')
      }
    })
}
