import { Command } from 'commander'
import Ajv from 'ajv'
import { summary, toRunwayError } from '@runway/core'
import { logger } from '../utils/logger'
import { reportFailure } from '../utils/errors'
import { doctorSummarySchema } from '../schemas/doctor-summary.schema'
import { loadConfig } from '../core/config/config'
import { defaultChecks } from '../core/doctor/checks'
import { renderDoctorReport, runDoctor } from '../core/doctor/engine'
import { clientFor, type CliDeps } from './context'

const ajv = new Ajv({ allErrors: true, strict: false })
const validateSummary = ajv.compile(doctorSummarySchema)

/** Remote checks need a project id; without a usable config they report unknown. */
async function configuredProject(cwd: string): Promise<string | undefined> {
  try {
    const cfg = await loadConfig(cwd)
    return cfg.project.projectId.trim() || undefined
  } catch (err) {
    logger.debug(`doctor: ${toRunwayError(err).message}`)
    return undefined
  }
}

export function registerDoctorCommand(program: Command, deps: CliDeps): void {
  program
    .command('doctor')
    .description('Check tools, account, project, billing and APIs needed to deploy (use --json for a machine-readable report)')
    .action(async (): Promise<void> => {
      try {
        const cwd = deps.cwd()
        const projectId = await configuredProject(cwd)
        const report = await runDoctor({ client: clientFor(deps), runner: deps.runner, cwd, projectId }, defaultChecks())
        if (!report.allPassed) process.exitCode = 1
        if (logger.isJson()) {
          const out = { ...summary({ ok: report.allPassed, action: 'doctor' }), checks: report.checks }
          const valid: boolean = validateSummary(out)
          if (!valid) {
            const errs: string[] = (validateSummary.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? ''}`.trim())
            logger.json({ ...out, ok: false, schemaErrors: errs })
            process.exitCode = 1
            return
          }
          logger.json(out)
          return
        }
        logger.section('Runway doctor')
        logger.raw(`${renderDoctorReport(report)}\n`)
      } catch (err) {
        reportFailure('doctor', err)
      }
    })
}
