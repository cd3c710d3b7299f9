import { Command } from 'commander'
import { LocalValidationError, summary } from '@runway/core'
import { computeServiceAccount } from '@runway/provider-cloud-run'
import { logger } from '../utils/logger'
import { reportFailure } from '../utils/errors'
import { computeRedactors } from '../utils/redaction'
import { confirmAction } from '../utils/prompt'
import { loadConfig, requireRemoteTarget } from '../core/config/config'
import { clientFor, type CliDeps } from './context'

const SECRET_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/

export interface SecretAssignment {
  readonly key: string
  readonly value: string
}

/** Split `KEY=VALUE` at the first `=`; the key doubles as the env var name. */
export function parseAssignment(arg: string): SecretAssignment {
  const eq = arg.indexOf('=')
  const key = eq === -1 ? arg : arg.slice(0, eq)
  if (eq === -1 || !SECRET_KEY.test(key)) {
    throw new LocalValidationError(`expected KEY=VALUE with KEY a valid environment variable name, got "${key}"`, { code: 'INVALID_SECRET' })
  }
  const value = arg.slice(eq + 1)
  if (value.length === 0) throw new LocalValidationError(`secret ${key} has an empty value`, { code: 'INVALID_SECRET' })
  return { key, value }
}

function requireKey(key: string): string {
  if (!SECRET_KEY.test(key)) throw new LocalValidationError(`"${key}" is not a valid secret name`, { code: 'INVALID_SECRET' })
  return key
}

export function registerSecretCommand(program: Command, deps: CliDeps): void {
  const secret = program
    .command('secret')
    .description('Manage Secret Manager secrets injected into the service as env vars')

  secret
    .command('set')
    .description('Create or update a secret and let the service read it')
    .argument('<assignment>', 'KEY=VALUE')
    .action(async (assignment: string): Promise<void> => {
      try {
        const cwd = deps.cwd()
        const { key, value } = parseAssignment(assignment)
        const redactors = await computeRedactors({ cwd, literals: [value] })
        logger.setRedactors(redactors)
        const { projectId } = requireRemoteTarget(await loadConfig(cwd))
        const client = clientFor(deps, redactors)
        const outcome = await client.setSecret(projectId, key, value)
        const account = computeServiceAccount(await client.projectNumber(projectId))
        await client.grantSecretAccess(projectId, key, account)
        logger.success(`Secret ${key} ${outcome}`)
        logger.info(`Readable by ${account}; takes effect on the next deploy`)
        if (logger.isJson()) logger.json({ ...summary({ ok: true, action: 'secret', message: `${key} ${outcome}` }), key, outcome })
      } catch (err) {
        reportFailure('secret', err, 'secret set')
      }
    })

  secret
    .command('list')
    .description('List secret names in the project')
    .action(async (): Promise<void> => {
      try {
        const { projectId } = requireRemoteTarget(await loadConfig(deps.cwd()))
        const names = await clientFor(deps).listSecrets(projectId)
        if (logger.isJson()) {
          logger.json({ ...summary({ ok: true, action: 'secret' }), secrets: names })
          return
        }
        if (names.length === 0) logger.info(`No secrets in ${projectId}`)
        for (const n of names) logger.raw(`${n}\n`)
      } catch (err) {
        reportFailure('secret', err, 'secret list')
      }
    })

  secret
    .command('delete')
    .description('Delete a secret and all of its versions')
    .argument('<key>', 'Secret name')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (rawKey: string, opts: { readonly yes?: boolean }): Promise<void> => {
      try {
        const key = requireKey(rawKey)
        const { projectId } = requireRemoteTarget(await loadConfig(deps.cwd()))
        if (opts.yes !== true) {
          if (logger.isJson()) {
            throw new LocalValidationError('secret delete needs confirmation', { code: 'CONFIRMATION_REQUIRED', remedy: 'Re-run with --yes' })
          }
          if (!(await confirmAction(`Delete secret ${key} from ${projectId}?`))) {
            logger.note('Nothing deleted')
            return
          }
        }
        await clientFor(deps).deleteSecret(projectId, key)
        logger.success(`Secret ${key} deleted`)
        if (logger.isJson()) logger.json({ ...summary({ ok: true, action: 'secret', message: `${key} deleted` }), key })
      } catch (err) {
        reportFailure('secret', err, 'secret delete')
      }
    })
}
