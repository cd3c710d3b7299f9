import { Command } from 'commander'
import { logger } from './utils/logger'
import { isColorMode, setColorMode } from './utils/colors'
import { defaultDeps, type CliDeps } from './commands/context'
import { registerNewCommand, registerInitCommand } from './commands/new'
import { registerDeployCommand } from './commands/deploy'
import { registerDestroyCommand } from './commands/destroy'
import { registerDoctorCommand } from './commands/doctor'
import { registerSecretCommand } from './commands/secret'
import { registerStatusCommand } from './commands/status'
import { registerLogsCommand } from './commands/logs'
import { registerEjectCommand } from './commands/eject'
import { registerCiCommand } from './commands/ci'

export const VERSION: string = '0.3.0'

/**
 * Output modes are set before Commander parses so that the earliest log lines
 * already honour them. `RUNWAY_*` mirrors are exported for child modules.
 */
export function applyGlobalFlags(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): void {
  if (argv.includes('--verbose')) {
    logger.setLevel('debug')
    env.RUNWAY_VERBOSE = '1'
  }
  if (argv.includes('--json')) {
    logger.setJsonOnly(true)
    env.RUNWAY_JSON = '1'
  }
  if (argv.includes('--quiet')) {
    logger.setLevel('error')
    env.RUNWAY_QUIET = '1'
  }
  if (argv.includes('--no-emoji')) logger.setNoEmoji(true)
  if (argv.includes('--ndjson')) {
    logger.setNdjson(true)
    env.RUNWAY_NDJSON = '1'
    env.RUNWAY_JSON = '1'
  }
  if (argv.includes('--timestamps')) logger.setTimestamps(true)
  const colorIx = argv.indexOf('--color')
  const mode = colorIx !== -1 ? argv[colorIx + 1] : undefined
  setColorMode(mode !== undefined && isColorMode(mode) ? mode : 'auto')
}

export function buildProgram(deps: CliDeps = defaultDeps()): Command {
  const program: Command = new Command()
  program.name('runway')
  program.description('Deploy Rust HTTP services to Google Cloud Run')
  program.version(VERSION, '-v, --version', 'output the version number')
  program.option('--verbose', 'Verbose output')
  program.option('--json', 'JSON-only output (one final summary object)')
  program.option('--ndjson', 'Newline-delimited JSON streaming (implies --json)')
  program.option('--quiet', 'Error-only output (suppresses info/warn/success)')
  program.option('--no-emoji', 'Disable emoji prefixes for logs')
  program.option('--timestamps', 'Prefix human logs and JSON with ISO timestamps')
  program.option('--color <mode>', 'Color mode: auto|always|never', 'auto')
  registerNewCommand(program, deps)
  registerInitCommand(program, deps)
  registerDoctorCommand(program, deps)
  registerDeployCommand(program, deps)
  registerStatusCommand(program, deps)
  registerLogsCommand(program, deps)
  registerSecretCommand(program, deps)
  registerEjectCommand(program, deps)
  registerCiCommand(program, deps)
  registerDestroyCommand(program, deps)
  return program
}
