import { logger } from './utils/logger'
import { applyGlobalFlags, buildProgram } from './program'

function main(): void {
  applyGlobalFlags(process.argv)
  buildProgram().parseAsync(process.argv)
    .then(() => {})
    .catch((err: unknown) => {
      const message: string = err instanceof Error ? err.message : String(err)
      if (logger.isJson()) {
        logger.json({ ok: false, action: 'error', message, final: true })
      } else {
        // eslint-disable-next-line no-console
        console.error(`Error: ${message}`)
      }
      process.exit(1)
    })
}

main()
