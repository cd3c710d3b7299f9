import { summary, toRunwayError, type ErrorInfo, type RunwayAction } from '@runway/core'
import { logger } from './logger'

/** Printable form of anything thrown. */
export function errorInfo(err: unknown): ErrorInfo {
  return toRunwayError(err).toInfo()
}

/**
 * Action-boundary handler shared by every command: prints the message and
 * remedy, emits the final JSON summary in JSON modes, and sets exit code 1.
 */
export function reportFailure(action: RunwayAction, err: unknown, context?: string): void {
  const info = errorInfo(err)
  const prefix = context ? `${context}: ` : ''
  logger.error(`${prefix}${info.message}`)
  if (info.remedy) logger.note(`Try: ${info.remedy}`)
  if (logger.isJson()) logger.json(summary({ ok: false, action, message: `${prefix}${info.message}`, error: info }))
  process.exitCode = 1
}
