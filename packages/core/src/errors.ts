/**
 * Error taxonomy shared by every Runway package.
 *
 * Local errors never involve the remote platform. Remote errors carry the
 * platform's failure text verbatim in `detail` (and as the message).
 */

export type ErrorKind =
  | 'local-validation'
  | 'local-io'
  | 'remote-auth'
  | 'remote-not-found'
  | 'remote-permission'
  | 'remote-quota'
  | 'remote-unknown'
  | 'timeout'
  | 'cancelled'
  | 'launch-failed'

/** Structured, printable form of an error. */
export interface ErrorInfo {
  readonly kind: ErrorKind
  readonly code: string
  readonly message: string
  readonly remedy?: string
  readonly detail?: string
}

export interface RunwayErrorOptions {
  readonly code?: string
  readonly remedy?: string
  readonly detail?: string
  readonly cause?: unknown
}

export abstract class RunwayError extends Error {
  public abstract readonly kind: ErrorKind
  public readonly code: string
  public readonly remedy?: string
  public readonly detail?: string

  protected constructor(message: string, defaultCode: string, opts: RunwayErrorOptions = {}) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined)
    this.name = new.target.name
    this.code = opts.code ?? defaultCode
    this.remedy = opts.remedy
    this.detail = opts.detail
  }

  public toInfo(): ErrorInfo {
    return { kind: this.kind, code: this.code, message: this.message, remedy: this.remedy, detail: this.detail }
  }
}

export class LocalValidationError extends RunwayError {
  public readonly kind = 'local-validation' as const
  public constructor(message: string, opts?: RunwayErrorOptions) { super(message, 'LOCAL_VALIDATION', opts) }
}

export class LocalIOError extends RunwayError {
  public readonly kind = 'local-io' as const
  public constructor(message: string, opts?: RunwayErrorOptions) { super(message, 'LOCAL_IO', opts) }
}

export class TimeoutError extends RunwayError {
  public readonly kind = 'timeout' as const
  public constructor(message: string, opts?: RunwayErrorOptions) { super(message, 'TIMEOUT', opts) }
}

export class CancelledError extends RunwayError {
  public readonly kind = 'cancelled' as const
  public constructor(message = 'cancelled', opts?: RunwayErrorOptions) { super(message, 'CANCELLED', opts) }
}

/** The executor could not start the program at all. */
export class LaunchFailedError extends RunwayError {
  public readonly kind = 'launch-failed' as const
  public readonly bin: string
  public constructor(bin: string, reason: string) {
    super(`failed to launch ${bin}: ${reason}`, 'LAUNCH_FAILED', {
      detail: reason,
      remedy: reason === 'ENOENT' ? `Install ${bin} and make sure it is on PATH` : undefined
    })
    this.bin = bin
  }
}

export interface RemoteErrorOptions extends RunwayErrorOptions {
  /** Short name of the remote operation, e.g. `builds submit`. */
  readonly operation?: string
}

export abstract class RemoteError extends RunwayError {
  public readonly operation?: string
  protected constructor(detail: string, defaultCode: string, opts: RemoteErrorOptions = {}) {
    super(detail, defaultCode, { ...opts, detail: opts.detail ?? detail })
    this.operation = opts.operation
  }
}

export class RemoteAuthError extends RemoteError {
  public readonly kind = 'remote-auth' as const
  public constructor(detail: string, opts?: RemoteErrorOptions) {
    super(detail, 'REMOTE_AUTH', { remedy: 'Run: gcloud auth login', ...opts })
  }
}

export class RemoteNotFoundError extends RemoteError {
  public readonly kind = 'remote-not-found' as const
  public constructor(detail: string, opts?: RemoteErrorOptions) { super(detail, 'REMOTE_NOT_FOUND', opts) }
}

export class RemotePermissionError extends RemoteError {
  public readonly kind = 'remote-permission' as const
  public constructor(detail: string, opts?: RemoteErrorOptions) {
    super(detail, 'REMOTE_PERMISSION', { remedy: 'Check the IAM roles of the active gcloud account', ...opts })
  }
}

export class RemoteQuotaError extends RemoteError {
  public readonly kind = 'remote-quota' as const
  public constructor(detail: string, opts?: RemoteErrorOptions) {
    super(detail, 'REMOTE_QUOTA', { remedy: 'Wait for quota to refill or request an increase in the console', ...opts })
  }
}

export class RemoteUnknownError extends RemoteError {
  public readonly kind = 'remote-unknown' as const
  public constructor(detail: string, opts?: RemoteErrorOptions) { super(detail, 'REMOTE_UNKNOWN', opts) }
}

const AUTH_PATTERNS: readonly RegExp[] = [
  /not (currently )?authenticated/,
  /no active account/,
  /do not currently have an active account/,
  /reauthentication/,
  /unauthenticated/,
  /invalid_grant/,
  /gcloud auth login/,
  /not logged in/,
  /gh auth login/,
  /\b401\b/
]
const QUOTA_PATTERNS: readonly RegExp[] = [/quota/, /resource_exhausted/, /rate limit/, /\b429\b/]
const PERMISSION_PATTERNS: readonly RegExp[] = [/permission_denied/, /permission denied/, /does not have permission/, /forbidden/, /\b403\b/]
const NOT_FOUND_PATTERNS: readonly RegExp[] = [/not_found/, /not found/, /could not be found/, /does not exist/, /\b404\b/]

/**
 * Map the failure text of a remote call (CLI stderr or a failed build's
 * status detail) to the matching remote error. The text is kept verbatim.
 */
export function classifyRemoteFailure(raw: string, operation?: string): RemoteError {
  const detail: string = raw.trim() || 'remote operation failed without output'
  const txt: string = detail.toLowerCase()
  const opts: RemoteErrorOptions = { operation }
  if (AUTH_PATTERNS.some(re => re.test(txt))) return new RemoteAuthError(detail, opts)
  if (QUOTA_PATTERNS.some(re => re.test(txt))) return new RemoteQuotaError(detail, opts)
  if (PERMISSION_PATTERNS.some(re => re.test(txt))) return new RemotePermissionError(detail, opts)
  if (NOT_FOUND_PATTERNS.some(re => re.test(txt))) return new RemoteNotFoundError(detail, opts)
  return new RemoteUnknownError(detail, opts)
}

export function isRunwayError(err: unknown): err is RunwayError {
  return err instanceof RunwayError
}

/** Wrap anything thrown into the taxonomy without losing its message. */
export function toRunwayError(err: unknown): RunwayError {
  if (err instanceof RunwayError) return err
  const message: string = err instanceof Error ? err.message : String(err)
  return new LocalIOError(message, { cause: err })
}
