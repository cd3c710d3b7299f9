export type CheckStatus = 'pass' | 'fail' | 'unknown'

export interface CheckResult {
  readonly name: string
  readonly status: CheckStatus
  readonly detail?: string
}

export interface DoctorReport {
  readonly checks: readonly CheckResult[]
  /** True only when every check passed. */
  readonly allPassed: boolean
}
