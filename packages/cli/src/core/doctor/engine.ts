import { toRunwayError, type CheckResult, type DoctorReport } from '@runway/core'
import { paint, type Tone } from '../../utils/colors'
import type { DoctorCheck, DoctorContext } from './checks'

/**
 * Run every check concurrently. Nothing short-circuits: a check that throws
 * is reported as `unknown`, and the report keeps definition order whatever
 * order the checks finish in.
 */
export async function runDoctor(ctx: DoctorContext, checks: readonly DoctorCheck[]): Promise<DoctorReport> {
  const results: CheckResult[] = await Promise.all(checks.map(async (c): Promise<CheckResult> => {
    try {
      const r = await c.run(ctx)
      return { ...r, name: c.name }
    } catch (err) {
      return { name: c.name, status: 'unknown', detail: toRunwayError(err).message }
    }
  }))
  return { checks: results, allPassed: results.every(r => r.status === 'pass') }
}

const MARK: Readonly<Record<CheckResult['status'], string>> = { pass: 'OK', fail: 'NG', unknown: '??' }

const TONE: Readonly<Record<CheckResult['status'], Tone>> = { pass: 'ok', fail: 'fail', unknown: 'warn' }

/** Aligned table, one line per check. */
export function renderDoctorReport(report: DoctorReport): string {
  const width = Math.max(0, ...report.checks.map(c => c.name.length))
  const rows = report.checks.map(c => {
    const detail = c.detail ? `  ${c.detail}` : ''
    return `  ${paint(TONE[c.status], MARK[c.status])}  ${c.name.padEnd(width)}${detail}`.trimEnd()
  })
  const passed = report.checks.filter(c => c.status === 'pass').length
  const footer = report.allPassed
    ? paint('ok', `All ${report.checks.length} checks passed`)
    : paint('warn', `${passed}/${report.checks.length} checks passed`)
  return [...rows, '', footer].join('\n')
}
