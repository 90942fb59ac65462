import type { CheckCounts, CheckResult, Severity, Verdict } from './types.js'

export type RecordListener = (result: CheckResult) => void

/** Running tally of check outcomes for a single run. */
export class CheckRecorder {
  private readonly results: CheckResult[] = []
  private readonly counts: CheckCounts = { ok: 0, warn: 0, bad: 0 }

  constructor(private readonly onRecord?: RecordListener) {}

  record(severity: Severity, message: string): void {
    const result: CheckResult = Object.freeze({ severity, message })
    this.results.push(result)
    this.counts[severity] += 1
    this.onRecord?.(result)
  }

  ok(message: string): void {
    this.record('ok', message)
  }

  warn(message: string): void {
    this.record('warn', message)
  }

  bad(message: string): void {
    this.record('bad', message)
  }

  list(): readonly CheckResult[] {
    return this.results
  }

  /** Call once, after the last check. */
  finalize(): Verdict {
    return resolveVerdict({ ...this.counts })
  }
}

export function resolveVerdict(counts: CheckCounts): Verdict {
  const total = counts.ok + counts.warn + counts.bad
  if (counts.bad > 0) {
    return { kind: 'errors', exitCode: 1, counts, total }
  }
  if (counts.warn > 0) {
    return { kind: 'warnings', exitCode: 0, counts, total }
  }
  return { kind: 'clear', exitCode: 0, counts, total }
}
