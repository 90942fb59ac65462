import type { CheckResult, Severity, Verdict } from './types.js'

export type ReportWriter = (line: string) => void

export const SEVERITY_GLYPHS: Record<Severity, string> = {
  ok: '✔',
  warn: '▲',
  bad: '✖',
}

export const SEPARATOR = '─'.repeat(56)

export function formatResult(result: CheckResult): string {
  return `${SEVERITY_GLYPHS[result.severity]} ${result.message}`
}

export function formatDetail(text: string): string {
  return `   ${text}`
}

export function formatRemediation(text: string): string {
  return `   ➤ Fix: ${text}`
}

export function formatHeader(full: boolean, now: Date): string[] {
  return [SEPARATOR, `awgbot quick check${full ? ' (full)' : ''}`, now.toISOString(), SEPARATOR]
}

export function formatVerdict(verdict: Verdict): string {
  const { counts, total } = verdict
  switch (verdict.kind) {
    case 'errors':
      return `${SEVERITY_GLYPHS.bad} Errors: ${String(counts.bad)}; warnings: ${String(counts.warn)}; total checks: ${String(total)}`
    case 'warnings':
      return `${SEVERITY_GLYPHS.warn} Warnings: ${String(counts.warn)}; errors: 0; total checks: ${String(total)}`
    case 'clear':
      return `${SEVERITY_GLYPHS.ok} All clear. Total checks: ${String(total)}`
  }
}
