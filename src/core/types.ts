export type Severity = 'ok' | 'warn' | 'bad'

export interface CheckResult {
  severity: Severity
  message: string
}

/** Metadata of the secret file as reported by `stat`. */
export interface FileAccessDescriptor {
  /** Permission bits in octal notation, e.g. `600`. Kept as text: anything unexpected stays unrecognized. */
  mode: string
  uid: number
  gid: number
  ownerName: string
  groupName: string
}

/** Identity of the process inside the bot container. `null` when the probe failed. */
export interface ProcessIdentity {
  uid: number | null
  gid: number | null
}

export interface AccessDecision {
  readable: boolean
  /** Recommended permission bits when the file is readable but looser than needed. */
  hint?: '600' | '640'
}

export type ContainerClassification = 'ok' | 'degraded' | 'absent'

export interface ContainerStatusReport {
  name: string
  status: string | null
  classification: ContainerClassification
}

export interface CheckCounts {
  ok: number
  warn: number
  bad: number
}

export type VerdictKind = 'errors' | 'warnings' | 'clear'

export interface Verdict {
  kind: VerdictKind
  exitCode: 0 | 1
  counts: CheckCounts
  total: number
}

export interface ProcessResult {
  exitCode: number | null
  stdout: string
  stderr: string
}
