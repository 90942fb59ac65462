import { readFileSync, statSync } from 'node:fs'

import type { CheckConfig } from './config.js'
import type { FileAccessDescriptor, ProcessIdentity, ProcessResult } from './types.js'
import { parseStatusListing } from './container-status.js'
import { parseDiskUsage, parseDockerStats, type ContainerStats, type DiskUsage } from './resources.js'
import { runCommand, type RunOptions } from './runner.js'

export interface ExecResult {
  ok: boolean
  stdout: string
}

/**
 * Read-only questions the health check asks about the deployment.
 *
 * Expected negative answers come back as `false`/`null`; a rejected promise
 * means the question itself could not be asked.
 */
export interface ExternalProbe {
  directoryExists(path: string): Promise<boolean>
  composeAvailable(): Promise<boolean>
  listServices(): Promise<Map<string, string> | null>
  exec(service: string, script: string): Promise<ExecResult>
  statFile(path: string): Promise<FileAccessDescriptor | null>
  readFile(path: string): Promise<string | null>
  identity(service: string): Promise<ProcessIdentity>
  heartbeatAge(service: string, path: string): Promise<number | null>
  listContainers(service: string): Promise<Map<string, string>>
  containerStats(service: string): Promise<ContainerStats[]>
  diskUsage(service: string, path: string): Promise<DiskUsage | null>
}

export type CommandRunner = (command: string[], options?: RunOptions) => Promise<ProcessResult>

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

const INTEGER_RE = /^\d+$/

function parseId(result: ExecResult): number | null {
  if (!result.ok || !INTEGER_RE.test(result.stdout)) return null
  return parseInt(result.stdout, 10)
}

/** Parse the tab-separated output of `stat -c '%a\t%u\t%g\t%U\t%G'`. */
export function parseStat(output: string): FileAccessDescriptor | null {
  const parts = output.trim().split('\t')
  if (parts.length !== 5) return null
  const [mode, uid, gid, ownerName, groupName] = parts
  if (!INTEGER_RE.test(uid) || !INTEGER_RE.test(gid)) return null
  return { mode, uid: parseInt(uid, 10), gid: parseInt(gid, 10), ownerName, groupName }
}

export class ComposeProbe implements ExternalProbe {
  constructor(
    private readonly config: Pick<CheckConfig, 'composeCommand'>,
    private readonly run: CommandRunner = runCommand,
  ) {}

  private compose(args: string[]): Promise<ProcessResult> {
    return this.run([...this.config.composeCommand, ...args])
  }

  async directoryExists(path: string): Promise<boolean> {
    try {
      return statSync(path).isDirectory()
    } catch {
      return false
    }
  }

  async composeAvailable(): Promise<boolean> {
    try {
      const result = await this.compose(['ps'])
      return result.exitCode === 0
    } catch {
      return false
    }
  }

  async listServices(): Promise<Map<string, string> | null> {
    const result = await this.compose(['ps', '--format', '{{.Service}}\t{{.Status}}'])
    if (result.exitCode !== 0) return null
    return parseStatusListing(result.stdout)
  }

  async exec(service: string, script: string): Promise<ExecResult> {
    const result = await this.compose(['exec', '-T', service, 'sh', '-lc', script])
    return { ok: result.exitCode === 0, stdout: result.stdout.trim() }
  }

  async statFile(path: string): Promise<FileAccessDescriptor | null> {
    const result = await this.run(['stat', '-c', '%a\t%u\t%g\t%U\t%G', path])
    if (result.exitCode !== 0) return null
    return parseStat(result.stdout)
  }

  async readFile(path: string): Promise<string | null> {
    try {
      return readFileSync(path, 'utf-8')
    } catch {
      return null
    }
  }

  async identity(service: string): Promise<ProcessIdentity> {
    // Unresolvable ids stay null
    const uid = await this.exec(service, 'id -u').then(parseId, () => null)
    const gid = await this.exec(service, 'id -g').then(parseId, () => null)
    return { uid, gid }
  }

  async heartbeatAge(service: string, path: string): Promise<number | null> {
    const file = shellQuote(path)
    const script = `if [ -f ${file} ]; then echo $(( $(date +%s) - $(stat -c %Y ${file}) )); else echo -1; fi`
    const result = await this.exec(service, script)
    if (!result.ok || !INTEGER_RE.test(result.stdout)) return null
    return parseInt(result.stdout, 10)
  }

  async listContainers(service: string): Promise<Map<string, string>> {
    const result = await this.exec(service, `docker ps --format '{{.Names}}\\t{{.Status}}'`)
    if (!result.ok) return new Map()
    return parseStatusListing(result.stdout)
  }

  async containerStats(service: string): Promise<ContainerStats[]> {
    const result = await this.exec(
      service,
      `docker stats --no-stream --format '{{.Name}}\\t{{.CPUPerc}}\\t{{.MemUsage}}\\t{{.MemPerc}}'`,
    )
    if (!result.ok) return []
    return parseDockerStats(result.stdout)
  }

  async diskUsage(service: string, path: string): Promise<DiskUsage | null> {
    const result = await this.exec(service, `df -h ${shellQuote(path)}`)
    if (!result.ok) return null
    return parseDiskUsage(result.stdout)
  }
}
