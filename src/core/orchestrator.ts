import { basename, posix } from 'node:path'

import type { CheckConfig } from './config.js'
import type { AccessDecision, FileAccessDescriptor, Severity, Verdict } from './types.js'
import { describeHint, evaluateAccess, remediationFor } from './access.js'
import { isHealthy, reportContainer, classifyContainerStatus } from './container-status.js'
import { CheckRecorder } from './recorder.js'
import { shellQuote, type ExternalProbe } from './probe.js'
import {
  SEPARATOR,
  formatDetail,
  formatHeader,
  formatRemediation,
  formatResult,
  formatVerdict,
  type ReportWriter,
} from './report.js'

export type RunState = 'INIT' | 'PRECHECK' | 'CHECKS' | 'SUMMARY' | 'DONE'

export interface HealthCheckOptions {
  full?: boolean
  now?: () => Date
}

export interface RunOutcome {
  verdict: Verdict
  states: RunState[]
}

/** Values shared between checks within one run. */
export interface RunContext {
  probe: ExternalProbe
  config: CheckConfig
  recorder: CheckRecorder
  write: ReportWriter
  services: Map<string, string>
}

export interface NamedCheck {
  name: string
  run(ctx: RunContext): Promise<void>
}

/** A fatal check returns false after recording exactly one `bad` result. */
export interface FatalCheck {
  name: string
  run(ctx: RunContext): Promise<boolean>
}

export function safeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message.split('\n')[0] ?? 'unknown error'
  }
  return String(err).split('\n')[0] ?? 'unknown error'
}

/** Heartbeat age in seconds to severity; `null` means the heartbeat could not be read. */
export function classifyHeartbeat(age: number | null, staleAfterSeconds: number): Severity {
  if (age === null || !Number.isInteger(age) || age < 0) return 'bad'
  return age < staleAfterSeconds ? 'ok' : 'warn'
}

// ── Fatal prechecks ─────────────────────────────────────────────────────────

export const PRECHECKS: FatalCheck[] = [
  {
    name: 'root directory',
    async run({ probe, config, recorder }) {
      if (await probe.directoryExists(config.root)) return true
      recorder.bad(`directory ${config.root} not found`)
      return false
    },
  },
  {
    name: 'compose',
    async run({ probe, recorder }) {
      if (await probe.composeAvailable()) {
        recorder.ok('docker compose available')
        return true
      }
      recorder.bad('docker compose is not working')
      return false
    },
  },
  {
    name: 'services',
    async run(ctx) {
      const services = await ctx.probe.listServices()
      if (services === null) {
        ctx.recorder.bad('docker compose ps failed')
        return false
      }
      for (const name of [ctx.config.botService, ctx.config.proxyService]) {
        if (!services.has(name)) {
          ctx.recorder.bad(`service ${name} not found`)
          return false
        }
      }
      ctx.services = services
      return true
    },
  },
]

// ── Checks ──────────────────────────────────────────────────────────────────

async function checkSecretFile(ctx: RunContext): Promise<void> {
  const { probe, config, recorder, write } = ctx
  const path = config.secretPath
  const name = basename(path)

  const content = await probe.readFile(path)
  if (content === null) {
    recorder.bad(`${name} missing or unreadable: ${path}`)
    return
  }
  recorder.ok(`${name} found`)

  let stat: FileAccessDescriptor | null
  let statError = ''
  try {
    stat = await probe.statFile(path)
  } catch (err) {
    stat = null
    statError = `: ${safeError(err)}`
  }
  const identity = await probe.identity(config.botService)

  const ids = `${identity.uid === null ? '?' : String(identity.uid)}:${identity.gid === null ? '?' : String(identity.gid)}`
  write(
    formatDetail(
      stat === null
        ? `${name}: stat failed${statError}; container uid/gid=${ids}`
        : `${name}: mode=${stat.mode} owner=${stat.ownerName}(${String(stat.uid)}):${stat.groupName}(${String(stat.gid)}) container uid/gid=${ids}`,
    ),
  )

  const decision: AccessDecision = stat === null ? { readable: false } : evaluateAccess(stat, identity)
  if (decision.readable) {
    recorder.ok(`${name} readable by the container`)
    if (decision.hint !== undefined) {
      recorder.warn(`security: ${describeHint(decision.hint, path)}`)
    }
  } else {
    recorder.bad(`${name} NOT readable by the container (uid/gid or mode do not match)`)
    write(formatRemediation(remediationFor(identity, path)))
  }

  for (const key of config.requiredKeys) {
    const assigned = content.split(/\r?\n/).some((line) => line.startsWith(`${key}=`))
    if (assigned) {
      recorder.ok(`${key} present`)
    } else {
      recorder.bad(`${key} missing`)
    }
  }
}

async function checkSecretMount({ probe, config, recorder }: RunContext): Promise<void> {
  const name = basename(config.mountedSecretPath)
  const result = await probe.exec(config.botService, `test -r ${shellQuote(config.mountedSecretPath)}`)
  if (result.ok) {
    recorder.ok(`${name} mounted in the container`)
  } else {
    recorder.bad(`${name} is not mounted inside the container (${config.mountedSecretPath})`)
  }
}

async function checkHeartbeat({ probe, config, recorder }: RunContext): Promise<void> {
  const age = await probe.heartbeatAge(config.botService, config.heartbeatPath)
  const severity = classifyHeartbeat(age, config.heartbeatStaleSeconds)
  if (age === null || severity === 'bad') {
    recorder.bad('heartbeat not found')
  } else if (severity === 'warn') {
    recorder.warn(`heartbeat stale (${String(age)}s)`)
  } else {
    recorder.ok(`heartbeat OK (${String(age)}s)`)
  }
}

async function checkWritable({ probe, config, recorder }: RunContext): Promise<void> {
  const marker = shellQuote(posix.join(config.dataDir, '.wtest'))
  // The marker is removed whether or not the write succeeded
  const script = `p=${marker}; echo ok >"$p"; rc=$?; rm -f "$p"; exit $rc`
  const result = await probe.exec(config.botService, script)
  if (result.ok) {
    recorder.ok(`${config.dataDir} writable`)
  } else {
    recorder.bad(`${config.dataDir} not writable`)
  }
}

async function checkDockerHost({ probe, config, recorder }: RunContext): Promise<void> {
  const result = await probe.exec(config.botService, 'echo "$DOCKER_HOST"')
  if (result.ok && result.stdout.includes(config.dockerHost)) {
    recorder.ok(`DOCKER_HOST=${config.dockerHost}`)
  } else {
    recorder.bad(`DOCKER_HOST is not set to ${config.dockerHost}`)
  }
}

async function checkDaemon({ probe, config, recorder }: RunContext): Promise<void> {
  const result = await probe.exec(config.botService, `docker version --format '{{.Server.Version}}'`)
  if (result.ok && result.stdout !== '') {
    recorder.ok(`docker daemon reachable through the proxy (v${result.stdout})`)
  } else {
    recorder.bad('docker daemon is not reachable through the proxy')
  }
}

async function checkContainers({ probe, config, recorder }: RunContext): Promise<void> {
  const listing = await probe.listContainers(config.botService)
  const names = [config.containers.awg, config.containers.xray, config.containers.dns, config.botService]
  for (const name of names) {
    if (name.trim() === '') continue
    const report = reportContainer(name, listing)
    switch (report.classification) {
      case 'ok':
        recorder.ok(`${name}: ${report.status ?? ''}`)
        break
      case 'degraded':
        recorder.warn(`${name}: ${report.status ?? ''}`)
        break
      case 'absent':
        recorder.bad(`${name}: not running`)
        break
    }
  }
}

async function checkNestedConfig(
  { probe, config, recorder }: RunContext,
  label: string,
  container: string,
  path: string,
): Promise<void> {
  const inner = `test -r ${shellQuote(path)}`
  const script = `docker exec ${shellQuote(container)} sh -lc ${shellQuote(inner)}`
  const result = await probe.exec(config.botService, script)
  if (result.ok) {
    recorder.ok(`${label} config readable in ${container}`)
  } else {
    recorder.bad(`${label} config NOT readable in ${container} (${path})`)
  }
}

export const CHECKS: NamedCheck[] = [
  {
    name: 'bot health',
    async run({ config, services, recorder }) {
      const status = services.get(config.botService) ?? ''
      if (isHealthy(status)) {
        recorder.ok(`${config.botService} healthy`)
      } else {
        recorder.warn(`${config.botService} is not healthy${status === '' ? '' : ` (${status})`}`)
      }
    },
  },
  {
    name: 'proxy running',
    async run({ config, services, recorder }) {
      const status = services.get(config.proxyService) ?? ''
      if (classifyContainerStatus(status === '' ? null : status) === 'ok') {
        recorder.ok(`${config.proxyService} running`)
      } else {
        recorder.bad(`${config.proxyService} is not running${status === '' ? '' : ` (${status})`}`)
      }
    },
  },
  { name: 'secret file', run: checkSecretFile },
  { name: 'secret mount', run: checkSecretMount },
  { name: 'heartbeat', run: checkHeartbeat },
  { name: 'data writable', run: checkWritable },
  { name: 'DOCKER_HOST', run: checkDockerHost },
  { name: 'docker daemon', run: checkDaemon },
  { name: 'containers', run: checkContainers },
  {
    name: 'xray config',
    run: (ctx) => checkNestedConfig(ctx, 'XRay', ctx.config.containers.xray, ctx.config.xrayConfigPath),
  },
  {
    name: 'awg config',
    run: (ctx) => checkNestedConfig(ctx, 'AmneziaWG', ctx.config.containers.awg, ctx.config.awgConfigPath),
  },
]

// ── Full report ─────────────────────────────────────────────────────────────

async function writeResources({ probe, config, write }: RunContext): Promise<void> {
  write(SEPARATOR)
  write('Resources (docker stats)')
  try {
    const stats = await probe.containerStats(config.botService)
    if (stats.length === 0) write(formatDetail('docker stats unavailable'))
    for (const s of stats) {
      write(`   • ${s.name.padEnd(20)} CPU ${s.cpu.padEnd(8)} MEM ${s.memUsage.padEnd(22)} (${s.memPercent})`)
    }
  } catch (err) {
    write(formatDetail(`docker stats unavailable: ${safeError(err)}`))
  }

  write(SEPARATOR)
  write(`Filesystem (${config.dataDir})`)
  try {
    const disk = await probe.diskUsage(config.botService, config.dataDir)
    write(
      disk === null
        ? formatDetail('disk usage unavailable')
        : `   • size: ${disk.size}; used: ${disk.used}; free: ${disk.available} (${disk.usePercent})`,
    )
  } catch (err) {
    write(formatDetail(`disk usage unavailable: ${safeError(err)}`))
  }
}

// ── Run ─────────────────────────────────────────────────────────────────────

/**
 * One pass over the deployment: fatal prechecks, then every check in order,
 * then the summary. A failed precheck skips straight to the summary.
 */
export class HealthCheckRun {
  constructor(
    private readonly probe: ExternalProbe,
    private readonly config: CheckConfig,
    private readonly write: ReportWriter = console.log,
    private readonly prechecks: FatalCheck[] = PRECHECKS,
    private readonly checks: NamedCheck[] = CHECKS,
  ) {}

  async execute(options: HealthCheckOptions = {}): Promise<RunOutcome> {
    const full = options.full ?? false
    const now = options.now ?? (() => new Date())
    const states: RunState[] = []
    const enter = (state: RunState): void => {
      states.push(state)
    }

    enter('INIT')
    const ctx: RunContext = {
      probe: this.probe,
      config: this.config,
      recorder: new CheckRecorder((result) => this.write(formatResult(result))),
      write: this.write,
      services: new Map(),
    }
    for (const line of formatHeader(full, now())) this.write(line)

    enter('PRECHECK')
    let passed = true
    for (const check of this.prechecks) {
      try {
        passed = await check.run(ctx)
      } catch (err) {
        ctx.recorder.bad(`${check.name}: ${safeError(err)}`)
        passed = false
      }
      if (!passed) break
    }

    if (passed) {
      enter('CHECKS')
      for (const name of [this.config.botService, this.config.proxyService]) {
        this.write(formatDetail(`${name.padEnd(16)} ${ctx.services.get(name) ?? ''}`))
      }
      for (const check of this.checks) {
        try {
          await check.run(ctx)
        } catch (err) {
          ctx.recorder.bad(`${check.name}: check failed: ${safeError(err)}`)
        }
      }
      this.write(formatDetail(`${this.config.proxyService} log level: ${this.config.proxyLogLevel}`))
      if (full) await writeResources(ctx)
    }

    enter('SUMMARY')
    const verdict = ctx.recorder.finalize()
    this.write(SEPARATOR)
    this.write(formatVerdict(verdict))

    enter('DONE')
    return { verdict, states }
  }
}
