import { Command } from 'commander'

import { DEFAULT_ROOT, loadConfig, resolveTilde } from '../core/config.js'
import { HealthCheckRun } from '../core/orchestrator.js'
import { ComposeProbe } from '../core/probe.js'

const check = new Command('awgcheck')
  .description('Health check for the awgbot deployment: services, secret file, heartbeat, containers')
  .option('--full', 'Append container resource usage and disk usage', false)
  .option('--root <dir>', 'Deployment directory holding .env and secret.env', DEFAULT_ROOT)
  .action(async (opts: { full: boolean; root: string }) => {
    try {
      const config = loadConfig(resolveTilde(opts.root))
      const run = new HealthCheckRun(new ComposeProbe(config), config)
      const { verdict } = await run.execute({ full: opts.full })
      process.exitCode = verdict.exitCode
    } catch (err: unknown) {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
      process.exitCode = 1
    }
  })

export { check as checkCommand }
