#!/usr/bin/env node
import { Command } from 'commander'

import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'

import { checkCommand } from './check.js'

const pkg = JSON.parse(
  readFileSync(resolve(import.meta.dirname, '../../package.json'), 'utf-8'),
) as { version: string }

checkCommand.version(pkg.version)

checkCommand.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
  process.exitCode = 1
})
