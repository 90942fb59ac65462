import { readFileSync } from 'node:fs'
import { resolve, join } from 'node:path'
import { homedir } from 'node:os'
import * as dotenv from 'dotenv'

export const DEFAULT_ROOT = '/opt/awgbot'
export const ENV_FILE_NAME = '.env'

export interface ContainerNames {
  awg: string
  xray: string
  dns: string
}

export interface CheckConfig {
  root: string
  envFile: string
  secretPath: string
  composeCommand: string[]
  botService: string
  proxyService: string
  containers: ContainerNames
  xrayConfigPath: string
  awgConfigPath: string
  proxyLogLevel: string
  mountedSecretPath: string
  dataDir: string
  heartbeatPath: string
  dockerHost: string
  requiredKeys: string[]
  heartbeatStaleSeconds: number
}

const FILE_DEFAULTS = {
  AWG_CONTAINER: 'amnezia-awg',
  XRAY_CONTAINER: 'amnezia-xray',
  DNS_CONTAINER: 'amnezia-dns',
  XRAY_CONFIG_PATH: '/opt/amnezia/xray/server.json',
  AWG_CONFIG_PATH: '/opt/amnezia/awg/wg0.conf',
  DOCKER_PROXY_LOG_LEVEL: 'notice',
} as const

type FileKey = keyof typeof FILE_DEFAULTS

export function resolveTilde(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return resolve(homedir(), p.slice(2))
  }
  return p
}

function pick(values: Record<string, string>, key: FileKey): string {
  const value = values[key]
  if (value === undefined || value.trim() === '') return FILE_DEFAULTS[key]
  return value
}

export function defaultConfig(root: string = DEFAULT_ROOT): CheckConfig {
  return parseConfig({}, root)
}

export function parseConfig(values: Record<string, string>, root: string = DEFAULT_ROOT): CheckConfig {
  return {
    root,
    envFile: join(root, ENV_FILE_NAME),
    secretPath: join(root, 'secret.env'),
    composeCommand: ['docker', 'compose'],
    botService: 'awgbot',
    proxyService: 'docker-proxy',
    containers: {
      awg: pick(values, 'AWG_CONTAINER'),
      xray: pick(values, 'XRAY_CONTAINER'),
      dns: pick(values, 'DNS_CONTAINER'),
    },
    xrayConfigPath: pick(values, 'XRAY_CONFIG_PATH'),
    awgConfigPath: pick(values, 'AWG_CONFIG_PATH'),
    proxyLogLevel: pick(values, 'DOCKER_PROXY_LOG_LEVEL'),
    mountedSecretPath: '/run/secrets/secret.env',
    dataDir: '/app/data',
    heartbeatPath: '/app/data/heartbeat',
    dockerHost: 'tcp://docker-proxy:2375',
    requiredKeys: ['TELEGRAM_TOKEN', 'ADMIN_IDS'],
    heartbeatStaleSeconds: 120,
  }
}

export function loadConfig(root: string = DEFAULT_ROOT): CheckConfig {
  const envFile = join(root, ENV_FILE_NAME)
  let raw: string
  try {
    raw = readFileSync(envFile, 'utf-8')
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && (err as NodeJS.ErrnoException).code === 'ENOENT') {
      return defaultConfig(root)
    }
    throw err
  }

  return parseConfig(dotenv.parse(raw), root)
}
