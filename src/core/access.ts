import type { AccessDecision, FileAccessDescriptor, ProcessIdentity } from './types.js'

export const DEFAULT_CONTAINER_ID = 10001

const OWNER_READABLE = new Set(['600', '640', '644'])
const GROUP_READABLE = new Set(['640', '644'])
const WORLD_READABLE = new Set(['644'])

/**
 * Decide whether the secret file is guaranteed readable by the container process.
 *
 * The first matching branch wins: owner, then group, then everyone else.
 * Only 600, 640 and 644 are ever treated as readable; any other mode,
 * including an unparseable one, is not.
 */
export function evaluateAccess(file: FileAccessDescriptor, target: ProcessIdentity): AccessDecision {
  if (target.uid !== null && file.uid === target.uid) {
    const readable = OWNER_READABLE.has(file.mode)
    return readable && file.mode !== '600' ? { readable, hint: '600' } : { readable }
  }

  if (target.gid !== null && file.gid === target.gid) {
    const readable = GROUP_READABLE.has(file.mode)
    return readable && file.mode !== '640' ? { readable, hint: '640' } : { readable }
  }

  // World-readable files pass without a hint even though 644 is the loosest mode here.
  return { readable: WORLD_READABLE.has(file.mode) }
}

export function describeHint(hint: '600' | '640', path: string): string {
  return hint === '600'
    ? `tighten to 600: chmod 600 ${path}`
    : `tighten to 640 for group read: chmod 640 ${path}`
}

export function remediationFor(target: ProcessIdentity, path: string): string {
  if (target.uid !== null && target.gid !== null) {
    return `chown ${String(target.uid)}:${String(target.gid)} ${path} && chmod 600 ${path}`
  }
  return `align owner and mode with the container user (usually uid/gid ${String(DEFAULT_CONTAINER_ID)})`
}
