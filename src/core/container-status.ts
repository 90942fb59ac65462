import type { ContainerClassification, ContainerStatusReport } from './types.js'

/**
 * Classify a raw `docker ps` status string.
 *
 * `null` means the container is missing from the listing. Matching is a
 * case-insensitive substring test; "unhealthy"/"restarting" beat "up"/"healthy",
 * and anything unrecognized counts as degraded.
 */
export function classifyContainerStatus(status: string | null): ContainerClassification {
  if (status === null) return 'absent'

  const low = status.toLowerCase()
  if (low.includes('unhealthy') || low.includes('restarting')) return 'degraded'
  if (low.includes('up') || low.includes('healthy')) return 'ok'
  return 'degraded'
}

/**
 * Parse `name<TAB>status` lines into a map. Blank names are dropped and a
 * repeated name keeps its last status.
 */
export function parseStatusListing(output: string): Map<string, string> {
  const listing = new Map<string, string>()
  for (const line of output.split('\n')) {
    const tab = line.indexOf('\t')
    const name = (tab === -1 ? line : line.slice(0, tab)).trim()
    if (name === '') continue
    listing.set(name, tab === -1 ? '' : line.slice(tab + 1).trim())
  }
  return listing
}

/** A listed container with an empty status is reported as absent. */
export function reportContainer(name: string, listing: Map<string, string>): ContainerStatusReport {
  const raw = listing.get(name)
  const status = raw === undefined || raw === '' ? null : raw
  return { name, status, classification: classifyContainerStatus(status) }
}

/** True when the status reports a passing healthcheck (and not a failing one). */
export function isHealthy(status: string): boolean {
  const low = status.toLowerCase()
  return low.includes('healthy') && !low.includes('unhealthy')
}
