export interface ContainerStats {
  name: string
  cpu: string
  memUsage: string
  memPercent: string
}

export interface DiskUsage {
  size: string
  used: string
  available: string
  usePercent: string
}

/** Parse `docker stats --no-stream --format '{{.Name}}\t{{.CPUPerc}}\t{{.MemUsage}}\t{{.MemPerc}}'`. */
export function parseDockerStats(output: string): ContainerStats[] {
  const stats: ContainerStats[] = []
  for (const line of output.split('\n')) {
    const parts = line.split('\t')
    if (parts.length !== 4) continue
    const [name, cpu, memUsage, memPercent] = parts.map((p) => p.trim())
    if (name === '') continue
    stats.push({ name, cpu, memUsage, memPercent })
  }
  return stats
}

/** Parse the last row of `df -h <path>`. */
export function parseDiskUsage(output: string): DiskUsage | null {
  const rows = output
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l !== '')
  if (rows.length < 2) return null
  const columns = rows[rows.length - 1].split(/\s+/)
  // Filesystem Size Used Avail Use% Mounted-on; long device names may wrap onto their own row
  if (columns.length < 5) return null
  const offset = columns.length >= 6 ? 1 : 0
  const [size, used, available, usePercent] = columns.slice(offset, offset + 4)
  return { size, used, available, usePercent }
}
