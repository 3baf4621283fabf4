import { runCommand, type CommandRunner } from "./exec"

const SCAN_TIMEOUT_MS = 5000

/**
 * Parse `lsof -t` output: one pid per line. Duplicates (IPv4 and IPv6
 * listeners of the same process) collapse into one entry.
 */
export function parseLsofPids(output: string): Array<number> {
  const pids = new Set<number>()
  for (const line of output.split("\n")) {
    const pid = Number.parseInt(line.trim(), 10)
    if (Number.isInteger(pid) && pid > 0) pids.add(pid)
  }
  return [...pids].sort((a, b) => a - b)
}

/**
 * List the pids listening on a TCP port, on any local address.
 * lsof exits 1 with no output when nothing matches; that is the only
 * non-zero status read as "free".
 */
export async function findPortHolders(
  port: number,
  run: CommandRunner = runCommand,
): Promise<Array<number>> {
  const result = await run(
    "lsof",
    ["-nP", `-iTCP:${port}`, "-sTCP:LISTEN", "-t"],
    { timeoutMs: SCAN_TIMEOUT_MS },
  )

  if (result.timedOut) {
    throw new Error(`lsof timed out scanning port ${port}`)
  }
  if (result.code === 0) return parseLsofPids(result.stdout)
  if (result.code === 1 && result.stdout.trim() === "") return []

  throw new Error(
    `lsof failed scanning port ${port} (exit ${result.code}): ${result.stderr.trim()}`,
  )
}

/**
 * One-line `pid user command` description of a process, used as evidence
 * in conflict reports. Returns null when the process is gone.
 */
export async function describeProcess(
  pid: number,
  run: CommandRunner = runCommand,
): Promise<string | null> {
  try {
    const result = await run("ps", ["-o", "pid=,user=,command=", "-p", String(pid)], {
      timeoutMs: SCAN_TIMEOUT_MS,
    })
    const line = result.stdout.trim()
    return result.code === 0 && line ? line : null
  } catch {
    // ps missing: evidence is best-effort
    return null
  }
}

export interface ProcessDetails {
  pid: number
  user: string
  cpuPercent: string
  memPercent: string
  // ps etime: [[dd-]hh:]mm:ss
  elapsed: string
  rssKb: number
  command: string
}

const DETAIL_COLUMNS = "pid=,user=,%cpu=,%mem=,etime=,rss=,command="

// One headerless `ps -o pid,user,%cpu,%mem,etime,rss,command` row. The
// command is the last column and may contain spaces.
export function parsePsDetails(line: string): ProcessDetails | null {
  const fields = line.trim().split(/\s+/)
  if (fields.length < 7) return null
  const [pidField, user, cpuPercent, memPercent, elapsed, rssField, ...command] = fields
  const pid = Number.parseInt(pidField, 10)
  const rssKb = Number.parseInt(rssField, 10)
  if (!Number.isInteger(pid) || !Number.isInteger(rssKb)) return null
  return { pid, user, cpuPercent, memPercent, elapsed, rssKb, command: command.join(" ") }
}

export async function inspectProcess(
  pid: number,
  run: CommandRunner = runCommand,
): Promise<ProcessDetails | null> {
  try {
    const result = await run("ps", ["-o", DETAIL_COLUMNS, "-p", String(pid)], {
      timeoutMs: SCAN_TIMEOUT_MS,
    })
    return result.code === 0 ? parsePsDetails(result.stdout) : null
  } catch {
    return null
  }
}

// Process group of a pid, or null when the process is gone. A service
// launched through a wrapper (uv, npx) listens from a descendant that
// shares the group of the pid the warden recorded.
export async function processGroupOf(
  pid: number,
  run: CommandRunner = runCommand,
): Promise<number | null> {
  try {
    const result = await run("ps", ["-o", "pgid=", "-p", String(pid)], {
      timeoutMs: SCAN_TIMEOUT_MS,
    })
    const pgid = Number.parseInt(result.stdout.trim(), 10)
    return result.code === 0 && Number.isInteger(pgid) ? pgid : null
  } catch {
    return null
  }
}
