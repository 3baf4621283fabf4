import consola from "consola"

import type { ServiceConfig } from "~/lib/config"
import type { PidRecord } from "~/daemon/pid"
import type { ProcessStateProbe } from "~/daemon/probe"

export type CheckStatus = "pass" | "warn" | "fail"

export interface CheckResult {
  name: "process" | "port" | "oauth-metadata" | "mcp-endpoint"
  status: CheckStatus
  detail: string
}

// degraded is HealthDegraded: advisory, never fatal to other commands
export type HealthVerdict = "healthy" | "degraded" | "unhealthy"

export interface HealthReport {
  verdict: HealthVerdict
  checks: Array<CheckResult>
}

export interface ProbeResponse {
  status: number
  body?: { cancel: () => Promise<void> } | null
}

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<ProbeResponse>

export interface HealthProberOptions {
  probe: ProcessStateProbe
  pidRecord: PidRecord
  fetch?: FetchLike
  timeoutMs?: number
}

const METADATA_PATH = "/.well-known/oauth-authorization-server"
const MCP_PATH = "/mcp"

// Wildcard binds are reachable on loopback
function probeHost(host: string): string {
  if (host === "0.0.0.0") return "127.0.0.1"
  if (host === "::") return "[::1]"
  return host.includes(":") && !host.startsWith("[") ? `[${host}]` : host
}

export class HealthProber {
  private readonly fetch: FetchLike
  private readonly timeoutMs: number

  constructor(
    private readonly service: ServiceConfig,
    private readonly opts: HealthProberOptions,
  ) {
    this.fetch = opts.fetch ?? ((url, init) => fetch(url, init))
    this.timeoutMs = opts.timeoutMs ?? 5000
  }

  async check(): Promise<HealthReport> {
    const checks: Array<CheckResult> = []
    const { probe, pidRecord } = this.opts

    const pid = await pidRecord.read()
    if (pid === null || !probe.isAlive(pid)) {
      checks.push({
        name: "process",
        status: "fail",
        detail: pid === null ? "no pid record" : `process ${pid} does not exist`,
      })
      return { verdict: "unhealthy", checks }
    }
    checks.push({ name: "process", status: "pass", detail: `process ${pid} alive` })

    const holders = await probe.portHolders(this.service.port)
    if (holders.length === 0) {
      checks.push({
        name: "port",
        status: "fail",
        detail: `port ${this.service.port} not listening`,
      })
      return { verdict: "unhealthy", checks }
    }
    checks.push({
      name: "port",
      status: "pass",
      detail: `port ${this.service.port} listening (PID ${holders.join(", ")})`,
    })

    const metadata = await this.probe(METADATA_PATH)
    checks.push(
      metadata === null
        ? { name: "oauth-metadata", status: "warn", detail: "connection failed (still starting, or firewalled)" }
        : metadata === 200
          ? { name: "oauth-metadata", status: "pass", detail: "OAuth metadata: 200" }
          : { name: "oauth-metadata", status: "warn", detail: `OAuth metadata returned ${metadata}, expected 200` },
    )

    const mcp = await this.probe(MCP_PATH)
    checks.push(
      mcp === null
        ? { name: "mcp-endpoint", status: "warn", detail: "connection failed" }
        : mcp === 401
          ? { name: "mcp-endpoint", status: "pass", detail: "MCP endpoint requires auth (401)" }
          : { name: "mcp-endpoint", status: "pass", detail: `MCP endpoint returned ${mcp}` },
    )

    const degraded = checks.some((c) => c.status === "warn")
    return { verdict: degraded ? "degraded" : "healthy", checks }
  }

  // HTTP status of GET path, or null when the request did not complete
  private async probe(urlPath: string): Promise<number | null> {
    const url = `http://${probeHost(this.service.host)}:${this.service.port}${urlPath}`
    try {
      const response = await this.fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) })
      // Only the status matters; release the connection
      await response.body?.cancel()
      return response.status
    } catch (error) {
      consola.debug(`Probe ${url} failed:`, error)
      return null
    }
  }
}
