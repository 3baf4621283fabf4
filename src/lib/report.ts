import consola from "consola"

import { EXIT_CODES, WardenError, type ExitCode } from "~/daemon/errors"
import { describeObservation } from "~/daemon/state"
import type { StartResult, StatusReport, StopResult } from "~/daemon/types"
import type { HealthReport } from "~/health/prober"

import { formatBytes } from "./log-tail"
import type { ProcessDetails } from "./port-check"

function printEvidence(lines: Array<string>): void {
  for (const line of lines) consola.log(`  ${line}`)
}

// Runs one command and turns its outcome into the process exit code.
// WardenErrors carry their own code and evidence; anything else is a
// generic failure.
export async function withVerdict(action: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await action()
  } catch (error) {
    if (error instanceof WardenError) {
      consola.error(`${error.code}: ${error.message}`)
      printEvidence(error.evidence)
      process.exitCode = error.exitCode
      return
    }
    consola.error("Command failed:", error)
    process.exitCode = EXIT_CODES.FAILURE
  }
}

export function reportStart(result: StartResult): void {
  if (result.outcome === "slow-start") {
    consola.warn(
      `SlowStart: process ${result.pid} is alive but the port is not listening yet; check again with status`,
    )
  } else {
    consola.success("Service started")
  }
  printEvidence([
    `PID:      ${result.pid}`,
    `Mode:     ${result.mode}`,
    `Address:  ${result.address}`,
    `Endpoint: ${result.endpoint}`,
    `Log:      ${result.logPath}`,
  ])
}

export function reportStop(result: StopResult): void {
  if (result.outcome === "not-running") {
    consola.info("Service was not running")
    return
  }
  const stopped = `Service stopped (PID ${result.terminated.join(", ")})`
  consola.success(
    result.forced ? `${stopped}; SIGKILL was needed for PID ${result.killed.join(", ")}` : stopped,
  )
}

export function reportStatus(report: StatusReport): void {
  const summary = `${report.state}: ${describeObservation(report.observation)}`
  switch (report.observation.kind) {
    case "running":
      consola.success(summary)
      break
    case "stopped":
      consola.info(summary)
      break
    default:
      consola.warn(summary)
  }

  const recorded =
    report.recordedPid === null
      ? "none"
      : `${report.recordedPid} (${report.recordedAlive ? "alive" : "dead"})`
  const holders =
    report.holders.length === 0
      ? "not listening"
      : `listening, PID ${report.holders.map((h) => h.pid).join(", ")}`
  const log =
    report.logSize === null ? `${report.logPath} (missing)` : `${report.logPath} (${formatBytes(report.logSize)})`

  const lines = [`Recorded PID: ${recorded}`]
  if (report.process) lines.push(`Process:      ${describeDetails(report.process)}`)
  printEvidence([
    ...lines,
    `Port ${report.port}:    ${holders}`,
    `Host:         ${report.host}`,
    `URL:          ${report.publicUrl}`,
    `PID record:   ${report.pidPath}`,
    `Log:          ${log}`,
  ])

  if (report.recentLog.length > 0) {
    consola.log("")
    consola.info(`Last ${report.recentLog.length} log lines:`)
    printEvidence(report.recentLog)
  }
}

export function describeDetails(details: ProcessDetails): string {
  return [
    `user ${details.user}`,
    `up ${details.elapsed}`,
    `cpu ${details.cpuPercent}%`,
    `mem ${details.memPercent}% (${formatBytes(details.rssKb * 1024)})`,
    details.command,
  ].join(", ")
}

export function reportHealth(report: HealthReport): void {
  for (const check of report.checks) {
    const line = `${check.name}: ${check.detail}`
    if (check.status === "pass") consola.success(line)
    else if (check.status === "warn") consola.warn(line)
    else consola.error(line)
  }

  switch (report.verdict) {
    case "healthy":
      consola.success("Healthy")
      break
    case "degraded":
      consola.warn("HealthDegraded: service is up but not every probe passed")
      break
    case "unhealthy":
      consola.error("Unhealthy")
      break
  }
}

export function healthExitCode(report: HealthReport): ExitCode {
  return report.verdict === "unhealthy" ? EXIT_CODES.FAILURE : EXIT_CODES.OK
}
