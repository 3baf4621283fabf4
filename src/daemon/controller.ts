import consola from "consola"

import { modeArgs, type ServiceConfig } from "~/lib/config"
import { fileSize, tailLines } from "~/lib/log-tail"

import { pollWithCeiling, sleep as realSleep, type Sleep } from "./bounded-poll"
import { CommandFailedError, CrashedOnStartupError, PortConflictError, StopFailedError } from "./errors"
import type { PidRecord } from "./pid"
import type { ProcessStateProbe } from "./probe"
import type { ProcessDriver } from "./spawner"
import { observe, toServiceState, type PortHolder } from "./state"
import {
  DEFAULT_TIMINGS,
  type ControllerTimings,
  type LifecycleState,
  type StartResult,
  type StatusReport,
  type StopResult,
} from "./types"

export interface ControllerDeps {
  probe: ProcessStateProbe
  driver: ProcessDriver
  pidRecord: PidRecord
  timings?: Partial<ControllerTimings>
  sleep?: Sleep
}

type StartTick = { kind: "crashed" } | { kind: "bound"; holders: Array<number> }

// LifecycleController drives one service identity through
// STOPPED → STARTING → RUNNING → STOPPING → STOPPED.
// It keeps no knowledge between invocations: every operation re-reads the
// pid record and re-scans the port.
export class LifecycleController {
  private state: LifecycleState = "STOPPED"
  private readonly timings: ControllerTimings
  private readonly sleep: Sleep

  constructor(
    private readonly service: ServiceConfig,
    private readonly deps: ControllerDeps,
  ) {
    this.timings = { ...DEFAULT_TIMINGS, ...deps.timings }
    this.sleep = deps.sleep ?? realSleep
  }

  getState(): LifecycleState {
    return this.state
  }

  async start(mode: string): Promise<StartResult> {
    const { probe, driver, pidRecord } = this.deps
    const { port, host, paths } = this.service

    // Pre-flight: never start over an occupied port, whoever holds it
    const occupying = await probe.portHolders(port)
    if (occupying.length > 0) {
      const evidence = await this.describeAll(occupying)
      throw new PortConflictError(port, occupying, evidence)
    }

    let clearedStalePid: number | null = null
    const recorded = await pidRecord.read()
    if (recorded !== null) {
      if (probe.isAlive(recorded)) {
        throw new CommandFailedError(
          `Process ${recorded} from a previous start is still alive but not listening yet; wait for it or run stop first`,
        )
      }
      consola.warn(`Removing stale pid record (process ${recorded} does not exist)`)
      await pidRecord.remove()
      clearedStalePid = recorded
    }

    this.state = "STARTING"
    consola.info(`Starting ${this.service.identity} (mode: ${mode})...`)

    const pid = await driver.spawnDetached({
      command: this.service.command,
      args: [...this.service.commandArgs, ...modeArgs(mode)],
      cwd: paths.STATE_DIR,
      logPath: paths.LOG_PATH,
    })
    // Written before verification so a crash still leaves the pid behind
    await pidRecord.write(pid)
    consola.info(`Spawned PID ${pid}, waiting for port ${port}...`)

    const poll = await pollWithCeiling<StartTick, null>({
      maxAttempts: this.timings.startTicks,
      intervalMs: this.timings.intervalMs,
      sleep: this.sleep,
      label: "start",
      check: async () => {
        if (!probe.isAlive(pid)) return { kind: "crashed" }
        const holders = await probe.portHolders(port)
        return holders.length > 0 ? { kind: "bound", holders } : undefined
      },
      onExhausted: async () => null,
    })

    const result: StartResult = {
      outcome: "started",
      pid,
      mode,
      address: `http://${host}:${port}`,
      endpoint: `${this.service.publicUrl}/mcp`,
      logPath: paths.LOG_PATH,
      holders: [],
      clearedStalePid,
    }

    if (!poll.settled) {
      // Slow start: the process stays up and keeps its record
      this.state = "RUNNING"
      return { ...result, outcome: "slow-start" }
    }

    if (poll.value.kind === "crashed") {
      this.state = "FAILED_START"
      const excerpt = (await tailLines(paths.LOG_PATH, this.timings.crashLogLines)) ?? []
      await pidRecord.remove()
      throw new CrashedOnStartupError(pid, excerpt)
    }

    this.state = "RUNNING"
    return { ...result, holders: poll.value.holders }
  }

  async stop(): Promise<StopResult> {
    const { probe, driver, pidRecord } = this.deps
    const { port } = this.service

    const recorded = await pidRecord.read()
    const recordedAlive = recorded !== null && probe.isAlive(recorded)
    const holders = await probe.portHolders(port)

    // The recorded process and every port holder are cleared together:
    // an orphan on the port is part of the same shutdown.
    const candidates = union(recordedAlive && recorded !== null ? [recorded] : [], holders)
    const clearedStalePid = recorded !== null && !recordedAlive ? recorded : null

    if (candidates.length === 0) {
      if (recorded !== null) {
        consola.warn(`Removing stale pid record (process ${recorded} does not exist)`)
      }
      await pidRecord.remove()
      this.state = "STOPPED"
      return {
        outcome: "not-running",
        terminated: [],
        forced: false,
        killed: [],
        clearedStalePid,
      }
    }

    this.state = "STOPPING"
    for (const pid of candidates) {
      consola.info(`Sending SIGTERM to PID ${pid}`)
      driver.signal(pid, "SIGTERM")
    }

    const remaining = async (): Promise<Array<number>> =>
      union(
        candidates.filter((pid) => probe.isAlive(pid)),
        await probe.portHolders(port),
      )

    const poll = await pollWithCeiling<true, Array<number>>({
      maxAttempts: this.timings.stopTicks,
      intervalMs: this.timings.intervalMs,
      sleep: this.sleep,
      label: "stop",
      check: async () => ((await remaining()).length === 0 ? true : undefined),
      onExhausted: async () => {
        const survivors = await remaining()
        consola.warn(`PID ${survivors.join(", ")} ignored SIGTERM, sending SIGKILL`)
        for (const pid of survivors) driver.signal(pid, "SIGKILL")
        await this.sleep(this.timings.intervalMs)
        return survivors
      },
    })

    await pidRecord.remove()

    const stillHolding = await probe.portHolders(port)
    if (stillHolding.length > 0) {
      this.state = "FAILED_STOP"
      throw new StopFailedError(port, stillHolding, !poll.settled)
    }

    this.state = "STOPPED"
    return {
      outcome: "stopped",
      terminated: candidates,
      forced: !poll.settled,
      killed: poll.settled ? [] : poll.escalation,
      clearedStalePid,
    }
  }

  // Not atomic: the service is down between the two halves
  async restart(mode: string): Promise<StartResult> {
    try {
      await this.stop()
    } catch (error) {
      consola.warn("Stop during restart failed, starting anyway:", error)
    }
    return this.start(mode)
  }

  // Pure read: no signals, no spawning, no record changes
  async status(): Promise<StatusReport> {
    const { probe, pidRecord } = this.deps
    const { paths } = this.service

    const recordedPid = await pidRecord.read()
    const recordedAlive = recordedPid !== null && probe.isAlive(recordedPid)
    const holders = await this.lookupHolders()
    const observation = observe(recordedPid, recordedAlive, holders)
    const state = toServiceState(observation)
    this.state = state

    return {
      state,
      observation,
      recordedPid,
      recordedAlive,
      process: recordedPid !== null && recordedAlive ? await probe.details(recordedPid) : null,
      holders,
      host: this.service.host,
      port: this.service.port,
      publicUrl: this.service.publicUrl,
      pidPath: pidRecord.path,
      logPath: paths.LOG_PATH,
      logSize: await fileSize(paths.LOG_PATH),
      recentLog: (await tailLines(paths.LOG_PATH, this.timings.statusLogLines)) ?? [],
    }
  }

  // Pure read of the log tail; no probing
  logs(lines: number): Promise<Array<string> | null> {
    return tailLines(this.service.paths.LOG_PATH, lines)
  }

  private async lookupHolders(): Promise<Array<PortHolder>> {
    const pids = await this.deps.probe.portHolders(this.service.port)
    return Promise.all(
      pids.map(async (pid) => ({ pid, group: await this.deps.probe.processGroup(pid) })),
    )
  }

  private async describeAll(pids: Array<number>): Promise<Array<string>> {
    return Promise.all(
      pids.map(async (pid) => (await this.deps.probe.describe(pid)) ?? `${pid} (no details)`),
    )
  }
}

function union(a: Array<number>, b: Array<number>): Array<number> {
  return [...new Set([...a, ...b])].sort((x, y) => x - y)
}
