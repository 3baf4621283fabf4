import type { ProcessDetails } from "~/lib/port-check"

import type { Observation, PortHolder, ServiceState } from "./state"

export type LifecycleState =
  | "STOPPED"
  | "STARTING"
  | "RUNNING"
  | "STOPPING"
  | "FAILED_START"
  | "FAILED_STOP"

export interface ControllerTimings {
  // Start confirmation: one port check per tick
  startTicks: number
  // Stop: one port check per tick before escalating to SIGKILL
  stopTicks: number
  intervalMs: number
  // Log lines attached to a CrashedOnStartup report
  crashLogLines: number
  // Log lines shown by status
  statusLogLines: number
}

export const DEFAULT_TIMINGS: ControllerTimings = {
  startTicks: 15,
  stopTicks: 10,
  intervalMs: 1000,
  crashLogLines: 20,
  statusLogLines: 5,
}

export type StartOutcome = "started" | "slow-start"

export interface StartResult {
  outcome: StartOutcome
  pid: number
  mode: string
  address: string
  endpoint: string
  logPath: string
  holders: Array<number>
  // Stale record found and cleared during pre-flight
  clearedStalePid: number | null
}

export interface StopResult {
  outcome: "not-running" | "stopped"
  // Every candidate that received SIGTERM
  terminated: Array<number>
  forced: boolean
  // Survivors of the SIGTERM wait that were sent SIGKILL
  killed: Array<number>
  clearedStalePid: number | null
}

export interface StatusReport {
  state: ServiceState
  observation: Observation
  recordedPid: number | null
  recordedAlive: boolean
  // ps row of the recorded pid, when it is alive
  process: ProcessDetails | null
  holders: Array<PortHolder>
  host: string
  port: number
  publicUrl: string
  pidPath: string
  logPath: string
  logSize: number | null
  recentLog: Array<string>
}
