// Reconciliation of the two signals the warden can observe: the pid record
// and a live scan of the port. Each disagreement case is its own variant.

export interface PortHolder {
  pid: number
  // Process group; null when the holder exited between scan and lookup
  group: number | null
}

// A holder belongs to the recorded process when it is that process or one
// of its descendants: the recorded pid leads its own group (spawned detached).
export function isOwnedBy(holder: PortHolder, recordedPid: number): boolean {
  return holder.pid === recordedPid || holder.group === recordedPid
}

export type Observation =
  | { kind: "stopped" }
  | { kind: "running"; pid: number; holders: Array<PortHolder> }
  | { kind: "unconfirmed"; pid: number }
  | { kind: "stale-record"; recordedPid: number }
  | {
      kind: "orphaned"
      recordedPid: number | null
      recordedAlive: boolean
      holders: Array<PortHolder>
    }

export function observe(
  recordedPid: number | null,
  recordedAlive: boolean,
  holders: Array<PortHolder>,
): Observation {
  if (holders.length === 0) {
    if (recordedPid === null) return { kind: "stopped" }
    if (!recordedAlive) return { kind: "stale-record", recordedPid }
    return { kind: "unconfirmed", pid: recordedPid }
  }

  if (recordedPid !== null && recordedAlive) {
    const pid = recordedPid
    if (holders.some((holder) => isOwnedBy(holder, pid))) {
      return { kind: "running", pid, holders }
    }
  }

  return {
    kind: "orphaned",
    recordedPid,
    recordedAlive: recordedPid !== null && recordedAlive,
    holders,
  }
}

export type ServiceState = "STOPPED" | "STARTING" | "RUNNING"

// Coarse state shown to the operator. `unconfirmed` is a process that is
// alive but not (yet) listening, i.e. still starting.
export function toServiceState(observation: Observation): ServiceState {
  switch (observation.kind) {
    case "running":
    case "orphaned":
      return "RUNNING"
    case "unconfirmed":
      return "STARTING"
    case "stopped":
    case "stale-record":
      return "STOPPED"
  }
}

export function describeObservation(observation: Observation): string {
  switch (observation.kind) {
    case "stopped":
      return "not running"
    case "running":
      return `running (PID ${observation.pid})`
    case "unconfirmed":
      return `process ${observation.pid} alive but port not bound yet`
    case "stale-record":
      return `stale pid record (process ${observation.recordedPid} does not exist)`
    case "orphaned": {
      const holders = observation.holders.map((h) => h.pid).join(", ")
      if (observation.recordedPid === null) {
        return `port held by PID ${holders} with no pid record`
      }
      return observation.recordedAlive
        ? `port held by PID ${holders}, recorded process ${observation.recordedPid} is alive but not listening`
        : `port held by PID ${holders}, recorded process ${observation.recordedPid} is gone`
    }
  }
}
