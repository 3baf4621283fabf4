export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  PORT_CONFLICT: 2,
  CRASHED_ON_STARTUP: 3,
  STOP_FAILED: 4,
  TRANSPORT_UNAVAILABLE: 5,
  CONFIG: 6,
} as const

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES]

export type WardenErrorCode =
  | "PortConflict"
  | "CrashedOnStartup"
  | "StopFailed"
  | "TransportUnavailable"
  | "ConfigError"
  | "CommandFailed"

// Base for every failure a command reports as its final verdict.
// `evidence` is printed under the message so the operator can act on it.
export class WardenError extends Error {
  constructor(
    readonly code: WardenErrorCode,
    message: string,
    readonly exitCode: ExitCode,
    readonly evidence: Array<string> = [],
  ) {
    super(message)
    this.name = code
  }
}

export class PortConflictError extends WardenError {
  constructor(
    readonly port: number,
    readonly holders: Array<number>,
    evidence: Array<string> = [],
  ) {
    super(
      "PortConflict",
      `Port ${port} is already in use by PID ${holders.join(", ")}; run stop first`,
      EXIT_CODES.PORT_CONFLICT,
      evidence,
    )
  }
}

export class CrashedOnStartupError extends WardenError {
  constructor(
    readonly pid: number,
    readonly logExcerpt: Array<string>,
  ) {
    super(
      "CrashedOnStartup",
      `Process ${pid} exited before binding its port`,
      EXIT_CODES.CRASHED_ON_STARTUP,
      logExcerpt,
    )
  }
}

export class StopFailedError extends WardenError {
  constructor(
    readonly port: number,
    readonly holders: Array<number>,
    // Whether SIGKILL was sent before the final scan
    readonly forced: boolean,
  ) {
    super(
      "StopFailed",
      forced
        ? `Port ${port} is still held by PID ${holders.join(", ")} after SIGKILL; manual intervention required`
        : `Port ${port} was bound again by PID ${holders.join(", ")} after the service exited; run stop again`,
      EXIT_CODES.STOP_FAILED,
    )
  }
}

export class TransportUnavailableError extends WardenError {
  constructor(target: string, detail: string) {
    super(
      "TransportUnavailable",
      `Cannot reach ${target} over ssh`,
      EXIT_CODES.TRANSPORT_UNAVAILABLE,
      detail ? [detail] : [],
    )
  }
}

export class ConfigError extends WardenError {
  constructor(issues: Array<string>) {
    super("ConfigError", "Invalid configuration", EXIT_CODES.CONFIG, issues)
  }
}

export class CommandFailedError extends WardenError {
  constructor(message: string, evidence: Array<string> = []) {
    super("CommandFailed", message, EXIT_CODES.FAILURE, evidence)
  }
}
