import { runCommand, type CommandRunner } from "~/lib/exec"
import {
  describeProcess,
  findPortHolders,
  inspectProcess,
  processGroupOf,
  type ProcessDetails,
} from "~/lib/port-check"

import { isProcessAlive } from "./pid"

/**
 * Raw facts about the operating system's process and port tables.
 * Nothing here decides what those facts mean for the managed service:
 * that is the controller's job (see state.ts).
 */
export interface ProcessStateProbe {
  isAlive: (pid: number) => boolean
  // Every pid listening on the TCP port, on any local address
  portHolders: (port: number) => Promise<Array<number>>
  processGroup: (pid: number) => Promise<number | null>
  describe: (pid: number) => Promise<string | null>
  details: (pid: number) => Promise<ProcessDetails | null>
}

export function createSystemProbe(run: CommandRunner = runCommand): ProcessStateProbe {
  return {
    isAlive: isProcessAlive,
    portHolders: (port) => findPortHolders(port, run),
    processGroup: (pid) => processGroupOf(pid, run),
    describe: (pid) => describeProcess(pid, run),
    details: (pid) => inspectProcess(pid, run),
  }
}
