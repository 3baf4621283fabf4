import consola from "consola"
import { spawn } from "node:child_process"
import fs from "node:fs/promises"
import path from "node:path"

import { CommandFailedError } from "./errors"

export interface SpawnSpec {
  command: string
  args: Array<string>
  cwd: string
  logPath: string
  env?: NodeJS.ProcessEnv
}

export type TerminationSignal = "SIGTERM" | "SIGKILL"

/**
 * Everything the controller does to the process table, as opposed to
 * observing it (probe.ts).
 */
export interface ProcessDriver {
  // Returns the pid of a child that outlives the warden
  spawnDetached: (spec: SpawnSpec) => Promise<number>
  // false when no process received the signal
  signal: (pid: number, sig: TerminationSignal) => boolean
}

export function createSystemDriver(): ProcessDriver {
  return {
    async spawnDetached(spec) {
      await fs.mkdir(path.dirname(spec.logPath), { recursive: true })
      const logFd = await fs.open(spec.logPath, "a")

      try {
        const child = spawn(spec.command, spec.args, {
          cwd: spec.cwd,
          detached: true,
          stdio: ["ignore", logFd.fd, logFd.fd],
          env: spec.env ?? process.env,
          windowsHide: true,
        })

        if (child.pid === undefined) {
          const err = await new Promise<Error>((resolve) => child.once("error", resolve))
          throw new CommandFailedError(`Failed to launch ${spec.command}: ${err.message}`)
        }

        child.once("error", (err) => {
          consola.debug(`Child ${spec.command} reported an error:`, err)
        })
        child.unref()
        return child.pid
      } finally {
        await logFd.close()
      }
    },

    signal(pid, sig) {
      // The child is spawned detached and leads its own process group;
      // signalling the group also reaches what it forked (uv → python).
      if (process.platform !== "win32") {
        try {
          process.kill(-pid, sig)
          return true
        } catch {
          consola.debug(`No process group ${pid}, signalling the process only`)
        }
      }
      try {
        process.kill(pid, sig)
        return true
      } catch {
        return false
      }
    },
  }
}
