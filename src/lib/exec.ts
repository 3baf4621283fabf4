import consola from "consola"
import { spawn } from "node:child_process"

export interface CommandResult {
  // null when the command was killed (timeout) rather than exiting
  code: number | null
  stdout: string
  stderr: string
  timedOut: boolean
}

export interface RunOptions {
  timeoutMs?: number
  env?: NodeJS.ProcessEnv
  // "inherit" streams the child's output straight to the operator's terminal
  stdio?: "pipe" | "inherit"
}

export type CommandRunner = (
  command: string,
  args: Array<string>,
  opts?: RunOptions,
) => Promise<CommandResult>

const DEFAULT_TIMEOUT_MS = 5000

/**
 * Run an external command to completion. Never waits longer than
 * `timeoutMs`: the child gets SIGKILL and the result is marked timedOut.
 * Rejects only when the command could not be started at all (e.g. ENOENT).
 */
export const runCommand: CommandRunner = (command, args, opts = {}) => {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS
  const stdio = opts.stdio ?? "pipe"

  consola.debug(`exec: ${command} ${args.join(" ")}`)

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      env: opts.env ?? process.env,
      stdio: stdio === "inherit" ? ["ignore", "inherit", "inherit"] : "pipe",
      windowsHide: true,
    })

    let stdout = ""
    let stderr = ""
    let timedOut = false

    child.stdout?.setEncoding("utf8")
    child.stderr?.setEncoding("utf8")
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk
    })
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk
    })

    const timer = setTimeout(() => {
      timedOut = true
      child.kill("SIGKILL")
    }, timeoutMs)

    child.once("error", (err) => {
      clearTimeout(timer)
      reject(err)
    })

    child.once("close", (code) => {
      clearTimeout(timer)
      resolve({ code, stdout, stderr, timedOut })
    })
  })
}
