import { spawn } from "node:child_process"
import fs from "node:fs/promises"
import path from "node:path"
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest"

import { CommandFailedError } from "../src/daemon/errors"
import { isProcessAlive } from "../src/daemon/pid"
import { createSystemDriver } from "../src/daemon/spawner"

import { makeTempDir } from "./helpers/fake-process-table"

// Prints one line, then idles until signalled
const IDLE_SCRIPT = "console.log('new'); setInterval(() => {}, 1000)"
const WAIT = { timeout: 5000, interval: 25 }

let dir: string
let logPath: string
const started: Array<number> = []

beforeEach(async () => {
  dir = await makeTempDir()
  logPath = path.join(dir, "logs", "test-server.log")
})

afterEach(async () => {
  for (const pid of started.splice(0)) {
    if (isProcessAlive(pid)) process.kill(pid, "SIGKILL")
  }
  await fs.rm(dir, { recursive: true, force: true })
})

describe("createSystemDriver", () => {
  test("appends to the existing log and stops the group on SIGTERM", async () => {
    await fs.mkdir(path.dirname(logPath), { recursive: true })
    await fs.writeFile(logPath, "old\n")
    const driver = createSystemDriver()

    const pid = await driver.spawnDetached({
      command: process.execPath,
      args: ["-e", IDLE_SCRIPT],
      cwd: dir,
      logPath,
    })
    started.push(pid)

    await vi.waitFor(async () => {
      expect(await fs.readFile(logPath, "utf8")).toBe("old\nnew\n")
    }, WAIT)
    expect(isProcessAlive(pid)).toBe(true)

    expect(driver.signal(pid, "SIGTERM")).toBe(true)
    await vi.waitFor(() => {
      expect(isProcessAlive(pid)).toBe(false)
    }, WAIT)
  })

  test("creates the log directory on demand", async () => {
    const driver = createSystemDriver()

    const pid = await driver.spawnDetached({
      command: process.execPath,
      args: ["-e", IDLE_SCRIPT],
      cwd: dir,
      logPath,
    })
    started.push(pid)

    await vi.waitFor(async () => {
      expect(await fs.readFile(logPath, "utf8")).toBe("new\n")
    }, WAIT)
    driver.signal(pid, "SIGKILL")
  })

  test("a missing command is CommandFailed", async () => {
    const driver = createSystemDriver()
    const missing = path.join(dir, "no-such-server")

    const error = await driver
      .spawnDetached({ command: missing, args: [], cwd: dir, logPath })
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(CommandFailedError)
    if (!(error instanceof CommandFailedError)) return
    expect(error.message).toBe(`Failed to launch ${missing}: spawn ${missing} ENOENT`)
  })

  test("signals a process that leads no group directly", async () => {
    const driver = createSystemDriver()
    const child = spawn(process.execPath, ["-e", "setInterval(() => {}, 1000)"], {
      stdio: "ignore",
    })
    const exited = new Promise<NodeJS.Signals | null>((resolve) => {
      child.once("exit", (_code, signal) => resolve(signal))
    })
    const pid = child.pid
    expect(pid).toBeTypeOf("number")
    if (pid === undefined) return
    started.push(pid)

    expect(driver.signal(pid, "SIGTERM")).toBe(true)
    expect(await exited).toBe("SIGTERM")
  })

  test("reports false when no process receives the signal", async () => {
    const driver = createSystemDriver()
    const child = spawn(process.execPath, ["-e", ""], { stdio: "ignore" })
    await new Promise<void>((resolve) => child.once("exit", () => resolve()))
    const pid = child.pid
    if (pid === undefined) return

    expect(driver.signal(pid, "SIGTERM")).toBe(false)
  })
})
