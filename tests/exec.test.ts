import { describe, expect, test } from "vitest"

import { runCommand } from "../src/lib/exec"

describe("runCommand", () => {
  test("captures output and exit code", async () => {
    const result = await runCommand(process.execPath, [
      "-e",
      "process.stdout.write('out'); process.stderr.write('err'); process.exitCode = 3",
    ])

    expect(result).toEqual({ code: 3, stdout: "out", stderr: "err", timedOut: false })
  })

  test("kills a command that outlives its timeout", async () => {
    const result = await runCommand(process.execPath, ["-e", "setTimeout(() => {}, 60000)"], {
      timeoutMs: 200,
    })

    expect(result.timedOut).toBe(true)
    expect(result.code).toBeNull()
  })

  test("rejects when the command does not exist", async () => {
    await expect(runCommand("mcp-warden-no-such-binary", [])).rejects.toThrow(/ENOENT/)
  })
})
