import { describe, expect, test } from "vitest"

import {
  describeProcess,
  findPortHolders,
  inspectProcess,
  parseLsofPids,
  parsePsDetails,
  processGroupOf,
} from "../src/lib/port-check"

import { createFakeRunner } from "./helpers/fake-runner"

describe("parseLsofPids", () => {
  test("collapses duplicates and ignores blank lines", () => {
    expect(parseLsofPids("4312\n118\n4312\n\n")).toEqual([118, 4312])
  })

  test("empty output means no holders", () => {
    expect(parseLsofPids("")).toEqual([])
  })
})

describe("findPortHolders", () => {
  test("scans listening TCP sockets on the port", async () => {
    const { run, calls } = createFakeRunner(() => ({ stdout: "2001\n" }))

    expect(await findPortHolders(8000, run)).toEqual([2001])
    expect(calls[0]?.command).toBe("lsof")
    expect(calls[0]?.args).toEqual(["-nP", "-iTCP:8000", "-sTCP:LISTEN", "-t"])
  })

  test("exit 1 with no output is a free port", async () => {
    const { run } = createFakeRunner(() => ({ code: 1 }))

    expect(await findPortHolders(8000, run)).toEqual([])
  })

  test("other failures are errors, never a free port", async () => {
    const { run } = createFakeRunner(() => ({ code: 2, stderr: "lsof: bad option" }))

    await expect(findPortHolders(8000, run)).rejects.toThrow(
      "lsof failed scanning port 8000 (exit 2): lsof: bad option",
    )
  })

  test("a timed-out scan is an error", async () => {
    const { run } = createFakeRunner(() => ({ code: null, timedOut: true }))

    await expect(findPortHolders(8000, run)).rejects.toThrow("lsof timed out scanning port 8000")
  })

  test("missing lsof propagates", async () => {
    const { run } = createFakeRunner(() => new Error("spawn lsof ENOENT"))

    await expect(findPortHolders(8000, run)).rejects.toThrow("spawn lsof ENOENT")
  })
})

describe("process details", () => {
  test("describeProcess returns the ps line", async () => {
    const { run } = createFakeRunner(() => ({ stdout: "  2001 deploy python -m server\n" }))

    expect(await describeProcess(2001, run)).toBe("2001 deploy python -m server")
  })

  test("describeProcess is null for a vanished process", async () => {
    const { run } = createFakeRunner(() => ({ code: 1 }))

    expect(await describeProcess(2001, run)).toBeNull()
  })

  test("processGroupOf parses the pgid", async () => {
    const { run, calls } = createFakeRunner(() => ({ stdout: " 1990\n" }))

    expect(await processGroupOf(2001, run)).toBe(1990)
    expect(calls[0]?.args).toEqual(["-o", "pgid=", "-p", "2001"])
  })

  test("inspectProcess parses the status columns", async () => {
    const { run, calls } = createFakeRunner(() => ({
      stdout: " 2001 deploy     1.5  0.8    02:03:04 51200 uv run python main.py\n",
    }))

    expect(await inspectProcess(2001, run)).toEqual({
      pid: 2001,
      user: "deploy",
      cpuPercent: "1.5",
      memPercent: "0.8",
      elapsed: "02:03:04",
      rssKb: 51200,
      command: "uv run python main.py",
    })
    expect(calls[0]?.args).toEqual([
      "-o",
      "pid=,user=,%cpu=,%mem=,etime=,rss=,command=",
      "-p",
      "2001",
    ])
  })

  test("inspectProcess is null for a vanished process", async () => {
    const { run } = createFakeRunner(() => ({ code: 1 }))

    expect(await inspectProcess(2001, run)).toBeNull()
  })

  test("a truncated ps row is not parsed", () => {
    expect(parsePsDetails("2001 deploy 1.5")).toBeNull()
  })
})
