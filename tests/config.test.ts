import fs from "node:fs/promises"
import path from "node:path"
import { afterEach, beforeEach, describe, expect, test } from "vitest"

import { ConfigError } from "../src/daemon/errors"
import { loadConfig, modeArgs, requireRemote } from "../src/lib/config"

import { makeTempDir } from "./helpers/fake-process-table"

let dir: string

beforeEach(async () => {
  dir = await makeTempDir()
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

function configError(fn: () => unknown): ConfigError {
  try {
    fn()
  } catch (error) {
    if (error instanceof ConfigError) return error
    throw error
  }
  throw new Error("expected a ConfigError")
}

describe("loadConfig", () => {
  test("defaults without an env file", () => {
    const config = loadConfig({ cwd: dir, env: {} })

    expect(config.service).toEqual({
      identity: "mcp-server",
      host: "127.0.0.1",
      port: 8000,
      publicUrl: "http://localhost:8000",
      command: "uv",
      commandArgs: ["run", "clawdchat-mcp"],
      paths: {
        STATE_DIR: dir,
        PID_PATH: path.join(dir, ".mcp-server.pid"),
        LOG_DIR: path.join(dir, "logs"),
        LOG_PATH: path.join(dir, "logs", "mcp-server.log"),
      },
    })
    expect(config.remote).toBeNull()
  })

  test("reads the env file, real environment wins", async () => {
    await fs.writeFile(
      path.join(dir, ".env"),
      [
        "MCP_SERVER_HOST=0.0.0.0",
        "MCP_SERVER_PORT=9001",
        "MCP_SERVER_URL=https://mcp.example.test/",
        "SERVICE_NAME=social-mcp",
        "SERVICE_COMMAND=node server.js --quiet",
        "REMOTE_HOST=",
      ].join("\n"),
    )

    const config = loadConfig({ cwd: dir, env: { MCP_SERVER_PORT: "9100" } })

    expect(config.service.host).toBe("0.0.0.0")
    expect(config.service.port).toBe(9100)
    expect(config.service.publicUrl).toBe("https://mcp.example.test")
    expect(config.service.command).toBe("node")
    expect(config.service.commandArgs).toEqual(["server.js", "--quiet"])
    expect(config.service.paths.PID_PATH).toBe(path.join(dir, ".social-mcp.pid"))
    expect(config.remote).toBeNull()
  })

  test("a custom env file path is resolved against cwd", async () => {
    await fs.writeFile(path.join(dir, "prod.env"), "MCP_SERVER_PORT=7000\n")

    const config = loadConfig({ cwd: dir, envFile: "prod.env", env: {} })

    expect(config.service.port).toBe(7000)
  })

  test("rejects an invalid port", () => {
    const error = configError(() => loadConfig({ cwd: dir, env: { MCP_SERVER_PORT: "70000" } }))

    expect(error.exitCode).toBe(6)
    expect(error.evidence).toHaveLength(1)
    expect(error.evidence[0]).toMatch(/^MCP_SERVER_PORT: /)
  })

  test("remote settings", () => {
    const config = loadConfig({
      cwd: dir,
      env: {
        REMOTE_HOST: "203.0.113.10",
        REMOTE_USER: "deploy",
        REMOTE_PORT: "2222",
        REMOTE_PROJECT_DIR: "~/apps/mcp",
        REMOTE_IDENTITY_FILE: "/keys/test_key",
      },
    })

    expect(config.remote).toEqual({
      host: "203.0.113.10",
      user: "deploy",
      port: 2222,
      projectDir: "~/apps/mcp",
      auth: "key",
      password: undefined,
      identityFile: "/keys/test_key",
      artifactPath: path.join(dir, "dist", "main.mjs"),
    })
  })

  test("password auth requires a password", () => {
    const error = configError(() =>
      loadConfig({ cwd: dir, env: { REMOTE_HOST: "203.0.113.10", REMOTE_AUTH: "password" } }),
    )

    expect(error.evidence).toEqual(["REMOTE_PASSWORD: is required when REMOTE_AUTH=password"])
  })
})

test("requireRemote", () => {
  const config = loadConfig({ cwd: dir, env: {} })

  expect(configError(() => requireRemote(config)).evidence).toEqual([
    "REMOTE_HOST: is required for remote commands",
  ])
})

test("modeArgs", () => {
  expect(modeArgs("stdio")).toEqual([])
  expect(modeArgs("streamable-http")).toEqual(["--transport", "streamable-http"])
  expect(modeArgs("sse")).toEqual(["--transport", "sse"])
})
