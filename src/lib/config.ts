import { parse as parseDotenv } from "dotenv"
import fs from "node:fs"
import path from "node:path"
import { z } from "zod"

import { ConfigError } from "~/daemon/errors"

import { resolvePaths, type ServicePaths } from "./paths"

export const DEFAULT_MODE = "streamable-http"

export interface ServiceConfig {
  identity: string
  host: string
  port: number
  publicUrl: string
  command: string
  commandArgs: Array<string>
  paths: ServicePaths
}

export type CredentialMode = "key" | "password"

export interface RemoteConfig {
  host: string
  user: string
  port: number
  projectDir: string
  auth: CredentialMode
  password?: string
  identityFile?: string
  // Local bundle copied by `remote upload`; keeps its file name remotely
  artifactPath: string
}

export interface WardenConfig {
  service: ServiceConfig
  remote: RemoteConfig | null
}

const port = z.coerce.number().int().min(1).max(65535)

const envSchema = z
  .object({
    SERVICE_NAME: z
      .string()
      .regex(/^[\w.-]+$/, "may only contain letters, digits, '.', '_' and '-'")
      .default("mcp-server"),
    SERVICE_COMMAND: z.string().trim().min(1).default("uv run clawdchat-mcp"),
    SERVICE_DIR: z.string().optional(),
    MCP_SERVER_HOST: z.string().min(1).default("127.0.0.1"),
    MCP_SERVER_PORT: port.default(8000),
    MCP_SERVER_URL: z.string().url().optional(),
    REMOTE_HOST: z.string().optional(),
    REMOTE_USER: z.string().min(1).default("root"),
    REMOTE_PORT: port.default(22),
    REMOTE_PROJECT_DIR: z.string().min(1).default("mcp-warden"),
    REMOTE_AUTH: z.enum(["key", "password"]).default("key"),
    REMOTE_PASSWORD: z.string().optional(),
    REMOTE_IDENTITY_FILE: z.string().optional(),
    REMOTE_ARTIFACT: z.string().min(1).default("dist/main.mjs"),
  })
  .superRefine((env, ctx) => {
    if (env.REMOTE_AUTH === "password" && !env.REMOTE_PASSWORD) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["REMOTE_PASSWORD"],
        message: "is required when REMOTE_AUTH=password",
      })
    }
  })

export interface LoadConfigOptions {
  envFile?: string
  env?: NodeJS.ProcessEnv
  cwd?: string
}

// Read the env file when present. Values already in the real environment
// win over the file, matching dotenv's default of never overriding.
function readEnvFile(envFile: string): Record<string, string> {
  if (!fs.existsSync(envFile)) return {}
  return parseDotenv(fs.readFileSync(envFile))
}

function withoutEmpty(source: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== "") out[key] = value
  }
  return out
}

export function loadConfig(opts: LoadConfigOptions = {}): WardenConfig {
  const cwd = opts.cwd ?? process.cwd()
  const envFile = path.resolve(cwd, opts.envFile ?? ".env")

  const merged = {
    ...withoutEmpty(readEnvFile(envFile)),
    ...withoutEmpty(opts.env ?? process.env),
  }

  const parsed = envSchema.safeParse(merged)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    )
  }
  const env = parsed.data

  const [command, ...commandArgs] = env.SERVICE_COMMAND.split(/\s+/)
  const stateDir = path.resolve(cwd, env.SERVICE_DIR ?? ".")

  const service: ServiceConfig = {
    identity: env.SERVICE_NAME,
    host: env.MCP_SERVER_HOST,
    port: env.MCP_SERVER_PORT,
    publicUrl: (env.MCP_SERVER_URL ?? `http://localhost:${env.MCP_SERVER_PORT}`).replace(
      /\/+$/,
      "",
    ),
    command,
    commandArgs,
    paths: resolvePaths(stateDir, env.SERVICE_NAME),
  }

  const remote: RemoteConfig | null = env.REMOTE_HOST
    ? {
        host: env.REMOTE_HOST,
        user: env.REMOTE_USER,
        port: env.REMOTE_PORT,
        projectDir: env.REMOTE_PROJECT_DIR,
        auth: env.REMOTE_AUTH,
        password: env.REMOTE_PASSWORD,
        identityFile: env.REMOTE_IDENTITY_FILE,
        artifactPath: path.resolve(cwd, env.REMOTE_ARTIFACT),
      }
    : null

  return { service, remote }
}

export function requireRemote(config: WardenConfig): RemoteConfig {
  if (!config.remote) {
    throw new ConfigError(["REMOTE_HOST: is required for remote commands"])
  }
  return config.remote
}

// Arguments the supervised server gets for a transport mode. stdio is the
// server's own default, so it takes no flag.
export function modeArgs(mode: string): Array<string> {
  return mode === "stdio" ? [] : ["--transport", mode]
}
