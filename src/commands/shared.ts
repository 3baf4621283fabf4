import consola from "consola"

import { LifecycleController } from "~/daemon/controller"
import { createPidRecord } from "~/daemon/pid"
import { createSystemProbe } from "~/daemon/probe"
import { createSystemDriver } from "~/daemon/spawner"
import { HealthProber } from "~/health/prober"
import { CommandFailedError } from "~/daemon/errors"
import { loadConfig, type WardenConfig } from "~/lib/config"

// Flags every command accepts
export const commonArgs = {
  "env-file": {
    type: "string",
    default: ".env",
    description: "Env file holding the service and remote settings",
  },
  verbose: {
    alias: "v",
    type: "boolean",
    default: false,
    description: "Enable verbose logging",
  },
} as const

export interface CommonArgs {
  "env-file": string
  verbose: boolean
}

export interface LocalContext {
  config: WardenConfig
  controller: LifecycleController
  prober: HealthProber
}

export function loadContext(args: CommonArgs): WardenConfig {
  if (args.verbose) {
    consola.level = 5
    consola.debug("Verbose logging enabled")
  }
  return loadConfig({ envFile: args["env-file"] })
}

export function createLocalContext(args: CommonArgs): LocalContext {
  const config = loadContext(args)
  const probe = createSystemProbe()
  const pidRecord = createPidRecord(config.service.paths.PID_PATH)

  return {
    config,
    controller: new LifecycleController(config.service, {
      probe,
      driver: createSystemDriver(),
      pidRecord,
    }),
    prober: new HealthProber(config.service, { probe, pidRecord }),
  }
}

export function parseLineCount(raw: string | undefined, fallback = 50): number {
  if (raw === undefined) return fallback
  if (!/^\d+$/.test(raw)) {
    throw new CommandFailedError(`Invalid line count: ${raw}`)
  }
  return Number.parseInt(raw, 10)
}
