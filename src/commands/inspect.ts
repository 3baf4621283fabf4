import { defineCommand } from "citty"
import consola from "consola"

import { EXIT_CODES } from "~/daemon/errors"
import { healthExitCode, reportHealth, reportStatus, withVerdict } from "~/lib/report"

import { commonArgs, createLocalContext, parseLineCount } from "./shared"

export const status = defineCommand({
  meta: {
    name: "status",
    description: "Show whether the service is running (read-only)",
  },
  args: commonArgs,
  run({ args }) {
    return withVerdict(async () => {
      const { controller } = createLocalContext(args)
      reportStatus(await controller.status())
      return EXIT_CODES.OK
    })
  },
})

export const logs = defineCommand({
  meta: {
    name: "logs",
    description: "Print the last lines of the service log",
  },
  args: {
    lines: {
      type: "positional",
      required: false,
      description: "Number of lines (default 50)",
    },
    ...commonArgs,
  },
  run({ args }) {
    return withVerdict(async () => {
      const { controller, config } = createLocalContext(args)
      const n = parseLineCount(args.lines)
      const lines = await controller.logs(n)

      if (lines === null) {
        consola.warn(`Log file does not exist: ${config.service.paths.LOG_PATH}`)
        return EXIT_CODES.OK
      }

      consola.info(`Last ${n} lines of ${config.service.paths.LOG_PATH}:`)
      for (const line of lines) consola.log(line)
      return EXIT_CODES.OK
    })
  },
})

export const health = defineCommand({
  meta: {
    name: "health",
    description: "Check process, port and HTTP endpoints",
  },
  args: commonArgs,
  run({ args }) {
    return withVerdict(async () => {
      const { prober } = createLocalContext(args)
      const report = await prober.check()
      reportHealth(report)
      return healthExitCode(report)
    })
  },
})
