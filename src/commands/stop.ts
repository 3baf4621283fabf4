import { defineCommand } from "citty"

import { EXIT_CODES } from "~/daemon/errors"
import { reportStop, withVerdict } from "~/lib/report"

import { commonArgs, createLocalContext } from "./shared"

export const stop = defineCommand({
  meta: {
    name: "stop",
    description: "Stop the service and anything else holding its port",
  },
  args: commonArgs,
  run({ args }) {
    return withVerdict(async () => {
      const { controller } = createLocalContext(args)
      reportStop(await controller.stop())
      return EXIT_CODES.OK
    })
  },
})
