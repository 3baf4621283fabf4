import { defineCommand } from "citty"

import { EXIT_CODES } from "~/daemon/errors"
import { DEFAULT_MODE } from "~/lib/config"
import { reportStart, withVerdict } from "~/lib/report"

import { commonArgs, createLocalContext } from "./shared"

export const start = defineCommand({
  meta: {
    name: "start",
    description: "Start the service in the background",
  },
  args: {
    mode: {
      type: "positional",
      required: false,
      default: DEFAULT_MODE,
      description: "Transport mode passed to the server (stdio | streamable-http)",
    },
    ...commonArgs,
  },
  run({ args }) {
    return withVerdict(async () => {
      const { controller } = createLocalContext(args)
      reportStart(await controller.start(args.mode))
      return EXIT_CODES.OK
    })
  },
})

export const restart = defineCommand({
  meta: {
    name: "restart",
    description: "Stop the service (best effort), then start it",
  },
  args: {
    mode: {
      type: "positional",
      required: false,
      default: DEFAULT_MODE,
      description: "Transport mode passed to the server (stdio | streamable-http)",
    },
    ...commonArgs,
  },
  run({ args }) {
    return withVerdict(async () => {
      const { controller } = createLocalContext(args)
      reportStart(await controller.restart(args.mode))
      return EXIT_CODES.OK
    })
  },
})
