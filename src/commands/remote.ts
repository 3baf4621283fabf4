import { defineCommand } from "citty"
import consola from "consola"

import { EXIT_CODES } from "~/daemon/errors"
import { DEFAULT_MODE, requireRemote } from "~/lib/config"
import { withVerdict } from "~/lib/report"
import { RemoteProxy, type RemoteVerb } from "~/remote/proxy"
import { SshTransport } from "~/remote/ssh"

import { commonArgs, loadContext, type CommonArgs } from "./shared"

function createProxy(args: CommonArgs): RemoteProxy {
  const remote = requireRemote(loadContext(args))
  return new RemoteProxy(remote, new SshTransport(remote))
}

function dispatch(args: CommonArgs, verb: RemoteVerb, extra: Array<string> = []) {
  return withVerdict(() => createProxy(args).dispatch(verb, extra))
}

// Verbs taking one optional positional (mode or line count) forward it as is
function verbWithArg(name: RemoteVerb, description: string, argDescription: string) {
  return defineCommand({
    meta: { name, description },
    args: {
      arg: { type: "positional", required: false, description: argDescription },
      ...commonArgs,
    },
    run({ args }) {
      return dispatch(args, name, args.arg ? [args.arg] : [])
    },
  })
}

function verb(name: RemoteVerb, description: string) {
  return defineCommand({
    meta: { name, description },
    args: commonArgs,
    run({ args }) {
      return dispatch(args, name)
    },
  })
}

const upload = defineCommand({
  meta: {
    name: "upload",
    description: "Copy the bundled warden to the remote project directory",
  },
  args: commonArgs,
  run({ args }) {
    return withVerdict(async () => {
      const proxy = createProxy(args)
      const result = await proxy.upload()
      consola.success(`Uploaded ${result.bytes} bytes to ${result.remotePath}`)
      return EXIT_CODES.OK
    })
  },
})

const deploy = defineCommand({
  meta: {
    name: "deploy",
    description: "Upload the warden, restart the remote service and check its health",
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
    return withVerdict(() => createProxy(args).deploy(args.mode))
  },
})

export const remote = defineCommand({
  meta: {
    name: "remote",
    description: "Run a lifecycle command on the remote host over ssh",
  },
  subCommands: {
    upload,
    deploy,
    start: verbWithArg("start", "Start the remote service", "Transport mode"),
    stop: verb("stop", "Stop the remote service"),
    restart: verbWithArg("restart", "Restart the remote service", "Transport mode"),
    status: verb("status", "Show remote service status"),
    logs: verbWithArg("logs", "Print the remote service log tail", "Number of lines"),
    health: verb("health", "Health-check the remote service"),
  },
})
