#!/usr/bin/env node

import { defineCommand, runMain } from "citty"

import { restart, start } from "./commands/start"
import { health, logs, status } from "./commands/inspect"
import { remote } from "./commands/remote"
import { stop } from "./commands/stop"

const main = defineCommand({
  meta: {
    name: "mcp-warden",
    description: "Start, stop and inspect the MCP server, locally or over ssh",
  },
  subCommands: {
    start,
    stop,
    restart,
    status,
    logs,
    health,
    remote,
  },
})

void runMain(main)
