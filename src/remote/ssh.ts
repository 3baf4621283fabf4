import { runCommand, type CommandResult, type CommandRunner } from "~/lib/exec"
import type { RemoteConfig } from "~/lib/config"

const CONNECT_TIMEOUT_S = 5
// Connectivity check and every short remote step (mkdir, mv, test -x)
export const REMOTE_STEP_TIMEOUT_MS = 10_000

// POSIX single-quote escaping for one word of a remote shell command
export function shellQuote(word: string): string {
  if (/^[\w@%+=:,./-]+$/.test(word)) return word
  return `'${word.replaceAll("'", `'\\''`)}'`
}

// Like shellQuote, but a leading "~/" stays unquoted so the remote shell
// still expands it to the login user's home.
export function quoteRemotePath(remotePath: string): string {
  if (remotePath === "~") return "~"
  if (remotePath.startsWith("~/")) return `~/${shellQuote(remotePath.slice(2))}`
  return shellQuote(remotePath)
}

interface Invocation {
  command: string
  args: Array<string>
  env?: NodeJS.ProcessEnv
}

/**
 * ssh/scp invocations for one remote host. Key-based auth runs in
 * BatchMode so a missing key fails fast instead of prompting. Password
 * auth goes through `sshpass -e`, which reads SSHPASS from the
 * environment rather than argv; keys are still offered before the password.
 */
export class SshTransport {
  constructor(
    private readonly remote: RemoteConfig,
    private readonly run: CommandRunner = runCommand,
  ) {}

  get target(): string {
    return `${this.remote.user}@${this.remote.host}`
  }

  // Lightweight round trip; true when the host accepted us and ran `true`
  async ping(): Promise<CommandResult> {
    return this.exec("true", { timeoutMs: REMOTE_STEP_TIMEOUT_MS })
  }

  exec(
    remoteCommand: string,
    opts: { timeoutMs?: number; stream?: boolean } = {},
  ): Promise<CommandResult> {
    const invocation = this.wrap("ssh", [
      "-p",
      String(this.remote.port),
      this.target,
      remoteCommand,
    ])
    return this.run(invocation.command, invocation.args, {
      env: invocation.env,
      timeoutMs: opts.timeoutMs,
      stdio: opts.stream ? "inherit" : "pipe",
    })
  }

  copy(localPath: string, remotePath: string, timeoutMs = 120_000): Promise<CommandResult> {
    const invocation = this.wrap("scp", [
      "-P",
      String(this.remote.port),
      localPath,
      `${this.target}:${remotePath}`,
    ])
    return this.run(invocation.command, invocation.args, {
      env: invocation.env,
      timeoutMs,
    })
  }

  private wrap(binary: "ssh" | "scp", args: Array<string>): Invocation {
    const common = [
      "-o",
      `ConnectTimeout=${CONNECT_TIMEOUT_S}`,
      "-o",
      "StrictHostKeyChecking=accept-new",
    ]

    const identity = this.remote.identityFile ? ["-i", this.remote.identityFile] : []

    if (this.remote.auth === "password" && this.remote.password) {
      return {
        command: "sshpass",
        args: [
          "-e",
          binary,
          ...common,
          "-o",
          "PreferredAuthentications=publickey,password",
          ...identity,
          ...args,
        ],
        env: { ...process.env, SSHPASS: this.remote.password },
      }
    }

    return {
      command: binary,
      args: [...common, "-o", "BatchMode=yes", ...identity, ...args],
    }
  }
}
