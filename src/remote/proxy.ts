import consola from "consola"
import fs from "node:fs/promises"
import path from "node:path"

import { CommandFailedError, EXIT_CODES, TransportUnavailableError } from "~/daemon/errors"
import type { RemoteConfig } from "~/lib/config"
import type { CommandResult } from "~/lib/exec"

import { quoteRemotePath, REMOTE_STEP_TIMEOUT_MS, shellQuote, type SshTransport } from "./ssh"

export type RemoteVerb = "start" | "stop" | "restart" | "status" | "logs" | "health"

// restart waits for a full stop (≤ 11 s) and a full start (≤ 15 s)
const VERB_TIMEOUT_MS = 120_000

export interface UploadResult {
  remotePath: string
  bytes: number
}

/**
 * Runs the warden's own verbs on a remote host. The remote side is the same
 * bundled CLI, uploaded once with upload(); nothing here reconciles state.
 */
export class RemoteProxy {
  constructor(
    private readonly remote: RemoteConfig,
    private readonly ssh: SshTransport,
  ) {}

  get artifactName(): string {
    return path.basename(this.remote.artifactPath)
  }

  get remoteArtifactPath(): string {
    return path.posix.join(this.remote.projectDir, this.artifactName)
  }

  // Checked before anything that touches the remote host
  async ensureReachable(): Promise<void> {
    consola.info(`Checking ssh connectivity to ${this.ssh.target}:${this.remote.port}...`)
    let detail: string
    try {
      const result = await this.ssh.ping()
      if (result.code === 0) return
      detail = result.timedOut
        ? "connectivity check timed out"
        : result.stderr.trim() || `ssh exited with ${result.code}`
    } catch (error) {
      // ssh or sshpass not installed
      detail = error instanceof Error ? error.message : String(error)
    }
    throw new TransportUnavailableError(this.ssh.target, detail)
  }

  // Copies the local bundle to <projectDir>/<name>: temp file, rename,
  // chmod. Re-running overwrites the previous copy.
  async upload(): Promise<UploadResult> {
    const local = this.remote.artifactPath
    let bytes: number
    try {
      bytes = (await fs.stat(local)).size
    } catch {
      throw new CommandFailedError(`Artifact ${local} not found; run \`npm run build\` first`)
    }

    await this.ensureReachable()

    const dir = quoteRemotePath(this.remote.projectDir)
    const finalPath = this.remoteArtifactPath
    const tmpPath = `${finalPath}.upload`

    await this.mustSucceed(`mkdir -p ${dir}`, "create remote directory")

    consola.info(`Uploading ${local} → ${this.ssh.target}:${finalPath}`)
    const copied = await this.ssh.copy(local, tmpPath)
    if (copied.timedOut) {
      throw new CommandFailedError(`Artifact upload to ${this.ssh.target} timed out`)
    }
    if (copied.code !== 0) {
      throw new CommandFailedError("Artifact upload failed", [copied.stderr.trim()])
    }

    await this.mustSucceed(
      `mv -f ${quoteRemotePath(tmpPath)} ${quoteRemotePath(finalPath)} && chmod 755 ${quoteRemotePath(finalPath)}`,
      "install artifact",
    )

    return { remotePath: finalPath, bytes }
  }

  // Runs `<artifact> <verb> [args]` remotely, streaming its output.
  // Resolves with the remote exit code.
  async dispatch(verb: RemoteVerb, args: Array<string> = []): Promise<number> {
    await this.ensureReachable()

    const artifact = quoteRemotePath(this.remoteArtifactPath)
    const present = await this.step(`test -x ${artifact}`, "look for the warden")
    if (present.code !== 0) {
      throw new CommandFailedError(
        `No executable warden at ${this.ssh.target}:${this.remoteArtifactPath}; run \`remote upload\` first`,
      )
    }

    const command = [
      `cd ${quoteRemotePath(this.remote.projectDir)}`,
      "&&",
      `./${shellQuote(this.artifactName)}`,
      verb,
      ...args.map(shellQuote),
    ].join(" ")

    const result = await this.ssh.exec(command, { stream: true, timeoutMs: VERB_TIMEOUT_MS })
    if (result.code === null) {
      throw new CommandFailedError(`Remote ${verb} did not finish within ${VERB_TIMEOUT_MS / 1000}s`)
    }
    return result.code
  }

  // upload, then the remote restart and health; the first non-zero
  // remote exit code ends the flow
  async deploy(mode: string): Promise<number> {
    const uploaded = await this.upload()
    consola.success(`Uploaded ${uploaded.bytes} bytes to ${uploaded.remotePath}`)

    const restarted = await this.dispatch("restart", [mode])
    if (restarted !== EXIT_CODES.OK) return restarted
    return this.dispatch("health")
  }

  private async step(remoteCommand: string, what: string): Promise<CommandResult> {
    const result = await this.ssh.exec(remoteCommand, { timeoutMs: REMOTE_STEP_TIMEOUT_MS })
    if (result.timedOut) {
      throw new CommandFailedError(
        `Timed out after ${REMOTE_STEP_TIMEOUT_MS / 1000}s trying to ${what} on ${this.ssh.target}`,
      )
    }
    return result
  }

  private async mustSucceed(remoteCommand: string, what: string): Promise<void> {
    const result = await this.step(remoteCommand, what)
    if (result.code !== 0) {
      throw new CommandFailedError(`Failed to ${what} on ${this.ssh.target}`, [
        result.stderr.trim(),
      ])
    }
  }
}
