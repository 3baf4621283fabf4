import fs from "node:fs/promises"
import path from "node:path"

// Validate that a process with the given PID actually exists.
// EPERM means it exists but belongs to another user.
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    return isErrnoException(err) && err.code === "EPERM"
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err
}

export interface PidRecord {
  readonly path: string
  read: () => Promise<number | null>
  write: (pid: number) => Promise<void>
  remove: () => Promise<void>
}

/**
 * The on-disk pid record of one service identity: a plain-text file holding
 * a single integer. Reads treat a missing or corrupted file as "no record".
 */
export function createPidRecord(pidPath: string): PidRecord {
  const dir = path.dirname(pidPath)
  const base = path.basename(pidPath)

  async function clearStaleTemps(): Promise<void> {
    let entries: Array<string>
    try {
      entries = await fs.readdir(dir)
    } catch {
      return
    }
    for (const entry of entries) {
      if (entry.startsWith(`${base}.`) && entry.endsWith(".tmp")) {
        await fs.rm(path.join(dir, entry), { force: true })
      }
    }
  }

  return {
    path: pidPath,

    async read() {
      let content: string
      try {
        content = await fs.readFile(pidPath, "utf8")
      } catch {
        return null
      }
      const trimmed = content.trim()
      if (!/^\d+$/.test(trimmed)) return null
      const pid = Number(trimmed)
      return pid > 0 ? pid : null
    },

    // Temp file + rename so a reader never sees a half-written record
    async write(pid) {
      await fs.mkdir(dir, { recursive: true })
      await clearStaleTemps()

      const tmp = `${pidPath}.${process.pid}.tmp`
      await fs.writeFile(tmp, `${pid}\n`, { mode: 0o600 })

      let retries = 3
      while (true) {
        try {
          await fs.rename(tmp, pidPath)
          return
        } catch (err) {
          retries--
          if (retries === 0) {
            await fs.rm(tmp, { force: true })
            throw new Error(`Failed to write pid record ${pidPath}: ${String(err)}`)
          }
          await new Promise((r) => setTimeout(r, 50))
        }
      }
    },

    async remove() {
      await fs.rm(pidPath, { force: true })
    },
  }
}
