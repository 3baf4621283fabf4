import fs from "node:fs/promises"

// Last `n` lines of a text file, or null when the file does not exist.
// A trailing newline does not count as an empty last line.
export async function tailLines(
  filePath: string,
  n: number,
): Promise<Array<string> | null> {
  let content: string
  try {
    content = await fs.readFile(filePath, "utf8")
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null
    throw err
  }

  if (n <= 0 || content === "") return []
  const lines = content.split(/\r?\n/)
  if (lines.at(-1) === "") lines.pop()
  return lines.slice(-n)
}

export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stat = await fs.stat(filePath)
    return stat.size
  } catch {
    return null
  }
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}
