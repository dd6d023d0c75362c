import { access, lstat, mkdir, readdir, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"

export type EntryKind = "file" | "directory" | "symlink" | "other"

export interface TreeEntry {
  relativePath: string
  kind: EntryKind
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await lstat(path)
    return stats.isDirectory()
  } catch {
    return false
  }
}

/**
 * Lists every entry below `baseDir` as slash-separated relative paths, directories included.
 * `include` is asked about each entry name; a rejected directory is not descended into.
 */
export async function walkTree(
  baseDir: string,
  include: (name: string) => boolean = () => true,
  relativeDir = "",
): Promise<TreeEntry[]> {
  const currentDir = relativeDir ? join(baseDir, ...relativeDir.split("/")) : baseDir
  const entries = await readdir(currentDir, { withFileTypes: true })

  const output: TreeEntry[] = []

  for (const entry of entries) {
    if (!include(entry.name)) {
      continue
    }

    const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name

    if (entry.isDirectory()) {
      output.push({ relativePath, kind: "directory" })
      output.push(...(await walkTree(baseDir, include, relativePath)))
      continue
    }

    if (entry.isSymbolicLink()) {
      output.push({ relativePath, kind: "symlink" })
      continue
    }

    output.push({ relativePath, kind: entry.isFile() ? "file" : "other" })
  }

  return output
}

export async function writeJsonFile(path: string, value: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, `${JSON.stringify(value, null, 2)}\n`, "utf8")
}
