import { lstat, rm } from "node:fs/promises"
import { join } from "node:path"

import { type MigrationConfig, statePaths } from "../lib/config"
import { isDirectory, walkTree } from "../lib/fs"

const DAY_MS = 24 * 60 * 60 * 1000
const TEMP_FILE_MAX_AGE_DAYS = 1

export interface CleanupResult {
  removedTempFiles: string[]
  removedLogs: string[]
}

async function removeOlderThan(
  rootDir: string,
  matches: (name: string) => boolean,
  cutoffMs: number,
): Promise<string[]> {
  if (!(await isDirectory(rootDir))) {
    return []
  }

  const removed: string[] = []
  for (const entry of await walkTree(rootDir)) {
    const name = entry.relativePath.split("/").at(-1) ?? ""
    if (entry.kind !== "file" || !matches(name)) {
      continue
    }

    const path = join(rootDir, ...entry.relativePath.split("/"))
    const stats = await lstat(path)
    if (stats.mtimeMs >= cutoffMs) {
      continue
    }

    await rm(path, { force: true })
    removed.push(path)
  }

  return removed
}

/**
 * Prunes leftovers under the state directory: `*.tmp` files older than a day, and run logs older
 * than the retention window. A retention of 0 keeps logs forever.
 */
export async function cleanupStateDir(
  config: Pick<MigrationConfig, "stateDir" | "logRetentionDays">,
  now = new Date(),
): Promise<CleanupResult> {
  const removedTempFiles = await removeOlderThan(
    config.stateDir,
    (name) => name.endsWith(".tmp"),
    now.getTime() - TEMP_FILE_MAX_AGE_DAYS * DAY_MS,
  )

  const removedLogs =
    config.logRetentionDays > 0
      ? await removeOlderThan(
          statePaths(config).logsDir,
          (name) => name.endsWith(".log"),
          now.getTime() - config.logRetentionDays * DAY_MS,
        )
      : []

  return { removedTempFiles, removedLogs }
}
