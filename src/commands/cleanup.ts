import { intro, log, outro } from "@clack/prompts"

import { loadConfig } from "../lib/config"
import { toTildePath } from "../lib/paths"
import { cleanupStateDir } from "../migrate/housekeeping"

export interface CleanupOptions {
  configPath?: string | undefined
}

export async function runCleanup(options: CleanupOptions): Promise<void> {
  intro("tiermove - Cleanup")

  const config = await loadConfig({ configPath: options.configPath })
  const result = await cleanupStateDir(config)

  for (const path of [...result.removedTempFiles, ...result.removedLogs]) {
    log.message(`Removed ${toTildePath(path)}`)
  }

  outro(
    `Cleanup completed (${result.removedTempFiles.length} temp file(s), ${result.removedLogs.length} log file(s) removed)`,
  )
}
