import { mkdir } from "node:fs/promises"
import { join } from "node:path"

import { backupStamp, chooseNumberedBackupPath } from "../lib/backups"
import type { MigrationConfig } from "../lib/config"
import { errorMessage } from "../lib/errors"
import type { Logger } from "../lib/logger"
import type { Registry } from "./registry"

export const BACKUP_FILENAME = "registry_backup.db"

export function backupsDirectory(archiveRoot: string): string {
  return join(archiveRoot, "00_MAINTENANCE", "backups")
}

/**
 * Snapshots the registry before anything mutates it. Best effort: a failure is logged as a warning
 * and the run carries on. Returns the snapshot path when one was written.
 */
export async function createPreRunBackup(
  registry: Pick<Registry, "backupTo">,
  config: Pick<MigrationConfig, "archiveRoot" | "backupBeforeMigrate" | "dryRun">,
  logger: Logger,
  now = new Date(),
): Promise<string | undefined> {
  if (!config.backupBeforeMigrate) {
    logger.debug("Pre-run registry backup disabled")
    return undefined
  }

  if (config.dryRun) {
    logger.info("DRY RUN: skipping pre-run registry backup")
    return undefined
  }

  try {
    const { backupPath } = await chooseNumberedBackupPath(
      backupsDirectory(config.archiveRoot),
      `pre_migration_${backupStamp(now)}`,
    )
    await mkdir(backupPath, { recursive: true })

    const snapshotPath = join(backupPath, BACKUP_FILENAME)
    await registry.backupTo(snapshotPath)
    logger.info(`Registry backup created: ${snapshotPath}`)
    return snapshotPath
  } catch (error) {
    logger.warn(`Failed to create registry backup: ${errorMessage(error)}`)
    return undefined
  }
}
