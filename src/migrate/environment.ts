import { constants } from "node:fs"
import { access, statfs } from "node:fs/promises"

import type { MigrationConfig } from "../lib/config"
import { EnvironmentError, errorMessage } from "../lib/errors"
import { isDirectory } from "../lib/fs"
import type { Logger } from "../lib/logger"

const GIB = 1024 ** 3
const LOW_SPACE_WARNING_BYTES = 10 * GIB

/**
 * Fatal pre-run checks. Nothing here writes to either volume, so it is safe in dry-run mode.
 */
export async function validateEnvironment(
  config: Pick<MigrationConfig, "sourceRoot" | "archiveRoot">,
  logger: Logger,
): Promise<void> {
  logger.debug("Validating migration environment")

  if (!(await isDirectory(config.sourceRoot))) {
    throw new EnvironmentError("SOURCE_MISSING", `Source directory not found: ${config.sourceRoot}`)
  }

  if (!(await isDirectory(config.archiveRoot))) {
    throw new EnvironmentError("ARCHIVE_MISSING", `Archive directory not found: ${config.archiveRoot}`)
  }

  try {
    await access(config.archiveRoot, constants.W_OK)
  } catch (error) {
    throw new EnvironmentError(
      "ARCHIVE_UNWRITABLE",
      `Cannot write to archive directory: ${config.archiveRoot}`,
      errorMessage(error),
    )
  }

  try {
    const stats = await statfs(config.archiveRoot)
    const freeBytes = stats.bavail * stats.bsize
    logger.debug(`Archive free space: ${(freeBytes / GIB).toFixed(1)}GB`)
    if (freeBytes < LOW_SPACE_WARNING_BYTES) {
      logger.warn(
        `Low disk space on archive (${(freeBytes / GIB).toFixed(1)}GB free). Consider freeing space or using smaller batches.`,
      )
    }
  } catch (error) {
    logger.debug(`Could not read archive free space: ${errorMessage(error)}`)
  }

  logger.debug("Environment validation passed")
}
