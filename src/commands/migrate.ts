import { intro, log, outro, spinner } from "@clack/prompts"

import { loadConfig, type MigrationConfig, statePaths } from "../lib/config"
import { describeError } from "../lib/errors"
import { RunLogger } from "../lib/logger"
import { toTildePath } from "../lib/paths"
import { createPreRunBackup } from "../migrate/backup"
import type { MigrationRunResult } from "../migrate/contracts"
import { validateEnvironment } from "../migrate/environment"
import { PathResolver } from "../migrate/path-resolver"
import { ProgressFile } from "../migrate/progress"
import { retryPolicyFrom } from "../migrate/queue"
import { Registry } from "../migrate/registry"
import { buildReport, formatFailureLine, formatReport, writeReport } from "../migrate/report"
import { runMigration } from "../migrate/scheduler"
import { TransferExecutor } from "../migrate/transfer"
import { IntegrityVerifier } from "../migrate/verify"

const PROGRESS_TICKER_FRAMES = ["", ".", "..", "..."] as const
const FAILURE_PREVIEW_LIMIT = 20

export interface MigrateOptions {
  configPath?: string | undefined
  category?: string | undefined
  limit?: number | undefined
  dryRun: boolean
  batchSize?: number | undefined
  parallelJobs?: number | undefined
}

function startProgressTicker(progressSpinner: ReturnType<typeof spinner>): {
  setMessage: (message: string) => void
  stop: (message: string) => void
} {
  let baseMessage = "Migration in progress"
  let frameIndex = 0

  progressSpinner.start(baseMessage)

  const interval = setInterval(() => {
    frameIndex = (frameIndex + 1) % PROGRESS_TICKER_FRAMES.length
    progressSpinner.message(`${baseMessage}${PROGRESS_TICKER_FRAMES[frameIndex]}`)
  }, 150)
  interval.unref?.()

  return {
    setMessage(message: string): void {
      const trimmed = message.trim()
      if (trimmed.length === 0) {
        return
      }

      baseMessage = trimmed
      progressSpinner.message(`${baseMessage}${PROGRESS_TICKER_FRAMES[frameIndex]}`)
    },
    stop(message: string): void {
      clearInterval(interval)
      progressSpinner.stop(message)
    },
  }
}

function listenForShutdown(controller: AbortController, logger: RunLogger): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      process.exit(130)
    }

    logger.warn(`Received ${signal}; letting in-flight items finish before stopping (repeat to exit now)`)
    controller.abort()
  }

  process.on("SIGINT", onSignal)
  process.on("SIGTERM", onSignal)

  return () => {
    process.off("SIGINT", onSignal)
    process.off("SIGTERM", onSignal)
  }
}

function describeRun(config: MigrationConfig, options: MigrateOptions): string {
  return [
    `Source: ${toTildePath(config.sourceRoot)}`,
    `Archive: ${toTildePath(config.archiveRoot)}`,
    `Registry: ${toTildePath(config.registryPath)}`,
    `Category: ${options.category ?? "all"}`,
    `Limit: ${options.limit && options.limit > 0 ? options.limit : "none"}`,
    `Batch size: ${config.batchSize}, parallel jobs: ${config.parallelJobs}`,
  ].join("\n")
}

function summarizeRun(result: MigrationRunResult, logger: RunLogger): void {
  if (result.failed === 0) {
    logger.success(`Migrated ${result.migrated} item(s) with no failures`)
    return
  }

  const preview = result.failures.slice(0, FAILURE_PREVIEW_LIMIT).map((entry) => `- ${formatFailureLine(entry)}`)
  if (result.failures.length > FAILURE_PREVIEW_LIMIT) {
    preview.push(`- ... ${result.failures.length - FAILURE_PREVIEW_LIMIT} more listed in the report`)
  }

  logger.warn(`Migrated ${result.migrated} item(s); ${result.failed} failed this run:\n${preview.join("\n")}`)
}

export async function runMigrate(options: MigrateOptions): Promise<void> {
  intro("tiermove - Migrate project bundles")

  const config = await loadConfig({
    configPath: options.configPath,
    overrides: {
      ...(options.dryRun ? { dryRun: true } : {}),
      ...(options.batchSize !== undefined ? { batchSize: options.batchSize } : {}),
      ...(options.parallelJobs !== undefined ? { parallelJobs: options.parallelJobs } : {}),
    },
  })
  const paths = statePaths(config)
  const logger = new RunLogger(paths.logPath)

  try {
    logger.info("Starting project migration")
    log.message(describeRun(config, options))
    if (config.dryRun) {
      logger.warn("DRY RUN MODE - no files will be copied")
    }

    await validateEnvironment(config, logger)
    const registry = Registry.open(config.registryPath)

    const controller = new AbortController()
    const stopListening = listenForShutdown(controller, logger)

    try {
      await createPreRunBackup(registry, config, logger)

      const progressTicker = startProgressTicker(spinner())
      let result: MigrationRunResult
      try {
        result = await runMigration(
          {
            category: options.category,
            limit: options.limit,
            dryRun: config.dryRun,
            batchSize: config.batchSize,
            parallelJobs: config.parallelJobs,
            batchPauseMs: config.batchPauseMs,
            removeSourceAfterMigration: config.removeSourceAfterMigration,
            retryPolicy: retryPolicyFrom(config),
            signal: controller.signal,
            onProgress: (message) => progressTicker.setMessage(message),
          },
          {
            registry,
            resolver: new PathResolver({
              archiveRoot: config.archiveRoot,
              categoryDirectories: config.categoryDirectories,
              dryRun: config.dryRun,
            }),
            executor: new TransferExecutor({
              excludePatterns: config.excludePatterns,
              ioTimeoutMs: config.ioTimeoutSeconds * 1000,
            }),
            verifier: new IntegrityVerifier({
              excludePatterns: config.excludePatterns,
              checksum: config.checksumVerification,
            }),
            progress: new ProgressFile(paths.progressPath),
            logger,
          },
        )
      } catch (error) {
        progressTicker.stop("Migration aborted")
        throw error
      }

      progressTicker.stop(
        result.stoppedEarly
          ? `Migration stopped early (${result.attempted}/${result.eligibleAtStart} items attempted)`
          : `Migration complete (${result.attempted} items attempted)`,
      )

      summarizeRun(result, logger)

      const reportText = formatReport(buildReport(registry, config))
      await writeReport(paths.reportPath, reportText)
      log.message(reportText)
      logger.info(`Migration report saved to: ${paths.reportPath}`)
    } finally {
      stopListening()
      registry.close()
    }

    outro("Migration process completed")
  } catch (error) {
    logger.record("ERROR", describeError(error))
    throw error
  } finally {
    await logger.flush()
  }
}
