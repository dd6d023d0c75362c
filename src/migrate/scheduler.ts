import { nanoid } from "nanoid"

import { forEachConcurrent, sleep } from "../lib/concurrency"
import { errorMessage } from "../lib/errors"
import { type Logger, silentLogger } from "../lib/logger"
import type {
  FailedItemSummary,
  ItemFailure,
  ItemKind,
  MigrationItem,
  MigrationRunResult,
  RetryPolicy,
} from "./contracts"
import type { PathResolver } from "./path-resolver"
import type { ProgressSink } from "./progress"
import { QueueSelector } from "./queue"
import type { Registry } from "./registry"
import { removeSource, toFailure, type Transferer } from "./transfer"
import type { Verifier } from "./verify"

export const INTEGRITY_MISMATCH_MESSAGE = "Checksum verification failed"

export type SchedulerRegistry = Pick<
  Registry,
  "selectPending" | "countEligible" | "recordAttempt" | "markMigrated" | "markFailed"
>

export interface SchedulerDependencies {
  registry: SchedulerRegistry
  resolver: Pick<PathResolver, "resolveTargetDir" | "resolveConflictFreePath" | "reclaim">
  executor: Transferer
  verifier: Verifier
  progress?: ProgressSink | undefined
  logger?: Logger | undefined
  removeSource?: ((sourcePath: string) => Promise<void>) | undefined
  pause?: ((ms: number) => Promise<void>) | undefined
}

export interface MigrationRunOptions {
  category?: string | undefined
  // Total items this run may dispatch; 0 means no ceiling.
  limit?: number | undefined
  dryRun: boolean
  batchSize: number
  parallelJobs: number
  batchPauseMs: number
  removeSourceAfterMigration: boolean
  retryPolicy: RetryPolicy
  runId?: string | undefined
  // Once aborted, no new item is dispatched; items already running finish.
  signal?: AbortSignal | undefined
  onProgress?: ((message: string) => void) | undefined
}

type ItemResult =
  | { status: "migrated"; targetPath: string }
  | { status: "failed"; failure: ItemFailure }
  | { status: "skipped" }

type TargetPreparation = { ok: true; targetPath: string } | { ok: false; failure: ItemFailure }

/**
 * Drains the eligible queue in batches. Each batch goes to a pool of `parallelJobs` workers and is
 * fully settled, registry writes included, before the next batch is fetched.
 */
export async function runMigration(
  options: MigrationRunOptions,
  deps: SchedulerDependencies,
): Promise<MigrationRunResult> {
  const logger = deps.logger ?? silentLogger
  const pause = deps.pause ?? sleep
  const runId = options.runId ?? nanoid()
  const queue = new QueueSelector(deps.registry, runId, options.retryPolicy, options.category)

  const ceiling = options.limit && options.limit > 0 ? Math.floor(options.limit) : Number.POSITIVE_INFINITY
  const batchSize = Math.max(1, Math.floor(options.batchSize))
  const eligibleAtStart = queue.count()
  const itemsTotal = Math.min(eligibleAtStart, ceiling)

  const result: MigrationRunResult = {
    runId,
    eligibleAtStart,
    attempted: 0,
    migrated: 0,
    failed: 0,
    failures: [],
    stoppedEarly: false,
  }

  if (eligibleAtStart === 0) {
    logger.info("No items to migrate")
    return result
  }

  logger.info(
    `Starting migration run ${runId}: ${itemsTotal} item(s), batch size ${batchSize}, parallel jobs ${options.parallelJobs}`,
  )

  let dispatched = 0
  let settled = 0
  let active = 0

  const reportProgress = (): void => {
    options.onProgress?.(
      `Progress: ${settled}/${itemsTotal} items complete (${result.failed} failed, ${active} active)`,
    )
  }

  const processItem = async (item: MigrationItem): Promise<void> => {
    if (options.signal?.aborted) {
      return
    }

    active += 1
    reportProgress()

    let outcome: ItemResult
    try {
      outcome = await migrateItem(item, runId, options, deps, logger)
    } finally {
      active -= 1
    }

    if (outcome.status === "skipped") {
      reportProgress()
      return
    }

    result.attempted += 1
    settled += 1

    if (outcome.status === "migrated") {
      result.migrated += 1
    } else {
      result.failed += 1
      result.failures.push(summarizeFailure(item, outcome.failure))
    }

    if (deps.progress) {
      try {
        await deps.progress.record({
          itemsDone: settled,
          itemsTotal,
          lastItemName: item.displayName,
          updatedAt: new Date().toISOString(),
        })
      } catch (error) {
        logger.warn(`Could not write progress file: ${errorMessage(error)}`)
      }
    }

    reportProgress()
  }

  reportProgress()

  while (dispatched < ceiling) {
    if (options.signal?.aborted) {
      result.stoppedEarly = true
      break
    }

    const requested = Math.min(batchSize, ceiling - dispatched)
    const batch = queue.next(requested)
    if (batch.length === 0) {
      logger.debug("No more items to process")
      break
    }

    logger.debug(`Processing batch: ${dispatched + 1}-${dispatched + batch.length} of ${itemsTotal}`)
    await forEachConcurrent(batch, options.parallelJobs, processItem)
    dispatched += batch.length

    if (batch.length < requested || dispatched >= ceiling || options.signal?.aborted) {
      continue
    }

    if (options.batchPauseMs > 0) {
      await pause(options.batchPauseMs)
    }
  }

  if (options.signal?.aborted) {
    result.stoppedEarly = true
  }

  logger.info(
    `Migration run ${runId} finished: ${result.attempted}/${itemsTotal} attempted, ${result.migrated} migrated, ${result.failed} failed`,
  )
  return result
}

async function migrateItem(
  item: MigrationItem,
  runId: string,
  options: MigrationRunOptions,
  deps: SchedulerDependencies,
  logger: Logger,
): Promise<ItemResult> {
  logger.debug(`Processing: ${item.displayName} (priority ${item.priority}, attempt ${item.attempts + 1})`)

  const preparation = await prepareTarget(item, options.dryRun, deps)
  const plannedTarget = preparation.ok ? preparation.targetPath : item.plannedTargetPath

  // Registry errors are not caught below: losing the registry aborts the run.
  if (!deps.registry.recordAttempt(item.id, runId, plannedTarget ?? null)) {
    logger.warn(`Skipping ${item.displayName}: item is no longer eligible`)
    return { status: "skipped" }
  }

  if (!preparation.ok) {
    return fail(item, preparation.failure, deps, logger)
  }

  const { targetPath } = preparation
  logger.debug(`Migrating: ${item.sourcePath} -> ${targetPath}`)

  const transfer = await deps.executor.transfer(item.sourcePath, targetPath, options.dryRun)
  if (!transfer.ok) {
    return fail(item, transfer.failure, deps, logger)
  }

  if (options.dryRun) {
    logger.debug(`DRY RUN: would copy ${item.sourcePath} to ${targetPath}`)
  } else if (!(await deps.verifier.verify(item.sourcePath, targetPath))) {
    return fail(item, { kind: "integrity-mismatch", message: INTEGRITY_MISMATCH_MESSAGE }, deps, logger)
  }

  if (!deps.registry.markMigrated(item.id, targetPath)) {
    logger.warn(`Skipping ${item.displayName}: another run already migrated it`)
    return { status: "skipped" }
  }
  logger.debug(`Migrated: ${item.displayName} -> ${targetPath}`)

  if (options.removeSourceAfterMigration && !options.dryRun) {
    const remove = deps.removeSource ?? removeSource
    try {
      await remove(item.sourcePath)
      logger.debug(`Removed source: ${item.sourcePath}`)
    } catch (error) {
      logger.warn(`Could not remove source of ${item.displayName}: ${errorMessage(error)}`)
    }
  }

  return { status: "migrated", targetPath }
}

async function prepareTarget(
  item: MigrationItem,
  dryRun: boolean,
  deps: SchedulerDependencies,
): Promise<TargetPreparation> {
  let kind: ItemKind = "directory"
  if (!dryRun) {
    const inspection = await deps.executor.inspect(item.sourcePath)
    if (!inspection.ok) {
      return inspection
    }
    kind = inspection.kind
  }

  try {
    const targetPath = item.plannedTargetPath
      ? await deps.resolver.reclaim(item.plannedTargetPath, kind)
      : await deps.resolver.resolveConflictFreePath(
          deps.resolver.resolveTargetDir(item.category),
          item.displayName,
          kind,
        )
    return { ok: true, targetPath }
  } catch (error) {
    return { ok: false, failure: toFailure(error) }
  }
}

function fail(item: MigrationItem, failure: ItemFailure, deps: SchedulerDependencies, logger: Logger): ItemResult {
  deps.registry.markFailed(item.id, failure)
  logger.debug(`Failed to migrate ${item.displayName}: [${failure.kind}] ${failure.message}`)
  return { status: "failed", failure }
}

function summarizeFailure(item: MigrationItem, failure: ItemFailure): FailedItemSummary {
  return {
    id: item.id,
    displayName: item.displayName,
    category: item.category,
    failure,
    attempts: item.attempts + 1,
  }
}
