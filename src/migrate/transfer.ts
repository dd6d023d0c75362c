import { createReadStream, createWriteStream, type Stats } from "node:fs"
import { chmod, lstat, mkdir, readdir, readlink, rm, symlink, utimes } from "node:fs/promises"
import { basename, join } from "node:path"
import { pipeline } from "node:stream/promises"

import { TimeoutError, withTimeout } from "../lib/concurrency"
import { errorCode, errorMessage, isEnoent } from "../lib/errors"
import { createExcludeMatcher, type NameMatcher } from "./artifacts"
import type { FailureKind, ItemFailure, ItemKind, TransferOutcome } from "./contracts"

export interface TransferExecutorOptions {
  excludePatterns: readonly string[]
  // 0 disables the bound.
  ioTimeoutMs: number
}

export type SourceInspection = { ok: true; kind: ItemKind } | { ok: false; failure: ItemFailure }

export interface Transferer {
  inspect(sourcePath: string): Promise<SourceInspection>
  transfer(sourcePath: string, targetPath: string, dryRun: boolean): Promise<TransferOutcome>
}

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof TimeoutError) {
    return "timeout"
  }

  const code = errorCode(error)
  switch (code) {
    case "ENOENT":
      return "source-missing"
    case "EACCES":
    case "EPERM":
    case "EROFS":
      return "permission-denied"
    case "ENOSPC":
    case "EDQUOT":
      return "disk-full"
    case undefined:
      return "unknown"
    default:
      return "io-error"
  }
}

export function toFailure(error: unknown): ItemFailure {
  return { kind: classifyFailure(error), message: errorMessage(error) }
}

async function lstatOrNull(path: string): Promise<Stats | null> {
  try {
    return await lstat(path)
  } catch (error) {
    if (isEnoent(error)) {
      return null
    }
    throw error
  }
}

async function applyMetadata(path: string, stats: Stats): Promise<void> {
  await chmod(path, stats.mode & 0o7777)
  await utimes(path, stats.atime, stats.mtime)
}

/**
 * Copies one item into the archive, keeping modes, timestamps and symlinks as they are. A rerun on
 * the same pair replaces what the previous run left and drops target entries the source no longer
 * has, so interrupted copies converge instead of piling up. The source is never modified.
 *
 * The timeout aborts the copy between entries and inside file streams; a timed-out transfer has
 * stopped writing by the time it reports failure.
 */
export class TransferExecutor implements Transferer {
  private readonly isExcluded: NameMatcher

  constructor(private readonly options: TransferExecutorOptions) {
    this.isExcluded = createExcludeMatcher(options.excludePatterns)
  }

  async inspect(sourcePath: string): Promise<SourceInspection> {
    try {
      const stats = await lstat(sourcePath)
      return { ok: true, kind: stats.isDirectory() ? "directory" : "file" }
    } catch (error) {
      return { ok: false, failure: toFailure(error) }
    }
  }

  async transfer(sourcePath: string, targetPath: string, dryRun: boolean): Promise<TransferOutcome> {
    if (dryRun) {
      return { ok: true }
    }

    try {
      await withTimeout(
        (signal) => this.copyEntry(sourcePath, targetPath, signal),
        this.options.ioTimeoutMs,
        `Transfer of ${basename(sourcePath)}`,
      )
      return { ok: true }
    } catch (error) {
      return { ok: false, failure: toFailure(error) }
    }
  }

  private async copyEntry(sourcePath: string, targetPath: string, signal: AbortSignal): Promise<void> {
    signal.throwIfAborted()
    const stats = await lstat(sourcePath)

    if (stats.isDirectory()) {
      await this.copyDirectory(sourcePath, targetPath, stats, signal)
      return
    }

    // Covers the empty placeholder that reserved the name and anything an earlier run left.
    if (await lstatOrNull(targetPath)) {
      await rm(targetPath, { recursive: true, force: true })
    }

    if (stats.isSymbolicLink()) {
      await symlink(await readlink(sourcePath), targetPath)
      return
    }

    if (!stats.isFile()) {
      throw new Error(`Unsupported file type: ${sourcePath}`)
    }

    await pipeline(createReadStream(sourcePath), createWriteStream(targetPath), { signal })
    await applyMetadata(targetPath, stats)
  }

  private async copyDirectory(sourceDir: string, targetDir: string, stats: Stats, signal: AbortSignal): Promise<void> {
    const existing = await lstatOrNull(targetDir)
    if (existing && !existing.isDirectory()) {
      await rm(targetDir, { force: true })
    }
    await mkdir(targetDir, { recursive: true })

    const [sourceNames, targetNames] = await Promise.all([readdir(sourceDir), readdir(targetDir)])
    const kept = new Set(sourceNames.filter((name) => !this.isExcluded(name)))

    for (const name of targetNames) {
      if (!kept.has(name)) {
        await rm(join(targetDir, name), { recursive: true, force: true })
      }
    }

    for (const name of kept) {
      await this.copyEntry(join(sourceDir, name), join(targetDir, name), signal)
    }

    await applyMetadata(targetDir, stats)
  }
}

export async function removeSource(sourcePath: string): Promise<void> {
  await rm(sourcePath, { recursive: true, force: true })
}
