import { mkdir, open } from "node:fs/promises"
import { dirname, join } from "node:path"

import { UNCATEGORIZED_DIRECTORY } from "../lib/config"
import { errorCode } from "../lib/errors"
import { pathExists } from "../lib/fs"
import type { ItemKind } from "./contracts"

const DEFAULT_MAX_CANDIDATES = 10_000

export interface PathResolverOptions {
  archiveRoot: string
  categoryDirectories: Readonly<Record<string, string>>
  // Reserve names in memory only and never touch the archive.
  dryRun: boolean
  maxCandidates?: number | undefined
}

export function sanitizeSegment(displayName: string): string {
  const cleaned = displayName.replace(/[/\\]+/gu, "_").replace(/\0/gu, "").trim()
  if (cleaned.length === 0 || cleaned === "." || cleaned === "..") {
    return "item"
  }

  return cleaned
}

export function candidateName(baseName: string, index: number): string {
  return index === 0 ? baseName : `${baseName}_${index}`
}

/**
 * Maps categories to archive tiers and hands out target paths that no other item holds.
 *
 * In live mode a name is taken by creating it exclusively (an empty directory or file that the
 * transfer then fills), so two workers racing on the same display name always end up apart.
 */
export class PathResolver {
  private readonly reserved = new Set<string>()
  private readonly maxCandidates: number

  constructor(private readonly options: PathResolverOptions) {
    this.maxCandidates = options.maxCandidates ?? DEFAULT_MAX_CANDIDATES
  }

  resolveTargetDir(category: string): string {
    const directory = Object.hasOwn(this.options.categoryDirectories, category)
      ? this.options.categoryDirectories[category]
      : undefined
    return join(this.options.archiveRoot, directory ?? UNCATEGORIZED_DIRECTORY)
  }

  async resolveConflictFreePath(targetDir: string, displayName: string, kind: ItemKind): Promise<string> {
    const baseName = sanitizeSegment(displayName)

    if (!this.options.dryRun) {
      await mkdir(targetDir, { recursive: true })
    }

    for (let index = 0; index < this.maxCandidates; index += 1) {
      const candidate = join(targetDir, candidateName(baseName, index))
      if (this.reserved.has(candidate)) {
        continue
      }

      const taken = this.options.dryRun ? await this.reserveVirtual(candidate) : await this.reserveOnDisk(candidate, kind)
      if (taken) {
        return candidate
      }
    }

    throw new Error(`Could not find a free name for ${baseName} under ${targetDir} after ${this.maxCandidates} attempts`)
  }

  /** Re-claims a path this item reserved on an earlier attempt so the copy resumes in place. */
  async reclaim(path: string, kind: ItemKind): Promise<string> {
    this.reserved.add(path)
    if (this.options.dryRun) {
      return path
    }

    await mkdir(kind === "directory" ? path : dirname(path), { recursive: true })
    return path
  }

  private async reserveVirtual(candidate: string): Promise<boolean> {
    const exists = await pathExists(candidate)
    // Another worker may have claimed the name while we awaited.
    if (exists || this.reserved.has(candidate)) {
      return false
    }

    this.reserved.add(candidate)
    return true
  }

  private async reserveOnDisk(candidate: string, kind: ItemKind): Promise<boolean> {
    try {
      if (kind === "directory") {
        await mkdir(candidate)
      } else {
        const handle = await open(candidate, "wx")
        await handle.close()
      }
    } catch (error) {
      if (errorCode(error) === "EEXIST") {
        return false
      }

      throw error
    }

    this.reserved.add(candidate)
    return true
  }
}
