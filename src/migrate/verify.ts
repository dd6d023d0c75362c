import { createHash } from "node:crypto"
import { createReadStream } from "node:fs"
import { lstat, readlink } from "node:fs/promises"
import { join } from "node:path"
import { pipeline } from "node:stream/promises"

import { type EntryKind, walkTree } from "../lib/fs"
import { createExcludeMatcher, type NameMatcher } from "./artifacts"

export interface IntegrityVerifierOptions {
  excludePatterns: readonly string[]
  // When off, file pairs are compared by size only.
  checksum: boolean
}

export interface Verifier {
  verify(sourcePath: string, targetPath: string): Promise<boolean>
}

export async function sha256File(path: string): Promise<string> {
  const hash = createHash("sha256")
  await pipeline(createReadStream(path), hash)
  return hash.digest("hex")
}

function kindOf(stats: { isDirectory(): boolean; isFile(): boolean; isSymbolicLink(): boolean }): EntryKind {
  if (stats.isDirectory()) {
    return "directory"
  }

  if (stats.isSymbolicLink()) {
    return "symlink"
  }

  return stats.isFile() ? "file" : "other"
}

/**
 * Read-only equivalence check between a source and its archived copy. Any difference or read
 * failure is reported as `false`; nothing here throws.
 */
export class IntegrityVerifier implements Verifier {
  private readonly isExcluded: NameMatcher

  constructor(private readonly options: IntegrityVerifierOptions) {
    this.isExcluded = createExcludeMatcher(options.excludePatterns)
  }

  async verify(sourcePath: string, targetPath: string): Promise<boolean> {
    try {
      const [sourceStats, targetStats] = await Promise.all([lstat(sourcePath), lstat(targetPath)])
      const sourceKind = kindOf(sourceStats)
      if (sourceKind !== kindOf(targetStats)) {
        return false
      }

      if (sourceKind === "directory") {
        return await this.compareTrees(sourcePath, targetPath)
      }

      return await this.compareEntry(sourceKind, sourcePath, targetPath)
    } catch {
      return false
    }
  }

  private async compareTrees(sourceDir: string, targetDir: string): Promise<boolean> {
    const include = (name: string): boolean => !this.isExcluded(name)
    const [sourceEntries, targetEntries] = await Promise.all([
      walkTree(sourceDir, include),
      walkTree(targetDir, include),
    ])

    if (sourceEntries.length !== targetEntries.length) {
      return false
    }

    const targetKinds = new Map(targetEntries.map((entry) => [entry.relativePath, entry.kind]))

    for (const entry of sourceEntries) {
      if (targetKinds.get(entry.relativePath) !== entry.kind) {
        return false
      }
    }

    for (const entry of sourceEntries) {
      const segments = entry.relativePath.split("/")
      const matches = await this.compareEntry(entry.kind, join(sourceDir, ...segments), join(targetDir, ...segments))
      if (!matches) {
        return false
      }
    }

    return true
  }

  private async compareEntry(kind: EntryKind, sourcePath: string, targetPath: string): Promise<boolean> {
    if (kind === "directory") {
      return true
    }

    if (kind === "symlink") {
      const [sourceLink, targetLink] = await Promise.all([readlink(sourcePath), readlink(targetPath)])
      return sourceLink === targetLink
    }

    const [sourceStats, targetStats] = await Promise.all([lstat(sourcePath), lstat(targetPath)])
    if (sourceStats.size !== targetStats.size) {
      return false
    }

    if (!this.options.checksum || kind !== "file") {
      return true
    }

    const [sourceDigest, targetDigest] = await Promise.all([sha256File(sourcePath), sha256File(targetPath)])
    return sourceDigest === targetDigest
  }
}
