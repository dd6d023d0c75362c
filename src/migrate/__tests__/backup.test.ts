import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"

import { pathExists } from "../../lib/fs"
import { type Logger, silentLogger } from "../../lib/logger"
import { BACKUP_FILENAME, backupsDirectory, createPreRunBackup } from "../backup"
import { Registry } from "../registry"

const tempPaths: string[] = []
const openRegistries: Registry[] = []

afterEach(async () => {
  for (const registry of openRegistries.splice(0)) {
    registry.close()
  }

  await Promise.all(
    tempPaths.splice(0).map(async (path) => {
      await rm(path, { recursive: true, force: true })
    }),
  )
})

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = []
  return { ...silentLogger, warn: (message) => warnings.push(message), warnings }
}

async function setup(): Promise<{ archiveRoot: string; registry: Registry }> {
  const root = await mkdtemp(join(tmpdir(), "tiermove-backup-test-"))
  tempPaths.push(root)

  const registry = Registry.open(join(root, "projects.db"), { create: true })
  openRegistries.push(registry)
  registry.registerItems([
    { id: 1, sourcePath: "/media/projects/site", category: "production_ready", priority: 1, displayName: "site" },
  ])

  return { archiveRoot: join(root, "archive"), registry }
}

const NOW = new Date(2024, 4, 1, 10, 0, 0)

describe("createPreRunBackup", () => {
  it("snapshots the registry under a numbered maintenance directory", async () => {
    const { archiveRoot, registry } = await setup()
    const config = { archiveRoot, backupBeforeMigrate: true, dryRun: false }

    const first = await createPreRunBackup(registry, config, silentLogger, NOW)
    const second = await createPreRunBackup(registry, config, silentLogger, NOW)

    const backups = backupsDirectory(archiveRoot)
    expect(first).toBe(join(backups, "pre_migration_20240501_100000", BACKUP_FILENAME))
    expect(second).toBe(join(backups, "pre_migration_20240501_100000.1", BACKUP_FILENAME))

    const snapshot = Registry.open(first ?? "")
    openRegistries.push(snapshot)
    expect(snapshot.getItem(1)?.displayName).toBe("site")
  })

  it("skips the snapshot when disabled or in a dry run", async () => {
    const { archiveRoot, registry } = await setup()

    expect(await createPreRunBackup(registry, { archiveRoot, backupBeforeMigrate: false, dryRun: false }, silentLogger, NOW)).toBeUndefined()
    expect(await createPreRunBackup(registry, { archiveRoot, backupBeforeMigrate: true, dryRun: true }, silentLogger, NOW)).toBeUndefined()
    expect(await pathExists(backupsDirectory(archiveRoot))).toBe(false)
  })

  it("warns and carries on when the snapshot fails", async () => {
    const { archiveRoot } = await setup()
    const logger = recordingLogger()

    const result = await createPreRunBackup(
      { backupTo: () => Promise.reject(new Error("disk gone")) },
      { archiveRoot, backupBeforeMigrate: true, dryRun: false },
      logger,
      NOW,
    )

    expect(result).toBeUndefined()
    expect(logger.warnings).toEqual(["Failed to create registry backup: disk gone"])
  })
})
