import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"

import { loadConfig, statePaths } from "../config"
import { ConfigError } from "../errors"

const tempPaths: string[] = []

afterEach(async () => {
  await Promise.all(
    tempPaths.splice(0).map(async (path) => {
      await rm(path, { recursive: true, force: true })
    }),
  )
})

async function makeTempDir(): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), "tiermove-config-test-"))
  tempPaths.push(root)
  return root
}

describe("loadConfig", () => {
  it("uses defaults when no config file or environment is present", async () => {
    const cwd = await makeTempDir()
    const config = await loadConfig({ cwd, env: {} })

    expect(config.sourceRoot).toBe("/media/projects")
    expect(config.archiveRoot).toBe("/mnt/archive/projects")
    expect(config.registryPath).toBe(join(cwd, "database", "projects.db"))
    expect(config.stateDir).toBe(join(cwd, ".tiermove"))
    expect(config.batchSize).toBe(25)
    expect(config.parallelJobs).toBe(4)
    expect(config.dryRun).toBe(false)
    expect(config.checksumVerification).toBe(true)
    expect(config.maxAttempts).toBe(3)
    expect(config.excludePatterns).toEqual(["*.tmp", "*.bak"])
    expect(config.categoryDirectories.production_ready).toBe("01_PRODUCTION_READY")
  })

  it("layers file, environment and overrides in that order", async () => {
    const cwd = await makeTempDir()
    await writeFile(
      join(cwd, "tiermove.config.json"),
      JSON.stringify({
        archiveRoot: "archive",
        batchSize: 10,
        parallelJobs: 2,
        checksumVerification: false,
        excludePatterns: ["*.swp"],
        categoryDirectories: { drafts: "07_DRAFTS" },
      }),
      "utf8",
    )

    const config = await loadConfig({
      cwd,
      env: { BATCH_SIZE: "40", DRY_RUN: "yes" },
      overrides: { parallelJobs: 8 },
    })

    expect(config.archiveRoot).toBe(join(cwd, "archive"))
    expect(config.batchSize).toBe(40)
    expect(config.parallelJobs).toBe(8)
    expect(config.dryRun).toBe(true)
    expect(config.checksumVerification).toBe(false)
    expect(config.excludePatterns).toEqual(["*.swp"])
    expect(config.categoryDirectories.drafts).toBe("07_DRAFTS")
    expect(config.categoryDirectories.simple_ideas).toBe("06_SIMPLE_IDEAS")
  })

  it("reads the file named by TIERMOVE_CONFIG", async () => {
    const cwd = await makeTempDir()
    await writeFile(join(cwd, "custom.json"), JSON.stringify({ sourceRoot: "/srv/projects" }), "utf8")

    const config = await loadConfig({ cwd, env: { TIERMOVE_CONFIG: "custom.json" } })
    expect(config.sourceRoot).toBe("/srv/projects")
  })

  it("requires an explicitly named config file to exist", async () => {
    const cwd = await makeTempDir()
    await expect(loadConfig({ cwd, env: {}, configPath: "missing.json" })).rejects.toBeInstanceOf(ConfigError)
  })

  it("rejects invalid values with the offending key", async () => {
    const cwd = await makeTempDir()

    await expect(loadConfig({ cwd, env: { PARALLEL_JOBS: "0" } })).rejects.toThrow(
      "Invalid value for PARALLEL_JOBS: 0 (expected an integer >= 1)",
    )
    await expect(loadConfig({ cwd, env: { DRY_RUN: "maybe" } })).rejects.toThrow(
      "Invalid value for DRY_RUN: maybe (expected true or false)",
    )
  })

  it("rejects config files that are not JSON objects", async () => {
    const cwd = await makeTempDir()
    await writeFile(join(cwd, "tiermove.config.json"), "[1, 2]", "utf8")

    await expect(loadConfig({ cwd, env: {} })).rejects.toThrow("must contain a JSON object")
  })
})

describe("statePaths", () => {
  it("places run artifacts under the state directory", () => {
    expect(statePaths({ stateDir: "/var/lib/tiermove" })).toEqual({
      progressPath: "/var/lib/tiermove/migration_progress.json",
      logsDir: "/var/lib/tiermove/logs",
      logPath: "/var/lib/tiermove/logs/migration.log",
      reportPath: "/var/lib/tiermove/reports/migration_report.txt",
    })
  })
})
