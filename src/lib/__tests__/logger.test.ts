import { mkdtemp, readFile, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, describe, expect, it, vi } from "vitest"

vi.mock("@clack/prompts", () => ({
  log: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}))

import { formatLogLine, formatLogTimestamp, RunLogger } from "../logger"

const tempPaths: string[] = []

afterEach(async () => {
  await Promise.all(
    tempPaths.splice(0).map(async (path) => {
      await rm(path, { recursive: true, force: true })
    }),
  )
})

describe("formatLogLine", () => {
  it("prefixes a local timestamp and the level", () => {
    const date = new Date(2024, 2, 5, 7, 8, 9)

    expect(formatLogTimestamp(date)).toBe("2024-03-05 07:08:09")
    expect(formatLogLine("WARN", "disk space low", date)).toBe("[2024-03-05 07:08:09] [WARN] disk space low\n")
  })
})

describe("RunLogger", () => {
  it("appends every level to the run log in call order", async () => {
    const root = await mkdtemp(join(tmpdir(), "tiermove-logger-test-"))
    tempPaths.push(root)

    const logPath = join(root, "logs", "migration.log")
    const logger = new RunLogger(logPath, () => new Date(2024, 0, 1, 12, 0, 0))

    logger.debug("batch 1")
    logger.info("starting")
    logger.success("done")
    logger.warn("slow")
    logger.error("broken")
    await logger.flush()

    expect(await readFile(logPath, "utf8")).toBe(
      [
        "[2024-01-01 12:00:00] [DEBUG] batch 1",
        "[2024-01-01 12:00:00] [INFO] starting",
        "[2024-01-01 12:00:00] [INFO] done",
        "[2024-01-01 12:00:00] [WARN] slow",
        "[2024-01-01 12:00:00] [ERROR] broken",
        "",
      ].join("\n"),
    )
  })
})
