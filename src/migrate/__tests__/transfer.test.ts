import { lstat, mkdir, mkdtemp, readdir, readFile, readlink, rm, stat, symlink, utimes, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"

import { TimeoutError } from "../../lib/concurrency"
import { DEFAULT_CATEGORY_DIRECTORIES } from "../../lib/config"
import { pathExists } from "../../lib/fs"
import { PathResolver } from "../path-resolver"
import { classifyFailure, TransferExecutor } from "../transfer"
import { IntegrityVerifier } from "../verify"

const tempPaths: string[] = []

afterEach(async () => {
  await Promise.all(
    tempPaths.splice(0).map(async (path) => {
      await rm(path, { recursive: true, force: true })
    }),
  )
})

async function makeTempDir(): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), "tiermove-transfer-test-"))
  tempPaths.push(root)
  return root
}

async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const path = join(root, ...relativePath.split("/"))
    await mkdir(join(path, ".."), { recursive: true })
    await writeFile(path, content, "utf8")
  }
}

function errorWithCode(code: string): Error {
  return Object.assign(new Error(`${code}: simulated`), { code })
}

const executor = new TransferExecutor({ excludePatterns: ["*.tmp", "*.bak"], ioTimeoutMs: 0 })
const verifier = new IntegrityVerifier({ excludePatterns: ["*.tmp", "*.bak"], checksum: true })

describe("classifyFailure", () => {
  it("maps filesystem error codes to failure kinds", () => {
    expect(classifyFailure(errorWithCode("ENOENT"))).toBe("source-missing")
    expect(classifyFailure(errorWithCode("EACCES"))).toBe("permission-denied")
    expect(classifyFailure(errorWithCode("EROFS"))).toBe("permission-denied")
    expect(classifyFailure(errorWithCode("ENOSPC"))).toBe("disk-full")
    expect(classifyFailure(errorWithCode("EIO"))).toBe("io-error")
    expect(classifyFailure(new TimeoutError("Transfer of demo", 300_000))).toBe("timeout")
    expect(classifyFailure(new Error("plain"))).toBe("unknown")
  })
})

describe("TransferExecutor", () => {
  it("reports the kind of a source and fails for missing ones", async () => {
    const root = await makeTempDir()
    await writeTree(root, { "project/readme.md": "hello", "single.txt": "one" })

    expect(await executor.inspect(join(root, "project"))).toEqual({ ok: true, kind: "directory" })
    expect(await executor.inspect(join(root, "single.txt"))).toEqual({ ok: true, kind: "file" })

    const missing = await executor.inspect(join(root, "gone"))
    expect(missing.ok).toBe(false)
    if (!missing.ok) {
      expect(missing.failure.kind).toBe("source-missing")
    }
  })

  it("does nothing during a dry run", async () => {
    const root = await makeTempDir()
    await writeTree(root, { "source/readme.md": "hello" })

    const target = join(root, "archive", "source")
    expect(await executor.transfer(join(root, "source"), target, true)).toEqual({ ok: true })
    expect(await pathExists(join(root, "archive"))).toBe(false)
  })

  it("copies a single file", async () => {
    const root = await makeTempDir()
    await writeTree(root, { "notes.txt": "remember the milk" })

    const modifiedAt = new Date("2020-01-02T03:04:05.000Z")
    await utimes(join(root, "notes.txt"), modifiedAt, modifiedAt)

    const target = join(root, "archive", "notes.txt")
    await mkdir(join(root, "archive"))
    await writeFile(target, "", "utf8")

    expect(await executor.transfer(join(root, "notes.txt"), target, false)).toEqual({ ok: true })
    expect(await readFile(target, "utf8")).toBe("remember the milk")
    expect((await stat(target)).mtime.toISOString()).toBe("2020-01-02T03:04:05.000Z")
    expect(await readFile(join(root, "notes.txt"), "utf8")).toBe("remember the milk")
  })

  it("copies a directory tree without excluded artifacts", async () => {
    const root = await makeTempDir()
    await writeTree(root, {
      "source/readme.md": "hello",
      "source/src/main.ts": "export {}",
      "source/scratch.tmp": "scratch",
      "source/src/old.bak": "old",
    })

    const target = join(root, "archive", "source")
    await mkdir(target, { recursive: true })

    expect(await executor.transfer(join(root, "source"), target, false)).toEqual({ ok: true })
    expect((await readdir(target)).sort()).toEqual(["readme.md", "src"])
    expect(await readdir(join(target, "src"))).toEqual(["main.ts"])
    expect(await readFile(join(target, "src", "main.ts"), "utf8")).toBe("export {}")
  })

  it("converges a partial copy from an earlier run", async () => {
    const root = await makeTempDir()
    await writeTree(root, {
      "source/readme.md": "fresh",
      "source/src/main.ts": "export {}",
      "archive/source/readme.md": "partial",
      "archive/source/stale.txt": "no longer in the source",
      "archive/source/src/leftover.tmp": "junk",
      "archive/source/dropped/file.txt": "gone",
      "archive/source/src/main.ts/nested.txt": "a directory where a file belongs",
    })

    const target = join(root, "archive", "source")
    expect(await executor.transfer(join(root, "source"), target, false)).toEqual({ ok: true })

    expect((await readdir(target)).sort()).toEqual(["readme.md", "src"])
    expect(await readdir(join(target, "src"))).toEqual(["main.ts"])
    expect(await readFile(join(target, "readme.md"), "utf8")).toBe("fresh")
    expect(await readFile(join(target, "src", "main.ts"), "utf8")).toBe("export {}")
  })

  it("keeps relative symlinks inside a directory verbatim", async () => {
    const root = await makeTempDir()
    await writeTree(root, { "source/real.txt": "content", "source/docs/guide.md": "guide" })
    await symlink("real.txt", join(root, "source", "link"))
    await symlink("../real.txt", join(root, "source", "docs", "up"))

    const source = join(root, "source")
    const target = join(root, "archive", "source")

    expect(await executor.transfer(source, target, false)).toEqual({ ok: true })
    expect(await readlink(join(target, "link"))).toBe("real.txt")
    expect(await readlink(join(target, "docs", "up"))).toBe("../real.txt")
    expect(await readFile(join(target, "link"), "utf8")).toBe("content")
    expect(await verifier.verify(source, target)).toBe(true)
  })

  it("copies a symlink item over the placeholder that reserved its name", async () => {
    const root = await makeTempDir()
    await writeTree(root, { "source/real.als": "session" })
    const source = join(root, "source", "alias.als")
    await symlink("real.als", source)

    const inspection = await executor.inspect(source)
    expect(inspection).toEqual({ ok: true, kind: "file" })

    const resolver = new PathResolver({
      archiveRoot: join(root, "archive"),
      categoryDirectories: DEFAULT_CATEGORY_DIRECTORIES,
      dryRun: false,
    })
    const target = await resolver.resolveConflictFreePath(
      resolver.resolveTargetDir("unsorted"),
      "alias.als",
      "file",
    )
    expect((await lstat(target)).isFile()).toBe(true)

    expect(await executor.transfer(source, target, false)).toEqual({ ok: true })
    expect((await lstat(target)).isSymbolicLink()).toBe(true)
    expect(await readlink(target)).toBe("real.als")
    expect(await verifier.verify(source, target)).toBe(true)
  })

  it("returns a classified failure when the source is missing", async () => {
    const root = await makeTempDir()
    const outcome = await executor.transfer(join(root, "gone"), join(root, "archive", "gone"), false)

    expect(outcome.ok).toBe(false)
    if (!outcome.ok) {
      expect(outcome.failure.kind).toBe("source-missing")
    }
  })
})
