import { mkdirSync } from "node:fs"
import { dirname } from "node:path"
import Database from "better-sqlite3"

import { EnvironmentError, errorMessage } from "../lib/errors"
import type {
  FailureKind,
  ItemFailure,
  ItemRegistration,
  ItemState,
  ItemStatus,
  MigrationItem,
  SelectionFilter,
} from "./contracts"

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS items (
    id INTEGER PRIMARY KEY,
    source_path TEXT NOT NULL,
    category TEXT NOT NULL,
    priority REAL NOT NULL DEFAULT 0,
    display_name TEXT NOT NULL,
    accepted INTEGER NOT NULL DEFAULT 1,
    state TEXT NOT NULL DEFAULT 'pending' CHECK(state IN ('pending', 'migrated', 'failed')),
    target_path TEXT,
    migrated_at TEXT,
    failure_kind TEXT,
    failure_message TEXT,
    failed_at TEXT,
    attempts INTEGER NOT NULL DEFAULT 0,
    last_attempt_at TEXT,
    last_run_id TEXT,
    planned_target_path TEXT,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_items_queue ON items(accepted, state, priority DESC, id);
  CREATE INDEX IF NOT EXISTS idx_items_category ON items(category);
`

const FAILURE_KINDS = new Set<FailureKind>([
  "source-missing",
  "permission-denied",
  "disk-full",
  "io-error",
  "timeout",
  "integrity-mismatch",
  "unknown",
])

interface ItemRow {
  id: number
  source_path: string
  category: string
  priority: number
  display_name: string
  accepted: number
  state: string
  target_path: string | null
  migrated_at: string | null
  failure_kind: string | null
  failure_message: string | null
  failed_at: string | null
  attempts: number
  last_attempt_at: string | null
  last_run_id: string | null
  planned_target_path: string | null
}

interface EligibilityParams {
  category: string | null
  runId: string | null
  maxAttempts: number
  backoffMinutes: number
  skipCorrupted: number
  now: string
}

interface CountRow {
  count: number
}

export interface CategoryCount {
  category: string
  total: number
  migrated: number
  failed: number
}

export interface RecentMigration {
  id: number
  displayName: string
  migratedAt: string
  targetPath: string
}

// Shared by selection and counting so both see the same eligible set.
const ELIGIBLE_WHERE = `
  accepted = 1
  AND state != 'migrated'
  AND (@category IS NULL OR category = @category)
  AND (@runId IS NULL OR last_run_id IS NULL OR last_run_id != @runId)
  AND (
    state != 'failed'
    OR (
      (@maxAttempts = 0 OR attempts < @maxAttempts)
      AND (@skipCorrupted = 0 OR failure_kind IS NULL OR failure_kind != 'integrity-mismatch')
      AND (
        @backoffMinutes = 0
        OR last_attempt_at IS NULL
        OR (julianday(@now) - julianday(last_attempt_at)) * 1440.0
          >= @backoffMinutes * (1 << max(attempts - 1, 0))
      )
    )
  )
`

function parseFailureKind(raw: string | null): FailureKind {
  for (const kind of FAILURE_KINDS) {
    if (kind === raw) {
      return kind
    }
  }

  return "unknown"
}

function toStatus(row: ItemRow): ItemStatus {
  if (row.state === "migrated") {
    return {
      state: "migrated",
      targetPath: row.target_path ?? "",
      migratedAt: row.migrated_at ?? "",
    }
  }

  if (row.state === "failed") {
    return {
      state: "failed",
      failure: {
        kind: parseFailureKind(row.failure_kind),
        message: row.failure_message ?? "",
      },
      failedAt: row.failed_at ?? "",
    }
  }

  return { state: "pending" }
}

function toItem(row: ItemRow): MigrationItem {
  return {
    id: row.id,
    sourcePath: row.source_path,
    category: row.category,
    priority: row.priority,
    displayName: row.display_name,
    accepted: row.accepted === 1,
    status: toStatus(row),
    attempts: row.attempts,
    lastAttemptAt: row.last_attempt_at ?? undefined,
    lastRunId: row.last_run_id ?? undefined,
    plannedTargetPath: row.planned_target_path ?? undefined,
  }
}

export interface OpenRegistryOptions {
  // Create the database file and its directory when missing. Runs require an existing registry.
  create?: boolean | undefined
}

/**
 * Durable per-item migration state. Every mutation is one statement keyed by `id`, so concurrent
 * workers never contend on each other's rows, and nothing ever moves an item out of `migrated`.
 */
export class Registry {
  private constructor(
    private readonly db: Database.Database,
    readonly path: string,
  ) {}

  static open(path: string, options: OpenRegistryOptions = {}): Registry {
    let db: Database.Database
    try {
      if (options.create) {
        mkdirSync(dirname(path), { recursive: true })
      }

      db = new Database(path, { fileMustExist: options.create !== true })
      db.pragma("busy_timeout = 5000")
      db.pragma("journal_mode = WAL")
      db.exec(SCHEMA)
    } catch (error) {
      throw new EnvironmentError("REGISTRY_UNREACHABLE", `Could not open registry at ${path}`, errorMessage(error))
    }

    return new Registry(db, path)
  }

  close(): void {
    this.db.close()
  }

  registerItems(items: readonly ItemRegistration[], now = new Date()): number {
    const insert = this.db.prepare(`
      INSERT OR IGNORE INTO items (id, source_path, category, priority, display_name, accepted, created_at)
      VALUES (@id, @sourcePath, @category, @priority, @displayName, @accepted, @createdAt)
    `)
    const createdAt = now.toISOString()

    const insertAll = this.db.transaction((entries: readonly ItemRegistration[]): number => {
      let inserted = 0
      for (const entry of entries) {
        const result = insert.run({
          id: entry.id,
          sourcePath: entry.sourcePath,
          category: entry.category,
          priority: entry.priority,
          displayName: entry.displayName,
          accepted: entry.accepted === false ? 0 : 1,
          createdAt,
        })
        inserted += result.changes
      }
      return inserted
    })

    return insertAll(items)
  }

  getItem(id: number): MigrationItem | undefined {
    const row = this.db.prepare<[number], ItemRow>("SELECT * FROM items WHERE id = ?").get(id)
    return row ? toItem(row) : undefined
  }

  /** Eligible items by priority (highest first), ties by ascending id. */
  selectPending(limit: number, filter: SelectionFilter = {}): MigrationItem[] {
    if (limit <= 0) {
      return []
    }

    const rows = this.db
      .prepare<EligibilityParams & { limit: number }, ItemRow>(
        `SELECT * FROM items WHERE ${ELIGIBLE_WHERE} ORDER BY priority DESC, id ASC LIMIT @limit`,
      )
      .all({ ...eligibilityParams(filter), limit: Math.floor(limit) })

    return rows.map(toItem)
  }

  countEligible(filter: SelectionFilter = {}): number {
    const row = this.db
      .prepare<EligibilityParams, CountRow>(`SELECT COUNT(*) AS count FROM items WHERE ${ELIGIBLE_WHERE}`)
      .get(eligibilityParams(filter))
    return row?.count ?? 0
  }

  countByState(state: ItemState): number {
    const row = this.db.prepare<[string], CountRow>("SELECT COUNT(*) AS count FROM items WHERE state = ?").get(state)
    return row?.count ?? 0
  }

  countAccepted(): number {
    const row = this.db.prepare<[], CountRow>("SELECT COUNT(*) AS count FROM items WHERE accepted = 1").get()
    return row?.count ?? 0
  }

  /**
   * Stamps a dispatch and remembers the reserved target; a null target keeps the previous one.
   * Returns false when the item is unknown or already migrated.
   */
  recordAttempt(id: number, runId: string, plannedTargetPath: string | null, now = new Date()): boolean {
    const result = this.db
      .prepare(`
        UPDATE items
        SET attempts = attempts + 1, last_attempt_at = @at, last_run_id = @runId,
            planned_target_path = COALESCE(@planned, planned_target_path)
        WHERE id = @id AND state != 'migrated'
      `)
      .run({ id, runId, planned: plannedTargetPath, at: now.toISOString() })
    return result.changes === 1
  }

  /**
   * Moves an item into `migrated`. Repeating the call, or calling it on an item that already
   * migrated elsewhere, leaves the first recorded pairing untouched and returns false.
   */
  markMigrated(id: number, targetPath: string, now = new Date()): boolean {
    const result = this.db
      .prepare(`
        UPDATE items
        SET state = 'migrated', target_path = @targetPath, migrated_at = @at,
            failure_kind = NULL, failure_message = NULL, failed_at = NULL
        WHERE id = @id AND state != 'migrated'
      `)
      .run({ id, targetPath, at: now.toISOString() })

    if (result.changes === 0) {
      this.assertKnown(id)
      return false
    }

    return true
  }

  markFailed(id: number, failure: ItemFailure, now = new Date()): boolean {
    const result = this.db
      .prepare(`
        UPDATE items
        SET state = 'failed', failure_kind = @kind, failure_message = @message, failed_at = @at
        WHERE id = @id AND state != 'migrated'
      `)
      .run({ id, kind: failure.kind, message: failure.message, at: now.toISOString() })

    if (result.changes === 0) {
      this.assertKnown(id)
      return false
    }

    return true
  }

  categoryBreakdown(): CategoryCount[] {
    return this.db
      .prepare<[], CategoryCount>(`
        SELECT category,
               COUNT(*) AS total,
               SUM(CASE WHEN state = 'migrated' THEN 1 ELSE 0 END) AS migrated,
               SUM(CASE WHEN state = 'failed' THEN 1 ELSE 0 END) AS failed
        FROM items
        WHERE accepted = 1
        GROUP BY category
        ORDER BY category ASC
      `)
      .all()
  }

  recentMigrations(limit = 10): RecentMigration[] {
    return this.db
      .prepare<[number], RecentMigration>(`
        SELECT id, display_name AS displayName, migrated_at AS migratedAt, target_path AS targetPath
        FROM items
        WHERE state = 'migrated'
        ORDER BY migrated_at DESC, id DESC
        LIMIT ?
      `)
      .all(limit)
  }

  failedItems(): MigrationItem[] {
    return this.db
      .prepare<[], ItemRow>("SELECT * FROM items WHERE state = 'failed' ORDER BY priority DESC, id ASC")
      .all()
      .map(toItem)
  }

  async backupTo(destinationPath: string): Promise<void> {
    await this.db.backup(destinationPath)
  }

  private assertKnown(id: number): void {
    const row = this.db.prepare<[number], { id: number }>("SELECT id FROM items WHERE id = ?").get(id)
    if (!row) {
      throw new Error(`Unknown registry item: ${id}`)
    }
  }
}

function eligibilityParams(filter: SelectionFilter): EligibilityParams {
  const policy = filter.policy
  return {
    category: filter.category ?? null,
    runId: filter.excludeRunId ?? null,
    maxAttempts: policy?.maxAttempts ?? 0,
    backoffMinutes: policy?.retryBackoffMinutes ?? 0,
    skipCorrupted: policy?.skipCorruptedItems ? 1 : 0,
    now: (filter.now ?? new Date()).toISOString(),
  }
}
