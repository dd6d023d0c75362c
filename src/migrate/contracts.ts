export const ITEM_STATES = ["pending", "migrated", "failed"] as const

export type ItemState = (typeof ITEM_STATES)[number]

export type FailureKind =
  | "source-missing"
  | "permission-denied"
  | "disk-full"
  | "io-error"
  | "timeout"
  | "integrity-mismatch"
  | "unknown"

export interface ItemFailure {
  kind: FailureKind
  message: string
}

export type ItemStatus =
  | { state: "pending" }
  | { state: "migrated"; targetPath: string; migratedAt: string }
  | { state: "failed"; failure: ItemFailure; failedAt: string }

export interface MigrationItem {
  id: number
  sourcePath: string
  category: string
  priority: number
  displayName: string
  accepted: boolean
  status: ItemStatus
  attempts: number
  lastAttemptAt?: string | undefined
  lastRunId?: string | undefined
  plannedTargetPath?: string | undefined
}

// What the upstream classification stage hands over for each discovered unit.
export interface ItemRegistration {
  id: number
  sourcePath: string
  category: string
  priority: number
  displayName: string
  accepted?: boolean | undefined
}

export interface RetryPolicy {
  maxAttempts: number
  retryBackoffMinutes: number
  skipCorruptedItems: boolean
}

export interface SelectionFilter {
  category?: string | undefined
  // Items already attempted under this run id are not offered again.
  excludeRunId?: string | undefined
  policy?: RetryPolicy | undefined
  now?: Date | undefined
}

export type TransferOutcome = { ok: true } | { ok: false; failure: ItemFailure }

export type ItemKind = "file" | "directory"

export interface ProgressCheckpoint {
  itemsDone: number
  itemsTotal: number
  lastItemName: string
  updatedAt: string
}

export interface FailedItemSummary {
  id: number
  displayName: string
  category: string
  failure: ItemFailure
  attempts: number
}

export interface MigrationRunResult {
  runId: string
  eligibleAtStart: number
  attempted: number
  migrated: number
  failed: number
  failures: FailedItemSummary[]
  stoppedEarly: boolean
}
