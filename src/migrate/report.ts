import { mkdir, writeFile } from "node:fs/promises"
import { dirname } from "node:path"

import type { MigrationConfig } from "../lib/config"
import type { FailedItemSummary } from "./contracts"
import type { CategoryCount, RecentMigration, Registry } from "./registry"

const RECENT_MIGRATIONS_LIMIT = 10

export interface MigrationReport {
  generatedAt: string
  sourceRoot: string
  archiveRoot: string
  totalAccepted: number
  migrated: number
  failed: number
  pending: number
  successRate: number
  categories: CategoryCount[]
  recent: RecentMigration[]
  failures: FailedItemSummary[]
}

export type ReportSource = Pick<
  Registry,
  "countAccepted" | "countByState" | "categoryBreakdown" | "recentMigrations" | "failedItems"
>

export function successRate(migrated: number, total: number): number {
  return total > 0 ? Math.floor((migrated * 100) / total) : 0
}

export function buildReport(
  registry: ReportSource,
  config: Pick<MigrationConfig, "sourceRoot" | "archiveRoot">,
  now = new Date(),
): MigrationReport {
  const totalAccepted = registry.countAccepted()
  const migrated = registry.countByState("migrated")
  const failed = registry.countByState("failed")

  const failures: FailedItemSummary[] = []
  for (const item of registry.failedItems()) {
    if (item.status.state !== "failed") {
      continue
    }

    failures.push({
      id: item.id,
      displayName: item.displayName,
      category: item.category,
      failure: item.status.failure,
      attempts: item.attempts,
    })
  }

  return {
    generatedAt: now.toISOString(),
    sourceRoot: config.sourceRoot,
    archiveRoot: config.archiveRoot,
    totalAccepted,
    migrated,
    failed,
    pending: Math.max(0, totalAccepted - migrated - failed),
    successRate: successRate(migrated, totalAccepted),
    categories: registry.categoryBreakdown(),
    recent: registry.recentMigrations(RECENT_MIGRATIONS_LIMIT),
    failures,
  }
}

export function categoryLabel(category: string): string {
  return category.replace(/_/g, " ").toUpperCase()
}

function section(title: string, lines: string[]): string[] {
  return [title, "-".repeat(title.length), ...(lines.length > 0 ? lines : ["(none)"]), ""]
}

export function formatReport(report: MigrationReport): string {
  return [
    "MIGRATION REPORT",
    "================",
    `Generated: ${report.generatedAt}`,
    `Source Directory: ${report.sourceRoot}`,
    `Archive Directory: ${report.archiveRoot}`,
    "",
    ...section("SUMMARY", [
      `Total Accepted Items: ${report.totalAccepted}`,
      `Successfully Migrated: ${report.migrated}`,
      `Failed Migrations: ${report.failed}`,
      `Pending: ${report.pending}`,
      `Success Rate: ${report.successRate}%`,
    ]),
    ...section(
      "CATEGORY BREAKDOWN",
      report.categories.map(
        (entry) =>
          `${categoryLabel(entry.category)}: ${entry.total} items (${entry.migrated} migrated, ${entry.failed} failed)`,
      ),
    ),
    ...section(
      "RECENT MIGRATIONS",
      report.recent.map((entry) => `${entry.displayName} - ${entry.migratedAt} -> ${entry.targetPath}`),
    ),
    ...section("FAILED ITEMS", report.failures.map(formatFailureLine)),
  ].join("\n")
}

export function formatFailureLine(entry: FailedItemSummary): string {
  return `#${entry.id} ${entry.displayName} [${entry.category}]: ${entry.failure.kind} - ${entry.failure.message} (attempts: ${entry.attempts})`
}

export async function writeReport(path: string, text: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, text, "utf8")
}
