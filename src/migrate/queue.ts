import type { MigrationConfig } from "../lib/config"
import type { MigrationItem, RetryPolicy, SelectionFilter } from "./contracts"
import type { Registry } from "./registry"

export function retryPolicyFrom(
  config: Pick<MigrationConfig, "maxAttempts" | "retryBackoffMinutes" | "skipCorruptedItems">,
): RetryPolicy {
  return {
    maxAttempts: config.maxAttempts,
    retryBackoffMinutes: config.retryBackoffMinutes,
    skipCorruptedItems: config.skipCorruptedItems,
  }
}

export type QueueSource = Pick<Registry, "selectPending" | "countEligible">

/**
 * The eligible queue for one run: accepted, not migrated, not yet tried in this run, and (for
 * failed items) still within the retry policy.
 */
export class QueueSelector {
  constructor(
    private readonly source: QueueSource,
    private readonly runId: string,
    private readonly policy: RetryPolicy,
    private readonly category?: string | undefined,
  ) {}

  next(limit: number): MigrationItem[] {
    return this.source.selectPending(limit, this.filter())
  }

  count(): number {
    return this.source.countEligible(this.filter())
  }

  private filter(): SelectionFilter {
    return {
      category: this.category,
      excludeRunId: this.runId,
      policy: this.policy,
      now: new Date(),
    }
  }
}
