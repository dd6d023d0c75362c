#!/usr/bin/env tsx

import { log } from "@clack/prompts"

import { runCleanup } from "./commands/cleanup"
import { runMigrate } from "./commands/migrate"
import { runReport } from "./commands/report"
import { parseArgs, usage } from "./lib/args"
import { describeError, UsageError } from "./lib/errors"

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv)

  switch (parsed.command) {
    case "help":
      console.log(usage())
      return
    case "migrate":
      await runMigrate({
        configPath: parsed.flags.configPath,
        category: parsed.flags.category,
        limit: parsed.flags.limit,
        dryRun: parsed.flags.dryRun,
        batchSize: parsed.flags.batchSize,
        parallelJobs: parsed.flags.parallelJobs,
      })
      return
    case "report":
      await runReport({ configPath: parsed.flags.configPath })
      return
    case "cleanup":
      await runCleanup({ configPath: parsed.flags.configPath })
      return
  }
}

main().catch((error: unknown) => {
  log.error(describeError(error))
  if (error instanceof UsageError) {
    console.log(`\n${usage()}`)
  }
  process.exit(1)
})
