import { intro, log, outro } from "@clack/prompts"

import { loadConfig, statePaths } from "../lib/config"
import { readProgress } from "../migrate/progress"
import { Registry } from "../migrate/registry"
import { buildReport, formatReport, writeReport } from "../migrate/report"

export interface ReportOptions {
  configPath?: string | undefined
}

export async function runReport(options: ReportOptions): Promise<void> {
  intro("tiermove - Migration report")

  const config = await loadConfig({ configPath: options.configPath })
  const paths = statePaths(config)
  const registry = Registry.open(config.registryPath)

  let text: string
  try {
    text = formatReport(buildReport(registry, config))
  } finally {
    registry.close()
  }

  await writeReport(paths.reportPath, text)
  log.message(text)

  const progress = await readProgress(paths.progressPath)
  if (progress) {
    log.info(
      `Last checkpoint: ${progress.itemsDone}/${progress.itemsTotal} (${progress.lastItemName}) at ${progress.updatedAt}`,
    )
  }

  outro(`Report saved to ${paths.reportPath}`)
}
