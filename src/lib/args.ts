import { UsageError } from "./errors"

export type CommandName = "migrate" | "report" | "cleanup" | "help"

export interface ParsedArgs {
  command: CommandName
  flags: {
    dryRun: boolean
    category?: string | undefined
    limit?: number | undefined
    configPath?: string | undefined
    batchSize?: number | undefined
    parallelJobs?: number | undefined
  }
}

type ValueFlagKey = "category" | "limit" | "configPath" | "batchSize" | "parallelJobs"

type OptionSpec =
  | { longName: string; kind: "boolean"; flag: "dryRun"; commands: readonly CommandName[] }
  | { longName: string; kind: "string" | "integer"; flag: ValueFlagKey; commands: readonly CommandName[] }

const ALL_COMMANDS: readonly CommandName[] = ["migrate", "report", "cleanup"]

const OPTION_SPECS: readonly OptionSpec[] = [
  { longName: "--dry-run", kind: "boolean", flag: "dryRun", commands: ["migrate"] },
  { longName: "--category", kind: "string", flag: "category", commands: ["migrate"] },
  { longName: "--limit", kind: "integer", flag: "limit", commands: ["migrate"] },
  { longName: "--batch-size", kind: "integer", flag: "batchSize", commands: ["migrate"] },
  { longName: "--parallel-jobs", kind: "integer", flag: "parallelJobs", commands: ["migrate"] },
  { longName: "--config", kind: "string", flag: "configPath", commands: ALL_COMMANDS },
]

const OPTION_SPEC_BY_LONG_NAME = new Map(OPTION_SPECS.map((spec) => [spec.longName, spec]))

export function usage(): string {
  return [
    "tiermove - Move classified project bundles into a tiered archive, verified and resumable",
    "",
    "Usage:",
    "  tiermove migrate [options]  Migrate pending items from the registry into the archive",
    "  tiermove report [options]   Print and save the migration report",
    "  tiermove cleanup [options]  Remove stale temp files and expired run logs",
    "",
    "Migrate options:",
    "  --category <name>      Only migrate items from this category",
    "  --limit <n>            Migrate at most n items this run (0 = no limit)",
    "  --dry-run              Run the full state machine without copying anything",
    "  --batch-size <n>       Items fetched per batch (default: 25)",
    "  --parallel-jobs <n>    Concurrent transfers (default: 4)",
    "",
    "Common options:",
    "  --config <path>        JSON config file (default: ./tiermove.config.json)",
    "  --help, -h             Show this help message",
    "",
    "Environment:",
    "  SOURCE_DIR, ARCHIVE_ROOT, REGISTRY_PATH, STATE_DIR, BATCH_SIZE, PARALLEL_JOBS, DRY_RUN,",
    "  BACKUP_BEFORE_MIGRATE, REMOVE_SOURCE_AFTER_MIGRATION, ENABLE_CHECKSUM_VERIFICATION,",
    "  SKIP_CORRUPTED_FILES, LOG_RETENTION_DAYS, IO_TIMEOUT, MAX_ATTEMPTS, RETRY_BACKOFF_MINUTES,",
    "  BATCH_PAUSE_MS, TIERMOVE_CONFIG",
    "",
    "Examples:",
    "  tiermove migrate --category production_ready --limit 25",
    "  tiermove migrate --dry-run",
  ].join("\n")
}

function parseIntegerValue(raw: string, key: string): number {
  if (!/^\d+$/u.test(raw)) {
    throw new UsageError(`Invalid value for ${key}: ${raw}`)
  }

  const parsedValue = Number(raw)
  if (!Number.isSafeInteger(parsedValue)) {
    throw new UsageError(`Invalid value for ${key}: ${raw}`)
  }

  return parsedValue
}

function parseOptionToken(arg: string): { longName: string; inlineValue?: string } {
  const splitIndex = arg.indexOf("=")
  if (splitIndex < 0) {
    return { longName: arg }
  }

  return {
    longName: arg.slice(0, splitIndex),
    inlineValue: arg.slice(splitIndex + 1),
  }
}

function takeValue(args: readonly string[], index: number, key: string): string {
  const value = args[index + 1]
  if (!value || value.startsWith("--")) {
    throw new UsageError(`Missing value for ${key}`)
  }

  return value
}

function applyOption(parsed: ParsedArgs, rest: readonly string[], index: number): number {
  const arg = rest[index] ?? ""
  const token = parseOptionToken(arg)
  const spec = OPTION_SPEC_BY_LONG_NAME.get(token.longName)

  if (!spec) {
    throw new UsageError(`Unknown argument: ${arg}`)
  }

  if (!spec.commands.includes(parsed.command)) {
    throw new UsageError(`${spec.longName} is not supported with \`tiermove ${parsed.command}\``)
  }

  if (spec.kind === "boolean") {
    if (token.inlineValue !== undefined) {
      throw new UsageError(`Unknown argument: ${arg}`)
    }

    parsed.flags[spec.flag] = true
    return 0
  }

  const rawValue = token.inlineValue ?? takeValue(rest, index, spec.longName)
  if (rawValue.length === 0) {
    throw new UsageError(`Missing value for ${spec.longName}`)
  }

  switch (spec.flag) {
    case "category":
    case "configPath":
      parsed.flags[spec.flag] = rawValue
      break
    case "limit":
    case "batchSize":
    case "parallelJobs":
      parsed.flags[spec.flag] = parseIntegerValue(rawValue, spec.longName)
      break
  }

  return token.inlineValue === undefined ? 1 : 0
}

function validateArgs(parsed: ParsedArgs): void {
  for (const [key, value] of [
    ["--batch-size", parsed.flags.batchSize],
    ["--parallel-jobs", parsed.flags.parallelJobs],
  ] as const) {
    if (value !== undefined && value < 1) {
      throw new UsageError(`${key} must be a positive integer`)
    }
  }
}

function isCommandName(value: string): value is CommandName {
  return value === "migrate" || value === "report" || value === "cleanup" || value === "help"
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const [, , command, ...rest] = argv

  const parsed: ParsedArgs = { command: "help", flags: { dryRun: false } }

  if (command === undefined || command === "--help" || command === "-h" || command === "help") {
    return parsed
  }

  if (!isCommandName(command)) {
    throw new UsageError(`Unknown command: ${command}`)
  }

  parsed.command = command

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index]
    if (!arg) {
      continue
    }

    if (arg === "--help" || arg === "-h") {
      parsed.command = "help"
      return parsed
    }

    index += applyOption(parsed, rest, index)
  }

  validateArgs(parsed)
  return parsed
}
