import { readFile } from "node:fs/promises"
import { join } from "node:path"

import { ConfigError, errorMessage, isEnoent } from "./errors"
import { asRecord, asStringArray, asStringRecord, type JsonRecord } from "./json"
import { resolveUserPath } from "./paths"

export const DEFAULT_CONFIG_FILENAME = "tiermove.config.json"

export const DEFAULT_CATEGORY_DIRECTORIES: Readonly<Record<string, string>> = {
  production_ready: "01_PRODUCTION_READY",
  active_production: "02_ACTIVE_PRODUCTION",
  finished_experiments: "03_FINISHED_EXPERIMENTS",
  development: "04_DEVELOPMENT",
  complex_sketches: "05_COMPLEX_SKETCHES",
  simple_ideas: "06_SIMPLE_IDEAS",
}

export const UNCATEGORIZED_DIRECTORY = "00_UNCATEGORIZED"

export interface MigrationConfig {
  sourceRoot: string
  archiveRoot: string
  registryPath: string
  stateDir: string
  batchSize: number
  parallelJobs: number
  dryRun: boolean
  backupBeforeMigrate: boolean
  removeSourceAfterMigration: boolean
  checksumVerification: boolean
  skipCorruptedItems: boolean
  logRetentionDays: number
  ioTimeoutSeconds: number
  maxAttempts: number
  retryBackoffMinutes: number
  batchPauseMs: number
  excludePatterns: string[]
  categoryDirectories: Record<string, string>
}

export type ConfigOverrides = Partial<Pick<MigrationConfig, "dryRun" | "batchSize" | "parallelJobs">>

const DEFAULT_CONFIG: MigrationConfig = {
  sourceRoot: "/media/projects",
  archiveRoot: "/mnt/archive/projects",
  registryPath: "./database/projects.db",
  stateDir: "./.tiermove",
  batchSize: 25,
  parallelJobs: 4,
  dryRun: false,
  backupBeforeMigrate: true,
  removeSourceAfterMigration: false,
  checksumVerification: true,
  skipCorruptedItems: true,
  logRetentionDays: 30,
  ioTimeoutSeconds: 300,
  maxAttempts: 3,
  retryBackoffMinutes: 0,
  batchPauseMs: 2_000,
  excludePatterns: ["*.tmp", "*.bak"],
  categoryDirectories: { ...DEFAULT_CATEGORY_DIRECTORIES },
}

type StringKey = "sourceRoot" | "archiveRoot" | "registryPath" | "stateDir"
type IntegerKey =
  | "batchSize"
  | "parallelJobs"
  | "logRetentionDays"
  | "ioTimeoutSeconds"
  | "maxAttempts"
  | "retryBackoffMinutes"
  | "batchPauseMs"
type BooleanKey =
  | "dryRun"
  | "backupBeforeMigrate"
  | "removeSourceAfterMigration"
  | "checksumVerification"
  | "skipCorruptedItems"

const STRING_ENV: readonly [StringKey, string][] = [
  ["sourceRoot", "SOURCE_DIR"],
  ["archiveRoot", "ARCHIVE_ROOT"],
  ["registryPath", "REGISTRY_PATH"],
  ["stateDir", "STATE_DIR"],
]

// Keys whose value must be at least 1; the rest accept 0.
const POSITIVE_INTEGER_KEYS = new Set<IntegerKey>(["batchSize", "parallelJobs"])

const INTEGER_ENV: readonly [IntegerKey, string][] = [
  ["batchSize", "BATCH_SIZE"],
  ["parallelJobs", "PARALLEL_JOBS"],
  ["logRetentionDays", "LOG_RETENTION_DAYS"],
  ["ioTimeoutSeconds", "IO_TIMEOUT"],
  ["maxAttempts", "MAX_ATTEMPTS"],
  ["retryBackoffMinutes", "RETRY_BACKOFF_MINUTES"],
  ["batchPauseMs", "BATCH_PAUSE_MS"],
]

const BOOLEAN_ENV: readonly [BooleanKey, string][] = [
  ["dryRun", "DRY_RUN"],
  ["backupBeforeMigrate", "BACKUP_BEFORE_MIGRATE"],
  ["removeSourceAfterMigration", "REMOVE_SOURCE_AFTER_MIGRATION"],
  ["checksumVerification", "ENABLE_CHECKSUM_VERIFICATION"],
  ["skipCorruptedItems", "SKIP_CORRUPTED_FILES"],
]

const TRUE_VALUES = new Set(["true", "1", "yes", "on"])
const FALSE_VALUES = new Set(["false", "0", "no", "off"])

export function defaultConfig(): MigrationConfig {
  return structuredClone(DEFAULT_CONFIG)
}

function parseInteger(key: string, raw: unknown, min: number): number {
  const value = typeof raw === "string" && /^\d+$/u.test(raw.trim()) ? Number(raw.trim()) : raw
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < min) {
    throw new ConfigError(key, `Invalid value for ${key}: ${String(raw)} (expected an integer >= ${min})`)
  }

  return value
}

function parseBoolean(key: string, raw: unknown): boolean {
  if (typeof raw === "boolean") {
    return raw
  }

  const normalized = typeof raw === "string" ? raw.trim().toLowerCase() : ""
  if (TRUE_VALUES.has(normalized)) {
    return true
  }

  if (FALSE_VALUES.has(normalized)) {
    return false
  }

  throw new ConfigError(key, `Invalid value for ${key}: ${String(raw)} (expected true or false)`)
}

function parseString(key: string, raw: unknown): string {
  if (typeof raw !== "string" || raw.trim().length === 0) {
    throw new ConfigError(key, `Invalid value for ${key}: expected a non-empty string`)
  }

  return raw.trim()
}

function applyFileValues(config: MigrationConfig, raw: JsonRecord): void {
  for (const [key] of STRING_ENV) {
    if (raw[key] !== undefined) {
      config[key] = parseString(key, raw[key])
    }
  }

  for (const [key] of INTEGER_ENV) {
    if (raw[key] !== undefined) {
      config[key] = parseInteger(key, raw[key], POSITIVE_INTEGER_KEYS.has(key) ? 1 : 0)
    }
  }

  for (const [key] of BOOLEAN_ENV) {
    if (raw[key] !== undefined) {
      config[key] = parseBoolean(key, raw[key])
    }
  }

  if (raw.excludePatterns !== undefined) {
    config.excludePatterns = asStringArray(raw.excludePatterns)
  }

  if (raw.categoryDirectories !== undefined) {
    config.categoryDirectories = {
      ...config.categoryDirectories,
      ...asStringRecord(raw.categoryDirectories),
    }
  }
}

function applyEnvValues(config: MigrationConfig, env: NodeJS.ProcessEnv): void {
  for (const [key, name] of STRING_ENV) {
    const value = env[name]
    if (value !== undefined && value.length > 0) {
      config[key] = parseString(name, value)
    }
  }

  for (const [key, name] of INTEGER_ENV) {
    const value = env[name]
    if (value !== undefined && value.length > 0) {
      config[key] = parseInteger(name, value, POSITIVE_INTEGER_KEYS.has(key) ? 1 : 0)
    }
  }

  for (const [key, name] of BOOLEAN_ENV) {
    const value = env[name]
    if (value !== undefined && value.length > 0) {
      config[key] = parseBoolean(name, value)
    }
  }
}

async function readConfigFile(path: string, required: boolean): Promise<JsonRecord> {
  let raw: string
  try {
    raw = await readFile(path, "utf8")
  } catch (error) {
    if (!required && isEnoent(error)) {
      return {}
    }

    throw new ConfigError("config", `Could not read config file ${path}: ${errorMessage(error)}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new ConfigError("config", `Config file ${path} is not valid JSON: ${errorMessage(error)}`)
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError("config", `Config file ${path} must contain a JSON object`)
  }

  return asRecord(parsed)
}

export interface LoadConfigOptions {
  configPath?: string | undefined
  env?: NodeJS.ProcessEnv | undefined
  cwd?: string | undefined
  overrides?: ConfigOverrides | undefined
}

/**
 * Builds the run configuration once: defaults, then the JSON config file, then environment
 * variables, then CLI overrides. Paths are resolved against `cwd`.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<MigrationConfig> {
  const env = options.env ?? process.env
  const cwd = options.cwd ?? process.cwd()
  const explicitPath = options.configPath ?? env.TIERMOVE_CONFIG
  const configPath = explicitPath ? resolveAgainst(cwd, explicitPath) : join(cwd, DEFAULT_CONFIG_FILENAME)

  const config = defaultConfig()
  applyFileValues(config, await readConfigFile(configPath, explicitPath !== undefined))
  applyEnvValues(config, env)

  const overrides = options.overrides ?? {}
  if (overrides.dryRun !== undefined) {
    config.dryRun = overrides.dryRun
  }
  if (overrides.batchSize !== undefined) {
    config.batchSize = parseInteger("--batch-size", overrides.batchSize, 1)
  }
  if (overrides.parallelJobs !== undefined) {
    config.parallelJobs = parseInteger("--parallel-jobs", overrides.parallelJobs, 1)
  }

  config.sourceRoot = resolveAgainst(cwd, config.sourceRoot)
  config.archiveRoot = resolveAgainst(cwd, config.archiveRoot)
  config.registryPath = resolveAgainst(cwd, config.registryPath)
  config.stateDir = resolveAgainst(cwd, config.stateDir)

  return config
}

function resolveAgainst(cwd: string, path: string): string {
  if (path.startsWith("~") || path.startsWith("/")) {
    return resolveUserPath(path)
  }

  return resolveUserPath(join(cwd, path))
}

export function statePaths(config: Pick<MigrationConfig, "stateDir">): {
  progressPath: string
  logPath: string
  logsDir: string
  reportPath: string
} {
  return {
    progressPath: join(config.stateDir, "migration_progress.json"),
    logsDir: join(config.stateDir, "logs"),
    logPath: join(config.stateDir, "logs", "migration.log"),
    reportPath: join(config.stateDir, "reports", "migration_report.txt"),
  }
}
