export type EnvironmentErrorCode =
  | "SOURCE_MISSING"
  | "ARCHIVE_MISSING"
  | "ARCHIVE_UNWRITABLE"
  | "REGISTRY_UNREACHABLE"

export class EnvironmentError extends Error {
  code: EnvironmentErrorCode
  details?: string

  constructor(code: EnvironmentErrorCode, message: string, details?: string) {
    super(`[${code}] ${message}`)
    this.name = "EnvironmentError"
    this.code = code
    if (details !== undefined) {
      this.details = details
    }
  }
}

export class ConfigError extends Error {
  key: string

  constructor(key: string, message: string) {
    super(message)
    this.name = "ConfigError"
    this.key = key
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "UsageError"
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** Message plus the details an EnvironmentError carries. */
export function describeError(error: unknown): string {
  if (error instanceof EnvironmentError && error.details) {
    return `${error.message} (${error.details})`
  }

  return errorMessage(error)
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined
  }

  return typeof error.code === "string" ? error.code : undefined
}

export function isEnoent(error: unknown): boolean {
  return errorCode(error) === "ENOENT"
}
