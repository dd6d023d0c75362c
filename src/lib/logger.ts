import { appendFile, mkdir } from "node:fs/promises"
import { dirname } from "node:path"
import { log } from "@clack/prompts"

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR"

export interface Logger {
  debug(message: string): void
  info(message: string): void
  success(message: string): void
  warn(message: string): void
  error(message: string): void
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
}

function pad(value: number): string {
  return String(value).padStart(2, "0")
}

export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

export function formatLogLine(level: LogLevel, message: string, date: Date): string {
  return `[${formatLogTimestamp(date)}] [${level}] ${message}\n`
}

/**
 * Terminal output through @clack/prompts plus an append-only run log. Debug lines only reach the
 * file. File writes are chained so lines keep their order; call `flush()` before exiting.
 */
export class RunLogger implements Logger {
  private chain: Promise<void> = Promise.resolve()
  private writeError: unknown = null

  constructor(
    private readonly logPath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  debug(message: string): void {
    this.record("DEBUG", message)
  }

  info(message: string): void {
    log.info(message)
    this.record("INFO", message)
  }

  success(message: string): void {
    log.success(message)
    this.record("INFO", message)
  }

  warn(message: string): void {
    log.warn(message)
    this.record("WARN", message)
  }

  error(message: string): void {
    log.error(message)
    this.record("ERROR", message)
  }

  async flush(): Promise<void> {
    await this.chain
    if (this.writeError !== null) {
      const failure = this.writeError
      this.writeError = null
      log.warn(`Could not write run log ${this.logPath}: ${failure instanceof Error ? failure.message : String(failure)}`)
    }
  }

  /** Writes to the run log only. */
  record(level: LogLevel, message: string): void {
    const line = formatLogLine(level, message, this.now())
    this.chain = this.chain
      .then(async () => {
        await mkdir(dirname(this.logPath), { recursive: true })
        await appendFile(this.logPath, line, "utf8")
      })
      .catch((error: unknown) => {
        this.writeError = error
      })
  }
}
