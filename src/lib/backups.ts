import { join } from "node:path"

import { pathExists } from "./fs"

const DEFAULT_MAX_ATTEMPTS = 10_000

export async function chooseNumberedBackupPath(
  directoryPath: string,
  baseLabel: string,
  maxAttempts = DEFAULT_MAX_ATTEMPTS,
): Promise<{ backupPath: string; label: string }> {
  for (let index = 0; index < maxAttempts; index += 1) {
    const label = index === 0 ? baseLabel : `${baseLabel}.${index}`
    const backupPath = join(directoryPath, label)

    if (!(await pathExists(backupPath))) {
      return { backupPath, label }
    }
  }

  throw new Error(`Could not find an available backup path under ${directoryPath} after ${maxAttempts} attempts`)
}

function pad(value: number): string {
  return String(value).padStart(2, "0")
}

// YYYYMMDD_HHMMSS in local time.
export function backupStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}
