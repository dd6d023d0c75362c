import { readFile } from "node:fs/promises"

import { isEnoent } from "../lib/errors"
import { writeJsonFile } from "../lib/fs"
import { asRecord } from "../lib/json"
import type { ProgressCheckpoint } from "./contracts"

export interface ProgressSink {
  record(checkpoint: ProgressCheckpoint): Promise<void>
}

/**
 * Overwrites the progress file. Writes are serialized so the last completion wins; a failed write
 * rejects its own caller without blocking later ones.
 */
export class ProgressFile implements ProgressSink {
  private chain: Promise<void> = Promise.resolve()

  constructor(readonly path: string) {}

  async record(checkpoint: ProgressCheckpoint): Promise<void> {
    const write = this.chain.then(() => writeJsonFile(this.path, checkpoint))
    this.chain = write.catch(() => undefined)
    await write
  }
}

export function parseProgress(value: unknown): ProgressCheckpoint | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return null
  }

  const record = asRecord(value)
  if (
    typeof record.itemsDone !== "number" ||
    typeof record.itemsTotal !== "number" ||
    typeof record.lastItemName !== "string" ||
    typeof record.updatedAt !== "string"
  ) {
    return null
  }

  return {
    itemsDone: record.itemsDone,
    itemsTotal: record.itemsTotal,
    lastItemName: record.lastItemName,
    updatedAt: record.updatedAt,
  }
}

export async function readProgress(path: string): Promise<ProgressCheckpoint | null> {
  let raw: string
  try {
    raw = await readFile(path, "utf8")
  } catch (error) {
    if (isEnoent(error)) {
      return null
    }

    throw error
  }

  try {
    const parsed: unknown = JSON.parse(raw)
    return parseProgress(parsed)
  } catch {
    return null
  }
}
