/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight. Items are picked up in
 * array order; the returned promise settles once every worker has drained the list.
 */
export async function forEachConcurrent<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  const total = items.length
  if (total === 0) {
    return
  }

  const workerCount = Math.max(1, Math.min(Math.floor(concurrency), total))
  let nextIndex = 0

  await Promise.all(
    Array.from({ length: workerCount }, async () => {
      while (true) {
        const index = nextIndex
        nextIndex += 1

        if (index >= total) {
          return
        }

        const item = items[index]
        if (item === undefined) {
          return
        }

        await worker(item, index)
      }
    }),
  )
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms)
  })
}

export class TimeoutError extends Error {
  timeoutMs: number

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${Math.round(timeoutMs / 1000)}s`)
    this.name = "TimeoutError"
    this.timeoutMs = timeoutMs
  }
}

/**
 * Runs `task` with a signal that aborts after `timeoutMs`, then rejects with a TimeoutError. The
 * task is always awaited to the end, so nothing it started is still running when this settles;
 * how quickly it stops after the abort is up to the task. A timeout of 0 or less disables the bound.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController()
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return task(controller.signal)
  }

  const timer = setTimeout(() => controller.abort(new TimeoutError(label, timeoutMs)), timeoutMs)

  let value: T
  try {
    value = await task(controller.signal)
  } catch (error) {
    if (controller.signal.aborted) {
      throw new TimeoutError(label, timeoutMs)
    }
    throw error
  } finally {
    clearTimeout(timer)
  }

  if (controller.signal.aborted) {
    throw new TimeoutError(label, timeoutMs)
  }
  return value
}
