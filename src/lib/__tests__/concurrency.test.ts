import { describe, expect, it } from "vitest"

import { forEachConcurrent, sleep, TimeoutError, withTimeout } from "../concurrency"

describe("forEachConcurrent", () => {
  it("returns immediately for empty lists", async () => {
    let called = false
    await forEachConcurrent([], 4, () => {
      called = true
      return Promise.resolve()
    })

    expect(called).toBe(false)
  })

  it("processes all items with bounded worker count", async () => {
    const seen: number[] = []

    await forEachConcurrent([1, 2, 3, 4, 5], 20, async (item) => {
      await sleep(item % 2 === 0 ? 2 : 1)
      seen.push(item)
    })

    expect(seen.sort((left, right) => left - right)).toEqual([1, 2, 3, 4, 5])
  })

  it("never runs more than the requested number of workers at once", async () => {
    let active = 0
    let peak = 0

    await forEachConcurrent([5, 1, 4, 2, 3, 1, 2], 3, async (delay) => {
      active += 1
      peak = Math.max(peak, active)
      await sleep(delay)
      active -= 1
    })

    expect(peak).toBe(3)
  })

  it("starts items in array order with a single worker", async () => {
    const started: string[] = []

    await forEachConcurrent(["c", "a", "b"], 1, async (item, index) => {
      started.push(`${index}:${item}`)
      await sleep(1)
    })

    expect(started).toEqual(["0:c", "1:a", "2:b"])
  })
})

describe("withTimeout", () => {
  it("resolves with the task value when it finishes in time", async () => {
    await expect(withTimeout(async () => "done", 1_000, "task")).resolves.toBe("done")
  })

  it("aborts a slow task and waits for it to stop before rejecting", async () => {
    let stopped = false
    const task = (signal: AbortSignal): Promise<string> =>
      new Promise((_, reject) => {
        signal.addEventListener(
          "abort",
          () => {
            setTimeout(() => {
              stopped = true
              reject(new Error("aborted"))
            }, 20)
          },
          { once: true },
        )
      })

    const outcome = withTimeout(task, 10, "Transfer of demo").then(
      () => "resolved",
      (error: unknown) => (error instanceof TimeoutError ? `timeout, stopped: ${stopped}` : "other"),
    )

    await expect(outcome).resolves.toBe("timeout, stopped: true")
  })

  it("reports a timeout when the task ignores the signal and finishes late", async () => {
    let finished = false
    const task = async (): Promise<number> => {
      await sleep(30)
      finished = true
      return 1
    }

    await expect(withTimeout(task, 5, "task")).rejects.toThrow("task timed out after 0s")
    expect(finished).toBe(true)
  })

  it("does not bound the task when the timeout is 0", async () => {
    await expect(withTimeout(() => sleep(5).then(() => 7), 0, "task")).resolves.toBe(7)
  })
})
