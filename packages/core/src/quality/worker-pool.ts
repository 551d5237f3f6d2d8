/**
 * Fixed-size worker pool over a shared queue. Each worker keeps a minimum
 * spacing between the starts of its own calls.
 */

import { setTimeout as delay } from 'node:timers/promises'

export type PoolOutcome<I, R> =
  | { item: I; ok: true; value: R }
  | { item: I; ok: false; error: unknown }

export interface WorkerPoolOptions {
  workers: number
  minDelayMs: number
  signal?: AbortSignal
  /** Checked before each item is taken. Items never taken are absent from the outcome. */
  shouldStop?: () => boolean
  sleep?: (ms: number) => Promise<void>
  now?: () => number
}

export async function runWorkerPool<I, R>(
  items: readonly I[],
  options: WorkerPoolOptions,
  task: (item: I, workerId: number) => Promise<R>,
): Promise<Array<PoolOutcome<I, R>>> {
  const sleep = options.sleep ?? (async (ms: number) => { await delay(ms) })
  const now = options.now ?? Date.now
  const outcomes: Array<PoolOutcome<I, R> | undefined> = new Array(items.length)
  let cursor = 0

  const worker = async (workerId: number): Promise<void> => {
    let lastStart: number | null = null
    while (cursor < items.length) {
      if (options.signal?.aborted || options.shouldStop?.()) return
      const index = cursor++
      const item = items[index]
      if (item === undefined) return

      if (lastStart !== null) {
        const wait = options.minDelayMs - (now() - lastStart)
        if (wait > 0) await sleep(wait)
      }
      lastStart = now()

      try {
        outcomes[index] = { item, ok: true, value: await task(item, workerId) }
      } catch (error) {
        outcomes[index] = { item, ok: false, error }
      }
    }
  }

  const count = Math.max(1, Math.min(options.workers, items.length))
  await Promise.all(Array.from({ length: count }, (_, i) => worker(i)))

  return outcomes.filter((o): o is PoolOutcome<I, R> => o !== undefined)
}
