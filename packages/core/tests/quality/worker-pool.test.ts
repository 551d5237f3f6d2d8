import { describe, it, expect } from 'vitest'
import { setTimeout as delay } from 'node:timers/promises'
import { runWorkerPool } from '../../src/quality/index.js'

describe('runWorkerPool', () => {
  it('returns outcomes in input order', async () => {
    const outcomes = await runWorkerPool([1, 2, 3, 4, 5, 6], { workers: 3, minDelayMs: 0 }, async (n) => {
      await delay((7 - n) * 2)
      return n * 10
    })

    expect(outcomes.map(o => (o.ok ? o.value : null))).toEqual([10, 20, 30, 40, 50, 60])
  })

  it('captures a failing item without stopping the rest', async () => {
    const outcomes = await runWorkerPool(['a', 'b', 'c'], { workers: 2, minDelayMs: 0 }, async (s) => {
      if (s === 'b') throw new Error('boom')
      return s.toUpperCase()
    })

    expect(outcomes).toHaveLength(3)
    expect(outcomes[0]).toEqual({ item: 'a', ok: true, value: 'A' })
    expect(outcomes[1].ok).toBe(false)
    expect(outcomes[2]).toEqual({ item: 'c', ok: true, value: 'C' })
  })

  it('never runs more tasks at once than there are workers', async () => {
    let active = 0
    let peak = 0
    await runWorkerPool([1, 2, 3, 4, 5], { workers: 2, minDelayMs: 0 }, async () => {
      active++
      peak = Math.max(peak, active)
      await delay(5)
      active--
    })
    expect(peak).toBe(2)
  })

  it('spaces the calls of each worker by minDelayMs', async () => {
    const waits: number[] = []
    await runWorkerPool([1, 2, 3], {
      workers: 1,
      minDelayMs: 100,
      now: () => 0,
      sleep: async (ms) => { waits.push(ms) },
    }, async (n) => n)

    expect(waits).toEqual([100, 100])
  })

  it('leaves out items never taken after shouldStop', async () => {
    let taken = 0
    const outcomes = await runWorkerPool([1, 2, 3, 4], {
      workers: 1,
      minDelayMs: 0,
      shouldStop: () => taken >= 2,
    }, async (n) => {
      taken++
      return n
    })
    expect(outcomes.map(o => o.item)).toEqual([1, 2])
  })

  it('takes nothing once the signal is aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    const outcomes = await runWorkerPool([1, 2], { workers: 2, minDelayMs: 0, signal: controller.signal }, async (n) => n)
    expect(outcomes).toEqual([])
  })

  it('handles an empty queue', async () => {
    expect(await runWorkerPool([], { workers: 3, minDelayMs: 0 }, async () => 1)).toEqual([])
  })
})
