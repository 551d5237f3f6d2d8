import { describe, it, expect, vi } from 'vitest'
import {
  PermanentApiError,
  RateLimitError,
  RetryPolicy,
  TransientApiError,
  classifyApiError,
} from '../../src/quality/index.js'

function policy(options: ConstructorParameters<typeof RetryPolicy>[0] = {}, random = () => 0.5) {
  const waits: number[] = []
  const sleep = vi.fn(async (ms: number) => { waits.push(ms) })
  return { policy: new RetryPolicy(options, { sleep, random }), waits, sleep }
}

/** Fails with the given errors in order, then returns 'done'. */
function failing(...errors: Error[]) {
  let call = 0
  return vi.fn(async () => {
    const error = errors[call++]
    if (error) throw error
    return 'done'
  })
}

describe('classifyApiError', () => {
  it('maps error classes to reasons', () => {
    expect(classifyApiError(new RateLimitError('slow down'))).toBe('rate_limited')
    expect(classifyApiError(new PermanentApiError('bad request', 400))).toBe('permanent')
    expect(classifyApiError(new TransientApiError('503'))).toBe('transient')
    expect(classifyApiError(new Error('socket hang up'))).toBe('transient')
  })
})

describe('RetryPolicy.delayFor', () => {
  it('doubles from the base delay', () => {
    const { policy: p } = policy({ baseDelayMs: 100, maxDelayMs: 1000, jitter: 0.1 })
    expect([1, 2, 3, 4].map(a => p.delayFor(a))).toEqual([100, 200, 400, 800])
  })

  it('caps at the maximum delay', () => {
    const { policy: p } = policy({ baseDelayMs: 100, maxDelayMs: 1000 })
    expect(p.delayFor(5)).toBe(1000)
    expect(p.delayFor(12)).toBe(1000)
  })

  it('spreads by the jitter fraction', () => {
    expect(policy({ jitter: 0.1 }, () => 1).policy.delayFor(1)).toBe(110)
    expect(policy({ jitter: 0.1 }, () => 0).policy.delayFor(1)).toBe(90)
  })
})

describe('RetryPolicy.execute', () => {
  it('retries transient failures with backoff until success', async () => {
    const { policy: p, waits } = policy()
    const fn = failing(new TransientApiError('503'), new TransientApiError('503'))
    const onRetry = vi.fn()

    const result = await p.execute(fn, { onRetry })

    expect(result).toEqual({ ok: true, value: { value: 'done', attempts: 3, rateLimited: 0 } })
    expect(waits).toEqual([100, 200])
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, 'transient', 100)
    expect(onRetry).toHaveBeenNthCalledWith(2, 2, 'transient', 200)
  })

  it('stops at once on a permanent failure', async () => {
    const { policy: p, sleep } = policy()
    const result = await p.execute(failing(new PermanentApiError('404', 404)))

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.reason).toBe('permanent')
      expect(result.error.attempts).toBe(1)
    }
    expect(sleep).not.toHaveBeenCalled()
  })

  it('gives up after maxAttempts', async () => {
    const { policy: p, waits } = policy({ maxAttempts: 3 })
    const fn = failing(...Array.from({ length: 5 }, () => new TransientApiError('timeout')))

    const result = await p.execute(fn)
    expect(fn).toHaveBeenCalledTimes(3)
    expect(waits).toEqual([100, 200])
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toMatchObject({ reason: 'transient', attempts: 3, rateLimited: 0 })
  })

  it('honours a longer Retry-After and counts rate-limited responses', async () => {
    const { policy: p, waits } = policy()
    const result = await p.execute(failing(new RateLimitError('429', 5000)))

    expect(waits).toEqual([5000])
    expect(result).toEqual({ ok: true, value: { value: 'done', attempts: 2, rateLimited: 1 } })
  })

  it('caps Retry-After at the maximum delay', async () => {
    const { policy: p, waits } = policy({ maxDelayMs: 10_000 })
    await p.execute(failing(new RateLimitError('429', 60_000)))
    expect(waits).toEqual([10_000])
  })

  it('does not retry once the signal is aborted', async () => {
    const { policy: p, sleep } = policy()
    const controller = new AbortController()
    controller.abort()

    const result = await p.execute(failing(new TransientApiError('503')), { signal: controller.signal })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.attempts).toBe(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('returns the failure when the backoff wait is interrupted', async () => {
    const interrupted = new Error('The operation was aborted')
    const p = new RetryPolicy({}, { sleep: async () => { throw interrupted }, random: () => 0.5 })

    const result = await p.execute(failing(new TransientApiError('503')))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.error).toBe(interrupted)
      expect(result.error.attempts).toBe(1)
    }
  })
})
