/**
 * Exponential backoff with jitter for calls to the enrichment API.
 */

import { setTimeout as delay } from 'node:timers/promises'
import type { Result } from '../common/result.js'
import { Ok, Err } from '../common/result.js'
import type { FailureReason } from './schemas.js'

/** HTTP 429 or an equivalent quota signal. */
export class RateLimitError extends Error {
  readonly retryAfterMs: number | null

  constructor(message: string, retryAfterMs: number | null = null) {
    super(message)
    this.name = 'RateLimitError'
    this.retryAfterMs = retryAfterMs
  }
}

/** 5xx, timeouts, dropped connections. Worth retrying. */
export class TransientApiError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TransientApiError'
  }
}

/** 4xx other than 429. Retrying will not help. */
export class PermanentApiError extends Error {
  readonly status: number | null

  constructor(message: string, status: number | null = null) {
    super(message)
    this.name = 'PermanentApiError'
    this.status = status
  }
}

export type ApiFailureReason = Extract<FailureReason, 'rate_limited' | 'transient' | 'permanent'>

export function classifyApiError(err: unknown): ApiFailureReason {
  if (err instanceof RateLimitError) return 'rate_limited'
  if (err instanceof PermanentApiError) return 'permanent'
  return 'transient'
}

export interface RetryOptions {
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  /** Fraction of the delay randomized in either direction, 0..1. */
  jitter: number
}

export interface RetryDeps {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  random?: () => number
}

export interface RetryHooks {
  signal?: AbortSignal
  /** Called before each backoff wait. */
  onRetry?: (attempt: number, reason: ApiFailureReason, delayMs: number) => void
}

export interface RetrySuccess<T> {
  value: T
  attempts: number
  rateLimited: number
}

export interface RetryFailure {
  error: unknown
  reason: ApiFailureReason
  attempts: number
  rateLimited: number
}

const DEFAULT_RETRY: RetryOptions = { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 10_000, jitter: 0.1 }

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await delay(ms, undefined, signal ? { signal } : undefined)
}

export class RetryPolicy {
  readonly options: RetryOptions
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly random: () => number

  constructor(options: Partial<RetryOptions> = {}, deps: RetryDeps = {}) {
    this.options = { ...DEFAULT_RETRY, ...options }
    this.sleep = deps.sleep ?? defaultSleep
    this.random = deps.random ?? Math.random
  }

  /** Delay before retry number `attempt` (1-based: the wait after the first failure is attempt 1). */
  delayFor(attempt: number): number {
    const { baseDelayMs, maxDelayMs, jitter } = this.options
    const exponential = Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1))
    const spread = exponential * jitter * (2 * this.random() - 1)
    return Math.max(0, Math.min(maxDelayMs, Math.round(exponential + spread)))
  }

  /**
   * Run `fn` until it succeeds, fails permanently, or attempts run out.
   * A rate-limit response with a Retry-After longer than the backoff waits the longer time.
   */
  async execute<T>(
    fn: (attempt: number) => Promise<T>,
    hooks: RetryHooks = {},
  ): Promise<Result<RetrySuccess<T>, RetryFailure>> {
    const { signal, onRetry } = hooks
    let rateLimited = 0
    let attempt = 0
    for (;;) {
      attempt++
      try {
        const value = await fn(attempt)
        return Ok({ value, attempts: attempt, rateLimited })
      } catch (err) {
        const reason = classifyApiError(err)
        if (reason === 'rate_limited') rateLimited++
        if (reason === 'permanent' || attempt >= this.options.maxAttempts || signal?.aborted) {
          return Err({ error: err, reason, attempts: attempt, rateLimited })
        }
        let waitMs = this.delayFor(attempt)
        if (err instanceof RateLimitError && err.retryAfterMs !== null) {
          waitMs = Math.min(this.options.maxDelayMs, Math.max(waitMs, err.retryAfterMs))
        }
        onRetry?.(attempt, reason, waitMs)
        try {
          await this.sleep(waitMs, signal)
        } catch (sleepErr) {
          // Aborted while backing off
          return Err({ error: sleepErr, reason, attempts: attempt, rateLimited })
        }
      }
    }
  }
}
