/**
 * fetch helpers shared by the HTTP clients: per-request timeout chained to the
 * caller's AbortSignal, and status-to-error classification for the retry policy.
 */

import { KnowledgeBaseError, PermanentApiError, RateLimitError, TransientApiError, errorMessage } from '@refkb/core'

export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<Response> {
  if (signal?.aborted) throw KnowledgeBaseError.cancelled()

  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  const onAbort = () => controller.abort()
  signal?.addEventListener('abort', onAbort, { once: true })

  try {
    return await fetch(url, { ...init, signal: controller.signal })
  } catch (err) {
    if (signal?.aborted) throw KnowledgeBaseError.cancelled()
    if (controller.signal.aborted) throw new TransientApiError(`Request to ${url} timed out after ${timeoutMs}ms`)
    throw new TransientApiError(`Request to ${url} failed: ${errorMessage(err)}`)
  } finally {
    clearTimeout(timeout)
    signal?.removeEventListener('abort', onAbort)
  }
}

/** Retry-After in milliseconds; accepts delta-seconds or an HTTP date. */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (!header) return null
  const seconds = Number(header)
  if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1000)
  const date = Date.parse(header)
  return Number.isNaN(date) ? null : Math.max(0, date - now)
}

/** Throws the error class matching a non-2xx response. */
export async function throwForStatus(response: Response, service: string): Promise<never> {
  const body = (await response.text().catch(() => '')).slice(0, 200)
  const detail = `${service} responded ${response.status}${body ? `: ${body}` : ''}`
  if (response.status === 429) {
    throw new RateLimitError(detail, parseRetryAfter(response.headers.get('retry-after')))
  }
  if (response.status >= 500 || response.status === 408) {
    throw new TransientApiError(detail)
  }
  throw new PermanentApiError(detail, response.status)
}

export function l2Normalize(vec: number[]): number[] {
  let norm = 0
  for (let i = 0; i < vec.length; i++) {
    norm += vec[i] * vec[i]
  }
  norm = Math.sqrt(norm)
  if (norm === 0) return vec
  return vec.map(v => v / norm)
}
