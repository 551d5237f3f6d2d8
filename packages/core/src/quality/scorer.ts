/**
 * QualityScorer: scores documents in basic or enhanced mode.
 *
 * Enhanced mode batches DOI lookups across a small worker pool, retries with
 * backoff, and falls back to basic scoring per document whenever enrichment is
 * unavailable. A sliding failure window detects sustained API trouble and asks
 * the caller whether to keep retrying or finish in basic mode. Every document
 * always gets a score.
 */

import type { CheckpointManager } from '../checkpoint/index.js'
import { KnowledgeBaseError } from '../common/errors.js'
import type { Result } from '../common/result.js'
import { Ok, Err } from '../common/result.js'
import { calculateBasicQuality } from './basic.js'
import { calculateEnhancedQuality } from './enhanced.js'
import type { QualityEnrichmentClient } from './enrichment-client.js'
import { FailureMonitor } from './failure-monitor.js'
import type { FailureSnapshot } from './failure-monitor.js'
import { normalizeDoi, normalizeEnrichment } from './normalize.js'
import { RetryPolicy } from './retry-policy.js'
import type { ApiFailureReason } from './retry-policy.js'
import type { FailureReason, QualityInput, ScoreMode, ScoredDocument } from './schemas.js'
import { runWorkerPool } from './worker-pool.js'
import type { PoolOutcome } from './worker-pool.js'

export interface ScoringTarget {
  documentId: string
  input: QualityInput
}

export type DegradedChoice = 'basic' | 'retry'

export interface DegradationReport extends FailureSnapshot {
  processed: number
  remaining: number
}

export interface QualityScorerOptions {
  mode: ScoreMode
  workers?: number
  minDelayMs?: number
  batchSize?: number
  failureThreshold?: number
  failureWindow?: number
  retryPolicy?: RetryPolicy
  enrichmentClient?: QualityEnrichmentClient | null
  /** Asked once per degradation episode. Defaults to finishing in basic mode. */
  onDegraded?: (report: DegradationReport) => DegradedChoice | Promise<DegradedChoice>
  now?: () => Date
  sleep?: (ms: number) => Promise<void>
}

export interface ScoreRunOptions {
  /** Completed documents are skipped and their stored results reused. */
  checkpoint?: CheckpointManager<ScoredDocument>
  signal?: AbortSignal
  onProgress?: (done: number, total: number) => void
}

export interface ScoringSummary {
  total: number
  enhanced: number
  basic: number
  /** Enhanced was requested but the document fell back to basic. */
  fallback: number
  resumed: number
  failures: Partial<Record<FailureReason, number>>
  apiCalls: number
  rateLimitedResponses: number
  degraded: boolean
  retriedBatches: number
}

export interface ScoringOutcome {
  results: ScoredDocument[]
  summary: ScoringSummary
}

interface BatchFailure {
  batch: ScoringTarget[]
  reason: ApiFailureReason
}

const DEFAULTS = {
  workers: 3,
  minDelayMs: 100,
  batchSize: 100,
  failureThreshold: 0.5,
  failureWindow: 20,
}

export class QualityScorer {
  readonly mode: ScoreMode
  private readonly workers: number
  private readonly minDelayMs: number
  private readonly batchSize: number
  private readonly retryPolicy: RetryPolicy
  private readonly client: QualityEnrichmentClient | null
  private readonly monitor: FailureMonitor
  private readonly onDegraded: (report: DegradationReport) => DegradedChoice | Promise<DegradedChoice>
  private readonly now: () => Date
  private readonly sleep: ((ms: number) => Promise<void>) | undefined

  constructor(options: QualityScorerOptions) {
    this.mode = options.mode
    this.workers = options.workers ?? DEFAULTS.workers
    this.minDelayMs = options.minDelayMs ?? DEFAULTS.minDelayMs
    this.client = options.enrichmentClient ?? null
    const requested = options.batchSize ?? DEFAULTS.batchSize
    this.batchSize = Math.max(1, Math.min(requested, this.client?.maxBatchSize ?? requested))
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy()
    this.monitor = new FailureMonitor(
      options.failureThreshold ?? DEFAULTS.failureThreshold,
      options.failureWindow ?? DEFAULTS.failureWindow,
    )
    this.onDegraded = options.onDegraded ?? (() => 'basic')
    this.now = options.now ?? (() => new Date())
    this.sleep = options.sleep
  }

  /** Score a single document locally. */
  scoreBasic(target: ScoringTarget, fallbackReason: FailureReason | null = null): ScoredDocument {
    return {
      documentId: target.documentId,
      quality: calculateBasicQuality(target.input, this.now()),
      fallbackReason,
    }
  }

  async scoreAll(
    targets: readonly ScoringTarget[],
    runOptions: ScoreRunOptions = {},
  ): Promise<Result<ScoringOutcome, KnowledgeBaseError>> {
    const { checkpoint, signal, onProgress } = runOptions
    const results = new Map<string, ScoredDocument>()
    const summary: ScoringSummary = {
      total: targets.length,
      enhanced: 0,
      basic: 0,
      fallback: 0,
      resumed: 0,
      failures: {},
      apiCalls: 0,
      rateLimitedResponses: 0,
      degraded: false,
      retriedBatches: 0,
    }

    if (checkpoint) {
      const point = checkpoint.resume(targets.map(t => ({ id: t.documentId })))
      for (const target of targets) {
        const stored = point.results.get(target.documentId)
        if (point.completedIds.has(target.documentId) && stored) {
          results.set(target.documentId, stored)
          summary.resumed++
        }
      }
      if (summary.resumed > 0) {
        console.log(`[quality] resuming: ${summary.resumed}/${targets.length} documents already scored`)
      }
    }

    const report = () => onProgress?.(results.size, targets.length)
    const commit = async (doc: ScoredDocument): Promise<void> => {
      results.set(doc.documentId, doc)
      if (checkpoint) await checkpoint.record(doc.documentId, doc)
      report()
    }

    const pending = targets.filter(t => !results.has(t.documentId))

    if (this.mode === 'basic' || !this.client) {
      if (this.mode === 'enhanced') {
        console.warn('[quality] no enrichment client configured, using basic scoring')
      }
      for (const target of pending) {
        if (signal?.aborted) return Err(KnowledgeBaseError.cancelled('Quality scoring cancelled'))
        await commit(this.scoreBasic(target, this.mode === 'enhanced' ? 'degraded' : null))
      }
    } else {
      const cancelled = await this.scoreEnhanced(this.client, pending, summary, commit, signal)
      if (cancelled) return Err(KnowledgeBaseError.cancelled('Quality scoring cancelled'))
    }

    if (checkpoint) await checkpoint.flush()

    const ordered: ScoredDocument[] = []
    for (const target of targets) {
      const doc = results.get(target.documentId)
      if (!doc) return Err(KnowledgeBaseError.integrity(`Document ${target.documentId} was not scored`))
      ordered.push(doc)
      if (doc.quality.mode === 'enhanced') summary.enhanced++
      else summary.basic++
      if (doc.fallbackReason) {
        summary.fallback++
        summary.failures[doc.fallbackReason] = (summary.failures[doc.fallbackReason] ?? 0) + 1
      }
    }

    console.log(`[quality] scored ${ordered.length} documents: ${summary.enhanced} enhanced, ${summary.basic} basic (${summary.fallback} fallbacks)`)
    return Ok({ results: ordered, summary })
  }

  /** Returns true when cancelled. */
  private async scoreEnhanced(
    client: QualityEnrichmentClient,
    pending: ScoringTarget[],
    summary: ScoringSummary,
    commit: (doc: ScoredDocument) => Promise<void>,
    signal: AbortSignal | undefined,
  ): Promise<boolean> {
    const withDoi: ScoringTarget[] = []
    for (const target of pending) {
      if (target.input.doi && normalizeDoi(target.input.doi)) withDoi.push(target)
      else await commit(this.scoreBasic(target, 'no_identifier'))
    }

    const batches: ScoringTarget[][] = []
    for (let i = 0; i < withDoi.length; i += this.batchSize) {
      batches.push(withDoi.slice(i, i + this.batchSize))
    }

    const health: { finishInBasic: boolean; retryRequested: boolean; decision: Promise<void> | null } = {
      finishInBasic: false,
      retryRequested: false,
      decision: null,
    }
    let processed = 0
    const failed: BatchFailure[] = []

    const checkHealth = async (remaining: number): Promise<void> => {
      if (health.finishInBasic || !this.monitor.isDegraded()) return
      if (!health.decision) {
        const snapshot = this.monitor.snapshot()
        summary.degraded = true
        console.warn(`[quality] enrichment API degraded: ${snapshot.failures}/${snapshot.samples} recent calls failed`)
        health.decision = Promise.resolve(this.onDegraded({ ...snapshot, processed, remaining })).then(choice => {
          if (choice === 'basic') {
            console.warn('[quality] finishing remaining documents with basic scoring')
            health.finishInBasic = true
          } else {
            health.retryRequested = true
            this.monitor.reset()
          }
          health.decision = null
        })
      }
      await health.decision
    }

    const runBatch = async (batch: ScoringTarget[], retryRound: boolean): Promise<void> => {
      if (health.finishInBasic) {
        for (const target of batch) await commit(this.scoreBasic(target, 'degraded'))
        return
      }

      const dois = batch.map(t => normalizeDoi(t.input.doi ?? ''))
      summary.apiCalls++
      const outcome = await this.retryPolicy.execute(() => client.fetchBatch(dois, signal), {
        signal,
        onRetry: (attempt, reason, delayMs) => {
          console.warn(`[quality] batch of ${batch.length} failed (${reason}), attempt ${attempt}; retrying in ${delayMs}ms`)
        },
      })
      if (outcome.ok) {
        summary.rateLimitedResponses += outcome.value.rateLimited
        this.monitor.record(true)
        for (const target of batch) {
          await commit(this.scoreFromRecord(target, outcome.value.value.get(normalizeDoi(target.input.doi ?? ''))))
        }
      } else {
        summary.rateLimitedResponses += outcome.error.rateLimited
        this.monitor.record(false)
        if (!retryRound) failed.push({ batch, reason: outcome.error.reason })
        for (const target of batch) await commit(this.scoreBasic(target, outcome.error.reason))
      }
      processed += batch.length
      await checkHealth(withDoi.length - processed)
    }

    rethrowFirstFailure(await runWorkerPool(
      batches,
      { workers: this.workers, minDelayMs: this.minDelayMs, signal, sleep: this.sleep },
      batch => runBatch(batch, false),
    ))
    if (signal?.aborted) return true

    // A 'retry' answer gives failed batches one more pass once the queue drains
    if (health.retryRequested && !health.finishInBasic && failed.length > 0) {
      const retryable = failed.filter(f => f.reason !== 'permanent').map(f => f.batch)
      summary.retriedBatches = retryable.length
      console.log(`[quality] retrying ${retryable.length} failed batches`)
      rethrowFirstFailure(await runWorkerPool(
        retryable,
        { workers: this.workers, minDelayMs: this.minDelayMs, signal, sleep: this.sleep, shouldStop: () => health.finishInBasic },
        batch => runBatch(batch, true),
      ))
      if (signal?.aborted) return true
    }

    return false
  }

  private scoreFromRecord(target: ScoringTarget, raw: unknown): ScoredDocument {
    if (raw === undefined || raw === null) return this.scoreBasic(target, 'not_found')
    const enrichment = normalizeEnrichment(raw)
    if (!enrichment.ok) {
      console.warn(`[quality] ${target.documentId}: ${enrichment.error.message}`)
      return this.scoreBasic(target, 'malformed')
    }
    return {
      documentId: target.documentId,
      quality: calculateEnhancedQuality(target.input, enrichment.value, this.now()),
      fallbackReason: null,
    }
  }
}

/** API failures are handled inside a batch; anything escaping it (a failed checkpoint write) aborts the run. */
function rethrowFirstFailure<I>(outcomes: Array<PoolOutcome<I, void>>): void {
  for (const outcome of outcomes) {
    if (!outcome.ok) throw outcome.error
  }
}
