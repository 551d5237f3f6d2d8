/**
 * BuildOrchestrator: one safe, resumable build of the knowledge base.
 *
 *   diff -> extract -> score (+persist scores) -> embed (+persist cache) -> merge-index -> verify
 *
 * Each arrow is a checkpoint boundary; an interrupted run resumes at the last
 * boundary it crossed. The metadata store, the embedding cache and the vector
 * index are three separate files, kept consistent only by the order in which
 * this class writes them:
 *   - quality scores reach the metadata store before any embedding work
 *   - a vector reaches the cache file before its document is checkpointed
 *   - the index file is written before the metadata rows that point into it,
 *     with the pre-merge row count kept as a checkpoint marker
 *   - the fingerprint store is updated last, so a document only counts as
 *     embedded once its row is in place
 *
 * Incremental builds never delete anything. A full rebuild needs `confirm`
 * and backs up the previous state first.
 */

import { mkdir } from 'node:fs/promises'
import { freemem } from 'node:os'
import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import { CheckpointManager } from '../checkpoint/index.js'
import { KnowledgeBaseError, errorMessage, unwrap } from '../common/index.js'
import type { Result } from '../common/index.js'
import { Ok, Err } from '../common/index.js'
import { resolveKnowledgeBasePaths } from '../config/index.js'
import type { KnowledgeBaseConfig, KnowledgeBasePaths } from '../config/index.js'
import { DocumentRepository, KB_FORMAT_VERSION, formatDocumentId } from '../documents/index.js'
import type { DocumentRecord, EmbeddingAssignment, SourceDocument } from '../documents/index.js'
import { EmbeddingCache, buildEmbeddingText, optimalBatchSize } from '../embeddings/index.js'
import type { EmbeddingClient } from '../embeddings/index.js'
import { FingerprintStore, computeQualityFingerprint, diffDocuments } from '../fingerprint/index.js'
import { FlatVectorIndex, IndexBuilder, verifyKnowledgeBase } from '../indexing/index.js'
import type { IntegrityReport } from '../indexing/index.js'
import { FailureReasonSchema, QualityScorer, RetryPolicy, ScoredDocumentSchema } from '../quality/index.js'
import type { QualityEnrichmentClient, QualityScorerOptions, ScoredDocument, ScoringSummary } from '../quality/index.js'
import { BuildLock, openDatabase } from '../storage/index.js'
import { analyzeKnowledgeBase } from './analyze.js'
import type { KnowledgeBaseAnalysis } from './analyze.js'
import { createBackup } from './backup.js'
import { collectDocuments, qualityInputFor, toDocumentContent } from './documents.js'
import type { DocumentSource } from './documents.js'
import { BuildStageSchema, emptyCounts, stageOrder } from './schemas.js'
import type { BuildCounts, BuildMode, BuildProgress, BuildReport, BuildStage, DocumentFailure } from './schemas.js'

export interface BuildCollaborators {
  embeddingClient: EmbeddingClient
  /** Needed for enhanced scoring and quality upgrades. */
  enrichmentClient?: QualityEnrichmentClient | null
}

export interface BuildOrchestratorDeps {
  now?: () => Date
  /** Replaces every backoff and rate-limit wait. */
  sleep?: (ms: number) => Promise<void>
  /** Free-memory reading used to size embedding batches. */
  freeMemory?: () => number
}

export interface BuildOptions {
  mode?: BuildMode
  /** Required for a full rebuild. */
  confirm?: boolean
  signal?: AbortSignal
  onProgress?: (progress: BuildProgress) => void
  onDegraded?: QualityScorerOptions['onDegraded']
}

interface BuildContext {
  runId: string
  mode: BuildMode
  options: BuildOptions
  repo: DocumentRepository
  fingerprints: FingerprintStore
  cache: EmbeddingCache
  checkpoint: CheckpointManager<ScoredDocument>
  builder: IndexBuilder
  index: FlatVectorIndex
  modelId: string
  counts: BuildCounts
  quality: ScoringSummary | null
  failures: DocumentFailure[]
  backupDir: string | null
  resumedFrom: BuildStage | null
}

/** Diff counts survive a resume as checkpoint markers. */
const COUNT_MARKERS = ['total', 'new', 'changed', 'unchanged', 'removed', 'revived', 'duplicates'] as const

/** So does the scoring summary, once scores are persisted. */
const QUALITY_MARKERS = ['total', 'enhanced', 'basic', 'fallback', 'resumed', 'apiCalls', 'rateLimitedResponses', 'retriedBatches'] as const

export class BuildOrchestrator {
  readonly paths: KnowledgeBasePaths
  private readonly now: () => Date
  private readonly freeMemory: () => number

  constructor(
    private readonly config: KnowledgeBaseConfig,
    private readonly collaborators: BuildCollaborators,
    private readonly deps: BuildOrchestratorDeps = {},
  ) {
    this.paths = resolveKnowledgeBasePaths(config.rootDir)
    this.now = deps.now ?? (() => new Date())
    this.freeMemory = deps.freeMemory ?? freemem
  }

  /** Dry run: what a build of `documents` would do, without writing anything. */
  async analyze(documents: DocumentSource): Promise<Result<KnowledgeBaseAnalysis, KnowledgeBaseError>> {
    return analyzeKnowledgeBase(this.config, documents, this.collaborators.embeddingClient)
  }

  /**
   * Run a build. `documents` is the full current source library; it may be
   * null only for a quality upgrade of the documents already stored.
   */
  async build(
    documents: DocumentSource | null,
    options: BuildOptions = {},
  ): Promise<Result<BuildReport, KnowledgeBaseError>> {
    const startedAt = Date.now()
    const mode = options.mode ?? 'incremental'

    if (mode === 'rebuild' && !options.confirm) {
      return Err(KnowledgeBaseError.confirmationRequired(
        'A full rebuild replaces the vector index and re-packs every document. ' +
        'Nothing was changed. Pass confirm: true to proceed; a backup is taken first.',
      ))
    }
    if (documents === null && mode !== 'quality-upgrade') {
      return Err(KnowledgeBaseError.validation(`A ${mode} build needs the source documents`))
    }
    if (mode === 'quality-upgrade' && !this.collaborators.enrichmentClient) {
      return Err(KnowledgeBaseError.validation(
        'A quality upgrade needs an enrichment client; configure quality.mode "enhanced"',
      ))
    }

    let incoming: SourceDocument[] | null = null
    if (documents !== null) {
      const collected = await collectDocuments(documents)
      if (!collected.ok) return collected
      incoming = collected.value
    }

    await mkdir(this.paths.rootDir, { recursive: true })
    const lock = new BuildLock(this.paths.lock)
    const locked = await lock.acquire()
    if (!locked.ok) return locked

    let db: Database.Database | null = null
    try {
      db = openDatabase(this.paths.metadataDb)
      return await this.run(db, mode, incoming, options, startedAt)
    } catch (err) {
      const error = err instanceof KnowledgeBaseError ? err : KnowledgeBaseError.io(`Build failed: ${errorMessage(err)}`)
      console.error(`[build] ${error.message}`)
      return Err(error)
    } finally {
      db?.close()
      await lock.release()
    }
  }

  private async run(
    db: Database.Database,
    mode: BuildMode,
    incoming: SourceDocument[] | null,
    options: BuildOptions,
    startedAt: number,
  ): Promise<Result<BuildReport, KnowledgeBaseError>> {
    const client = this.collaborators.embeddingClient
    const repo = new DocumentRepository(db)

    const stored = unwrap(repo.getModelState())
    if (stored && mode !== 'rebuild' &&
      (stored.modelId !== client.providerFingerprint || stored.dimensions !== client.dimensions)) {
      return Err(KnowledgeBaseError.modelMismatch(
        `The knowledge base was embedded with ${stored.modelId} (${stored.dimensions} dimensions) but the ` +
        `active model is ${client.providerFingerprint} (${client.dimensions} dimensions). Vectors from ` +
        'different models cannot share an index. Run a full rebuild (mode "rebuild", confirm: true) to re-embed every document.',
      ))
    }

    const checkpoint = new CheckpointManager(this.paths.checkpoint, ScoredDocumentSchema, {
      interval: this.config.checkpoint.interval,
    })
    const pending = await checkpoint.detect()
    let runId: string
    let resumedFrom: BuildStage | null = null

    if (pending && pending.operation !== mode) {
      if (mode !== 'rebuild') {
        return Err(KnowledgeBaseError.validation(
          `An interrupted ${pending.operation} build is waiting at stage "${pending.stage}". ` +
          `Run a ${pending.operation} build to resume it, or a confirmed full rebuild to start over.`,
        ))
      }
      console.warn(`[build] discarding interrupted ${pending.operation} build; the confirmed rebuild supersedes it`)
      await checkpoint.discard()
    }

    if (pending && pending.operation === mode) {
      checkpoint.adopt(pending)
      runId = pending.runId
      const stage = BuildStageSchema.safeParse(pending.stage)
      resumedFrom = stage.success ? stage.data : 'diff'
      console.log(`[build] resuming ${mode} run ${runId.slice(0, 8)} at stage ${resumedFrom}`)
    } else {
      runId = uuidv4()
      await checkpoint.begin({ runId, operation: mode, stage: 'diff' })
    }
    unwrap(repo.startRun(runId, mode))

    const builder = new IndexBuilder(this.paths.index, client.dimensions)
    const opened = await builder.open()
    let index: FlatVectorIndex
    if (opened.ok) {
      index = opened.value
    } else if (mode === 'rebuild') {
      console.warn(`[build] ${opened.error.message}; the rebuild starts from an empty index`)
      index = new FlatVectorIndex(client.dimensions)
    } else {
      await checkpoint.interrupt()
      unwrap(repo.finishRun(runId, 'failed', {}, opened.error.message))
      return Err(KnowledgeBaseError.integrity(
        `${opened.error.message}. The index was left untouched; run a full rebuild (mode "rebuild", confirm: true) to regenerate it.`,
      ))
    }

    const ctx: BuildContext = {
      runId,
      mode,
      options,
      repo,
      fingerprints: await FingerprintStore.load(this.paths.fingerprints),
      cache: await EmbeddingCache.load(
        { metaPath: this.paths.embeddingCacheMeta, dataPath: this.paths.embeddingCacheData },
        client.dimensions,
      ),
      checkpoint,
      builder,
      index,
      modelId: client.providerFingerprint,
      counts: emptyCounts(),
      quality: null,
      failures: [],
      backupDir: null,
      resumedFrom,
    }

    try {
      if (mode === 'rebuild' && checkpoint.getMarker('backedUp') === undefined) {
        ctx.backupDir = await createBackup(db, this.paths, this.now())
        checkpoint.setMarker('backedUp', 1)
        await checkpoint.flush()
      }

      const start = ctx.resumedFrom ?? 'diff'
      const reached = (stage: BuildStage) => stageOrder(start) <= stageOrder(stage)
      const touchesEmbeddings = !(mode === 'quality-upgrade' && incoming === null)

      if (reached('extract') && incoming !== null) await this.diffAndExtract(ctx, incoming, start)
      else if (reached('extract')) await checkpoint.advance('score')
      this.restoreCounts(ctx)

      if (reached('persist-scores')) await this.scoreQuality(ctx)
      else this.restoreQuality(ctx)

      if (touchesEmbeddings) {
        if (reached('persist-embeddings')) await this.embed(ctx)
        if (reached('merge-index')) await this.mergeIndex(ctx)
      } else if (reached('merge-index')) {
        await checkpoint.advance('verify')
      }

      const integrity = await this.verify(ctx)
      if (!integrity.ok) {
        await checkpoint.interrupt()
        unwrap(repo.finishRun(runId, 'failed', this.counters(ctx), integrity.diagnosis))
        console.error(`[build] ${integrity.diagnosis}`)
        return Err(KnowledgeBaseError.integrity(integrity.diagnosis))
      }

      unwrap(repo.setState({ kb_format_version: KB_FORMAT_VERSION, last_build_at: this.now().toISOString() }))
      await checkpoint.complete()
      unwrap(repo.finishRun(runId, 'completed', this.counters(ctx)))

      const report: BuildReport = {
        runId,
        mode,
        resumedFrom: ctx.resumedFrom,
        counts: ctx.counts,
        quality: ctx.quality,
        failures: ctx.failures,
        integrity,
        backupDir: ctx.backupDir,
        durationMs: Date.now() - startedAt,
      }
      const c = ctx.counts
      console.log(
        `[build] ${mode} run ${runId.slice(0, 8)} done in ${(report.durationMs / 1000).toFixed(1)}s: ` +
        `${c.new} new, ${c.changed} changed, ${c.unchanged} unchanged, ${c.removed} removed; ` +
        `${c.embedded} embedded, ${c.cacheHits} cache hits, +${c.appendedRows} rows`,
      )
      return Ok(report)
    } catch (err) {
      const error = err instanceof KnowledgeBaseError ? err : KnowledgeBaseError.io(`Build failed: ${errorMessage(err)}`)
      // Vectors of committed documents go to disk before the checkpoint naming them.
      // If that fails, those documents are embedded again on resume.
      await ctx.cache.save().catch((saveErr: unknown) => {
        console.warn(`[build] could not save the embedding cache: ${errorMessage(saveErr)}`)
      })
      // Keep the checkpoint: the next run resumes from the last boundary crossed
      await checkpoint.interrupt()
      unwrap(repo.finishRun(runId, error.code === 'CANCELLED' ? 'cancelled' : 'failed', this.counters(ctx), error.message))
      if (error.code === 'CANCELLED') {
        console.warn(`[build] run ${runId.slice(0, 8)} cancelled; progress is checkpointed`)
      } else {
        console.error(`[build] run ${runId.slice(0, 8)} failed: ${error.message}`)
      }
      return Err(error)
    }
  }

  // ── Diff + ExtractNew ──

  private async diffAndExtract(ctx: BuildContext, incoming: SourceDocument[], start: BuildStage): Promise<void> {
    const { repo, checkpoint } = ctx
    const diff = diffDocuments(incoming, unwrap(repo.list()), ctx.fingerprints)

    if (start === 'diff') {
      const counts: Record<typeof COUNT_MARKERS[number], number> = {
        total: incoming.length - diff.duplicateKeys.length,
        new: diff.added.length,
        changed: diff.changed.length,
        unchanged: diff.unchanged.length,
        removed: diff.removed.length,
        revived: diff.revived.length,
        duplicates: diff.duplicateKeys.length,
      }
      for (const key of COUNT_MARKERS) checkpoint.setMarker(`count.${key}`, counts[key])
      console.log(`[build] diff: ${counts.new} new, ${counts.changed} changed, ${counts.unchanged} unchanged, ${counts.removed} removed, ${counts.revived} revived`)
      await checkpoint.advance('extract')
    }
    this.progress(ctx, 'extract', 0, 1)

    // Re-running this after a crash is harmless: inserted documents now diff as
    // changed, and rewriting identical content is a no-op.
    if (diff.added.length > 0) {
      const first = Number.parseInt(unwrap(repo.nextId()), 10)
      unwrap(repo.insertDocuments(diff.added.map((doc, i) => toDocumentContent(formatDocumentId(first + i), doc))))
    }
    const updated = [...diff.changed, ...diff.revived]
    if (updated.length > 0) {
      unwrap(repo.updateContent(updated.map(doc => toDocumentContent(doc.record.id, doc))))
    }
    if (diff.removed.length > 0) {
      unwrap(repo.markRemoved(diff.removed.map(r => r.id)))
      console.log(`[build] tombstoned ${diff.removed.length} documents no longer in the source library`)
    }

    this.progress(ctx, 'extract', 1, 1)
    await checkpoint.advance('score')
  }

  private restoreCounts(ctx: BuildContext): void {
    for (const key of COUNT_MARKERS) {
      ctx.counts[key] = ctx.checkpoint.getMarker(`count.${key}`) ?? 0
    }
  }

  // ── ScoreQuality + PersistScores ──

  private needsScore(ctx: BuildContext, record: DocumentRecord): boolean {
    if (ctx.mode === 'rebuild' || record.qualityScore === null) return true
    if (record.qualityFingerprint !== computeQualityFingerprint(qualityInputFor(record))) return true
    return ctx.mode === 'quality-upgrade' && record.qualityMode !== 'enhanced'
  }

  private async scoreQuality(ctx: BuildContext): Promise<void> {
    const { repo, checkpoint, options } = ctx
    const live = unwrap(repo.list()).filter(r => !r.removed)
    const targets = live.filter(r => this.needsScore(ctx, r))
    const byId = new Map(live.map(r => [r.id, r]))

    const mode = ctx.mode === 'quality-upgrade' ? 'enhanced' : this.config.quality.mode
    const scorer = new QualityScorer({
      mode,
      workers: this.config.quality.workers,
      minDelayMs: this.config.quality.minDelayMs,
      batchSize: this.config.quality.batchSize,
      failureThreshold: this.config.quality.failureThreshold,
      failureWindow: this.config.quality.failureWindow,
      retryPolicy: new RetryPolicy(this.config.retry, { sleep: this.deps.sleep }),
      enrichmentClient: mode === 'enhanced' ? this.collaborators.enrichmentClient : null,
      onDegraded: options.onDegraded,
      now: this.now,
      sleep: this.deps.sleep,
    })

    console.log(`[build] scoring ${targets.length} of ${live.length} documents (${mode})`)
    const scored = unwrap(await scorer.scoreAll(
      targets.map(r => ({ documentId: r.id, input: qualityInputFor(r) })),
      {
        checkpoint,
        signal: options.signal,
        onProgress: (done, total) => this.progress(ctx, 'score', done, total),
      },
    ))

    // Scores are durable before any embedding work starts
    this.progress(ctx, 'persist-scores', 0, scored.results.length)
    const updates = scored.results.flatMap(result => {
      const record = byId.get(result.documentId)
      return record
        ? [{ documentId: result.documentId, quality: result.quality, qualityFingerprint: computeQualityFingerprint(qualityInputFor(record)) }]
        : []
    })
    unwrap(repo.saveQualityScores(updates))
    this.progress(ctx, 'persist-scores', updates.length, updates.length)

    ctx.quality = scored.summary
    ctx.counts.scored = updates.length
    ctx.failures = scored.results.flatMap(r => (r.fallbackReason ? [{ documentId: r.documentId, reason: r.fallbackReason }] : []))

    const summary = scored.summary
    for (const key of QUALITY_MARKERS) checkpoint.setMarker(`quality.${key}`, summary[key])
    checkpoint.setMarker('quality.degraded', summary.degraded ? 1 : 0)
    for (const reason of FailureReasonSchema.options) {
      const count = summary.failures[reason]
      if (count !== undefined) checkpoint.setMarker(`quality.failures.${reason}`, count)
    }
    for (const failure of ctx.failures) {
      checkpoint.setMarker(`failure.${failure.documentId}`, FailureReasonSchema.options.indexOf(failure.reason))
    }
    checkpoint.setMarker('count.scored', updates.length)
    await checkpoint.advance('embed')
  }

  /** A run resumed past scoring reports the summary the interrupted run kept. */
  private restoreQuality(ctx: BuildContext): void {
    const { checkpoint } = ctx
    const total = checkpoint.getMarker('quality.total')
    if (total === undefined) return

    const marker = (name: string) => checkpoint.getMarker(name) ?? 0
    const failures: ScoringSummary['failures'] = {}
    for (const reason of FailureReasonSchema.options) {
      const count = checkpoint.getMarker(`quality.failures.${reason}`)
      if (count !== undefined) failures[reason] = count
    }
    ctx.quality = {
      total,
      enhanced: marker('quality.enhanced'),
      basic: marker('quality.basic'),
      fallback: marker('quality.fallback'),
      resumed: marker('quality.resumed'),
      failures,
      apiCalls: marker('quality.apiCalls'),
      rateLimitedResponses: marker('quality.rateLimitedResponses'),
      degraded: marker('quality.degraded') === 1,
      retriedBatches: marker('quality.retriedBatches'),
    }
    ctx.counts.scored = marker('count.scored')

    const markers = checkpoint.current?.markers ?? {}
    ctx.failures = unwrap(ctx.repo.list()).flatMap(record => {
      const reason = FailureReasonSchema.options[markers[`failure.${record.id}`] ?? -1]
      return reason ? [{ documentId: record.id, reason }] : []
    })
  }

  // ── Embed + PersistEmbeddings ──

  /** The stored row for this record is missing, stale, or from another model. */
  private needsNewVector(ctx: BuildContext, record: DocumentRecord): boolean {
    return record.embeddingIndex === null ||
      ctx.fingerprints.get(record.id) !== record.contentFingerprint ||
      record.embeddingModelId !== ctx.modelId
  }

  private async embed(ctx: BuildContext): Promise<void> {
    const { cache, checkpoint, index, modelId, counts, options } = ctx
    const client = this.collaborators.embeddingClient
    const live = unwrap(ctx.repo.list()).filter(r => !r.removed)
    const pending: DocumentRecord[] = []

    cache.resetStats()
    for (const record of live) {
      const fp = record.contentFingerprint
      if (!this.needsNewVector(ctx, record)) {
        if (cache.get(fp, modelId)) continue
        // Unchanged document missing from the cache: re-cache it from its index row
        if (record.embeddingIndex !== null && record.embeddingIndex < index.size) {
          cache.put(fp, index.reconstruct(record.embeddingIndex), modelId)
          counts.cacheBackfilled++
          continue
        }
      }
      if (checkpoint.isCompleted(record.id) && cache.has(fp, modelId)) continue
      if (!cache.get(fp, modelId)) pending.push(record)
    }
    counts.cacheHits = cache.stats().hits

    const batchSize = Math.min(
      optimalBatchSize(this.freeMemory(), client.maxBatchSize ?? Infinity),
      this.config.embedding.maxBatchSize,
    )
    console.log(`[build] embedding ${pending.length} documents in batches of ${batchSize} (${counts.cacheHits} cache hits, ${counts.cacheBackfilled} backfilled)`)

    for (let start = 0; start < pending.length; start += batchSize) {
      if (options.signal?.aborted) throw KnowledgeBaseError.cancelled('Build cancelled during embedding')
      const batch = pending.slice(start, start + batchSize)

      let vectors: number[][]
      try {
        vectors = (await client.embed(batch.map(r => buildEmbeddingText(r)), options.signal)).embeddings
      } catch (err) {
        if (options.signal?.aborted) throw KnowledgeBaseError.cancelled('Build cancelled during embedding')
        throw KnowledgeBaseError.api(`Embedding model ${client.modelName} failed: ${errorMessage(err)}`)
      }
      if (vectors.length !== batch.length) {
        throw KnowledgeBaseError.api(`Embedding model returned ${vectors.length} vectors for ${batch.length} texts`)
      }
      const wrongDims = vectors.find(v => v.length !== client.dimensions)
      if (wrongDims) {
        throw KnowledgeBaseError.modelMismatch(
          `Embedding model ${client.modelName} returned ${wrongDims.length}-dimensional vectors, configured for ${client.dimensions}. ` +
          'Fix the embedding dimensions setting; a model change needs a confirmed full rebuild.',
        )
      }

      // Only a complete batch reaches the cache, and the cache file before the checkpoint
      batch.forEach((record, i) => cache.put(record.contentFingerprint, vectors[i], modelId))
      if (checkpoint.flushesWithin(batch.length)) await cache.save()
      for (const record of batch) await checkpoint.record(record.id)
      counts.embedded += batch.length
      this.progress(ctx, 'embed', Math.min(start + batchSize, pending.length), pending.length)
    }

    this.progress(ctx, 'persist-embeddings', 0, 1)
    const known = new Set(unwrap(ctx.repo.list()).map(r => r.contentFingerprint))
    const pruned = cache.prune(known, modelId)
    if (pruned > 0) console.log(`[build] pruned ${pruned} stale cache entries`)
    await cache.save()
    this.progress(ctx, 'persist-embeddings', 1, 1)
    await checkpoint.advance('merge-index')
  }

  // ── MergeIndex ──

  private vectorFor(ctx: BuildContext, record: DocumentRecord): Float32Array {
    const vector = ctx.cache.peek(record.contentFingerprint, ctx.modelId)
    if (!vector) {
      throw KnowledgeBaseError.integrity(`No cached embedding for document ${record.id}; rerun the build to re-embed it`)
    }
    return vector
  }

  private async mergeIndex(ctx: BuildContext): Promise<void> {
    const { repo, checkpoint, fingerprints, counts } = ctx
    const client = this.collaborators.embeddingClient
    const records = unwrap(repo.list())
    const live = records.filter(r => !r.removed)
    const assignment = (record: DocumentRecord, embeddingIndex: number): EmbeddingAssignment => ({
      documentId: record.id,
      embeddingIndex,
      modelId: ctx.modelId,
      dimensions: client.dimensions,
    })

    if (ctx.mode === 'rebuild') {
      const vectors = live.map(r => this.vectorFor(ctx, r))
      ctx.index = await ctx.builder.rebuild(vectors)
      unwrap(repo.repackEmbeddings(live.map((r, i) => assignment(r, i))))
      for (const record of records) {
        if (record.removed) fingerprints.delete(record.id)
        else fingerprints.set(record.id, record.contentFingerprint)
      }
      counts.appendedRows = live.length
    } else {
      const stale = live.filter(r => this.needsNewVector(ctx, r))
      const storedBase = checkpoint.getMarker('baseRowCount')
      const base = storedBase ?? ctx.index.size
      // A row at or past the pre-merge count was appended by an interrupted run of this merge
      const append = stale.filter(r => r.embeddingIndex === null || r.embeddingIndex >= base)
      const replace = stale.flatMap(r => (
        r.embeddingIndex !== null && r.embeddingIndex < base ? [{ record: r, row: r.embeddingIndex }] : []
      ))

      if (storedBase === undefined) {
        checkpoint.setMarker('baseRowCount', base)
        checkpoint.setMarker('appendCount', append.length)
        checkpoint.setMarker('replaceCount', replace.length)
        await checkpoint.flush()
      }
      const appendCount = checkpoint.getMarker('appendCount') ?? append.length

      if (ctx.index.size === base) {
        await ctx.builder.merge(ctx.index, {
          append: append.map(r => this.vectorFor(ctx, r)),
          replace: replace.map(({ record, row }) => ({ row, vector: this.vectorFor(ctx, record) })),
        })
      } else if (ctx.index.size === base + appendCount) {
        console.log('[build] index already merged by the interrupted run; finishing metadata')
      } else {
        throw KnowledgeBaseError.integrity(
          `Index has ${ctx.index.size} rows; expected ${base} before this merge or ${base + appendCount} after it. ` +
          'Run a full rebuild (mode "rebuild", confirm: true) to regenerate the index.',
        )
      }

      // Records come back in id order, the order their rows were appended in
      unwrap(repo.assignEmbeddings([
        ...replace.map(({ record, row }) => assignment(record, row)),
        ...append.map((record, i) => assignment(record, base + i)),
      ]))
      for (const record of stale) fingerprints.set(record.id, record.contentFingerprint)
      counts.appendedRows = appendCount
      counts.replacedRows = checkpoint.getMarker('replaceCount') ?? replace.length
    }

    await fingerprints.save()
    unwrap(repo.setModelState({ modelId: ctx.modelId, dimensions: client.dimensions }))
    this.progress(ctx, 'merge-index', 1, 1)
    await checkpoint.advance('verify')
  }

  // ── Verify ──

  private async verify(ctx: BuildContext): Promise<IntegrityReport> {
    const report = verifyKnowledgeBase(unwrap(ctx.repo.list()), ctx.index)
    const onDisk = await ctx.builder.verify(report.indexRows)
    this.progress(ctx, 'verify', 1, 1)
    if (onDisk.status === 'ok') return report

    const detail = onDisk.status === 'corrupt'
      ? `index file is corrupt (${onDisk.reason})`
      : `index file holds ${onDisk.actual} ${onDisk.status === 'size_mismatch' ? 'rows' : 'dimensions'}, expected ${onDisk.expected}`
    const diagnosis = report.ok
      ? `Knowledge base is inconsistent: ${detail}. Run a full rebuild (mode "rebuild" with confirm) to regenerate the index from the metadata store.`
      : report.diagnosis.replace('Knowledge base is inconsistent: ', `Knowledge base is inconsistent: ${detail}; `)
    return { ...report, ok: false, diagnosis }
  }

  private progress(ctx: BuildContext, stage: BuildStage, done: number, total: number): void {
    ctx.options.onProgress?.({ stage, done, total })
  }

  private counters(ctx: BuildContext): Record<string, number> {
    return { ...ctx.counts }
  }
}
