/**
 * Durable checkpoints for long batch operations.
 *
 *   idle -> running (flushed every `interval` items) -> completed (file deleted)
 *                                                    -> interrupted (file kept)
 *
 * An interrupted run is detected on the next start by the file's presence and
 * resumes after the last committed item. Writes are atomic and serialized: one
 * writer at a time, each write a consistent snapshot. An unparseable file is
 * treated as no checkpoint and the batch restarts from zero.
 */

import { rm } from 'node:fs/promises'
import { z } from 'zod'
import { readJsonFile, writeJsonAtomic } from '../storage/index.js'

export type CheckpointPhase = 'idle' | 'running' | 'interrupted' | 'completed'

export interface CheckpointState<T> {
  version: 1
  runId: string
  operation: string
  stage: string
  /** Completed item ids in commit order. */
  completedIds: string[]
  /** Results not yet merged into the main store, by item id. */
  partialResults: Record<string, T>
  /** Named integer markers (e.g. row counts) that make a stage idempotent. */
  markers: Record<string, number>
  createdAt: string
  updatedAt: string
}

export interface ResumePoint<T> {
  /** Index of the first item in the given order that is not yet complete. */
  nextIndex: number
  completedIds: ReadonlySet<string>
  results: ReadonlyMap<string, T>
  /** Items still to process, in the given order. */
  remaining: number
}

export interface CheckpointOptions {
  /** Flush after this many recorded items. */
  interval?: number
}

export const DEFAULT_CHECKPOINT_INTERVAL = 50

export class CheckpointManager<T> {
  private state: CheckpointState<T> | null = null
  private completed = new Set<string>()
  private phase: CheckpointPhase = 'idle'
  private sinceFlush = 0
  private writeChain: Promise<void> = Promise.resolve()
  private readonly fileSchema: z.ZodType<CheckpointState<T>, z.ZodTypeDef, unknown>
  readonly interval: number

  constructor(
    private readonly path: string,
    resultSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: CheckpointOptions = {},
  ) {
    this.interval = options.interval ?? DEFAULT_CHECKPOINT_INTERVAL
    this.fileSchema = z.object({
      version: z.literal(1),
      runId: z.string().min(1),
      operation: z.string().min(1),
      stage: z.string().min(1),
      completedIds: z.array(z.string()),
      partialResults: z.record(resultSchema),
      markers: z.record(z.number().int()),
      createdAt: z.string(),
      updatedAt: z.string(),
    })
  }

  /**
   * Look for a checkpoint left by an interrupted run. A corrupted file is
   * logged and reported as absent.
   */
  async detect(): Promise<CheckpointState<T> | null> {
    const result = await readJsonFile(this.path, this.fileSchema)
    if (!result.ok) {
      console.warn(`[checkpoint] ignoring corrupted checkpoint, restarting batch from the beginning: ${result.error.message}`)
      await rm(this.path, { force: true })
      return null
    }
    if (result.value) {
      this.phase = 'interrupted'
      console.log(`[checkpoint] found interrupted ${result.value.operation} run ${result.value.runId.slice(0, 8)} at stage ${result.value.stage} (${result.value.completedIds.length} items committed)`)
    }
    return result.value
  }

  /** Read the checkpoint file without adopting, repairing or deleting it. */
  async peek(): Promise<CheckpointState<T> | null> {
    const result = await readJsonFile(this.path, this.fileSchema)
    return result.ok ? result.value : null
  }

  /** Start a fresh checkpoint and persist it immediately. */
  async begin(init: { runId: string; operation: string; stage: string }): Promise<void> {
    const now = new Date().toISOString()
    this.state = {
      version: 1,
      runId: init.runId,
      operation: init.operation,
      stage: init.stage,
      completedIds: [],
      partialResults: {},
      markers: {},
      createdAt: now,
      updatedAt: now,
    }
    this.completed = new Set()
    this.phase = 'running'
    this.sinceFlush = 0
    await this.flush()
  }

  /** Continue from a detected checkpoint. */
  adopt(state: CheckpointState<T>): void {
    this.state = {
      ...state,
      completedIds: [...state.completedIds],
      partialResults: { ...state.partialResults },
      markers: { ...state.markers },
    }
    this.completed = new Set(state.completedIds)
    this.phase = 'running'
    this.sinceFlush = 0
  }

  /** Where to pick up `items`: everything already committed is skipped, nothing is lost. */
  resume(items: ReadonlyArray<{ id: string }>): ResumePoint<T> {
    const completedIds: ReadonlySet<string> = new Set(this.completed)
    const results = new Map(Object.entries(this.state?.partialResults ?? {}))

    let nextIndex = items.findIndex(item => !completedIds.has(item.id))
    if (nextIndex === -1) nextIndex = items.length
    const remaining = items.filter(item => !completedIds.has(item.id)).length

    return { nextIndex, completedIds, results, remaining }
  }

  isCompleted(id: string): boolean {
    return this.completed.has(id)
  }

  /** Whether recording `count` more items triggers a flush. */
  flushesWithin(count: number): boolean {
    return this.sinceFlush + count >= this.interval
  }

  /** Commit one item; flushes every `interval` items. */
  async record(id: string, result?: T): Promise<void> {
    const state = this.requireState()
    if (!this.completed.has(id)) {
      this.completed.add(id)
      state.completedIds.push(id)
    }
    if (result !== undefined) {
      state.partialResults[id] = result
    }
    this.sinceFlush++
    if (this.sinceFlush >= this.interval) {
      await this.flush()
    }
  }

  /**
   * Cross a stage boundary: results of the finished stage have been merged into
   * the main store, so the per-item state is cleared. Flushed immediately.
   */
  async advance(stage: string): Promise<void> {
    const state = this.requireState()
    state.stage = stage
    state.completedIds = []
    state.partialResults = {}
    this.completed = new Set()
    await this.flush()
  }

  setMarker(name: string, value: number): void {
    this.requireState().markers[name] = value
  }

  getMarker(name: string): number | undefined {
    return this.state?.markers[name]
  }

  get current(): Readonly<CheckpointState<T>> | null {
    return this.state
  }

  get status(): CheckpointPhase {
    return this.phase
  }

  /** Serialized write of a snapshot taken now. */
  flush(): Promise<void> {
    const state = this.requireState()
    state.updatedAt = new Date().toISOString()
    const snapshot: unknown = JSON.parse(JSON.stringify(state))
    this.sinceFlush = 0

    const write = this.writeChain.then(() => writeJsonAtomic(this.path, snapshot))
    // The caller sees the failure through `write`; the chain itself keeps going
    this.writeChain = write.then(() => undefined, () => undefined)
    return write
  }

  /** Successful, verified completion: wait for pending writes, then delete the file. */
  async complete(): Promise<void> {
    await this.writeChain
    await rm(this.path, { force: true })
    this.state = null
    this.completed = new Set()
    this.phase = 'completed'
  }

  /** Stop without deleting: the file stays for the next run to resume from. */
  async interrupt(): Promise<void> {
    if (this.state) {
      await this.flush()
    }
    this.phase = 'interrupted'
  }

  /** Drop any checkpoint on disk without resuming it. */
  async discard(): Promise<void> {
    await this.writeChain
    await rm(this.path, { force: true })
    this.state = null
    this.completed = new Set()
    this.phase = 'idle'
  }

  private requireState(): CheckpointState<T> {
    if (!this.state) {
      throw new Error('Checkpoint not started: call begin() or adopt() first')
    }
    return this.state
  }
}
