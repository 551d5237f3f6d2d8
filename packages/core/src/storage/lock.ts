/**
 * Exclusive build lock. Only one build may mutate a knowledge base at a time:
 * the cache, the index and the metadata store have no transaction spanning them.
 */

import { open, readFile, rm, mkdir, stat } from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'
import { dirname } from 'node:path'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeBaseError, errorMessage } from '../common/index.js'

/** A lock file without a readable owner is only stale once it is this old. */
const OWNERLESS_GRACE_MS = 5_000

interface LockOwner {
  pid: number
  acquiredAt: string
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    // EPERM means the process exists but belongs to someone else
    return err instanceof Error && 'code' in err && err.code === 'EPERM'
  }
}

function parseOwner(raw: string): LockOwner | null {
  try {
    const parsed: unknown = JSON.parse(raw)
    if (
      typeof parsed === 'object' && parsed !== null &&
      'pid' in parsed && typeof parsed.pid === 'number' &&
      'acquiredAt' in parsed && typeof parsed.acquiredAt === 'string'
    ) {
      return { pid: parsed.pid, acquiredAt: parsed.acquiredAt }
    }
  } catch {
    // unparseable lock body: treated as stale below
  }
  return null
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}

function sameOwner(a: LockOwner | null, b: LockOwner | null): boolean {
  if (a === null || b === null) return a === b
  return a.pid === b.pid && a.acquiredAt === b.acquiredAt
}

export class BuildLock {
  private held = false

  constructor(private readonly path: string) {}

  private get takeoverPath(): string {
    return `${this.path}.takeover`
  }

  private async readOwner(): Promise<LockOwner | null> {
    return parseOwner(await readFile(this.path, 'utf-8').catch(() => ''))
  }

  async acquire(): Promise<Result<void, KnowledgeBaseError>> {
    await mkdir(dirname(this.path), { recursive: true })

    for (let attempt = 0; attempt < 3; attempt++) {
      try {
        const handle = await open(this.path, 'wx')
        try {
          const owner: LockOwner = { pid: process.pid, acquiredAt: new Date().toISOString() }
          await handle.writeFile(JSON.stringify(owner))
        } finally {
          await handle.close()
        }
        this.held = true
        return Ok(undefined)
      } catch (err) {
        if (!hasCode(err, 'EEXIST')) {
          return Err(KnowledgeBaseError.io(`Cannot create lock file ${this.path}: ${errorMessage(err)}`))
        }
      }

      const owner = await this.readOwner()
      if (owner && isProcessAlive(owner.pid)) {
        return Err(KnowledgeBaseError.locked(
          `Another build (pid ${owner.pid}, started ${owner.acquiredAt}) holds ${this.path}. ` +
          'Wait for it to finish; concurrent builds against one knowledge base are not supported.',
        ))
      }

      if (!owner && await this.isRecent()) {
        return Err(KnowledgeBaseError.locked(`Another build is creating ${this.path}; retry in a moment`))
      }

      const removed = await this.removeStale(owner)
      if (!removed.ok) return removed
    }

    return Err(KnowledgeBaseError.locked(`Could not acquire ${this.path}`))
  }

  private async isRecent(): Promise<boolean> {
    try {
      const info = await stat(this.path)
      return Date.now() - info.mtimeMs < OWNERLESS_GRACE_MS
    } catch (err) {
      if (hasCode(err, 'ENOENT')) return false
      throw err
    }
  }

  /**
   * Delete a lock left by a dead process. Only the holder of the takeover file
   * may delete, and only while the lock still names the owner judged stale.
   */
  private async removeStale(stale: LockOwner | null): Promise<Result<void, KnowledgeBaseError>> {
    let guard: FileHandle
    try {
      guard = await open(this.takeoverPath, 'wx')
    } catch (err) {
      if (hasCode(err, 'EEXIST')) {
        return Err(KnowledgeBaseError.locked(
          `Another process is taking over the stale lock ${this.path}. ` +
          `If no build is running, delete ${this.takeoverPath} and retry.`,
        ))
      }
      return Err(KnowledgeBaseError.io(`Cannot create ${this.takeoverPath}: ${errorMessage(err)}`))
    }

    try {
      await guard.close()
      if (sameOwner(await this.readOwner(), stale)) {
        console.warn(`[lock] removing stale lock ${this.path}${stale ? ` left by pid ${stale.pid}` : ''}`)
        await rm(this.path, { force: true })
      }
      return Ok(undefined)
    } finally {
      await rm(this.takeoverPath, { force: true })
    }
  }

  async release(): Promise<void> {
    if (!this.held) return
    await rm(this.path, { force: true })
    this.held = false
  }

  get isHeld(): boolean {
    return this.held
  }
}
