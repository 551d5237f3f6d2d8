import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { openDatabase, SCHEMA_VERSION } from '../../src/storage/index.js'

describe('openDatabase', () => {
  it('creates all expected tables', () => {
    const db = openDatabase(':memory:')

    const tables = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all()

    const tableNames = tables.map((t) => t.name)

    expect(tableNames).toContain('documents')
    expect(tableNames).toContain('kb_state')
    expect(tableNames).toContain('build_runs')
    expect(tableNames).toContain('schema_version')

    db.close()
  })

  it('adds quality and tombstone columns to documents', () => {
    const db = openDatabase(':memory:')
    const columns = db
      .prepare<[], { name: string }>('PRAGMA table_info(documents)')
      .all()
      .map((c) => c.name)

    expect(columns).toContain('quality_score')
    expect(columns).toContain('quality_fingerprint')
    expect(columns).toContain('removed')
    db.close()
  })

  it('enables foreign keys', () => {
    const db = openDatabase(':memory:')
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1)
    db.close()
  })

  it('records schema version', () => {
    const db = openDatabase(':memory:')
    const version = db
      .prepare<[], { version: number }>('SELECT MAX(version) as version FROM schema_version')
      .get()

    expect(version?.version).toBe(SCHEMA_VERSION)
    expect(SCHEMA_VERSION).toBe(4)
    db.close()
  })

  describe('on disk', () => {
    let tempDir: string

    beforeEach(async () => {
      tempDir = await mkdtemp(join(tmpdir(), 'kb-db-'))
    })

    afterEach(async () => {
      await rm(tempDir, { recursive: true, force: true })
    })

    it('uses WAL journaling and re-opens without re-running migrations', () => {
      const path = join(tempDir, 'metadata.db')
      const first = openDatabase(path)
      expect(first.pragma('journal_mode', { simple: true })).toBe('wal')
      first.close()

      const second = openDatabase(path)
      const rows = second.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM schema_version').get()
      expect(rows?.n).toBe(SCHEMA_VERSION)
      second.close()
    })

    it('opens read-only without creating a missing file', () => {
      expect(() => openDatabase(join(tempDir, 'absent.db'), { readonly: true })).toThrow()
    })

    it('rejects writes through a read-only handle', () => {
      const path = join(tempDir, 'metadata.db')
      openDatabase(path).close()

      const db = openDatabase(path, { readonly: true })
      expect(() =>
        db.prepare("INSERT INTO kb_state (key, value, updated_at) VALUES ('k', 'v', 't')").run(),
      ).toThrow()
      db.close()
    })
  })
})
