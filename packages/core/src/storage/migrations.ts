/**
 * Version-based SQLite migrations for the knowledge-base metadata store.
 */

import type Database from 'better-sqlite3'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

/**
 * Runs SQL statements using the better-sqlite3 Database.exec() method.
 * Note: this is SQLite's native exec for DDL, not child_process.exec.
 */
function runSQL(db: Database.Database, sql: string): void {
  db.exec(sql)
}

const migrations: Migration[] = [
  {
    version: 1,
    description: 'Initial schema: documents, kb_state',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS documents (
          id TEXT PRIMARY KEY,
          source_key TEXT NOT NULL UNIQUE,
          title TEXT NOT NULL,
          authors_json TEXT NOT NULL DEFAULT '[]',
          year INTEGER,
          doi TEXT,
          journal TEXT,
          abstract TEXT NOT NULL DEFAULT '',
          study_type TEXT NOT NULL DEFAULT 'study',
          sample_size INTEGER,
          has_full_text INTEGER NOT NULL DEFAULT 0,
          content_fingerprint TEXT NOT NULL,
          embedding_index INTEGER UNIQUE,
          embedding_model_id TEXT,
          embedding_dim INTEGER,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS kb_state (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
      `,
      )
    },
  },
  {
    version: 2,
    description: 'Quality score columns',
    up(db) {
      runSQL(
        db,
        `
        ALTER TABLE documents ADD COLUMN quality_score INTEGER;
        ALTER TABLE documents ADD COLUMN quality_mode TEXT;
        ALTER TABLE documents ADD COLUMN quality_factors_json TEXT;
        ALTER TABLE documents ADD COLUMN quality_explanation TEXT;
        ALTER TABLE documents ADD COLUMN quality_fingerprint TEXT;
      `,
      )
    },
  },
  {
    version: 3,
    description: 'Tombstones for documents removed from the source library',
    up(db) {
      runSQL(
        db,
        `
        ALTER TABLE documents ADD COLUMN removed INTEGER NOT NULL DEFAULT 0;
        CREATE INDEX IF NOT EXISTS idx_documents_removed ON documents(removed);
      `,
      )
    },
  },
  {
    version: 4,
    description: 'Build run history',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS build_runs (
          run_id TEXT PRIMARY KEY,
          mode TEXT NOT NULL,
          status TEXT NOT NULL,
          counters_json TEXT NOT NULL DEFAULT '{}',
          error TEXT,
          started_at TEXT NOT NULL,
          finished_at TEXT
        );

        CREATE INDEX IF NOT EXISTS idx_build_runs_started ON build_runs(started_at);
      `,
      )
    },
  },
]

export function runMigrations(db: Database.Database): void {
  // Ensure schema_version table exists for checking current version
  runSQL(
    db,
    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    )`,
  )

  const currentVersion = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version')
    .get()

  const applied = currentVersion?.version ?? 0

  for (const migration of migrations) {
    if (migration.version > applied) {
      db.transaction(() => {
        migration.up(db)
        db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
          migration.version,
          new Date().toISOString(),
        )
      })()
    }
  }
}

export const SCHEMA_VERSION = migrations[migrations.length - 1].version
