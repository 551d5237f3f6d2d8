/**
 * SQLite metadata store initialization with WAL mode and migrations.
 */

import Database from 'better-sqlite3'
import { runMigrations } from './migrations.js'

export interface OpenDatabaseOptions {
  /** Open an existing file without writing to it (no pragmas that write, no migrations). */
  readonly?: boolean
}

export function openDatabase(path: string, options: OpenDatabaseOptions = {}): Database.Database {
  if (options.readonly) {
    const db = new Database(path, { readonly: true, fileMustExist: true })
    db.pragma('busy_timeout = 5000')
    return db
  }

  const db = new Database(path)

  // Performance + safety pragmas
  db.pragma('journal_mode = WAL')
  db.pragma('foreign_keys = ON')
  db.pragma('busy_timeout = 5000')

  runMigrations(db)

  return db
}

/**
 * Consistent online copy of a live database (safe under WAL, unlike a file copy).
 */
export async function backupDatabase(db: Database.Database, destination: string): Promise<void> {
  await db.backup(destination)
}
