/**
 * Pre-rebuild backup: a consistent copy of the metadata database plus the
 * index and fingerprint files, in backups/<timestamp>/.
 */

import { copyFile, mkdir } from 'node:fs/promises'
import { basename, join } from 'node:path'
import type Database from 'better-sqlite3'
import type { KnowledgeBasePaths } from '../config/index.js'
import { backupDatabase, isMissingFile } from '../storage/index.js'

export function backupDirName(now: Date): string {
  return now.toISOString().replace(/[:.]/g, '-')
}

export async function createBackup(db: Database.Database, paths: KnowledgeBasePaths, now: Date = new Date()): Promise<string> {
  const dir = join(paths.backupsDir, backupDirName(now))
  await mkdir(dir, { recursive: true })

  await backupDatabase(db, join(dir, basename(paths.metadataDb)))
  for (const file of [paths.index, paths.fingerprints]) {
    try {
      await copyFile(file, join(dir, basename(file)))
    } catch (err) {
      if (!isMissingFile(err)) throw err
    }
  }

  console.log(`[build] backed up knowledge base to ${dir}`)
  return dir
}
