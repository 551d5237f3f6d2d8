/**
 * Storage: SQLite metadata store, migrations, atomic files, build lock.
 */

export { openDatabase, backupDatabase } from './database.js'
export type { OpenDatabaseOptions } from './database.js'
export { runMigrations, SCHEMA_VERSION } from './migrations.js'
export { writeFileAtomic, writeJsonAtomic, readJsonFile, isMissingFile } from './atomic-file.js'
export { BuildLock } from './lock.js'
