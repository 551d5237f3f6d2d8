import { join, resolve } from 'node:path'

export interface KnowledgeBasePaths {
  rootDir: string
  metadataDb: string
  index: string
  fingerprints: string
  embeddingCacheMeta: string
  embeddingCacheData: string
  checkpoint: string
  lock: string
  backupsDir: string
  configFile: string
}

export const CONFIG_FILE_NAME = 'refkb.config.json'

export function resolveKnowledgeBasePaths(rootDir: string): KnowledgeBasePaths {
  const root = resolve(rootDir)
  return {
    rootDir: root,
    metadataDb: join(root, 'metadata.db'),
    index: join(root, 'index.bin'),
    fingerprints: join(root, 'fingerprints.json'),
    embeddingCacheMeta: join(root, 'embedding-cache.json'),
    embeddingCacheData: join(root, 'embedding-cache.bin'),
    checkpoint: join(root, '.build-checkpoint.json'),
    lock: join(root, '.build.lock'),
    backupsDir: join(root, 'backups'),
    configFile: join(root, CONFIG_FILE_NAME),
  }
}
