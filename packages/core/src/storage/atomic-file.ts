/**
 * Atomic file persistence: write to a sibling temp file, fsync, then rename over
 * the target. A crash mid-write leaves either the old file or the new one.
 */

import { mkdir, open, readFile, rename, rm } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { z } from 'zod'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeBaseError, errorMessage } from '../common/index.js'

let tempCounter = 0

export async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  const tempPath = `${path}.${process.pid}.${++tempCounter}.tmp`
  const handle = await open(tempPath, 'w')
  try {
    await handle.writeFile(data)
    await handle.sync()
  } finally {
    await handle.close()
  }

  try {
    await rename(tempPath, path)
  } catch (err) {
    await rm(tempPath, { force: true })
    throw err
  }
}

export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  await writeFileAtomic(path, JSON.stringify(value, null, 2) + '\n')
}

/**
 * Read and validate a JSON file.
 * Returns Ok(null) when the file does not exist; Err(PARSE_ERROR) when it exists
 * but is unreadable, is not JSON, or does not match the schema.
 */
export async function readJsonFile<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<Result<T | null, KnowledgeBaseError>> {
  let raw: string
  try {
    raw = await readFile(path, 'utf-8')
  } catch (err) {
    if (isMissingFile(err)) return Ok(null)
    return Err(KnowledgeBaseError.io(`Failed to read ${path}: ${errorMessage(err)}`))
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    return Err(KnowledgeBaseError.parse(`Invalid JSON in ${path}: ${errorMessage(err)}`))
  }

  const validated = schema.safeParse(parsed)
  if (!validated.success) {
    const issue = validated.error.issues[0]
    return Err(KnowledgeBaseError.parse(`Unexpected shape in ${path}: ${issue.path.join('.')} ${issue.message}`))
  }
  return Ok(validated.data)
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
