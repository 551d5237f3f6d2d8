import { freemem } from 'node:os'

const GIB = 1024 ** 3

/** Embedding batch size from free memory, capped by what the provider accepts. */
export function optimalBatchSize(freeBytes: number = freemem(), providerMax = Infinity): number {
  let size: number
  if (freeBytes > 16 * GIB) {
    size = 256
  } else if (freeBytes > 8 * GIB) {
    size = 128
  } else {
    size = 64
  }
  return Math.max(1, Math.min(size, providerMax))
}
