/**
 * Float32 helpers shared by the embedding cache and the vector index.
 */

/** Concatenate equally sized rows into one contiguous little-endian buffer. */
export function packRows(rows: ArrayLike<number>[], dims: number): Buffer {
  const buf = Buffer.alloc(rows.length * dims * 4)
  rows.forEach((row, r) => {
    const base = r * dims * 4
    for (let i = 0; i < dims; i++) {
      buf.writeFloatLE(row[i], base + i * 4)
    }
  })
  return buf
}

/** Split a contiguous buffer into rows. Returns null when the length is not a whole number of rows. */
export function unpackRows(buf: Buffer, dims: number, expectedRows?: number): Float32Array[] | null {
  const rowBytes = dims * 4
  if (rowBytes === 0 || buf.byteLength % rowBytes !== 0) return null
  const count = buf.byteLength / rowBytes
  if (expectedRows !== undefined && count !== expectedRows) return null

  const rows: Float32Array[] = []
  for (let r = 0; r < count; r++) {
    const row = new Float32Array(dims)
    const base = r * rowBytes
    for (let i = 0; i < dims; i++) {
      row[i] = buf.readFloatLE(base + i * 4)
    }
    rows.push(row)
  }
  return rows
}

/** Squared Euclidean distance. */
export function l2DistanceSquared(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let sum = 0
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i]
    sum += d * d
  }
  return sum
}
