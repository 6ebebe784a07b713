/**
 * A single cell as the engine hands it over: integers arrive as bigint
 * (statements run with safe integers enabled), reals as number, text as
 * string, blobs as Buffer.
 */
export type SqlValue = number | bigint | string | Buffer | null

/** The engine's runtime tag for the value actually stored in a cell. */
export type StorageClass = 'integer' | 'real' | 'text' | 'blob' | 'null'

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

const LEADING_INTEGER = /^\s*([+-]?\d+)/
const LEADING_REAL = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?/

export function storageClassOf(cell: SqlValue): StorageClass {
  if (cell === null) return 'null'
  if (typeof cell === 'bigint') return 'integer'
  if (typeof cell === 'number') return 'real'
  if (typeof cell === 'string') return 'text'
  return 'blob'
}

function clampInt64(value: bigint): bigint {
  if (value < INT64_MIN) return INT64_MIN
  if (value > INT64_MAX) return INT64_MAX
  return value
}

/**
 * Read a cell through the 64-bit integer accessor. NULL reads as 0, reals
 * truncate toward zero and saturate at the int64 bounds, text contributes
 * its leading integer prefix.
 */
export function toInt64(cell: SqlValue): bigint {
  if (cell === null) return 0n
  if (typeof cell === 'bigint') return cell
  if (typeof cell === 'number') {
    if (Number.isNaN(cell)) return 0n
    if (cell >= 2 ** 63) return INT64_MAX
    if (cell <= -(2 ** 63)) return INT64_MIN
    return BigInt(Math.trunc(cell))
  }
  const text = typeof cell === 'string' ? cell : cell.toString('utf8')
  const match = LEADING_INTEGER.exec(text)
  return match ? clampInt64(BigInt(match[1])) : 0n
}

/** Read a cell through the 32-bit accessor: the low 32 bits of the int64 value. */
export function toInt32(cell: SqlValue): number {
  return Number(BigInt.asIntN(32, toInt64(cell)))
}

export function toDouble(cell: SqlValue): number {
  if (cell === null) return 0
  if (typeof cell === 'number') return cell
  if (typeof cell === 'bigint') return Number(cell)
  const text = typeof cell === 'string' ? cell : cell.toString('utf8')
  const match = LEADING_REAL.exec(text)
  return match ? Number.parseFloat(match[0]) : 0
}

/**
 * Render a cell as text. Integral reals keep a trailing ".0" the way the
 * engine formats them.
 */
export function toText(cell: SqlValue): string {
  if (cell === null) return ''
  if (typeof cell === 'string') return cell
  if (typeof cell === 'bigint') return cell.toString()
  if (typeof cell === 'number') {
    return Number.isInteger(cell) && Math.abs(cell) < 1e15 ? `${cell}.0` : String(cell)
  }
  return cell.toString('utf8')
}

export function toBytes(cell: SqlValue): Buffer {
  if (cell === null) return Buffer.alloc(0)
  if (Buffer.isBuffer(cell)) return cell
  return Buffer.from(toText(cell), 'utf8')
}
