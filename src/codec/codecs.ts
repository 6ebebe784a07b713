import { CodecError } from './errors.js'
import { type SqlValue, storageClassOf, toBytes, toDouble, toInt32, toInt64, toText } from './cells.js'

/**
 * How long the engine may rely on bound bytes. `static` hands buffers over
 * as they are, so the caller must leave them alone until the statement has
 * run; `transient` copies them at bind time.
 */
export type BindPolicy = 'static' | 'transient'

/**
 * Conversion between one semantic type and the engine's cell
 * representation. Statements are typed by tuples of codecs, so a value
 * with no codec has no way to reach a parameter slot.
 */
export interface Codec<T> {
  /** Short name used in diagnostics. */
  readonly name: string

  /** Convert a value into the cell written to a parameter slot. */
  bind(value: T, policy: BindPolicy): SqlValue

  /**
   * Convert a result cell. `previous` is the current content of the
   * output slot when extracting into caller-owned storage.
   */
  extract(cell: SqlValue, previous?: T): T
}

/**
 * Integer of at most 4 bytes: bound through the 32-bit path and narrowed
 * to its width on the way out. Out-of-range values wrap.
 */
function narrowInteger(name: string, narrow: (value: number) => number): Codec<number> {
  return {
    name,
    bind(value) {
      // bigint keeps the storage class INTEGER; a JS number would bind as REAL
      return BigInt(narrow(value) | 0)
    },
    extract(cell) {
      return narrow(toInt32(cell))
    },
  }
}

export const int8 = narrowInteger('int8', (value) => (value << 24) >> 24)
export const int16 = narrowInteger('int16', (value) => (value << 16) >> 16)
export const int32 = narrowInteger('int32', (value) => value | 0)
export const uint8 = narrowInteger('uint8', (value) => value & 0xff)
export const uint16 = narrowInteger('uint16', (value) => value & 0xffff)
export const uint32 = narrowInteger('uint32', (value) => value >>> 0)

export const int64: Codec<bigint> = {
  name: 'int64',
  bind(value) {
    if (BigInt.asIntN(64, value) !== value) {
      throw new CodecError('int64', `Value ${value} does not fit in a 64-bit integer`)
    }
    return value
  },
  extract(cell) {
    return toInt64(cell)
  },
}

export const boolean: Codec<boolean> = {
  name: 'boolean',
  bind(value) {
    return value ? 1n : 0n
  },
  extract(cell) {
    return toInt32(cell) !== 0
  },
}

export const double: Codec<number> = {
  name: 'double',
  bind(value) {
    return value
  },
  extract(cell) {
    return toDouble(cell)
  },
}

export const text: Codec<string> = {
  name: 'text',
  bind(value) {
    return value
  },
  extract(cell) {
    return toText(cell)
  },
}

export const blob: Codec<Buffer> = {
  name: 'blob',
  bind(value, policy) {
    return policy === 'transient' ? Buffer.from(value) : value
  },
  extract(cell) {
    return toBytes(cell)
  },
}

/** Always binds NULL, whatever the argument. */
export const nil: Codec<null> = {
  name: 'null',
  bind() {
    return null
  },
  extract() {
    return null
  },
}

const utf8 = new TextDecoder('utf-8', { fatal: true })

/**
 * Fixed-size, zero-terminated text buffer of `capacity` bytes.
 *
 * Binding sends exactly `capacity - 1` bytes as text and fails when they
 * are not valid UTF-8, such as a multi-byte character cut at the boundary.
 * Extraction copies at
 * most `capacity - 1` bytes of the cell's text, stopping at an embedded
 * zero byte, then writes a terminator; a NULL cell leaves the output buffer
 * as it was.
 */
export function fixedText(capacity: number): Codec<Buffer> {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new CodecError('fixedText', `Capacity must be a positive integer, got ${capacity}`)
  }
  const name = `fixedText(${capacity})`

  function checkSize(buffer: Buffer): void {
    if (buffer.length < capacity) {
      throw new CodecError(name, `Buffer holds ${buffer.length} bytes, expected at least ${capacity}`)
    }
  }

  return {
    name,
    bind(value) {
      checkSize(value)
      try {
        return utf8.decode(value.subarray(0, capacity - 1))
      } catch (err) {
        throw new CodecError(name, `First ${capacity - 1} bytes are not valid UTF-8 text`, { cause: err })
      }
    },
    extract(cell, previous) {
      const target = previous ?? Buffer.alloc(capacity)
      checkSize(target)
      if (cell === null) return target

      const source = toBytes(cell)
      const terminator = source.indexOf(0)
      const end = Math.min(terminator === -1 ? source.length : terminator, capacity - 1)
      source.copy(target, 0, 0, end)
      target[end] = 0
      return target
    },
  }
}

/**
 * Numeric enumeration stored through its underlying integer codec.
 * Extracting a number that is not a member of the enumeration fails.
 */
export function enumeration<E extends Record<string, string | number>>(
  enumObject: E,
  underlying: Codec<number> = int32,
): Codec<Extract<E[keyof E], number>> {
  const values: Array<string | number> = Object.values(enumObject)
  const members = values.filter(
    (value): value is Extract<E[keyof E], number> => typeof value === 'number',
  )
  const name = `enumeration<${underlying.name}>`

  return {
    name,
    bind(value, policy) {
      return underlying.bind(value, policy)
    },
    extract(cell) {
      const raw = underlying.extract(cell)
      const member = members.find((candidate) => candidate === raw)
      if (member === undefined) {
        throw new CodecError(name, `${raw} is not a member of the enumeration`)
      }
      return member
    },
  }
}

/** Maps `undefined` to NULL and back, delegating present values to `inner`. */
export function optional<T>(inner: Codec<T>): Codec<T | undefined> {
  return {
    name: `optional<${inner.name}>`,
    bind(value, policy) {
      return value === undefined ? null : inner.bind(value, policy)
    },
    extract(cell) {
      if (storageClassOf(cell) === 'null') return undefined
      return inner.extract(cell)
    },
  }
}
