import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import {
  blob,
  boolean,
  CodecError,
  double,
  enumeration,
  fixedText,
  int32,
  int64,
  int8,
  nil,
  optional,
  text,
  uint32,
  type Codec,
} from '../codec/index.js'
import { Connection } from './connection.js'
import { DatabaseError } from './errors.js'

enum Color {
  Red = 1,
  Green = 2,
  Blue = 4,
}

function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('expected a failure')
}

describe('Statement', () => {
  let connection: Connection

  beforeEach(() => {
    connection = Connection.open(':memory:')
    connection.executeScript('CREATE TABLE cells (value)')
  })

  afterEach(() => {
    connection.close()
  })

  function roundTrip<T>(codec: Codec<T>, value: T): T | undefined {
    connection.executeScript('DELETE FROM cells')
    connection.execute('INSERT INTO cells (value) VALUES (?)', { params: [codec] }, value).finalize()
    const select = connection.execute('SELECT value FROM cells', { columns: [codec] })
    try {
      return select.fetch()?.[0]
    } finally {
      select.finalize()
    }
  }

  describe('round trips through a single-column table', () => {
    it('should round-trip 32-bit integers', () => {
      expect(roundTrip(int32, 123456)).toBe(123456)
      expect(roundTrip(int32, -42)).toBe(-42)
    })

    it('should round-trip narrow and unsigned integers', () => {
      expect(roundTrip(int8, -5)).toBe(-5)
      expect(roundTrip(uint32, 4_000_000_000)).toBe(4_000_000_000)
    })

    it('should round-trip 64-bit integers beyond the double range', () => {
      expect(roundTrip(int64, 9007199254740993n)).toBe(9007199254740993n)
      expect(roundTrip(int64, -(2n ** 63n))).toBe(-(2n ** 63n))
    })

    it('should round-trip doubles', () => {
      expect(roundTrip(double, 3.25)).toBe(3.25)
    })

    it('should round-trip booleans', () => {
      expect(roundTrip(boolean, true)).toBe(true)
      expect(roundTrip(boolean, false)).toBe(false)
    })

    it('should round-trip text with embedded zero characters', () => {
      expect(roundTrip(text, 'a\u0000b')).toBe('a\u0000b')
      expect(roundTrip(text, 'héllo')).toBe('héllo')
    })

    it('should round-trip blobs', () => {
      expect(roundTrip(blob, Buffer.from([0, 1, 254, 255]))).toEqual(Buffer.from([0, 1, 254, 255]))
    })

    it('should round-trip enumeration members', () => {
      expect(roundTrip(enumeration(Color), Color.Blue)).toBe(Color.Blue)
    })

    it('should round-trip fixed-size buffers', () => {
      const codec = fixedText(8)
      const value = Buffer.alloc(8)
      value.write('hello')
      expect(roundTrip(codec, value)).toEqual(value)
    })

    it('should round-trip empty and present optionals', () => {
      expect(roundTrip(optional(int32), undefined)).toBeUndefined()
      expect(roundTrip(optional(int32), 7)).toBe(7)
      expect(roundTrip(optional(text), 'x')).toBe('x')
    })

    it('should store an explicit NULL through the null codec', () => {
      connection.execute('INSERT INTO cells (value) VALUES (?)', { params: [nil] }, null).finalize()
      const select = connection.execute('SELECT typeof(value) FROM cells', { columns: [text] })
      expect(select.fetch()).toEqual(['null'])
    })

    it('should store integers with the INTEGER storage class', () => {
      connection.execute('INSERT INTO cells (value) VALUES (?)', { params: [int32] }, 5).finalize()
      const select = connection.execute('SELECT typeof(value) FROM cells', { columns: [text] })
      expect(select.fetch()).toEqual(['integer'])
    })
  })

  describe('fetch', () => {
    beforeEach(() => {
      const insert = connection.prepare('INSERT INTO cells (value) VALUES (?)', { params: [int32] })
      for (const value of [1, 2, 3]) {
        insert.execute(value)
      }
      insert.finalize()
    })

    it('should hold the first row after execute', () => {
      const select = connection.execute('SELECT value FROM cells ORDER BY value', { columns: [int32] })
      expect(select.rowAvailable).toBe(true)
      expect(select.fetch()).toEqual([1])
      expect(select.rowAvailable).toBe(false)
    })

    it('should walk every row and then report no row without failing', () => {
      const select = connection.execute('SELECT value FROM cells ORDER BY value', { columns: [int32] })
      expect([...select.rows()]).toEqual([[1], [2], [3]])
      expect(select.fetch()).toBeUndefined()
      expect(select.fetch()).toBeUndefined()
    })

    it('should report no row for an empty result set', () => {
      const select = connection.execute('SELECT value FROM cells WHERE value > ?', {
        params: [int32],
        columns: [int32],
      }, 10)
      expect(select.rowAvailable).toBe(false)
      expect(select.fetch()).toBeUndefined()
    })

    it('should discard an unread row on the next execute', () => {
      const select = connection.prepare('SELECT value FROM cells WHERE value >= ? ORDER BY value', {
        params: [int32],
        columns: [int32],
      })
      select.execute(1)
      expect(select.fetch()).toEqual([1])
      select.execute(2)
      expect(select.fetch()).toEqual([2])
      expect(select.fetch()).toEqual([3])
      expect(select.fetch()).toBeUndefined()
    })

    it('should extract several columns in order', () => {
      const select = connection.execute(
        "SELECT value, value * 2, 'row ' || value FROM cells WHERE value = ?",
        { params: [int32], columns: [int32, int64, text] },
        2,
      )
      expect(select.fetch()).toEqual([2, 4n, 'row 2'])
    })

    it('should extract into caller-owned output slots', () => {
      const select = connection.execute('SELECT value, NULL FROM cells ORDER BY value', {
        columns: [int32, optional(text)],
      })
      const row: [number, string | undefined] = [0, 'stale']
      expect(select.fetchInto(row)).toBe(true)
      expect(row).toEqual([1, undefined])
    })

    it('should report no row from fetchInto once exhausted', () => {
      const select = connection.execute('SELECT value FROM cells WHERE value = 3', { columns: [int32] })
      const row: [number] = [0]
      expect(select.fetchInto(row)).toBe(true)
      expect(select.fetchInto(row)).toBe(false)
      expect(row).toEqual([3])
    })

    it('should read a missing column as NULL', () => {
      const select = connection.execute('SELECT value FROM cells ORDER BY value', {
        columns: [int32, optional(int32)],
      })
      expect(select.fetch()).toEqual([1, undefined])
    })
  })

  describe('fixed-size buffer extraction', () => {
    it('should never write beyond the declared capacity', () => {
      connection.execute('INSERT INTO cells (value) VALUES (?)', { params: [text] }, 'abcdefghijkl').finalize()
      const backing = Buffer.alloc(8, 0x2a)
      const window = backing.subarray(0, 5)
      const select = connection.execute('SELECT value FROM cells', { columns: [fixedText(5)] })

      expect(select.fetchInto([window])).toBe(true)
      expect(backing.toString('latin1')).toBe('abcd\u0000***')
    })

    it('should leave the output buffer untouched when the column is NULL', () => {
      connection.execute('INSERT INTO cells (value) VALUES (NULL)').finalize()
      const out = Buffer.from('keep\u0000')
      const select = connection.execute('SELECT value FROM cells', { columns: [fixedText(5)] })

      expect(select.fetchInto([out])).toBe(true)
      expect(out.toString('latin1')).toBe('keep\u0000')
    })
  })

  describe('execution results', () => {
    it('should report changes and the last inserted rowid', () => {
      const insert = connection.prepare('INSERT INTO cells (value) VALUES (?)', { params: [text] })
      insert.execute('first')
      expect(insert.changes).toBe(1)
      expect(Number(insert.lastInsertRowid)).toBe(1)
      expect(insert.rowAvailable).toBe(false)
    })

    it('should accept an explicit bind policy', () => {
      const bytes = Buffer.from([7, 8, 9])
      connection.prepare('INSERT INTO cells (value) VALUES (?)', { params: [blob] }).executeWith('static', bytes)
      const select = connection.execute('SELECT value FROM cells', { columns: [blob] })
      expect(select.fetch()).toEqual([Buffer.from([7, 8, 9])])
    })
  })

  describe('failures', () => {
    it('should surface a parameter-count mismatch as a bind failure', () => {
      const statement = connection.prepare('INSERT INTO cells (value) VALUES (? + ?)', { params: [int32] })
      const err = captureError(() => statement.execute(1))
      expect(err).toBeInstanceOf(DatabaseError)
      expect(err).toMatchObject({ code: 'BIND_FAILED', sql: 'INSERT INTO cells (value) VALUES (? + ?)' })
    })

    it('should surface codec errors as bind failures naming the position', () => {
      const statement = connection.prepare('INSERT INTO cells (value) VALUES (?)', { params: [int64] })
      const err = captureError(() => statement.execute(2n ** 70n))
      expect(err).toMatchObject({ code: 'BIND_FAILED' })
      expect(err instanceof DatabaseError && err.cause).toBeInstanceOf(CodecError)
      expect(err instanceof Error && err.message).toBe(
        'Cannot bind parameter 1 as int64: Value 1180591620717411303424 does not fit in a 64-bit integer',
      )
    })

    it('should refuse fixed-size text whose transmitted bytes are not valid UTF-8', () => {
      const statement = connection.prepare('INSERT INTO cells (value) VALUES (?)', { params: [fixedText(3)] })
      const err = captureError(() => statement.execute(Buffer.from([0x61, 0xc3, 0xa9, 0x00])))
      expect(err).toMatchObject({ code: 'BIND_FAILED' })
      expect(err instanceof DatabaseError && err.cause).toBeInstanceOf(CodecError)
      expect(err instanceof Error && err.message).toBe(
        'Cannot bind parameter 1 as fixedText(3): First 2 bytes are not valid UTF-8 text',
      )
    })

    it('should not run the statement when binding fails', () => {
      const statement = connection.prepare('INSERT INTO cells (value) VALUES (?)', { params: [int64] })
      captureError(() => statement.execute(2n ** 70n))
      const count = connection.execute('SELECT COUNT(*) FROM cells', { columns: [int32] })
      expect(count.fetch()).toEqual([0])
    })

    it('should surface constraint violations as step failures with the engine diagnostic', () => {
      connection.executeScript('CREATE TABLE unique_ids (id INTEGER UNIQUE)')
      const insert = connection.prepare('INSERT INTO unique_ids (id) VALUES (?)', { params: [int32] })
      insert.execute(1)
      const err = captureError(() => insert.execute(1))
      expect(err).toMatchObject({
        code: 'STEP_FAILED',
        engineCode: 'SQLITE_CONSTRAINT_UNIQUE',
        message: 'UNIQUE constraint failed: unique_ids.id',
      })
    })

    it('should deliver the rows before a failing row and fail on the fetch that reaches it', () => {
      const insert = connection.prepare('INSERT INTO cells (value) VALUES (?)', { params: [int32] })
      for (const value of [1, 2, 3]) {
        insert.execute(value)
      }
      const select = connection.execute(
        'SELECT CASE WHEN value < 3 THEN value ELSE abs(value - 9223372036854775807 - 4) END FROM cells',
        { columns: [int64] },
      )

      expect(select.fetch()).toEqual([1n])
      expect(select.fetch()).toEqual([2n])
      expect(captureError(() => select.fetch())).toMatchObject({
        code: 'STEP_FAILED',
        message: 'integer overflow',
      })
      expect(select.fetch()).toBeUndefined()
      connection.execute('SELECT 1').finalize()
    })

    it('should fail to execute once finalized', () => {
      const statement = connection.prepare('SELECT 1', { columns: [int32] })
      statement.finalize()
      statement.finalize()
      expect(statement.isLive).toBe(false)
      expect(captureError(() => statement.execute())).toMatchObject({ code: 'RESET_FAILED' })
      expect(statement.fetch()).toBeUndefined()
    })
  })

  describe('ownership transfer', () => {
    it('should move the compiled plan and pending rows to a new statement', () => {
      const select = connection.prepare('SELECT ? UNION ALL SELECT ?', {
        params: [int32, int32],
        columns: [int32],
      })
      select.execute(10, 20)

      const moved = select.transfer()
      expect(select.isLive).toBe(false)
      expect(select.fetch()).toBeUndefined()
      expect(moved.fetch()).toEqual([10])
      expect(moved.fetch()).toEqual([20])
      moved.execute(30, 40)
      expect(moved.fetch()).toEqual([30])
    })

    it('should release nothing when the emptied source is finalized', () => {
      const select = connection.prepare('SELECT 1', { columns: [int32] })
      const moved = select.transfer()
      select.finalize()
      moved.execute()
      expect(moved.fetch()).toEqual([1])
      expect(connection.liveStatements).toBe(1)
    })

    it('should refuse to transfer an empty statement', () => {
      const select = connection.prepare('SELECT 1')
      select.finalize()
      expect(captureError(() => select.transfer())).toMatchObject({ code: 'RESET_FAILED' })
    })
  })
})
