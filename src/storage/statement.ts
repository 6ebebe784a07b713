import type Database from 'better-sqlite3'
import type { BindPolicy, Codec, SqlValue } from '../codec/index.js'
import { DatabaseError, messageOf } from './errors.js'
import type { Finalizable, NativeStatement, PlanCache } from './plans.js'

/** Ordered codecs for parameter slots or result columns. */
export type CodecList = readonly Codec<unknown>[]

/** The value tuple described by a codec list. */
export type Values<C extends CodecList> = {
  -readonly [K in keyof C]: C[K] extends Codec<infer T> ? T : never
}

/**
 * Codecs for the `?` parameters (bound from position 1) and the result
 * columns (extracted from column 0) of a statement.
 */
export interface StatementShape<P extends CodecList, C extends CodecList> {
  params?: P
  columns?: C
}

/**
 * A compiled statement with typed positional binding and extraction.
 *
 * `execute` binds its arguments and runs the statement; for statements that
 * return data it steps once, so the first row becomes available. `fetch`
 * steps one row further each time and reports `undefined` once the result
 * set is exhausted. The statement never moves past a row that has not been
 * fetched; a new `execute` discards it. A step failure surfaces from the
 * `execute` or `fetch` that reached the failing row.
 *
 * While a result set is partly read the driver holds the connection busy:
 * other statements on it fail until the rows are exhausted, the statement
 * is executed again, or it is finalized.
 *
 * A statement owns its compiled plan until `finalize` (or until the owning
 * connection closes). `transfer` moves that ownership to a new object and
 * leaves this one empty.
 */
export class Statement<P extends CodecList = [], C extends CodecList = []> implements Finalizable {
  readonly sql: string

  private plan: NativeStatement | null
  private readonly paramCodecs: CodecList
  private readonly columnCodecs: CodecList

  private cursor: IterableIterator<SqlValue[]> | null = null
  private current: SqlValue[] | null = null
  private lastRun: Database.RunResult | null = null

  constructor(
    plan: NativeStatement,
    private readonly shape: StatementShape<P, C>,
    private readonly plans: PlanCache,
    private readonly persistent: boolean,
  ) {
    this.plan = plan
    this.sql = plan.source
    this.paramCodecs = shape.params ?? []
    this.columnCodecs = shape.columns ?? []
    plans.adopt(this)
  }

  /** True between a row-producing advance and the fetch that consumes it. */
  get rowAvailable(): boolean {
    return this.current !== null
  }

  /** False once the compiled plan has been released or moved away. */
  get isLive(): boolean {
    return this.plan !== null
  }

  /** Rows changed by the last execution of a statement that returns no data. */
  get changes(): number {
    return this.lastRun?.changes ?? 0
  }

  get lastInsertRowid(): number | bigint {
    return this.lastRun?.lastInsertRowid ?? 0
  }

  /** Bind `args` with the `transient` policy and run the statement. */
  execute(...args: Values<P>): void {
    this.executeWith('transient', ...args)
  }

  /** Bind `args` with an explicit policy and run the statement. */
  executeWith(policy: BindPolicy, ...args: Values<P>): void {
    const plan = this.reset()
    const bound = this.bind(policy, args)
    this.run(plan, bound)
    this.advance()
  }

  /**
   * Take the available row (advancing once if none is held) and extract
   * its columns. Returns `undefined` when there is no row.
   */
  fetch(): Values<C> | undefined {
    const row = this.take()
    if (row === null) return undefined
    return this.columnCodecs.map((codec, index) => codec.extract(row[index] ?? null)) as Values<C>
  }

  /**
   * Out-argument form of `fetch`: extract into `target` in place, handing
   * each codec the slot's current value. Returns false when there is no row.
   */
  fetchInto(target: Values<C> & unknown[]): boolean {
    const row = this.take()
    if (row === null) return false
    const slots: unknown[] = target
    this.columnCodecs.forEach((codec, index) => {
      slots[index] = codec.extract(row[index] ?? null, slots[index])
    })
    return true
  }

  /** Fetch until the result set is exhausted. */
  *rows(): Generator<Values<C>, void, undefined> {
    for (let row = this.fetch(); row !== undefined; row = this.fetch()) {
      yield row
    }
  }

  /** Release the compiled plan. Safe to call more than once. */
  finalize(): void {
    const plan = this.plan
    if (plan === null) return
    this.plan = null
    this.clear()
    this.plans.reclaim(this, plan, this.persistent)
  }

  /**
   * Move ownership of the compiled plan, open result set included, to a new
   * statement. This one is left empty and releases nothing on finalize.
   */
  transfer(): Statement<P, C> {
    const plan = this.plan
    if (plan === null) {
      throw new DatabaseError('RESET_FAILED', 'Statement has no compiled plan to transfer', { sql: this.sql })
    }
    const next = new Statement<P, C>(plan, this.shape, this.plans, this.persistent)
    next.cursor = this.cursor
    next.current = this.current
    next.lastRun = this.lastRun

    this.plan = null
    this.cursor = null
    this.clear()
    this.plans.disown(this)
    return next
  }

  private clear(): void {
    this.cursor?.return?.()
    this.cursor = null
    this.current = null
    this.lastRun = null
  }

  private reset(): NativeStatement {
    if (this.plan === null) {
      throw new DatabaseError('RESET_FAILED', 'Statement has been finalized', { sql: this.sql })
    }
    this.clear()
    return this.plan
  }

  private bind(policy: BindPolicy, args: readonly unknown[]): SqlValue[] {
    if (args.length !== this.paramCodecs.length) {
      throw new DatabaseError(
        'BIND_FAILED',
        `Expected ${this.paramCodecs.length} parameter values, got ${args.length}`,
        { sql: this.sql },
      )
    }
    return this.paramCodecs.map((codec, index) => {
      try {
        return codec.bind(args[index], policy)
      } catch (err) {
        throw new DatabaseError(
          'BIND_FAILED',
          `Cannot bind parameter ${index + 1} as ${codec.name}: ${messageOf(err)}`,
          { sql: this.sql, cause: err },
        )
      }
    })
  }

  private run(plan: NativeStatement, bound: SqlValue[]): void {
    try {
      if (plan.reader) {
        this.cursor = plan.iterate(...bound)
      } else {
        this.lastRun = plan.run(...bound)
      }
    } catch (err) {
      // the driver reports slot-count mismatches as RangeError before stepping
      const code = err instanceof RangeError ? 'BIND_FAILED' : 'STEP_FAILED'
      throw new DatabaseError(code, messageOf(err), { sql: this.sql, cause: err })
    }
  }

  private advance(): void {
    const cursor = this.cursor
    this.current = null
    if (cursor === null) return

    let step: IteratorResult<SqlValue[]>
    try {
      step = cursor.next()
    } catch (err) {
      this.cursor = null
      throw new DatabaseError('STEP_FAILED', messageOf(err), { sql: this.sql, cause: err })
    }
    if (step.done) {
      this.cursor = null
    } else {
      this.current = step.value
    }
  }

  private take(): SqlValue[] | null {
    if (this.current === null) this.advance()
    const row = this.current
    this.current = null
    return row
  }
}
