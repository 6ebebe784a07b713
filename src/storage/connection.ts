import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import Database from 'better-sqlite3'
import type { SqlValue } from '../codec/index.js'
import type { DatabaseSettings } from '../types/config.js'
import { DatabaseError, messageOf } from './errors.js'
import { PlanCache, type NativeStatement } from './plans.js'
import { Statement, type CodecList, type StatementShape, type Values } from './statement.js'

/** Lock-acquisition strategy chosen when a transaction starts. */
export type TransactionKind = 'deferred' | 'immediate' | 'exclusive'

export type JournalMode = 'delete' | 'wal'

const BEGIN_STATEMENTS: Record<TransactionKind, string> = {
  deferred: 'BEGIN DEFERRED TRANSACTION',
  immediate: 'BEGIN IMMEDIATE TRANSACTION',
  exclusive: 'BEGIN EXCLUSIVE TRANSACTION',
}

const COMMIT_STATEMENT = 'COMMIT TRANSACTION'
const ROLLBACK_STATEMENT = 'ROLLBACK TRANSACTION'

const DEFAULT_BUSY_TIMEOUT_MS = 5000
const DEFAULT_PLAN_CACHE_SIZE = 32

export interface ConnectionOptions {
  /** Create the database file when it does not exist. Defaults to true. */
  create?: boolean
  readonly?: boolean
  /** How long to wait on a locked database before failing with SQLITE_BUSY. */
  busyTimeoutMs?: number
  journalMode?: JournalMode
  foreignKeys?: boolean
  /** Idle compiled plans kept for reuse by persistent statements. */
  planCacheSize?: number
  /** Receives the text of every statement the engine executes. */
  trace?: (sql: string) => void
}

export interface PrepareFlags {
  /**
   * Keep the compiled plan when the statement is finalized so the next
   * `prepare` of the same SQL reuses it. Defaults to true.
   */
  persistent?: boolean
}

/**
 * Exclusive owner of one open database.
 *
 * Statements prepared here depend on the connection: `close` finalizes any
 * that are still alive before closing the database, and an uncommitted
 * transaction is discarded by the engine at that point.
 *
 * All operations are synchronous. A connection is not meant to be shared
 * between workers; cross-connection locking is the engine's.
 */
export class Connection {
  private db: Database.Database | null

  private constructor(
    db: Database.Database,
    readonly filename: string,
    private readonly plans: PlanCache,
  ) {
    this.db = db
  }

  /**
   * Open (and by default create) a database. On failure the partially
   * opened handle is closed and an `OPEN_FAILED` error carries the engine's
   * message.
   */
  static open(filename: string, options: ConnectionOptions = {}): Connection {
    const { trace } = options
    let db: Database.Database | undefined
    try {
      db = new Database(filename, {
        readonly: options.readonly ?? false,
        fileMustExist: options.create === false,
        timeout: options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS,
        verbose: trace ? (message?: unknown) => trace(String(message)) : undefined,
      })
      if (options.journalMode !== undefined && !options.readonly) {
        db.pragma(`journal_mode = ${options.journalMode}`)
      }
      if (options.foreignKeys !== undefined) {
        db.pragma(`foreign_keys = ${options.foreignKeys ? 'ON' : 'OFF'}`)
      }
    } catch (err) {
      db?.close()
      throw new DatabaseError('OPEN_FAILED', messageOf(err), { cause: err })
    }
    return new Connection(db, filename, new PlanCache(options.planCacheSize ?? DEFAULT_PLAN_CACHE_SIZE))
  }

  get isOpen(): boolean {
    return this.db !== null
  }

  get inTransaction(): boolean {
    return this.db?.inTransaction ?? false
  }

  /** Idle compiled plans waiting to be reused. */
  get cachedPlans(): number {
    return this.plans.size
  }

  /** Statements that still own a compiled plan. */
  get liveStatements(): number {
    return this.plans.liveCount
  }

  begin(kind: TransactionKind = 'deferred'): void {
    this.runOnce(BEGIN_STATEMENTS[kind])
  }

  commit(): void {
    this.runOnce(COMMIT_STATEMENT)
  }

  rollback(): void {
    this.runOnce(ROLLBACK_STATEMENT)
  }

  /**
   * Run `fn` inside a transaction: commit when it returns, roll back and
   * rethrow when it throws.
   */
  transaction<T>(fn: () => T, kind: TransactionKind = 'deferred'): T {
    this.begin(kind)
    try {
      const result = fn()
      this.commit()
      return result
    } catch (err) {
      if (this.inTransaction) this.rollback()
      throw err
    }
  }

  /** Compile `sql` into a reusable statement. */
  prepare<const P extends CodecList = [], const C extends CodecList = []>(
    sql: string,
    shape: StatementShape<P, C> = {},
    flags: PrepareFlags = {},
  ): Statement<P, C> {
    const db = this.handle()
    const persistent = flags.persistent ?? true
    const plan = (persistent ? this.plans.take(sql) : undefined) ?? this.compile(db, sql)
    return new Statement<P, C>(plan, shape, this.plans, persistent)
  }

  /**
   * Compile, bind and run `sql` in one call. The returned statement holds
   * the first row, if any, for `fetch`; finalize it when done.
   */
  execute<const P extends CodecList = [], const C extends CodecList = []>(
    sql: string,
    shape: StatementShape<P, C> = {},
    ...args: Values<P>
  ): Statement<P, C> {
    const statement = this.prepare(sql, shape, { persistent: false })
    try {
      statement.execute(...args)
    } catch (err) {
      statement.finalize()
      throw err
    }
    return statement
  }

  /** Run a script of zero or more statements verbatim. */
  executeScript(sql: string): void {
    const db = this.handle()
    try {
      db.exec(sql)
    } catch (err) {
      throw new DatabaseError('STEP_FAILED', messageOf(err), { sql, cause: err })
    }
  }

  /**
   * Move ownership of the database (and its live statements) to a new
   * connection. This one is left closed and releases nothing.
   */
  transfer(): Connection {
    const db = this.handle()
    this.db = null
    return new Connection(db, this.filename, this.plans)
  }

  /** Finalize live statements and close the database. Safe to call more than once. */
  close(): void {
    const db = this.db
    if (db === null) return
    this.plans.close()
    this.db = null
    db.close()
  }

  private handle(): Database.Database {
    if (this.db === null) {
      throw new DatabaseError('CONNECTION_CLOSED', `Connection to ${this.filename} is closed`)
    }
    return this.db
  }

  private compile(db: Database.Database, sql: string): NativeStatement {
    let plan: NativeStatement
    try {
      plan = db.prepare<SqlValue[], SqlValue[]>(sql)
    } catch (err) {
      throw new DatabaseError('COMPILE_FAILED', messageOf(err), { sql, cause: err })
    }
    if (plan.reader) plan.raw(true)
    return plan.safeIntegers(true)
  }

  private runOnce(sql: string): void {
    this.execute(sql).finalize()
  }
}

/**
 * Open the database described by loaded configuration, creating its
 * parent directory when the file may be created.
 */
export function openDatabase(settings: DatabaseSettings, trace?: (sql: string) => void): Connection {
  if (settings.create && !settings.readonly && settings.path !== ':memory:') {
    mkdirSync(dirname(settings.path), { recursive: true })
  }
  return Connection.open(settings.path, {
    create: settings.create,
    readonly: settings.readonly,
    busyTimeoutMs: settings.busyTimeoutMs,
    journalMode: settings.journalMode,
    foreignKeys: settings.foreignKeys,
    planCacheSize: settings.planCacheSize,
    trace,
  })
}
