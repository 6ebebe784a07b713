import type Database from 'better-sqlite3'
import type { SqlValue } from '../codec/index.js'

/** Compiled statement as the driver exposes it, returning raw rows. */
export type NativeStatement = Database.Statement<SqlValue[], SqlValue[]>

/** Holder of a compiled plan that must be released deterministically. */
export interface Finalizable {
  finalize(): void
}

/**
 * Book-keeping for the compiled plans of one connection.
 *
 * Tracks every statement still alive so closing the connection can
 * finalize them, and keeps the plans of finalized persistent statements
 * (keyed by SQL text) so the next `prepare` of the same text skips
 * compilation. Idle plans beyond `capacity` are evicted oldest first.
 */
export class PlanCache {
  private readonly live = new Set<Finalizable>()
  private readonly idle = new Map<string, NativeStatement>()
  private closed = false

  constructor(private readonly capacity: number) {}

  /** Number of idle plans kept for reuse. */
  get size(): number {
    return this.idle.size
  }

  /** Number of statements currently owning a plan. */
  get liveCount(): number {
    return this.live.size
  }

  /** Remove and return the idle plan compiled from `sql`, if any. */
  take(sql: string): NativeStatement | undefined {
    const plan = this.idle.get(sql)
    if (plan !== undefined) this.idle.delete(sql)
    return plan
  }

  adopt(statement: Finalizable): void {
    this.live.add(statement)
  }

  /** Forget a statement without touching its plan (ownership moved). */
  disown(statement: Finalizable): void {
    this.live.delete(statement)
  }

  /** Take back the plan of a finalized statement. */
  reclaim(statement: Finalizable, plan: NativeStatement, persistent: boolean): void {
    this.live.delete(statement)
    if (!persistent || this.closed || this.capacity === 0 || this.idle.has(plan.source)) return

    if (this.idle.size >= this.capacity) {
      const oldest = this.idle.keys().next()
      if (!oldest.done) this.idle.delete(oldest.value)
    }
    this.idle.set(plan.source, plan)
  }

  /** Finalize every live statement and drop all idle plans. */
  close(): void {
    this.closed = true
    for (const statement of [...this.live]) {
      statement.finalize()
    }
    this.live.clear()
    this.idle.clear()
  }
}
