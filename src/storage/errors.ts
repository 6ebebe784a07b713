import Database from 'better-sqlite3'

/** Typed failure codes for the access layer */
export type DatabaseErrorCode =
  | 'OPEN_FAILED'
  | 'COMPILE_FAILED'
  | 'BIND_FAILED'
  | 'STEP_FAILED'
  | 'RESET_FAILED'
  | 'CONNECTION_CLOSED'
  | 'MIGRATION_FAILED'

export interface DatabaseErrorDetails {
  /** SQL text the failure originated from. */
  sql?: string
  cause?: unknown
}

/**
 * Failure raised by a connection, statement or the migration applier.
 *
 * The message is the engine's diagnostic text. `engineCode` carries the
 * engine's extended result code (e.g. `SQLITE_CONSTRAINT_UNIQUE`) when the
 * failure came from the engine itself.
 */
export class DatabaseError extends Error {
  readonly code: DatabaseErrorCode
  readonly sql?: string
  readonly engineCode?: string

  constructor(code: DatabaseErrorCode, message: string, details: DatabaseErrorDetails = {}) {
    super(message, { cause: details.cause })
    this.name = 'DatabaseError'
    this.code = code
    this.sql = details.sql
    this.engineCode = engineCodeOf(details.cause)
  }
}

/** Error thrown by the engine itself, as opposed to the driver's argument checks. */
export type EngineError = InstanceType<typeof Database.SqliteError>

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof Database.SqliteError
}

function engineCodeOf(cause: unknown): string | undefined {
  if (isEngineError(cause)) return cause.code
  if (cause instanceof DatabaseError) return cause.engineCode
  return undefined
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
