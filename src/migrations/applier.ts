import { int32, optional, text } from '../codec/index.js'
import type { Connection, TransactionKind } from '../storage/connection.js'
import { DatabaseError, messageOf } from '../storage/errors.js'
import type { MigrationResult, MigrationStatus, VersionRecord } from '../types/migration.js'

/**
 * A migration: raw SQL of zero or more statements, run verbatim. Its
 * position in the list is its version (1-based).
 */
export type MigrationScript = string | { sql: string; description?: string }

export interface ApplyOptions {
  /** Transaction kind for the batch. Defaults to `deferred`. */
  kind?: TransactionKind
  /** Called for each recorded version once the batch has committed. */
  onApplied?: (version: number, description: string | undefined) => void
}

const CREATE_VERSION_TABLE = `
  CREATE TABLE IF NOT EXISTS VersionInfo
  (
    Version INTEGER NOT NULL,
    AppliedOn DATETIME,
    Description TEXT
  )
`

const SELECT_CURRENT_VERSION = 'SELECT MAX(Version) FROM VersionInfo'

const COUNT_VERSION_TABLES = "SELECT COUNT(*) FROM sqlite_master WHERE type = 'table' AND name = 'VersionInfo'"

const INSERT_VERSION = `
  INSERT INTO VersionInfo (Version, AppliedOn, Description)
  VALUES (?, datetime('now'), ?)
`

const SELECT_VERSIONS = 'SELECT Version, AppliedOn, Description FROM VersionInfo ORDER BY Version'

function normalize(script: MigrationScript): { sql: string; description?: string } {
  return typeof script === 'string' ? { sql: script } : script
}

/** Create the version table when missing. Runs outside any transaction scope of its own. */
export function ensureVersionTable(connection: Connection): void {
  connection.execute(CREATE_VERSION_TABLE).finalize()
}

function hasVersionTable(connection: Connection): boolean {
  const statement = connection.execute(COUNT_VERSION_TABLES, { columns: [int32] })
  try {
    return (statement.fetch()?.[0] ?? 0) > 0
  } finally {
    statement.finalize()
  }
}

/**
 * Highest applied version, or 0 when nothing has been applied. Never
 * writes: a database without the version table is at version 0.
 */
export function getCurrentVersion(connection: Connection): number {
  if (!hasVersionTable(connection)) return 0
  const statement = connection.execute(SELECT_CURRENT_VERSION, { columns: [int32] })
  try {
    return statement.fetch()?.[0] ?? 0
  } finally {
    statement.finalize()
  }
}

/** Every version record, oldest first. Read-only, like `getCurrentVersion`. */
export function listVersions(connection: Connection): VersionRecord[] {
  if (!hasVersionTable(connection)) return []
  const statement = connection.execute(SELECT_VERSIONS, {
    columns: [int32, optional(text), optional(text)],
  })
  try {
    return [...statement.rows()].map(([version, appliedOn, description]) => ({
      version,
      appliedOn,
      description,
    }))
  } finally {
    statement.finalize()
  }
}

/** Where the database stands against `scripts`, without writing anything. */
export function migrationStatus(connection: Connection, scripts: readonly MigrationScript[]): MigrationStatus {
  const current = getCurrentVersion(connection)
  const pending: number[] = []
  for (let version = current + 1; version <= scripts.length; version++) {
    pending.push(version)
  }
  return { current, target: Math.max(current, scripts.length), pending }
}

/**
 * Apply every script past the current version, in list order, inside one
 * transaction, recording each as version `index + 1`.
 *
 * The batch is atomic. When a script or its version record fails, the
 * transaction is rolled back here before the failure is rethrown as
 * `MIGRATION_FAILED`, so the connection stays usable. Only a transaction
 * this call began is rolled back: if `begin` fails because the caller
 * already holds one, the caller's transaction is left as it was.
 */
export function applyMigrations(
  connection: Connection,
  scripts: readonly MigrationScript[],
  options: ApplyOptions = {},
): MigrationResult {
  ensureVersionTable(connection)
  const from = getCurrentVersion(connection)
  if (scripts.length <= from) {
    return { from, to: from, applied: [] }
  }

  const recorded: Array<{ version: number; description?: string }> = []
  const insert = connection.prepare(INSERT_VERSION, { params: [int32, optional(text)] })
  let version = from + 1
  let began = false
  try {
    connection.begin(options.kind ?? 'deferred')
    began = true
    for (let index = from; index < scripts.length; index++) {
      version = index + 1
      const { sql, description } = normalize(scripts[index])
      connection.executeScript(sql)
      insert.execute(version, description)
      recorded.push({ version, description })
    }
    connection.commit()
  } catch (err) {
    if (began && connection.inTransaction) connection.rollback()
    throw new DatabaseError('MIGRATION_FAILED', `Migration ${version} failed: ${messageOf(err)}`, {
      sql: err instanceof DatabaseError ? err.sql : undefined,
      cause: err,
    })
  } finally {
    insert.finalize()
  }

  for (const record of recorded) {
    options.onApplied?.(record.version, record.description)
  }
  return { from, to: scripts.length, applied: recorded.map((record) => record.version) }
}
