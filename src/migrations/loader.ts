import { readdirSync, readFileSync } from 'node:fs'
import { basename, join } from 'node:path'
import type { MigrationScript } from './applier.js'

/** Migration scripts could not be read from disk. */
export class MigrationSourceError extends Error {
  readonly directory: string

  constructor(directory: string, message: string) {
    super(message)
    this.name = 'MigrationSourceError'
    this.directory = directory
  }
}

const DESCRIPTION_LINE = /^\s*--\s*description:\s*(.+?)\s*$/i

/**
 * Read every `*.sql` file in `directory`, ordered by file name, as a
 * migration list. A first line of the form `-- description: ...` becomes
 * the description; otherwise the file name (without extension) is used.
 */
export function loadMigrationScripts(directory: string): MigrationScript[] {
  let entries: string[]
  try {
    entries = readdirSync(directory)
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new MigrationSourceError(directory, `Migrations directory not found: ${directory}`)
    }
    throw new MigrationSourceError(directory, `Failed to read migrations directory: ${directory}`)
  }

  return entries
    .filter((entry) => entry.toLowerCase().endsWith('.sql'))
    .sort()
    .map((entry) => {
      const sql = readFileSync(join(directory, entry), 'utf-8')
      const firstLine = sql.split('\n', 1)[0]
      const match = DESCRIPTION_LINE.exec(firstLine)
      return { sql, description: match ? match[1] : basename(entry, '.sql') }
    })
}
