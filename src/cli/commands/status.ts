import type { Command } from 'commander'
import { loadConfig, ConfigError } from '../../config/index.js'
import { listVersions, loadMigrationScripts, migrationStatus, MigrationSourceError } from '../../migrations/index.js'
import { DatabaseError, openDatabase, type Connection } from '../../storage/index.js'
import type { AppConfig, VersionRecord } from '../../types/index.js'
import { output } from '../output.js'

/**
 * Render version records as aligned lines: version right-aligned, applied
 * timestamp padded, description last. Nothing for an empty list.
 */
export function formatVersionTable(records: readonly VersionRecord[]): string[] {
  if (records.length === 0) return []
  const rows = records.map((record) => [String(record.version), record.appliedOn ?? '', record.description ?? ''])
  const versionWidth = Math.max('VERSION'.length, ...rows.map(([version]) => version.length))
  const appliedWidth = Math.max('APPLIED ON'.length, ...rows.map(([, appliedOn]) => appliedOn.length))
  return [['VERSION', 'APPLIED ON', 'DESCRIPTION'], ...rows].map(([version, appliedOn, description], index) => {
    const first = index === 0 ? version.padEnd(versionWidth) : version.padStart(versionWidth)
    return `${first}  ${appliedOn.padEnd(appliedWidth)}  ${description}`.trimEnd()
  })
}

/**
 * Register the `status` command on the Commander program.
 *
 * Shows the current schema version, the number of pending scripts and
 * the applied version records.
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the schema version and pending migrations')
    .option('-c, --config <path>', 'configuration file path', 'typed-sqlite.config.json')
    .action((options: { config: string }) => {
      let config: AppConfig
      try {
        config = loadConfig(options.config)
      } catch (err) {
        if (err instanceof ConfigError) {
          output.error(err.message)
          process.exit(1)
          return
        }
        throw err
      }

      let connection: Connection | undefined
      try {
        const scripts = loadMigrationScripts(config.migrations.directory)
        connection = openDatabase(config.database)
        const status = migrationStatus(connection, scripts)
        const records = listVersions(connection)

        output.info(`Current version: ${status.current}`)
        output.info(`Pending migrations: ${status.pending.length}`)
        for (const line of formatVersionTable(records)) {
          output.info(line)
        }
      } catch (err) {
        if (err instanceof DatabaseError || err instanceof MigrationSourceError) {
          output.error(err.message)
          process.exit(1)
          return
        }
        throw err
      } finally {
        connection?.close()
      }
    })
}
