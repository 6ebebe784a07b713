import type { Command } from 'commander'
import { loadConfig, ConfigError } from '../../config/index.js'
import { applyMigrations, loadMigrationScripts, MigrationSourceError } from '../../migrations/index.js'
import { DatabaseError, openDatabase, type Connection } from '../../storage/index.js'
import type { AppConfig } from '../../types/index.js'
import { output } from '../output.js'

/**
 * Register the `migrate` command on the Commander program.
 *
 * Loads configuration, reads the migration scripts, opens the database
 * and applies every pending script in one transaction.
 */
export function registerMigrateCommand(program: Command): void {
  program
    .command('migrate')
    .description('Apply pending migrations')
    .option('-c, --config <path>', 'configuration file path', 'typed-sqlite.config.json')
    .option('--trace', 'print every executed SQL statement')
    .action((options: { config: string; trace?: boolean }) => {
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
        connection = openDatabase(config.database, options.trace ? output.trace : undefined)
        const result = applyMigrations(connection, scripts, {
          kind: config.migrations.transactionKind,
          onApplied: (version, description) => {
            output.info(description ? `Applied version ${version}: ${description}` : `Applied version ${version}`)
          },
        })

        if (result.applied.length === 0) {
          output.success(`Database is up to date at version ${result.to}`)
        } else {
          output.success(`Migrated from version ${result.from} to ${result.to}`)
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
