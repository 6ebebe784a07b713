export {
  applyMigrations,
  ensureVersionTable,
  getCurrentVersion,
  listVersions,
  migrationStatus,
} from './applier.js'
export type { ApplyOptions, MigrationScript } from './applier.js'
export { loadMigrationScripts, MigrationSourceError } from './loader.js'
