// Common types
export { TransactionKindSchema, JournalModeSchema, EngineTimestamp } from './common.js'

// Configuration
export { AppConfigSchema, DatabaseSettingsSchema } from './config.js'
export type { AppConfig, DatabaseSettings } from './config.js'

// Migrations
export { VersionRecordSchema, MigrationResultSchema, MigrationStatusSchema } from './migration.js'
export type { VersionRecord, MigrationResult, MigrationStatus } from './migration.js'
