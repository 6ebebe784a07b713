export * from './codec/index.js'
export * from './storage/index.js'
export * from './migrations/index.js'
export { loadConfig, ConfigError, DEFAULT_CONFIG } from './config/index.js'
export type { AppConfig, DatabaseSettings, MigrationResult, MigrationStatus, VersionRecord } from './types/index.js'
