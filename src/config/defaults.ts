import type { AppConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: AppConfig = {
  database: {
    path: './data/app.db',
    create: true,
    readonly: false,
    busyTimeoutMs: 5000,
    journalMode: 'delete',
    foreignKeys: true,
    planCacheSize: 32,
  },
  migrations: {
    directory: './migrations',
    transactionKind: 'deferred',
  },
}
