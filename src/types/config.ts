import { Type, type Static } from '@sinclair/typebox'
import { JournalModeSchema, TransactionKindSchema } from './common.js'

/** Database settings section */
export const DatabaseSettingsSchema = Type.Object({
  path: Type.String({ minLength: 1, default: './data/app.db' }),
  create: Type.Boolean({ default: true }),
  readonly: Type.Boolean({ default: false }),
  busyTimeoutMs: Type.Number({ minimum: 0, default: 5000 }),
  journalMode: JournalModeSchema,
  foreignKeys: Type.Boolean({ default: true }),
  planCacheSize: Type.Integer({ minimum: 0, default: 32 }),
})

export type DatabaseSettings = Static<typeof DatabaseSettingsSchema>

/** typed-sqlite configuration schema for typed-sqlite.config.json */
export const AppConfigSchema = Type.Object({
  database: DatabaseSettingsSchema,
  migrations: Type.Object({
    directory: Type.String({ minLength: 1, default: './migrations' }),
    transactionKind: TransactionKindSchema,
  }),
})

export type AppConfig = Static<typeof AppConfigSchema>
