import { Type, type Static } from '@sinclair/typebox'
import { EngineTimestamp } from './common.js'

/** One row of the VersionInfo table */
export const VersionRecordSchema = Type.Object({
  version: Type.Integer({ minimum: 1 }),
  appliedOn: Type.Optional(EngineTimestamp),
  description: Type.Optional(Type.String()),
})

export type VersionRecord = Static<typeof VersionRecordSchema>

/** Outcome of one applyMigrations call */
export const MigrationResultSchema = Type.Object({
  from: Type.Integer({ minimum: 0 }),
  to: Type.Integer({ minimum: 0 }),
  applied: Type.Array(Type.Integer({ minimum: 1 })),
})

export type MigrationResult = Static<typeof MigrationResultSchema>

/** Current, target and pending versions for a script list */
export const MigrationStatusSchema = Type.Object({
  current: Type.Integer({ minimum: 0 }),
  target: Type.Integer({ minimum: 0 }),
  pending: Type.Array(Type.Integer({ minimum: 1 })),
})

export type MigrationStatus = Static<typeof MigrationStatusSchema>
