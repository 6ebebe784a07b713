import { Type, type Static } from '@sinclair/typebox'

/** Transaction lock-acquisition strategy */
export const TransactionKindSchema = Type.Union([
  Type.Literal('deferred'),
  Type.Literal('immediate'),
  Type.Literal('exclusive'),
])
export type TransactionKindSchema = Static<typeof TransactionKindSchema>

/** Journal mode applied when a database is opened for writing */
export const JournalModeSchema = Type.Union([Type.Literal('delete'), Type.Literal('wal')])
export type JournalModeSchema = Static<typeof JournalModeSchema>

/** Engine timestamp as produced by datetime('now'): "YYYY-MM-DD HH:MM:SS" */
export const EngineTimestamp = Type.String({ pattern: '^\\d{4}-\\d{2}-\\d{2} \\d{2}:\\d{2}:\\d{2}$' })
export type EngineTimestamp = Static<typeof EngineTimestamp>
