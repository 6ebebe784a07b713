export { Connection, openDatabase } from './connection.js'
export type { ConnectionOptions, JournalMode, PrepareFlags, TransactionKind } from './connection.js'
export { Statement } from './statement.js'
export type { CodecList, StatementShape, Values } from './statement.js'
export { DatabaseError, isEngineError } from './errors.js'
export type { DatabaseErrorCode, DatabaseErrorDetails, EngineError } from './errors.js'
export type { Finalizable } from './plans.js'
