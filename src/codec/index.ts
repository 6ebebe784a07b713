export type { SqlValue, StorageClass } from './cells.js'
export { storageClassOf, toBytes, toDouble, toInt32, toInt64, toText } from './cells.js'
export type { BindPolicy, Codec } from './codecs.js'
export {
  int8,
  int16,
  int32,
  uint8,
  uint16,
  uint32,
  int64,
  boolean,
  double,
  text,
  blob,
  nil,
  fixedText,
  enumeration,
  optional,
} from './codecs.js'
export { CodecError } from './errors.js'
