/**
 * rowbind - fill caller-owned records from prepared statement results
 *
 * Record types list their own write-targets in column order; rowbind runs the
 * statement, walks the cursor and binds each row, without reflection or
 * schema inference.
 *
 * @packageDocumentation
 */

export { Materializer, materializeAll, materializeOne } from './materialize.js';
export type { MaterializerOptions } from './materialize.js';
export { collect, collectRecords } from './accumulator.js';
export { slot, field, discard } from './slots.js';
export {
  asString,
  asNumber,
  asInteger,
  asBigInt,
  asBoolean,
  asDate,
  asBytes,
  nullable,
  parseWith,
} from './convert.js';
export { BufferedRowCursor, IteratorRowCursor } from './cursor.js';
export type { RowSource } from './cursor.js';
export {
  RowbindError,
  ExecutionError,
  ScanError,
  CursorError,
  ReleaseError,
  ConversionError,
  NotFoundError,
} from './errors.js';
export type { RowCursor, StatementExecutor } from './database.js';
export { validateTargets, validateRow } from './validator.js';
export type {
  Slot,
  Converter,
  SingleRecordBinder,
  RecordSetAccumulator,
} from './types.js';

// Re-export adapters for convenience
export * from './adapters/index.js';
