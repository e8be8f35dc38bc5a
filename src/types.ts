/**
 * rowbind types
 *
 * The two capability contracts a record type implements to be filled from a
 * result set, plus the write-target they are built from.
 */

/**
 * Slot is an addressable location a scan writes one column value into.
 */
export interface Slot {
  set(value: unknown): void;
}

/**
 * Converter turns a raw column value into a field's type, or throws.
 */
export type Converter<T> = (value: unknown) => T;

/**
 * SingleRecordBinder exposes the write-targets of one record.
 *
 * The targets are returned in result column order, one per column. Arity and
 * type mismatches are not checked here; they surface when the row is scanned.
 *
 * @example
 * ```typescript
 * class Label implements SingleRecordBinder {
 *   id = 0;
 *   name = '';
 *
 *   targets(this: Label): Slot[] {
 *     return [field(this, 'id', asInteger), field(this, 'name', asString)];
 *   }
 * }
 * ```
 */
export interface SingleRecordBinder {
  targets(): Slot[];
}

/**
 * RecordSetAccumulator grows a caller-owned collection by one record per row.
 *
 * Each newElement() call must create a new record, append it to the
 * collection, and return a binder scoped to that record. Binders are never
 * reused.
 */
export interface RecordSetAccumulator {
  newElement(): SingleRecordBinder;
}
