/**
 * Error classes for rowbind.
 *
 * Every error raised by the cursors, converters and adapters extends
 * RowbindError. The materialization functions themselves never wrap: whatever
 * the executor or cursor rejects with reaches the caller unchanged.
 */

/**
 * RowbindError is the base error class for all rowbind errors.
 */
export class RowbindError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RowbindError';
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, RowbindError.prototype);
  }
}

/**
 * ExecutionError indicates the query could not be started.
 *
 * No cursor exists when this is raised, so nothing was written to the
 * destination collection.
 */
export class ExecutionError extends RowbindError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExecutionError';
    Object.setPrototypeOf(this, ExecutionError.prototype);
  }
}

/**
 * ScanError indicates a single row could not be written into its targets.
 *
 * The record for that row has already been allocated by the accumulator and
 * may be partially populated.
 *
 * @example
 * ```typescript
 * try {
 *   await materializeAll(executor, collect(labels, () => new Label()));
 * } catch (err) {
 *   if (err instanceof ScanError) {
 *     console.error(`column ${err.column} rejected:`, err.cause);
 *   }
 * }
 * ```
 */
export class ScanError extends RowbindError {
  /** Zero-based index of the failing column, when one column is to blame. */
  readonly column?: number;
  readonly columnName?: string;

  constructor(
    message: string,
    options?: ErrorOptions & { column?: number; columnName?: string }
  ) {
    super(message, options);
    this.name = 'ScanError';
    this.column = options?.column;
    this.columnName = options?.columnName;
    Object.setPrototypeOf(this, ScanError.prototype);
  }
}

/**
 * CursorError is a fault found while fetching rows rather than while scanning
 * one, reported through RowCursor.terminalError() after iteration stops.
 */
export class CursorError extends RowbindError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CursorError';
    Object.setPrototypeOf(this, CursorError.prototype);
  }
}

/**
 * ReleaseError indicates the driver failed to close a cursor.
 */
export class ReleaseError extends RowbindError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ReleaseError';
    Object.setPrototypeOf(this, ReleaseError.prototype);
  }
}

/**
 * ConversionError is thrown by converters when a column value cannot become
 * the field's type. Cursors report it as the cause of a ScanError.
 */
export class ConversionError extends RowbindError {
  constructor(message: string) {
    super(message);
    this.name = 'ConversionError';
    Object.setPrototypeOf(this, ConversionError.prototype);
  }
}

/**
 * NotFoundError indicates a single-row query returned no rows.
 */
export class NotFoundError extends RowbindError {
  constructor(message: string = 'no rows in result set') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}
