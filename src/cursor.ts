/**
 * Row cursors over driver results.
 *
 * Drivers that hand back a fully fetched result (node-postgres, postgres.js)
 * use BufferedRowCursor; drivers that stream rows through an iterator
 * (better-sqlite3) use IteratorRowCursor. Both expect rows in array mode, one
 * value per column in select-list order.
 */

import type { RowCursor } from './database.js';
import type { Slot } from './types.js';
import { CursorError, ReleaseError, RowbindError, ScanError } from './errors.js';
import { validateRow, validateTargets } from './validator.js';

/**
 * RowSource is anything that yields rows one at a time.
 */
export type RowSource = Iterator<unknown> | AsyncIterator<unknown>;

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

abstract class ArrayRowCursor implements RowCursor {
  readonly columns?: readonly string[];
  protected current?: unknown[];
  protected failure?: Error;
  protected released = false;

  constructor(columns?: readonly string[]) {
    this.columns = columns;
  }

  abstract advance(): Promise<boolean>;
  abstract release(): Promise<void>;

  async scanInto(targets: readonly Slot[]): Promise<void> {
    const row = this.current;
    if (row === undefined) {
      throw new ScanError('scan called without a current row');
    }
    validateTargets(targets, row.length);

    for (let index = 0; index < row.length; index++) {
      try {
        targets[index].set(row[index]);
      } catch (err) {
        const columnName = this.columns?.[index];
        const label = columnName === undefined
          ? `column index ${index}`
          : `column index ${index}, name "${columnName}"`;
        throw new ScanError(`scan error on ${label}: ${describe(err)}`, {
          cause: err,
          column: index,
          columnName,
        });
      }
    }
  }

  terminalError(): Error | undefined {
    return this.failure;
  }

  /**
   * Record a fetch fault as the terminal error and end iteration.
   */
  protected fail(err: unknown): false {
    this.current = undefined;
    this.failure = err instanceof RowbindError
      ? err
      : new CursorError(`fetching row: ${describe(err)}`, { cause: err });
    return false;
  }
}

/**
 * BufferedRowCursor walks rows that were fetched in one round trip.
 *
 * @example
 * ```typescript
 * const result = await client.query({ text, values, rowMode: 'array' });
 * const cursor = new BufferedRowCursor(result.rows, result.fields.map((f) => f.name));
 * ```
 */
export class BufferedRowCursor extends ArrayRowCursor {
  private readonly rows: readonly unknown[];
  private position = -1;

  constructor(rows: readonly unknown[], columns?: readonly string[]) {
    super(columns);
    this.rows = rows;
  }

  async advance(): Promise<boolean> {
    if (this.released || this.failure || this.position + 1 >= this.rows.length) {
      this.current = undefined;
      return false;
    }
    this.position++;
    try {
      this.current = validateRow(this.rows[this.position]);
    } catch (err) {
      return this.fail(err);
    }
    return true;
  }

  async release(): Promise<void> {
    this.released = true;
    this.current = undefined;
  }
}

/**
 * IteratorRowCursor pulls rows from a driver iterator on demand.
 *
 * An error thrown by the iterator ends iteration and becomes the terminal
 * error. Releasing calls the iterator's return() once, which lets drivers
 * such as better-sqlite3 free the statement before the result is exhausted.
 */
export class IteratorRowCursor extends ArrayRowCursor {
  private readonly source: RowSource;
  private done = false;

  constructor(source: RowSource, columns?: readonly string[]) {
    super(columns);
    this.source = source;
  }

  async advance(): Promise<boolean> {
    if (this.released || this.done) {
      this.current = undefined;
      return false;
    }
    try {
      const result = await this.source.next();
      if (result.done) {
        this.done = true;
        this.current = undefined;
        return false;
      }
      this.current = validateRow(result.value);
      return true;
    } catch (err) {
      this.done = true;
      return this.fail(err);
    }
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    this.current = undefined;
    try {
      await this.source.return?.();
    } catch (err) {
      throw new ReleaseError(`releasing cursor: ${describe(err)}`, { cause: err });
    }
  }
}
