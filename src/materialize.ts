/**
 * rowbind materializer
 *
 * This module runs a prepared statement and fills caller-owned records from
 * its rows through the SingleRecordBinder / RecordSetAccumulator contracts.
 */

import type { RowCursor, StatementExecutor } from './database.js';
import type { RecordSetAccumulator, SingleRecordBinder } from './types.js';
import { NotFoundError } from './errors.js';

/**
 * MaterializerOptions configures a Materializer instance.
 */
export interface MaterializerOptions {
  /**
   * Receives a cursor release failure that happened while another error was
   * already on its way to the caller. The pending error is always the one
   * thrown. A release failure on an otherwise successful call is thrown
   * instead and never reaches this hook. If the hook itself throws, that
   * error is emitted as a process warning.
   * Default: emit a process warning
   */
  onReleaseError?: (error: unknown) => void;
}

function emitReleaseWarning(error: unknown): void {
  process.emitWarning(error instanceof Error ? error : String(error), 'RowbindReleaseWarning');
}

/**
 * Materializer runs one prepared statement into caller-owned records.
 *
 * Materializers hold no state beyond the executor and options and are cheap to
 * create per call site.
 *
 * @example
 * ```typescript
 * import Database from 'better-sqlite3';
 * import { Materializer, collect, sqliteExecutor } from 'rowbind';
 *
 * const db = new Database('app.db');
 * const labelsByOwner = new Materializer(
 *   sqliteExecutor(db.prepare('SELECT id, name FROM labels WHERE owner = ?'))
 * );
 *
 * const labels: Label[] = [];
 * await labelsByOwner.all(collect(labels, () => new Label()), ownerId);
 * ```
 */
export class Materializer {
  private readonly executor: StatementExecutor;
  private readonly onReleaseError: (error: unknown) => void;

  /**
   * Creates a new Materializer instance.
   *
   * @param executor - The prepared statement to run
   * @param options - Configuration options
   */
  constructor(executor: StatementExecutor, options: MaterializerOptions = {}) {
    this.executor = executor;
    this.onReleaseError = options.onReleaseError ?? emitReleaseWarning;
  }

  /**
   * All executes the statement and appends one record to dst per row.
   *
   * Rows are bound strictly in cursor order and iteration stops at the first
   * error. Records appended before the failure stay in the collection,
   * including the one allocated for the failing row.
   *
   * @param dst - Accumulator that grows the destination collection
   * @param args - Bind arguments for the statement
   * @throws The executor's error, the first scan error, or the cursor's
   *   terminal error, unchanged
   */
  async all(dst: RecordSetAccumulator, ...args: unknown[]): Promise<void> {
    await this.withCursor(args, async (cursor) => {
      while (await cursor.advance()) {
        const binder = dst.newElement();
        await cursor.scanInto(binder.targets());
      }

      const err = cursor.terminalError();
      if (err) {
        throw err;
      }
    });
  }

  /**
   * One executes the statement and binds the first row into dst.
   *
   * Further rows are ignored.
   *
   * @param dst - Binder for the destination record
   * @param args - Bind arguments for the statement
   * @throws {NotFoundError} If the result has no rows and the cursor reports
   *   no terminal error
   */
  async one(dst: SingleRecordBinder, ...args: unknown[]): Promise<void> {
    await this.withCursor(args, async (cursor) => {
      if (!(await cursor.advance())) {
        throw cursor.terminalError() ?? new NotFoundError();
      }
      await cursor.scanInto(dst.targets());
    });
  }

  /**
   * Execute the statement and run body against the cursor, releasing the
   * cursor exactly once afterwards.
   */
  private async withCursor(
    args: unknown[],
    body: (cursor: RowCursor) => Promise<void>
  ): Promise<void> {
    const cursor = await this.executor.execute(args);

    let pending = false;
    try {
      await body(cursor);
    } catch (err) {
      pending = true;
      throw err;
    } finally {
      await this.release(cursor, pending);
    }
  }

  private async release(cursor: RowCursor, pending: boolean): Promise<void> {
    if (!pending) {
      await cursor.release();
      return;
    }
    // The body's error is already propagating; a release failure must not
    // replace it.
    try {
      await cursor.release();
    } catch (err) {
      this.reportReleaseError(err);
    }
  }

  private reportReleaseError(err: unknown): void {
    try {
      this.onReleaseError(err);
    } catch (hookErr) {
      emitReleaseWarning(hookErr);
    }
  }
}

/**
 * MaterializeAll executes a prepared statement and stores every result row
 * in dst. It stops at the first error.
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
 *
 * const labels: Label[] = [];
 * await materializeAll(labelsByOwner, collect(labels, () => new Label()), ownerId);
 * ```
 */
export async function materializeAll(
  executor: StatementExecutor,
  dst: RecordSetAccumulator,
  ...args: unknown[]
): Promise<void> {
  return new Materializer(executor).all(dst, ...args);
}

/**
 * MaterializeOne executes a prepared statement and stores its first row in
 * dst, rejecting with NotFoundError when there is none.
 */
export async function materializeOne(
  executor: StatementExecutor,
  dst: SingleRecordBinder,
  ...args: unknown[]
): Promise<void> {
  return new Materializer(executor).one(dst, ...args);
}
