/**
 * Database abstraction for rowbind.
 *
 * This module defines the two collaborators the materializer drives: a
 * prepared statement that can be executed with bind arguments, and the
 * forward-only cursor that execution yields. Adapters in ./adapters implement
 * both for node-postgres, postgres.js and better-sqlite3.
 */

import type { Slot } from './types.js';

/**
 * RowCursor is a live, forward-only, single-pass view over one execution's
 * result rows.
 */
export interface RowCursor {
  /**
   * Column names in result order, when the driver reports them.
   */
  readonly columns?: readonly string[];

  /**
   * Move to the next row.
   *
   * A fault while fetching does not reject: the cursor keeps it as its
   * terminal error and resolves to false.
   *
   * @returns true if a row is now current
   */
  advance(): Promise<boolean>;

  /**
   * Write the current row into targets, positionally.
   *
   * @throws {ScanError} On arity mismatch, missing current row, or a slot
   *   that rejects its value
   */
  scanInto(targets: readonly Slot[]): Promise<void>;

  /**
   * The error that ended iteration early, if any.
   */
  terminalError(): Error | undefined;

  /**
   * Close the cursor. Safe to call more than once.
   */
  release(): Promise<void>;
}

/**
 * StatementExecutor is a prepared statement, ready to run.
 *
 * @example
 * ```typescript
 * import Database from 'better-sqlite3';
 * import { sqliteExecutor } from 'rowbind';
 *
 * const db = new Database('app.db');
 * const labelsByOwner = sqliteExecutor(
 *   db.prepare('SELECT id, name FROM labels WHERE owner = ?')
 * );
 * ```
 */
export interface StatementExecutor {
  /**
   * Run the statement.
   *
   * @param args - Bind arguments, passed through to the driver untouched
   * @throws {ExecutionError} If the query could not be started
   */
  execute(args: readonly unknown[]): Promise<RowCursor>;
}
