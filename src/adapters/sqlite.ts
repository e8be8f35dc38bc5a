/**
 * better-sqlite3 adapter for rowbind.
 *
 * This module runs a prepared better-sqlite3 statement in raw mode and
 * streams its rows through iterate(), one row per advance.
 */

import type Database from 'better-sqlite3';
import type { RowCursor, StatementExecutor } from '../database.js';
import { IteratorRowCursor } from '../cursor.js';
import { ExecutionError } from '../errors.js';

/**
 * sqliteExecutor wraps a prepared better-sqlite3 statement.
 *
 * The statement is switched to raw mode, so it must return data. Raw mode
 * stays on the statement: later get(), all() or iterate() calls made on it
 * directly also return rows as arrays, so prepare a separate statement for
 * that kind of use. While a cursor is open the connection is busy; the
 * materializer releases it before returning, which frees the connection even
 * when iteration stops early.
 *
 * @param statement - A statement from Database.prepare()
 * @returns A StatementExecutor instance
 *
 * @example
 * ```typescript
 * import Database from 'better-sqlite3';
 * import { materializeAll, sqliteExecutor } from 'rowbind';
 *
 * const db = new Database(':memory:');
 * const labelsByOwner = sqliteExecutor(db.prepare('SELECT id, name FROM labels WHERE owner = ?'));
 * ```
 */
export function sqliteExecutor(statement: Database.Statement<unknown[]>): StatementExecutor {
  return {
    async execute(args: readonly unknown[]): Promise<RowCursor> {
      try {
        const columns = statement.columns().map((c) => c.name);
        const rows = statement.raw(true).iterate(...args);
        return new IteratorRowCursor(rows, columns);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ExecutionError(`executing statement: ${reason}`, { cause: err });
      }
    },
  };
}
