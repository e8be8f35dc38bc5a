/**
 * postgres.js adapter for rowbind.
 */

import type { RowCursor, StatementExecutor } from '../database.js';
import { BufferedRowCursor } from '../cursor.js';
import { ExecutionError } from '../errors.js';

/**
 * PostgresRows is the result of a values() query: rows as arrays, with the
 * column descriptions postgres.js attaches to the result.
 */
export type PostgresRows = unknown[][] & {
  columns?: ReadonlyArray<{ name: string }>;
};

/**
 * PostgresSql represents a postgres.js Sql instance.
 *
 * This is a minimal interface matching postgres.js's unsafe method and the
 * values() mode of the query it returns.
 */
export interface PostgresSql {
  unsafe(
    text: string,
    params?: unknown[],
    options?: { prepare?: boolean }
  ): { values(): PromiseLike<PostgresRows> };
}

/**
 * postgresExecutor wraps a postgres.js Sql instance and statement text.
 *
 * The statement is sent with prepare: true so postgres.js keeps it prepared
 * on the connection.
 *
 * @param sql - A postgres.js Sql instance
 * @param text - SQL text with $1, $2, ... placeholders
 * @returns A StatementExecutor instance
 *
 * @example
 * ```typescript
 * import postgres from 'postgres';
 * import { materializeAll, postgresExecutor } from 'rowbind';
 *
 * const sql = postgres(process.env.DATABASE_URL);
 * const labelsByOwner = postgresExecutor(sql, 'SELECT id, name FROM labels WHERE owner = $1');
 * ```
 */
export function postgresExecutor(sql: PostgresSql, text: string): StatementExecutor {
  return {
    async execute(args: readonly unknown[]): Promise<RowCursor> {
      try {
        const rows = await sql.unsafe(text, [...args], { prepare: true }).values();
        return new BufferedRowCursor(rows, rows.columns?.map((c) => c.name));
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ExecutionError(`executing statement: ${reason}`, { cause: err });
      }
    },
  };
}
