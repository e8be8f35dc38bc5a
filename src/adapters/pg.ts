/**
 * node-postgres (pg) adapter for rowbind.
 *
 * This module turns a pg Pool, Client or PoolClient plus a statement text into
 * a StatementExecutor.
 */

import type { QueryArrayConfig } from 'pg';
import type { RowCursor, StatementExecutor } from '../database.js';
import { BufferedRowCursor } from '../cursor.js';
import { ExecutionError } from '../errors.js';

/**
 * PgQueryable represents a node-postgres client that can run array-mode
 * queries.
 *
 * This interface matches the query signature of Pool, Client and PoolClient
 * from 'pg'.
 */
export interface PgQueryable {
  query(config: QueryArrayConfig<unknown[]>): Promise<{
    rows: unknown[][];
    fields?: ReadonlyArray<{ name: string }>;
  }>;
}

/**
 * PgExecutorOptions configures pgExecutor.
 */
export interface PgExecutorOptions {
  /**
   * Prepared statement name. When set, pg parses and plans the statement once
   * per connection and reuses it on later executions.
   */
  name?: string;
}

/**
 * pgExecutor wraps a node-postgres client and statement text.
 *
 * Rows are requested in array mode so each value lines up with its column
 * position. pg fetches the whole result before the cursor is returned.
 *
 * @param client - A pg Pool, Client or PoolClient
 * @param text - SQL text with $1, $2, ... placeholders
 * @param options - Executor options
 * @returns A StatementExecutor instance
 *
 * @example
 * ```typescript
 * import { Pool } from 'pg';
 * import { collect, materializeAll, pgExecutor } from 'rowbind';
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const labelsByOwner = pgExecutor(pool, 'SELECT id, name FROM labels WHERE owner = $1', {
 *   name: 'labels-by-owner',
 * });
 *
 * const labels: Label[] = [];
 * await materializeAll(labelsByOwner, collect(labels, () => new Label()), ownerId);
 * ```
 */
export function pgExecutor(
  client: PgQueryable,
  text: string,
  options: PgExecutorOptions = {}
): StatementExecutor {
  return {
    async execute(args: readonly unknown[]): Promise<RowCursor> {
      let result: Awaited<ReturnType<PgQueryable['query']>>;
      try {
        result = await client.query({
          name: options.name,
          text,
          values: [...args],
          rowMode: 'array',
        });
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ExecutionError(`executing statement: ${reason}`, { cause: err });
      }
      return new BufferedRowCursor(result.rows, result.fields?.map((f) => f.name));
    },
  };
}
