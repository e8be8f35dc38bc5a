/**
 * Statement executor adapters for rowbind.
 *
 * This module provides executors for popular SQL clients.
 */

export { pgExecutor } from './pg.js';
export type { PgQueryable, PgExecutorOptions } from './pg.js';
export { postgresExecutor } from './postgres.js';
export type { PostgresSql, PostgresRows } from './postgres.js';
export { sqliteExecutor } from './sqlite.js';
