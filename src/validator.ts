/**
 * Input validation for row scanning.
 *
 * These checks run inside the cursors before any target is written, so a
 * malformed row or target list fails without touching the record.
 */

import type { Slot } from './types.js';
import { CursorError, ScanError } from './errors.js';

/**
 * Validate a target list against the number of columns in the current row.
 *
 * @param targets - Slots returned by a binder
 * @param columnCount - Number of values in the current row
 * @throws {ScanError} If the counts differ or a target is not a slot
 */
export function validateTargets(targets: readonly Slot[], columnCount: number): void {
  if (!Array.isArray(targets)) {
    throw new ScanError('targets must be an array');
  }
  if (targets.length !== columnCount) {
    throw new ScanError(
      `expected ${columnCount} destination arguments in scan, not ${targets.length}`
    );
  }
  targets.forEach((target, index) => {
    if (!target || typeof target.set !== 'function') {
      throw new ScanError(`destination ${index} is not a slot`, { column: index });
    }
  });
}

/**
 * Validate a row fetched from a driver in array mode.
 *
 * @param row - The fetched row
 * @throws {CursorError} If the row is not an array of column values
 */
export function validateRow(row: unknown): unknown[] {
  if (!Array.isArray(row)) {
    throw new CursorError(`expected row as an array of column values, got ${typeof row}`);
  }
  return row;
}
