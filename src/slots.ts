/**
 * Write-target helpers.
 *
 * A record type lists its slots explicitly, one per column, in column order.
 * Nothing here inspects the record; every binding names its field.
 */

import type { Converter, Slot } from './types.js';

/**
 * Create a slot from an assignment function.
 *
 * @example
 * ```typescript
 * let total = 0;
 * const targets = [slot((value) => { total = asNumber(value); })];
 * ```
 */
export function slot(assign: (value: unknown) => void): Slot {
  return { set: assign };
}

/**
 * Create a slot that writes a converted column value into record[key].
 *
 * @param record - The record to write into
 * @param key - Field receiving the column value
 * @param convert - Converts the raw value to the field's type, or throws
 */
export function field<T extends object, K extends keyof T>(
  record: T,
  key: K,
  convert: Converter<T[K]>
): Slot {
  return {
    set(value: unknown): void {
      record[key] = convert(value);
    },
  };
}

/**
 * Create a slot that ignores its column.
 */
export function discard(): Slot {
  return { set: () => undefined };
}
