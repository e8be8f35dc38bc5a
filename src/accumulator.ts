/**
 * Accumulators over caller-owned arrays.
 */

import type { RecordSetAccumulator, SingleRecordBinder, Slot } from './types.js';

/**
 * Accumulate records that bind themselves.
 *
 * @param into - Array the records are appended to, in row order
 * @param create - Makes one empty record per row
 *
 * @example
 * ```typescript
 * const labels: Label[] = [];
 * await materializeAll(labelsByOwner, collect(labels, () => new Label()), ownerId);
 * ```
 */
export function collect<T extends SingleRecordBinder>(
  into: T[],
  create: () => T
): RecordSetAccumulator {
  return {
    newElement(): SingleRecordBinder {
      const record = create();
      into.push(record);
      return record;
    },
  };
}

/**
 * Accumulate plain data records, binding each one with a separate function.
 *
 * @param into - Array the records are appended to, in row order
 * @param create - Makes one empty record per row
 * @param bind - Returns the record's slots in column order
 *
 * @example
 * ```typescript
 * interface Label { id: number; name: string }
 *
 * const labels: Label[] = [];
 * const dst = collectRecords(
 *   labels,
 *   () => ({ id: 0, name: '' }),
 *   (l) => [field(l, 'id', asInteger), field(l, 'name', asString)]
 * );
 * ```
 */
export function collectRecords<T>(
  into: T[],
  create: () => T,
  bind: (record: T) => Slot[]
): RecordSetAccumulator {
  return {
    newElement(): SingleRecordBinder {
      const record = create();
      into.push(record);
      return { targets: () => bind(record) };
    },
  };
}
