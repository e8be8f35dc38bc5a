/**
 * Column value converters.
 *
 * Drivers disagree on how they represent the same SQL type: node-postgres
 * returns int8 and numeric as strings, better-sqlite3 returns booleans as 0/1
 * and may return bigint. Each converter accepts the representations a driver
 * can produce for its target type and throws ConversionError for anything
 * else. NULL is rejected unless the converter is wrapped in nullable().
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { Converter } from './types.js';
import { ConversionError } from './errors.js';

const utf8 = new TextDecoder();

function isNull(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

function typeName(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (value instanceof Uint8Array) {
    return 'bytes';
  }
  return typeof value;
}

function unsupported(value: unknown, target: string): ConversionError {
  if (isNull(value)) {
    return new ConversionError(`converting NULL to ${target} is unsupported`);
  }
  return new ConversionError(`converting ${typeName(value)} to ${target} is unsupported`);
}

/**
 * Wrap a converter so NULL becomes null instead of an error.
 */
export function nullable<T>(convert: Converter<T>): Converter<T | null> {
  return (value) => (isNull(value) ? null : convert(value));
}

export const asString: Converter<string> = (value) => {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Uint8Array) {
    return utf8.decode(value);
  }
  throw unsupported(value, 'string');
};

/**
 * Convert to a finite number. Numeric strings and bigints that fit in a
 * double without loss are accepted.
 */
export const asNumber: Converter<number> = (value) => {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ConversionError(`converting ${value} to number is unsupported`);
    }
    return value;
  }
  if (typeof value === 'bigint') {
    const n = Number(value);
    if (!Number.isSafeInteger(n)) {
      throw new ConversionError(`value ${value} is out of range for number`);
    }
    return n;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    if (/^-?\d+$/.test(value.trim()) && !Number.isSafeInteger(n)) {
      throw new ConversionError(`value ${value} is out of range for number`);
    }
    if (Number.isFinite(n)) {
      return n;
    }
    throw new ConversionError(`converting string "${value}" to number: invalid syntax`);
  }
  throw unsupported(value, 'number');
};

export const asInteger: Converter<number> = (value) => {
  const n = asNumber(value);
  if (!Number.isSafeInteger(n)) {
    throw new ConversionError(`converting ${n} to integer would lose precision`);
  }
  return n;
};

export const asBigInt: Converter<bigint> = (value) => {
  if (typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value)) {
    return BigInt(value);
  }
  if (typeof value === 'number' || typeof value === 'string') {
    throw new ConversionError(`converting ${typeName(value)} "${value}" to bigint: invalid syntax`);
  }
  throw unsupported(value, 'bigint');
};

/**
 * Convert to boolean. Accepts booleans, 0/1 as number or bigint, and the
 * PostgreSQL text forms "t"/"f", "true"/"false".
 */
export const asBoolean: Converter<boolean> = (value) => {
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 1 || value === 1n) {
    return true;
  }
  if (value === 0 || value === 0n) {
    return false;
  }
  if (typeof value === 'string') {
    switch (value.toLowerCase()) {
      case 't':
      case 'true':
        return true;
      case 'f':
      case 'false':
        return false;
    }
    throw new ConversionError(`converting string "${value}" to boolean: invalid syntax`);
  }
  throw unsupported(value, 'boolean');
};

/**
 * Convert to Date. Accepts Date, ISO-8601 strings and epoch milliseconds.
 */
export const asDate: Converter<Date> = (value) => {
  let date: Date;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'string' || typeof value === 'number') {
    date = new Date(value);
  } else {
    throw unsupported(value, 'Date');
  }
  if (Number.isNaN(date.getTime())) {
    throw new ConversionError(`converting ${typeName(value)} "${String(value)}" to Date: invalid time value`);
  }
  return date;
};

export const asBytes: Converter<Uint8Array> = (value) => {
  if (value instanceof Uint8Array) {
    return value;
  }
  if (typeof value === 'string') {
    return new TextEncoder().encode(value);
  }
  throw unsupported(value, 'bytes');
};

/**
 * Build a converter from a zod schema.
 *
 * @example
 * ```typescript
 * const asStatus = parseWith(z.enum(['open', 'closed']));
 * ```
 */
export function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>): Converter<T> {
  return (value) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ConversionError(issue ? issue.message : 'value rejected by schema');
    }
    return result.data;
  };
}
