/**
 * Unit tests for row cursors.
 */

import { describe, test, expect, vi } from 'vitest';
import { BufferedRowCursor, IteratorRowCursor } from './cursor.js';
import { ConversionError, CursorError, ReleaseError, ScanError } from './errors.js';
import { Label } from '../test/fakes.js';

describe('BufferedRowCursor', () => {
  test('walks rows in order and scans the current one', async () => {
    const cursor = new BufferedRowCursor([
      [1, 'bug'],
      [2, 'feature'],
    ]);
    const seen: Array<[number, string]> = [];

    while (await cursor.advance()) {
      const label = new Label();
      await cursor.scanInto(label.targets());
      seen.push([label.id, label.name]);
    }

    expect(seen).toEqual([
      [1, 'bug'],
      [2, 'feature'],
    ]);
    expect(await cursor.advance()).toBe(false);
    expect(cursor.terminalError()).toBeUndefined();
  });

  test('scan before advance rejects', async () => {
    const cursor = new BufferedRowCursor([[1, 'bug']]);

    await expect(cursor.scanInto(new Label().targets())).rejects.toThrow(
      'scan called without a current row'
    );
  });

  test('scan after the last row rejects', async () => {
    const cursor = new BufferedRowCursor([]);

    expect(await cursor.advance()).toBe(false);
    await expect(cursor.scanInto([])).rejects.toThrow(ScanError);
  });

  test('rejects a target list of the wrong length', async () => {
    const cursor = new BufferedRowCursor([[1, 'bug', 'extra']]);
    await cursor.advance();

    await expect(cursor.scanInto(new Label().targets())).rejects.toThrow(
      'expected 3 destination arguments in scan, not 2'
    );
  });

  test('wraps a converter failure with the column index and name', async () => {
    const cursor = new BufferedRowCursor([[null, 'bug']], ['id', 'name']);
    await cursor.advance();
    const label = new Label();

    const err = await cursor.scanInto(label.targets()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ScanError);
    expect(err).toMatchObject({
      message: 'scan error on column index 0, name "id": converting NULL to number is unsupported',
      column: 0,
      columnName: 'id',
    });
    expect(err instanceof ScanError && err.cause).toBeInstanceOf(ConversionError);
  });

  test('rejects an int8 string that does not fit a number', async () => {
    const cursor = new BufferedRowCursor([['9007199254740993', 'bug']], ['id', 'name']);
    await cursor.advance();
    const label = new Label();

    await expect(cursor.scanInto(label.targets())).rejects.toThrow(
      'scan error on column index 0, name "id": value 9007199254740993 is out of range for number'
    );
    expect(label.id).toBe(0);
  });

  test('leaves earlier columns written when a later one fails', async () => {
    const cursor = new BufferedRowCursor([[7, { not: 'a string' }]]);
    await cursor.advance();
    const label = new Label();

    await expect(cursor.scanInto(label.targets())).rejects.toThrow(
      'scan error on column index 1: converting object to string is unsupported'
    );
    expect(label.id).toBe(7);
    expect(label.name).toBe('');
  });

  test('a row that is not an array ends iteration with a terminal error', async () => {
    const cursor = new BufferedRowCursor([[1, 'bug'], 'oops', [3, 'docs']]);

    expect(await cursor.advance()).toBe(true);
    expect(await cursor.advance()).toBe(false);
    expect(await cursor.advance()).toBe(false);

    const err = cursor.terminalError();
    expect(err).toBeInstanceOf(CursorError);
    expect(err?.message).toBe('expected row as an array of column values, got string');
  });

  test('advance returns false after release', async () => {
    const cursor = new BufferedRowCursor([[1, 'bug']]);

    await cursor.release();
    await cursor.release();

    expect(await cursor.advance()).toBe(false);
  });
});

describe('IteratorRowCursor', () => {
  test('pulls rows from a generator on demand', async () => {
    const pulled: number[] = [];
    function* rows(): Generator<unknown[]> {
      for (const id of [1, 2, 3]) {
        pulled.push(id);
        yield [id, `label-${id}`];
      }
    }
    const cursor = new IteratorRowCursor(rows());

    expect(await cursor.advance()).toBe(true);
    expect(pulled).toEqual([1]);

    const label = new Label();
    await cursor.scanInto(label.targets());
    expect([label.id, label.name]).toEqual([1, 'label-1']);
  });

  test('reads from an async iterator', async () => {
    async function* rows(): AsyncGenerator<unknown[]> {
      yield [1, 'bug'];
      yield [2, 'feature'];
    }
    const cursor = new IteratorRowCursor(rows());
    const ids: number[] = [];

    while (await cursor.advance()) {
      const label = new Label();
      await cursor.scanInto(label.targets());
      ids.push(label.id);
    }

    expect(ids).toEqual([1, 2]);
  });

  test('a fetch failure becomes the terminal error', async () => {
    const failure = new Error('disk I/O error');
    function* rows(): Generator<unknown[]> {
      yield [1, 'bug'];
      throw failure;
    }
    const cursor = new IteratorRowCursor(rows());

    expect(await cursor.advance()).toBe(true);
    expect(await cursor.advance()).toBe(false);
    expect(await cursor.advance()).toBe(false);

    const err = cursor.terminalError();
    expect(err).toBeInstanceOf(CursorError);
    expect(err?.message).toBe('fetching row: disk I/O error');
    expect(err?.cause).toBe(failure);
  });

  test('release closes an unfinished generator', async () => {
    let closed = false;
    function* rows(): Generator<unknown[]> {
      try {
        yield [1, 'bug'];
        yield [2, 'feature'];
      } finally {
        closed = true;
      }
    }
    const cursor = new IteratorRowCursor(rows());
    await cursor.advance();

    await cursor.release();

    expect(closed).toBe(true);
    expect(await cursor.advance()).toBe(false);
  });

  test('release calls return once', async () => {
    const source = {
      next: vi.fn(() => ({ done: false as const, value: [1, 'bug'] })),
      return: vi.fn(() => ({ done: true as const, value: undefined })),
    };
    const cursor = new IteratorRowCursor(source);

    await cursor.release();
    await cursor.release();

    expect(source.return).toHaveBeenCalledTimes(1);
    expect(source.next).not.toHaveBeenCalled();
  });

  test('release failure is reported as ReleaseError', async () => {
    const failure = new Error('statement busy');
    const source: Iterator<unknown> = {
      next: () => ({ done: true, value: undefined }),
      return: () => {
        throw failure;
      },
    };
    const cursor = new IteratorRowCursor(source);

    const err = await cursor.release().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ReleaseError);
    expect(err).toMatchObject({ message: 'releasing cursor: statement busy', cause: failure });
  });
});
