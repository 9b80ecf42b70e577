/**
 * Edit Batch Tests
 */

import { describe, test, expect } from 'vitest';
import { TextBuffer } from '../../../src/core/buffer.ts';
import {
  applyBatch,
  describeChanges,
  dirtyRangeOf,
  insertedRanges,
  invertBatch,
  isEmptyBatch,
  lengthDelta,
  mapOffset,
  normalizeBatch,
  type EditOp,
} from '../../../src/core/edit.ts';
import { InvalidEditBatchError, OutOfRangeError } from '../../../src/core/errors.ts';
import { randomInt, randomText, seededRandom } from '../helpers/random.ts';

describe('normalizeBatch', () => {
  test('sorts by position and keeps same-point inserts in order', () => {
    const batch = normalizeBatch([
      { from: 6, to: 6, text: 'b' },
      { from: 0, to: 1, text: '' },
      { from: 6, to: 6, text: 'c' },
    ]);
    expect(batch).toEqual([
      { from: 0, to: 1, text: '' },
      { from: 6, to: 6, text: 'b' },
      { from: 6, to: 6, text: 'c' },
    ]);
  });

  test('allows touching ranges', () => {
    expect(normalizeBatch([{ from: 2, to: 4, text: '' }, { from: 0, to: 2, text: 'x' }])).toHaveLength(2);
  });

  test('rejects overlapping and inverted ranges', () => {
    expect(() => normalizeBatch([{ from: 0, to: 3, text: '' }, { from: 2, to: 5, text: '' }])).toThrow(
      InvalidEditBatchError
    );
    expect(() => normalizeBatch([{ from: 3, to: 1, text: '' }])).toThrow(InvalidEditBatchError);
  });

  test('drops no-op edits', () => {
    expect(normalizeBatch([{ from: 4, to: 4, text: '' }])).toEqual([]);
    expect(isEmptyBatch([{ from: 4, to: 4, text: '' }])).toBe(true);
  });
});

describe('applyBatch', () => {
  test('applies every edit against pre-batch offsets', () => {
    const buffer = TextBuffer.fromString('hello world');
    const batch = normalizeBatch([
      { from: 0, to: 5, text: 'HELLO' },
      { from: 6, to: 11, text: 'there' },
    ]);
    expect(applyBatch(buffer, batch).toString()).toBe('HELLO there');
  });

  test('an op outside the buffer throws and leaves the input alone', () => {
    const buffer = TextBuffer.fromString('abc');
    expect(() => applyBatch(buffer, [{ from: 2, to: 9, text: '' }])).toThrow(OutOfRangeError);
    expect(buffer.toString()).toBe('abc');
  });

  test('a batch equals its ops applied one at a time from the end', () => {
    const random = seededRandom(11);
    const text = randomText(random, 500);
    const buffer = TextBuffer.fromString(text);

    const ops: EditOp[] = [];
    let cursor = 0;
    while (cursor < text.length) {
      const from = cursor + randomInt(random, 30);
      if (from > text.length) break;
      const to = Math.min(text.length, from + randomInt(random, 10));
      ops.push({ from, to, text: randomText(random, randomInt(random, 8)) });
      cursor = to + 1;
    }
    const batch = normalizeBatch(ops);

    let expected = text;
    for (let i = batch.length - 1; i >= 0; i--) {
      const op = batch[i];
      if (!op) continue;
      expected = expected.slice(0, op.from) + op.text + expected.slice(op.to);
    }
    expect(applyBatch(buffer, batch).toString()).toBe(expected);
  });
});

describe('mapOffset', () => {
  const batch = normalizeBatch([{ from: 2, to: 4, text: 'xyz' }]);

  test('offsets before an edit stay, offsets after it shift', () => {
    expect(mapOffset(1, batch)).toBe(1);
    expect(mapOffset(5, batch)).toBe(6);
  });

  test('offsets inside a replaced range go to its end or start', () => {
    expect(mapOffset(3, batch, 1)).toBe(5);
    expect(mapOffset(3, batch, -1)).toBe(2);
  });

  test('an insertion point associates by assoc', () => {
    const insert = normalizeBatch([{ from: 3, to: 3, text: 'ab' }]);
    expect(mapOffset(3, insert, 1)).toBe(5);
    expect(mapOffset(3, insert, -1)).toBe(3);
  });

  test('deltas accumulate across several edits', () => {
    const several = normalizeBatch([
      { from: 0, to: 0, text: 'Z' },
      { from: 6, to: 6, text: 'Z' },
    ]);
    expect(mapOffset(0, several)).toBe(1);
    expect(mapOffset(6, several)).toBe(8);
    expect(mapOffset(10, several)).toBe(12);
  });
});

describe('inversion', () => {
  test('the inverse batch restores the original text', () => {
    const before = TextBuffer.fromString('abcdef');
    const batch = normalizeBatch([
      { from: 1, to: 2, text: 'XY' },
      { from: 4, to: 6, text: '' },
    ]);
    const after = applyBatch(before, batch);
    expect(after.toString()).toBe('aXYcd');

    const inverse = invertBatch(before, batch);
    expect(inverse).toEqual([
      { from: 1, to: 3, text: 'b' },
      { from: 5, to: 5, text: 'ef' },
    ]);
    expect(applyBatch(after, inverse).toString()).toBe('abcdef');
  });

  test('inserted ranges, dirty range and length delta', () => {
    const batch = normalizeBatch([
      { from: 1, to: 2, text: 'XY' },
      { from: 4, to: 6, text: '' },
    ]);
    expect(insertedRanges(batch)).toEqual([
      { from: 1, to: 3 },
      { from: 5, to: 5 },
    ]);
    expect(dirtyRangeOf(batch)).toEqual({ from: 1, to: 5 });
    expect(dirtyRangeOf([])).toBeNull();
    expect(lengthDelta(batch)).toBe(-1);
  });
});

describe('describeChanges', () => {
  test('reports changes highest offset first with row/column points', () => {
    const before = TextBuffer.fromString('ab\ncd');
    const batch = normalizeBatch([
      { from: 1, to: 1, text: 'x\ny' },
      { from: 4, to: 5, text: '' },
    ]);
    expect(describeChanges(before, batch)).toEqual([
      {
        startIndex: 4,
        oldEndIndex: 5,
        newEndIndex: 4,
        startPosition: { row: 1, column: 1 },
        oldEndPosition: { row: 1, column: 2 },
        newEndPosition: { row: 1, column: 1 },
      },
      {
        startIndex: 1,
        oldEndIndex: 1,
        newEndIndex: 4,
        startPosition: { row: 0, column: 1 },
        oldEndPosition: { row: 0, column: 1 },
        newEndPosition: { row: 1, column: 1 },
      },
    ]);
  });
});
