/**
 * Height Map Tests
 */

import { describe, test, expect } from 'vitest';
import { HeightMap } from '../../../src/layout/height-map.ts';

describe('HeightMap', () => {
  test('unmeasured lines are one row each', () => {
    const map = new HeightMap(5);
    expect(map.lineCount).toBe(5);
    expect(map.totalRows).toBe(5);
    expect(map.rowOfLine(3)).toBe(3);
    expect(map.lineAtRow(3)).toEqual({ line: 3, rowInLine: 0 });
  });

  test('measured lines shift the rows after them', () => {
    const map = new HeightMap(5);
    map.setRows(1, 3);
    expect(map.totalRows).toBe(7);
    expect(map.rowOfLine(2)).toBe(4);
    expect(map.lineAtRow(2)).toEqual({ line: 1, rowInLine: 1 });
    expect(map.lineAtRow(4)).toEqual({ line: 2, rowInLine: 0 });
  });

  test('rows past the end resolve to the last line', () => {
    const map = new HeightMap(5);
    map.setRows(4, 2);
    expect(map.lineAtRow(100)).toEqual({ line: 4, rowInLine: 1 });
  });

  test('out-of-range lines are ignored', () => {
    const map = new HeightMap(2);
    map.setRows(5, 3);
    expect(map.totalRows).toBe(2);
    expect(map.rowsOf(5)).toBe(0);
  });

  test('splice replaces lines with unmeasured ones and keeps the rest', () => {
    const map = new HeightMap(5);
    map.setRows(3, 2);
    map.splice(1, 1, 3);
    expect(map.lineCount).toBe(7);
    expect(map.rowsOf(5)).toBe(2);
    expect(map.totalRows).toBe(8);
  });

  test('lookups and splices work across blocks', () => {
    const map = new HeightMap(3000);
    map.setRows(2500, 4);
    expect(map.totalRows).toBe(3003);
    expect(map.rowOfLine(2501)).toBe(2504);
    expect(map.lineAtRow(2503)).toEqual({ line: 2500, rowInLine: 3 });
    expect(map.lineAtRow(2504)).toEqual({ line: 2501, rowInLine: 0 });

    map.splice(1000, 100, 0);
    expect(map.lineCount).toBe(2900);
    expect(map.rowsOf(2400)).toBe(4);
    expect(map.totalRows).toBe(2903);
  });

  test('removing every line leaves one', () => {
    const map = new HeightMap(3);
    map.splice(0, 3, 0);
    expect(map.lineCount).toBe(1);
    expect(map.totalRows).toBe(1);
  });
});
