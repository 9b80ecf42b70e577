/**
 * Edit History Tests
 */

import { describe, test, expect } from 'vitest';
import { CursorSet } from '../../../src/core/cursor.ts';
import { History, type HistoryEntry } from '../../../src/core/history.ts';

function typed(at: number, text: string): HistoryEntry {
  return {
    kind: 'typing',
    forward: [{ from: at, to: at, text }],
    inverse: [{ from: at, to: at + text.length, text: '' }],
    cursorsBefore: CursorSet.single(at),
    cursorsAfter: CursorSet.single(at + text.length),
  };
}

describe('History', () => {
  test('starts empty', () => {
    const history = History.empty();
    expect(history.canUndo).toBe(false);
    expect(history.canRedo).toBe(false);
    expect(history.undo()).toBeNull();
    expect(history.redo()).toBeNull();
  });

  test('consecutive typing folds into one entry', () => {
    const history = History.empty().record(typed(0, 'a')).record(typed(1, 'b'));
    expect(history.undoStack).toHaveLength(1);
    const entry = history.undoStack[0];
    expect(entry?.forward).toEqual([{ from: 0, to: 0, text: 'ab' }]);
    expect(entry?.inverse).toEqual([{ from: 0, to: 2, text: '' }]);
    expect(entry?.cursorsBefore.primaryCursor.head).toBe(0);
    expect(entry?.cursorsAfter.primaryCursor.head).toBe(2);
  });

  test('typing elsewhere starts a new entry', () => {
    const history = History.empty().record(typed(0, 'a')).record(typed(5, 'b'));
    expect(history.undoStack).toHaveLength(2);
  });

  test('a sealed entry does not absorb more typing', () => {
    const history = History.empty().record(typed(0, 'a')).seal().record(typed(1, 'b'));
    expect(history.undoStack).toHaveLength(2);
  });

  test('undo moves entries to the redo stack and recording clears it', () => {
    const history = History.empty().record(typed(0, 'a'));
    const undone = history.undo();
    expect(undone?.entry.forward).toEqual([{ from: 0, to: 0, text: 'a' }]);
    expect(undone?.history.canRedo).toBe(true);

    const redone = undone?.history.redo();
    expect(redone?.history.canUndo).toBe(true);
    expect(redone?.history.canRedo).toBe(false);

    const recorded = undone?.history.record(typed(3, 'z'));
    expect(recorded?.canRedo).toBe(false);
  });

  test('the undo stack is bounded', () => {
    let history = History.empty(3);
    for (let i = 0; i < 5; i++) {
      history = history.seal().record(typed(i * 10, 'x'));
    }
    expect(history.undoStack).toHaveLength(3);
    expect(history.undoStack[0]?.forward[0]?.from).toBe(20);
    expect(history.withLimit(1).undoStack).toHaveLength(1);
  });
});
