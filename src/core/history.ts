/**
 * Edit History
 *
 * Undo/redo stacks of committed batches. Each entry stores the forward batch,
 * its inverse and the cursors on either side, so undo and redo are just
 * further batches. Consecutive typing at the end of the previous insert is
 * folded into one entry.
 */

import type { CursorSet } from './cursor.ts';
import { insertedRanges, type EditOp } from './edit.ts';

export type EditKind = 'typing' | 'other';

export interface HistoryEntry {
  readonly kind: EditKind;
  /** Batch against the buffer before the edit */
  readonly forward: readonly EditOp[];
  /** Batch against the buffer after the edit that restores it */
  readonly inverse: readonly EditOp[];
  readonly cursorsBefore: CursorSet;
  readonly cursorsAfter: CursorSet;
}

export const DEFAULT_HISTORY_LIMIT = 1000;

/**
 * True when `next` continues typing right where `prev` left off.
 */
function continuesTyping(prev: HistoryEntry, next: HistoryEntry): boolean {
  if (prev.kind !== 'typing' || next.kind !== 'typing') return false;
  if (prev.forward.length !== next.forward.length) return false;

  const ends = insertedRanges(prev.forward);
  return next.forward.every((op, i) => {
    const end = ends[i];
    return end !== undefined && op.from === op.to && op.from === end.to && !op.text.includes('\n');
  });
}

function combine(prev: HistoryEntry, next: HistoryEntry): HistoryEntry {
  const forward = prev.forward.map((op, i) => ({
    from: op.from,
    to: op.to,
    text: op.text + (next.forward[i]?.text ?? ''),
  }));
  const inverse = insertedRanges(forward).map((range, i) => ({
    from: range.from,
    to: range.to,
    text: prev.inverse[i]?.text ?? '',
  }));
  return {
    kind: 'typing',
    forward,
    inverse,
    cursorsBefore: prev.cursorsBefore,
    cursorsAfter: next.cursorsAfter,
  };
}

export class History {
  readonly undoStack: readonly HistoryEntry[];
  readonly redoStack: readonly HistoryEntry[];
  readonly limit: number;

  private constructor(undoStack: readonly HistoryEntry[], redoStack: readonly HistoryEntry[], limit: number) {
    this.undoStack = undoStack;
    this.redoStack = redoStack;
    this.limit = limit;
  }

  static empty(limit: number = DEFAULT_HISTORY_LIMIT): History {
    return new History([], [], Math.max(1, limit));
  }

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /**
   * Record a committed edit. Clears the redo stack.
   */
  record(entry: HistoryEntry): History {
    const last = this.undoStack[this.undoStack.length - 1];
    let stack: HistoryEntry[];
    if (last && continuesTyping(last, entry)) {
      stack = [...this.undoStack.slice(0, -1), combine(last, entry)];
    } else {
      stack = [...this.undoStack, entry];
    }
    if (stack.length > this.limit) {
      stack = stack.slice(stack.length - this.limit);
    }
    return new History(stack, [], this.limit);
  }

  /**
   * Pop the newest entry for undoing. Returns null when there is nothing to undo.
   */
  undo(): { history: History; entry: HistoryEntry } | null {
    const entry = this.undoStack[this.undoStack.length - 1];
    if (!entry) return null;
    return {
      history: new History(this.undoStack.slice(0, -1), [...this.redoStack, entry], this.limit),
      entry,
    };
  }

  redo(): { history: History; entry: HistoryEntry } | null {
    const entry = this.redoStack[this.redoStack.length - 1];
    if (!entry) return null;
    return {
      history: new History([...this.undoStack, entry], this.redoStack.slice(0, -1), this.limit),
      entry,
    };
  }

  /**
   * Stop the newest entry from absorbing further typing.
   */
  seal(): History {
    const last = this.undoStack[this.undoStack.length - 1];
    if (!last || last.kind !== 'typing') return this;
    return new History([...this.undoStack.slice(0, -1), { ...last, kind: 'other' }], this.redoStack, this.limit);
  }

  withLimit(limit: number): History {
    const bounded = Math.max(1, limit);
    const stack = this.undoStack.length > bounded ? this.undoStack.slice(this.undoStack.length - bounded) : this.undoStack;
    return new History(stack, this.redoStack, bounded);
  }
}

export default History;
