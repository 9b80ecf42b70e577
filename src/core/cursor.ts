/**
 * Cursor Set
 *
 * Immutable, sorted collection of carets and selections. Every operation
 * returns a new set and leaves the cursors non-overlapping.
 */

import type { Range, TextBuffer } from './buffer.ts';
import { columnAtVisual, visualColumn } from './char-width.ts';
import { mapOffset, type EditBatch } from './edit.ts';
import { OutOfRangeError } from './errors.ts';
import { nextWordBoundary, previousWordBoundary, wordRangeAt } from './word.ts';

export interface Cursor {
  readonly anchor: number;
  readonly head: number;
  /** Remembered visual column for vertical motion */
  readonly goalColumn: number | null;
}

export type Direction = 'left' | 'right' | 'up' | 'down';
export type MotionUnit = 'character' | 'word' | 'line' | 'page' | 'document';

export interface MotionOptions {
  tabSize: number;
  /** Lines moved by a page step */
  pageLines: number;
}

export const DEFAULT_MOTION: MotionOptions = { tabSize: 4, pageLines: 20 };

/** A line and a visual column (cells, tabs expanded) */
export interface GridPosition {
  readonly line: number;
  readonly column: number;
}

/**
 * Block selection dragged from `start` to `current`. Each line of the block
 * gets its own cursor, with the caret on the `current` column.
 */
export interface RectangleSelection {
  readonly start: GridPosition;
  readonly current: GridPosition;
}

// ============================================
// Cursor helpers
// ============================================

export function caret(offset: number, goalColumn: number | null = null): Cursor {
  return { anchor: offset, head: offset, goalColumn };
}

export function selection(anchor: number, head: number): Cursor {
  return { anchor, head, goalColumn: null };
}

export function cursorFrom(cursor: Cursor): number {
  return Math.min(cursor.anchor, cursor.head);
}

export function cursorTo(cursor: Cursor): number {
  return Math.max(cursor.anchor, cursor.head);
}

export function isCaret(cursor: Cursor): boolean {
  return cursor.anchor === cursor.head;
}

export function cursorRange(cursor: Cursor): Range {
  return { from: cursorFrom(cursor), to: cursorTo(cursor) };
}

function compareCursors(a: Cursor, b: Cursor): number {
  return cursorFrom(a) - cursorFrom(b) || cursorTo(a) - cursorTo(b);
}

function isSurrogatePair(buffer: TextBuffer, offset: number): boolean {
  if (offset < 0 || offset + 1 >= buffer.length) return false;
  const high = buffer.charCodeAt(offset);
  const low = buffer.charCodeAt(offset + 1);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

function sameCursors(a: CursorSet, b: CursorSet): boolean {
  return (
    a.primary === b.primary &&
    a.cursors.length === b.cursors.length &&
    a.cursors.every((cursor, i) => {
      const other = b.cursors[i];
      return other !== undefined && cursor.anchor === other.anchor && cursor.head === other.head;
    })
  );
}

/**
 * One expansion step for a cursor: caret to word, word (or any selection
 * inside one line) to the line's content. Null means the whole document.
 */
function expandCursor(buffer: TextBuffer, cursor: Cursor): Cursor | null {
  const line = buffer.offsetToLine(cursor.head);
  const start = buffer.lineToOffset(line);
  const end = buffer.lineEnd(line);

  if (isCaret(cursor)) {
    const word = wordRangeAt(buffer, cursor.head);
    return word.from < word.to ? selection(word.from, word.to) : selection(start, end);
  }

  const from = cursorFrom(cursor);
  const to = cursorTo(cursor);
  if (from === start && to === end) return null;
  if (from >= start && to <= end) return selection(start, end);
  return null;
}

/**
 * Merge sorted cursors. A cursor folds into its predecessor when it starts
 * inside it, or when it is a caret sitting on the predecessor's end.
 */
function mergeSorted(cursors: readonly Cursor[], primary: number): { cursors: Cursor[]; primary: number } {
  const entries = cursors
    .map((cursor, index) => ({ cursor, isPrimary: index === primary }))
    .sort((a, b) => compareCursors(a.cursor, b.cursor));

  const merged: Array<{ cursor: Cursor; isPrimary: boolean }> = [];
  for (const entry of entries) {
    const last = merged[merged.length - 1];
    if (!last) {
      merged.push(entry);
      continue;
    }

    const prev = last.cursor;
    const cur = entry.cursor;
    const overlaps = cursorFrom(cur) < cursorTo(prev);
    const caretOnEdge = isCaret(cur) && cursorFrom(cur) === cursorTo(prev);
    if (!overlaps && !caretOnEdge) {
      merged.push(entry);
      continue;
    }

    const from = Math.min(cursorFrom(prev), cursorFrom(cur));
    const to = Math.max(cursorTo(prev), cursorTo(cur));
    const source = isCaret(prev) ? cur : prev;
    const forward = source.head >= source.anchor;
    last.cursor = {
      anchor: forward ? from : to,
      head: forward ? to : from,
      goalColumn: prev.goalColumn,
    };
    last.isPrimary = last.isPrimary || entry.isPrimary;
  }

  const index = merged.findIndex(entry => entry.isPrimary);
  return { cursors: merged.map(entry => entry.cursor), primary: Math.max(0, index) };
}

// ============================================
// CursorSet
// ============================================

export class CursorSet {
  readonly cursors: readonly Cursor[];
  readonly primary: number;

  private constructor(cursors: readonly Cursor[], primary: number) {
    this.cursors = cursors;
    this.primary = primary;
  }

  /**
   * Build a set from arbitrary cursors, sorting and merging them.
   */
  static create(cursors: readonly Cursor[], primary = 0): CursorSet {
    if (cursors.length === 0) return CursorSet.single(0);
    const result = mergeSorted(cursors, primary);
    return new CursorSet(result.cursors, result.primary);
  }

  /**
   * One cursor per line of a block selection. Columns past a line's end
   * clamp to it, and lines outside the buffer clamp to its first or last.
   * The cursor on the dragged-to line is primary.
   */
  static fromRectangle(
    buffer: TextBuffer,
    rectangle: RectangleSelection,
    tabSize: number = DEFAULT_MOTION.tabSize
  ): CursorSet {
    const lastLine = buffer.lineCount - 1;
    const clampLine = (line: number): number => Math.min(Math.max(line, 0), lastLine);
    const startLine = clampLine(rectangle.start.line);
    const currentLine = clampLine(rectangle.current.line);
    const top = Math.min(startLine, currentLine);
    const bottom = Math.max(startLine, currentLine);

    const headColumn = Math.max(0, rectangle.current.column);
    const anchorColumn = Math.max(0, rectangle.start.column);

    const cursors: Cursor[] = [];
    for (let line = top; line <= bottom; line++) {
      const offset = buffer.lineToOffset(line);
      const text = buffer.lineText(line);
      const head = offset + columnAtVisual(text, headColumn, tabSize);
      const anchor = offset + columnAtVisual(text, anchorColumn, tabSize);
      cursors.push(anchor === head ? caret(head, headColumn) : selection(anchor, head));
    }
    return CursorSet.create(cursors, currentLine - top);
  }

  static single(anchor: number, head: number = anchor): CursorSet {
    return new CursorSet([{ anchor, head, goalColumn: null }], 0);
  }

  get size(): number {
    return this.cursors.length;
  }

  get primaryCursor(): Cursor {
    return this.cursors[this.primary] ?? this.cursors[0] ?? caret(0);
  }

  get top(): Cursor {
    return this.cursors[0] ?? caret(0);
  }

  get bottom(): Cursor {
    return this.cursors[this.cursors.length - 1] ?? caret(0);
  }

  ranges(): Range[] {
    return this.cursors.map(cursorRange);
  }

  hasSelection(): boolean {
    return this.cursors.some(cursor => !isCaret(cursor));
  }

  private with(cursors: readonly Cursor[], primary: number = this.primary): CursorSet {
    return CursorSet.create(cursors, primary);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Edits
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Map every cursor through a batch. Selections do not grow to include text
   * inserted at their edges; carets move past text inserted at them.
   */
  applyEdits(batch: EditBatch): CursorSet {
    if (batch.length === 0) return this;
    const mapped = this.cursors.map(cursor => {
      if (isCaret(cursor)) {
        return caret(mapOffset(cursor.head, batch, 1));
      }
      const from = mapOffset(cursorFrom(cursor), batch, 1);
      const to = Math.max(from, mapOffset(cursorTo(cursor), batch, -1));
      return cursor.head >= cursor.anchor ? selection(from, to) : selection(to, from);
    });
    return this.with(mapped);
  }

  /**
   * Replace every cursor (used after typing, where each cursor's new position
   * is known exactly).
   */
  replaceAll(cursors: readonly Cursor[]): CursorSet {
    return this.with(cursors);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Motion
  // ─────────────────────────────────────────────────────────────────────────

  move(
    buffer: TextBuffer,
    direction: Direction,
    unit: MotionUnit,
    extend: boolean,
    options: MotionOptions = DEFAULT_MOTION
  ): CursorSet {
    const moved = this.cursors.map(cursor => moveCursor(buffer, cursor, direction, unit, extend, options));
    return this.with(moved);
  }

  /**
   * Add a caret one line above the top cursor, at its goal column.
   */
  addCursorAbove(buffer: TextBuffer, tabSize: number = DEFAULT_MOTION.tabSize): CursorSet {
    const top = this.top;
    const line = buffer.offsetToLine(top.head);
    if (line === 0) return this;
    return this.addAtLine(buffer, top, line - 1, tabSize);
  }

  /**
   * Add a caret one line below the bottom cursor, at its goal column.
   */
  addCursorBelow(buffer: TextBuffer, tabSize: number = DEFAULT_MOTION.tabSize): CursorSet {
    const bottom = this.bottom;
    const line = buffer.offsetToLine(bottom.head);
    if (line + 1 >= buffer.lineCount) return this;
    return this.addAtLine(buffer, bottom, line + 1, tabSize);
  }

  private addAtLine(buffer: TextBuffer, source: Cursor, line: number, tabSize: number): CursorSet {
    const goal = goalColumnOf(buffer, source, tabSize);
    const start = buffer.lineToOffset(line);
    const offset = start + columnAtVisual(buffer.lineText(line), goal, tabSize);
    return this.addCursor(caret(offset, goal));
  }

  mergeOverlapping(): CursorSet {
    return this.with(this.cursors);
  }

  /**
   * Add a cursor and make it primary.
   */
  addCursor(cursor: Cursor): CursorSet {
    return this.with([...this.cursors, cursor], this.cursors.length);
  }

  /**
   * Remove the cursor at `offset` if there is one (and it is not the last),
   * otherwise add a caret there.
   */
  toggleCursorAt(offset: number): CursorSet {
    const index = this.cursors.findIndex(cursor =>
      isCaret(cursor) ? cursor.head === offset : cursorFrom(cursor) <= offset && offset <= cursorTo(cursor)
    );
    if (index === -1) return this.addCursor(caret(offset));
    return this.removeAt(index);
  }

  /**
   * Remove the cursor at `index`. The last cursor is never removed, and an
   * index outside the set changes nothing.
   */
  removeAt(index: number): CursorSet {
    if (index < 0 || index >= this.cursors.length || this.cursors.length === 1) return this;

    const remaining = this.cursors.filter((_, i) => i !== index);
    let primary = this.primary;
    if (index < primary) primary--;
    else if (index === primary) primary = Math.min(primary, remaining.length - 1);
    return new CursorSet(remaining, primary);
  }

  collapseToPrimary(): CursorSet {
    return new CursorSet([this.primaryCursor], 0);
  }

  clearSelections(): CursorSet {
    return this.with(this.cursors.map(cursor => (isCaret(cursor) ? cursor : caret(cursor.head))));
  }

  setSingle(anchor: number, head: number = anchor): CursorSet {
    return CursorSet.single(anchor, head);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Selection
  // ─────────────────────────────────────────────────────────────────────────

  selectAll(buffer: TextBuffer): CursorSet {
    return CursorSet.single(0, buffer.length);
  }

  /**
   * Expand each caret to the word around it. Selections are kept.
   */
  selectWord(buffer: TextBuffer): CursorSet {
    return this.with(
      this.cursors.map(cursor => {
        if (!isCaret(cursor)) return cursor;
        const range = wordRangeAt(buffer, cursor.head);
        return selection(range.from, range.to);
      })
    );
  }

  /**
   * Grow every cursor one level: caret, word, line content, whole document.
   * A caret with no word under it goes straight to its line. Once any cursor
   * would take the whole document, the set becomes that single selection.
   * Returns this set when nothing grows.
   */
  expandSelection(buffer: TextBuffer): CursorSet {
    const expanded: Cursor[] = [];
    for (const cursor of this.cursors) {
      const next = expandCursor(buffer, cursor);
      if (!next) {
        const all = this.selectAll(buffer);
        return sameCursors(all, this) ? this : all;
      }
      expanded.push(next);
    }
    const result = this.with(expanded);
    return sameCursors(result, this) ? this : result;
  }

  /**
   * Expand each cursor to whole lines, including the trailing line break.
   */
  selectLine(buffer: TextBuffer): CursorSet {
    return this.with(
      this.cursors.map(cursor => {
        const first = buffer.offsetToLine(cursorFrom(cursor));
        const last = buffer.offsetToLine(cursorTo(cursor));
        const end = last + 1 < buffer.lineCount ? buffer.lineToOffset(last + 1) : buffer.length;
        return selection(buffer.lineToOffset(first), end);
      })
    );
  }

  /**
   * Throw OutOfRangeError if any endpoint lies outside the buffer.
   */
  validate(buffer: TextBuffer): void {
    for (const cursor of this.cursors) {
      if (!buffer.isValidOffset(cursor.anchor)) throw OutOfRangeError.offset(cursor.anchor, buffer.length);
      if (!buffer.isValidOffset(cursor.head)) throw OutOfRangeError.offset(cursor.head, buffer.length);
    }
  }
}

// ============================================
// Single-cursor motion
// ============================================

function goalColumnOf(buffer: TextBuffer, cursor: Cursor, tabSize: number): number {
  if (cursor.goalColumn !== null) return cursor.goalColumn;
  const line = buffer.offsetToLine(cursor.head);
  const start = buffer.lineToOffset(line);
  return visualColumn(buffer.lineText(line), cursor.head - start, tabSize);
}

function characterLeft(buffer: TextBuffer, offset: number): number {
  if (offset === 0) return 0;
  const line = buffer.offsetToLine(offset);
  const start = buffer.lineToOffset(line);
  if (offset === start) return buffer.lineEnd(line - 1);
  return isSurrogatePair(buffer, offset - 2) ? offset - 2 : offset - 1;
}

function characterRight(buffer: TextBuffer, offset: number): number {
  const line = buffer.offsetToLine(offset);
  if (offset >= buffer.lineEnd(line)) {
    return line + 1 < buffer.lineCount ? buffer.lineToOffset(line + 1) : offset;
  }
  return isSurrogatePair(buffer, offset) ? offset + 2 : offset + 1;
}

function verticalTarget(
  buffer: TextBuffer,
  cursor: Cursor,
  lines: number,
  tabSize: number
): { offset: number; goal: number } {
  const goal = goalColumnOf(buffer, cursor, tabSize);
  const line = buffer.offsetToLine(cursor.head);
  const target = Math.max(0, Math.min(buffer.lineCount - 1, line + lines));
  if (target === line) return { offset: cursor.head, goal };
  const start = buffer.lineToOffset(target);
  return { offset: start + columnAtVisual(buffer.lineText(target), goal, tabSize), goal };
}

export function moveCursor(
  buffer: TextBuffer,
  cursor: Cursor,
  direction: Direction,
  unit: MotionUnit,
  extend: boolean,
  options: MotionOptions
): Cursor {
  const horizontal = direction === 'left' || direction === 'right';

  // Collapsing a selection takes the place of the first step
  if (horizontal && unit === 'character' && !extend && !isCaret(cursor)) {
    return caret(direction === 'left' ? cursorFrom(cursor) : cursorTo(cursor));
  }

  let head = cursor.head;
  let goal: number | null = null;

  if (horizontal) {
    const line = buffer.offsetToLine(head);
    switch (unit) {
      case 'character':
        head = direction === 'left' ? characterLeft(buffer, head) : characterRight(buffer, head);
        break;
      case 'word':
        head = direction === 'left' ? previousWordBoundary(buffer, head) : nextWordBoundary(buffer, head);
        break;
      case 'line':
      case 'page':
        head = direction === 'left' ? buffer.lineToOffset(line) : buffer.lineEnd(line);
        break;
      case 'document':
        head = direction === 'left' ? 0 : buffer.length;
        break;
    }
  } else if (unit === 'document') {
    head = direction === 'up' ? 0 : buffer.length;
  } else {
    const step = unit === 'page' ? Math.max(1, options.pageLines) : 1;
    const target = verticalTarget(buffer, cursor, direction === 'up' ? -step : step, options.tabSize);
    head = target.offset;
    goal = target.goal;
  }

  return extend ? { anchor: cursor.anchor, head, goalColumn: goal } : caret(head, goal);
}

export default CursorSet;
