/**
 * Viewport Layout
 *
 * Monospace layout of the visible region. Lines are laid out on demand and
 * cached line-relative, so an edit only drops the lines it touched; the rest
 * are re-keyed by the edit's line delta. With word wrap a height map keeps
 * row ↔ line lookups logarithmic; without it rows are lines.
 */

import type { TextBuffer } from '../core/buffer.ts';
import { columnAtVisual, codePointWidth, visualColumn } from '../core/char-width.ts';
import { describeChanges } from '../core/edit.ts';
import { debugLog } from '../debug.ts';
import type { Document } from '../state/document.ts';
import { HeightMap } from './height-map.ts';

export interface LayoutMetrics {
  lineHeight: number;
  charWidth: number;
  tabSize: number;
  wordWrap: boolean;
  gutterMinDigits: number;
  gutterPadding: number;
  /** Space between gutter and text */
  textPadding: number;
  /** Lines laid out beyond each edge of the viewport */
  prefetchLines: number;
}

export const DEFAULT_LAYOUT_METRICS: LayoutMetrics = {
  lineHeight: 20,
  charWidth: 8,
  tabSize: 4,
  wordWrap: false,
  gutterMinDigits: 3,
  gutterPadding: 8,
  textPadding: 8,
  prefetchLines: 10,
};

export interface Viewport {
  scrollTop: number;
  width: number;
  height: number;
}

export interface LineRange {
  first: number;
  last: number;
}

/**
 * One wrap row of a line.
 */
export interface LineSegment {
  from: number;
  to: number;
  startColumn: number;
  endColumn: number;
  width: number;
}

export interface LineLayout {
  line: number;
  from: number;
  to: number;
  segments: LineSegment[];
  width: number;
  rows: number;
}

export interface CaretAnchor {
  x: number;
  y: number;
  height: number;
}

/** Wrap row in line-relative columns */
export interface WrapRow {
  start: number;
  end: number;
  startColumn: number;
  endColumn: number;
}

const MAX_CACHED_LINES = 4096;

const METRIC_KEYS: readonly (keyof LayoutMetrics)[] = [
  'lineHeight',
  'charWidth',
  'tabSize',
  'wordWrap',
  'gutterMinDigits',
  'gutterPadding',
  'textPadding',
  'prefetchLines',
];

function isBlank(char: string): boolean {
  return char === ' ' || char === '\t';
}

/**
 * Split a line into wrap rows of at most `columns` cells. Breaks after the
 * last space or tab that fits, otherwise mid-word; spaces at a break stay at
 * the end of the row they follow. Every row holds at least one character.
 */
export function wrapLine(text: string, columns: number, tabSize: number): WrapRow[] {
  const rows: WrapRow[] = [];
  let rowStart = 0;
  let rowStartColumn = 0;
  let lastBreak = -1;
  let lastBreakColumn = 0;
  let i = 0;
  let column = 0;

  while (i < text.length) {
    const code = text.codePointAt(i) ?? 0;
    const step = code > 0xffff ? 2 : 1;
    const width = code === 9 ? tabSize - (column % tabSize) : codePointWidth(code);
    const char = text.charAt(i);

    if (column + width - rowStartColumn > columns && i > rowStart) {
      let breakAt = i;
      let breakColumn = column;
      if (!isBlank(char) && lastBreak > rowStart) {
        breakAt = lastBreak;
        breakColumn = lastBreakColumn;
      }
      while (breakAt < text.length && text.charAt(breakAt) === ' ') {
        breakAt++;
        breakColumn++;
      }
      rows.push({ start: rowStart, end: breakAt, startColumn: rowStartColumn, endColumn: breakColumn });
      rowStart = breakAt;
      rowStartColumn = breakColumn;
      lastBreak = -1;
      i = breakAt;
      column = breakColumn;
      continue;
    }

    i += step;
    column += width;
    if (isBlank(char)) {
      lastBreak = i;
      lastBreakColumn = column;
    }
  }

  if (rowStart < text.length || rows.length === 0) {
    rows.push({ start: rowStart, end: text.length, startColumn: rowStartColumn, endColumn: column });
  }
  return rows;
}

export class ViewportLayout {
  private readonly metrics: LayoutMetrics;
  private readonly textWidth: number;
  private cache: Map<number, WrapRow[]> = new Map();
  private heightMap: HeightMap | null = null;
  private syncedBuffer: TextBuffer | null = null;
  private lines = 1;
  private gutterCache: { digits: number; width: number } | null = null;

  /**
   * Metrics and text width are fixed for the life of a layout; the caches
   * only follow the document. Changing either yields a new layout, so a
   * model holding the old one keeps answering the same way.
   */
  constructor(metrics: Partial<LayoutMetrics> = {}, textWidth = 0) {
    this.metrics = { ...DEFAULT_LAYOUT_METRICS, ...metrics };
    this.textWidth = Math.max(0, textWidth);
  }

  get settings(): Readonly<LayoutMetrics> {
    return this.metrics;
  }

  /**
   * Layout with changed metrics, or this one when nothing changes.
   */
  withMetrics(metrics: Partial<LayoutMetrics>, textWidth: number = this.textWidth): ViewportLayout {
    const next = { ...this.metrics, ...metrics };
    const same = METRIC_KEYS.every(key => next[key] === this.metrics[key]);
    if (same) return this.withTextWidth(textWidth);
    return new ViewportLayout(next, textWidth);
  }

  /**
   * Layout for a text area `width` pixels wide. Without word wrap the width
   * changes nothing and this layout is returned.
   */
  withTextWidth(width: number): ViewportLayout {
    if (!this.metrics.wordWrap) return this;
    const columns = Math.max(1, Math.floor(Math.max(0, width) / this.metrics.charWidth));
    if (columns === this.wrapColumns) return this;
    return new ViewportLayout(this.metrics, width);
  }

  get wrapColumns(): number {
    return Math.max(1, Math.floor(this.textWidth / this.metrics.charWidth));
  }

  private invalidateAll(): void {
    this.cache.clear();
    this.heightMap = this.metrics.wordWrap ? new HeightMap(this.lines) : null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Document sync
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Catch up with the document through its edit journal.
   */
  sync(document: Document): void {
    if (this.syncedBuffer === document.buffer) return;

    const entries = this.syncedBuffer ? document.journalSince(this.syncedBuffer) : null;
    this.lines = document.lineCount;

    if (!entries) {
      this.invalidateAll();
    } else {
      for (const entry of entries) {
        for (const change of describeChanges(entry.before, entry.edits)) {
          const startRow = change.startPosition.row;
          const oldEndRow = change.oldEndPosition.row;
          const newEndRow = change.newEndPosition.row;
          this.shiftLines(startRow, oldEndRow, newEndRow - oldEndRow);
          this.heightMap?.splice(startRow, oldEndRow - startRow + 1, newEndRow - startRow + 1);
        }
      }
      if (this.heightMap && this.heightMap.lineCount !== this.lines) {
        debugLog(`[ViewportLayout] Height map out of step (${this.heightMap.lineCount} vs ${this.lines}), resetting`);
        this.heightMap.reset(this.lines);
        this.cache.clear();
      }
    }

    this.syncedBuffer = document.buffer;
  }

  private shiftLines(startRow: number, oldEndRow: number, delta: number): void {
    if (this.cache.size === 0) return;
    const next = new Map<number, WrapRow[]>();
    for (const [line, shape] of this.cache) {
      if (line < startRow) next.set(line, shape);
      else if (line > oldEndRow) next.set(line + delta, shape);
    }
    this.cache = next;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Rows
  // ─────────────────────────────────────────────────────────────────────────

  get totalRows(): number {
    return this.heightMap ? this.heightMap.totalRows : this.lines;
  }

  private rowOfLine(line: number): number {
    return this.heightMap ? this.heightMap.rowOfLine(line) : line;
  }

  private lineAtRow(row: number): { line: number; rowInLine: number } {
    if (this.heightMap) return this.heightMap.lineAtRow(row);
    return { line: Math.max(0, Math.min(this.lines - 1, row)), rowInLine: 0 };
  }

  private rowsOf(line: number): number {
    return this.heightMap ? this.heightMap.rowsOf(line) : 1;
  }

  contentHeight(): number {
    return this.totalRows * this.metrics.lineHeight;
  }

  lineTop(line: number): number {
    return this.rowOfLine(line) * this.metrics.lineHeight;
  }

  /**
   * Lines intersecting the viewport.
   */
  visibleLineRange(viewport: Viewport): LineRange {
    const { lineHeight } = this.metrics;
    const topRow = Math.max(0, Math.floor(viewport.scrollTop / lineHeight));
    const bottomRow = Math.max(topRow, Math.ceil((viewport.scrollTop + viewport.height) / lineHeight) - 1);
    const first = this.lineAtRow(topRow).line;
    const last = this.lineAtRow(bottomRow).line;
    return { first, last: Math.max(first, last) };
  }

  /**
   * Visible lines plus the prefetch margin on each side.
   */
  prefetchRange(viewport: Viewport): LineRange {
    const { first, last } = this.visibleLineRange(viewport);
    const margin = this.metrics.prefetchLines;
    return { first: Math.max(0, first - margin), last: Math.min(this.lines - 1, last + margin) };
  }

  /**
   * scrollTop that brings a line fully into view with the least movement.
   */
  scrollToReveal(line: number, viewport: Viewport): number {
    const top = this.lineTop(line);
    const bottom = top + this.rowsOf(line) * this.metrics.lineHeight;
    if (top < viewport.scrollTop) return top;
    if (bottom > viewport.scrollTop + viewport.height) return Math.max(0, bottom - viewport.height);
    return viewport.scrollTop;
  }

  /**
   * Keep scrollTop inside the content.
   */
  clampScroll(scrollTop: number, viewport: Viewport): number {
    const max = Math.max(0, this.contentHeight() - viewport.height);
    return Math.max(0, Math.min(scrollTop, max));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lines
  // ─────────────────────────────────────────────────────────────────────────

  layoutLine(document: Document, line: number): LineLayout {
    this.sync(document);
    const buffer = document.buffer;
    const from = buffer.lineToOffset(line);

    let shape = this.cache.get(line);
    if (!shape) {
      const text = buffer.lineText(line);
      shape = this.metrics.wordWrap
        ? wrapLine(text, this.wrapColumns, this.metrics.tabSize)
        : [{ start: 0, end: text.length, startColumn: 0, endColumn: visualColumn(text, text.length, this.metrics.tabSize) }];
      this.cache.set(line, shape);
      this.heightMap?.setRows(line, shape.length);
    }

    const { charWidth } = this.metrics;
    const segments = shape.map(row => ({
      from: from + row.start,
      to: from + row.end,
      startColumn: row.startColumn,
      endColumn: row.endColumn,
      width: (row.endColumn - row.startColumn) * charWidth,
    }));
    const last = shape[shape.length - 1];
    return {
      line,
      from,
      to: from + (last ? last.end : 0),
      segments,
      width: segments.reduce((max, segment) => Math.max(max, segment.width), 0),
      rows: shape.length,
    };
  }

  /**
   * Drop cached lines outside a range once the cache grows large.
   */
  evictOutside(range: LineRange): void {
    if (this.cache.size <= MAX_CACHED_LINES) return;
    for (const line of [...this.cache.keys()]) {
      if (line < range.first || line > range.last) this.cache.delete(line);
    }
  }

  /**
   * Lines currently holding a cached layout, ascending.
   */
  cachedLines(): number[] {
    return [...this.cache.keys()].sort((a, b) => a - b);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Gutter
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Gutter width in pixels, recomputed only when the digit count of the
   * largest line number changes.
   */
  gutterWidth(document: Document): number {
    const digits = String(document.lineCount).length;
    if (this.gutterCache && this.gutterCache.digits === digits) return this.gutterCache.width;
    const { gutterMinDigits, charWidth, gutterPadding } = this.metrics;
    const width = Math.max(gutterMinDigits, digits) * charWidth + gutterPadding;
    this.gutterCache = { digits, width };
    return width;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Hit testing
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Offset under a point. `x` is relative to the start of the text area,
   * `y` to the top of the content (scroll already applied).
   */
  hitTest(document: Document, x: number, y: number): number {
    this.sync(document);
    const { lineHeight, charWidth, tabSize } = this.metrics;
    const { line, rowInLine } = this.lineAtRow(Math.max(0, Math.floor(y / lineHeight)));
    const layout = this.layoutLine(document, line);
    const segment = layout.segments[Math.min(rowInLine, layout.segments.length - 1)];
    if (!segment) return layout.from;

    const target = segment.startColumn + Math.max(0, Math.round(x / charWidth));
    const text = document.buffer.lineText(line);
    const column = columnAtVisual(text, target, tabSize);
    const isLastRow = segment === layout.segments[layout.segments.length - 1];
    const maxOffset = isLastRow ? segment.to : Math.max(segment.from, segment.to - 1);
    return Math.max(segment.from, Math.min(layout.from + column, maxOffset));
  }

  /**
   * Where to draw a caret at `offset`, in content coordinates relative to the
   * start of the text area.
   */
  caretAnchor(document: Document, offset: number): CaretAnchor {
    const buffer = document.buffer;
    const line = buffer.offsetToLine(offset);
    const layout = this.layoutLine(document, line);
    const column = Math.min(offset, layout.to) - layout.from;

    let rowIndex = layout.segments.findIndex(segment => offset < segment.to);
    if (rowIndex === -1) rowIndex = layout.segments.length - 1;
    const segment = layout.segments[rowIndex];
    const visual = visualColumn(buffer.lineText(line), column, this.metrics.tabSize);
    const { lineHeight, charWidth } = this.metrics;

    return {
      x: (visual - (segment ? segment.startColumn : 0)) * charWidth,
      y: this.lineTop(line) + Math.max(0, rowIndex) * lineHeight,
      height: lineHeight,
    };
  }
}
