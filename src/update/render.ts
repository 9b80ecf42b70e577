/**
 * Render Frame
 *
 * Everything a renderer needs to draw the visible region: laid-out lines
 * with their highlight spans, caret positions and selection rectangles.
 * While a block selection is being dragged its cursors are drawn in place
 * of the document's.
 * Coordinates are viewport pixels; x = 0 is the left edge of the gutter.
 *
 * Only the visible lines plus the prefetch margin are laid out.
 */

import { CursorSet, cursorFrom, cursorTo, isCaret } from '../core/cursor.ts';
import { visualColumn } from '../core/char-width.ts';
import type { HighlightSpan } from '../features/syntax/grammar.ts';
import type { LineLayout } from '../layout/viewport-layout.ts';
import type { EditorModel } from './model.ts';

export interface RenderLine {
  line: number;
  /** 1-based line number shown in the gutter */
  number: number;
  layout: LineLayout;
  spans: HighlightSpan[];
}

export interface RenderCaret {
  x: number;
  y: number;
  height: number;
  primary: boolean;
}

export interface SelectionRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface RenderFrame {
  revision: number;
  firstLine: number;
  lastLine: number;
  gutterWidth: number;
  scrollTop: number;
  lines: RenderLine[];
  carets: RenderCaret[];
  selections: SelectionRect[];
}

export function renderFrame(model: EditorModel): RenderFrame {
  const { document, layout, highlighter, viewport } = model;
  const buffer = document.buffer;
  const { lineHeight, charWidth, textPadding, tabSize } = layout.settings;

  layout.sync(document);
  const prefetch = layout.prefetchRange(viewport);
  for (let line = prefetch.first; line <= prefetch.last; line++) {
    layout.layoutLine(document, line);
  }
  const { first, last } = layout.visibleLineRange(viewport);
  layout.evictOutside(prefetch);

  const gutterWidth = layout.gutterWidth(document);
  const textLeft = gutterWidth + textPadding;

  const lines: RenderLine[] = [];
  for (let line = first; line <= last; line++) {
    const lineLayout = layout.layoutLine(document, line);
    lines.push({
      line,
      number: line + 1,
      layout: lineLayout,
      spans: highlighter.highlightsIn(document, lineLayout.from, lineLayout.to),
    });
  }

  const carets: RenderCaret[] = [];
  const selections: SelectionRect[] = [];
  const visibleFrom = buffer.lineToOffset(first);
  const visibleTo = buffer.lineEnd(last);

  const cursors = model.rectangle ? CursorSet.fromRectangle(buffer, model.rectangle, tabSize) : document.cursors;
  cursors.cursors.forEach((cursor, index) => {
    const head = cursor.head;
    if (head >= visibleFrom && head <= visibleTo) {
      const anchor = layout.caretAnchor(document, head);
      carets.push({
        x: textLeft + anchor.x,
        y: anchor.y - viewport.scrollTop,
        height: anchor.height,
        primary: index === cursors.primary,
      });
    }

    if (isCaret(cursor)) return;
    const from = cursorFrom(cursor);
    const to = cursorTo(cursor);
    for (const { line, layout: lineLayout } of lines) {
      if (lineLayout.to < from || lineLayout.from > to) continue;
      const text = buffer.lineText(line);
      const top = layout.lineTop(line);

      lineLayout.segments.forEach((segment, row) => {
        const start = Math.max(from, segment.from);
        const end = Math.min(to, segment.to);
        const isLastRow = row === lineLayout.segments.length - 1;
        // The line break is drawn as one cell when the selection runs past it
        const coversBreak = isLastRow && to > lineLayout.to;
        if (start > end || (start === end && !coversBreak)) return;

        const startColumn = visualColumn(text, start - lineLayout.from, tabSize) - segment.startColumn;
        const endColumn = visualColumn(text, end - lineLayout.from, tabSize) - segment.startColumn;
        selections.push({
          x: textLeft + startColumn * charWidth,
          y: top + row * lineHeight - viewport.scrollTop,
          width: (endColumn - startColumn + (coversBreak ? 1 : 0)) * charWidth,
          height: lineHeight,
        });
      });
    }
  });

  return {
    revision: document.revision,
    firstLine: first,
    lastLine: last,
    gutterWidth,
    scrollTop: viewport.scrollTop,
    lines,
    carets,
    selections,
  };
}
