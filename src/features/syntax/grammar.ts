/**
 * Grammar Interface
 *
 * Capability set every highlighting backend provides. A grammar owns an
 * opaque tree type; the highlighter never looks inside it.
 */

import type { Range, TextBuffer } from '../../core/buffer.ts';
import type { TextChange } from '../../core/edit.ts';

/**
 * Highlight span in document offsets. Never crosses a line break.
 */
export interface HighlightSpan {
  from: number;
  to: number;
  scope: string;
}

/**
 * Highlight token in line-relative columns.
 */
export interface LineToken {
  start: number;
  end: number;
  scope: string;
}

export interface ReparseResult<T> {
  tree: T;
  /** Ranges of the new source whose highlighting may have changed */
  changedRanges: Range[];
}

export interface Grammar<T> {
  readonly languageId: string;

  /** Parse a whole document. */
  parse(source: TextBuffer): T;

  /**
   * Bring a tree up to date with `source` after `edits`, given in the order
   * they were applied. The old tree must not be used afterwards.
   */
  reparse(tree: T, source: TextBuffer, edits: readonly TextChange[]): ReparseResult<T>;

  /** Tokens of one line of the source the tree was built from. */
  highlightLine(tree: T, source: TextBuffer, line: number): LineToken[];
}

export type AnyGrammar = Grammar<unknown>;

/**
 * Sort tokens, clip overlaps and drop anything outside the line's content.
 */
export function normalizeLineTokens(tokens: readonly LineToken[], lineLength: number): LineToken[] {
  const sorted = tokens
    .map(token => ({ start: Math.max(0, token.start), end: Math.min(lineLength, token.end), scope: token.scope }))
    .filter(token => token.start < token.end)
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const result: LineToken[] = [];
  let cursor = 0;
  for (const token of sorted) {
    const start = Math.max(token.start, cursor);
    if (start >= token.end) continue;
    result.push({ start, end: token.end, scope: token.scope });
    cursor = token.end;
  }
  return result;
}
