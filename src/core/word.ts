/**
 * Word Classes
 *
 * Character classification for word motion, word deletion and whole-word
 * search. Runs of the same class form a word.
 */

import type { Range, TextBuffer } from './buffer.ts';

export type CharClass = 'whitespace' | 'word' | 'punctuation';

const PUNCTUATION = new Set('/:,.-(){}[];"\'<>=+*&|!@#$%^~`\\?'.split(''));

export function isWhitespace(char: string): boolean {
  return /^\s$/u.test(char);
}

export function isPunctuation(char: string): boolean {
  return PUNCTUATION.has(char);
}

export function charClass(char: string): CharClass {
  if (isWhitespace(char)) return 'whitespace';
  if (isPunctuation(char)) return 'punctuation';
  return 'word';
}

export function isWordChar(char: string): boolean {
  return charClass(char) === 'word';
}

// ============================================
// Line-local scanning
// ============================================

/**
 * Column reached by a word step to the right within a line: skip whitespace,
 * then one run of the same class.
 */
export function wordEndInLine(text: string, column: number): number {
  let i = column;
  while (i < text.length && isWhitespace(text.charAt(i))) i++;
  const cls = i < text.length ? charClass(text.charAt(i)) : null;
  while (i < text.length && charClass(text.charAt(i)) === cls) i++;
  return i;
}

/**
 * Column reached by a word step to the left within a line.
 */
export function wordStartInLine(text: string, column: number): number {
  let i = column;
  while (i > 0 && isWhitespace(text.charAt(i - 1))) i--;
  const cls = i > 0 ? charClass(text.charAt(i - 1)) : null;
  while (i > 0 && charClass(text.charAt(i - 1)) === cls) i--;
  return i;
}

// ============================================
// Buffer-level motion
// ============================================

/**
 * Offset after one word step right. At a line end the step crosses the line
 * break onto the next line.
 */
export function nextWordBoundary(buffer: TextBuffer, offset: number): number {
  const line = buffer.offsetToLine(offset);
  const start = buffer.lineToOffset(line);
  const end = buffer.lineEnd(line);
  if (offset >= end) {
    return line + 1 < buffer.lineCount ? buffer.lineToOffset(line + 1) : buffer.length;
  }
  return start + wordEndInLine(buffer.slice(start, end), offset - start);
}

/**
 * Offset after one word step left. At a line start the step moves to the end
 * of the previous line.
 */
export function previousWordBoundary(buffer: TextBuffer, offset: number): number {
  const line = buffer.offsetToLine(offset);
  const start = buffer.lineToOffset(line);
  if (offset <= start) {
    return line > 0 ? buffer.lineEnd(line - 1) : 0;
  }
  const end = buffer.lineEnd(line);
  const text = buffer.slice(start, end);
  return start + wordStartInLine(text, Math.min(offset, end) - start);
}

/**
 * Range of the word (or run of punctuation) around an offset. Prefers a word
 * character to the left when the offset sits between runs. Whitespace is
 * never a word: an offset inside a run of it gives an empty range.
 */
export function wordRangeAt(buffer: TextBuffer, offset: number): Range {
  const line = buffer.offsetToLine(offset);
  const start = buffer.lineToOffset(line);
  const text = buffer.lineText(line);
  const column = Math.min(offset - start, text.length);

  let at = column;
  const right = text.charAt(column);
  const left = column > 0 ? text.charAt(column - 1) : '';
  if (left && (!right || (isWordChar(left) && !isWordChar(right)))) {
    at = column - 1;
  }
  if (at >= text.length) return { from: offset, to: offset };

  const cls = charClass(text.charAt(at));
  if (cls === 'whitespace') return { from: offset, to: offset };
  let from = at;
  let to = at + 1;
  while (from > 0 && charClass(text.charAt(from - 1)) === cls) from--;
  while (to < text.length && charClass(text.charAt(to)) === cls) to++;
  return { from: start + from, to: start + to };
}

/**
 * True when [from, to) is bounded by non-word characters on both sides.
 */
export function isWholeWordAt(text: string, from: number, to: number): boolean {
  const before = from > 0 ? text.charAt(from - 1) : '';
  const after = to < text.length ? text.charAt(to) : '';
  return (!before || !isWordChar(before)) && (!after || !isWordChar(after));
}
