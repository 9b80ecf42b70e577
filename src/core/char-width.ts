/**
 * Character Width Utilities
 *
 * Display width of characters in monospace cells, plus the column conversions
 * layout and vertical cursor motion share: tabs expand to the next tab stop,
 * wide characters take two cells, combining marks take none.
 */

type CodeRange = readonly [number, number];

// Sorted, non-overlapping. Checked before the wide table.
const ZERO_WIDTH: readonly CodeRange[] = [
  [0x0300, 0x036f], // Combining Diacritical Marks
  [0x0483, 0x0489], // Combining Cyrillic marks
  [0x0591, 0x05bd], // Hebrew combining marks
  [0x1ab0, 0x1aff], // Combining Diacritical Marks Extended
  [0x1dc0, 0x1dff], // Combining Diacritical Marks Supplement
  [0x200b, 0x200f], // Zero-width space, joiners, direction marks
  [0x2028, 0x202f], // Line/paragraph separators, embedding controls
  [0x2060, 0x206f], // Word joiner, invisible operators
  [0x20d0, 0x20ff], // Combining marks for symbols
  [0xfe00, 0xfe0f], // Variation selectors
  [0xfe20, 0xfe2f], // Combining half marks
  [0xfeff, 0xfeff], // BOM
  [0xe0100, 0xe01ef], // Variation selectors supplement
];

const WIDE: readonly CodeRange[] = [
  [0x1100, 0x115f], // Hangul Jamo
  [0x231a, 0x231b], // Watch, hourglass
  [0x23e9, 0x23f3], // Media control symbols
  [0x23f8, 0x23fa],
  [0x26aa, 0x26ab],
  [0x26bd, 0x26be],
  [0x26c4, 0x26c5],
  [0x26ce, 0x26ce],
  [0x26d4, 0x26d4],
  [0x26ea, 0x26ea],
  [0x26f2, 0x26f3],
  [0x26f5, 0x26f5],
  [0x26fa, 0x26fa],
  [0x26fd, 0x26fd],
  [0x2705, 0x2705],
  [0x274c, 0x274c],
  [0x274e, 0x274e],
  [0x2753, 0x2755],
  [0x2757, 0x2757],
  [0x2b1b, 0x2b1c],
  [0x2b50, 0x2b55],
  [0x2e80, 0xa4cf], // CJK, Yi
  [0xac00, 0xd7a3], // Hangul syllables
  [0xf900, 0xfaff], // CJK compatibility
  [0xfe10, 0xfe1f], // Vertical forms
  [0xfe30, 0xfe6f], // CJK compatibility forms
  [0xff00, 0xff60], // Fullwidth forms
  [0xffe0, 0xffe6],
  [0x1f004, 0x1f0cf], // Mahjong, playing cards
  [0x1f1e0, 0x1f1ff], // Flags
  [0x1f300, 0x1f9ff], // Pictographs, emoticons, transport
  [0x20000, 0x2ffff], // CJK extension B-F
];

function inRanges(code: number, ranges: readonly CodeRange[]): boolean {
  let low = 0;
  let high = ranges.length - 1;
  while (low <= high) {
    const mid = (low + high) >> 1;
    const range = ranges[mid];
    if (!range) return false;
    if (code < range[0]) high = mid - 1;
    else if (code > range[1]) low = mid + 1;
    else return true;
  }
  return false;
}

/**
 * Width of a single code point in cells: 0, 1 or 2.
 */
export function codePointWidth(code: number): number {
  if (code < 32 || code === 0x7f) return 0;
  if (code < 127) return 1;
  if (inRanges(code, ZERO_WIDTH)) return 0;
  if (inRanges(code, WIDE)) return 2;
  return 1;
}

export function getCharWidth(char: string): number {
  return codePointWidth(char.codePointAt(0) ?? 0);
}

/**
 * Cells taken by the character starting at `index`, given the visual column
 * it starts at (tabs depend on it). Returns the width and the code-unit step.
 */
function measureAt(text: string, index: number, visual: number, tabSize: number): { width: number; step: number } {
  const code = text.codePointAt(index) ?? 0;
  const step = code > 0xffff ? 2 : 1;
  if (code === 9) {
    return { width: tabSize - (visual % tabSize), step };
  }
  return { width: codePointWidth(code), step };
}

/**
 * Visual column (cells) of a code-unit column within a line.
 */
export function visualColumn(text: string, column: number, tabSize: number): number {
  let visual = 0;
  let i = 0;
  const end = Math.min(column, text.length);
  while (i < end) {
    const { width, step } = measureAt(text, i, visual, tabSize);
    visual += width;
    i += step;
  }
  return visual;
}

/**
 * First code-unit column whose visual column is at or past `target`.
 * Never lands inside a surrogate pair.
 */
export function columnAtVisual(text: string, target: number, tabSize: number): number {
  let visual = 0;
  let i = 0;
  while (i < text.length) {
    if (visual >= target) return i;
    const { width, step } = measureAt(text, i, visual, tabSize);
    visual += width;
    i += step;
  }
  return text.length;
}

/**
 * Total display width of a line in cells.
 */
export function displayWidth(text: string, tabSize: number): number {
  return visualColumn(text, text.length, tabSize);
}
