/**
 * Edit Batches
 *
 * An EditOp replaces [from, to) of the pre-batch buffer with `text`. A batch
 * is sorted by `from`, non-overlapping (touching is fine) and applied from the
 * highest offset down so earlier offsets stay valid while it is applied.
 */

import { InvalidEditBatchError } from './errors.ts';
import type { Range, TextBuffer } from './buffer.ts';

export interface EditOp {
  readonly from: number;
  readonly to: number;
  readonly text: string;
}

export type EditBatch = readonly EditOp[];

/**
 * Row/column point as incremental parsers expect it. Columns are raw
 * code-unit distances from the line start ('\r' included).
 */
export interface Point {
  row: number;
  column: number;
}

/**
 * One applied edit in the coordinates of the buffer it was applied to.
 */
export interface TextChange {
  startIndex: number;
  oldEndIndex: number;
  newEndIndex: number;
  startPosition: Point;
  oldEndPosition: Point;
  newEndPosition: Point;
}

/**
 * Association for offsets sitting exactly on an edit: -1 stays before the
 * inserted text, 1 moves after it.
 */
export type Assoc = -1 | 1;

// ============================================
// Construction
// ============================================

/**
 * Sort a batch and reject overlapping operations. Inserts at the same point
 * keep their relative order.
 */
export function normalizeBatch(ops: readonly EditOp[]): EditOp[] {
  const sorted = ops
    .map((op, index) => ({ op, index }))
    .sort((a, b) => a.op.from - b.op.from || a.op.to - b.op.to || a.index - b.index)
    .map(entry => entry.op);

  for (let i = 0; i < sorted.length; i++) {
    const op = sorted[i];
    if (!op) continue;
    if (op.from > op.to) {
      throw new InvalidEditBatchError(`Edit [${op.from}, ${op.to}) has from > to`);
    }
    const prev = sorted[i - 1];
    if (prev && op.from < prev.to) {
      throw new InvalidEditBatchError(
        `Edits [${prev.from}, ${prev.to}) and [${op.from}, ${op.to}) overlap`
      );
    }
  }

  return sorted.filter(op => op.from !== op.to || op.text.length > 0);
}

export function isEmptyBatch(batch: EditBatch): boolean {
  return batch.every(op => op.from === op.to && op.text.length === 0);
}

// ============================================
// Application
// ============================================

/**
 * Apply a normalized batch. Throws OutOfRangeError if any op lies outside the
 * buffer; the input buffer is never modified.
 */
export function applyBatch(buffer: TextBuffer, batch: EditBatch): TextBuffer {
  let result = buffer;
  for (let i = batch.length - 1; i >= 0; i--) {
    const op = batch[i];
    if (!op) continue;
    result = result.replace(op.from, op.to, op.text);
  }
  return result;
}

/**
 * Map a pre-batch offset to its post-batch position.
 */
export function mapOffset(offset: number, batch: EditBatch, assoc: Assoc = 1): number {
  let position = offset;
  let delta = 0;

  for (const op of batch) {
    if (op.from > position) break;
    const change = op.text.length - (op.to - op.from);
    if (op.to < position) {
      delta += change;
      continue;
    }
    // position lies within [from, to]
    if (assoc < 0) return op.from + delta;
    position = op.to;
    delta += change;
  }

  return position + delta;
}

/**
 * Post-batch range of each op's inserted text, in batch order.
 */
export function insertedRanges(batch: EditBatch): Range[] {
  const ranges: Range[] = [];
  let delta = 0;
  for (const op of batch) {
    const from = op.from + delta;
    ranges.push({ from, to: from + op.text.length });
    delta += op.text.length - (op.to - op.from);
  }
  return ranges;
}

/**
 * Smallest post-batch range covering every inserted text. Pure deletions give
 * an empty range at the deletion point.
 */
export function dirtyRangeOf(batch: EditBatch): Range | null {
  const ranges = insertedRanges(batch);
  const first = ranges[0];
  const last = ranges[ranges.length - 1];
  if (!first || !last) return null;
  return { from: first.from, to: last.to };
}

/**
 * Batch that undoes `batch`, expressed against the post-batch buffer.
 */
export function invertBatch(before: TextBuffer, batch: EditBatch): EditOp[] {
  const ranges = insertedRanges(batch);
  return batch.map((op, i) => {
    const range = ranges[i] ?? { from: op.from, to: op.from + op.text.length };
    return { from: range.from, to: range.to, text: before.slice(op.from, op.to) };
  });
}

/**
 * Net change in document length.
 */
export function lengthDelta(batch: EditBatch): number {
  let delta = 0;
  for (const op of batch) {
    delta += op.text.length - (op.to - op.from);
  }
  return delta;
}

// ============================================
// Parser Edits
// ============================================

export function pointAt(buffer: TextBuffer, offset: number): Point {
  const row = buffer.offsetToLine(offset);
  return { row, column: offset - buffer.lineToOffset(row) };
}

function advancePoint(start: Point, text: string): Point {
  const lastNewline = text.lastIndexOf('\n');
  if (lastNewline === -1) {
    return { row: start.row, column: start.column + text.length };
  }
  let rows = 0;
  for (let i = 0; i <= lastNewline; i++) {
    if (text.charCodeAt(i) === 10) rows++;
  }
  return { row: start.row + rows, column: text.length - lastNewline - 1 };
}

/**
 * Describe a batch as the sequence of single edits it performs, in
 * application order (highest offset first). Each change is in the
 * coordinates of the buffer at the moment it is applied.
 */
export function describeChanges(before: TextBuffer, batch: EditBatch): TextChange[] {
  const changes: TextChange[] = [];
  for (let i = batch.length - 1; i >= 0; i--) {
    const op = batch[i];
    if (!op) continue;
    const startPosition = pointAt(before, op.from);
    changes.push({
      startIndex: op.from,
      oldEndIndex: op.to,
      newEndIndex: op.from + op.text.length,
      startPosition,
      oldEndPosition: pointAt(before, op.to),
      newEndPosition: advancePoint(startPosition, op.text),
    });
  }
  return changes;
}
