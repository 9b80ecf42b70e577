/**
 * Height Map
 *
 * Row counts per line for soft-wrapped layout. Lines are grouped into blocks;
 * each block keeps a Fenwick tree over its lines' row counts and a top-level
 * Fenwick tree sums the blocks. Row ↔ line lookups and single-line updates
 * are O(log n); inserting or removing lines rebuilds only the blocks touched.
 *
 * Lines that were never measured count as one row.
 */

const BLOCK_SIZE = 1024;

// ============================================
// Fenwick Tree
// ============================================

class Fenwick {
  private readonly tree: Float64Array;

  constructor(values: readonly number[]) {
    const size = values.length;
    this.tree = new Float64Array(size + 1);
    for (let i = 0; i < size; i++) {
      this.tree[i + 1] = (this.tree[i + 1] ?? 0) + (values[i] ?? 0);
      const parent = i + 1 + ((i + 1) & -(i + 1));
      if (parent <= size) this.tree[parent] = (this.tree[parent] ?? 0) + (this.tree[i + 1] ?? 0);
    }
  }

  get size(): number {
    return this.tree.length - 1;
  }

  add(index: number, delta: number): void {
    for (let i = index + 1; i < this.tree.length; i += i & -i) {
      this.tree[i] = (this.tree[i] ?? 0) + delta;
    }
  }

  /** Sum of values [0, count) */
  prefix(count: number): number {
    let sum = 0;
    for (let i = Math.min(count, this.size); i > 0; i -= i & -i) {
      sum += this.tree[i] ?? 0;
    }
    return sum;
  }

  /**
   * Largest count such that prefix(count) <= target, with the remainder.
   */
  search(target: number): { count: number; remainder: number } {
    let position = 0;
    let remaining = target;
    let step = 1;
    while (step * 2 <= this.size) step *= 2;

    for (; step > 0; step >>= 1) {
      const next = position + step;
      const value = this.tree[next];
      if (next <= this.size && value !== undefined && value <= remaining) {
        position = next;
        remaining -= value;
      }
    }
    return { count: position, remainder: remaining };
  }
}

// ============================================
// HeightMap
// ============================================

interface Block {
  rows: number[];
  tree: Fenwick;
  total: number;
}

function makeBlock(rows: number[]): Block {
  let total = 0;
  for (const r of rows) total += r;
  return { rows, tree: new Fenwick(rows), total };
}

function chunkRows(rows: number[]): Block[] {
  const blocks: Block[] = [];
  for (let i = 0; i < rows.length; i += BLOCK_SIZE) {
    blocks.push(makeBlock(rows.slice(i, i + BLOCK_SIZE)));
  }
  return blocks;
}

export class HeightMap {
  private blocks: Block[] = [];
  /** Row totals per block */
  private topRows: Fenwick = new Fenwick([]);
  /** Line counts per block */
  private topLines: Fenwick = new Fenwick([]);
  private lines = 0;

  constructor(lineCount = 1) {
    this.reset(lineCount);
  }

  /**
   * Forget all measurements: every line is one row again.
   */
  reset(lineCount: number): void {
    this.lines = Math.max(1, lineCount);
    this.blocks = chunkRows(new Array<number>(this.lines).fill(1));
    this.rebuildTop();
  }

  get lineCount(): number {
    return this.lines;
  }

  get totalRows(): number {
    return this.topRows.prefix(this.blocks.length);
  }

  private rebuildTop(): void {
    this.topRows = new Fenwick(this.blocks.map(block => block.total));
    this.topLines = new Fenwick(this.blocks.map(block => block.rows.length));
  }

  /**
   * Block holding a line and the line's index inside it. `line` may equal
   * the line count, which resolves to the end of the last block.
   */
  private locate(line: number): { block: number; local: number } {
    if (line >= this.lines) {
      const last = this.blocks.length - 1;
      return { block: last, local: this.blocks[last]?.rows.length ?? 0 };
    }
    const { count, remainder } = this.topLines.search(line);
    return { block: count, local: remainder };
  }

  rowsOf(line: number): number {
    if (line < 0 || line >= this.lines) return 0;
    const { block, local } = this.locate(line);
    return this.blocks[block]?.rows[local] ?? 1;
  }

  /**
   * Record the measured row count of a line.
   */
  setRows(line: number, rows: number): void {
    if (line < 0 || line >= this.lines) return;
    const { block, local } = this.locate(line);
    const entry = this.blocks[block];
    if (!entry) return;
    const current = entry.rows[local] ?? 1;
    const delta = Math.max(1, rows) - current;
    if (delta === 0) return;
    entry.rows[local] = current + delta;
    entry.tree.add(local, delta);
    entry.total += delta;
    this.topRows.add(block, delta);
  }

  /**
   * First row of a line (rows of all lines before it).
   */
  rowOfLine(line: number): number {
    const { block, local } = this.locate(Math.max(0, line));
    const entry = this.blocks[block];
    return this.topRows.prefix(block) + (entry ? entry.tree.prefix(local) : 0);
  }

  /**
   * Line containing a row and the row's index within that line.
   */
  lineAtRow(row: number): { line: number; rowInLine: number } {
    if (row >= this.totalRows) {
      const last = this.lines - 1;
      return { line: last, rowInLine: Math.max(0, this.rowsOf(last) - 1) };
    }
    const outer = this.topRows.search(Math.max(0, row));
    const entry = this.blocks[outer.count];
    if (!entry) return { line: this.lines - 1, rowInLine: 0 };
    const inner = entry.tree.search(outer.remainder);
    return { line: this.topLines.prefix(outer.count) + inner.count, rowInLine: inner.remainder };
  }

  /**
   * Replace `removed` lines starting at `line` with `inserted` unmeasured
   * lines. Only the blocks covering the edit are rebuilt.
   */
  splice(line: number, removed: number, inserted: number): void {
    const start = Math.max(0, Math.min(line, this.lines));
    const count = Math.max(0, Math.min(removed, this.lines - start));
    if (count === 0 && inserted === 0) return;

    const { block, local } = this.locate(start);
    let endBlock = block;
    let covered = (this.blocks[block]?.rows.length ?? 0) - local;
    while (covered < count && endBlock + 1 < this.blocks.length) {
      endBlock++;
      covered += this.blocks[endBlock]?.rows.length ?? 0;
    }

    let rows: number[] = [];
    for (let b = block; b <= endBlock; b++) {
      rows = rows.concat(this.blocks[b]?.rows ?? []);
    }
    rows = rows.slice(0, local).concat(new Array<number>(inserted).fill(1), rows.slice(local + count));

    this.blocks = [...this.blocks.slice(0, block), ...chunkRows(rows), ...this.blocks.slice(endBlock + 1)];
    if (this.blocks.length === 0) this.blocks = [makeBlock([1])];
    this.lines = Math.max(1, this.lines - count + inserted);
    this.rebuildTop();
  }
}
