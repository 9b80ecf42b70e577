/**
 * Rope Text Buffer
 *
 * Persistent balanced tree of text chunks. Every node caches its length and
 * newline count, so edits, slices and line lookups all descend a single
 * root-to-leaf path: O(log n) in document length.
 *
 * Buffers are immutable. insert/delete/replace return a new buffer that shares
 * every untouched subtree with the old one, which keeps undo snapshots and the
 * document edit journal cheap.
 *
 * Offsets are UTF-16 code units. Lines are separated by '\n'; a '\r' before the
 * '\n' is stored verbatim (so load/save round-trips) but is not part of the
 * line's content range.
 */

import { OutOfRangeError } from './errors.ts';

export interface Position {
  line: number;    // 0-indexed line number
  column: number;  // 0-indexed code-unit column within the line
}

export interface Range {
  from: number;
  to: number;
}

// ============================================
// Tree Nodes
// ============================================

/** Upper bound for a leaf chunk, in code units */
const MAX_LEAF = 1024;
/** Adjacent leaves smaller than this are merged when an edit touches them */
const MIN_LEAF = 256;
const MAX_CHILDREN = 16;
const MIN_CHILDREN = 4;

interface LeafNode {
  readonly kind: 'leaf';
  readonly text: string;
  readonly length: number;
  readonly newlines: number;
  readonly height: 0;
}

interface BranchNode {
  readonly kind: 'branch';
  readonly children: readonly RopeNode[];
  readonly length: number;
  readonly newlines: number;
  readonly height: number;
}

type RopeNode = LeafNode | BranchNode;

function countNewlines(text: string, from = 0, to = text.length): number {
  let count = 0;
  for (let i = from; i < to; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return count;
}

function makeLeaf(text: string): LeafNode {
  return { kind: 'leaf', text, length: text.length, newlines: countNewlines(text), height: 0 };
}

function makeBranch(children: readonly RopeNode[]): BranchNode {
  let length = 0;
  let newlines = 0;
  for (const child of children) {
    length += child.length;
    newlines += child.newlines;
  }
  const first = children[0];
  return { kind: 'branch', children, length, newlines, height: first ? first.height + 1 : 1 };
}

const EMPTY_LEAF = makeLeaf('');

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Split text into leaves no longer than MAX_LEAF, preferring to cut after a
 * newline and never cutting a surrogate pair.
 */
function chunkText(text: string): LeafNode[] {
  if (text.length === 0) return [];
  if (text.length <= MAX_LEAF) return [makeLeaf(text)];

  const leaves: LeafNode[] = [];
  // Even-sized chunks instead of full ones followed by a tiny tail
  const count = Math.ceil(text.length / MAX_LEAF);
  const target = Math.ceil(text.length / count);
  let pos = 0;

  while (pos < text.length) {
    let end = Math.min(pos + target, text.length);
    if (end < text.length) {
      const newline = text.lastIndexOf('\n', end - 1);
      if (newline >= pos + (target >> 1)) {
        end = newline + 1;
      } else if (isHighSurrogate(text.charCodeAt(end - 1))) {
        end--;
      }
    }
    leaves.push(makeLeaf(text.slice(pos, end)));
    pos = end;
  }

  return leaves;
}

/**
 * Group same-height nodes into as few branches as possible, with sizes spread
 * evenly so no branch ends up nearly empty.
 */
function groupNodes(nodes: readonly RopeNode[]): BranchNode[] {
  const groups = Math.ceil(nodes.length / MAX_CHILDREN);
  const size = Math.ceil(nodes.length / groups);
  const result: BranchNode[] = [];
  for (let i = 0; i < nodes.length; i += size) {
    result.push(makeBranch(nodes.slice(i, i + size)));
  }
  return result;
}

function buildRoot(nodes: readonly RopeNode[]): RopeNode {
  let level: readonly RopeNode[] = nodes;
  if (level.length === 0) return EMPTY_LEAF;
  while (level.length > 1) {
    level = groupNodes(level);
  }
  let root = level[0] ?? EMPTY_LEAF;
  while (root.kind === 'branch' && root.children.length === 1) {
    root = root.children[0] ?? EMPTY_LEAF;
  }
  return root;
}

/**
 * Merge undersized neighbours produced by an edit. Only runs over the
 * children of a node on the edit path, so its cost is bounded by MAX_CHILDREN.
 */
function coalesce(nodes: RopeNode[]): RopeNode[] {
  if (nodes.length < 2) return nodes;

  const result: RopeNode[] = [];
  for (const node of nodes) {
    const prev = result[result.length - 1];
    if (prev && prev.kind === 'leaf' && node.kind === 'leaf') {
      if ((prev.length < MIN_LEAF || node.length < MIN_LEAF) && prev.length + node.length <= MAX_LEAF) {
        result[result.length - 1] = makeLeaf(prev.text + node.text);
        continue;
      }
    } else if (prev && prev.kind === 'branch' && node.kind === 'branch') {
      const combined = prev.children.length + node.children.length;
      if ((prev.children.length < MIN_CHILDREN || node.children.length < MIN_CHILDREN) && combined <= MAX_CHILDREN) {
        result[result.length - 1] = makeBranch([...prev.children, ...node.children]);
        continue;
      }
    }
    result.push(node);
  }
  return result;
}

/**
 * Replace [from, to) inside a node. Returns zero or more nodes of the same
 * height as the input.
 */
function replaceInNode(node: RopeNode, from: number, to: number, text: string): RopeNode[] {
  if (node.kind === 'leaf') {
    const next = node.text.slice(0, from) + text + node.text.slice(to);
    if (next.length === 0) return [];
    if (next.length <= MAX_LEAF) return [makeLeaf(next)];
    return chunkText(next);
  }

  const out: RopeNode[] = [];
  let pos = 0;
  let placed = false;

  for (const child of node.children) {
    const start = pos;
    const end = pos + child.length;
    pos = end;

    if (!placed) {
      if (end < from) {
        out.push(child);
        continue;
      }
      // First child whose end reaches `from` receives the replacement text
      out.push(...replaceInNode(child, from - start, Math.min(to, end) - start, text));
      placed = true;
      continue;
    }

    if (start >= to) {
      out.push(child);
    } else if (end > to) {
      out.push(...replaceInNode(child, 0, to - start, ''));
    }
    // Children fully inside the range are dropped
  }

  const merged = coalesce(out);
  if (merged.length === 0) return [];
  if (merged.length <= MAX_CHILDREN) return [makeBranch(merged)];
  return groupNodes(merged);
}

function buildFromText(text: string): RopeNode {
  return buildRoot(chunkText(text));
}

// ============================================
// TextBuffer
// ============================================

export class TextBuffer {
  private readonly root: RopeNode;

  private constructor(root: RopeNode) {
    this.root = root;
  }

  static readonly empty: TextBuffer = new TextBuffer(EMPTY_LEAF);

  /**
   * Build a balanced buffer from raw text in O(n).
   */
  static fromString(text: string): TextBuffer {
    if (text.length === 0) return TextBuffer.empty;
    return new TextBuffer(buildFromText(text));
  }

  /**
   * Total length in code units
   */
  get length(): number {
    return this.root.length;
  }

  /**
   * Number of lines (always >= 1)
   */
  get lineCount(): number {
    return this.root.newlines + 1;
  }

  /**
   * Depth of the underlying tree (exposed for balance checks)
   */
  get depth(): number {
    return this.root.height;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Mutation (returns new buffers)
  // ─────────────────────────────────────────────────────────────────────────

  insert(offset: number, text: string): TextBuffer {
    this.checkOffset(offset);
    if (text.length === 0) return this;
    return this.replaceUnchecked(offset, offset, text);
  }

  delete(from: number, to: number): TextBuffer {
    this.checkRange(from, to);
    if (from === to) return this;
    return this.replaceUnchecked(from, to, '');
  }

  replace(from: number, to: number, text: string): TextBuffer {
    this.checkRange(from, to);
    if (from === to && text.length === 0) return this;
    return this.replaceUnchecked(from, to, text);
  }

  private replaceUnchecked(from: number, to: number, text: string): TextBuffer {
    if (this.root.length === 0) return TextBuffer.fromString(text);
    return new TextBuffer(buildRoot(replaceInNode(this.root, from, to, text)));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Reading
  // ─────────────────────────────────────────────────────────────────────────

  slice(from: number, to: number = this.length): string {
    this.checkRange(from, to);
    if (from === to) return '';
    let result = '';
    for (const piece of this.chunks(from, to)) {
      result += piece;
    }
    return result;
  }

  toString(): string {
    const parts: string[] = [];
    collectLeaves(this.root, parts);
    return parts.join('');
  }

  /**
   * Iterate the text in [from, to) as a sequence of chunk slices.
   */
  *chunks(from = 0, to: number = this.length): Generator<string> {
    this.checkRange(from, to);
    if (from === to) return;

    const stack: Array<{ node: RopeNode; start: number }> = [{ node: this.root, start: 0 }];
    while (stack.length > 0) {
      const top = stack.pop();
      if (!top) break;
      const { node, start } = top;
      const end = start + node.length;
      if (end <= from || start >= to) continue;

      if (node.kind === 'leaf') {
        yield node.text.slice(Math.max(0, from - start), Math.min(node.length, to - start));
        continue;
      }

      // Push in reverse so children are visited left to right
      let childStart = end;
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        if (!child) continue;
        childStart -= child.length;
        stack.push({ node: child, start: childStart });
      }
    }
  }

  /**
   * The rest of the leaf chunk containing `offset` (empty at end of buffer).
   * Streaming consumers such as the parser pull text through this.
   */
  chunkAt(offset: number): string {
    this.checkOffset(offset);
    let node = this.root;
    let local = offset;
    while (node.kind === 'branch') {
      let next: RopeNode | undefined;
      for (const child of node.children) {
        if (local < child.length) {
          next = child;
          break;
        }
        local -= child.length;
      }
      if (!next) return '';
      node = next;
    }
    return node.text.slice(local);
  }

  charCodeAt(offset: number): number {
    if (offset < 0 || offset >= this.length) {
      throw OutOfRangeError.offset(offset, this.length);
    }
    return this.chunkAt(offset).charCodeAt(0);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Line Index
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Offset of the first character of a line
   */
  lineToOffset(line: number): number {
    this.checkLine(line);
    if (line === 0) return 0;
    return nthNewlineOffset(this.root, line) + 1;
  }

  /**
   * Line containing an offset (an offset right after '\n' belongs to the next line)
   */
  offsetToLine(offset: number): number {
    this.checkOffset(offset);
    return newlinesBefore(this.root, offset);
  }

  /**
   * Offset where a line's content ends, before any '\r\n' or '\n'
   */
  lineEnd(line: number): number {
    this.checkLine(line);
    if (line === this.lineCount - 1) return this.length;
    const newline = nthNewlineOffset(this.root, line + 1);
    if (newline > 0 && this.charCodeAt(newline - 1) === 13) {
      const start = this.lineToOffset(line);
      return Math.max(start, newline - 1);
    }
    return newline;
  }

  lineLength(line: number): number {
    return this.lineEnd(line) - this.lineToOffset(line);
  }

  /**
   * Content of a line without its line break
   */
  lineText(line: number): string {
    const start = this.lineToOffset(line);
    return this.slice(start, this.lineEnd(line));
  }

  positionAt(offset: number): Position {
    const line = this.offsetToLine(offset);
    const start = this.lineToOffset(line);
    return { line, column: Math.min(offset - start, this.lineEnd(line) - start) };
  }

  offsetAt(position: Position): number {
    const start = this.lineToOffset(position.line);
    const end = this.lineEnd(position.line);
    if (position.column < 0 || start + position.column > end) {
      throw new OutOfRangeError(
        `Column ${position.column} is outside line ${position.line} of length ${end - start}`
      );
    }
    return start + position.column;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Validation
  // ─────────────────────────────────────────────────────────────────────────

  isValidOffset(offset: number): boolean {
    return Number.isInteger(offset) && offset >= 0 && offset <= this.length;
  }

  private checkOffset(offset: number): void {
    if (!this.isValidOffset(offset)) {
      throw OutOfRangeError.offset(offset, this.length);
    }
  }

  private checkRange(from: number, to: number): void {
    if (!this.isValidOffset(from) || !this.isValidOffset(to) || from > to) {
      throw OutOfRangeError.range(from, to, this.length);
    }
  }

  private checkLine(line: number): void {
    if (!Number.isInteger(line) || line < 0 || line >= this.lineCount) {
      throw OutOfRangeError.line(line, this.lineCount);
    }
  }
}

// ============================================
// Tree Walks
// ============================================

function collectLeaves(node: RopeNode, parts: string[]): void {
  if (node.kind === 'leaf') {
    parts.push(node.text);
    return;
  }
  for (const child of node.children) {
    collectLeaves(child, parts);
  }
}

/**
 * Offset of the n-th newline (1-based) in the subtree.
 */
function nthNewlineOffset(root: RopeNode, n: number): number {
  let node = root;
  let remaining = n;
  let offset = 0;

  while (node.kind === 'branch') {
    let next: RopeNode | undefined;
    for (const child of node.children) {
      if (child.newlines >= remaining) {
        next = child;
        break;
      }
      remaining -= child.newlines;
      offset += child.length;
    }
    if (!next) return root.length;
    node = next;
  }

  let index = -1;
  for (let i = 0; i < remaining; i++) {
    index = node.text.indexOf('\n', index + 1);
    if (index === -1) return root.length;
  }
  return offset + index;
}

/**
 * Number of newlines strictly before `offset`.
 */
function newlinesBefore(root: RopeNode, offset: number): number {
  let node = root;
  let local = offset;
  let count = 0;

  while (node.kind === 'branch') {
    let next: RopeNode | undefined;
    for (const child of node.children) {
      if (local <= child.length) {
        next = child;
        break;
      }
      local -= child.length;
      count += child.newlines;
    }
    if (!next) return count;
    node = next;
  }

  return count + countNewlines(node.text, 0, local);
}

export default TextBuffer;
