/**
 * Line-State Grammar
 *
 * Backend for languages a per-line tokenizer can describe. Each line is
 * tokenized from the state the previous line ended in; the tree is just the
 * start state of every line. Reparsing re-tokenizes from the first edited
 * line until a line's end state matches the state stored for the next one.
 */

import type { Range, TextBuffer } from '../../core/buffer.ts';
import type { TextChange } from '../../core/edit.ts';
import { MalformedParseStateError } from '../../core/errors.ts';
import { normalizeLineTokens, type Grammar, type LineToken, type ReparseResult } from './grammar.ts';

export interface LineTokenizer<S> {
  readonly languageId: string;
  readonly initialState: S;
  tokenizeLine(text: string, state: S): { tokens: LineToken[]; endState: S };
  equalStates?(a: S, b: S): boolean;
}

export interface LineStateTree<S> {
  /** Start state of each line; length equals the line count */
  readonly states: readonly S[];
}

export class LineStateGrammar<S> implements Grammar<LineStateTree<S>> {
  readonly languageId: string;
  private readonly tokenizer: LineTokenizer<S>;

  constructor(tokenizer: LineTokenizer<S>) {
    this.tokenizer = tokenizer;
    this.languageId = tokenizer.languageId;
  }

  private equal(a: S, b: S): boolean {
    return this.tokenizer.equalStates ? this.tokenizer.equalStates(a, b) : Object.is(a, b);
  }

  parse(source: TextBuffer): LineStateTree<S> {
    const states: S[] = [this.tokenizer.initialState];
    let state = this.tokenizer.initialState;
    for (let line = 0; line + 1 < source.lineCount; line++) {
      state = this.tokenizer.tokenizeLine(source.lineText(line), state).endState;
      states.push(state);
    }
    return { states };
  }

  reparse(tree: LineStateTree<S>, source: TextBuffer, edits: readonly TextChange[]): ReparseResult<LineStateTree<S>> {
    const states: Array<S | null> = [...tree.states];
    let dirty: number[] = [];

    for (const edit of edits) {
      const startRow = edit.startPosition.row;
      const oldEndRow = edit.oldEndPosition.row;
      const newEndRow = edit.newEndPosition.row;
      if (startRow >= states.length || oldEndRow >= states.length) {
        throw new MalformedParseStateError(this.languageId, `edit at row ${oldEndRow} outside tree of ${states.length} lines`);
      }

      const delta = newEndRow - oldEndRow;
      states.splice(startRow + 1, oldEndRow - startRow, ...new Array<S | null>(newEndRow - startRow).fill(null));

      const shifted: number[] = [];
      for (const line of dirty) {
        if (line < startRow) shifted.push(line);
        else if (line > oldEndRow) shifted.push(line + delta);
      }
      for (let line = startRow; line <= newEndRow; line++) shifted.push(line);
      dirty = shifted;
    }

    if (states.length !== source.lineCount) {
      throw new MalformedParseStateError(
        this.languageId,
        `tree has ${states.length} lines after edits, source has ${source.lineCount}`
      );
    }

    const dirtyLines = [...new Set(dirty)].sort((a, b) => a - b);
    const changedRanges: Range[] = [];
    let runStart = -1;
    let runEnd = -1;
    let next = 0;
    let line = dirtyLines[0] ?? source.lineCount;

    while (line < source.lineCount) {
      const state = states[line];
      if (state === undefined || state === null) {
        throw new MalformedParseStateError(this.languageId, `missing start state for line ${line}`);
      }
      if (runStart === -1) runStart = line;
      runEnd = line;

      const { endState } = this.tokenizer.tokenizeLine(source.lineText(line), state);
      while (next < dirtyLines.length && (dirtyLines[next] ?? Infinity) <= line) next++;

      const following = line + 1;
      if (following >= source.lineCount) break;

      const stored = states[following];
      const followingDirty = dirtyLines[next] === following;
      if (!followingDirty && stored !== null && stored !== undefined && this.equal(stored, endState)) {
        // Converged: jump to the next edited line
        changedRanges.push(this.lineRange(source, runStart, runEnd));
        runStart = -1;
        line = dirtyLines[next] ?? source.lineCount;
        continue;
      }

      states[following] = endState;
      line = following;
    }

    if (runStart !== -1) changedRanges.push(this.lineRange(source, runStart, runEnd));

    const finalStates: S[] = [];
    for (const state of states) {
      if (state === null) throw new MalformedParseStateError(this.languageId, 'unresolved line state after reparse');
      finalStates.push(state);
    }
    return { tree: { states: finalStates }, changedRanges };
  }

  highlightLine(tree: LineStateTree<S>, source: TextBuffer, line: number): LineToken[] {
    const state = tree.states[line];
    if (state === undefined) {
      throw new MalformedParseStateError(this.languageId, `no state for line ${line}`);
    }
    const text = source.lineText(line);
    return normalizeLineTokens(this.tokenizer.tokenizeLine(text, state).tokens, text.length);
  }

  private lineRange(source: TextBuffer, first: number, last: number): Range {
    return { from: source.lineToOffset(first), to: source.lineEnd(last) };
  }
}
