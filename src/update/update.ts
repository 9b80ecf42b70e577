/**
 * Edit Engine
 *
 * update(model, message) → [model, commands]. Synchronous and free of I/O:
 * every message maps to at most one edit batch, committed atomically through
 * Document.commit, and effects are returned as commands for the runtime.
 *
 * Rejected messages (an EditorError such as OutOfRangeError) leave the model
 * untouched: the very same object comes back with no commands.
 */

import type { TextBuffer } from '../core/buffer.ts';
import {
  CursorSet,
  caret,
  cursorFrom,
  cursorTo,
  isCaret,
  selection,
  type Cursor,
  type MotionOptions,
} from '../core/cursor.ts';
import { mapOffset, normalizeBatch, type EditBatch, type EditOp } from '../core/edit.ts';
import { InvalidSearchPatternError, isEditorError } from '../core/errors.ts';
import type { EditKind } from '../core/history.ts';
import { nextWordBoundary, previousWordBoundary, wordRangeAt } from '../core/word.ts';
import { debugLog } from '../debug.ts';
import { expandReplacement, searchIndex, type SearchMatch, type SearchOptions } from '../features/search/search-index.ts';
import { detectLanguage, PLAINTEXT } from '../features/syntax/languages.ts';
import type { Document } from '../state/document.ts';
import { scheduleHighlight, type EditorCommand } from './commands.ts';
import type { EditorMessage, LifecycleMessage, SearchMessage, TextMessage, CursorMessage, ViewportMessage } from './messages.ts';
import { EMPTY_SEARCH, fitLayout, layoutFor, liveSteps, openDocument, type EditorModel, type SearchState } from './model.ts';

export type UpdateResult = [EditorModel, EditorCommand[]];

export function update(model: EditorModel, message: EditorMessage): UpdateResult {
  try {
    return dispatch(model, message);
  } catch (error) {
    if (!isEditorError(error)) throw error;
    debugLog(`[EditEngine] ${message.type} rejected: ${error.message}`);
    return [model, []];
  }
}

/**
 * Apply messages in order, collecting every command.
 */
export function updateAll(model: EditorModel, messages: readonly EditorMessage[]): UpdateResult {
  let current = model;
  const commands: EditorCommand[] = [];
  for (const message of messages) {
    const [next, emitted] = update(current, message);
    current = next;
    commands.push(...emitted);
  }
  return [current, commands];
}

function dispatch(model: EditorModel, message: EditorMessage): UpdateResult {
  switch (message.type) {
    case 'insertText':
    case 'paste':
    case 'deleteBackward':
    case 'deleteForward':
    case 'deleteWordBackward':
    case 'deleteWordForward':
    case 'deleteLine':
    case 'duplicate':
    case 'indent':
    case 'unindent':
      return updateText(model, message);

    case 'moveCursor':
    case 'setCursor':
    case 'extendSelectionTo':
    case 'selectAll':
    case 'selectWord':
    case 'selectLine':
    case 'clearSelection':
    case 'addCursorAbove':
    case 'addCursorBelow':
    case 'toggleCursor':
    case 'removeCursor':
    case 'collapseCursors':
    case 'selectNextOccurrence':
    case 'unselectOccurrence':
    case 'selectAllOccurrences':
    case 'expandSelection':
    case 'shrinkSelection':
    case 'startRectangleSelection':
    case 'updateRectangleSelection':
    case 'finishRectangleSelection':
    case 'cancelRectangleSelection':
      return updateCursors(model, message);

    case 'search':
    case 'findNext':
    case 'findPrevious':
    case 'clearSearch':
    case 'replaceCurrent':
    case 'replaceAll':
      return updateSearch(model, message);

    case 'undo': {
      const document = model.document.undo();
      return document === model.document ? [model, []] : afterEdit(model, document);
    }
    case 'redo': {
      const document = model.document.redo();
      return document === model.document ? [model, []] : afterEdit(model, document);
    }

    case 'copy': {
      const text = selectedText(model.document);
      return text === null ? [model, []] : [model, [{ type: 'setClipboard', text }]];
    }
    case 'cut': {
      const text = selectedText(model.document);
      if (text === null) return [model, []];
      const [next, commands] = editPerCursor(model, cursor => ({ from: cursorFrom(cursor), to: cursorTo(cursor), text: '' }), 'other');
      return [next, [{ type: 'setClipboard', text }, ...commands]];
    }

    case 'scroll':
    case 'scrollToLine':
    case 'resize':
      return updateViewport(model, message);

    case 'load':
    case 'requestLoad':
    case 'save':
    case 'saveCompleted':
    case 'setLanguage':
    case 'configure':
    case 'highlightTick':
      return updateLifecycle(model, message);
  }
}

// ============================================
// Shared steps
// ============================================

/**
 * Scroll so the primary cursor's line is visible.
 */
function reveal(model: EditorModel): UpdateResult {
  const { layout, document, viewport } = model;
  layout.sync(document);
  const line = document.buffer.offsetToLine(document.cursors.primaryCursor.head);
  const scrollTop = layout.scrollToReveal(line, viewport);
  if (scrollTop === viewport.scrollTop) return [model, []];
  return [{ ...model, viewport: { ...viewport, scrollTop } }, [{ type: 'scrollTo', scrollTop }]];
}

function setCursors(model: EditorModel, cursors: CursorSet): UpdateResult {
  if (cursors === model.document.cursors) return [model, []];
  return reveal({ ...model, document: model.document.withCursors(cursors) });
}

/**
 * Everything that follows a committed mutation: layout catches up, the
 * deferred resync is scheduled and the primary cursor is kept in view.
 */
function afterEdit(model: EditorModel, document: Document): UpdateResult {
  const next: EditorModel = { ...model, document, layout: fitLayout({ ...model, document }) };
  const [revealed, commands] = reveal(next);
  return [revealed, [scheduleHighlight(document.revision, model.config.highlightDebounceMs), ...commands]];
}

function commit(model: EditorModel, ops: readonly EditOp[], cursorsAfter: CursorSet, kind: EditKind): UpdateResult {
  const batch = normalizeBatch(ops);
  if (batch.length === 0) return setCursors(model, cursorsAfter);
  return afterEdit(model, model.document.commit(batch, cursorsAfter, kind));
}

interface EditGroup {
  op: EditOp;
  cursors: number;
}

/**
 * One edit per cursor, each cursor landing right after its own inserted
 * text. Edits that would overlap (two deletions reaching into each other)
 * are merged first, and their cursors end up on the same spot.
 */
function editPerCursor(
  model: EditorModel,
  produce: (cursor: Cursor, index: number) => EditOp,
  kind: EditKind
): UpdateResult {
  const current = model.document.cursors;
  const groups: EditGroup[] = [];

  current.cursors.forEach((cursor, index) => {
    let group: EditGroup = { op: produce(cursor, index), cursors: 1 };
    let last = groups[groups.length - 1];
    while (last && group.op.from < last.op.to) {
      groups.pop();
      group = {
        op: {
          from: Math.min(last.op.from, group.op.from),
          to: Math.max(last.op.to, group.op.to),
          text: last.op.text + group.op.text,
        },
        cursors: last.cursors + group.cursors,
      };
      last = groups[groups.length - 1];
    }
    groups.push(group);
  });

  const placed: Cursor[] = [];
  let delta = 0;
  for (const { op, cursors } of groups) {
    const end = op.from + delta + op.text.length;
    for (let i = 0; i < cursors; i++) placed.push(caret(end));
    delta += op.text.length - (op.to - op.from);
  }

  return commit(model, groups.map(group => group.op), current.replaceAll(placed), kind);
}

function lineBreakOf(document: Document): string {
  return document.lineEnding === 'crlf' ? '\r\n' : '\n';
}

function motionOptions(model: EditorModel): MotionOptions {
  return {
    tabSize: model.config.tabSize,
    pageLines: Math.max(1, Math.floor(model.viewport.height / model.config.lineHeight)),
  };
}

function selectedText(document: Document): string | null {
  const parts = document.cursors.cursors
    .filter(cursor => !isCaret(cursor))
    .map(cursor => document.buffer.slice(cursorFrom(cursor), cursorTo(cursor)));
  return parts.length > 0 ? parts.join('\n') : null;
}

// ============================================
// Text
// ============================================

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Start of the character before `offset`; '\r\n' and surrogate pairs count
 * as one character.
 */
function previousCharStart(buffer: TextBuffer, offset: number): number {
  if (offset === 0) return 0;
  if (offset >= 2) {
    const last = buffer.charCodeAt(offset - 1);
    const before = buffer.charCodeAt(offset - 2);
    if ((last === 10 && before === 13) || (isLowSurrogate(last) && isHighSurrogate(before))) return offset - 2;
  }
  return offset - 1;
}

function nextCharEnd(buffer: TextBuffer, offset: number): number {
  if (offset >= buffer.length) return buffer.length;
  if (offset + 1 < buffer.length) {
    const first = buffer.charCodeAt(offset);
    const second = buffer.charCodeAt(offset + 1);
    if ((first === 13 && second === 10) || (isHighSurrogate(first) && isLowSurrogate(second))) return offset + 2;
  }
  return offset + 1;
}

interface LineBlock {
  first: number;
  last: number;
}

/**
 * Line spans covered by the cursors, merged where they overlap. A selection
 * ending at column 0 does not cover that line.
 */
function lineBlocks(buffer: TextBuffer, cursors: readonly Cursor[]): LineBlock[] {
  const blocks: LineBlock[] = [];
  for (const cursor of cursors) {
    const from = cursorFrom(cursor);
    const to = cursorTo(cursor);
    const first = buffer.offsetToLine(from);
    let last = buffer.offsetToLine(to);
    if (to > from && last > first && buffer.lineToOffset(last) === to) last--;

    const prev = blocks[blocks.length - 1];
    if (prev && first <= prev.last) prev.last = Math.max(prev.last, last);
    else blocks.push({ first, last });
  }
  return blocks;
}

function blockOf(buffer: TextBuffer, blocks: readonly LineBlock[], cursor: Cursor): LineBlock | undefined {
  const line = buffer.offsetToLine(cursorFrom(cursor));
  return blocks.find(block => block.first <= line && line <= block.last);
}

/**
 * Range removed by deleting whole lines, including one adjacent line break.
 */
function lineDeletion(buffer: TextBuffer, block: LineBlock): EditOp {
  if (block.last + 1 < buffer.lineCount) {
    return { from: buffer.lineToOffset(block.first), to: buffer.lineToOffset(block.last + 1), text: '' };
  }
  if (block.first > 0) {
    return { from: previousCharStart(buffer, buffer.lineToOffset(block.first)), to: buffer.length, text: '' };
  }
  return { from: 0, to: buffer.length, text: '' };
}

function leadingIndent(text: string, tabSize: number): number {
  if (text.startsWith('\t')) return 1;
  let count = 0;
  while (count < tabSize && text.charAt(count) === ' ') count++;
  return count;
}

function updateText(model: EditorModel, message: TextMessage): UpdateResult {
  const document = model.document;
  const buffer = document.buffer;
  const cursors = document.cursors;

  switch (message.type) {
    case 'insertText': {
      const text = document.normalizeLineBreaks(message.text);
      const kind: EditKind = !text.includes('\n') && !cursors.hasSelection() ? 'typing' : 'other';
      return editPerCursor(model, cursor => ({ from: cursorFrom(cursor), to: cursorTo(cursor), text }), kind);
    }

    case 'paste': {
      // One line per cursor when the clipboard holds exactly that many lines
      const lines = message.text.split(/\r?\n/);
      const distribute = cursors.size > 1 && lines.length === cursors.size;
      const whole = document.normalizeLineBreaks(message.text);
      return editPerCursor(
        model,
        (cursor, index) => ({
          from: cursorFrom(cursor),
          to: cursorTo(cursor),
          text: distribute ? (lines[index] ?? '') : whole,
        }),
        'other'
      );
    }

    case 'deleteBackward':
      return editPerCursor(
        model,
        cursor =>
          isCaret(cursor)
            ? { from: previousCharStart(buffer, cursor.head), to: cursor.head, text: '' }
            : { from: cursorFrom(cursor), to: cursorTo(cursor), text: '' },
        'other'
      );

    case 'deleteForward':
      return editPerCursor(
        model,
        cursor =>
          isCaret(cursor)
            ? { from: cursor.head, to: nextCharEnd(buffer, cursor.head), text: '' }
            : { from: cursorFrom(cursor), to: cursorTo(cursor), text: '' },
        'other'
      );

    case 'deleteWordBackward':
      return editPerCursor(
        model,
        cursor =>
          isCaret(cursor)
            ? { from: previousWordBoundary(buffer, cursor.head), to: cursor.head, text: '' }
            : { from: cursorFrom(cursor), to: cursorTo(cursor), text: '' },
        'other'
      );

    case 'deleteWordForward':
      return editPerCursor(
        model,
        cursor =>
          isCaret(cursor)
            ? { from: cursor.head, to: nextWordBoundary(buffer, cursor.head), text: '' }
            : { from: cursorFrom(cursor), to: cursorTo(cursor), text: '' },
        'other'
      );

    case 'deleteLine': {
      const blocks = lineBlocks(buffer, cursors.cursors);
      const ops = blocks.map(block => lineDeletion(buffer, block));
      const batch = normalizeBatch(ops);
      const placed = cursors.cursors.map(cursor => {
        const block = blockOf(buffer, blocks, cursor);
        const op = block ? lineDeletion(buffer, block) : { from: cursorFrom(cursor) };
        return caret(mapOffset(op.from, batch, -1));
      });
      return commit(model, batch, cursors.replaceAll(placed), 'other');
    }

    case 'duplicate':
      return duplicate(model);

    case 'indent': {
      const unit = ' '.repeat(model.config.tabSize);
      const ops: EditOp[] = [];
      for (const block of lineBlocks(buffer, cursors.cursors)) {
        for (let line = block.first; line <= block.last; line++) {
          const start = buffer.lineToOffset(line);
          ops.push({ from: start, to: start, text: unit });
        }
      }
      const batch = normalizeBatch(ops);
      return commit(model, batch, cursors.applyEdits(batch), 'other');
    }

    case 'unindent': {
      const ops: EditOp[] = [];
      for (const block of lineBlocks(buffer, cursors.cursors)) {
        for (let line = block.first; line <= block.last; line++) {
          const start = buffer.lineToOffset(line);
          const width = leadingIndent(buffer.lineText(line), model.config.tabSize);
          if (width > 0) ops.push({ from: start, to: start + width, text: '' });
        }
      }
      const batch = normalizeBatch(ops);
      return commit(model, batch, cursors.applyEdits(batch), 'other');
    }
  }
}

/**
 * Selections are copied right after themselves and the copy is selected;
 * carets copy their whole lines below and move onto the copy.
 */
function duplicate(model: EditorModel): UpdateResult {
  const document = model.document;
  const buffer = document.buffer;
  const cursors = document.cursors.cursors;
  const eol = lineBreakOf(document);

  const carets = cursors.filter(isCaret);
  const blocks = lineBlocks(buffer, carets);
  const ops: EditOp[] = cursors
    .filter(cursor => !isCaret(cursor))
    .map(cursor => ({ from: cursorTo(cursor), to: cursorTo(cursor), text: buffer.slice(cursorFrom(cursor), cursorTo(cursor)) }));
  const blockText = blocks.map(block => eol + buffer.slice(buffer.lineToOffset(block.first), buffer.lineEnd(block.last)));
  blocks.forEach((block, i) => {
    const end = buffer.lineEnd(block.last);
    ops.push({ from: end, to: end, text: blockText[i] ?? '' });
  });

  const batch: EditBatch = normalizeBatch(ops);
  const placed = cursors.map(cursor => {
    if (isCaret(cursor)) {
      const index = blocks.findIndex(block => block === blockOf(buffer, blocks, cursor));
      return caret(mapOffset(cursor.head, batch, -1) + (blockText[index]?.length ?? 0));
    }
    const start = mapOffset(cursorTo(cursor), batch, -1);
    const end = start + (cursorTo(cursor) - cursorFrom(cursor));
    return cursor.head >= cursor.anchor ? selection(start, end) : selection(end, start);
  });
  return commit(model, batch, document.cursors.replaceAll(placed), 'other');
}

// ============================================
// Cursors
// ============================================

/**
 * Non-overlapping literal occurrences of `needle`.
 */
function occurrences(content: string, needle: string): number[] {
  const found: number[] = [];
  for (let index = content.indexOf(needle); index !== -1; index = content.indexOf(needle, index + needle.length)) {
    found.push(index);
  }
  return found;
}

function updateCursors(model: EditorModel, message: CursorMessage): UpdateResult {
  const document = model.document;
  const buffer = document.buffer;
  const cursors = document.cursors;

  switch (message.type) {
    case 'moveCursor':
      return setCursors(model, cursors.move(buffer, message.direction, message.unit, message.extend, motionOptions(model)));
    case 'setCursor':
      return setCursors(model, cursors.setSingle(message.offset));
    case 'extendSelectionTo':
      return setCursors(model, cursors.setSingle(cursors.primaryCursor.anchor, message.offset));
    case 'selectAll':
      return setCursors(model, cursors.selectAll(buffer));
    case 'selectWord':
      return setCursors(model, cursors.selectWord(buffer));
    case 'selectLine':
      return setCursors(model, cursors.selectLine(buffer));
    case 'clearSelection':
      return setCursors(model, cursors.clearSelections());
    case 'addCursorAbove':
      return setCursors(model, cursors.addCursorAbove(buffer, model.config.tabSize));
    case 'addCursorBelow':
      return setCursors(model, cursors.addCursorBelow(buffer, model.config.tabSize));
    case 'toggleCursor':
      return setCursors(model, cursors.toggleCursorAt(message.offset));
    case 'removeCursor':
      return setCursors(model, cursors.removeAt(message.index));
    case 'collapseCursors':
      return setCursors(model, cursors.collapseToPrimary());

    case 'selectNextOccurrence': {
      const primary = cursors.primaryCursor;
      if (isCaret(primary)) {
        const word = wordRangeAt(buffer, primary.head);
        if (word.from === word.to) return [model, []];
        const replaced = cursors.cursors.map((cursor, i) => (i === cursors.primary ? selection(word.from, word.to) : cursor));
        return setCursors(model, CursorSet.create(replaced, cursors.primary));
      }

      const needle = buffer.slice(cursorFrom(primary), cursorTo(primary));
      const found = occurrences(buffer.toString(), needle);
      const taken = new Set(cursors.cursors.map(cursorFrom));
      const after = found.filter(index => index >= cursorTo(primary));
      const next = [...after, ...found].find(index => !taken.has(index));
      if (next === undefined) return [model, []];
      const added = cursors.addCursor(selection(next, next + needle.length));
      const steps = [...liveSteps(model.occurrences, cursors), { before: cursors, after: added }];
      return setCursors({ ...model, occurrences: steps }, added);
    }

    case 'unselectOccurrence': {
      const steps = liveSteps(model.occurrences, cursors);
      const last = steps[steps.length - 1];
      if (!last) return [model, []];
      return setCursors({ ...model, occurrences: steps.slice(0, -1) }, last.before);
    }

    case 'selectAllOccurrences': {
      const primary = cursors.primaryCursor;
      const range = isCaret(primary) ? wordRangeAt(buffer, primary.head) : { from: cursorFrom(primary), to: cursorTo(primary) };
      if (range.from === range.to) return [model, []];
      const needle = buffer.slice(range.from, range.to);
      const found = occurrences(buffer.toString(), needle);
      const primaryIndex = Math.max(0, found.indexOf(range.from));
      return setCursors(
        model,
        CursorSet.create(
          found.map(index => selection(index, index + needle.length)),
          primaryIndex
        )
      );
    }

    case 'expandSelection': {
      const expanded = cursors.expandSelection(buffer);
      if (expanded === cursors) return [model, []];
      const steps = [...liveSteps(model.expansions, cursors), { before: cursors, after: expanded }];
      return setCursors({ ...model, expansions: steps }, expanded);
    }

    case 'shrinkSelection': {
      const steps = liveSteps(model.expansions, cursors);
      const last = steps[steps.length - 1];
      if (!last) {
        if (!cursors.hasSelection()) return [model, []];
        return setCursors({ ...model, expansions: [] }, cursors.clearSelections());
      }
      return setCursors({ ...model, expansions: steps.slice(0, -1) }, last.before);
    }

    case 'startRectangleSelection': {
      const at = { line: message.line, column: message.column };
      return [{ ...model, rectangle: { start: at, current: at } }, []];
    }

    case 'updateRectangleSelection':
      if (!model.rectangle) return [model, []];
      return [
        { ...model, rectangle: { ...model.rectangle, current: { line: message.line, column: message.column } } },
        [],
      ];

    case 'finishRectangleSelection': {
      if (!model.rectangle) return [model, []];
      const block = CursorSet.fromRectangle(buffer, model.rectangle, model.config.tabSize);
      return setCursors({ ...model, rectangle: null }, block);
    }

    case 'cancelRectangleSelection':
      if (!model.rectangle) return [model, []];
      return [{ ...model, rectangle: null }, []];
  }
}

// ============================================
// Search
// ============================================

/**
 * Run a query. One that does not compile keeps the previous matches while
 * they still describe the current revision, and drops them otherwise.
 */
function runSearch(model: EditorModel, query: string, options: SearchOptions): SearchState {
  const document = model.document;
  try {
    const matches = searchIndex.findAll(document.buffer, query, options);
    const current = searchIndex.nextMatchIndex(matches, cursorFrom(document.cursors.primaryCursor));
    return { query, options, matches, current, error: null, revision: document.revision };
  } catch (error) {
    if (!(error instanceof InvalidSearchPatternError)) throw error;
    debugLog(`[EditEngine] ${error.message}`);
    const failed = { ...model.search, query, options, error: error.message };
    return model.search.revision === document.revision ? failed : { ...failed, matches: [], current: -1 };
  }
}

/**
 * Matches for the current document, recomputed when an edit outdated them.
 */
function freshSearch(model: EditorModel): EditorModel {
  const search = model.search;
  if (!search.query || (search.revision === model.document.revision && search.error === null)) return model;
  return { ...model, search: runSearch(model, search.query, search.options) };
}

/**
 * Fresh matches to navigate or replace, or null while the query is invalid.
 */
function usableSearch(model: EditorModel): EditorModel | null {
  const current = freshSearch(model);
  return current.search.error === null ? current : null;
}

function selectMatch(model: EditorModel, index: number): UpdateResult {
  const match = model.search.matches[index];
  if (!match) return [model, []];
  const next = { ...model, search: { ...model.search, current: index } };
  const [moved, commands] = setCursors(next, next.document.cursors.setSingle(match.from, match.to));
  return [moved, commands];
}

function replacementFor(match: SearchMatch, replacement: string, options: SearchOptions): string {
  return options.regex ? expandReplacement(replacement, match) : replacement;
}

function updateSearch(model: EditorModel, message: SearchMessage): UpdateResult {
  switch (message.type) {
    case 'search': {
      const options = { ...model.search.options, ...message.options };
      if (!message.query) return [{ ...model, search: { ...EMPTY_SEARCH, options } }, []];
      return [{ ...model, search: runSearch(model, message.query, options) }, []];
    }

    case 'clearSearch':
      return [{ ...model, search: { ...EMPTY_SEARCH, options: model.search.options } }, []];

    case 'findNext': {
      const current = usableSearch(model);
      if (!current) return [model, []];
      const primary = current.document.cursors.primaryCursor;
      const index = searchIndex.nextMatchIndex(current.search.matches, cursorTo(primary));
      return index === -1 ? [current, []] : selectMatch(current, index);
    }

    case 'findPrevious': {
      const current = usableSearch(model);
      if (!current) return [model, []];
      const primary = current.document.cursors.primaryCursor;
      const index = searchIndex.previousMatchIndex(current.search.matches, cursorFrom(primary));
      return index === -1 ? [current, []] : selectMatch(current, index);
    }

    case 'replaceCurrent': {
      const current = usableSearch(model);
      if (!current) return [model, []];
      const { matches, options } = current.search;
      const index =
        current.search.current >= 0
          ? current.search.current
          : searchIndex.nextMatchIndex(matches, cursorFrom(current.document.cursors.primaryCursor));
      const match = matches[index];
      if (!match) return [current, []];

      const text = replacementFor(match, message.replacement, options);
      const [edited, commands] = commit(
        current,
        [{ from: match.from, to: match.to, text }],
        current.document.cursors.setSingle(match.from + text.length),
        'other'
      );
      return [{ ...edited, search: runSearch(edited, current.search.query, options) }, commands];
    }

    case 'replaceAll': {
      const current = usableSearch(model);
      if (!current) return [model, []];
      const { matches, options, query } = current.search;
      const edits = searchIndex.replaceAllEdits(current.document.buffer, matches, message.replacement, options);
      if (edits.length === 0) return [current, []];
      const batch = normalizeBatch(edits);
      const [edited, commands] = commit(current, batch, current.document.cursors.applyEdits(batch), 'other');
      return [{ ...edited, search: runSearch(edited, query, options) }, commands];
    }
  }
}

// ============================================
// Viewport
// ============================================

function updateViewport(model: EditorModel, message: ViewportMessage): UpdateResult {
  const { layout, viewport, document } = model;
  layout.sync(document);

  switch (message.type) {
    case 'scroll': {
      const scrollTop = layout.clampScroll(viewport.scrollTop + message.deltaY, viewport);
      if (scrollTop === viewport.scrollTop) return [model, []];
      return [{ ...model, viewport: { ...viewport, scrollTop } }, []];
    }

    case 'scrollToLine': {
      // Validates the line
      document.buffer.lineToOffset(message.line);
      const scrollTop = layout.clampScroll(layout.lineTop(message.line), viewport);
      return [{ ...model, viewport: { ...viewport, scrollTop } }, [{ type: 'scrollTo', scrollTop }]];
    }

    case 'resize': {
      const resized: EditorModel = {
        ...model,
        viewport: { ...viewport, width: Math.max(0, message.width), height: Math.max(0, message.height) },
      };
      const fitted = fitLayout(resized);
      const scrollTop = fitted.clampScroll(viewport.scrollTop, resized.viewport);
      return [{ ...resized, layout: fitted, viewport: { ...resized.viewport, scrollTop } }, []];
    }
  }
}

// ============================================
// Lifecycle
// ============================================

/**
 * Buffer as it was at `revision`, if still reachable.
 */
function bufferAt(document: Document, revision: number): TextBuffer | null {
  if (revision === document.revision) return document.buffer;
  const entry = document.journal.find(candidate => candidate.revision === revision);
  return entry ? entry.after : null;
}

function updateLifecycle(model: EditorModel, message: LifecycleMessage): UpdateResult {
  const document = model.document;

  switch (message.type) {
    case 'load': {
      const loaded = openDocument(message.text, message.path ?? null, message.languageId, model.config);
      const viewport = { ...model.viewport, scrollTop: 0 };
      const next: EditorModel = {
        ...model,
        document: loaded,
        viewport,
        search: { ...EMPTY_SEARCH, options: model.search.options },
        layout: fitLayout({ layout: model.layout, viewport, document: loaded }),
        rectangle: null,
        expansions: [],
        occurrences: [],
      };
      debugLog(`[EditEngine] Loaded ${loaded.path ?? '(untitled)'} as ${loaded.languageId}, ${loaded.lineCount} lines`);
      return [next, [scheduleHighlight(loaded.revision, 0)]];
    }

    case 'requestLoad':
      return [model, [{ type: 'requestLoad', path: message.path }]];

    case 'save':
      return [
        model,
        [
          {
            type: 'requestSave',
            path: message.path ?? document.path,
            text: document.buffer.toString(),
            revision: document.revision,
          },
        ],
      ];

    case 'saveCompleted': {
      if (message.error !== undefined) {
        debugLog(`[EditEngine] Save of revision ${message.revision} failed: ${message.error}`);
        return [model, []];
      }
      const saved = bufferAt(document, message.revision) ?? document.savedBuffer;
      let next = document.markSaved(saved, message.path);
      if (document.path === null && document.languageId === PLAINTEXT) {
        next = next.withLanguage(detectLanguage(message.path));
      }
      const commands = next.languageId !== document.languageId ? [scheduleHighlight(next.revision, 0)] : [];
      return [{ ...model, document: next }, commands];
    }

    case 'setLanguage': {
      const next = document.withLanguage(message.languageId);
      if (next === document) return [model, []];
      return [{ ...model, document: next }, [scheduleHighlight(next.revision, 0)]];
    }

    case 'configure': {
      const config = {
        ...model.config,
        ...message.config,
        search: { ...model.config.search, ...message.config.search },
      };
      const limited = document.withLimits(config.historyLimit, config.journalLimit);
      const layout = layoutFor(model.layout, config, limited, model.viewport);
      const next: EditorModel = {
        ...model,
        config,
        document: limited,
        layout,
        viewport: { ...model.viewport, scrollTop: layout.clampScroll(model.viewport.scrollTop, model.viewport) },
        highlighter: model.highlighter.withOptions({ fullReparseRatio: config.fullReparseRatio }),
        search: message.config.search ? { ...model.search, options: config.search, revision: -1 } : model.search,
      };
      return [freshSearch(next), []];
    }

    case 'highlightTick': {
      if (message.revision !== document.revision) return [model, []];
      model.highlighter.resync(document);
      const failure = model.highlighter.lastError;
      if (failure) debugLog(`[EditEngine] Highlighting degraded: ${failure.message}`);
      const next = document.clearDirty(message.revision);
      return next === document ? [model, []] : [{ ...model, document: next }, []];
    }
  }
}
