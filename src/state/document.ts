/**
 * Document Model
 *
 * Immutable snapshot of an open file: text buffer, cursors, revision, the
 * dirty range of the last edit and a bounded journal of recent edits that
 * derived caches (syntax, layout) replay to catch up incrementally.
 */

import { TextBuffer, type Range } from '../core/buffer.ts';
import { CursorSet } from '../core/cursor.ts';
import { applyBatch, dirtyRangeOf, invertBatch, type EditBatch } from '../core/edit.ts';
import { History, DEFAULT_HISTORY_LIMIT, type EditKind } from '../core/history.ts';

export type LineEnding = 'lf' | 'crlf' | 'mixed';

/**
 * One committed batch. `before` and `after` are the buffers on either side,
 * compared by identity when following the chain.
 */
export interface JournalEntry {
  readonly revision: number;
  readonly before: TextBuffer;
  readonly after: TextBuffer;
  readonly edits: EditBatch;
}

export interface DocumentOptions {
  path?: string | null;
  languageId?: string;
  historyLimit?: number;
  journalLimit?: number;
}

export const DEFAULT_JOURNAL_LIMIT = 64;

interface DocumentFields {
  buffer: TextBuffer;
  cursors: CursorSet;
  revision: number;
  dirty: Range | null;
  journal: readonly JournalEntry[];
  journalLimit: number;
  history: History;
  languageId: string;
  path: string | null;
  lineEnding: LineEnding;
  savedBuffer: TextBuffer;
}

/**
 * Detect the line-ending style of loaded text. Text without line breaks
 * counts as 'lf'.
 */
export function detectLineEnding(text: string): LineEnding {
  let crlf = 0;
  let lf = 0;
  for (let i = text.indexOf('\n'); i !== -1; i = text.indexOf('\n', i + 1)) {
    if (i > 0 && text.charCodeAt(i - 1) === 13) crlf++;
    else lf++;
  }
  if (crlf > 0 && lf > 0) return 'mixed';
  return crlf > 0 ? 'crlf' : 'lf';
}

export class Document implements DocumentFields {
  readonly buffer: TextBuffer;
  readonly cursors: CursorSet;
  readonly revision: number;
  readonly dirty: Range | null;
  readonly journal: readonly JournalEntry[];
  readonly journalLimit: number;
  readonly history: History;
  readonly languageId: string;
  readonly path: string | null;
  readonly lineEnding: LineEnding;
  readonly savedBuffer: TextBuffer;

  private modifiedCache: boolean | null = null;

  private constructor(fields: DocumentFields) {
    this.buffer = fields.buffer;
    this.cursors = fields.cursors;
    this.revision = fields.revision;
    this.dirty = fields.dirty;
    this.journal = fields.journal;
    this.journalLimit = fields.journalLimit;
    this.history = fields.history;
    this.languageId = fields.languageId;
    this.path = fields.path;
    this.lineEnding = fields.lineEnding;
    this.savedBuffer = fields.savedBuffer;
  }

  /**
   * Open a document on loaded text. The cursor starts at offset 0.
   */
  static create(text: string, options: DocumentOptions = {}): Document {
    const buffer = TextBuffer.fromString(text);
    return new Document({
      buffer,
      cursors: CursorSet.single(0),
      revision: 0,
      dirty: null,
      journal: [],
      journalLimit: Math.max(1, options.journalLimit ?? DEFAULT_JOURNAL_LIMIT),
      history: History.empty(options.historyLimit ?? DEFAULT_HISTORY_LIMIT),
      languageId: options.languageId ?? 'plaintext',
      path: options.path ?? null,
      lineEnding: detectLineEnding(text),
      savedBuffer: buffer,
    });
  }

  private with(changes: Partial<DocumentFields>): Document {
    return new Document({ ...this.fields(), ...changes });
  }

  private fields(): DocumentFields {
    return {
      buffer: this.buffer,
      cursors: this.cursors,
      revision: this.revision,
      dirty: this.dirty,
      journal: this.journal,
      journalLimit: this.journalLimit,
      history: this.history,
      languageId: this.languageId,
      path: this.path,
      lineEnding: this.lineEnding,
      savedBuffer: this.savedBuffer,
    };
  }

  get length(): number {
    return this.buffer.length;
  }

  get lineCount(): number {
    return this.buffer.lineCount;
  }

  /**
   * Whether the text differs from what was last loaded or saved.
   */
  get isModified(): boolean {
    if (this.modifiedCache === null) {
      const saved = this.savedBuffer;
      this.modifiedCache =
        this.buffer !== saved && (this.buffer.length !== saved.length || this.buffer.toString() !== saved.toString());
    }
    return this.modifiedCache;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Mutation
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Commit a normalized batch atomically: buffer, cursors, revision, dirty
   * range, journal and history all move together. Throws OutOfRangeError
   * (leaving this document untouched) if the batch does not fit the buffer.
   */
  commit(batch: EditBatch, cursorsAfter: CursorSet, kind: EditKind = 'other'): Document {
    if (batch.length === 0) return this.withCursors(cursorsAfter);
    const before = this.buffer;
    const after = applyBatch(before, batch);
    cursorsAfter.validate(after);

    return this.with({
      ...this.recordEdit(before, after, batch),
      cursors: cursorsAfter,
      history: this.history.record({
        kind,
        forward: batch,
        inverse: invertBatch(before, batch),
        cursorsBefore: this.cursors,
        cursorsAfter,
      }),
    });
  }

  /**
   * Undo the newest history entry. Returns this document when there is
   * nothing to undo.
   */
  undo(): Document {
    const step = this.history.undo();
    if (!step) return this;
    const after = applyBatch(this.buffer, step.entry.inverse);
    return this.with({
      ...this.recordEdit(this.buffer, after, step.entry.inverse),
      cursors: step.entry.cursorsBefore,
      history: step.history,
    });
  }

  redo(): Document {
    const step = this.history.redo();
    if (!step) return this;
    const after = applyBatch(this.buffer, step.entry.forward);
    return this.with({
      ...this.recordEdit(this.buffer, after, step.entry.forward),
      cursors: step.entry.cursorsAfter,
      history: step.history,
    });
  }

  private recordEdit(
    before: TextBuffer,
    after: TextBuffer,
    edits: EditBatch
  ): Pick<DocumentFields, 'buffer' | 'revision' | 'dirty' | 'journal'> {
    const revision = this.revision + 1;
    const journal = [...this.journal, { revision, before, after, edits }];
    return {
      buffer: after,
      revision,
      dirty: dirtyRangeOf(edits),
      journal: journal.length > this.journalLimit ? journal.slice(journal.length - this.journalLimit) : journal,
    };
  }

  /**
   * Replace the cursors without editing. Ends any typing run in history.
   */
  withCursors(cursors: CursorSet): Document {
    if (cursors === this.cursors) return this;
    cursors.validate(this.buffer);
    return this.with({ cursors, history: this.history.seal() });
  }

  withLanguage(languageId: string): Document {
    if (languageId === this.languageId) return this;
    return this.with({ languageId });
  }

  withLimits(historyLimit: number, journalLimit: number): Document {
    const limit = Math.max(1, journalLimit);
    const journal = this.journal.length > limit ? this.journal.slice(this.journal.length - limit) : this.journal;
    return this.with({ history: this.history.withLimit(historyLimit), journal, journalLimit: limit });
  }

  /**
   * Clear the dirty range once the deferred resync for `revision` committed.
   */
  clearDirty(revision: number): Document {
    if (revision !== this.revision || this.dirty === null) return this;
    return this.with({ dirty: null });
  }

  /**
   * Mark `buffer` as the content now on disk, under an optional new path.
   */
  markSaved(buffer: TextBuffer, path: string | null = this.path): Document {
    return this.with({ savedBuffer: buffer, path });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Journal
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Journal entries leading from `buffer` to the current buffer, oldest first.
   * Returns null when the chain is broken (trimmed or a different history).
   */
  journalSince(buffer: TextBuffer): JournalEntry[] | null {
    if (buffer === this.buffer) return [];
    const start = this.journal.findIndex(entry => entry.before === buffer);
    if (start === -1) return null;

    const entries = this.journal.slice(start);
    for (let i = 1; i < entries.length; i++) {
      if (entries[i]?.before !== entries[i - 1]?.after) return null;
    }
    const last = entries[entries.length - 1];
    return last && last.after === this.buffer ? entries : null;
  }

  /**
   * Normalize line breaks of text about to be inserted to the document's style.
   */
  normalizeLineBreaks(text: string): string {
    if (this.lineEnding !== 'crlf') return text;
    return text.replace(/\r?\n/g, '\r\n');
  }
}

export default Document;
