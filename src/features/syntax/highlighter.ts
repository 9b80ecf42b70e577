/**
 * Incremental Highlighter
 *
 * Keeps a syntax tree and a per-line span cache in step with a document.
 * Between edits and the deferred resync the highlighter is stale; resync
 * replays the document's edit journal into the grammar's incremental reparse
 * and drops cached lines only where the text or the tree changed.
 *
 *   idle ──parse──▶ fresh(revision) ──edit──▶ stale(dirty) ──resync──▶ reparsing ──▶ fresh
 */

import type { Range, TextBuffer } from '../../core/buffer.ts';
import { describeChanges, insertedRanges, type TextChange } from '../../core/edit.ts';
import { MalformedParseStateError, describeError } from '../../core/errors.ts';
import { debugLog } from '../../debug.ts';
import type { Document, JournalEntry } from '../../state/document.ts';
import type { AnyGrammar, HighlightSpan, LineToken } from './grammar.ts';
import { resolveGrammar, type GrammarResolver } from './languages.ts';

export type HighlighterState =
  | { status: 'idle' }
  | { status: 'stale'; dirty: Range[] }
  | { status: 'reparsing' }
  | { status: 'fresh'; revision: number };

export interface HighlighterOptions {
  /** Fall back to a full parse when edits cover more than this share of the document */
  fullReparseRatio: number;
}

export const DEFAULT_HIGHLIGHTER_OPTIONS: HighlighterOptions = {
  fullReparseRatio: 0.5,
};

export interface HighlighterStats {
  fullParses: number;
  incrementalParses: number;
}

export class IncrementalHighlighter {
  private readonly resolve: GrammarResolver;
  private readonly options: HighlighterOptions;

  private languageId: string | null = null;
  private grammar: AnyGrammar | null = null;
  private tree: unknown = null;
  private syncedBuffer: TextBuffer | null = null;
  private syncedRevision = -1;
  private reparsing = false;
  private lineCache: Map<number, LineToken[]> = new Map();
  private error: MalformedParseStateError | null = null;

  readonly stats: HighlighterStats = { fullParses: 0, incrementalParses: 0 };

  constructor(resolve: GrammarResolver = resolveGrammar, options: Partial<HighlighterOptions> = {}) {
    this.resolve = resolve;
    this.options = { ...DEFAULT_HIGHLIGHTER_OPTIONS, ...options };
  }

  get settings(): Readonly<HighlighterOptions> {
    return this.options;
  }

  /**
   * Highlighter with changed options, or this one when nothing changes.
   * The new one starts idle and parses on first use.
   */
  withOptions(options: Partial<HighlighterOptions>): IncrementalHighlighter {
    const next = { ...this.options, ...options };
    if (next.fullReparseRatio === this.options.fullReparseRatio) return this;
    return new IncrementalHighlighter(this.resolve, next);
  }

  /**
   * Last grammar failure, cleared by the next successful parse.
   */
  get lastError(): MalformedParseStateError | null {
    return this.error;
  }

  get revision(): number {
    return this.syncedRevision;
  }

  /**
   * State relative to a document.
   */
  stateFor(document: Document): HighlighterState {
    if (this.reparsing) return { status: 'reparsing' };
    if (this.syncedBuffer === null) return { status: 'idle' };
    if (this.syncedBuffer === document.buffer && this.languageId === document.languageId) {
      return { status: 'fresh', revision: this.syncedRevision };
    }
    const entries = document.journalSince(this.syncedBuffer) ?? [];
    const dirty = entries.length > 0 ? entries.flatMap(entry => insertedRanges(entry.edits)) : [{ from: 0, to: document.length }];
    return { status: 'stale', dirty };
  }

  isFresh(document: Document): boolean {
    return this.stateFor(document).status === 'fresh';
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Resync
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Bring the tree up to date with the document. Idempotent when fresh.
   */
  resync(document: Document): void {
    if (document.languageId !== this.languageId) {
      this.setLanguage(document.languageId);
    }
    if (this.syncedBuffer === document.buffer) return;

    this.reparsing = true;
    try {
      this.reparse(document);
      this.error = null;
    } catch (error) {
      this.degrade(error);
    } finally {
      this.reparsing = false;
    }

    this.syncedBuffer = document.buffer;
    this.syncedRevision = document.revision;
  }

  private setLanguage(languageId: string): void {
    this.languageId = languageId;
    this.grammar = this.resolve(languageId);
    this.tree = null;
    this.syncedBuffer = null;
    this.syncedRevision = -1;
    this.lineCache.clear();
    debugLog(`[Highlighter] Language ${languageId}: ${this.grammar ? 'grammar loaded' : 'no grammar'}`);
  }

  private reparse(document: Document): void {
    const grammar = this.grammar;
    if (!grammar) return;

    const entries = this.tree !== null && this.syncedBuffer ? document.journalSince(this.syncedBuffer) : null;
    if (!entries) {
      this.fullParse(grammar, document.buffer);
      return;
    }

    const dirtySize = entries.reduce((sum, entry) => sum + entryDirtySize(entry), 0);
    if (dirtySize > this.options.fullReparseRatio * Math.max(1, document.length)) {
      debugLog(`[Highlighter] Dirty size ${dirtySize} exceeds reparse ratio, parsing in full`);
      this.fullParse(grammar, document.buffer);
      return;
    }

    const changes: TextChange[] = [];
    for (const entry of entries) {
      const entryChanges = describeChanges(entry.before, entry.edits);
      for (const change of entryChanges) {
        this.shiftLines(change);
      }
      changes.push(...entryChanges);
    }

    const result = grammar.reparse(this.tree, document.buffer, changes);
    this.tree = result.tree;
    this.stats.incrementalParses++;

    for (const range of result.changedRanges) {
      this.invalidateRange(document.buffer, range);
    }
  }

  private fullParse(grammar: AnyGrammar, buffer: TextBuffer): void {
    this.lineCache.clear();
    this.tree = grammar.parse(buffer);
    this.stats.fullParses++;
  }

  private degrade(error: unknown): void {
    const failure =
      error instanceof MalformedParseStateError
        ? error
        : new MalformedParseStateError(this.languageId ?? 'unknown', describeError(error));
    this.error = failure;
    this.tree = null;
    this.lineCache.clear();
    debugLog(`[Highlighter] ${failure.message}`);
  }

  /**
   * Re-key cached lines after one applied change: lines it touched are
   * dropped, lines after it move by its line delta.
   */
  private shiftLines(change: TextChange): void {
    const startRow = change.startPosition.row;
    const oldEndRow = change.oldEndPosition.row;
    const delta = change.newEndPosition.row - oldEndRow;
    if (this.lineCache.size === 0) return;

    const next = new Map<number, LineToken[]>();
    for (const [line, tokens] of this.lineCache) {
      if (line < startRow) next.set(line, tokens);
      else if (line > oldEndRow) next.set(line + delta, tokens);
    }
    this.lineCache = next;
  }

  private invalidateRange(buffer: TextBuffer, range: Range): void {
    const from = Math.min(range.from, buffer.length);
    const to = Math.min(Math.max(range.to, from), buffer.length);
    const first = buffer.offsetToLine(from);
    const last = buffer.offsetToLine(to);
    for (let line = first; line <= last; line++) {
      this.lineCache.delete(line);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Tokens of one line (line-relative columns), computed lazily and cached.
   */
  lineTokens(document: Document, line: number): LineToken[] {
    this.resync(document);
    const cached = this.lineCache.get(line);
    if (cached) return cached;

    const grammar = this.grammar;
    if (!grammar || this.tree === null) return [];

    let tokens: LineToken[];
    try {
      tokens = grammar.highlightLine(this.tree, document.buffer, line);
    } catch (error) {
      this.degrade(error);
      return [];
    }
    this.lineCache.set(line, tokens);
    return tokens;
  }

  /**
   * Spans overlapping [from, to), sorted by offset.
   */
  highlightsIn(document: Document, from: number, to: number): HighlightSpan[] {
    this.resync(document);
    const buffer = document.buffer;
    const start = Math.max(0, Math.min(from, buffer.length));
    const end = Math.max(start, Math.min(to, buffer.length));
    const first = buffer.offsetToLine(start);
    const last = buffer.offsetToLine(end);

    const spans: HighlightSpan[] = [];
    for (let line = first; line <= last; line++) {
      const lineStart = buffer.lineToOffset(line);
      for (const token of this.lineTokens(document, line)) {
        const span = { from: lineStart + token.start, to: lineStart + token.end, scope: token.scope };
        if (span.to > start && span.from < end) spans.push(span);
      }
    }
    return spans;
  }

  /**
   * Number of cached lines (exposed for cache behaviour checks).
   */
  get cachedLineCount(): number {
    return this.lineCache.size;
  }

  hasCachedLine(line: number): boolean {
    return this.lineCache.has(line);
  }
}

function entryDirtySize(entry: JournalEntry): number {
  let size = 0;
  for (const op of entry.edits) {
    size += Math.max(op.text.length, op.to - op.from);
  }
  return size;
}
