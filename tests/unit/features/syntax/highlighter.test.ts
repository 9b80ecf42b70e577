/**
 * Incremental Highlighter Tests
 */

import { afterEach, describe, test, expect } from 'vitest';
import { CursorSet } from '../../../../src/core/cursor.ts';
import { normalizeBatch } from '../../../../src/core/edit.ts';
import { MalformedParseStateError } from '../../../../src/core/errors.ts';
import { setDebugEnabled, setDebugSink } from '../../../../src/debug.ts';
import type { AnyGrammar } from '../../../../src/features/syntax/grammar.ts';
import { IncrementalHighlighter } from '../../../../src/features/syntax/highlighter.ts';
import { LineStateGrammar } from '../../../../src/features/syntax/line-grammar.ts';
import { markdownTokenizer } from '../../../../src/features/syntax/grammars/markdown.ts';
import { Document } from '../../../../src/state/document.ts';
import { randomInt, seededRandom } from '../../helpers/random.ts';

const markdown = new LineStateGrammar(markdownTokenizer);

const broken: AnyGrammar = {
  languageId: 'broken',
  parse(): never {
    throw new Error('boom');
  },
  reparse(): never {
    throw new Error('boom');
  },
  highlightLine() {
    return [];
  },
};

function resolver(languageId: string): AnyGrammar | null {
  if (languageId === 'markdown') return markdown;
  if (languageId === 'broken') return broken;
  return null;
}

function edit(document: Document, from: number, to: number, text: string): Document {
  return document.commit(normalizeBatch([{ from, to, text }]), CursorSet.single(from + text.length));
}

describe('IncrementalHighlighter', () => {
  afterEach(() => {
    setDebugSink(null);
    setDebugEnabled(false);
  });

  // ─────────────────────────────────────────────────────────────────────────
  // State
  // ─────────────────────────────────────────────────────────────────────────

  describe('state', () => {
    test('idle until the first resync, then fresh', () => {
      const document = Document.create('# a\nb', { languageId: 'markdown' });
      const highlighter = new IncrementalHighlighter(resolver);
      expect(highlighter.stateFor(document)).toEqual({ status: 'idle' });

      highlighter.resync(document);
      expect(highlighter.stateFor(document)).toEqual({ status: 'fresh', revision: 0 });
      expect(highlighter.stats.fullParses).toBe(1);
    });

    test('an edit makes it stale with the inserted ranges as dirty', () => {
      const document = Document.create('# a\nb', { languageId: 'markdown' });
      const highlighter = new IncrementalHighlighter(resolver);
      highlighter.resync(document);

      const edited = edit(document, 5, 5, 'c');
      expect(highlighter.stateFor(edited)).toEqual({ status: 'stale', dirty: [{ from: 5, to: 6 }] });
      expect(highlighter.isFresh(edited)).toBe(false);
    });

    test('resync is idempotent', () => {
      const document = Document.create('# a\nb', { languageId: 'markdown' });
      const highlighter = new IncrementalHighlighter(resolver);
      highlighter.resync(document);
      highlighter.resync(document);
      expect(highlighter.stats).toEqual({ fullParses: 1, incrementalParses: 0 });
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Reparsing
  // ─────────────────────────────────────────────────────────────────────────

  describe('reparsing', () => {
    test('small edits reparse incrementally and keep untouched lines cached', () => {
      const document = Document.create('# a\nb', { languageId: 'markdown' });
      const highlighter = new IncrementalHighlighter(resolver);
      highlighter.lineTokens(document, 0);
      highlighter.lineTokens(document, 1);
      expect(highlighter.cachedLineCount).toBe(2);

      const edited = edit(document, 5, 5, 'c');
      highlighter.resync(edited);
      expect(highlighter.stats).toEqual({ fullParses: 1, incrementalParses: 1 });
      expect(highlighter.hasCachedLine(0)).toBe(true);
      expect(highlighter.hasCachedLine(1)).toBe(false);
      expect(highlighter.stateFor(edited)).toEqual({ status: 'fresh', revision: 1 });
    });

    test('large edits fall back to a full parse', () => {
      const document = Document.create('abcdef\nghij', { languageId: 'markdown' });
      const highlighter = new IncrementalHighlighter(resolver);
      highlighter.resync(document);

      highlighter.resync(edit(document, 0, 10, 'zzzzzzzzzz'));
      expect(highlighter.stats).toEqual({ fullParses: 2, incrementalParses: 0 });
    });

    test('the reparse ratio is configurable', () => {
      const document = Document.create('abcdef\nghij', { languageId: 'markdown' });
      const highlighter = new IncrementalHighlighter(resolver, { fullReparseRatio: 1 });
      highlighter.resync(document);

      highlighter.resync(edit(document, 0, 10, 'zzzzzzzzzz'));
      expect(highlighter.stats).toEqual({ fullParses: 1, incrementalParses: 1 });
    });

    test('a trimmed journal forces a full parse', () => {
      const document = Document.create('one\ntwo', { languageId: 'markdown', journalLimit: 1 });
      const highlighter = new IncrementalHighlighter(resolver);
      highlighter.resync(document);

      const edited = edit(edit(document, 0, 0, 'x'), 5, 5, 'y');
      expect(highlighter.stateFor(edited)).toEqual({ status: 'stale', dirty: [{ from: 0, to: 9 }] });
      highlighter.resync(edited);
      expect(highlighter.stats).toEqual({ fullParses: 2, incrementalParses: 0 });
    });

    test('a warm highlighter agrees with a fresh one through random edits', () => {
      const random = seededRandom(41);
      const fragments = ['```\n', '# h\n', '*x* ', '`c`', '- item\n', 'plain ', '\n', '**b**', '---\n'];
      const pick = (): string => fragments[randomInt(random, fragments.length)] ?? '';

      let document = Document.create(Array.from({ length: 60 }, (_, i) => `line ${i} *a*`).join('\n'), {
        languageId: 'markdown',
      });
      const highlighter = new IncrementalHighlighter(resolver);
      highlighter.highlightsIn(document, 0, document.length);

      for (let round = 0; round < 40; round++) {
        // Several commits per resync, so the journal holds more than one entry
        const commits = 1 + randomInt(random, 3);
        for (let i = 0; i < commits; i++) {
          const from = randomInt(random, document.length + 1);
          if (random() < 0.3) {
            const to = Math.min(document.length, from + randomInt(random, 12));
            document = edit(document, from, to, '');
          } else if (random() < 0.5) {
            const second = randomInt(random, document.length + 1);
            const ops = normalizeBatch([
              { from, to: from, text: pick() },
              { from: second, to: second, text: pick() },
            ]);
            document = document.commit(ops, CursorSet.single(0));
          } else {
            document = edit(document, from, from, pick());
          }
        }

        const incremental = highlighter.highlightsIn(document, 0, document.length);
        const fresh = new IncrementalHighlighter(resolver).highlightsIn(document, 0, document.length);
        expect(incremental).toEqual(fresh);
      }
      expect(highlighter.stats.incrementalParses).toBeGreaterThan(0);
    });

    test('highlights follow the text after a reparse', () => {
      const document = Document.create('one\ntwo\nthree', { languageId: 'markdown' });
      const highlighter = new IncrementalHighlighter(resolver);
      expect(highlighter.lineTokens(document, 2)).toEqual([]);

      const fenced = edit(document, 0, 0, '```\n');
      expect(highlighter.lineTokens(fenced, 3)).toEqual([{ start: 0, end: 5, scope: 'markup.raw.block' }]);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────────────

  describe('queries', () => {
    test('highlightsIn returns document-offset spans overlapping the range', () => {
      const document = Document.create('# a\nb *x*', { languageId: 'markdown' });
      const highlighter = new IncrementalHighlighter(resolver);
      expect(highlighter.highlightsIn(document, 5, 7)).toEqual([{ from: 6, to: 9, scope: 'markup.italic' }]);
      expect(highlighter.highlightsIn(document, 0, 9)).toEqual([
        { from: 0, to: 3, scope: 'markup.heading' },
        { from: 6, to: 9, scope: 'markup.italic' },
      ]);
    });

    test('languages without a grammar produce no highlights', () => {
      const document = Document.create('# a', { languageId: 'plaintext' });
      const highlighter = new IncrementalHighlighter(resolver);
      expect(highlighter.lineTokens(document, 0)).toEqual([]);
      expect(highlighter.stateFor(document)).toEqual({ status: 'fresh', revision: 0 });
    });

    test('changing the language drops the old tree', () => {
      const document = Document.create('# a', { languageId: 'markdown' });
      const highlighter = new IncrementalHighlighter(resolver);
      expect(highlighter.lineTokens(document, 0)).toHaveLength(1);

      const plain = document.withLanguage('plaintext');
      expect(highlighter.stateFor(plain)).toEqual({ status: 'stale', dirty: [{ from: 0, to: 3 }] });
      expect(highlighter.lineTokens(plain, 0)).toEqual([]);
      expect(highlighter.cachedLineCount).toBe(0);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Failures
  // ─────────────────────────────────────────────────────────────────────────

  describe('failures', () => {
    test('a failing grammar degrades to no highlights and logs', () => {
      const lines: string[] = [];
      setDebugEnabled(true);
      setDebugSink(line => lines.push(line));

      const document = Document.create('text', { languageId: 'broken' });
      const highlighter = new IncrementalHighlighter(resolver);
      expect(highlighter.lineTokens(document, 0)).toEqual([]);

      expect(highlighter.lastError).toBeInstanceOf(MalformedParseStateError);
      expect(highlighter.lastError?.message).toBe('[broken] Error: boom');
      expect(lines.some(line => line.endsWith('[Highlighter] [broken] Error: boom'))).toBe(true);
    });

    test('the editor keeps working after a grammar failure', () => {
      const document = Document.create('text', { languageId: 'broken' });
      const highlighter = new IncrementalHighlighter(resolver);
      highlighter.resync(document);

      const edited = edit(document, 4, 4, '!');
      highlighter.resync(edited);
      expect(highlighter.stateFor(edited)).toEqual({ status: 'fresh', revision: 1 });
      expect(edited.buffer.toString()).toBe('text!');
    });
  });
});
