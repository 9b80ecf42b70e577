/**
 * Tree-sitter Grammar Tests
 */

import { describe, test, expect } from 'vitest';
import { TextBuffer } from '../../../../src/core/buffer.ts';
import { CursorSet } from '../../../../src/core/cursor.ts';
import { normalizeBatch } from '../../../../src/core/edit.ts';
import { IncrementalHighlighter } from '../../../../src/features/syntax/highlighter.ts';
import { resolveGrammar } from '../../../../src/features/syntax/languages.ts';
import { TreeSitterGrammar } from '../../../../src/features/syntax/tree-sitter-grammar.ts';
import { treeSitterLoader } from '../../../../src/features/syntax/tree-sitter-loader.ts';
import { Document } from '../../../../src/state/document.ts';
import { randomInt, seededRandom } from '../../helpers/random.ts';

function javascriptGrammar(): TreeSitterGrammar {
  const parser = treeSitterLoader.createParser('javascript');
  if (!parser) throw new Error(`javascript grammar unavailable: ${treeSitterLoader.getLoadError() ?? 'not installed'}`);
  return new TreeSitterGrammar('javascript', parser);
}

describe('TreeSitterLoader', () => {
  test('loads the javascript grammar', () => {
    expect(treeSitterLoader.getLoadError()).toBeNull();
    expect(treeSitterLoader.isAvailable('javascript')).toBe(true);
  });

  test('unknown languages are never available', () => {
    expect(treeSitterLoader.isAvailable('cobol')).toBe(false);
    expect(treeSitterLoader.createParser('cobol')).toBeNull();
    expect(treeSitterLoader.getSupportedLanguages()).toContain('typescript');
  });
});

describe('TreeSitterGrammar', () => {
  test('highlights keywords and literals', () => {
    const document = Document.create('const x = 1;', { languageId: 'javascript' });
    const highlighter = new IncrementalHighlighter(resolveGrammar);
    const tokens = highlighter.lineTokens(document, 0);
    expect(tokens).toContainEqual({ start: 0, end: 5, scope: 'keyword.declaration' });
    expect(tokens).toContainEqual({ start: 10, end: 11, scope: 'constant.numeric' });
  });

  test('incremental reparse agrees with a fresh parse', () => {
    const document = Document.create('let a = "x";\nfoo(a);\n', { languageId: 'javascript' });
    const highlighter = new IncrementalHighlighter(resolveGrammar);
    highlighter.resync(document);

    const edited = document.commit(normalizeBatch([{ from: 13, to: 13, text: '// ' }]), CursorSet.single(16));
    const incremental = highlighter.highlightsIn(edited, 0, edited.length);
    expect(highlighter.stats.incrementalParses).toBe(1);

    const fresh = new IncrementalHighlighter(resolveGrammar).highlightsIn(edited, 0, edited.length);
    expect(incremental).toEqual(fresh);
  });

  test('incremental reparses agree with fresh parses through random edits', () => {
    const random = seededRandom(5);
    const statements = [
      'const a = 1;',
      'let b = "two";',
      'foo(a, b);',
      '// note',
      'if (a) { b = 3; }',
      'function f(x) { return x + 1; }',
    ];
    const pick = (): string => statements[randomInt(random, statements.length)] ?? '';

    let document = Document.create(Array.from({ length: 40 }, (_, i) => statements[i % statements.length]).join('\n') + '\n', {
      languageId: 'javascript',
    });
    const highlighter = new IncrementalHighlighter(resolveGrammar);
    highlighter.highlightsIn(document, 0, document.length);

    for (let round = 0; round < 30; round++) {
      const commits = 1 + randomInt(random, 3);
      for (let i = 0; i < commits; i++) {
        const buffer = document.buffer;
        // Whole statements are inserted or removed at line starts so the text stays valid
        const line = randomInt(random, buffer.lineCount - 1);
        const start = buffer.lineToOffset(line);
        const batch =
          random() < 0.4 && buffer.lineCount > 3
            ? normalizeBatch([{ from: start, to: buffer.lineToOffset(line + 1), text: '' }])
            : normalizeBatch([{ from: start, to: start, text: pick() + '\n' }]);
        document = document.commit(batch, CursorSet.single(0));
      }

      const incremental = highlighter.highlightsIn(document, 0, document.length);
      const fresh = new IncrementalHighlighter(resolveGrammar).highlightsIn(document, 0, document.length);
      expect(incremental).toEqual(fresh);
    }
    expect(highlighter.stats.incrementalParses).toBeGreaterThan(0);
  });

  test('highlighting a line costs the same however many lines come before it', () => {
    const grammar = javascriptGrammar();

    function stepsForLastLine(lines: number): number {
      const buffer = TextBuffer.fromString(Array.from({ length: lines }, (_, i) => `const v${i} = ${i};`).join('\n'));
      const tree = grammar.parse(buffer);
      grammar.stats.visitedNodes = 0;
      const tokens = grammar.highlightLine(tree, buffer, lines - 1);
      expect(tokens[0]).toEqual({ start: 0, end: 5, scope: 'keyword.declaration' });
      return grammar.stats.visitedNodes;
    }

    const small = stepsForLastLine(200);
    const large = stepsForLastLine(20_000);
    expect(large).toBe(small);
    expect(small).toBeLessThan(20);
  });
});
