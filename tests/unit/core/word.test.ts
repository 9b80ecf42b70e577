/**
 * Word Class Tests
 */

import { describe, test, expect } from 'vitest';
import { TextBuffer } from '../../../src/core/buffer.ts';
import {
  charClass,
  isWholeWordAt,
  nextWordBoundary,
  previousWordBoundary,
  wordEndInLine,
  wordRangeAt,
  wordStartInLine,
} from '../../../src/core/word.ts';

describe('charClass', () => {
  test('classifies characters', () => {
    expect(charClass(' ')).toBe('whitespace');
    expect(charClass('\t')).toBe('whitespace');
    expect(charClass('.')).toBe('punctuation');
    expect(charClass('(')).toBe('punctuation');
    expect(charClass('a')).toBe('word');
    expect(charClass('_')).toBe('word');
    expect(charClass('9')).toBe('word');
  });
});

describe('line-local word steps', () => {
  test('stepping right skips whitespace then one run', () => {
    const text = 'foo  bar.baz';
    expect(wordEndInLine(text, 0)).toBe(3);
    expect(wordEndInLine(text, 3)).toBe(8);
    expect(wordEndInLine(text, 8)).toBe(9);
    expect(wordEndInLine(text, 12)).toBe(12);
  });

  test('stepping left mirrors it', () => {
    const text = 'foo  bar.baz';
    expect(wordStartInLine(text, 12)).toBe(9);
    expect(wordStartInLine(text, 9)).toBe(8);
    expect(wordStartInLine(text, 8)).toBe(5);
    expect(wordStartInLine(text, 5)).toBe(0);
  });
});

describe('buffer word boundaries', () => {
  const buffer = TextBuffer.fromString('ab cd\nef');

  test('cross line breaks at line edges', () => {
    expect(nextWordBoundary(buffer, 5)).toBe(6);
    expect(previousWordBoundary(buffer, 6)).toBe(5);
  });

  test('stay at document edges', () => {
    expect(nextWordBoundary(buffer, 8)).toBe(8);
    expect(previousWordBoundary(buffer, 0)).toBe(0);
  });

  test('move within a line', () => {
    expect(nextWordBoundary(buffer, 0)).toBe(2);
    expect(previousWordBoundary(buffer, 5)).toBe(3);
  });
});

describe('wordRangeAt', () => {
  const buffer = TextBuffer.fromString('hello world');

  test('inside a word', () => {
    expect(wordRangeAt(buffer, 3)).toEqual({ from: 0, to: 5 });
  });

  test('right after a word prefers the word', () => {
    expect(wordRangeAt(buffer, 5)).toEqual({ from: 0, to: 5 });
    expect(wordRangeAt(buffer, 11)).toEqual({ from: 6, to: 11 });
  });

  test('empty line gives an empty range', () => {
    const empty = TextBuffer.fromString('a\n\nb');
    expect(wordRangeAt(empty, 2)).toEqual({ from: 2, to: 2 });
  });

  test('whitespace gives an empty range', () => {
    const spaced = TextBuffer.fromString('a    b');
    expect(wordRangeAt(spaced, 3)).toEqual({ from: 3, to: 3 });
    expect(wordRangeAt(TextBuffer.fromString('  x'), 0)).toEqual({ from: 0, to: 0 });
  });

  test('punctuation runs still form a range', () => {
    expect(wordRangeAt(TextBuffer.fromString('a == b'), 3)).toEqual({ from: 2, to: 4 });
  });
});

describe('isWholeWordAt', () => {
  test('requires non-word neighbours', () => {
    expect(isWholeWordAt('a cat.', 2, 5)).toBe(true);
    expect(isWholeWordAt('concat', 3, 6)).toBe(false);
    expect(isWholeWordAt('cats', 0, 3)).toBe(false);
    expect(isWholeWordAt('cat', 0, 3)).toBe(true);
  });
});
