/**
 * Language Registry Tests
 */

import { describe, test, expect } from 'vitest';
import { PLAINTEXT, detectLanguage, knownLanguages, resolveGrammar } from '../../../../src/features/syntax/languages.ts';

describe('detectLanguage', () => {
  test('maps extensions case-insensitively', () => {
    expect(detectLanguage('src/main.TS')).toBe('typescript');
    expect(detectLanguage('notes.md')).toBe('markdown');
    expect(detectLanguage('config.yml')).toBe('yaml');
    expect(detectLanguage('lib.rs')).toBe('rust');
  });

  test('unknown or missing paths are plaintext', () => {
    expect(detectLanguage('README')).toBe(PLAINTEXT);
    expect(detectLanguage('image.png')).toBe(PLAINTEXT);
    expect(detectLanguage(null)).toBe(PLAINTEXT);
  });
});

describe('resolveGrammar', () => {
  test('line grammars are always available', () => {
    expect(resolveGrammar('markdown')?.languageId).toBe('markdown');
    expect(resolveGrammar('yaml')?.languageId).toBe('yaml');
  });

  test('plaintext has no grammar', () => {
    expect(resolveGrammar(PLAINTEXT)).toBeNull();
    expect(knownLanguages()).toContain('markdown');
  });
});
