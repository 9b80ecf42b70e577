/**
 * Language Registry
 *
 * Picks a language id from a file path and resolves the grammar for it.
 */

import * as path from 'node:path';
import type { AnyGrammar } from './grammar.ts';
import { LineStateGrammar } from './line-grammar.ts';
import { markdownTokenizer } from './grammars/markdown.ts';
import { yamlTokenizer } from './grammars/yaml.ts';
import { TreeSitterGrammar } from './tree-sitter-grammar.ts';
import { treeSitterLoader } from './tree-sitter-loader.ts';

export const PLAINTEXT = 'plaintext';

const EXTENSION_TO_LANGUAGE: Record<string, string> = {
  '.js': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.tsx': 'tsx',
  '.json': 'json',
  '.py': 'python',
  '.pyi': 'python',
  '.rs': 'rust',
  '.md': 'markdown',
  '.markdown': 'markdown',
  '.yml': 'yaml',
  '.yaml': 'yaml',
};

/**
 * Language id for a file path; plaintext when the extension is unknown.
 */
export function detectLanguage(filePath: string | null | undefined): string {
  if (!filePath) return PLAINTEXT;
  const ext = path.extname(filePath).toLowerCase();
  return EXTENSION_TO_LANGUAGE[ext] ?? PLAINTEXT;
}

export type GrammarResolver = (languageId: string) => AnyGrammar | null;

const lineGrammars: Record<string, AnyGrammar> = {
  'markdown': new LineStateGrammar(markdownTokenizer),
  'yaml': new LineStateGrammar(yamlTokenizer),
};

/**
 * Grammar for a language id, or null when the language has no highlighting
 * (plaintext, unknown ids, tree-sitter grammars that are not installed).
 * Tree-sitter grammars get a fresh parser per call.
 */
export function resolveGrammar(languageId: string): AnyGrammar | null {
  const line = lineGrammars[languageId];
  if (line) return line;

  const parser = treeSitterLoader.createParser(languageId);
  return parser ? new TreeSitterGrammar(languageId, parser) : null;
}

export function knownLanguages(): string[] {
  return [PLAINTEXT, ...Object.keys(lineGrammars), ...treeSitterLoader.getSupportedLanguages()];
}
