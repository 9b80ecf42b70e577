/**
 * Tree-sitter Grammar Loader
 *
 * Loads the native tree-sitter binding and its grammar packages on demand.
 * All of them are optional: a binding or grammar that fails to load makes its
 * language unsupported, never an error.
 */

import { createRequire } from 'node:module';
import type Parser from 'tree-sitter';
import { debugLog } from '../../debug.ts';
import { describeError } from '../../core/errors.ts';

const require = createRequire(import.meta.url);

function isParserClass(value: unknown): value is typeof Parser {
  return typeof value === 'function';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

// ============================================
// Language Modules
// ============================================

interface LanguageModule {
  /** npm package providing the grammar */
  packageName: string;
  /** Property of the package export holding the language, if not the export itself */
  property?: string;
}

const languageModules: Record<string, LanguageModule> = {
  'javascript': { packageName: 'tree-sitter-javascript' },
  'typescript': { packageName: 'tree-sitter-typescript', property: 'typescript' },
  'tsx': { packageName: 'tree-sitter-typescript', property: 'tsx' },
  'json': { packageName: 'tree-sitter-json' },
  'python': { packageName: 'tree-sitter-python' },
  'rust': { packageName: 'tree-sitter-rust' },
};

export class TreeSitterLoader {
  private parserClass: typeof Parser | null = null;
  private loadError: string | null = null;
  private attempted = false;
  private languages: Map<string, unknown> = new Map();

  /**
   * Load the native binding once. Returns false when it is unavailable.
   */
  private ensureBinding(): boolean {
    if (this.attempted) return this.parserClass !== null;
    this.attempted = true;

    try {
      const binding: unknown = require('tree-sitter');
      if (!isParserClass(binding)) {
        this.loadError = 'tree-sitter export is not a parser class';
      } else {
        this.parserClass = binding;
      }
    } catch (error) {
      this.loadError = describeError(error);
    }

    if (this.loadError) {
      debugLog(`[TreeSitterLoader] Binding unavailable: ${this.loadError}`);
    }
    return this.parserClass !== null;
  }

  /**
   * Load the language object for a language id, or null.
   */
  loadLanguage(languageId: string): unknown {
    if (this.languages.has(languageId)) return this.languages.get(languageId) ?? null;

    const module = languageModules[languageId];
    let language: unknown = null;
    if (module && this.ensureBinding()) {
      try {
        const exported: unknown = require(module.packageName);
        language = module.property && isRecord(exported) ? exported[module.property] ?? null : exported;
      } catch (error) {
        debugLog(`[TreeSitterLoader] Failed to load grammar for ${languageId}: ${describeError(error)}`);
      }
    }

    this.languages.set(languageId, language);
    return language;
  }

  /**
   * Create a parser for a language, or null when it cannot be loaded.
   */
  createParser(languageId: string): Parser | null {
    const language = this.loadLanguage(languageId);
    if (language === null || !this.parserClass) return null;

    try {
      const parser = new this.parserClass();
      parser.setLanguage(language);
      return parser;
    } catch (error) {
      debugLog(`[TreeSitterLoader] Failed to create parser for ${languageId}: ${describeError(error)}`);
      this.languages.set(languageId, null);
      return null;
    }
  }

  isAvailable(languageId: string): boolean {
    return this.loadLanguage(languageId) !== null;
  }

  getSupportedLanguages(): string[] {
    return Object.keys(languageModules);
  }

  getLoadError(): string | null {
    this.ensureBinding();
    return this.loadError;
  }
}

export const treeSitterLoader = new TreeSitterLoader();

export default treeSitterLoader;
