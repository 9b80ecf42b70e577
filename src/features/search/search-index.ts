/**
 * In-File Search
 *
 * Finds all non-overlapping matches of a query in a buffer and turns a
 * replace-all into a single edit batch. Nothing is indexed across edits:
 * every query runs against the current text.
 */

import type { TextBuffer } from '../../core/buffer.ts';
import type { EditOp } from '../../core/edit.ts';
import { InvalidSearchPatternError, describeError } from '../../core/errors.ts';
import { isWholeWordAt } from '../../core/word.ts';

/**
 * Search options for text-based search
 */
export interface SearchOptions {
  caseSensitive: boolean;
  wholeWord: boolean;
  regex: boolean;
}

export const DEFAULT_SEARCH_OPTIONS: SearchOptions = {
  caseSensitive: false,
  wholeWord: false,
  regex: false,
};

/**
 * Search match result
 */
export interface SearchMatch {
  from: number;
  to: number;
  /** Capture groups, index 0 being the whole match */
  captures: readonly (string | undefined)[];
  groups: Readonly<Record<string, string | undefined>> | null;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class SearchIndex {
  /**
   * Compile a query. Throws InvalidSearchPatternError for a bad regex.
   */
  compile(query: string, options: SearchOptions): RegExp {
    const source = options.regex ? query : escapeRegExp(query);
    const flags = options.caseSensitive ? 'gm' : 'gim';
    try {
      return new RegExp(source, flags);
    } catch (error) {
      throw new InvalidSearchPatternError(query, describeError(error));
    }
  }

  /**
   * All matches in document order. Empty matches are skipped.
   */
  findAll(buffer: TextBuffer, query: string, options: SearchOptions = DEFAULT_SEARCH_OPTIONS): SearchMatch[] {
    if (!query) return [];
    const regex = this.compile(query, options);
    const content = buffer.toString();
    const matches: SearchMatch[] = [];

    let match: RegExpExecArray | null;
    while ((match = regex.exec(content)) !== null) {
      const from = match.index;
      const to = from + match[0].length;

      if (to === from) {
        regex.lastIndex = from + 1;
        continue;
      }
      if (options.wholeWord && !isWholeWordAt(content, from, to)) {
        regex.lastIndex = from + 1;
        continue;
      }

      matches.push({
        from,
        to,
        captures: options.regex ? [...match] : [match[0]],
        groups: options.regex && match.groups ? { ...match.groups } : null,
      });
    }

    return matches;
  }

  /**
   * One edit per match replacing it with `replacement`. In regex mode the
   * replacement expands $&, $1..$99, $<name> and $$.
   */
  replaceAllEdits(
    buffer: TextBuffer,
    matches: readonly SearchMatch[],
    replacement: string,
    options: SearchOptions = DEFAULT_SEARCH_OPTIONS
  ): EditOp[] {
    const edits: EditOp[] = [];
    let lastEnd = 0;
    for (const match of matches) {
      if (match.from < lastEnd || match.to > buffer.length) continue;
      edits.push({
        from: match.from,
        to: match.to,
        text: options.regex ? expandReplacement(replacement, match) : replacement,
      });
      lastEnd = match.to;
    }
    return edits;
  }

  /**
   * Index of the first match starting at or after `offset`, wrapping to 0.
   */
  nextMatchIndex(matches: readonly SearchMatch[], offset: number): number {
    if (matches.length === 0) return -1;
    const index = matches.findIndex(match => match.from >= offset);
    return index === -1 ? 0 : index;
  }

  /**
   * Index of the last match ending at or before `offset`, wrapping to the end.
   */
  previousMatchIndex(matches: readonly SearchMatch[], offset: number): number {
    if (matches.length === 0) return -1;
    for (let i = matches.length - 1; i >= 0; i--) {
      const match = matches[i];
      if (match && match.to <= offset) return i;
    }
    return matches.length - 1;
  }
}

/**
 * Expand $-references in a replacement template against a regex match.
 * Unknown references are kept literally.
 */
export function expandReplacement(template: string, match: SearchMatch): string {
  let result = '';
  let i = 0;
  while (i < template.length) {
    const ch = template.charAt(i);
    if (ch !== '$' || i + 1 >= template.length) {
      result += ch;
      i++;
      continue;
    }

    const next = template.charAt(i + 1);
    if (next === '$') {
      result += '$';
      i += 2;
    } else if (next === '&') {
      result += match.captures[0] ?? '';
      i += 2;
    } else if (next === '<') {
      const close = template.indexOf('>', i + 2);
      const name = close === -1 ? '' : template.slice(i + 2, close);
      if (match.groups && close !== -1 && name in match.groups) {
        result += match.groups[name] ?? '';
        i = close + 1;
      } else {
        result += '$';
        i++;
      }
    } else if (next >= '0' && next <= '9') {
      // Prefer a two-digit group when it exists
      const two = template.slice(i + 1, i + 3);
      if (/^\d\d$/.test(two) && Number(two) > 0 && Number(two) < match.captures.length) {
        result += match.captures[Number(two)] ?? '';
        i += 3;
      } else if (Number(next) > 0 && Number(next) < match.captures.length) {
        result += match.captures[Number(next)] ?? '';
        i += 2;
      } else {
        result += '$';
        i++;
      }
    } else {
      result += '$';
      i++;
    }
  }
  return result;
}

export const searchIndex = new SearchIndex();

export default searchIndex;
