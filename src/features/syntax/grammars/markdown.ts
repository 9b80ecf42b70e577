/**
 * Markdown tokenizer. The carried state is the open code fence marker
 * ('' outside a fence).
 */

import type { LineToken } from '../grammar.ts';
import type { LineTokenizer } from '../line-grammar.ts';

const FENCE = /^ {0,3}(`{3,}|~{3,})/;
const HEADING = /^ {0,3}#{1,6}(\s|$)/;
const RULE = /^ {0,3}([-*_])(\s*\1){2,}\s*$/;
const QUOTE = /^ {0,3}>/;
const LIST_MARKER = /^(\s*)([-*+]|\d+[.)])(\s+)/;

interface InlineRule {
  pattern: RegExp;
  scope: string;
}

// Order matters: code spans win over emphasis inside them
const INLINE_RULES: InlineRule[] = [
  { pattern: /`[^`]+`/g, scope: 'markup.inline.raw' },
  { pattern: /\*\*[^*]+\*\*|__[^_]+__/g, scope: 'markup.bold' },
  { pattern: /\*[^*\s][^*]*\*|\b_[^_\s][^_]*_\b/g, scope: 'markup.italic' },
  { pattern: /\[[^\]]*\]\([^)\s]*\)/g, scope: 'markup.underline.link' },
];

function inlineTokens(text: string, offset: number): LineToken[] {
  const tokens: LineToken[] = [];
  const taken: boolean[] = new Array<boolean>(text.length).fill(false);

  for (const rule of INLINE_RULES) {
    rule.pattern.lastIndex = 0;
    for (const match of text.matchAll(rule.pattern)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      if (taken.slice(start, end).some(Boolean)) continue;
      taken.fill(true, start, end);
      tokens.push({ start: start + offset, end: end + offset, scope: rule.scope });
    }
  }
  return tokens;
}

export const markdownTokenizer: LineTokenizer<string> = {
  languageId: 'markdown',
  initialState: '',

  tokenizeLine(text, state) {
    const fence = FENCE.exec(text);

    if (state !== '') {
      const closes = fence !== null && fence[1] !== undefined && fence[1].charAt(0) === state.charAt(0) && fence[1].length >= state.length;
      if (closes) {
        return { tokens: [{ start: 0, end: text.length, scope: 'punctuation.definition.fenced' }], endState: '' };
      }
      return { tokens: [{ start: 0, end: text.length, scope: 'markup.raw.block' }], endState: state };
    }

    if (fence && fence[1] !== undefined) {
      return {
        tokens: [{ start: 0, end: text.length, scope: 'punctuation.definition.fenced' }],
        endState: fence[1],
      };
    }

    if (HEADING.test(text)) {
      return { tokens: [{ start: 0, end: text.length, scope: 'markup.heading' }], endState: '' };
    }
    if (RULE.test(text)) {
      return { tokens: [{ start: 0, end: text.length, scope: 'meta.separator' }], endState: '' };
    }
    if (QUOTE.test(text)) {
      return { tokens: [{ start: 0, end: text.length, scope: 'markup.quote' }], endState: '' };
    }

    const tokens: LineToken[] = [];
    let bodyStart = 0;
    const list = LIST_MARKER.exec(text);
    if (list && list[1] !== undefined && list[2] !== undefined) {
      const start = list[1].length;
      tokens.push({ start, end: start + list[2].length, scope: 'punctuation.definition.list' });
      bodyStart = list[0].length;
    }

    tokens.push(...inlineTokens(text.slice(bodyStart), bodyStart));
    return { tokens, endState: '' };
  },
};
