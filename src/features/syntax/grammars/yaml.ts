/**
 * YAML tokenizer. The carried state is the indentation of the key that opened
 * a block scalar ('|' or '>'), or -1 outside one.
 */

import type { LineToken } from '../grammar.ts';
import type { LineTokenizer } from '../line-grammar.ts';

const DOCUMENT_MARKER = /^(---|\.\.\.)(\s|$)/;
const KEY = /^(\s*)(-\s+)?([^\s#'"\-][^:#]*?|"[^"]*"|'[^']*')\s*:(?=\s|$)/;
const SEQUENCE = /^(\s*)(-)(?=\s|$)/;
const BLOCK_SCALAR = /^[|>][-+]?\d*\s*(#.*)?$/;
const NUMBER = /^[-+]?(\d[\d_]*(\.\d*)?([eE][-+]?\d+)?|\.\d+|0x[0-9a-fA-F]+|0o[0-7]+|\.inf|\.nan)$/;
const CONSTANT = /^(true|false|null|yes|no|on|off|~)$/i;

function indentOf(text: string): number {
  return text.length - text.trimStart().length;
}

/**
 * Start of a comment outside quotes, or -1.
 */
function commentStart(text: string, from: number): number {
  let quote = '';
  for (let i = from; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quote) {
      if (ch === quote) quote = '';
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '#' && (i === 0 || /\s/.test(text.charAt(i - 1)))) {
      return i;
    }
  }
  return -1;
}

function valueScope(value: string): string {
  if (value.startsWith('"')) return 'string.quoted.double';
  if (value.startsWith("'")) return 'string.quoted.single';
  if (value.startsWith('&') || value.startsWith('*')) return 'variable.other.anchor';
  if (value.startsWith('!')) return 'storage.type.tag';
  if (NUMBER.test(value)) return 'constant.numeric';
  if (CONSTANT.test(value)) return 'constant.language';
  return 'string.unquoted';
}

export const yamlTokenizer: LineTokenizer<number> = {
  languageId: 'yaml',
  initialState: -1,

  tokenizeLine(text, state) {
    const indent = indentOf(text);

    if (state >= 0) {
      if (text.trim() === '') return { tokens: [], endState: state };
      if (indent > state) {
        return { tokens: [{ start: indent, end: text.length, scope: 'string.unquoted.block' }], endState: state };
      }
    }

    const tokens: LineToken[] = [];
    if (DOCUMENT_MARKER.test(text)) {
      tokens.push({ start: 0, end: 3, scope: 'entity.other.document' });
      return { tokens, endState: -1 };
    }

    const comment = commentStart(text, 0);
    const content = comment === -1 ? text : text.slice(0, comment);
    if (comment !== -1) {
      tokens.push({ start: comment, end: text.length, scope: 'comment.line' });
    }

    let pos = indent;
    let endState = -1;
    const key = KEY.exec(content);
    if (key && key[1] !== undefined && key[3] !== undefined) {
      pos = key[1].length;
      if (key[2]) {
        tokens.push({ start: pos, end: pos + 1, scope: 'punctuation.definition.block.sequence' });
        pos += key[2].length;
      }
      tokens.push({ start: pos, end: pos + key[3].length, scope: 'entity.name.tag' });
      const colon = key[0].length - 1;
      tokens.push({ start: colon, end: colon + 1, scope: 'punctuation.separator.key-value' });
      pos = key[0].length;
    } else {
      const seq = SEQUENCE.exec(content);
      if (seq && seq[1] !== undefined) {
        tokens.push({ start: seq[1].length, end: seq[1].length + 1, scope: 'punctuation.definition.block.sequence' });
        pos = seq[0].length;
      }
    }

    const rest = content.slice(pos);
    const value = rest.trim();
    if (value) {
      const start = pos + (rest.length - rest.trimStart().length);
      if (BLOCK_SCALAR.test(value)) {
        tokens.push({ start, end: start + value.length, scope: 'keyword.control.flow.block-scalar' });
        endState = indent;
      } else {
        tokens.push({ start, end: start + value.length, scope: valueScope(value) });
      }
    }

    return { tokens, endState };
  },
};
