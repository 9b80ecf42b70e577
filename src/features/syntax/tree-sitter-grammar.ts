/**
 * Tree-sitter Grammar
 *
 * Incremental parsing through the native binding. The parser streams text
 * out of the rope chunk by chunk; highlights come from mapping leaf node
 * types (and a little parent context) to TextMate-style scopes.
 */

import type { Range, TextBuffer } from '../../core/buffer.ts';
import type { TextChange } from '../../core/edit.ts';
import { normalizeLineTokens, type Grammar, type LineToken, type ReparseResult } from './grammar.ts';
import type Parser from 'tree-sitter';

/**
 * Map tree-sitter node types to TextMate-style scopes
 */
const NODE_TYPE_TO_SCOPE: Record<string, string> = {
  // Comments
  'comment': 'comment',
  'line_comment': 'comment.line',
  'block_comment': 'comment.block',
  'doc_comment': 'comment.block.documentation',

  // Strings
  'string_fragment': 'string',
  'string_content': 'string',
  'escape_sequence': 'constant.character.escape',
  'regex_pattern': 'string.regexp',
  'char_literal': 'string',

  // Numbers
  'number': 'constant.numeric',
  'integer': 'constant.numeric',
  'float': 'constant.numeric',
  'integer_literal': 'constant.numeric',
  'float_literal': 'constant.numeric',

  // Booleans and null
  'true': 'constant.language.boolean.true',
  'false': 'constant.language.boolean.false',
  'null': 'constant.language.null',
  'undefined': 'constant.language.undefined',
  'none': 'constant.language.null',
  'boolean_literal': 'constant.language.boolean',

  // Keywords - Control flow
  'if': 'keyword.control.conditional',
  'else': 'keyword.control.conditional',
  'elif': 'keyword.control.conditional',
  'match': 'keyword.control.conditional',
  'switch': 'keyword.control.conditional',
  'case': 'keyword.control.conditional',
  'for': 'keyword.control.loop',
  'while': 'keyword.control.loop',
  'loop': 'keyword.control.loop',
  'do': 'keyword.control.loop',
  'break': 'keyword.control.flow',
  'continue': 'keyword.control.flow',
  'return': 'keyword.control.flow',
  'throw': 'keyword.control.flow',
  'raise': 'keyword.control.flow',
  'try': 'keyword.control.trycatch',
  'catch': 'keyword.control.trycatch',
  'except': 'keyword.control.trycatch',
  'finally': 'keyword.control.trycatch',
  'yield': 'keyword.control.flow',
  'await': 'keyword.control.flow',

  // Keywords - Declarations
  'const': 'keyword.declaration',
  'let': 'keyword.declaration',
  'var': 'keyword.declaration',
  'function': 'keyword.declaration.function',
  'fn': 'keyword.declaration.function',
  'def': 'keyword.declaration.function',
  'lambda': 'keyword.declaration.function',
  'class': 'keyword.declaration.class',
  'struct': 'keyword.declaration.struct',
  'impl': 'keyword.declaration.impl',
  'trait': 'keyword.declaration.trait',
  'interface': 'keyword.declaration.interface',
  'type': 'keyword.declaration.type',
  'enum': 'keyword.declaration.enum',
  'namespace': 'keyword.declaration.namespace',
  'mod': 'keyword.declaration.module',
  'import': 'keyword.control.import',
  'use': 'keyword.control.import',
  'export': 'keyword.control.export',
  'from': 'keyword.control.from',
  'as': 'keyword.control.as',
  'default': 'keyword.control.default',

  // Keywords - Modifiers
  'public': 'keyword.modifier',
  'private': 'keyword.modifier',
  'protected': 'keyword.modifier',
  'pub': 'keyword.modifier',
  'mut': 'keyword.modifier',
  'static': 'keyword.modifier',
  'readonly': 'keyword.modifier',
  'abstract': 'keyword.modifier',
  'async': 'keyword.modifier.async',
  'extends': 'keyword.modifier',
  'implements': 'keyword.modifier',

  // Keywords - Other
  'new': 'keyword.operator.new',
  'this': 'variable.language.this',
  'super': 'variable.language.super',
  'self': 'variable.language.self',
  'typeof': 'keyword.operator.typeof',
  'instanceof': 'keyword.operator.instanceof',
  'in': 'keyword.operator.in',
  'of': 'keyword.operator.of',
  'delete': 'keyword.operator.delete',
  'void': 'keyword.operator.void',
  'not': 'keyword.operator.logical',
  'and': 'keyword.operator.logical',
  'or': 'keyword.operator.logical',

  // Types
  'type_identifier': 'entity.name.type',
  'predefined_type': 'support.type.primitive',
  'primitive_type': 'support.type.primitive',

  // Identifiers
  'property_identifier': 'variable.other.property',
  'shorthand_property_identifier': 'variable.other.property',
  'shorthand_property_identifier_pattern': 'variable.other.property',
  'field_identifier': 'variable.other.property',

  // JSX/TSX
  'jsx_text': 'string.jsx',

  // Rust specific
  'lifetime': 'storage.modifier.lifetime',
};

/**
 * Scopes inherited by every leaf inside a node of these types (quotes,
 * delimiters and interpolation punctuation included).
 */
const CONTAINER_SCOPES: Record<string, string> = {
  'string': 'string',
  'string_literal': 'string',
  'raw_string_literal': 'string',
  'template_string': 'string.template',
  'regex': 'string.regexp',
  'comment': 'comment',
  'line_comment': 'comment.line',
  'block_comment': 'comment.block',
};

/**
 * Map operator symbols to scopes
 */
const OPERATOR_SCOPES: Record<string, string> = {
  '=': 'keyword.operator.assignment',
  '==': 'keyword.operator.comparison',
  '===': 'keyword.operator.comparison',
  '!=': 'keyword.operator.comparison',
  '!==': 'keyword.operator.comparison',
  '<': 'keyword.operator.comparison',
  '>': 'keyword.operator.comparison',
  '<=': 'keyword.operator.comparison',
  '>=': 'keyword.operator.comparison',
  '+': 'keyword.operator.arithmetic',
  '-': 'keyword.operator.arithmetic',
  '*': 'keyword.operator.arithmetic',
  '/': 'keyword.operator.arithmetic',
  '%': 'keyword.operator.arithmetic',
  '**': 'keyword.operator.arithmetic',
  '++': 'keyword.operator.arithmetic',
  '--': 'keyword.operator.arithmetic',
  '+=': 'keyword.operator.assignment.compound',
  '-=': 'keyword.operator.assignment.compound',
  '*=': 'keyword.operator.assignment.compound',
  '/=': 'keyword.operator.assignment.compound',
  '&&': 'keyword.operator.logical',
  '||': 'keyword.operator.logical',
  '!': 'keyword.operator.logical',
  '&': 'keyword.operator.bitwise',
  '|': 'keyword.operator.bitwise',
  '^': 'keyword.operator.bitwise',
  '~': 'keyword.operator.bitwise',
  '<<': 'keyword.operator.bitwise',
  '>>': 'keyword.operator.bitwise',
  '>>>': 'keyword.operator.bitwise',
  '?': 'keyword.operator.ternary',
  '=>': 'keyword.operator.arrow',
  '->': 'keyword.operator.arrow',
  '...': 'keyword.operator.spread',
  '?.': 'keyword.operator.optional',
  '??': 'keyword.operator.nullish',
};

const NAME_SCOPES: Record<string, string> = {
  'function_declaration': 'entity.name.function',
  'generator_function_declaration': 'entity.name.function',
  'method_definition': 'entity.name.function',
  'function_definition': 'entity.name.function',
  'function_item': 'entity.name.function',
  'class_declaration': 'entity.name.class',
  'class_definition': 'entity.name.class',
  'struct_item': 'entity.name.type',
  'enum_item': 'entity.name.type',
  'interface_declaration': 'entity.name.type',
  'type_alias_declaration': 'entity.name.type',
};

const PARAMETER_PARENTS = new Set([
  'required_parameter',
  'optional_parameter',
  'formal_parameters',
  'parameters',
  'parameter',
]);

/**
 * Scope of a leaf node, using its parent for names, calls and properties.
 */
function getScopeForNode(node: Parser.SyntaxNode): string | null {
  const direct = NODE_TYPE_TO_SCOPE[node.type];
  if (direct) return direct;

  const operator = OPERATOR_SCOPES[node.type];
  if (operator) return operator;

  const parent = node.parent;
  if (!parent) return null;

  const nameScope = NAME_SCOPES[parent.type];
  if (nameScope && isSameNode(parent.childForFieldName('name'), node)) {
    return nameScope;
  }

  if (parent.type === 'call_expression' || parent.type === 'call') {
    const callee = parent.childForFieldName('function');
    if (isSameNode(callee, node)) return 'entity.name.function';
  }
  if (parent.type === 'member_expression' && isSameNode(parent.childForFieldName('property'), node)) {
    const grand = parent.parent;
    if (grand && grand.type === 'call_expression' && isSameNode(grand.childForFieldName('function'), parent)) {
      return 'entity.name.function';
    }
    return 'variable.other.property';
  }
  if (parent.type === 'macro_invocation' && isSameNode(parent.childForFieldName('macro'), node)) {
    return 'entity.name.function.macro';
  }
  if (PARAMETER_PARENTS.has(parent.type) && node.type === 'identifier') {
    return 'variable.parameter';
  }
  if (parent.type === 'pair' && isSameNode(parent.childForFieldName('key'), node)) {
    return 'variable.other.property';
  }
  if (parent.type === 'decorator') {
    return 'entity.name.decorator';
  }

  return null;
}

function isSameNode(a: Parser.SyntaxNode | null, b: Parser.SyntaxNode): boolean {
  return a !== null && a.startIndex === b.startIndex && a.endIndex === b.endIndex && a.type === b.type;
}

// ============================================
// Grammar
// ============================================

export interface TreeWalkStats {
  /** Nodes the cursor stepped onto while highlighting lines */
  visitedNodes: number;
}

export class TreeSitterGrammar implements Grammar<Parser.Tree> {
  readonly languageId: string;
  readonly stats: TreeWalkStats = { visitedNodes: 0 };
  private readonly parser: Parser;

  constructor(languageId: string, parser: Parser) {
    this.languageId = languageId;
    this.parser = parser;
  }

  private input(source: TextBuffer): Parser.Input {
    return index => (index >= source.length ? null : source.chunkAt(index));
  }

  parse(source: TextBuffer): Parser.Tree {
    return this.parser.parse(this.input(source));
  }

  reparse(tree: Parser.Tree, source: TextBuffer, edits: readonly TextChange[]): ReparseResult<Parser.Tree> {
    for (const edit of edits) {
      tree.edit(edit);
    }
    const next = this.parser.parse(this.input(source), tree);
    const changedRanges: Range[] = tree
      .getChangedRanges(next)
      .map(range => ({ from: range.startIndex, to: Math.min(range.endIndex, source.length) }));
    return { tree: next, changedRanges };
  }

  highlightLine(tree: Parser.Tree, source: TextBuffer, line: number): LineToken[] {
    const lineStart = source.lineToOffset(line);
    const lineEnd = source.lineEnd(line);
    if (lineEnd === lineStart) return [];

    const tokens: LineToken[] = [];
    this.collectTokens(tree.walk(), lineStart, lineEnd, null, tokens);
    return normalizeLineTokens(tokens, lineEnd - lineStart);
  }

  /**
   * Walk the nodes intersecting [lineStart, lineEnd), emitting leaf tokens.
   * Each level jumps straight to the first child reaching the line, so a
   * line costs the depth of the tree, not the number of nodes before it.
   */
  private collectTokens(
    cursor: Parser.TreeCursor,
    lineStart: number,
    lineEnd: number,
    inherited: string | null,
    tokens: LineToken[]
  ): void {
    const scope = CONTAINER_SCOPES[cursor.nodeType] ?? inherited;

    if (!cursor.gotoFirstChildForIndex(lineStart)) {
      // Every child ends before the line
      if (cursor.gotoFirstChild()) {
        cursor.gotoParent();
        return;
      }
      const leafScope = getScopeForNode(cursor.currentNode) ?? scope;
      if (leafScope) {
        tokens.push({
          start: Math.max(cursor.startIndex, lineStart) - lineStart,
          end: Math.min(cursor.endIndex, lineEnd) - lineStart,
          scope: leafScope,
        });
      }
      return;
    }

    do {
      this.stats.visitedNodes++;
      if (cursor.endIndex <= lineStart) continue;
      if (cursor.startIndex >= lineEnd) break;
      this.collectTokens(cursor, lineStart, lineEnd, scope, tokens);
    } while (cursor.gotoNextSibling());
    cursor.gotoParent();
  }
}
