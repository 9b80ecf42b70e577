/**
 * Strata editing core
 *
 * Rope buffer, multi-cursor editing, incremental highlighting and viewport
 * layout behind a single update(model, message) entry point.
 */

export { TextBuffer, type Position, type Range } from './core/buffer.ts';
export {
  CursorSet,
  caret,
  selection,
  cursorFrom,
  cursorTo,
  isCaret,
  type Cursor,
  type Direction,
  type MotionUnit,
  type MotionOptions,
  type GridPosition,
  type RectangleSelection,
} from './core/cursor.ts';
export {
  normalizeBatch,
  applyBatch,
  mapOffset,
  invertBatch,
  describeChanges,
  type EditOp,
  type EditBatch,
  type TextChange,
} from './core/edit.ts';
export {
  EditorError,
  OutOfRangeError,
  MalformedParseStateError,
  InvalidSearchPatternError,
  InvalidEditBatchError,
  SettingsValidationError,
  isEditorError,
  type EditorErrorCode,
} from './core/errors.ts';
export { History, type EditKind, type HistoryEntry } from './core/history.ts';
export { visualColumn, columnAtVisual, displayWidth } from './core/char-width.ts';

export { Document, type DocumentOptions, type JournalEntry, type LineEnding } from './state/document.ts';

export { IncrementalHighlighter, type HighlighterState, type HighlighterOptions } from './features/syntax/highlighter.ts';
export type { Grammar, AnyGrammar, HighlightSpan, LineToken, ReparseResult } from './features/syntax/grammar.ts';
export { LineStateGrammar, type LineTokenizer } from './features/syntax/line-grammar.ts';
export { detectLanguage, resolveGrammar, knownLanguages, PLAINTEXT, type GrammarResolver } from './features/syntax/languages.ts';
export { treeSitterLoader } from './features/syntax/tree-sitter-loader.ts';

export {
  SearchIndex,
  searchIndex,
  expandReplacement,
  DEFAULT_SEARCH_OPTIONS,
  type SearchOptions,
  type SearchMatch,
} from './features/search/search-index.ts';

export { HeightMap } from './layout/height-map.ts';
export {
  ViewportLayout,
  wrapLine,
  DEFAULT_LAYOUT_METRICS,
  type LayoutMetrics,
  type LineLayout,
  type LineSegment,
  type Viewport,
} from './layout/viewport-layout.ts';

export {
  Settings,
  settings,
  defaultSettings,
  configFromSettings,
  DEFAULT_EDITOR_CONFIG,
  type EditorSettings,
  type EditorConfig,
} from './config/settings.ts';
export { SettingsLoader, settingsLoader } from './config/settings-loader.ts';

export { update, updateAll, type UpdateResult } from './update/update.ts';
export { createModel, type EditorModel, type ModelOptions, type SearchState, type SelectionStep } from './update/model.ts';
export { renderFrame, type RenderFrame, type RenderLine, type RenderCaret, type SelectionRect } from './update/render.ts';
export type { EditorMessage } from './update/messages.ts';
export type { EditorCommand } from './update/commands.ts';

export { debugLog, isDebugEnabled, setDebugEnabled, setDebugLogPath, setDebugSink } from './debug.ts';
