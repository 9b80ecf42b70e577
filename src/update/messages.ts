/**
 * Editor Messages
 *
 * Everything the runtime can ask the editor to do. Offsets are UTF-16
 * positions in the current buffer.
 */

import type { Direction, GridPosition, MotionUnit } from '../core/cursor.ts';
import type { SearchOptions } from '../features/search/search-index.ts';
import type { EditorConfig } from '../config/settings.ts';

// ============================================
// Text
// ============================================

export type TextMessage =
  | { type: 'insertText'; text: string }
  | { type: 'paste'; text: string }
  | { type: 'deleteBackward' }
  | { type: 'deleteForward' }
  | { type: 'deleteWordBackward' }
  | { type: 'deleteWordForward' }
  | { type: 'deleteLine' }
  | { type: 'duplicate' }
  | { type: 'indent' }
  | { type: 'unindent' };

// ============================================
// Cursors and selections
// ============================================

export type CursorMessage =
  | { type: 'moveCursor'; direction: Direction; unit: MotionUnit; extend: boolean }
  | { type: 'setCursor'; offset: number }
  | { type: 'extendSelectionTo'; offset: number }
  | { type: 'selectAll' }
  | { type: 'selectWord' }
  | { type: 'selectLine' }
  | { type: 'clearSelection' }
  | { type: 'addCursorAbove' }
  | { type: 'addCursorBelow' }
  | { type: 'toggleCursor'; offset: number }
  | { type: 'removeCursor'; index: number }
  | { type: 'collapseCursors' }
  | { type: 'selectNextOccurrence' }
  | { type: 'unselectOccurrence' }
  | { type: 'selectAllOccurrences' }
  | { type: 'expandSelection' }
  | { type: 'shrinkSelection' }
  /** Columns are visual cells, tabs expanded */
  | ({ type: 'startRectangleSelection' } & GridPosition)
  | ({ type: 'updateRectangleSelection' } & GridPosition)
  | { type: 'finishRectangleSelection' }
  | { type: 'cancelRectangleSelection' };

// ============================================
// Search and replace
// ============================================

export type SearchMessage =
  | { type: 'search'; query: string; options?: Partial<SearchOptions> }
  | { type: 'findNext' }
  | { type: 'findPrevious' }
  | { type: 'clearSearch' }
  | { type: 'replaceCurrent'; replacement: string }
  | { type: 'replaceAll'; replacement: string };

// ============================================
// History and clipboard
// ============================================

export type HistoryMessage = { type: 'undo' } | { type: 'redo' };

export type ClipboardMessage = { type: 'copy' } | { type: 'cut' };

// ============================================
// Viewport
// ============================================

export type ViewportMessage =
  | { type: 'scroll'; deltaY: number }
  | { type: 'scrollToLine'; line: number }
  | { type: 'resize'; width: number; height: number };

// ============================================
// Document lifecycle and settings
// ============================================

export type LifecycleMessage =
  | { type: 'load'; text: string; path?: string | null; languageId?: string }
  | { type: 'requestLoad'; path: string }
  | { type: 'save'; path?: string }
  | { type: 'saveCompleted'; revision: number; path: string; error?: string }
  | { type: 'setLanguage'; languageId: string }
  | { type: 'configure'; config: Partial<EditorConfig> }
  | { type: 'highlightTick'; revision: number };

export type EditorMessage =
  | TextMessage
  | CursorMessage
  | SearchMessage
  | HistoryMessage
  | ClipboardMessage
  | ViewportMessage
  | LifecycleMessage;

export type MessageType = EditorMessage['type'];
