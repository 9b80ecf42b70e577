/**
 * Editor Model
 *
 * The value threaded through update(). Document, viewport, search state and
 * config are immutable. Layout and highlighter are derived caches keyed by
 * buffer identity and shared between successive models; their metrics and
 * options never change in place, so a model answers the same way however
 * many models were derived from it.
 */

import { DEFAULT_EDITOR_CONFIG, type EditorConfig } from '../config/settings.ts';
import { DEFAULT_SEARCH_OPTIONS, type SearchMatch, type SearchOptions } from '../features/search/search-index.ts';
import { IncrementalHighlighter } from '../features/syntax/highlighter.ts';
import { detectLanguage, resolveGrammar, type GrammarResolver } from '../features/syntax/languages.ts';
import { ViewportLayout, type LayoutMetrics, type Viewport } from '../layout/viewport-layout.ts';
import type { CursorSet, RectangleSelection } from '../core/cursor.ts';
import { Document } from '../state/document.ts';

export interface SearchState {
  readonly query: string;
  readonly options: SearchOptions;
  readonly matches: readonly SearchMatch[];
  /** Index into matches, -1 when none is current */
  readonly current: number;
  readonly error: string | null;
  /** Document revision the matches were computed for */
  readonly revision: number;
}

export const EMPTY_SEARCH: SearchState = {
  query: '',
  options: DEFAULT_SEARCH_OPTIONS,
  matches: [],
  current: -1,
  error: null,
  revision: -1,
};

/**
 * A cursor change that can be stepped back. Only valid while the document's
 * cursors are still `after`; any other cursor change leaves it stale.
 */
export interface SelectionStep {
  readonly before: CursorSet;
  readonly after: CursorSet;
}

export interface EditorModel {
  readonly document: Document;
  readonly viewport: Viewport;
  readonly search: SearchState;
  readonly config: EditorConfig;
  readonly layout: ViewportLayout;
  readonly highlighter: IncrementalHighlighter;
  /** Block selection being dragged, null when none is */
  readonly rectangle: RectangleSelection | null;
  /** expandSelection steps, undone by shrinkSelection */
  readonly expansions: readonly SelectionStep[];
  /** Cursors added by selectNextOccurrence, undone by unselectOccurrence */
  readonly occurrences: readonly SelectionStep[];
}

/**
 * The steps still in force: all of them when the last one produced the
 * current cursors, none otherwise.
 */
export function liveSteps(steps: readonly SelectionStep[], cursors: CursorSet): readonly SelectionStep[] {
  const last = steps[steps.length - 1];
  return last && last.after === cursors ? steps : [];
}

export interface ModelOptions {
  text?: string;
  path?: string | null;
  languageId?: string;
  config?: Partial<EditorConfig>;
  viewport?: Partial<Viewport>;
  resolveGrammar?: GrammarResolver;
}

export const DEFAULT_VIEWPORT: Viewport = { scrollTop: 0, width: 800, height: 600 };

export function layoutMetricsOf(config: EditorConfig): Partial<LayoutMetrics> {
  return {
    lineHeight: config.lineHeight,
    charWidth: config.charWidth,
    tabSize: config.tabSize,
    wordWrap: config.wordWrap,
    gutterMinDigits: config.gutterMinDigits,
    gutterPadding: config.gutterPadding,
    prefetchLines: config.prefetchLines,
  };
}

/**
 * Open a document with the given config.
 */
export function openDocument(text: string, path: string | null, languageId: string | undefined, config: EditorConfig): Document {
  return Document.create(text, {
    path,
    languageId: languageId ?? detectLanguage(path),
    historyLimit: config.historyLimit,
    journalLimit: config.journalLimit,
  });
}

/**
 * Pixel width left for text once the gutter is drawn.
 */
export function textAreaWidth(model: Pick<EditorModel, 'layout' | 'viewport' | 'document'>): number {
  const { layout, viewport, document } = model;
  return Math.max(0, viewport.width - layout.gutterWidth(document) - layout.settings.textPadding);
}

/**
 * The model's layout fitted to its current viewport and gutter, synced with
 * its document.
 */
export function fitLayout(model: Pick<EditorModel, 'layout' | 'viewport' | 'document'>): ViewportLayout {
  const layout = model.layout.withTextWidth(textAreaWidth(model));
  layout.sync(model.document);
  return layout;
}

/**
 * Layout for `config`, reusing `current` when its metrics already match.
 */
export function layoutFor(
  current: ViewportLayout,
  config: EditorConfig,
  document: Document,
  viewport: Viewport
): ViewportLayout {
  return fitLayout({ layout: current.withMetrics(layoutMetricsOf(config)), viewport, document });
}

export function createModel(options: ModelOptions = {}): EditorModel {
  const config: EditorConfig = {
    ...DEFAULT_EDITOR_CONFIG,
    ...options.config,
    search: { ...DEFAULT_EDITOR_CONFIG.search, ...options.config?.search },
  };
  const document = openDocument(options.text ?? '', options.path ?? null, options.languageId, config);
  const viewport = { ...DEFAULT_VIEWPORT, ...options.viewport };
  return {
    document,
    viewport,
    search: { ...EMPTY_SEARCH, options: config.search },
    config,
    layout: fitLayout({ layout: new ViewportLayout(layoutMetricsOf(config)), viewport, document }),
    highlighter: new IncrementalHighlighter(options.resolveGrammar ?? resolveGrammar, {
      fullReparseRatio: config.fullReparseRatio,
    }),
    rectangle: null,
    expansions: [],
    occurrences: [],
  };
}
