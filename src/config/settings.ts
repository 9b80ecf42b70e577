/**
 * Settings Manager
 *
 * Manages editor configuration with VS Code compatible dotted keys.
 * The pure update step never reads this class; it consumes an
 * EditorConfig snapshot taken with toConfig().
 */

import type { SearchOptions } from '../features/search/search-index.ts';

export interface EditorSettings {
  'editor.tabSize': number;
  'editor.wordWrap': 'off' | 'on';
  'editor.lineHeight': number;
  'editor.charWidth': number;
  'editor.gutter.minDigits': number;
  'editor.gutter.padding': number;
  'editor.layout.prefetchLines': number;
  'editor.highlight.fullReparseRatio': number;
  'editor.highlight.debounceMs': number;
  'editor.history.limit': number;
  'editor.journal.limit': number;
  'search.caseSensitive': boolean;
  'search.wholeWord': boolean;
  'search.regex': boolean;
}

export type SettingKey = keyof EditorSettings;

export const defaultSettings: Readonly<EditorSettings> = {
  'editor.tabSize': 4,
  'editor.wordWrap': 'off',
  'editor.lineHeight': 20,
  'editor.charWidth': 8,
  'editor.gutter.minDigits': 3,
  'editor.gutter.padding': 8,
  'editor.layout.prefetchLines': 10,
  'editor.highlight.fullReparseRatio': 0.5,
  'editor.highlight.debounceMs': 30,
  'editor.history.limit': 1000,
  'editor.journal.limit': 64,
  'search.caseSensitive': false,
  'search.wholeWord': false,
  'search.regex': false,
};

/**
 * Plain snapshot handed to the update step.
 */
export interface EditorConfig {
  tabSize: number;
  wordWrap: boolean;
  lineHeight: number;
  charWidth: number;
  gutterMinDigits: number;
  gutterPadding: number;
  prefetchLines: number;
  fullReparseRatio: number;
  highlightDebounceMs: number;
  historyLimit: number;
  journalLimit: number;
  search: SearchOptions;
}

export function configFromSettings(values: Readonly<EditorSettings>): EditorConfig {
  return {
    tabSize: values['editor.tabSize'],
    wordWrap: values['editor.wordWrap'] === 'on',
    lineHeight: values['editor.lineHeight'],
    charWidth: values['editor.charWidth'],
    gutterMinDigits: values['editor.gutter.minDigits'],
    gutterPadding: values['editor.gutter.padding'],
    prefetchLines: values['editor.layout.prefetchLines'],
    fullReparseRatio: values['editor.highlight.fullReparseRatio'],
    highlightDebounceMs: values['editor.highlight.debounceMs'],
    historyLimit: values['editor.history.limit'],
    journalLimit: values['editor.journal.limit'],
    search: {
      caseSensitive: values['search.caseSensitive'],
      wholeWord: values['search.wholeWord'],
      regex: values['search.regex'],
    },
  };
}

export const DEFAULT_EDITOR_CONFIG: EditorConfig = configFromSettings(defaultSettings);

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(defaultSettings, key);
}

export class Settings {
  private settings: EditorSettings;
  private listeners: Map<SettingKey, Set<() => void>> = new Map();

  constructor(initial: Partial<EditorSettings> = {}) {
    this.settings = { ...defaultSettings };
    this.update(initial);
  }

  /**
   * Get a setting value
   */
  get<K extends SettingKey>(key: K): EditorSettings[K] {
    return this.settings[key];
  }

  /**
   * Set a setting value
   */
  set<K extends SettingKey>(key: K, value: EditorSettings[K]): void {
    const oldValue = this.settings[key];
    this.settings[key] = value;

    if (oldValue !== value) {
      this.notifyListeners(key);
    }
  }

  /**
   * Get all settings
   */
  getAll(): EditorSettings {
    return { ...this.settings };
  }

  /**
   * Update multiple settings. Undefined values are skipped.
   */
  update(partial: Partial<EditorSettings>): void {
    for (const key of Object.keys(partial)) {
      if (isSettingKey(key)) this.assign(key, partial);
    }
  }

  private assign<K extends SettingKey>(key: K, source: Partial<EditorSettings>): void {
    const value = source[key];
    if (value !== undefined) this.set(key, value);
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    const previous = this.settings;
    this.settings = { ...defaultSettings };
    for (const key of this.listeners.keys()) {
      if (previous[key] !== this.settings[key]) this.notifyListeners(key);
    }
  }

  /**
   * Listen for changes to a specific setting
   */
  onChange<K extends SettingKey>(key: K, callback: (value: EditorSettings[K]) => void): () => void {
    let keyListeners = this.listeners.get(key);
    if (!keyListeners) {
      keyListeners = new Set();
      this.listeners.set(key, keyListeners);
    }
    const listener = () => callback(this.settings[key]);
    keyListeners.add(listener);

    return () => {
      this.listeners.get(key)?.delete(listener);
    };
  }

  toConfig(): EditorConfig {
    return configFromSettings(this.settings);
  }

  private notifyListeners(key: SettingKey): void {
    const keyListeners = this.listeners.get(key);
    if (keyListeners) {
      for (const listener of keyListeners) {
        listener();
      }
    }
  }
}

export const settings = new Settings();

export default settings;
