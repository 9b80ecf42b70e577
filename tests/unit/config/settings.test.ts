/**
 * Settings Tests
 */

import { describe, test, expect } from 'vitest';
import { DEFAULT_EDITOR_CONFIG, Settings, defaultSettings, isSettingKey } from '../../../src/config/settings.ts';

describe('Settings', () => {
  test('starts from defaults merged with the initial values', () => {
    const settings = new Settings({ 'editor.tabSize': 2 });
    expect(settings.get('editor.tabSize')).toBe(2);
    expect(settings.get('editor.lineHeight')).toBe(20);
  });

  test('set notifies listeners with the new value', () => {
    const settings = new Settings();
    const seen: number[] = [];
    const unsubscribe = settings.onChange('editor.tabSize', value => seen.push(value));

    settings.set('editor.tabSize', 8);
    settings.set('editor.tabSize', 8);
    unsubscribe();
    settings.set('editor.tabSize', 3);

    expect(seen).toEqual([8]);
    expect(settings.get('editor.tabSize')).toBe(3);
  });

  test('update skips undefined values', () => {
    const settings = new Settings();
    settings.update({ 'editor.tabSize': undefined, 'search.regex': true });
    expect(settings.get('editor.tabSize')).toBe(4);
    expect(settings.get('search.regex')).toBe(true);
  });

  test('reset notifies only keys that changed', () => {
    const settings = new Settings({ 'editor.wordWrap': 'on' });
    const wrap: string[] = [];
    const tab: number[] = [];
    settings.onChange('editor.wordWrap', value => wrap.push(value));
    settings.onChange('editor.tabSize', value => tab.push(value));

    settings.reset();

    expect(wrap).toEqual(['off']);
    expect(tab).toEqual([]);
    expect(settings.getAll()).toEqual(defaultSettings);
  });

  test('toConfig builds the update snapshot', () => {
    const settings = new Settings({ 'editor.wordWrap': 'on', 'search.wholeWord': true });
    const config = settings.toConfig();
    expect(config.wordWrap).toBe(true);
    expect(config.search).toEqual({ caseSensitive: false, wholeWord: true, regex: false });
    expect(config.highlightDebounceMs).toBe(30);
  });

  test('default config', () => {
    expect(DEFAULT_EDITOR_CONFIG.tabSize).toBe(4);
    expect(DEFAULT_EDITOR_CONFIG.wordWrap).toBe(false);
    expect(isSettingKey('editor.tabSize')).toBe(true);
    expect(isSettingKey('editor.fontFamily')).toBe(false);
  });
});
