/**
 * Settings Loader Tests
 */

import { afterEach, beforeEach, describe, test, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Settings, defaultSettings } from '../../../src/config/settings.ts';
import { settingsLoader } from '../../../src/config/settings-loader.ts';
import { SettingsValidationError } from '../../../src/core/errors.ts';

function issuesOf(text: string): string[] {
  try {
    settingsLoader.parse(text);
  } catch (error) {
    if (error instanceof SettingsValidationError) return error.issues;
    throw error;
  }
  return [];
}

describe('SettingsLoader', () => {
  // ─────────────────────────────────────────────────────────────────────────
  // Parsing
  // ─────────────────────────────────────────────────────────────────────────

  describe('parse', () => {
    test('accepts comments and trailing commas and drops unknown keys', () => {
      const text = `{
        // indentation
        "editor.tabSize": 2,
        /* wrap */ "editor.wordWrap": "on",
        "workbench.colorTheme": "dark",
      }`;
      expect(settingsLoader.parse(text)).toEqual({ 'editor.tabSize': 2, 'editor.wordWrap': 'on' });
    });

    test('reports schema issues by key', () => {
      const issues = issuesOf('{"editor.tabSize": 0}');
      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(/^editor\.tabSize: /);
    });

    test('reports malformed text as a parse issue', () => {
      const issues = issuesOf('not json');
      expect(issues).toHaveLength(1);
      expect(issues[0]?.startsWith('(parse): SyntaxError')).toBe(true);
    });

    test('the shipped defaults file matches the built-in defaults', () => {
      const text = fs.readFileSync(path.join(process.cwd(), 'config/default-settings.jsonc'), 'utf-8');
      expect(settingsLoader.parse(text)).toEqual(defaultSettings);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Applying
  // ─────────────────────────────────────────────────────────────────────────

  describe('apply', () => {
    test('applies valid text', () => {
      const settings = new Settings();
      settingsLoader.apply(settings, '{"search.regex": true}');
      expect(settings.get('search.regex')).toBe(true);
    });

    test('leaves settings unchanged when any key is invalid', () => {
      const settings = new Settings();
      expect(() => settingsLoader.apply(settings, '{"editor.tabSize": 2, "editor.wordWrap": "sometimes"}')).toThrow(
        SettingsValidationError
      );
      expect(settings.get('editor.tabSize')).toBe(4);
    });
  });

  describe('loadFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'settings-test-'));
    });

    afterEach(async () => {
      await fs.promises.rm(dir, { recursive: true, force: true });
    });

    test('a missing file keeps the current values', async () => {
      const settings = new Settings();
      expect(await settingsLoader.loadFile(settings, path.join(dir, 'missing.jsonc'))).toBe(false);
      expect(settings.getAll()).toEqual(defaultSettings);
    });

    test('a valid file is applied', async () => {
      const file = path.join(dir, 'settings.jsonc');
      await fs.promises.writeFile(file, '{ "editor.lineHeight": 18, }');
      const settings = new Settings();
      expect(await settingsLoader.loadFile(settings, file)).toBe(true);
      expect(settings.get('editor.lineHeight')).toBe(18);
    });

    test('an invalid file is rejected', async () => {
      const file = path.join(dir, 'settings.jsonc');
      await fs.promises.writeFile(file, '{ "editor.lineHeight": "tall" }');
      const settings = new Settings();
      expect(await settingsLoader.loadFile(settings, file)).toBe(false);
      expect(settings.get('editor.lineHeight')).toBe(20);
    });
  });
});
