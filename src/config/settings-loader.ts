/**
 * Settings Loader
 *
 * Reads settings.jsonc text (comments and trailing commas allowed), validates
 * it and applies it to a Settings instance. Invalid files leave the current
 * values in place.
 */

import * as fs from 'fs';
import stripJsonComments from 'strip-json-comments';
import { z } from 'zod';
import { SettingsValidationError, describeError } from '../core/errors.ts';
import { debugLog } from '../debug.ts';
import type { EditorSettings, Settings } from './settings.ts';

const positiveInt = z.number().int().positive();

/**
 * Unknown keys are stripped; every known key is optional.
 */
export const settingsSchema = z
  .object({
    'editor.tabSize': positiveInt.max(16),
    'editor.wordWrap': z.enum(['off', 'on']),
    'editor.lineHeight': z.number().positive(),
    'editor.charWidth': z.number().positive(),
    'editor.gutter.minDigits': positiveInt.max(12),
    'editor.gutter.padding': z.number().nonnegative(),
    'editor.layout.prefetchLines': z.number().int().nonnegative(),
    'editor.highlight.fullReparseRatio': z.number().min(0).max(1),
    'editor.highlight.debounceMs': z.number().int().nonnegative(),
    'editor.history.limit': positiveInt,
    'editor.journal.limit': positiveInt,
    'search.caseSensitive': z.boolean(),
    'search.wholeWord': z.boolean(),
    'search.regex': z.boolean(),
  })
  .partial();

function formatIssue(issue: z.ZodIssue): string {
  const key = issue.path.join('.') || '(root)';
  return `${key}: ${issue.message}`;
}

export class SettingsLoader {
  /**
   * Parse and validate settings text. Throws SettingsValidationError.
   */
  parse(text: string): Partial<EditorSettings> {
    let data: unknown;
    try {
      data = JSON.parse(stripJsonComments(text, { trailingCommas: true }));
    } catch (error) {
      throw new SettingsValidationError([`(parse): ${describeError(error)}`]);
    }

    const result = settingsSchema.safeParse(data);
    if (!result.success) {
      throw new SettingsValidationError(result.error.issues.map(formatIssue));
    }
    return result.data;
  }

  /**
   * Validate then apply. Nothing is applied when validation fails.
   */
  apply(target: Settings, text: string): void {
    target.update(this.parse(text));
  }

  /**
   * Load a settings file into `target`. Returns false (keeping the current
   * values) when the file is missing or invalid.
   */
  async loadFile(target: Settings, filePath: string): Promise<boolean> {
    let text: string;
    try {
      text = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
      debugLog(`[SettingsLoader] Could not read ${filePath}: ${describeError(error)}`);
      return false;
    }

    try {
      this.apply(target, text);
      debugLog(`[SettingsLoader] Loaded ${filePath}`);
      return true;
    } catch (error) {
      if (!(error instanceof SettingsValidationError)) throw error;
      debugLog(`[SettingsLoader] ${filePath}: ${error.message}`);
      return false;
    }
  }
}

export const settingsLoader = new SettingsLoader();

export default settingsLoader;
