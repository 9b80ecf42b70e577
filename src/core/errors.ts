/**
 * Editor Errors
 *
 * Error taxonomy for the editing core. Every failure raised here is
 * recoverable: the update step discards the offending message and keeps
 * buffer and cursors consistent.
 */

export type EditorErrorCode =
  | 'OUT_OF_RANGE'
  | 'MALFORMED_PARSE_STATE'
  | 'INVALID_SEARCH_PATTERN'
  | 'INVALID_EDIT_BATCH'
  | 'INVALID_SETTINGS';

/**
 * Base class for all errors raised by the editing core.
 */
export class EditorError extends Error {
  readonly code: EditorErrorCode;

  constructor(code: EditorErrorCode, message: string) {
    super(message);
    this.name = 'EditorError';
    this.code = code;
  }
}

/**
 * An offset, range or line lies outside the buffer.
 */
export class OutOfRangeError extends EditorError {
  constructor(message: string) {
    super('OUT_OF_RANGE', message);
    this.name = 'OutOfRangeError';
  }

  static offset(offset: number, length: number): OutOfRangeError {
    return new OutOfRangeError(`Offset ${offset} is outside buffer of length ${length}`);
  }

  static range(from: number, to: number, length: number): OutOfRangeError {
    return new OutOfRangeError(`Range [${from}, ${to}) is outside buffer of length ${length}`);
  }

  static line(line: number, lineCount: number): OutOfRangeError {
    return new OutOfRangeError(`Line ${line} is outside buffer of ${lineCount} lines`);
  }
}

/**
 * A grammar failed while parsing or extracting highlights.
 */
export class MalformedParseStateError extends EditorError {
  readonly languageId: string;

  constructor(languageId: string, message: string) {
    super('MALFORMED_PARSE_STATE', `[${languageId}] ${message}`);
    this.name = 'MalformedParseStateError';
    this.languageId = languageId;
  }
}

/**
 * A search query could not be compiled.
 */
export class InvalidSearchPatternError extends EditorError {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super('INVALID_SEARCH_PATTERN', `Invalid search pattern "${pattern}": ${reason}`);
    this.name = 'InvalidSearchPatternError';
    this.pattern = pattern;
  }
}

/**
 * An edit batch is unsorted or contains overlapping operations.
 */
export class InvalidEditBatchError extends EditorError {
  constructor(message: string) {
    super('INVALID_EDIT_BATCH', message);
    this.name = 'InvalidEditBatchError';
  }
}

/**
 * A settings file failed validation.
 */
export class SettingsValidationError extends EditorError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_SETTINGS', `Invalid settings: ${issues.join('; ')}`);
    this.name = 'SettingsValidationError';
    this.issues = issues;
  }
}

export function isEditorError(error: unknown): error is EditorError {
  return error instanceof EditorError;
}

/**
 * Render an unknown thrown value as a log-friendly string.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
