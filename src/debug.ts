/**
 * Debug Logging
 *
 * Opt-in file logger. Enabled with STRATA_DEBUG=1 or setDebugEnabled(true);
 * lines go to STRATA_DEBUG_LOG (default ./strata-debug.log).
 */

import * as fs from 'fs';
import * as path from 'path';

let enabled = process.env.STRATA_DEBUG === '1' || process.env.STRATA_DEBUG === 'true';
let logPath = process.env.STRATA_DEBUG_LOG || path.join(process.cwd(), 'strata-debug.log');
let sink: ((line: string) => void) | null = null;

export function isDebugEnabled(): boolean {
  return enabled;
}

export function setDebugEnabled(value: boolean): void {
  enabled = value;
}

export function setDebugLogPath(filePath: string): void {
  logPath = filePath;
}

/**
 * Redirect log lines (tests use this instead of touching the filesystem).
 * Pass null to go back to the log file.
 */
export function setDebugSink(fn: ((line: string) => void) | null): void {
  sink = fn;
}

export function debugLog(message: string): void {
  if (!enabled) return;

  const line = `${new Date().toISOString()} ${message}`;
  if (sink) {
    sink(line);
    return;
  }

  try {
    fs.appendFileSync(logPath, line + '\n');
  } catch {
    // Logging must never break editing
    enabled = false;
  }
}
