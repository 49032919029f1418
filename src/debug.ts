/**
 * Debug Logging
 *
 * Writes timestamped lines to debug.log in the working directory when
 * enabled with --debug. The terminal is owned by the renderer, so nothing
 * here may write to stdout.
 */

import { appendFileSync } from 'node:fs';
import { join } from 'node:path';

let enabled = false;
let logPath = join(process.cwd(), 'debug.log');

/**
 * Turn debug logging on or off.
 */
export function setDebugEnabled(value: boolean, path?: string): void {
  enabled = value;
  if (path) {
    logPath = path;
  }
}

/**
 * Check if debug logging is on.
 */
export function isDebugEnabled(): boolean {
  return enabled;
}

/**
 * Append a message to the debug log.
 */
export function debugLog(message: string): void {
  if (!enabled) return;
  try {
    appendFileSync(logPath, `[${new Date().toISOString()}] ${message}\n`);
  } catch {
    // Log file unwritable: stop trying
    enabled = false;
  }
}
