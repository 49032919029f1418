/**
 * File path helpers shared by the command line and the command window.
 */

import * as path from 'node:path';

/**
 * Expand ~ and make a path absolute.
 */
export function resolveFilePath(file: string, cwd = process.cwd(), home = process.env.HOME || ''): string {
  let expanded = file;
  if (expanded === '~') {
    expanded = home;
  } else if (expanded.startsWith('~/')) {
    expanded = path.join(home, expanded.slice(2));
  }
  return path.resolve(cwd, expanded);
}
