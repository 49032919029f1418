/**
 * ANSI Text Styles
 *
 * SGR sequences for TextAttributes, and the minimal transition between the
 * attributes of two consecutively written cells.
 */

import { CSI } from './ansi.ts';
import { bgColor, fgColor } from './colors.ts';
import type { TextAttributes } from '../ui/types.ts';

type Flag = 'bold' | 'dim' | 'italic' | 'underline' | 'inverse';

const FLAG_CODES: Record<Flag, { on: number; off: number }> = {
  bold: { on: 1, off: 22 },
  dim: { on: 2, off: 22 },
  italic: { on: 3, off: 23 },
  underline: { on: 4, off: 24 },
  inverse: { on: 7, off: 27 },
};

const FLAGS: readonly Flag[] = ['bold', 'dim', 'italic', 'underline', 'inverse'];

/**
 * Full style sequence for a set of attributes.
 */
export function buildStyle(attributes: TextAttributes): string {
  return transitionStyle(null, attributes);
}

/**
 * Build minimal style sequence for transition from prev to next.
 * Returns empty string if no style changes needed.
 */
export function transitionStyle(prev: TextAttributes | null, next: TextAttributes): string {
  const parts: string[] = [];

  if (!prev || prev.fg !== next.fg) {
    parts.push(fgColor(next.fg));
  }
  if (!prev || prev.bg !== next.bg) {
    parts.push(bgColor(next.bg));
  }

  // Offs first. Bold and dim share code 22, which clears both.
  let intensityOff = false;
  for (const flag of FLAGS) {
    if (!prev?.[flag] || next[flag]) continue;
    const { off } = FLAG_CODES[flag];
    if (off === 22) {
      intensityOff = true;
    } else {
      parts.push(`${CSI}${off}m`);
    }
  }
  if (intensityOff) {
    parts.push(`${CSI}22m`);
  }

  for (const flag of FLAGS) {
    if (!next[flag]) continue;
    const { on, off } = FLAG_CODES[flag];
    if (!prev?.[flag] || (intensityOff && off === 22)) {
      parts.push(`${CSI}${on}m`);
    }
  }

  return parts.join('');
}
