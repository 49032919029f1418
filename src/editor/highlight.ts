/**
 * Keyword Highlighting
 */

import type { TextAttributes } from '../ui/types.ts';

/** Keyword to foreground color */
export type KeywordColors = Readonly<Record<string, string>>;

export const DEFAULT_KEYWORDS: KeywordColors = {
  return: 'brightGreen',
  def: 'brightRed',
};

const WORD = /[\p{L}\p{N}_]+/gu;

/**
 * Attributes for each UTF-16 code unit of content: defaults, with whole-word
 * keyword occurrences in their keyword's color.
 */
export function highlightLine(
  content: string,
  keywords: KeywordColors,
  defaults: TextAttributes
): TextAttributes[] {
  const attributes: TextAttributes[] = new Array<TextAttributes>(content.length).fill(defaults);
  const colors = new Map(Object.entries(keywords));
  if (colors.size === 0) {
    return attributes;
  }

  for (const match of content.matchAll(WORD)) {
    const color = colors.get(match[0]);
    if (color === undefined || match.index === undefined) continue;
    attributes.fill({ ...defaults, fg: color }, match.index, match.index + match[0].length);
  }
  return attributes;
}
