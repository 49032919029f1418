/**
 * Character Width
 *
 * Display width of Unicode characters in terminal cells.
 */

type Range = readonly [number, number];

/** Combining marks, joiners, variation selectors, BOM */
const ZERO_WIDTH: readonly Range[] = [
  [0x0300, 0x036f],
  [0x0483, 0x0489],
  [0x0591, 0x05bd],
  [0x1ab0, 0x1aff],
  [0x1dc0, 0x1dff],
  [0x200b, 0x200f],
  [0x2028, 0x202f],
  [0x2060, 0x206f],
  [0x20d0, 0x20ff],
  [0xfe00, 0xfe0f],
  [0xfe20, 0xfe2f],
  [0xfeff, 0xfeff],
  [0xe0100, 0xe01ef],
];

/** CJK, Hangul, fullwidth forms and emoji with default emoji presentation */
const DOUBLE_WIDTH: readonly Range[] = [
  [0x1100, 0x115f],
  [0x231a, 0x231b],
  [0x23e9, 0x23f3],
  [0x23f8, 0x23fa],
  [0x2705, 0x2705],
  [0x274c, 0x274c],
  [0x2753, 0x2755],
  [0x2757, 0x2757],
  [0x2b50, 0x2b55],
  [0x2e80, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe10, 0xfe1f],
  [0xfe30, 0xfe6f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1f004, 0x1f0cf],
  [0x1f1e0, 0x1f1ff],
  [0x1f300, 0x1f9ff],
  [0x20000, 0x2ffff],
];

function inRanges(code: number, ranges: readonly Range[]): boolean {
  for (const [start, end] of ranges) {
    if (code < start) return false;
    if (code <= end) return true;
  }
  return false;
}

/**
 * Cells taken by one character (code point): 0, 1 or 2.
 */
export function getCharWidth(char: string): number {
  const code = char.codePointAt(0) ?? 0;
  if (code < 32 || code === 127) return 0;
  if (code < 127) return 1;
  if (inRanges(code, ZERO_WIDTH)) return 0;
  if (inRanges(code, DOUBLE_WIDTH)) return 2;
  return 1;
}

/**
 * Cells taken by a string.
 */
export function getDisplayWidth(str: string): number {
  let width = 0;
  for (const char of str) {
    width += getCharWidth(char);
  }
  return width;
}

/**
 * Pad with spaces (or cut) to exactly width cells.
 */
export function padToWidth(str: string, width: number): string {
  let result = '';
  let used = 0;
  for (const char of str) {
    const charWidth = getCharWidth(char);
    if (used + charWidth > width) break;
    result += char;
    used += charWidth;
  }
  return result + ' '.repeat(width - used);
}
