/**
 * ANSI Colors
 *
 * Color parsing and SGR color sequences. Named colors use the terminal's own
 * 16-color palette; hex colors use 24-bit sequences.
 */

import { CSI } from './ansi.ts';

// ============================================
// Types
// ============================================

export interface RGB {
  r: number;
  g: number;
  b: number;
}

export type Color =
  | { kind: 'default' }
  | { kind: 'named'; index: number }
  | { kind: 'rgb'; rgb: RGB };

// ============================================
// Named Colors
// ============================================

/**
 * Palette index (0-15) of each named color.
 */
export const NAMED_COLORS: Record<string, number> = {
  black: 0,
  red: 1,
  green: 2,
  yellow: 3,
  blue: 4,
  magenta: 5,
  cyan: 6,
  white: 7,
  brightblack: 8,
  gray: 8,
  grey: 8,
  brightred: 9,
  brightgreen: 10,
  brightyellow: 11,
  brightblue: 12,
  brightmagenta: 13,
  brightcyan: 14,
  brightwhite: 15,
};

// ============================================
// Color Parsing
// ============================================

/**
 * Parse a hex color string to RGB.
 * Supports formats: #RGB, #RRGGBB
 */
export function hexToRgb(hex: string): RGB | null {
  const match = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(hex);
  if (!match?.[1]) {
    return null;
  }

  let digits = match[1];
  if (digits.length === 3) {
    digits = [...digits].map((d) => d + d).join('');
  }
  return {
    r: parseInt(digits.slice(0, 2), 16),
    g: parseInt(digits.slice(2, 4), 16),
    b: parseInt(digits.slice(4, 6), 16),
  };
}

/**
 * Parse a color string: 'default', a named color (any case) or hex.
 * Returns null for anything else.
 */
export function parseColor(color: string): Color | null {
  if (color === 'default') {
    return { kind: 'default' };
  }

  const rgb = hexToRgb(color);
  if (rgb) {
    return { kind: 'rgb', rgb };
  }

  const name = color.toLowerCase();
  const index = Object.hasOwn(NAMED_COLORS, name) ? NAMED_COLORS[name] : undefined;
  if (index !== undefined) {
    return { kind: 'named', index };
  }

  return null;
}

/**
 * Check that a color string can be rendered.
 */
export function isValidColor(color: string): boolean {
  return parseColor(color) !== null;
}

// ============================================
// ANSI Color Sequences
// ============================================

/**
 * Set foreground color from color string. Unknown colors fall back to the
 * terminal default.
 */
export function fgColor(color: string): string {
  const parsed: Color = parseColor(color) ?? { kind: 'default' };
  switch (parsed.kind) {
    case 'default':
      return `${CSI}39m`;
    case 'named':
      return `${CSI}${parsed.index < 8 ? 30 + parsed.index : 82 + parsed.index}m`;
    case 'rgb':
      return `${CSI}38;2;${parsed.rgb.r};${parsed.rgb.g};${parsed.rgb.b}m`;
  }
}

/**
 * Set background color from color string.
 */
export function bgColor(color: string): string {
  const parsed: Color = parseColor(color) ?? { kind: 'default' };
  switch (parsed.kind) {
    case 'default':
      return `${CSI}49m`;
    case 'named':
      return `${CSI}${parsed.index < 8 ? 40 + parsed.index : 92 + parsed.index}m`;
    case 'rgb':
      return `${CSI}48;2;${parsed.rgb.r};${parsed.rgb.g};${parsed.rgb.b}m`;
  }
}
