/**
 * UI Core Types
 *
 * Geometry, text attributes and key events shared by the editor core and
 * the UI backends.
 */

// ============================================
// Geometry
// ============================================

export interface Rect {
  x: number; // Column (0-indexed)
  y: number; // Row (0-indexed)
  width: number;
  height: number;
}

export interface Size {
  width: number;
  height: number;
}

// ============================================
// Attributes
// ============================================

/**
 * Display attributes of one character. Colors are 'default', a named
 * terminal color (e.g. 'brightGreen') or hex ('#rrggbb').
 */
export interface TextAttributes {
  fg: string;
  bg: string;
  bold?: boolean;
  dim?: boolean;
  italic?: boolean;
  underline?: boolean;
  inverse?: boolean;
}

export const DEFAULT_ATTRIBUTES: TextAttributes = { fg: 'default', bg: 'default' };

/**
 * Check if two attribute sets render the same.
 */
export function attributesEqual(a: TextAttributes, b: TextAttributes): boolean {
  return (
    a.fg === b.fg &&
    a.bg === b.bg &&
    !!a.bold === !!b.bold &&
    !!a.dim === !!b.dim &&
    !!a.italic === !!b.italic &&
    !!a.underline === !!b.underline &&
    !!a.inverse === !!b.inverse
  );
}

// ============================================
// Input
// ============================================

/**
 * One logical key: a printable character (key is the character) or a
 * named key ('Enter', 'Backspace', 'ArrowUp', ...) with modifiers.
 */
export interface KeyEvent {
  key: string;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  meta: boolean;
}
