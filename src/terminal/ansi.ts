/**
 * ANSI Escape Sequences
 *
 * Low-level terminal control used by the renderer and the terminal backend.
 */

export const ESC = '\x1b';
export const CSI = `${ESC}[`;

// Cursor control
export const CURSOR = {
  hide: `${CSI}?25l`,
  show: `${CSI}?25h`,
  home: `${CSI}H`,
  // row and col are 0-indexed here, the terminal counts from 1
  moveTo: (row: number, col: number) => `${CSI}${row + 1};${col + 1}H`,
};

// Screen control
export const SCREEN = {
  clear: `${CSI}2J`,
  enterAlt: `${CSI}?1049h`,
  exitAlt: `${CSI}?1049l`,
};

export const RESET = `${CSI}0m`;
