/**
 * UI Backend Contract
 *
 * The capability set the editor core needs from a display. Windows talk to
 * a Surface in the buffer's own line vocabulary; nothing terminal-specific
 * crosses this boundary.
 */

import type { KeyEvent, Rect, Size, TextAttributes } from './types.ts';

/**
 * A rectangular drawing area owned by exactly one window.
 */
export interface Surface {
  /** Replace the content of a line */
  lineUpdate(line: number, content: string, attributes: readonly TextAttributes[]): void;
  /** Insert a line before index, shifting the following lines down */
  lineInsert(line: number, content: string, attributes: readonly TextAttributes[]): void;
  /** Remove a line, shifting the following lines up */
  lineDelete(line: number): void;

  /** Move the cursor (scrolling the surface to keep it in view) */
  cursorDraw(line: number, column: number): void;
  /** Make the cursor visible on this surface */
  cursorShow(): void;
  /** Hide the cursor on this surface */
  cursorHide(): void;

  /** Default attributes for empty cells and unstyled text */
  attributesSet(attributes: TextAttributes): void;
  /** Move or resize the surface */
  setBounds(rect: Rect): void;
  /** Remove the surface from the display */
  destroy(): void;

  /** Wait for one logical key */
  keyGet(): Promise<KeyEvent>;
}

/**
 * A display capable of hosting surfaces.
 */
export interface UIBackend {
  /** Screen size in cells */
  readonly size: Size;
  /** Create a surface at the given position and size */
  createSurface(rect: Rect): Surface;
  /** Paint every surface */
  refresh(): void;
  /** Release the display and input */
  close(): void;
}
