/**
 * Screen Buffer
 *
 * Cell grid for the whole terminal. Tracks dirty cells so the renderer only
 * writes what changed.
 */

import { getCharWidth } from '../core/char-width.ts';
import { DEFAULT_ATTRIBUTES, attributesEqual, type Rect, type Size, type TextAttributes } from '../ui/types.ts';

// ============================================
// Cells
// ============================================

/**
 * One screen cell. The second cell of a wide character has char ''.
 */
export interface Cell extends TextAttributes {
  char: string;
}

export function createEmptyCell(attributes: TextAttributes = DEFAULT_ATTRIBUTES): Cell {
  return { ...attributes, char: ' ' };
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.char === b.char && attributesEqual(a, b);
}

function isAttributeList(
  value: TextAttributes | readonly TextAttributes[]
): value is readonly TextAttributes[] {
  return Array.isArray(value);
}

// ============================================
// ScreenBuffer Class
// ============================================

export class ScreenBuffer {
  private width: number;
  private height: number;
  private cells: Cell[][];
  private dirty: boolean[][];

  constructor(size: Size) {
    this.width = size.width;
    this.height = size.height;
    this.cells = this.createGrid();
    this.dirty = this.createDirtyGrid(true);
  }

  private createGrid(): Cell[][] {
    return Array.from({ length: this.height }, () =>
      Array.from({ length: this.width }, () => createEmptyCell())
    );
  }

  private createDirtyGrid(initialValue: boolean): boolean[][] {
    return Array.from({ length: this.height }, () =>
      Array.from({ length: this.width }, () => initialValue)
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Size Management
  // ─────────────────────────────────────────────────────────────────────────

  getSize(): Size {
    return { width: this.width, height: this.height };
  }

  /**
   * Resize the buffer. Contents are cleared.
   */
  resize(size: Size): void {
    this.width = size.width;
    this.height = size.height;
    this.cells = this.createGrid();
    this.dirty = this.createDirtyGrid(true);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Cell Access
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Get a cell at position. Returns null if out of bounds.
   */
  get(x: number, y: number): Cell | null {
    return this.cells[y]?.[x] ?? null;
  }

  /**
   * Set a cell at position. Marks as dirty if changed.
   * Out of bounds writes are ignored.
   */
  set(x: number, y: number, cell: Cell): void {
    const row = this.cells[y];
    const dirtyRow = this.dirty[y];
    const existing = row?.[x];
    if (!row || !dirtyRow || !existing) {
      return;
    }
    if (!cellsEqual(existing, cell)) {
      row[x] = { ...cell };
      dirtyRow[x] = true;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Bulk Operations
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Write text starting at (x, y), stopping at the right edge or after
   * maxWidth cells. attributes is either one set for the whole text or one
   * entry per UTF-16 code unit of text (missing entries use fallback).
   * Returns the number of cells written.
   */
  writeString(
    x: number,
    y: number,
    text: string,
    attributes: TextAttributes | readonly TextAttributes[],
    maxWidth = Infinity,
    fallback: TextAttributes = DEFAULT_ATTRIBUTES
  ): number {
    const limit = Math.min(this.width, x + maxWidth);
    let px = x;
    let index = 0;

    for (const char of text) {
      const charWidth = getCharWidth(char);
      const style = isAttributeList(attributes) ? (attributes[index] ?? fallback) : attributes;
      index += char.length;

      // Zero-width characters (combining marks, variation selectors)
      if (charWidth === 0) continue;
      if (px + charWidth > limit) break;

      this.set(px, y, { ...style, char });
      if (charWidth === 2) {
        this.set(px + 1, y, { ...style, char: '' });
      }
      px += charWidth;
    }
    return px - x;
  }

  /**
   * Fill a rectangle with a cell.
   */
  fillRect(rect: Rect, cell: Cell): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) {
        this.set(x, y, cell);
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Dirty Tracking
  // ─────────────────────────────────────────────────────────────────────────

  isDirty(x: number, y: number): boolean {
    return this.dirty[y]?.[x] ?? false;
  }

  markAllDirty(): void {
    this.dirty = this.createDirtyGrid(true);
  }

  clearDirty(): void {
    this.dirty = this.createDirtyGrid(false);
  }

  /**
   * Get all dirty cells, row by row.
   */
  getDirtyCells(): Array<{ x: number; y: number; cell: Cell }> {
    const result: Array<{ x: number; y: number; cell: Cell }> = [];
    this.cells.forEach((row, y) => {
      row.forEach((cell, x) => {
        if (this.dirty[y]?.[x]) {
          result.push({ x, y, cell });
        }
      });
    });
    return result;
  }

  hasDirty(): boolean {
    return this.dirty.some((row) => row.includes(true));
  }
}

// ============================================
// Factory Function
// ============================================

/**
 * Create a new screen buffer.
 */
export function createScreenBuffer(size: Size): ScreenBuffer {
  return new ScreenBuffer(size);
}
