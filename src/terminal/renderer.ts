/**
 * Renderer
 *
 * Writes the dirty cells of a ScreenBuffer to the terminal as ANSI. Output
 * goes through a function so tests can capture it.
 */

import type { Size } from '../ui/types.ts';
import { ScreenBuffer, type Cell } from './screen-buffer.ts';
import { CURSOR, RESET, SCREEN } from './ansi.ts';
import { transitionStyle } from './styles.ts';
import { getCharWidth } from '../core/char-width.ts';

// ============================================
// Types
// ============================================

export interface RendererOptions {
  /** Output function. Defaults to process.stdout.write */
  output?: (data: string) => void;
  /** Enable alternate screen buffer */
  alternateScreen?: boolean;
}

// ============================================
// Renderer Class
// ============================================

export class Renderer {
  private buffer: ScreenBuffer;
  private size: Size;
  private output: (data: string) => void;
  private alternateScreen: boolean;
  private initialized = false;

  // Style of the last written cell; null forces a full style sequence
  private lastCell: Cell | null = null;

  constructor(size: Size, options: RendererOptions = {}) {
    this.size = { ...size };
    this.buffer = new ScreenBuffer(size);
    this.output =
      options.output ??
      ((data: string) => {
        process.stdout.write(data);
      });
    this.alternateScreen = options.alternateScreen ?? true;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Take over the terminal: alternate screen, hidden cursor, cleared.
   */
  initialize(): void {
    if (this.initialized) return;

    let sequence = '';
    if (this.alternateScreen) {
      sequence += SCREEN.enterAlt;
    }
    sequence += CURSOR.hide + SCREEN.clear + CURSOR.home;

    this.output(sequence);
    this.initialized = true;
  }

  /**
   * Give the terminal back in the state we found it.
   */
  cleanup(): void {
    if (!this.initialized) return;

    let sequence = RESET;
    if (this.alternateScreen) {
      sequence += SCREEN.exitAlt;
    }
    sequence += CURSOR.show;

    this.output(sequence);
    this.initialized = false;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Size Management
  // ─────────────────────────────────────────────────────────────────────────

  getSize(): Size {
    return { ...this.size };
  }

  /**
   * Resize the renderer and buffer. Everything is repainted on next flush.
   */
  resize(size: Size): void {
    this.size = { ...size };
    this.buffer.resize(size);
    this.lastCell = null;
  }

  getBuffer(): ScreenBuffer {
    return this.buffer;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Flush dirty cells to the terminal.
   */
  flush(): void {
    const dirtyCells = this.buffer.getDirtyCells();
    if (dirtyCells.length === 0) {
      return;
    }

    this.output(this.buildOutput(dirtyCells));
    this.buffer.clearDirty();
  }

  /**
   * Force full redraw of entire buffer.
   */
  fullRedraw(): void {
    this.buffer.markAllDirty();
    this.lastCell = null;
    this.flush();
  }

  /**
   * Build output for dirty cells, moving the cursor only when the next cell
   * is not where the previous write left it.
   */
  private buildOutput(cells: Array<{ x: number; y: number; cell: Cell }>): string {
    let output = '';
    let lastY = -1;
    let cursorX = -1;

    for (const { x, y, cell } of cells) {
      if (cell.char === '') {
        // Second half of a wide character: written with the first half
        const prev = this.buffer.get(x - 1, y);
        if (prev && getCharWidth(prev.char) === 2) {
          continue;
        }
        output += CURSOR.moveTo(y, x) + transitionStyle(this.lastCell, cell) + ' ';
        this.lastCell = cell;
        cursorX = x + 1;
        lastY = y;
        continue;
      }

      // Terminals disagree on non-ASCII widths: always position explicitly
      const isNonAscii = (cell.char.codePointAt(0) ?? 0) > 127;
      if (y !== lastY || x !== cursorX || isNonAscii) {
        output += CURSOR.moveTo(y, x);
      }

      output += transitionStyle(this.lastCell, cell) + cell.char;
      cursorX = isNonAscii ? -1 : x + 1;
      this.lastCell = cell;
      lastY = y;
    }

    return output;
  }
}

// ============================================
// Factory Functions
// ============================================

/**
 * Create a renderer for the terminal.
 */
export function createRenderer(size: Size, options?: RendererOptions): Renderer {
  return new Renderer(size, options);
}

/**
 * Create a renderer that captures output (for testing).
 */
export function createTestRenderer(
  size: Size
): { renderer: Renderer; getOutput: () => string; clearOutput: () => void } {
  let captured = '';

  const renderer = new Renderer(size, {
    output: (data: string) => {
      captured += data;
    },
    alternateScreen: false,
  });

  return {
    renderer,
    getOutput: () => captured,
    clearOutput: () => {
      captured = '';
    },
  };
}
