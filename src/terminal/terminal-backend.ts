/**
 * Terminal Backend
 *
 * UIBackend on a raw ANSI terminal. Surfaces keep their own lines and
 * paint themselves into the shared ScreenBuffer on refresh; the renderer
 * then writes only the cells that changed.
 */

import type { Surface, UIBackend } from '../ui/backend.ts';
import { DEFAULT_ATTRIBUTES, type KeyEvent, type Rect, type Size, type TextAttributes } from '../ui/types.ts';
import { getCharWidth, getDisplayWidth } from '../core/char-width.ts';
import { createRenderer, type Renderer } from './renderer.ts';
import { KeyReader, type KeySource } from './key-reader.ts';
import { createEmptyCell, type ScreenBuffer } from './screen-buffer.ts';
import { debugLog } from '../debug.ts';

// ============================================
// Types
// ============================================

export interface TerminalBackendOptions {
  /** Output function. Defaults to process.stdout.write */
  output?: (data: string) => void;
  /** Key source. Defaults to process.stdin */
  input?: KeySource;
  /** Fixed screen size. Defaults to the terminal's, following resizes */
  size?: Size;
  /** Use the alternate screen (default true) */
  alternateScreen?: boolean;
  /** Tab stop width when painting tabs (default 4) */
  tabSize?: number;
}

export type ResizeCallback = (size: Size) => void;

/**
 * Replace tabs with spaces up to the next tab stop. Each space takes the
 * tab's attributes.
 */
export function expandTabs(
  text: string,
  attributes: readonly TextAttributes[],
  tabSize: number,
  fallback: TextAttributes = DEFAULT_ATTRIBUTES
): { text: string; attributes: TextAttributes[] } {
  if (!text.includes('\t')) {
    return { text, attributes: [...attributes] };
  }

  let expanded = '';
  const expandedAttributes: TextAttributes[] = [];
  let column = 0;
  let index = 0;

  for (const char of text) {
    const style = attributes[index] ?? fallback;
    if (char === '\t') {
      const spaces = tabSize - (column % tabSize);
      expanded += ' '.repeat(spaces);
      for (let i = 0; i < spaces; i++) {
        expandedAttributes.push(style);
      }
      column += spaces;
    } else {
      expanded += char;
      for (let i = 0; i < char.length; i++) {
        expandedAttributes.push(attributes[index + i] ?? fallback);
      }
      column += getCharWidth(char);
    }
    index += char.length;
  }
  return { text: expanded, attributes: expandedAttributes };
}

// ============================================
// Terminal Surface
// ============================================

export class TerminalSurface implements Surface {
  private lines: string[] = [];
  private lineAttributes: TextAttributes[][] = [];
  private defaults: TextAttributes = { ...DEFAULT_ATTRIBUTES };
  private cursor = { line: 0, column: 0 };
  private cursorVisible = false;

  // First visible line and first visible display column
  private top = 0;
  private left = 0;

  private destroyed = false;

  constructor(
    private backend: TerminalBackend,
    private rect: Rect
  ) {}

  // ─────────────────────────────────────────────────────────────────────────
  // Lines
  // ─────────────────────────────────────────────────────────────────────────

  lineUpdate(line: number, content: string, attributes: readonly TextAttributes[]): void {
    while (this.lines.length <= line) {
      this.lines.push('');
      this.lineAttributes.push([]);
    }
    this.lines[line] = content;
    this.lineAttributes[line] = [...attributes];
  }

  lineInsert(line: number, content: string, attributes: readonly TextAttributes[]): void {
    this.lines.splice(line, 0, content);
    this.lineAttributes.splice(line, 0, [...attributes]);
  }

  lineDelete(line: number): void {
    this.lines.splice(line, 1);
    this.lineAttributes.splice(line, 1);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Cursor
  // ─────────────────────────────────────────────────────────────────────────

  cursorDraw(line: number, column: number): void {
    this.cursor = { line, column };
    this.scrollToCursor();
  }

  cursorShow(): void {
    this.cursorVisible = true;
  }

  cursorHide(): void {
    this.cursorVisible = false;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Surface State
  // ─────────────────────────────────────────────────────────────────────────

  attributesSet(attributes: TextAttributes): void {
    this.defaults = { ...attributes };
  }

  setBounds(rect: Rect): void {
    this.rect = { ...rect };
    this.scrollToCursor();
  }

  getBounds(): Rect {
    return { ...this.rect };
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.backend.removeSurface(this);
  }

  keyGet(): Promise<KeyEvent> {
    return this.backend.nextKey();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Painting
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Paint the visible part of the surface into the screen buffer.
   */
  paint(screen: ScreenBuffer): void {
    const { x, y, width, height } = this.rect;
    const blank = createEmptyCell(this.defaults);

    for (let row = 0; row < height; row++) {
      const index = this.top + row;
      const { text, attributes } = expandTabs(
        this.lines[index] ?? '',
        this.lineAttributes[index] ?? [],
        this.backend.tabSize,
        this.defaults
      );
      const start = this.codeUnitAtColumn(text, this.left);

      const written = screen.writeString(x, y + row, text.slice(start), attributes.slice(start), width, this.defaults);
      screen.fillRect({ x: x + written, y: y + row, width: width - written, height: 1 }, blank);
    }

    if (this.cursorVisible) {
      const row = this.cursor.line - this.top;
      const column = this.cursorDisplayColumn() - this.left;
      const cell = screen.get(x + column, y + row);
      if (cell && row >= 0 && row < height && column >= 0 && column < width) {
        screen.set(x + column, y + row, { ...cell, char: cell.char || ' ', inverse: !cell.inverse });
      }
    }
  }

  private scrollToCursor(): void {
    const { width, height } = this.rect;

    if (this.cursor.line < this.top) {
      this.top = this.cursor.line;
    } else if (height > 0 && this.cursor.line >= this.top + height) {
      this.top = this.cursor.line - height + 1;
    }

    const column = this.cursorDisplayColumn();
    if (column < this.left) {
      this.left = column;
    } else if (width > 0 && column >= this.left + width) {
      this.left = column - width + 1;
    }
  }

  private cursorDisplayColumn(): number {
    const before = (this.lines[this.cursor.line] ?? '').slice(0, this.cursor.column);
    return getDisplayWidth(expandTabs(before, [], this.backend.tabSize).text);
  }

  /**
   * Code unit index of the first character at or after a display column.
   */
  private codeUnitAtColumn(text: string, column: number): number {
    let width = 0;
    let index = 0;
    for (const char of text) {
      if (width >= column) break;
      width += getCharWidth(char);
      index += char.length;
    }
    return index;
  }
}

// ============================================
// Terminal Backend
// ============================================

export class TerminalBackend implements UIBackend {
  private renderer: Renderer;
  private keyReader: KeyReader;
  private surfaces: TerminalSurface[] = [];
  private resizeCallbacks: Set<ResizeCallback> = new Set();
  private followTerminalSize: boolean;
  private started = false;
  readonly tabSize: number;

  constructor(options: TerminalBackendOptions = {}) {
    this.followTerminalSize = options.size === undefined;
    this.tabSize = Math.max(1, options.tabSize ?? 4);
    const size = options.size ?? {
      width: process.stdout.columns || 80,
      height: process.stdout.rows || 24,
    };
    this.renderer = createRenderer(size, {
      output: options.output,
      alternateScreen: options.alternateScreen,
    });
    this.keyReader = new KeyReader(options.input);
  }

  get size(): Size {
    return this.renderer.getSize();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Take over the terminal and start reading keys.
   */
  start(): void {
    if (this.started) return;
    this.started = true;

    this.renderer.initialize();
    this.keyReader.start();
    if (this.followTerminalSize) {
      process.stdout.on('resize', this.handleResize);
    }
    debugLog(`[TerminalBackend] Started at ${this.size.width}x${this.size.height}`);
  }

  close(): void {
    if (!this.started) return;
    this.started = false;

    if (this.followTerminalSize) {
      process.stdout.off('resize', this.handleResize);
    }
    this.keyReader.stop();
    this.renderer.cleanup();
    debugLog('[TerminalBackend] Closed');
  }

  /**
   * Register resize callback.
   */
  onResize(callback: ResizeCallback): () => void {
    this.resizeCallbacks.add(callback);
    return () => this.resizeCallbacks.delete(callback);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Surfaces
  // ─────────────────────────────────────────────────────────────────────────

  createSurface(rect: Rect): TerminalSurface {
    const surface = new TerminalSurface(this, { ...rect });
    this.surfaces.push(surface);
    return surface;
  }

  /**
   * Forget a destroyed surface and blank the area it covered.
   */
  removeSurface(surface: TerminalSurface): void {
    this.surfaces = this.surfaces.filter((s) => s !== surface);
    this.renderer.getBuffer().fillRect(surface.getBounds(), createEmptyCell());
  }

  refresh(): void {
    const screen = this.renderer.getBuffer();
    for (const surface of this.surfaces) {
      surface.paint(screen);
    }
    this.renderer.flush();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Input
  // ─────────────────────────────────────────────────────────────────────────

  nextKey(): Promise<KeyEvent> {
    return this.keyReader.next();
  }

  /**
   * Feed raw terminal input (for testing).
   */
  simulateInput(data: string): void {
    this.keyReader.simulateInput(data);
  }

  private handleResize = (): void => {
    const size = {
      width: process.stdout.columns || 80,
      height: process.stdout.rows || 24,
    };
    this.renderer.resize(size);
    for (const callback of this.resizeCallbacks) {
      callback(size);
    }
  };
}

// ============================================
// Factory Function
// ============================================

/**
 * Create a terminal backend.
 */
export function createTerminalBackend(options?: TerminalBackendOptions): TerminalBackend {
  return new TerminalBackend(options);
}
