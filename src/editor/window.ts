/**
 * Window
 *
 * Base class for everything that displays a buffer. A window owns one
 * surface and observes one (possibly shared) buffer, mirroring every line
 * change onto the surface.
 */

import type { BufferObserver, ObserverHandle, TextBuffer } from '../core/text-buffer.ts';
import type { Surface } from '../ui/backend.ts';
import { DEFAULT_ATTRIBUTES, type KeyEvent, type Rect, type TextAttributes } from '../ui/types.ts';

/**
 * A buffer line ready for a surface.
 */
export interface FormattedLine {
  content: string;
  /** One entry per UTF-16 code unit of content */
  attributes: TextAttributes[];
}

export abstract class Window implements BufferObserver {
  readonly surface: Surface;
  protected defaults: TextAttributes;

  private _buffer: TextBuffer;
  private handle: ObserverHandle | null = null;

  /** Lines currently on the surface */
  protected surfaceLineCount = 0;

  /**
   * Subclasses call link() at the end of their constructor, once the state
   * that format() reads is in place.
   */
  constructor(surface: Surface, buffer: TextBuffer, defaults: TextAttributes = DEFAULT_ATTRIBUTES) {
    this.surface = surface;
    this._buffer = buffer;
    this.defaults = { ...defaults };
    surface.attributesSet(this.defaults);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Buffer
  // ─────────────────────────────────────────────────────────────────────────

  get buffer(): TextBuffer {
    return this._buffer;
  }

  /**
   * Display another buffer. Unlinks from the current one first.
   */
  set buffer(buffer: TextBuffer) {
    this.unlink();
    this._buffer = buffer;
    this.link();
  }

  get isLinked(): boolean {
    return this.handle !== null;
  }

  protected link(): void {
    if (this.handle === null) {
      this.handle = this._buffer.windowLink(this);
    }
  }

  protected unlink(): void {
    if (this.handle !== null) {
      this._buffer.windowUnlink(this.handle);
      this.handle = null;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Formatting
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Content and attributes of a buffer line. Plain default attributes here;
   * subclasses decorate.
   */
  format(line: number): FormattedLine {
    const content = this._buffer.line(line);
    return {
      content,
      attributes: new Array<TextAttributes>(content.length).fill(this.defaults),
    };
  }

  get attributes(): TextAttributes {
    return { ...this.defaults };
  }

  /**
   * Change the surface defaults and redraw.
   */
  set attributes(attributes: TextAttributes) {
    this.defaults = { ...attributes };
    this.surface.attributesSet(this.defaults);
    this.redraw();
  }

  /**
   * Re-send every line to the surface.
   */
  redraw(): void {
    for (let line = 0; line < this.surfaceLineCount; line++) {
      const { content, attributes } = this.format(line);
      this.surface.lineUpdate(line, content, attributes);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Buffer Notifications
  // ─────────────────────────────────────────────────────────────────────────

  reload(): void {
    const lineCount = this._buffer.lineCount;
    const common = Math.min(lineCount, this.surfaceLineCount);

    for (let line = 0; line < common; line++) {
      const { content, attributes } = this.format(line);
      this.surface.lineUpdate(line, content, attributes);
    }
    for (let line = common; line < lineCount; line++) {
      const { content, attributes } = this.format(line);
      this.surface.lineInsert(line, content, attributes);
    }
    for (let line = this.surfaceLineCount - 1; line >= lineCount; line--) {
      this.surface.lineDelete(line);
    }
    this.surfaceLineCount = lineCount;
  }

  lineUpdated(line: number): void {
    const { content, attributes } = this.format(line);
    this.surface.lineUpdate(line, content, attributes);
  }

  lineInserted(line: number): void {
    const { content, attributes } = this.format(line);
    this.surface.lineInsert(line, content, attributes);
    this.surfaceLineCount++;
  }

  lineDeleted(line: number): void {
    this.surface.lineDelete(line);
    this.surfaceLineCount--;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Input & Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Handle a key. Returns false when the window has no use for it.
   */
  keyHandle(_key: KeyEvent): boolean | Promise<boolean> {
    return false;
  }

  onFocus(): void {
    this.surface.cursorShow();
  }

  onBlur(): void {
    this.surface.cursorHide();
  }

  setBounds(rect: Rect): void {
    this.surface.setBounds(rect);
  }

  /**
   * Stop observing the buffer and remove the surface.
   */
  close(): void {
    this.unlink();
    this.surface.destroy();
  }
}
