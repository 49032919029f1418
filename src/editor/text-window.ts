/**
 * Text Window
 *
 * Editable view of a buffer with a cursor. Printable keys are typed at the
 * cursor; everything else goes through the window's keymap to execute().
 *
 * The cursor is always a valid buffer position. Vertical moves aim for the
 * target column, which only horizontal moves and edits change, so moving
 * through a short line and back restores the original column.
 */

import { positionsEqual, type Position } from '../core/position.ts';
import type { TextBuffer } from '../core/text-buffer.ts';
import type { Surface } from '../ui/backend.ts';
import type { KeyEvent, TextAttributes } from '../ui/types.ts';
import { isPrintable } from '../input/keys.ts';
import { Keymap } from '../input/keymap.ts';
import type { TextCommand } from './commands.ts';
import { highlightLine, type KeywordColors } from './highlight.ts';
import { Window, type FormattedLine } from './window.ts';

// ============================================
// Types
// ============================================

export interface TextWindowOptions {
  keymap?: Keymap<TextCommand>;
  /** Default attributes of the surface */
  attributes?: TextAttributes;
  /** Keywords to color (none by default) */
  keywords?: KeywordColors;
  /** Tab stop width for edit.insertTab */
  tabSize?: number;
}

// ============================================
// TextWindow Class
// ============================================

export class TextWindow extends Window {
  protected keymap: Keymap<TextCommand>;
  private keywords: KeywordColors;
  private tabSize: number;

  private _cursor: Position = { line: 0, column: 0 };
  private _targetColumn = 0;

  constructor(surface: Surface, buffer: TextBuffer, options: TextWindowOptions = {}) {
    super(surface, buffer, options.attributes);
    this.keymap = options.keymap ?? new Keymap<TextCommand>();
    this.keywords = options.keywords ?? {};
    this.tabSize = Math.max(1, options.tabSize ?? 4);
    this.link();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Cursor
  // ─────────────────────────────────────────────────────────────────────────

  get cursor(): Position {
    return { ...this._cursor };
  }

  /**
   * Move the cursor. Does not touch the target column.
   */
  set cursor(position: Position) {
    this._cursor = { line: position.line, column: position.column };
    this.surface.cursorDraw(position.line, position.column);
  }

  get targetColumn(): number {
    return this._targetColumn;
  }

  /**
   * Set the cursor and make its column the new target column.
   */
  private place(position: Position): void {
    this.cursor = position;
    this._targetColumn = position.column;
  }

  cursorUp(): void {
    const above = this.buffer.charAbove(this._cursor.line, this._targetColumn);
    if (above) {
      this.cursor = above;
    }
  }

  cursorDown(): void {
    const below = this.buffer.charBelow(this._cursor.line, this._targetColumn);
    if (below) {
      this.cursor = below;
    }
  }

  cursorBack(): void {
    const before = this.buffer.charBefore(this._cursor);
    if (before) {
      this.place(before);
    }
  }

  cursorForward(): void {
    const after = this.buffer.charAfter(this._cursor);
    if (after) {
      this.place(after);
    }
  }

  cursorBeginBuffer(): void {
    this.place({ line: 0, column: 0 });
  }

  cursorEndBuffer(): void {
    this.place(this.buffer.end);
  }

  cursorLineStart(): void {
    this.place(this.buffer.lineStart(this._cursor.line));
  }

  cursorLineEnd(): void {
    this.place(this.buffer.lineEnd(this._cursor.line));
  }

  /**
   * Jump to a position, clamped into the buffer.
   */
  cursorGoto(position: Position): void {
    this.place(this.buffer.clamp(position));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Editing
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Type one character at the cursor.
   */
  charInsert(char: string): void {
    const { line, column } = this._cursor;
    this.buffer.charInsert(char, line, column);
    this.cursorForward();
  }

  /**
   * Type a string at the cursor. Newlines break lines.
   */
  insertText(text: string): void {
    for (const char of text) {
      if (char === '\n') {
        this.lineBreak();
      } else {
        this.charInsert(char);
      }
    }
  }

  /**
   * Delete the character before the cursor (joining lines at column 0).
   */
  charDeleteBackward(): void {
    const before = this.buffer.charBefore(this._cursor);
    if (!before) return;
    this.buffer.charDelete(before.line, before.column);
    this.place(before);
  }

  /**
   * Delete the character under the cursor (joining lines at line end).
   */
  charDeleteForward(): void {
    if (positionsEqual(this._cursor, this.buffer.end)) return;
    const { line, column } = this._cursor;
    this.buffer.charDelete(line, column);
    this.place(this._cursor);
  }

  lineBreak(): void {
    const { line, column } = this._cursor;
    this.buffer.lineBreak(line, column);
    // The break point is now the end of the line: step over the newline
    const after = this.buffer.charAfter({ line, column });
    if (after) {
      this.place(after);
    }
  }

  /**
   * Insert spaces up to the next tab stop.
   */
  insertTab(): void {
    const spaces = this.tabSize - (this._cursor.column % this.tabSize);
    for (let i = 0; i < spaces; i++) {
      this.charInsert(' ');
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Commands
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Handle a key: type it when printable, else run its bound command.
   */
  override keyHandle(key: KeyEvent): boolean | Promise<boolean> {
    if (isPrintable(key)) {
      this.charInsert(key.key);
      return true;
    }

    const command = this.keymap.lookup(key);
    if (command === null) {
      return false;
    }
    this.execute(command);
    return true;
  }

  execute(command: TextCommand): void {
    switch (command) {
      case 'cursor.up':
        return this.cursorUp();
      case 'cursor.down':
        return this.cursorDown();
      case 'cursor.back':
        return this.cursorBack();
      case 'cursor.forward':
        return this.cursorForward();
      case 'cursor.beginBuffer':
        return this.cursorBeginBuffer();
      case 'cursor.endBuffer':
        return this.cursorEndBuffer();
      case 'cursor.lineStart':
        return this.cursorLineStart();
      case 'cursor.lineEnd':
        return this.cursorLineEnd();
      case 'edit.lineBreak':
        return this.lineBreak();
      case 'edit.deleteBackward':
        return this.charDeleteBackward();
      case 'edit.deleteForward':
        return this.charDeleteForward();
      case 'edit.insertTab':
        return this.insertTab();
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Formatting & Notifications
  // ─────────────────────────────────────────────────────────────────────────

  override format(line: number): FormattedLine {
    const content = this.buffer.line(line);
    return {
      content,
      attributes: highlightLine(content, this.keywords, this.defaults),
    };
  }

  setKeywords(keywords: KeywordColors): void {
    this.keywords = keywords;
    this.redraw();
  }

  override reload(): void {
    super.reload();
    this.place({ line: 0, column: 0 });
  }

  override lineUpdated(line: number): void {
    super.lineUpdated(line);
    // A merge deletes the next line only after this update arrives
    if (line === this._cursor.line) {
      this.revalidate();
    }
  }

  override lineInserted(line: number): void {
    super.lineInserted(line);
    // Keep the cursor on the same text when a line appears above it
    if (line <= this._cursor.line) {
      this._cursor = { line: this._cursor.line + 1, column: this._cursor.column };
    }
    this.revalidate();
  }

  override lineDeleted(line: number): void {
    super.lineDeleted(line);
    if (line < this._cursor.line) {
      this._cursor = { line: this._cursor.line - 1, column: this._cursor.column };
    }
    this.revalidate();
  }

  /**
   * Clamp the cursor after another writer changed the buffer.
   */
  private revalidate(): void {
    this.cursor = this.buffer.clamp(this._cursor);
  }
}

// ============================================
// Factory Function
// ============================================

/**
 * Create a text window.
 */
export function createTextWindow(
  surface: Surface,
  buffer: TextBuffer,
  options?: TextWindowOptions
): TextWindow {
  return new TextWindow(surface, buffer, options);
}
