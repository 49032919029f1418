/**
 * Text Buffer
 *
 * Line-oriented text storage shared by the windows that display it.
 * Every mutation notifies all linked observers before it returns.
 */

import { readFile, writeFile } from 'node:fs/promises';
import type { Position } from './position.ts';
import { BufferFileError, BufferRangeError, PreconditionError, errorMessage } from './errors.ts';
import { debugLog } from '../debug.ts';

// ============================================
// Types
// ============================================

/**
 * Opaque handle returned by windowLink, used to unlink.
 */
export type ObserverHandle = number;

/**
 * Receives the buffer's line-level change notifications.
 */
export interface BufferObserver {
  /** Whole content replaced (or observer just linked) */
  reload(): void;
  /** Line text changed */
  lineUpdated(line: number): void;
  /** New line inserted at index */
  lineInserted(line: number): void;
  /** Line at index removed */
  lineDeleted(line: number): void;
}

export const LINE_SEPARATOR = '\n';

// ============================================
// Surrogate Pair Helpers
// ============================================

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Width in code units of the character starting at column.
 */
function widthAt(text: string, column: number): number {
  if (
    isHighSurrogate(text.charCodeAt(column)) &&
    isLowSurrogate(text.charCodeAt(column + 1))
  ) {
    return 2;
  }
  return 1;
}

/**
 * Width in code units of the character ending at column.
 */
function widthBefore(text: string, column: number): number {
  if (
    column >= 2 &&
    isLowSurrogate(text.charCodeAt(column - 1)) &&
    isHighSurrogate(text.charCodeAt(column - 2))
  ) {
    return 2;
  }
  return 1;
}

/**
 * Move a column off the middle of a surrogate pair.
 */
function snapColumn(text: string, column: number): number {
  if (
    column > 0 &&
    column < text.length &&
    isLowSurrogate(text.charCodeAt(column)) &&
    isHighSurrogate(text.charCodeAt(column - 1))
  ) {
    return column - 1;
  }
  return column;
}

// ============================================
// TextBuffer Class
// ============================================

export class TextBuffer {
  /** Never empty: an empty buffer is one empty line */
  private _lines: string[];

  /** Linked observers, notified in link order */
  private observers: Map<ObserverHandle, BufferObserver> = new Map();

  private nextHandle: ObserverHandle = 1;

  private _filePath: string | null = null;

  constructor(content = '', observer?: BufferObserver) {
    this._lines = content.split(LINE_SEPARATOR);
    if (observer) {
      this.windowLink(observer);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Content
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Full text, lines joined with the line separator.
   */
  get content(): string {
    return this._lines.join(LINE_SEPARATOR);
  }

  set content(content: string) {
    this._lines = content.split(LINE_SEPARATOR);
    this.notifyReload();
  }

  get lines(): readonly string[] {
    return this._lines;
  }

  get lineCount(): number {
    return this._lines.length;
  }

  /**
   * Get a line's text.
   */
  line(index: number): string {
    this.assertLine(index);
    return this._lines[index] ?? '';
  }

  get filePath(): string | null {
    return this._filePath;
  }

  set filePath(path: string | null) {
    this._filePath = path;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Navigation
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Last valid position: after the last character of the last line.
   */
  get end(): Position {
    const line = this._lines.length - 1;
    return { line, column: this.lineLength(line) };
  }

  /**
   * Position preceding pos in document order, or null at (0, 0).
   * Column 0 of a line steps back onto the previous line's newline.
   */
  charBefore(position: Position): Position | null {
    const { line, column } = position;
    this.assertPosition(line, column);

    if (column > 0) {
      return { line, column: column - widthBefore(this.rawLine(line), column) };
    }
    if (line > 0) {
      return { line: line - 1, column: this.lineLength(line - 1) };
    }
    return null;
  }

  /**
   * Position following pos in document order, or null at the end.
   * The end of a line steps onto column 0 of the next line.
   */
  charAfter(position: Position): Position | null {
    const { line, column } = position;
    this.assertPosition(line, column);

    const length = this.lineLength(line);
    if (column < length) {
      return { line, column: column + widthAt(this.rawLine(line), column) };
    }
    if (line + 1 < this._lines.length) {
      return { line: line + 1, column: 0 };
    }
    return null;
  }

  /**
   * One line up, column clamped to the destination line's length.
   */
  charAbove(line: number, targetColumn: number): Position | null {
    this.assertLine(line);
    this.assertColumnValue(targetColumn);
    if (line === 0) return null;
    return this.clampedOn(line - 1, targetColumn);
  }

  /**
   * One line down, column clamped to the destination line's length.
   */
  charBelow(line: number, targetColumn: number): Position | null {
    this.assertLine(line);
    this.assertColumnValue(targetColumn);
    if (line + 1 >= this._lines.length) return null;
    return this.clampedOn(line + 1, targetColumn);
  }

  /**
   * Start of a line.
   */
  lineStart(line: number): Position {
    this.assertLine(line);
    return { line, column: 0 };
  }

  /**
   * End of a line (before its newline).
   */
  lineEnd(line: number): Position {
    this.assertLine(line);
    return { line, column: this.lineLength(line) };
  }

  /**
   * Nearest valid position to an arbitrary one: line clamped into the
   * buffer, column clamped into that line.
   */
  clamp(position: Position): Position {
    if (position.line >= this._lines.length) {
      return this.end;
    }
    const line = Math.max(0, position.line);
    return this.clampedOn(line, Math.max(0, position.column));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Mutation
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Insert one character at (line, column).
   */
  charInsert(char: string, line: number, column: number): void {
    this.assertPosition(line, column);
    if (char.length === 0 || [...char].length !== 1 || char === LINE_SEPARATOR) {
      throw new PreconditionError(`charInsert expects a single non-newline character, got ${JSON.stringify(char)}`);
    }

    const text = this.rawLine(line);
    this._lines[line] = text.slice(0, column) + char + text.slice(column);
    this.notifyLineUpdated(line);
  }

  /**
   * Delete the character at (line, column). At the end of a line the
   * newline is deleted, merging the next line into this one.
   */
  charDelete(line: number, column: number): void {
    this.assertPosition(line, column);

    const text = this.rawLine(line);
    if (column === text.length) {
      if (line + 1 >= this._lines.length) {
        throw new BufferRangeError(`charDelete at end of buffer (${line}, ${column}): no next line to merge`);
      }
      this._lines.splice(line, 2, text + this.rawLine(line + 1));
      this.notifyLineUpdated(line);
      this.notifyLineDeleted(line + 1);
      return;
    }

    this._lines[line] = text.slice(0, column) + text.slice(column + widthAt(text, column));
    this.notifyLineUpdated(line);
  }

  /**
   * Split a line in two at column.
   */
  lineBreak(line: number, column: number): void {
    this.assertPosition(line, column);

    const text = this.rawLine(line);
    this._lines.splice(line, 1, text.slice(0, column), text.slice(column));
    this.notifyLineUpdated(line);
    this.notifyLineInserted(line + 1);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Observers
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Link an observer and resync it. Linking an already linked observer
   * returns its existing handle.
   */
  windowLink(observer: BufferObserver): ObserverHandle {
    for (const [handle, existing] of this.observers) {
      if (existing === observer) return handle;
    }

    const handle = this.nextHandle++;
    this.observers.set(handle, observer);
    observer.reload();
    return handle;
  }

  /**
   * Unlink an observer. Unknown handles are ignored.
   */
  windowUnlink(handle: ObserverHandle): void {
    this.observers.delete(handle);
  }

  get observerCount(): number {
    return this.observers.size;
  }

  /**
   * No window displays this buffer any more.
   */
  get isOrphaned(): boolean {
    return this.observers.size === 0;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // File I/O
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Load a file into the buffer and associate it with the buffer.
   */
  async fileOpen(path: string): Promise<void> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      throw new BufferFileError(`Cannot open ${path}: ${errorMessage(error)}`, path, { cause: error });
    }

    this._filePath = path;
    this.content = text;
    debugLog(`[TextBuffer] Opened ${path} (${this._lines.length} lines)`);
  }

  /**
   * Write the buffer to path, or to its associated file. A buffer with no
   * file adopts the path it is first written to.
   */
  async fileWrite(path?: string): Promise<string> {
    const target = path ?? this._filePath;
    if (target === null) {
      throw new BufferFileError('No file name', null);
    }

    try {
      await writeFile(target, this.content, 'utf-8');
    } catch (error) {
      throw new BufferFileError(`Cannot write ${target}: ${errorMessage(error)}`, target, { cause: error });
    }

    if (this._filePath === null) {
      this._filePath = target;
    }
    debugLog(`[TextBuffer] Wrote ${target}`);
    return target;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Notification
  // ─────────────────────────────────────────────────────────────────────────

  private notifyReload(): void {
    for (const observer of this.observers.values()) {
      observer.reload();
    }
  }

  private notifyLineUpdated(line: number): void {
    for (const observer of this.observers.values()) {
      observer.lineUpdated(line);
    }
  }

  private notifyLineInserted(line: number): void {
    for (const observer of this.observers.values()) {
      observer.lineInserted(line);
    }
  }

  private notifyLineDeleted(line: number): void {
    for (const observer of this.observers.values()) {
      observer.lineDeleted(line);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  private rawLine(line: number): string {
    return this._lines[line] ?? '';
  }

  private lineLength(line: number): number {
    return this.rawLine(line).length;
  }

  private clampedOn(line: number, column: number): Position {
    const text = this.rawLine(line);
    return { line, column: snapColumn(text, Math.min(column, text.length)) };
  }

  private assertLine(line: number): void {
    if (!Number.isInteger(line) || line < 0 || line >= this._lines.length) {
      throw new PreconditionError(`Line ${line} out of range [0, ${this._lines.length})`);
    }
  }

  private assertColumnValue(column: number): void {
    if (!Number.isInteger(column) || column < 0) {
      throw new PreconditionError(`Invalid column ${column}`);
    }
  }

  private assertPosition(line: number, column: number): void {
    this.assertLine(line);
    const length = this.lineLength(line);
    if (!Number.isInteger(column) || column < 0 || column > length) {
      throw new PreconditionError(`Column ${column} out of range [0, ${length}] on line ${line}`);
    }
    if (snapColumn(this.rawLine(line), column) !== column) {
      throw new PreconditionError(`Column ${column} splits a character on line ${line}`);
    }
  }
}

// ============================================
// Factory Function
// ============================================

/**
 * Create a new text buffer.
 */
export function createTextBuffer(content = '', observer?: BufferObserver): TextBuffer {
  return new TextBuffer(content, observer);
}
