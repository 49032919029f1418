/**
 * Status Window
 *
 * Read-only line showing the cursor of the current text window and its
 * file, or a transient message until the next key.
 */

import type { Position } from '../core/position.ts';
import { formatPosition } from '../core/position.ts';
import { TextBuffer } from '../core/text-buffer.ts';
import type { Surface } from '../ui/backend.ts';
import { DEFAULT_ATTRIBUTES, type TextAttributes } from '../ui/types.ts';
import type { TextWindow } from './text-window.ts';
import { Window } from './window.ts';

/** Width the position is padded to before the file name */
const POSITION_WIDTH = 15;

/**
 * Status text for a cursor and file: "(line+1, column)" padded, then path.
 */
export function formatStatus(cursor: Position, filePath: string | null): string {
  return formatPosition(cursor).padEnd(POSITION_WIDTH) + (filePath ?? '');
}

export class StatusWindow extends Window {
  private _message: string | null = null;

  constructor(surface: Surface, attributes: TextAttributes = { ...DEFAULT_ATTRIBUTES, inverse: true }) {
    super(surface, new TextBuffer(), attributes);
    this.link();
  }

  get message(): string | null {
    return this._message;
  }

  get text(): string {
    return this.buffer.content;
  }

  /**
   * Show a message instead of the position until clearMessage().
   */
  showMessage(message: string): void {
    this._message = message.replace(/\r?\n/g, ' ');
  }

  clearMessage(): void {
    this._message = null;
  }

  /**
   * Refresh the status line from a text window.
   */
  update(window: TextWindow): void {
    const text = this._message ?? formatStatus(window.cursor, window.buffer.filePath);
    if (this.buffer.content !== text) {
      this.buffer.content = text;
    }
  }
}
