/**
 * In-Memory Backend
 *
 * A UIBackend that keeps surfaces as plain line arrays and reads keys from
 * a queue. Records every contract call so tests can compare what windows
 * sent to their surfaces.
 */

import type { Surface, UIBackend } from './backend.ts';
import { DEFAULT_ATTRIBUTES, type KeyEvent, type Rect, type Size, type TextAttributes } from './types.ts';

// ============================================
// Types
// ============================================

export type SurfaceOp =
  | { op: 'update'; line: number; content: string }
  | { op: 'insert'; line: number; content: string }
  | { op: 'delete'; line: number };

// ============================================
// Memory Surface
// ============================================

export class MemorySurface implements Surface {
  lines: string[] = [];
  lineAttributes: TextAttributes[][] = [];
  cursor = { line: 0, column: 0 };
  cursorVisible = false;
  defaults: TextAttributes = { ...DEFAULT_ATTRIBUTES };
  bounds: Rect;
  destroyed = false;

  /** Line-level calls in order */
  readonly ops: SurfaceOp[] = [];

  constructor(
    private backend: MemoryBackend,
    rect: Rect
  ) {
    this.bounds = { ...rect };
  }

  lineUpdate(line: number, content: string, attributes: readonly TextAttributes[]): void {
    while (this.lines.length <= line) {
      this.lines.push('');
      this.lineAttributes.push([]);
    }
    this.lines[line] = content;
    this.lineAttributes[line] = [...attributes];
    this.ops.push({ op: 'update', line, content });
  }

  lineInsert(line: number, content: string, attributes: readonly TextAttributes[]): void {
    this.lines.splice(line, 0, content);
    this.lineAttributes.splice(line, 0, [...attributes]);
    this.ops.push({ op: 'insert', line, content });
  }

  lineDelete(line: number): void {
    this.lines.splice(line, 1);
    this.lineAttributes.splice(line, 1);
    this.ops.push({ op: 'delete', line });
  }

  cursorDraw(line: number, column: number): void {
    this.cursor = { line, column };
  }

  cursorShow(): void {
    this.cursorVisible = true;
  }

  cursorHide(): void {
    this.cursorVisible = false;
  }

  attributesSet(attributes: TextAttributes): void {
    this.defaults = { ...attributes };
  }

  setBounds(rect: Rect): void {
    this.bounds = { ...rect };
  }

  destroy(): void {
    this.destroyed = true;
  }

  keyGet(): Promise<KeyEvent> {
    return this.backend.nextKey();
  }
}

// ============================================
// Memory Backend
// ============================================

export class MemoryBackend implements UIBackend {
  size: Size;
  readonly surfaces: MemorySurface[] = [];
  refreshCount = 0;
  closed = false;

  private keys: KeyEvent[] = [];
  private waiters: Array<(key: KeyEvent) => void> = [];

  constructor(size: Size = { width: 80, height: 24 }) {
    this.size = { ...size };
  }

  createSurface(rect: Rect): MemorySurface {
    const surface = new MemorySurface(this, rect);
    this.surfaces.push(surface);
    return surface;
  }

  refresh(): void {
    this.refreshCount++;
  }

  close(): void {
    this.closed = true;
  }

  /**
   * Change the screen size. Callers relayout themselves.
   */
  resize(size: Size): void {
    this.size = { ...size };
  }

  /**
   * Queue keys for keyGet.
   */
  pushKeys(...keys: KeyEvent[]): void {
    for (const key of keys) {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(key);
      } else {
        this.keys.push(key);
      }
    }
  }

  /**
   * Next queued key, or wait for one to be pushed.
   */
  nextKey(): Promise<KeyEvent> {
    const key = this.keys.shift();
    if (key) {
      return Promise.resolve(key);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}

// ============================================
// Factory Function
// ============================================

/**
 * Create an in-memory backend.
 */
export function createMemoryBackend(size?: Size): MemoryBackend {
  return new MemoryBackend(size);
}
