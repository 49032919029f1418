/**
 * Key Reader
 *
 * Reads raw terminal input and turns it into KeyEvents: CSI and SS3
 * sequences, ESC-prefixed Alt keys, control characters, and printable
 * characters (including surrogate pairs). Events queue up until next()
 * takes them.
 */

import type { KeyEvent } from '../ui/types.ts';
import { createKeyEvent } from '../input/keys.ts';
import { ESC } from './ansi.ts';
import { debugLog } from '../debug.ts';

// ============================================
// Constants
// ============================================

/** Final byte of CSI/SS3 sequences without a number */
const LETTER_KEYS: Record<string, string> = {
  A: 'ArrowUp',
  B: 'ArrowDown',
  C: 'ArrowRight',
  D: 'ArrowLeft',
  H: 'Home',
  F: 'End',
  P: 'F1',
  Q: 'F2',
  R: 'F3',
  S: 'F4',
};

/** Number of `CSI n ~` sequences */
const TILDE_KEYS: Record<number, string> = {
  1: 'Home',
  2: 'Insert',
  3: 'Delete',
  4: 'End',
  5: 'PageUp',
  6: 'PageDown',
  7: 'Home',
  8: 'End',
  11: 'F1',
  12: 'F2',
  13: 'F3',
  14: 'F4',
  15: 'F5',
  17: 'F6',
  18: 'F7',
  19: 'F8',
  20: 'F9',
  21: 'F10',
  23: 'F11',
  24: 'F12',
};

/** Keycodes of `CSI code u` that name a key rather than a character */
const CODEPOINT_KEYS: Record<number, string> = {
  9: 'Tab',
  13: 'Enter',
  27: 'Escape',
  127: 'Backspace',
};

const CSI_PATTERN = /^\x1b\[(\d*)(?:;(\d+))?([A-Za-z~])/;
const SS3_PATTERN = /^\x1bO([A-DFHPQRS])/;
const PARTIAL_CSI = /^\x1b(\[[\d;]*|O)?$/;

// ============================================
// Types
// ============================================

/** The part of a readable stream the reader uses */
export interface KeySource {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  off(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
}

// ============================================
// Helpers
// ============================================

/**
 * Decode the xterm modifier parameter (1 + bitmask).
 */
function decodeModifiers(param: string | undefined): Pick<KeyEvent, 'ctrl' | 'alt' | 'shift' | 'meta'> {
  const bits = (param ? parseInt(param, 10) : 1) - 1;
  return {
    shift: (bits & 1) !== 0,
    alt: (bits & 2) !== 0,
    ctrl: (bits & 4) !== 0,
    meta: (bits & 8) !== 0,
  };
}

/**
 * Key for a single character outside any escape sequence.
 */
function keyForChar(char: string): KeyEvent | null {
  const code = char.codePointAt(0) ?? 0;
  switch (code) {
    case 8:
    case 127:
      return createKeyEvent('Backspace');
    case 9:
      return createKeyEvent('Tab');
    case 10:
    case 13:
      return createKeyEvent('Enter');
    case 27:
      return createKeyEvent('Escape');
    case 0:
      return createKeyEvent(' ', { ctrl: true });
  }
  if (code >= 1 && code <= 26) {
    return createKeyEvent(String.fromCharCode(code + 96), { ctrl: true });
  }
  if (code < 32) {
    return null;
  }
  return createKeyEvent(char, {
    shift: char !== char.toLowerCase() && char.toLowerCase() !== char.toUpperCase(),
  });
}

/**
 * The first character of text, keeping a surrogate pair together.
 */
function firstChar(text: string): string {
  return String.fromCodePoint(text.codePointAt(0) ?? 0);
}

// ============================================
// Key Reader
// ============================================

export class KeyReader {
  private isRunning = false;
  private buffer = '';
  private escapeTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly escapeTimeout = 50;

  private queue: KeyEvent[] = [];
  private waiters: Array<(event: KeyEvent) => void> = [];

  constructor(private input: KeySource = process.stdin) {}

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Start reading: raw mode on, stream flowing.
   */
  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;

    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }
    this.input.setEncoding('utf8');
    this.input.on('data', this.handleData);
    this.input.resume();
  }

  /**
   * Stop reading and restore cooked mode.
   */
  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;

    if (this.escapeTimer) {
      clearTimeout(this.escapeTimer);
      this.escapeTimer = null;
    }

    this.input.off('data', this.handleData);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.input.pause();
  }

  isActive(): boolean {
    return this.isRunning;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Consuming
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Next key: the oldest queued one, or the next one to arrive.
   */
  next(): Promise<KeyEvent> {
    const event = this.queue.shift();
    if (event) {
      return Promise.resolve(event);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Number of keys parsed and not yet taken.
   */
  get pending(): number {
    return this.queue.length;
  }

  /**
   * Feed input as if it came from the terminal (for testing).
   */
  simulateInput(data: string): void {
    this.buffer += data;
    this.parseBuffer();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Parsing
  // ─────────────────────────────────────────────────────────────────────────

  private handleData = (chunk: string | Buffer): void => {
    this.buffer += typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    this.parseBuffer();
  };

  private parseBuffer(): void {
    if (this.escapeTimer) {
      clearTimeout(this.escapeTimer);
      this.escapeTimer = null;
    }

    while (this.buffer.length > 0) {
      const consumed = this.tryParse();
      if (consumed === 0) {
        // Incomplete escape sequence: wait a little for the rest of it,
        // then take what we have as a lone Escape
        this.escapeTimer = setTimeout(() => {
          this.escapeTimer = null;
          this.emitKey(createKeyEvent('Escape'));
          this.buffer = this.buffer.slice(1);
          this.parseBuffer();
        }, this.escapeTimeout);
        return;
      }
      this.buffer = this.buffer.slice(consumed);
    }
  }

  /**
   * Parse one key off the front of the buffer. Returns the number of code
   * units consumed, or 0 when more input is needed.
   */
  private tryParse(): number {
    const buffer = this.buffer;

    if (!buffer.startsWith(ESC)) {
      const char = firstChar(buffer);
      const event = keyForChar(char);
      if (event) {
        this.emitKey(event);
      } else {
        debugLog(`[KeyReader] Ignoring control character ${char.charCodeAt(0)}`);
      }
      return char.length;
    }

    if (PARTIAL_CSI.test(buffer)) {
      return 0;
    }

    const csi = CSI_PATTERN.exec(buffer);
    if (csi) {
      const [sequence, number = '', modifiers, final = ''] = csi;
      const event = this.csiKey(number, modifiers, final);
      if (event) {
        this.emitKey(event);
      } else {
        debugLog(`[KeyReader] Unknown sequence ${JSON.stringify(sequence)}`);
      }
      return sequence.length;
    }

    const ss3 = SS3_PATTERN.exec(buffer);
    if (ss3) {
      this.emitKey(createKeyEvent(LETTER_KEYS[ss3[1] ?? ''] ?? 'Escape'));
      return ss3[0].length;
    }

    // ESC followed by a key: that key with Alt
    const rest = buffer.slice(1);
    if (rest.startsWith(ESC)) {
      this.emitKey(createKeyEvent('Escape'));
      return 1;
    }
    const char = firstChar(rest);
    const event = keyForChar(char);
    if (event) {
      event.alt = true;
      this.emitKey(event);
    }
    return 1 + char.length;
  }

  private csiKey(number: string, modifiers: string | undefined, final: string): KeyEvent | null {
    const mods = decodeModifiers(modifiers);

    if (final === 'u') {
      const code = parseInt(number, 10);
      if (!Number.isInteger(code) || code < 0 || code > 0x10ffff) return null;
      const key = CODEPOINT_KEYS[code] ?? String.fromCodePoint(code);
      return createKeyEvent(key, mods);
    }
    if (final === '~') {
      const key = TILDE_KEYS[parseInt(number, 10)];
      return key ? createKeyEvent(key, mods) : null;
    }
    if (final === 'Z') {
      return createKeyEvent('Tab', { ...mods, shift: true });
    }
    const key = LETTER_KEYS[final];
    return key ? createKeyEvent(key, mods) : null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Event Emission
  // ─────────────────────────────────────────────────────────────────────────

  private emitKey(event: KeyEvent): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
    } else {
      this.queue.push(event);
    }
  }
}

// ============================================
// Factory Function
// ============================================

/**
 * Create a key reader on stdin (or another source).
 */
export function createKeyReader(input?: KeySource): KeyReader {
  return new KeyReader(input);
}
