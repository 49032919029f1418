/**
 * Editor
 *
 * Owns the windows and buffers, routes keys, and runs the main loop.
 *
 * Layout: text windows share the top height-2 rows, the status window sits
 * on row height-2 and the command window on row height-1.
 */

import { BufferFileError, CommandError, errorMessage } from '../core/errors.ts';
import { TextBuffer } from '../core/text-buffer.ts';
import type { UIBackend } from '../ui/backend.ts';
import type { KeyEvent, Rect, TextAttributes } from '../ui/types.ts';
import { keyToString } from '../input/keys.ts';
import { Keymap, type KeyBinding } from '../input/keymap.ts';
import type { EditorSettings } from '../config/settings.ts';
import { debugLog } from '../debug.ts';
import {
  isCommandLineCommand,
  isEditorCommand,
  isTextCommand,
  type CommandLineCommand,
  type EditorCommand,
  type TextCommand,
} from './commands.ts';
import { CommandWindow, type CommandWindowHost } from './command-window.ts';
import { DEFAULT_KEYWORDS, type KeywordColors } from './highlight.ts';
import { StatusWindow } from './status-window.ts';
import { TextWindow } from './text-window.ts';
import type { Window } from './window.ts';

// ============================================
// Types
// ============================================

export interface EditorKeymaps {
  text: Keymap<TextCommand>;
  commandLine: Keymap<CommandLineCommand>;
  editor: Keymap<EditorCommand>;
}

export interface EditorOptions {
  /** Missing settings fall back to plain colors and the built-in keywords */
  settings?: Partial<EditorSettings>;
  keybindings?: readonly KeyBinding[];
}

export interface OpenOptions {
  /** Start an empty buffer for the path when the file does not exist */
  create?: boolean;
}

/**
 * Split bindings into the keymap of each component by command prefix.
 */
export function createKeymaps(bindings: readonly KeyBinding[]): EditorKeymaps {
  const keymaps: EditorKeymaps = {
    text: new Keymap<TextCommand>(),
    commandLine: new Keymap<CommandLineCommand>(),
    editor: new Keymap<EditorCommand>(),
  };
  keymaps.text.load(bindings, isTextCommand);
  keymaps.commandLine.load(bindings, isCommandLineCommand);
  keymaps.editor.load(bindings, isEditorCommand);
  return keymaps;
}

function isMissingFile(error: unknown): boolean {
  if (!(error instanceof BufferFileError)) return false;
  const cause = error.cause;
  return typeof cause === 'object' && cause !== null && 'code' in cause && cause.code === 'ENOENT';
}

// ============================================
// Editor Class
// ============================================

export class Editor implements CommandWindowHost {
  readonly statusWindow: StatusWindow;
  readonly commandWindow: CommandWindow;

  private backend: UIBackend;
  private keymaps: EditorKeymaps;
  private textAttributes: TextAttributes;
  private keywords: KeywordColors;
  private tabSize: number | undefined;

  /** Text windows in cycling order */
  private textWindows: TextWindow[] = [];
  /** Buffers shown by at least one window */
  private _buffers: TextBuffer[] = [];

  private focused: Window;
  private _current: TextWindow;
  private _quitting = false;

  constructor(backend: UIBackend, options: EditorOptions = {}) {
    const settings = options.settings ?? {};
    this.backend = backend;
    this.keymaps = createKeymaps(options.keybindings ?? []);
    this.keywords = settings['editor.highlight.keywords'] ?? DEFAULT_KEYWORDS;
    this.tabSize = settings['editor.tabSize'];
    this.textAttributes = {
      fg: settings['ui.text.foreground'] ?? 'default',
      bg: settings['ui.text.background'] ?? 'default',
    };

    const { width } = backend.size;
    this.statusWindow = new StatusWindow(backend.createSurface({ x: 0, y: 0, width, height: 1 }), {
      fg: settings['ui.status.foreground'] ?? 'default',
      bg: settings['ui.status.background'] ?? 'default',
      inverse: true,
    });
    this.commandWindow = new CommandWindow(
      backend.createSurface({ x: 0, y: 0, width, height: 1 }),
      new TextBuffer(),
      this,
      {
        keymap: this.keymaps.text,
        commandKeymap: this.keymaps.commandLine,
        attributes: {
          fg: settings['ui.command.foreground'] ?? 'default',
          bg: settings['ui.command.background'] ?? 'default',
        },
        tabSize: this.tabSize,
      }
    );

    const first = this.createTextWindow(new TextBuffer());
    this._current = first;
    this.focused = first;
    this.layout();
    first.onFocus();
    debugLog(`[Editor] Created at ${width}x${backend.size.height}`);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // State
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Last focused text window; the target of commands.
   */
  get current(): TextWindow {
    return this._current;
  }

  get focusedWindow(): Window {
    return this.focused;
  }

  get windows(): readonly TextWindow[] {
    return this.textWindows;
  }

  get buffers(): readonly TextBuffer[] {
    return this._buffers;
  }

  get quitting(): boolean {
    return this._quitting;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Layout
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Place every window for the backend's current size.
   */
  layout(): void {
    const { width, height } = this.backend.size;
    const textHeight = Math.max(0, height - 2);
    const count = this.textWindows.length;
    const rowsEach = Math.floor(textHeight / count);

    let y = 0;
    this.textWindows.forEach((window, index) => {
      const rows = index === count - 1 ? textHeight - y : rowsEach;
      window.setBounds({ x: 0, y, width, height: rows });
      y += rows;
    });

    const statusRect: Rect = { x: 0, y: textHeight, width, height: 1 };
    this.statusWindow.setBounds(statusRect);
    this.commandWindow.setBounds({ ...statusRect, y: textHeight + 1 });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Windows
  // ─────────────────────────────────────────────────────────────────────────

  private createTextWindow(buffer: TextBuffer): TextWindow {
    const surface = this.backend.createSurface({ x: 0, y: 0, width: this.backend.size.width, height: 0 });
    const window = new TextWindow(surface, buffer, {
      keymap: this.keymaps.text,
      attributes: this.textAttributes,
      keywords: this.keywords,
      tabSize: this.tabSize,
    });
    this.textWindows.push(window);
    this.trackBuffer(buffer);
    return window;
  }

  private isTextWindow(window: Window): window is TextWindow {
    return this.textWindows.some((textWindow) => textWindow === window);
  }

  private trackBuffer(buffer: TextBuffer): void {
    if (!this._buffers.includes(buffer)) {
      this._buffers.push(buffer);
    }
  }

  private dropIfOrphaned(buffer: TextBuffer): void {
    if (buffer.isOrphaned) {
      this._buffers = this._buffers.filter((b) => b !== buffer);
      debugLog(`[Editor] Dropped buffer ${buffer.filePath ?? '<unnamed>'}`);
    }
  }

  /**
   * Give a window the focus: its cursor shows, the previous one hides.
   */
  focus(window: Window): void {
    if (window !== this.focused) {
      this.focused.onBlur();
      this.focused = window;
    }
    if (this.isTextWindow(window)) {
      this._current = window;
    }
    window.onFocus();
  }

  /**
   * Focus the text window after the current one.
   */
  focusNext(): void {
    const index = this.textWindows.indexOf(this._current);
    const next = this.textWindows[(index + 1) % this.textWindows.length];
    if (next) {
      this.focus(next);
    }
  }

  /**
   * Open a text window on a buffer (a new empty one by default).
   */
  openWindow(buffer: TextBuffer = new TextBuffer()): TextWindow {
    const window = this.createTextWindow(buffer);
    this.layout();
    return window;
  }

  /**
   * Another window on the current buffer.
   */
  split(): TextWindow {
    return this.openWindow(this._current.buffer);
  }

  /**
   * Close a text window. Its buffer goes when no window shows it.
   */
  closeWindow(window: TextWindow): void {
    const index = this.textWindows.indexOf(window);
    if (index === -1) {
      return;
    }
    if (this.textWindows.length === 1) {
      throw new CommandError('Cannot close the last window');
    }

    this.textWindows.splice(index, 1);
    window.close();
    this.dropIfOrphaned(window.buffer);

    if (window === this._current) {
      const neighbor = this.textWindows[Math.min(index, this.textWindows.length - 1)];
      if (neighbor) {
        this._current = neighbor;
      }
    }
    if (window === this.focused) {
      this.focused = this._current;
      this._current.onFocus();
    }
    this.layout();
  }

  /**
   * Show a buffer in a window, dropping the old buffer if nothing else
   * shows it.
   */
  showBuffer(window: TextWindow, buffer: TextBuffer): void {
    const previous = window.buffer;
    if (previous === buffer) return;
    window.buffer = buffer;
    this.trackBuffer(buffer);
    this.dropIfOrphaned(previous);
  }

  /**
   * Focus the command window, or leave it when it has the focus.
   */
  toggleCommandWindow(): void {
    if (this.focused === this.commandWindow) {
      this.leaveCommandWindow();
      return;
    }
    this.commandWindow.buffer.content = '';
    this.focus(this.commandWindow);
  }

  leaveCommandWindow(): void {
    this.focus(this._current);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Files
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Load a file into a new buffer shown in the current window.
   */
  async open(path: string, options: OpenOptions = {}): Promise<void> {
    const buffer = new TextBuffer();
    try {
      await buffer.fileOpen(path);
    } catch (error) {
      if (!options.create || !isMissingFile(error)) {
        throw error;
      }
      buffer.filePath = path;
      debugLog(`[Editor] New file ${path}`);
    }
    this.showBuffer(this._current, buffer);
  }

  /**
   * Write the current buffer. Resolves with the path written.
   */
  save(path?: string): Promise<string> {
    return this._current.buffer.fileWrite(path);
  }

  quit(): void {
    this._quitting = true;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Keys & Commands
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Dispatch one key: the focused window first, then the global keymap.
   * Failures are logged and shown in the status window.
   */
  async keyHandle(key: KeyEvent): Promise<void> {
    this.statusWindow.clearMessage();
    try {
      if (await this.focused.keyHandle(key)) {
        return;
      }

      const command = this.keymaps.editor.lookup(key);
      if (command === null) {
        debugLog(`[Editor] Unbound key ${keyToString(key)}`);
        return;
      }
      await this.execute(command);
    } catch (error) {
      debugLog(`[Editor] Key ${keyToString(key)} failed: ${errorMessage(error)}`);
      this.statusWindow.showMessage(errorMessage(error));
    }
  }

  async execute(command: EditorCommand): Promise<void> {
    switch (command) {
      case 'editor.quit':
        return this.quit();
      case 'editor.save': {
        const path = await this.save();
        this.statusWindow.showMessage(`Saved ${path}`);
        return;
      }
      case 'editor.toggleCommand':
        return this.toggleCommandWindow();
      case 'editor.focusNext':
        return this.focusNext();
      case 'editor.split':
        this.split();
        return;
      case 'editor.closeWindow':
        return this.closeWindow(this._current);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Main Loop
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Refresh the screen and handle keys until quit().
   */
  async run(): Promise<void> {
    debugLog('[Editor] Main loop started');
    while (!this._quitting) {
      this.statusWindow.update(this._current);
      this.backend.refresh();
      const key = await this.focused.surface.keyGet();
      await this.keyHandle(key);
    }
    debugLog('[Editor] Main loop finished');
  }
}

// ============================================
// Factory Function
// ============================================

/**
 * Create an editor on a backend.
 */
export function createEditor(backend: UIBackend, options?: EditorOptions): Editor {
  return new Editor(backend, options);
}
