/**
 * Command Window
 *
 * One-line text window for typing command-table commands. Its own keymap is
 * consulted before the text keymap, so Enter runs the line instead of
 * breaking it.
 */

import { errorMessage } from '../core/errors.ts';
import type { TextBuffer } from '../core/text-buffer.ts';
import type { Surface } from '../ui/backend.ts';
import type { KeyEvent } from '../ui/types.ts';
import { Keymap } from '../input/keymap.ts';
import { debugLog } from '../debug.ts';
import type { CommandLineCommand } from './commands.ts';
import { runCommandLine, type CommandContext } from './command-table.ts';
import { TextWindow, type TextWindowOptions } from './text-window.ts';

/**
 * The editor as seen from the command window.
 */
export interface CommandWindowHost extends CommandContext {
  /** Give focus back to the current text window */
  leaveCommandWindow(): void;
}

export interface CommandWindowOptions extends TextWindowOptions {
  commandKeymap?: Keymap<CommandLineCommand>;
}

export class CommandWindow extends TextWindow {
  private commandKeymap: Keymap<CommandLineCommand>;

  constructor(
    surface: Surface,
    buffer: TextBuffer,
    private host: CommandWindowHost,
    options: CommandWindowOptions = {}
  ) {
    super(surface, buffer, options);
    this.commandKeymap = options.commandKeymap ?? new Keymap<CommandLineCommand>();
  }

  override keyHandle(key: KeyEvent): boolean | Promise<boolean> {
    const command = this.commandKeymap.lookup(key);
    if (command !== null) {
      return this.executeLineCommand(command).then(() => true);
    }
    return super.keyHandle(key);
  }

  async executeLineCommand(command: CommandLineCommand): Promise<void> {
    switch (command) {
      case 'command.execute':
        return this.runLine();
      case 'command.cancel':
        return this.cancel();
    }
  }

  /**
   * Run the typed line and replace it with the result or the error.
   */
  async runLine(): Promise<void> {
    const line = this.buffer.content;
    let output: string;
    try {
      output = await runCommandLine(this.host, line);
    } catch (error) {
      debugLog(`[CommandWindow] ${JSON.stringify(line)} failed: ${errorMessage(error)}`);
      output = errorMessage(error);
    }

    this.buffer.content = output.replace(/\r?\n/g, ' ');
    this.cursorEndBuffer();
    this.host.leaveCommandWindow();
  }

  /**
   * Drop the typed line.
   */
  cancel(): void {
    this.buffer.content = '';
    this.host.leaveCommandWindow();
  }
}
