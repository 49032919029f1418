/**
 * Command Table
 *
 * Named commands for the command window. Each entry declares its usage and
 * runs against the editor through CommandContext; there is no evaluation
 * of arbitrary text.
 */

import { CommandError } from '../core/errors.ts';
import { resolveFilePath } from '../core/paths.ts';
import { formatPosition } from '../core/position.ts';
import type { TextWindow } from './text-window.ts';

// ============================================
// Types
// ============================================

/**
 * What commands can reach. Implemented by the Editor.
 */
export interface CommandContext {
  /** Text window commands act on */
  readonly current: TextWindow;
  open(path: string): Promise<void>;
  save(path?: string): Promise<string>;
  split(): TextWindow;
  focusNext(): void;
  closeWindow(window: TextWindow): void;
  quit(): void;
}

export interface CommandDefinition {
  usage: string;
  summary: string;
  minArgs: number;
  maxArgs: number;
  /** args are the words after the name, unquoted; rest is the raw text after it */
  run(context: CommandContext, args: string[], rest: string): string | void | Promise<string | void>;
}

export interface ParsedCommandLine {
  name: string;
  args: string[];
  rest: string;
}

// ============================================
// Argument Helpers
// ============================================

function parseIntegerArg(value: string | undefined, label: string, min: number): number {
  const number = Number(value);
  if (value === undefined || !Number.isInteger(number) || number < min) {
    throw new CommandError(`${label} must be an integer >= ${min}, got ${value ?? 'nothing'}`);
  }
  return number;
}

// ============================================
// Command Table
// ============================================

export const COMMAND_TABLE: Readonly<Record<string, CommandDefinition>> = {
  help: {
    usage: 'help [command]',
    summary: 'list commands or describe one',
    minArgs: 0,
    maxArgs: 1,
    run: (_context, [name]) => {
      if (name === undefined) {
        return Object.keys(COMMAND_TABLE).join(' ');
      }
      const command = lookupCommand(name);
      return `${command.usage}: ${command.summary}`;
    },
  },
  open: {
    usage: 'open <path>',
    summary: 'load a file into the current window',
    minArgs: 1,
    maxArgs: 1,
    run: async (context, [path = '']) => {
      const resolved = resolveFilePath(path);
      await context.open(resolved);
      return `Opened ${resolved}`;
    },
  },
  save: {
    usage: 'save [path]',
    summary: 'write the current buffer',
    minArgs: 0,
    maxArgs: 1,
    run: async (context, [path]) => {
      const written = await context.save(path === undefined ? undefined : resolveFilePath(path));
      return `Saved ${written}`;
    },
  },
  goto: {
    usage: 'goto <line> [column]',
    summary: 'move the cursor (line counts from 1)',
    minArgs: 1,
    maxArgs: 2,
    run: (context, [line, column]) => {
      const target = {
        line: parseIntegerArg(line, 'line', 1) - 1,
        column: column === undefined ? 0 : parseIntegerArg(column, 'column', 0),
      };
      context.current.cursorGoto(target);
      return formatPosition(context.current.cursor);
    },
  },
  lines: {
    usage: 'lines',
    summary: 'number of lines in the current buffer',
    minArgs: 0,
    maxArgs: 0,
    run: (context) => String(context.current.buffer.lineCount),
  },
  cursor: {
    usage: 'cursor',
    summary: 'cursor position of the current window',
    minArgs: 0,
    maxArgs: 0,
    run: (context) => formatPosition(context.current.cursor),
  },
  begin: {
    usage: 'begin',
    summary: 'move to the start of the buffer',
    minArgs: 0,
    maxArgs: 0,
    run: (context) => {
      context.current.cursorBeginBuffer();
    },
  },
  end: {
    usage: 'end',
    summary: 'move to the end of the buffer',
    minArgs: 0,
    maxArgs: 0,
    run: (context) => {
      context.current.cursorEndBuffer();
    },
  },
  insert: {
    usage: 'insert <text>',
    summary: 'type text at the cursor (\\n breaks the line)',
    minArgs: 1,
    maxArgs: Infinity,
    run: (context, _args, rest) => {
      context.current.insertText(rest.replace(/\\n/g, '\n'));
    },
  },
  split: {
    usage: 'split',
    summary: 'open another window on the current buffer',
    minArgs: 0,
    maxArgs: 0,
    run: (context) => {
      context.split();
    },
  },
  next: {
    usage: 'next',
    summary: 'focus the next text window',
    minArgs: 0,
    maxArgs: 0,
    run: (context) => {
      context.focusNext();
    },
  },
  close: {
    usage: 'close',
    summary: 'close the current window',
    minArgs: 0,
    maxArgs: 0,
    run: (context) => {
      context.closeWindow(context.current);
    },
  },
  quit: {
    usage: 'quit',
    summary: 'leave the editor',
    minArgs: 0,
    maxArgs: 0,
    run: (context) => {
      context.quit();
    },
  },
};

// ============================================
// Parsing & Running
// ============================================

/**
 * Split text into words. Quotes group words and a backslash escapes the
 * next character (not inside single quotes). An unclosed quote runs to
 * the end of the text.
 */
export function splitArgs(text: string): string[] {
  const words: string[] = [];
  let word = '';
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);

    if (quote !== null) {
      if (char === quote) {
        quote = null;
      } else if (char === '\\' && quote === '"' && i + 1 < text.length) {
        word += text.charAt(++i);
      } else {
        word += char;
      }
      continue;
    }

    if (/\s/.test(char)) {
      if (inWord) {
        words.push(word);
        word = '';
        inWord = false;
      }
      continue;
    }

    inWord = true;
    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === '\\' && i + 1 < text.length) {
      word += text.charAt(++i);
    } else {
      word += char;
    }
  }

  if (inWord) {
    words.push(word);
  }
  return words;
}

/**
 * Split a command line into name, words and raw remainder.
 * Returns null for a blank line.
 */
export function parseCommandLine(text: string): ParsedCommandLine | null {
  const match = /^\s*(\S+)\s*(.*)$/s.exec(text);
  if (!match) {
    return null;
  }
  const [, name = '', rest = ''] = match;
  return { name, args: splitArgs(rest), rest };
}

/**
 * Find a command by name.
 */
export function lookupCommand(name: string): CommandDefinition {
  const command = Object.hasOwn(COMMAND_TABLE, name) ? COMMAND_TABLE[name] : undefined;
  if (!command) {
    throw new CommandError(`Unknown command: ${name}`);
  }
  return command;
}

/**
 * Run a command line. Resolves with the text to show ('' for none).
 */
export async function runCommandLine(context: CommandContext, text: string): Promise<string> {
  const parsed = parseCommandLine(text);
  if (!parsed) {
    return '';
  }

  const command = lookupCommand(parsed.name);
  if (parsed.args.length < command.minArgs || parsed.args.length > command.maxArgs) {
    throw new CommandError(`Usage: ${command.usage}`);
  }

  const result = await command.run(context, parsed.args, parsed.rest);
  return typeof result === 'string' ? result : '';
}
