/**
 * Command Table Tests
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CommandError } from '../../../src/core/errors.ts';
import { MemoryBackend } from '../../../src/ui/memory-backend.ts';
import { Editor } from '../../../src/editor/editor.ts';
import {
  COMMAND_TABLE,
  lookupCommand,
  parseCommandLine,
  runCommandLine,
  splitArgs,
} from '../../../src/editor/command-table.ts';

describe('parseCommandLine', () => {
  test('splits name, words and the raw rest', () => {
    expect(parseCommandLine('  goto  3 4 ')).toEqual({ name: 'goto', args: ['3', '4'], rest: '3 4 ' });
    expect(parseCommandLine('lines')).toEqual({ name: 'lines', args: [], rest: '' });
  });

  test('quoted words keep their spaces', () => {
    expect(parseCommandLine('open "my notes.txt"')).toEqual({
      name: 'open',
      args: ['my notes.txt'],
      rest: '"my notes.txt"',
    });
  });

  test('blank lines parse to null', () => {
    expect(parseCommandLine('')).toBeNull();
    expect(parseCommandLine('   ')).toBeNull();
  });
});

describe('splitArgs', () => {
  test('quotes group words', () => {
    expect(splitArgs(`a "b c" 'd  e'`)).toEqual(['a', 'b c', 'd  e']);
    expect(splitArgs('x"y z"w')).toEqual(['xy zw']);
    expect(splitArgs('"" b')).toEqual(['', 'b']);
  });

  test('backslash escapes the next character', () => {
    expect(splitArgs('my\\ notes.txt')).toEqual(['my notes.txt']);
    expect(splitArgs('"say \\"hi\\""')).toEqual(['say "hi"']);
    expect(splitArgs("'a\\b'")).toEqual(['a\\b']);
  });

  test('an unclosed quote runs to the end', () => {
    expect(splitArgs(`don't stop`)).toEqual(['dont stop']);
  });
});

describe('lookupCommand', () => {
  test('finds table entries', () => {
    expect(lookupCommand('save')).toBe(COMMAND_TABLE['save']);
  });

  test('unknown names and object keys are rejected', () => {
    expect(() => lookupCommand('frob')).toThrow(CommandError);
    expect(() => lookupCommand('toString')).toThrow('Unknown command: toString');
  });
});

describe('runCommandLine', () => {
  let editor: Editor;

  beforeEach(() => {
    editor = new Editor(new MemoryBackend({ width: 40, height: 10 }));
    editor.current.insertText('ab\ncd');
  });

  test('a blank line does nothing', async () => {
    expect(await runCommandLine(editor, '')).toBe('');
  });

  test('argument counts are checked against the usage', async () => {
    await expect(runCommandLine(editor, 'lines 3')).rejects.toThrow('Usage: lines');
    await expect(runCommandLine(editor, 'goto')).rejects.toThrow('Usage: goto <line> [column]');
  });

  test('help lists commands or describes one', async () => {
    expect(await runCommandLine(editor, 'help')).toBe(Object.keys(COMMAND_TABLE).join(' '));
    expect(await runCommandLine(editor, 'help goto')).toBe('goto <line> [column]: move the cursor (line counts from 1)');
    await expect(runCommandLine(editor, 'help nope')).rejects.toThrow('Unknown command: nope');
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Cursor Commands
  // ─────────────────────────────────────────────────────────────────────────

  test('lines and cursor report on the current window', async () => {
    expect(await runCommandLine(editor, 'lines')).toBe('2');
    expect(await runCommandLine(editor, 'cursor')).toBe('(2, 2)');
  });

  test('goto moves to a 1-based line', async () => {
    expect(await runCommandLine(editor, 'goto 1 1')).toBe('(1, 1)');
    expect(editor.current.cursor).toEqual({ line: 0, column: 1 });
    expect(await runCommandLine(editor, 'goto 2')).toBe('(2, 0)');
  });

  test('goto clamps past the end', async () => {
    expect(await runCommandLine(editor, 'goto 9 9')).toBe('(2, 2)');
  });

  test('goto rejects bad numbers', async () => {
    await expect(runCommandLine(editor, 'goto 0')).rejects.toThrow('line must be an integer >= 1, got 0');
    await expect(runCommandLine(editor, 'goto 1 x')).rejects.toThrow('column must be an integer >= 0, got x');
  });

  test('begin and end jump through the buffer', async () => {
    expect(await runCommandLine(editor, 'begin')).toBe('');
    expect(editor.current.cursor).toEqual({ line: 0, column: 0 });
    await runCommandLine(editor, 'end');
    expect(editor.current.cursor).toEqual({ line: 1, column: 2 });
  });

  test('insert types the raw rest with escaped newlines', async () => {
    await runCommandLine(editor, 'begin');
    await runCommandLine(editor, 'insert x  y\\nz');
    expect(editor.current.buffer.lines).toEqual(['x  y', 'zab', 'cd']);
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Window Commands
  // ─────────────────────────────────────────────────────────────────────────

  test('split, next and close manage windows', async () => {
    const first = editor.current;
    await runCommandLine(editor, 'split');
    expect(editor.windows).toHaveLength(2);

    await runCommandLine(editor, 'next');
    expect(editor.current).not.toBe(first);

    await runCommandLine(editor, 'close');
    expect(editor.windows).toEqual([first]);
    await expect(runCommandLine(editor, 'close')).rejects.toThrow('Cannot close the last window');
  });

  test('quit asks the editor to stop', async () => {
    await runCommandLine(editor, 'quit');
    expect(editor.quitting).toBe(true);
  });

  // ─────────────────────────────────────────────────────────────────────────
  // File Commands
  // ─────────────────────────────────────────────────────────────────────────

  describe('files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'scribe-commands-'));
    });

    afterEach(async () => {
      vi.unstubAllEnvs();
      await rm(dir, { recursive: true, force: true });
    });

    test('save writes the current buffer', async () => {
      const path = join(dir, 'out.txt');
      expect(await runCommandLine(editor, `save ${path}`)).toBe(`Saved ${path}`);
      expect(await readFile(path, 'utf-8')).toBe('ab\ncd');
      expect(await runCommandLine(editor, 'save')).toBe(`Saved ${path}`);
    });

    test('open loads a file into the current window', async () => {
      const path = join(dir, 'out.txt');
      await runCommandLine(editor, `save ${path}`);

      const other = new Editor(new MemoryBackend({ width: 40, height: 10 }));
      expect(await runCommandLine(other, `open ${path}`)).toBe(`Opened ${path}`);
      expect(other.current.buffer.lines).toEqual(['ab', 'cd']);
    });

    test('quoted paths may contain spaces', async () => {
      const path = join(dir, 'my notes.txt');
      expect(await runCommandLine(editor, `save "${path}"`)).toBe(`Saved ${path}`);

      const other = new Editor(new MemoryBackend({ width: 40, height: 10 }));
      expect(await runCommandLine(other, `open "${path}"`)).toBe(`Opened ${path}`);
      expect(other.current.buffer.lines).toEqual(['ab', 'cd']);
    });

    test('~ expands to the home directory', async () => {
      vi.stubEnv('HOME', dir);
      expect(await runCommandLine(editor, 'save ~/home.txt')).toBe(`Saved ${join(dir, 'home.txt')}`);
      expect(await readFile(join(dir, 'home.txt'), 'utf-8')).toBe('ab\ncd');

      const other = new Editor(new MemoryBackend({ width: 40, height: 10 }));
      expect(await runCommandLine(other, 'open ~/home.txt')).toBe(`Opened ${join(dir, 'home.txt')}`);
    });

    test('open reports a missing file', async () => {
      await expect(runCommandLine(editor, `open ${join(dir, 'missing.txt')}`)).rejects.toThrow('Cannot open');
    });
  });
});
