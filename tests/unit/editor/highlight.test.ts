/**
 * Keyword Highlighting and Command ID Tests
 */

import { describe, test, expect } from 'vitest';
import { DEFAULT_KEYWORDS, highlightLine } from '../../../src/editor/highlight.ts';
import { commandScope, isEditorCommand, isTextCommand } from '../../../src/editor/commands.ts';
import type { TextAttributes } from '../../../src/ui/types.ts';

const plain: TextAttributes = { fg: 'default', bg: 'black' };

const LETTERS: Record<string, string> = { brightRed: 'r', brightGreen: 'g' };

function colors(attributes: TextAttributes[]): string {
  return attributes.map((a) => LETTERS[a.fg] ?? '.').join('');
}

describe('highlightLine', () => {
  test('one entry per code unit', () => {
    expect(highlightLine('ab', {}, plain)).toEqual([plain, plain]);
    expect(highlightLine('', DEFAULT_KEYWORDS, plain)).toEqual([]);
  });

  test('colors whole keywords and keeps the background', () => {
    const attributes = highlightLine('def f(): return x', DEFAULT_KEYWORDS, plain);
    expect(colors(attributes)).toBe('rrr......gggggg..');
    expect(attributes[0]).toEqual({ fg: 'brightRed', bg: 'black' });
  });

  test('keywords inside other words are not colored', () => {
    expect(colors(highlightLine('undef returns _def', DEFAULT_KEYWORDS, plain))).toBe('..................');
  });
});

describe('command ids', () => {
  test('scope by prefix', () => {
    expect(commandScope('cursor.up')).toBe('text');
    expect(commandScope('command.cancel')).toBe('commandLine');
    expect(commandScope('editor.split')).toBe('editor');
    expect(commandScope('editor.frobnicate')).toBeNull();
  });

  test('guards', () => {
    expect(isTextCommand('edit.insertTab')).toBe(true);
    expect(isTextCommand('editor.quit')).toBe(false);
    expect(isEditorCommand('editor.quit')).toBe(true);
  });
});
