/**
 * Keymap Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { Keymap, createKeymap } from '../../../src/input/keymap.ts';
import { createKeyEvent } from '../../../src/input/keys.ts';
import { isTextCommand, type TextCommand } from '../../../src/editor/commands.ts';

describe('Keymap', () => {
  let keymap: Keymap<TextCommand>;

  beforeEach(() => {
    keymap = new Keymap<TextCommand>();
  });

  test('looks up events by normalized key', () => {
    keymap.bind('Alt+i', 'cursor.up');
    expect(keymap.lookup(createKeyEvent('i', { alt: true }))).toBe('cursor.up');
    expect(keymap.lookupKey('alt+i')).toBe('cursor.up');
  });

  test('unbound keys give null', () => {
    expect(keymap.lookup(createKeyEvent('q'))).toBeNull();
  });

  test('a later binding for the same key wins', () => {
    keymap.bind('ctrl+j', 'edit.lineBreak');
    keymap.bind('ctrl+j', 'cursor.down');
    expect(keymap.lookupKey('ctrl+j')).toBe('cursor.down');
    expect(keymap.size).toBe(1);
  });

  test('unbind removes a key', () => {
    keymap.bind('up', 'cursor.up');
    keymap.unbind('ArrowUp');
    expect(keymap.lookupKey('up')).toBeNull();
  });

  test('load keeps only accepted commands', () => {
    const added = keymap.load(
      [
        { key: 'alt+i', command: 'cursor.up' },
        { key: 'alt+q', command: 'editor.quit' },
        { key: 'enter', command: 'edit.lineBreak' },
      ],
      isTextCommand
    );
    expect(added).toBe(2);
    expect(keymap.getBindings()).toEqual([
      { key: 'alt+i', command: 'cursor.up' },
      { key: 'enter', command: 'edit.lineBreak' },
    ]);
  });

  test('keyFor finds the first key of a command', () => {
    keymap.bind('alt+i', 'cursor.up');
    keymap.bind('up', 'cursor.up');
    expect(keymap.keyFor('cursor.up')).toBe('alt+i');
    expect(keymap.keyFor('cursor.down')).toBeUndefined();
  });

  test('clone is independent', () => {
    keymap.bind('enter', 'edit.lineBreak');
    const copy = keymap.clone();
    copy.bind('enter', 'cursor.down');
    expect(keymap.lookupKey('enter')).toBe('edit.lineBreak');
    expect(copy.lookupKey('enter')).toBe('cursor.down');
  });
});

describe('createKeymap', () => {
  test('binds every entry', () => {
    const keymap = createKeymap([
      { key: 'backspace', command: 'edit.deleteBackward' },
      { key: 'C-d', command: 'edit.deleteForward' },
    ]);
    expect(keymap.lookup(createKeyEvent('Backspace'))).toBe('edit.deleteBackward');
    expect(keymap.lookup(createKeyEvent('d', { ctrl: true }))).toBe('edit.deleteForward');
  });
});
