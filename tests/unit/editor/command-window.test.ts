/**
 * Command Window Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { MemoryBackend } from '../../../src/ui/memory-backend.ts';
import { Editor } from '../../../src/editor/editor.ts';
import { key, keys, loadDefaultKeybindings } from '../../helpers/editor-fixtures.ts';

describe('CommandWindow', () => {
  let editor: Editor;

  async function type(...keyStrings: string[]): Promise<void> {
    for (const event of keys(...keyStrings)) {
      await editor.keyHandle(event);
    }
  }

  beforeEach(() => {
    editor = new Editor(new MemoryBackend({ width: 40, height: 10 }), {
      keybindings: loadDefaultKeybindings(),
    });
  });

  test('alt+x moves the focus there and back', async () => {
    await editor.keyHandle(key('alt+x'));
    expect(editor.focusedWindow).toBe(editor.commandWindow);
    await editor.keyHandle(key('alt+x'));
    expect(editor.focusedWindow).toBe(editor.current);
  });

  test('typed text goes to the command line, not the text window', async () => {
    await editor.keyHandle(key('alt+x'));
    await type('l', 'i');
    expect(editor.commandWindow.buffer.content).toBe('li');
    expect(editor.current.buffer.content).toBe('');
  });

  test('enter runs the line and shows the result', async () => {
    editor.current.insertText('a\nb\nc');
    await editor.keyHandle(key('alt+x'));
    await type('l', 'i', 'n', 'e', 's', 'enter');

    expect(editor.commandWindow.buffer.content).toBe('3');
    expect(editor.commandWindow.cursor).toEqual({ line: 0, column: 1 });
    expect(editor.focusedWindow).toBe(editor.current);
    expect(editor.current.buffer.lines).toEqual(['a', 'b', 'c']);
  });

  test('errors replace the line', async () => {
    await editor.keyHandle(key('alt+x'));
    await type('n', 'o', 'p', 'e', 'enter');
    expect(editor.commandWindow.buffer.content).toBe('Unknown command: nope');
    expect(editor.statusWindow.message).toBeNull();
  });

  test('escape drops the line', async () => {
    await editor.keyHandle(key('alt+x'));
    await type('q', 'u', 'i', 't', 'escape');
    expect(editor.commandWindow.buffer.content).toBe('');
    expect(editor.focusedWindow).toBe(editor.current);
    expect(editor.quitting).toBe(false);
  });

  test('entering clears the previous result', async () => {
    await editor.keyHandle(key('alt+x'));
    await type('l', 'i', 'n', 'e', 's', 'enter');
    expect(editor.commandWindow.buffer.content).toBe('1');

    await editor.keyHandle(key('alt+x'));
    expect(editor.commandWindow.buffer.content).toBe('');
  });

  test('text editing keys work on the command line', async () => {
    await editor.keyHandle(key('alt+x'));
    await type('a', 'b', 'backspace', 'c');
    expect(editor.commandWindow.buffer.content).toBe('ac');
  });

  test('commands act on the last focused text window', async () => {
    const first = editor.current;
    await editor.keyHandle(key('alt+2'));
    await editor.keyHandle(key('alt+o'));
    const second = editor.current;
    expect(second).not.toBe(first);

    await editor.keyHandle(key('alt+x'));
    await type('i', 'n', 's', 'e', 'r', 't', 'space', 'z', 'enter');
    expect(second.buffer.content).toBe('z');
    expect(second.cursor).toEqual({ line: 0, column: 1 });
    expect(first.cursor).toEqual({ line: 0, column: 0 });
  });
});
