/**
 * File Path Tests
 */

import { describe, test, expect } from 'vitest';
import { join, resolve } from 'node:path';
import { resolveFilePath } from '../../../src/core/paths.ts';

describe('resolveFilePath', () => {
  test('relative paths resolve against the working directory', () => {
    expect(resolveFilePath('a.txt', '/work')).toBe(resolve('/work', 'a.txt'));
    expect(resolveFilePath('/etc/x', '/work')).toBe(resolve('/etc/x'));
  });

  test('~ expands to the home directory', () => {
    expect(resolveFilePath('~/notes.txt', '/work', '/home/me')).toBe(resolve(join('/home/me', 'notes.txt')));
    expect(resolveFilePath('~', '/work', '/home/me')).toBe(resolve('/home/me'));
  });

  test('~ inside a name is left alone', () => {
    expect(resolveFilePath('a~/b', '/work', '/home/me')).toBe(resolve('/work', 'a~/b'));
  });
});
