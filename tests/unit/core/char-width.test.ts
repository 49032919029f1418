/**
 * Character Width Tests
 */

import { describe, test, expect } from 'vitest';
import { getCharWidth, getDisplayWidth, padToWidth } from '../../../src/core/char-width.ts';

describe('getCharWidth', () => {
  test('ASCII is one cell', () => {
    expect(getCharWidth('a')).toBe(1);
    expect(getCharWidth(' ')).toBe(1);
    expect(getCharWidth('~')).toBe(1);
  });

  test('control characters take no cells', () => {
    expect(getCharWidth('\t')).toBe(0);
    expect(getCharWidth('\x7f')).toBe(0);
  });

  test('CJK and emoji are two cells', () => {
    expect(getCharWidth('\u4e2d')).toBe(2);
    expect(getCharWidth('\ud55c')).toBe(2);
    expect(getCharWidth('😀')).toBe(2);
  });

  test('combining marks take no cells', () => {
    expect(getCharWidth('\u0301')).toBe(0);
    expect(getCharWidth('\u200b')).toBe(0);
  });

  test('other letters are one cell', () => {
    expect(getCharWidth('\u00e9')).toBe(1);
    expect(getCharWidth('ж')).toBe(1);
  });
});

describe('getDisplayWidth', () => {
  test('sums character widths', () => {
    expect(getDisplayWidth('abc')).toBe(3);
    expect(getDisplayWidth('a中b')).toBe(4);
    expect(getDisplayWidth('e\u0301')).toBe(1);
    expect(getDisplayWidth('')).toBe(0);
  });
});

describe('padToWidth', () => {
  test('pads short strings with spaces', () => {
    expect(padToWidth('ab', 4)).toBe('ab  ');
  });

  test('cuts long strings', () => {
    expect(padToWidth('abcdef', 3)).toBe('abc');
  });

  test('never splits a wide character', () => {
    expect(padToWidth('a中', 2)).toBe('a ');
  });
});
