/**
 * Command Line Tests
 */

import { describe, test, expect } from 'vitest';
import { parseArgs } from '../../src/main.ts';

describe('parseArgs', () => {
  test('no arguments starts an empty editor', () => {
    expect(parseArgs([])).toEqual({
      ok: true,
      options: { help: false, version: false, debug: false, configDir: null, file: null },
    });
  });

  test('flags and one file', () => {
    expect(parseArgs(['--debug', 'notes.txt', '--config', '/tmp/cfg'])).toEqual({
      ok: true,
      options: { help: false, version: false, debug: true, configDir: '/tmp/cfg', file: 'notes.txt' },
    });
  });

  test('short help and version', () => {
    const result = parseArgs(['-h', '-v']);
    expect(result.ok && result.options.help && result.options.version).toBe(true);
  });

  test('errors', () => {
    expect(parseArgs(['--config'])).toEqual({ ok: false, error: '--config needs a directory' });
    expect(parseArgs(['--frob'])).toEqual({ ok: false, error: 'Unknown option: --frob' });
    expect(parseArgs(['a.txt', 'b.txt'])).toEqual({
      ok: false,
      error: 'Only one file can be opened, got a.txt and b.txt',
    });
  });
});
