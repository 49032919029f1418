/**
 * Debug Log Tests
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { debugLog, isDebugEnabled, setDebugEnabled } from '../../src/debug.ts';

describe('debugLog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'scribe-debug-'));
  });

  afterEach(async () => {
    setDebugEnabled(false);
    await rm(dir, { recursive: true, force: true });
  });

  test('writes nothing while disabled', () => {
    const path = join(dir, 'debug.log');
    setDebugEnabled(false, path);
    debugLog('[Test] hidden');
    expect(isDebugEnabled()).toBe(false);
    expect(existsSync(path)).toBe(false);
  });

  test('appends timestamped lines when enabled', async () => {
    const path = join(dir, 'debug.log');
    setDebugEnabled(true, path);
    debugLog('[Test] one');
    debugLog('[Test] two');

    const lines = (await readFile(path, 'utf-8')).trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[Test\] one$/);
    expect(lines[1]?.endsWith('] [Test] two')).toBe(true);
  });

  test('an unwritable log turns logging off', () => {
    setDebugEnabled(true, join(dir, 'missing', 'debug.log'));
    debugLog('[Test] lost');
    expect(isDebugEnabled()).toBe(false);
  });
});
