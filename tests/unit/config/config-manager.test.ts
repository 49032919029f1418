/**
 * Config Manager Tests
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigManager, createConfigManager, parseJsonc, stripJsonComments } from '../../../src/config/config-manager.ts';
import { ConfigError } from '../../../src/core/errors.ts';

// ============================================
// JSONC
// ============================================

describe('stripJsonComments', () => {
  test('removes line and block comments', () => {
    expect(stripJsonComments('a // note\nb')).toBe('a \nb');
    expect(stripJsonComments('a /* x\ny */b')).toBe('a b');
  });

  test('leaves comment markers inside strings', () => {
    expect(stripJsonComments('{"url": "http://x/*y*/"} // z')).toBe('{"url": "http://x/*y*/"} ');
    expect(stripJsonComments('"a\\"//b"')).toBe('"a\\"//b"');
  });

  test('parseJsonc reads commented JSON', () => {
    expect(parseJsonc('{\n  // tab\n  "editor.tabSize": 2\n}')).toEqual({ 'editor.tabSize': 2 });
  });
});

// ============================================
// ConfigManager
// ============================================

describe('ConfigManager', () => {
  let dir: string;
  let userDir: string;
  let config: ConfigManager;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'scribe-config-'));
    userDir = join(dir, 'user');
    config = createConfigManager({ userDir });
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  async function writeUserFile(name: string, content: string): Promise<string> {
    await mkdir(userDir, { recursive: true });
    const path = join(userDir, name);
    await writeFile(path, content, 'utf-8');
    return path;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Paths
  // ─────────────────────────────────────────────────────────────────────────

  describe('paths', () => {
    test('user files live in the user directory', () => {
      const paths = config.getPaths();
      expect(paths.userDir).toBe(userDir);
      expect(paths.userSettings).toBe(join(userDir, 'settings.jsonc'));
      expect(paths.userKeybindings).toBe(join(userDir, 'keybindings.jsonc'));
    });

    test('SCRIBE_CONFIG_DIR sets the user directory', () => {
      vi.stubEnv('SCRIBE_CONFIG_DIR', join(dir, 'from-env'));
      expect(new ConfigManager().getPaths().userDir).toBe(join(dir, 'from-env'));
    });

    test('defaults to ~/.scribe', () => {
      vi.stubEnv('SCRIBE_CONFIG_DIR', '');
      vi.stubEnv('HOME', join(dir, 'home'));
      expect(new ConfigManager().getPaths().userDir).toBe(join(dir, 'home', '.scribe'));
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Loading
  // ─────────────────────────────────────────────────────────────────────────

  describe('load', () => {
    test('first run writes commented copies of the defaults', async () => {
      await config.load();
      expect(config.isLoaded()).toBe(true);
      expect(config.getProblems()).toEqual([]);

      const settingsText = await readFile(join(userDir, 'settings.jsonc'), 'utf-8');
      expect(settingsText.startsWith('// Editor settings - edit this file to customize scribe\n')).toBe(true);
      expect(parseJsonc(settingsText)).toEqual(config.getAllSettings());

      const keybindingsText = await readFile(join(userDir, 'keybindings.jsonc'), 'utf-8');
      expect(parseJsonc(keybindingsText)).toEqual(config.getKeybindings());
    });

    test('shipped defaults fill every setting', async () => {
      await config.load();
      const settings = config.getSettings();
      expect(settings['editor.tabSize']).toBe(4);
      expect(settings['editor.highlight.keywords']).toEqual({ return: 'brightGreen', def: 'brightRed' });
      expect(settings['ui.status.background']).toBe('default');
    });

    test('existing user files are not overwritten', async () => {
      const path = await writeUserFile('settings.jsonc', '{ "editor.tabSize": 2 }');
      await config.load();
      expect(await readFile(path, 'utf-8')).toBe('{ "editor.tabSize": 2 }');
    });

    test('user settings override the defaults', async () => {
      await writeUserFile('settings.jsonc', '{\n  // narrow\n  "editor.tabSize": 2,\n  "ui.text.foreground": "cyan"\n}');
      await config.load();
      expect(config.get('editor.tabSize')).toBe(2);
      expect(config.get('ui.text.foreground')).toBe('cyan');
      expect(config.get('ui.text.background')).toBe('default');
    });

    test('invalid user settings are reported and skipped', async () => {
      const path = await writeUserFile('settings.jsonc', '{ "editor.tabSize": -1, "editor.font": "mono" }');
      await config.load();
      expect(config.get('editor.tabSize')).toBe(4);
      expect(config.getProblems()).toEqual([
        `${path}: ignored setting editor.tabSize`,
        `${path}: ignored setting editor.font`,
      ]);
    });

    test('an unparseable user file is reported and the defaults kept', async () => {
      const path = await writeUserFile('settings.jsonc', '{ "editor.tabSize": ');
      await config.load();
      expect(config.get('editor.tabSize')).toBe(4);
      const problems = config.getProblems();
      expect(problems).toHaveLength(1);
      expect(problems[0]?.startsWith(`${path}: `)).toBe(true);
    });

    test('load only reads once', async () => {
      await config.load();
      await writeUserFile('settings.jsonc', '{ "editor.tabSize": 2 }');
      await config.load();
      expect(config.get('editor.tabSize')).toBe(4);
    });

    test('broken shipped defaults are fatal', async () => {
      const defaultsDir = join(dir, 'defaults');
      await mkdir(defaultsDir);
      await writeFile(join(defaultsDir, 'default-settings.jsonc'), '{ "editor.tabSize": 4 }', 'utf-8');

      const broken = createConfigManager({ userDir, defaultsDir });
      await expect(broken.load()).rejects.toThrow(ConfigError);
      await expect(createConfigManager({ userDir, defaultsDir: join(dir, 'missing') }).load()).rejects.toThrow(
        'Cannot read default config'
      );
    });

    test('settings are unavailable before load', () => {
      expect(() => config.getSettings()).toThrow(ConfigError);
      expect(config.get('editor.tabSize')).toBeUndefined();
      expect(config.getWithDefault('editor.tabSize', 3)).toBe(3);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Keybindings
  // ─────────────────────────────────────────────────────────────────────────

  describe('keybindings', () => {
    test('a user binding replaces every default key of its command', async () => {
      await writeUserFile('keybindings.jsonc', '[ { "key": "ctrl+q", "command": "editor.quit" } ]');
      await config.load();

      const bindings = config.getKeybindings();
      expect(bindings.filter((b) => b.command === 'editor.quit')).toEqual([{ key: 'ctrl+q', command: 'editor.quit' }]);
      expect(bindings.filter((b) => b.command === 'cursor.up').map((b) => b.key)).toEqual(['alt+i', 'up']);
      expect(config.getKeybindingForCommand('editor.quit')).toEqual({ key: 'ctrl+q', command: 'editor.quit' });
    });

    test('bindings by scope', async () => {
      await config.load();
      expect(config.getKeybindingsFor('commandLine').map((b) => b.key)).toEqual([
        'enter',
        'ctrl+j',
        'escape',
        'ctrl+g',
      ]);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Changes
  // ─────────────────────────────────────────────────────────────────────────

  describe('set and onChange', () => {
    test('listeners hear changed values only', async () => {
      await config.load();
      const seen: unknown[] = [];
      const unsubscribe = config.onChange('editor.tabSize', (value) => seen.push(value));

      config.set('editor.tabSize', 8);
      config.set('editor.tabSize', 8);
      config.set('ui.text.foreground', 'red');
      expect(seen).toEqual([8]);
      expect(config.get('editor.tabSize')).toBe(8);

      unsubscribe();
      config.set('editor.tabSize', 2);
      expect(seen).toEqual([8]);
    });
  });
});
