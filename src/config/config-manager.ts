/**
 * Config Manager
 *
 * Loads settings and keybindings. Defaults ship in config/default-*.jsonc
 * next to the package; user overrides live in ~/.scribe/ (or the directory
 * given by --config or SCRIBE_CONFIG_DIR).
 */

import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { debugLog } from '../debug.ts';
import { ConfigError, errorMessage } from '../core/errors.ts';
import type { KeyBinding } from '../input/keymap.ts';
import { commandScope, type KeybindingScope } from '../editor/commands.ts';
import {
  isCompleteSettings,
  validateKeybindings,
  validateSettings,
  type EditorSettings,
  type SettingKey,
} from './settings.ts';

// ============================================
// Types
// ============================================

/**
 * Config paths for different locations.
 */
export interface ConfigPaths {
  /** User config directory (~/.scribe/) */
  userDir: string;
  /** User settings file (~/.scribe/settings.jsonc) - supports comments */
  userSettings: string;
  /** User keybindings file (~/.scribe/keybindings.jsonc) - supports comments */
  userKeybindings: string;
  /** Shipped default settings */
  defaultSettings: string;
  /** Shipped default keybindings */
  defaultKeybindings: string;
}

export interface ConfigManagerOptions {
  /** User config directory, overriding SCRIBE_CONFIG_DIR and ~/.scribe */
  userDir?: string;
  /** Directory holding default-settings.jsonc and default-keybindings.jsonc */
  defaultsDir?: string;
}

const DEFAULTS_DIR = fileURLToPath(new URL('../../config/', import.meta.url));

// ============================================
// JSONC
// ============================================

/**
 * Remove // and /* *\/ comments, leaving string literals intact.
 */
export function stripJsonComments(text: string): string {
  let result = '';
  let inString = false;
  let i = 0;

  while (i < text.length) {
    const char = text.charAt(i);
    const next = text.charAt(i + 1);

    if (inString) {
      if (char === '\\') {
        result += char + next;
        i += 2;
        continue;
      }
      if (char === '"') inString = false;
      result += char;
      i++;
      continue;
    }

    if (char === '/' && next === '/') {
      const end = text.indexOf('\n', i);
      i = end === -1 ? text.length : end;
      continue;
    }
    if (char === '/' && next === '*') {
      const end = text.indexOf('*/', i + 2);
      i = end === -1 ? text.length : end + 2;
      continue;
    }

    if (char === '"') inString = true;
    result += char;
    i++;
  }

  return result;
}

/**
 * Parse JSON with comments.
 */
export function parseJsonc(text: string): unknown {
  return JSON.parse(stripJsonComments(text));
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

// ============================================
// Config Manager
// ============================================

export class ConfigManager {
  /** Current settings */
  private settings: Partial<EditorSettings> = {};

  /** Shipped defaults, read on load */
  private defaultSettings: Partial<EditorSettings> = {};
  private defaultKeybindings: KeyBinding[] = [];

  /** Current keybindings */
  private keybindings: KeyBinding[] = [];

  /** Config paths */
  private paths: ConfigPaths;

  /** Settings change listeners */
  private listeners: Map<string, Set<(value: unknown) => void>> = new Map();

  /** Problems found in user files during the last load */
  private problems: string[] = [];

  /** Whether config has been loaded */
  private loaded = false;

  constructor(options: ConfigManagerOptions = {}) {
    const home = process.env.HOME || process.env.USERPROFILE || '';
    const userDir = options.userDir ?? (process.env.SCRIBE_CONFIG_DIR || join(home, '.scribe'));
    const defaultsDir = options.defaultsDir ?? DEFAULTS_DIR;

    this.paths = {
      userDir,
      userSettings: join(userDir, 'settings.jsonc'),
      userKeybindings: join(userDir, 'keybindings.jsonc'),
      defaultSettings: join(defaultsDir, 'default-settings.jsonc'),
      defaultKeybindings: join(defaultsDir, 'default-keybindings.jsonc'),
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Loading
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Load all configuration. Throws ConfigError when the shipped defaults
   * cannot be read; problems in user files are collected instead.
   */
  async load(): Promise<void> {
    if (this.loaded) return;

    this.problems = [];
    await this.loadDefaults();
    await this.ensureConfigDir();
    await this.loadSettings();
    await this.loadKeybindings();

    this.loaded = true;
    debugLog('[ConfigManager] Configuration loaded');
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  /**
   * Problems found in the user's files during load (unparseable files,
   * rejected settings).
   */
  getProblems(): string[] {
    return [...this.problems];
  }

  private async loadDefaults(): Promise<void> {
    const settings = await this.readDefaultFile(this.paths.defaultSettings);
    const { settings: valid, rejected } = validateSettings(settings);
    if (rejected.length > 0 || !isCompleteSettings(valid)) {
      throw new ConfigError(`Invalid default settings in ${this.paths.defaultSettings}: ${rejected.join(', ') || 'missing keys'}`);
    }
    this.defaultSettings = valid;

    const keybindings = await this.readDefaultFile(this.paths.defaultKeybindings);
    this.defaultKeybindings = validateKeybindings(keybindings);
  }

  private async readDefaultFile(path: string): Promise<unknown> {
    try {
      return parseJsonc(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Cannot read default config ${path}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Ensure the user config directory and its files exist.
   */
  private async ensureConfigDir(): Promise<void> {
    try {
      await mkdir(this.paths.userDir, { recursive: true });

      await this.ensureDefaultFile(
        this.paths.userSettings,
        this.defaultSettings,
        'Editor settings - edit this file to customize scribe'
      );
      await this.ensureDefaultFile(
        this.paths.userKeybindings,
        this.defaultKeybindings,
        'Keybindings - a binding here replaces every default key of its command'
      );
    } catch (error) {
      this.problems.push(`${this.paths.userDir}: ${errorMessage(error)}`);
      debugLog(`[ConfigManager] Error creating config dir: ${errorMessage(error)}`);
    }
  }

  /**
   * Create a default config file if it doesn't exist.
   */
  private async ensureDefaultFile(path: string, defaults: unknown, comment: string): Promise<void> {
    if (await fileExists(path)) {
      return;
    }

    const header = `// ${comment}\n// Generated by scribe on ${new Date().toISOString()}\n`;
    await writeFile(path, header + JSON.stringify(defaults, null, 2) + '\n', 'utf-8');
    debugLog(`[ConfigManager] Created default config: ${path}`);
  }

  /**
   * Load settings: defaults, then user settings on top.
   */
  private async loadSettings(): Promise<void> {
    this.settings = { ...this.defaultSettings };

    const userSettings = await this.loadJsonFile(this.paths.userSettings);
    if (userSettings === null) {
      return;
    }

    const { settings, rejected } = validateSettings(userSettings);
    for (const key of rejected) {
      this.problems.push(`${this.paths.userSettings}: ignored setting ${key}`);
    }
    this.settings = { ...this.settings, ...settings };
    debugLog(`[ConfigManager] Loaded ${Object.keys(settings).length} user settings from ${this.paths.userSettings}`);
  }

  /**
   * Load keybindings. A command the user binds keeps only the user's keys;
   * other commands keep all their default keys.
   */
  private async loadKeybindings(): Promise<void> {
    this.keybindings = [...this.defaultKeybindings];

    const userFile = await this.loadJsonFile(this.paths.userKeybindings);
    if (userFile === null) {
      return;
    }

    const userKeybindings = validateKeybindings(userFile);
    const overridden = new Set(userKeybindings.map((binding) => binding.command));
    this.keybindings = [
      ...this.defaultKeybindings.filter((binding) => !overridden.has(binding.command)),
      ...userKeybindings,
    ];
  }

  /**
   * Load a user JSONC file. Returns null when it is missing or unparseable.
   */
  private async loadJsonFile(path: string): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      debugLog(`[ConfigManager] Cannot read ${path}: ${errorMessage(error)}`);
      return null;
    }

    try {
      return parseJsonc(content);
    } catch (error) {
      this.problems.push(`${path}: ${errorMessage(error)}`);
      debugLog(`[ConfigManager] Error parsing ${path}: ${errorMessage(error)}`);
      return null;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Settings Access
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Get a setting value.
   */
  get<K extends SettingKey>(key: K): EditorSettings[K] | undefined {
    return this.settings[key];
  }

  /**
   * Get a setting with a default fallback.
   */
  getWithDefault<K extends SettingKey>(key: K, defaultValue: EditorSettings[K]): EditorSettings[K] {
    return this.settings[key] ?? defaultValue;
  }

  /**
   * Set a setting value.
   */
  set<K extends SettingKey>(key: K, value: EditorSettings[K]): void {
    const oldValue = this.settings[key];
    this.settings[key] = value;

    if (oldValue !== value) {
      this.notifyListeners(key, value);
    }
  }

  /**
   * Get all settings.
   */
  getAllSettings(): Partial<EditorSettings> {
    return { ...this.settings };
  }

  /**
   * Every setting, once loaded.
   */
  getSettings(): EditorSettings {
    const settings = { ...this.settings };
    if (!isCompleteSettings(settings)) {
      throw new ConfigError('Settings requested before configuration was loaded');
    }
    return settings;
  }

  /**
   * Listen for setting changes.
   */
  onChange(key: SettingKey, callback: (value: unknown) => void): () => void {
    let keyListeners = this.listeners.get(key);
    if (!keyListeners) {
      keyListeners = new Set();
      this.listeners.set(key, keyListeners);
    }
    keyListeners.add(callback);

    return () => {
      this.listeners.get(key)?.delete(callback);
    };
  }

  private notifyListeners(key: string, value: unknown): void {
    const keyListeners = this.listeners.get(key);
    if (keyListeners) {
      for (const listener of keyListeners) {
        listener(value);
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Keybindings Access
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Get all keybindings.
   */
  getKeybindings(): KeyBinding[] {
    return [...this.keybindings];
  }

  /**
   * Keybindings whose command belongs to one scope.
   */
  getKeybindingsFor(scope: KeybindingScope): KeyBinding[] {
    return this.keybindings.filter((binding) => commandScope(binding.command) === scope);
  }

  /**
   * Get keybinding for a command.
   */
  getKeybindingForCommand(command: string): KeyBinding | undefined {
    return this.keybindings.find((binding) => binding.command === command);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Paths
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Get config paths.
   */
  getPaths(): ConfigPaths {
    return { ...this.paths };
  }
}

// ============================================
// Factory Function
// ============================================

/**
 * Create a config manager.
 */
export function createConfigManager(options?: ConfigManagerOptions): ConfigManager {
  return new ConfigManager(options);
}
