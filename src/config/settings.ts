/**
 * Settings
 *
 * The editor's setting keys, their types, and validation of values read
 * from JSONC files.
 */

import { isValidColor } from '../terminal/colors.ts';
import type { KeyBinding } from '../input/keymap.ts';

export interface EditorSettings {
  'editor.tabSize': number;
  /** Keyword to foreground color */
  'editor.highlight.keywords': Record<string, string>;
  'ui.text.foreground': string;
  'ui.text.background': string;
  'ui.status.foreground': string;
  'ui.status.background': string;
  'ui.command.foreground': string;
  'ui.command.background': string;
}

export type SettingKey = keyof EditorSettings;

// ============================================
// Validation
// ============================================

type SettingValidators = {
  [K in SettingKey]: (value: unknown) => value is EditorSettings[K];
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isColor(value: unknown): value is string {
  return typeof value === 'string' && isValidColor(value);
}

function isKeywordColors(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every(isColor);
}

const VALIDATORS: SettingValidators = {
  'editor.tabSize': isPositiveInteger,
  'editor.highlight.keywords': isKeywordColors,
  'ui.text.foreground': isColor,
  'ui.text.background': isColor,
  'ui.status.foreground': isColor,
  'ui.status.background': isColor,
  'ui.command.foreground': isColor,
  'ui.command.background': isColor,
};

export const SETTING_KEYS = Object.keys(VALIDATORS).filter(isSettingKey);

export function isSettingKey(key: string): key is SettingKey {
  return Object.hasOwn(VALIDATORS, key);
}

/**
 * Check one setting value.
 */
export function isValidSetting<K extends SettingKey>(key: K, value: unknown): value is EditorSettings[K] {
  const validate: (value: unknown) => value is EditorSettings[K] = VALIDATORS[key];
  return validate(value);
}

function copySetting<K extends SettingKey>(
  key: K,
  source: Record<string, unknown>,
  target: Partial<EditorSettings>
): boolean {
  const value = source[key];
  if (!isValidSetting(key, value)) {
    return false;
  }
  target[key] = value;
  return true;
}

/**
 * Keep the known, well-typed settings of a parsed file. Everything else is
 * reported in `rejected`.
 */
export function validateSettings(value: unknown): { settings: Partial<EditorSettings>; rejected: string[] } {
  const settings: Partial<EditorSettings> = {};
  const rejected: string[] = [];
  if (!isRecord(value)) {
    return { settings, rejected: ['<root>'] };
  }

  for (const key of Object.keys(value)) {
    if (!isSettingKey(key) || !copySetting(key, value, settings)) {
      rejected.push(key);
    }
  }
  return { settings, rejected };
}

/**
 * Keep the well-formed { key, command } entries of a parsed file.
 */
export function validateKeybindings(value: unknown): KeyBinding[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const bindings: KeyBinding[] = [];
  for (const entry of value) {
    if (isRecord(entry) && typeof entry.key === 'string' && typeof entry.command === 'string') {
      bindings.push({ key: entry.key, command: entry.command });
    }
  }
  return bindings;
}

/**
 * Check that every setting has a value.
 */
export function isCompleteSettings(settings: Partial<EditorSettings>): settings is EditorSettings {
  return SETTING_KEYS.every((key) => settings[key] !== undefined);
}
