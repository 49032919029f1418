/**
 * Key Strings
 *
 * Conversion between KeyEvents and the normalized key strings used in
 * keybinding tables ('ctrl+j', 'alt+i', 'backspace', 'arrowup').
 * Modifiers are sorted so 'ctrl+alt+x' and 'alt+ctrl+x' are the same key.
 */

import type { KeyEvent } from '../ui/types.ts';

// ============================================
// Named Keys
// ============================================

/**
 * Lower-case names (and aliases) to KeyEvent key names.
 */
const NAMED_KEYS: Record<string, string> = {
  enter: 'Enter',
  return: 'Enter',
  backspace: 'Backspace',
  delete: 'Delete',
  del: 'Delete',
  tab: 'Tab',
  escape: 'Escape',
  esc: 'Escape',
  space: ' ',
  arrowup: 'ArrowUp',
  up: 'ArrowUp',
  arrowdown: 'ArrowDown',
  down: 'ArrowDown',
  arrowleft: 'ArrowLeft',
  left: 'ArrowLeft',
  arrowright: 'ArrowRight',
  right: 'ArrowRight',
  home: 'Home',
  end: 'End',
  pageup: 'PageUp',
  pagedown: 'PageDown',
  insert: 'Insert',
  f1: 'F1',
  f2: 'F2',
  f3: 'F3',
  f4: 'F4',
  f5: 'F5',
  f6: 'F6',
  f7: 'F7',
  f8: 'F8',
  f9: 'F9',
  f10: 'F10',
  f11: 'F11',
  f12: 'F12',
};

const MODIFIER_ALIASES: Record<string, 'ctrl' | 'alt' | 'shift' | 'meta'> = {
  ctrl: 'ctrl',
  control: 'ctrl',
  c: 'ctrl',
  alt: 'alt',
  option: 'alt',
  m: 'alt',
  shift: 'shift',
  s: 'shift',
  meta: 'meta',
  cmd: 'meta',
  super: 'meta',
};

// ============================================
// Key Events
// ============================================

/**
 * Create a key event.
 */
export function createKeyEvent(
  key: string,
  modifiers: Partial<Pick<KeyEvent, 'ctrl' | 'alt' | 'shift' | 'meta'>> = {}
): KeyEvent {
  return {
    key,
    ctrl: modifiers.ctrl ?? false,
    alt: modifiers.alt ?? false,
    shift: modifiers.shift ?? false,
    meta: modifiers.meta ?? false,
  };
}

/**
 * A key that types a character: a single printable code point with no
 * ctrl/alt/meta modifier.
 */
export function isPrintable(event: KeyEvent): boolean {
  if (event.ctrl || event.alt || event.meta) return false;
  const chars = [...event.key];
  if (chars.length !== 1) return false;
  const code = event.key.codePointAt(0) ?? 0;
  return code >= 32 && code !== 127;
}

/**
 * Turn printable keys into a sequence of key events (one per character).
 */
export function keysFromText(text: string): KeyEvent[] {
  return [...text].map((char) =>
    createKeyEvent(char, { shift: char !== char.toLowerCase() })
  );
}

// ============================================
// Key Strings
// ============================================

/**
 * Normalized key string for an event.
 */
export function keyToString(event: KeyEvent): string {
  const modifiers: string[] = [];
  if (event.ctrl) modifiers.push('ctrl');
  if (event.shift) modifiers.push('shift');
  if (event.alt) modifiers.push('alt');
  if (event.meta) modifiers.push('meta');
  modifiers.sort();
  modifiers.push(event.key === ' ' ? 'space' : event.key.toLowerCase());
  return modifiers.join('+');
}

/**
 * Parse a binding string ('Ctrl+J', 'alt+shift+i', 'C-d') into an event.
 * Both '+' and '-' separate modifiers; a trailing separator names the
 * separator key itself ('ctrl++').
 */
export function parseKeyString(keyString: string): KeyEvent {
  const trimmed = keyString.trim();
  if (trimmed.length === 1) {
    return createKeyEvent(trimmed, { shift: trimmed !== trimmed.toLowerCase() });
  }

  const separator = trimmed.includes('+') ? '+' : '-';
  const parts = trimmed.split(separator);
  let keyName = parts.pop() ?? '';
  if (keyName === '' && parts.length > 0) {
    // 'ctrl++' splits into ['ctrl', '', '']
    parts.pop();
    keyName = separator;
  }

  const event = createKeyEvent('');
  for (const part of parts) {
    const modifier = MODIFIER_ALIASES[part.trim().toLowerCase()];
    if (modifier) {
      event[modifier] = true;
    }
  }

  const named = NAMED_KEYS[keyName.toLowerCase()];
  if (named) {
    event.key = named;
  } else if ([...keyName].length === 1) {
    event.key = keyName.toLowerCase();
    if (keyName !== keyName.toLowerCase()) {
      event.shift = true;
    }
  } else {
    event.key = keyName;
  }
  return event;
}

/**
 * Normalize a binding string so it compares equal to keyToString output.
 */
export function normalizeKeyString(keyString: string): string {
  return keyToString(parseKeyString(keyString));
}
