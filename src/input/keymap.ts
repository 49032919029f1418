/**
 * Keymap
 *
 * Maps normalized key strings to command ids. Each component keeps its own
 * keymap over its own command type.
 */

import type { KeyEvent } from '../ui/types.ts';
import { keyToString, normalizeKeyString } from './keys.ts';
import { debugLog } from '../debug.ts';

export interface KeyBinding {
  key: string; // e.g. "ctrl+j", "alt+shift+i"
  command: string; // Command ID
}

export class Keymap<C extends string = string> {
  private bindings: Map<string, C> = new Map();

  /**
   * Bind a key. A later binding for the same key replaces the earlier one.
   */
  bind(key: string, command: C): void {
    this.bindings.set(normalizeKeyString(key), command);
  }

  /**
   * Remove a binding.
   */
  unbind(key: string): void {
    this.bindings.delete(normalizeKeyString(key));
  }

  /**
   * Load bindings from config, keeping only commands accepted by isCommand.
   * Returns the number of bindings added.
   */
  load(bindings: readonly KeyBinding[], isCommand: (command: string) => command is C): number {
    let added = 0;
    for (const binding of bindings) {
      if (!isCommand(binding.command)) {
        debugLog(`[Keymap] Ignoring binding ${binding.key}: unknown command ${binding.command}`);
        continue;
      }
      this.bind(binding.key, binding.command);
      added++;
    }
    return added;
  }

  /**
   * Get command for a key event.
   */
  lookup(event: KeyEvent): C | null {
    return this.bindings.get(keyToString(event)) ?? null;
  }

  /**
   * Get command for a key string.
   */
  lookupKey(key: string): C | null {
    return this.bindings.get(normalizeKeyString(key)) ?? null;
  }

  /**
   * First key bound to a command.
   */
  keyFor(command: C): string | undefined {
    for (const [key, bound] of this.bindings) {
      if (bound === command) {
        return key;
      }
    }
    return undefined;
  }

  getBindings(): Array<{ key: string; command: C }> {
    return Array.from(this.bindings, ([key, command]) => ({ key, command }));
  }

  get size(): number {
    return this.bindings.size;
  }

  /**
   * Copy of this keymap, for components that override a few keys.
   */
  clone(): Keymap<C> {
    const copy = new Keymap<C>();
    for (const [key, command] of this.bindings) {
      copy.bindings.set(key, command);
    }
    return copy;
  }
}

/**
 * Create a keymap from bindings.
 */
export function createKeymap<C extends string>(
  bindings: ReadonlyArray<{ key: string; command: C }> = []
): Keymap<C> {
  const keymap = new Keymap<C>();
  for (const binding of bindings) {
    keymap.bind(binding.key, binding.command);
  }
  return keymap;
}
