/**
 * Command IDs
 *
 * Keys are bound to these ids; each component interprets its own set.
 * The prefix decides which component a binding belongs to.
 */

export const TEXT_COMMANDS = [
  'cursor.up',
  'cursor.down',
  'cursor.back',
  'cursor.forward',
  'cursor.beginBuffer',
  'cursor.endBuffer',
  'cursor.lineStart',
  'cursor.lineEnd',
  'edit.lineBreak',
  'edit.deleteBackward',
  'edit.deleteForward',
  'edit.insertTab',
] as const;

export const COMMAND_LINE_COMMANDS = ['command.execute', 'command.cancel'] as const;

export const EDITOR_COMMANDS = [
  'editor.quit',
  'editor.save',
  'editor.toggleCommand',
  'editor.focusNext',
  'editor.split',
  'editor.closeWindow',
] as const;

export type TextCommand = (typeof TEXT_COMMANDS)[number];
export type CommandLineCommand = (typeof COMMAND_LINE_COMMANDS)[number];
export type EditorCommand = (typeof EDITOR_COMMANDS)[number];
export type CommandId = TextCommand | CommandLineCommand | EditorCommand;

/** Where a binding applies */
export type KeybindingScope = 'text' | 'commandLine' | 'editor';

const textCommands: ReadonlySet<string> = new Set(TEXT_COMMANDS);
const commandLineCommands: ReadonlySet<string> = new Set(COMMAND_LINE_COMMANDS);
const editorCommands: ReadonlySet<string> = new Set(EDITOR_COMMANDS);

export function isTextCommand(id: string): id is TextCommand {
  return textCommands.has(id);
}

export function isCommandLineCommand(id: string): id is CommandLineCommand {
  return commandLineCommands.has(id);
}

export function isEditorCommand(id: string): id is EditorCommand {
  return editorCommands.has(id);
}

/**
 * Scope of a command id, or null for an unknown id.
 */
export function commandScope(id: string): KeybindingScope | null {
  if (isTextCommand(id)) return 'text';
  if (isCommandLineCommand(id)) return 'commandLine';
  if (isEditorCommand(id)) return 'editor';
  return null;
}
