/**
 * scribe bootstrap
 *
 * Argument parsing and the wiring of config, terminal backend and editor.
 */

import { createConfigManager } from './config/config-manager.ts';
import { errorMessage } from './core/errors.ts';
import { resolveFilePath } from './core/paths.ts';
import { setDebugEnabled, debugLog } from './debug.ts';
import { createEditor } from './editor/editor.ts';
import { createTerminalBackend } from './terminal/terminal-backend.ts';

export const VERSION = '0.1.0';

export const HELP_TEXT = `
scribe - Terminal Text Editor

Usage: scribe [options] [file]

Options:
  -h, --help              Show this help message
  -v, --version           Show version number
  --debug                 Enable debug logging to debug.log
  --config <dir>          Read settings and keybindings from <dir>
                          (default: $SCRIBE_CONFIG_DIR or ~/.scribe)

Keys (defaults):
  alt+x                   Command line (try "help")
  alt+s                   Save
  alt+q                   Quit

Examples:
  scribe                  Start with an empty buffer
  scribe notes.txt        Open notes.txt (created on first save)
  scribe --debug file.txt Open with debug logging
`;

export interface CliOptions {
  help: boolean;
  version: boolean;
  debug: boolean;
  configDir: string | null;
  file: string | null;
}

export type ParseResult = { ok: true; options: CliOptions } | { ok: false; error: string };

/**
 * Parse command line arguments (without the node and script entries).
 */
export function parseArgs(args: readonly string[]): ParseResult {
  const options: CliOptions = { help: false, version: false, debug: false, configDir: null, file: null };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    switch (arg) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-v':
      case '--version':
        options.version = true;
        break;
      case '--debug':
        options.debug = true;
        break;
      case '--config': {
        const dir = args[i + 1];
        if (dir === undefined) {
          return { ok: false, error: '--config needs a directory' };
        }
        options.configDir = dir;
        i++;
        break;
      }
      default:
        if (arg.startsWith('-') && arg !== '-') {
          return { ok: false, error: `Unknown option: ${arg}` };
        }
        if (options.file !== null) {
          return { ok: false, error: `Only one file can be opened, got ${options.file} and ${arg}` };
        }
        options.file = arg;
    }
  }

  return { ok: true, options };
}

/**
 * Run the editor in the terminal until it quits.
 */
export async function runEditor(options: CliOptions): Promise<void> {
  setDebugEnabled(options.debug);

  const config = createConfigManager({ userDir: options.configDir ?? undefined });
  await config.load();

  const settings = config.getSettings();
  const backend = createTerminalBackend({ tabSize: settings['editor.tabSize'] });
  const editor = createEditor(backend, {
    settings,
    keybindings: config.getKeybindings(),
  });

  const stopResize = backend.onResize(() => {
    editor.layout();
    backend.refresh();
  });

  backend.start();
  try {
    if (options.file !== null) {
      try {
        await editor.open(resolveFilePath(options.file), { create: true });
      } catch (error) {
        debugLog(`[main] ${errorMessage(error)}`);
        editor.statusWindow.showMessage(errorMessage(error));
      }
    }

    const [problem] = config.getProblems();
    if (problem !== undefined && editor.statusWindow.message === null) {
      editor.statusWindow.showMessage(problem);
    }

    await editor.run();
  } finally {
    stopResize();
    backend.close();
  }
}
