/**
 * scribe - Terminal Text Editor
 *
 * Entry point for the application.
 */

import { HELP_TEXT, VERSION, parseArgs, runEditor } from './main.ts';

// Parse command line arguments
const parsed = parseArgs(process.argv.slice(2));

if (!parsed.ok) {
  console.error(`scribe: ${parsed.error}`);
  console.error('Try scribe --help');
  process.exit(2);
} else if (parsed.options.help) {
  console.log(HELP_TEXT);
  process.exit(0);
} else if (parsed.options.version) {
  console.log(`scribe v${VERSION}`);
  process.exit(0);
} else {
  runEditor(parsed.options)
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error('scribe failed:', error);
      process.exit(1);
    });
}
