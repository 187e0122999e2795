/**
 * Help text for kbgen.
 */

import { getEnvVarDocumentation } from '../config/index.js';
import { getVersion } from './commands/version.js';
import type { OutputStream } from './types.js';

/**
 * Usage for the `generate-config-h` command.
 */
export const GENERATE_CONFIG_H_HELP = `
USAGE: kbgen generate-config-h -kb <keyboard> [options]

Generates an info_config.h header from a keyboard's info.json files.

OPTIONS:
  -kb, --keyboard <name>  Keyboard to generate the header for
  -km, --keymap <name>    Keymap whose info.json is merged last
  -o, --output <file>     Write to a file instead of stdout
  -q, --quiet             Do not log where the file was written

EXAMPLES:
  kbgen generate-config-h -kb clueboard/66/rev3
  kbgen generate-config-h -kb clueboard/66/rev3 -km default -o build/info_config.h
`;

const COMMAND_HELP: Readonly<Record<string, string>> = {
  'generate-config-h': GENERATE_CONFIG_H_HELP,
  help: `
USAGE: kbgen help [command]

Shows general usage, or usage for a single command.
`,
  version: `
USAGE: kbgen version

Shows the installed version.
`,
};

/**
 * Builds the general usage text.
 */
export function formatHelp(): string {
  const envLines = Object.entries(getEnvVarDocumentation()).map(
    ([name, doc]) => `  ${name.padEnd(28)}${doc.description}`
  );

  return `
kbgen v${getVersion()}

USAGE:
  kbgen <command> [options]

COMMANDS:
  generate-config-h   Generate info_config.h for a keyboard
  help [command]      Show this help message, or help for a command
  version             Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information

ENVIRONMENT:
${envLines.join('\n')}

Settings are read from kbgen.toml in the working directory.
`;
}

/**
 * Writes general or per-command help.
 *
 * @param command - Command to describe, or undefined for general usage.
 * @returns Exit code: 0, or 1 for an unknown command.
 */
export function showHelp(
  command: string | undefined,
  stdout: OutputStream,
  stderr: OutputStream
): number {
  if (command === undefined) {
    stdout.write(formatHelp());
    return 0;
  }

  const help = COMMAND_HELP[command];
  if (help === undefined) {
    stderr.write(`Unknown command: ${command}\n\nRun "kbgen help" to see all available commands.\n`);
    return 1;
  }

  stdout.write(help);
  return 0;
}
