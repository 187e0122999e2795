/**
 * Version command handler for kbgen.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import type { CliCommandResult, CliContext } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersion(): string {
  const packageJsonPath = join(__dirname, '../../../package.json');
  let packageJson: unknown;
  try {
    packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  } catch {
    return '(unknown)';
  }

  return typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
    ? packageJson.version
    : '(unknown)';
}

/**
 * Handles the version command.
 */
export function handleVersionCommand(context: Pick<CliContext, 'stdout'>): CliCommandResult {
  context.stdout.write(`kbgen v${getVersion()}\n`);
  return { exitCode: 0 };
}
