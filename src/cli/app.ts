/**
 * Application wiring for the kbgen CLI.
 */

import { loadSettings, readEnvOverrides, type EnvRecord } from '../config/index.js';
import { Logger } from '../utils/logger.js';
import { CliUsageError, parseArgs } from './args.js';
import { handleGenerateConfigHCommand } from './commands/generate-config-h.js';
import { handleVersionCommand } from './commands/version.js';
import { showHelp } from './help.js';
import type { CliContext, OutputStream } from './types.js';
import { formatError } from './utils/errorHandling.js';

/**
 * Process-level inputs for the CLI. Everything defaults to the current process.
 */
export interface CliAppOptions {
  cwd?: string | undefined;
  env?: EnvRecord | undefined;
  stdout?: OutputStream | undefined;
  stderr?: OutputStream | undefined;
}

/**
 * Creates and initializes CLI application context.
 *
 * Settings come from kbgen.toml in `cwd` and KBGEN_* variables in `env`.
 *
 * @throws SettingsParseError, EnvCoercionError or SettingsValidationError for bad settings.
 */
export async function createCliApp(options: CliAppOptions = {}): Promise<CliContext> {
  const cwd = options.cwd ?? process.cwd();
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;

  const env = options.env ?? process.env;
  const settings = await loadSettings({ cwd, env });

  const logger = new Logger({
    component: 'kbgen',
    debugMode: settings.logging.debug,
    quiet: settings.logging.quiet,
    stream: stderr,
  });
  logger.debug('settings_loaded', { settings, envVars: readEnvOverrides(env).appliedVars });

  return { settings, logger, cwd, stdout, stderr };
}

/**
 * Parses `argv`, runs the selected command and reports failures on stderr.
 *
 * @param argv - Arguments after the executable and script path.
 * @returns The exit code.
 */
export async function runCli(argv: readonly string[], options: CliAppOptions = {}): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;

  try {
    const command = parseArgs(argv);

    switch (command.type) {
      case 'help':
        return showHelp(command.command, stdout, stderr);

      case 'version':
        return handleVersionCommand({ stdout }).exitCode;

      case 'unknown':
        stderr.write(
          `Error: Unknown command: ${command.command}\n\nRun "kbgen help" for usage information.\n`
        );
        return 1;

      case 'generate-config-h': {
        const context = await createCliApp(options);
        const result = await handleGenerateConfigHCommand(command.options, context);
        return result.exitCode;
      }
    }
  } catch (error) {
    stderr.write(`Error: ${formatError(error)}\n`);
    if (error instanceof CliUsageError) {
      stderr.write(`\nRun "kbgen help ${error.command}" for usage information.\n`);
    }
    return 1;
  }
}
