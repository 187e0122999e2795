/**
 * CLI argument parsing.
 *
 * Turns argv into a typed {@link Command}. Flags accept both `--flag value`
 * and `--flag=value`; short flags take their value from the next argument.
 */

/**
 * Options for the `generate-config-h` command.
 */
export interface GenerateConfigHOptions {
  /** Keyboard name relative to the keyboards directory. */
  keyboard?: string | undefined;
  /** Keymap whose info.json is merged last. */
  keymap?: string | undefined;
  /** File to write; stdout when absent. */
  output?: string | undefined;
  /** Suppress the informational log line after writing a file. */
  quiet: boolean;
}

export type Command =
  | { type: 'help'; command?: string | undefined }
  | { type: 'version' }
  | { type: 'generate-config-h'; options: GenerateConfigHOptions }
  | { type: 'unknown'; command: string };

/**
 * Raised for malformed command-line arguments.
 */
export class CliUsageError extends Error {
  /** Command whose arguments were malformed. */
  public readonly command: string;

  /**
   * @param message - What was wrong.
   * @param command - Command whose arguments were malformed.
   */
  constructor(message: string, command: string) {
    super(message);
    this.name = 'CliUsageError';
    this.command = command;
  }
}

interface ValueFlag {
  readonly long: string;
  readonly short: string;
  readonly key: 'keyboard' | 'keymap' | 'output';
}

const GENERATE_CONFIG_H_FLAGS: readonly ValueFlag[] = [
  { long: 'keyboard', short: 'kb', key: 'keyboard' },
  { long: 'keymap', short: 'km', key: 'keymap' },
  { long: 'output', short: 'o', key: 'output' },
];

function isHelpFlag(arg: string): boolean {
  return arg === '-h' || arg === '--help';
}

function parseGenerateConfigHOptions(args: readonly string[]): GenerateConfigHOptions {
  const options: GenerateConfigHOptions = { quiet: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '-q' || arg === '--quiet') {
      options.quiet = true;
      continue;
    }

    const flag = GENERATE_CONFIG_H_FLAGS.find(
      (f) => arg === `--${f.long}` || arg === `-${f.short}` || arg.startsWith(`--${f.long}=`)
    );

    if (flag === undefined) {
      const message = arg.startsWith('-') ? `Unknown option: ${arg}` : `Unexpected argument: ${arg}`;
      throw new CliUsageError(message, 'generate-config-h');
    }

    let value: string | undefined;
    if (arg.startsWith(`--${flag.long}=`)) {
      value = arg.slice(`--${flag.long}=`.length);
    } else {
      value = args[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new CliUsageError(`Option ${arg} requires a value`, 'generate-config-h');
      }
      i++;
    }

    options[flag.key] = value;
  }

  return options;
}

/**
 * Parses command-line arguments into a typed Command.
 *
 * @param argv - Arguments after the executable and script path.
 * @throws {CliUsageError} For an unknown option, a stray argument, or a flag missing its value.
 *
 * @example
 * ```typescript
 * parseArgs(['generate-config-h', '-kb', 'clueboard/66/rev3', '-q']);
 * // { type: 'generate-config-h', options: { keyboard: 'clueboard/66/rev3', quiet: true } }
 * ```
 */
export function parseArgs(argv: readonly string[]): Command {
  const command = argv[0];
  const args = argv.slice(1);

  if (command === undefined || command === '' || command === 'help' || isHelpFlag(command)) {
    return { type: 'help', command: args[0] };
  }

  if (command === 'version' || command === '-v' || command === '--version') {
    return { type: 'version' };
  }

  switch (command) {
    case 'generate-config-h':
      if (args.some(isHelpFlag)) {
        return { type: 'help', command };
      }
      return { type: 'generate-config-h', options: parseGenerateConfigHOptions(args) };
    default:
      return { type: 'unknown', command };
  }
}
