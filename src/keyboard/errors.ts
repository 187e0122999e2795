/**
 * Errors raised while resolving a keyboard definition.
 *
 * @packageDocumentation
 */

/**
 * Base class for problems in a keyboard's configuration. The CLI reports
 * these to the user and produces no output.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * The requested keyboard name does not resolve to a keyboard directory.
 */
export class KeyboardNotFoundError extends ConfigurationError {
  /** The keyboard name as given by the caller. */
  public readonly keyboard: string;

  /**
   * @param keyboard - The keyboard name as given by the caller.
   */
  constructor(keyboard: string) {
    super(`Invalid keyboard: "${keyboard}"`);
    this.name = 'KeyboardNotFoundError';
    this.keyboard = keyboard;
  }
}

/**
 * An info.json file is unreadable, is not valid JSON, or does not match the
 * keyboard schema.
 */
export class KeyboardInfoError extends ConfigurationError {
  /** File (or description of the merged result) that failed. */
  public readonly source: string;
  /** Individual schema violations, formatted as `instancePath: message`. */
  public readonly details: readonly string[];

  /**
   * @param source - File or merged-result label that failed.
   * @param message - Summary of the failure.
   * @param details - Individual schema violations.
   * @param cause - Underlying error, if any.
   */
  constructor(source: string, message: string, details: readonly string[] = [], cause?: unknown) {
    const suffix = details.length > 0 ? `\n  ${details.join('\n  ')}` : '';
    super(`${source}: ${message}${suffix}`, cause !== undefined ? { cause } : undefined);
    this.name = 'KeyboardInfoError';
    this.source = source;
    this.details = details;
  }
}

/**
 * The requested keymap has no directory under any `keymaps/` folder of the keyboard.
 */
export class KeymapNotFoundError extends ConfigurationError {
  /** The keyboard the keymap was looked up for. */
  public readonly keyboard: string;
  /** The keymap name as given by the caller. */
  public readonly keymap: string;

  /**
   * @param keyboard - The keyboard the keymap was looked up for.
   * @param keymap - The keymap name as given by the caller.
   */
  constructor(keyboard: string, keymap: string) {
    super(`Invalid keymap: "${keymap}" for keyboard "${keyboard}"`);
    this.name = 'KeymapNotFoundError';
    this.keyboard = keyboard;
    this.keymap = keymap;
  }
}
