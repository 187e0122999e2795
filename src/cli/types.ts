/**
 * CLI types and interfaces for kbgen.
 */

import type { Settings } from '../config/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Writable text stream as used by the CLI.
 */
export type OutputStream = Pick<NodeJS.WritableStream, 'write'>;

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Effective settings (file, environment and defaults merged).
   */
  settings: Settings;

  /**
   * Logger writing JSON lines to `stderr`.
   */
  logger: Logger;

  /**
   * Directory relative paths on the command line resolve against.
   */
  cwd: string;

  /**
   * Destination for command output.
   */
  stdout: OutputStream;

  /**
   * Destination for error messages and logs.
   */
  stderr: OutputStream;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message describing the outcome.
   */
  message?: string;
}
