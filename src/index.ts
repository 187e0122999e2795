/**
 * keyboard-config-gen
 *
 * Turns a keyboard's info.json definitions into an `#ifndef`-guarded C header
 * for the firmware build.
 *
 * @example
 * ```typescript
 * import { FileSink, renderConfigH, resolveKeyboardInfo } from 'keyboard-config-gen';
 *
 * const { info } = await resolveKeyboardInfo({
 *   keyboardsDir: 'keyboards',
 *   keyboard: 'clueboard/66/rev3',
 * });
 * await new FileSink({ path: 'build/info_config.h' }).write(renderConfigH(info));
 * ```
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './header/index.js';
export * from './keyboard/index.js';
export * from './output/index.js';
export * from './config/index.js';
export { Logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
export { PathValidationError } from './utils/safe-fs.js';
export { runCli, createCliApp } from './cli/app.js';
export type { CliAppOptions } from './cli/app.js';
export { CliUsageError, parseArgs } from './cli/args.js';
export type { Command, GenerateConfigHOptions } from './cli/args.js';
export { handleGenerateConfigHCommand } from './cli/commands/generate-config-h.js';
export type { CliCommandResult, CliContext } from './cli/types.js';
