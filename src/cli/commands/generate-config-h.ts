/**
 * generate-config-h command handler.
 *
 * Resolves a keyboard's info.json files, renders the guarded header, and
 * writes it to a file (keeping a backup of any previous version) or stdout.
 */

import * as path from 'node:path';
import { renderConfigH } from '../../header/index.js';
import { resolveKeyboardInfo } from '../../keyboard/index.js';
import { FileSink, StdoutSink, type OutputSink } from '../../output/index.js';
import type { GenerateConfigHOptions } from '../args.js';
import { GENERATE_CONFIG_H_HELP } from '../help.js';
import type { CliCommandResult, CliContext } from '../types.js';

/** Message reported when no keyboard was given. */
export const MISSING_KEYBOARD_MESSAGE = 'Missing parameter: --keyboard';

/**
 * Handles the generate-config-h command.
 *
 * @param options - Parsed command options.
 * @param context - CLI context.
 * @returns Exit code 0 on success, 1 when no keyboard was given.
 * @throws {KeyboardNotFoundError} If the keyboard does not exist.
 * @throws {KeymapNotFoundError} If the keymap does not exist.
 * @throws {KeyboardInfoError} If an info.json is unreadable or invalid.
 * @throws {MatrixShapeError} If `matrix_pins.direct` is malformed.
 * @throws {OutputWriteError} If the output file cannot be written.
 */
export async function handleGenerateConfigHCommand(
  options: GenerateConfigHOptions,
  context: CliContext
): Promise<CliCommandResult> {
  const { keyboard, keymap, output, quiet } = options;
  const logger = context.logger.child('generate-config-h');

  if (keyboard === undefined || keyboard === '') {
    context.stderr.write(`Error: ${MISSING_KEYBOARD_MESSAGE}\n`);
    context.stderr.write(GENERATE_CONFIG_H_HELP);
    return { exitCode: 1, message: MISSING_KEYBOARD_MESSAGE };
  }

  const { info, files } = await resolveKeyboardInfo({
    keyboardsDir: context.settings.paths.keyboards,
    keyboard,
    keymap,
    logger,
  });
  logger.debug('keyboard_resolved', { keyboard, keymap, fileCount: files.length });

  const text = renderConfigH(info);

  const sink: OutputSink =
    output !== undefined
      ? new FileSink({
          path: path.resolve(context.cwd, output),
          backupSuffix: context.settings.output.backup_suffix,
        })
      : new StdoutSink(context.stdout);

  const result = await sink.write(text);

  if (output !== undefined && !quiet) {
    logger.info('header_written', {
      keyboard,
      path: result.destination,
      ...(result.backupPath !== undefined ? { backupPath: result.backupPath } : {}),
    });
  }

  return { exitCode: 0, message: result.destination };
}
