/**
 * Destinations for generated header text.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import {
  safeExists,
  safeMkdir,
  safeRename,
  safeStat,
  safeUnlink,
  safeWriteFile,
} from '../utils/safe-fs.js';

/**
 * Default suffix for the previous version of an overwritten file.
 */
export const DEFAULT_BACKUP_SUFFIX = '.bak';

/**
 * Outcome of writing header text.
 */
export interface OutputResult {
  /** Absolute file path, or `stdout`. */
  readonly destination: string;
  /** Where the previous file was moved, if one existed. */
  readonly backupPath?: string;
}

/**
 * Accepts final header text. Implementations decide where it goes.
 */
export interface OutputSink {
  write(text: string): Promise<OutputResult>;
}

/**
 * Error raised when a file sink cannot put the header in place.
 */
export class OutputWriteError extends Error {
  /** Target path that could not be written. */
  public readonly path: string;

  /**
   * @param message - What failed.
   * @param targetPath - Target path that could not be written.
   * @param cause - Underlying file system error.
   */
  constructor(message: string, targetPath: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'OutputWriteError';
    this.path = targetPath;
  }
}

/**
 * Writes header text to a stream, standard output by default.
 */
export class StdoutSink implements OutputSink {
  private readonly stream: Pick<NodeJS.WritableStream, 'write'>;

  /**
   * @param stream - Stream to write to.
   */
  constructor(stream: Pick<NodeJS.WritableStream, 'write'> = process.stdout) {
    this.stream = stream;
  }

  write(text: string): Promise<OutputResult> {
    return new Promise((resolve, reject) => {
      this.stream.write(text, (error?: Error | null) => {
        if (error) {
          reject(error);
        } else {
          resolve({ destination: 'stdout' });
        }
      });
    });
  }
}

/**
 * Options for {@link FileSink}.
 */
export interface FileSinkOptions {
  /** Target file path. */
  path: string;
  /** Suffix appended to the target path for the previous version. */
  backupSuffix?: string | undefined;
}

/**
 * Writes header text to a file, keeping the previous version as a backup.
 *
 * The text is first written to a temporary sibling, so a failed write leaves
 * the existing file untouched. The existing file is then moved to the backup
 * path and the temporary file renamed into place. If that last rename fails,
 * the backup is moved back; if that fails too, the previous version stays at
 * the backup path. A backup left by an earlier write is replaced, so it cannot
 * be recovered after a rollback.
 */
export class FileSink implements OutputSink {
  private readonly target: string;
  private readonly backupSuffix: string;

  /**
   * @param options - Target path and backup suffix.
   */
  constructor(options: FileSinkOptions) {
    this.target = path.resolve(options.path);
    this.backupSuffix = options.backupSuffix ?? DEFAULT_BACKUP_SUFFIX;
  }

  /** Absolute path of the file this sink writes. */
  get path(): string {
    return this.target;
  }

  /** Absolute path the previous version is moved to. */
  get backupPath(): string {
    return this.target + this.backupSuffix;
  }

  async write(text: string): Promise<OutputResult> {
    const dir = path.dirname(this.target);
    const tempPath = path.join(dir, `.${path.basename(this.target)}.${String(process.pid)}.tmp`);

    try {
      await safeMkdir(dir, { recursive: true });
    } catch (error) {
      throw new OutputWriteError(`Cannot create directory ${dir}`, this.target, error);
    }

    try {
      await safeWriteFile(tempPath, text);
    } catch (error) {
      await this.discard(tempPath);
      throw new OutputWriteError(`Cannot write ${tempPath}`, this.target, error);
    }

    let backedUp = false;
    try {
      if (await safeExists(this.target)) {
        await safeRename(this.target, this.backupPath);
        backedUp = true;
      }
    } catch (error) {
      await this.discard(tempPath);
      throw new OutputWriteError(
        `Cannot move ${this.target} to ${this.backupPath}`,
        this.target,
        error
      );
    }

    try {
      await safeRename(tempPath, this.target);
    } catch (error) {
      let restoreFailure: string | undefined;
      if (backedUp) {
        try {
          await safeRename(this.backupPath, this.target);
        } catch (restoreError) {
          restoreFailure = restoreError instanceof Error ? restoreError.message : String(restoreError);
        }
      }
      await this.discard(tempPath);
      const message =
        restoreFailure === undefined
          ? `Cannot move ${tempPath} to ${this.target}`
          : `Cannot move ${tempPath} to ${this.target}; restoring ${this.backupPath} also failed (${restoreFailure})`;
      throw new OutputWriteError(message, this.target, error);
    }

    return backedUp
      ? { destination: this.target, backupPath: this.backupPath }
      : { destination: this.target };
  }

  private async discard(tempPath: string): Promise<void> {
    if ((await safeExists(tempPath)) && (await safeStat(tempPath)).isFile()) {
      await safeUnlink(tempPath);
    }
  }
}
