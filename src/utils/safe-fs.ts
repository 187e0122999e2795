/**
 * File system helpers that validate paths before touching the disk.
 *
 * Every path is resolved to an absolute path and rejected when empty or when
 * it contains a null byte.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is not a string, is empty, or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (typeof filePath !== 'string') {
    throw new PathValidationError('Path must be a string', String(filePath));
  }

  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 */
export async function safeReadFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Writes a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 */
export async function safeWriteFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.writeFile(validatedPath, data, 'utf-8');
}

/**
 * Checks whether a file or directory exists.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.access(validatedPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Creates a directory after validating the path.
 *
 * @param filePath - The directory to create.
 * @param options - Optional recursive mode.
 * @returns The first directory created when recursive, otherwise undefined.
 */
export async function safeMkdir(
  filePath: string,
  options?: { recursive?: boolean }
): Promise<string | undefined> {
  const validatedPath = validatePath(filePath);
  return fs.mkdir(validatedPath, options);
}

/**
 * Stats a path after validating it.
 *
 * @param filePath - The path to stat.
 */
export async function safeStat(filePath: string): Promise<Stats> {
  const validatedPath = validatePath(filePath);
  return fs.stat(validatedPath);
}

/**
 * Deletes a file after validating the path.
 *
 * @param filePath - The file to delete.
 */
export async function safeUnlink(filePath: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.unlink(validatedPath);
}

/**
 * Renames a file after validating both paths. Replaces `newPath` if it exists.
 *
 * @param oldPath - Current path.
 * @param newPath - Destination path.
 */
export async function safeRename(oldPath: string, newPath: string): Promise<void> {
  const validatedOld = validatePath(oldPath);
  const validatedNew = validatePath(newPath);
  return fs.rename(validatedOld, validatedNew);
}
