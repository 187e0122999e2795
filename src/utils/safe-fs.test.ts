import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fc from 'fast-check';
import {
  validatePath,
  safeReadFile,
  safeWriteFile,
  safeExists,
  safeMkdir,
  safeStat,
  safeUnlink,
  safeRename,
  PathValidationError,
} from './safe-fs.js';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as path from 'node:path';

describe('safe-fs', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'safe-fs-test-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('should resolve and validate absolute paths', () => {
      expect(validatePath('/tmp/info_config.h')).toBe('/tmp/info_config.h');
    });

    it('should resolve relative paths to absolute', () => {
      const result = validatePath('./build/info_config.h');
      expect(path.isAbsolute(result)).toBe(true);
      expect(result.endsWith(join('build', 'info_config.h'))).toBe(true);
    });

    it('should reject empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('should reject paths with null bytes', () => {
      expect(() => validatePath('/tmp/test\0file.h')).toThrow('null bytes');
    });

    it('should reject non-string values', () => {
      expect(() => validatePath(null as unknown as string)).toThrow(PathValidationError);
    });

    it('non-empty strings without null bytes do not throw', () => {
      fc.assert(
        fc.property(
          fc.string({ minLength: 1 }).filter((s) => !s.includes('\0')),
          (input) => {
            expect(() => validatePath(input)).not.toThrow();
          }
        )
      );
    });
  });

  describe('read and write', () => {
    it('should round-trip UTF-8 text', async () => {
      const testFile = join(tempDir, 'rw.h');
      await safeWriteFile(testFile, '#pragma once\n');
      expect(await safeReadFile(testFile)).toBe('#pragma once\n');
    });

    it('should reject empty paths', async () => {
      await expect(safeReadFile('')).rejects.toThrow(PathValidationError);
      await expect(safeWriteFile('', 'content')).rejects.toThrow(PathValidationError);
    });
  });

  describe('safeExists', () => {
    it('should report existing and missing files', async () => {
      const testFile = join(tempDir, 'exists.h');
      await safeWriteFile(testFile, 'x');
      expect(await safeExists(testFile)).toBe(true);
      expect(await safeExists(join(tempDir, 'missing.h'))).toBe(false);
    });
  });

  describe('safeMkdir', () => {
    it('should create nested directories with recursive option', async () => {
      const nested = join(tempDir, 'nested', 'dir');
      await safeMkdir(nested, { recursive: true });
      expect((await safeStat(nested)).isDirectory()).toBe(true);
    });
  });

  describe('safeStat', () => {
    it('should return file statistics', async () => {
      const testFile = join(tempDir, 'stat.txt');
      await safeWriteFile(testFile, 'content');
      const stats = await safeStat(testFile);
      expect(stats.isFile()).toBe(true);
      expect(stats.size).toBe(7);
    });
  });

  describe('safeUnlink', () => {
    it('should delete a file', async () => {
      const testFile = join(tempDir, 'unlink.txt');
      await safeWriteFile(testFile, 'content');
      await safeUnlink(testFile);
      expect(await safeExists(testFile)).toBe(false);
    });
  });

  describe('safeRename', () => {
    it('should replace an existing destination', async () => {
      const oldPath = join(tempDir, 'new.h');
      const newPath = join(tempDir, 'target.h');
      await safeWriteFile(oldPath, 'new');
      await safeWriteFile(newPath, 'old');
      await safeRename(oldPath, newPath);
      expect(await safeExists(oldPath)).toBe(false);
      expect(await safeReadFile(newPath)).toBe('new');
    });

    it('should reject empty paths', async () => {
      await expect(safeRename('', '/tmp/test.h')).rejects.toThrow(PathValidationError);
      await expect(safeRename('/tmp/test.h', '')).rejects.toThrow(PathValidationError);
    });
  });
});
