import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import {
  PathValidationError,
  isNotFoundError,
  safeMkdir,
  safeReadFile,
  safeReaddir,
  safeWriteFileAtomic,
  validatePath,
} from './safe-fs.js';

describe('safe-fs', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'voicecraft-safe-fs-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('should resolve relative paths to absolute', () => {
      expect(validatePath('state/sessions')).toBe(path.resolve('state/sessions'));
    });

    it('should reject empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
    });

    it('should reject paths with null bytes', () => {
      expect(() => validatePath('bad\0path')).toThrow('Path cannot contain null bytes');
    });

    it('should accept non-empty strings without null bytes (property-based)', () => {
      fc.assert(
        fc.property(
          fc.string({ minLength: 1 }).filter((s) => !s.includes('\0')),
          (candidate) => path.isAbsolute(validatePath(candidate))
        )
      );
    });
  });

  describe('safeWriteFileAtomic', () => {
    it('should write the target and leave no temp file behind', async () => {
      const target = path.join(directory, 'record.json');

      await safeWriteFileAtomic(target, '{"version":1}\n', 'tmp1');

      expect(await readFile(target, 'utf-8')).toBe('{"version":1}\n');
      expect(await readdir(directory)).toEqual(['record.json']);
    });

    it('should replace an existing file', async () => {
      const target = path.join(directory, 'record.json');
      await writeFile(target, 'old');

      await safeWriteFileAtomic(target, 'new', 'tmp2');

      expect(await readFile(target, 'utf-8')).toBe('new');
    });

    it('should clean up the temp file when the rename fails', async () => {
      const target = path.join(directory, 'taken');
      await safeMkdir(path.join(target, 'child'));

      await expect(safeWriteFileAtomic(target, 'data', 'tmp3')).rejects.toThrow();
      expect(await readdir(directory)).toEqual(['taken']);
    });
  });

  describe('safeReadFile', () => {
    it('should read text', async () => {
      const target = path.join(directory, 'note.txt');

      await writeFile(target, 'hello', 'utf-8');

      expect(await safeReadFile(target)).toBe('hello');
    });

    it('should reject before touching the disk for an empty path', async () => {
      await expect(safeReadFile('')).rejects.toBeInstanceOf(PathValidationError);
    });
  });

  describe('safeReaddir', () => {
    it('should return an empty list for a missing directory', async () => {
      expect(await safeReaddir(path.join(directory, 'missing'))).toEqual([]);
    });

    it('should list created entries', async () => {
      await safeMkdir(path.join(directory, 'a', 'b'));

      expect(await safeReaddir(path.join(directory, 'a'))).toEqual(['b']);
    });
  });

  describe('isNotFoundError', () => {
    it('should recognise ENOENT only', async () => {
      const missing = await readFile(path.join(directory, 'missing')).catch((error: unknown) => error);

      expect(isNotFoundError(missing)).toBe(true);
      expect(isNotFoundError(new Error('other'))).toBe(false);
    });
  });
});
