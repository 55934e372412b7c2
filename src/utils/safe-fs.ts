/**
 * File system helpers that validate paths before touching the disk.
 *
 * Every path is resolved to an absolute path and rejected if it is empty or
 * contains null bytes. The store and the post exporter go through these
 * helpers rather than calling `node:fs/promises` directly.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
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
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
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
 * Writes a file atomically: the data goes to a sibling temp file which is
 * then renamed over the target. The temp file is removed if the write fails.
 *
 * @param filePath - The target path.
 * @param data - The text to write.
 * @param tempSuffix - Unique suffix for the temp file name.
 */
export async function safeWriteFileAtomic(
  filePath: string,
  data: string,
  tempSuffix: string
): Promise<void> {
  const validatedPath = validatePath(filePath);
  const tempPath = path.join(
    path.dirname(validatedPath),
    `.${path.basename(validatedPath)}.${tempSuffix}.tmp`
  );

  try {
    await fs.writeFile(tempPath, data, 'utf-8');
    await fs.rename(tempPath, validatedPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Creates a directory (and its parents) after validating the path.
 *
 * @param dirPath - The directory to create.
 */
export async function safeMkdir(dirPath: string): Promise<void> {
  const validatedPath = validatePath(dirPath);
  await fs.mkdir(validatedPath, { recursive: true });
}

/**
 * Lists the entry names of a directory, or an empty list if it does not exist.
 *
 * @param dirPath - The directory to read.
 */
export async function safeReaddir(dirPath: string): Promise<string[]> {
  const validatedPath = validatePath(dirPath);
  try {
    return await fs.readdir(validatedPath);
  } catch (error) {
    if (isNotFoundError(error)) {
      return [];
    }
    throw error;
  }
}

/**
 * Checks whether an error is a Node "file not found" error.
 *
 * @param error - The caught value.
 * @returns True for ENOENT errors.
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
