/**
 * Access to the JSON data files shipped in the package's `data/` directory.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

/**
 * Reads and parses a JSON file from `data/`.
 *
 * The path is resolved from this module's location, which sits two levels
 * below the package root in both `src/` and `dist/`.
 *
 * @param fileName - File name inside `data/`.
 * @returns The parsed JSON value.
 */
export function readDataFile(fileName: string): unknown {
  const filePath = fileURLToPath(new URL(`../../data/${fileName}`, import.meta.url));
  return JSON.parse(readFileSync(filePath, 'utf-8'));
}

/**
 * Checks that a value is an array of strings.
 */
export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}
