/**
 * Version command: prints the version from package.json.
 */

import { readFileSync } from 'node:fs';
import type { CliCommandResult, Prompter } from '../types.js';

const PACKAGE_JSON_URL = new URL('../../../package.json', import.meta.url);

function readJson(url: URL): unknown {
  try {
    const parsed: unknown = JSON.parse(readFileSync(url, 'utf-8'));
    return parsed;
  } catch (error) {
    if (error instanceof SyntaxError || (error instanceof Error && 'code' in error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersion(packageJsonUrl: URL = PACKAGE_JSON_URL): string {
  const packageJson = readJson(packageJsonUrl);
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return typeof packageJson.version === 'string' ? packageJson.version : '(unknown)';
  }
  return '(unknown)';
}

export function handleVersionCommand(output: Pick<Prompter, 'print'>): CliCommandResult {
  output.print(`voicecraft v${getVersion()}`);
  return { exitCode: 0 };
}
