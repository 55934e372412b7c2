/**
 * Loads the effective configuration: defaults, then voicecraft.toml, then
 * VOICECRAFT_* environment overrides, then semantic validation.
 *
 * @packageDocumentation
 */

import { isNotFoundError, safeReadFile } from '../utils/safe-fs.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

/** Configuration file looked up in the working directory. */
export const CONFIG_FILE_NAME = 'voicecraft.toml';

/**
 * Options for loading configuration.
 */
export interface LoadConfigOptions {
  /**
   * Path of the TOML file. A missing file means defaults.
   * @defaultValue voicecraft.toml
   */
  readonly path?: string;
  /**
   * Environment to read overrides from.
   * @defaultValue process.env
   */
  readonly env?: EnvRecord;
}

/**
 * Loads and validates configuration.
 *
 * @param options - File path and environment.
 * @returns The effective configuration.
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const filePath = options.path ?? CONFIG_FILE_NAME;

  let fileConfig: Config;
  try {
    fileConfig = parseConfig(await safeReadFile(filePath));
  } catch (error) {
    if (!isNotFoundError(error)) {
      throw error;
    }
    fileConfig = getDefaultConfig();
  }

  const config = applyEnvOverrides(fileConfig, options.env ?? process.env);
  assertConfigValid(config);
  return config;
}
