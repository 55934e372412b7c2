/**
 * Configuration module for voicecraft.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  Config,
  ContentConfig,
  ConversationConfig,
  GenerationConfig,
  LoggingConfig,
  ModelAssignments,
  MonitoringConfig,
  PartialConfig,
  PathConfig,
  PipelineConfig,
  StyleConfig,
} from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_CONTENT,
  DEFAULT_CONVERSATION,
  DEFAULT_GENERATION,
  DEFAULT_LOGGING,
  DEFAULT_MODEL_ASSIGNMENTS,
  DEFAULT_MONITORING,
  DEFAULT_PATHS,
  DEFAULT_PIPELINE,
  DEFAULT_STYLE,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { CONFIG_FILE_NAME, loadConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
