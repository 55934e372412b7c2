/**
 * Environment variable overrides for configuration.
 *
 * VOICECRAFT_* variables override configuration values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvMapping =
  | { type: 'string'; description: string; apply: (target: PartialConfig, value: string) => void }
  | { type: 'number'; description: string; apply: (target: PartialConfig, value: number) => void }
  | {
      type: 'boolean';
      description: string;
      apply: (target: PartialConfig, value: boolean) => void;
    };

function text(
  description: string,
  apply: (target: PartialConfig, value: string) => void
): EnvMapping {
  return { type: 'string', description, apply };
}

function numeric(
  description: string,
  apply: (target: PartialConfig, value: number) => void
): EnvMapping {
  return { type: 'number', description, apply };
}

function flag(
  description: string,
  apply: (target: PartialConfig, value: boolean) => void
): EnvMapping {
  return { type: 'boolean', description, apply };
}

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: VOICECRAFT_<SECTION>_<FIELD> maps to config.<section>.<field>.
 * Shortcuts come first so the full form wins when both are set.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  // Shortcuts
  VOICECRAFT_MODEL: text('Override the writer model (shortcut)', (o, v) => {
    o.models = { ...o.models, writer_model: v };
  }),
  VOICECRAFT_MAX_RETRIES: numeric('Override generation retries (shortcut)', (o, v) => {
    o.generation = { ...o.generation, max_retries: v };
  }),
  VOICECRAFT_DEBUG: flag('Enable debug logging (shortcut)', (o, v) => {
    o.logging = { ...o.logging, debug: v };
  }),

  // Models
  VOICECRAFT_MODELS_INTERVIEWER_MODEL: text('Override the interviewer model', (o, v) => {
    o.models = { ...o.models, interviewer_model: v };
  }),
  VOICECRAFT_MODELS_STRATEGIST_MODEL: text('Override the strategist model', (o, v) => {
    o.models = { ...o.models, strategist_model: v };
  }),
  VOICECRAFT_MODELS_HOOK_MODEL: text('Override the hook model', (o, v) => {
    o.models = { ...o.models, hook_model: v };
  }),
  VOICECRAFT_MODELS_STRUCTURE_MODEL: text('Override the structure model', (o, v) => {
    o.models = { ...o.models, structure_model: v };
  }),
  VOICECRAFT_MODELS_WRITER_MODEL: text('Override the writer model', (o, v) => {
    o.models = { ...o.models, writer_model: v };
  }),

  // Conversation
  VOICECRAFT_CONVERSATION_MIN_USER_TURNS: numeric('Minimum user turns', (o, v) => {
    o.conversation = { ...o.conversation, min_user_turns: v };
  }),
  VOICECRAFT_CONVERSATION_MIN_FOCUS_COVERAGE: numeric('Minimum covered focus areas', (o, v) => {
    o.conversation = { ...o.conversation, min_focus_coverage: v };
  }),
  VOICECRAFT_CONVERSATION_MAX_USER_TURNS: numeric('Maximum user turns', (o, v) => {
    o.conversation = { ...o.conversation, max_user_turns: v };
  }),
  VOICECRAFT_CONVERSATION_SUBSTANTIVE_REPLY_WORDS: numeric(
    'Words that make a reply substantive',
    (o, v) => {
      o.conversation = { ...o.conversation, substantive_reply_words: v };
    }
  ),

  // Style
  VOICECRAFT_STYLE_EMA_CAP: numeric('Moving-average divisor cap', (o, v) => {
    o.style = { ...o.style, ema_cap: v };
  }),
  VOICECRAFT_STYLE_PHRASE_TOP_K: numeric('Characteristic phrases kept', (o, v) => {
    o.style = { ...o.style, phrase_top_k: v };
  }),

  // Generation
  VOICECRAFT_GENERATION_EXECUTABLE: text('Generation executable', (o, v) => {
    o.generation = { ...o.generation, executable: v };
  }),
  VOICECRAFT_GENERATION_TIMEOUT_MS: numeric('Generation timeout in milliseconds', (o, v) => {
    o.generation = { ...o.generation, timeout_ms: v };
  }),
  VOICECRAFT_GENERATION_MAX_RETRIES: numeric('Generation retries', (o, v) => {
    o.generation = { ...o.generation, max_retries: v };
  }),
  VOICECRAFT_GENERATION_RETRY_BASE_DELAY_MS: numeric('Retry base delay in milliseconds', (o, v) => {
    o.generation = { ...o.generation, retry_base_delay_ms: v };
  }),
  VOICECRAFT_GENERATION_RETRY_MAX_DELAY_MS: numeric('Retry delay ceiling in milliseconds', (o, v) => {
    o.generation = { ...o.generation, retry_max_delay_ms: v };
  }),

  // Pipeline
  VOICECRAFT_PIPELINE_MAX_STAGE_ATTEMPTS: numeric('Attempts per pipeline stage', (o, v) => {
    o.pipeline = { ...o.pipeline, max_stage_attempts: v };
  }),
  VOICECRAFT_PIPELINE_HOOK_COUNT: numeric('Hook options requested', (o, v) => {
    o.pipeline = { ...o.pipeline, hook_count: v };
  }),
  VOICECRAFT_PIPELINE_STAGE_RETRY_BASE_DELAY_MS: numeric(
    'Base delay between stage attempts',
    (o, v) => {
      o.pipeline = { ...o.pipeline, stage_retry_base_delay_ms: v };
    }
  ),

  // Content
  VOICECRAFT_CONTENT_TARGET_AUDIENCE: text('Target audience', (o, v) => {
    o.content = { ...o.content, target_audience: v };
  }),
  VOICECRAFT_CONTENT_CONTENT_FOCUS: text('Content focus', (o, v) => {
    o.content = { ...o.content, content_focus: v };
  }),

  // Paths
  VOICECRAFT_PATHS_STATE: text('State directory', (o, v) => {
    o.paths = { ...o.paths, state: v };
  }),
  VOICECRAFT_PATHS_OUTPUT: text('Output file for the final post', (o, v) => {
    o.paths = { ...o.paths, output: v };
  }),

  // Monitoring and logging
  VOICECRAFT_MONITORING_TARGET_RESPONSE_MS: numeric('Target response time', (o, v) => {
    o.monitoring = { ...o.monitoring, target_response_ms: v };
  }),
  VOICECRAFT_LOGGING_DEBUG: flag('Enable debug logging (true/false)', (o, v) => {
    o.logging = { ...o.logging, debug: v };
  }),
};

/**
 * Coerces a string value to a number.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced number value.
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Coerces a string value to a boolean (case-insensitive).
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value is not a recognized boolean word.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  if (TRUTHY.includes(trimmed)) {
    return true;
  }
  if (FALSY.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

function applyMapping(mapping: EnvMapping, target: PartialConfig, value: string, envVar: string): void {
  switch (mapping.type) {
    case 'string':
      mapping.apply(target, value);
      return;
    case 'number':
      mapping.apply(target, coerceToNumber(value, envVar));
      return;
    case 'boolean':
      mapping.apply(target, coerceToBoolean(value, envVar));
      return;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads VOICECRAFT_* environment variables into configuration overrides.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ VOICECRAFT_CONVERSATION_MAX_USER_TURNS: '8' });
 * console.log(result.overrides.conversation?.max_user_turns); // 8
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyMapping(mapping, overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    models: { ...base.models, ...partial.models },
    conversation: { ...base.conversation, ...partial.conversation },
    style: { ...base.style, ...partial.style },
    generation: { ...base.generation, ...partial.generation },
    pipeline: { ...base.pipeline, ...partial.pipeline },
    content: { ...base.content, ...partial.content },
    paths: { ...base.paths, ...partial.paths },
    monitoring: { ...base.monitoring, ...partial.monitoring },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
