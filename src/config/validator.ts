/**
 * Semantic validation for configuration values.
 *
 * Checks what the parser cannot: integer ranges, relationships between
 * conversation thresholds, and non-empty model and path strings.
 *
 * @packageDocumentation
 */

import { FOCUS_AREAS } from '../conversation/focus-areas.js';
import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Checks that a value is an integer within [min, max].
 */
function validateIntegerRange(
  value: number,
  fieldPath: string,
  min: number,
  max: number,
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be an integer between ${String(min)} and ${String(max)}, got ${String(value)}`,
    });
  }
}

function validateNonEmpty(value: string, fieldPath: string, errors: ValidationError[]): void {
  if (value.trim() === '') {
    errors.push({ field: fieldPath, value, message: `'${fieldPath}' must not be empty` });
  }
}

function validateModels(config: Config, errors: ValidationError[]): void {
  for (const [field, model] of Object.entries(config.models)) {
    validateNonEmpty(model, `models.${field}`, errors);
  }
}

function validateConversation(config: Config, errors: ValidationError[]): void {
  const { conversation } = config;
  validateIntegerRange(conversation.min_user_turns, 'conversation.min_user_turns', 1, 100, errors);
  validateIntegerRange(
    conversation.min_focus_coverage,
    'conversation.min_focus_coverage',
    0,
    FOCUS_AREAS.length,
    errors
  );
  validateIntegerRange(conversation.max_user_turns, 'conversation.max_user_turns', 1, 100, errors);
  validateIntegerRange(
    conversation.substantive_reply_words,
    'conversation.substantive_reply_words',
    1,
    1000,
    errors
  );

  if (conversation.min_user_turns > conversation.max_user_turns) {
    errors.push({
      field: 'conversation.min_user_turns',
      value: conversation.min_user_turns,
      message: `'conversation.min_user_turns' (${String(conversation.min_user_turns)}) must not exceed 'conversation.max_user_turns' (${String(conversation.max_user_turns)})`,
    });
  }
}

function validateGeneration(config: Config, errors: ValidationError[]): void {
  const { generation } = config;
  validateNonEmpty(generation.executable, 'generation.executable', errors);
  validateIntegerRange(generation.timeout_ms, 'generation.timeout_ms', 1, 3600000, errors);
  validateIntegerRange(generation.max_retries, 'generation.max_retries', 0, 100, errors);
  validateIntegerRange(
    generation.retry_base_delay_ms,
    'generation.retry_base_delay_ms',
    0,
    3600000,
    errors
  );
  validateIntegerRange(
    generation.retry_max_delay_ms,
    'generation.retry_max_delay_ms',
    0,
    3600000,
    errors
  );
  if (generation.retry_max_delay_ms < generation.retry_base_delay_ms) {
    errors.push({
      field: 'generation.retry_max_delay_ms',
      value: generation.retry_max_delay_ms,
      message: `'generation.retry_max_delay_ms' must be at least 'generation.retry_base_delay_ms'`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validateModels(config, errors);
  validateConversation(config, errors);
  validateIntegerRange(config.style.ema_cap, 'style.ema_cap', 1, 1000, errors);
  validateIntegerRange(config.style.phrase_top_k, 'style.phrase_top_k', 1, 100, errors);
  validateGeneration(config, errors);
  validateIntegerRange(
    config.pipeline.max_stage_attempts,
    'pipeline.max_stage_attempts',
    1,
    20,
    errors
  );
  validateIntegerRange(config.pipeline.hook_count, 'pipeline.hook_count', 1, 5, errors);
  validateIntegerRange(
    config.pipeline.stage_retry_base_delay_ms,
    'pipeline.stage_retry_base_delay_ms',
    0,
    3600000,
    errors
  );
  validateNonEmpty(config.paths.state, 'paths.state', errors);
  validateNonEmpty(config.paths.output, 'paths.output', errors);
  validateIntegerRange(
    config.monitoring.target_response_ms,
    'monitoring.target_response_ms',
    1,
    3600000,
    errors
  );

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
