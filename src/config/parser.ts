/**
 * TOML configuration parser for voicecraft.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
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
import type {
  Config,
  ContentConfig,
  ConversationConfig,
  GenerationConfig,
  LoggingConfig,
  ModelAssignments,
  MonitoringConfig,
  PathConfig,
  PipelineConfig,
  StyleConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type RawTable = Record<string, unknown>;

function isTable(value: unknown): value is RawTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrows a top-level TOML value to a table.
 *
 * @param value - The value under the section key.
 * @param section - Section name for error messages.
 * @returns The table, or undefined when the section is absent.
 * @throws ConfigParseError if the section is present but not a table.
 */
function readSection(value: unknown, section: string): RawTable | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(`Invalid type for '${section}': expected table, got ${typeof value}`);
  }
  return value;
}

function readString(raw: RawTable | undefined, field: string, section: string, fallback: string): string {
  if (raw === undefined || !(field in raw)) {
    return fallback;
  }
  const value = raw[field];
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${section}.${field}': expected string, got ${typeof value}`
    );
  }
  return value;
}

function readNumber(raw: RawTable | undefined, field: string, section: string, fallback: number): number {
  if (raw === undefined || !(field in raw)) {
    return fallback;
  }
  const value = raw[field];
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${section}.${field}': expected number, got ${typeof value}`
    );
  }
  if (!Number.isFinite(value)) {
    throw new ConfigParseError(
      `Invalid value for '${section}.${field}': must be a finite number, got ${String(value)}`
    );
  }
  return value;
}

function readBoolean(
  raw: RawTable | undefined,
  field: string,
  section: string,
  fallback: boolean
): boolean {
  if (raw === undefined || !(field in raw)) {
    return fallback;
  }
  const value = raw[field];
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${section}.${field}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function parseModels(raw: RawTable | undefined): ModelAssignments {
  const d = DEFAULT_MODEL_ASSIGNMENTS;
  return {
    interviewer_model: readString(raw, 'interviewer_model', 'models', d.interviewer_model),
    strategist_model: readString(raw, 'strategist_model', 'models', d.strategist_model),
    hook_model: readString(raw, 'hook_model', 'models', d.hook_model),
    structure_model: readString(raw, 'structure_model', 'models', d.structure_model),
    writer_model: readString(raw, 'writer_model', 'models', d.writer_model),
  };
}

function parseConversation(raw: RawTable | undefined): ConversationConfig {
  const d = DEFAULT_CONVERSATION;
  return {
    min_user_turns: readNumber(raw, 'min_user_turns', 'conversation', d.min_user_turns),
    min_focus_coverage: readNumber(raw, 'min_focus_coverage', 'conversation', d.min_focus_coverage),
    max_user_turns: readNumber(raw, 'max_user_turns', 'conversation', d.max_user_turns),
    substantive_reply_words: readNumber(
      raw,
      'substantive_reply_words',
      'conversation',
      d.substantive_reply_words
    ),
  };
}

function parseStyle(raw: RawTable | undefined): StyleConfig {
  return {
    ema_cap: readNumber(raw, 'ema_cap', 'style', DEFAULT_STYLE.ema_cap),
    phrase_top_k: readNumber(raw, 'phrase_top_k', 'style', DEFAULT_STYLE.phrase_top_k),
  };
}

function parseGeneration(raw: RawTable | undefined): GenerationConfig {
  const d = DEFAULT_GENERATION;
  return {
    executable: readString(raw, 'executable', 'generation', d.executable),
    timeout_ms: readNumber(raw, 'timeout_ms', 'generation', d.timeout_ms),
    max_retries: readNumber(raw, 'max_retries', 'generation', d.max_retries),
    retry_base_delay_ms: readNumber(raw, 'retry_base_delay_ms', 'generation', d.retry_base_delay_ms),
    retry_max_delay_ms: readNumber(raw, 'retry_max_delay_ms', 'generation', d.retry_max_delay_ms),
  };
}

function parsePipeline(raw: RawTable | undefined): PipelineConfig {
  const d = DEFAULT_PIPELINE;
  return {
    max_stage_attempts: readNumber(raw, 'max_stage_attempts', 'pipeline', d.max_stage_attempts),
    hook_count: readNumber(raw, 'hook_count', 'pipeline', d.hook_count),
    stage_retry_base_delay_ms: readNumber(
      raw,
      'stage_retry_base_delay_ms',
      'pipeline',
      d.stage_retry_base_delay_ms
    ),
  };
}

function parseContent(raw: RawTable | undefined): ContentConfig {
  return {
    target_audience: readString(raw, 'target_audience', 'content', DEFAULT_CONTENT.target_audience),
    content_focus: readString(raw, 'content_focus', 'content', DEFAULT_CONTENT.content_focus),
  };
}

function parsePaths(raw: RawTable | undefined): PathConfig {
  return {
    state: readString(raw, 'state', 'paths', DEFAULT_PATHS.state),
    output: readString(raw, 'output', 'paths', DEFAULT_PATHS.output),
  };
}

function parseMonitoring(raw: RawTable | undefined): MonitoringConfig {
  return {
    target_response_ms: readNumber(
      raw,
      'target_response_ms',
      'monitoring',
      DEFAULT_MONITORING.target_response_ms
    ),
  };
}

function parseLogging(raw: RawTable | undefined): LoggingConfig {
  return { debug: readBoolean(raw, 'debug', 'logging', DEFAULT_LOGGING.debug) };
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or mistyped fields.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [conversation]
 * min_user_turns = 5
 * `);
 * console.log(config.conversation.min_user_turns); // 5
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: RawTable;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigParseError(
      `Invalid TOML syntax: ${message}`,
      error instanceof Error ? error : undefined
    );
  }

  return {
    models: parseModels(readSection(parsed.models, 'models')),
    conversation: parseConversation(readSection(parsed.conversation, 'conversation')),
    style: parseStyle(readSection(parsed.style, 'style')),
    generation: parseGeneration(readSection(parsed.generation, 'generation')),
    pipeline: parsePipeline(readSection(parsed.pipeline, 'pipeline')),
    content: parseContent(readSection(parsed.content, 'content')),
    paths: parsePaths(readSection(parsed.paths, 'paths')),
    monitoring: parseMonitoring(readSection(parsed.monitoring, 'monitoring')),
    logging: parseLogging(readSection(parsed.logging, 'logging')),
  };
}

/**
 * Returns a copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return structuredClone(DEFAULT_CONFIG);
}
