/**
 * Configuration types for voicecraft.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Model role aliases. Each generation request is sent to the model
 * assigned to the role that issues it.
 */
export interface ModelAssignments {
  /** Model asking the brainstorming questions. */
  interviewer_model: string;
  /** Model writing the content brief. */
  strategist_model: string;
  /** Model proposing hooks. */
  hook_model: string;
  /** Model outlining the post structure. */
  structure_model: string;
  /** Model writing the final post. */
  writer_model: string;
}

/**
 * Thresholds of the conversational session.
 */
export interface ConversationConfig {
  /** User turns required before coverage can complete a session. */
  min_user_turns: number;
  /** Focus areas that must be covered before completion. */
  min_focus_coverage: number;
  /** User turns after which a session completes regardless of coverage. */
  max_user_turns: number;
  /** Word count from which an unmatched reply credits the targeted area. */
  substantive_reply_words: number;
}

/**
 * Style profile merging parameters.
 */
export interface StyleConfig {
  /** Upper bound of the moving-average divisor. */
  ema_cap: number;
  /** Number of characteristic phrases kept. */
  phrase_top_k: number;
}

/**
 * Settings of the command-line generation client.
 */
export interface GenerationConfig {
  /** Executable invoked for each generation request. */
  executable: string;
  /** Per-request timeout in milliseconds. */
  timeout_ms: number;
  /** Retries after the first failed attempt. */
  max_retries: number;
  /** Base delay for exponential backoff. */
  retry_base_delay_ms: number;
  /** Ceiling for a single backoff delay. */
  retry_max_delay_ms: number;
}

/**
 * Pipeline orchestration settings.
 */
export interface PipelineConfig {
  /** Attempts per stage before the run fails. */
  max_stage_attempts: number;
  /** Number of hook options requested. */
  hook_count: number;
  /** Base delay between stage attempts. */
  stage_retry_base_delay_ms: number;
}

/**
 * Audience and topical focus passed into every prompt.
 */
export interface ContentConfig {
  target_audience: string;
  content_focus: string;
}

/**
 * Path configuration for state and output.
 */
export interface PathConfig {
  /** Directory holding session and run records. */
  state: string;
  /** File the final post is written to. */
  output: string;
}

/**
 * Response monitoring settings.
 */
export interface MonitoringConfig {
  /** Target time between question and reply. */
  target_response_ms: number;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Emit debug-level entries. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from voicecraft.toml.
 */
export interface Config {
  models: ModelAssignments;
  conversation: ConversationConfig;
  style: StyleConfig;
  generation: GenerationConfig;
  pipeline: PipelineConfig;
  content: ContentConfig;
  paths: PathConfig;
  monitoring: MonitoringConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export type PartialConfig = {
  [Section in keyof Config]?: Partial<Config[Section]>;
};
