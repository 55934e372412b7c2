/**
 * Default configuration values for voicecraft.toml.
 *
 * @packageDocumentation
 */

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
 * Default model assignments. The interviewer runs on a fast model since its
 * latency is felt on every turn.
 */
export const DEFAULT_MODEL_ASSIGNMENTS: ModelAssignments = {
  interviewer_model: 'claude-haiku-4-5',
  strategist_model: 'claude-sonnet-4-5',
  hook_model: 'claude-sonnet-4-5',
  structure_model: 'claude-sonnet-4-5',
  writer_model: 'claude-sonnet-4-5',
};

export const DEFAULT_CONVERSATION: ConversationConfig = {
  min_user_turns: 4,
  min_focus_coverage: 4,
  max_user_turns: 12,
  substantive_reply_words: 4,
};

export const DEFAULT_STYLE: StyleConfig = {
  ema_cap: 5,
  phrase_top_k: 8,
};

export const DEFAULT_GENERATION: GenerationConfig = {
  executable: 'claude',
  timeout_ms: 120000,
  max_retries: 2,
  retry_base_delay_ms: 1000,
  retry_max_delay_ms: 30000,
};

export const DEFAULT_PIPELINE: PipelineConfig = {
  max_stage_attempts: 3,
  hook_count: 3,
  stage_retry_base_delay_ms: 2000,
};

export const DEFAULT_CONTENT: ContentConfig = {
  target_audience: 'Industry professionals and ambitious Gen-Z individuals',
  content_focus: "Tech and startups, India's development, AI advancements",
};

/**
 * Default path configuration relative to the working directory.
 */
export const DEFAULT_PATHS: PathConfig = {
  state: '.voicecraft/state',
  output: 'linkedin_post.md',
};

export const DEFAULT_MONITORING: MonitoringConfig = {
  target_response_ms: 2000,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  models: DEFAULT_MODEL_ASSIGNMENTS,
  conversation: DEFAULT_CONVERSATION,
  style: DEFAULT_STYLE,
  generation: DEFAULT_GENERATION,
  pipeline: DEFAULT_PIPELINE,
  content: DEFAULT_CONTENT,
  paths: DEFAULT_PATHS,
  monitoring: DEFAULT_MONITORING,
  logging: DEFAULT_LOGGING,
};
