/**
 * Generation capability: types, retry and the command-line client.
 *
 * @packageDocumentation
 */

export type {
  CancelledError,
  GenerationCapability,
  GenerationError,
  GenerationErrorKind,
  GenerationRequest,
  GenerationResponse,
  GenerationResult,
  InvalidRequestError,
  PromptKind,
  RateLimitError,
  TimeoutError,
  TransportError,
} from './types.js';
export {
  PROMPT_KINDS,
  createCancelledError,
  createFailureResult,
  createInvalidRequestError,
  createRateLimitError,
  createSuccessResult,
  createTimeoutError,
  createTransportError,
  isRetryableError,
} from './types.js';
export {
  DEFAULT_RETRY_CONFIG,
  calculateBackoffDelay,
  defaultSleep,
  validateRetryConfig,
  withRetry,
} from './retry.js';
export type { RetryAttemptInfo, RetryConfig, WithRetryOptions } from './retry.js';
export { renderPrompt } from './prompts.js';
export type { RenderResult } from './prompts.js';
export { CommandGenerationClient, parseCommandOutput, resolveModel } from './command-client.js';
export type { CommandGenerationClientOptions } from './command-client.js';
