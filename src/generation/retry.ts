/**
 * Retry logic with exponential backoff for generation calls.
 *
 * @packageDocumentation
 */

import type { GenerationError, GenerationResult } from './types.js';
import { createFailureResult, createTransportError, isRetryableError } from './types.js';

/**
 * Configuration options for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 2). */
  maxRetries: number;
  /** Base delay in milliseconds for exponential backoff (default: 1000). */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000). */
  maxDelayMs: number;
  /** Jitter factor (0-1) for randomizing delays (default: 0.2). */
  jitterFactor: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxRetries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.2,
} as const;

/**
 * Validates retry configuration values.
 *
 * @param config - Partial retry configuration to validate.
 * @returns Valid retry configuration with defaults applied.
 * @throws Error if configuration values are invalid.
 */
export function validateRetryConfig(config: Partial<RetryConfig> = {}): RetryConfig {
  const {
    maxRetries = DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs = DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs = DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor = DEFAULT_RETRY_CONFIG.jitterFactor,
  } = config;

  if (maxRetries < 0 || !Number.isInteger(maxRetries)) {
    throw new Error(`maxRetries must be a non-negative integer, got: ${String(maxRetries)}`);
  }

  if (baseDelayMs < 0) {
    throw new Error(`baseDelayMs must be non-negative, got: ${String(baseDelayMs)}`);
  }

  if (maxDelayMs < baseDelayMs) {
    throw new Error(
      `maxDelayMs (${String(maxDelayMs)}) must be >= baseDelayMs (${String(baseDelayMs)})`
    );
  }

  if (jitterFactor < 0 || jitterFactor > 1) {
    throw new Error(`jitterFactor must be between 0 and 1, got: ${String(jitterFactor)}`);
  }

  return { maxRetries, baseDelayMs, maxDelayMs, jitterFactor };
}

/**
 * Calculates the delay before the next attempt:
 * min(maxDelayMs, baseDelayMs * 2^attempt) * (1 ± jitter).
 *
 * A rate limit carrying a retry-after hint uses the hint instead, capped at
 * maxDelayMs.
 *
 * @param attempt - The retry attempt number (0-indexed).
 * @param config - Retry configuration.
 * @param error - Optional error that may contain retry hints.
 * @param random - Random function for jitter (injectable for testing).
 * @returns Delay in milliseconds before the next attempt.
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig,
  error?: GenerationError,
  random: () => number = Math.random
): number {
  if (error?.kind === 'RateLimitError' && error.retryAfterMs !== undefined) {
    return Math.min(error.retryAfterMs, config.maxDelayMs);
  }

  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);
  const jitterMultiplier = 1 - config.jitterFactor + random() * 2 * config.jitterFactor;

  return Math.round(cappedDelay * jitterMultiplier);
}

/**
 * Information about a retry attempt.
 */
export interface RetryAttemptInfo {
  /** The attempt number about to run (1-indexed). */
  attempt: number;
  /** Total attempts that will be made (initial + retries). */
  totalAttempts: number;
  /** Delay before this attempt in milliseconds. */
  delayMs: number;
  /** The error from the previous attempt. */
  previousError: GenerationError;
}

/**
 * Options for the withRetry function.
 */
export interface WithRetryOptions {
  /** Retry configuration (uses defaults if not provided). */
  config?: Partial<RetryConfig>;
  /** Callback invoked before each retry attempt. */
  onRetry?: (info: RetryAttemptInfo) => void;
  /** Sleep function for delays (injectable for testing). */
  sleep?: (ms: number) => Promise<void>;
  /** Random function for jitter (injectable for testing). */
  random?: () => number;
  /** Stops retrying once aborted. */
  signal?: AbortSignal;
}

/**
 * Default sleep implementation using setTimeout.
 *
 * @param ms - Milliseconds to sleep.
 */
export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs a generation call, retrying retryable failures with exponential backoff.
 *
 * Non-retryable failures return immediately. When every attempt fails the
 * result is a TransportError naming the attempt count and the last error.
 *
 * @param operation - The generation call.
 * @param options - Retry options.
 * @returns The first success, the first non-retryable failure, or the exhaustion failure.
 *
 * @example
 * ```typescript
 * const result = await withRetry(() => capability.generate(request, signal), {
 *   config: { maxRetries: 2, baseDelayMs: 500 },
 *   onRetry: (info) => logger.warn('generation_retry', { attempt: info.attempt }),
 * });
 * ```
 */
export async function withRetry(
  operation: () => Promise<GenerationResult>,
  options: WithRetryOptions = {}
): Promise<GenerationResult> {
  const config = validateRetryConfig(options.config);
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;
  const totalAttempts = config.maxRetries + 1;

  let lastError: GenerationError | undefined;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    if (lastError !== undefined) {
      if (options.signal?.aborted === true) {
        return createFailureResult(lastError);
      }
      const delayMs = calculateBackoffDelay(attempt - 1, config, lastError, random);
      options.onRetry?.({ attempt: attempt + 1, totalAttempts, delayMs, previousError: lastError });
      await sleep(delayMs);
    }

    const result = await operation();

    if (result.success || !isRetryableError(result.error)) {
      return result;
    }

    lastError = result.error;
  }

  if (lastError === undefined) {
    return createFailureResult(createTransportError('No generation attempt was made'));
  }

  return createFailureResult(
    createTransportError(
      `All ${String(totalAttempts)} attempts failed. Last error: ${lastError.message}`,
      { cause: lastError.cause }
    )
  );
}
