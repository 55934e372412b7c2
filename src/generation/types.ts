/**
 * Generation capability types.
 *
 * Every piece of generated text (questions, briefs, hooks, outlines, the final
 * post) comes from a {@link GenerationCapability}. Failures are returned as a
 * discriminated result, never thrown.
 *
 * @packageDocumentation
 */

/**
 * What the generated text is for. Each kind has its own prompt template and
 * model role.
 */
export type PromptKind = 'question' | 'wrapUp' | 'brief' | 'hooks' | 'structure' | 'content';

/**
 * Array of all prompt kinds.
 */
export const PROMPT_KINDS: readonly PromptKind[] = [
  'question',
  'wrapUp',
  'brief',
  'hooks',
  'structure',
  'content',
] as const;

/**
 * Request to the generation capability.
 */
export interface GenerationRequest {
  /** Template and model role to use. */
  readonly promptKind: PromptKind;
  /** Values substituted into the template (idea, transcript, bundle sections...). */
  readonly context: Readonly<Record<string, unknown>>;
}

/**
 * Successful generation output.
 */
export interface GenerationResponse {
  /** Generated text. */
  readonly content: string;
  /** Model that produced the text. */
  readonly modelId: string;
  /** Wall time of the call in milliseconds. */
  readonly latencyMs: number;
}

/**
 * Discriminant of generation failures.
 */
export type GenerationErrorKind =
  | 'TimeoutError'
  | 'RateLimitError'
  | 'TransportError'
  | 'InvalidRequestError'
  | 'CancelledError';

interface GenerationErrorBase {
  readonly kind: GenerationErrorKind;
  readonly message: string;
  readonly cause?: Error | undefined;
}

/**
 * The call did not finish within its timeout.
 */
export interface TimeoutError extends GenerationErrorBase {
  readonly kind: 'TimeoutError';
  readonly timeoutMs: number;
  readonly retryable: true;
}

/**
 * The backend refused the call for capacity reasons.
 */
export interface RateLimitError extends GenerationErrorBase {
  readonly kind: 'RateLimitError';
  /** Milliseconds to wait before retrying, when the backend says. */
  readonly retryAfterMs?: number | undefined;
  readonly retryable: true;
}

/**
 * The backend process failed or produced no usable output.
 */
export interface TransportError extends GenerationErrorBase {
  readonly kind: 'TransportError';
  readonly exitCode?: number | undefined;
  readonly retryable: true;
}

/**
 * The request itself cannot succeed (missing context, unknown executable).
 */
export interface InvalidRequestError extends GenerationErrorBase {
  readonly kind: 'InvalidRequestError';
  /** Context fields the prompt needed but did not get. */
  readonly missingFields: readonly string[];
  readonly retryable: false;
}

/**
 * The caller aborted the call.
 */
export interface CancelledError extends GenerationErrorBase {
  readonly kind: 'CancelledError';
  readonly retryable: false;
}

/**
 * Union type of all generation errors.
 */
export type GenerationError =
  | TimeoutError
  | RateLimitError
  | TransportError
  | InvalidRequestError
  | CancelledError;

/**
 * Result type for generation calls.
 */
export type GenerationResult =
  | { readonly success: true; readonly response: GenerationResponse }
  | { readonly success: false; readonly error: GenerationError };

/**
 * Anything that can turn a prompt kind and context into text.
 */
export interface GenerationCapability {
  /**
   * Generates text for a request.
   *
   * @param request - Prompt kind and context.
   * @param signal - Aborts the call; the result is then a CancelledError.
   */
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResult>;
}

export function createTimeoutError(
  message: string,
  timeoutMs: number,
  cause?: Error
): TimeoutError {
  return { kind: 'TimeoutError', message, timeoutMs, retryable: true, cause };
}

export function createRateLimitError(
  message: string,
  options: { retryAfterMs?: number | undefined; cause?: Error | undefined } = {}
): RateLimitError {
  return {
    kind: 'RateLimitError',
    message,
    retryable: true,
    retryAfterMs: options.retryAfterMs,
    cause: options.cause,
  };
}

export function createTransportError(
  message: string,
  options: { exitCode?: number | undefined; cause?: Error | undefined } = {}
): TransportError {
  return {
    kind: 'TransportError',
    message,
    retryable: true,
    exitCode: options.exitCode,
    cause: options.cause,
  };
}

export function createInvalidRequestError(
  message: string,
  missingFields: readonly string[] = []
): InvalidRequestError {
  return { kind: 'InvalidRequestError', message, missingFields, retryable: false };
}

export function createCancelledError(message = 'Generation was cancelled'): CancelledError {
  return { kind: 'CancelledError', message, retryable: false };
}

/**
 * Creates a successful result.
 */
export function createSuccessResult(
  response: GenerationResponse
): Extract<GenerationResult, { success: true }> {
  return { success: true, response };
}

/**
 * Creates a failure result.
 */
export function createFailureResult(
  error: GenerationError
): Extract<GenerationResult, { success: false }> {
  return { success: false, error };
}

/**
 * Whether retrying the same request may succeed.
 *
 * @param error - The error to check.
 * @returns True for timeouts, rate limits and transport failures.
 */
export function isRetryableError(error: GenerationError): boolean {
  return error.retryable;
}
