/**
 * Error taxonomy shared by the conversation engine, the context bundle,
 * the entity store and the pipeline orchestrator.
 *
 * @packageDocumentation
 */

/**
 * Error codes for programmatic handling.
 *
 * - GENERATION_UNAVAILABLE: the generation capability kept failing after retries
 * - SCHEMA_VIOLATION: a payload is missing required fields or is malformed
 * - CONFLICT: a concurrent write advanced the stored version
 * - INVALID_TRANSITION: the entity is not in a state that allows the operation
 * - NOT_FOUND: no entity is stored under the id
 * - INVALID_INPUT: the caller supplied an unusable argument
 */
export type VoicecraftErrorCode =
  | 'GENERATION_UNAVAILABLE'
  | 'SCHEMA_VIOLATION'
  | 'CONFLICT'
  | 'INVALID_TRANSITION'
  | 'NOT_FOUND'
  | 'INVALID_INPUT';

/**
 * Base class for every tagged failure surfaced to callers.
 *
 * `snapshot` carries the last valid state of the failing entity, when the
 * raising component has one, so callers never have to reload to recover.
 */
export class VoicecraftError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: VoicecraftErrorCode;
  /** Id of the session, run or record involved, if any. */
  public readonly entityId: string | undefined;
  /** Last good snapshot of the entity, if available. */
  public readonly snapshot: unknown;
  /** The underlying cause if available. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new VoicecraftError.
   *
   * @param message - Human-readable error message.
   * @param code - The error code.
   * @param options - Entity id, snapshot and cause.
   */
  constructor(
    message: string,
    code: VoicecraftErrorCode,
    options?: { entityId?: string | undefined; snapshot?: unknown; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'VoicecraftError';
    this.code = code;
    this.entityId = options?.entityId;
    this.snapshot = options?.snapshot;
    this.cause = options?.cause;
  }
}

/**
 * The generation capability failed (timeout, rate limit, transport error)
 * more times than the retry budget allows.
 */
export class GenerationUnavailableError extends VoicecraftError {
  /** Number of attempts made before giving up. */
  public readonly attempts: number;

  constructor(
    message: string,
    options: {
      attempts: number;
      entityId?: string | undefined;
      snapshot?: unknown;
      cause?: Error | undefined;
    }
  ) {
    super(message, 'GENERATION_UNAVAILABLE', options);
    this.name = 'GenerationUnavailableError';
    this.attempts = options.attempts;
  }
}

/**
 * A single schema problem found while validating a payload.
 */
export interface SchemaIssue {
  /** JSON pointer of the offending field ('' for the payload root). */
  readonly path: string;
  /** Description of the problem. */
  readonly message: string;
}

/**
 * A stage contribution does not satisfy the declared section schema,
 * or would overwrite a section that is not revisable.
 */
export class SchemaViolationError extends VoicecraftError {
  /** The section being written. */
  public readonly section: string;
  /** Individual schema problems. */
  public readonly issues: readonly SchemaIssue[];

  constructor(
    message: string,
    options: {
      section: string;
      issues?: readonly SchemaIssue[];
      entityId?: string | undefined;
      snapshot?: unknown;
    }
  ) {
    super(message, 'SCHEMA_VIOLATION', options);
    this.name = 'SchemaViolationError';
    this.section = options.section;
    this.issues = options.issues ?? [];
  }
}

/**
 * Optimistic concurrency failure: the stored version moved since it was loaded.
 */
export class ConflictError extends VoicecraftError {
  /** Version the writer expected to replace. */
  public readonly expectedVersion: number;
  /** Version actually stored. */
  public readonly actualVersion: number;

  constructor(id: string, expectedVersion: number, actualVersion: number) {
    super(
      `Write conflict on '${id}': expected version ${String(expectedVersion)}, found ${String(actualVersion)}`,
      'CONFLICT',
      { entityId: id }
    );
    this.name = 'ConflictError';
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

/**
 * The operation is not allowed in the entity's current state.
 */
export class InvalidTransitionError extends VoicecraftError {
  /** State the entity was in. */
  public readonly fromState: string;
  /** Operation that was attempted. */
  public readonly operation: string;

  constructor(
    message: string,
    options: {
      fromState: string;
      operation: string;
      entityId?: string | undefined;
      snapshot?: unknown;
    }
  ) {
    super(message, 'INVALID_TRANSITION', options);
    this.name = 'InvalidTransitionError';
    this.fromState = options.fromState;
    this.operation = options.operation;
  }
}

/**
 * No entity is stored under the requested id.
 */
export class NotFoundError extends VoicecraftError {
  constructor(id: string) {
    super(`No record stored under '${id}'`, 'NOT_FOUND', { entityId: id });
    this.name = 'NotFoundError';
  }
}

/**
 * Checks whether a value is a VoicecraftError with the given code.
 *
 * @param error - The value to check.
 * @param code - The expected code.
 * @returns True if the value carries that code.
 */
export function hasErrorCode(error: unknown, code: VoicecraftErrorCode): error is VoicecraftError {
  return error instanceof VoicecraftError && error.code === code;
}
