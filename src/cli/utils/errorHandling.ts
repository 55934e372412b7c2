/**
 * Shared error handling for CLI commands.
 */

import type { VoicecraftErrorCode } from '../../errors.js';
import { VoicecraftError } from '../../errors.js';
import type { CliCommandResult } from '../types.js';

const EXIT_CODES: Readonly<Record<VoicecraftErrorCode, number>> = {
  INVALID_INPUT: 2,
  GENERATION_UNAVAILABLE: 3,
  SCHEMA_VIOLATION: 4,
  CONFLICT: 5,
  INVALID_TRANSITION: 6,
  NOT_FOUND: 7,
};

/**
 * Exit code for an error raised by a command.
 *
 * @returns The code mapped to a {@link VoicecraftError}, 1 for anything else.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof VoicecraftError ? EXIT_CODES[error.code] : 1;
}

/**
 * One-line description of an error for stderr.
 */
export function describeError(error: unknown): string {
  if (error instanceof VoicecraftError) {
    const subject = error.entityId !== undefined ? ` (${error.entityId})` : '';
    return `Error [${error.code}]${subject}: ${error.message}`;
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Runs a command handler and exits the process with its result.
 *
 * Errors are printed to stderr and exit with {@link exitCodeFor}.
 *
 * @param fn - The function to wrap (sync or async).
 */
export function withErrorHandling(fn: () => CliCommandResult | Promise<CliCommandResult>): void {
  void (async () => {
    try {
      const result = await fn();
      process.exit(result.exitCode);
    } catch (error) {
      console.error(describeError(error));
      process.exit(exitCodeFor(error));
    }
  })();
}
