/**
 * CLI types.
 */

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /** Exit code (0 for success, non-zero for error). */
  exitCode: number;
}

/**
 * Line-based console I/O used by interactive commands.
 * Abstracted for testability.
 */
export interface Prompter {
  /**
   * Reads one line of input.
   *
   * @returns The line, or undefined once input has ended.
   */
  readLine(prompt: string): Promise<string | undefined>;
  /** Writes one block of text to stdout. */
  print(text: string): void;
  close(): void;
}
