/**
 * Structured logging utility.
 *
 * Every component logs through a {@link Logger} that writes one JSON object
 * per line to stderr, keeping stdout free for the conversation itself.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: diagnostic detail, emitted only when debug mode is on
 * - `info`: normal operation (transitions, stage completions)
 * - `warn`: recoverable trouble (retries, discarded results)
 * - `error`: failures surfaced to the caller
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2026-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;
  /** Severity level. */
  readonly level: LogLevel;
  /**
   * Name of the component that produced the entry.
   * @example "ConversationEngine"
   */
  readonly component: string;
  /**
   * Short snake_case event name.
   * @example "session_transition"
   */
  readonly event: string;
  /** JSON-serializable context for the event. */
  readonly data?: Record<string, unknown>;
}

/**
 * Options for creating a Logger.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;
  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
  /**
   * Destination for serialized lines.
   * @defaultValue writes to process.stderr
   */
  readonly sink?: (line: string) => void;
}

function defaultSink(line: string): void {
  process.stderr.write(line);
}

/**
 * Structured logger that outputs JSON lines.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'PipelineOrchestrator', debugMode: true });
 * logger.info('stage_succeeded', { runId: 'run_1', stage: 'Hook' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: (line: string) => void;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? defaultSink;
  }

  /**
   * Creates a logger for another component sharing this logger's settings.
   *
   * @param component - Name of the child component.
   * @returns A new Logger writing to the same sink.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, sink: this.sink });
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data !== undefined
        ? { timestamp: new Date().toISOString(), level, component: this.component, event, data }
        : { timestamp: new Date().toISOString(), level, component: this.component, event };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Circular structures and BigInt values land here.
      line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        component: this.component,
        event,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    this.sink(line + '\n');
  }
}

/**
 * Logger that discards everything. Handy default for library consumers
 * that do not want stderr output.
 */
export const silentLogger = new Logger({
  component: 'silent',
  sink: () => {
    // discard
  },
});
