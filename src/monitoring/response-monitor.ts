/**
 * Response-time tracking for the brainstorming dialogue.
 *
 * @packageDocumentation
 */

import { Logger, silentLogger } from '../utils/logger.js';

/** Global statistics cover this many most recent responses. */
export const GLOBAL_WINDOW_SIZE = 100;

/**
 * Statistics for one session.
 */
export interface SessionResponseStats {
  /** Questions answered. */
  readonly responses: number;
  /** Questions that never got an answer because generation or delivery failed. */
  readonly failures: number;
  readonly averageResponseMs: number;
  readonly minResponseMs: number;
  readonly maxResponseMs: number;
  /** failures / (responses + failures), 0 when nothing was recorded. */
  readonly failureRate: number;
}

/**
 * Statistics across all sessions.
 */
export interface GlobalResponseStats {
  readonly totalQuestions: number;
  readonly totalResponses: number;
  readonly totalFailures: number;
  /** Average over the last {@link GLOBAL_WINDOW_SIZE} responses. */
  readonly averageResponseMs: number;
  /** totalResponses / totalQuestions, 0 before the first question. */
  readonly responseRate: number;
}

export interface ResponseMonitorOptions {
  /** Response time the dialogue aims for. */
  readonly targetResponseMs: number;
  readonly logger?: Logger | undefined;
  /** Milliseconds since the epoch. */
  readonly now?: (() => number) | undefined;
}

interface SessionRecord {
  pendingSince: number | undefined;
  readonly responseTimes: number[];
  failures: number;
}

/**
 * Records when each question was asked and when its reply arrived.
 *
 * @example
 * ```typescript
 * const monitor = new ResponseMonitor({ targetResponseMs: 2000 });
 * monitor.startQuestion('s1');
 * // ... user replies
 * monitor.recordResponse('s1');
 * monitor.getOptimizationSuggestions();
 * ```
 */
export class ResponseMonitor {
  private readonly targetResponseMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly recent: number[] = [];
  private totalQuestions = 0;
  private totalResponses = 0;
  private totalFailures = 0;

  constructor(options: ResponseMonitorOptions) {
    this.targetResponseMs = options.targetResponseMs;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  private record(sessionId: string): SessionRecord {
    let record = this.sessions.get(sessionId);
    if (record === undefined) {
      record = { pendingSince: undefined, responseTimes: [], failures: 0 };
      this.sessions.set(sessionId, record);
    }
    return record;
  }

  /**
   * Marks a question as delivered to the user.
   */
  startQuestion(sessionId: string): void {
    this.record(sessionId).pendingSince = this.now();
    this.totalQuestions += 1;
  }

  /**
   * Marks the pending question of a session as answered.
   *
   * @returns The response time in milliseconds, or 0 when no question was pending.
   */
  recordResponse(sessionId: string): number {
    const record = this.sessions.get(sessionId);
    if (record?.pendingSince === undefined) {
      this.logger.warn('response_without_question', { sessionId });
      return 0;
    }

    const elapsed = this.now() - record.pendingSince;
    record.pendingSince = undefined;
    record.responseTimes.push(elapsed);
    this.totalResponses += 1;
    this.recent.push(elapsed);
    if (this.recent.length > GLOBAL_WINDOW_SIZE) {
      this.recent.shift();
    }

    if (elapsed > this.targetResponseMs) {
      this.logger.warn('slow_response', { sessionId, elapsedMs: elapsed, targetMs: this.targetResponseMs });
    } else {
      this.logger.debug('response_recorded', { sessionId, elapsedMs: elapsed });
    }
    return elapsed;
  }

  /**
   * Records a question that could not be asked or answered.
   */
  recordFailure(sessionId: string): void {
    const record = this.record(sessionId);
    record.failures += 1;
    record.pendingSince = undefined;
    this.totalFailures += 1;
    this.logger.warn('question_failed', { sessionId });
  }

  /**
   * Statistics for one session, or undefined when it was never seen.
   */
  getSessionStats(sessionId: string): SessionResponseStats | undefined {
    const record = this.sessions.get(sessionId);
    if (record === undefined) {
      return undefined;
    }
    const times = record.responseTimes;
    const attempts = times.length + record.failures;
    return {
      responses: times.length,
      failures: record.failures,
      averageResponseMs: average(times),
      minResponseMs: times.length > 0 ? Math.min(...times) : 0,
      maxResponseMs: times.length > 0 ? Math.max(...times) : 0,
      failureRate: attempts > 0 ? record.failures / attempts : 0,
    };
  }

  getGlobalStats(): GlobalResponseStats {
    return {
      totalQuestions: this.totalQuestions,
      totalResponses: this.totalResponses,
      totalFailures: this.totalFailures,
      averageResponseMs: average(this.recent),
      responseRate: this.totalQuestions > 0 ? this.totalResponses / this.totalQuestions : 0,
    };
  }

  /**
   * Suggestions for tuning the dialogue, based on the global statistics.
   */
  getOptimizationSuggestions(): string[] {
    const stats = this.getGlobalStats();
    const suggestions: string[] = [];

    if (stats.averageResponseMs > this.targetResponseMs * 2) {
      suggestions.push(
        `Average response time (${(stats.averageResponseMs / 1000).toFixed(1)}s) is more than twice the target; ask shorter questions.`
      );
    }
    if (stats.totalFailures > stats.totalResponses * 0.2) {
      suggestions.push('Many questions failed; check the generation backend and its timeout.');
    }
    if (stats.responseRate < 0.8) {
      suggestions.push('Fewer than 80% of questions were answered; make questions easier to reply to.');
    }
    if (suggestions.length === 0) {
      suggestions.push('Response times are within target.');
    }
    return suggestions;
  }

  /**
   * Plain-text report of the global statistics and suggestions.
   */
  formatReport(): string {
    const stats = this.getGlobalStats();
    return [
      'Conversation performance',
      `  Questions: ${String(stats.totalQuestions)}`,
      `  Responses: ${String(stats.totalResponses)}`,
      `  Failures: ${String(stats.totalFailures)}`,
      `  Average response time: ${(stats.averageResponseMs / 1000).toFixed(2)}s`,
      `  Response rate: ${(stats.responseRate * 100).toFixed(1)}%`,
      'Suggestions:',
      ...this.getOptimizationSuggestions().map((line) => `  ${line}`),
    ].join('\n');
  }
}

function average(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;
}
