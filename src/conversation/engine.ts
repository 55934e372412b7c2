/**
 * Conversation engine.
 *
 * Drives brainstorming sessions through the state machine in `machine.ts`,
 * persisting every change through an {@link EntityStore} with optimistic
 * concurrency. Operations on one session run one at a time; cancellation
 * bypasses the queue and aborts the generation call in flight.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import type { Config } from '../config/types.js';
import {
  ConflictError,
  GenerationUnavailableError,
  InvalidTransitionError,
  VoicecraftError,
} from '../errors.js';
import { withRetry } from '../generation/retry.js';
import type { GenerationCapability, GenerationRequest } from '../generation/types.js';
import type { ResponseMonitor } from '../monitoring/response-monitor.js';
import type { EntityStore } from '../store/types.js';
import { NEW_RECORD_VERSION } from '../store/types.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { uncoveredFocusAreas } from './focus-areas.js';
import {
  EXPLICIT_STOP_TEXT,
  applyQuestion,
  applyReply,
  cancel,
  createSession,
  firstStep,
  formatTranscript,
  isTerminalState,
  type NextStep,
} from './machine.js';
import type { ConversationThresholds, Session } from './types.js';

/** Conflict retries before a mutation gives up. */
export const DEFAULT_MAX_CONFLICT_RETRIES = 3;

/**
 * Options for creating a ConversationEngine.
 */
export interface ConversationEngineOptions {
  readonly store: EntityStore<Session>;
  readonly generation: GenerationCapability;
  readonly config: Pick<Config, 'conversation' | 'style' | 'generation'>;
  readonly logger?: Logger | undefined;
  readonly monitor?: ResponseMonitor | undefined;
  /** Session id factory. */
  readonly generateId?: (() => string) | undefined;
  readonly now?: (() => Date) | undefined;
  /** Backoff sleep between generation retries. */
  readonly sleep?: ((ms: number) => Promise<void>) | undefined;
  readonly random?: (() => number) | undefined;
  readonly maxConflictRetries?: number | undefined;
}

/**
 * Runs brainstorming sessions.
 *
 * @example
 * ```typescript
 * const engine = new ConversationEngine({ store, generation, config });
 * let session = await engine.startSession('AI and creativity');
 * session = await engine.submitUserTurn(session.id, 'Mostly founders who feel stuck.');
 * ```
 */
export class ConversationEngine {
  private readonly store: EntityStore<Session>;
  private readonly generation: GenerationCapability;
  private readonly config: Pick<Config, 'conversation' | 'style' | 'generation'>;
  private readonly logger: Logger;
  private readonly monitor: ResponseMonitor | undefined;
  private readonly generateId: () => string;
  private readonly now: () => Date;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private readonly random: (() => number) | undefined;
  private readonly maxConflictRetries: number;
  private readonly mutex = new KeyedMutex();
  private readonly inFlight = new Map<string, AbortController>();

  constructor(options: ConversationEngineOptions) {
    this.store = options.store;
    this.generation = options.generation;
    this.config = options.config;
    this.logger = (options.logger ?? silentLogger).child('ConversationEngine');
    this.monitor = options.monitor;
    this.generateId = options.generateId ?? (() => `session_${randomUUID()}`);
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep;
    this.random = options.random;
    this.maxConflictRetries = options.maxConflictRetries ?? DEFAULT_MAX_CONFLICT_RETRIES;
  }

  private get thresholds(): ConversationThresholds {
    const conversation = this.config.conversation;
    return {
      minUserTurns: conversation.min_user_turns,
      minFocusCoverage: conversation.min_focus_coverage,
      maxUserTurns: conversation.max_user_turns,
      substantiveReplyWords: conversation.substantive_reply_words,
    };
  }

  /**
   * Creates a session and asks the first question.
   *
   * When the first question cannot be generated the session stays stored in
   * Initiated and the thrown error carries its id; {@link resumeSession}
   * retries.
   *
   * @param initialIdea - The user's rough idea.
   * @returns The session in Questioning, its last turn being the question.
   * @throws VoicecraftError INVALID_INPUT for an empty idea.
   * @throws GenerationUnavailableError when generation keeps failing.
   */
  async startSession(initialIdea: string): Promise<Session> {
    const idea = initialIdea.trim();
    if (idea === '') {
      throw new VoicecraftError('Initial idea must not be empty', 'INVALID_INPUT');
    }

    const session = createSession(this.generateId(), idea, this.now());
    await this.store.save(session.id, session, NEW_RECORD_VERSION);
    this.logger.info('session_created', { sessionId: session.id });

    return this.askFirstQuestion(session.id, 'startSession');
  }

  /**
   * Asks the first question of a session left in Initiated.
   *
   * @throws InvalidTransitionError if the session is past Initiated.
   */
  async resumeSession(sessionId: string): Promise<Session> {
    return this.askFirstQuestion(sessionId, 'resumeSession');
  }

  /**
   * Records a user reply and asks the next question, or completes the session.
   *
   * @throws VoicecraftError INVALID_INPUT for empty text.
   * @throws InvalidTransitionError if the session does not take replies.
   * @throws GenerationUnavailableError when the next question cannot be
   *   generated; the stored session is left as it was.
   */
  async submitUserTurn(sessionId: string, text: string): Promise<Session> {
    if (text.trim() === '') {
      throw new VoicecraftError('Reply must not be empty', 'INVALID_INPUT', { entityId: sessionId });
    }
    return this.mutate(sessionId, 'submitUserTurn', (current, signal) =>
      this.reply(current, text, false, signal)
    );
  }

  /**
   * Records an explicit stop and completes the session.
   *
   * @throws InvalidTransitionError if the session does not take replies.
   */
  async requestExplicitStop(sessionId: string): Promise<Session> {
    return this.mutate(sessionId, 'requestExplicitStop', (current, signal) =>
      this.reply(current, EXPLICIT_STOP_TEXT, true, signal)
    );
  }

  /**
   * Cancels a session without waiting for the operation in flight, whose
   * result is then discarded.
   *
   * @throws InvalidTransitionError if the session already completed or was cancelled.
   */
  async cancelSession(sessionId: string): Promise<Session> {
    for (let attempt = 0; ; attempt++) {
      const { value, version } = await this.store.load(sessionId);
      const cancelled = cancel(value, this.now());
      try {
        await this.store.save(sessionId, cancelled, version);
      } catch (error) {
        if (error instanceof ConflictError && attempt < this.maxConflictRetries) {
          this.logger.debug('cancel_conflict_retry', { sessionId, attempt: attempt + 1 });
          continue;
        }
        throw error;
      }
      this.inFlight.get(sessionId)?.abort();
      this.logger.info('session_transition', { sessionId, from: value.state, to: 'Cancelled' });
      return cancelled;
    }
  }

  /**
   * Loads a session.
   *
   * @throws NotFoundError if no session is stored under the id.
   */
  async getSession(sessionId: string): Promise<Session> {
    const { value } = await this.store.load(sessionId);
    return value;
  }

  private async askFirstQuestion(sessionId: string, operation: string): Promise<Session> {
    return this.mutate(sessionId, operation, async (current, signal) => {
      if (current.state !== 'Initiated') {
        throw new InvalidTransitionError(
          `Cannot ${operation}: session '${sessionId}' is ${current.state}`,
          { fromState: current.state, operation, entityId: sessionId, snapshot: current }
        );
      }
      const step = firstStep();
      const question = await this.generateQuestion(current, current, step, signal);
      return applyQuestion(current, question, step, this.now());
    });
  }

  private async reply(
    current: Session,
    text: string,
    forceStop: boolean,
    signal: AbortSignal
  ): Promise<Session> {
    const { session, next } = applyReply(current, text, {
      thresholds: this.thresholds,
      style: { emaCap: this.config.style.ema_cap, phraseTopK: this.config.style.phrase_top_k },
      now: this.now(),
      forceStop,
    });
    if (next.kind === 'complete') {
      return session;
    }
    const question = await this.generateQuestion(current, session, next, signal);
    return applyQuestion(session, question, next, this.now());
  }

  /**
   * Generates the next question with retries.
   *
   * @param stored - The session as stored, reported on failure.
   * @param session - The session the question follows.
   */
  private async generateQuestion(
    stored: Session,
    session: Session,
    step: NextStep,
    signal: AbortSignal
  ): Promise<string> {
    const request: GenerationRequest =
      step.kind === 'ask' && step.promptKind === 'question'
        ? {
            promptKind: 'question',
            context: {
              initialIdea: session.initialIdea,
              transcript: formatTranscript(session.turns),
              uncoveredAreas: uncoveredFocusAreas(session.coveredFocusAreas),
              targetArea: step.targetFocusArea,
            },
          }
        : {
            promptKind: 'wrapUp',
            context: {
              initialIdea: session.initialIdea,
              transcript: formatTranscript(session.turns),
            },
          };

    let attempts = 0;
    const generation = this.config.generation;
    const result = await withRetry(
      () => {
        attempts += 1;
        return this.generation.generate(request, signal);
      },
      {
        config: {
          maxRetries: generation.max_retries,
          baseDelayMs: generation.retry_base_delay_ms,
          maxDelayMs: Math.max(generation.retry_max_delay_ms, generation.retry_base_delay_ms),
        },
        signal,
        ...(this.sleep !== undefined ? { sleep: this.sleep } : {}),
        ...(this.random !== undefined ? { random: this.random } : {}),
        onRetry: (info) => {
          this.logger.warn('generation_retry', {
            sessionId: session.id,
            attempt: info.attempt,
            totalAttempts: info.totalAttempts,
            delayMs: info.delayMs,
            error: info.previousError.message,
          });
        },
      }
    );

    if (result.success) {
      return result.response.content.trim();
    }
    if (signal.aborted) {
      throw new InvalidTransitionError(`Session '${session.id}' was cancelled`, {
        fromState: 'Cancelled',
        operation: 'generateQuestion',
        entityId: session.id,
      });
    }

    this.monitor?.recordFailure(session.id);
    this.logger.error('generation_unavailable', {
      sessionId: session.id,
      attempts,
      error: result.error.message,
    });
    throw new GenerationUnavailableError(
      `Could not generate the next question: ${result.error.message}`,
      { attempts, entityId: session.id, snapshot: stored, cause: result.error.cause }
    );
  }

  /**
   * Runs a read-modify-write on one session under its lock.
   *
   * A conflicting save reloads and redoes the step, unless the session was
   * cancelled meanwhile, in which case the result is discarded.
   */
  private async mutate(
    sessionId: string,
    operation: string,
    step: (current: Session, signal: AbortSignal) => Promise<Session>
  ): Promise<Session> {
    return this.mutex.runExclusive(sessionId, async () => {
      for (let attempt = 0; ; attempt++) {
        const { value: current, version } = await this.store.load(sessionId);
        if (isTerminalState(current.state)) {
          throw new InvalidTransitionError(
            `Cannot ${operation}: session '${sessionId}' is ${current.state}`,
            { fromState: current.state, operation, entityId: sessionId, snapshot: current }
          );
        }

        const controller = new AbortController();
        this.inFlight.set(sessionId, controller);
        let next: Session;
        try {
          next = await step(current, controller.signal);
        } finally {
          this.inFlight.delete(sessionId);
        }

        try {
          await this.store.save(sessionId, next, version);
        } catch (error) {
          if (!(error instanceof ConflictError) || attempt >= this.maxConflictRetries) {
            throw error;
          }
          const { value: latest } = await this.store.load(sessionId);
          if (latest.state === 'Cancelled') {
            this.logger.warn('result_discarded', { sessionId, operation });
            throw new InvalidTransitionError(`Session '${sessionId}' was cancelled`, {
              fromState: latest.state,
              operation,
              entityId: sessionId,
              snapshot: latest,
            });
          }
          this.logger.debug('save_conflict_retry', { sessionId, operation, attempt: attempt + 1 });
          continue;
        }

        this.logTransitions(current, next);
        this.recordTimings(current, next);
        return next;
      }
    });
  }

  private recordTimings(before: Session, after: Session): void {
    if (this.monitor === undefined) {
      return;
    }
    const added = after.turns.slice(before.turns.length);
    if (added.some((turn) => turn.speaker === 'user')) {
      this.monitor.recordResponse(after.id);
    }
    if (added.some((turn) => turn.speaker === 'assistant')) {
      this.monitor.startQuestion(after.id);
    }
  }

  private logTransitions(before: Session, after: Session): void {
    for (const record of after.transitions.slice(before.transitions.length)) {
      this.logger.info('session_transition', {
        sessionId: after.id,
        sequence: record.sequence,
        from: record.from,
        to: record.to,
        turnIndex: record.turnIndex,
        reason: record.reason,
      });
    }
  }
}
