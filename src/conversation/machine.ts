/**
 * Pure session state machine.
 *
 * Every function here returns a new {@link Session}; the engine decides when
 * the result is persisted.
 *
 * @packageDocumentation
 */

import { InvalidTransitionError } from '../errors.js';
import { createEmptyProfile, extract, merge } from '../style/extractor.js';
import type { MergeOptions } from '../style/types.js';
import type { FocusArea } from './focus-areas.js';
import { FOCUS_AREAS, addCoverage, detectFocusAreas, uncoveredFocusAreas } from './focus-areas.js';
import { isStopSignal } from './stop-signals.js';
import type {
  CompletionReason,
  ConversationThresholds,
  Session,
  SessionState,
  Turn,
} from './types.js';

/**
 * Allowed target states per source state. Self-transitions record a reply
 * that did not change the state.
 */
export const SESSION_TRANSITIONS: ReadonlyMap<SessionState, readonly SessionState[]> = new Map<
  SessionState,
  readonly SessionState[]
>([
  ['Initiated', ['Questioning', 'Cancelled']],
  ['Questioning', ['Questioning', 'AwaitingExplicitStop', 'Completed', 'Cancelled']],
  ['AwaitingExplicitStop', ['AwaitingExplicitStop', 'Completed', 'Cancelled']],
  ['Completed', []],
  ['Cancelled', []],
]);

/** Text recorded for a stop requested outside of a reply. */
export const EXPLICIT_STOP_TEXT = '/done';

export function canTransition(from: SessionState, to: SessionState): boolean {
  return SESSION_TRANSITIONS.get(from)?.includes(to) ?? false;
}

export function isTerminalState(state: SessionState): boolean {
  return state === 'Completed' || state === 'Cancelled';
}

/**
 * Whether the session takes user replies in this state.
 */
export function acceptsReplies(state: SessionState): boolean {
  return state === 'Questioning' || state === 'AwaitingExplicitStop';
}

export function countUserTurns(session: Session): number {
  return session.turns.filter((turn) => turn.speaker === 'user').length;
}

/**
 * The most recent assistant turn, if any.
 */
export function lastQuestion(session: Session): Turn | undefined {
  for (let i = session.turns.length - 1; i >= 0; i--) {
    const turn = session.turns[i];
    if (turn?.speaker === 'assistant') {
      return turn;
    }
  }
  return undefined;
}

/**
 * Creates a session in Initiated.
 */
export function createSession(id: string, initialIdea: string, now: Date): Session {
  const at = now.toISOString();
  return {
    id,
    initialIdea,
    state: 'Initiated',
    turns: [],
    coveredFocusAreas: [],
    styleProfile: createEmptyProfile(),
    transitions: [],
    createdAt: at,
    updatedAt: at,
  };
}

/**
 * Moves a session to another state and logs the transition.
 *
 * @throws InvalidTransitionError if the move is not allowed.
 */
export function transition(
  session: Session,
  to: SessionState,
  details: { turnIndex: number; reason: string; operation: string; now: Date }
): Session {
  if (!canTransition(session.state, to)) {
    throw new InvalidTransitionError(
      `Cannot ${details.operation}: session '${session.id}' is ${session.state}`,
      { fromState: session.state, operation: details.operation, entityId: session.id, snapshot: session }
    );
  }
  const at = details.now.toISOString();
  return {
    ...session,
    state: to,
    transitions: [
      ...session.transitions,
      {
        sequence: session.transitions.length,
        from: session.state,
        to,
        turnIndex: details.turnIndex,
        reason: details.reason,
        at,
      },
    ],
    updatedAt: at,
  };
}

/**
 * Completion check after a reply. An explicit stop wins over coverage, and
 * coverage over the turn limit.
 */
export function evaluateCompletion(
  facts: { userTurns: number; coveredCount: number; stopRequested: boolean },
  thresholds: ConversationThresholds
): CompletionReason | undefined {
  if (facts.stopRequested) {
    return 'explicitStop';
  }
  if (facts.userTurns >= thresholds.minUserTurns && facts.coveredCount >= thresholds.minFocusCoverage) {
    return 'coverage';
  }
  if (facts.userTurns >= thresholds.maxUserTurns) {
    return 'turnLimit';
  }
  return undefined;
}

function wordCount(text: string): number {
  return text.match(/[\p{L}\p{N}]+/gu)?.length ?? 0;
}

/**
 * Areas a reply is credited with: the keyword matches, or the area the last
 * question targeted when a substantive reply matches nothing.
 */
export function creditFocusAreas(
  text: string,
  targetFocusArea: FocusArea | undefined,
  substantiveReplyWords: number
): FocusArea[] {
  const detected = detectFocusAreas(text);
  if (detected.length > 0) {
    return detected;
  }
  if (targetFocusArea !== undefined && wordCount(text) >= substantiveReplyWords) {
    return [targetFocusArea];
  }
  return [];
}

/**
 * What the engine has to do after a reply was applied.
 */
export type NextStep =
  | { readonly kind: 'complete'; readonly reason: CompletionReason }
  | { readonly kind: 'ask'; readonly promptKind: 'question'; readonly targetFocusArea: FocusArea }
  | { readonly kind: 'ask'; readonly promptKind: 'wrapUp' };

export interface ReplyOptions {
  readonly thresholds: ConversationThresholds;
  readonly style: MergeOptions;
  readonly now: Date;
  /** Records the turn as a stop regardless of its text. */
  readonly forceStop?: boolean;
}

/**
 * Applies one user reply: appends the turn, updates the style profile and
 * coverage, and either completes the session or moves it to the state that
 * decides the next question.
 *
 * @throws InvalidTransitionError when the session does not take replies.
 */
export function applyReply(
  session: Session,
  text: string,
  options: ReplyOptions
): { session: Session; next: NextStep } {
  const operation = options.forceStop === true ? 'requestExplicitStop' : 'submitUserTurn';
  if (!acceptsReplies(session.state)) {
    throw new InvalidTransitionError(
      `Cannot ${operation}: session '${session.id}' is ${session.state}`,
      { fromState: session.state, operation, entityId: session.id, snapshot: session }
    );
  }

  const stopSignal = options.forceStop === true || isStopSignal(text);
  const covered = stopSignal
    ? []
    : creditFocusAreas(text, lastQuestion(session)?.targetFocusArea, options.thresholds.substantiveReplyWords);
  const signal = extract(text);
  const turnIndex = session.turns.length;

  const turn: Turn = {
    index: turnIndex,
    speaker: 'user',
    text,
    timestamp: options.now.toISOString(),
    coveredFocusAreas: covered,
    ...(stopSignal ? { stopSignal: true } : {}),
  };

  const updated: Session = {
    ...session,
    turns: [...session.turns, turn],
    coveredFocusAreas: addCoverage(session.coveredFocusAreas, covered),
    styleProfile: merge(session.styleProfile, signal, session.styleProfile.samples + 1, options.style),
    updatedAt: options.now.toISOString(),
  };

  const reason = evaluateCompletion(
    {
      userTurns: countUserTurns(updated),
      coveredCount: updated.coveredFocusAreas.length,
      stopRequested: stopSignal,
    },
    options.thresholds
  );

  if (reason !== undefined) {
    const completed = transition(updated, 'Completed', {
      turnIndex,
      reason,
      operation,
      now: options.now,
    });
    return { session: { ...completed, completionReason: reason }, next: { kind: 'complete', reason } };
  }

  const uncovered = uncoveredFocusAreas(updated.coveredFocusAreas);
  const target = uncovered[0];
  if (target === undefined) {
    return {
      session: transition(updated, 'AwaitingExplicitStop', {
        turnIndex,
        reason: 'all focus areas covered',
        operation,
        now: options.now,
      }),
      next: { kind: 'ask', promptKind: 'wrapUp' },
    };
  }

  return {
    session: transition(updated, 'Questioning', {
      turnIndex,
      reason: `${String(uncovered.length)} focus areas open`,
      operation,
      now: options.now,
    }),
    next: { kind: 'ask', promptKind: 'question', targetFocusArea: target },
  };
}

/**
 * The first question of a session in Initiated targets the top-priority area.
 */
export function firstStep(): NextStep {
  return { kind: 'ask', promptKind: 'question', targetFocusArea: FOCUS_AREAS[0] ?? 'HookPreference' };
}

/**
 * Appends a generated question. A session in Initiated moves to Questioning.
 */
export function applyQuestion(session: Session, text: string, step: NextStep, now: Date): Session {
  const turn: Turn = {
    index: session.turns.length,
    speaker: 'assistant',
    text,
    timestamp: now.toISOString(),
    ...(step.kind === 'ask' && step.promptKind === 'question'
      ? { targetFocusArea: step.targetFocusArea }
      : { wrapUp: true }),
  };
  const withTurn: Session = { ...session, turns: [...session.turns, turn], updatedAt: now.toISOString() };

  if (session.state === 'Initiated') {
    return transition(withTurn, 'Questioning', {
      turnIndex: turn.index,
      reason: 'first question asked',
      operation: 'startSession',
      now,
    });
  }
  return withTurn;
}

/**
 * Cancels a non-terminal session.
 *
 * @throws InvalidTransitionError for Completed or Cancelled sessions.
 */
export function cancel(session: Session, now: Date): Session {
  return transition(session, 'Cancelled', {
    turnIndex: session.turns.length - 1,
    reason: 'cancelled on request',
    operation: 'cancelSession',
    now,
  });
}

/**
 * Renders turns as "Assistant: ..." / "User: ..." lines.
 */
export function formatTranscript(turns: readonly Turn[]): string {
  return turns
    .map((turn) => `${turn.speaker === 'assistant' ? 'Assistant' : 'User'}: ${turn.text}`)
    .join('\n');
}
