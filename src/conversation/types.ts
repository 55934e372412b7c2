/**
 * Conversational session types.
 *
 * @packageDocumentation
 */

import type { StyleProfile } from '../style/types.js';
import type { FocusArea } from './focus-areas.js';

/**
 * Lifecycle states of a brainstorming session.
 *
 * @remarks
 * - Initiated: created, first question not produced yet
 * - Questioning: probing the uncovered focus areas
 * - AwaitingExplicitStop: every area is covered but the turn minimum is not
 *   met; wrap-up questions are asked until the minimum or a stop
 * - Completed: enough material gathered (terminal)
 * - Cancelled: abandoned on request (terminal)
 */
export type SessionState =
  | 'Initiated'
  | 'Questioning'
  | 'AwaitingExplicitStop'
  | 'Completed'
  | 'Cancelled';

export const SESSION_STATES: readonly SessionState[] = [
  'Initiated',
  'Questioning',
  'AwaitingExplicitStop',
  'Completed',
  'Cancelled',
] as const;

/**
 * Why a session completed.
 *
 * - coverage: enough user turns and enough focus areas covered
 * - explicitStop: the user asked to move on
 * - turnLimit: the maximum number of user turns was reached
 */
export type CompletionReason = 'coverage' | 'explicitStop' | 'turnLimit';

export type Speaker = 'assistant' | 'user';

/**
 * One message of the dialogue.
 */
export interface Turn {
  /** 0-based position in the transcript. */
  readonly index: number;
  readonly speaker: Speaker;
  readonly text: string;
  /** ISO 8601. */
  readonly timestamp: string;
  /** Areas this user turn was credited with. */
  readonly coveredFocusAreas?: readonly FocusArea[];
  /** Area an assistant question was aimed at. */
  readonly targetFocusArea?: FocusArea;
  /** Whether this assistant turn is a wrap-up question. */
  readonly wrapUp?: boolean;
  /** Whether this user turn asked to stop. */
  readonly stopSignal?: boolean;
}

/**
 * A logged state change.
 */
export interface TransitionRecord {
  /** Strictly increasing from 0 within a session. */
  readonly sequence: number;
  readonly from: SessionState;
  readonly to: SessionState;
  /** Index of the turn that caused the change, or -1 when none did. */
  readonly turnIndex: number;
  readonly reason: string;
  /** ISO 8601. */
  readonly at: string;
}

/**
 * A brainstorming session.
 */
export interface Session {
  readonly id: string;
  readonly initialIdea: string;
  readonly state: SessionState;
  /** Append-only. */
  readonly turns: readonly Turn[];
  /** Grows monotonically, kept in priority order. */
  readonly coveredFocusAreas: readonly FocusArea[];
  readonly styleProfile: StyleProfile;
  /** Append-only. */
  readonly transitions: readonly TransitionRecord[];
  readonly completionReason?: CompletionReason;
  /** ISO 8601. */
  readonly createdAt: string;
  /** ISO 8601. */
  readonly updatedAt: string;
}

/**
 * Thresholds that decide completion.
 */
export interface ConversationThresholds {
  readonly minUserTurns: number;
  readonly minFocusCoverage: number;
  readonly maxUserTurns: number;
  readonly substantiveReplyWords: number;
}
