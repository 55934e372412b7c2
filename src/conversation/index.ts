/**
 * Conversational brainstorming sessions.
 *
 * @packageDocumentation
 */

export type {
  CompletionReason,
  ConversationThresholds,
  Session,
  SessionState,
  Speaker,
  TransitionRecord,
  Turn,
} from './types.js';
export { SESSION_STATES } from './types.js';

export {
  FOCUS_AREAS,
  addCoverage,
  detectFocusAreas,
  isFocusArea,
  uncoveredFocusAreas,
  type FocusArea,
} from './focus-areas.js';

export { STOP_COMMANDS, STOP_PHRASES, isStopSignal } from './stop-signals.js';

export {
  EXPLICIT_STOP_TEXT,
  SESSION_TRANSITIONS,
  acceptsReplies,
  applyQuestion,
  applyReply,
  canTransition,
  cancel,
  countUserTurns,
  createSession,
  creditFocusAreas,
  evaluateCompletion,
  firstStep,
  formatTranscript,
  isTerminalState,
  lastQuestion,
  transition,
  type NextStep,
  type ReplyOptions,
} from './machine.js';

export {
  ConversationEngine,
  DEFAULT_MAX_CONFLICT_RETRIES,
  type ConversationEngineOptions,
} from './engine.js';
