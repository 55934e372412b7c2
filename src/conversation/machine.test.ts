/**
 * Tests for the session state machine.
 */

import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { InvalidTransitionError } from '../errors.js';
import {
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
  type ReplyOptions,
} from './machine.js';
import type { ConversationThresholds, Session } from './types.js';

const NOW = new Date('2026-03-01T09:00:00.000Z');

const DEFAULT_THRESHOLDS: ConversationThresholds = {
  minUserTurns: 4,
  minFocusCoverage: 4,
  maxUserTurns: 12,
  substantiveReplyWords: 4,
};

function options(thresholds: Partial<ConversationThresholds> = {}): ReplyOptions {
  return {
    thresholds: { ...DEFAULT_THRESHOLDS, ...thresholds },
    style: { emaCap: 5, phraseTopK: 8 },
    now: NOW,
  };
}

function startedSession(): Session {
  return applyQuestion(createSession('s1', 'AI and creativity', NOW), 'How do you want to open?', firstStep(), NOW);
}

/**
 * Applies replies, asking a placeholder question whenever the machine wants one.
 */
function converse(replies: readonly string[], replyOptions: ReplyOptions): Session {
  let session = startedSession();
  for (const text of replies) {
    if (!acceptsReplies(session.state)) {
      break;
    }
    const { session: next, next: step } = applyReply(session, text, replyOptions);
    session = step.kind === 'complete' ? next : applyQuestion(next, 'Next question?', step, NOW);
  }
  return session;
}

const AI_AND_CREATIVITY_REPLIES = [
  'Open with a bold statement that machines can draw now.',
  'Mostly students who worry about their careers.',
  'My contrarian view is that AI amplifies taste.',
  'The takeaway is to keep practicing your craft.',
];

describe('transition table', () => {
  it('should allow only the listed moves', () => {
    expect(canTransition('Initiated', 'Questioning')).toBe(true);
    expect(canTransition('Initiated', 'Completed')).toBe(false);
    expect(canTransition('Completed', 'Cancelled')).toBe(false);
    expect(canTransition('AwaitingExplicitStop', 'Questioning')).toBe(false);
  });
});

describe('evaluateCompletion', () => {
  it('should let an explicit stop win over coverage', () => {
    expect(
      evaluateCompletion({ userTurns: 5, coveredCount: 7, stopRequested: true }, DEFAULT_THRESHOLDS)
    ).toBe('explicitStop');
  });

  it('should need both the turn minimum and the coverage minimum', () => {
    expect(
      evaluateCompletion({ userTurns: 3, coveredCount: 7, stopRequested: false }, DEFAULT_THRESHOLDS)
    ).toBeUndefined();
    expect(
      evaluateCompletion({ userTurns: 4, coveredCount: 4, stopRequested: false }, DEFAULT_THRESHOLDS)
    ).toBe('coverage');
  });

  it('should complete at the turn limit whatever the coverage', () => {
    expect(
      evaluateCompletion({ userTurns: 12, coveredCount: 0, stopRequested: false }, DEFAULT_THRESHOLDS)
    ).toBe('turnLimit');
  });
});

describe('creditFocusAreas', () => {
  it('should credit keyword matches in priority order', () => {
    expect(creditFocusAreas('A story with hard data about the audience', undefined, 4)).toEqual([
      'AudienceAndPainPoints',
      'PersonalStory',
      'SupportingData',
    ]);
  });

  it('should credit the targeted area for a substantive reply without keywords', () => {
    expect(creditFocusAreas('Something surprising about machines making art', 'HookPreference', 4)).toEqual([
      'HookPreference',
    ]);
  });

  it('should credit nothing for a short reply without keywords', () => {
    expect(creditFocusAreas('Not sure', 'HookPreference', 4)).toEqual([]);
  });
});

describe('applyReply', () => {
  it('should complete the AI and creativity conversation on coverage after four replies', () => {
    const session = converse(AI_AND_CREATIVITY_REPLIES, options());

    expect(session.state).toBe('Completed');
    expect(session.completionReason).toBe('coverage');
    expect(session.coveredFocusAreas).toEqual([
      'HookPreference',
      'AudienceAndPainPoints',
      'UniqueAngle',
      'KeyMessage',
    ]);
    expect(countUserTurns(session)).toBe(4);
  });

  it('should keep questioning the same conversation when five turns are required', () => {
    const session = converse(AI_AND_CREATIVITY_REPLIES, options({ minUserTurns: 5 }));

    expect(session.state).toBe('Questioning');
    expect(session.turns.at(-1)).toMatchObject({
      speaker: 'assistant',
      targetFocusArea: 'PersonalStory',
    });
  });

  it('should complete on a stop phrase regardless of coverage', () => {
    const { session, next } = applyReply(startedSession(), 'Let’s proceed', options());

    expect(next).toEqual({ kind: 'complete', reason: 'explicitStop' });
    expect(session.state).toBe('Completed');
    expect(session.turns.at(-1)).toMatchObject({ speaker: 'user', stopSignal: true });
  });

  it('should wait for the turn minimum once every area is covered', () => {
    const first = applyReply(startedSession(), 'hook audience angle message story data tone', options());

    expect(first.session.state).toBe('AwaitingExplicitStop');
    expect(first.next).toEqual({ kind: 'ask', promptKind: 'wrapUp' });

    const session = converse(
      ['hook audience angle message story data tone', 'Nothing more.', 'Still nothing.', 'Done thinking.'],
      options()
    );
    expect(session.state).toBe('Completed');
    expect(session.completionReason).toBe('coverage');
    expect(session.turns.filter((turn) => turn.wrapUp === true)).toHaveLength(3);
  });

  it('should target the highest-priority uncovered area next', () => {
    const { next } = applyReply(startedSession(), AI_AND_CREATIVITY_REPLIES[0] ?? '', options());

    expect(next).toEqual({ kind: 'ask', promptKind: 'question', targetFocusArea: 'AudienceAndPainPoints' });
  });

  it('should log transitions with increasing sequence numbers and turn indexes', () => {
    const { session } = applyReply(startedSession(), 'Not sure', options());

    expect(session.transitions.map(({ sequence, from, to, turnIndex }) => ({ sequence, from, to, turnIndex }))).toEqual([
      { sequence: 0, from: 'Initiated', to: 'Questioning', turnIndex: 0 },
      { sequence: 1, from: 'Questioning', to: 'Questioning', turnIndex: 1 },
    ]);
  });

  it('should merge the style signal of informative replies only', () => {
    const afterShort = applyReply(startedSession(), 'Yes', options()).session;
    const afterLong = applyReply(startedSession(), 'honestly i think this is kinda wild!!', options()).session;

    expect(afterShort.styleProfile.samples).toBe(0);
    expect(afterLong.styleProfile.samples).toBe(1);
    expect(afterLong.styleProfile.tone).toBeGreaterThan(0.5);
  });

  it('should reject replies outside Questioning and AwaitingExplicitStop', () => {
    const initiated = createSession('s1', 'AI and creativity', NOW);

    expect(() => applyReply(initiated, 'hello there', options())).toThrow(InvalidTransitionError);
  });

  it('should always complete within the turn limit', () => {
    fc.assert(
      fc.property(fc.array(fc.string({ maxLength: 40 }), { minLength: 12, maxLength: 20 }), (replies) => {
        const session = converse(replies, options());
        expect(session.state).toBe('Completed');
        expect(countUserTurns(session)).toBeLessThanOrEqual(12);
      })
    );
  });
});

describe('cancel', () => {
  it('should cancel a live session and refuse a finished one', () => {
    const cancelled = cancel(startedSession(), NOW);
    expect(cancelled.state).toBe('Cancelled');
    expect(cancelled.transitions.at(-1)).toMatchObject({ from: 'Questioning', to: 'Cancelled', turnIndex: 0 });

    expect(() => cancel(cancelled, NOW)).toThrow(InvalidTransitionError);
  });
});

describe('formatTranscript', () => {
  it('should label each speaker', () => {
    const { session } = applyReply(startedSession(), 'Not sure', options());

    expect(formatTranscript(session.turns)).toBe('Assistant: How do you want to open?\nUser: Not sure');
  });
});
