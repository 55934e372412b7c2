/**
 * `voicecraft resume <sessionId>`: continue a saved session.
 *
 * @packageDocumentation
 */

import { InvalidTransitionError, VoicecraftError } from '../../errors.js';
import type { CliCommandResult } from '../types.js';
import { type CreateCommandContext, continueSession, withResumeHint } from './create.js';

/**
 * Runs the resume command. A session left in Initiated gets its first
 * question; one still questioning picks up at its last question; a completed
 * one goes straight to the pipeline.
 *
 * @param args - Command arguments; the first is the session id.
 */
export async function handleResumeCommand(
  args: readonly string[],
  context: CreateCommandContext
): Promise<CliCommandResult> {
  const { service, prompter } = context;
  const sessionId = args[0]?.trim() ?? '';
  if (sessionId === '') {
    throw new VoicecraftError('Usage: voicecraft resume <sessionId>', 'INVALID_INPUT');
  }

  const stored = await service.getSession(sessionId);
  if (stored.state === 'Cancelled') {
    throw new InvalidTransitionError(`Cannot resume: session '${sessionId}' is Cancelled`, {
      fromState: stored.state,
      operation: 'resume',
      entityId: sessionId,
    });
  }

  prompter.print(`Resuming session ${sessionId}: ${stored.initialIdea}`);
  const session =
    stored.state === 'Initiated'
      ? await withResumeHint(prompter, () => service.resumeSession(sessionId))
      : stored;
  return continueSession(session, context);
}
