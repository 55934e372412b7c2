/**
 * `voicecraft create "<idea>"`: brainstorm interactively, then write the post.
 *
 * @packageDocumentation
 */

import { getPayload } from '../../bundle/bundle.js';
import { acceptsReplies, lastQuestion } from '../../conversation/machine.js';
import type { Session } from '../../conversation/types.js';
import { GenerationUnavailableError, VoicecraftError } from '../../errors.js';
import { writePostFile } from '../../export/post-file.js';
import type { StructureEdits } from '../../pipeline/orchestrator.js';
import { runFailureError } from '../../pipeline/orchestrator.js';
import type { PipelineRun } from '../../pipeline/types.js';
import type { ContentService } from '../../service/content-service.js';
import type { Logger } from '../../utils/logger.js';
import { formatOutline, formatSessionStatus } from '../format.js';
import type { CliCommandResult, Prompter } from '../types.js';

export interface CreateCommandContext {
  readonly service: ContentService;
  readonly prompter: Prompter;
  /** Where the finished post is written. */
  readonly outputPath: string;
  readonly logger: Logger;
}

type ConversationEnd = { kind: 'completed'; session: Session } | { kind: 'stopped'; exitCode: number };

/**
 * Tells the user how to pick a session up again when generation gave out.
 */
export async function withResumeHint<T>(prompter: Prompter, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof GenerationUnavailableError && error.entityId !== undefined) {
      prompter.print(`Session ${error.entityId} is saved. Run "voicecraft resume ${error.entityId}" to continue.`);
    }
    throw error;
  }
}

async function converse(session: Session, context: CreateCommandContext): Promise<ConversationEnd> {
  const { service, prompter } = context;
  let current = session;
  if (acceptsReplies(current.state)) {
    prompter.print(lastQuestion(current)?.text ?? '');
  }

  while (acceptsReplies(current.state)) {
    const line = await prompter.readLine('> ');
    if (line === undefined) {
      prompter.print(`Input ended. Session ${current.id} is saved as ${current.state}.`);
      return { kind: 'stopped', exitCode: 1 };
    }
    const text = line.trim();
    if (text === '') {
      continue;
    }
    if (text === '/status') {
      prompter.print(formatSessionStatus(current));
      continue;
    }
    if (text === '/cancel') {
      await service.cancelSession(current.id);
      prompter.print('Session cancelled.');
      return { kind: 'stopped', exitCode: 1 };
    }

    current =
      text === '/done'
        ? await service.requestExplicitStop(current.id)
        : await service.submitUserTurn(current.id, text);
    if (acceptsReplies(current.state)) {
      prompter.print(lastQuestion(current)?.text ?? '');
    }
  }
  return { kind: 'completed', session: current };
}

async function readEdits(prompter: Prompter): Promise<StructureEdits> {
  const format = (await prompter.readLine('New format (blank to keep): '))?.trim() ?? '';
  const callToAction = (await prompter.readLine('Call to action (blank to keep): '))?.trim() ?? '';
  return {
    ...(format !== '' ? { format } : {}),
    ...(callToAction !== '' ? { callToAction } : {}),
  };
}

/**
 * Shows the outline and applies the reviewer's choice.
 *
 * @returns The run after approval, or undefined when the reviewer aborted it.
 */
async function review(run: PipelineRun, context: CreateCommandContext): Promise<PipelineRun | undefined> {
  const { service, prompter } = context;
  const outline = getPayload(run.bundle, 'structureOutline');
  if (outline !== undefined) {
    prompter.print(formatOutline(outline, getPayload(run.bundle, 'hookOptions')));
  }

  const answer = (await prompter.readLine('Approve this structure? [Y]es / [e]dit / [n]o: '))?.trim().toLowerCase();
  if (answer === undefined || answer === 'n' || answer === 'no') {
    await service.cancelRun(run.id);
    prompter.print('Run aborted.');
    return undefined;
  }
  if (answer === 'e' || answer === 'edit') {
    const edits = await readEdits(prompter);
    if (Object.keys(edits).length > 0) {
      const revised = await service.reviseStructure(run.id, edits);
      const revisedOutline = getPayload(revised.bundle, 'structureOutline');
      if (revisedOutline !== undefined) {
        prompter.print(formatOutline(revisedOutline, getPayload(revised.bundle, 'hookOptions')));
      }
    }
  }
  return service.approveStructure(run.id);
}

/**
 * Runs the create command.
 *
 * @param args - Command arguments; joined to form the idea.
 */
export async function handleCreateCommand(
  args: readonly string[],
  context: CreateCommandContext
): Promise<CliCommandResult> {
  const { service, prompter } = context;
  const idea = args.join(' ').trim();
  if (idea === '') {
    throw new VoicecraftError('Usage: voicecraft create "<idea>"', 'INVALID_INPUT');
  }

  prompter.print('Answer a few questions. Type /done to finish early, /status for progress, /cancel to stop.');
  const session = await withResumeHint(prompter, () => service.startSession(idea));
  return continueSession(session, context);
}

/**
 * Carries a session from its current question to the saved post.
 */
export async function continueSession(session: Session, context: CreateCommandContext): Promise<CliCommandResult> {
  const { service, prompter, logger } = context;
  const ended = await withResumeHint(prompter, () => converse(session, context));
  if (ended.kind === 'stopped') {
    return { exitCode: ended.exitCode };
  }

  prompter.print('Writing your post...');
  let run = await service.startPipeline(ended.session.id);
  logger.info('pipeline_started', { sessionId: ended.session.id, runId: run.id, state: run.state });

  if (run.state === 'AwaitingUserApproval') {
    const approved = await review(run, context);
    if (approved === undefined) {
      return { exitCode: 1 };
    }
    run = approved;
  }

  const failure = runFailureError(run);
  if (failure !== undefined) {
    throw failure;
  }

  const markdown = await writePostFile(run, context.outputPath);
  prompter.print(markdown);
  prompter.print(`Saved to ${context.outputPath}`);
  prompter.print(service.monitor.formatReport());
  return { exitCode: 0 };
}
