/**
 * Tests for the resume command.
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getDefaultConfig } from '../../config/parser.js';
import type { Session } from '../../conversation/types.js';
import { InvalidTransitionError, NotFoundError } from '../../errors.js';
import type { GenerationCapability, GenerationRequest, GenerationResult } from '../../generation/types.js';
import { createFailureResult, createInvalidRequestError, createSuccessResult } from '../../generation/types.js';
import type { PipelineRun } from '../../pipeline/types.js';
import { ContentService } from '../../service/content-service.js';
import { InMemoryEntityStore } from '../../store/memory-store.js';
import { silentLogger } from '../../utils/logger.js';
import type { Prompter } from '../types.js';
import { handleCreateCommand } from './create.js';
import { handleResumeCommand } from './resume.js';

type Generate = GenerationCapability['generate'];

const STAGE_OUTPUTS: Record<string, string> = {
  brief: JSON.stringify({
    topic: 'Remote onboarding',
    audience: 'Engineering managers',
    keyMessages: ['Pair new hires early'],
    researchNotes: [],
  }),
  hooks: JSON.stringify({ options: [{ text: 'Day one matters.', style: 'bold claim' }] }),
  structure: JSON.stringify({
    format: 'list',
    selectedHookIndex: 0,
    sections: [{ heading: 'Pairing', purpose: 'Show the habit', points: ['First week buddy'] }],
  }),
  content: JSON.stringify({ post: 'Day one matters.', hashtags: ['#onboarding'] }),
};

function scriptedPrompter(lines: readonly string[]): Prompter & { readonly output: string[] } {
  const queue = [...lines];
  const output: string[] = [];
  return {
    output,
    readLine: () => Promise.resolve(queue.shift()),
    print: (text) => {
      output.push(text);
    },
    close: () => undefined,
  };
}

function createService(generation: { unavailable: boolean }): ContentService {
  const answer = (request: GenerationRequest): Promise<GenerationResult> =>
    Promise.resolve(
      generation.unavailable
        ? createFailureResult(createInvalidRequestError('bad', ['x']))
        : createSuccessResult({
            content: STAGE_OUTPUTS[request.promptKind] ?? `What about ${request.promptKind}?`,
            modelId: 'test-model',
            latencyMs: 1,
          })
    );
  return new ContentService({
    config: getDefaultConfig(),
    sessions: new InMemoryEntityStore<Session>(),
    runs: new InMemoryEntityStore<PipelineRun>(),
    generation: { generate: vi.fn<Generate>(answer) },
    sleep: () => Promise.resolve(),
    random: () => 0.5,
    generateSessionId: () => 'session_1',
    generateRunId: () => 'run_1',
  });
}

describe('handleResumeCommand', () => {
  let directory: string;
  let outputPath: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'voicecraft-resume-'));
    outputPath = join(directory, 'linkedin_post.md');
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should ask the first question of a session left without one and finish the post', async () => {
    const generation = { unavailable: true };
    const service = createService(generation);
    await expect(
      handleCreateCommand(['Remote onboarding'], {
        service,
        prompter: scriptedPrompter([]),
        outputPath,
        logger: silentLogger,
      })
    ).rejects.toMatchObject({ code: 'GENERATION_UNAVAILABLE' });
    expect((await service.getSession('session_1')).state).toBe('Initiated');

    generation.unavailable = false;
    const prompter = scriptedPrompter(['/done', 'y']);
    const result = await handleResumeCommand(['session_1'], { service, prompter, outputPath, logger: silentLogger });

    expect(result).toEqual({ exitCode: 0 });
    expect(prompter.output.slice(0, 2)).toEqual([
      'Resuming session session_1: Remote onboarding',
      'What about question?',
    ]);
    expect(await readFile(outputPath, 'utf-8')).toBe('Day one matters.\n\n#onboarding\n');
  });

  it('should pick up a questioning session at its last question', async () => {
    const service = createService({ unavailable: false });
    await service.startSession('Remote onboarding');
    const prompter = scriptedPrompter(['/done', 'y']);

    const result = await handleResumeCommand(['session_1'], { service, prompter, outputPath, logger: silentLogger });

    expect(result.exitCode).toBe(0);
    expect(prompter.output[1]).toBe('What about question?');
    expect((await service.getRunStatus('run_1')).state).toBe('Succeeded');
  });

  it('should refuse a cancelled session', async () => {
    const service = createService({ unavailable: false });
    await service.startSession('Remote onboarding');
    await service.cancelSession('session_1');

    await expect(
      handleResumeCommand(['session_1'], {
        service,
        prompter: scriptedPrompter([]),
        outputPath,
        logger: silentLogger,
      })
    ).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it('should reject a missing or unknown session id', async () => {
    const context = {
      service: createService({ unavailable: false }),
      prompter: scriptedPrompter([]),
      outputPath,
      logger: silentLogger,
    };

    await expect(handleResumeCommand([], context)).rejects.toMatchObject({ code: 'INVALID_INPUT' });
    await expect(handleResumeCommand(['missing'], context)).rejects.toBeInstanceOf(NotFoundError);
  });
});
