/**
 * Tests for PipelineOrchestrator.
 */

import type { Mock } from 'vitest';
import { describe, expect, it, vi } from 'vitest';
import { appendSection, bundleFromSession, createBundle, getPayload, getSection } from '../bundle/bundle.js';
import type { ContextBundle } from '../bundle/types.js';
import { getDefaultConfig } from '../config/parser.js';
import { applyQuestion, applyReply, createSession, firstStep } from '../conversation/machine.js';
import { InvalidTransitionError, SchemaViolationError } from '../errors.js';
import type { GenerationCapability, GenerationRequest, GenerationResult } from '../generation/types.js';
import {
  createFailureResult,
  createInvalidRequestError,
  createRateLimitError,
  createSuccessResult,
} from '../generation/types.js';
import { InMemoryEntityStore } from '../store/memory-store.js';
import { PipelineOrchestrator } from './orchestrator.js';
import type { PipelineRun } from './types.js';

const NOW = new Date('2026-03-01T09:00:00.000Z');

type Generate = GenerationCapability['generate'];

const OUTPUTS: Record<string, string> = {
  brief: JSON.stringify({
    topic: 'AI and creativity',
    audience: 'Students',
    keyMessages: ['Taste still matters'],
    researchNotes: ['Drawing robots exist'],
  }),
  hooks: '```json\n{"options":[{"text":"Machines can draw now.","style":"bold claim"},{"text":"Is taste dead?","style":"question"}]}\n```',
  structure: JSON.stringify({
    format: 'story',
    selectedHookIndex: 1,
    sections: [{ heading: 'Setup', purpose: 'Context', points: ['A drawing robot'] }],
  }),
  content: JSON.stringify({ post: 'Is taste dead? No.', hashtags: ['#AI'] }),
};

function ok(content: string): GenerationResult {
  return createSuccessResult({ content, modelId: 'test-model', latencyMs: 1 });
}

function answerByKind(request: GenerationRequest): Promise<GenerationResult> {
  return Promise.resolve(ok(OUTPUTS[request.promptKind] ?? '{}'));
}

function createGeneration(implementation: Generate = answerByKind): { generate: Mock<Generate> } {
  return { generate: vi.fn<Generate>(implementation) };
}

function handoffBundle(): ContextBundle {
  const started = applyQuestion(createSession('s1', 'AI and creativity', NOW), 'How to open?', firstStep(), NOW);
  const completed = applyReply(started, "that's enough", {
    thresholds: { minUserTurns: 4, minFocusCoverage: 4, maxUserTurns: 12, substantiveReplyWords: 4 },
    style: { emaCap: 5, phraseTopK: 8 },
    now: NOW,
  }).session;
  return bundleFromSession(completed, { id: 'b1', now: NOW });
}

function createOrchestrator(generation: GenerationCapability): {
  orchestrator: PipelineOrchestrator;
  store: InMemoryEntityStore<PipelineRun>;
  sleep: Mock<(ms: number) => Promise<void>>;
} {
  const store = new InMemoryEntityStore<PipelineRun>();
  const sleep = vi.fn<(ms: number) => Promise<void>>(() => Promise.resolve());
  let ids = 0;
  const orchestrator = new PipelineOrchestrator({
    store,
    generation,
    config: getDefaultConfig(),
    generateId: () => `run_${String(++ids)}`,
    now: () => NOW,
    sleep,
    random: () => 0.5,
  });
  return { orchestrator, store, sleep };
}

describe('PipelineOrchestrator', () => {
  it('should run to the structure checkpoint and finish after approval', async () => {
    const generation = createGeneration();
    const { orchestrator } = createOrchestrator(generation);

    const paused = await orchestrator.startPipeline(handoffBundle());

    expect(paused.state).toBe('AwaitingUserApproval');
    expect(paused.nextStageIndex).toBe(3);
    expect(getPayload(paused.bundle, 'hookOptions')?.options).toHaveLength(2);
    expect(getPayload(paused.bundle, 'finalContent')).toBeUndefined();

    const done = await orchestrator.approveStructure(paused.id);

    expect(done.state).toBe('Succeeded');
    expect(getPayload(done.bundle, 'finalContent')).toEqual({ post: 'Is taste dead? No.', hashtags: ['#AI'] });
    expect(done.bundle.version).toBe(6);
    expect(done.attempts.map((a) => `${a.stage}:${a.outcome}`)).toEqual([
      'Brainstorm:success',
      'Hook:success',
      'Structure:success',
      'ContentWriting:success',
    ]);
  });

  it('should pass the hook count and input sections to generation', async () => {
    const generation = createGeneration();
    const { orchestrator } = createOrchestrator(generation);

    await orchestrator.startPipeline(handoffBundle());

    expect(generation.generate).toHaveBeenCalledWith(
      {
        promptKind: 'hooks',
        context: expect.objectContaining({ hookCount: 3, brief: expect.objectContaining({ topic: 'AI and creativity' }) }),
      },
      expect.any(AbortSignal)
    );
  });

  it('should fail after three retryable failures and let a fresh run finish from the kept bundle', async () => {
    const generation = createGeneration((request) =>
      request.promptKind === 'hooks'
        ? Promise.resolve(createFailureResult(createRateLimitError('429 Too Many Requests')))
        : answerByKind(request)
    );
    const { orchestrator, sleep } = createOrchestrator(generation);

    const failed = await orchestrator.startPipeline(handoffBundle());

    expect(failed.state).toBe('Failed');
    expect(failed.failure).toEqual({
      code: 'GENERATION_UNAVAILABLE',
      message: 'Hook failed after 3 attempts: 429 Too Many Requests',
      stage: 'Hook',
    });
    expect(failed.attempts.filter((a) => a.stage === 'Hook').map((a) => a.outcome)).toEqual([
      'retryable',
      'retryable',
      'retryable',
    ]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
    expect(getPayload(failed.bundle, 'brief')).toBeDefined();

    generation.generate.mockImplementation(answerByKind);
    const fresh = await orchestrator.restartRun(failed.id);

    expect(fresh.id).toBe('run_2');
    expect(fresh.restartedFrom).toBe('run_1');
    expect(fresh.state).toBe('AwaitingUserApproval');
    expect(fresh.attempts.map((a) => `${a.stage}:${a.outcome}`)).toEqual([
      'Brainstorm:skipped',
      'Hook:success',
      'Structure:success',
    ]);
    expect((await orchestrator.getRunStatus(failed.id)).state).toBe('Failed');
  });

  it('should fail immediately on output that is not JSON', async () => {
    const generation = createGeneration((request) =>
      request.promptKind === 'brief' ? Promise.resolve(ok('Here is your brief!')) : answerByKind(request)
    );
    const { orchestrator } = createOrchestrator(generation);

    const run = await orchestrator.startPipeline(handoffBundle());

    expect(run.state).toBe('Failed');
    expect(run.failure).toMatchObject({ code: 'SCHEMA_VIOLATION', stage: 'Brainstorm' });
    expect(generation.generate).toHaveBeenCalledTimes(1);
  });

  it('should fail on output that violates the section schema', async () => {
    const generation = createGeneration((request) =>
      request.promptKind === 'brief' ? Promise.resolve(ok('{"topic":"AI"}')) : answerByKind(request)
    );
    const { orchestrator } = createOrchestrator(generation);

    const run = await orchestrator.startPipeline(handoffBundle());

    expect(run.failure?.code).toBe('SCHEMA_VIOLATION');
    expect(run.bundle.version).toBe(2);
  });

  it('should fail on an invalid generation request without retrying', async () => {
    const generation = createGeneration(() =>
      Promise.resolve(createFailureResult(createInvalidRequestError('Missing context', ['brief'])))
    );
    const { orchestrator } = createOrchestrator(generation);

    const run = await orchestrator.startPipeline(handoffBundle());

    expect(run.failure).toEqual({ code: 'INVALID_INPUT', message: 'Missing context', stage: 'Brainstorm' });
    expect(generation.generate).toHaveBeenCalledTimes(1);
  });

  it('should fail when input sections are missing', async () => {
    const generation = createGeneration();
    const { orchestrator } = createOrchestrator(generation);

    const run = await orchestrator.startPipeline(createBundle('empty', { now: NOW }));

    expect(run.failure).toEqual({
      code: 'INVALID_INPUT',
      message: 'Brainstorm is missing input sections: conversation, styleProfile',
      stage: 'Brainstorm',
    });
    expect(generation.generate).not.toHaveBeenCalled();
  });

  it('should revise the structure once and keep waiting for approval', async () => {
    const { orchestrator } = createOrchestrator(createGeneration());
    const paused = await orchestrator.startPipeline(handoffBundle());

    const revised = await orchestrator.reviseStructure(paused.id, { format: 'listicle', callToAction: 'Share yours' });

    expect(revised.state).toBe('AwaitingUserApproval');
    expect(revised.structureRevisions).toBe(1);
    expect(getSection(revised.bundle, 'structureOutline')).toMatchObject({
      revision: 1,
      payload: { format: 'listicle', selectedHookIndex: 1, callToAction: 'Share yours' },
    });
    await expect(orchestrator.reviseStructure(paused.id, { format: 'story' })).rejects.toBeInstanceOf(
      InvalidTransitionError
    );
    expect((await orchestrator.approveStructure(paused.id)).state).toBe('Succeeded');
  });

  it('should reject a revision that breaks the outline schema', async () => {
    const { orchestrator } = createOrchestrator(createGeneration());
    const paused = await orchestrator.startPipeline(handoffBundle());

    await expect(orchestrator.reviseStructure(paused.id, { sections: [] })).rejects.toBeInstanceOf(
      SchemaViolationError
    );
    expect((await orchestrator.getRunStatus(paused.id)).structureRevisions).toBe(0);
  });

  it('should reject a revision selecting a hook that does not exist', async () => {
    const { orchestrator } = createOrchestrator(createGeneration());
    const paused = await orchestrator.startPipeline(handoffBundle());

    await expect(orchestrator.reviseStructure(paused.id, { selectedHookIndex: 7 })).rejects.toMatchObject({
      code: 'SCHEMA_VIOLATION',
      message: "Invalid 'structureOutline' payload: selectedHookIndex 7 is out of range for 2 hook options",
    });
    const stored = await orchestrator.getRunStatus(paused.id);
    expect(stored.structureRevisions).toBe(0);
    expect(getPayload(stored.bundle, 'structureOutline')?.selectedHookIndex).toBe(1);
  });

  it('should refuse approval outside the checkpoint', async () => {
    const { orchestrator } = createOrchestrator(createGeneration());
    const paused = await orchestrator.startPipeline(handoffBundle());
    await orchestrator.approveStructure(paused.id);

    await expect(orchestrator.approveStructure(paused.id)).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it('should skip stages whose output already exists', async () => {
    const generation = createGeneration();
    const { orchestrator } = createOrchestrator(generation);
    const withBrief = appendSection(handoffBundle(), 'Brainstorm', 'brief', JSON.parse(OUTPUTS.brief ?? '{}'), {
      now: NOW,
    });

    const run = await orchestrator.startPipeline(withBrief);

    expect(run.attempts[0]).toMatchObject({ stage: 'Brainstorm', outcome: 'skipped' });
    expect(generation.generate.mock.calls.map(([request]) => request.promptKind)).toEqual(['hooks', 'structure']);
  });

  it('should abort a run in flight and keep its bundle', async () => {
    const gate: { release?: () => void } = {};
    const generation = createGeneration((request) =>
      request.promptKind === 'hooks'
        ? new Promise<GenerationResult>((resolve) => {
            gate.release = () => resolve(ok(OUTPUTS.hooks ?? ''));
          })
        : answerByKind(request)
    );
    const { orchestrator } = createOrchestrator(generation);

    const pending = orchestrator.startPipeline(handoffBundle());
    await vi.waitFor(() => {
      expect(gate.release).toBeDefined();
    });
    const aborted = await orchestrator.cancelRun('run_1');
    gate.release?.();
    const finished = await pending;

    expect(aborted.state).toBe('Aborted');
    expect(finished.state).toBe('Aborted');
    expect(getPayload(finished.bundle, 'brief')).toBeDefined();
    expect(getPayload(finished.bundle, 'hookOptions')).toBeUndefined();
    await expect(orchestrator.cancelRun('run_1')).rejects.toBeInstanceOf(InvalidTransitionError);
  });
});
