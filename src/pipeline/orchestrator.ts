/**
 * Pipeline orchestrator.
 *
 * Runs the stages of {@link PIPELINE_STAGES} over a context bundle, retrying
 * retryable stage failures with backoff, pausing once after Structure for
 * review, and persisting the run after every stage.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { getPayload, reviseSection } from '../bundle/bundle.js';
import type { ContextBundle, StructureOutline } from '../bundle/types.js';
import type { Config } from '../config/types.js';
import { ConflictError, InvalidTransitionError, VoicecraftError } from '../errors.js';
import { DEFAULT_RETRY_CONFIG, calculateBackoffDelay, defaultSleep } from '../generation/retry.js';
import type { GenerationCapability } from '../generation/types.js';
import type { EntityStore } from '../store/types.js';
import { NEW_RECORD_VERSION } from '../store/types.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { PIPELINE_STAGES } from './definition.js';
import { runStage } from './stage-runner.js';
import type {
  PipelineRun,
  RunFailure,
  RunState,
  StageAttempt,
  StageDescriptor,
  StageOutcome,
} from './types.js';
import { TERMINAL_RUN_STATES } from './types.js';

/** Stage name recorded for reviewer edits. */
export const REVIEW_STAGE = 'Review';

/**
 * Options for creating a PipelineOrchestrator.
 */
export interface PipelineOrchestratorOptions {
  readonly store: EntityStore<PipelineRun>;
  readonly generation: GenerationCapability;
  readonly config: Pick<Config, 'pipeline'>;
  readonly logger?: Logger | undefined;
  /** Run id factory. */
  readonly generateId?: (() => string) | undefined;
  readonly now?: (() => Date) | undefined;
  readonly sleep?: ((ms: number) => Promise<void>) | undefined;
  readonly random?: (() => number) | undefined;
  /** Stage list; defaults to {@link PIPELINE_STAGES}. */
  readonly stages?: readonly StageDescriptor[] | undefined;
}

/**
 * Edits merged over the current structure outline.
 */
export type StructureEdits = Partial<StructureOutline>;

export function isTerminalRunState(state: RunState): boolean {
  return TERMINAL_RUN_STATES.includes(state);
}

/**
 * Sequences pipeline stages for any number of runs.
 *
 * @example
 * ```typescript
 * const orchestrator = new PipelineOrchestrator({ store, generation, config });
 * let run = await orchestrator.startPipeline(bundle);
 * if (run.state === 'AwaitingUserApproval') {
 *   run = await orchestrator.approveStructure(run.id);
 * }
 * ```
 */
export class PipelineOrchestrator {
  private readonly store: EntityStore<PipelineRun>;
  private readonly generation: GenerationCapability;
  private readonly config: Pick<Config, 'pipeline'>;
  private readonly logger: Logger;
  private readonly generateId: () => string;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly stages: readonly StageDescriptor[];
  private readonly mutex = new KeyedMutex();
  private readonly inFlight = new Map<string, AbortController>();

  constructor(options: PipelineOrchestratorOptions) {
    this.store = options.store;
    this.generation = options.generation;
    this.config = options.config;
    this.logger = (options.logger ?? silentLogger).child('PipelineOrchestrator');
    this.generateId = options.generateId ?? (() => `run_${randomUUID()}`);
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.stages = options.stages ?? PIPELINE_STAGES;
  }

  /**
   * Starts a fresh run over a bundle and advances it until the review
   * checkpoint or a terminal state. Stages whose output the bundle already
   * holds are skipped.
   */
  async startPipeline(bundle: ContextBundle, options: { restartedFrom?: string } = {}): Promise<PipelineRun> {
    const at = this.now().toISOString();
    const run: PipelineRun = {
      id: this.generateId(),
      state: 'Running',
      bundle,
      nextStageIndex: 0,
      attempts: [],
      structureRevisions: 0,
      ...(options.restartedFrom !== undefined ? { restartedFrom: options.restartedFrom } : {}),
      createdAt: at,
      updatedAt: at,
    };
    await this.store.save(run.id, run, NEW_RECORD_VERSION);
    this.logger.info('run_created', { runId: run.id, bundleId: bundle.id, bundleVersion: bundle.version });
    return this.advance(run.id);
  }

  /**
   * Starts a fresh run from the bundle a failed or aborted run kept.
   *
   * @throws InvalidTransitionError if the run is not Failed or Aborted.
   */
  async restartRun(runId: string): Promise<PipelineRun> {
    const { value } = await this.store.load(runId);
    if (value.state !== 'Failed' && value.state !== 'Aborted') {
      throw this.rejected(value, 'restartRun');
    }
    return this.startPipeline(value.bundle, { restartedFrom: runId });
  }

  /**
   * Approves the structure outline and runs the remaining stages.
   *
   * @throws InvalidTransitionError unless the run is AwaitingUserApproval.
   */
  async approveStructure(runId: string): Promise<PipelineRun> {
    await this.mutex.runExclusive(runId, async () => {
      const { value, version } = await this.store.load(runId);
      if (value.state !== 'AwaitingUserApproval') {
        throw this.rejected(value, 'approveStructure');
      }
      await this.store.save(runId, this.withState(value, 'Running'), version);
      this.logger.info('run_transition', { runId, from: value.state, to: 'Running', reason: 'structure approved' });
    });
    return this.advance(runId);
  }

  /**
   * Applies the single allowed revision of the structure outline. The run
   * stays AwaitingUserApproval so the revised outline can be approved.
   *
   * @throws InvalidTransitionError unless the run is AwaitingUserApproval and
   *   has not been revised yet.
   * @throws SchemaViolationError if the merged outline is invalid.
   */
  async reviseStructure(runId: string, edits: StructureEdits): Promise<PipelineRun> {
    return this.mutex.runExclusive(runId, async () => {
      const { value, version } = await this.store.load(runId);
      const outline = getPayload(value.bundle, 'structureOutline');
      if (value.state !== 'AwaitingUserApproval' || outline === undefined) {
        throw this.rejected(value, 'reviseStructure');
      }

      const bundle = reviseSection(value.bundle, REVIEW_STAGE, 'structureOutline', { ...outline, ...edits }, {
        runState: value.state,
        now: this.now(),
      });
      const next: PipelineRun = {
        ...value,
        bundle,
        structureRevisions: value.structureRevisions + 1,
        updatedAt: this.now().toISOString(),
      };
      await this.store.save(runId, next, version);
      this.logger.info('structure_revised', { runId, bundleVersion: bundle.version });
      return next;
    });
  }

  /**
   * Aborts a run without waiting for the stage in flight, whose result is
   * then discarded. The bundle is kept as it was.
   *
   * @throws InvalidTransitionError if the run already reached a terminal state.
   */
  async cancelRun(runId: string): Promise<PipelineRun> {
    for (;;) {
      const { value, version } = await this.store.load(runId);
      if (isTerminalRunState(value.state)) {
        throw this.rejected(value, 'cancelRun');
      }
      const aborted = this.withState(value, 'Aborted');
      try {
        await this.store.save(runId, aborted, version);
      } catch (error) {
        if (error instanceof ConflictError) {
          continue;
        }
        throw error;
      }
      this.inFlight.get(runId)?.abort();
      this.logger.info('run_transition', { runId, from: value.state, to: 'Aborted', reason: 'cancelled on request' });
      return aborted;
    }
  }

  /**
   * Loads a run.
   *
   * @throws NotFoundError if no run is stored under the id.
   */
  async getRunStatus(runId: string): Promise<PipelineRun> {
    const { value } = await this.store.load(runId);
    return value;
  }

  private rejected(run: PipelineRun, operation: string): InvalidTransitionError {
    return new InvalidTransitionError(`Cannot ${operation}: run '${run.id}' is ${run.state}`, {
      fromState: run.state,
      operation,
      entityId: run.id,
      snapshot: run,
    });
  }

  private withState(run: PipelineRun, state: RunState): PipelineRun {
    return { ...run, state, updatedAt: this.now().toISOString() };
  }

  /**
   * Runs stages while the run is Running.
   */
  private async advance(runId: string): Promise<PipelineRun> {
    return this.mutex.runExclusive(runId, async () => {
      for (;;) {
        const { value: run, version } = await this.store.load(runId);
        if (run.state !== 'Running') {
          return run;
        }

        const stage = this.stages[run.nextStageIndex];
        const next =
          stage === undefined
            ? this.withState(run, 'Succeeded')
            : await this.executeStage(run, stage);

        try {
          await this.store.save(runId, next, version);
        } catch (error) {
          if (!(error instanceof ConflictError)) {
            throw error;
          }
          const { value: latest } = await this.store.load(runId);
          if (latest.state === 'Aborted') {
            this.logger.warn('result_discarded', { runId, stage: stage?.name });
            return latest;
          }
          this.logger.debug('save_conflict_retry', { runId, stage: stage?.name });
          continue;
        }

        if (next.state !== run.state) {
          this.logger.info('run_transition', {
            runId,
            from: run.state,
            to: next.state,
            ...(next.failure !== undefined ? { code: next.failure.code, reason: next.failure.message } : {}),
          });
        }
      }
    });
  }

  /**
   * Runs one stage with its attempt budget and returns the updated run.
   */
  private async executeStage(run: PipelineRun, stage: StageDescriptor): Promise<PipelineRun> {
    const maxAttempts = this.config.pipeline.max_stage_attempts;
    const retry = {
      ...DEFAULT_RETRY_CONFIG,
      maxRetries: maxAttempts - 1,
      baseDelayMs: this.config.pipeline.stage_retry_base_delay_ms,
      maxDelayMs: Math.max(DEFAULT_RETRY_CONFIG.maxDelayMs, this.config.pipeline.stage_retry_base_delay_ms),
    };
    const controller = new AbortController();
    this.inFlight.set(run.id, controller);

    const attempts: StageAttempt[] = [];
    let outcome: StageOutcome = { kind: 'cancelled' };
    try {
      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        const startedAt = this.now().toISOString();
        outcome = await runStage(stage, run.bundle, {
          generation: this.generation,
          pipeline: this.config.pipeline,
          signal: controller.signal,
          now: this.now,
        });
        attempts.push({
          stage: stage.name,
          attempt,
          outcome: outcome.kind,
          ...(outcome.kind === 'retryable'
            ? { message: outcome.error.message }
            : outcome.kind === 'fatal'
              ? { message: outcome.message }
              : {}),
          startedAt,
          finishedAt: this.now().toISOString(),
        });

        if (outcome.kind !== 'retryable' || attempt === maxAttempts) {
          break;
        }
        const delayMs = calculateBackoffDelay(attempt - 1, retry, outcome.error, this.random);
        this.logger.warn('stage_retry', {
          runId: run.id,
          stage: stage.name,
          attempt: attempt + 1,
          maxAttempts,
          delayMs,
          error: outcome.error.message,
        });
        await this.sleep(delayMs);
      }
    } finally {
      this.inFlight.delete(run.id);
    }

    const base: PipelineRun = {
      ...run,
      attempts: [...run.attempts, ...attempts],
      updatedAt: this.now().toISOString(),
    };

    switch (outcome.kind) {
      case 'success':
      case 'skipped': {
        this.logger.info(outcome.kind === 'success' ? 'stage_succeeded' : 'stage_skipped', {
          runId: run.id,
          stage: stage.name,
          bundleVersion: outcome.bundle.version,
        });
        const nextStageIndex = run.nextStageIndex + 1;
        const state: RunState =
          nextStageIndex >= this.stages.length
            ? 'Succeeded'
            : stage.checkpoint && outcome.kind === 'success'
              ? 'AwaitingUserApproval'
              : 'Running';
        return { ...base, bundle: outcome.bundle, nextStageIndex, state };
      }
      case 'retryable':
        return this.failed(base, {
          code: 'GENERATION_UNAVAILABLE',
          message: `${stage.name} failed after ${String(maxAttempts)} attempts: ${outcome.error.message}`,
          stage: stage.name,
        });
      case 'fatal':
        return this.failed(base, { code: outcome.code, message: outcome.message, stage: stage.name });
      case 'cancelled':
        return this.withState(base, 'Aborted');
    }
  }

  private failed(run: PipelineRun, failure: RunFailure): PipelineRun {
    this.logger.error('stage_failed', { runId: run.id, ...failure });
    return { ...run, state: 'Failed', failure };
  }
}

/**
 * Raises the failure of a Failed run as an error.
 */
export function runFailureError(run: PipelineRun): VoicecraftError | undefined {
  if (run.failure === undefined) {
    return undefined;
  }
  return new VoicecraftError(run.failure.message, run.failure.code, { entityId: run.id, snapshot: run });
}
