/**
 * Pipeline run types.
 *
 * @packageDocumentation
 */

import type { ContextBundle, SectionName } from '../bundle/types.js';
import type { VoicecraftErrorCode } from '../errors.js';
import type { GenerationError, PromptKind } from '../generation/types.js';

/**
 * Lifecycle states of a pipeline run.
 *
 * @remarks
 * - Running: stages are executing
 * - AwaitingUserApproval: paused after Structure until approved or revised
 * - Succeeded: every stage produced its section (terminal)
 * - Failed: a stage failed fatally or ran out of attempts (terminal)
 * - Aborted: cancelled on request (terminal)
 */
export type RunState = 'Running' | 'AwaitingUserApproval' | 'Succeeded' | 'Failed' | 'Aborted';

export const TERMINAL_RUN_STATES: readonly RunState[] = ['Succeeded', 'Failed', 'Aborted'] as const;

export type StageName = 'Brainstorm' | 'Hook' | 'Structure' | 'ContentWriting';

/**
 * Declaration of one stage.
 */
export interface StageDescriptor {
  readonly name: StageName;
  readonly promptKind: PromptKind;
  /** Sections that must exist before the stage runs. */
  readonly inputs: readonly SectionName[];
  /** Section the stage writes. */
  readonly output: SectionName;
  /** Whether the run pauses for review after this stage. */
  readonly checkpoint: boolean;
}

/**
 * Result of running a stage once.
 */
export type StageOutcome =
  | { readonly kind: 'success'; readonly bundle: ContextBundle }
  | { readonly kind: 'skipped'; readonly bundle: ContextBundle }
  | { readonly kind: 'retryable'; readonly error: GenerationError }
  | { readonly kind: 'fatal'; readonly code: VoicecraftErrorCode; readonly message: string }
  | { readonly kind: 'cancelled' };

/**
 * One recorded stage attempt.
 */
export interface StageAttempt {
  readonly stage: StageName;
  /** 1-based within the stage. */
  readonly attempt: number;
  readonly outcome: StageOutcome['kind'];
  readonly message?: string;
  /** ISO 8601. */
  readonly startedAt: string;
  /** ISO 8601. */
  readonly finishedAt: string;
}

/**
 * Why a run failed.
 */
export interface RunFailure {
  readonly code: VoicecraftErrorCode;
  readonly message: string;
  readonly stage: StageName;
}

/**
 * A pipeline run over a context bundle.
 */
export interface PipelineRun {
  readonly id: string;
  readonly state: RunState;
  /** Latest bundle; kept as it was when the run failed or was aborted. */
  readonly bundle: ContextBundle;
  /** Index into the stage list of the next stage to run. */
  readonly nextStageIndex: number;
  /** Append-only. */
  readonly attempts: readonly StageAttempt[];
  readonly failure?: RunFailure;
  readonly structureRevisions: number;
  /** Run this one was restarted from, if any. */
  readonly restartedFrom?: string;
  /** ISO 8601. */
  readonly createdAt: string;
  /** ISO 8601. */
  readonly updatedAt: string;
}
