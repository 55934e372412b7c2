/**
 * Content pipeline.
 *
 * @packageDocumentation
 */

export type {
  PipelineRun,
  RunFailure,
  RunState,
  StageAttempt,
  StageDescriptor,
  StageName,
  StageOutcome,
} from './types.js';
export { TERMINAL_RUN_STATES } from './types.js';
export { PIPELINE_STAGES, buildStageContext, missingInputs } from './definition.js';
export { extractJson, runStage, type StageRunDependencies } from './stage-runner.js';
export {
  PipelineOrchestrator,
  REVIEW_STAGE,
  isTerminalRunState,
  runFailureError,
  type PipelineOrchestratorOptions,
  type StructureEdits,
} from './orchestrator.js';
