/**
 * The content pipeline: Brainstorm, Hook, Structure (reviewed), ContentWriting.
 *
 * @packageDocumentation
 */

import { getPayload } from '../bundle/bundle.js';
import type { ContextBundle, SectionName } from '../bundle/types.js';
import type { PipelineConfig } from '../config/types.js';
import type { StageDescriptor } from './types.js';

export const PIPELINE_STAGES: readonly StageDescriptor[] = [
  {
    name: 'Brainstorm',
    promptKind: 'brief',
    inputs: ['conversation', 'styleProfile'],
    output: 'brief',
    checkpoint: false,
  },
  {
    name: 'Hook',
    promptKind: 'hooks',
    inputs: ['brief', 'styleProfile'],
    output: 'hookOptions',
    checkpoint: false,
  },
  {
    name: 'Structure',
    promptKind: 'structure',
    inputs: ['brief', 'hookOptions', 'styleProfile'],
    output: 'structureOutline',
    checkpoint: true,
  },
  {
    name: 'ContentWriting',
    promptKind: 'content',
    inputs: ['brief', 'hookOptions', 'structureOutline', 'styleProfile'],
    output: 'finalContent',
    checkpoint: false,
  },
] as const;

/**
 * Inputs of a stage that the bundle lacks.
 */
export function missingInputs(stage: StageDescriptor, bundle: ContextBundle): SectionName[] {
  return stage.inputs.filter((section) => getPayload(bundle, section) === undefined);
}

/**
 * Prompt context of a stage: each input section under its own name, plus the
 * number of hooks for the Hook stage.
 */
export function buildStageContext(
  stage: StageDescriptor,
  bundle: ContextBundle,
  pipeline: PipelineConfig
): Record<string, unknown> {
  const context: Record<string, unknown> = {};
  for (const section of stage.inputs) {
    context[section] = getPayload(bundle, section);
  }
  if (stage.promptKind === 'hooks') {
    context.hookCount = pipeline.hook_count;
  }
  return context;
}
