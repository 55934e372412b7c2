/**
 * Runs one pipeline stage once.
 *
 * @packageDocumentation
 */

import { appendSection, crossSectionProblem, hasSection } from '../bundle/bundle.js';
import type { ContextBundle } from '../bundle/types.js';
import type { PipelineConfig } from '../config/types.js';
import { SchemaViolationError } from '../errors.js';
import type { GenerationCapability } from '../generation/types.js';
import { buildStageContext, missingInputs } from './definition.js';
import type { StageDescriptor, StageOutcome } from './types.js';

const FENCED_BLOCK = /```(?:json)?\s*\n?([\s\S]*?)```/i;

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Reads a JSON value from a reply, either bare or inside a fenced block.
 *
 * @returns The parsed value, or undefined when the reply holds no JSON.
 */
export function extractJson(text: string): unknown {
  const candidates = [text.trim()];
  const fenced = FENCED_BLOCK.exec(text);
  if (fenced?.[1] !== undefined) {
    candidates.push(fenced[1].trim());
  }
  for (const candidate of candidates) {
    const parsed = candidate === '' ? { ok: false as const } : parseJson(candidate);
    if (parsed.ok) {
      return parsed.value;
    }
  }
  return undefined;
}

export interface StageRunDependencies {
  readonly generation: GenerationCapability;
  readonly pipeline: PipelineConfig;
  readonly signal: AbortSignal;
  readonly now: () => Date;
}

/**
 * Runs a stage over a bundle.
 *
 * A stage whose output section already exists is skipped. Timeouts, rate
 * limits and transport failures are retryable; everything else is fatal.
 */
export async function runStage(
  stage: StageDescriptor,
  bundle: ContextBundle,
  deps: StageRunDependencies
): Promise<StageOutcome> {
  if (hasSection(bundle, stage.output)) {
    return { kind: 'skipped', bundle };
  }
  const missing = missingInputs(stage, bundle);
  if (missing.length > 0) {
    return {
      kind: 'fatal',
      code: 'INVALID_INPUT',
      message: `${stage.name} is missing input sections: ${missing.join(', ')}`,
    };
  }
  if (deps.signal.aborted) {
    return { kind: 'cancelled' };
  }

  const result = await deps.generation.generate(
    { promptKind: stage.promptKind, context: buildStageContext(stage, bundle, deps.pipeline) },
    deps.signal
  );

  if (!result.success) {
    if (result.error.kind === 'CancelledError' || deps.signal.aborted) {
      return { kind: 'cancelled' };
    }
    if (result.error.retryable) {
      return { kind: 'retryable', error: result.error };
    }
    return { kind: 'fatal', code: 'INVALID_INPUT', message: result.error.message };
  }

  const payload = extractJson(result.response.content);
  if (payload === undefined) {
    return {
      kind: 'fatal',
      code: 'SCHEMA_VIOLATION',
      message: `${stage.name} returned output that is not JSON`,
    };
  }

  let next: ContextBundle;
  try {
    next = appendSection(bundle, stage.name, stage.output, payload, { now: deps.now() });
  } catch (error) {
    if (error instanceof SchemaViolationError) {
      return { kind: 'fatal', code: 'SCHEMA_VIOLATION', message: error.message };
    }
    throw error;
  }

  const problem = crossSectionProblem(next, stage.output);
  if (problem !== undefined) {
    return { kind: 'fatal', code: 'SCHEMA_VIOLATION', message: `${stage.name}: ${problem}` };
  }
  return { kind: 'success', bundle: next };
}
