/**
 * Shape checks for records read back from the file store.
 *
 * @packageDocumentation
 */

import { checkSectionPayload } from '../bundle/schemas.js';
import type { ContextBundle } from '../bundle/types.js';
import { SECTION_ORDER } from '../bundle/types.js';
import type { Session, SessionState } from '../conversation/types.js';
import { SESSION_STATES } from '../conversation/types.js';
import { VoicecraftError } from '../errors.js';
import type { PipelineRun, RunState } from '../pipeline/types.js';

const RUN_STATES: readonly RunState[] = [
  'Running',
  'AwaitingUserApproval',
  'Succeeded',
  'Failed',
  'Aborted',
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(kind: string, field: string): VoicecraftError {
  return new VoicecraftError(`Stored ${kind} has an invalid '${field}' field`, 'SCHEMA_VIOLATION');
}

function isSessionState(value: unknown): value is SessionState {
  return typeof value === 'string' && SESSION_STATES.some((state) => state === value);
}

function isRunState(value: unknown): value is RunState {
  return typeof value === 'string' && RUN_STATES.some((state) => state === value);
}

function isTurn(value: unknown): boolean {
  return (
    isRecord(value) &&
    typeof value.index === 'number' &&
    (value.speaker === 'assistant' || value.speaker === 'user') &&
    typeof value.text === 'string' &&
    typeof value.timestamp === 'string'
  );
}

function assertSession(value: unknown): asserts value is Session {
  if (!isRecord(value)) {
    throw new VoicecraftError('Stored session is not an object', 'SCHEMA_VIOLATION');
  }
  for (const field of ['id', 'initialIdea', 'createdAt', 'updatedAt'] as const) {
    if (typeof value[field] !== 'string') {
      throw invalid('session', field);
    }
  }
  if (!isSessionState(value.state)) {
    throw invalid('session', 'state');
  }
  if (!Array.isArray(value.turns) || !value.turns.every(isTurn)) {
    throw invalid('session', 'turns');
  }
  if (!Array.isArray(value.coveredFocusAreas) || !Array.isArray(value.transitions)) {
    throw invalid('session', Array.isArray(value.transitions) ? 'coveredFocusAreas' : 'transitions');
  }
  if (!checkSectionPayload('styleProfile', value.styleProfile).valid) {
    throw invalid('session', 'styleProfile');
  }
}

function assertBundle(value: unknown): asserts value is ContextBundle {
  if (!isRecord(value)) {
    throw invalid('run', 'bundle');
  }
  if (typeof value.id !== 'string' || typeof value.version !== 'number') {
    throw invalid('bundle', typeof value.id === 'string' ? 'version' : 'id');
  }
  if (!Array.isArray(value.ledger)) {
    throw invalid('bundle', 'ledger');
  }
  const sections = value.sections;
  if (!isRecord(sections)) {
    throw invalid('bundle', 'sections');
  }
  for (const section of SECTION_ORDER) {
    const entry = sections[section];
    if (entry === undefined) {
      continue;
    }
    if (!isRecord(entry) || !checkSectionPayload(section, entry.payload).valid) {
      throw invalid('bundle', `sections.${section}`);
    }
  }
}

function assertRun(value: unknown): asserts value is PipelineRun {
  if (!isRecord(value)) {
    throw new VoicecraftError('Stored run is not an object', 'SCHEMA_VIOLATION');
  }
  for (const field of ['id', 'createdAt', 'updatedAt'] as const) {
    if (typeof value[field] !== 'string') {
      throw invalid('run', field);
    }
  }
  if (!isRunState(value.state)) {
    throw invalid('run', 'state');
  }
  if (typeof value.nextStageIndex !== 'number' || typeof value.structureRevisions !== 'number') {
    throw invalid('run', typeof value.nextStageIndex === 'number' ? 'structureRevisions' : 'nextStageIndex');
  }
  if (!Array.isArray(value.attempts)) {
    throw invalid('run', 'attempts');
  }
  assertBundle(value.bundle);
}

/**
 * Reads a stored session, rejecting records of the wrong shape.
 */
export function parseSessionRecord(raw: unknown): Session {
  assertSession(raw);
  return raw;
}

/**
 * Reads a stored pipeline run. Every section payload of its bundle is
 * checked against the section schema.
 */
export function parseRunRecord(raw: unknown): PipelineRun {
  assertRun(raw);
  return raw;
}
