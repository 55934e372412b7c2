/**
 * Context bundle operations.
 *
 * Bundles are never mutated: every append or revision returns a new bundle
 * with a higher version and a new ledger entry. A section is written once;
 * only {@link REVISABLE_SECTIONS} may be revised, at most
 * {@link MAX_SECTION_REVISIONS} times, and only while the run waits for
 * approval.
 *
 * @packageDocumentation
 */

import { InvalidTransitionError, SchemaViolationError, VoicecraftError } from '../errors.js';
import type { Session } from '../conversation/types.js';
import type { RunState } from '../pipeline/types.js';
import { checkSectionPayload } from './schemas.js';
import type {
  BundleSections,
  ContextBundle,
  ConversationHandoff,
  LedgerAction,
  LedgerEntry,
  SectionEntry,
  SectionName,
  SectionPayloads,
} from './types.js';
import { SECTION_ORDER } from './types.js';

/** Sections a reviewer may revise. */
export const REVISABLE_SECTIONS: ReadonlySet<SectionName> = new Set<SectionName>(['structureOutline']);

/** Revisions allowed per revisable section. */
export const MAX_SECTION_REVISIONS = 1;

/** Stage name recorded for sections written by the conversation. */
export const CONVERSATION_STAGE = 'Conversation';

type MutableSections = { -readonly [K in SectionName]?: SectionEntry<K> };

/**
 * Creates an empty bundle.
 */
export function createBundle(id: string, options: { now: Date; sessionId?: string | undefined }): ContextBundle {
  const at = options.now.toISOString();
  return {
    id,
    version: 0,
    ...(options.sessionId !== undefined ? { sessionId: options.sessionId } : {}),
    sections: {},
    ledger: [],
    createdAt: at,
    updatedAt: at,
  };
}

/**
 * Reads a section entry.
 */
export function getSection<K extends SectionName>(
  bundle: ContextBundle,
  section: K
): SectionEntry<K> | undefined {
  const sections: BundleSections = bundle.sections;
  return sections[section];
}

/**
 * Reads a section payload.
 */
export function getPayload<K extends SectionName>(
  bundle: ContextBundle,
  section: K
): SectionPayloads[K] | undefined {
  return getSection(bundle, section)?.payload;
}

export function hasSection(bundle: ContextBundle, section: SectionName): boolean {
  return getSection(bundle, section) !== undefined;
}

function withSection<K extends SectionName>(
  sections: BundleSections,
  section: K,
  entry: SectionEntry<K>
): BundleSections {
  const next: MutableSections = { ...sections, [section]: entry };
  return next;
}

function ledgerEntry(
  bundle: ContextBundle,
  offset: number,
  action: LedgerAction,
  section: SectionName,
  stage: string,
  version: number,
  at: string
): LedgerEntry {
  return { sequence: bundle.ledger.length + offset, action, section, stage, version, at };
}

function validated<K extends SectionName>(
  bundle: ContextBundle,
  section: K,
  payload: unknown
): SectionPayloads[K] {
  const check = checkSectionPayload(section, payload);
  if (!check.valid) {
    const detail = check.issues
      .map((issue) => `${issue.path === '' ? '(root)' : issue.path} ${issue.message}`)
      .join('; ');
    throw new SchemaViolationError(`Invalid '${section}' payload: ${detail}`, {
      section,
      issues: check.issues,
      entityId: bundle.id,
      snapshot: bundle,
    });
  }
  return check.payload;
}

/**
 * Checks constraints between sections that the schemas cannot express,
 * after `section` was written.
 *
 * @returns The first problem found, or undefined.
 */
export function crossSectionProblem(bundle: ContextBundle, section: SectionName): string | undefined {
  if (section !== 'structureOutline') {
    return undefined;
  }
  const outline = getPayload(bundle, 'structureOutline');
  const hooks = getPayload(bundle, 'hookOptions');
  if (outline !== undefined && hooks !== undefined && outline.selectedHookIndex >= hooks.options.length) {
    return `selectedHookIndex ${String(outline.selectedHookIndex)} is out of range for ${String(hooks.options.length)} hook options`;
  }
  return undefined;
}

/**
 * Adds a section written by a stage.
 *
 * @param bundle - Current bundle.
 * @param stageName - Producing stage.
 * @param section - Target section.
 * @param payload - Candidate payload, checked against the section schema.
 * @param options - Clock and the originating conversation turn.
 * @returns A new bundle with version + 1.
 * @throws SchemaViolationError if the payload does not satisfy the schema.
 * @throws VoicecraftError SECTION_EXISTS (code SCHEMA_VIOLATION) if the
 *   section is already written.
 */
export function appendSection<K extends SectionName>(
  bundle: ContextBundle,
  stageName: string,
  section: K,
  payload: unknown,
  options: { now: Date; turnIndex?: number | undefined }
): ContextBundle {
  if (hasSection(bundle, section)) {
    throw new SchemaViolationError(`SECTION_EXISTS: section '${section}' is already written`, {
      section,
      issues: [{ path: '', message: 'SECTION_EXISTS' }],
      entityId: bundle.id,
      snapshot: bundle,
    });
  }
  const typed = validated(bundle, section, payload);
  const version = bundle.version + 1;
  const at = options.now.toISOString();

  const entry: SectionEntry<K> = {
    payload: typed,
    stage: stageName,
    producedAt: at,
    version,
    ...(options.turnIndex !== undefined ? { turnIndex: options.turnIndex } : {}),
    revision: 0,
    history: [],
  };

  return {
    ...bundle,
    version,
    sections: withSection(bundle.sections, section, entry),
    ledger: [...bundle.ledger, ledgerEntry(bundle, 0, 'append', section, stageName, version, at)],
    updatedAt: at,
  };
}

/**
 * Replaces the payload of a revisable section and clears every section
 * written after it.
 *
 * @throws InvalidTransitionError if the section is not revisable, was never
 *   written, was already revised, or the run is not awaiting approval.
 * @throws SchemaViolationError if the payload does not satisfy the schema or
 *   conflicts with an earlier section.
 */
export function reviseSection<K extends SectionName>(
  bundle: ContextBundle,
  stageName: string,
  section: K,
  payload: unknown,
  options: { runState: RunState; now: Date }
): ContextBundle {
  const reject = (reason: string): InvalidTransitionError =>
    new InvalidTransitionError(`Cannot revise '${section}': ${reason}`, {
      fromState: options.runState,
      operation: 'reviseSection',
      entityId: bundle.id,
      snapshot: bundle,
    });

  if (!REVISABLE_SECTIONS.has(section)) {
    throw reject('section is not revisable');
  }
  if (options.runState !== 'AwaitingUserApproval') {
    throw reject(`run is ${options.runState}`);
  }
  const current = getSection(bundle, section);
  if (current === undefined) {
    throw reject('section was never written');
  }
  if (current.revision >= MAX_SECTION_REVISIONS) {
    throw reject('revision limit reached');
  }

  const typed = validated(bundle, section, payload);
  const version = bundle.version + 1;
  const at = options.now.toISOString();

  const cleared = SECTION_ORDER.slice(SECTION_ORDER.indexOf(section) + 1).filter((name) =>
    hasSection(bundle, name)
  );
  const remaining: MutableSections = { ...bundle.sections };
  for (const name of cleared) {
    delete remaining[name];
  }

  const entry: SectionEntry<K> = {
    ...current,
    payload: typed,
    stage: stageName,
    producedAt: at,
    version,
    revision: current.revision + 1,
    history: [...current.history, current.payload],
  };

  const revised: ContextBundle = {
    ...bundle,
    version,
    sections: withSection(remaining, section, entry),
    ledger: [
      ...bundle.ledger,
      ...cleared.map((name, i) => ledgerEntry(bundle, i, 'clear', name, stageName, version, at)),
      ledgerEntry(bundle, cleared.length, 'revise', section, stageName, version, at),
    ],
    updatedAt: at,
  };
  const problem = crossSectionProblem(revised, section);
  if (problem !== undefined) {
    throw new SchemaViolationError(`Invalid '${section}' payload: ${problem}`, {
      section,
      issues: [{ path: '', message: problem }],
      entityId: bundle.id,
      snapshot: bundle,
    });
  }
  return revised;
}

/**
 * Builds the handoff bundle of a completed session: its transcript and its
 * style profile.
 *
 * @throws InvalidTransitionError if the session is not Completed.
 */
export function bundleFromSession(session: Session, options: { id: string; now: Date }): ContextBundle {
  if (session.state !== 'Completed' || session.completionReason === undefined) {
    throw new InvalidTransitionError(
      `Cannot hand off session '${session.id}': it is ${session.state}`,
      { fromState: session.state, operation: 'handoff', entityId: session.id, snapshot: session }
    );
  }
  const lastTurn = session.turns.at(-1);
  if (lastTurn === undefined) {
    throw new VoicecraftError(`Session '${session.id}' has no turns`, 'INVALID_INPUT', {
      entityId: session.id,
    });
  }

  const handoff: ConversationHandoff = {
    sessionId: session.id,
    initialIdea: session.initialIdea,
    turns: session.turns.map(({ speaker, text }) => ({ speaker, text })),
    coveredFocusAreas: session.coveredFocusAreas,
    completionReason: session.completionReason,
  };

  const empty = createBundle(options.id, { now: options.now, sessionId: session.id });
  const withConversation = appendSection(empty, CONVERSATION_STAGE, 'conversation', handoff, {
    now: options.now,
    turnIndex: lastTurn.index,
  });
  return appendSection(withConversation, CONVERSATION_STAGE, 'styleProfile', session.styleProfile, {
    now: options.now,
    turnIndex: lastTurn.index,
  });
}
