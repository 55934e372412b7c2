/**
 * Context bundle types.
 *
 * A bundle is the immutable, versioned record handed from the conversation to
 * the pipeline and from each pipeline stage to the next.
 *
 * @packageDocumentation
 */

import type { CompletionReason, Speaker } from '../conversation/types.js';
import type { FocusArea } from '../conversation/focus-areas.js';
import type { StyleProfile } from '../style/types.js';

/**
 * Named sections of a bundle.
 */
export type SectionName =
  | 'conversation'
  | 'styleProfile'
  | 'brief'
  | 'hookOptions'
  | 'structureOutline'
  | 'finalContent';

/**
 * Sections in the order they are produced. Revising a section clears every
 * section after it.
 */
export const SECTION_ORDER: readonly SectionName[] = [
  'conversation',
  'styleProfile',
  'brief',
  'hookOptions',
  'structureOutline',
  'finalContent',
] as const;

/**
 * Transcript handed over by a completed session.
 */
export interface ConversationHandoff {
  readonly sessionId: string;
  readonly initialIdea: string;
  readonly turns: readonly { readonly speaker: Speaker; readonly text: string }[];
  readonly coveredFocusAreas: readonly FocusArea[];
  readonly completionReason: CompletionReason;
}

export interface Brief {
  readonly topic: string;
  readonly audience: string;
  /** At least one. */
  readonly keyMessages: readonly string[];
  readonly researchNotes: readonly string[];
  readonly personalStory?: string;
  readonly hookPreference?: string;
}

export interface HookOption {
  readonly text: string;
  /** e.g. "question", "bold claim", "story". */
  readonly style: string;
  readonly rationale?: string;
}

export interface HookOptions {
  /** One to five candidates. */
  readonly options: readonly HookOption[];
}

export interface OutlineSection {
  readonly heading: string;
  readonly purpose: string;
  readonly points: readonly string[];
}

export interface StructureOutline {
  /** e.g. "story", "listicle". */
  readonly format: string;
  /** Index into the hook options. */
  readonly selectedHookIndex: number;
  readonly sections: readonly OutlineSection[];
  readonly callToAction?: string;
}

export interface FinalContent {
  readonly post: string;
  readonly hashtags?: readonly string[];
}

/**
 * Payload type of each section.
 */
export interface SectionPayloads {
  conversation: ConversationHandoff;
  styleProfile: StyleProfile;
  brief: Brief;
  hookOptions: HookOptions;
  structureOutline: StructureOutline;
  finalContent: FinalContent;
}

/**
 * A written section and its provenance.
 */
export interface SectionEntry<K extends SectionName = SectionName> {
  readonly payload: SectionPayloads[K];
  /** Stage that produced the current payload. */
  readonly stage: string;
  /** ISO 8601. */
  readonly producedAt: string;
  /** Bundle version that introduced the current payload. */
  readonly version: number;
  /** Conversation turn the payload derives from, when it does. */
  readonly turnIndex?: number;
  /** 0 until revised. */
  readonly revision: number;
  /** Earlier payloads, oldest first. */
  readonly history: readonly SectionPayloads[K][];
}

/**
 * Sections present in a bundle.
 */
export type BundleSections = { readonly [K in SectionName]?: SectionEntry<K> };

export type LedgerAction = 'append' | 'revise' | 'clear';

/**
 * One change to a bundle.
 */
export interface LedgerEntry {
  readonly sequence: number;
  readonly action: LedgerAction;
  readonly section: SectionName;
  readonly stage: string;
  /** Bundle version after the change. */
  readonly version: number;
  /** ISO 8601. */
  readonly at: string;
}

/**
 * Versioned context handed between stages.
 */
export interface ContextBundle {
  readonly id: string;
  /** 0 when empty, +1 per append or revision. */
  readonly version: number;
  /** Session the bundle was built from, if any. */
  readonly sessionId?: string;
  readonly sections: BundleSections;
  /** Append-only. */
  readonly ledger: readonly LedgerEntry[];
  /** ISO 8601. */
  readonly createdAt: string;
  /** ISO 8601. */
  readonly updatedAt: string;
}
