/**
 * Context bundle handoff protocol.
 *
 * @packageDocumentation
 */

export type {
  Brief,
  BundleSections,
  ContextBundle,
  ConversationHandoff,
  FinalContent,
  HookOption,
  HookOptions,
  LedgerAction,
  LedgerEntry,
  OutlineSection,
  SectionEntry,
  SectionName,
  SectionPayloads,
  StructureOutline,
} from './types.js';
export { SECTION_ORDER } from './types.js';
export { checkSectionPayload, type SchemaCheck } from './schemas.js';
export {
  CONVERSATION_STAGE,
  MAX_SECTION_REVISIONS,
  REVISABLE_SECTIONS,
  appendSection,
  bundleFromSession,
  createBundle,
  crossSectionProblem,
  getPayload,
  getSection,
  hasSection,
  reviseSection,
} from './bundle.js';
