/**
 * Style profile extraction and merging.
 *
 * @packageDocumentation
 */

export type { ListFormat, MergeOptions, PhraseCount, StyleProfile, StyleSignal } from './types.js';
export { LIST_FORMATS } from './types.js';
export {
  PHRASES_PER_UTTERANCE,
  createEmptyProfile,
  extract,
  merge,
  rankPhrases,
} from './extractor.js';
