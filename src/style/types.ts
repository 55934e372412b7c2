/**
 * Style profile types.
 *
 * @packageDocumentation
 */

/**
 * How the user lays out enumerations.
 */
export type ListFormat = 'prose' | 'bullets' | 'numbered';

/**
 * All list formats; the order breaks ties when picking a preference.
 */
export const LIST_FORMATS: readonly ListFormat[] = ['prose', 'bullets', 'numbered'] as const;

/**
 * A phrase and how often it was seen.
 */
export interface PhraseCount {
  readonly phrase: string;
  readonly count: number;
}

/**
 * Style features of a single utterance.
 */
export interface StyleSignal {
  /** 0 for empty or one-word text, which must not move the profile. */
  readonly weight: 0 | 1;
  readonly wordCount: number;
  readonly sentenceCount: number;
  /** Words per sentence. */
  readonly avgSentenceLength: number;
  /** Exclamation runs per sentence. */
  readonly exclamationDensity: number;
  /** Ellipses per sentence. */
  readonly ellipsisDensity: number;
  /** Question mark runs per sentence. */
  readonly questionDensity: number;
  /** Emoji per word. */
  readonly emojiRate: number;
  /** Share of sentences that start with a lowercase letter. */
  readonly lowercaseRate: number;
  /** 0 formal to 1 casual. */
  readonly casualness: number;
  readonly listFormat: ListFormat;
  /** Most frequent short phrases, count desc then phrase asc. */
  readonly phrases: readonly PhraseCount[];
}

/**
 * Running summary of a user's voice.
 */
export interface StyleProfile {
  /** 0 formal to 1 casual. */
  readonly tone: number;
  readonly avgSentenceLength: number;
  readonly exclamationDensity: number;
  readonly ellipsisDensity: number;
  readonly questionDensity: number;
  readonly emojiFrequency: number;
  readonly lowercaseTendency: number;
  /** Top-K phrases, count desc then phrase asc. */
  readonly characteristicPhrases: readonly PhraseCount[];
  readonly listFormatCounts: Readonly<Record<ListFormat, number>>;
  readonly listPreference: ListFormat;
  /** Informative utterances merged so far. */
  readonly samples: number;
}

/**
 * Parameters of {@link merge}.
 */
export interface MergeOptions {
  /** Upper bound of the moving-average divisor. */
  readonly emaCap: number;
  /** Phrases kept in the profile. */
  readonly phraseTopK: number;
}
