/**
 * Incremental style inference.
 *
 * {@link extract} turns one utterance into a {@link StyleSignal};
 * {@link merge} folds a signal into the running {@link StyleProfile} with a
 * capped moving average. Both are pure, so replaying the same turns always
 * yields the same profile.
 *
 * @packageDocumentation
 */

import { isStringArray, readDataFile } from '../utils/data-files.js';
import type {
  ListFormat,
  MergeOptions,
  PhraseCount,
  StyleProfile,
  StyleSignal,
} from './types.js';
import { LIST_FORMATS } from './types.js';

interface Lexicon {
  readonly fillers: readonly string[];
  readonly slang: readonly string[];
  readonly stopwords: ReadonlySet<string>;
}

function loadLexicon(): Lexicon {
  const raw = readDataFile('style-lexicon.json');
  if (
    typeof raw !== 'object' ||
    raw === null ||
    !('fillers' in raw) ||
    !isStringArray(raw.fillers) ||
    !('slang' in raw) ||
    !isStringArray(raw.slang) ||
    !('stopwords' in raw) ||
    !isStringArray(raw.stopwords)
  ) {
    throw new Error('data/style-lexicon.json must hold string arrays fillers, slang and stopwords');
  }
  return { fillers: raw.fillers, slang: raw.slang, stopwords: new Set(raw.stopwords) };
}

const LEXICON = loadLexicon();

/** Phrases kept per utterance. */
export const PHRASES_PER_UTTERANCE = 10;

const WORD_PATTERN = /[\p{L}\p{N}][\p{L}\p{N}'-]*/gu;
const SENTENCE_SPLIT = /[.!?…]+|\n+/u;
const EMOJI_PATTERN = /\p{Extended_Pictographic}/gu;
const CONTRACTION_PATTERN = /\b\p{L}+'(?:s|re|ve|ll|d|t|m)\b/giu;
const BULLET_LINE = /^\s*[-*•]\s+/u;
const NUMBERED_LINE = /^\s*\d+[.)]\s+/u;

function normalizeApostrophes(text: string): string {
  return text.replace(/[‘’]/g, "'");
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

/**
 * Counts whole-word occurrences of a term (single word or phrase).
 */
function countTerm(lowerText: string, term: string): number {
  return countMatches(lowerText, new RegExp(`(?<![\\p{L}\\p{N}'])${escapeRegExp(term)}(?![\\p{L}\\p{N}'])`, 'gu'));
}

function detectListFormat(text: string): ListFormat {
  const lines = text.split('\n');
  const bullets = lines.filter((line) => BULLET_LINE.test(line)).length;
  const numbered = lines.filter((line) => NUMBERED_LINE.test(line)).length;
  if (bullets >= 2 && bullets >= numbered) {
    return 'bullets';
  }
  if (numbered >= 2) {
    return 'numbered';
  }
  return 'prose';
}

/**
 * Sorts phrase counts by count desc then phrase asc.
 */
export function rankPhrases(phrases: Iterable<PhraseCount>): PhraseCount[] {
  return [...phrases].sort((a, b) =>
    b.count !== a.count ? b.count - a.count : a.phrase < b.phrase ? -1 : a.phrase > b.phrase ? 1 : 0
  );
}

function extractPhrases(sentences: readonly string[], lowerText: string): PhraseCount[] {
  const counts = new Map<string, number>();
  const add = (phrase: string, by: number): void => {
    counts.set(phrase, (counts.get(phrase) ?? 0) + by);
  };

  for (const sentence of sentences) {
    const tokens = sentence.toLowerCase().match(WORD_PATTERN) ?? [];
    for (const size of [2, 3]) {
      for (let start = 0; start + size <= tokens.length; start++) {
        const gram = tokens.slice(start, start + size);
        const first = gram[0];
        const last = gram[gram.length - 1];
        if (
          first === undefined ||
          last === undefined ||
          LEXICON.stopwords.has(first) ||
          LEXICON.stopwords.has(last)
        ) {
          continue;
        }
        add(gram.join(' '), 1);
      }
    }
  }

  for (const filler of LEXICON.fillers) {
    const hits = countTerm(lowerText, filler);
    if (hits > 0) {
      add(filler, hits);
    }
  }

  return rankPhrases(
    [...counts].map(([phrase, count]) => ({ phrase, count }))
  ).slice(0, PHRASES_PER_UTTERANCE);
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

const DEGENERATE_SIGNAL: StyleSignal = {
  weight: 0,
  wordCount: 0,
  sentenceCount: 0,
  avgSentenceLength: 0,
  exclamationDensity: 0,
  ellipsisDensity: 0,
  questionDensity: 0,
  emojiRate: 0,
  lowercaseRate: 0,
  casualness: 0,
  listFormat: 'prose',
  phrases: [],
};

/**
 * Extracts the style features of one utterance.
 *
 * Empty and one-word text yields a zero-weight signal.
 *
 * @param text - The user's reply.
 * @returns The style signal.
 */
export function extract(text: string): StyleSignal {
  const normalized = normalizeApostrophes(text);
  const words = normalized.match(WORD_PATTERN) ?? [];
  if (words.length < 2) {
    return { ...DEGENERATE_SIGNAL, wordCount: words.length };
  }

  const sentences = normalized
    .split(SENTENCE_SPLIT)
    .map((sentence) => sentence.trim())
    .filter((sentence) => /[\p{L}\p{N}]/u.test(sentence));
  const sentenceCount = Math.max(1, sentences.length);
  const lowerText = normalized.toLowerCase();

  const startsWithLetter = sentences
    .map((sentence) => sentence.replace(/^[^\p{L}]+/u, ''))
    .filter((sentence) => sentence !== '');
  const lowercaseStarts = startsWithLetter.filter((sentence) => /^\p{Ll}/u.test(sentence)).length;
  const lowercaseRate = startsWithLetter.length > 0 ? lowercaseStarts / startsWithLetter.length : 0;

  const emojiCount = countMatches(normalized, EMOJI_PATTERN);
  const contractions = countMatches(normalized, CONTRACTION_PATTERN);
  const fillers = LEXICON.fillers.reduce((sum, term) => sum + countTerm(lowerText, term), 0);
  const slang = LEXICON.slang.reduce((sum, term) => sum + countTerm(lowerText, term), 0);
  const informalRate = (contractions + fillers + slang + emojiCount) / words.length;

  return {
    weight: 1,
    wordCount: words.length,
    sentenceCount,
    avgSentenceLength: words.length / sentenceCount,
    exclamationDensity: countMatches(normalized, /!+/g) / sentenceCount,
    ellipsisDensity: countMatches(normalized, /…|\.{3,}/g) / sentenceCount,
    questionDensity: countMatches(normalized, /\?+/g) / sentenceCount,
    emojiRate: emojiCount / words.length,
    lowercaseRate,
    casualness: clamp01(0.7 * Math.min(1, informalRate * 4) + 0.3 * lowercaseRate),
    listFormat: detectListFormat(normalized),
    phrases: extractPhrases(sentences, lowerText),
  };
}

/**
 * The profile before any informative utterance.
 */
export function createEmptyProfile(): StyleProfile {
  return {
    tone: 0.5,
    avgSentenceLength: 0,
    exclamationDensity: 0,
    ellipsisDensity: 0,
    questionDensity: 0,
    emojiFrequency: 0,
    lowercaseTendency: 0,
    characteristicPhrases: [],
    listFormatCounts: { prose: 0, bullets: 0, numbered: 0 },
    listPreference: 'prose',
    samples: 0,
  };
}

function preferredFormat(counts: Readonly<Record<ListFormat, number>>): ListFormat {
  let best: ListFormat = 'prose';
  for (const format of LIST_FORMATS) {
    if (counts[format] > counts[best]) {
      best = format;
    }
  }
  return best;
}

/**
 * Folds a signal into a profile.
 *
 * Scalars move by `(signal - old) / min(turnIndex, emaCap)`; phrase and list
 * counts are added, then phrases are re-ranked and cut to `phraseTopK`.
 * A zero-weight signal returns the prior unchanged.
 *
 * @param prior - Current profile.
 * @param signal - Features of the new utterance.
 * @param turnIndex - 1-based index of this informative sample.
 * @param options - Moving-average cap and phrase limit.
 * @returns A new profile.
 */
export function merge(
  prior: StyleProfile,
  signal: StyleSignal,
  turnIndex: number,
  options: MergeOptions
): StyleProfile {
  if (signal.weight === 0) {
    return prior;
  }

  const divisor = Math.min(Math.max(1, turnIndex), options.emaCap);
  const step = (old: number, next: number): number => old + (next - old) / divisor;

  const phraseCounts = new Map(prior.characteristicPhrases.map((p) => [p.phrase, p.count]));
  for (const { phrase, count } of signal.phrases) {
    phraseCounts.set(phrase, (phraseCounts.get(phrase) ?? 0) + count);
  }

  const listFormatCounts = {
    ...prior.listFormatCounts,
    [signal.listFormat]: prior.listFormatCounts[signal.listFormat] + 1,
  };

  return {
    tone: step(prior.tone, signal.casualness),
    avgSentenceLength: step(prior.avgSentenceLength, signal.avgSentenceLength),
    exclamationDensity: step(prior.exclamationDensity, signal.exclamationDensity),
    ellipsisDensity: step(prior.ellipsisDensity, signal.ellipsisDensity),
    questionDensity: step(prior.questionDensity, signal.questionDensity),
    emojiFrequency: step(prior.emojiFrequency, signal.emojiRate),
    lowercaseTendency: step(prior.lowercaseTendency, signal.lowercaseRate),
    characteristicPhrases: rankPhrases(
      [...phraseCounts].map(([phrase, count]) => ({ phrase, count }))
    ).slice(0, options.phraseTopK),
    listFormatCounts,
    listPreference: preferredFormat(listFormatCounts),
    samples: prior.samples + 1,
  };
}
