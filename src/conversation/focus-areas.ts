/**
 * Focus areas the brainstorming dialogue must probe, and keyword-based
 * detection of which ones a reply touches.
 *
 * @packageDocumentation
 */

import { isStringArray, readDataFile } from '../utils/data-files.js';

/**
 * Topics of the dialogue. {@link FOCUS_AREAS} lists them in priority order.
 */
export type FocusArea =
  | 'HookPreference'
  | 'AudienceAndPainPoints'
  | 'UniqueAngle'
  | 'KeyMessage'
  | 'PersonalStory'
  | 'SupportingData'
  | 'StylePreference';

/**
 * All focus areas, highest priority first.
 */
export const FOCUS_AREAS: readonly FocusArea[] = [
  'HookPreference',
  'AudienceAndPainPoints',
  'UniqueAngle',
  'KeyMessage',
  'PersonalStory',
  'SupportingData',
  'StylePreference',
] as const;

/**
 * Checks if a string is a FocusArea.
 */
export function isFocusArea(value: unknown): value is FocusArea {
  return typeof value === 'string' && FOCUS_AREAS.some((area) => area === value);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Builds the matcher for one keyword. Keywords starting with a letter or digit
 * must start at a word boundary and match as a prefix ("frustrat" matches
 * "frustrated"); others match anywhere.
 */
function keywordPattern(keyword: string): RegExp {
  const escaped = escapeRegExp(keyword.toLowerCase());
  return /^[\p{L}\p{N}]/u.test(keyword)
    ? new RegExp(`(?<![\\p{L}\\p{N}])${escaped}`, 'u')
    : new RegExp(escaped, 'u');
}

function loadKeywords(): ReadonlyMap<FocusArea, readonly RegExp[]> {
  const raw = readDataFile('focus-areas.json');
  if (typeof raw !== 'object' || raw === null) {
    throw new Error('data/focus-areas.json must hold an object keyed by focus area');
  }
  const entries = new Map<FocusArea, readonly RegExp[]>();
  for (const area of FOCUS_AREAS) {
    const keywords: unknown = Object.entries(raw).find(([key]) => key === area)?.[1];
    if (!isStringArray(keywords)) {
      throw new Error(`data/focus-areas.json is missing keywords for ${area}`);
    }
    entries.set(area, keywords.map(keywordPattern));
  }
  return entries;
}

const KEYWORDS = loadKeywords();

/**
 * Finds the focus areas a text touches, in priority order.
 *
 * @param text - A user reply.
 * @returns Matching areas, highest priority first.
 */
export function detectFocusAreas(text: string): FocusArea[] {
  const lower = text.replace(/[‘’]/g, "'").toLowerCase();
  return FOCUS_AREAS.filter((area) =>
    (KEYWORDS.get(area) ?? []).some((pattern) => pattern.test(lower))
  );
}

/**
 * Focus areas not yet covered, highest priority first.
 */
export function uncoveredFocusAreas(covered: readonly FocusArea[]): FocusArea[] {
  return FOCUS_AREAS.filter((area) => !covered.includes(area));
}

/**
 * Adds newly covered areas, keeping priority order and no duplicates.
 */
export function addCoverage(
  covered: readonly FocusArea[],
  added: readonly FocusArea[]
): FocusArea[] {
  return FOCUS_AREAS.filter((area) => covered.includes(area) || added.includes(area));
}
