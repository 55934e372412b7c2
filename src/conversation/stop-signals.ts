/**
 * Detection of replies asking to end the brainstorming.
 *
 * A reply is a stop instruction only when, once courtesy words around it
 * are dropped, nothing but a stop phrase is left. A phrase inside a longer
 * answer ("I had to move on and rebuild") is content, not an instruction.
 *
 * @packageDocumentation
 */

/**
 * Phrases that end the dialogue when they make up the whole reply.
 */
export const STOP_PHRASES: readonly string[] = [
  "let's proceed",
  "let's proceed to the next step",
  'proceed to the next step',
  'proceed',
  "let's move on",
  'move on',
  'next step',
  "that's enough",
  "that's all",
  'that is all',
  "that's it",
  'stop asking',
  'stop asking questions',
  "we're done",
  "i'm done",
  'enough questions',
  'no more questions',
  'write the post',
  "let's write the post",
  'go ahead and write the post',
];

/**
 * Commands that end the dialogue when they make up the whole reply.
 */
export const STOP_COMMANDS: readonly string[] = ['/done', '/stop'];

const LEADING_COURTESY = new Set([
  'ok',
  'okay',
  'alright',
  'right',
  'great',
  'cool',
  'fine',
  'yes',
  'yeah',
  'so',
  'now',
  'please',
  'thanks',
  'well',
]);

// Longer suffixes first.
const TRAILING_COURTESY: readonly (readonly string[])[] = [
  ['thank', 'you'],
  ['for', 'now'],
  ['please'],
  ['thanks'],
  ['now'],
  ['then'],
];

function toWords(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/['‘’]/g, '')
    .replace(/[^a-z0-9\s]/g, ' ')
    .split(/\s+/)
    .filter((word) => word !== '');
}

const NORMALIZED_PHRASES = new Set(STOP_PHRASES.map((phrase) => toWords(phrase).join(' ')));

function endsWith(words: readonly string[], suffix: readonly string[]): boolean {
  return (
    words.length > suffix.length &&
    suffix.every((word, i) => words[words.length - suffix.length + i] === word)
  );
}

function withoutCourtesy(words: readonly string[]): string[] {
  let start = 0;
  while (start < words.length - 1 && LEADING_COURTESY.has(words[start] ?? '')) {
    start += 1;
  }
  const core = words.slice(start);
  for (;;) {
    const suffix = TRAILING_COURTESY.find((candidate) => endsWith(core, candidate));
    if (suffix === undefined) {
      return core;
    }
    core.splice(core.length - suffix.length, suffix.length);
  }
}

/**
 * Whether a reply asks to stop the questions.
 *
 * @param text - A user reply.
 */
export function isStopSignal(text: string): boolean {
  if (STOP_COMMANDS.includes(text.trim().toLowerCase())) {
    return true;
  }
  return NORMALIZED_PHRASES.has(withoutCourtesy(toWords(text)).join(' '));
}
