/**
 * Spoken-text normalization.
 * Rewrites a recognized fragment into the literal characters the user meant to type.
 */

interface Correction {
  spoken: string;
  written: string;
  /** Attach to the previous token instead of standing alone (file extensions). */
  glue?: boolean;
}

/**
 * Known speech-recognition confusions. Applied longest spoken form first, so
 * multi-word corrections win over the single words they contain.
 */
const PHONETIC_CORRECTIONS: Correction[] = [
  { spoken: 'clause', written: 'claude' },
  { spoken: 'clawed', written: 'claude' },
  { spoken: 'cloud code', written: 'claude code' },
  { spoken: 'file name', written: 'filename' },
  { spoken: 'dot py', written: '.py', glue: true },
  { spoken: 'dot js', written: '.js', glue: true },
  { spoken: 'dot ts', written: '.ts', glue: true },
  { spoken: 'dot json', written: '.json', glue: true },
  { spoken: 'dot md', written: '.md', glue: true },
];

const NUMBER_WORDS: Record<string, string> = {
  one: '1',
  two: '2',
  three: '3',
  four: '4',
  five: '5',
};

const FILLER_WORDS = ['um', 'uh', 'erm', 'uhm'];

// A token starts after whitespace (or at the start) and may be followed by trailing punctuation.
const TOKEN_START = '(?<=^|\\s)';
const TOKEN_END = '(?=$|\\s|[.,!?;:"\'])';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phrasePattern(spoken: string): string {
  return spoken.split(' ').map(escapeRegExp).join('\\s+');
}

const correctionRules = [...PHONETIC_CORRECTIONS]
  .sort((a, b) => b.spoken.length - a.spoken.length)
  .map((correction) => ({
    pattern: correction.glue
      ? new RegExp(`\\s*${TOKEN_START}${phrasePattern(correction.spoken)}${TOKEN_END}`, 'gi')
      : new RegExp(`${TOKEN_START}${phrasePattern(correction.spoken)}${TOKEN_END}`, 'gi'),
    written: correction.written,
  }));

const numberPattern = new RegExp(
  `${TOKEN_START}(${Object.keys(NUMBER_WORDS).join('|')})${TOKEN_END}`,
  'gi'
);

const fillerPattern = new RegExp(`${TOKEN_START}(?:${FILLER_WORDS.join('|')})[,.]?(?=$|\\s)`, 'gi');

/**
 * Normalizes a raw transcribed fragment.
 *
 * Drops filler tokens, applies phonetic corrections, converts the number words
 * one..five to digits and collapses whitespace. Text that is not rewritten keeps
 * its original case. Pure, total and idempotent.
 */
export function normalize(raw: string): string {
  // Fillers go first so that removing one never joins the words of a correction.
  let text = raw.replace(fillerPattern, '');

  for (const rule of correctionRules) {
    text = text.replace(rule.pattern, rule.written);
  }

  text = text.replace(numberPattern, (word: string) => NUMBER_WORDS[word.toLowerCase()] ?? word);

  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Phonetic corrections in the order they are applied, for `voxkey grammar`.
 */
export function listCorrections(): ReadonlyArray<Readonly<Correction>> {
  return [...PHONETIC_CORRECTIONS].sort((a, b) => b.spoken.length - a.spoken.length);
}
