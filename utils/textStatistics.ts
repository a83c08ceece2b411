import { abbreviationCorrection } from './abbreviations';

export interface AggregateStats {
  symbols: number;
  characters: number;
  words: number;
  sentences: number;
  syllables: number;
}

const VOWELS = new Set(['a', 'e', 'i', 'o', 'u', 'y']);
const LETTER_OR_DIGIT = /[\p{L}\p{Nd}]/u;
const LETTER = /\p{L}/u;
// Unicode White_Space: ASCII controls, NEL and the separator categories.
// Unlike \s, U+0085 splits words and U+FEFF does not.
const WHITESPACE = /[\t\n\v\f\r\u0085\p{Z}]+/u;

const occurrences = (text: string, needle: string): number => text.split(needle).length - 1;

const isVowel = (char: string | undefined): boolean => char !== undefined && VOWELS.has(char);

const isConsonant = (char: string | undefined): boolean =>
  char !== undefined && LETTER.test(char) && !VOWELS.has(char);

/**
 * Counts symbols: every code point except newlines, with "..." counted once.
 * Ellipses inside other punctuation ("[...]", "?...") are not special-cased.
 * @param text The text to measure.
 * @returns The symbol count.
 */
export function countSymbols(text: string): number {
  if (!text) return 0;

  const codePoints = Array.from(text).length;
  const newLines = occurrences(text, '\n');
  const ellipses = occurrences(text, '...');
  return codePoints - newLines - 2 * ellipses;
}

/**
 * Counts letters and decimal digits in any script.
 */
export function countCharacters(text: string): number {
  if (!text) return 0;

  let characters = 0;
  for (const char of text) {
    if (LETTER_OR_DIGIT.test(char)) characters++;
  }
  return characters;
}

function tokenize(text: string): string[] {
  return text.replace(/\n/g, ' ').split(WHITESPACE).filter(Boolean);
}

/**
 * Counts whitespace-delimited tokens. Numbers, contractions and possessives
 * are one word each.
 */
export function countWords(text: string): number {
  if (!text) return 0;
  return tokenize(text).length;
}

/**
 * Counts sentence terminators ('.', '!', '?') minus the dots that belong to
 * known abbreviations.
 *
 * Repeated punctuation ("?!", "...") is not collapsed, decimals such as "10.5"
 * count their dot, and a terminator does not need to be followed by whitespace.
 * @param text The text to measure.
 * @returns The sentence count, never negative.
 */
export function countSentences(text: string): number {
  if (!text) return 0;

  let terminators = 0;
  for (const char of text) {
    if (char === '.' || char === '!' || char === '?') terminators++;
  }
  return Math.max(0, terminators - abbreviationCorrection(text));
}

/**
 * A heuristic syllable counter for English words: vowel groups, a silent
 * trailing 'e' and a few suffix corrections. Always returns at least 1.
 * @param word A single word.
 * @returns The estimated number of syllables.
 */
export function countSyllables(word: string): number {
  const w = word.toLowerCase();
  const chars = Array.from(w);
  const length = chars.length;

  let syllables = 0;
  let previousWasVowel = false;
  for (const char of chars) {
    const vowel = isVowel(char);
    if (vowel && !previousWasVowel) syllables++;
    previousWasVowel = vowel;
  }

  if (w.endsWith('e')) syllables--;

  if (length > 2) {
    const before = (suffixLength: number): string | undefined => chars[length - suffixLength - 1];

    if (w.endsWith('les') || w.endsWith('le')) {
      if (isConsonant(before(w.endsWith('les') ? 3 : 2))) syllables++;
    } else if (w.endsWith('ed')) {
      const char = before(2);
      if (char === 't') syllables++;
      else if (isVowel(char)) syllables--;
    } else if (w.endsWith('es')) {
      const char = before(2);
      if (isConsonant(char) && char !== 'w' && char !== 'x' && char !== 'y') syllables++;
    }
  }

  return Math.max(1, syllables);
}

/**
 * Runs every counting primitive once over the text. Syllables are counted
 * per whitespace token as written, punctuation included.
 * @param text The text to measure.
 * @returns All five counts.
 */
export function buildAggregateStats(text: string): AggregateStats {
  const syllables = tokenize(text).reduce((total, token) => total + countSyllables(token), 0);

  return {
    symbols: countSymbols(text),
    characters: countCharacters(text),
    words: countWords(text),
    sentences: countSentences(text),
    syllables,
  };
}

const STAT_LABELS: ReadonlyArray<[keyof AggregateStats, string]> = [
  ['symbols', 'Symbols:\t'],
  ['characters', 'Characters:\t'],
  ['words', 'Words:\t\t'],
  ['sentences', 'Sentences:\t'],
  ['syllables', 'Syllables:\t'],
];

/**
 * Renders the stats as label:value lines.
 */
export function formatStats(stats: AggregateStats): string {
  return STAT_LABELS.map(([key, label]) => `${label}${stats[key]}`).join('\n');
}
