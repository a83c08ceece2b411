// Abbreviations whose dots would otherwise be read as sentence terminators.
// The weight is the number of dots the abbreviation carries; all of them are
// treated as non-terminating.

const ABBREVIATIONS = [
  'u.s.',

  'mr.',
  'messrs.',
  'mrs.',
  'mmes.',
  'ms.',
  'dr.',
  'prof.',
  'capt.',
  'st.',
  'revd.',
  'rev.',

  'jan.',
  'feb.',
  'mar.',
  'apr.',
  'aug.',
  'sept.',
  'oct.',
  'nov.',
  'dec.',

  'a.m.',
  'p.m.',
  'i.e.',
  'e.g.',
  'a.d.',
  'b.c.',
  'b.c.e.',
  'c.e.',
  'n.b.',
] as const;

const countDots = (abbreviation: string): number => abbreviation.split('.').length - 1;

const abbreviationWeights: ReadonlyMap<string, number> = new Map(
  ABBREVIATIONS.map((abbreviation) => [abbreviation, countDots(abbreviation)] as const),
);

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Longest first so that "b.c.e." wins over "b.c.".
const alternation = [...abbreviationWeights.keys()]
  .sort((a, b) => b.length - a.length)
  .map(escapeRegExp)
  .join('|');

// An abbreviation must not be glued to a preceding letter, digit or dot
// ("first." must not count as "st.").
const ABBREVIATION_SOURCE = `(?<![\\p{L}\\p{Nd}.])(?:${alternation})`;

/**
 * Number of dots the abbreviation carries, or undefined when it is not a
 * known abbreviation. Lookup is case-insensitive.
 */
export function abbreviationWeight(abbreviation: string): number | undefined {
  return abbreviationWeights.get(abbreviation.toLowerCase());
}

/**
 * Total weight of all abbreviation occurrences in the text.
 * @param text The text to scan.
 * @returns The number of dots that belong to abbreviations.
 */
export function abbreviationCorrection(text: string): number {
  // A fresh global regex per scan; lastIndex is never shared between calls.
  const pattern = new RegExp(ABBREVIATION_SOURCE, 'giu');
  let correction = 0;
  for (const match of text.matchAll(pattern)) {
    correction += abbreviationWeight(match[0]) ?? 0;
  }
  return correction;
}
