import { countCharacters, countSentences, countWords } from './textStatistics';
import { convertAriToGrades, GradeBand } from './gradeLevels';

export type ReadabilityErrorCode = 'EMPTY_INPUT' | 'NO_WORDS' | 'NO_SENTENCES';

export class ReadabilityError extends Error {
  readonly code: ReadabilityErrorCode;

  constructor(code: ReadabilityErrorCode, message: string) {
    super(message);
    this.name = 'ReadabilityError';
    this.code = code;
  }
}

export type ReadabilityResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ReadabilityError };

export type Language = 'en' | 'it';

export type FormulaId = 'coleman-liau' | 'ari' | 'gulpease';

export interface ReadabilityFormula {
  id: FormulaId;
  name: string;
  language: Language;
  compute(text: string): ReadabilityResult<number>;
}

interface FormulaInputs {
  characters: number;
  words: number;
  sentences: number;
}

const success = <T>(value: T): ReadabilityResult<T> => ({ ok: true, value });

const failure = <T>(code: ReadabilityErrorCode, message: string): ReadabilityResult<T> => ({
  ok: false,
  error: new ReadabilityError(code, message),
});

// Half values round away from zero; never returns -0.
function roundHalfAway(value: number): number {
  const rounded = Math.sign(value) * Math.round(Math.abs(value));
  return rounded === 0 ? 0 : rounded;
}

function countInputs(text: string): FormulaInputs {
  return {
    characters: countCharacters(text),
    words: countWords(text),
    sentences: countSentences(text),
  };
}

/**
 * Coleman–Liau index, rounded to one decimal place.
 * See https://en.wikipedia.org/wiki/Coleman%E2%80%93Liau_index
 */
export function calculateCli(text: string): ReadabilityResult<number> {
  if (text.length === 0) {
    return failure('EMPTY_INPUT', 'Empty string.');
  }

  const { characters, words, sentences } = countInputs(text);
  if (words === 0) {
    return failure('NO_WORDS', 'No words were parsed. Cannot calculate CLI.');
  }

  const cli = 5.88 * (characters / words) - 29.6 * (sentences / words) - 15.8;
  return success(roundHalfAway(cli * 10) / 10);
}

/**
 * Automated readability index. The text needs at least one word and one
 * sentence; the score is always rounded up.
 * @param text The text to score.
 * @returns The ARI score, or the reason it could not be computed.
 */
export function calculateAri(text: string): ReadabilityResult<number> {
  if (text.length === 0) {
    return failure('EMPTY_INPUT', 'Empty string.');
  }

  const { characters, words, sentences } = countInputs(text);
  if (words === 0) {
    return failure('NO_WORDS', 'No words were parsed. Cannot calculate ARI.');
  }
  if (sentences === 0) {
    return failure('NO_SENTENCES', 'No sentences were parsed. Cannot calculate ARI.');
  }

  const ari = 4.71 * (characters / words) + 0.5 * (words / sentences) - 21.43;
  return success(Math.ceil(ari));
}

/**
 * ARI score together with its age and grade band.
 */
export function calculateAriGrade(text: string): ReadabilityResult<{ score: number } & GradeBand> {
  const result = calculateAri(text);
  if (!result.ok) return result;
  return success({ score: result.value, ...convertAriToGrades(result.value) });
}

/**
 * Gulpease index for Italian texts, rounded to the nearest whole number.
 * A number counts as a word, so "18." is a valid input.
 * See https://it.wikipedia.org/wiki/Indice_Gulpease
 */
export function calculateGulpease(text: string): ReadabilityResult<number> {
  if (text.length === 0) {
    return failure('EMPTY_INPUT', 'Empty string.');
  }

  const { characters, words, sentences } = countInputs(text);
  if (words === 0) {
    return failure('NO_WORDS', 'No words were parsed. Cannot calculate Gulpease readability index.');
  }

  const gulpease = 89 + (300 * sentences - 10 * characters) / words;
  return success(roundHalfAway(gulpease));
}

export const readabilityFormulas: Readonly<Record<FormulaId, ReadabilityFormula>> = {
  'coleman-liau': {
    id: 'coleman-liau',
    name: 'Coleman–Liau Index',
    language: 'en',
    compute: calculateCli,
  },
  ari: {
    id: 'ari',
    name: 'Automated Readability Index',
    language: 'en',
    compute: calculateAri,
  },
  gulpease: {
    id: 'gulpease',
    name: 'Gulpease Index',
    language: 'it',
    compute: calculateGulpease,
  },
};

export const FORMULA_IDS: readonly FormulaId[] = ['coleman-liau', 'ari', 'gulpease'];
export const LANGUAGES: readonly Language[] = ['en', 'it'];

export function isFormulaId(value: string): value is FormulaId {
  return FORMULA_IDS.some((id) => id === value);
}

export function isLanguage(value: string): value is Language {
  return LANGUAGES.some((language) => language === value);
}

export function formulasForLanguage(language: Language): ReadabilityFormula[] {
  return FORMULA_IDS.map((id) => readabilityFormulas[id]).filter(
    (formula) => formula.language === language,
  );
}
