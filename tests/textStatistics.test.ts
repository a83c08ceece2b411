import {
  buildAggregateStats,
  countCharacters,
  countSentences,
  countSymbols,
  countSyllables,
  countWords,
  formatStats,
} from '../utils/textStatistics';
import { abbreviationCorrection, abbreviationWeight } from '../utils/abbreviations';
import * as library from '../utils';

describe('Text statistics', () => {
  describe('countSymbols', () => {
    it('should return 0 for empty text', () => {
      expect(countSymbols('')).toBe(0);
    });

    it('should count an ellipsis as one symbol', () => {
      expect(countSymbols('Hello...')).toBe(6);
    });

    it('should only collapse non-overlapping ellipses', () => {
      expect(countSymbols('Wait....')).toBe(6);
    });

    it('should not count newlines', () => {
      expect(countSymbols('ab\ncd')).toBe(4);
    });

    it('should count code points rather than UTF-16 units', () => {
      expect(countSymbols('h\u00e9llo \u{1F642}')).toBe(7);
    });
  });

  describe('countCharacters', () => {
    it('should return 0 for empty text', () => {
      expect(countCharacters('')).toBe(0);
    });

    it('should count only letters and digits', () => {
      expect(countCharacters('Hello, world! 42')).toBe(12);
    });

    it('should classify letters and digits beyond ASCII', () => {
      expect(countCharacters('Ci\u00f2 \u00e8 gi\u00e0 3\u20ac')).toBe(8);
      expect(countCharacters('\u65e5\u672c\u8a9e \u0661\u0662')).toBe(5);
    });
  });

  describe('countWords', () => {
    it('should count whitespace-delimited tokens', () => {
      expect(countWords('')).toBe(0);
      expect(countWords('a b  c')).toBe(3);
      expect(countWords('line1\nline2')).toBe(2);
    });

    it('should treat numbers, contractions and punctuation runs as single words', () => {
      expect(countWords("  don't stop 12.5 ...  ")).toBe(4);
    });

    it('should not add words for blank lines', () => {
      expect(countWords('One.\n\nTwo.')).toBe(2);
    });

    it('should split on Unicode white space only', () => {
      expect(countWords('a\u0085b')).toBe(2);
      expect(countWords('a\u00a0b\u3000c')).toBe(3);
      expect(countWords('a\ufeffb')).toBe(1);
    });
  });

  describe('countSentences', () => {
    it('should return 0 for empty text or text without terminators', () => {
      expect(countSentences('')).toBe(0);
      expect(countSentences('no terminal punctuation')).toBe(0);
    });

    it('should not count the dot of an abbreviation', () => {
      expect(countSentences('Dr. Smith went home.')).toBe(1);
    });

    it('should match abbreviations case-insensitively', () => {
      expect(countSentences('MR. Jones met Mrs. Smith at 5 p.m. today.')).toBe(1);
    });

    it('should prefer the longest abbreviation', () => {
      expect(countSentences('The empire fell in 476 b.c.e. and later.')).toBe(1);
    });

    it('should not treat word endings as abbreviations', () => {
      expect(countSentences('It was the first. Then the second.')).toBe(2);
    });

    it('should count every terminator in repeated punctuation', () => {
      expect(countSentences('Really?! Yes.')).toBe(3);
      expect(countSentences('Wait... what?')).toBe(4);
    });

    it('should treat all abbreviation dots as non-terminating', () => {
      expect(countSentences('He lives in the U.S.')).toBe(0);
    });
  });

  describe('abbreviation table', () => {
    it('should weigh each abbreviation by its dots', () => {
      expect(abbreviationWeight('dr.')).toBe(1);
      expect(abbreviationWeight('U.S.')).toBe(2);
      expect(abbreviationWeight('b.c.e.')).toBe(3);
      expect(abbreviationWeight('etc.')).toBeUndefined();
    });

    it('should only expose the table through lookups', () => {
      expect(Object.keys(library)).not.toContain('abbreviationWeights');
      expect(Object.keys(library)).not.toContain('abbreviationPattern');
    });

    it('should scan every text from its start', () => {
      expect(abbreviationCorrection('Mrs. Brown met Dr. Who and Prof. X at noon.')).toBe(3);
      expect(countSentences('Dr. Smith went home.')).toBe(1);
      expect(countSentences('Dr. Smith went home.')).toBe(1);
      expect(abbreviationCorrection('Dr. X')).toBe(1);
    });

    it('should sum the weights of all occurrences', () => {
      expect(abbreviationCorrection('Dr. Who and dr. No, e.g. twice')).toBe(4);
    });
  });

  describe('countSyllables', () => {
    it.each([
      ['table', 2],
      ['TABLE', 2],
      ['cake', 1],
      ['apple', 2],
      ['whole', 1],
      ['readability', 5],
      ['rhythm', 1],
    ])('should count vowel groups in %s', (word, expected) => {
      expect(countSyllables(word)).toBe(expected);
    });

    it.each([
      ['tables', 3],
      ['bottles', 3],
      ['wanted', 3],
      ['played', 1],
      ['cakes', 3],
      ['boxes', 2],
      ['sees', 1],
    ])('should apply suffix corrections to %s', (word, expected) => {
      expect(countSyllables(word)).toBe(expected);
    });

    it('should never return less than 1', () => {
      expect(countSyllables('')).toBe(1);
      expect(countSyllables('le')).toBe(1);
      expect(countSyllables('the')).toBe(1);
      expect(countSyllables('ed')).toBe(1);
      expect(countSyllables('e')).toBe(1);
      expect(countSyllables('xyz')).toBe(1);
    });
  });

  describe('buildAggregateStats', () => {
    it('should bundle every count for a sentence', () => {
      expect(buildAggregateStats('The cat sat on the mat.')).toEqual({
        symbols: 23,
        characters: 17,
        words: 6,
        sentences: 1,
        syllables: 6,
      });
    });

    it('should handle abbreviations, newlines and ellipses together', () => {
      expect(buildAggregateStats('Dr. Smith went home.\nThe table was ready...')).toEqual({
        symbols: 40,
        characters: 31,
        words: 8,
        sentences: 4,
        syllables: 11,
      });
    });

    it('should count syllables on each token as written', () => {
      expect(countSyllables('home.')).toBe(2);
      expect(buildAggregateStats('Go home.').syllables).toBe(
        countSyllables('Go') + countSyllables('home.'),
      );
      expect(buildAggregateStats('Go home.').syllables).toBe(3);
    });

    it('should return zeros for empty text', () => {
      expect(buildAggregateStats('')).toEqual({
        symbols: 0,
        characters: 0,
        words: 0,
        sentences: 0,
        syllables: 0,
      });
    });

    it('should keep characters within symbols within code points', () => {
      const samples = ['Hello...', 'Dr. Smith went home.', 'a\nb c!', '\u00e9t\u00e9 \u{1F642}?'];
      for (const text of samples) {
        const stats = buildAggregateStats(text);
        expect(stats.characters).toBeLessThanOrEqual(stats.symbols);
        expect(stats.symbols).toBeLessThanOrEqual(Array.from(text).length);
      }
    });

    it('should return the same counts on repeated calls', () => {
      const text = 'Mrs. Brown bakes cakes. They sell fast!';
      expect(buildAggregateStats(text)).toEqual(buildAggregateStats(text));
    });
  });

  describe('formatStats', () => {
    it('should render one label:value line per count', () => {
      const stats = buildAggregateStats('The cat sat on the mat.');
      expect(formatStats(stats)).toBe(
        'Symbols:\t23\nCharacters:\t17\nWords:\t\t6\nSentences:\t1\nSyllables:\t6',
      );
    });
  });
});
