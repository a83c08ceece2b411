import * as readability from '../utils';

describe('Library entry point', () => {
  it('should expose the counting primitives and formulas together', () => {
    const text = 'Dr. Smith went home.';

    expect(readability.countSentences(text)).toBe(1);
    expect(readability.buildAggregateStats(text).words).toBe(4);
    expect(readability.convertAriToGrades(20)).toBe(readability.PROFESSOR_BAND);
    expect(readability.calculateGulpease('').ok).toBe(false);
  });
});
