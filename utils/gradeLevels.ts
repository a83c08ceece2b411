// Age and US grade level for each Automated Readability Index score.
// See https://en.wikipedia.org/wiki/Automated_readability_index

export interface GradeBand {
  readonly age: string;
  readonly grade: string;
}

const ariGradeTable: ReadonlyMap<number, GradeBand> = new Map<number, GradeBand>([
  [1, Object.freeze({ age: '5-6', grade: 'Kindengarden' })],
  [2, Object.freeze({ age: '6-7', grade: 'First Grade' })],
  [3, Object.freeze({ age: '7-8', grade: 'Second Grade' })],
  [4, Object.freeze({ age: '8-9', grade: 'Third Grade' })],
  [5, Object.freeze({ age: '9-10', grade: 'Forth Grade' })],
  [6, Object.freeze({ age: '10-11', grade: 'Fifth Grade' })],
  [7, Object.freeze({ age: '11-12', grade: 'Sixth Grade' })],
  [8, Object.freeze({ age: '12-13', grade: 'Seventh Grade' })],
  [9, Object.freeze({ age: '13-14', grade: 'Eighth Grade' })],
  [10, Object.freeze({ age: '14-15', grade: 'Ninth Grade' })],
  [11, Object.freeze({ age: '15-16', grade: 'Tenth Grade' })],
  [12, Object.freeze({ age: '16-17', grade: 'Eleventh Grade' })],
  [13, Object.freeze({ age: '17-18', grade: 'Twelfth Grade' })],
  [14, Object.freeze({ age: '18-22', grade: 'College student' })],
]);

const MAX_TABLE_SCORE = 14;

export const PROFESSOR_BAND: GradeBand = Object.freeze({ age: '22+', grade: 'Professor level' });
export const UNKNOWN_BAND: GradeBand = Object.freeze({ age: 'Unknown', grade: 'Unknown' });

/**
 * Maps an ARI score to the minimal age and grade expected to read the text.
 * @param score An ARI score.
 * @returns The matching band, the open-ended professor band above the table,
 *   or the unknown band for anything else.
 */
export function convertAriToGrades(score: number): GradeBand {
  if (score > MAX_TABLE_SCORE) {
    return PROFESSOR_BAND;
  }
  return ariGradeTable.get(score) ?? UNKNOWN_BAND;
}
