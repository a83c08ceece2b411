import { AggregateStats, buildAggregateStats } from '../../utils/textStatistics';
import { convertAriToGrades, GradeBand } from '../../utils/gradeLevels';
import {
  FormulaId,
  formulasForLanguage,
  Language,
  ReadabilityErrorCode,
  ReadabilityFormula,
  readabilityFormulas,
} from '../../utils/readability';

export interface ReportOptions {
  language?: Language;
  formulas?: FormulaId[];
}

export type FormulaScore =
  | {
      formula: FormulaId;
      name: string;
      score: number;
      grade?: GradeBand;
    }
  | {
      formula: FormulaId;
      name: string;
      error: {
        code: ReadabilityErrorCode;
        message: string;
      };
    };

export interface ReadabilityReport {
  stats: AggregateStats;
  language: Language;
  scores: FormulaScore[];
}

function scoreFormula(formula: ReadabilityFormula, text: string): FormulaScore {
  const result = formula.compute(text);
  if (!result.ok) {
    return {
      formula: formula.id,
      name: formula.name,
      error: { code: result.error.code, message: result.error.message },
    };
  }

  return {
    formula: formula.id,
    name: formula.name,
    score: result.value,
    ...(formula.id === 'ari' && { grade: convertAriToGrades(result.value) }),
  };
}

/**
 * Computes the aggregate stats and every requested readability score for a text.
 * Formula failures are reported per score; this never throws for bad text.
 * @param text The text to analyze.
 * @param options Language (default 'en') and an explicit formula list that
 *   overrides the language's default set.
 */
export function buildReadabilityReport(text: string, options: ReportOptions = {}): ReadabilityReport {
  const language = options.language ?? 'en';
  const formulas =
    options.formulas && options.formulas.length > 0
      ? options.formulas.map((id) => readabilityFormulas[id])
      : formulasForLanguage(language);

  return {
    stats: buildAggregateStats(text),
    language,
    scores: formulas.map((formula) => scoreFormula(formula, text)),
  };
}
