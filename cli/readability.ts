#!/usr/bin/env node
import fs from 'fs';
import chalk from 'chalk';
import { buildReadabilityReport, FormulaScore } from '../server/services/readabilityReport';
import { formatStats } from '../utils/textStatistics';
import { isLanguage, Language } from '../utils/readability';

const USAGE = 'Usage: readability [--lang en|it] [--stats] [file]';

export interface CliOptions {
  language: Language;
  showStats: boolean;
  file?: string;
}

export type ParsedArgs = { ok: true; options: CliOptions } | { ok: false; message: string };

export function parseArgs(argv: string[]): ParsedArgs {
  const options: CliOptions = { language: 'en', showStats: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--stats') {
      options.showStats = true;
    } else if (arg === '--lang') {
      const value = argv[++i];
      if (value === undefined || !isLanguage(value)) {
        return { ok: false, message: `--lang expects one of: en, it` };
      }
      options.language = value;
    } else if (arg.startsWith('-')) {
      return { ok: false, message: `Unknown option: ${arg}` };
    } else if (options.file === undefined) {
      options.file = arg;
    } else {
      return { ok: false, message: `Unexpected argument: ${arg}` };
    }
  }

  return { ok: true, options };
}

export function formatScore(score: FormulaScore): string {
  if ('error' in score) {
    return chalk.red(`${score.name}: ${score.error.message}`);
  }
  const grade = score.grade ? ` (age ${score.grade.age}, ${score.grade.grade})` : '';
  return `${chalk.bold(score.name)}: ${score.score}${grade}`;
}

/**
 * Renders the report for a text and returns the exit code:
 * 0 when every formula succeeded, 1 otherwise.
 */
export function renderReport(text: string, options: CliOptions, write: (line: string) => void): number {
  const report = buildReadabilityReport(text, { language: options.language });

  if (options.showStats) {
    write(formatStats(report.stats));
  }
  for (const score of report.scores) {
    write(formatScore(score));
  }

  return report.scores.every((score) => !('error' in score)) ? 0 : 1;
}

function readInput(file: string | undefined): string {
  // File descriptor 0 is stdin
  return fs.readFileSync(file ?? 0, 'utf8');
}

export function main(argv: string[]): number {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    console.error(chalk.red(parsed.message));
    console.error(USAGE);
    return 2;
  }

  let text: string;
  try {
    text = readInput(parsed.options.file);
  } catch (error: unknown) {
    console.error(chalk.red(`Cannot read input: ${error instanceof Error ? error.message : String(error)}`));
    return 2;
  }

  return renderReport(text, parsed.options, (line) => console.log(line));
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
