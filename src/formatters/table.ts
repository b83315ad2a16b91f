/**
 * Terminal summary formatter for the analyze command.
 *
 * Uses chalk for colours, boxen for the bordered header.
 */

import chalk from 'chalk';
import boxen from 'boxen';
import type { BatchAnalysis, EntryAnalysis } from '../types/index.js';
import { formatValue, percent, pluralize, preview } from '../utils/strings.js';

/** Options for the summary formatters. */
export interface SummaryOptions {
  /** Number of repetitive entries to show. Default: 3 */
  examples?: number;
  /** Preview length for the most frequent pattern. Default: 150 */
  previewLength?: number;
}

/**
 * Format a batch analysis as a styled terminal summary.
 *
 * @returns A multi-line string ready for `console.log`.
 */
export function formatAnalysisTable(
  analysis: BatchAnalysis,
  options?: SummaryOptions,
): string {
  const examples = options?.examples ?? 3;
  const previewLength = options?.previewLength ?? 150;
  const settings = analysis.analysisSettings;
  const output: string[] = [];

  // ── Header box ─────────────────────────────────────────────────────────────
  const title = chalk.bold.cyan('LLM REPEATS - Repetition Analysis');
  const divider = chalk.dim('─'.repeat(45));
  const stats: string[] = [];
  if (analysis.sourceFile) {
    stats.push(`${chalk.bold('Results file:')} ${analysis.sourceFile}`);
  }
  stats.push(`${chalk.bold('Total entries:')} ${analysis.totalEntries.toLocaleString()}`);
  stats.push(
    `${chalk.bold('Entries with repetition:')} ${analysis.entriesWithRepetition.toLocaleString()}`,
  );
  stats.push(
    `${chalk.bold('Thresholds:')} length >= ${settings.minLength}, occurrences >= ${settings.minOccurrences}`,
  );

  const flags = [
    settings.decompose ? 'decompose' : null,
    settings.normalize ? 'normalize' : null,
    settings.overlapPolicy === 'overlapping' ? 'overlapping' : null,
  ].filter((f): f is string => f !== null);
  if (flags.length > 0) {
    stats.push(`${chalk.bold('Modes:')} ${flags.join(', ')}`);
  }

  output.push(
    boxen(`${title}\n${divider}\n${stats.join('\n')}`, {
      padding: 1,
      borderStyle: 'round',
      borderColor: 'cyan',
    }),
  );

  // ── Correctness ────────────────────────────────────────────────────────────
  const correct = analysis.correctAnswers;
  const incorrect = analysis.incorrectAnswers;
  const withAnswers = correct + incorrect;

  if (withAnswers > 0) {
    output.push('');
    output.push(chalk.bold('CORRECTNESS'));
    output.push(`  Entries with answer comparison: ${withAnswers}`);
    output.push(`  Correct answers: ${correct} (${percent(correct, withAnswers)})`);
    output.push(`  Incorrect answers: ${incorrect} (${percent(incorrect, withAnswers)})`);

    const { correctWithRepetition, incorrectWithRepetition } =
      analysis.repetitionByCorrectness;
    output.push('');
    output.push(chalk.bold('REPETITION VS CORRECTNESS'));
    if (correct > 0) {
      output.push(
        `  Correct answers with repetition: ${correctWithRepetition}/${correct} (${percent(correctWithRepetition, correct)})`,
      );
    }
    if (incorrect > 0) {
      output.push(
        `  Incorrect answers with repetition: ${incorrectWithRepetition}/${incorrect} (${percent(incorrectWithRepetition, incorrect)})`,
      );
    }
  }

  output.push('');

  if (analysis.entriesWithRepetition === 0) {
    output.push(chalk.green('No repetitive patterns found!'));
    return output.join('\n');
  }

  output.push(
    `Overall repetition rate: ${chalk.yellow(percent(analysis.entriesWithRepetition, analysis.totalEntries))}`,
  );

  // ── Examples ───────────────────────────────────────────────────────────────
  const repetitive = analysis.entries.filter((e) => e.hasRepetition);
  output.push('');
  output.push(chalk.bold('EXAMPLES OF REPETITIVE ENTRIES'));

  for (const entry of repetitive.slice(0, examples)) {
    output.push('');
    output.push(...formatEntry(entry, previewLength));
  }

  if (repetitive.length > examples) {
    output.push('');
    output.push(
      chalk.dim(
        `... and ${pluralize(repetitive.length - examples, 'more entry', 'more entries')} with repetition`,
      ),
    );
  }

  return output.join('\n');
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function formatEntry(entry: EntryAnalysis, previewLength: number): string[] {
  const lines: string[] = [chalk.bold(`Entry ${entry.entryIndex}:`)];

  if (entry.isCorrect !== null) {
    const status = entry.isCorrect ? chalk.green('✓ Correct') : chalk.red('✗ Incorrect');
    lines.push(
      `  Answer: ${status} (expected: ${formatValue(entry.expected)}, got: ${formatValue(entry.response)})`,
    );
  }
  lines.push(`  Text length: ${entry.textLength} characters`);
  lines.push(`  Patterns found: ${entry.patternsFound}`);

  const top = entry.mostFrequentPattern;
  if (top) {
    lines.push(`  Most frequent pattern: ${top.length} chars, ${top.occurrences} times`);

    const internal = top.internalRepetition;
    if (internal) {
      const exactness = internal.isExactRepetition ? 'exact' : 'partial';
      lines.push(
        `  → Atomic unit: '${internal.atomicUnit}' × ${internal.unitRepetitions.toFixed(1)} (${exactness})`,
      );
      lines.push(
        `  → Total atomic occurrences: ${internal.totalAtomicOccurrences.toFixed(1)}`,
      );
    }

    lines.push(`  Preview: ${chalk.dim(`'${preview(top.text, previewLength)}'`)}`);
  }

  return lines;
}
