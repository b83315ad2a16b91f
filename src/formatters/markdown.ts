/**
 * Markdown formatter for analysis results.
 *
 * Used by `analyze --format markdown`.
 */

import type { BatchAnalysis } from '../types/index.js';
import type { SummaryOptions } from './table.js';
import { formatValue, percent, preview } from '../utils/strings.js';

/**
 * Format a batch analysis as a Markdown document.
 */
export function formatAnalysisMarkdown(
  analysis: BatchAnalysis,
  options?: SummaryOptions,
): string {
  const lines: string[] = [];
  const examples = options?.examples ?? 3;
  const previewLength = options?.previewLength ?? 150;
  const settings = analysis.analysisSettings;

  lines.push('# LLM Repeats - Repetition Analysis');
  lines.push('');
  if (analysis.sourceFile) {
    lines.push(`**Results File:** \`${analysis.sourceFile}\`  `);
  }
  lines.push(`**Total Entries:** ${analysis.totalEntries.toLocaleString()}  `);
  lines.push(`**Entries With Repetition:** ${analysis.entriesWithRepetition.toLocaleString()}  `);
  lines.push(
    `**Thresholds:** length >= ${settings.minLength}, occurrences >= ${settings.minOccurrences}`,
  );
  lines.push('');
  lines.push('---');
  lines.push('');

  // ── Correctness ───────────────────────────────────────────────────────
  const correct = analysis.correctAnswers;
  const incorrect = analysis.incorrectAnswers;
  const withAnswers = correct + incorrect;

  if (withAnswers > 0) {
    const { correctWithRepetition, incorrectWithRepetition } =
      analysis.repetitionByCorrectness;

    lines.push('## Repetition vs Correctness');
    lines.push('');
    lines.push('| Answer | Entries | With Repetition | Rate |');
    lines.push('|--------|---------|-----------------|------|');
    lines.push(
      `| Correct | ${correct} | ${correctWithRepetition} | ${percent(correctWithRepetition, correct)} |`,
    );
    lines.push(
      `| Incorrect | ${incorrect} | ${incorrectWithRepetition} | ${percent(incorrectWithRepetition, incorrect)} |`,
    );
    lines.push('');
    lines.push('---');
    lines.push('');
  }

  // ── Repetitive entries ────────────────────────────────────────────────
  lines.push('## Repetitive Entries');
  lines.push('');

  const repetitive = analysis.entries.filter((e) => e.hasRepetition);
  if (repetitive.length === 0) {
    lines.push('_No repetitive patterns found._');
  } else {
    lines.push(
      `**Overall Repetition Rate:** ${percent(analysis.entriesWithRepetition, analysis.totalEntries)}`,
    );
    lines.push('');
    lines.push('| Entry | Answer | Patterns | Top Length | Top Count | Atomic Unit | Preview |');
    lines.push('|-------|--------|----------|------------|-----------|-------------|---------|');

    for (const entry of repetitive.slice(0, examples)) {
      const top = entry.mostFrequentPattern;
      const answer =
        entry.isCorrect === null
          ? 'n/a'
          : `${entry.isCorrect ? 'Correct' : 'Incorrect'} (${escapeMarkdown(formatValue(entry.response))})`;
      const unit = top?.internalRepetition
        ? `\`${escapeMarkdown(top.internalRepetition.atomicUnit)}\``
        : '-';
      lines.push(
        `| ${entry.entryIndex} | ${answer} | ${entry.patternsFound} | ${top?.length ?? 0} | ${top?.occurrences ?? 0} | ${unit} | \`${escapeMarkdown(preview(top?.text ?? '', previewLength))}\` |`,
      );
    }

    if (repetitive.length > examples) {
      lines.push('');
      lines.push(`_... and ${repetitive.length - examples} more with repetition._`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Escape pipe characters, backticks, and line breaks inside markdown table cells. */
function escapeMarkdown(s: string): string {
  return s.replace(/\|/g, '\\|').replace(/`/g, '\\`').replace(/\r?\n|\r/g, ' ');
}
