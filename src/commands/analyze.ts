/**
 * `llm-repeats analyze` command implementation.
 *
 * Orchestrates: results file loading → per-record repetition detection →
 * formatted summary → JSON output file.
 */

import chalk from 'chalk';
import ora from 'ora';
import { analyzeRecords, DEFAULT_BATCH_OPTIONS } from '../analyzers/batch.js';
import { parseResultsFile } from '../parsers/results.js';
import { formatAnalysisTable } from '../formatters/table.js';
import { formatAnalysisJson } from '../formatters/json.js';
import { formatAnalysisMarkdown } from '../formatters/markdown.js';
import {
  fileExists,
  getDefaultOutputPath,
  writeJsonFile,
} from '../utils/file-operations.js';
import type { AnalyzeOptions, BatchAnalysis } from '../types/index.js';

/**
 * Run the `analyze` command.
 *
 * Loads the results file, analyses every record, prints the summary and
 * writes the detailed analysis as JSON.
 *
 * @param options - CLI options parsed by Commander.
 * @returns The batch analysis (also written to the output file).
 */
export async function runAnalyze(options: AnalyzeOptions): Promise<BatchAnalysis> {
  const spinner = ora('Loading results…').start();

  try {
    // 1 ── Verify file exists ────────────────────────────────────────────────
    const filePath = options.resultsFile;
    if (!(await fileExists(filePath))) {
      spinner.fail(`Results file not found: ${filePath}`);
      process.exit(1);
    }

    // 2 ── Load records ──────────────────────────────────────────────────────
    spinner.text = `Reading results from ${filePath}…`;
    const records = await parseResultsFile(filePath);

    // 3 ── Detect repetition ─────────────────────────────────────────────────
    spinner.text = `Analyzing ${records.length} entries for repetition…`;
    const analysis = analyzeRecords(records, {
      minLength: options.minLength ?? DEFAULT_BATCH_OPTIONS.minLength,
      minOccurrences: options.minOccurrences ?? DEFAULT_BATCH_OPTIONS.minOccurrences,
      decompose: options.decompose ?? false,
      normalize: options.normalize ?? false,
      overlapPolicy: options.overlap ? 'overlapping' : 'non-overlapping',
      textField: options.textField ?? DEFAULT_BATCH_OPTIONS.textField,
      expectedField: options.expectedField ?? DEFAULT_BATCH_OPTIONS.expectedField,
      answerField: options.answerField ?? DEFAULT_BATCH_OPTIONS.answerField,
      sourceFile: filePath,
    });

    spinner.succeed('Analysis complete!');

    for (const skipped of analysis.skippedEntries) {
      console.error(chalk.yellow(`Warning: Entry ${skipped.entryIndex} skipped: ${skipped.reason}`));
    }
    console.log('');

    // 4 ── Formatted output ──────────────────────────────────────────────────
    const summaryOptions = { examples: options.examples };
    switch (options.format) {
      case 'json':
        console.log(formatAnalysisJson(analysis));
        break;
      case 'markdown':
        console.log(formatAnalysisMarkdown(analysis, summaryOptions));
        break;
      default:
        console.log(formatAnalysisTable(analysis, summaryOptions));
        break;
    }

    // 5 ── Detailed JSON results ─────────────────────────────────────────────
    const outputPath = options.output ?? getDefaultOutputPath(filePath);
    await writeJsonFile(outputPath, analysis);
    console.log('');
    console.log(chalk.green(`Detailed results saved to: ${outputPath}`));

    return analysis;
  } catch (error) {
    spinner.fail('Analysis failed');
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`\nError: ${message}`));
    process.exit(1);
  }
}
