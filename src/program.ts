/**
 * Commander program definition for the llm-repeats CLI.
 */

import { readFileSync } from 'node:fs';
import { Command, InvalidArgumentError, Option } from 'commander';
import { runAnalyze } from './commands/analyze.js';
import { DEFAULT_BATCH_OPTIONS } from './analyzers/batch.js';
import type { OutputFormat } from './types/index.js';

/** Version from package.json (one directory above both `src/` and `dist/`). */
export function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf-8'),
  );
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

// ── Argument parsers ─────────────────────────────────────────────────────────

/** Build a Commander parser for integers no smaller than `min`. */
export function intAtLeast(min: number): (value: string) => number {
  return (value: string) => {
    const n = Number(value);
    if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return n;
  };
}

interface AnalyzeFlags {
  minLength: number;
  minOccurrences: number;
  decompose?: boolean;
  normalize?: boolean;
  overlap?: boolean;
  textField: string;
  expectedField: string;
  answerField: string;
  format: OutputFormat;
  examples: number;
  output?: string;
}

// ── Program ──────────────────────────────────────────────────────────────────

export function createProgram(): Command {
  const program = new Command();

  program
    .name('llm-repeats')
    .description('Detect repetitive generation loops in LLM benchmark results')
    .version(readPackageVersion());

  program
    .command('analyze', { isDefault: true })
    .description('Scan every response in a results file for repeating patterns')
    .argument('<results-file>', 'JSON file with a "results" array')
    .option(
      '--min-length <n>',
      'minimum pattern length to search for',
      intAtLeast(1),
      DEFAULT_BATCH_OPTIONS.minLength,
    )
    .option(
      '--min-occurrences <n>',
      'minimum number of repetitions required',
      intAtLeast(2),
      DEFAULT_BATCH_OPTIONS.minOccurrences,
    )
    .option('--decompose', 'analyze patterns for internal repetition (atomic units)')
    .option('--normalize', 'strip whitespace and lowercase before analysis')
    .option('--overlap', 'count overlapping occurrences')
    .option('--text-field <key>', 'record key holding the response text', DEFAULT_BATCH_OPTIONS.textField)
    .option('--expected-field <key>', 'record key holding the expected answer', DEFAULT_BATCH_OPTIONS.expectedField)
    .option('--answer-field <key>', 'record key holding the model answer', DEFAULT_BATCH_OPTIONS.answerField)
    .addOption(
      new Option('-f, --format <format>', 'summary format')
        .choices(['table', 'json', 'markdown'])
        .default('table'),
    )
    .option('--examples <n>', 'repetitive entries shown in the summary', intAtLeast(0), 3)
    .option('-o, --output <file>', 'output JSON file (default: <input>-repeats.json)')
    .action(async (resultsFile: string, flags: AnalyzeFlags) => {
      await runAnalyze({ resultsFile, ...flags });
    });

  return program;
}
