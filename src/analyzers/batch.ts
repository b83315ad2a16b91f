/**
 * Batch analysis of benchmark records.
 *
 * Runs the repetition detector on each record's response text, compares the
 * expected and produced answers, and tallies how repetition lines up with
 * correctness.
 */

import { isDeepStrictEqual } from 'node:util';
import {
  findInternalRepetition,
  findRepeatingPatterns,
} from './repetition.js';
import { charLength } from '../utils/strings.js';
import type {
  BatchAnalysis,
  EntryAnalysis,
  OverlapPolicy,
  PatternMatch,
  PatternReport,
} from '../types/index.js';

// ── Options ─────────────────────────────────────────────────────────────────

/** Configuration for batch analysis. */
export interface BatchOptions {
  /** Minimum pattern length. Default: 25 */
  minLength?: number;
  /** Minimum number of occurrences. Default: 5 */
  minOccurrences?: number;
  /** Attach atomic-unit decomposition to each pattern. Default: false */
  decompose?: boolean;
  /** Strip whitespace and lowercase before detection. Default: false */
  normalize?: boolean;
  /** Default: `'non-overlapping'` */
  overlapPolicy?: OverlapPolicy;
  /** Record key holding the response text. Default: `response_text` */
  textField?: string;
  /** Record key holding the expected answer. Default: `expected_int` */
  expectedField?: string;
  /** Record key holding the model's answer. Default: `response_int` */
  answerField?: string;
  /** Input path, echoed back in the result. */
  sourceFile?: string;
}

export const DEFAULT_BATCH_OPTIONS: Required<Omit<BatchOptions, 'sourceFile'>> = {
  minLength: 25,
  minOccurrences: 5,
  decompose: false,
  normalize: false,
  overlapPolicy: 'non-overlapping',
  textField: 'response_text',
  expectedField: 'expected_int',
  answerField: 'response_int',
};

// ── Public API ──────────────────────────────────────────────────────────────

/** Remove all whitespace and lowercase the text. */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, '').toLowerCase();
}

/**
 * Analyse every record and return per-entry results plus aggregate counts.
 *
 * Records that are not objects or lack a string text field are listed in
 * `skippedEntries` and still count towards `totalEntries`.
 */
export function analyzeRecords(
  records: readonly unknown[],
  options?: BatchOptions,
): BatchAnalysis {
  const opts = { ...DEFAULT_BATCH_OPTIONS, ...options };

  const analysis: BatchAnalysis = {
    sourceFile: opts.sourceFile,
    totalEntries: records.length,
    entriesWithRepetition: 0,
    correctAnswers: 0,
    incorrectAnswers: 0,
    repetitionByCorrectness: {
      correctWithRepetition: 0,
      incorrectWithRepetition: 0,
    },
    analysisSettings: {
      minLength: opts.minLength,
      minOccurrences: opts.minOccurrences,
      decompose: opts.decompose,
      normalize: opts.normalize,
      overlapPolicy: opts.overlapPolicy,
    },
    entries: [],
    skippedEntries: [],
  };

  records.forEach((record, entryIndex) => {
    if (!isRecord(record)) {
      analysis.skippedEntries.push({ entryIndex, reason: 'entry is not an object' });
      return;
    }

    const rawText = record[opts.textField];
    if (typeof rawText !== 'string') {
      analysis.skippedEntries.push({
        entryIndex,
        reason:
          rawText === undefined
            ? `missing '${opts.textField}' key`
            : `'${opts.textField}' is not a string`,
      });
      return;
    }

    // Correctness
    let isCorrect: boolean | null = null;
    if (opts.expectedField in record && opts.answerField in record) {
      isCorrect = isDeepStrictEqual(record[opts.expectedField], record[opts.answerField]);
      if (isCorrect) analysis.correctAnswers += 1;
      else analysis.incorrectAnswers += 1;
    }

    const text = opts.normalize ? normalizeText(rawText) : rawText;
    const matches = findRepeatingPatterns(text, opts.minLength, opts.minOccurrences, {
      overlapPolicy: opts.overlapPolicy,
    });

    const hasRepetition = matches.length > 0;
    if (hasRepetition) {
      analysis.entriesWithRepetition += 1;
      if (isCorrect === true) analysis.repetitionByCorrectness.correctWithRepetition += 1;
      if (isCorrect === false) analysis.repetitionByCorrectness.incorrectWithRepetition += 1;
    }

    const allPatterns = matches.map((m) => toPatternReport(m, opts.decompose));
    const entry: EntryAnalysis = {
      entryIndex,
      expected: record[opts.expectedField],
      response: record[opts.answerField],
      isCorrect,
      textLength: charLength(text),
      hasRepetition,
      patternsFound: matches.length,
      mostFrequentPattern: allPatterns[0],
      allPatterns,
    };

    analysis.entries.push(entry);
  });

  return analysis;
}

/**
 * Convert a match to its reported form, adding the atomic unit when
 * `decompose` is set and the pattern has one.
 */
export function toPatternReport(match: PatternMatch, decompose: boolean): PatternReport {
  const report: PatternReport = {
    text: match.pattern,
    length: charLength(match.pattern),
    occurrences: match.count,
    positions: match.positions,
  };

  if (decompose) {
    const internal = findInternalRepetition(match.pattern);
    if (internal) {
      report.internalRepetition = {
        atomicUnit: internal.unit,
        unitRepetitions: internal.repetitions,
        isExactRepetition: internal.isExact,
        totalAtomicOccurrences: match.count * internal.repetitions,
      };
    }
  }

  return report;
}

// ── Internal helpers ────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
