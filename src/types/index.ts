/**
 * Shared type definitions for llm-repeats.
 */

// ── Detection ───────────────────────────────────────────────────────────────

/**
 * How occurrences of a candidate substring are counted.
 *
 * `non-overlapping` advances past each hit, so occurrences never share a
 * character. `overlapping` advances by one character and inflates counts for
 * periodic text.
 */
export type OverlapPolicy = 'non-overlapping' | 'overlapping';

/**
 * A maximal repeating substring found at one starting offset.
 * Offsets and lengths count code points.
 */
export interface PatternMatch {
  /** The repeated substring. */
  pattern: string;
  /** Number of occurrences found (equals `positions.length`). */
  count: number;
  /** Strictly increasing code-point offsets of each occurrence. */
  positions: number[];
}

/** The smallest repeating unit a pattern is built from. */
export interface AtomicDecomposition {
  unit: string;
  /** Pattern length over unit length, in code points; fractional when the last copy is partial. */
  repetitions: number;
  isExact: boolean;
}

// ── Batch analysis ──────────────────────────────────────────────────────────

/** Decomposition details attached to a reported pattern. */
export interface InternalRepetition {
  atomicUnit: string;
  unitRepetitions: number;
  isExactRepetition: boolean;
  /** `occurrences × unitRepetitions`, kept fractional. */
  totalAtomicOccurrences: number;
}

/** Serialised form of a {@link PatternMatch}. */
export interface PatternReport {
  text: string;
  length: number;
  occurrences: number;
  positions: number[];
  internalRepetition?: InternalRepetition;
}

/** Analysis of a single benchmark record. */
export interface EntryAnalysis {
  entryIndex: number;
  expected?: unknown;
  response?: unknown;
  /** `null` when the record lacks either answer field. */
  isCorrect: boolean | null;
  /** Code-point length of the analysed (possibly normalised) text. */
  textLength: number;
  hasRepetition: boolean;
  patternsFound: number;
  mostFrequentPattern?: PatternReport;
  allPatterns: PatternReport[];
}

/** A record that could not be analysed. */
export interface SkippedEntry {
  entryIndex: number;
  reason: string;
}

/** Settings echoed back in the analysis output. */
export interface AnalysisSettings {
  minLength: number;
  minOccurrences: number;
  decompose: boolean;
  normalize: boolean;
  overlapPolicy: OverlapPolicy;
}

/** Aggregate result of analysing a batch of records. */
export interface BatchAnalysis {
  sourceFile?: string;
  totalEntries: number;
  entriesWithRepetition: number;
  correctAnswers: number;
  incorrectAnswers: number;
  repetitionByCorrectness: {
    correctWithRepetition: number;
    incorrectWithRepetition: number;
  };
  analysisSettings: AnalysisSettings;
  entries: EntryAnalysis[];
  skippedEntries: SkippedEntry[];
}

// ── CLI options ─────────────────────────────────────────────────────────────

/** Output format for the printed summary. */
export type OutputFormat = 'table' | 'json' | 'markdown';

/** Options for the `analyze` command (parsed by Commander). */
export interface AnalyzeOptions {
  /** Path to the results JSON file. */
  resultsFile: string;
  minLength?: number;
  minOccurrences?: number;
  decompose?: boolean;
  normalize?: boolean;
  /** Count overlapping occurrences instead of non-overlapping ones. */
  overlap?: boolean;
  textField?: string;
  expectedField?: string;
  answerField?: string;
  format?: OutputFormat;
  /** Number of repetitive entries shown in the summary. Default: 3 */
  examples?: number;
  /** JSON output path. Default: `<stem>-repeats<ext>` beside the input. */
  output?: string;
}
