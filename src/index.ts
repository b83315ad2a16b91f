/**
 * Programmatic API.
 */

export {
  discoverRepeatingPatterns,
  findAllOccurrences,
  findInternalRepetition,
  findRepeatingPatterns,
} from './analyzers/repetition.js';
export type { DetectOptions, DiscoveredPattern } from './analyzers/repetition.js';
export {
  analyzeRecords,
  normalizeText,
  toPatternReport,
  DEFAULT_BATCH_OPTIONS,
} from './analyzers/batch.js';
export type { BatchOptions } from './analyzers/batch.js';
export { parseResultsFile, parseResultsJson, ResultsFileError } from './parsers/results.js';
export { formatAnalysisTable } from './formatters/table.js';
export type { SummaryOptions } from './formatters/table.js';
export { formatAnalysisMarkdown } from './formatters/markdown.js';
export { formatAnalysisJson } from './formatters/json.js';
export type * from './types/index.js';
