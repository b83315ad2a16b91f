/**
 * JSON formatter for the analyze command.
 *
 * Serialises the BatchAnalysis to pretty-printed JSON for piping
 * or downstream consumption by other tools.
 */

import type { BatchAnalysis } from '../types/index.js';

/**
 * Format a batch analysis as pretty-printed JSON.
 *
 * @returns A JSON string (2-space indented).
 */
export function formatAnalysisJson(analysis: BatchAnalysis): string {
  return JSON.stringify(analysis, null, 2);
}
