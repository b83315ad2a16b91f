/**
 * Benchmark results file loader.
 *
 * Expects a JSON document of the form `{ "results": [ ... ] }`. Individual
 * records are not validated here; malformed records are skipped later by
 * {@link analyzeRecords}.
 */

import fs from 'node:fs/promises';

// ── Error types ─────────────────────────────────────────────────────────────

/** Thrown when the results file is missing, unparseable or has no `results` array. */
export class ResultsFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResultsFileError';
  }
}

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Parse the contents of a results file and return its `results` array.
 *
 * @param content - Raw file contents.
 * @param source  - File path, used in error messages.
 */
export function parseResultsJson(content: string, source: string): unknown[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ResultsFileError(`Invalid JSON in file ${source}: ${detail}`);
  }

  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('results' in parsed) ||
    !Array.isArray(parsed.results)
  ) {
    throw new ResultsFileError("JSON file must contain a 'results' array");
  }

  return parsed.results;
}

/** Read a results file from disk and return its `results` array. */
export async function parseResultsFile(filePath: string): Promise<unknown[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new ResultsFileError(`Could not find file: ${filePath}`);
    }
    throw err;
  }

  return parseResultsJson(content, filePath);
}

// ── Internal helpers ────────────────────────────────────────────────────────

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
