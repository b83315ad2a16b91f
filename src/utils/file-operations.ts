/**
 * Safe file write utilities and output path helpers.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

/** Suffix appended to the input file stem for the default JSON output. */
const OUTPUT_SUFFIX = '-repeats';

// ── Path helpers ─────────────────────────────────────────────────────────────

/**
 * Default JSON output path for an input file:
 * `results/run.json` → `results/run-repeats.json`.
 */
export function getDefaultOutputPath(inputPath: string): string {
  const { dir, name, ext } = path.parse(inputPath);
  return path.join(dir, `${name}${OUTPUT_SUFFIX}${ext}`);
}

// ── Directory helpers ────────────────────────────────────────────────────────

/**
 * Ensure a directory exists, creating it (and parents) if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

// ── Write helpers ────────────────────────────────────────────────────────────

/**
 * Write text content to a file, creating parent directories as needed.
 */
export async function writeFileSafe(
  filePath: string,
  content: string,
): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, content, 'utf-8');
}

/**
 * Write a JSON-serialisable value to a file (pretty-printed).
 */
export async function writeJsonFile(
  filePath: string,
  data: unknown,
): Promise<void> {
  const json = JSON.stringify(data, null, 2) + '\n';
  await writeFileSafe(filePath, json);
}

// ── File existence ───────────────────────────────────────────────────────────

/**
 * Check whether a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
