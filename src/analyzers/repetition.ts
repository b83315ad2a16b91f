/**
 * Repeating-pattern detection.
 *
 * Scans a text offset by offset for the longest substring that still repeats
 * at least `minOccurrences` times, claiming the spans of every reported match
 * so later offsets inside them are skipped. Matches are ranked by frequency
 * first, then by length.
 *
 * Offsets, lengths and positions count Unicode code points, so a candidate
 * never starts or ends inside a surrogate pair.
 */

import type {
  AtomicDecomposition,
  OverlapPolicy,
  PatternMatch,
} from '../types/index.js';

// ── Options ─────────────────────────────────────────────────────────────────

/** Configuration for {@link findRepeatingPatterns}. */
export interface DetectOptions {
  /** Occurrence counting policy. Default: `'non-overlapping'` */
  overlapPolicy?: OverlapPolicy;
}

/** A match together with the offset it was discovered from. */
export interface DiscoveredPattern extends PatternMatch {
  /** Code-point offset whose scan produced this match. */
  start: number;
  /** Pattern length in code points. */
  length: number;
}

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Find maximal repeating substrings in `text`.
 *
 * Steps:
 *  1. Bail out when the text cannot hold `minOccurrences` copies of `minLength`.
 *  2. For each unclaimed offset, grow the candidate while it still repeats.
 *  3. Record the longest qualifying candidate and claim its occurrence spans.
 *  4. Sort by count desc, then pattern length desc.
 *
 * @throws RangeError when `minLength < 1` or `minOccurrences < 2`.
 */
export function findRepeatingPatterns(
  text: string,
  minLength: number,
  minOccurrences: number,
  options?: DetectOptions,
): PatternMatch[] {
  const discovered = discoverRepeatingPatterns(text, minLength, minOccurrences, options);

  discovered.sort((a, b) => {
    if (b.count !== a.count) return b.count - a.count;
    return b.length - a.length;
  });

  return discovered.map(({ pattern, count, positions }) => ({ pattern, count, positions }));
}

/**
 * Steps 1-3 of {@link findRepeatingPatterns}, returning matches in discovery
 * order with the offset each one was grown from.
 *
 * A match never starts at an offset claimed by an earlier match. Its
 * occurrences are searched over the whole text, so they may still fall
 * inside claimed spans.
 */
export function discoverRepeatingPatterns(
  text: string,
  minLength: number,
  minOccurrences: number,
  options?: DetectOptions,
): DiscoveredPattern[] {
  assertThresholds(minLength, minOccurrences);
  const policy = options?.overlapPolicy ?? 'non-overlapping';

  const index = new CodePointIndex(text);
  const total = index.length;
  if (total < minLength * minOccurrences) return [];

  const claimed = new Uint8Array(total);
  const results: DiscoveredPattern[] = [];

  for (let start = 0; start <= total - minLength; start++) {
    if (claimed[start]) continue;

    let length = minLength;
    let best: DiscoveredPattern | null = null;

    while (start + length <= total) {
      const candidate = index.slice(start, start + length);
      const positions = scanOccurrences(text, candidate, policy, index);
      if (positions.length < minOccurrences) break;

      best = { pattern: candidate, count: positions.length, positions, start, length };
      length++;
    }

    if (best) {
      results.push(best);
      for (const pos of best.positions) {
        claimed.fill(1, pos, pos + best.length);
      }
    }
  }

  return results;
}

/**
 * Return every code-point offset where `pattern` starts in `text`, scanning
 * left to right.
 *
 * Non-overlapping scans resume after the end of each hit; overlapping scans
 * resume one character later.
 */
export function findAllOccurrences(
  text: string,
  pattern: string,
  overlapPolicy: OverlapPolicy = 'non-overlapping',
): number[] {
  return scanOccurrences(text, pattern, overlapPolicy, new CodePointIndex(text));
}

/**
 * Find the smallest leading unit that `pattern` is made of.
 *
 * A unit qualifies when its whole repeats rebuild the pattern prefix and any
 * trailing remainder equals the start of the unit. Returns `null` when the
 * pattern has no shorter repeating unit.
 */
export function findInternalRepetition(
  pattern: string,
): AtomicDecomposition | null {
  const chars = Array.from(pattern);
  const len = chars.length;
  const prefix = (n: number): string => chars.slice(0, n).join('');

  for (let unitLength = 1; unitLength <= Math.floor(len / 2); unitLength++) {
    const unit = prefix(unitLength);
    const fullRepeats = Math.floor(len / unitLength);

    if (unit.repeat(fullRepeats) !== prefix(fullRepeats * unitLength)) {
      continue;
    }

    const remainder = len % unitLength;
    if (
      remainder === 0 ||
      chars.slice(len - remainder).join('') === prefix(remainder)
    ) {
      return {
        unit,
        repetitions: len / unitLength,
        isExact: remainder === 0,
      };
    }
  }

  return null;
}

// ── Internal helpers ────────────────────────────────────────────────────────

/** Maps between UTF-16 offsets and code-point offsets of one text. */
class CodePointIndex {
  /** UTF-16 offset of each code point, plus the text length at the end. */
  private readonly offsets: number[] = [];
  /** Code-point offset for each UTF-16 offset; -1 inside a surrogate pair. */
  private readonly toCodePoint: Int32Array;

  constructor(private readonly text: string) {
    this.toCodePoint = new Int32Array(text.length + 1).fill(-1);
    let unit = 0;
    for (const ch of text) {
      this.toCodePoint[unit] = this.offsets.length;
      this.offsets.push(unit);
      unit += ch.length;
    }
    this.toCodePoint[text.length] = this.offsets.length;
    this.offsets.push(text.length);
  }

  /** Number of code points. */
  get length(): number {
    return this.offsets.length - 1;
  }

  /** Substring between two code-point offsets. */
  slice(from: number, to: number): string {
    return this.text.slice(this.offsets[from], this.offsets[to]);
  }

  /** Code-point offset of a UTF-16 offset, or -1 if it splits a pair. */
  codePointAt(unit: number): number {
    return this.toCodePoint[unit];
  }

  /** UTF-16 offset of a code-point offset. */
  unitAt(codePoint: number): number {
    return this.offsets[codePoint];
  }
}

function scanOccurrences(
  text: string,
  pattern: string,
  overlapPolicy: OverlapPolicy,
  index: CodePointIndex,
): number[] {
  if (pattern.length === 0) return [];

  const positions: number[] = [];
  let unit = text.indexOf(pattern);

  while (unit !== -1) {
    const codePoint = index.codePointAt(unit);
    if (codePoint === -1 || index.codePointAt(unit + pattern.length) === -1) {
      // Hit splits a surrogate pair.
      unit = text.indexOf(pattern, unit + 1);
      continue;
    }

    positions.push(codePoint);
    const next =
      overlapPolicy === 'overlapping' ? index.unitAt(codePoint + 1) : unit + pattern.length;
    unit = text.indexOf(pattern, next);
  }

  return positions;
}

function assertThresholds(minLength: number, minOccurrences: number): void {
  if (!Number.isInteger(minLength) || minLength < 1) {
    throw new RangeError(`minLength must be an integer >= 1 (got ${minLength})`);
  }
  if (!Number.isInteger(minOccurrences) || minOccurrences < 2) {
    throw new RangeError(
      `minOccurrences must be an integer >= 2 (got ${minOccurrences})`,
    );
  }
}
