import { describe, it, expect } from 'vitest';
import {
  discoverRepeatingPatterns,
  findAllOccurrences,
  findInternalRepetition,
  findRepeatingPatterns,
} from '../../src/analyzers/repetition.js';
import type { PatternMatch } from '../../src/types/index.js';

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Deterministic pseudo-random text over a small alphabet. */
function makeText(seed: number, length: number, alphabet: string): string {
  let state = seed;
  let out = '';
  for (let i = 0; i < length; i++) {
    state = (state * 16807) % 2147483647;
    out += alphabet[state % alphabet.length];
  }
  return out;
}

function expectWellFormed(
  text: string,
  matches: PatternMatch[],
  minLength: number,
  minOccurrences: number,
): void {
  for (const m of matches) {
    expect(m.pattern.length).toBeGreaterThanOrEqual(minLength);
    expect(m.count).toBeGreaterThanOrEqual(minOccurrences);
    expect(m.positions).toHaveLength(m.count);

    for (let i = 0; i < m.positions.length; i++) {
      const pos = m.positions[i];
      expect(text.slice(pos, pos + m.pattern.length)).toBe(m.pattern);
      if (i > 0) {
        expect(m.positions[i - 1] + m.pattern.length).toBeLessThanOrEqual(pos);
      }
    }
  }

  for (let i = 1; i < matches.length; i++) {
    const prev = matches[i - 1];
    const cur = matches[i];
    expect(
      prev.count > cur.count ||
        (prev.count === cur.count && prev.pattern.length >= cur.pattern.length),
    ).toBe(true);
  }
}

// ── findAllOccurrences ──────────────────────────────────────────────────────

describe('findAllOccurrences', () => {
  it('counts non-overlapping occurrences by default', () => {
    expect(findAllOccurrences('aaaa', 'aa')).toEqual([0, 2]);
  });

  it('counts overlapping occurrences when asked', () => {
    expect(findAllOccurrences('aaaa', 'aa', 'overlapping')).toEqual([0, 1, 2]);
  });

  it('returns empty array when the pattern is absent', () => {
    expect(findAllOccurrences('abc', 'd')).toEqual([]);
  });

  it('returns empty array for an empty pattern', () => {
    expect(findAllOccurrences('abc', '')).toEqual([]);
  });

  it('resumes the scan after each hit', () => {
    expect(findAllOccurrences('abaXabaXaba', 'aba')).toEqual([0, 4, 8]);
  });

  it('reports positions in code points', () => {
    expect(findAllOccurrences('😀x😀y😀z', '😀')).toEqual([0, 2, 4]);
    expect(findAllOccurrences('😀😀😀', '😀😀')).toEqual([0]);
    expect(findAllOccurrences('😀😀😀', '😀😀', 'overlapping')).toEqual([0, 1]);
  });

  it('ignores hits that split a surrogate pair', () => {
    expect(findAllOccurrences('😀', '\uDE00')).toEqual([]);
    expect(findAllOccurrences('😀', '\uD83D')).toEqual([]);
  });
});

// ── findRepeatingPatterns ───────────────────────────────────────────────────

describe('findRepeatingPatterns', () => {
  it('returns empty array when text is shorter than minLength * minOccurrences', () => {
    expect(findRepeatingPatterns('abab', 2, 3)).toEqual([]);
    expect(findRepeatingPatterns('', 1, 2)).toEqual([]);
  });

  it('extends "ab" to the longest pattern that still repeats enough', () => {
    expect(findRepeatingPatterns('abababababab', 2, 3)).toEqual([
      { pattern: 'abab', count: 3, positions: [0, 4, 8] },
    ]);
  });

  it('returns empty array when nothing repeats', () => {
    expect(findRepeatingPatterns('abcdefghij', 2, 2)).toEqual([]);
  });

  it('skips offsets claimed by an earlier match', () => {
    expect(findRepeatingPatterns('abcabcabc', 2, 3)).toEqual([
      { pattern: 'abc', count: 3, positions: [0, 3, 6] },
    ]);
  });

  it('reports separate regions as separate matches, most frequent first', () => {
    const text = 'abcabcabcabc' + '0123456789' + 'xyxyxyxyxy';

    expect(findRepeatingPatterns(text, 2, 3)).toEqual([
      { pattern: 'xy', count: 5, positions: [22, 24, 26, 28, 30] },
      { pattern: 'abc', count: 4, positions: [0, 3, 6, 9] },
    ]);
  });

  it('breaks count ties by pattern length', () => {
    const text = 'xy1xy2xy3klmn4klmn5klmn6';

    expect(findRepeatingPatterns(text, 2, 3)).toEqual([
      { pattern: 'klmn', count: 3, positions: [9, 14, 19] },
      { pattern: 'xy', count: 3, positions: [0, 3, 6] },
    ]);
  });

  it('overlapping policy inflates counts for periodic text', () => {
    expect(findRepeatingPatterns('aaaaaa', 2, 3)).toEqual([
      { pattern: 'aa', count: 3, positions: [0, 2, 4] },
    ]);
    expect(
      findRepeatingPatterns('aaaaaa', 2, 3, { overlapPolicy: 'overlapping' }),
    ).toEqual([{ pattern: 'aaaa', count: 3, positions: [0, 1, 2] }]);
  });

  it('finds a loop inside a longer response', () => {
    const loop = 'I need to check again. ';
    const text = 'Let me think. ' + loop.repeat(6) + 'The answer is 7.';

    expect(findRepeatingPatterns(text, 10, 5)).toEqual([
      {
        pattern: '. I need to check again',
        count: 6,
        positions: [12, 35, 58, 81, 104, 127],
      },
    ]);
  });

  it('never reports half of an astral character', () => {
    expect(findRepeatingPatterns('\u{1F600}a\u{1F601}b\u{1F602}c', 1, 3)).toEqual([]);
  });

  it('measures offsets and lengths in code points', () => {
    expect(findRepeatingPatterns('😀x😀y😀z', 1, 3)).toEqual([
      { pattern: '😀', count: 3, positions: [0, 2, 4] },
    ]);
    expect(findRepeatingPatterns('🔁ab'.repeat(4), 2, 4)).toEqual([
      { pattern: '🔁ab', count: 4, positions: [0, 3, 6, 9] },
    ]);
  });

  it('applies the short-text bail-out to code points', () => {
    // 4 code points, 8 UTF-16 units
    expect(findRepeatingPatterns('😀😀😀😀', 2, 3)).toEqual([]);
  });

  it('rejects invalid thresholds', () => {
    expect(() => findRepeatingPatterns('abc', 0, 2)).toThrow(RangeError);
    expect(() => findRepeatingPatterns('abc', 2, 1)).toThrow(RangeError);
    expect(() => findRepeatingPatterns('abc', 2.5, 2)).toThrow(RangeError);
  });

  it('produces well-formed, sorted results on arbitrary text', () => {
    for (const seed of [1, 7, 42, 1234]) {
      const text = makeText(seed, 80, 'ab');
      for (const [minLength, minOccurrences] of [[2, 3], [3, 2], [4, 4]]) {
        const matches = findRepeatingPatterns(text, minLength, minOccurrences);
        expectWellFormed(text, matches, minLength, minOccurrences);
      }
    }
  });

  it('is idempotent', () => {
    const text = makeText(99, 120, 'abc');
    expect(findRepeatingPatterns(text, 3, 3)).toEqual(findRepeatingPatterns(text, 3, 3));
  });
});

// ── discoverRepeatingPatterns ───────────────────────────────────────────────

describe('discoverRepeatingPatterns', () => {
  it('lets occurrences reach into spans claimed by earlier matches', () => {
    expect(discoverRepeatingPatterns('ababba', 2, 2)).toEqual([
      { pattern: 'ab', count: 2, positions: [0, 2], start: 0, length: 2 },
      { pattern: 'ba', count: 2, positions: [1, 4], start: 4, length: 2 },
    ]);
  });

  it('never starts a match at an offset claimed by an earlier match', () => {
    for (const seed of [1, 7, 42, 1234, 98765]) {
      const text = makeText(seed, 80, 'ab');
      for (const [minLength, minOccurrences] of [[2, 3], [3, 2], [4, 4]]) {
        const claimed = new Set<number>();
        let lastStart = -1;

        for (const m of discoverRepeatingPatterns(text, minLength, minOccurrences)) {
          expect(claimed.has(m.start)).toBe(false);
          expect(m.start).toBeGreaterThan(lastStart);
          expect(text.slice(m.start, m.start + m.length)).toBe(m.pattern);

          lastStart = m.start;
          for (const pos of m.positions) {
            for (let i = pos; i < pos + m.length; i++) claimed.add(i);
          }
        }
      }
    }
  });

  it('holds the same matches findRepeatingPatterns sorts', () => {
    const text = makeText(5, 90, 'abc');
    const discovered = discoverRepeatingPatterns(text, 2, 3).map(
      ({ pattern, count, positions }) => ({ pattern, count, positions }),
    );

    expect(findRepeatingPatterns(text, 2, 3)).toEqual(
      expect.arrayContaining(discovered),
    );
    expect(findRepeatingPatterns(text, 2, 3)).toHaveLength(discovered.length);
  });
});

// ── findInternalRepetition ──────────────────────────────────────────────────

describe('findInternalRepetition', () => {
  it('finds the atomic unit of an exact repetition', () => {
    expect(findInternalRepetition('xyzxyzxyzxyz')).toEqual({
      unit: 'xyz',
      repetitions: 4,
      isExact: true,
    });
  });

  it('returns the smallest unit rather than any unit', () => {
    expect(findInternalRepetition('abababab')).toEqual({
      unit: 'ab',
      repetitions: 4,
      isExact: true,
    });
    expect(findInternalRepetition('aaaa')?.unit).toBe('a');
  });

  it('accepts a partial trailing repetition', () => {
    const result = findInternalRepetition('abcabca');

    expect(result?.unit).toBe('abc');
    expect(result?.repetitions).toBeCloseTo(7 / 3);
    expect(result?.isExact).toBe(false);
  });

  it('reports fractional repetitions for a half unit', () => {
    expect(findInternalRepetition('ababa')).toEqual({
      unit: 'ab',
      repetitions: 2.5,
      isExact: false,
    });
  });

  it('counts units in code points', () => {
    expect(findInternalRepetition('🙂🙃🙂🙃🙂')).toEqual({
      unit: '🙂🙃',
      repetitions: 2.5,
      isExact: false,
    });
  });

  it('returns null for atomic patterns', () => {
    expect(findInternalRepetition('abcd')).toBeNull();
    expect(findInternalRepetition('abaab')).toBeNull();
  });

  it('returns null for patterns shorter than two characters', () => {
    expect(findInternalRepetition('a')).toBeNull();
    expect(findInternalRepetition('')).toBeNull();
  });

  it('rebuilds exact patterns from unit and repetitions', () => {
    for (const pattern of ['xyzxyzxyzxyz', 'abababab', 'aaaa', 'hello hello ']) {
      const result = findInternalRepetition(pattern);
      expect(result?.isExact).toBe(true);
      if (result) {
        expect(result.unit.repeat(result.repetitions)).toBe(pattern);
      }
    }
  });
});
