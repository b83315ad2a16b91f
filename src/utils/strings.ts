/**
 * Shared string utility helpers.
 */

/** Cut a string to `max` code points, appending `...` if anything was cut. */
export function preview(s: string, max: number): string {
  const chars = Array.from(s);
  if (chars.length <= max) return s;
  return chars.slice(0, max).join('') + '...';
}

/** Format `part / whole` as a percentage with one decimal, e.g. `42.9%`. */
export function percent(part: number, whole: number): string {
  if (whole === 0) return '0.0%';
  return `${((part / whole) * 100).toFixed(1)}%`;
}

/** `1 entry`, `2 entries`. */
export function pluralize(n: number, singular: string, plural = `${singular}s`): string {
  return `${n} ${n === 1 ? singular : plural}`;
}

/** Render an arbitrary answer value for display. */
export function formatValue(value: unknown): string {
  if (value === undefined) return 'n/a';
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

/** Length of a string in code points. */
export function charLength(s: string): number {
  return Array.from(s).length;
}
